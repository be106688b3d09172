import type { VariableValue } from '../inventory/types';
import type { DeviceRecord, TemplateAttachPayload, TemplateVariableValue, VariableEntry } from '../manager/types';

// Projected into the fixed keys, never copied through
const RESERVED_VARIABLES = new Set(['system_ip', 'site_id']);

export interface TemplateAttachInput {
	deviceId: string;
	templateId: string;
	device?: DeviceRecord;
	variables: Record<string, VariableValue>;
}

/**
 * Build the flat variable record the manager expects for a feature-template attach.
 */
export function buildTemplateAttachPayload(input: TemplateAttachInput): TemplateAttachPayload {
	const { deviceId, templateId, device, variables } = input;
	const systemIp = variables['system_ip'] === undefined ? '' : String(variables['system_ip']);
	const siteId = variables['site_id'] === undefined ? '' : String(variables['site_id']);
	const hostName = device?.hostName || `Edge${siteId}`;

	const record: Record<string, TemplateVariableValue> = {
		'csv-status': 'complete',
		'csv-deviceId': deviceId,
		'csv-deviceIP': device?.managementIp || systemIp,
		'csv-host-name': hostName,
		'//system/host-name': hostName,
		'//system/system-ip': systemIp,
		'//system/site-id': siteId,
		'csv-templateId': templateId,
	};

	for (const [name, value] of Object.entries(variables)) {
		if (!RESERVED_VARIABLES.has(name)) {
			record[name] = value;
		}
	}

	return {
		deviceTemplateList: [
			{
				templateId,
				device: [record],
				isEdited: false,
				isMasterEdited: false,
			},
		],
	};
}

export function toVariableEntries(variables: Record<string, VariableValue>): VariableEntry[] {
	return Object.entries(variables).map(([name, value]) => ({ name, value }));
}
