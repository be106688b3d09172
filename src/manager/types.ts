/**
 * Manager client contract
 * =======================
 *
 * Operations the onboarder consumes from the remote SD-WAN manager.
 * ManagerHttpClient implements them over the manager's REST API;
 * tests substitute an in-process fake.
 */

export type DeviceCategory = 'controllers' | 'vedges';

export type DevicePersonality = 'vsmart' | 'vbond';

export interface DeviceRecord {
	id: string;
	managementIp?: string;
	serialNumber?: string;
	reachability?: string;
	certificateStatus?: string;
	hostName?: string;
	personality?: string;
}

/**
 * Snapshot read on every poll tick; never cached between ticks.
 */
export interface DeviceRuntimeState {
	reachability?: string;
	certificateStatus?: string;
}

export interface DeviceCreationRequest {
	deviceIp: string;
	username: string;
	password: string;
	personality: DevicePersonality;
	generateCsr: boolean;
}

export interface NamedArtifact {
	id: string;
	name: string;
}

export interface ManagerResponse<T = unknown> {
	status: number;
	data: T;
	text: string;
}

export type TemplateVariableValue = string | number | boolean;

export interface TemplateAttachPayload {
	deviceTemplateList: Array<{
		templateId: string;
		device: Array<Record<string, TemplateVariableValue>>;
		isEdited: boolean;
		isMasterEdited: boolean;
	}>;
}

export interface VariableEntry {
	name: string;
	value: TemplateVariableValue;
}

export interface JobStatusReport {
	status?: string;
	raw: unknown;
}

export interface HierarchyNode {
	name: string;
	uuid?: string;
	description?: string;
	data: {
		parentUuid?: string;
		label: string;
		isSecondary?: boolean;
		hierarchyId: {
			regionId?: number;
			subRegionId?: number;
		};
	};
}

export type CatalogDefinition = Record<string, unknown>;

export interface ManagerClient {
	createDevice(request: DeviceCreationRequest): Promise<void>;
	listDevices(category: DeviceCategory): Promise<DeviceRecord[]>;
	getDeviceState(deviceId: string): Promise<DeviceRuntimeState>;
	getAttachedConfigText(deviceId: string): Promise<string>;

	listTemplates(): Promise<NamedArtifact[]>;
	submitTemplateAttach(payload: TemplateAttachPayload): Promise<ManagerResponse>;
	listConfigGroups(): Promise<NamedArtifact[]>;
	associateDevice(groupId: string, deviceId: string): Promise<ManagerResponse>;
	pushVariables(groupId: string, deviceId: string, variables: VariableEntry[]): Promise<ManagerResponse>;
	getJobStatus(jobId: string): Promise<JobStatusReport>;

	getServerVersion(): Promise<string>;
	getNetworkHierarchy(): Promise<HierarchyNode[]>;
	createNetworkHierarchy(node: HierarchyNode): Promise<void>;

	getTemplateDefinition(templateId: string): Promise<CatalogDefinition>;
	createTemplate(definition: CatalogDefinition): Promise<void>;
	getConfigGroup(groupId: string): Promise<CatalogDefinition>;
	createConfigGroup(definition: CatalogDefinition): Promise<void>;

	logout(): Promise<void>;
}
