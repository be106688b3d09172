/**
 * Device inventory persistence
 * ============================
 *
 * Converts between the YAML inventory file (snake_case, one list per device
 * class) and the typed DeviceInventory used by the onboarder.
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { InventoryValidationError, errorMessage } from '../errors';
import {
	ControlComponentFile,
	ControllerSpec,
	DeviceInventory,
	EdgeFile,
	EdgeSpec,
	InventoryFile,
	InventoryFileSchema,
	ValidatorSpec,
} from './types';

function formatIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
		return `${location}: ${issue.message}`;
	});
}

function toControlFields(file: ControlComponentFile) {
	return {
		ip: file.ip,
		password: file.password,
		siteId: file.site_id,
		systemIp: file.system_ip,
		hostname: file.hostname,
	};
}

function toEdgeSpec(file: EdgeFile): EdgeSpec {
	const edge: EdgeSpec = {
		kind: 'edge',
		serial: file.serial,
		systemIp: file.system_ip,
		siteId: file.site_id,
		values: { ...file.values },
	};
	if (file.template_name) {
		edge.attachment = { type: 'template', name: file.template_name };
	} else if (file.config_group) {
		edge.attachment = { type: 'config-group', name: file.config_group };
	}
	return edge;
}

/**
 * Validate raw inventory data (as loaded from YAML or JSON)
 */
export function parseInventory(data: unknown): DeviceInventory {
	const result = InventoryFileSchema.safeParse(data);
	if (!result.success) {
		throw new InventoryValidationError('Invalid device inventory', formatIssues(result.error));
	}

	const file = result.data;
	return {
		manager: Object.freeze({ ...file.manager }),
		controllers: file.controllers.map((c): ControllerSpec => ({ kind: 'controller', ...toControlFields(c) })),
		validators: file.validators.map((v): ValidatorSpec => ({ kind: 'validator', ...toControlFields(v) })),
		edges: file.edges.map(toEdgeSpec),
	};
}

function fromControlSpec(spec: ControllerSpec | ValidatorSpec): ControlComponentFile {
	return {
		ip: spec.ip,
		password: spec.password,
		site_id: spec.siteId,
		system_ip: spec.systemIp,
		hostname: spec.hostname,
	};
}

function fromEdgeSpec(spec: EdgeSpec): EdgeFile {
	return {
		serial: spec.serial,
		system_ip: spec.systemIp,
		site_id: spec.siteId,
		template_name: spec.attachment?.type === 'template' ? spec.attachment.name : undefined,
		config_group: spec.attachment?.type === 'config-group' ? spec.attachment.name : undefined,
		values: { ...spec.values },
	};
}

export function toInventoryFile(inventory: DeviceInventory): InventoryFile {
	return {
		manager: { ...inventory.manager },
		controllers: inventory.controllers.map(fromControlSpec),
		validators: inventory.validators.map(fromControlSpec),
		edges: inventory.edges.map(fromEdgeSpec),
	};
}

/**
 * Serialize an inventory to YAML. Unset optional fields are omitted.
 */
export function dumpInventory(inventory: DeviceInventory): string {
	return yaml.dump(toInventoryFile(inventory), { sortKeys: false, noRefs: true, skipInvalid: true });
}

export function loadInventory(path: string): DeviceInventory {
	if (!fs.existsSync(path)) {
		throw new InventoryValidationError(`File not found: ${path}`);
	}

	let data: unknown;
	try {
		data = yaml.load(fs.readFileSync(path, 'utf-8'));
	} catch (error) {
		throw new InventoryValidationError(`Failed to parse ${path}: ${errorMessage(error)}`);
	}
	return parseInventory(data);
}

export function saveInventory(inventory: DeviceInventory, path: string): void {
	fs.writeFileSync(path, dumpInventory(inventory), 'utf-8');
}

export function totalDevices(inventory: DeviceInventory): number {
	return inventory.controllers.length + inventory.validators.length + inventory.edges.length;
}

export function controlComponentCount(inventory: DeviceInventory): number {
	return inventory.controllers.length + inventory.validators.length;
}
