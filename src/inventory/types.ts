import { z } from 'zod';

// ============================================================================
// Inventory file schema (snake_case keys, as written by operators)
// ============================================================================

const VariableValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const ManagerEndpointSchema = z.object({
	url: z.string().regex(/^https?:\/\//, 'URL must start with http:// or https://'),
	username: z.string().min(1),
	password: z.string(),
	port: z.number().int().positive().default(443),
	verify: z.boolean().default(false),
});

export const ControlComponentFileSchema = z.object({
	ip: z.string().min(1),
	password: z.string().optional(),
	site_id: z.number().int().optional(),
	system_ip: z.string().optional(),
	hostname: z.string().optional(),
});

export const EdgeFileSchema = z.object({
	serial: z.string().min(1),
	system_ip: z.string().min(1),
	site_id: z.number().int(),
	template_name: z.string().optional(),
	config_group: z.string().optional(),
	values: z.record(VariableValueSchema).default({}),
}).refine(
	(edge) => !(edge.template_name && edge.config_group),
	{ message: 'template_name and config_group are mutually exclusive' }
);

export const InventoryFileSchema = z.object({
	manager: ManagerEndpointSchema,
	controllers: z.array(ControlComponentFileSchema).default([]),
	validators: z.array(ControlComponentFileSchema).default([]),
	edges: z.array(EdgeFileSchema).default([]),
});

export type InventoryFile = z.infer<typeof InventoryFileSchema>;
export type ControlComponentFile = z.infer<typeof ControlComponentFileSchema>;
export type EdgeFile = z.infer<typeof EdgeFileSchema>;

// ============================================================================
// Domain model
// ============================================================================

export type ManagerEndpoint = Readonly<z.infer<typeof ManagerEndpointSchema>>;

export type VariableValue = z.infer<typeof VariableValueSchema>;

interface ControlComponentFields {
	ip: string;
	password?: string;
	siteId?: number;
	systemIp?: string;
	hostname?: string;
}

export interface ControllerSpec extends ControlComponentFields {
	kind: 'controller';
}

export interface ValidatorSpec extends ControlComponentFields {
	kind: 'validator';
}

export type ControlComponentSpec = ControllerSpec | ValidatorSpec;

/**
 * Legacy device template or configuration group; an edge carries at most one.
 */
export type EdgeAttachment =
	| { type: 'template'; name: string }
	| { type: 'config-group'; name: string };

export interface EdgeSpec {
	kind: 'edge';
	serial: string;
	systemIp: string;
	siteId: number;
	attachment?: EdgeAttachment;
	values: Record<string, VariableValue>;
}

export type DeviceSpec = ControllerSpec | ValidatorSpec | EdgeSpec;

export type DeviceKind = DeviceSpec['kind'];

export interface DeviceInventory {
	manager: ManagerEndpoint;
	controllers: ControllerSpec[];
	validators: ValidatorSpec[];
	edges: EdgeSpec[];
}

export interface OnboardingResult {
	controllers: string[];
	validators: string[];
	edges: string[];
}
