import { z } from 'zod';

/**
 * Response shapes read from the manager's dataservice API.
 * Only the fields the onboarder uses are declared; everything else passes through.
 */

export const RemoteDeviceSchema = z.object({
	uuid: z.string(),
	deviceIP: z.string().optional(),
	'host-name': z.string().optional(),
	reachability: z.string().optional(),
	certInstallStatus: z.string().optional(),
	serialNumber: z.string().optional(),
	'board-serial': z.string().optional(),
	chasisNumber: z.string().optional(),
	personality: z.string().optional(),
}).passthrough();

export type RemoteDevice = z.infer<typeof RemoteDeviceSchema>;

export const DeviceListResponseSchema = z.object({
	data: z.array(RemoteDeviceSchema),
});

export const AttachedConfigResponseSchema = z.object({
	config: z.string().default(''),
});

export const TemplateListResponseSchema = z.object({
	data: z.array(z.object({
		templateId: z.string(),
		templateName: z.string(),
	}).passthrough()),
});

export const ConfigGroupListResponseSchema = z.array(z.object({
	id: z.string(),
	name: z.string(),
}).passthrough());

export const TaskSubmissionResponseSchema = z.object({
	id: z.string().optional(),
}).passthrough();

export const TaskStatusResponseSchema = z.object({
	summary: z.object({
		status: z.string().optional(),
	}).passthrough().optional(),
}).passthrough();

export const ServerInfoResponseSchema = z.object({
	data: z.object({
		platformVersion: z.string(),
	}).passthrough(),
});

// Unset hierarchy fields come back as null
const unset = <T extends z.ZodTypeAny>(schema: T) =>
	schema.nullish().transform((value): z.output<T> | undefined => value ?? undefined);

export const HierarchyNodeSchema = z.object({
	name: z.string(),
	uuid: unset(z.string()),
	description: unset(z.string()),
	data: z.object({
		parentUuid: unset(z.string()),
		label: z.string(),
		isSecondary: unset(z.boolean()),
		hierarchyId: z.object({
			regionId: unset(z.number()),
			subRegionId: unset(z.number()),
		}).default({}),
	}),
});

export const HierarchyListResponseSchema = z.array(HierarchyNodeSchema);

export const CatalogDefinitionSchema = z.record(z.unknown());
