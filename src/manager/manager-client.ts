/**
 * Manager HTTP Client
 * ===================
 *
 * axios implementation of ManagerClient against the SD-WAN manager's REST API.
 *
 * Authentication follows the manager's two-step scheme:
 * 1. POST j_security_check with form credentials -> session cookie
 * 2. GET dataservice/client/token -> XSRF token sent on every later call
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import * as https from 'https';
import { z } from 'zod';
import { ManagerRequestError } from '../errors';
import type { ManagerEndpoint } from '../inventory/types';
import { buildBaseUrl, buildDataservicePath } from './endpoint-utils';
import {
	AttachedConfigResponseSchema,
	CatalogDefinitionSchema,
	ConfigGroupListResponseSchema,
	DeviceListResponseSchema,
	HierarchyListResponseSchema,
	RemoteDevice,
	ServerInfoResponseSchema,
	TaskStatusResponseSchema,
	TemplateListResponseSchema,
} from './schemas';
import type {
	CatalogDefinition,
	DeviceCategory,
	DeviceCreationRequest,
	DeviceRecord,
	DeviceRuntimeState,
	HierarchyNode,
	JobStatusReport,
	ManagerClient,
	ManagerResponse,
	NamedArtifact,
	TemplateAttachPayload,
	VariableEntry,
} from './types';

export interface ManagerClientOptions {
	requestTimeout?: number; // ms
	/** Replaces axios' HTTP transport */
	adapter?: AxiosAdapter;
}

const DEVICE_CATEGORIES: readonly DeviceCategory[] = ['controllers', 'vedges'];

export function toDeviceRecord(device: RemoteDevice): DeviceRecord {
	return {
		id: device.uuid,
		managementIp: device.deviceIP,
		serialNumber: device.serialNumber ?? device['board-serial'] ?? device.chasisNumber,
		reachability: device.reachability,
		certificateStatus: device.certInstallStatus,
		hostName: device['host-name'],
		personality: device.personality,
	};
}

function responseText(data: unknown): string {
	if (typeof data === 'string') {
		return data;
	}
	return data === undefined ? '' : JSON.stringify(data);
}

export class ManagerHttpClient implements ManagerClient {
	private readonly http: AxiosInstance;

	constructor(
		private readonly endpoint: ManagerEndpoint,
		options: ManagerClientOptions = {}
	) {
		this.http = axios.create({
			baseURL: buildBaseUrl(endpoint.url, endpoint.port),
			timeout: options.requestTimeout ?? 30000,
			httpsAgent: new https.Agent({ rejectUnauthorized: endpoint.verify }),
			headers: {
				'Content-Type': 'application/json',
			},
			// Status codes are checked per call
			validateStatus: () => true,
			adapter: options.adapter,
		});
	}

	/**
	 * Open an authenticated session
	 */
	async login(): Promise<void> {
		const form = new URLSearchParams({
			j_username: this.endpoint.username,
			j_password: this.endpoint.password,
		});

		const response = await this.http.post<unknown>('/j_security_check', form.toString(), {
			headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
			maxRedirects: 0,
		});

		if (response.status === 401 || response.status === 403) {
			throw new ManagerRequestError(
				`Unauthorized: login rejected for user '${this.endpoint.username}'`,
				response.status
			);
		}
		if (response.status >= 400) {
			throw new ManagerRequestError(
				`Login returned ${response.status}`,
				response.status,
				responseText(response.data)
			);
		}
		// A rejected login is answered with the HTML login page
		if (/<html/i.test(responseText(response.data))) {
			throw new ManagerRequestError(
				`Unauthorized: login rejected for user '${this.endpoint.username}'`,
				401
			);
		}

		const rawCookies: unknown = response.headers['set-cookie'];
		const cookies = Array.isArray(rawCookies)
			? rawCookies.filter((cookie): cookie is string => typeof cookie === 'string')
			: [];
		const sessionCookie = cookies.map((cookie) => cookie.split(';')[0]).join('; ');
		if (!sessionCookie) {
			throw new ManagerRequestError('Unauthorized: manager returned no session cookie', 401);
		}
		this.http.defaults.headers.common['Cookie'] = sessionCookie;

		const tokenResponse = await this.http.get<unknown>(buildDataservicePath('/client/token'), {
			responseType: 'text',
		});
		this.assertOk(tokenResponse, 'GET /client/token');
		this.http.defaults.headers.common['X-XSRF-TOKEN'] = responseText(tokenResponse.data).trim();
	}

	async logout(): Promise<void> {
		await this.http.get('/logout', { maxRedirects: 0 });
		delete this.http.defaults.headers.common['Cookie'];
		delete this.http.defaults.headers.common['X-XSRF-TOKEN'];
	}

	// ========================================================================
	// Device inventory
	// ========================================================================

	async createDevice(request: DeviceCreationRequest): Promise<void> {
		const response = await this.http.post<unknown>(buildDataservicePath('/system/device'), {
			deviceIP: request.deviceIp,
			username: request.username,
			password: request.password,
			generateCSR: request.generateCsr,
			personality: request.personality,
		});
		this.assertOk(response, `POST /system/device (${request.deviceIp})`);
	}

	async listDevices(category: DeviceCategory): Promise<DeviceRecord[]> {
		const body = await this.getJson(`/system/device/${category}`, DeviceListResponseSchema);
		return body.data.map(toDeviceRecord);
	}

	async getDeviceState(deviceId: string): Promise<DeviceRuntimeState> {
		for (const category of DEVICE_CATEGORIES) {
			const device = (await this.listDevices(category)).find((d) => d.id === deviceId);
			if (device) {
				return {
					reachability: device.reachability,
					certificateStatus: device.certificateStatus,
				};
			}
		}
		throw new ManagerRequestError(`Device ${deviceId} not present in manager inventory`, 404);
	}

	async getAttachedConfigText(deviceId: string): Promise<string> {
		const body = await this.getJson(`/template/config/attached/${deviceId}`, AttachedConfigResponseSchema);
		return body.config;
	}

	// ========================================================================
	// Templates and configuration groups
	// ========================================================================

	async listTemplates(): Promise<NamedArtifact[]> {
		const body = await this.getJson('/template/device', TemplateListResponseSchema);
		return body.data.map((template) => ({ id: template.templateId, name: template.templateName }));
	}

	async submitTemplateAttach(payload: TemplateAttachPayload): Promise<ManagerResponse> {
		return this.send('/template/device/config/attachfeature', payload);
	}

	async listConfigGroups(): Promise<NamedArtifact[]> {
		const groups = await this.getJson('/v1/config-group', ConfigGroupListResponseSchema);
		return groups.map((group) => ({ id: group.id, name: group.name }));
	}

	async associateDevice(groupId: string, deviceId: string): Promise<ManagerResponse> {
		return this.send(`/v1/config-group/${groupId}/device/associate`, {
			devices: [{ id: deviceId }],
		});
	}

	async pushVariables(groupId: string, deviceId: string, variables: VariableEntry[]): Promise<ManagerResponse> {
		return this.send(`/v1/config-group/${groupId}/device/variables`, {
			devices: [{ id: deviceId, variables }],
		});
	}

	async getJobStatus(jobId: string): Promise<JobStatusReport> {
		const body = await this.getJson(`/device/action/status/${jobId}`, TaskStatusResponseSchema);
		return { status: body.summary?.status, raw: body };
	}

	// ========================================================================
	// Network hierarchy (MRF regions)
	// ========================================================================

	async getServerVersion(): Promise<string> {
		const body = await this.getJson('/client/server', ServerInfoResponseSchema);
		return body.data.platformVersion;
	}

	async getNetworkHierarchy(): Promise<HierarchyNode[]> {
		return this.getJson('/v1/network-hierarchy', HierarchyListResponseSchema);
	}

	async createNetworkHierarchy(node: HierarchyNode): Promise<void> {
		const response = await this.send('/v1/network-hierarchy', node);
		this.assertOk(response, `POST /v1/network-hierarchy (${node.name})`);
	}

	// ========================================================================
	// Catalog definitions (backup/restore)
	// ========================================================================

	async getTemplateDefinition(templateId: string): Promise<CatalogDefinition> {
		return this.getJson(`/template/device/object/${templateId}`, CatalogDefinitionSchema);
	}

	async createTemplate(definition: CatalogDefinition): Promise<void> {
		const response = await this.send('/template/device/feature', definition);
		this.assertOk(response, 'POST /template/device/feature');
	}

	async getConfigGroup(groupId: string): Promise<CatalogDefinition> {
		return this.getJson(`/v1/config-group/${groupId}`, CatalogDefinitionSchema);
	}

	async createConfigGroup(definition: CatalogDefinition): Promise<void> {
		const response = await this.send('/v1/config-group', definition);
		this.assertOk(response, 'POST /v1/config-group');
	}

	// ========================================================================
	// Helpers
	// ========================================================================

	private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
		const response = await this.http.get<unknown>(buildDataservicePath(path));
		this.assertOk(response, `GET ${path}`);

		const parsed = schema.safeParse(response.data);
		if (!parsed.success) {
			throw new ManagerRequestError(
				`Unexpected response from GET ${path}: ${parsed.error.message}`,
				response.status,
				responseText(response.data)
			);
		}
		return parsed.data;
	}

	private async send(path: string, body: unknown): Promise<ManagerResponse> {
		const response = await this.http.post<unknown>(buildDataservicePath(path), body);
		return {
			status: response.status,
			data: response.data,
			text: responseText(response.data),
		};
	}

	private assertOk(response: AxiosResponse<unknown> | ManagerResponse, operation: string): void {
		if (response.status < 200 || response.status >= 300) {
			const text = 'text' in response ? response.text : responseText(response.data);
			throw new ManagerRequestError(
				`${operation} failed: ${response.status} - ${text}`,
				response.status,
				text
			);
		}
	}
}

/**
 * Session factory used by SessionManager: build a client and log in
 */
export async function createManagerSession(
	endpoint: ManagerEndpoint,
	options: ManagerClientOptions = {}
): Promise<ManagerClient> {
	const client = new ManagerHttpClient(endpoint, options);
	await client.login();
	return client;
}
