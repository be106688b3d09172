/**
 * Control plane onboarding (controllers and validators)
 *
 * Control components are registered by the manager itself: it logs into the
 * device over its management IP, so registration needs working device
 * credentials. The well-known default password is tried first and the
 * inventory's own password only after an authentication rejection.
 */

import axios from 'axios';
import {
	CredentialAttempt,
	CredentialError,
	DeviceResolutionError,
	ManagerRequestError,
	enrichError,
	errorMessage,
} from '../errors';
import type { ControlComponentSpec } from '../inventory/types';
import type { DevicePersonality, DeviceRecord } from '../manager/types';
import { throwIfAborted } from '../polling/clock';
import { extractManagementIps } from './config-ip';
import { appendUnique, DeviceClassOnboarder, OnboarderContext } from './types';

type ControlKind = ControlComponentSpec['kind'];

export const PERSONALITY: Record<ControlKind, DevicePersonality> = {
	controller: 'vsmart',
	validator: 'vbond',
};

export interface CredentialCandidate {
	label: 'default' | 'supplied';
	password: string;
}

const AUTH_REJECTION = /authenticat|credential|password|unauthori[sz]ed/i;

/**
 * Ordered passwords to try. The supplied one is dropped when it equals the default.
 */
export function credentialCandidates(defaultPassword: string, supplied?: string): CredentialCandidate[] {
	const candidates: CredentialCandidate[] = [{ label: 'default', password: defaultPassword }];
	if (supplied !== undefined && supplied !== defaultPassword) {
		candidates.push({ label: 'supplied', password: supplied });
	}
	return candidates;
}

export function isAuthenticationRejection(error: unknown): boolean {
	if (error instanceof ManagerRequestError) {
		return error.status === 401 || error.status === 403
			|| AUTH_REJECTION.test(error.message) || AUTH_REJECTION.test(error.body ?? '');
	}
	if (axios.isAxiosError(error)) {
		const status = error.response?.status;
		return status === 401 || status === 403;
	}
	return false;
}

export class ControlPlaneOnboarder<S extends ControlComponentSpec> implements DeviceClassOnboarder<S> {
	constructor(
		private readonly kind: S['kind'],
		private readonly context: OnboarderContext
	) {}

	async onboard(specs: readonly S[], skipExisting: boolean, signal?: AbortSignal): Promise<string[]> {
		const { logger, observer } = this.context;
		logger.info(`Onboarding ${specs.length} ${this.kind}(s)`);

		const alreadyOnboarded = skipExisting ? await this.collectOnboardedIps() : new Set<string>();
		const ids: string[] = [];

		for (const [index, spec] of specs.entries()) {
			throwIfAborted(signal);
			logger.info(`Processing ${this.kind} ${index + 1}/${specs.length}: ${spec.ip}`);

			if (alreadyOnboarded.has(spec.ip)) {
				const existing = await this.findDeviceIdByIp(spec.ip);
				if (existing) {
					logger.info(`${this.kind} ${spec.ip} already onboarded, skipping`, { id: existing });
					appendUnique(ids, existing);
					observer?.deviceOnboarded(this.kind, existing);
				} else {
					logger.warn(`${this.kind} ${spec.ip} already onboarded but its identifier could not be resolved`);
				}
				continue;
			}

			try {
				const id = await this.register(spec);
				appendUnique(ids, id);
				observer?.deviceOnboarded(this.kind, id);
				logger.info(`Successfully onboarded ${this.kind} ${spec.ip}`, { id });
			} catch (error) {
				throw enrichError(error, `Failed to onboard ${this.kind} ${spec.ip}`);
			}
		}

		return ids;
	}

	private async register(spec: S): Promise<string> {
		const { client, logger, username, defaultPassword } = this.context;
		const attempts: CredentialAttempt[] = [];
		let registered = false;

		for (const candidate of credentialCandidates(defaultPassword, spec.password)) {
			try {
				logger.debug(`Trying ${candidate.label} credentials for ${spec.ip}`);
				await client.createDevice({
					deviceIp: spec.ip,
					username,
					password: candidate.password,
					personality: PERSONALITY[spec.kind],
					generateCsr: false,
				});
				registered = true;
				break;
			} catch (error) {
				if (!isAuthenticationRejection(error)) {
					throw error;
				}
				attempts.push({ candidate: candidate.label, reason: errorMessage(error) });
				logger.debug(`${candidate.label} credentials rejected for ${spec.ip}`);
			}
		}

		if (!registered) {
			throw new CredentialError(spec.ip, attempts);
		}

		const id = await this.findDeviceIdByIp(spec.ip);
		if (!id) {
			throw new DeviceResolutionError(spec.ip);
		}
		return id;
	}

	private async collectOnboardedIps(): Promise<Set<string>> {
		const { client, logger } = this.context;
		const ips = new Set<string>();

		let devices: DeviceRecord[];
		try {
			devices = await client.listDevices('controllers');
		} catch (error) {
			logger.warn(`Error getting onboarded devices: ${errorMessage(error)}`);
			return ips;
		}

		for (const device of devices) {
			try {
				const config = await client.getAttachedConfigText(device.id);
				extractManagementIps(config, device.managementIp).forEach((ip) => ips.add(ip));
			} catch (error) {
				logger.debug(`Error getting config for device ${device.id}`, { error: errorMessage(error) });
				if (device.managementIp) {
					ips.add(device.managementIp);
				}
			}
		}

		return ips;
	}

	private async findDeviceIdByIp(ip: string): Promise<string | undefined> {
		try {
			const devices = await this.context.client.listDevices('controllers');
			return devices.find((device) => device.managementIp === ip)?.id;
		} catch (error) {
			this.context.logger.debug(`Error finding device by IP ${ip}`, { error: errorMessage(error) });
			return undefined;
		}
	}
}
