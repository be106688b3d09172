/**
 * Readiness Poller
 * ================
 *
 * Generic timeout-bounded wait over a set of device ids. The same loop serves
 * the full readiness wait (reachable + certificate) and certificate-only waits;
 * only the predicate changes.
 */

import { OnboardingTimeoutError, errorMessage } from '../errors';
import type { ComponentLogger } from '../logging/component-logger';
import type { DeviceRuntimeState } from '../manager/types';
import { Clock, systemClock, throwIfAborted } from './clock';

export type ReadinessPredicate = (id: string) => Promise<boolean>;

export interface WaitOptions {
	timeout: number; // ms
	interval: number; // ms
	signal?: AbortSignal;
	description?: string;
}

export interface ReadinessPollerOptions {
	logger: ComponentLogger;
	clock?: Clock;
}

const PROGRESS_LOG_INTERVAL = 30000;

const INSTALLED_CERTIFICATE_STATES = new Set(['installed', 'certinstalled']);

/**
 * Reachable and holding an installed certificate
 */
export function isDeviceReady(state: DeviceRuntimeState): boolean {
	return state.reachability?.toLowerCase() === 'reachable'
		&& INSTALLED_CERTIFICATE_STATES.has(state.certificateStatus?.toLowerCase() ?? '');
}

export function isCertificateInstalled(state: DeviceRuntimeState): boolean {
	return state.certificateStatus === 'Installed';
}

export class ReadinessPoller {
	private readonly logger: ComponentLogger;
	private readonly clock: Clock;

	constructor(options: ReadinessPollerOptions) {
		this.logger = options.logger;
		this.clock = options.clock ?? systemClock;
	}

	async waitUntilReady(
		ids: Iterable<string>,
		predicate: ReadinessPredicate,
		options: WaitOptions
	): Promise<void> {
		const pending = new Set(ids);
		if (pending.size === 0) {
			return;
		}

		const description = options.description ?? 'devices to become ready';
		const total = pending.size;
		const start = this.clock.now();
		let lastProgress = start;

		this.logger.info(`Waiting for ${description}`, {
			pending: total,
			timeout: options.timeout,
			interval: options.interval,
		});

		for (;;) {
			throwIfAborted(options.signal);

			for (const id of [...pending]) {
				try {
					if (await predicate(id)) {
						pending.delete(id);
						this.logger.debug('Device ready', { id });
					}
				} catch (error) {
					this.logger.debug('Readiness check failed, will retry', { id, error: errorMessage(error) });
				}
			}

			if (pending.size === 0) {
				this.logger.info(`Finished waiting for ${description}`, { ready: total });
				return;
			}

			const now = this.clock.now();
			const elapsed = now - start;
			if (elapsed > options.timeout) {
				throw new OnboardingTimeoutError(
					`Timeout waiting for ${description}: ${pending.size} of ${total} still pending after ${Math.round(elapsed / 1000)}s`,
					[...pending]
				);
			}

			if (now - lastProgress >= PROGRESS_LOG_INTERVAL) {
				lastProgress = now;
				this.logger.info(`Still waiting for ${description}: ${pending.size}/${total} pending`, {
					elapsedSeconds: Math.round(elapsed / 1000),
				});
			}

			await this.clock.sleep(options.interval, options.signal);
		}
	}
}
