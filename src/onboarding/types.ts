import type { AttachmentCoordinator } from '../attachment/attachment-coordinator';
import type { DeviceKind } from '../inventory/types';
import type { ComponentLogger } from '../logging/component-logger';
import type { ManagerClient } from '../manager/types';
import type { ReadinessPoller } from '../polling/readiness-poller';

/**
 * Progress hook. Called as each device is onboarded, so callers can see
 * partial progress even when a later device fails the run.
 */
export interface OnboardingObserver {
	deviceOnboarded(kind: DeviceKind, id: string): void;
}

export interface OnboarderContext {
	client: ManagerClient;
	logger: ComponentLogger;
	poller: ReadinessPoller;
	attachments: AttachmentCoordinator;
	username: string;
	defaultPassword: string;
	certificateTimeout: number; // ms
	pollInterval: number; // ms
	observer?: OnboardingObserver;
}

/**
 * One implementation per device class. Returns remote identifiers in input order.
 */
export interface DeviceClassOnboarder<S> {
	onboard(specs: readonly S[], skipExisting: boolean, signal?: AbortSignal): Promise<string[]>;
}

export function appendUnique(ids: string[], id: string): void {
	if (!ids.includes(id)) {
		ids.push(id);
	}
}
