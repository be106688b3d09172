/**
 * DEVICE ONBOARDER
 * ================
 *
 * Phase orchestrator over the three device classes. Each class has its own
 * procedure (ControlPlaneOnboarder, EdgeOnboarder); this class wires them to a
 * shared context and owns the fleet-wide readiness wait.
 *
 * Devices are processed sequentially so results keep inventory order.
 */

import type { AttachmentCoordinator } from '../attachment/attachment-coordinator';
import type { ControllerSpec, EdgeSpec, ValidatorSpec } from '../inventory/types';
import type { ComponentLogger } from '../logging/component-logger';
import type { ManagerClient } from '../manager/types';
import { isDeviceReady, ReadinessPoller } from '../polling/readiness-poller';
import { ControlPlaneOnboarder } from './control-plane-onboarder';
import { EdgeOnboarder } from './edge-onboarder';
import type { OnboarderContext, OnboardingObserver } from './types';

export interface DeviceOnboarderOptions {
	poller: ReadinessPoller;
	attachments: AttachmentCoordinator;
	logger: ComponentLogger;
	username?: string;
	defaultPassword?: string;
	certificateTimeout?: number; // ms
	pollInterval?: number; // ms
	observer?: OnboardingObserver;
}

export class DeviceOnboarder {
	private readonly context: OnboarderContext;
	private readonly controllers: ControlPlaneOnboarder<ControllerSpec>;
	private readonly validators: ControlPlaneOnboarder<ValidatorSpec>;
	private readonly edges: EdgeOnboarder;

	constructor(client: ManagerClient, options: DeviceOnboarderOptions) {
		this.context = {
			client,
			logger: options.logger,
			poller: options.poller,
			attachments: options.attachments,
			username: options.username ?? 'admin',
			defaultPassword: options.defaultPassword ?? 'admin',
			certificateTimeout: options.certificateTimeout ?? 300000,
			pollInterval: options.pollInterval ?? 10000,
			observer: options.observer,
		};
		this.controllers = new ControlPlaneOnboarder<ControllerSpec>('controller', this.context);
		this.validators = new ControlPlaneOnboarder<ValidatorSpec>('validator', this.context);
		this.edges = new EdgeOnboarder(this.context);
	}

	onboardControllers(specs: readonly ControllerSpec[], skipExisting = true, signal?: AbortSignal): Promise<string[]> {
		return this.controllers.onboard(specs, skipExisting, signal);
	}

	onboardValidators(specs: readonly ValidatorSpec[], skipExisting = true, signal?: AbortSignal): Promise<string[]> {
		return this.validators.onboard(specs, skipExisting, signal);
	}

	onboardEdges(specs: readonly EdgeSpec[], skipExisting = true, signal?: AbortSignal): Promise<string[]> {
		return this.edges.onboard(specs, skipExisting, signal);
	}

	/**
	 * Wait until every device is reachable with an installed certificate
	 */
	async waitForOnboarding(
		ids: readonly string[],
		timeout = 600000,
		interval = this.context.pollInterval,
		signal?: AbortSignal
	): Promise<void> {
		if (ids.length === 0) {
			this.context.logger.info('No devices to wait for');
			return;
		}

		const { client, poller } = this.context;
		await poller.waitUntilReady(
			ids,
			async (id) => isDeviceReady(await client.getDeviceState(id)),
			{ timeout, interval, signal, description: 'devices to complete onboarding' }
		);
	}
}
