/**
 * ORCHESTRATOR
 * ============
 *
 * Entry point of the library. Runs the onboarding sequence for an inventory:
 *
 *   connect -> controllers -> validators -> wait (control plane)
 *           -> edges -> wait (edges)
 *
 * The control plane wait is a hard barrier: no edge call is made before it
 * returns. Any failure is surfaced as a single OrchestrationError and partial
 * results are not returned; use an OnboardingObserver to follow progress.
 *
 * Usage:
 *   const orchestrator = Orchestrator.fromFile('devices.yaml');
 *   try {
 *     const result = await orchestrator.onboard();
 *   } finally {
 *     await orchestrator.cleanup();
 *   }
 */

import type { Logger } from 'winston';
import { AttachmentCoordinator } from './attachment/attachment-coordinator';
import { CatalogBackupEngine } from './backup/catalog-backup-engine';
import {
	BackupOptions,
	ConfigurationManager,
	RestoreOptions,
} from './backup/configuration-manager';
import type { BackupEngineFactory } from './backup/engine';
import { DEFAULT_CONFIG, OnboarderConfig } from './config/config-loader';
import { OrchestrationError, errorMessage } from './errors';
import { controlComponentCount, loadInventory, parseInventory } from './inventory/inventory';
import type { DeviceInventory, OnboardingResult } from './inventory/types';
import { ComponentLogger } from './logging/component-logger';
import { createLogger } from './logging/logger';
import { createManagerSession } from './manager/manager-client';
import type { ManagerClient } from './manager/types';
import { DeviceOnboarder } from './onboarding/device-onboarder';
import type { OnboardingObserver } from './onboarding/types';
import { Clock, systemClock } from './polling/clock';
import { ReadinessPoller } from './polling/readiness-poller';
import { SessionFactory, SessionManager } from './session/session-manager';

export interface OrchestratorOptions {
	config?: Partial<OnboarderConfig>;
	logger?: Logger;
	clock?: Clock;
	sessionFactory?: SessionFactory;
	backupEngine?: BackupEngineFactory;
	observer?: OnboardingObserver;
}

export interface OnboardOptions {
	skipExisting?: boolean;
	waitForReady?: boolean;
	timeout?: number; // ms
	signal?: AbortSignal;
}

const defaultBackupEngine: BackupEngineFactory = (client, logger) => new CatalogBackupEngine(client, logger);

export class Orchestrator {
	private readonly config: OnboarderConfig;
	private readonly baseLogger: Logger;
	private readonly logger: ComponentLogger;
	private readonly clock: Clock;
	private readonly sessions: SessionManager;
	private readonly backupEngine: BackupEngineFactory;
	private readonly observer?: OnboardingObserver;

	constructor(readonly inventory: DeviceInventory, options: OrchestratorOptions = {}) {
		this.config = { ...DEFAULT_CONFIG, ...options.config };
		this.baseLogger = options.logger ?? createLogger({
			level: this.config.logLevel,
			format: this.config.logFormat,
			file: this.config.logFile,
			maxSize: this.config.logMaxSize,
			maxFiles: this.config.logMaxFiles,
		});
		this.logger = new ComponentLogger(this.baseLogger, 'Orchestrator');
		this.clock = options.clock ?? systemClock;
		this.backupEngine = options.backupEngine ?? defaultBackupEngine;
		this.observer = options.observer;

		const requestTimeout = this.config.requestTimeout;
		this.sessions = new SessionManager(inventory.manager, {
			factory: options.sessionFactory ?? ((endpoint) => createManagerSession(endpoint, { requestTimeout })),
			logger: this.logger.forComponent('SessionManager'),
			clock: this.clock,
			maxRetries: this.config.connectMaxRetries,
			retryInterval: this.config.connectRetryInterval,
		});
	}

	static fromFile(path: string, options: OrchestratorOptions = {}): Orchestrator {
		return new Orchestrator(loadInventory(path), options);
	}

	static fromObject(data: unknown, options: OrchestratorOptions = {}): Orchestrator {
		return new Orchestrator(parseInventory(data), options);
	}

	async onboard(options: OnboardOptions = {}): Promise<OnboardingResult> {
		const {
			skipExisting = true,
			waitForReady = true,
			timeout = this.config.readyTimeout,
			signal,
		} = options;
		const { controllers, validators, edges } = this.inventory;

		this.logger.info(
			`Starting onboarding: ${controlComponentCount(this.inventory)} control components, ${edges.length} edges`
		);

		try {
			const client = await this.sessions.connect(undefined, signal);
			const onboarder = this.createOnboarder(client);

			const controllerIds = await onboarder.onboardControllers(controllers, skipExisting, signal);
			const validatorIds = await onboarder.onboardValidators(validators, skipExisting, signal);

			if (waitForReady) {
				this.logger.info('Waiting for control plane to be ready...');
				await onboarder.waitForOnboarding(
					[...controllerIds, ...validatorIds],
					timeout,
					this.config.pollInterval,
					signal
				);
			}

			const edgeIds = await onboarder.onboardEdges(edges, skipExisting, signal);

			if (waitForReady) {
				this.logger.info('Waiting for edge devices to be ready...');
				await onboarder.waitForOnboarding(edgeIds, timeout, this.config.pollInterval, signal);
			}

			this.logger.info(
				`Onboarding complete: ${controllerIds.length} controllers, ` +
				`${validatorIds.length} validators, ${edgeIds.length} edges`
			);
			return { controllers: controllerIds, validators: validatorIds, edges: edgeIds };
		} catch (error) {
			this.logger.error('Onboarding failed', error);
			throw new OrchestrationError(`Onboarding failed: ${errorMessage(error)}`, { cause: error });
		}
	}

	async backup(outputDir: string, options: BackupOptions = {}, signal?: AbortSignal): Promise<boolean> {
		const manager = await this.createConfigurationManager(signal);
		return manager.backup(outputDir, options);
	}

	async restore(backupDir: string, options: RestoreOptions = {}, signal?: AbortSignal): Promise<boolean> {
		const manager = await this.createConfigurationManager(signal);
		return manager.restore(backupDir, options);
	}

	/**
	 * Close the manager session. Safe to call more than once.
	 */
	async cleanup(): Promise<void> {
		this.logger.info('Cleaning up...');
		await this.sessions.close();
	}

	private createOnboarder(client: ManagerClient): DeviceOnboarder {
		const poller = new ReadinessPoller({
			logger: this.logger.forComponent('ReadinessPoller'),
			clock: this.clock,
		});
		const attachments = new AttachmentCoordinator(client, {
			logger: this.logger.forComponent('AttachmentCoordinator'),
			clock: this.clock,
			taskTimeout: this.config.taskTimeout,
			pollInterval: this.config.pollInterval,
		});

		return new DeviceOnboarder(client, {
			poller,
			attachments,
			logger: this.logger.forComponent('DeviceOnboarder'),
			username: this.config.deviceUsername,
			defaultPassword: this.config.defaultDevicePassword,
			certificateTimeout: this.config.certificateTimeout,
			pollInterval: this.config.pollInterval,
			observer: this.observer,
		});
	}

	private async createConfigurationManager(signal?: AbortSignal): Promise<ConfigurationManager> {
		const client = await this.sessions.connect(undefined, signal);
		const logger = this.logger.forComponent('ConfigurationManager');
		return new ConfigurationManager(client, this.backupEngine(client, logger.forComponent('BackupEngine')), logger);
	}
}
