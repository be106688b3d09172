export { Orchestrator } from './orchestrator';
export type { OnboardOptions, OrchestratorOptions } from './orchestrator';

export * from './errors';

export {
	dumpInventory,
	loadInventory,
	parseInventory,
	saveInventory,
	totalDevices,
	controlComponentCount,
} from './inventory/inventory';
export type {
	ControllerSpec,
	DeviceInventory,
	DeviceKind,
	DeviceSpec,
	EdgeAttachment,
	EdgeSpec,
	ManagerEndpoint,
	OnboardingResult,
	ValidatorSpec,
	VariableValue,
} from './inventory/types';

export { ConfigLoader, DEFAULT_CONFIG } from './config/config-loader';
export type { OnboarderConfig } from './config/config-loader';
export { createLogger } from './logging/logger';
export type { LogConfig, LogFormat, LogLevel } from './logging/logger';
export { ComponentLogger } from './logging/component-logger';

export { ManagerHttpClient, createManagerSession } from './manager/manager-client';
export type { ManagerClient } from './manager/types';

export { SessionManager, classifyConnectionFailure } from './session/session-manager';
export { ReadinessPoller, isDeviceReady, isCertificateInstalled } from './polling/readiness-poller';
export { systemClock } from './polling/clock';
export type { Clock } from './polling/clock';

export { DeviceOnboarder } from './onboarding/device-onboarder';
export type { OnboardingObserver } from './onboarding/types';
export { AttachmentCoordinator } from './attachment/attachment-coordinator';
export type { AttachmentJob } from './attachment/attachment-coordinator';
export { buildTemplateAttachPayload } from './attachment/payloads';

export { ConfigurationManager } from './backup/configuration-manager';
export { CatalogBackupEngine } from './backup/catalog-backup-engine';
export type { BackupEngine, BackupEngineFactory, BackupTag } from './backup/engine';
