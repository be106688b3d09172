import type { ManagerClient } from '../manager/types';
import type { ComponentLogger } from '../logging/component-logger';

export const BACKUP_TAGS = ['all', 'template_device', 'config_group'] as const;

export type BackupTag = typeof BACKUP_TAGS[number];

export function isBackupTag(value: string): value is BackupTag {
	return BACKUP_TAGS.some((tag) => tag === value);
}

/**
 * Serializes manager configuration items to a working directory and back.
 */
export interface BackupEngine {
	backup(workdir: string, tags: readonly BackupTag[], saveRunning: boolean): Promise<boolean>;
	restore(workdir: string, tags: readonly BackupTag[], attach: boolean): Promise<boolean>;
}

/**
 * Engines are bound to the session they run against.
 */
export type BackupEngineFactory = (client: ManagerClient, logger: ComponentLogger) => BackupEngine;
