/**
 * Configuration Manager
 * =====================
 *
 * Backup and restore of manager configuration: the catalog engine plus the
 * version-gated MRF region step. MRF regions are restored before the catalog
 * since configuration items may reference them.
 */

import * as fs from 'fs/promises';
import { BackupError, RestoreError, errorMessage } from '../errors';
import type { ComponentLogger } from '../logging/component-logger';
import type { ManagerClient } from '../manager/types';
import type { BackupEngine, BackupTag } from './engine';
import { NetworkHierarchyBackup } from './network-hierarchy';

export interface BackupOptions {
	saveRunning?: boolean;
	tags?: BackupTag[];
	backupMrf?: boolean;
}

export interface RestoreOptions {
	attach?: boolean;
	tags?: BackupTag[];
	restoreMrf?: boolean;
}

export class ConfigurationManager {
	private readonly hierarchy: NetworkHierarchyBackup;

	constructor(
		client: ManagerClient,
		private readonly engine: BackupEngine,
		private readonly logger: ComponentLogger
	) {
		this.hierarchy = new NetworkHierarchyBackup(client, logger.forComponent('NetworkHierarchy'));
	}

	async backup(workdir: string, options: BackupOptions = {}): Promise<boolean> {
		const { saveRunning = false, tags = ['all'], backupMrf = true } = options;

		this.logger.info(`Starting backup to ${workdir}`, { tags });

		try {
			await fs.mkdir(workdir, { recursive: true });
			await this.engine.backup(workdir, tags, saveRunning);

			if (backupMrf) {
				await this.hierarchy.backup(workdir);
			}
		} catch (error) {
			throw new BackupError(`Backup failed: ${errorMessage(error)}`, { cause: error });
		}

		this.logger.info('Backup completed successfully');
		return true;
	}

	async restore(workdir: string, options: RestoreOptions = {}): Promise<boolean> {
		const { attach = false, tags = ['all'], restoreMrf = true } = options;

		try {
			await fs.access(workdir);
		} catch (error) {
			throw new RestoreError(`Backup directory not found: ${workdir}`, { cause: error });
		}

		this.logger.info(`Starting restore from ${workdir}`, { tags, attach });

		try {
			if (restoreMrf) {
				await this.hierarchy.restore(workdir);
			}
			await this.engine.restore(workdir, tags, attach);
		} catch (error) {
			throw new RestoreError(`Restore failed: ${errorMessage(error)}`, { cause: error });
		}

		this.logger.info('Restore completed successfully');
		return true;
	}
}
