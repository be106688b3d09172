/**
 * Catalog Backup Engine
 * =====================
 *
 * Built-in BackupEngine covering the two configuration catalogs the onboarder
 * attaches from: device templates and configuration groups.
 *
 * Layout under the working directory:
 *   template_device/<name>.json   device template definitions
 *   config_group/<name>.json      configuration group definitions
 *   running/<device-id>.cfg       running configs (saveRunning only)
 *
 * Restore only creates items whose name does not exist on the manager yet.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors';
import type { ComponentLogger } from '../logging/component-logger';
import type { CatalogDefinition, DeviceCategory, ManagerClient, NamedArtifact } from '../manager/types';
import type { BackupEngine, BackupTag } from './engine';

type CatalogTag = Exclude<BackupTag, 'all'>;

interface CatalogHandler {
	/** Field of a definition holding the item's name */
	nameField: string;
	list(client: ManagerClient): Promise<NamedArtifact[]>;
	read(client: ManagerClient, id: string): Promise<CatalogDefinition>;
	create(client: ManagerClient, definition: CatalogDefinition): Promise<void>;
}

const CATALOGS: Record<CatalogTag, CatalogHandler> = {
	template_device: {
		nameField: 'templateName',
		list: (client) => client.listTemplates(),
		read: (client, id) => client.getTemplateDefinition(id),
		create: (client, definition) => client.createTemplate(definition),
	},
	config_group: {
		nameField: 'name',
		list: (client) => client.listConfigGroups(),
		read: (client, id) => client.getConfigGroup(id),
		create: (client, definition) => client.createConfigGroup(definition),
	},
};

const RUNNING_DIR = 'running';
const DEVICE_CATEGORIES: readonly DeviceCategory[] = ['controllers', 'vedges'];

export function safeFileName(name: string): string {
	return name.replace(/[^A-Za-z0-9._-]/g, '_');
}

export interface ArtifactFile {
	fileName: string;
	collided: boolean;
}

/**
 * JSON file name for a saved item. Distinct names can sanitize to the same
 * file; the later item then gets its id (or a counter) appended.
 */
export function artifactFileName(name: string, id: string | undefined, taken: Set<string>): ArtifactFile {
	const base = safeFileName(name);
	let fileName = `${base}.json`;
	const collided = taken.has(fileName);
	if (collided) {
		fileName = id ? `${base}_${safeFileName(id)}.json` : `${base}_1.json`;
		for (let n = 2; taken.has(fileName); n++) {
			fileName = `${base}_${n}.json`;
		}
	}
	taken.add(fileName);
	return { fileName, collided };
}

export function resolveCatalogTags(tags: readonly BackupTag[]): CatalogTag[] {
	if (tags.length === 0 || tags.includes('all')) {
		return ['template_device', 'config_group'];
	}
	return tags.filter((tag): tag is CatalogTag => tag !== 'all');
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.access(target);
		return true;
	} catch {
		return false;
	}
}

export class CatalogBackupEngine implements BackupEngine {
	constructor(
		private readonly client: ManagerClient,
		private readonly logger: ComponentLogger
	) {}

	async backup(workdir: string, tags: readonly BackupTag[], saveRunning: boolean): Promise<boolean> {
		for (const tag of resolveCatalogTags(tags)) {
			const handler = CATALOGS[tag];
			const dir = path.join(workdir, tag);
			await fs.mkdir(dir, { recursive: true });

			const items = await handler.list(this.client);
			const taken = new Set<string>();
			for (const item of items) {
				const definition = await handler.read(this.client, item.id);
				const { fileName, collided } = artifactFileName(item.name, item.id, taken);
				if (collided) {
					this.logger.warn(`${tag} '${item.name}' shares its file name with another item, saved as ${fileName}`);
				}
				const file = path.join(dir, fileName);
				await fs.writeFile(file, JSON.stringify(definition, null, 2), 'utf-8');
				this.logger.debug(`Saved ${tag} '${item.name}'`, { file });
			}
			this.logger.info(`Backed up ${items.length} ${tag} item(s)`);
		}

		if (saveRunning) {
			await this.backupRunningConfigs(workdir);
		}

		return true;
	}

	async restore(workdir: string, tags: readonly BackupTag[], attach: boolean): Promise<boolean> {
		for (const tag of resolveCatalogTags(tags)) {
			const dir = path.join(workdir, tag);
			if (!(await pathExists(dir))) {
				this.logger.debug(`No ${tag} backup found, skipping`);
				continue;
			}

			const handler = CATALOGS[tag];
			const existing = new Set((await handler.list(this.client)).map((item) => item.name));
			const files = (await fs.readdir(dir)).filter((f) => f.endsWith('.json')).sort();

			let created = 0;
			for (const file of files) {
				const parsed: unknown = JSON.parse(await fs.readFile(path.join(dir, file), 'utf-8'));
				if (!isRecord(parsed)) {
					throw new Error(`${path.join(tag, file)} does not contain a JSON object`);
				}

				const nameValue = parsed[handler.nameField];
				const name = typeof nameValue === 'string' ? nameValue : path.basename(file, '.json');
				if (existing.has(name)) {
					this.logger.info(`${tag} '${name}' already exists, skipping`);
					continue;
				}

				await handler.create(this.client, parsed);
				created++;
				this.logger.debug(`Restored ${tag} '${name}'`);
			}
			this.logger.info(`Restored ${created} ${tag} item(s)`);
		}

		if (attach) {
			this.logger.warn('Attaching restored items is not supported by the catalog engine; skipping attach');
		}

		return true;
	}

	private async backupRunningConfigs(workdir: string): Promise<void> {
		const dir = path.join(workdir, RUNNING_DIR);
		await fs.mkdir(dir, { recursive: true });

		for (const category of DEVICE_CATEGORIES) {
			for (const device of await this.client.listDevices(category)) {
				try {
					const config = await this.client.getAttachedConfigText(device.id);
					await fs.writeFile(path.join(dir, `${safeFileName(device.id)}.cfg`), config, 'utf-8');
				} catch (error) {
					this.logger.warn(`Could not save running config of ${device.id}: ${errorMessage(error)}`);
				}
			}
		}
	}
}
