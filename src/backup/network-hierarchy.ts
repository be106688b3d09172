/**
 * MRF region backup
 *
 * Multi-Region Fabric regions and subregions live in the manager's network
 * hierarchy (20.7+). They are saved next to the catalog backup and restored
 * before it, parents first. Every failure here is a warning only.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors';
import type { ComponentLogger } from '../logging/component-logger';
import { HierarchyNodeSchema } from '../manager/schemas';
import type { HierarchyNode, ManagerClient } from '../manager/types';
import { artifactFileName } from './catalog-backup-engine';

const MRF_DIR = 'mrf';
const REGIONS_DIR = 'regions';
const SUBREGIONS_DIR = 'subregions';

/**
 * True when the reported platform version is 20.7 or later
 */
export function supportsMrf(version: string): boolean {
	const [major, minor] = version.split('.').map((part) => Number.parseInt(part, 10));
	if (Number.isNaN(major) || Number.isNaN(minor)) {
		return false;
	}
	return major > 20 || (major === 20 && minor >= 7);
}

export function toRegionArtifact(node: HierarchyNode): HierarchyNode | undefined {
	const regionId = node.data.hierarchyId.regionId;
	if (node.data.label !== 'REGION' || regionId === undefined || regionId === 0) {
		return undefined;
	}

	const artifact: HierarchyNode = {
		name: node.name,
		uuid: node.uuid,
		data: {
			parentUuid: node.data.parentUuid,
			label: node.data.label,
			hierarchyId: { regionId },
		},
	};
	if (node.description !== undefined) {
		artifact.description = node.description;
	}
	if (node.data.isSecondary !== undefined) {
		artifact.data.isSecondary = node.data.isSecondary;
	}
	return artifact;
}

export function toSubregionArtifact(node: HierarchyNode): HierarchyNode | undefined {
	if (node.data.label !== 'SUB_REGION') {
		return undefined;
	}

	const artifact: HierarchyNode = {
		name: node.name,
		uuid: node.uuid,
		data: {
			parentUuid: node.data.parentUuid,
			label: node.data.label,
			hierarchyId: { subRegionId: node.data.hierarchyId.subRegionId },
		},
	};
	if (node.description !== undefined) {
		artifact.description = node.description;
	}
	return artifact;
}


// fs errors may come from another realm, so no instanceof check
function isMissing(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export class NetworkHierarchyBackup {
	constructor(
		private readonly client: ManagerClient,
		private readonly logger: ComponentLogger
	) {}

	async backup(workdir: string): Promise<void> {
		try {
			const version = await this.client.getServerVersion();
			if (!supportsMrf(version)) {
				this.logger.debug(`Manager version ${version} < 20.7, skipping MRF backup`);
				return;
			}

			this.logger.info('Backing up MRF regions and subregions...');
			const hierarchy = await this.client.getNetworkHierarchy();

			const hasRegions = hierarchy.some((node) => node.data.label === 'REGION');
			if (!hasRegions) {
				this.logger.debug('No MRF regions found');
				return;
			}

			const regions = hierarchy
				.map(toRegionArtifact)
				.filter((node): node is HierarchyNode => node !== undefined);
			const subregions = hierarchy
				.map(toSubregionArtifact)
				.filter((node): node is HierarchyNode => node !== undefined);

			await this.writeArtifacts(path.join(workdir, MRF_DIR, REGIONS_DIR), regions);
			if (subregions.length > 0) {
				await this.writeArtifacts(path.join(workdir, MRF_DIR, SUBREGIONS_DIR), subregions);
			}

			this.logger.info(`Backed up ${regions.length} regions and ${subregions.length} subregions`);
		} catch (error) {
			this.logger.warn(`Error backing up MRF regions: ${errorMessage(error)}`);
		}
	}

	async restore(workdir: string): Promise<void> {
		const mrfDir = path.join(workdir, MRF_DIR);

		try {
			await fs.access(mrfDir);
		} catch {
			this.logger.debug('No MRF backup found, skipping');
			return;
		}

		try {
			this.logger.info('Restoring MRF regions and subregions...');
			// Regions are the parents of subregions
			await this.restoreDirectory(path.join(mrfDir, REGIONS_DIR), 'region');
			await this.restoreDirectory(path.join(mrfDir, SUBREGIONS_DIR), 'subregion');
			this.logger.info('MRF restore completed');
		} catch (error) {
			this.logger.warn(`Error restoring MRF regions: ${errorMessage(error)}`);
		}
	}

	private async writeArtifacts(dir: string, artifacts: HierarchyNode[]): Promise<void> {
		await fs.mkdir(dir, { recursive: true });
		const taken = new Set<string>();
		for (const artifact of artifacts) {
			const { fileName, collided } = artifactFileName(artifact.name, artifact.uuid, taken);
			if (collided) {
				this.logger.warn(`'${artifact.name}' shares its file name with another item, saved as ${fileName}`);
			}
			await fs.writeFile(path.join(dir, fileName), JSON.stringify(artifact, null, 2), 'utf-8');
		}
	}

	private async restoreDirectory(dir: string, kind: string): Promise<void> {
		let files: string[];
		try {
			files = (await fs.readdir(dir)).filter((file) => file.endsWith('.json')).sort();
		} catch (error) {
			if (isMissing(error)) {
				return;
			}
			throw error;
		}

		for (const file of files) {
			try {
				const node = HierarchyNodeSchema.parse(JSON.parse(await fs.readFile(path.join(dir, file), 'utf-8')));
				await this.client.createNetworkHierarchy(node);
				this.logger.debug(`Restored ${kind}: ${node.name}`);
			} catch (error) {
				this.logger.warn(`Error restoring ${kind} ${file}: ${errorMessage(error)}`);
			}
		}
	}
}
