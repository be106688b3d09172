/**
 * Edge onboarding
 *
 * Edges bootstrap themselves through zero-touch provisioning and show up in the
 * manager's vEdge inventory on their own. Here we only find them by serial,
 * wait for the certificate and attach their configuration profile.
 */

import { DeviceNotFoundError, OperationAbortedError, enrichError } from '../errors';
import type { EdgeSpec, VariableValue } from '../inventory/types';
import type { DeviceRecord } from '../manager/types';
import { throwIfAborted } from '../polling/clock';
import { isCertificateInstalled } from '../polling/readiness-poller';
import { appendUnique, DeviceClassOnboarder, OnboarderContext } from './types';

export function edgeVariables(spec: EdgeSpec): Record<string, VariableValue> {
	return {
		system_ip: spec.systemIp,
		site_id: spec.siteId,
		...spec.values,
	};
}

export class EdgeOnboarder implements DeviceClassOnboarder<EdgeSpec> {
	constructor(private readonly context: OnboarderContext) {}

	async onboard(specs: readonly EdgeSpec[], skipExisting: boolean, signal?: AbortSignal): Promise<string[]> {
		const { logger, observer } = this.context;
		logger.info(`Onboarding ${specs.length} edge device(s)`);

		const ids: string[] = [];

		for (const [index, spec] of specs.entries()) {
			throwIfAborted(signal);
			logger.info(
				`Processing edge ${index + 1}/${specs.length}: serial=${spec.serial}, ` +
				`system_ip=${spec.systemIp}, site_id=${spec.siteId}`
			);

			try {
				const device = await this.findEdge(spec.serial);
				if (!device) {
					throw new DeviceNotFoundError(
						`Edge device with serial ${spec.serial} not found in manager inventory. ` +
						'Ensure the device has discovered the validator and appears in device inventory.',
						spec.serial
					);
				}

				if (skipExisting && isCertificateInstalled(device)) {
					logger.info(`Edge ${spec.serial} already has certificate installed, skipping`, { id: device.id });
					appendUnique(ids, device.id);
					observer?.deviceOnboarded('edge', device.id);
					continue;
				}

				await this.context.poller.waitUntilReady(
					[device.id],
					(id) => this.certificateInstalled(id),
					{
						timeout: this.context.certificateTimeout,
						interval: this.context.pollInterval,
						signal,
						description: `certificate installation on ${device.id}`,
					}
				);
				appendUnique(ids, device.id);
				observer?.deviceOnboarded('edge', device.id);
				logger.info(`Edge ${spec.serial} certificate installed`, { id: device.id });

				await this.attach(spec, device.id, signal);
			} catch (error) {
				if (error instanceof DeviceNotFoundError || error instanceof OperationAbortedError) {
					throw error;
				}
				throw enrichError(error, `Failed to onboard edge ${spec.serial}`);
			}
		}

		logger.info(`Successfully onboarded ${ids.length} edge device(s)`);
		return ids;
	}

	private async attach(spec: EdgeSpec, deviceId: string, signal?: AbortSignal): Promise<void> {
		const { attachments, logger } = this.context;

		switch (spec.attachment?.type) {
			case 'template':
				await attachments.attachTemplate(deviceId, spec.attachment.name, edgeVariables(spec), signal);
				break;
			case 'config-group':
				await attachments.attachConfigGroup(deviceId, spec.attachment.name, edgeVariables(spec));
				break;
			default:
				logger.info(`No template or config-group specified for edge ${spec.serial}, skipping attachment`);
		}
	}

	/**
	 * Match by hardware serial, or by remote id when the inventory already holds one
	 */
	private async findEdge(serial: string): Promise<DeviceRecord | undefined> {
		const devices = await this.context.client.listDevices('vedges');
		return devices.find((device) => device.serialNumber === serial || device.id === serial);
	}

	private async certificateInstalled(deviceId: string): Promise<boolean> {
		const devices = await this.context.client.listDevices('vedges');
		const device = devices.find((d) => d.id === deviceId);
		return device !== undefined && isCertificateInstalled(device);
	}
}
