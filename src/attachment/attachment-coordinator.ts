/**
 * Attachment Coordinator
 * ======================
 *
 * Attaches a configuration profile to an onboarded edge:
 *
 * - Legacy device template: resolve by name, submit the attach payload, then
 *   poll the returned asynchronous task until it reports success or failure.
 * - Configuration group (20.12+): resolve by name, associate the device, then
 *   push variables. The variable push is best effort.
 */

import {
	AttachmentError,
	ConfigGroupNotFoundError,
	ConfigurationError,
	DeviceNotFoundError,
	OperationAbortedError,
	TemplateNotFoundError,
	errorMessage,
} from '../errors';
import type { VariableValue } from '../inventory/types';
import type { ComponentLogger } from '../logging/component-logger';
import { TaskSubmissionResponseSchema } from '../manager/schemas';
import type { ManagerClient, ManagerResponse, VariableEntry } from '../manager/types';
import { Clock, systemClock, throwIfAborted } from '../polling/clock';
import { buildTemplateAttachPayload, toVariableEntries } from './payloads';

export type AttachmentJobStatus = 'pending' | 'succeeded' | 'failed';

export interface AttachmentJob {
	id: string;
	status: AttachmentJobStatus;
}

export interface AttachmentCoordinatorOptions {
	logger: ComponentLogger;
	clock?: Clock;
	taskTimeout?: number; // ms
	pollInterval?: number; // ms
}

const PROGRESS_LOG_INTERVAL = 30000;

function isSuccessful(response: ManagerResponse): boolean {
	return response.status >= 200 && response.status < 300;
}

export class AttachmentCoordinator {
	private readonly logger: ComponentLogger;
	private readonly clock: Clock;
	private readonly taskTimeout: number;
	private readonly pollInterval: number;

	constructor(
		private readonly client: ManagerClient,
		options: AttachmentCoordinatorOptions
	) {
		this.logger = options.logger;
		this.clock = options.clock ?? systemClock;
		this.taskTimeout = options.taskTimeout ?? 600000;
		this.pollInterval = options.pollInterval ?? 10000;
	}

	async attachTemplate(
		deviceId: string,
		templateName: string,
		variables: Record<string, VariableValue>,
		signal?: AbortSignal
	): Promise<AttachmentJob> {
		this.logger.info(`Attaching template '${templateName}' to device ${deviceId}`);

		try {
			const template = (await this.client.listTemplates()).find((t) => t.name === templateName);
			if (!template) {
				throw new TemplateNotFoundError(templateName);
			}
			this.logger.debug('Resolved template', { templateName, templateId: template.id });

			const device = (await this.client.listDevices('vedges')).find((d) => d.id === deviceId);
			if (!device) {
				throw new DeviceNotFoundError(`Device ${deviceId} not found`, deviceId);
			}

			const payload = buildTemplateAttachPayload({
				deviceId,
				templateId: template.id,
				device,
				variables,
			});

			const response = await this.client.submitTemplateAttach(payload);
			if (!isSuccessful(response)) {
				throw new AttachmentError(
					`Failed to attach template: ${response.status} - ${response.text}`,
					response.status,
					response.text
				);
			}

			const submission = TaskSubmissionResponseSchema.safeParse(response.data);
			const taskId = submission.success ? submission.data.id : undefined;
			if (!taskId) {
				throw new AttachmentError(
					'Template attach accepted but no task id was returned',
					response.status,
					response.text
				);
			}
			this.logger.info(`Template attachment initiated, task ID: ${taskId}`);

			const job = await this.waitForTask(taskId, this.taskTimeout, this.pollInterval, signal);
			this.logger.info(`Template '${templateName}' attached to ${deviceId}`);
			return job;
		} catch (error) {
			if (error instanceof ConfigurationError
				|| error instanceof DeviceNotFoundError
				|| error instanceof OperationAbortedError) {
				throw error;
			}
			throw new AttachmentError(
				`Failed to attach template '${templateName}': ${errorMessage(error)}`,
				undefined,
				undefined,
				{ cause: error }
			);
		}
	}

	async attachConfigGroup(
		deviceId: string,
		groupName: string,
		variables: Record<string, VariableValue>
	): Promise<void> {
		this.logger.info(`Attaching config-group '${groupName}' to device ${deviceId}`);

		try {
			const group = (await this.client.listConfigGroups()).find((g) => g.name === groupName);
			if (!group) {
				throw new ConfigGroupNotFoundError(groupName);
			}
			this.logger.debug('Resolved config-group', { groupName, groupId: group.id });

			const response = await this.client.associateDevice(group.id, deviceId);
			if (!isSuccessful(response)) {
				throw new AttachmentError(
					`Failed to associate device with config-group: ${response.status} - ${response.text}`,
					response.status,
					response.text
				);
			}

			const entries = toVariableEntries(variables);
			if (entries.length > 0) {
				await this.pushVariables(group.id, deviceId, groupName, entries);
			}

			this.logger.info(`Config-group '${groupName}' attached to ${deviceId}`);
		} catch (error) {
			if (error instanceof ConfigurationError) {
				throw error;
			}
			throw new AttachmentError(
				`Failed to attach config-group '${groupName}': ${errorMessage(error)}`,
				undefined,
				undefined,
				{ cause: error }
			);
		}
	}

	private async pushVariables(
		groupId: string,
		deviceId: string,
		groupName: string,
		entries: VariableEntry[]
	): Promise<void> {
		try {
			const response = await this.client.pushVariables(groupId, deviceId, entries);
			if (!isSuccessful(response)) {
				this.logger.warn(`Failed to deploy variables: ${response.text}`, {
					groupName,
					deviceId,
					status: response.status,
				});
			}
		} catch (error) {
			this.logger.warn(`Failed to deploy variables: ${errorMessage(error)}`, { groupName, deviceId });
		}
	}

	/**
	 * Poll an asynchronous manager task until it succeeds, fails or times out.
	 * Read errors count as "status not known yet".
	 */
	async waitForTask(
		taskId: string,
		timeout = this.taskTimeout,
		interval = this.pollInterval,
		signal?: AbortSignal
	): Promise<AttachmentJob> {
		const job: AttachmentJob = { id: taskId, status: 'pending' };
		const start = this.clock.now();
		let lastProgress = start;

		this.logger.info(`Waiting for task ${taskId} to complete`);

		for (;;) {
			throwIfAborted(signal);

			const now = this.clock.now();
			const elapsed = now - start;
			if (elapsed > timeout) {
				throw new AttachmentError(`Timeout waiting for task ${taskId}`);
			}

			try {
				const report = await this.client.getJobStatus(taskId);
				const status = report.status?.toLowerCase();
				if (status === 'success') {
					job.status = 'succeeded';
					this.logger.info(`Task ${taskId} completed successfully`);
					return job;
				}
				if (status?.includes('fail')) {
					job.status = 'failed';
					throw new AttachmentError(`Task ${taskId} failed: ${JSON.stringify(report.raw)}`);
				}
			} catch (error) {
				if (error instanceof AttachmentError) {
					throw error;
				}
				this.logger.debug('Error checking task status', { taskId, error: errorMessage(error) });
			}

			if (now - lastProgress >= PROGRESS_LOG_INTERVAL) {
				lastProgress = now;
				this.logger.info(`Waiting for task ${taskId}... (${Math.round(elapsed / 1000)}s elapsed)`);
			}

			await this.clock.sleep(interval, signal);
		}
	}
}
