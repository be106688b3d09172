/**
 * SESSION MANAGER
 * ===============
 *
 * Holds the single authenticated session to the SD-WAN manager.
 *
 * The manager is frequently still booting when onboarding starts, so connection
 * attempts are retried at a fixed interval (default 120 x 30s = 1 hour).
 * Rejected credentials are never retried.
 */

import axios from 'axios';
import {
	AuthenticationError,
	ConnectionError,
	ManagerRequestError,
	SessionError,
	errorMessage,
} from '../errors';
import type { ManagerEndpoint } from '../inventory/types';
import type { ComponentLogger } from '../logging/component-logger';
import type { ManagerClient } from '../manager/types';
import { Clock, systemClock, throwIfAborted } from '../polling/clock';

export type SessionFactory = (endpoint: ManagerEndpoint) => Promise<ManagerClient>;

export type ConnectionFailureKind = 'transient' | 'authentication' | 'fatal';

export interface SessionManagerOptions {
	factory: SessionFactory;
	logger: ComponentLogger;
	clock?: Clock;
	maxRetries?: number;
	retryInterval?: number; // ms
}

// Socket-level failures while the manager is still coming up
const TRANSIENT_NETWORK_CODES = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ECONNABORTED',
	'ETIMEDOUT',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'ENOTFOUND',
	'EAI_AGAIN',
	'EPIPE',
]);

function hasUnauthorizedSignal(status: number | undefined, message: string): boolean {
	return status === 401 || /\b401\b|unauthori[sz]ed/i.test(message);
}

export function classifyConnectionFailure(error: unknown): ConnectionFailureKind {
	if (error instanceof ManagerRequestError) {
		return hasUnauthorizedSignal(error.status, error.message) ? 'authentication' : 'transient';
	}

	if (axios.isAxiosError(error)) {
		return hasUnauthorizedSignal(error.response?.status, error.message) ? 'authentication' : 'transient';
	}

	if (error instanceof Error && 'code' in error && typeof error.code === 'string'
		&& TRANSIENT_NETWORK_CODES.has(error.code)) {
		return 'transient';
	}

	return 'fatal';
}

export class SessionManager {
	private current?: ManagerClient;
	private readonly logger: ComponentLogger;
	private readonly clock: Clock;
	private readonly factory: SessionFactory;
	private readonly maxRetries: number;
	private readonly retryInterval: number;

	constructor(readonly endpoint: ManagerEndpoint, options: SessionManagerOptions) {
		this.factory = options.factory;
		this.logger = options.logger;
		this.clock = options.clock ?? systemClock;
		this.maxRetries = options.maxRetries ?? 120;
		this.retryInterval = options.retryInterval ?? 30000;
	}

	get session(): ManagerClient | undefined {
		return this.current;
	}

	isConnected(): boolean {
		return this.current !== undefined;
	}

	/**
	 * Connect with retry. A timeout (ms) overrides the attempt budget with
	 * timeout / retryInterval attempts.
	 */
	async connect(timeout?: number, signal?: AbortSignal): Promise<ManagerClient> {
		if (this.current) {
			return this.current;
		}

		const maxAttempts = timeout
			? Math.max(1, Math.floor(timeout / this.retryInterval))
			: this.maxRetries;

		this.logger.info(`Connecting to manager at ${this.endpoint.url}:${this.endpoint.port}`);

		let attempts = 0;
		let lastError: unknown;

		while (attempts < maxAttempts) {
			throwIfAborted(signal);

			try {
				this.current = await this.factory(this.endpoint);
				this.logger.info('Successfully connected to manager', { attempts: attempts + 1 });
				return this.current;
			} catch (error) {
				const kind = classifyConnectionFailure(error);

				if (kind === 'authentication') {
					throw new AuthenticationError(
						`Authentication failed for user '${this.endpoint.username}'`,
						{ cause: error }
					);
				}
				if (kind === 'fatal') {
					throw new SessionError(
						`Unexpected error connecting to manager: ${errorMessage(error)}`,
						{ cause: error }
					);
				}

				lastError = error;
				attempts++;
				this.logger.debug('Manager not reachable yet', {
					attempt: attempts,
					maxAttempts,
					error: errorMessage(error),
				});
				if (attempts % 10 === 0) {
					this.logger.info(`Waiting for manager API (attempt ${attempts}/${maxAttempts})...`);
				}

				if (attempts < maxAttempts) {
					await this.clock.sleep(this.retryInterval, signal);
				}
			}
		}

		throw new ConnectionError(
			`Failed to connect to manager after ${maxAttempts} attempts. Last error: ${errorMessage(lastError)}`,
			maxAttempts,
			{ cause: lastError }
		);
	}

	/**
	 * Release the session. Safe to call repeatedly or without a session.
	 */
	async close(): Promise<void> {
		const session = this.current;
		if (!session) {
			this.logger.debug('No active session to close');
			return;
		}

		this.current = undefined;
		try {
			await session.logout();
			this.logger.debug('Manager session closed');
		} catch (error) {
			this.logger.warn('Error while logging out of manager', { error: errorMessage(error) });
		}
	}

	/**
	 * Scoped acquisition: connect, run, and always close
	 */
	async withSession<T>(fn: (session: ManagerClient) => Promise<T>, signal?: AbortSignal): Promise<T> {
		const session = await this.connect(undefined, signal);
		try {
			return await fn(session);
		} finally {
			await this.close();
		}
	}
}
