/**
 * Component Logger
 * ================
 *
 * Wrapper around a winston logger that stamps the component name on every entry.
 * Each onboarding component receives one through its constructor.
 *
 * Usage:
 *   const logger = new ComponentLogger(baseLogger, 'SessionManager');
 *   logger.info('Connected'); // { component: 'SessionManager' } added
 *   logger.error('Login failed', error, { attempt: 3 });
 */

import type { Logger } from 'winston';

export interface LogContext {
	component?: string;
	[key: string]: unknown;
}

export class ComponentLogger {
	constructor(
		private readonly logger: Logger,
		private readonly component: string
	) {}

	private mergeContext(context?: LogContext): LogContext {
		return {
			component: this.component,
			...context,
		};
	}

	debug(message: string, context?: LogContext): void {
		this.logger.debug(message, this.mergeContext(context));
	}

	info(message: string, context?: LogContext): void {
		this.logger.info(message, this.mergeContext(context));
	}

	warn(message: string, context?: LogContext): void {
		this.logger.warn(message, this.mergeContext(context));
	}

	error(message: string, error?: unknown, context?: LogContext): void {
		const errorContext = error instanceof Error ? {
			error: {
				name: error.name,
				message: error.message,
				stack: error.stack,
			},
		} : error !== undefined ? { error: String(error) } : {};

		this.logger.error(message, {
			...this.mergeContext(context),
			...errorContext,
		});
	}

	/**
	 * Logger for a sub-component sharing the same transports
	 */
	forComponent(component: string): ComponentLogger {
		return new ComponentLogger(this.logger, component);
	}
}
