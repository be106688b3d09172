/**
 * Error taxonomy
 * ==============
 *
 * Every failure surfaced by the onboarder derives from OrchestratorError so that
 * callers (and the CLI) can tell our errors apart from programming mistakes.
 */

export class OrchestratorError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}

	/**
	 * Prefix the message with the identity of the device or step that failed.
	 * The error keeps its class so callers can still branch on it.
	 */
	withContext(prefix: string): this {
		this.message = `${prefix}: ${this.message}`;
		return this;
	}
}

export class OrchestrationError extends OrchestratorError {}

export class OperationAbortedError extends OrchestratorError {
	constructor(message = 'Operation aborted') {
		super(message);
	}
}

export class InventoryValidationError extends OrchestratorError {
	constructor(message: string, readonly issues: string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
	}
}

// ============================================================================
// Manager transport
// ============================================================================

export class ManagerRequestError extends OrchestratorError {
	constructor(
		message: string,
		readonly status?: number,
		readonly body?: string,
		options?: ErrorOptions
	) {
		super(message, options);
	}
}

// ============================================================================
// Session
// ============================================================================

export class SessionError extends OrchestratorError {}

export class ConnectionError extends SessionError {
	constructor(message: string, readonly attempts: number, options?: ErrorOptions) {
		super(message, options);
	}
}

export class AuthenticationError extends SessionError {}

// ============================================================================
// Onboarding
// ============================================================================

export class OnboardingError extends OrchestratorError {}

export interface CredentialAttempt {
	candidate: string;
	reason: string;
}

export class CredentialError extends OnboardingError {
	constructor(readonly deviceIp: string, readonly attempts: CredentialAttempt[]) {
		super(
			`Failed to authenticate to ${deviceIp} with ${attempts.map((a) => a.candidate).join(' and ')} password(s): ` +
			attempts.map((a) => `${a.candidate}: ${a.reason}`).join('; ')
		);
	}
}

export class DeviceNotFoundError extends OnboardingError {
	constructor(message: string, readonly device: string) {
		super(message);
	}
}

/**
 * Registration reported success but the device id could not be looked up afterwards.
 */
export class DeviceResolutionError extends OnboardingError {
	constructor(readonly deviceIp: string) {
		super(`Device ${deviceIp} registered but its identifier could not be resolved`);
	}
}

export class OnboardingTimeoutError extends OnboardingError {
	constructor(message: string, readonly pending: string[]) {
		super(message);
	}

	get pendingCount(): number {
		return this.pending.length;
	}
}

// ============================================================================
// Configuration attachment
// ============================================================================

export class ConfigurationError extends OrchestratorError {}

export class TemplateNotFoundError extends ConfigurationError {
	constructor(readonly templateName: string) {
		super(`Device template '${templateName}' not found in manager`);
	}
}

export class ConfigGroupNotFoundError extends ConfigurationError {
	constructor(readonly groupName: string) {
		super(
			`Configuration group '${groupName}' not found in manager. ` +
			'Ensure the manager version is 20.12 or higher.'
		);
	}
}

export class AttachmentError extends ConfigurationError {
	constructor(
		message: string,
		readonly status?: number,
		readonly body?: string,
		options?: ErrorOptions
	) {
		super(message, options);
	}
}

// ============================================================================
// Backup / restore
// ============================================================================

export class BackupRestoreError extends OrchestratorError {}

export class BackupError extends BackupRestoreError {}

export class RestoreError extends BackupRestoreError {}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Prefix a failure with the identity of the device or step it belongs to.
 * Our own errors keep their class; anything else becomes an OnboardingError.
 * Aborts pass through untouched.
 */
export function enrichError(error: unknown, prefix: string): Error {
	if (error instanceof OperationAbortedError) {
		return error;
	}
	if (error instanceof OrchestratorError) {
		return error.withContext(prefix);
	}
	return new OnboardingError(`${prefix}: ${errorMessage(error)}`, { cause: error });
}
