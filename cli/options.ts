import { InvalidArgumentError } from 'commander';
import { BackupTag, BACKUP_TAGS, isBackupTag } from '../src/backup/engine';
import type { LogLevel } from '../src/logging/logger';

/**
 * -v => info, -vv => debug; warnings only by default
 */
export function verbosityToLogLevel(verbosity: number): LogLevel {
	if (verbosity >= 2) {
		return 'debug';
	}
	return verbosity === 1 ? 'info' : 'warn';
}

export function increaseVerbosity(_value: string, previous: number): number {
	return previous + 1;
}

/**
 * Parse a positive duration in seconds into milliseconds
 */
export function parseSeconds(value: string): number {
	const seconds = Number(value);
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new InvalidArgumentError('Expected a positive number of seconds.');
	}
	return seconds * 1000;
}

export function parsePort(value: string): number {
	const port = Number(value);
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new InvalidArgumentError('Expected a port between 1 and 65535.');
	}
	return port;
}

export function collectTag(value: string, previous: BackupTag[]): BackupTag[] {
	if (!isBackupTag(value)) {
		throw new InvalidArgumentError(`Unknown tag. Choose from: ${BACKUP_TAGS.join(', ')}.`);
	}
	return [...previous, value];
}
