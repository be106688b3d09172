import winston from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export interface LogConfig {
	level: LogLevel;
	format?: LogFormat; // console only; the file is always JSON
	file?: string;
	maxSize?: string; // e.g. '10MB'
	maxFiles?: number;
	silent?: boolean;
}

const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;
const DEFAULT_MAX_FILES = 5;

const SIZE_UNITS: Record<string, number> = {
	'': 1,
	b: 1,
	k: 1024,
	kb: 1024,
	m: 1024 ** 2,
	mb: 1024 ** 2,
	g: 1024 ** 3,
	gb: 1024 ** 3,
};

/**
 * Operator-facing console line: `12:00:01 info [SessionManager] Connected`
 */
export const consoleLine = winston.format.printf((entry) => {
	const { timestamp, level, message, component, ...rest } = entry;
	const scope = typeof component === 'string' ? ` [${component}]` : '';
	const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
	return `${String(timestamp)} ${level}${scope} ${String(message)}${extra}`;
});

export function createLogger(config: LogConfig): winston.Logger {
	const jsonFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.json()
	);
	const consoleFormat = config.format === 'json'
		? jsonFormat
		: winston.format.combine(
			winston.format.timestamp({ format: 'HH:mm:ss' }),
			winston.format.errors({ stack: true }),
			winston.format.colorize(),
			consoleLine
		);

	const transports: winston.transport[] = [
		// stderr keeps stdout free for command results
		new winston.transports.Console({
			level: config.level,
			format: consoleFormat,
			stderrLevels: ['debug', 'info', 'warn', 'error'],
		}),
	];

	if (config.file) {
		transports.push(
			new winston.transports.File({
				filename: config.file,
				level: config.level,
				format: jsonFormat,
				maxsize: config.maxSize ? parseSize(config.maxSize) : DEFAULT_MAX_SIZE,
				maxFiles: config.maxFiles ?? DEFAULT_MAX_FILES,
				tailable: true,
			})
		);
	}

	return winston.createLogger({
		level: config.level,
		silent: config.silent,
		transports,
		exitOnError: false,
	});
}

/**
 * Parse a human file size such as `512KB`, `10MB` or `1.5g` into bytes
 */
export function parseSize(sizeStr: string): number {
	const match = /^(\d+(?:\.\d+)?)\s*([kmg]?b?)$/i.exec(sizeStr.trim());
	const multiplier = match ? SIZE_UNITS[match[2].toLowerCase()] : undefined;
	if (!match || multiplier === undefined) {
		throw new Error(`Invalid size format: ${sizeStr}`);
	}
	return Math.floor(parseFloat(match[1]) * multiplier);
}
