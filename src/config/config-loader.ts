/**
 * Onboarder Configuration Loader
 * ==============================
 * Loads configuration from multiple sources with priority:
 * 1. JSON config file (ONBOARDER_CONFIG_FILE) - highest priority
 * 2. Environment variables
 * 3. Default values
 *
 * LOG_FORMAT=json switches the console to structured JSON lines.
 */

import * as fs from 'fs';
import type { LogFormat, LogLevel } from '../logging/logger';

export interface OnboarderConfig {
	// Logging
	logLevel: LogLevel;
	logFormat: LogFormat;
	logFile?: string;
	logMaxSize: string;
	logMaxFiles: number;

	// Manager session
	connectMaxRetries: number;
	connectRetryInterval: number; // ms
	requestTimeout: number; // ms

	// Device registration
	deviceUsername: string;
	defaultDevicePassword: string;

	// Waits
	readyTimeout: number; // ms
	pollInterval: number; // ms
	certificateTimeout: number; // ms
	taskTimeout: number; // ms
}

export const DEFAULT_CONFIG: OnboarderConfig = {
	logLevel: 'info',
	logFormat: 'text',
	logMaxSize: '10MB',
	logMaxFiles: 5,
	connectMaxRetries: 120,
	connectRetryInterval: 30000, // 30s
	requestTimeout: 30000, // 30s
	deviceUsername: 'admin',
	defaultDevicePassword: 'admin',
	readyTimeout: 600000, // 10min
	pollInterval: 10000, // 10s
	certificateTimeout: 300000, // 5min
	taskTimeout: 600000, // 10min
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type Env = Record<string, string | undefined>;

export class ConfigLoader {
	private fileConfig: Partial<OnboarderConfig> = {};
	private envConfig: Partial<OnboarderConfig> = {};

	constructor(private readonly env: Env = process.env) {
		this.reload();
	}

	/**
	 * Load configuration from the JSON file named by ONBOARDER_CONFIG_FILE
	 */
	private loadFileConfig(): void {
		this.fileConfig = {};
		const configFile = this.env.ONBOARDER_CONFIG_FILE;
		if (!configFile) {
			return;
		}

		if (!fs.existsSync(configFile)) {
			throw new Error(`Config file not found: ${configFile}`);
		}

		const parsed: unknown = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
		if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
			throw new Error(`Config file ${configFile} must contain a JSON object`);
		}

		const source = new Map(Object.entries(parsed));
		this.fileConfig = this.pick((key) => {
			const value = source.get(key);
			return value === undefined || value === null ? undefined : String(value);
		});
	}

	/**
	 * Load configuration from environment variables
	 */
	private loadEnvConfig(): void {
		this.envConfig = this.pick((key) => this.env[ENV_KEYS[key]]);
	}

	private pick(read: (key: keyof OnboarderConfig) => string | undefined): Partial<OnboarderConfig> {
		return {
			logLevel: this.parseLogLevel(read('logLevel')),
			logFormat: this.parseLogFormat(read('logFormat')),
			logFile: read('logFile'),
			logMaxSize: read('logMaxSize'),
			logMaxFiles: this.parseNumber(read('logMaxFiles')),
			connectMaxRetries: this.parseNumber(read('connectMaxRetries')),
			connectRetryInterval: this.parseNumber(read('connectRetryInterval')),
			requestTimeout: this.parseNumber(read('requestTimeout')),
			deviceUsername: read('deviceUsername'),
			defaultDevicePassword: read('defaultDevicePassword'),
			readyTimeout: this.parseNumber(read('readyTimeout')),
			pollInterval: this.parseNumber(read('pollInterval')),
			certificateTimeout: this.parseNumber(read('certificateTimeout')),
			taskTimeout: this.parseNumber(read('taskTimeout')),
		};
	}

	/**
	 * Get merged configuration (file overrides ENV overrides defaults)
	 */
	public getConfig(): OnboarderConfig {
		const resolve = <K extends keyof OnboarderConfig>(key: K): OnboarderConfig[K] =>
			this.fileConfig[key] ?? this.envConfig[key] ?? DEFAULT_CONFIG[key];

		return {
			logLevel: resolve('logLevel'),
			logFormat: resolve('logFormat'),
			logFile: resolve('logFile'),
			logMaxSize: resolve('logMaxSize'),
			logMaxFiles: resolve('logMaxFiles'),
			connectMaxRetries: resolve('connectMaxRetries'),
			connectRetryInterval: resolve('connectRetryInterval'),
			requestTimeout: resolve('requestTimeout'),
			deviceUsername: resolve('deviceUsername'),
			defaultDevicePassword: resolve('defaultDevicePassword'),
			readyTimeout: resolve('readyTimeout'),
			pollInterval: resolve('pollInterval'),
			certificateTimeout: resolve('certificateTimeout'),
			taskTimeout: resolve('taskTimeout'),
		};
	}

	public get<K extends keyof OnboarderConfig>(key: K): OnboarderConfig[K] {
		return this.getConfig()[key];
	}

	public reload(): void {
		this.loadFileConfig();
		this.loadEnvConfig();
	}

	// ========================================================================
	// Helpers
	// ========================================================================

	private parseNumber(value: string | undefined): number | undefined {
		if (value === undefined) return undefined;
		const num = parseInt(value, 10);
		return isNaN(num) ? undefined : num;
	}

	private parseLogLevel(value: string | undefined): LogLevel | undefined {
		if (value === undefined) return undefined;
		const normalized = value.toLowerCase();
		return LOG_LEVELS.find((level) => level === normalized);
	}

	private parseLogFormat(value: string | undefined): LogFormat | undefined {
		const normalized = value?.toLowerCase();
		return normalized === 'json' || normalized === 'text' ? normalized : undefined;
	}
}

const ENV_KEYS: Record<keyof OnboarderConfig, string> = {
	logLevel: 'LOG_LEVEL',
	logFormat: 'LOG_FORMAT',
	logFile: 'LOG_FILE',
	logMaxSize: 'LOG_MAX_SIZE',
	logMaxFiles: 'LOG_MAX_FILES',
	connectMaxRetries: 'CONNECT_MAX_RETRIES',
	connectRetryInterval: 'CONNECT_RETRY_INTERVAL',
	requestTimeout: 'REQUEST_TIMEOUT',
	deviceUsername: 'DEVICE_USERNAME',
	defaultDevicePassword: 'DEFAULT_DEVICE_PASSWORD',
	readyTimeout: 'READY_TIMEOUT',
	pollInterval: 'POLL_INTERVAL',
	certificateTimeout: 'CERTIFICATE_TIMEOUT',
	taskTimeout: 'TASK_TIMEOUT',
};
