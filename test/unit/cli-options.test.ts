import { describe, it, expect } from '@jest/globals';
import { InvalidArgumentError } from 'commander';
import {
	collectTag,
	increaseVerbosity,
	parsePort,
	parseSeconds,
	verbosityToLogLevel,
} from '../../cli/options';

describe('CLI options', () => {
	it('should map repeated -v flags to log levels', () => {
		const verbosity = ['', ''].reduce((count, flag) => increaseVerbosity(flag, count), 0);

		expect(verbosity).toBe(2);
		expect(verbosityToLogLevel(0)).toBe('warn');
		expect(verbosityToLogLevel(1)).toBe('info');
		expect(verbosityToLogLevel(verbosity)).toBe('debug');
	});

	it('should convert seconds to milliseconds', () => {
		expect(parseSeconds('900')).toBe(900000);
		expect(parseSeconds('1.5')).toBe(1500);
	});

	it('should reject non-positive durations', () => {
		expect(() => parseSeconds('0')).toThrow(InvalidArgumentError);
		expect(() => parseSeconds('ten')).toThrow('Expected a positive number of seconds.');
	});

	it('should accept ports in range only', () => {
		expect(parsePort('8443')).toBe(8443);
		expect(() => parsePort('70000')).toThrow('Expected a port between 1 and 65535.');
		expect(() => parsePort('443.5')).toThrow(InvalidArgumentError);
	});

	it('should collect known backup tags', () => {
		expect(collectTag('config_group', collectTag('template_device', []))).toEqual([
			'template_device',
			'config_group',
		]);
		expect(() => collectTag('policies', [])).toThrow('Unknown tag. Choose from: all, template_device, config_group.');
	});
});
