#!/usr/bin/env node
/**
 * SD-WAN onboarding CLI
 *
 * Usage:
 *   sdwan-onboard onboard devices.yaml --timeout 900 -v
 *   sdwan-onboard backup ./backup -m https://manager.example.com -u admin -p <password>
 *   sdwan-onboard restore ./backup -m https://manager.example.com -u admin -p <password> --attach
 *
 * Settings not exposed as flags (retry budget, poll intervals, log file) come
 * from the environment or ONBOARDER_CONFIG_FILE; see ConfigLoader.
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import type { BackupTag } from '../src/backup/engine';
import { ConfigLoader } from '../src/config/config-loader';
import { errorMessage } from '../src/errors';
import { parseInventory } from '../src/inventory/inventory';
import { Orchestrator, OrchestratorOptions } from '../src/orchestrator';
import {
	collectTag,
	increaseVerbosity,
	parsePort,
	parseSeconds,
	verbosityToLogLevel,
} from './options';

interface GlobalOptions {
	verbose: number;
}

interface OnboardCommandOptions {
	skipExisting: boolean;
	wait: boolean;
	timeout?: number;
}

interface ManagerCommandOptions {
	manager: string;
	username: string;
	password: string;
	port: number;
	verify: boolean;
	mrf: boolean;
	tag: BackupTag[];
}

interface BackupCommandOptions extends ManagerCommandOptions {
	saveRunning: boolean;
}

interface RestoreCommandOptions extends ManagerCommandOptions {
	attach: boolean;
}

const program = new Command();

function orchestratorOptions(): OrchestratorOptions {
	const config = new ConfigLoader().getConfig();
	const { verbose } = program.opts<GlobalOptions>();
	return {
		config: { ...config, logLevel: verbosityToLogLevel(verbose) },
	};
}

function managerOnlyOrchestrator(options: ManagerCommandOptions): Orchestrator {
	const inventory = parseInventory({
		manager: {
			url: options.manager,
			username: options.username,
			password: options.password,
			port: options.port,
			verify: options.verify,
		},
	});
	return new Orchestrator(inventory, orchestratorOptions());
}

/**
 * Run a command against an orchestrator; Ctrl-C aborts waits and the session
 * is always closed.
 */
async function run(orchestrator: Orchestrator, task: (signal: AbortSignal) => Promise<void>): Promise<void> {
	const controller = new AbortController();
	const onSigint = () => controller.abort();
	process.once('SIGINT', onSigint);

	try {
		await task(controller.signal);
	} finally {
		process.removeListener('SIGINT', onSigint);
		await orchestrator.cleanup();
	}
}

program
	.name('sdwan-onboard')
	.description('Onboard SD-WAN control plane and edge devices, back up and restore manager configuration')
	.version('0.1.0')
	.option('-v, --verbose', 'Increase log verbosity (repeatable)', increaseVerbosity, 0);

program
	.command('onboard')
	.description('Onboard every device listed in an inventory file')
	.argument('<device-file>', 'YAML device inventory')
	.option('--no-skip-existing', 'Re-register devices that are already onboarded')
	.option('--no-wait', 'Do not wait for devices to become ready')
	.option('--timeout <seconds>', 'Readiness wait timeout in seconds', parseSeconds)
	.action(async (deviceFile: string, options: OnboardCommandOptions) => {
		const orchestrator = Orchestrator.fromFile(deviceFile, orchestratorOptions());
		await run(orchestrator, async (signal) => {
			const result = await orchestrator.onboard({
				skipExisting: options.skipExisting,
				waitForReady: options.wait,
				timeout: options.timeout,
				signal,
			});
			console.log(JSON.stringify(result, null, 2));
		});
	});

function addManagerOptions(command: Command): Command {
	return command
		.requiredOption('-m, --manager <url>', 'Manager URL')
		.requiredOption('-u, --username <username>', 'Manager username')
		.requiredOption('-p, --password <password>', 'Manager password')
		.option('--port <port>', 'Manager port', parsePort, 443)
		.option('--verify', 'Verify the manager TLS certificate', false)
		.option('-t, --tag <tag>', 'Item tag to include (repeatable, default: all)', collectTag, [])
		.option('--no-mrf', 'Skip MRF regions and subregions');
}

addManagerOptions(
	program
		.command('backup')
		.description('Back up manager configuration to a directory')
		.argument('<output-dir>', 'Backup directory')
		.option('--save-running', 'Also save the running config of every device', false)
).action(async (outputDir: string, options: BackupCommandOptions) => {
	const orchestrator = managerOnlyOrchestrator(options);
	await run(orchestrator, async (signal) => {
		await orchestrator.backup(outputDir, {
			saveRunning: options.saveRunning,
			tags: options.tag.length > 0 ? options.tag : undefined,
			backupMrf: options.mrf,
		}, signal);
		console.log(`Backup written to ${outputDir}`);
	});
});

addManagerOptions(
	program
		.command('restore')
		.description('Restore manager configuration from a backup directory')
		.argument('<backup-dir>', 'Backup directory')
		.option('--attach', 'Attach restored items after restore', false)
).action(async (backupDir: string, options: RestoreCommandOptions) => {
	const orchestrator = managerOnlyOrchestrator(options);
	await run(orchestrator, async (signal) => {
		await orchestrator.restore(backupDir, {
			attach: options.attach,
			tags: options.tag.length > 0 ? options.tag : undefined,
			restoreMrf: options.mrf,
		}, signal);
		console.log(`Restored configuration from ${backupDir}`);
	});
});

dotenv.config();

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error(`Error: ${errorMessage(error)}`);
	process.exitCode = 1;
});
