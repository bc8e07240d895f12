#!/usr/bin/env node
import 'dotenv/config';
import { extractConfigOption, handleConfigCli, handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { createMonitor } from './core/runtime.js';
import { readConfig, getConfigPath } from './config/json-config.js';
import { formatValidationReport, validateConfig } from './config/config-validator.js';
import { configureLogger, logThought } from './utils/logger.js';
import { describeError } from './utils/errors.js';

const { args, configPath, error: usageError } = extractConfigOption(process.argv.slice(2));

async function main(): Promise<void> {
    if (usageError) {
        console.error(`[dropwatch] ${usageError}`);
        console.error(`Run 'dropwatch --help' to see available commands.`);
        process.exitCode = 1;
        return;
    }

    // ── Early one-shot CLI commands (bypass monitor startup) ──────────────────

    if (handleHelpCli(args)) return;
    if (await handleConfigCli(args, configPath)) return;
    if (handleUnknownCommand(args)) return;

    const config = await readConfig(configPath);
    configureLogger(config.logging);

    if (await handleLogsCli(args)) return;

    // ── Startup ──────────────────────────────────────────────────────────────

    const validation = validateConfig(config);
    if (!validation.ok) {
        console.error(`[dropwatch] Cannot start with ${getConfigPath(configPath)}:`);
        console.error(formatValidationReport(validation));
        process.exitCode = 1;
        return;
    }

    const monitor = await createMonitor(config);
    const controller = new AbortController();

    // ── Signal Handlers ──────────────────────────────────────────────────────

    const stop = (signal: NodeJS.Signals): void => {
        if (controller.signal.aborted) return;
        console.log(`[dropwatch] Received ${signal}; shutting down.`);
        void logThought(`[dropwatch] Received ${signal}; shutting down.`);
        controller.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    console.log(`[dropwatch] ${config.name} is watching ${Object.keys(config.directories).length} director(ies).`);
    await monitor.run(controller.signal);
    await logThought('[dropwatch] Monitor stopped.');
}

main().catch((err) => {
    const message = describeError(err);
    console.error(`[dropwatch] EXITING due to error: ${message}`);
    void logThought(`[dropwatch] EXITING due to error: ${message}`, 'error');
    process.exitCode = 1;
});
