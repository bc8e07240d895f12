import { getConfigPath, initConfig, readConfig, redactConfig } from '../config/json-config.js';
import { formatValidationReport, validateConfig } from '../config/config-validator.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: dropwatch [command] [options]

Commands:
  (none)              Start monitoring the configured directories
  config show         Print the merged configuration (token redacted)
  config init         Write a default config file if none exists
  config validate     Check the configuration and report problems
  logs [--follow|-f]  Print or tail today's log file
    [--date <day>]    Print another day's log (YYYY-MM-DD)

Options:
  --config <path>     Use a specific config file (default: ~/.config/dropwatch/dropwatch.json)
  --help, -h          Show this help message

Environment:
  DROPWATCH_CONFIG_PATH, DROPWATCH_BOT_TOKEN, DROPWATCH_CHAT_ID,
  DROPWATCH_LOG_LEVEL, DROPWATCH_INTERVAL_SECONDS

Examples:
  dropwatch config init
  dropwatch --config ./dropwatch.json config validate
  dropwatch logs --follow
  dropwatch
`.trim();

const KNOWN_COMMANDS = new Set(['config', 'logs']);

/**
 * Split `--config <path>` out of argv.
 * Returns the remaining arguments and the path, if given. A `--config`
 * without a usable value yields `error` instead of falling back to the default.
 */
export function extractConfigOption(argv: string[]): { args: string[]; configPath?: string; error?: string } {
    const args: string[] = [];
    let configPath: string | undefined;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i] ?? '';
        if (arg === '--config' || arg.startsWith('--config=')) {
            const value = arg === '--config' ? argv[++i] : arg.slice('--config='.length);
            if (!value || value.startsWith('-')) {
                return { args, error: `--config expects a file path, got '${value ?? ''}'` };
            }
            configPath = value;
        } else {
            args.push(arg);
        }
    }

    return configPath ? { args, configPath } : { args };
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Handle `config show|init|validate`.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleConfigCli(argv: string[], configPath?: string): Promise<boolean> {
    if (argv[0] !== 'config') return false;

    const subcommand = argv[1] ?? 'show';

    try {
        switch (subcommand) {
            case 'show': {
                const config = await readConfig(configPath);
                console.log(`# ${getConfigPath(configPath)}`);
                console.log(JSON.stringify(redactConfig(config), null, 2));
                process.exitCode = 0;
                break;
            }
            case 'init': {
                const result = await initConfig(configPath);
                console.log(
                    result.created
                        ? `[dropwatch] Wrote default configuration to ${result.path}`
                        : `[dropwatch] Configuration already exists at ${result.path}; left untouched.`,
                );
                process.exitCode = 0;
                break;
            }
            case 'validate': {
                const config = await readConfig(configPath);
                const result = validateConfig(config);
                console.log(formatValidationReport(result));
                process.exitCode = result.ok ? 0 : 1;
                break;
            }
            default:
                console.error(`[dropwatch] Unknown config subcommand: '${subcommand}'`);
                console.error(`Run 'dropwatch --help' to see available commands.`);
                process.exitCode = 1;
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[dropwatch] config ${subcommand} failed: ${message}`);
        process.exitCode = 1;
    }

    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0] ?? '';

    if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
        return false;
    }

    console.error(`[dropwatch] Unknown command: '${command}'`);
    console.error(`Run 'dropwatch --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}
