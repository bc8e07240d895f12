/**
 * Structured validation of a loaded {@link DropwatchConfig}.
 *
 * Issues never include the bot token itself, so results are safe to print.
 */

import { ENV_OVERRIDES, type DropwatchConfig } from './json-config.js';
import { LOG_LEVELS, isLogLevel } from '../utils/logger.js';

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
    /** Dotted path of the offending key, e.g. `directories./data.recursionLimit`. */
    key: string;
    class: ConfigIssueClass;
    message: string;
    remediation: string;
}

export interface ConfigValidationResult {
    /** true when the monitor can start with this configuration. */
    ok: boolean;
    issues: ConfigIssue[];
    /** ISO-8601 timestamp of the validation run. */
    validatedAt: string;
}

function isPositiveInteger(value: unknown): boolean {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: unknown): boolean {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function checkDirectories(config: DropwatchConfig, issues: ConfigIssue[]): void {
    const entries = Object.entries(config.directories);

    if (entries.length === 0) {
        issues.push({
            key: 'directories',
            class: 'missing_required',
            message: 'No directories are configured for monitoring.',
            remediation: 'Add at least one entry under "directories", e.g. { "~/incoming": {} }.',
        });
        return;
    }

    for (const [directory, params] of entries) {
        if (typeof params !== 'object' || params === null || Array.isArray(params)) {
            issues.push({
                key: `directories.${directory}`,
                class: 'format_error',
                message: `Settings for '${directory}' must be an object.`,
                remediation: 'Use {} for defaults, or set "extensions" and "recursionLimit".',
            });
            continue;
        }

        if (params.recursionLimit !== undefined && !isNonNegativeInteger(params.recursionLimit)) {
            issues.push({
                key: `directories.${directory}.recursionLimit`,
                class: 'format_error',
                message: `recursionLimit for '${directory}' must be a non-negative integer, got ${JSON.stringify(params.recursionLimit)}.`,
                remediation: 'Use 0 to watch only the top level, or remove the key for unbounded depth.',
            });
        }

        if (
            params.extensions !== undefined &&
            (!Array.isArray(params.extensions) ||
                !params.extensions.every((ext) => typeof ext === 'string' && ext.length > 0))
        ) {
            issues.push({
                key: `directories.${directory}.extensions`,
                class: 'format_error',
                message: `extensions for '${directory}' must be a list of non-empty strings.`,
                remediation: 'Example: "extensions": [".csv", ".fits"].',
            });
        }
    }
}

export function validateConfig(config: DropwatchConfig): ConfigValidationResult {
    const issues: ConfigIssue[] = [];

    if (!config.telegram.botToken.trim()) {
        issues.push({
            key: 'telegram.botToken',
            class: 'missing_required',
            message: 'Telegram bot token is not set.',
            remediation: `Set telegram.botToken in the config file or export ${ENV_OVERRIDES.botToken}.`,
        });
    }

    if (!config.telegram.chatId.trim()) {
        issues.push({
            key: 'telegram.chatId',
            class: 'missing_required',
            message: 'Telegram chat id is not set.',
            remediation: `Set telegram.chatId in the config file or export ${ENV_OVERRIDES.chatId}.`,
        });
    }

    if (!config.name.trim()) {
        issues.push({
            key: 'name',
            class: 'format_error',
            message: 'name must not be empty.',
            remediation: 'Pick a short name shown in every notification.',
        });
    }

    if (!isPositiveInteger(config.intervalSeconds)) {
        issues.push({
            key: 'intervalSeconds',
            class: 'format_error',
            message: `intervalSeconds must be a positive integer, got ${JSON.stringify(config.intervalSeconds)}.`,
            remediation: 'Use the number of seconds between scans, e.g. 60.',
        });
    }

    checkDirectories(config, issues);

    if (!isLogLevel(config.logging.level)) {
        issues.push({
            key: 'logging.level',
            class: 'format_error',
            message: `logging.level must be one of ${LOG_LEVELS.join(', ')}, got ${JSON.stringify(config.logging.level)}.`,
            remediation: 'Use "info" for normal operation or "debug" when diagnosing scans.',
        });
    }

    const positiveNumbers: [string, unknown][] = [
        ['notifier.maxMessagesPerWindow', config.notifier.maxMessagesPerWindow],
        ['notifier.rateLimitWindowMs', config.notifier.rateLimitWindowMs],
        ['notifier.maxAttempts', config.notifier.maxAttempts],
        ['monitor.maxConcurrentScans', config.monitor.maxConcurrentScans],
    ];
    for (const [key, value] of positiveNumbers) {
        if (!isPositiveInteger(value)) {
            issues.push({
                key,
                class: 'format_error',
                message: `${key} must be a positive integer, got ${JSON.stringify(value)}.`,
                remediation: `Remove ${key} to use the default.`,
            });
        }
    }

    const nonNegativeNumbers: [string, unknown][] = [
        ['notifier.baseDelayMs', config.notifier.baseDelayMs],
        ['monitor.errorRecoveryDelayMs', config.monitor.errorRecoveryDelayMs],
    ];
    for (const [key, value] of nonNegativeNumbers) {
        if (!isNonNegativeInteger(value)) {
            issues.push({
                key,
                class: 'format_error',
                message: `${key} must be a non-negative integer, got ${JSON.stringify(value)}.`,
                remediation: `Remove ${key} to use the default.`,
            });
        }
    }

    return {
        ok: issues.length === 0,
        issues,
        validatedAt: new Date().toISOString(),
    };
}

/** Plain-text report of a validation result for the terminal. */
export function formatValidationReport(result: ConfigValidationResult): string {
    if (result.ok) return '✅ Configuration is valid.';

    const lines = [`❌ Configuration has ${result.issues.length} issue(s):`];
    for (const issue of result.issues) {
        lines.push(`  - [${issue.class}] ${issue.key}: ${issue.message}`);
        lines.push(`      → ${issue.remediation}`);
    }
    return lines.join('\n');
}
