import { appendFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerSettings {
    enabled: boolean;
    level: LogLevel;
    /** Directory holding one `<YYYY-MM-DD>.md` diary file per day. */
    directory: string;
}

const TELEGRAM_TOKEN_PATTERN = /(?<!\d)\d{6,12}:[A-Za-z0-9_-]{30,}/g;
const SENSITIVE_ENV_NAME = /(TOKEN|SECRET|KEY)/i;
const MIN_SENSITIVE_LENGTH = 8;

/** Literal values (e.g. a token read from the config file) redacted from every entry. */
const registeredSecrets = new Set<string>();

let settings: LoggerSettings = {
    enabled: true,
    level: 'info',
    directory: path.join(os.homedir(), '.config', 'dropwatch', 'logs'),
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function configureLogger(next: Partial<LoggerSettings>): void {
    settings = { ...settings, ...next };
}

/** Redact `value` from all later log output. Short values are ignored. */
export function registerSecret(value: string): void {
    if (value.length >= MIN_SENSITIVE_LENGTH) registeredSecrets.add(value);
}

export function getLoggerSettings(): LoggerSettings {
    return { ...settings };
}

export function logFilePath(date: Date = new Date()): string {
    return path.join(settings.directory, `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Redact bot tokens, registered secrets and the values of sensitive-looking
 * environment variables before anything reaches the log file.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text.replace(TELEGRAM_TOKEN_PATTERN, '[REDACTED]');

    for (const secret of registeredSecrets) {
        scrubbed = scrubbed.split(secret).join('[REDACTED]');
    }

    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SENSITIVE_LENGTH || !SENSITIVE_ENV_NAME.test(name)) continue;
        scrubbed = scrubbed.split(value).join('[REDACTED]');
    }

    return scrubbed;
}

/**
 * Append an entry to today's diary file.
 * Entries below the configured level, or any entry while logging is off, are dropped.
 */
export async function logThought(thought: string, level: LogLevel = 'info'): Promise<void> {
    if (!settings.enabled) return;
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(settings.level)) return;

    const now = new Date();
    const heading = level.charAt(0).toUpperCase() + level.slice(1);
    const entry = `## ${heading} @ ${now.toISOString()}\n${scrubSensitiveText(thought)}\n\n`;

    try {
        await mkdir(settings.directory, { recursive: true });
        await appendFile(logFilePath(now), entry, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log entry: ${message}`);
    }
}
