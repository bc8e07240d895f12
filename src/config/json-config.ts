import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/logger.js';
import type { WatchSpec } from '../types/file-watcher.js';

export interface DirectoryConfig {
    /** Filename suffixes to report (e.g. `.csv`). All files when omitted. */
    extensions?: string[];
    /** Maximum subdirectory depth. Unbounded when omitted. */
    recursionLimit?: number;
    /** Display label; defaults to the directory's basename. */
    label?: string;
}

export interface DropwatchConfig {
    /** Name shown in every notification. */
    name: string;
    /** Seconds between two scans. */
    intervalSeconds: number;
    telegram: {
        botToken: string;
        chatId: string;
    };
    /** Watched directories keyed by path (`~` allowed). */
    directories: Record<string, DirectoryConfig>;
    logging: {
        enabled: boolean;
        level: LogLevel;
        directory: string;
    };
    notifier: {
        maxMessagesPerWindow: number;
        rateLimitWindowMs: number;
        maxAttempts: number;
        baseDelayMs: number;
    };
    monitor: {
        errorRecoveryDelayMs: number;
        maxConcurrentScans: number;
    };
}

export const CONFIG_DIR = path.join(os.homedir(), '.config', 'dropwatch');

export const DEFAULT_CONFIG: DropwatchConfig = {
    name: 'dropwatch',
    intervalSeconds: 60,
    telegram: {
        botToken: '',
        chatId: '',
    },
    directories: {},
    logging: {
        enabled: true,
        level: 'info',
        directory: path.join(CONFIG_DIR, 'logs'),
    },
    notifier: {
        maxMessagesPerWindow: 20,
        rateLimitWindowMs: 1000,
        maxAttempts: 3,
        baseDelayMs: 1000,
    },
    monitor: {
        errorRecoveryDelayMs: 5000,
        maxConcurrentScans: 5,
    },
};

/** Environment variables that override values from the config file. */
export const ENV_OVERRIDES = {
    configPath: 'DROPWATCH_CONFIG_PATH',
    botToken: 'DROPWATCH_BOT_TOKEN',
    chatId: 'DROPWATCH_CHAT_ID',
    logLevel: 'DROPWATCH_LOG_LEVEL',
    intervalSeconds: 'DROPWATCH_INTERVAL_SECONDS',
} as const;

export function expandHome(target: string): string {
    if (target === '~') return os.homedir();
    if (target.startsWith('~/') || target.startsWith('~\\')) {
        return path.join(os.homedir(), target.slice(2));
    }
    return target;
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(expandHome(overridePath));
    const fromEnv = process.env[ENV_OVERRIDES.configPath];
    if (fromEnv) return path.resolve(expandHome(fromEnv));
    return path.join(CONFIG_DIR, 'dropwatch.json');
}

export async function ensureConfigDir(configPath: string): Promise<void> {
    const dir = path.dirname(configPath);
    if (!existsSync(dir)) {
        await fs.mkdir(dir, { recursive: true });
    }
}

export async function readConfig(overridePath?: string): Promise<DropwatchConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        const parsed: unknown = JSON.parse(rawData);
        return applyEnvOverrides(mergeWithDefaults(parsed));
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return applyEnvOverrides(mergeWithDefaults({}));
        throw new Error(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
    }
}

export async function writeConfig(config: DropwatchConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await ensureConfigDir(targetPath);
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        const serialized = JSON.stringify(config, null, 2);
        await fs.writeFile(tempPath, serialized, { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        await fs.rm(tempPath, { force: true });
        throw new Error(`Failed to save config to ${targetPath}: ${fsError.message}`);
    }
}

/**
 * Write the default configuration unless a file already exists.
 * Returns the path and whether anything was written.
 */
export async function initConfig(overridePath?: string): Promise<{ path: string; created: boolean }> {
    const targetPath = getConfigPath(overridePath);
    if (existsSync(targetPath)) {
        return { path: targetPath, created: false };
    }
    await writeConfig(cloneDefaults(), targetPath);
    return { path: targetPath, created: true };
}

/** Copy of the config safe to print: the bot token is masked. */
export function redactConfig(config: DropwatchConfig): DropwatchConfig {
    const copy = JSON.parse(JSON.stringify(config)) as DropwatchConfig;
    const token = copy.telegram.botToken;
    if (token) {
        copy.telegram.botToken = token.length > 8 ? `${token.slice(0, 4)}…[REDACTED]` : '[REDACTED]';
    }
    return copy;
}

/** One WatchSpec per configured directory, with `~` expanded. */
export function toWatchSpecs(config: DropwatchConfig): WatchSpec[] {
    return Object.entries(config.directories).map(([directory, params]) => ({
        root: path.resolve(expandHome(directory)),
        extensions: params.extensions,
        recursionLimit: params.recursionLimit,
        label: params.label,
    }));
}

function cloneDefaults(): DropwatchConfig {
    return JSON.parse(JSON.stringify(DEFAULT_CONFIG)) as DropwatchConfig;
}

function applyEnvOverrides(config: DropwatchConfig): DropwatchConfig {
    const read = (key: string): string | undefined => {
        const value = process.env[key];
        return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
    };

    const botToken = read(ENV_OVERRIDES.botToken);
    const chatId = read(ENV_OVERRIDES.chatId);
    const logLevel = read(ENV_OVERRIDES.logLevel);
    const intervalSeconds = read(ENV_OVERRIDES.intervalSeconds);

    if (botToken) config.telegram.botToken = botToken;
    if (chatId) config.telegram.chatId = chatId;
    if (logLevel) {
        const level = logLevel.toLowerCase();
        if (isLogLevel(level)) {
            config.logging.level = level;
        } else {
            console.warn(`[Config] Ignoring ${ENV_OVERRIDES.logLevel}='${logLevel}': expected one of ${LOG_LEVELS.join(', ')}.`);
        }
    }
    if (intervalSeconds) config.intervalSeconds = Number(intervalSeconds);

    return config;
}

function mergeWithDefaults(loaded: unknown): DropwatchConfig {
    const loadedRecord = (typeof loaded === 'object' && loaded !== null
        ? loaded
        : {}) as Record<string, unknown>;
    const config = cloneDefaults();

    const telegram = loadedRecord.telegram as Partial<DropwatchConfig['telegram']> | undefined;
    const directories = loadedRecord.directories as Record<string, DirectoryConfig | null> | undefined;
    const logging = loadedRecord.logging as Partial<DropwatchConfig['logging']> | undefined;
    const notifier = loadedRecord.notifier as Partial<DropwatchConfig['notifier']> | undefined;
    const monitor = loadedRecord.monitor as Partial<DropwatchConfig['monitor']> | undefined;

    if (typeof loadedRecord.name === 'string') config.name = loadedRecord.name;
    if (loadedRecord.intervalSeconds !== undefined) config.intervalSeconds = Number(loadedRecord.intervalSeconds);
    if (telegram) {
        config.telegram = { ...config.telegram, ...telegram };
        // Chat ids are often written as numbers.
        config.telegram.chatId = String(config.telegram.chatId ?? '');
        config.telegram.botToken = String(config.telegram.botToken ?? '');
    }
    if (directories && typeof directories === 'object') {
        for (const [directory, params] of Object.entries(directories)) {
            config.directories[directory] = params ?? {};
        }
    }
    if (logging) config.logging = { ...config.logging, ...logging };
    if (notifier) config.notifier = { ...config.notifier, ...notifier };
    if (monitor) config.monitor = { ...config.monitor, ...monitor };

    config.logging.directory = path.resolve(expandHome(String(config.logging.directory)));

    return config;
}
