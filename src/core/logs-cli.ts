import * as fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { getLoggerSettings } from '../utils/logger.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
/** Bytes of history printed before following. */
const TAIL_BYTES = 4096;

export interface LogsCliOptions {
    /** Log directory; the configured logger directory when omitted. */
    directory?: string;
    /** Reference time for "today". */
    now?: Date;
    /** Ends follow mode. Without one, SIGINT does. */
    signal?: AbortSignal;
    write?: (chunk: string) => void;
}

/** A running `--follow`. */
export interface LogFollower {
    readonly path: string;
    stop(): void;
}

interface LogsArgs {
    follow: boolean;
    day?: string;
    error?: string;
}

function parseLogsArgs(argv: string[]): LogsArgs {
    const parsed: LogsArgs = { follow: false };

    for (let i = 1; i < argv.length; i++) {
        const arg = argv[i] ?? '';
        if (arg === '--follow' || arg === '-f') {
            parsed.follow = true;
        } else if (arg === '--date') {
            const day = argv[i + 1];
            i++;
            if (!day || !DAY_PATTERN.test(day)) {
                return { ...parsed, error: `--date expects YYYY-MM-DD, got '${day ?? ''}'` };
            }
            parsed.day = day;
        } else {
            return { ...parsed, error: `Unknown logs option: '${arg}'` };
        }
    }

    return parsed;
}

/**
 * Print the last bytes of `filePath`, then stream whatever gets appended
 * until `stop()` is called. A truncated file is followed from its new end.
 */
export function followLogFile(filePath: string, write: (chunk: string) => void): LogFollower {
    let position = fs.statSync(filePath).size;

    const pump = (start: number, end: number): void => {
        if (end <= start) return;
        const stream = fs.createReadStream(filePath, { start, end: end - 1, encoding: 'utf8' });
        stream.on('data', (chunk) => write(String(chunk)));
        stream.on('error', (err) => {
            console.error(`[dropwatch logs] Failed to read ${filePath}: ${err.message}`);
        });
    };

    pump(Math.max(0, position - TAIL_BYTES), position);

    const watcher = fs.watch(filePath, (eventType) => {
        if (eventType !== 'change') return;

        const size = fs.statSync(filePath).size;
        if (size > position) pump(position, size);
        position = size;
    });

    return {
        path: filePath,
        stop: () => watcher.close(),
    };
}

/**
 * Handle `logs [--follow|-f] [--date YYYY-MM-DD]`.
 * Prints (or follows) one day's log file from the log directory.
 */
export async function handleLogsCli(argv: string[], options: LogsCliOptions = {}): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const write = options.write ?? ((chunk: string) => void process.stdout.write(chunk));
    const args = parseLogsArgs(argv);
    if (args.error) {
        console.error(`[dropwatch logs] ${args.error}`);
        process.exitCode = 1;
        return true;
    }

    const directory = options.directory ?? getLoggerSettings().directory;
    const day = args.day ?? (options.now ?? new Date()).toISOString().slice(0, 10);
    const logPath = path.join(directory, `${day}.md`);

    if (!fs.existsSync(logPath)) {
        console.error(`[dropwatch logs] No logs found for ${day} at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (!args.follow) {
        write(await readFile(logPath, 'utf8'));
        process.exitCode = 0;
        return true;
    }

    console.log(`[dropwatch logs] Following ${logPath} (Ctrl-C to stop)...\n`);
    const follower = followLogFile(logPath, write);

    if (options.signal) {
        options.signal.addEventListener('abort', () => follower.stop(), { once: true });
    } else {
        process.once('SIGINT', () => {
            follower.stop();
            process.exitCode = 0;
        });
    }

    return true;
}
