import { logThought } from '../utils/logger.js';
import { ConfigError, describeError, isAbortError } from '../utils/errors.js';
import { sleep as defaultSleep, type SleepFn } from '../utils/sleep.js';
import {
    composeChangeSummary,
    composeErrorNotice,
    composeShutdownNotice,
    composeStartupNotice,
} from '../services/notification-composer.js';
import type { TaggedChange } from '../types/file-watcher.js';
import type { FormatMode } from '../types/messaging.js';

export type MonitorState = 'idle' | 'starting' | 'running' | 'error_recovery' | 'shutting_down' | 'stopped';

/** What the loop needs from the watcher coordinator. */
export interface ChangeCollector {
    readonly size: number;
    checkAll(): Promise<TaggedChange[]>;
}

/** What the loop needs from the notifier. */
export interface MessageSender {
    /** Must reject promptly once `signal` aborts. */
    send(text: string, format?: FormatMode, signal?: AbortSignal): Promise<void>;
}

export interface MonitorLoopOptions {
    /** Name shown in every outbound message. */
    name: string;
    watchers: ChangeCollector;
    notifier: MessageSender;
    /** Pause between ticks, in whole seconds. */
    intervalSeconds: number;
    /** Pause after a failed tick. @default 5000 */
    errorRecoveryDelayMs?: number;
    sleep?: SleepFn;
    onStateChange?: (state: MonitorState) => void;
}

const DEFAULT_ERROR_RECOVERY_DELAY_MS = 5000;

/**
 * Polling loop: check every watcher, report what changed, sleep, repeat.
 *
 * State flow: starting → running ⇄ error_recovery → … → shutting_down → stopped.
 * Any failure inside a tick is reported and the loop keeps going; only the
 * abort signal passed to {@link run} ends it.
 */
export class MonitorLoop {
    readonly #name: string;
    readonly #watchers: ChangeCollector;
    readonly #notifier: MessageSender;
    readonly #intervalMs: number;
    readonly #intervalSeconds: number;
    readonly #errorRecoveryDelayMs: number;
    readonly #sleep: SleepFn;
    readonly #onStateChange: ((state: MonitorState) => void) | undefined;
    #state: MonitorState = 'idle';
    #ticks = 0;

    constructor(options: MonitorLoopOptions) {
        if (!Number.isInteger(options.intervalSeconds) || options.intervalSeconds <= 0) {
            throw new ConfigError(
                `[MonitorLoop] Interval must be a positive whole number of seconds, got ${options.intervalSeconds}.`,
                'intervalSeconds',
            );
        }

        this.#name = options.name;
        this.#watchers = options.watchers;
        this.#notifier = options.notifier;
        this.#intervalSeconds = options.intervalSeconds;
        this.#intervalMs = options.intervalSeconds * 1000;
        this.#errorRecoveryDelayMs = Math.max(0, options.errorRecoveryDelayMs ?? DEFAULT_ERROR_RECOVERY_DELAY_MS);
        this.#sleep = options.sleep ?? defaultSleep;
        this.#onStateChange = options.onStateChange;
    }

    get state(): MonitorState {
        return this.#state;
    }

    /** Completed tick bodies (scan + notify), successful or not. */
    get ticks(): number {
        return this.#ticks;
    }

    /** Run until `signal` aborts. Resolves once the shutdown notice has been attempted. */
    async run(signal: AbortSignal): Promise<void> {
        if (this.#state !== 'idle') {
            throw new Error(`[MonitorLoop] Loop already ${this.#state}.`);
        }

        this.#transition('starting');
        await this.#sendBestEffort(
            composeStartupNotice(this.#name, this.#watchers.size, this.#intervalSeconds),
            'startup notice',
            signal,
        );

        while (!signal.aborted) {
            this.#transition('running');

            try {
                await this.#tick(signal);
                await this.#sleep(this.#intervalMs, signal);
            } catch (err) {
                if (signal.aborted || isAbortError(err)) break;

                this.#transition('error_recovery');
                console.error(`[MonitorLoop] Error in main loop: ${describeError(err)}`);
                await logThought(`[MonitorLoop] Error in main loop: ${describeError(err)}`, 'error');
                await this.#sendBestEffort(composeErrorNotice(this.#name, err), 'error notice', signal);

                try {
                    await this.#sleep(this.#errorRecoveryDelayMs, signal);
                } catch (sleepErr) {
                    if (signal.aborted || isAbortError(sleepErr)) break;
                    throw sleepErr;
                }
            }
        }

        this.#transition('shutting_down');
        await logThought(`[MonitorLoop] ${this.#name} stopped by request.`);
        await this.#sendBestEffort(composeShutdownNotice(this.#name), 'shutdown notice');
        this.#transition('stopped');
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #tick(signal: AbortSignal): Promise<void> {
        try {
            const changes = await this.#watchers.checkAll();

            for (const change of changes) {
                await logThought(`[MonitorLoop] ${change.kind.toUpperCase()} FILE: ${change.root}/${change.path}`);
            }

            const message = composeChangeSummary(this.#name, changes, { showSource: this.#watchers.size > 1 });
            if (message !== null) {
                await this.#notifier.send(message, 'MarkdownV2', signal);
            }
        } finally {
            this.#ticks += 1;
        }
    }

    /** Shutdown passes no signal: the goodbye is still attempted after an abort. */
    async #sendBestEffort(text: string, what: string, signal?: AbortSignal): Promise<void> {
        try {
            await this.#notifier.send(text, 'MarkdownV2', signal);
        } catch (err) {
            if (isAbortError(err)) return;
            console.error(`[MonitorLoop] Failed to send ${what}: ${describeError(err)}`);
            await logThought(`[MonitorLoop] Failed to send ${what}: ${describeError(err)}`, 'error');
        }
    }

    #transition(next: MonitorState): void {
        if (this.#state === next) return;
        this.#state = next;
        void logThought(`[MonitorLoop] State → ${next}`, 'debug');
        this.#onStateChange?.(next);
    }
}
