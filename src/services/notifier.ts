import { logThought } from '../utils/logger.js';
import { DeliveryError, describeError } from '../utils/errors.js';
import { sleep as defaultSleep, throwIfAborted, type SleepFn } from '../utils/sleep.js';
import {
    initialBackoff,
    nextBackoff,
    resolveRetryOptions,
    type BackoffState,
    type RetryOptions,
} from '../utils/retry.js';
import type { FormatMode, MessageTransport, SendOutcome } from '../types/messaging.js';

export interface NotifierOptions extends RetryOptions {
    /** Maximum admitted send attempts per window. @default 20 */
    maxMessagesPerWindow?: number;
    /** Length of the rate-limit window in ms. @default 1000 */
    rateLimitWindowMs?: number;
    /** Clock used for rate-limit bookkeeping. */
    now?: () => number;
    /** Delay primitive; replaced in tests. Must reject when `signal` aborts. */
    sleep?: SleepFn;
    /** Label used in log messages. */
    label?: string;
}

export interface NotifierStats {
    delivered: number;
    failed: number;
    /** Times the remote endpoint asked us to back off. */
    throttled: number;
    /** Transient failures that were retried. */
    retried: number;
}

const DEFAULT_MAX_MESSAGES_PER_WINDOW = 20;
const DEFAULT_RATE_LIMIT_WINDOW_MS = 1000;

/**
 * Delivers messages to a {@link MessageTransport} under a sliding-window
 * rate limit, honouring remote "retry after" requests and retrying transient
 * failures with exponential backoff.
 *
 * Every attempt is admitted through the rate-limit gate and consumes budget,
 * whether or not it succeeds. Admission is serialized, so concurrent callers
 * never push a window past its cap.
 *
 * Usage:
 * ```ts
 * const notifier = new Notifier(new TelegramHandler(token, chatId));
 * await notifier.send('*hello*');
 * ```
 */
export class Notifier {
    readonly #transport: MessageTransport;
    readonly #maxPerWindow: number;
    readonly #windowMs: number;
    readonly #retry: Required<RetryOptions>;
    readonly #now: () => number;
    readonly #sleep: SleepFn;
    readonly #label: string;
    #timestamps: number[] = [];
    #gate: Promise<void> = Promise.resolve();
    readonly #stats: NotifierStats = { delivered: 0, failed: 0, throttled: 0, retried: 0 };

    constructor(transport: MessageTransport, options: NotifierOptions = {}) {
        this.#transport = transport;
        this.#maxPerWindow = Math.max(1, Math.floor(options.maxMessagesPerWindow ?? DEFAULT_MAX_MESSAGES_PER_WINDOW));
        this.#windowMs = Math.max(0, options.rateLimitWindowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS);
        this.#retry = resolveRetryOptions(options);
        this.#now = options.now ?? (() => Date.now());
        this.#sleep = options.sleep ?? defaultSleep;
        this.#label = options.label ?? 'notifier';
    }

    stats(): NotifierStats {
        return { ...this.#stats };
    }

    /** Number of admissions currently counted against the window. */
    get windowCount(): number {
        this.#prune(this.#now());
        return this.#timestamps.length;
    }

    /**
     * Deliver one message. Resolves once the endpoint acknowledged an attempt;
     * rejects with a {@link DeliveryError} when retries run out or the message
     * is refused, and rethrows anything the transport could not categorize.
     *
     * Aborting `signal` interrupts any wait (local window, remote retry-after,
     * backoff) and rejects with an `AbortError`; no further attempt is made.
     */
    async send(text: string, format: FormatMode = 'MarkdownV2', signal?: AbortSignal): Promise<void> {
        let backoff: BackoffState = initialBackoff(this.#retry);

        await logThought(`[Notifier] ${this.#label} is sending: ${text}`);

        for (;;) {
            throwIfAborted(signal);
            await this.#admit(signal);

            let outcome: SendOutcome;
            try {
                outcome = await this.#transport.send(text, format);
            } catch (err) {
                this.#stats.failed += 1;
                const stack = err instanceof Error && err.stack ? `\n${err.stack}` : '';
                console.error(`[Notifier] Unexpected error sending message (${this.#label}):`, err);
                await logThought(
                    `[Notifier] Unexpected error on attempt ${backoff.attempt} (${this.#label}, ${format}, ${text.length} chars): ${describeError(err)}${stack}`,
                    'error',
                );
                throw err;
            }

            switch (outcome.status) {
                case 'ok':
                    this.#stats.delivered += 1;
                    if (backoff.attempt > 1) {
                        await logThought(`[Notifier] ${this.#label} succeeded on attempt ${backoff.attempt}/${this.#retry.maxAttempts}.`);
                    }
                    return;

                case 'rate_limited': {
                    this.#stats.throttled += 1;
                    const waitMs = Math.max(0, outcome.retryAfterSeconds) * 1000;
                    console.warn(`[Notifier] Remote rate limit hit, waiting ${outcome.retryAfterSeconds}s`);
                    await logThought(`[Notifier] Remote rate limit hit, waiting ${outcome.retryAfterSeconds}s.`, 'warn');
                    await this.#sleep(waitMs, signal);
                    break;
                }

                case 'transient': {
                    const next = nextBackoff(backoff, this.#retry);
                    if (next === null) {
                        this.#stats.failed += 1;
                        console.error(`[Notifier] Failed to send message after ${backoff.attempt} attempts: ${outcome.detail}`);
                        await logThought(
                            `[Notifier] ${this.#label} exhausted all ${backoff.attempt} attempts. Last error: ${outcome.detail}.`,
                            'error',
                        );
                        throw new DeliveryError('transient_exhausted', outcome.detail, backoff.attempt);
                    }

                    this.#stats.retried += 1;
                    await logThought(
                        `[Notifier] Network error on attempt ${backoff.attempt}/${this.#retry.maxAttempts}: ${outcome.detail}. Retrying in ${backoff.delayMs}ms.`,
                        'warn',
                    );
                    await this.#sleep(backoff.delayMs, signal);
                    backoff = next;
                    break;
                }

                case 'rejected':
                    this.#stats.failed += 1;
                    console.error(`[Notifier] Message rejected: ${outcome.detail}`);
                    await logThought(`[Notifier] Message rejected by remote endpoint: ${outcome.detail}`, 'error');
                    throw new DeliveryError('rejected', outcome.detail, backoff.attempt);
            }
        }
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    /** Queue behind earlier admissions so prune-and-admit runs one caller at a time. */
    #admit(signal?: AbortSignal): Promise<void> {
        const admission = this.#gate.then(() => this.#admitNow(signal));
        this.#gate = admission.then(
            () => undefined,
            () => undefined,
        );
        return admission;
    }

    async #admitNow(signal?: AbortSignal): Promise<void> {
        throwIfAborted(signal);
        let now = this.#now();
        this.#prune(now);

        while (this.#timestamps.length >= this.#maxPerWindow) {
            const oldest = this.#timestamps[0] ?? now;
            const waitMs = this.#windowMs - (now - oldest);
            if (waitMs > 0) {
                await logThought(`[Notifier] Rate limit reached, sleeping for ${waitMs}ms.`, 'debug');
                await this.#sleep(waitMs, signal);
            }
            now = this.#now();
            this.#prune(now);
        }

        this.#timestamps.push(now);
    }

    #prune(now: number): void {
        this.#timestamps = this.#timestamps.filter((ts) => now - ts < this.#windowMs);
    }
}
