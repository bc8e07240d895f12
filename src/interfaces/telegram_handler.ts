import TelegramBot from 'node-telegram-bot-api';
import type { FormatMode, MessageTransport, SendOutcome } from '../types/messaging.js';

/** The slice of the Bot API client this transport uses. */
export type TelegramSender = Pick<TelegramBot, 'sendMessage'>;

const HTTP_TOO_MANY_REQUESTS = 429;

function asRecord(value: unknown): Record<string, unknown> | null {
    return typeof value === 'object' && value !== null ? (value as Record<string, unknown>) : null;
}

function errorMessage(err: Record<string, unknown>): string {
    return typeof err.message === 'string' ? err.message : 'unknown Telegram error';
}

/**
 * Map a `node-telegram-bot-api` failure onto the transport contract.
 *
 * - `ETELEGRAM` 429 with `retry_after` → rate_limited
 * - `ETELEGRAM` 429 without it, or any 5xx → transient
 * - other `ETELEGRAM` → rejected
 * - `EFATAL` (network, timeout) and `EPARSE` (unreadable response) → transient
 *
 * Returns `null` for anything else so the caller can rethrow it.
 */
export function classifyTelegramError(err: unknown): SendOutcome | null {
    const record = asRecord(err);
    if (!record) return null;

    const detail = errorMessage(record);

    switch (record.code) {
        case 'EFATAL':
        case 'EPARSE':
            return { status: 'transient', detail };

        case 'ETELEGRAM': {
            const body = asRecord(asRecord(record.response)?.body);
            const errorCode = typeof body?.error_code === 'number' ? body.error_code : null;
            const retryAfter = asRecord(body?.parameters)?.retry_after;

            if (errorCode === HTTP_TOO_MANY_REQUESTS && typeof retryAfter === 'number') {
                return { status: 'rate_limited', retryAfterSeconds: retryAfter };
            }
            if (errorCode === HTTP_TOO_MANY_REQUESTS || (errorCode !== null && errorCode >= 500)) {
                return { status: 'transient', detail };
            }
            return { status: 'rejected', detail };
        }

        default:
            return null;
    }
}

/**
 * Outbound-only Telegram channel. Polling stays off: dropwatch never reads
 * inbound messages.
 */
export class TelegramHandler implements MessageTransport {
    readonly #bot: TelegramSender;
    readonly #chatId: string;

    /**
     * @param token  - Telegram Bot token from @BotFather.
     * @param chatId - Chat (user, group or channel) receiving the notifications.
     * @param bot    - Pre-built client; a polling-free `TelegramBot` is created when omitted.
     */
    constructor(token: string, chatId: string | number, bot?: TelegramSender) {
        this.#bot = bot ?? new TelegramBot(token, { polling: false });
        this.#chatId = String(chatId);
    }

    get chatId(): string {
        return this.#chatId;
    }

    async send(text: string, format: FormatMode): Promise<SendOutcome> {
        try {
            if (format === 'MarkdownV2') {
                await this.#bot.sendMessage(this.#chatId, text, { parse_mode: 'MarkdownV2' });
            } else {
                await this.#bot.sendMessage(this.#chatId, text);
            }
            return { status: 'ok' };
        } catch (err) {
            const outcome = classifyTelegramError(err);
            if (outcome === null) throw err;
            return outcome;
        }
    }
}
