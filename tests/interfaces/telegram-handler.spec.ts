import { describe, expect, it, vi } from 'vitest';
import { TelegramHandler, classifyTelegramError, type TelegramSender } from '../../src/interfaces/telegram_handler.js';

function telegramError(errorCode: number, description: string, parameters?: Record<string, unknown>) {
    return Object.assign(new Error(`ETELEGRAM: ${errorCode} ${description}`), {
        code: 'ETELEGRAM',
        response: { body: { ok: false, error_code: errorCode, description, parameters } },
    });
}

function fakeBot(impl: TelegramSender['sendMessage']): TelegramSender {
    return { sendMessage: vi.fn(impl) };
}

describe('classifyTelegramError', () => {
    it('maps 429 with retry_after to rate_limited', () => {
        expect(classifyTelegramError(telegramError(429, 'Too Many Requests', { retry_after: 7 }))).toEqual({
            status: 'rate_limited',
            retryAfterSeconds: 7,
        });
    });

    it('maps 429 without retry_after to transient', () => {
        expect(classifyTelegramError(telegramError(429, 'Too Many Requests'))).toEqual({
            status: 'transient',
            detail: 'ETELEGRAM: 429 Too Many Requests',
        });
    });

    it('maps server errors to transient', () => {
        expect(classifyTelegramError(telegramError(502, 'Bad Gateway'))?.status).toBe('transient');
    });

    it('maps other API errors to rejected', () => {
        expect(classifyTelegramError(telegramError(400, "Bad Request: can't parse entities"))).toEqual({
            status: 'rejected',
            detail: "ETELEGRAM: 400 Bad Request: can't parse entities",
        });
    });

    it('maps network and parse failures to transient', () => {
        const network = Object.assign(new Error('EFATAL: Error: socket hang up'), { code: 'EFATAL' });
        const parse = Object.assign(new Error('EPARSE: bad body'), { code: 'EPARSE' });

        expect(classifyTelegramError(network)).toEqual({ status: 'transient', detail: 'EFATAL: Error: socket hang up' });
        expect(classifyTelegramError(parse)?.status).toBe('transient');
    });

    it('leaves unknown errors unclassified', () => {
        expect(classifyTelegramError(new Error('boom'))).toBeNull();
        expect(classifyTelegramError('boom')).toBeNull();
    });
});

describe('TelegramHandler', () => {
    it('sends MarkdownV2 messages with the parse mode set', async () => {
        const bot = fakeBot(async () => ({ message_id: 1, date: 0, chat: { id: 42, type: 'private' } }));
        const handler = new TelegramHandler('test-secret', 42, bot);

        await expect(handler.send('*hi*', 'MarkdownV2')).resolves.toEqual({ status: 'ok' });
        expect(bot.sendMessage).toHaveBeenCalledWith('42', '*hi*', { parse_mode: 'MarkdownV2' });
        expect(handler.chatId).toBe('42');
    });

    it('sends plain messages without options', async () => {
        const bot = fakeBot(async () => ({ message_id: 1, date: 0, chat: { id: 42, type: 'private' } }));
        const handler = new TelegramHandler('test-secret', '42', bot);

        await handler.send('hi', 'plain');

        expect(bot.sendMessage).toHaveBeenCalledWith('42', 'hi');
    });

    it('returns the classified outcome when the API refuses', async () => {
        const bot = fakeBot(async () => {
            throw telegramError(429, 'Too Many Requests', { retry_after: 3 });
        });
        const handler = new TelegramHandler('test-secret', '42', bot);

        await expect(handler.send('hi', 'plain')).resolves.toEqual({ status: 'rate_limited', retryAfterSeconds: 3 });
    });

    it('rethrows errors it cannot classify', async () => {
        const bug = new TypeError('unexpected');
        const handler = new TelegramHandler('test-secret', '42', fakeBot(async () => {
            throw bug;
        }));

        await expect(handler.send('hi', 'plain')).rejects.toBe(bug);
    });
});
