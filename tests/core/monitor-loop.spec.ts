import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MonitorLoop, type ChangeCollector, type MonitorState } from '../../src/core/monitor-loop.js';
import { ConfigError } from '../../src/utils/errors.js';
import { Notifier } from '../../src/services/notifier.js';
import type { MessageTransport, SendOutcome } from '../../src/types/messaging.js';
import type { TaggedChange } from '../../src/types/file-watcher.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

function abortError(): Error {
    const err = new Error('aborted');
    err.name = 'AbortError';
    return err;
}

function collector(batches: Array<TaggedChange[] | Error>): ChangeCollector {
    return {
        size: 2,
        checkAll: vi.fn(async () => {
            const next = batches.shift() ?? [];
            if (next instanceof Error) throw next;
            return next;
        }),
    };
}

/** Sleep that records delays and aborts the run on call number `stopAt`. */
function scriptedSleep(controller: AbortController, stopAt: number) {
    const delays: number[] = [];
    const sleep = async (ms: number): Promise<void> => {
        delays.push(ms);
        if (delays.length >= stopAt) {
            controller.abort();
            throw abortError();
        }
    };
    return { delays, sleep };
}

describe('MonitorLoop', () => {
    let sent: string[];
    let states: MonitorState[];
    const notifier = {
        send: vi.fn(async (text: string) => {
            sent.push(text);
        }),
    };

    beforeEach(() => {
        sent = [];
        states = [];
        notifier.send.mockClear();
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('announces startup, reports changes, and says goodbye on abort', async () => {
        const controller = new AbortController();
        const { delays, sleep } = scriptedSleep(controller, 2);
        const loop = new MonitorLoop({
            name: 'drops',
            watchers: collector([[{ path: 'a.csv', kind: 'new', root: '/data/in', label: 'in' }], []]),
            notifier,
            intervalSeconds: 60,
            sleep,
            onStateChange: (state) => states.push(state),
        });

        await loop.run(controller.signal);

        expect(sent).toHaveLength(3);
        expect(sent[0]).toContain('is now online');
        expect(sent[0]).toContain('📂 Monitoring *2* directories');
        expect(sent[1]).toContain('📁 *drops* detected 1 change');
        expect(sent[1]).toContain('    `in/a\\.csv`');
        expect(sent[2]).toContain('🔴 *drops* is shutting down');
        expect(delays).toEqual([60_000, 60_000]);
        expect(loop.ticks).toBe(2);
        expect(states).toEqual(['starting', 'running', 'shutting_down', 'stopped']);
        expect(loop.state).toBe('stopped');
    });

    it('sends nothing for a tick without changes', async () => {
        const controller = new AbortController();
        const { sleep } = scriptedSleep(controller, 1);
        const loop = new MonitorLoop({ name: 'drops', watchers: collector([[]]), notifier, intervalSeconds: 5, sleep });

        await loop.run(controller.signal);

        expect(sent).toHaveLength(2);
        expect(loop.ticks).toBe(1);
    });

    it('reports a failed tick, pauses, and keeps running', async () => {
        const controller = new AbortController();
        const { delays, sleep } = scriptedSleep(controller, 2);
        const watchers = collector([new Error('scan blew up'), []]);
        const loop = new MonitorLoop({
            name: 'drops',
            watchers,
            notifier,
            intervalSeconds: 60,
            errorRecoveryDelayMs: 5000,
            sleep,
            onStateChange: (state) => states.push(state),
        });

        await loop.run(controller.signal);

        expect(sent[1]).toBe('⚠️ *drops: Unexpected Error*\n`scan blew up`');
        expect(delays).toEqual([5000, 60_000]);
        expect(watchers.checkAll).toHaveBeenCalledTimes(2);
        expect(loop.ticks).toBe(2);
        expect(states).toEqual(['starting', 'running', 'error_recovery', 'running', 'shutting_down', 'stopped']);
    });

    it('keeps going when notices cannot be delivered', async () => {
        const controller = new AbortController();
        const { sleep } = scriptedSleep(controller, 2);
        const failing = { send: vi.fn(async () => Promise.reject(new Error('offline'))) };
        const loop = new MonitorLoop({
            name: 'drops',
            watchers: collector([[], []]),
            notifier: failing,
            intervalSeconds: 1,
            sleep,
        });

        await loop.run(controller.signal);

        expect(failing.send).toHaveBeenCalledTimes(2);
        expect(loop.ticks).toBe(2);
        expect(loop.state).toBe('stopped');
    });

    it('skips ticking when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const watchers = collector([]);
        const loop = new MonitorLoop({ name: 'drops', watchers, notifier, intervalSeconds: 1 });

        await loop.run(controller.signal);

        expect(watchers.checkAll).not.toHaveBeenCalled();
        expect(loop.ticks).toBe(0);
        expect(sent).toHaveLength(2);
    });

    it('interrupts the interval sleep as soon as it is aborted', async () => {
        const controller = new AbortController();
        const loop = new MonitorLoop({
            name: 'drops',
            watchers: collector([]),
            notifier,
            intervalSeconds: 3600,
        });

        const running = loop.run(controller.signal);
        await vi.waitFor(() => expect(loop.ticks).toBe(1));
        controller.abort();
        await running;

        expect(loop.state).toBe('stopped');
    });

    it('shuts down while a change summary waits on a remote retry-after', async () => {
        const outcomes: SendOutcome[] = [{ status: 'ok' }, { status: 'rate_limited', retryAfterSeconds: 3600 }];
        const delivered: string[] = [];
        const transport: MessageTransport = {
            send: vi.fn(async (text: string) => {
                const outcome: SendOutcome = outcomes.shift() ?? { status: 'ok' };
                if (outcome.status === 'ok') delivered.push(text);
                return outcome;
            }),
        };
        const controller = new AbortController();
        const loop = new MonitorLoop({
            name: 'drops',
            watchers: collector([[{ path: 'a.csv', kind: 'new', root: '/data/in', label: 'in' }]]),
            notifier: new Notifier(transport),
            intervalSeconds: 60,
            onStateChange: (state) => states.push(state),
        });

        const running = loop.run(controller.signal);
        await vi.waitFor(() => expect(transport.send).toHaveBeenCalledTimes(2));
        controller.abort();
        await running;

        expect(states).toEqual(['starting', 'running', 'shutting_down', 'stopped']);
        expect(delivered).toHaveLength(2);
        expect(delivered[1]).toContain('🔴 *drops* is shutting down');
    });

    it('refuses to run twice', async () => {
        const controller = new AbortController();
        controller.abort();
        const loop = new MonitorLoop({ name: 'drops', watchers: collector([]), notifier, intervalSeconds: 1 });

        await loop.run(controller.signal);

        await expect(loop.run(controller.signal)).rejects.toThrow('already stopped');
    });

    it.each([0, -5, 1.5, Number.NaN])('rejects an interval of %s seconds', (intervalSeconds) => {
        expect(
            () => new MonitorLoop({ name: 'drops', watchers: collector([]), notifier, intervalSeconds }),
        ).toThrow(ConfigError);
    });
});
