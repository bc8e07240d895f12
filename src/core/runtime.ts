import { MonitorLoop } from './monitor-loop.js';
import { toWatchSpecs, type DropwatchConfig } from '../config/json-config.js';
import { DirectoryWatcher } from '../services/directory-watcher.js';
import { WatcherSet } from '../services/watcher-set.js';
import { Notifier } from '../services/notifier.js';
import { TelegramHandler } from '../interfaces/telegram_handler.js';
import { logThought, registerSecret } from '../utils/logger.js';
import type { MessageTransport } from '../types/messaging.js';

export interface RuntimeOverrides {
    /** Transport to use instead of Telegram. */
    transport?: MessageTransport;
}

/**
 * Wire watchers, notifier and loop from a validated configuration.
 * Watcher creation failures (bad spec, unreadable root) propagate to the caller.
 */
export async function createMonitor(
    config: DropwatchConfig,
    overrides: RuntimeOverrides = {},
): Promise<MonitorLoop> {
    registerSecret(config.telegram.botToken);

    const watchers: DirectoryWatcher[] = [];
    for (const spec of toWatchSpecs(config)) {
        watchers.push(await DirectoryWatcher.create(spec));
    }

    const transport = overrides.transport ?? new TelegramHandler(config.telegram.botToken, config.telegram.chatId);

    const notifier = new Notifier(transport, {
        maxMessagesPerWindow: config.notifier.maxMessagesPerWindow,
        rateLimitWindowMs: config.notifier.rateLimitWindowMs,
        maxAttempts: config.notifier.maxAttempts,
        baseDelayMs: config.notifier.baseDelayMs,
        label: config.name,
    });

    await logThought(
        `[Runtime] ${config.name} monitoring ${watchers.length} director${watchers.length === 1 ? 'y' : 'ies'} every ${config.intervalSeconds}s.`,
    );

    return new MonitorLoop({
        name: config.name,
        watchers: new WatcherSet(watchers, { maxConcurrentScans: config.monitor.maxConcurrentScans }),
        notifier,
        intervalSeconds: config.intervalSeconds,
        errorRecoveryDelayMs: config.monitor.errorRecoveryDelayMs,
    });
}
