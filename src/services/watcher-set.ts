import pLimit from 'p-limit';
import { logThought } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import type { ChangeRecord, ChangeSource, TaggedChange } from '../types/file-watcher.js';

export interface WatcherSetOptions {
    /** Upper bound on simultaneous scans. @default 5 */
    maxConcurrentScans?: number;
}

const DEFAULT_MAX_CONCURRENT_SCANS = 5;

/**
 * Runs every watcher once per tick through a bounded pool and aggregates the
 * results. A failing watcher contributes no changes for that tick; it never
 * fails the whole set.
 */
export class WatcherSet {
    readonly #watchers: readonly ChangeSource[];
    readonly #busy: Set<ChangeSource> = new Set();
    readonly #concurrency: number;

    constructor(watchers: readonly ChangeSource[], options: WatcherSetOptions = {}) {
        const cap = Math.max(1, Math.floor(options.maxConcurrentScans ?? DEFAULT_MAX_CONCURRENT_SCANS));
        this.#watchers = [...watchers];
        this.#concurrency = Math.max(1, Math.min(cap, this.#watchers.length));
    }

    get size(): number {
        return this.#watchers.length;
    }

    get concurrency(): number {
        return this.#concurrency;
    }

    /** Check all watchers and wait for every one of them before returning. */
    async checkAll(): Promise<TaggedChange[]> {
        const limit = pLimit(this.#concurrency);
        const results = await Promise.all(
            this.#watchers.map((watcher) => limit(() => this.#checkOne(watcher))),
        );

        const aggregated: TaggedChange[] = [];
        results.forEach((changes, index) => {
            const watcher = this.#watchers[index];
            if (!watcher) return;
            for (const change of changes) {
                aggregated.push({ ...change, root: watcher.root, label: watcher.label });
            }
        });

        return aggregated;
    }

    async #checkOne(watcher: ChangeSource): Promise<ChangeRecord[]> {
        if (this.#busy.has(watcher)) {
            await logThought(`[WatcherSet] ${watcher.root} is still being checked; skipping this tick.`, 'warn');
            return [];
        }

        this.#busy.add(watcher);
        try {
            return await watcher.check();
        } catch (err) {
            const message = describeError(err);
            console.error(`[WatcherSet] Error checking directory ${watcher.root}:`, message);
            await logThought(`[WatcherSet] Error checking directory ${watcher.root}: ${message}`, 'error');
            return [];
        } finally {
            this.#busy.delete(watcher);
        }
    }
}
