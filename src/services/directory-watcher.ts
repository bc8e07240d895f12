import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { logThought } from '../utils/logger.js';
import { ConfigError, ScanError, describeError, errnoCode } from '../utils/errors.js';
import type { ChangeRecord, ChangeSource, WatchSpec } from '../types/file-watcher.js';

/** Pending directory in the bounded-depth walk. */
interface ScanFrame {
    absolute: string;
    /** `/`-separated path relative to root; empty for the root itself. */
    relative: string;
    depth: number;
}

function normalizeExtensions(extensions: string[] | undefined): ReadonlySet<string> | null {
    if (extensions === undefined) return null;
    return new Set(extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`)));
}

function validateSpec(spec: WatchSpec): void {
    if (typeof spec.root !== 'string' || spec.root.trim().length === 0) {
        throw new ConfigError('[DirectoryWatcher] Watch root must be a non-empty path.', 'root');
    }

    const limit = spec.recursionLimit;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
        throw new ConfigError(
            `[DirectoryWatcher] Recursion limit for '${spec.root}' must be a non-negative integer, got ${limit}.`,
            'recursionLimit',
        );
    }

    if (spec.extensions !== undefined) {
        for (const ext of spec.extensions) {
            if (typeof ext !== 'string' || ext.length === 0) {
                throw new ConfigError(
                    `[DirectoryWatcher] Extensions for '${spec.root}' must be non-empty strings.`,
                    'extensions',
                );
            }
        }
    }
}

/**
 * Keeps a snapshot of one directory tree (relative path → mtime) and reports
 * what changed since the previous snapshot.
 *
 * Scans walk the tree with an explicit work stack bounded by the recursion
 * limit. Symbolic links are skipped. An entry that disappears mid-scan counts
 * as absent; any other I/O failure aborts the scan with a {@link ScanError}
 * and leaves the index untouched.
 *
 * The index is owned by this instance alone. `check()` is not reentrant;
 * callers serialize it (the {@link WatcherSet} does).
 *
 * ```ts
 * const watcher = await DirectoryWatcher.create({ root: '/data/incoming', extensions: ['.csv'] });
 * const changes = await watcher.check();
 * ```
 */
export class DirectoryWatcher implements ChangeSource {
    readonly root: string;
    readonly label: string;
    readonly extensions: ReadonlySet<string> | null;
    readonly recursionLimit: number | null;
    readonly #index: Map<string, number> = new Map();

    private constructor(spec: WatchSpec) {
        validateSpec(spec);
        this.root = path.resolve(spec.root);
        this.label = spec.label ?? path.basename(this.root);
        this.extensions = normalizeExtensions(spec.extensions);
        this.recursionLimit = spec.recursionLimit ?? null;
    }

    /** Validate `spec` and take the initial snapshot. No changes are reported for it. */
    static async create(spec: WatchSpec): Promise<DirectoryWatcher> {
        const watcher = new DirectoryWatcher(spec);
        await watcher.#initialize();
        return watcher;
    }

    get size(): number {
        return this.#index.size;
    }

    has(relativePath: string): boolean {
        return this.#index.has(relativePath);
    }

    lastModified(relativePath: string): number | undefined {
        return this.#index.get(relativePath);
    }

    snapshot(): ReadonlyMap<string, number> {
        return new Map(this.#index);
    }

    /** Rescan and diff against the current index, updating it in place. */
    async check(): Promise<ChangeRecord[]> {
        const listing = await this.#scan();
        const changes: ChangeRecord[] = [];

        for (const [relativePath, mtimeMs] of listing) {
            const known = this.#index.get(relativePath);

            if (known === undefined) {
                changes.push({ path: relativePath, kind: 'new' });
                this.#index.set(relativePath, mtimeMs);
            } else if (mtimeMs > known) {
                changes.push({ path: relativePath, kind: 'modified' });
                this.#index.set(relativePath, mtimeMs);
                void logThought(
                    `[DirectoryWatcher] ${relativePath} moved from ${known} to ${mtimeMs} in ${this.root}`,
                    'debug',
                );
            }
        }

        for (const relativePath of [...this.#index.keys()]) {
            if (!listing.has(relativePath)) {
                changes.push({ path: relativePath, kind: 'deleted' });
                this.#index.delete(relativePath);
            }
        }

        void logThought(
            `[DirectoryWatcher] Finished checking ${this.root}: ${changes.length} change(s).`,
            'debug',
        );

        return changes;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #initialize(): Promise<void> {
        const details = [
            this.recursionLimit === null ? 'unbounded depth' : `recursion limit ${this.recursionLimit}`,
            this.extensions === null ? 'all files' : `extensions ${[...this.extensions].join(', ')}`,
        ];
        await logThought(`[DirectoryWatcher] Created a watch in ${this.root} (${details.join('; ')}).`);

        const initial = await this.#scan();
        for (const [relativePath, mtimeMs] of initial) {
            this.#index.set(relativePath, mtimeMs);
        }

        await logThought(`[DirectoryWatcher] Initial snapshot of ${this.root}: ${initial.size} file(s).`);
    }

    #accepts(fileName: string): boolean {
        return this.extensions === null || this.extensions.has(path.extname(fileName));
    }

    #descends(depth: number): boolean {
        return this.recursionLimit === null || depth + 1 <= this.recursionLimit;
    }

    async #scan(): Promise<Map<string, number>> {
        const listing = new Map<string, number>();
        const stack: ScanFrame[] = [{ absolute: this.root, relative: '', depth: 0 }];

        while (stack.length > 0) {
            const frame = stack.pop();
            if (!frame) break;

            const entries = await this.#readDirectory(frame);
            if (entries === null) continue;

            for (const entry of entries) {
                const absolute = path.join(frame.absolute, entry.name);
                const relative = frame.relative ? `${frame.relative}/${entry.name}` : entry.name;

                if (entry.isSymbolicLink()) {
                    void logThought(`[DirectoryWatcher] Skipping symbolic link ${absolute}`, 'debug');
                } else if (entry.isFile()) {
                    if (!this.#accepts(entry.name)) continue;
                    const mtimeMs = await this.#modifiedAt(absolute);
                    if (mtimeMs !== null) listing.set(relative, mtimeMs);
                } else if (entry.isDirectory() && this.#descends(frame.depth)) {
                    stack.push({ absolute, relative, depth: frame.depth + 1 });
                }
            }
        }

        return listing;
    }

    /** Entries of a directory, or `null` when a subdirectory vanished mid-scan. */
    async #readDirectory(frame: ScanFrame) {
        try {
            return await readdir(frame.absolute, { withFileTypes: true });
        } catch (err) {
            if (frame.depth > 0 && errnoCode(err) === 'ENOENT') {
                void logThought(`[DirectoryWatcher] ${frame.absolute} disappeared during scan.`, 'debug');
                return null;
            }
            throw new ScanError(
                `[DirectoryWatcher] Cannot read ${frame.absolute}: ${describeError(err)}`,
                this.root,
                { cause: err },
            );
        }
    }

    async #modifiedAt(absolute: string): Promise<number | null> {
        try {
            return (await stat(absolute)).mtimeMs;
        } catch (err) {
            if (errnoCode(err) === 'ENOENT') return null;
            throw new ScanError(
                `[DirectoryWatcher] Cannot stat ${absolute}: ${describeError(err)}`,
                this.root,
                { cause: err },
            );
        }
    }
}
