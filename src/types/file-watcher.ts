/** Kinds of change a directory scan can report. */
export type ChangeKind = 'new' | 'modified' | 'deleted';

/** Fixed category order used when changes are grouped for display. */
export const CHANGE_KINDS: readonly ChangeKind[] = ['new', 'modified', 'deleted'];

/** One detected change, keyed by the path relative to the watcher's root. */
export interface ChangeRecord {
    /** `/`-separated path relative to the watched root. */
    path: string;
    kind: ChangeKind;
}

/** A change tagged with the watcher it came from. */
export interface TaggedChange extends ChangeRecord {
    /** Absolute root of the source watcher. */
    root: string;
    /** Display label of the source watcher. */
    label: string;
}

/** Construction contract for a monitored directory. */
export interface WatchSpec {
    /** Directory to monitor. Relative paths resolve against the working directory. */
    root: string;
    /** Filename suffixes to include (e.g. `.csv`). If omitted, all files are included. */
    extensions?: string[];
    /** Maximum subdirectory depth to descend into. If omitted, depth is unbounded. */
    recursionLimit?: number;
    /** Display label; defaults to the root's basename. */
    label?: string;
}

/**
 * Anything the coordinator can poll once per tick.
 * Implemented by `DirectoryWatcher`; tests supply fakes.
 */
export interface ChangeSource {
    readonly root: string;
    readonly label: string;
    check(): Promise<ChangeRecord[]>;
}
