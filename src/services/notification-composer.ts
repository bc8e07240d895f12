import { escapeMarkdownV2 } from '../utils/markdown.js';
import { DeliveryError, describeError } from '../utils/errors.js';
import { CHANGE_KINDS, type ChangeKind, type ChangeRecord, type TaggedChange } from '../types/file-watcher.js';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';
const PATH_INDENT = '    ';
/** Telegram's limit on one message's text. */
export const MAX_MESSAGE_LENGTH = 4096;
/** Room kept free for the "…and N more" line. */
const OMISSION_RESERVE = 48;

export interface ChangeSummaryOptions {
    /** Prefix each path with its watcher's label (several watchers configured). */
    showSource?: boolean;
    /** @default MAX_MESSAGE_LENGTH */
    maxLength?: number;
}

const SECTION_TITLES: Record<ChangeKind, string> = {
    new: '✨ *New*',
    modified: '📝 *Modified*',
    deleted: '🗑 *Deleted*',
};

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
    return count === 1 ? singular : pluralForm;
}

/** Human-friendly interval: `45 s`, `5 min`, `1 h 30 min`. */
export function formatInterval(seconds: number): string {
    if (seconds < 60) return `${seconds} s`;

    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const rest = seconds % 60;

    const parts: string[] = [];
    if (hours > 0) parts.push(`${hours} h`);
    if (minutes > 0) parts.push(`${minutes} min`);
    if (rest > 0) parts.push(`${rest} s`);
    return parts.join(' ');
}

function hasLabel(change: ChangeRecord | TaggedChange): change is TaggedChange {
    return 'label' in change && typeof change.label === 'string';
}

function displayPath(change: ChangeRecord | TaggedChange, showSource: boolean): string {
    return showSource && hasLabel(change) ? `${change.label}/${change.path}` : change.path;
}

/**
 * Render one tick's changes as a single MarkdownV2 message, grouped as
 * New, Modified, Deleted. Returns `null` when there is nothing to report.
 *
 * Section counts are always complete. When the paths would not fit in
 * `maxLength`, the listing stops early and ends with "…and N more".
 */
export function composeChangeSummary(
    name: string,
    changes: readonly (ChangeRecord | TaggedChange)[],
    options: ChangeSummaryOptions = {},
): string | null {
    if (changes.length === 0) return null;

    const showSource = options.showSource ?? false;
    const total = changes.length;
    const parts = [
        `📁 *${escapeMarkdownV2(name)}* detected ${total} ${plural(total, 'change')}`,
        DIVIDER,
    ];

    let budget = (options.maxLength ?? MAX_MESSAGE_LENGTH) - OMISSION_RESERVE - parts.join('\n\n').length;
    let omitted = 0;

    for (const kind of CHANGE_KINDS) {
        const ofKind = changes.filter((change) => change.kind === kind);
        if (ofKind.length === 0) continue;

        const title = `${SECTION_TITLES[kind]} \\(${ofKind.length}\\)`;
        budget -= title.length + 2;

        const lines: string[] = [];
        for (const change of ofKind) {
            const line = `${PATH_INDENT}\`${escapeMarkdownV2(displayPath(change, showSource))}\``;
            if (omitted === 0 && line.length + 1 <= budget) {
                lines.push(line);
                budget -= line.length + 1;
            } else {
                omitted += 1;
            }
        }

        parts.push(lines.length > 0 ? `${title}\n${lines.join('\n')}` : title);
    }

    if (omitted > 0) {
        parts.push(`_…and ${omitted} more_`);
    }

    return parts.join('\n\n');
}

export function composeStartupNotice(name: string, directoryCount: number, intervalSeconds: number): string {
    return [
        `🟢 *${escapeMarkdownV2(name)}* is now online\\!`,
        DIVIDER,
        `📂 Monitoring *${directoryCount}* ${plural(directoryCount, 'directory', 'directories')}`,
        `⏱ Check interval: *${escapeMarkdownV2(formatInterval(intervalSeconds))}*`,
    ].join('\n');
}

export function composeShutdownNotice(name: string): string {
    return [
        `🔴 *${escapeMarkdownV2(name)}* is shutting down`,
        DIVIDER,
        '👋 Goodbye\\!',
    ].join('\n');
}

export function composeErrorNotice(name: string, error: unknown): string {
    const title = error instanceof DeliveryError ? 'Delivery Error' : 'Unexpected Error';
    return `⚠️ *${escapeMarkdownV2(name)}: ${title}*\n\`${escapeMarkdownV2(describeError(error))}\``;
}
