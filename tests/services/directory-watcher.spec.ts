import { mkdtemp, mkdir, rm, symlink, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DirectoryWatcher } from '../../src/services/directory-watcher.js';
import { ConfigError, ScanError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

/** Move a file's mtime by `offsetMs` relative to now. */
async function touchAt(filePath: string, offsetMs: number): Promise<void> {
    const when = new Date(Date.now() + offsetMs);
    await utimes(filePath, when, when);
}

describe('DirectoryWatcher', () => {
    let root = '';

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'dropwatch-watcher-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('indexes existing files on creation without reporting them', async () => {
        await writeFile(path.join(root, 'file.txt'), 'seed');

        const watcher = await DirectoryWatcher.create({ root });

        expect(watcher.has('file.txt')).toBe(true);
        expect(watcher.size).toBe(1);
        expect(await watcher.check()).toEqual([]);
    });

    it('reports new, modified and deleted for a single file, then nothing', async () => {
        const watcher = await DirectoryWatcher.create({ root });
        const file = path.join(root, 'a.txt');

        await writeFile(file, 'first');
        expect(await watcher.check()).toEqual([{ path: 'a.txt', kind: 'new' }]);

        await writeFile(file, 'second');
        await touchAt(file, 10_000);
        expect(await watcher.check()).toEqual([{ path: 'a.txt', kind: 'modified' }]);

        await rm(file);
        expect(await watcher.check()).toEqual([{ path: 'a.txt', kind: 'deleted' }]);

        expect(await watcher.check()).toEqual([]);
        expect(watcher.has('a.txt')).toBe(false);
    });

    it('returns no changes when checked twice without filesystem activity', async () => {
        const watcher = await DirectoryWatcher.create({ root });
        await writeFile(path.join(root, 'x.csv'), '1,2');

        expect(await watcher.check()).toHaveLength(1);
        expect(await watcher.check()).toEqual([]);
        expect(await watcher.check()).toEqual([]);
    });

    it('ignores an mtime that did not move forward', async () => {
        const file = path.join(root, 'steady.txt');
        await writeFile(file, 'data');
        const watcher = await DirectoryWatcher.create({ root });
        const before = watcher.lastModified('steady.txt');

        await touchAt(file, -60_000);

        expect(await watcher.check()).toEqual([]);
        expect(watcher.lastModified('steady.txt')).toBe(before);
    });

    it('records the newer mtime after a modification', async () => {
        const file = path.join(root, 'file.txt');
        await writeFile(file, 'seed');
        const watcher = await DirectoryWatcher.create({ root });
        const oldTime = watcher.lastModified('file.txt') ?? 0;

        await writeFile(file, 'testing');
        await touchAt(file, 5_000);
        await watcher.check();

        expect(watcher.lastModified('file.txt')).toBeGreaterThan(oldTime);
    });

    it('keys nested files by their /-separated relative path', async () => {
        const watcher = await DirectoryWatcher.create({ root });
        await mkdir(path.join(root, 'one', 'two'), { recursive: true });
        await writeFile(path.join(root, 'one', 'two', 'help.txt'), 'nested');

        expect(await watcher.check()).toEqual([{ path: 'one/two/help.txt', kind: 'new' }]);
        expect(watcher.has('one/two/help.txt')).toBe(true);
    });

    it('never reports files deeper than the recursion limit', async () => {
        const watcher = await DirectoryWatcher.create({ root, recursionLimit: 1 });
        await mkdir(path.join(root, 'one', 'two'), { recursive: true });
        await writeFile(path.join(root, 'one', 'shallow.txt'), 'depth 1');
        await writeFile(path.join(root, 'one', 'two', 'help.txt'), 'depth 2');

        expect(await watcher.check()).toEqual([{ path: 'one/shallow.txt', kind: 'new' }]);

        await touchAt(path.join(root, 'one', 'two', 'help.txt'), 10_000);
        expect(await watcher.check()).toEqual([]);
        expect(watcher.has('one/two/help.txt')).toBe(false);
    });

    it('watches only the top level with a recursion limit of zero', async () => {
        await mkdir(path.join(root, 'sub'));
        await writeFile(path.join(root, 'sub', 'inner.txt'), 'x');
        await writeFile(path.join(root, 'top.txt'), 'x');

        const watcher = await DirectoryWatcher.create({ root, recursionLimit: 0 });

        expect([...watcher.snapshot().keys()]).toEqual(['top.txt']);
    });

    it('filters files by extension, with or without the leading dot', async () => {
        const watcher = await DirectoryWatcher.create({ root, extensions: ['.txt', 'csv'] });
        await writeFile(path.join(root, 'test.f'), 'skip');
        await writeFile(path.join(root, 'keep.txt'), 'keep');
        await writeFile(path.join(root, 'data.csv'), 'keep');
        await writeFile(path.join(root, 'archive.txt.gz'), 'skip');

        const changes = await watcher.check();

        expect(changes.map((change) => change.path).sort()).toEqual(['data.csv', 'keep.txt']);
        expect(watcher.has('test.f')).toBe(false);
        expect(watcher.extensions).toEqual(new Set(['.txt', '.csv']));
    });

    it('skips symbolic links', async () => {
        await writeFile(path.join(root, 'real.txt'), 'x');
        await mkdir(path.join(root, 'dir'));
        await writeFile(path.join(root, 'dir', 'inner.txt'), 'x');
        await symlink(path.join(root, 'real.txt'), path.join(root, 'link.txt'));
        await symlink(path.join(root, 'dir'), path.join(root, 'dir-link'));

        const watcher = await DirectoryWatcher.create({ root });

        expect([...watcher.snapshot().keys()].sort()).toEqual(['dir/inner.txt', 'real.txt']);
    });

    it('resolves the root and defaults the label to its basename', async () => {
        const watcher = await DirectoryWatcher.create({ root: path.relative(process.cwd(), root) });

        expect(watcher.root).toBe(root);
        expect(watcher.label).toBe(path.basename(root));
        expect(watcher.recursionLimit).toBeNull();
        expect(watcher.extensions).toBeNull();
    });

    it('rejects a negative recursion limit at construction', async () => {
        await expect(DirectoryWatcher.create({ root, recursionLimit: -1 })).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects a fractional recursion limit at construction', async () => {
        await expect(DirectoryWatcher.create({ root, recursionLimit: 1.5 })).rejects.toThrow(/non-negative integer/);
    });

    it('rejects an empty extension', async () => {
        await expect(DirectoryWatcher.create({ root, extensions: [''] })).rejects.toBeInstanceOf(ConfigError);
    });

    it('fails creation with a ScanError when the root does not exist', async () => {
        await expect(
            DirectoryWatcher.create({ root: path.join(root, 'missing') }),
        ).rejects.toBeInstanceOf(ScanError);
    });

    it('keeps the index intact when the root disappears', async () => {
        const watched = path.join(root, 'watched');
        await mkdir(watched);
        await writeFile(path.join(watched, 'a.txt'), 'x');
        const watcher = await DirectoryWatcher.create({ root: watched });

        await rm(watched, { recursive: true });

        await expect(watcher.check()).rejects.toBeInstanceOf(ScanError);
        expect(watcher.has('a.txt')).toBe(true);
        expect(watcher.size).toBe(1);
    });
});
