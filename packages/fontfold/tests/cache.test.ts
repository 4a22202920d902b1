// tests/cache.test.ts — Tests for the on-disk content cache
import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { ContentCache } from '../src/lib/cache.js';
import type { CacheKey } from '../src/lib/cache.js';
import { InternalError } from '../src/lib/errors.js';
import { silentLogger, tempDir, text } from './fixtures.js';

const key: CacheKey = { repository: 'r', path: 'fonts/A.json', stage: 'fetch' };

function bytes(value: string): Uint8Array {
    return new TextEncoder().encode(value);
}

async function entries(root: string): Promise<string[]> {
    return (await readdir(root)).filter(name => name.endsWith('.bin'));
}

describe('ContentCache', () => {
    let root: string;

    beforeEach(async () => {
        root = join(await tempDir(), 'cache');
    });

    function open(refresh = false): Promise<ContentCache> {
        return ContentCache.open({ root, refresh, logger: silentLogger });
    }

    it('builds once and serves the stored entry afterwards', async () => {
        const cache = await open();
        const builder = vi.fn(async () => bytes('content'));

        const first = await cache.getOrBuild(key, 't1', builder);
        const second = await cache.getOrBuild(key, 't1', builder);

        expect(text(first)).toBe('content');
        expect(text(second)).toBe('content');
        expect(builder).toHaveBeenCalledTimes(1);
        expect(cache.stats()).toEqual({ hits: 1, builds: 1, joined: 0, evictions: 0 });
    });

    it('shares one build between concurrent requests', async () => {
        const cache = await open();
        const builder = vi.fn(async () => bytes('shared'));

        const results = await Promise.all(
            Array.from({ length: 5 }, () => cache.getOrBuild(key, 't1', builder)),
        );

        expect(results.map(text)).toEqual(['shared', 'shared', 'shared', 'shared', 'shared']);
        expect(builder).toHaveBeenCalledTimes(1);
        expect(cache.stats()).toMatchObject({ builds: 1, joined: 4 });
    });

    it('keeps only the entry of the latest token', async () => {
        const cache = await open();
        await cache.getOrBuild(key, 't1', async () => bytes('old'));
        const rebuilt = await cache.getOrBuild(key, 't2', async () => bytes('new'));

        expect(text(rebuilt)).toBe('new');
        expect(await entries(root)).toHaveLength(1);
        expect(cache.stats()).toMatchObject({ builds: 2, evictions: 1 });
    });

    it('keeps stages of one source apart', async () => {
        const cache = await open();
        const instanceKey: CacheKey = { ...key, stage: 'instance:wght=700' };
        await cache.getOrBuild(key, 't1', async () => bytes('raw'));
        await cache.getOrBuild(instanceKey, 't1', async () => bytes('instance'));
        await cache.getOrBuild(key, 't2', async () => bytes('raw2'));

        const builder = vi.fn(async () => bytes('rebuilt'));
        const instance = await cache.getOrBuild(instanceKey, 't1', builder);

        expect(text(instance)).toBe('instance');
        expect(builder).not.toHaveBeenCalled();
        expect(await entries(root)).toHaveLength(2);
    });

    it('stores nothing when the builder fails', async () => {
        const cache = await open();
        const failure = new Error('broken source');

        await expect(cache.getOrBuild(key, 't1', async () => {
            throw failure;
        })).rejects.toBe(failure);
        expect(await entries(root)).toEqual([]);

        const builder = vi.fn(async () => bytes('second try'));
        expect(text(await cache.getOrBuild(key, 't1', builder))).toBe('second try');
        expect(builder).toHaveBeenCalledTimes(1);
    });

    it('persists entries across instances', async () => {
        const first = await open();
        await first.getOrBuild(key, 't1', async () => bytes('persisted'));
        await first.close();

        const second = await open();
        const builder = vi.fn(async () => bytes('rebuilt'));
        expect(text(await second.getOrBuild(key, 't1', builder))).toBe('persisted');
        expect(builder).not.toHaveBeenCalled();
    });

    it('rebuilds entries of earlier invocations in refresh mode', async () => {
        const first = await open();
        await first.getOrBuild(key, 't1', async () => bytes('old'));

        const refreshed = await open(true);
        const builder = vi.fn(async () => bytes('fresh'));
        expect(text(await refreshed.getOrBuild(key, 't1', builder))).toBe('fresh');
        expect(text(await refreshed.getOrBuild(key, 't1', builder))).toBe('fresh');

        expect(builder).toHaveBeenCalledTimes(1);
        expect(refreshed.stats()).toMatchObject({ hits: 1, builds: 1 });
    });

    it('removes incomplete entries when opened', async () => {
        const first = await open();
        await first.close();
        await writeFile(join(root, 'abc.bin.1234.tmp'), 'partial');

        await open();
        expect(await readdir(root)).toEqual([]);
    });

    it('rejects requests after close', async () => {
        const cache = await open();
        await cache.close();
        await expect(cache.getOrBuild(key, 't1', async () => bytes('x'))).rejects.toThrow(InternalError);
        await expect(cache.getOrBuild(key, 't1', async () => bytes('x'))).rejects.toThrow('Content cache is closed');
    });
});
