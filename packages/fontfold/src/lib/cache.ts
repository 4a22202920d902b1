// fontfold/src/lib/cache.ts
// Content Cache — (repository, path, stage, freshness token) → bytes on disk.
//
// Entries live under the cache root as `<keyHash>-<tokenHash>.bin`, where
// keyHash identifies (repository, path, stage) and tokenHash the freshness
// token. A lookup is a hit only when the file for the current token exists.
// Storing a new token evicts every sibling of the same key.
//
// Writes go to a temp file that is renamed into place, so an entry is either
// complete or absent. A builder that throws stores nothing.

import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage, InternalError } from './errors.js';
import { sha256Hex } from './helpers.js';
import type { Logger } from './logger.js';

export interface CacheKey {
    readonly repository: string;
    readonly path: string;
    /** Transform stage, e.g. `fetch`, `instance:wdth=100,wght=700`, `merge`. */
    readonly stage: string;
}

export interface CacheStats {
    /** Entries served from disk. */
    hits: number;
    /** Builder invocations that completed. */
    builds: number;
    /** Requests that joined a build already in flight. */
    joined: number;
    /** Stale sibling entries removed. */
    evictions: number;
}

export interface CacheOptions {
    root: string;
    /** Ignore entries stored by earlier invocations. */
    refresh?: boolean;
    logger: Logger;
}

const ENTRY_SUFFIX = '.bin';
const TEMP_SUFFIX = '.tmp';

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function describeKey(key: CacheKey): string {
    return `${key.repository}:${key.path}#${key.stage}`;
}

export class ContentCache {
    private readonly inflight = new Map<string, Promise<Uint8Array>>();
    /** Entries written during this invocation; the only hits in refresh mode. */
    private readonly written = new Set<string>();
    private readonly counters: CacheStats = { hits: 0, builds: 0, joined: 0, evictions: 0 };
    private closed = false;

    private constructor(
        readonly root: string,
        private readonly refresh: boolean,
        private readonly logger: Logger,
    ) {}

    /**
     * Open the cache at `root`, creating the directory and dropping temp
     * files left behind by an interrupted invocation.
     */
    static async open(options: CacheOptions): Promise<ContentCache> {
        await mkdir(options.root, { recursive: true });
        const leftovers = (await readdir(options.root)).filter(name => name.endsWith(TEMP_SUFFIX));
        await Promise.all(leftovers.map(name => unlink(join(options.root, name))));
        if (leftovers.length > 0) {
            options.logger.debug('Removed incomplete entries', { count: leftovers.length });
        }
        return new ContentCache(options.root, options.refresh ?? false, options.logger);
    }

    /**
     * Return the entry for `key` stored under `token`, or run `builder`,
     * store its result and return it.
     *
     * Concurrent calls for the same key and token share one builder run.
     */
    getOrBuild(key: CacheKey, token: string, builder: () => Promise<Uint8Array>): Promise<Uint8Array> {
        if (this.closed) {
            return Promise.reject(new InternalError('Content cache is closed'));
        }

        const keyHash = sha256Hex(key.repository, key.path, key.stage).slice(0, 32);
        const fileName = `${keyHash}-${sha256Hex(token).slice(0, 16)}${ENTRY_SUFFIX}`;

        const pending = this.inflight.get(fileName);
        if (pending) {
            this.counters.joined++;
            return pending;
        }

        const promise = this.load(key, keyHash, fileName, builder).finally(() => {
            this.inflight.delete(fileName);
        });
        this.inflight.set(fileName, promise);
        return promise;
    }

    stats(): CacheStats {
        return { ...this.counters };
    }

    /** Wait for in-flight builds to settle; later requests are rejected. */
    async close(): Promise<void> {
        this.closed = true;
        await Promise.allSettled([...this.inflight.values()]);
        this.logger.debug('Closed', { ...this.counters });
    }

    // ─── Internals ──────────────────────────────────────────────────

    private async load(
        key: CacheKey,
        keyHash: string,
        fileName: string,
        builder: () => Promise<Uint8Array>,
    ): Promise<Uint8Array> {
        const entryPath = join(this.root, fileName);

        if (!this.refresh || this.written.has(fileName)) {
            try {
                const bytes = await readFile(entryPath);
                this.counters.hits++;
                this.logger.debug('Hit', { key: describeKey(key) });
                return bytes;
            } catch (err) {
                if (!isNotFound(err)) {
                    this.logger.warn('Unreadable entry, rebuilding', { key: describeKey(key), error: errorMessage(err) });
                }
            }
        }

        const bytes = await builder();
        this.counters.builds++;
        this.logger.debug('Built', { key: describeKey(key), bytes: bytes.byteLength });

        try {
            await this.store(entryPath, bytes);
            this.written.add(fileName);
            await this.evictSiblings(keyHash, fileName);
        } catch (err) {
            this.logger.warn('Could not store entry', { key: describeKey(key), error: errorMessage(err) });
        }
        return bytes;
    }

    private async store(entryPath: string, bytes: Uint8Array): Promise<void> {
        const tempPath = `${entryPath}.${randomUUID()}${TEMP_SUFFIX}`;
        try {
            await writeFile(tempPath, bytes);
            await rename(tempPath, entryPath);
        } catch (err) {
            await unlink(tempPath).catch((cleanupErr: unknown) => {
                if (!isNotFound(cleanupErr)) throw cleanupErr;
            });
            throw err;
        }
    }

    private async evictSiblings(keyHash: string, keep: string): Promise<void> {
        const prefix = `${keyHash}-`;
        const stale = (await readdir(this.root)).filter(
            name => name.startsWith(prefix) && name.endsWith(ENTRY_SUFFIX) && name !== keep,
        );
        for (const name of stale) {
            try {
                await unlink(join(this.root, name));
                this.counters.evictions++;
                this.written.delete(name);
            } catch (err) {
                if (!isNotFound(err)) throw err;
            }
        }
        if (stale.length > 0) {
            this.logger.debug('Evicted stale entries', { count: stale.length });
        }
    }
}
