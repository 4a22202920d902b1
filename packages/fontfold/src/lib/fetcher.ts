// fontfold/src/lib/fetcher.ts
// Fetcher Adapter — raw bytes and freshness tokens for (repository, path).
//
// Failures are FetchErrors marked transient or permanent. Transient ones
// (timeouts, network errors, 408/425/429/5xx) are retried by `withRetry`;
// permanent ones stop retrying at once and fail the owning target.

import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import pRetry, { AbortError } from 'p-retry';
import { CancelledError, describeSource, errorMessage, FetchError, toBuildError } from './errors.js';
import type { SourceIdentity } from './errors.js';
import type { Logger } from './logger.js';
import type { Repository } from './model.js';

/** Token for HTTP resources that expose no validator. */
export const UNVERSIONED = 'unversioned';

export interface Fetcher {
    /** Cheap freshness token; changes whenever the content may have changed. */
    revision(repository: Repository, path: string, signal?: AbortSignal): Promise<string>;
    fetch(repository: Repository, path: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export function isTransientStatus(status: number): boolean {
    return status === 408 || status === 425 || status === 429 || status >= 500;
}

function identity(repository: Repository, path: string): SourceIdentity {
    return { repository: repository.id, path };
}

// ─── HTTP ───────────────────────────────────────────────────────────

export interface HttpFetcherOptions {
    timeoutMs: number;
    fetchImpl?: typeof fetch;
}

export class HttpFetcher implements Fetcher {
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: HttpFetcherOptions) {
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async revision(repository: Repository, path: string, signal?: AbortSignal): Promise<string> {
        const response = await this.request('HEAD', repository, path, signal);
        const etag = response.headers.get('etag');
        if (etag) return `etag:${etag}`;
        const modified = response.headers.get('last-modified');
        if (modified) return `modified:${modified}`;
        return UNVERSIONED;
    }

    async fetch(repository: Repository, path: string, signal?: AbortSignal): Promise<Uint8Array> {
        const response = await this.request('GET', repository, path, signal);
        try {
            return new Uint8Array(await response.arrayBuffer());
        } catch (err) {
            throw new FetchError(`Reading body failed: ${errorMessage(err)}`, {
                transient: true,
                cause: err,
                source: identity(repository, path),
            });
        }
    }

    private async request(
        method: 'GET' | 'HEAD',
        repository: Repository,
        path: string,
        signal?: AbortSignal,
    ): Promise<Response> {
        const source = identity(repository, path);
        if (repository.kind !== 'http') {
            throw new FetchError(`Repository "${repository.id}" is not an HTTP repository`, { transient: false, source });
        }

        const url = new URL(path, repository.url);
        const timeout = AbortSignal.timeout(this.timeoutMs);
        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method,
                signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
            });
        } catch (err) {
            if (signal?.aborted) {
                throw new CancelledError(`${method} ${url.href} aborted`, { cause: err, source });
            }
            throw new FetchError(`${method} ${url.href} failed: ${errorMessage(err)}`, {
                transient: true,
                cause: err,
                source,
            });
        }

        if (!response.ok) {
            // Release the connection before the caller retries.
            await response.body?.cancel();
            throw new FetchError(`${method} ${url.href} returned ${response.status}`, {
                transient: isTransientStatus(response.status),
                status: response.status,
                source,
            });
        }
        return response;
    }
}

// ─── Local Directory ────────────────────────────────────────────────

const PERMANENT_FS_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'EACCES', 'EPERM']);

function fsError(err: unknown, action: string, source: SourceIdentity): FetchError {
    const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return new FetchError(`${action} ${describeSource(source)} failed: ${errorMessage(err)}`, {
        transient: code === undefined || !PERMANENT_FS_CODES.has(code),
        cause: err,
        source,
    });
}

export class LocalFetcher implements Fetcher {
    async revision(repository: Repository, path: string): Promise<string> {
        const source = identity(repository, path);
        const file = this.locate(repository, path);
        try {
            const info = await stat(file);
            return `stat:${info.size}:${info.mtimeMs}`;
        } catch (err) {
            throw fsError(err, 'stat', source);
        }
    }

    async fetch(repository: Repository, path: string): Promise<Uint8Array> {
        const source = identity(repository, path);
        const file = this.locate(repository, path);
        try {
            return await readFile(file);
        } catch (err) {
            throw fsError(err, 'read', source);
        }
    }

    private locate(repository: Repository, path: string): string {
        const source = identity(repository, path);
        if (repository.kind !== 'local') {
            throw new FetchError(`Repository "${repository.id}" is not a local repository`, { transient: false, source });
        }
        const file = resolve(repository.root, path);
        const rel = relative(repository.root, file);
        if (rel.startsWith('..') || isAbsolute(rel)) {
            throw new FetchError(`Path escapes repository root: ${path}`, { transient: false, source });
        }
        return file;
    }
}

// ─── Dispatch ───────────────────────────────────────────────────────

/** Routes each request to the fetcher for the repository's kind. */
export class RepositoryFetcher implements Fetcher {
    constructor(private readonly fetchers: Readonly<Record<Repository['kind'], Fetcher>>) {}

    revision(repository: Repository, path: string, signal?: AbortSignal): Promise<string> {
        return this.fetchers[repository.kind].revision(repository, path, signal);
    }

    fetch(repository: Repository, path: string, signal?: AbortSignal): Promise<Uint8Array> {
        return this.fetchers[repository.kind].fetch(repository, path, signal);
    }
}

export function createDefaultFetcher(timeoutMs: number): Fetcher {
    return new RepositoryFetcher({
        http: new HttpFetcher({ timeoutMs }),
        local: new LocalFetcher(),
    });
}

// ─── Retry ──────────────────────────────────────────────────────────

export interface RetryOptions {
    retries: number;
    minTimeoutMs: number;
    source: SourceIdentity;
    logger: Logger;
    signal?: AbortSignal;
}

/**
 * Run a fetch operation, retrying transient FetchErrors with exponential
 * backoff. Anything else is rethrown after the first attempt.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const { source, logger, signal } = options;
    try {
        return await pRetry(
            async () => {
                if (signal?.aborted) {
                    throw new AbortError(new CancelledError('Aborted before fetch', { source }));
                }
                try {
                    return await operation();
                } catch (err) {
                    if (err instanceof FetchError && err.transient) throw err;
                    throw new AbortError(toBuildError(err, (message, opts) => new FetchError(message, { ...opts, transient: false }), source));
                }
            },
            {
                retries: options.retries,
                minTimeout: options.minTimeoutMs,
                factor: 2,
                onFailedAttempt: error => {
                    logger.warn(`Attempt ${error.attemptNumber} failed`, {
                        source: describeSource(source),
                        retriesLeft: error.retriesLeft,
                        error: error.message,
                    });
                },
            },
        );
    } catch (err) {
        if (signal?.aborted && !(err instanceof CancelledError)) {
            throw new CancelledError('Aborted during fetch', { cause: err, source });
        }
        throw err;
    }
}
