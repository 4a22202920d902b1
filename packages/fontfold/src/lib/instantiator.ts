// fontfold/src/lib/instantiator.ts
// Instantiator Adapter — fetch → fixed style instance, through the cache.
//
//   revision  (memoised per invocation, under the fetch bound, retried)
//   fetch     stage "fetch",                     token = revision
//   subset    stage "subset:<ref>",              token = revision + ref revision
//   instance  stage "[subset:<ref>/]instance:<axes>", same token as its input
//
// Each stage is cached independently and only pulls its input when its own
// entry is missing. The subset stage exists only for sources with `subsetTo`.

import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import type { ArtifactEngine, FontArtifact } from './artifact.js';
import type { ContentCache } from './cache.js';
import { describeSource, errorMessage, InstantiationError, InternalError, MergeError } from './errors.js';
import type { SourceIdentity } from './errors.js';
import { withRetry } from './fetcher.js';
import type { Fetcher, RetryOptions } from './fetcher.js';
import type { Logger } from './logger.js';
import { findRepository } from './model.js';
import type { BuildConfig, Repository, Source, Style } from './model.js';
import { stripAxisTags } from './naming.js';

export interface PreparedSource {
    readonly source: Source;
    readonly artifact: FontArtifact;
    /** Freshness token of the source (and its subset reference) at this invocation. */
    readonly token: string;
}

export interface SourcePreparerDeps {
    config: BuildConfig;
    fetcher: Fetcher;
    engine: ArtifactEngine;
    cache: ContentCache;
    logger: Logger;
}

/** Stable stage name for a set of axis values: `instance:wdth=100,wght=700`. */
export function instanceStage(axes: Readonly<Record<string, number>>): string {
    const parts = Object.keys(axes)
        .sort()
        .map(tag => `${tag}=${axes[tag]}`);
    return `instance:${parts.join(',')}`;
}

/** Stage name of a source cut down to the codepoints of `reference`. */
export function subsetStage(reference: SourceIdentity): string {
    return `subset:${describeSource(reference)}`;
}

export class SourcePreparer {
    private readonly revisions = new Map<string, Promise<string>>();
    private readonly limit: LimitFunction;

    constructor(private readonly deps: SourcePreparerDeps) {
        this.limit = pLimit(deps.config.settings.fetch.concurrency);
    }

    /**
     * Revision of a source or reference; resolved once per invocation. A
     * failed lookup is forgotten so a later request tries again.
     */
    revision(source: SourceIdentity, signal?: AbortSignal): Promise<string> {
        const key = describeSource(source);
        const known = this.revisions.get(key);
        if (known) return known;

        const repository = this.repository(source);
        const promise = this.limit(() =>
            withRetry(() => this.deps.fetcher.revision(repository, source.path, signal), this.retryOptions(source, signal)),
        );
        this.revisions.set(key, promise);
        promise.catch(() => this.revisions.delete(key));
        return promise;
    }

    /**
     * Freshness token of everything a prepared source is made from: its own
     * revision, plus the reference revision when it is subset.
     */
    async token(source: Source, signal?: AbortSignal): Promise<string> {
        const revision = await this.revision(source, signal);
        if (!source.subsetTo) return revision;
        const reference = await this.revision(source.subsetTo, signal);
        return `${revision}|${subsetStage(source.subsetTo)}@${reference}`;
    }

    /**
     * Fixed instance of `source` at `style`, from cache where possible.
     *
     * @throws FetchError, InstantiationError, MergeError, CancelledError
     */
    async prepare(source: Source, style: Style, signal?: AbortSignal): Promise<PreparedSource> {
        const { cache, engine } = this.deps;
        const label = `${describeSource(source)} (${stripAxisTags(source.path)}-${style.name})`;
        const token = await this.token(source, signal);
        const { subsetTo } = source;

        const input = subsetTo
            ? (): Promise<FontArtifact> => this.subset(source, subsetTo, token, signal)
            : async (): Promise<FontArtifact> => this.decodeSource(source, await this.raw(source, signal), label);
        const stage = subsetTo ? `${subsetStage(subsetTo)}/${instanceStage(style.axes)}` : instanceStage(style.axes);

        const bytes = await cache.getOrBuild(
            { repository: source.repository, path: source.path, stage },
            token,
            async () => {
                const parametric = await input();
                let artifact: FontArtifact;
                try {
                    artifact = engine.instantiate(parametric, style.axes);
                } catch (err) {
                    throw new InstantiationError(`Cannot instantiate ${label}: ${errorMessage(err)}`, {
                        cause: err,
                        source,
                    });
                }
                this.deps.logger.debug('Instantiated', { source: label, units: artifact.units.size });
                return engine.encode(artifact);
            },
        );

        try {
            return { source, artifact: engine.decode(bytes, label), token };
        } catch (err) {
            throw new MergeError(`Unreadable instance of ${errorMessage(err)}`, { cause: err, source });
        }
    }

    /** Raw bytes of a source or reference, through the "fetch" stage. */
    private async raw(source: SourceIdentity, signal?: AbortSignal): Promise<Uint8Array> {
        const repository = this.repository(source);
        const revision = await this.revision(source, signal);
        return this.deps.cache.getOrBuild({ repository: source.repository, path: source.path, stage: 'fetch' }, revision, () =>
            this.limit(() =>
                withRetry(() => this.deps.fetcher.fetch(repository, source.path, signal), this.retryOptions(source, signal)),
            ),
        );
    }

    /** Decoded source cut down to the codepoints of `reference`, through the subset stage. */
    private async subset(
        source: Source,
        reference: SourceIdentity,
        token: string,
        signal?: AbortSignal,
    ): Promise<FontArtifact> {
        const { cache, engine } = this.deps;
        const label = describeSource(source);
        const bytes = await cache.getOrBuild(
            { repository: source.repository, path: source.path, stage: subsetStage(reference) },
            token,
            async () => {
                const [own, ref] = await Promise.all([this.raw(source, signal), this.raw(reference, signal)]);
                const artifact = this.decodeSource(source, own, label);
                const referenceArtifact = this.decodeSource(source, ref, `reference ${describeSource(reference)}`);
                const subset = engine.subset(artifact, referenceArtifact);
                this.deps.logger.debug('Subset', {
                    source: label,
                    reference: describeSource(reference),
                    kept: subset.units.size,
                    dropped: artifact.units.size - subset.units.size,
                });
                return engine.encode(subset);
            },
        );
        return this.decodeSource(source, bytes, label);
    }

    /** Decode bytes belonging to `source`; unreadable bytes are an InstantiationError. */
    private decodeSource(source: Source, bytes: Uint8Array, label: string): FontArtifact {
        try {
            return this.deps.engine.decode(bytes, label);
        } catch (err) {
            // The engine's message already names the label
            throw new InstantiationError(`Cannot instantiate ${errorMessage(err)}`, { cause: err, source });
        }
    }

    private repository(source: SourceIdentity): Repository {
        const repository = findRepository(this.deps.config, source.repository);
        if (!repository) {
            throw new InternalError(`Unknown repository "${source.repository}"`, { source });
        }
        return repository;
    }

    private retryOptions(source: SourceIdentity, signal?: AbortSignal): RetryOptions {
        const { retries, minTimeoutMs } = this.deps.config.settings.fetch;
        return { retries, minTimeoutMs, source, signal, logger: this.deps.logger };
    }
}
