// fontfold/src/lib/pipeline.ts
// Build pipeline: plan → scheduled target steps → delivery.
//
// One target step:
//   1. freshness tokens of every contribution (source and subset-reference
//      revisions, or the digest of the base target's output)
//   2. merge token = digest of those tokens plus everything else that
//      shapes the output (axes, exclusions, policies, limit, names)
//   3. through the cache under stage "merge": prepare sources, merge them
//      in priority order, apply family naming, encode

import type { ArtifactEngine } from './artifact.js';
import { ContentCache } from './cache.js';
import type { CacheStats } from './cache.js';
import { CancelledError, describeSource, errorMessage, InternalError, MergeError } from './errors.js';
import type { Fetcher } from './fetcher.js';
import { plan } from './graph.js';
import type { BuildPlan, BuildTarget, ContributionRef, PlanFilters } from './graph.js';
import { canonicalJson, digestBytes, isRecord, sha256Hex } from './helpers.js';
import { SourcePreparer } from './instantiator.js';
import type { Logger } from './logger.js';
import { mergeTarget } from './merge.js';
import type { Contribution, ContributionReport } from './merge.js';
import type { BuildConfig } from './model.js';
import { canonicalFileName, familyNames } from './naming.js';
import { runSteps } from './scheduler.js';
import type { StepResult } from './scheduler.js';
import { deliver } from './delivery.js';
import type { DeliveryReport } from './delivery.js';

/** Repository id under which whole-target outputs are cached. */
export const TARGET_REPOSITORY = '@target';

export interface TargetOutput {
    readonly bytes: Uint8Array;
    /** sha256 of `bytes`; the freshness token of this output for dependents. */
    readonly digest: string;
    readonly fileName: string;
    /** True when served from the cache without merging. */
    readonly cached: boolean;
    /** Per-contribution merge report; empty when cached. */
    readonly contributions: readonly ContributionReport[];
}

export interface BuildDeps {
    engine: ArtifactEngine;
    fetcher: Fetcher;
    logger: Logger;
    /** Opened (and closed) by `build` when absent. */
    cache?: ContentCache;
}

export interface BuildOptions {
    filters?: PlanFilters;
    /** Ignore cache entries from earlier invocations. */
    refresh?: boolean;
    /** Overrides `settings.concurrency`. */
    concurrency?: number;
    signal?: AbortSignal;
}

export interface BuildOutcome {
    readonly plan: BuildPlan;
    readonly results: ReadonlyMap<string, StepResult<TargetOutput>>;
    readonly delivery: DeliveryReport;
    readonly cache: CacheStats;
    /** Every planned target succeeded and every deliverable one was written. */
    readonly ok: boolean;
}

interface TargetContext {
    readonly config: BuildConfig;
    readonly engine: ArtifactEngine;
    readonly cache: ContentCache;
    readonly preparer: SourcePreparer;
    readonly outputs: Map<string, TargetOutput>;
    readonly logger: Logger;
}

function throwIfAborted(signal: AbortSignal, target: string): void {
    if (signal.aborted) {
        throw new CancelledError(`Build of "${target}" aborted`);
    }
}

function baseOutput(ctx: TargetContext, targetId: string): TargetOutput {
    const output = ctx.outputs.get(targetId);
    if (!output) throw new InternalError(`Output of "${targetId}" is not available`);
    return output;
}

async function contributionToken(
    ctx: TargetContext,
    ref: ContributionRef,
    signal: AbortSignal,
): Promise<string> {
    if (ref.kind === 'target') {
        return `${TARGET_REPOSITORY}:${ref.targetId}|${baseOutput(ctx, ref.targetId).digest}`;
    }
    const token = await ctx.preparer.token(ref.source, signal);
    return `${describeSource(ref.source)}|${token}|${ref.source.exclusion.fingerprint}`;
}

async function loadContribution(
    ctx: TargetContext,
    target: BuildTarget,
    ref: ContributionRef,
    signal: AbortSignal,
): Promise<Contribution> {
    if (ref.kind === 'source') {
        const prepared = await ctx.preparer.prepare(ref.source, target.style, signal);
        return { source: ref.source, artifact: prepared.artifact, exclusion: ref.source.exclusion };
    }
    const source = { repository: TARGET_REPOSITORY, path: ref.targetId };
    try {
        return { source, artifact: ctx.engine.decode(baseOutput(ctx, ref.targetId).bytes, ref.targetId) };
    } catch (err) {
        throw new MergeError(`Unreadable base artifact ${ref.targetId}: ${errorMessage(err)}`, { cause: err, source });
    }
}

async function buildTarget(ctx: TargetContext, target: BuildTarget, signal: AbortSignal): Promise<TargetOutput> {
    const { config, engine, cache } = ctx;
    const { merge, outputExtension } = config.settings;
    const logger = ctx.logger.child(target.id);

    const tokens = await Promise.all(target.contributions.map(ref => contributionToken(ctx, ref, signal)));
    const mergeToken = sha256Hex(canonicalJson({
        contributions: tokens,
        axes: target.style.axes,
        inheritsBase: target.inheritsBase,
        policies: merge.policies,
        maxUnits: merge.maxUnits,
        family: target.family.name,
        style: target.style.name,
        engine: engine.extension,
    }));

    const merged: { reports?: readonly ContributionReport[] } = {};
    const bytes = await cache.getOrBuild(
        { repository: TARGET_REPOSITORY, path: target.id, stage: 'merge' },
        mergeToken,
        async () => {
            const contributions = await Promise.all(
                target.contributions.map(ref => loadContribution(ctx, target, ref, signal)),
            );
            throwIfAborted(signal, target.id);

            const result = mergeTarget(engine, contributions, {
                base: target.inheritsBase,
                policies: merge.policies,
                maxUnits: merge.maxUnits,
                logger,
            });
            merged.reports = result.contributions;

            const names = result.artifact.globals.names;
            const named = engine.withGlobals(result.artifact, {
                ...result.artifact.globals,
                names: { ...(isRecord(names) ? names : {}), ...familyNames(target.family.name, target.style.name) },
            });
            logger.debug('Merged', { units: named.units.size, contributions: contributions.length });
            throwIfAborted(signal, target.id);
            return engine.encode(named);
        },
    );

    const output: TargetOutput = {
        bytes,
        digest: digestBytes(bytes),
        fileName: canonicalFileName(target.family.slug, target.style.name, outputExtension ?? engine.extension),
        cached: merged.reports === undefined,
        contributions: merged.reports ?? [],
    };
    ctx.outputs.set(target.id, output);
    return output;
}

/**
 * Build the planned targets of `config` and deliver them.
 *
 * @throws ConfigError for unknown filters; every other failure is attached
 *         to its target in the outcome
 */
export async function build(
    config: BuildConfig,
    deps: BuildDeps,
    options: BuildOptions = {},
): Promise<BuildOutcome> {
    const { engine, fetcher, logger } = deps;
    const buildPlan = plan(config, options.filters);
    logger.info('Planned', {
        targets: buildPlan.targets.length,
        deliverable: buildPlan.targets.filter(t => t.deliver).length,
    });

    const cache = deps.cache ?? await ContentCache.open({
        root: config.settings.cacheDir,
        refresh: options.refresh,
        logger: logger.child('Cache'),
    });

    try {
        const ctx: TargetContext = {
            config,
            engine,
            cache,
            preparer: new SourcePreparer({ config, fetcher, engine, cache, logger: logger.child('Sources') }),
            outputs: new Map(),
            logger,
        };

        const results = await runSteps(
            buildPlan.targets.map(target => ({
                id: target.id,
                dependsOn: target.dependsOn,
                run: (signal: AbortSignal) => buildTarget(ctx, target, signal),
            })),
            {
                concurrency: options.concurrency ?? config.settings.concurrency,
                logger: logger.child('Scheduler'),
                signal: options.signal,
            },
        );

        const delivery = await deliver(buildPlan.targets, results, {
            outputDir: config.settings.outputDir,
            logger: logger.child('Delivery'),
        });

        const ok =
            buildPlan.targets.every(t => results.get(t.id)?.status === 'succeeded') &&
            delivery.failed.length === 0;

        return { plan: buildPlan, results, delivery, cache: cache.stats(), ok };
    } finally {
        if (!deps.cache) await cache.close();
    }
}
