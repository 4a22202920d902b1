// fontfold/src/lib/scheduler.ts
// Parallel Scheduler — dependency levels, bounded workers, per-step results.
//
// Level n holds every step whose dependencies all sit in levels < n. A level
// starts only after the previous one has settled (the barrier), and its
// steps run concurrently up to `concurrency`. A failed step never cancels
// its siblings; its dependents are marked failed without being run.

import pLimit from 'p-limit';
import { BaseBuildError, CancelledError, InternalError, isBuildError, toBuildError } from './errors.js';
import type { BuildError } from './errors.js';
import type { Logger } from './logger.js';

export interface Step<T> {
    readonly id: string;
    readonly dependsOn: readonly string[];
    run(signal: AbortSignal): Promise<T>;
}

export type StepResult<T> =
    | { readonly status: 'succeeded'; readonly value: T; readonly durationMs: number }
    | { readonly status: 'failed'; readonly error: BuildError; readonly durationMs: number; readonly ran: boolean };

export interface RunOptions {
    concurrency: number;
    logger: Logger;
    signal?: AbortSignal;
}

/**
 * Group steps into dependency levels.
 *
 * @throws InternalError on unknown dependencies or cycles
 */
export function dependencyLevels<T>(steps: readonly Step<T>[]): Step<T>[][] {
    const byId = new Map(steps.map(step => [step.id, step]));
    const depth = new Map<string, number>();
    const visiting = new Set<string>();

    const levelOf = (step: Step<T>): number => {
        const known = depth.get(step.id);
        if (known !== undefined) return known;
        if (visiting.has(step.id)) {
            throw new InternalError(`Dependency cycle through "${step.id}"`);
        }
        visiting.add(step.id);
        let level = 0;
        for (const depId of step.dependsOn) {
            const dep = byId.get(depId);
            if (!dep) throw new InternalError(`Step "${step.id}" depends on unknown "${depId}"`);
            level = Math.max(level, levelOf(dep) + 1);
        }
        visiting.delete(step.id);
        depth.set(step.id, level);
        return level;
    };

    const levels: Step<T>[][] = [];
    for (const step of steps) {
        const level = levelOf(step);
        while (levels.length <= level) levels.push([]);
        levels[level].push(step);
    }
    return levels;
}

/**
 * Run every step, respecting dependencies. Each step's outcome is in the
 * returned map, keyed by step id; only a malformed step graph rejects.
 */
export async function runSteps<T>(
    steps: readonly Step<T>[],
    options: RunOptions,
): Promise<Map<string, StepResult<T>>> {
    const { logger } = options;
    const signal = options.signal ?? new AbortController().signal;
    const limit = pLimit(options.concurrency);
    const results = new Map<string, StepResult<T>>();

    const blockedBy = (step: Step<T>): BuildError | undefined => {
        for (const depId of step.dependsOn) {
            const dep = results.get(depId);
            if (dep?.status !== 'failed') continue;
            if (dep.error instanceof CancelledError) {
                return new CancelledError(`Not run: "${depId}" was cancelled`, { cause: dep.error });
            }
            return new BaseBuildError(`Not run: "${depId}" failed: ${dep.error.message}`, {
                cause: dep.error,
                source: dep.error.source,
            });
        }
        return undefined;
    };

    const execute = async (step: Step<T>): Promise<void> => {
        if (signal.aborted) {
            results.set(step.id, {
                status: 'failed',
                error: new CancelledError('Not run: build aborted'),
                durationMs: 0,
                ran: false,
            });
            return;
        }

        const started = Date.now();
        try {
            const value = await step.run(signal);
            const durationMs = Date.now() - started;
            results.set(step.id, { status: 'succeeded', value, durationMs });
            logger.info('Step succeeded', { step: step.id, durationMs });
        } catch (err) {
            const error = signal.aborted && !isBuildError(err)
                ? new CancelledError('Aborted while running', { cause: err })
                : toBuildError(err);
            results.set(step.id, { status: 'failed', error, durationMs: Date.now() - started, ran: true });
            logger.error('Step failed', error, { step: step.id, kind: error.kind });
        }
    };

    for (const level of dependencyLevels(steps)) {
        const runnable: Step<T>[] = [];
        for (const step of level) {
            const blocked = blockedBy(step);
            if (blocked) {
                results.set(step.id, { status: 'failed', error: blocked, durationMs: 0, ran: false });
                logger.warn('Step skipped', { step: step.id, reason: blocked.message });
            } else {
                runnable.push(step);
            }
        }
        await Promise.all(runnable.map(step => limit(() => execute(step))));
    }

    return results;
}
