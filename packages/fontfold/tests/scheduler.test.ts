// tests/scheduler.test.ts — Tests for dependency levels and parallel execution
import { describe, it, expect, vi } from 'vitest';
import { BaseBuildError, CancelledError, FetchError, InternalError } from '../src/lib/errors.js';
import { dependencyLevels, runSteps } from '../src/lib/scheduler.js';
import type { Step, StepResult } from '../src/lib/scheduler.js';
import { silentLogger } from './fixtures.js';

function step(id: string, run: (signal: AbortSignal) => Promise<string>, dependsOn: string[] = []): Step<string> {
    return { id, dependsOn, run };
}

function failure(result: StepResult<string> | undefined): { error: unknown; ran: boolean } {
    if (result?.status !== 'failed') throw new Error('Expected a failed step');
    return { error: result.error, ran: result.ran };
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

describe('dependencyLevels', () => {
    it('groups steps by dependency depth', () => {
        const noop = async () => '';
        const levels = dependencyLevels([
            step('hk', noop, ['base']),
            step('base', noop),
            step('kr', noop, ['base']),
        ]);
        expect(levels.map(level => level.map(s => s.id))).toEqual([['base'], ['hk', 'kr']]);
    });

    it('rejects cycles and unknown dependencies', () => {
        const noop = async () => '';
        expect(() => dependencyLevels([step('a', noop, ['b']), step('b', noop, ['a'])])).toThrow(InternalError);
        expect(() => dependencyLevels([step('a', noop, ['ghost'])]))
            .toThrow('Step "a" depends on unknown "ghost"');
    });
});

describe('runSteps', () => {
    const options = { concurrency: 4, logger: silentLogger };

    it('starts dependents only after their level has settled', async () => {
        const events: string[] = [];
        const results = await runSteps([
            step('base', async () => {
                events.push('base:start');
                await sleep(5);
                events.push('base:end');
                return 'base';
            }),
            step('hk', async () => {
                events.push('hk:start');
                return 'hk';
            }, ['base']),
        ], options);

        expect(events).toEqual(['base:start', 'base:end', 'hk:start']);
        expect(results.get('hk')).toMatchObject({ status: 'succeeded', value: 'hk' });
    });

    it('isolates a failing step from its siblings', async () => {
        const results = await runSteps([
            step('base', async () => 'base'),
            step('hk', async () => {
                throw new Error('boom');
            }, ['base']),
            step('kr', async () => 'kr', ['base']),
        ], options);

        const hk = failure(results.get('hk'));
        expect(hk.error).toBeInstanceOf(InternalError);
        expect(hk.error).toMatchObject({ message: 'boom' });
        expect(hk.ran).toBe(true);
        expect(results.get('kr')).toMatchObject({ status: 'succeeded', value: 'kr' });
    });

    it('fails every dependent of a failed step without running it', async () => {
        const source = { repository: 'r', path: 'base.json' };
        const dependent = vi.fn(async () => 'never');
        const results = await runSteps([
            step('base', async () => {
                throw new FetchError('base.json not found', { transient: false, source });
            }),
            step('hk', dependent, ['base']),
            step('kr', dependent, ['base']),
        ], options);

        expect(failure(results.get('base')).error).toBeInstanceOf(FetchError);
        for (const id of ['hk', 'kr']) {
            const { error, ran } = failure(results.get(id));
            expect(error).toBeInstanceOf(BaseBuildError);
            expect(error).toMatchObject({ message: 'Not run: "base" failed: base.json not found', source });
            expect(ran).toBe(false);
        }
        expect(dependent).not.toHaveBeenCalled();
    });

    it('runs at most `concurrency` steps at once', async () => {
        let active = 0;
        let peak = 0;
        const work = async (): Promise<string> => {
            active++;
            peak = Math.max(peak, active);
            await sleep(5);
            active--;
            return 'done';
        };

        const results = await runSteps(
            ['a', 'b', 'c', 'd', 'e'].map(id => step(id, work)),
            { concurrency: 2, logger: silentLogger },
        );

        expect(peak).toBe(2);
        expect([...results.values()].every(r => r.status === 'succeeded')).toBe(true);
    });

    it('runs nothing once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const run = vi.fn(async () => 'never');

        const results = await runSteps([step('a', run), step('b', run, ['a'])], {
            ...options,
            signal: controller.signal,
        });

        const a = failure(results.get('a'));
        expect(a.error).toBeInstanceOf(CancelledError);
        expect(a.ran).toBe(false);
        expect(failure(results.get('b')).error).toBeInstanceOf(CancelledError);
        expect(run).not.toHaveBeenCalled();
    });

    it('skips later levels when aborted mid-run', async () => {
        const controller = new AbortController();
        const later = vi.fn(async () => 'never');

        const results = await runSteps([
            step('base', async () => {
                controller.abort();
                return 'base';
            }),
            step('hk', later, ['base']),
        ], { ...options, signal: controller.signal });

        expect(results.get('base')).toMatchObject({ status: 'succeeded' });
        expect(failure(results.get('hk'))).toMatchObject({ ran: false });
        expect(failure(results.get('hk')).error).toMatchObject({ message: 'Not run: build aborted' });
        expect(later).not.toHaveBeenCalled();
    });
});
