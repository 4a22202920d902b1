// fontfold/src/lib/report.ts
// User-visible build summary and JSON error report.

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CacheStats } from './cache.js';
import { describeSource } from './errors.js';
import type { BuildErrorKind } from './errors.js';
import type { BuildOutcome } from './pipeline.js';

export interface TargetFailure {
    readonly target: string;
    readonly kind: BuildErrorKind;
    /** `repository:path` of the offending source, when known. */
    readonly source?: string;
    readonly message: string;
}

export interface BuildSummary {
    readonly ok: boolean;
    readonly succeeded: readonly string[];
    readonly failed: readonly TargetFailure[];
    readonly delivered: readonly string[];
    readonly cache: CacheStats;
}

export function summarize(outcome: BuildOutcome): BuildSummary {
    const succeeded: string[] = [];
    const failed: TargetFailure[] = [];

    for (const target of outcome.plan.targets) {
        const result = outcome.results.get(target.id);
        if (!result) continue;
        if (result.status === 'succeeded') {
            succeeded.push(target.id);
        } else {
            const { error } = result;
            failed.push({
                target: target.id,
                kind: error.kind,
                source: error.source ? describeSource(error.source) : undefined,
                message: error.message,
            });
        }
    }

    for (const { targetId, error } of outcome.delivery.failed) {
        failed.push({ target: targetId, kind: error.kind, message: error.message });
    }
    const undelivered = new Set(outcome.delivery.failed.map(f => f.targetId));

    return {
        ok: outcome.ok,
        succeeded: succeeded.filter(id => !undelivered.has(id)),
        failed,
        delivered: outcome.delivery.written.map(w => w.path),
        cache: outcome.cache,
    };
}

/** Console rendering of a summary, one line per entry. */
export function formatSummary(summary: BuildSummary): string {
    const lines = [
        `${summary.ok ? 'Build succeeded' : 'Build failed'}: ` +
            `${summary.succeeded.length} succeeded, ${summary.failed.length} failed, ` +
            `${summary.delivered.length} delivered`,
    ];
    for (const target of summary.succeeded) {
        lines.push(`  ok    ${target}`);
    }
    for (const failure of summary.failed) {
        const source = failure.source ? ` [${failure.source}]` : '';
        lines.push(`  FAIL  ${failure.target} (${failure.kind})${source}: ${failure.message}`);
    }
    return lines.join('\n');
}

/** Write the summary as pretty-printed JSON, creating parent directories. */
export async function writeErrorReport(path: string, summary: BuildSummary): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(summary, null, 2)}\n`);
}
