// fontfold/src/lib/merge.ts
// Merge Engine — priority-ordered union with first-writer-wins.
//
// Contributions are folded strictly in the order given (rank, then declared
// order). For each one:
//   1. its own exclusion removes units it may never contribute
//   2. units already in the accumulator are skipped (earlier source wins)
//   3. the rest are copied in verbatim, up to the unit limit
//   4. its global records merge field by field (first-writer-wins, except
//      fields whose policy widens)
// Structural tables come from the base artifact only, or are absent.

import { createRecordMerge, foldLayers, selectUnclaimed } from 'libfold';
import type { FieldPolicies } from 'libfold';
import type { ArtifactEngine, FontArtifact } from './artifact.js';
import { describeSource, errorMessage, MergeError } from './errors.js';
import type { SourceIdentity } from './errors.js';
import type { Logger } from './logger.js';
import type { Exclusion } from './model.js';

export interface Contribution {
    readonly source: SourceIdentity;
    readonly artifact: FontArtifact;
    /** Absent for contributions that are merged whole (a built base target). */
    readonly exclusion?: Exclusion;
}

export interface ContributionReport {
    readonly source: SourceIdentity;
    readonly added: number;
    readonly shadowed: number;
    readonly excluded: number;
    readonly truncated: number;
}

export interface MergeOptions {
    /** The first contribution is the base artifact; its structural tables are inherited. */
    base?: boolean;
    policies?: FieldPolicies;
    maxUnits?: number;
    logger?: Logger;
}

export interface MergeResult {
    readonly artifact: FontArtifact;
    readonly contributions: readonly ContributionReport[];
    /** Units dropped across all contributions because the limit was reached. */
    readonly truncated: number;
}

interface MergeState {
    readonly artifact: FontArtifact;
    readonly reports: ContributionReport[];
}

/**
 * Merge contributions into one artifact.
 *
 * Deterministic for fixed inputs and order. An empty contribution list
 * yields an empty artifact.
 *
 * @throws MergeError naming the contribution that could not be merged
 */
export function mergeTarget(
    engine: ArtifactEngine,
    contributions: readonly Contribution[],
    options: MergeOptions = {},
): MergeResult {
    const maxUnits = options.maxUnits ?? Infinity;
    const mergeGlobals = createRecordMerge({ policies: options.policies });

    let initial = engine.empty();
    const baseContribution = options.base ? contributions[0] : undefined;
    if (baseContribution) {
        initial = engine.inheritGlobalTables(initial, baseContribution.artifact);
    }

    const final = foldLayers<MergeState, Contribution>(
        { artifact: initial, reports: [] },
        contributions,
        (state, contribution) => {
            const { source, artifact, exclusion } = contribution;
            try {
                const candidates = [...artifact.units.keys()].sort((a, b) => a - b);
                const selection = selectUnclaimed(state.artifact.units, candidates, {
                    isExcluded: exclusion ? unit => exclusion.excludes(unit) : undefined,
                    limit: Math.max(0, maxUnits - state.artifact.units.size),
                });

                let next = engine.mergeUnits(state.artifact, artifact, selection.selected);
                next = engine.withGlobals(next, mergeGlobals(next.globals, artifact.globals));

                const report: ContributionReport = {
                    source,
                    added: selection.selected.length,
                    shadowed: selection.shadowed,
                    excluded: selection.excluded,
                    truncated: selection.truncated,
                };
                return { artifact: next, reports: [...state.reports, report] };
            } catch (err) {
                throw new MergeError(`Cannot merge ${describeSource(source)}: ${errorMessage(err)}`, {
                    cause: err,
                    source,
                });
            }
        },
    );

    const truncated = final.reports.reduce((sum, r) => sum + r.truncated, 0);
    if (truncated > 0) {
        options.logger?.warn('Unit limit reached', {
            limit: maxUnits,
            truncated,
        });
    }

    return { artifact: final.artifact, contributions: final.reports, truncated };
}
