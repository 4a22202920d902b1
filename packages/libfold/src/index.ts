// libfold/src/index.ts
// Public API — re-exports all fold primitives.

// Types
export type {
    Ranked,
    StepFn,
    FieldPolicy,
    FieldPolicies,
    RecordMergeFn,
    Claimed,
    Selection,
} from './types.js';

export type { RecordMergeOptions } from './record-merge.js';
export type { SelectOptions } from './first-writer.js';

// Rank system
export { mkRank, flattenRanked } from './rank.js';

// Field policies
export {
    DEFAULT_POLICY,
    FIELD_POLICIES,
    getPolicy,
    applyPolicy,
} from './policy.js';

// Sequential fold
export { foldLayers } from './fold.js';

// Record merge (global tables)
export { createRecordMerge } from './record-merge.js';

// First-writer-wins selection
export { selectUnclaimed } from './first-writer.js';
