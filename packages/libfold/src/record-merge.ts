// libfold/src/record-merge.ts
// Configurable record merge for global (non-per-unit) tables.
//
// Layers arrive highest precedence first. This engine merges them with:
//   - Deep recursive merge for plain objects
//   - First-writer-wins for every other value (arrays included)
//   - Per-field widening (max/min) where a policy names the dotted path

import { applyPolicy, getPolicy } from './policy.js';
import type { FieldPolicies, RecordMergeFn } from './types.js';

// ─── Helpers ────────────────────────────────────────────────────────

function isPlainObject(val: unknown): val is Record<string, unknown> {
    return (
        val !== null &&
        typeof val === 'object' &&
        !Array.isArray(val) &&
        !(val instanceof RegExp) &&
        !(val instanceof Date) &&
        !(val instanceof Map) &&
        !(val instanceof Set)
    );
}

// ─── Configuration ──────────────────────────────────────────────────

/**
 * Options for creating a record merge function.
 */
export interface RecordMergeOptions {
    /**
     * Per-field policies keyed by dotted path.
     *
     * Example: `{ 'metrics.yMax': 'widen-max' }` lets a later layer raise
     * `metrics.yMax` while every other metric stays first-writer-wins.
     *
     * @default {}
     */
    policies?: FieldPolicies;
}

// ─── Factory ────────────────────────────────────────────────────────

/**
 * Create a record merge function with the given options.
 *
 * 1. **Objects** — merged recursively; the dotted path grows per level.
 * 2. **Other values** — resolved by the field's policy:
 *    - `first-wins` (default): the accumulated value stays
 *    - `widen-max` / `widen-min`: numeric max / min of both
 *
 * Neither input is mutated.
 */
export function createRecordMerge(options?: RecordMergeOptions): RecordMergeFn {
    const policies = options?.policies ?? {};

    const mergeAt = (
        current: Readonly<Record<string, unknown>>,
        extension: Readonly<Record<string, unknown>>,
        prefix: string,
    ): Record<string, unknown> => {
        const result: Record<string, unknown> = { ...current };

        for (const [key, extVal] of Object.entries(extension)) {
            if (extVal === undefined) continue;
            const path = prefix ? `${prefix}.${key}` : key;

            const curVal = result[key];
            if (curVal === undefined) {
                result[key] = extVal;
                continue;
            }

            if (isPlainObject(curVal) && isPlainObject(extVal)) {
                result[key] = mergeAt(curVal, extVal, path);
                continue;
            }

            result[key] = applyPolicy(getPolicy(policies, path), path, curVal, extVal);
        }

        return result;
    };

    return (current, extension) => mergeAt(current, extension, '');
}
