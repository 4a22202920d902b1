// libfold/src/types.ts
// Core type definitions for priority-ordered folding.

// ─── Rank ───────────────────────────────────────────────────────────

/**
 * Ranked segment — a bucket of items sharing one priority rank.
 *
 * Lower rank = higher precedence = folded earlier.
 * Items inside a segment keep their declared order.
 */
export interface Ranked<T = unknown> {
    readonly __ranked: true;
    readonly rank: number;
    readonly items: readonly T[];
}

// ─── Fold ───────────────────────────────────────────────────────────

/** Fold step: combines the accumulator with the next layer. */
export type StepFn<S, L> = (acc: S, layer: L, index: number) => S;

// ─── Field Policies ─────────────────────────────────────────────────

/**
 * How a field of a global record resolves when two layers define it.
 *
 *   first-wins: the earlier (higher-precedence) layer keeps its value
 *   widen-max:  numeric maximum of both values
 *   widen-min:  numeric minimum of both values
 */
export type FieldPolicy = 'first-wins' | 'widen-max' | 'widen-min';

/** Policies keyed by dotted field path, e.g. `metrics.yMax`. */
export type FieldPolicies = Readonly<Record<string, FieldPolicy>>;

/** Record merge function: combines the accumulated record with a later layer's. */
export type RecordMergeFn = (
    current: Readonly<Record<string, unknown>>,
    extension: Readonly<Record<string, unknown>>,
) => Record<string, unknown>;

// ─── First-writer selection ─────────────────────────────────────────

/** Anything that can answer "is this key already taken?". */
export interface Claimed<K> {
    has(key: K): boolean;
}

/** Outcome of selecting unclaimed keys from one layer. */
export interface Selection<K> {
    /** Keys to copy in, in candidate order. */
    readonly selected: K[];
    /** Candidates already present in the accumulator. */
    readonly shadowed: number;
    /** Candidates rejected by the layer's own exclusion. */
    readonly excluded: number;
    /** Candidates dropped because the limit was reached. */
    readonly truncated: number;
}
