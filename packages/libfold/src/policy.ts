// libfold/src/policy.ts
// Field policies for global-record conflict resolution.
//
// The default is first-writer-wins: the value from the earliest layer that
// defines a field is final. Widening is the only exception, and only for the
// fields that name it explicitly.

import type { FieldPolicies, FieldPolicy } from './types.js';

/** Policy for fields with no explicit entry. */
export const DEFAULT_POLICY: FieldPolicy = 'first-wins';

/** All policies, for validating user input. */
export const FIELD_POLICIES = ['first-wins', 'widen-max', 'widen-min'] as const satisfies readonly FieldPolicy[];

/**
 * Look up the policy for a dotted field path.
 */
export function getPolicy(policies: FieldPolicies, path: string): FieldPolicy {
    return Object.prototype.hasOwnProperty.call(policies, path) ? policies[path] : DEFAULT_POLICY;
}

/**
 * Resolve one field given the value already accumulated and a later value.
 *
 * @param policy   - Policy for this field
 * @param path     - Dotted path, for error messages
 * @param current  - Accumulated (earlier, higher-precedence) value
 * @param incoming - Value from the later layer
 */
export function applyPolicy(
    policy: FieldPolicy,
    path: string,
    current: unknown,
    incoming: unknown,
): unknown {
    if (current === undefined) return incoming;
    if (incoming === undefined || policy === 'first-wins') return current;

    if (typeof current !== 'number' || typeof incoming !== 'number') {
        throw new Error(
            `Type mismatch for "${path}": ${policy} expects numbers, ` +
            `got ${typeof current} and ${typeof incoming}`,
        );
    }
    return policy === 'widen-max'
        ? Math.max(current, incoming)
        : Math.min(current, incoming);
}
