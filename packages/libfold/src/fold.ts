// libfold/src/fold.ts
// Sequential layer folding.
//
// Layers are applied strictly in the order given: each step sees the
// accumulator produced by every earlier layer and nothing from later ones.
// Folding is never parallelised, so the outcome depends only on the order.

import type { StepFn } from './types.js';

/**
 * Fold layers into a base state, in order.
 *
 * @param base   - Initial accumulator
 * @param layers - Layers, highest precedence first
 * @param step   - Combines the accumulator with one layer
 * @returns Final accumulator
 */
export function foldLayers<S, L>(
    base: S,
    layers: readonly L[],
    step: StepFn<S, L>,
): S {
    let current = base;
    for (let i = 0; i < layers.length; i++) {
        current = step(current, layers[i], i);
    }
    return current;
}
