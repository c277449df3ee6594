/**
 * Depth selection
 *
 * Picks the fixed search depth for one orchestrator call. Crowded boards and
 * wide branching get a shallow search; endgames and forced positions go deeper.
 * The policy never increases when either input grows.
 */

import type { DepthInput, DepthPolicy } from './types.js';

/** Piece-count thresholds, most pieces first */
const MATERIAL_TIERS: ReadonlyArray<{ minPieces: number; depth: number }> = [
  { minPieces: 25, depth: 2 },
  { minPieces: 13, depth: 3 },
  { minPieces: 7, depth: 4 },
  { minPieces: 0, depth: 5 },
];

const WIDE_BRANCHING = 35;
const NARROW_BRANCHING = 10;

/**
 * Create the default depth policy, capped at `maxDepth`
 */
export function createDepthPolicy(maxDepth: number): DepthPolicy {
  const ceiling = Math.max(1, Math.floor(maxDepth));

  return ({ branching, pieces }: DepthInput): number => {
    const tier = MATERIAL_TIERS.find(t => pieces >= t.minPieces);
    let depth = tier ? tier.depth : 1;

    if (branching > WIDE_BRANCHING) {
      depth--;
    } else if (branching < NARROW_BRANCHING) {
      depth++;
    }

    return Math.min(ceiling, Math.max(1, depth));
  };
}

/**
 * Resolve the depth for one call: a fixed depth wins over the policy
 */
export function selectDepth(depth: number | 'auto', policy: DepthPolicy, input: DepthInput): number {
  if (depth === 'auto') {
    return policy(input);
  }
  return Math.max(1, Math.floor(depth));
}
