/**
 * Random sources for tie-breaking and book selection
 *
 * The engine never reads a global generator; callers pass one in so tests
 * can seed it.
 */

import type { RandomSource } from './types.js';

/** Process-wide Math.random */
export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

function fnv1a32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Mulberry32: small, fast, deterministic
 */
export function createSeededRandom(seed: number | string): RandomSource {
  let a = typeof seed === 'string' ? fnv1a32(seed) : seed >>> 0;
  return {
    next: () => {
      a = (a + 0x6d2b79f5) >>> 0;
      let t = a;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Uniform pick from a non-empty list
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('pickRandom() from empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

/**
 * Weighted pick; weights must be positive
 */
export function pickWeighted<T>(items: readonly T[], weightOf: (item: T) => number, random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('pickWeighted() from empty list');
  }

  const totalWeight = items.reduce((sum, item) => sum + weightOf(item), 0);
  let remaining = random.next() * totalWeight;

  for (const item of items) {
    remaining -= weightOf(item);
    if (remaining < 0) {
      return item;
    }
  }

  return items[items.length - 1];
}
