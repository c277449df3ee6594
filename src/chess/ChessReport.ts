/**
 * ChessReport - Text for scores and evaluations shown to the user
 */

import type { Chess } from 'chess.js';
import type { ChessEvaluator } from './ChessEvaluator.js';
import { MATE_SCORE, MATE_THRESHOLD } from './types.js';

function signed(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

/**
 * Format a root score
 * @returns Centipawns, or moves to mate as #N / #-N
 */
export function formatScore(score: number): string {
  if (Math.abs(score) >= MATE_THRESHOLD) {
    // The root move itself is the first ply
    const plies = MATE_SCORE - Math.abs(score) + 1;
    return `#${score > 0 ? '' : '-'}${Math.ceil(plies / 2)}`;
  }
  return String(score);
}

/**
 * One-line static evaluation, always from White's side
 */
export function describeEvaluation(evaluator: ChessEvaluator, position: Chess): string {
  return `static evaluation ${signed(evaluator.evaluateForWhite(position))} for White`;
}
