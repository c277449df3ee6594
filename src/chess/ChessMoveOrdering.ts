/**
 * Move ordering for alpha-beta
 *
 * Captures are searched first; every other move keeps its generated order.
 */

export function orderMoves<M>(moves: readonly M[], isCapture: (move: M) => boolean): M[] {
  const captures: M[] = [];
  const quiet: M[] = [];

  for (const move of moves) {
    if (isCapture(move)) {
      captures.push(move);
    } else {
      quiet.push(move);
    }
  }

  return captures.concat(quiet);
}
