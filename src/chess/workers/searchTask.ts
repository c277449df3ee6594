/**
 * Scores one root candidate on an independent copy of the position, rebuilt
 * from the game's starting FEN and the moves played since.
 * Runs inside a worker thread; nothing here touches shared state.
 */

import { createChessEvaluator } from '../ChessEvaluator.js';
import { ChessRules } from '../ChessRules.js';
import { createChessSearch } from '../ChessSearch.js';
import { INFINITY } from '../types.js';
import { SearchRequestSchema, type SearchRequest, type SearchResponse } from './protocol.js';

export function runSearchTask(request: SearchRequest): SearchResponse {
  const rules = new ChessRules();
  const search = createChessSearch(rules, createChessEvaluator(), {
    maxQuiescenceDepth: request.maxQuiescenceDepth,
  });

  // Replaying the game keeps repetition draws visible to the search
  const position = rules.restore(request.fen);
  for (const lan of request.history) {
    const played = rules.fromNotation(position, lan);
    if (!played) {
      return {
        type: 'ERROR',
        id: request.id,
        error: `History move ${lan} is not legal in ${rules.snapshot(position)}`,
      };
    }
    rules.apply(position, played);
  }

  const move = rules.fromNotation(position, request.move);
  if (!move) {
    return {
      type: 'ERROR',
      id: request.id,
      error: `Move ${request.move} is not legal in ${rules.snapshot(position)}`,
    };
  }

  rules.apply(position, move);
  const score = -search.search(position, -INFINITY, INFINITY, request.depth);

  return { type: 'RESULT', id: request.id, score, stats: search.getStats() };
}

/**
 * Validate an incoming message and run it
 */
export function handleSearchMessage(message: unknown): SearchResponse {
  const parsed = SearchRequestSchema.safeParse(message);
  if (!parsed.success) {
    const id = typeof message === 'object' && message !== null && 'id' in message && typeof message.id === 'number'
      ? message.id
      : -1;
    return { type: 'ERROR', id, error: `Malformed search request: ${parsed.error.message}` };
  }

  try {
    return runSearchTask(parsed.data);
  } catch (error) {
    return {
      type: 'ERROR',
      id: parsed.data.id,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
