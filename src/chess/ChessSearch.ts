/**
 * ChessSearch - Negamax with alpha-beta pruning and quiescence
 *
 * Fail-hard alpha-beta over full moves down to a fixed depth, then a
 * capture-only quiescence search to settle exchanges past the horizon.
 * Scores are always relative to the side to move at the node.
 *
 * The search is generic over the rules engine: positions are mutated with
 * `apply`/`undo` and every apply is undone before the call returns, on
 * cutoffs and exceptions alike.
 */

import { orderMoves } from './ChessMoveOrdering.js';
import {
  DRAW_SCORE,
  MATE_SCORE,
  type PositionEvaluator,
  type RulesEngine,
  type SearchStats,
} from './types.js';

export interface SearchOptions {
  /**
   * Hard cap on quiescence plies. Captures normally run out on their own;
   * leave unset for an unbounded quiescence search.
   */
  maxQuiescenceDepth?: number;
}

function clamp(score: number, alpha: number, beta: number): number {
  return Math.min(beta, Math.max(alpha, score));
}

// =============================================================================
// ChessSearch Class
// =============================================================================

export class ChessSearch<P, M> {
  private readonly rules: RulesEngine<P, M>;
  private readonly evaluator: PositionEvaluator<P>;
  private readonly maxQuiescenceDepth: number | undefined;

  private stats: SearchStats = this.initStats();

  constructor(rules: RulesEngine<P, M>, evaluator: PositionEvaluator<P>, options: SearchOptions = {}) {
    this.rules = rules;
    this.evaluator = evaluator;
    this.maxQuiescenceDepth = options.maxQuiescenceDepth;
  }

  /**
   * Alpha-beta search
   * @param depth - Remaining full-width plies; 0 drops straight into quiescence
   * @param ply - Distance from the search root, used to prefer faster mates
   * @returns Score within [alpha, beta]
   */
  search(position: P, alpha: number, beta: number, depth: number, ply: number = 0): number {
    this.stats.nodes++;
    this.trackPly(ply);

    const status = this.rules.isTerminal(position);
    if (status.ended) {
      // Being mated is always bad for the side to move here
      const score = status.isCheckmate ? -MATE_SCORE + ply : DRAW_SCORE;
      return clamp(score, alpha, beta);
    }

    if (depth <= 0) {
      return this.quiescence(position, alpha, beta, ply);
    }

    const moves = orderMoves(this.rules.legalMoves(position), m => this.rules.isCapture(m));
    let bestScore = -Infinity;

    for (const move of moves) {
      this.rules.apply(position, move);
      let score: number;
      try {
        score = -this.search(position, -beta, -alpha, depth - 1, ply + 1);
      } finally {
        this.rules.undo(position);
      }

      if (score > bestScore) {
        bestScore = score;
      }
      if (bestScore >= beta) {
        this.stats.betaCutoffs++;
        return beta;
      }
      if (bestScore > alpha) {
        alpha = bestScore;
      }
    }

    return alpha;
  }

  /**
   * Quiescence search - search captures until position is quiet
   */
  quiesce(position: P, alpha: number, beta: number): number {
    return this.quiescence(position, alpha, beta, 0);
  }

  private quiescence(position: P, alpha: number, beta: number, ply: number, qply: number = 0): number {
    this.stats.qNodes++;
    this.trackPly(ply);

    // Stand pat
    const standPat = this.evaluator.evaluate(position);
    if (standPat >= beta) {
      return beta;
    }
    if (standPat > alpha) {
      alpha = standPat;
    }

    if (this.maxQuiescenceDepth !== undefined && qply >= this.maxQuiescenceDepth) {
      return alpha;
    }

    const captures = this.rules.legalMoves(position).filter(m => this.rules.isCapture(m));

    for (const move of captures) {
      this.rules.apply(position, move);
      let score: number;
      try {
        score = -this.quiescence(position, -beta, -alpha, ply + 1, qply + 1);
      } finally {
        this.rules.undo(position);
      }

      if (score >= beta) {
        return beta;
      }
      if (score > alpha) {
        alpha = score;
      }
    }

    return alpha;
  }

  private trackPly(ply: number): void {
    if (ply > this.stats.seldepth) {
      this.stats.seldepth = ply;
    }
  }

  /**
   * Initialize search statistics
   */
  private initStats(): SearchStats {
    return {
      nodes: 0,
      qNodes: 0,
      betaCutoffs: 0,
      seldepth: 0,
    };
  }

  /**
   * Get search statistics
   */
  getStats(): SearchStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = this.initStats();
  }
}

/**
 * Create a new search instance
 */
export function createChessSearch<P, M>(
  rules: RulesEngine<P, M>,
  evaluator: PositionEvaluator<P>,
  options?: SearchOptions
): ChessSearch<P, M> {
  return new ChessSearch(rules, evaluator, options);
}
