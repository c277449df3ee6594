/**
 * ChessAI - Move selection
 *
 * Coordinates the engine components for one decision:
 * - Opening book first, when it knows the position
 * - Otherwise every legal root move is scored at a fixed depth
 * - One of the moves sharing the best score is picked at random
 *
 * The position handed in is the caller's; it is searched in place and is
 * left exactly as it was found.
 */

import type { Chess, Move } from 'chess.js';
import { createChessEvaluator } from './ChessEvaluator.js';
import { NoLegalMovesError, SearchInvariantError, WrongSideToMoveError } from './ChessErrors.js';
import { createDepthPolicy, selectDepth } from './ChessDepth.js';
import { createOpeningBook } from './ChessOpenings.js';
import { mathRandom, pickRandom } from './ChessRandom.js';
import { ChessRules } from './ChessRules.js';
import { createChessSearch, type ChessSearch, type SearchOptions } from './ChessSearch.js';
import { ChessWorkerPool, WorkerRootSearch, type WorkerFactory } from './ChessWorkerPool.js';
import type { EngineConfig } from './ChessConfig.js';
import {
  INFINITY,
  type CandidateEval,
  type Color,
  type DepthPolicy,
  type EngineDecision,
  type MoveBook,
  type PositionEvaluator,
  type RandomSource,
  type RootSearchExecutor,
  type RootSearchRequest,
  type RootSearchResult,
  type RulesEngine,
} from './types.js';

// =============================================================================
// Sequential Root Search
// =============================================================================

/**
 * Scores root moves one after another on the caller's position
 */
export class SequentialRootSearch<P, M> implements RootSearchExecutor<P, M> {
  private readonly rules: RulesEngine<P, M>;
  private readonly search: ChessSearch<P, M>;

  constructor(rules: RulesEngine<P, M>, evaluator: PositionEvaluator<P>, options: SearchOptions = {}) {
    this.rules = rules;
    this.search = createChessSearch(rules, evaluator, options);
  }

  async scoreCandidates({ position, moves, depth }: RootSearchRequest<P, M>): Promise<RootSearchResult<M>> {
    this.search.resetStats();
    const candidates: CandidateEval<M>[] = [];

    for (const move of moves) {
      this.rules.apply(position, move);
      let score: number;
      try {
        score = -this.search.search(position, -INFINITY, INFINITY, depth);
      } finally {
        this.rules.undo(position);
      }
      candidates.push({ move, score });
    }

    return { candidates, stats: this.search.getStats() };
  }
}

// =============================================================================
// ChessAI Class
// =============================================================================

export interface ChessAIDeps<P, M> {
  rules: RulesEngine<P, M>;
  evaluator: PositionEvaluator<P>;
  config: EngineConfig;
  book?: MoveBook<P, M>;
  /** Defaults to a sequential search on the calling thread */
  executor?: RootSearchExecutor<P, M>;
  random?: RandomSource;
  depthPolicy?: DepthPolicy;
}

export class ChessAI<P, M> {
  private readonly rules: RulesEngine<P, M>;
  private readonly config: EngineConfig;
  private readonly book: MoveBook<P, M> | null;
  private readonly executor: RootSearchExecutor<P, M>;
  private readonly random: RandomSource;
  private readonly depthPolicy: DepthPolicy;

  constructor(deps: ChessAIDeps<P, M>) {
    this.rules = deps.rules;
    this.config = deps.config;
    this.book = deps.book ?? null;
    this.executor = deps.executor ?? new SequentialRootSearch(deps.rules, deps.evaluator, {
      maxQuiescenceDepth: deps.config.maxQuiescenceDepth,
    });
    this.random = deps.random ?? mathRandom;
    this.depthPolicy = deps.depthPolicy ?? createDepthPolicy(deps.config.maxDepth);
  }

  get side(): Color {
    return this.config.side;
  }

  /**
   * Choose the engine's next move
   * @throws NoLegalMovesError when the side to move has no legal move
   */
  async nextMove(position: P): Promise<M> {
    const decision = await this.analyze(position);
    return decision.move;
  }

  /**
   * Choose a move and report how it was chosen
   */
  async analyze(position: P): Promise<EngineDecision<M>> {
    const toMove = this.rules.sideToMove(position);
    if (toMove !== this.config.side) {
      throw new WrongSideToMoveError(this.config.side, toMove);
    }

    const bookMove = this.book?.suggest(position, this.random) ?? null;
    if (bookMove !== null) {
      return { move: bookMove, source: 'book', depth: 0, score: 0, candidates: [], best: [bookMove] };
    }

    const moves = this.rules.legalMoves(position);
    if (moves.length === 0) {
      throw new NoLegalMovesError(this.rules.snapshot(position));
    }

    const depth = selectDepth(this.config.depth, this.depthPolicy, {
      branching: moves.length,
      pieces: this.rules.pieceCount(position),
    });

    const before = this.config.verifyBalance ? this.rules.snapshot(position) : null;
    const result = await this.executor.scoreCandidates({ position, moves, depth });

    if (before !== null) {
      const after = this.rules.snapshot(position);
      if (after !== before) {
        throw new SearchInvariantError(`Root position changed during search: ${before} -> ${after}`);
      }
    }

    if (result.candidates.length !== moves.length) {
      throw new SearchInvariantError(
        `Expected ${moves.length} scored root moves, got ${result.candidates.length}`
      );
    }

    // Stable sort keeps generation order among equal scores
    const candidates = [...result.candidates].sort((a, b) => b.score - a.score);
    const score = candidates[0].score;
    const best = candidates.filter(c => c.score === score).map(c => c.move);

    return {
      move: pickRandom(best, this.random),
      source: 'search',
      depth,
      score,
      candidates,
      best,
      stats: result.stats,
    };
  }

  /**
   * Release worker threads, if any
   */
  async close(): Promise<void> {
    await this.executor.close?.();
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface CreateChessAIOptions {
  random?: RandomSource;
  book?: MoveBook<Chess, Move>;
  /** Used when `config.workers` is positive */
  createWorker?: WorkerFactory;
}

/**
 * Create an engine for standard chess from a validated configuration
 */
export function createChessAI(config: EngineConfig, options: CreateChessAIOptions = {}): ChessAI<Chess, Move> {
  const rules = new ChessRules();
  const evaluator = createChessEvaluator();
  const book = options.book ?? createOpeningBook(config.bookPath, { candidates: config.bookCandidates });

  const executor = config.workers > 0
    ? new WorkerRootSearch(new ChessWorkerPool(config.workers, options.createWorker), {
      maxQuiescenceDepth: config.maxQuiescenceDepth,
    })
    : undefined;

  return new ChessAI({ rules, evaluator, config, book, executor, random: options.random });
}
