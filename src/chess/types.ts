/**
 * Chess Module Type Definitions
 *
 * Shared types for the move-search engine: the rules-engine contract the
 * search consumes, scores and bounds, root candidates, and book entries.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

// =============================================================================
// Rules Engine Contract
// =============================================================================

/** Result of the terminal-state query. A game that ended without mate is a draw. */
export interface TerminalStatus {
  ended: boolean;
  isCheckmate: boolean;
}

/**
 * Everything the search needs from a rules library.
 *
 * `apply` and `undo` mutate the position in place and must be exact inverses,
 * including side to move and any castling or repetition bookkeeping.
 */
export interface RulesEngine<P, M> {
  /** Recomputed on every call */
  legalMoves(position: P): M[];
  apply(position: P, move: M): void;
  undo(position: P): void;
  isTerminal(position: P): TerminalStatus;
  isCapture(move: M): boolean;
  sideToMove(position: P): Color;
  /** Pieces of both colors, kings included */
  pieceCount(position: P): number;
  sameMove(a: M, b: M): boolean;
  toNotation(move: M): string;
  /** Returns null when the text names no legal move */
  fromNotation(position: P, text: string): M | null;
  /** Serialized copy of the position, used for worker tasks and balance checks */
  snapshot(position: P): string;
  restore(snapshot: string): P;
}

/** Static evaluation relative to the side to move */
export interface PositionEvaluator<P> {
  evaluate(position: P): number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Score of one root move, relative to the side to move at the root */
export interface CandidateEval<M> {
  move: M;
  score: number;
}

/** Search statistics */
export interface SearchStats {
  /** Full-width nodes visited */
  nodes: number;
  /** Quiescence nodes visited */
  qNodes: number;
  /** Beta cutoffs in the main search */
  betaCutoffs: number;
  /** Deepest ply reached, quiescence included */
  seldepth: number;
}

/** Inputs to the depth policy */
export interface DepthInput {
  /** Number of legal root moves */
  branching: number;
  /** Pieces left on the board, kings included */
  pieces: number;
}

export type DepthPolicy = (input: DepthInput) => number;

/** Where the orchestrator's move came from */
export type DecisionSource = 'book' | 'search';

/** Full result of one orchestrator call */
export interface EngineDecision<M> {
  move: M;
  source: DecisionSource;
  /** Search depth used (0 for book moves) */
  depth: number;
  /** Best score (0 for book moves) */
  score: number;
  /** Every root candidate, sorted by score descending */
  candidates: CandidateEval<M>[];
  /** Candidates sharing the maximum score */
  best: M[];
  stats?: SearchStats;
}

// =============================================================================
// Opening Book Types
// =============================================================================

/** Opening book move */
export interface BookMove<M> {
  move: M;
  weight: number;
}

/** A named opening line used to build the book */
export interface OpeningLine {
  name: string;
  /** Moves in SAN notation from the starting position */
  moves: string[];
  /** Weight given to every move of the line */
  weight: number;
}

/** Source of book suggestions, consulted before search */
export interface MoveBook<P, M> {
  lookup(position: P): BookMove<M>[] | null;
  suggest(position: P, random: RandomSource): M | null;
}

// =============================================================================
// Randomness
// =============================================================================

/** Uniform random numbers in [0, 1) */
export interface RandomSource {
  next(): number;
}

// =============================================================================
// Constants
// =============================================================================

/** Standard starting position FEN */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/** Material values in centipawns (the king carries no material) */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 300,
  b: 300,
  r: 500,
  q: 900,
  k: 0,
};

/** Larger than any reachable score */
export const INFINITY = 1_000_000;

/** Score of being checkmated at the current node, before ply adjustment */
export const MATE_SCORE = 100_000;

/** Scores beyond this magnitude are mate scores */
export const MATE_THRESHOLD = MATE_SCORE - 1_000;

export const DRAW_SCORE = 0;

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

// =============================================================================
// Root Search
// =============================================================================

/** Root moves to score at a fixed depth */
export interface RootSearchRequest<P, M> {
  position: P;
  moves: M[];
  depth: number;
}

export interface RootSearchResult<M> {
  /** One entry per requested move, in request order */
  candidates: CandidateEval<M>[];
  stats: SearchStats;
}

/**
 * Scores root candidates. The position must be left exactly as it was given,
 * and every candidate must be scored before the promise settles.
 */
export interface RootSearchExecutor<P, M> {
  scoreCandidates(request: RootSearchRequest<P, M>): Promise<RootSearchResult<M>>;
  close?(): Promise<void>;
}
