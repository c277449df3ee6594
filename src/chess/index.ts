/**
 * Chess move-search engine
 *
 * - Rules adapter over chess.js
 * - Material and piece-square evaluation
 * - Negamax alpha-beta search with quiescence
 * - Binary opening book and its builder
 * - Root move selection, sequential or on worker threads
 * - Interactive game loop
 *
 * @module chess
 */

// Rules
export {
  ChessRules,
  createPosition,
  isValidFen,
  squareToCoords,
  coordsToSquare,
} from './ChessRules.js';

// Evaluation
export {
  ChessEvaluator,
  createChessEvaluator,
  quickEvaluate,
  loadPieceSquareTables,
  type EvaluationBreakdown,
  type PieceSquareTables,
} from './ChessEvaluator.js';

export { formatScore, describeEvaluation } from './ChessReport.js';

// Search
export { orderMoves } from './ChessMoveOrdering.js';
export {
  ChessSearch,
  createChessSearch,
  type SearchOptions,
} from './ChessSearch.js';
export { createDepthPolicy, selectDepth } from './ChessDepth.js';

// Randomness
export {
  mathRandom,
  createSeededRandom,
  pickRandom,
  pickWeighted,
} from './ChessRandom.js';

// Opening Book
export { computeZobristHash } from './ChessZobrist.js';
export {
  OpeningBook,
  createOpeningBook,
  encodeBookMove,
  describeBookMove,
  parseBook,
  serializeBook,
  BOOK_RECORD_SIZE,
  type BookEntry,
  type OpeningBookOptions,
} from './ChessOpenings.js';
export {
  OpeningLineSchema,
  OpeningFileSchema,
  compileOpeningLines,
  buildOpeningBook,
  loadOpeningLines,
  writeOpeningBook,
} from './ChessBookBuilder.js';

// Configuration and errors
export {
  EngineConfigSchema,
  parseEngineConfig,
  loadEngineConfigFromEnv,
  type EngineConfig,
  type EngineConfigInput,
} from './ChessConfig.js';
export {
  ChessEngineError,
  NoLegalMovesError,
  WrongSideToMoveError,
  SearchInvariantError,
  ConfigError,
  OpeningBookError,
  type ChessErrorCode,
} from './ChessErrors.js';

// AI Player
export {
  ChessAI,
  SequentialRootSearch,
  createChessAI,
  type ChessAIDeps,
  type CreateChessAIOptions,
} from './ChessAI.js';
export {
  ChessWorkerPool,
  WorkerRootSearch,
  createSearchWorker,
  mergeStats,
  type PoolWorker,
  type WorkerFactory,
  type TaskResult,
} from './ChessWorkerPool.js';

// Game
export {
  ChessGame,
  chooseSide,
  colorName,
  INVALID_MOVE_MESSAGE,
  type GameIO,
  type GameOutcome,
  type GameResult,
  type ChessGameOptions,
} from './ChessGame.js';

// Types
export * from './types.js';
