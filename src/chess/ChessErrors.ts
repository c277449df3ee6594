/**
 * Engine error types
 *
 * Each failure the engine reports carries a stable `code` so the game loop
 * can tell a usage error apart from a configuration or invariant failure.
 */

export type ChessErrorCode =
  | 'NO_LEGAL_MOVES'
  | 'WRONG_SIDE'
  | 'SEARCH_INVARIANT'
  | 'INVALID_CONFIG'
  | 'BOOK_FORMAT';

export class ChessEngineError extends Error {
  readonly code: ChessErrorCode;

  constructor(code: ChessErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The engine was asked to move in a position with no legal moves */
export class NoLegalMovesError extends ChessEngineError {
  constructor(position: string) {
    super('NO_LEGAL_MOVES', `No legal moves available in position ${position}`);
  }
}

/** The engine was asked to move for the side it does not play */
export class WrongSideToMoveError extends ChessEngineError {
  constructor(expected: string, actual: string) {
    super('WRONG_SIDE', `Engine plays '${expected}' but '${actual}' is to move`);
  }
}

/** Unbalanced apply/undo or another broken search invariant */
export class SearchInvariantError extends ChessEngineError {
  constructor(message: string) {
    super('SEARCH_INVARIANT', message);
  }
}

export class ConfigError extends ChessEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid engine configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Unreadable or malformed opening book file */
export class OpeningBookError extends ChessEngineError {
  constructor(message: string) {
    super('BOOK_FORMAT', message);
  }
}
