/**
 * ChessRules - Rules-engine contract implemented over chess.js
 *
 * Positions are chess.js `Chess` instances mutated in place by `apply`/`undo`,
 * so repetition history survives a search. Moves are chess.js verbose moves.
 */

import { Chess, type Move } from 'chess.js';
import { FILES, type Color, type RulesEngine, type TerminalStatus } from './types.js';

/** Strip check, mate and annotation suffixes from SAN */
function normalizeSan(san: string): string {
  return san.replace(/[+#!?]+$/, '');
}

/**
 * ChessRules adapts chess.js to the search's rules contract
 */
export class ChessRules implements RulesEngine<Chess, Move> {
  legalMoves(position: Chess): Move[] {
    return position.moves({ verbose: true });
  }

  apply(position: Chess, move: Move): void {
    position.move({ from: move.from, to: move.to, promotion: move.promotion });
  }

  undo(position: Chess): void {
    position.undo();
  }

  isTerminal(position: Chess): TerminalStatus {
    if (position.isCheckmate()) {
      return { ended: true, isCheckmate: true };
    }
    return { ended: position.isDraw(), isCheckmate: false };
  }

  isCapture(move: Move): boolean {
    return move.captured !== undefined;
  }

  sideToMove(position: Chess): Color {
    return position.turn();
  }

  pieceCount(position: Chess): number {
    let count = 0;
    for (const row of position.board()) {
      for (const square of row) {
        if (square) count++;
      }
    }
    return count;
  }

  sameMove(a: Move, b: Move): boolean {
    return a.from === b.from && a.to === b.to && a.promotion === b.promotion;
  }

  toNotation(move: Move): string {
    return move.san;
  }

  /**
   * Accepts SAN ("Nf3", "exd5", "O-O", with or without "+"/"#") or
   * long algebraic notation ("g1f3", "e7e8q")
   */
  fromNotation(position: Chess, text: string): Move | null {
    const wanted = text.trim();
    if (!wanted) return null;

    const san = normalizeSan(wanted);
    const lan = wanted.toLowerCase();
    return this.legalMoves(position).find(m => normalizeSan(m.san) === san || m.lan === lan) ?? null;
  }

  snapshot(position: Chess): string {
    return position.fen();
  }

  restore(snapshot: string): Chess {
    return new Chess(snapshot);
  }
}

/**
 * Create a position from FEN, or the standard start when omitted
 */
export function createPosition(fen?: string): Chess {
  return fen ? new Chess(fen) : new Chess();
}

/**
 * Validate a FEN string
 */
export function isValidFen(fen: string): boolean {
  try {
    new Chess(fen);
    return true;
  } catch {
    return false;
  }
}

/**
 * Convert algebraic notation to 0-based coordinates (a1 = 0,0)
 */
export function squareToCoords(square: string): { file: number; rank: number } {
  return {
    file: square.charCodeAt(0) - 97,
    rank: parseInt(square[1], 10) - 1,
  };
}

/**
 * Convert 0-based coordinates to algebraic notation
 */
export function coordsToSquare(file: number, rank: number): string {
  return `${FILES[file]}${rank + 1}`;
}
