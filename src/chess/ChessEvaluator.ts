/**
 * ChessEvaluator - Static position evaluation
 *
 * Material balance plus piece-square tables. Tables are written from White's
 * perspective (row 0 = rank 8); Black reads the rank-mirrored row. The king
 * carries no material but does have a table.
 *
 * `evaluate` is relative to the side to move; `evaluateForWhite` is not.
 */

import { readFileSync } from 'node:fs';
import type { Chess } from 'chess.js';
import { z } from 'zod';
import { PIECE_VALUES, type PieceType, type PositionEvaluator } from './types.js';

// =============================================================================
// Piece-Square Tables (row 0 = rank 8, row 7 = rank 1)
// =============================================================================

const TableSchema = z.array(z.array(z.number().int()).length(8)).length(8);

const PieceSquareTablesSchema = z.object({
  p: TableSchema,
  n: TableSchema,
  b: TableSchema,
  r: TableSchema,
  q: TableSchema,
  k: TableSchema,
});

export type PieceSquareTables = Record<PieceType, number[][]>;

const TABLES_PATH = new URL('../../data/piece-square-tables.json', import.meta.url);

/**
 * Read and validate the piece-square tables shipped in data/
 */
export function loadPieceSquareTables(path: URL | string = TABLES_PATH): PieceSquareTables {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return PieceSquareTablesSchema.parse(raw);
}

const DEFAULT_TABLES = loadPieceSquareTables();

/** Evaluation split into its two terms, White-relative */
export interface EvaluationBreakdown {
  material: number;
  pieceSquares: number;
  total: number;
}

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export class ChessEvaluator implements PositionEvaluator<Chess> {
  private readonly tables: PieceSquareTables;

  constructor(tables: PieceSquareTables = DEFAULT_TABLES) {
    this.tables = tables;
  }

  /**
   * Evaluate relative to the side to move
   * @returns Centipawns, positive when the side to move is better
   */
  evaluate(position: Chess): number {
    const score = this.evaluateForWhite(position);
    return position.turn() === 'w' ? score : -score;
  }

  /**
   * Evaluate from White's perspective
   */
  evaluateForWhite(position: Chess): number {
    return this.getEvaluationBreakdown(position).total;
  }

  getEvaluationBreakdown(position: Chess): EvaluationBreakdown {
    let material = 0;
    let pieceSquares = 0;

    const board = position.board();
    for (let row = 0; row < 8; row++) {
      for (let file = 0; file < 8; file++) {
        const piece = board[row][file];
        if (!piece) continue;

        const sign = piece.color === 'w' ? 1 : -1;
        // Black reads the table mirrored across the center rank
        const pstRow = piece.color === 'w' ? row : 7 - row;

        material += sign * PIECE_VALUES[piece.type];
        pieceSquares += sign * this.tables[piece.type][pstRow][file];
      }
    }

    return { material, pieceSquares, total: material + pieceSquares };
  }
}

/**
 * Create an evaluator instance
 */
export function createChessEvaluator(tables?: PieceSquareTables): ChessEvaluator {
  return new ChessEvaluator(tables);
}

/**
 * Quick evaluation of a position
 */
export function quickEvaluate(position: Chess): number {
  return new ChessEvaluator().evaluate(position);
}
