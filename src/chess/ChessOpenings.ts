/**
 * ChessOpenings - Binary opening book
 *
 * The book is a flat file of 16-byte big-endian records in the Polyglot
 * layout, sorted by key:
 *
 *   key    u64  Zobrist key of the position (see ChessZobrist)
 *   move   u16  to-file | to-rank << 3 | from-file << 6 | from-rank << 9 | promotion << 12
 *   weight u16
 *   learn  u32  unused, written as 0
 *
 * Castling is stored as the king capturing its own rook (e1h1, e1a1).
 *
 * A book that is missing or unreadable disables itself: the failure is
 * logged once at load time and every lookup reports no suggestion.
 */

import { readFileSync } from 'node:fs';
import type { Chess, Move } from 'chess.js';
import { OpeningBookError } from './ChessErrors.js';
import { pickWeighted } from './ChessRandom.js';
import { coordsToSquare, squareToCoords } from './ChessRules.js';
import { computeZobristHash } from './ChessZobrist.js';
import type { BookMove, MoveBook, RandomSource } from './types.js';

// =============================================================================
// Record Format
// =============================================================================

export const BOOK_RECORD_SIZE = 16;

/** One decoded book record */
export interface BookEntry {
  key: bigint;
  move: number;
  weight: number;
  learn: number;
}

const PROMOTION_CODES: Record<string, number> = {
  n: 1, b: 2, r: 3, q: 4,
};

/** King moves that are castling, mapped to the king-takes-rook form */
const CASTLING_ENCODING: Record<string, string> = {
  e1g1: 'h1',
  e1c1: 'a1',
  e8g8: 'h8',
  e8c8: 'a8',
};

/**
 * Pack a move into the book's 16-bit move format
 */
export function encodeBookMove(move: Pick<Move, 'from' | 'to' | 'piece' | 'promotion'>): number {
  let to: string = move.to;
  if (move.piece === 'k') {
    to = CASTLING_ENCODING[`${move.from}${move.to}`] ?? to;
  }

  const from = squareToCoords(move.from);
  const target = squareToCoords(to);
  const promotion = move.promotion ? PROMOTION_CODES[move.promotion] ?? 0 : 0;

  return target.file | (target.rank << 3) | (from.file << 6) | (from.rank << 9) | (promotion << 12);
}

/**
 * Unpack a book move into its from/to squares, for display and debugging
 */
export function describeBookMove(raw: number): string {
  const to = coordsToSquare(raw & 7, (raw >> 3) & 7);
  const from = coordsToSquare((raw >> 6) & 7, (raw >> 9) & 7);
  const promotion = (raw >> 12) & 7;
  const suffix = promotion > 0 ? ' nbrq'[promotion] : '';
  return `${from}${to}${suffix}`;
}

/**
 * Parse a book file's contents
 * @throws OpeningBookError when the data is truncated or out of order
 */
export function parseBook(data: Uint8Array): BookEntry[] {
  if (data.byteLength % BOOK_RECORD_SIZE !== 0) {
    throw new OpeningBookError(
      `Book size ${data.byteLength} is not a multiple of ${BOOK_RECORD_SIZE} bytes`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const entries: BookEntry[] = [];

  for (let offset = 0; offset < data.byteLength; offset += BOOK_RECORD_SIZE) {
    const entry: BookEntry = {
      key: view.getBigUint64(offset),
      move: view.getUint16(offset + 8),
      weight: view.getUint16(offset + 10),
      learn: view.getUint32(offset + 12),
    };

    const previous = entries[entries.length - 1];
    if (previous && previous.key > entry.key) {
      throw new OpeningBookError(`Book records are not sorted by key at offset ${offset}`);
    }
    entries.push(entry);
  }

  return entries;
}

/**
 * Serialize records, sorting by key and then by descending weight
 */
export function serializeBook(entries: readonly BookEntry[]): Uint8Array {
  const sorted = [...entries].sort((a, b) => {
    if (a.key !== b.key) return a.key < b.key ? -1 : 1;
    return b.weight - a.weight;
  });

  const data = new Uint8Array(sorted.length * BOOK_RECORD_SIZE);
  const view = new DataView(data.buffer);

  sorted.forEach((entry, index) => {
    const offset = index * BOOK_RECORD_SIZE;
    view.setBigUint64(offset, entry.key);
    view.setUint16(offset + 8, entry.move);
    view.setUint16(offset + 10, entry.weight);
    view.setUint32(offset + 12, entry.learn);
  });

  return data;
}

// =============================================================================
// OpeningBook Class
// =============================================================================

export interface OpeningBookOptions {
  /** Only the highest-weighted entries are eligible for selection (default: 3) */
  candidates?: number;
}

export class OpeningBook implements MoveBook<Chess, Move> {
  private readonly entries: BookEntry[] | null;
  private readonly candidates: number;

  private constructor(entries: BookEntry[] | null, options: OpeningBookOptions) {
    this.entries = entries;
    this.candidates = Math.max(1, options.candidates ?? 3);
  }

  /**
   * Load a book file. A missing or corrupt file yields a disabled book.
   */
  static fromFile(path: string, options: OpeningBookOptions = {}): OpeningBook {
    try {
      return new OpeningBook(parseBook(readFileSync(path)), options);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[Book] No opening book was found at ${path} (${reason}); searching every move`);
      return OpeningBook.disabled();
    }
  }

  /**
   * Build a book from in-memory data
   * @throws OpeningBookError on malformed data
   */
  static fromData(data: Uint8Array, options: OpeningBookOptions = {}): OpeningBook {
    return new OpeningBook(parseBook(data), options);
  }

  /** A book that never suggests anything */
  static disabled(): OpeningBook {
    return new OpeningBook(null, {});
  }

  get available(): boolean {
    return this.entries !== null;
  }

  /** Number of records in the book */
  get size(): number {
    return this.entries?.length ?? 0;
  }

  /**
   * All book moves for a position that are legal in it, heaviest first
   * @returns null when the position is not in the book
   */
  lookup(position: Chess): BookMove<Move>[] | null {
    if (!this.entries) return null;

    const key = computeZobristHash(position.fen());
    const records = this.findRecords(key);
    if (records.length === 0) return null;

    const legal = position.moves({ verbose: true });
    const moves: BookMove<Move>[] = [];

    for (const record of records) {
      const move = legal.find(m => encodeBookMove(m) === record.move);
      if (move) {
        moves.push({ move, weight: record.weight });
      }
    }

    if (moves.length === 0) return null;
    return moves.sort((a, b) => b.weight - a.weight);
  }

  /**
   * Weighted-random pick among the top book moves for a position
   */
  suggest(position: Chess, random: RandomSource): Move | null {
    const moves = this.lookup(position);
    if (!moves) return null;

    const eligible = moves.filter(m => m.weight > 0).slice(0, this.candidates);
    if (eligible.length === 0) return null;

    return pickWeighted(eligible, m => m.weight, random).move;
  }

  /**
   * Binary search for the run of records with this key
   */
  private findRecords(key: bigint): BookEntry[] {
    const entries = this.entries ?? [];
    let low = 0;
    let high = entries.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (entries[mid].key < key) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    const found: BookEntry[] = [];
    for (let i = low; i < entries.length && entries[i].key === key; i++) {
      found.push(entries[i]);
    }
    return found;
  }
}

/**
 * Create opening book instance from a file, or a disabled book when no path is given
 */
export function createOpeningBook(path?: string, options?: OpeningBookOptions): OpeningBook {
  return path ? OpeningBook.fromFile(path, options) : OpeningBook.disabled();
}
