/**
 * Opening Book Tests
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { Chess } from 'chess.js';
import {
  buildOpeningBook,
  compileOpeningLines,
  loadOpeningLines,
  writeOpeningBook,
} from '../src/chess/ChessBookBuilder.js';
import { OpeningBookError } from '../src/chess/ChessErrors.js';
import {
  BOOK_RECORD_SIZE,
  OpeningBook,
  createOpeningBook,
  describeBookMove,
  encodeBookMove,
  parseBook,
  serializeBook,
} from '../src/chess/ChessOpenings.js';
import { createSeededRandom } from '../src/chess/ChessRandom.js';
import { computeZobristHash } from '../src/chess/ChessZobrist.js';
import { STARTING_FEN, type OpeningLine } from '../src/chess/types.js';

const LINES: OpeningLine[] = [
  { name: 'Open Game', moves: ['e4', 'e5'], weight: 50 },
  { name: 'Sicilian', moves: ['e4', 'c5'], weight: 80 },
  { name: 'Closed Game', moves: ['d4', 'd5'], weight: 20 },
];

// =============================================================================
// Record Format
// =============================================================================

describe('book move encoding', () => {
  it('packs from and to squares', () => {
    const move = new Chess().moves({ verbose: true }).find(m => m.lan === 'e2e4');
    expect(move).toBeDefined();
    if (!move) return;

    expect(encodeBookMove(move)).toBe(796);
    expect(describeBookMove(796)).toBe('e2e4');
  });

  it('stores castling as the king taking its rook', () => {
    const position = new Chess('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');
    const short = position.moves({ verbose: true }).find(m => m.san === 'O-O');
    const long = position.moves({ verbose: true }).find(m => m.san === 'O-O-O');
    if (!short || !long) throw new Error('castling moves missing');

    expect(describeBookMove(encodeBookMove(short))).toBe('e1h1');
    expect(describeBookMove(encodeBookMove(long))).toBe('e1a1');
  });

  it('keeps the promotion piece', () => {
    const position = new Chess('8/P6k/8/8/8/8/8/K7 w - - 0 1');
    const promotion = position.moves({ verbose: true }).find(m => m.lan === 'a7a8n');
    if (!promotion) throw new Error('promotion missing');

    expect(describeBookMove(encodeBookMove(promotion))).toBe('a7a8n');
  });
});

describe('book files', () => {
  it('writes 16-byte records sorted by key', () => {
    const data = buildOpeningBook(LINES);
    expect(data.byteLength).toBe(5 * BOOK_RECORD_SIZE);

    const entries = parseBook(data);
    for (let i = 1; i < entries.length; i++) {
      expect(entries[i - 1].key <= entries[i].key).toBe(true);
    }
  });

  it('rejects a truncated file', () => {
    expect(() => parseBook(new Uint8Array(10))).toThrow(OpeningBookError);
  });

  it('rejects records out of key order', () => {
    const data = serializeBook([
      { key: 1n, move: 796, weight: 1, learn: 0 },
      { key: 2n, move: 796, weight: 1, learn: 0 },
    ]);
    const swapped = new Uint8Array(data.byteLength);
    swapped.set(data.subarray(BOOK_RECORD_SIZE), 0);
    swapped.set(data.subarray(0, BOOK_RECORD_SIZE), BOOK_RECORD_SIZE);

    expect(() => parseBook(swapped)).toThrow('not sorted');
  });
});

// =============================================================================
// Builder
// =============================================================================

describe('compileOpeningLines', () => {
  it('keeps the highest weight for a shared position and move', () => {
    const entries = compileOpeningLines(LINES);
    const startKey = computeZobristHash(STARTING_FEN);
    const fromStart = entries.filter(e => e.key === startKey);

    expect(fromStart.map(e => [describeBookMove(e.move), e.weight])).toEqual([
      ['e2e4', 80],
      ['d2d4', 20],
    ]);
    expect(entries).toHaveLength(5);
  });

  it('rejects an illegal move', () => {
    expect(() => compileOpeningLines([{ name: 'Broken', moves: ['e4', 'e4'], weight: 10 }]))
      .toThrow('Illegal move "e4" in opening "Broken"');
  });

  it('compiles the shipped opening lines', () => {
    const lines = loadOpeningLines(new URL('../data/openings.json', import.meta.url).pathname);
    expect(lines.length).toBeGreaterThan(20);
    expect(() => compileOpeningLines(lines)).not.toThrow();
  });
});

// =============================================================================
// OpeningBook
// =============================================================================

describe('OpeningBook', () => {
  let dir: string;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chess-book-'));
    warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    rmSync(dir, { recursive: true, force: true });
  });

  it('lists book moves heaviest first', () => {
    const book = OpeningBook.fromData(buildOpeningBook(LINES));
    const moves = book.lookup(new Chess());

    expect(moves?.map(m => [m.move.san, m.weight])).toEqual([['e4', 80], ['d4', 20]]);
  });

  it('finds replies after a book move', () => {
    const book = OpeningBook.fromData(buildOpeningBook(LINES));
    const position = new Chess();
    position.move('e4');

    expect(book.lookup(position)?.map(m => m.move.san)).toEqual(['c5', 'e5']);
  });

  it('reports nothing for an unknown position', () => {
    const book = OpeningBook.fromData(buildOpeningBook(LINES));
    const position = new Chess();
    position.move('a3');

    expect(book.lookup(position)).toBeNull();
    expect(book.suggest(position, createSeededRandom(1))).toBeNull();
  });

  it('only suggests among the top candidates', () => {
    const book = OpeningBook.fromData(buildOpeningBook(LINES), { candidates: 1 });
    const random = createSeededRandom('top');

    for (let i = 0; i < 50; i++) {
      expect(book.suggest(new Chess(), random)?.san).toBe('e4');
    }
  });

  it('suggests moves in proportion to their weight', () => {
    const book = OpeningBook.fromData(buildOpeningBook(LINES));
    const random = createSeededRandom('weights');
    let kingPawn = 0;

    for (let i = 0; i < 1000; i++) {
      if (book.suggest(new Chess(), random)?.san === 'e4') kingPawn++;
    }

    // 80 of 100
    expect(kingPawn).toBeGreaterThan(720);
    expect(kingPawn).toBeLessThan(880);
  });

  it('round-trips through a file', () => {
    const input = join(dir, 'openings.json');
    const output = join(dir, 'openings.bin');
    writeFileSync(input, JSON.stringify({ openings: LINES }));

    expect(writeOpeningBook(input, output)).toBe(5);
    expect(readFileSync(output).byteLength).toBe(5 * BOOK_RECORD_SIZE);

    const book = OpeningBook.fromFile(output);
    expect(book.available).toBe(true);
    expect(book.size).toBe(5);
    expect(warn).not.toHaveBeenCalled();
  });

  it('disables itself and warns once when the file is missing', () => {
    const book = OpeningBook.fromFile(join(dir, 'missing.bin'));

    expect(book.available).toBe(false);
    expect(book.suggest(new Chess(), createSeededRandom(1))).toBeNull();
    expect(book.suggest(new Chess(), createSeededRandom(2))).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toContain('[Book] No opening book was found');
  });

  it('disables itself when the file is corrupt', () => {
    const path = join(dir, 'corrupt.bin');
    writeFileSync(path, Buffer.from('not a book'));

    const book = createOpeningBook(path);

    expect(book.available).toBe(false);
    expect(book.lookup(new Chess())).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('is disabled without a path', () => {
    const book = createOpeningBook();
    expect(book.available).toBe(false);
    expect(warn).not.toHaveBeenCalled();
  });

  it('rejects invalid opening files', () => {
    const input = join(dir, 'bad.json');
    writeFileSync(input, JSON.stringify({ openings: [{ name: 'Empty', moves: [] }] }));

    expect(() => loadOpeningLines(input)).toThrow(OpeningBookError);
  });
});
