/**
 * Opening book builder
 *
 * Compiles named opening lines (SAN from the starting position) into the
 * binary book read by ChessOpenings. Every position along a line gets an
 * entry for the move played from it; when several lines share a position
 * and move, the highest weight wins.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { OpeningBookError } from './ChessErrors.js';
import { encodeBookMove, serializeBook, type BookEntry } from './ChessOpenings.js';
import { ChessRules, createPosition } from './ChessRules.js';
import { computeZobristHash } from './ChessZobrist.js';
import type { OpeningLine } from './types.js';

const MAX_WEIGHT = 0xffff;

export const OpeningLineSchema = z.object({
  name: z.string().min(1),
  moves: z.array(z.string().min(1)).min(1),
  weight: z.number().int().positive().default(100),
});

export const OpeningFileSchema = z.object({
  openings: z.array(OpeningLineSchema),
});

/**
 * Turn opening lines into book records
 * @throws OpeningBookError when a line contains an illegal move
 */
export function compileOpeningLines(lines: readonly OpeningLine[]): BookEntry[] {
  const rules = new ChessRules();
  const merged = new Map<string, BookEntry>();

  for (const line of lines) {
    const position = createPosition();
    const weight = Math.min(MAX_WEIGHT, Math.max(1, Math.round(line.weight)));

    for (const san of line.moves) {
      const move = rules.fromNotation(position, san);
      if (!move) {
        throw new OpeningBookError(`Illegal move "${san}" in opening "${line.name}"`);
      }

      const key = computeZobristHash(position.fen());
      const encoded = encodeBookMove(move);
      const id = `${key}:${encoded}`;
      const existing = merged.get(id);

      if (existing) {
        existing.weight = Math.max(existing.weight, weight);
      } else {
        merged.set(id, { key, move: encoded, weight, learn: 0 });
      }

      rules.apply(position, move);
    }
  }

  return [...merged.values()];
}

/**
 * Build the binary book for a set of opening lines
 */
export function buildOpeningBook(lines: readonly OpeningLine[]): Uint8Array {
  return serializeBook(compileOpeningLines(lines));
}

/**
 * Read and validate an openings JSON file
 */
export function loadOpeningLines(path: string): OpeningLine[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const parsed = OpeningFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new OpeningBookError(`Invalid openings file ${path}: ${issues.join('; ')}`);
  }
  return parsed.data.openings;
}

/**
 * Compile an openings JSON file into a binary book file
 * @returns Number of records written
 */
export function writeOpeningBook(inputPath: string, outputPath: string): number {
  const entries = compileOpeningLines(loadOpeningLines(inputPath));
  writeFileSync(outputPath, serializeBook(entries));
  return entries.length;
}
