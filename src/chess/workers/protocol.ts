/**
 * Messages exchanged between the root search and its worker threads
 */

import { z } from 'zod';

export const SearchRequestSchema = z.object({
  type: z.literal('SEARCH'),
  id: z.number().int(),
  /** Position the game history starts from */
  fen: z.string().min(1),
  /** Moves from `fen` to the root position, in long algebraic notation */
  history: z.array(z.string().min(4)),
  /** Candidate root move in long algebraic notation */
  move: z.string().min(4),
  depth: z.number().int().min(0),
  maxQuiescenceDepth: z.number().int().min(1).optional(),
});

export const SearchStatsSchema = z.object({
  nodes: z.number().int().min(0),
  qNodes: z.number().int().min(0),
  betaCutoffs: z.number().int().min(0),
  seldepth: z.number().int().min(0),
});

export const SearchResponseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('RESULT'),
    id: z.number().int(),
    /** Score of the candidate, relative to the side to move at the root */
    score: z.number(),
    stats: SearchStatsSchema,
  }),
  z.object({
    type: z.literal('ERROR'),
    id: z.number().int(),
    error: z.string(),
  }),
]);

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;

/** A request before the pool assigns it an id */
export type SearchTask = Omit<SearchRequest, 'type' | 'id'>;
