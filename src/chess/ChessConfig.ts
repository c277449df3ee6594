/**
 * Engine configuration
 *
 * Validated once when the engine is built and frozen afterwards.
 */

import { z } from 'zod';
import { ConfigError } from './ChessErrors.js';

export const EngineConfigSchema = z.object({
  /** Side the engine plays */
  side: z.enum(['w', 'b']),
  /** Fixed search depth, or 'auto' to let the depth policy decide */
  depth: z.union([z.number().int().min(1), z.literal('auto')]).default('auto'),
  /** Ceiling for the depth policy */
  maxDepth: z.number().int().min(1).default(4),
  /** Worker threads for root moves; 0 searches on the calling thread */
  workers: z.number().int().min(0).default(0),
  /** Binary opening book file */
  bookPath: z.string().min(1).optional(),
  /** Top-weighted book moves eligible for selection */
  bookCandidates: z.number().int().min(1).default(3),
  /** Hard cap on quiescence plies (unbounded when unset) */
  maxQuiescenceDepth: z.number().int().min(1).optional(),
  /** Compare position snapshots around every root search */
  verifyBalance: z.boolean().default(false),
});

export type EngineConfig = Readonly<z.infer<typeof EngineConfigSchema>>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Validate and freeze an engine configuration
 * @throws ConfigError listing every invalid field
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return Object.freeze(parsed.data);
}

const EnvSchema = z.object({
  CHESS_DEPTH: z.union([z.literal('auto'), z.coerce.number().int()]).optional(),
  CHESS_MAX_DEPTH: z.coerce.number().int().optional(),
  CHESS_WORKERS: z.coerce.number().int().optional(),
  CHESS_BOOK: z.string().min(1).optional(),
  CHESS_BOOK_CANDIDATES: z.coerce.number().int().optional(),
  CHESS_QUIESCENCE_DEPTH: z.coerce.number().int().optional(),
  CHESS_VERIFY: z.enum(['0', '1', 'true', 'false']).optional(),
});

type Environment = Record<string, string | undefined>;

/** Unset fields must not hide a value from an earlier layer */
function definedOnly(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Build a configuration from CHESS_* environment variables.
 * Explicit overrides win over the environment.
 */
export function loadEngineConfigFromEnv(
  env: Environment = process.env,
  overrides: Partial<EngineConfigInput> = {}
): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const fromEnv: Partial<EngineConfigInput> = {
    depth: vars.CHESS_DEPTH,
    maxDepth: vars.CHESS_MAX_DEPTH,
    workers: vars.CHESS_WORKERS,
    bookPath: vars.CHESS_BOOK,
    bookCandidates: vars.CHESS_BOOK_CANDIDATES,
    maxQuiescenceDepth: vars.CHESS_QUIESCENCE_DEPTH,
    verifyBalance: vars.CHESS_VERIFY === undefined
      ? undefined
      : vars.CHESS_VERIFY === '1' || vars.CHESS_VERIFY === 'true',
  };

  return parseEngineConfig({ side: 'w', ...definedOnly(fromEnv), ...definedOnly(overrides) });
}
