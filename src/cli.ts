#!/usr/bin/env node
/**
 * Chess engine CLI
 *
 * Usage: chess-search [command] [options]
 *
 * Commands:
 *   play         - Play a game against the engine
 *   move         - Print the engine's move for a position
 *   build-book   - Compile opening lines into a binary book
 */

import chalk from 'chalk';
import meow from 'meow';
import {
  ChessEngineError,
  ChessGame,
  STARTING_FEN,
  chooseSide,
  colorName,
  createChessAI,
  createChessEvaluator,
  createPosition,
  createSeededRandom,
  describeEvaluation,
  formatScore,
  isValidFen,
  loadEngineConfigFromEnv,
  writeOpeningBook,
  type Color,
  type EngineConfigInput,
  type RandomSource,
} from './chess/index.js';
import { GameSession } from './ui/GameSession.js';
import { renderGameScreen } from './ui/GameScreen.js';

const DEFAULT_BOOK_PATH = 'openings.bin';
const DEFAULT_OPENINGS_PATH = 'data/openings.json';
const CANDIDATES_SHOWN = 5;

const cli = meow(`
  Usage
    $ chess-search [command] [options]

  Commands
    play          Play against the engine (default)
    move          Print the engine's move for --fen
    build-book    Compile --input opening lines into the --output book
    help          Show this help

  Options
    --side, -s      Side you play in a game (w/b)
    --fen, -f       Starting position
    --depth, -d     Fixed search depth (default: chosen per position)
    --workers, -w   Worker threads for the root search
    --book, -b      Opening book file (default: ${DEFAULT_BOOK_PATH})
    --seed          Seed for book and tie-break choices
    --input, -i     Openings JSON for build-book (default: ${DEFAULT_OPENINGS_PATH})
    --output, -o    Book file written by build-book (default: ${DEFAULT_BOOK_PATH})

  Environment
    CHESS_DEPTH, CHESS_MAX_DEPTH, CHESS_WORKERS, CHESS_BOOK,
    CHESS_BOOK_CANDIDATES, CHESS_QUIESCENCE_DEPTH, CHESS_VERIFY

  Examples
    $ chess-search play --side b
    $ chess-search move --fen "6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1"
    $ chess-search build-book --input data/openings.json --output openings.bin
`, {
  importMeta: import.meta,
  flags: {
    side: {
      type: 'string',
      shortFlag: 's',
    } as const,
    fen: {
      type: 'string',
      shortFlag: 'f',
    } as const,
    depth: {
      type: 'number',
      shortFlag: 'd',
    } as const,
    workers: {
      type: 'number',
      shortFlag: 'w',
    } as const,
    book: {
      type: 'string',
      shortFlag: 'b',
    } as const,
    seed: {
      type: 'string',
    } as const,
    input: {
      type: 'string',
      shortFlag: 'i',
      default: DEFAULT_OPENINGS_PATH,
    } as const,
    output: {
      type: 'string',
      shortFlag: 'o',
      default: DEFAULT_BOOK_PATH,
    } as const,
  },
});

function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

function parseSide(value: string | undefined): Color | undefined {
  if (value === undefined) return undefined;
  const side = value.trim().toLowerCase();
  if (side === 'w' || side === 'white') return 'w';
  if (side === 'b' || side === 'black') return 'b';
  throw new RangeError(`--side must be w or b, got "${value}"`);
}

function readFen(): string {
  const fen = cli.flags.fen ?? STARTING_FEN;
  if (!isValidFen(fen)) {
    throw new RangeError(`Invalid FEN: ${fen}`);
  }
  return fen;
}

function engineOverrides(side: Color): EngineConfigInput {
  return {
    side,
    depth: cli.flags.depth,
    workers: cli.flags.workers,
    bookPath: cli.flags.book ?? process.env.CHESS_BOOK ?? DEFAULT_BOOK_PATH,
  };
}

function randomSource(): RandomSource | undefined {
  return cli.flags.seed === undefined ? undefined : createSeededRandom(cli.flags.seed);
}

async function playCommand(): Promise<void> {
  const session = new GameSession();
  const screen = renderGameScreen(session);

  try {
    const playerSide = parseSide(cli.flags.side) ?? await chooseSide(session);
    const config = loadEngineConfigFromEnv(process.env, engineOverrides(opposite(playerSide)));
    const engine = createChessAI(config, { random: randomSource() });

    session.print(chalk.bold(`You play ${colorName(playerSide)}. Type a move in SAN, or "quit".`));

    try {
      const game = new ChessGame({ engine, playerSide, io: session, fen: cli.flags.fen });
      const outcome = await game.play();
      if (outcome.result === 'quit') {
        session.print(chalk.yellow(`Game abandoned after ${outcome.moves.length} moves.`));
      }
    } finally {
      await engine.close();
    }
  } finally {
    screen.unmount();
  }
  await screen.waitUntilExit();
}

async function moveCommand(): Promise<void> {
  const position = createPosition(readFen());
  const config = loadEngineConfigFromEnv(process.env, engineOverrides(position.turn()));
  const engine = createChessAI(config, { random: randomSource() });

  try {
    const decision = await engine.analyze(position);
    console.log(chalk.green.bold(decision.move.san));

    if (decision.source === 'book') {
      console.log(chalk.gray('  from the opening book'));
      return;
    }

    console.log(chalk.gray(`  depth ${decision.depth}, score ${formatScore(decision.score)}`));
    console.log(chalk.gray(`  ${describeEvaluation(createChessEvaluator(), position)}`));
    for (const candidate of decision.candidates.slice(0, CANDIDATES_SHOWN)) {
      const mark = decision.best.includes(candidate.move) ? '*' : ' ';
      console.log(chalk.gray(`  ${mark} ${candidate.move.san.padEnd(8)} ${formatScore(candidate.score)}`));
    }
    if (decision.stats) {
      console.log(chalk.gray(`  nodes ${decision.stats.nodes}, quiescence ${decision.stats.qNodes}`));
    }
  } finally {
    await engine.close();
  }
}

function buildBookCommand(): void {
  const { input, output } = cli.flags;
  const records = writeOpeningBook(input, output);
  console.log(chalk.green(`Wrote ${records} book records to ${output}`));
}

async function main(): Promise<void> {
  const [command = 'play'] = cli.input;

  switch (command) {
    case 'play':
      await playCommand();
      break;
    case 'move':
      await moveCommand();
      break;
    case 'build-book':
      buildBookCommand();
      break;
    case 'help':
      cli.showHelp(0);
      break;
    default:
      console.error(chalk.red(`Unknown command: ${command}`));
      cli.showHelp(2);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ChessEngineError) {
    console.error(chalk.red(`[Chess] ${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red('[Chess] Error:'), error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
