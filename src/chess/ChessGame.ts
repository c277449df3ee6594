/**
 * ChessGame - Interactive game against the engine
 *
 * Alternates between a human, who types moves in SAN, and the engine until
 * the game ends or the human quits. Input and output go through `GameIO` so
 * the loop runs the same in a terminal and in tests.
 */

import type { Chess, Move } from 'chess.js';
import type { ChessAI } from './ChessAI.js';
import { ChessRules, createPosition } from './ChessRules.js';
import type { Color, EngineDecision } from './types.js';

export const INVALID_MOVE_MESSAGE =
  'Given input is not standard algebraic notation of a legal move in this position';

const QUIT_COMMANDS = new Set(['quit', 'exit', 'resign']);

export interface GameIO {
  prompt(question: string): Promise<string>;
  print(line: string): void;
  /** Called with true before the engine starts thinking and false once it is done */
  thinking?(active: boolean): void;
}

export type GameResult = 'checkmate' | 'draw' | 'quit';

export interface GameOutcome {
  result: GameResult;
  /** Side that delivered mate; null for draws and abandoned games */
  winner: Color | null;
  /** Moves played, in SAN */
  moves: string[];
  fen: string;
}

export interface ChessGameOptions {
  engine: ChessAI<Chess, Move>;
  playerSide: Color;
  io: GameIO;
  /** Starting position (defaults to the standard start) */
  fen?: string;
}

export function colorName(color: Color): string {
  return color === 'w' ? 'White' : 'Black';
}

/**
 * Ask until the player answers w or b
 */
export async function chooseSide(io: GameIO): Promise<Color> {
  for (;;) {
    const answer = (await io.prompt('Play as white or black (w/b)')).trim().toLowerCase();
    if (answer === 'w' || answer === 'b') {
      return answer;
    }
  }
}

export class ChessGame {
  private readonly rules = new ChessRules();
  private readonly engine: ChessAI<Chess, Move>;
  private readonly playerSide: Color;
  private readonly io: GameIO;
  private readonly position: Chess;
  private readonly history: string[] = [];

  constructor(options: ChessGameOptions) {
    this.engine = options.engine;
    this.playerSide = options.playerSide;
    this.io = options.io;
    this.position = createPosition(options.fen);

    if (this.engine.side === this.playerSide) {
      throw new RangeError(`Engine and player cannot both play ${colorName(this.playerSide)}`);
    }
  }

  get fen(): string {
    return this.position.fen();
  }

  /**
   * Play until checkmate, a draw, or the player quits
   */
  async play(): Promise<GameOutcome> {
    for (;;) {
      const status = this.rules.isTerminal(this.position);
      if (status.ended) {
        return this.finish(status.isCheckmate ? 'checkmate' : 'draw');
      }

      if (this.rules.sideToMove(this.position) === this.playerSide) {
        const quit = await this.playerMove();
        if (quit) {
          return this.finish('quit');
        }
      } else {
        await this.engineMove();
      }
    }
  }

  /**
   * @returns true when the player asked to stop
   */
  private async playerMove(): Promise<boolean> {
    for (;;) {
      const input = (await this.io.prompt(`${colorName(this.playerSide)} plays`)).trim();
      if (QUIT_COMMANDS.has(input.toLowerCase())) {
        return true;
      }

      const move = this.rules.fromNotation(this.position, input);
      if (!move) {
        this.io.print(INVALID_MOVE_MESSAGE);
        continue;
      }

      this.rules.apply(this.position, move);
      this.history.push(move.san);
      return false;
    }
  }

  private async engineMove(): Promise<void> {
    this.io.thinking?.(true);
    let decision: EngineDecision<Move>;
    try {
      decision = await this.engine.analyze(this.position);
    } finally {
      this.io.thinking?.(false);
    }

    this.rules.apply(this.position, decision.move);
    this.history.push(decision.move.san);

    const note = decision.source === 'book' ? ' (book)' : '';
    this.io.print(this.position.ascii());
    this.io.print(`${colorName(this.engine.side)} plays: ${decision.move.san}${note}`);
  }

  private finish(result: GameResult): GameOutcome {
    let winner: Color | null = null;

    if (result === 'checkmate') {
      // The side to move is the one that got mated
      winner = this.rules.sideToMove(this.position) === 'w' ? 'b' : 'w';
      this.io.print(`Checkmate. ${colorName(winner)} wins.`);
    } else if (result === 'draw') {
      this.io.print('Draw.');
    }

    return { result, winner, moves: [...this.history], fen: this.position.fen() };
  }
}
