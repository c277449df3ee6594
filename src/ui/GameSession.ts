/**
 * GameSession - State behind the terminal game screen
 *
 * Implements `GameIO` for the game loop and exposes a subscribable snapshot
 * for the ink component that draws it. Printed text only ever grows, so the
 * screen can hand it to `<Static>`.
 */

import type { GameIO } from '../chess/ChessGame.js';

export interface GameScreenState {
  /** Transcript, one entry per terminal line */
  lines: readonly string[];
  /** Question waiting for an answer, if any */
  prompt: string | null;
  thinking: boolean;
}

type Listener = (state: GameScreenState) => void;

export class GameSession implements GameIO {
  private state: GameScreenState = { lines: [], prompt: null, thinking: false };
  private readonly listeners = new Set<Listener>();
  private answer: ((value: string) => void) | null = null;

  getState(): GameScreenState {
    return this.state;
  }

  /**
   * @returns A function that removes the listener
   */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  prompt(question: string): Promise<string> {
    if (this.answer) {
      return Promise.reject(new Error(`Still waiting for an answer to "${this.state.prompt}"`));
    }

    return new Promise<string>(resolve => {
      this.answer = resolve;
      this.update({ prompt: question });
    });
  }

  print(line: string): void {
    this.update({ lines: [...this.state.lines, ...line.split('\n')] });
  }

  thinking(active: boolean): void {
    this.update({ thinking: active });
  }

  /**
   * Answer the open prompt; the exchange is kept in the transcript
   * @returns false when nothing was asked
   */
  submit(value: string): boolean {
    const resolve = this.answer;
    if (!resolve || this.state.prompt === null) return false;

    this.answer = null;
    this.update({
      lines: [...this.state.lines, `${this.state.prompt}: ${value}`],
      prompt: null,
    });
    resolve(value);
    return true;
  }

  private update(changes: Partial<GameScreenState>): void {
    this.state = { ...this.state, ...changes };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
