/**
 * Root Orchestrator Tests
 */

import { describe, it, expect } from 'vitest';
import { Chess } from 'chess.js';
import { ChessAI, createChessAI } from '../src/chess/ChessAI.js';
import { buildOpeningBook } from '../src/chess/ChessBookBuilder.js';
import { parseEngineConfig } from '../src/chess/ChessConfig.js';
import {
  NoLegalMovesError,
  SearchInvariantError,
  WrongSideToMoveError,
} from '../src/chess/ChessErrors.js';
import { OpeningBook } from '../src/chess/ChessOpenings.js';
import { createSeededRandom } from '../src/chess/ChessRandom.js';
import { MATE_SCORE, type RootSearchExecutor } from '../src/chess/types.js';
import { TreePosition, TreeRules, branch, leaf, treeEvaluator, type TreeEdge } from './helpers/treeGame.js';

const QUEEN_HANGS = '4k3/8/8/3q4/4P3/8/8/4K3 w - - 0 1';
const MATE_IN_ONE = '6k1/5ppp/8/8/8/8/8/R5K1 w - - 0 1';
const FOOLS_MATE = 'rnb1kbnr/pppp1ppp/8/4p3/6Pq/5P2/PPPPP2P/RNBQKBNR w KQkq - 1 3';
const STALEMATE = '7k/5Q2/6K1/8/8/8/8/8 b - - 0 1';

/** Root moves a and b score 5, c scores 1 */
function tiedTree() {
  return branch([
    branch([leaf(5)]),
    branch([leaf(5)]),
    branch([leaf(1)]),
  ]);
}

function treeEngine(rules: TreeRules, seed: string, executor?: RootSearchExecutor<TreePosition, TreeEdge>) {
  return new ChessAI({
    rules,
    evaluator: treeEvaluator,
    config: parseEngineConfig({ side: 'w', depth: 1, verifyBalance: true }),
    random: createSeededRandom(seed),
    executor,
  });
}

// =============================================================================
// Chess Positions
// =============================================================================

describe('ChessAI on chess positions', () => {
  it('finds mate in one at depth 1', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }));
    const decision = await ai.analyze(new Chess(MATE_IN_ONE));

    expect(decision.source).toBe('search');
    expect(decision.depth).toBe(1);
    expect(decision.score).toBe(MATE_SCORE);
    expect(decision.best.map(m => m.san)).toEqual(['Ra8#']);
    expect(decision.move.san).toBe('Ra8#');
  });

  it('keeps only the move that wins material in the best set', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }));
    const decision = await ai.analyze(new Chess(QUEEN_HANGS));

    expect(decision.best.map(m => m.san)).toEqual(['exd5']);
    expect(decision.score).toBe(115);
    expect(decision.candidates[0].move.san).toBe('exd5');
    expect(decision.candidates.length).toBe(new Chess(QUEEN_HANGS).moves().length);
  });

  it('returns the move from nextMove', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }));
    const move = await ai.nextMove(new Chess(MATE_IN_ONE));
    expect(move.lan).toBe('a1a8');
  });

  it('raises a usage error when checkmated', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }));
    const error = await ai.nextMove(new Chess(FOOLS_MATE)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NoLegalMovesError);
    expect(error).toMatchObject({ code: 'NO_LEGAL_MOVES' });
  });

  it('raises a usage error when stalemated', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'b', depth: 1 }));
    await expect(ai.nextMove(new Chess(STALEMATE))).rejects.toBeInstanceOf(NoLegalMovesError);
  });

  it('refuses to move for the other side', async () => {
    const ai = createChessAI(parseEngineConfig({ side: 'b', depth: 1 }));
    await expect(ai.nextMove(new Chess())).rejects.toBeInstanceOf(WrongSideToMoveError);
  });

  it('leaves the position unmodified', async () => {
    const position = new Chess();
    position.move('e4');
    position.move('e5');
    const fen = position.fen();
    const history = position.history();

    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 2, verifyBalance: true }));
    await ai.analyze(position);

    expect(position.fen()).toBe(fen);
    expect(position.history()).toEqual(history);
  });

  it('plays from the book before searching', async () => {
    const book = OpeningBook.fromData(
      buildOpeningBook([{ name: 'King pawn', moves: ['e4', 'e5'], weight: 100 }])
    );
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }), { book });

    const decision = await ai.analyze(new Chess());

    expect(decision).toMatchObject({ source: 'book', depth: 0, score: 0, candidates: [] });
    expect(decision.move.san).toBe('e4');
  });

  it('searches once the position leaves the book', async () => {
    const book = OpeningBook.fromData(
      buildOpeningBook([{ name: 'King pawn', moves: ['e4', 'e5'], weight: 100 }])
    );
    const ai = createChessAI(parseEngineConfig({ side: 'w', depth: 1 }), { book });

    const decision = await ai.analyze(new Chess(MATE_IN_ONE));
    expect(decision.source).toBe('search');
  });
});

// =============================================================================
// Tie-breaking and Invariants
// =============================================================================

describe('ChessAI root selection', () => {
  it('collects every move sharing the best score', async () => {
    const rules = new TreeRules();
    const decision = await treeEngine(rules, 'ties').analyze(new TreePosition(tiedTree()));

    expect(decision.best.map(m => m.name)).toEqual(['a', 'b']);
    expect(decision.candidates.map(c => [c.move.name, c.score])).toEqual([['a', 5], ['b', 5], ['c', 1]]);
    expect(decision.score).toBe(5);
  });

  it('picks evenly between tied moves', async () => {
    const rules = new TreeRules();
    const ai = treeEngine(rules, 'even-split');
    const position = new TreePosition(tiedTree());
    const counts: Record<string, number> = { a: 0, b: 0, c: 0 };

    for (let i = 0; i < 2000; i++) {
      const move = await ai.nextMove(position);
      counts[move.name]++;
    }

    expect(counts.c).toBe(0);
    expect(counts.a).toBeGreaterThanOrEqual(850);
    expect(counts.a).toBeLessThanOrEqual(1150);
    expect(counts.b).toBeGreaterThanOrEqual(850);
    expect(counts.b).toBeLessThanOrEqual(1150);
    expect(position.path).toHaveLength(0);
    expect(rules.undone).toBe(rules.applied);
  });

  it('uses the depth policy when depth is auto', async () => {
    const rules = new TreeRules();
    const ai = new ChessAI({
      rules,
      evaluator: treeEvaluator,
      config: parseEngineConfig({ side: 'w' }),
      depthPolicy: () => 1,
    });

    const decision = await ai.analyze(new TreePosition(tiedTree()));
    expect(decision.depth).toBe(1);
  });

  it('detects an executor that leaves the position changed', async () => {
    const rules = new TreeRules();
    const leaky: RootSearchExecutor<TreePosition, TreeEdge> = {
      scoreCandidates: async ({ position, moves }) => {
        rules.apply(position, moves[0]);
        return {
          candidates: moves.map(move => ({ move, score: 0 })),
          stats: { nodes: 0, qNodes: 0, betaCutoffs: 0, seldepth: 0 },
        };
      },
    };

    await expect(treeEngine(rules, 'leak', leaky).analyze(new TreePosition(tiedTree())))
      .rejects.toBeInstanceOf(SearchInvariantError);
  });

  it('requires a score for every root move', async () => {
    const rules = new TreeRules();
    const partial: RootSearchExecutor<TreePosition, TreeEdge> = {
      scoreCandidates: async ({ moves }) => ({
        candidates: [{ move: moves[0], score: 0 }],
        stats: { nodes: 0, qNodes: 0, betaCutoffs: 0, seldepth: 0 },
      }),
    };

    await expect(treeEngine(rules, 'partial', partial).analyze(new TreePosition(tiedTree())))
      .rejects.toThrow('Expected 3 scored root moves, got 1');
  });
});
