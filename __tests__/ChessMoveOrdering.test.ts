import { describe, it, expect } from 'vitest';
import { Chess } from 'chess.js';
import { orderMoves } from '../src/chess/ChessMoveOrdering.js';
import { ChessRules } from '../src/chess/ChessRules.js';

describe('orderMoves', () => {
  it('puts captures first and keeps generation order within each group', () => {
    const isEven = (n: number) => n % 2 === 0;
    expect(orderMoves([1, 2, 3, 4, 6, 5], isEven)).toEqual([2, 4, 6, 1, 3, 5]);
  });

  it('does not modify its input', () => {
    const moves = [1, 2, 3];
    orderMoves(moves, n => n === 3);
    expect(moves).toEqual([1, 2, 3]);
  });

  it('orders chess captures ahead of quiet moves', () => {
    const rules = new ChessRules();
    const position = new Chess('r3k2r/p1ppqpb1/bn2pnp1/3PN3/1p2P3/2N2Q1p/PPPBBPPP/R3K2R w KQkq - 0 1');
    const moves = rules.legalMoves(position);
    const ordered = orderMoves(moves, m => rules.isCapture(m));

    const firstQuiet = ordered.findIndex(m => !rules.isCapture(m));
    const captures = moves.filter(m => rules.isCapture(m));

    expect(firstQuiet).toBe(captures.length);
    expect(ordered.slice(0, firstQuiet)).toEqual(captures);
    expect(ordered).toHaveLength(moves.length);
  });
});
