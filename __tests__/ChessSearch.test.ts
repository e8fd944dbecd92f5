/**
 * Search, evaluation and move-generation counts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Chess } from 'chess.js';
import { ChessEvaluator, quickEvaluate } from '../src/chess/ChessEvaluator.js';
import { encodeFen } from '../src/chess/ChessFen.js';
import { squareName } from '../src/chess/ChessNotation.js';
import { ChessSearch, divide, perft } from '../src/chess/ChessSearch.js';
import { playMove, evaluateOutcome } from '../src/chess/ChessRules.js';
import { MATE_SCORE } from '../src/chess/types.js';
import { fromFen, sq } from './fixtures.js';

const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';
const MATE_IN_ONE = '8:7k/8/6K1/8/8/8/8/1Q6 w - - 0 1';

/**
 * Reference leaf count from chess.js
 */
function referencePerft(chess: Chess, depth: number): number {
  if (depth === 0) return 1;
  const moves = chess.moves();
  if (depth === 1) return moves.length;
  let nodes = 0;
  for (const move of moves) {
    chess.move(move);
    nodes += referencePerft(chess, depth - 1);
    chess.undo();
  }
  return nodes;
}

// =============================================================================
// Perft
// =============================================================================

describe('Perft', () => {
  it('matches chess.js from the standard start', () => {
    const position = fromFen(START_FEN);
    const chess = new Chess(START_FEN);
    expect(perft(position, 1)).toBe(20);
    expect(perft(position, 2)).toBe(400);
    for (let depth = 1; depth <= 3; depth++) {
      expect(perft(position, depth)).toBe(referencePerft(chess, depth));
    }
  });

  it('matches chess.js with castling available', () => {
    const fen = 'r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1';
    const position = fromFen(fen);
    const chess = new Chess(fen);
    for (let depth = 1; depth <= 2; depth++) {
      expect(perft(position, depth)).toBe(referencePerft(chess, depth));
    }
  });

  it('lists the same root moves as chess.js', () => {
    const position = fromFen(START_FEN);
    const ours = [...divide(position, 1).keys()].sort();
    const theirs = new Chess(START_FEN)
      .moves({ verbose: true })
      .map(m => `${m.from}${m.to}`)
      .sort();
    expect(ours).toEqual(theirs);
  });

  it('does not modify the position', () => {
    const position = fromFen(START_FEN);
    const before = encodeFen(position);
    perft(position, 2);
    expect(encodeFen(position)).toBe(before);
  });
});

// =============================================================================
// Search
// =============================================================================

describe('ChessSearch', () => {
  let search: ChessSearch;

  beforeEach(() => {
    search = new ChessSearch(new ChessEvaluator(), { maxDepth: 1, random: () => 0 });
  });

  it('finds mate in one at depth 1', () => {
    const position = fromFen(MATE_IN_ONE);
    const result = search.search(position);

    expect(result.score).toBe(MATE_SCORE);
    expect(result.bestMove).toEqual({ from: sq('b1'), to: sq('b8') });
    expect(result.tiedMoves).toEqual([{ from: sq('b1'), to: sq('b8') }]);

    const best = result.bestMove;
    if (!best) return;
    playMove(position, best.from, best.to);
    expect(evaluateOutcome(position)).toBe('white_wins');
  });

  it('scores a deeper mate one point higher', () => {
    const result = search.search(fromFen(MATE_IN_ONE), 2);
    expect(result.depth).toBe(2);
    expect(result.score).toBe(MATE_SCORE + 1);
    expect(result.bestMove).toEqual({ from: sq('b1'), to: sq('b8') });
  });

  it('leaves the searched position untouched', () => {
    const position = fromFen(MATE_IN_ONE);
    const before = encodeFen(position);
    search.search(position, 2);
    expect(encodeFen(position)).toBe(before);
  });

  it('takes a hanging queen', () => {
    const result = search.search(fromFen('8:4k3/8/8/3q4/8/8/8/3RK3 w - - 0 1'));
    expect(result.bestMove).toEqual({ from: sq('d1'), to: sq('d5') });
    expect(result.score).toBeGreaterThan(0);
  });

  it('returns no move when mated or stalemated', () => {
    const mated = search.search(fromFen('8:7k/6Q1/6K1/8/8/8/8/8 b - - 0 1'));
    expect(mated.bestMove).toBeNull();
    expect(mated.score).toBe(-MATE_SCORE);

    const stalemated = search.search(fromFen('8:7k/5Q2/6K1/8/8/8/8/8 b - - 0 1'));
    expect(stalemated.bestMove).toBeNull();
    expect(stalemated.score).toBe(0);
  });

  it('picks among equal moves with the random source', () => {
    const position = fromFen('3:k2/3/2K w - - 0 1');
    const materialOnly = new ChessEvaluator({ usePositional: false });

    const first = new ChessSearch(materialOnly, { maxDepth: 1, random: () => 0 }).search(position);
    const last = new ChessSearch(materialOnly, { maxDepth: 1, random: () => 0.99 }).search(position);

    expect(first.tiedMoves).toHaveLength(2);
    expect(first.bestMove && squareName(first.bestMove.to)).toBe('c2');
    expect(last.bestMove && squareName(last.bestMove.to)).toBe('b1');
  });

  it('counts nodes in its stats', () => {
    const result = search.search(fromFen(START_FEN), 2);
    expect(result.nodes).toBeGreaterThan(20);
    expect(search.getStats().nodes).toBe(result.nodes);
  });
});

// =============================================================================
// Evaluation
// =============================================================================

describe('ChessEvaluator', () => {
  it('balances material in the start position', () => {
    const evaluator = new ChessEvaluator();
    expect(evaluator.getEvaluationBreakdown(fromFen(START_FEN)).material).toBe(0);
  });

  it('counts an extra queen', () => {
    const evaluator = new ChessEvaluator({ usePositional: false });
    const position = fromFen('8:4k3/8/8/8/8/8/8/3QK3 w - - 0 1');
    expect(evaluator.evaluate(position)).toBe(900);
    expect(evaluator.evaluateFor(position, 'b')).toBe(-900);
  });

  it('accepts custom piece values', () => {
    const evaluator = new ChessEvaluator({ usePositional: false, pieceValues: { q: 1000 } });
    expect(evaluator.evaluate(fromFen('8:4k3/8/8/8/8/8/8/3QK3 w - - 0 1'))).toBe(1000);
  });

  it('rewards advanced pawns', () => {
    const home = fromFen('8:4k3/8/8/8/8/8/4P3/4K3 w - - 0 1');
    const advanced = fromFen('8:4k3/8/4P3/8/8/8/8/4K3 w - - 0 1');
    expect(quickEvaluate(advanced) - quickEvaluate(home)).toBe(20);
  });
});
