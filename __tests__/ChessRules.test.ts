/**
 * Legality, special moves and terminal detection
 */

import { describe, it, expect } from 'vitest';
import { encodeFen } from '../src/chess/ChessFen.js';
import { Position } from '../src/chess/ChessPosition.js';
import {
  evaluateOutcome,
  isKingInCheck,
  isMoveSafe,
  legalMovesFrom,
  playMove,
} from '../src/chess/ChessRules.js';
import { fromFen, names, place, sq } from './fixtures.js';

const START_FEN = '8:rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

describe('Check', () => {
  it('detects a rook on an open file', () => {
    const position = fromFen('8:4k3/8/8/8/8/8/8/4RK2 w - - 0 1');
    expect(isKingInCheck(position, 'b')).toBe(true);
    expect(isKingInCheck(position, 'w')).toBe(false);
  });

  it('is never reported for a missing king', () => {
    const position = new Position(5);
    place(position, 'a1', 'q', 'w');
    expect(isKingInCheck(position, 'b')).toBe(false);
  });

  it('leaves a pinned piece without moves', () => {
    const position = fromFen('8:4k3/4r3/8/8/8/8/4B3/4K3 w - - 0 1');
    expect(legalMovesFrom(position, sq('e2'))).toEqual([]);
  });

  it('only offers pieces of the requested color', () => {
    const position = fromFen(START_FEN);
    expect(legalMovesFrom(position, sq('e7'), 'w')).toEqual([]);
    expect(names(legalMovesFrom(position, sq('e7'), 'b'))).toEqual(['e5', 'e6']);
  });
});

describe('isMoveSafe', () => {
  it('restores the board after testing a move', () => {
    const position = fromFen('8:4k3/4r3/8/8/8/8/4B3/4K3 w - - 0 1');
    const before = encodeFen(position);

    expect(isMoveSafe(position, sq('e2'), sq('d3'))).toBe(false);
    expect(isMoveSafe(position, sq('e1'), sq('d1'))).toBe(true);
    expect(encodeFen(position)).toBe(before);
    expect(position.get(sq('e2'))?.type).toBe('b');
    expect(position.get(sq('d3'))).toBeNull();
  });
});

// =============================================================================
// Castling
// =============================================================================

describe('Castling', () => {
  it('may not pass through an attacked square', () => {
    const position = fromFen('8:4k3/5r2/8/8/8/8/8/R3K2R w KQ - 0 1');
    expect(names(legalMovesFrom(position, sq('e1')))).toEqual(['c1', 'd1', 'd2', 'e2']);
  });

  it('is not allowed out of check', () => {
    const position = fromFen('8:4k3/4r3/8/8/8/8/8/R3K2R w KQ - 0 1');
    expect(names(legalMovesFrom(position, sq('e1')))).toEqual(['d1', 'd2', 'f1', 'f2']);
  });

  it('moves the rook onto the square the king crossed', () => {
    const position = fromFen('8:4k3/8/8/8/8/8/8/R3K2R w KQ - 0 1');
    const applied = playMove(position, sq('e1'), sq('c1'));

    expect(applied.castle).toBe('queen');
    expect(position.get(sq('c1'))?.type).toBe('k');
    expect(position.get(sq('d1'))).toEqual({ type: 'r', color: 'w', hasMoved: true });
    expect(position.get(sq('a1'))).toBeNull();
    expect(encodeFen(position)).toBe('8:4k3/8/8/8/8/8/8/2KR3R b - - 0 1');
  });

  it('works with distant rooks on wide boards', () => {
    const position = new Position(12);
    place(position, 'f1', 'k', 'w');
    place(position, 'l1', 'r', 'w');
    place(position, 'f12', 'k', 'b');

    const applied = playMove(position, sq('f1', 12), sq('h1', 12));
    expect(applied.castle).toBe('king');
    expect(position.get(sq('g1', 12))?.type).toBe('r');
    expect(position.get(sq('l1', 12))).toBeNull();
  });
});

// =============================================================================
// En Passant
// =============================================================================

describe('En passant', () => {
  function setup(): Position {
    const position = new Position(8);
    place(position, 'e1', 'k', 'w');
    place(position, 'e8', 'k', 'b');
    place(position, 'e2', 'p', 'w');
    place(position, 'd4', 'p', 'b', true);
    return position;
  }

  it('is available right after a double step', () => {
    const position = setup();
    playMove(position, sq('e2'), sq('e4'));

    expect(position.enPassant).toEqual(sq('e3'));
    expect(names(legalMovesFrom(position, sq('d4')))).toEqual(['d3', 'e3']);

    const applied = playMove(position, sq('d4'), sq('e3'));
    expect(applied.enPassant).toBe(true);
    expect(applied.captured?.type).toBe('p');
    expect(position.get(sq('e4'))).toBeNull();
    expect(position.get(sq('e3'))?.color).toBe('b');
  });

  it('expires after one half-move', () => {
    const position = setup();
    playMove(position, sq('e2'), sq('e4'));
    playMove(position, sq('e8'), sq('d8'));
    playMove(position, sq('e1'), sq('f1'));

    expect(position.enPassant).toBeNull();
    expect(names(legalMovesFrom(position, sq('d4')))).toEqual(['d3']);
  });

  it('targets the square just behind a three-step pawn', () => {
    const position = new Position(10);
    position.pawnFirstMoveDistance = 3;
    place(position, 'a1', 'k', 'w');
    place(position, 'j10', 'k', 'b');
    place(position, 'e2', 'p', 'w');
    place(position, 'd5', 'p', 'b', true);

    playMove(position, sq('e2', 10), sq('e5', 10));
    expect(position.enPassant).toEqual(sq('e4', 10));
    expect(names(legalMovesFrom(position, sq('d5', 10)))).toEqual(['d4', 'e4']);

    playMove(position, sq('d5', 10), sq('e4', 10));
    expect(position.get(sq('e5', 10))).toBeNull();
    expect(position.get(sq('e4', 10))?.color).toBe('b');
  });
});

// =============================================================================
// Turn State and Outcomes
// =============================================================================

describe('playMove', () => {
  it('updates clocks and the side to move', () => {
    const position = fromFen(START_FEN);

    playMove(position, sq('e2'), sq('e4'));
    expect(position.sideToMove).toBe('b');
    expect(position.halfMoveClock).toBe(0);
    expect(position.plyCount).toBe(1);
    expect(position.fullMoveNumber).toBe(1);

    playMove(position, sq('g8'), sq('f6'));
    expect(position.sideToMove).toBe('w');
    expect(position.halfMoveClock).toBe(1);
    expect(position.plyCount).toBe(2);
    expect(position.fullMoveNumber).toBe(2);
  });

  it('promotes to a queen unless told otherwise', () => {
    const position = fromFen('8:4k3/P7/8/8/8/8/8/4K3 w - - 0 1');
    const applied = playMove(position, sq('a7'), sq('a8'));
    expect(applied.promotedTo).toBe('q');
    expect(position.get(sq('a8'))).toEqual({ type: 'q', color: 'w', hasMoved: true });

    const knight = fromFen('8:4k3/P7/8/8/8/8/8/4K3 w - - 0 1');
    playMove(knight, sq('a7'), sq('a8'), 'n');
    expect(knight.get(sq('a8'))?.type).toBe('n');
  });
});

describe('evaluateOutcome', () => {
  it('recognizes checkmate', () => {
    expect(evaluateOutcome(fromFen('8:7k/6Q1/6K1/8/8/8/8/8 b - - 0 1'))).toBe('white_wins');
  });

  it('recognizes stalemate', () => {
    expect(evaluateOutcome(fromFen('8:7k/5Q2/6K1/8/8/8/8/8 b - - 0 1'))).toBe('stalemate');
  });

  it('draws at 100 half-moves without capture or pawn move', () => {
    const position = fromFen('8:4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
    position.halfMoveClock = 99;
    expect(evaluateOutcome(position)).toBe('playing');
    position.halfMoveClock = 100;
    expect(evaluateOutcome(position)).toBe('draw_by_clock');
  });

  it('prefers mate over the clock draw', () => {
    const position = fromFen('8:7k/6Q1/6K1/8/8/8/8/8 b - - 0 1');
    position.halfMoveClock = 120;
    expect(evaluateOutcome(position)).toBe('white_wins');
  });
});
