/**
 * Shared helpers for the chess tests
 */

import { decodeFen } from '../src/chess/ChessFen.js';
import { parseSquare, squareName } from '../src/chess/ChessNotation.js';
import { Position, createPiece, pieceChar } from '../src/chess/ChessPosition.js';
import type { Color, PieceType, Square } from '../src/chess/types.js';

/**
 * Decode a FEN string, failing the test when it does not parse
 */
export function fromFen(fen: string): Position {
  const result = decodeFen(fen);
  if (!result.success) throw new Error(`Fixture FEN rejected: ${result.error}`);
  return result.position;
}

export function sq(name: string, size = 8): Square {
  const square = parseSquare(name, size);
  if (!square) throw new Error(`Bad fixture square ${name}`);
  return square;
}

/** Sorted square names, for order-independent comparisons */
export function names(squares: Square[]): string[] {
  return squares.map(squareName).sort();
}

/**
 * Place pieces by square name, e.g. place(pos, 'e1', 'k', 'w', true)
 */
export function place(position: Position, name: string, type: PieceType, color: Color, hasMoved = false): void {
  position.set(sq(name, position.size), createPiece(type, color, hasMoved));
}

/** One rank as piece letters, '.' for empty squares */
export function rankText(position: Position, rank: number): string {
  let text = '';
  for (let file = 0; file < position.size; file++) {
    const piece = position.at(file, rank);
    text += piece ? pieceChar(piece) : '.';
  }
  return text;
}

/**
 * Park-Miller generator for repeatable "random" choices
 */
export function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

/** Cycles through fixed values */
export function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}
