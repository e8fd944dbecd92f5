/**
 * ChessNotation - square names and move text
 *
 * Files beyond 'z' continue as 'aa', 'ab', ... so every board up to 99 files
 * has a unique label. Ranks are 1-based numbers.
 */

import type { PieceType, PromotionType, Square } from './types.js';
import { PIECE_LETTERS } from './types.js';

const LETTERS = 'abcdefghijklmnopqrstuvwxyz';

// =============================================================================
// Square Names
// =============================================================================

/**
 * Label of a 0-indexed file: a..z, aa..az, ba..
 */
export function fileLabel(file: number): string {
  let label = '';
  let n = file + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    label = LETTERS[rem] + label;
    n = Math.floor((n - 1) / 26);
  }
  return label;
}

/**
 * Inverse of fileLabel; -1 for anything that is not a lowercase label
 */
export function parseFileLabel(label: string): number {
  if (!/^[a-z]+$/.test(label)) return -1;
  let n = 0;
  for (const ch of label) {
    n = n * 26 + (LETTERS.indexOf(ch) + 1);
  }
  return n - 1;
}

export function squareName(square: Square): string {
  return `${fileLabel(square.file)}${square.rank + 1}`;
}

/**
 * Parse a square name such as "e2" or "ab14" for a board of the given size.
 * Returns null when the name is malformed or off the board.
 */
export function parseSquare(name: string, size: number): Square | null {
  const match = /^([a-z]+)(\d+)$/.exec(name.trim().toLowerCase());
  if (!match) return null;
  const file = parseFileLabel(match[1]);
  const rank = Number.parseInt(match[2], 10) - 1;
  if (file < 0 || file >= size || rank < 0 || rank >= size) return null;
  return { file, rank };
}

// =============================================================================
// Move Text
// =============================================================================

export interface NotationInput {
  piece: PieceType;
  from: Square;
  to: Square;
  capture: boolean;
  castle: 'king' | 'queen' | null;
  promotion?: PromotionType | null;
  /** Other pieces of the same kind and color that could also reach `to` */
  rivals?: Square[];
  check: boolean;
  mate: boolean;
}

/**
 * Build algebraic-style move text: O-O / O-O-O, piece letter, disambiguation,
 * 'x' for captures, destination, '=Q' for promotions, '+' or '#'.
 */
export function buildMoveNotation(input: NotationInput): string {
  const suffix = input.mate ? '#' : input.check ? '+' : '';

  if (input.castle) {
    return (input.castle === 'king' ? 'O-O' : 'O-O-O') + suffix;
  }

  let text = '';
  if (input.piece === 'p') {
    if (input.capture) text += fileLabel(input.from.file);
  } else {
    text += PIECE_LETTERS[input.piece];
    text += disambiguation(input.from, input.rivals ?? []);
  }

  if (input.capture) text += 'x';
  text += squareName(input.to);

  if (input.promotion) {
    text += '=' + PIECE_LETTERS[input.promotion];
  }

  return text + suffix;
}

function disambiguation(from: Square, rivals: Square[]): string {
  if (rivals.length === 0) return '';
  const sameFile = rivals.some(r => r.file === from.file);
  const sameRank = rivals.some(r => r.rank === from.rank);
  if (!sameFile) return fileLabel(from.file);
  if (!sameRank) return String(from.rank + 1);
  return squareName(from);
}
