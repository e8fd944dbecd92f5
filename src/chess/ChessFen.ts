/**
 * ChessFen - extended FEN for boards of any supported size
 *
 * Format: `<size>:<placement> <side> <castling> - 0 1`
 * The size prefix is optional on input (8 when absent). Empty runs may span
 * several digits, e.g. `26:r24k/...`.
 */

import { Position, createPiece, pieceChar } from './ChessPosition.js';
import type { Color, Piece, PieceType } from './types.js';
import { FEN_DEFAULT_SIZE, MAX_BOARD_SIZE, MIN_BOARD_SIZE } from './types.js';

export type FenResult = { success: true; position: Position } | { success: false; error: string };

const PIECE_TYPES = new Map<string, PieceType>([
  ['k', 'k'],
  ['q', 'q'],
  ['r', 'r'],
  ['b', 'b'],
  ['n', 'n'],
  ['p', 'p'],
]);

// =============================================================================
// Export
// =============================================================================

/**
 * Encode placement, side to move and castling availability.
 * En passant and the clocks are written as the fixed `- 0 1`.
 */
export function encodeFen(position: Position): string {
  const size = position.size;
  const ranks: string[] = [];

  for (let rank = size - 1; rank >= 0; rank--) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < size; file++) {
      const piece = position.at(file, rank);
      if (!piece) {
        empty++;
        continue;
      }
      if (empty > 0) {
        row += empty;
        empty = 0;
      }
      row += pieceChar(piece);
    }
    if (empty > 0) row += empty;
    ranks.push(row);
  }

  const castling = castlingRights(position, 'w') + castlingRights(position, 'b');
  return `${size}:${ranks.join('/')} ${position.sideToMove} ${castling || '-'} - 0 1`;
}

/**
 * 'K'/'Q' (or 'k'/'q') when an unmoved king on its back rank still has an
 * unmoved rook of its color somewhere on that side.
 */
function castlingRights(position: Position, color: Color): string {
  const rank = color === 'w' ? 0 : position.size - 1;
  let rights = '';

  for (let file = 0; file < position.size; file++) {
    const king = position.at(file, rank);
    if (!king || king.type !== 'k' || king.color !== color || king.hasMoved) continue;

    if (hasUnmovedRook(position, color, rank, file + 1, position.size, 1)) rights += 'K';
    if (hasUnmovedRook(position, color, rank, file - 1, -1, -1)) rights += 'Q';
    break;
  }

  return color === 'w' ? rights : rights.toLowerCase();
}

function hasUnmovedRook(position: Position, color: Color, rank: number, start: number, end: number, step: 1 | -1): boolean {
  for (let file = start; file !== end; file += step) {
    const piece = position.at(file, rank);
    if (piece && piece.type === 'r' && piece.color === color && !piece.hasMoved) return true;
  }
  return false;
}

// =============================================================================
// Import
// =============================================================================

/**
 * Decode a FEN string into a fresh position. Never throws; the caller's
 * position stays untouched on failure. Turn state is reset: no en-passant
 * target, clocks at zero.
 */
export function decodeFen(text: string): FenResult {
  if (!text || text.trim().length === 0) {
    return { success: false, error: 'FEN string is empty' };
  }

  const parts = text.trim().split(/\s+/);
  let placement = parts[0];
  let size = FEN_DEFAULT_SIZE;

  const colon = placement.indexOf(':');
  if (colon >= 0) {
    const sizeText = placement.slice(0, colon);
    if (!/^\d+$/.test(sizeText)) {
      return { success: false, error: 'Invalid board size in FEN' };
    }
    size = Number.parseInt(sizeText, 10);
    placement = placement.slice(colon + 1);
  }

  if (size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
    return { success: false, error: `Board size must be between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}` };
  }

  const rows = placement.split('/');
  if (rows.length !== size) {
    return { success: false, error: `Expected ${size} ranks, got ${rows.length}` };
  }

  const position = new Position(size);
  for (let rowIdx = 0; rowIdx < rows.length; rowIdx++) {
    const rank = size - 1 - rowIdx;
    const error = parseRank(position, rows[rowIdx], rank);
    if (error) return { success: false, error };
  }

  for (const color of ['w', 'b'] as const) {
    const kings = position.pieces(color).filter(p => p.piece.type === 'k').length;
    if (kings !== 1) {
      const name = color === 'w' ? 'White' : 'Black';
      return { success: false, error: `${name} must have exactly one king, found ${kings}` };
    }
  }

  if (parts.length >= 2) {
    const side = parts[1].toLowerCase();
    if (side === 'w' || side === 'b') {
      position.sideToMove = side;
    } else {
      return { success: false, error: `Unknown side to move '${parts[1]}'` };
    }
  }

  if (parts.length >= 3) {
    const error = applyCastlingField(position, parts[2]);
    if (error) return { success: false, error };
  }

  return { success: true, position };
}

function parseRank(position: Position, row: string, rank: number): string | null {
  const size = position.size;
  let file = 0;
  let i = 0;

  while (i < row.length) {
    const ch = row[i];
    if (ch >= '0' && ch <= '9') {
      let j = i;
      while (j < row.length && row[j] >= '0' && row[j] <= '9') j++;
      file += Number.parseInt(row.slice(i, j), 10);
      i = j;
      continue;
    }

    const type = PIECE_TYPES.get(ch.toLowerCase());
    if (!type) {
      return `Unknown piece '${ch}' on rank ${rank + 1}`;
    }
    if (file >= size) {
      return `Rank ${rank + 1} describes more than ${size} squares`;
    }
    position.set({ file, rank }, createPiece(type, ch === ch.toUpperCase() ? 'w' : 'b'));
    file++;
    i++;
  }

  if (file !== size) {
    return `Rank ${rank + 1} describes ${file} squares, expected ${size}`;
  }
  return null;
}

/**
 * Rights missing from the field mark the pieces that would grant them as
 * moved, so a re-export reproduces the field.
 */
function applyCastlingField(position: Position, field: string): string | null {
  if (field !== '-' && !/^[KQkq]+$/.test(field)) {
    return `Invalid castling field '${field}'`;
  }

  for (const color of ['w', 'b'] as const) {
    const rank = color === 'w' ? 0 : position.size - 1;
    const kingSide = color === 'w' ? 'K' : 'k';
    const queenSide = color === 'w' ? 'Q' : 'q';
    const hasKing = field.includes(kingSide);
    const hasQueen = field.includes(queenSide);

    const kingFile = findKingFile(position, color, rank);
    if (kingFile < 0) continue;

    if (!hasKing) markRooksMoved(position, color, rank, kingFile + 1, position.size, 1);
    if (!hasQueen) markRooksMoved(position, color, rank, kingFile - 1, -1, -1);
    if (!hasKing && !hasQueen) {
      const king = position.at(kingFile, rank);
      if (king) king.hasMoved = true;
    }
  }
  return null;
}

function findKingFile(position: Position, color: Color, rank: number): number {
  for (let file = 0; file < position.size; file++) {
    const piece = position.at(file, rank);
    if (piece && piece.type === 'k' && piece.color === color) return file;
  }
  return -1;
}

function markRooksMoved(position: Position, color: Color, rank: number, start: number, end: number, step: 1 | -1): void {
  for (let file = start; file !== end; file += step) {
    const piece: Piece | null = position.at(file, rank);
    if (piece && piece.type === 'r' && piece.color === color) piece.hasMoved = true;
  }
}
