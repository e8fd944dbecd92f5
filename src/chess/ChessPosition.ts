/**
 * ChessPosition - board grid and turn state
 *
 * The grid is the single record of where pieces stand. Pieces carry no
 * coordinates, so moving a piece is a pair of cell writes.
 */

import { InvalidBoardSizeError, InvalidSquareError } from './errors.js';
import { fileLabel } from './ChessNotation.js';
import type { Color, Piece, PieceType, PlacedPiece, SetupMode, Square } from './types.js';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from './types.js';

/**
 * Build a fresh, unmoved piece
 */
export function createPiece(type: PieceType, color: Color, hasMoved = false): Piece {
  return { type, color, hasMoved };
}

export function pieceChar(piece: Piece): string {
  return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
}

export class Position {
  readonly size: number;
  private cells: (Piece | null)[];

  sideToMove: Color = 'w';
  /** Square a pawn may capture onto en passant, for the next half-move only */
  enPassant: Square | null = null;
  halfMoveClock = 0;
  fullMoveNumber = 1;
  /** Completed half-moves since setup */
  plyCount = 0;
  setupMode: SetupMode = 'custom';
  /** Squares an unmoved pawn may advance */
  pawnFirstMoveDistance = 2;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
      throw new InvalidBoardSizeError(size, MIN_BOARD_SIZE, MAX_BOARD_SIZE);
    }
    this.size = size;
    this.cells = new Array<Piece | null>(size * size).fill(null);
  }

  // ===========================================================================
  // Grid Access
  // ===========================================================================

  inBounds(file: number, rank: number): boolean {
    return file >= 0 && file < this.size && rank >= 0 && rank < this.size;
  }

  private index(square: Square): number {
    if (!this.inBounds(square.file, square.rank)) {
      throw new InvalidSquareError(square.file, square.rank, this.size);
    }
    return square.rank * this.size + square.file;
  }

  get(square: Square): Piece | null {
    return this.cells[this.index(square)];
  }

  /** get() by coordinates; null off the board */
  at(file: number, rank: number): Piece | null {
    if (!this.inBounds(file, rank)) return null;
    return this.cells[rank * this.size + file];
  }

  set(square: Square, piece: Piece | null): void {
    this.cells[this.index(square)] = piece;
  }

  /**
   * Relocate whatever stands on `from` to `to`, returning what `to` held.
   * Does not touch hasMoved.
   */
  move(from: Square, to: Square): Piece | null {
    const fromIdx = this.index(from);
    const toIdx = this.index(to);
    const captured = this.cells[toIdx];
    this.cells[toIdx] = this.cells[fromIdx];
    this.cells[fromIdx] = null;
    return captured;
  }

  clear(): void {
    this.cells.fill(null);
  }

  /**
   * Every occupied square, rank by rank from rank 0
   */
  pieces(color?: Color): PlacedPiece[] {
    const result: PlacedPiece[] = [];
    for (let i = 0; i < this.cells.length; i++) {
      const piece = this.cells[i];
      if (piece && (color === undefined || piece.color === color)) {
        result.push({ square: { file: i % this.size, rank: Math.floor(i / this.size) }, piece });
      }
    }
    return result;
  }

  findKing(color: Color): Square | null {
    for (let i = 0; i < this.cells.length; i++) {
      const piece = this.cells[i];
      if (piece && piece.type === 'k' && piece.color === color) {
        return { file: i % this.size, rank: Math.floor(i / this.size) };
      }
    }
    return null;
  }

  // ===========================================================================
  // Copies
  // ===========================================================================

  /**
   * Deep copy; the search explores moves on copies only
   */
  clone(): Position {
    const copy = new Position(this.size);
    copy.cells = this.cells.map(p => (p ? { ...p } : null));
    copy.sideToMove = this.sideToMove;
    copy.enPassant = this.enPassant ? { ...this.enPassant } : null;
    copy.halfMoveClock = this.halfMoveClock;
    copy.fullMoveNumber = this.fullMoveNumber;
    copy.plyCount = this.plyCount;
    copy.setupMode = this.setupMode;
    copy.pawnFirstMoveDistance = this.pawnFirstMoveDistance;
    return copy;
  }

  /**
   * Text board, highest rank first, '.' for empty squares
   */
  ascii(): string {
    const width = String(this.size).length;
    const lines: string[] = [];
    for (let rank = this.size - 1; rank >= 0; rank--) {
      const row: string[] = [];
      for (let file = 0; file < this.size; file++) {
        const piece = this.at(file, rank);
        row.push(piece ? pieceChar(piece) : '.');
      }
      lines.push(`${String(rank + 1).padStart(width)} ${row.join(' ')}`);
    }
    const files: string[] = [];
    for (let file = 0; file < this.size; file++) files.push(fileLabel(file));
    lines.push(`${' '.repeat(width)} ${files.join(' ')}`);
    return lines.join('\n');
  }
}
