/**
 * ChessPieces - pseudo-legal move geometry
 *
 * Destinations here respect board edges and occupancy only. Whether the
 * mover's king ends up safe is decided in ChessRules.
 */

import type { Position } from './ChessPosition.js';
import type { Color, Piece, Square } from './types.js';

// =============================================================================
// Geometry
// =============================================================================

type Offset = readonly [number, number];

export const KNIGHT_OFFSETS: readonly Offset[] = [
  [1, 2], [2, 1], [2, -1], [1, -2],
  [-1, -2], [-2, -1], [-2, 1], [-1, 2],
];

export const KING_OFFSETS: readonly Offset[] = [
  [1, 0], [1, 1], [0, 1], [-1, 1],
  [-1, 0], [-1, -1], [0, -1], [1, -1],
];

export const DIAGONAL_DIRS: readonly Offset[] = [[1, 1], [1, -1], [-1, 1], [-1, -1]];

export const CARDINAL_DIRS: readonly Offset[] = [[1, 0], [-1, 0], [0, 1], [0, -1]];

/** Rank direction a pawn of this color advances in */
export function forwardDir(color: Color): 1 | -1 {
  return color === 'w' ? 1 : -1;
}

/** Rank a pawn of this color promotes on */
export function promotionRank(position: Position, color: Color): number {
  return color === 'w' ? position.size - 1 : 0;
}

/** A castling candidate for an unmoved king */
export interface CastleOption {
  side: 'king' | 'queen';
  /** +1 toward higher files, -1 toward lower */
  dir: 1 | -1;
  kingTo: Square;
  rookFrom: Square;
  /** The square the king crosses; the rook lands here */
  rookTo: Square;
}

// =============================================================================
// Move Generation
// =============================================================================

/**
 * Pseudo-legal destinations of the piece on `from` (empty list for an empty square).
 * En passant is not included; it depends on the previous move.
 */
export function pseudoLegalMoves(position: Position, from: Square): Square[] {
  const piece = position.get(from);
  if (!piece) return [];

  switch (piece.type) {
    case 'p':
      return pawnMoves(position, from, piece);
    case 'n':
      return stepMoves(position, from, piece.color, KNIGHT_OFFSETS);
    case 'b':
      return slidingMoves(position, from, piece.color, DIAGONAL_DIRS);
    case 'r':
      return slidingMoves(position, from, piece.color, CARDINAL_DIRS);
    case 'q':
      return [
        ...slidingMoves(position, from, piece.color, DIAGONAL_DIRS),
        ...slidingMoves(position, from, piece.color, CARDINAL_DIRS),
      ];
    case 'k':
      return [
        ...stepMoves(position, from, piece.color, KING_OFFSETS),
        ...castleOptions(position, from).map(c => c.kingTo),
      ];
  }
}

function addIfValid(position: Position, moves: Square[], color: Color, file: number, rank: number): void {
  if (!position.inBounds(file, rank)) return;
  const target = position.at(file, rank);
  if (!target || target.color !== color) {
    moves.push({ file, rank });
  }
}

function stepMoves(position: Position, from: Square, color: Color, offsets: readonly Offset[]): Square[] {
  const moves: Square[] = [];
  for (const [df, dr] of offsets) {
    addIfValid(position, moves, color, from.file + df, from.rank + dr);
  }
  return moves;
}

function slidingMoves(position: Position, from: Square, color: Color, directions: readonly Offset[]): Square[] {
  const moves: Square[] = [];
  for (const [df, dr] of directions) {
    let f = from.file + df;
    let r = from.rank + dr;
    while (position.inBounds(f, r)) {
      const target = position.at(f, r);
      if (target) {
        if (target.color !== color) moves.push({ file: f, rank: r });
        break;
      }
      moves.push({ file: f, rank: r });
      f += df;
      r += dr;
    }
  }
  return moves;
}

function pawnMoves(position: Position, from: Square, pawn: Piece): Square[] {
  const moves: Square[] = [];
  const dir = forwardDir(pawn.color);
  const maxSteps = pawn.hasMoved ? 1 : position.pawnFirstMoveDistance;

  for (let step = 1; step <= maxSteps; step++) {
    const rank = from.rank + dir * step;
    if (!position.inBounds(from.file, rank) || position.at(from.file, rank)) break;
    moves.push({ file: from.file, rank });
  }

  for (const df of [-1, 1]) {
    const file = from.file + df;
    const rank = from.rank + dir;
    const target = position.at(file, rank);
    if (target && target.color !== pawn.color) {
      moves.push({ file, rank });
    }
  }

  return moves;
}

/**
 * Castling candidates: scanning outward along the king's rank, the first piece
 * met must be an unmoved rook of the king's color at least two files away.
 * Attack conditions are checked by the rules, not here.
 */
export function castleOptions(position: Position, from: Square): CastleOption[] {
  const king = position.get(from);
  if (!king || king.type !== 'k' || king.hasMoved) return [];

  const options: CastleOption[] = [];
  for (const dir of [1, -1] as const) {
    let file = from.file + dir;
    while (position.inBounds(file, from.rank) && !position.at(file, from.rank)) {
      file += dir;
    }
    const rook = position.at(file, from.rank);
    if (!rook || rook.type !== 'r' || rook.color !== king.color || rook.hasMoved) continue;
    if (Math.abs(file - from.file) < 2) continue;

    options.push({
      side: dir === 1 ? 'king' : 'queen',
      dir,
      kingTo: { file: from.file + 2 * dir, rank: from.rank },
      rookFrom: { file, rank: from.rank },
      rookTo: { file: from.file + dir, rank: from.rank },
    });
  }
  return options;
}

// =============================================================================
// Attacks
// =============================================================================

/**
 * Whether any piece of color `by` pseudo-legally reaches `target`.
 * Scans outward from the target, which is the same set as walking every
 * enemy piece's move list: castling and pawn pushes never land on an
 * occupied enemy square.
 */
export function isSquareAttacked(position: Position, target: Square, by: Color): boolean {
  const { file, rank } = target;

  const pawnRank = rank - forwardDir(by);
  for (const df of [-1, 1]) {
    const p = position.at(file + df, pawnRank);
    if (p && p.color === by && p.type === 'p') return true;
  }

  for (const [df, dr] of KNIGHT_OFFSETS) {
    const p = position.at(file + df, rank + dr);
    if (p && p.color === by && p.type === 'n') return true;
  }

  for (const [df, dr] of KING_OFFSETS) {
    const p = position.at(file + df, rank + dr);
    if (p && p.color === by && p.type === 'k') return true;
  }

  if (rayHits(position, target, by, DIAGONAL_DIRS, 'b')) return true;
  return rayHits(position, target, by, CARDINAL_DIRS, 'r');
}

function rayHits(
  position: Position,
  target: Square,
  by: Color,
  directions: readonly Offset[],
  slider: 'b' | 'r'
): boolean {
  for (const [df, dr] of directions) {
    let f = target.file + df;
    let r = target.rank + dr;
    while (position.inBounds(f, r)) {
      const p = position.at(f, r);
      if (p) {
        if (p.color === by && (p.type === slider || p.type === 'q')) return true;
        break;
      }
      f += df;
      r += dr;
    }
  }
  return false;
}
