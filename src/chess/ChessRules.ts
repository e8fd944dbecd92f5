/**
 * ChessRules - legality, move application and terminal detection
 *
 * Stateless functions over a Position. Legality is decided by playing the
 * move on the live grid, testing the mover's king and restoring the touched
 * squares.
 */

import { EmptySquareError } from './errors.js';
import { createPiece } from './ChessPosition.js';
import type { Position } from './ChessPosition.js';
import type { CastleOption } from './ChessPieces.js';
import { castleOptions, forwardDir, isSquareAttacked, promotionRank, pseudoLegalMoves } from './ChessPieces.js';
import type { AppliedMove, Color, Move, Outcome, PromotionType, Square } from './types.js';
import { HALF_MOVE_DRAW_LIMIT, opposite, sameSquare } from './types.js';

// =============================================================================
// Check Detection
// =============================================================================

/**
 * Whether `color`'s king is attacked. A board without that king is never in check.
 */
export function isKingInCheck(position: Position, color: Color): boolean {
  const king = position.findKing(color);
  if (!king) return false;
  return isSquareAttacked(position, king, opposite(color));
}

// =============================================================================
// Special Moves
// =============================================================================

/**
 * Castling option matching a two-file king move, or null for any other move
 */
export function castleFor(position: Position, from: Square, to: Square): CastleOption | null {
  const piece = position.get(from);
  if (!piece || piece.type !== 'k' || from.rank !== to.rank || Math.abs(to.file - from.file) !== 2) {
    return null;
  }
  return castleOptions(position, from).find(o => sameSquare(o.kingTo, to)) ?? null;
}

/**
 * En-passant destination available to the pawn on `from`, if any
 */
export function enPassantTarget(position: Position, from: Square): Square | null {
  const pawn = position.get(from);
  const target = position.enPassant;
  if (!pawn || pawn.type !== 'p' || !target) return null;
  if (target.rank !== from.rank + forwardDir(pawn.color)) return null;
  if (Math.abs(target.file - from.file) !== 1) return null;
  if (!position.inBounds(target.file, target.rank) || position.get(target)) return null;

  const victim = position.at(target.file, from.rank);
  if (!victim || victim.type !== 'p' || victim.color === pawn.color) return null;
  return target;
}

/**
 * Square of the pawn removed when `from`->`to` is an en-passant capture
 */
export function enPassantVictim(position: Position, from: Square, to: Square): Square | null {
  const piece = position.get(from);
  if (!piece || piece.type !== 'p' || !position.enPassant) return null;
  if (!sameSquare(position.enPassant, to) || to.file === from.file || position.get(to)) return null;
  return { file: to.file, rank: from.rank };
}

// =============================================================================
// Legality
// =============================================================================

/**
 * Play `from`->`to` on the live grid (with en-passant removal and rook
 * relocation), test the mover's king, then restore every touched square.
 */
export function isMoveSafe(position: Position, from: Square, to: Square): boolean {
  const piece = position.get(from);
  if (!piece) return false;

  const victim = enPassantVictim(position, from, to);
  const castle = castleFor(position, from, to);
  const touched: Square[] = [from, to];
  if (victim) touched.push(victim);
  if (castle) touched.push(castle.rookFrom, castle.rookTo);
  const saved = touched.map(sq => position.get(sq));

  try {
    if (victim) position.set(victim, null);
    if (castle) position.move(castle.rookFrom, castle.rookTo);
    position.move(from, to);
    return !isKingInCheck(position, piece.color);
  } finally {
    touched.forEach((sq, i) => position.set(sq, saved[i]));
  }
}

/**
 * Castling also needs the king out of check now and the crossed square safe
 */
function isCastleAllowed(position: Position, from: Square, castle: CastleOption, color: Color): boolean {
  if (isKingInCheck(position, color)) return false;
  return isMoveSafe(position, from, castle.rookTo);
}

/**
 * Pseudo-legal destinations plus en passant, without the king-safety filter
 */
export function candidateMoves(position: Position, from: Square): Square[] {
  const moves = pseudoLegalMoves(position, from);
  const ep = enPassantTarget(position, from);
  if (ep) moves.push(ep);
  return moves;
}

/**
 * Legal destinations of the piece on `from` when it belongs to `color`
 */
export function legalMovesFrom(position: Position, from: Square, color: Color = position.sideToMove): Square[] {
  const piece = position.get(from);
  if (!piece || piece.color !== color) return [];

  return candidateMoves(position, from).filter(to => {
    const castle = castleFor(position, from, to);
    if (castle && !isCastleAllowed(position, from, castle, color)) return false;
    return isMoveSafe(position, from, to);
  });
}

export function allLegalMoves(position: Position, color: Color = position.sideToMove): Move[] {
  const moves: Move[] = [];
  for (const { square } of position.pieces(color)) {
    for (const to of legalMovesFrom(position, square, color)) {
      moves.push({ from: square, to });
    }
  }
  return moves;
}

export function hasAnyLegalMove(position: Position, color: Color = position.sideToMove): boolean {
  for (const { square } of position.pieces(color)) {
    if (legalMovesFrom(position, square, color).length > 0) return true;
  }
  return false;
}

export function isLegalMove(position: Position, from: Square, to: Square): boolean {
  return legalMovesFrom(position, from).some(s => sameSquare(s, to));
}

// =============================================================================
// Move Application
// =============================================================================

/**
 * Apply a move to the board: en passant, castling, the new en-passant target,
 * hasMoved and promotion. Does not switch sides or touch the clocks.
 * Without `promotion`, a pawn reaching the far rank stays a pawn and the
 * result reports promotionPending.
 */
export function applyMove(position: Position, from: Square, to: Square, promotion?: PromotionType): AppliedMove {
  const piece = position.get(from);
  if (!piece) throw new EmptySquareError(from.file, from.rank);

  const victim = enPassantVictim(position, from, to);
  const castle = castleFor(position, from, to);
  let captured = castle ? null : position.get(to);

  if (victim) {
    captured = position.get(victim);
    position.set(victim, null);
  }

  if (castle) {
    const rook = position.get(castle.rookFrom);
    position.move(castle.rookFrom, castle.rookTo);
    if (rook) rook.hasMoved = true;
  }

  position.move(from, to);
  piece.hasMoved = true;

  const steps = to.rank - from.rank;
  position.enPassant =
    piece.type === 'p' && Math.abs(steps) >= 2
      ? { file: to.file, rank: to.rank - forwardDir(piece.color) }
      : null;

  let promotionPending = false;
  let promotedTo: PromotionType | null = null;
  if (piece.type === 'p' && to.rank === promotionRank(position, piece.color)) {
    if (promotion) {
      position.set(to, createPiece(promotion, piece.color, true));
      promotedTo = promotion;
    } else {
      promotionPending = true;
    }
  }

  return {
    piece,
    captured,
    enPassant: victim !== null,
    castle: castle ? castle.side : null,
    promotionPending,
    promotedTo,
  };
}

/**
 * Hand the move to the other side and update the clocks
 */
export function advanceTurn(position: Position, resetClock: boolean): void {
  position.halfMoveClock = resetClock ? 0 : position.halfMoveClock + 1;
  position.plyCount++;
  if (position.sideToMove === 'b') position.fullMoveNumber++;
  position.sideToMove = opposite(position.sideToMove);
}

/**
 * applyMove + advanceTurn, promoting to `promotion` (queen by default).
 * Used where no one is asked for a piece choice.
 */
export function playMove(position: Position, from: Square, to: Square, promotion: PromotionType = 'q'): AppliedMove {
  const applied = applyMove(position, from, to, promotion);
  advanceTurn(position, applied.captured !== null || applied.piece.type === 'p');
  return applied;
}

// =============================================================================
// Terminal Detection
// =============================================================================

/**
 * Outcome for the side to move: checkmate, then stalemate, then the
 * half-move clock draw.
 */
export function evaluateOutcome(position: Position): Outcome {
  const side = position.sideToMove;
  if (!hasAnyLegalMove(position, side)) {
    if (isKingInCheck(position, side)) {
      return side === 'w' ? 'black_wins' : 'white_wins';
    }
    return 'stalemate';
  }
  if (position.halfMoveClock >= HALF_MOVE_DRAW_LIMIT) return 'draw_by_clock';
  return 'playing';
}
