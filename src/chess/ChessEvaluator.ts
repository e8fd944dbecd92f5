/**
 * ChessEvaluator - Position evaluation function
 *
 * Material plus simple size-aware positional terms:
 * - Pawns: advancement and central files
 * - Knights and bishops: closeness to the center, knights penalized on edges
 * - Rooks: the opponent's second rank
 * - Queen: mild penalty while undeveloped
 * - King: stay near the home rank
 *
 * All values are in centipawns from White's perspective (positive = White advantage).
 */

import type { Position } from './ChessPosition.js';
import type { Color, EvaluationBreakdown, Piece, PieceType } from './types.js';
import { PIECE_VALUES } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface EvaluatorConfig {
  /** Custom piece values (centipawns) */
  pieceValues?: Partial<Record<PieceType, number>>;
  /** Include positional terms (material only when false) */
  usePositional?: boolean;
}

const KNIGHT_EDGE_PENALTY = 20;
const ROOK_SEVENTH_BONUS = 20;
const UNMOVED_QUEEN_PENALTY = 10;

// =============================================================================
// ChessEvaluator Class
// =============================================================================

export class ChessEvaluator {
  private values: Record<PieceType, number>;
  private usePositional: boolean;

  constructor(config: EvaluatorConfig = {}) {
    this.values = { ...PIECE_VALUES, ...config.pieceValues };
    this.usePositional = config.usePositional ?? true;
  }

  /**
   * Evaluate position, White-positive
   */
  evaluate(position: Position): number {
    return this.getEvaluationBreakdown(position).total;
  }

  /**
   * Evaluate from `color`'s point of view
   */
  evaluateFor(position: Position, color: Color): number {
    const score = this.evaluate(position);
    return color === 'w' ? score : -score;
  }

  /**
   * Get material and positional totals separately
   */
  getEvaluationBreakdown(position: Position): EvaluationBreakdown {
    let material = 0;
    let positional = 0;

    for (const { square, piece } of position.pieces()) {
      const sign = piece.color === 'w' ? 1 : -1;
      material += sign * this.values[piece.type];
      if (this.usePositional) {
        positional += sign * this.positionalBonus(position.size, piece, square.file, square.rank);
      }
    }

    return { material, positional, total: material + positional };
  }

  /** Material value of a piece type */
  pieceValue(type: PieceType): number {
    return this.values[type];
  }

  private positionalBonus(size: number, piece: Piece, file: number, rank: number): number {
    const center = Math.floor(size / 2);
    const fileDist = Math.abs(file - center);
    const centerDist = fileDist + Math.abs(rank - center);

    switch (piece.type) {
      case 'p': {
        const advancement = piece.color === 'w' ? rank : size - 1 - rank;
        return advancement * 5 + (center - fileDist) * 2;
      }
      case 'n': {
        const onEdge = file === 0 || file === size - 1 || rank === 0 || rank === size - 1;
        return (size - centerDist) * 3 - (onEdge ? KNIGHT_EDGE_PENALTY : 0);
      }
      case 'b':
        return (size - centerDist) * 2;
      case 'r': {
        const seventh = piece.color === 'w' ? size - 2 : 1;
        return rank === seventh ? ROOK_SEVENTH_BONUS : 0;
      }
      case 'q':
        return (piece.hasMoved ? 0 : -UNMOVED_QUEEN_PENALTY) + (size - centerDist);
      case 'k': {
        const home = piece.color === 'w' ? 0 : size - 1;
        return -3 * Math.abs(rank - home);
      }
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new evaluator instance
 */
export function createChessEvaluator(config?: EvaluatorConfig): ChessEvaluator {
  return new ChessEvaluator(config);
}

/**
 * Quick evaluation with default settings
 */
export function quickEvaluate(position: Position): number {
  return new ChessEvaluator().evaluate(position);
}
