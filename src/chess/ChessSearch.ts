/**
 * ChessSearch - Negamax alpha-beta search
 *
 * Every explored move is played on a fresh copy of the position, so the
 * search never undoes anything and never touches the caller's board.
 * Features:
 * - Full legality at the root, king-safety filtering in the tree
 * - MVV-LVA move ordering with a center tie-break
 * - Mate scores that prefer shorter mates
 * - Uniform random choice among equally scored root moves
 */

import { ChessEvaluator } from './ChessEvaluator.js';
import { squareName } from './ChessNotation.js';
import type { Position } from './ChessPosition.js';
import { isSquareAttacked } from './ChessPieces.js';
import { allLegalMoves, candidateMoves, castleFor, isKingInCheck, isMoveSafe, playMove } from './ChessRules.js';
import type { Color, Move, SearchConfig, SearchResult, SearchStats } from './types.js';
import { DEFAULT_SEARCH_CONFIG, MATE_SCORE, opposite } from './types.js';

const INFINITY = Number.MAX_SAFE_INTEGER;

interface ScoredMove extends Move {
  order: number;
}

// =============================================================================
// ChessSearch Class
// =============================================================================

export class ChessSearch {
  private config: SearchConfig;
  private evaluator: ChessEvaluator;
  private stats: SearchStats = this.initStats();

  constructor(evaluator?: ChessEvaluator, config?: Partial<SearchConfig>) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.evaluator = evaluator || new ChessEvaluator();
  }

  /**
   * Search for the best move of the side to move
   * @param position - Position to search (not modified)
   * @param maxDepth - Optional depth override
   */
  search(position: Position, maxDepth?: number): SearchResult {
    const startTime = Date.now();
    this.stats = this.initStats();

    const depth = Math.max(1, maxDepth ?? this.config.maxDepth);
    const root = position.clone();
    const color = root.sideToMove;
    const moves = this.orderMoves(root, allLegalMoves(root, color));

    if (moves.length === 0) {
      this.stats.time = Date.now() - startTime;
      return {
        bestMove: null,
        score: isKingInCheck(root, color) ? -MATE_SCORE : 0,
        depth,
        nodes: 0,
        time: this.stats.time,
        tiedMoves: [],
      };
    }

    let bestScore = -INFINITY;
    let bestMoves: Move[] = [];

    for (const move of moves) {
      const child = root.clone();
      playMove(child, move.from, move.to);
      const score = -this.negamax(child, depth - 1, -INFINITY, INFINITY);

      if (score > bestScore) {
        bestScore = score;
        bestMoves = [move];
      } else if (score === bestScore) {
        bestMoves.push(move);
      }
    }

    this.stats.time = Date.now() - startTime;

    return {
      bestMove: pickTiedMove(bestMoves, this.config.random),
      score: bestScore,
      depth,
      nodes: this.stats.nodes,
      time: this.stats.time,
      tiedMoves: bestMoves,
    };
  }

  /**
   * Negamax with alpha-beta, fail-soft
   */
  private negamax(position: Position, depth: number, alpha: number, beta: number): number {
    this.stats.nodes++;
    const color = position.sideToMove;

    if (depth === 0) {
      // A side in check with no escape is mated even at the horizon
      if (this.inCheck(position, color) && !this.hasLegalChild(position, color)) {
        return -MATE_SCORE;
      }
      return this.evaluator.evaluateFor(position, color);
    }

    const moves = this.orderMoves(position, this.generateMoves(position, color));
    let best = -INFINITY;
    let legal = 0;

    for (const move of moves) {
      const child = this.makeChild(position, move, color);
      if (!child) continue;
      legal++;

      const score = -this.negamax(child, depth - 1, -beta, -alpha);
      if (score > best) best = score;
      if (score > alpha) alpha = score;
      if (alpha >= beta) {
        this.stats.betaCutoffs++;
        break;
      }
    }

    if (legal === 0) {
      return this.inCheck(position, color) ? -(MATE_SCORE + depth) : 0;
    }
    return best;
  }

  // ===========================================================================
  // Move Generation
  // ===========================================================================

  /**
   * Pseudo-legal moves plus en passant; castling already screened for
   * check and the crossed square
   */
  private generateMoves(position: Position, color: Color): Move[] {
    const moves: Move[] = [];
    for (const { square } of position.pieces(color)) {
      for (const to of candidateMoves(position, square)) {
        const castle = castleFor(position, square, to);
        if (castle && (this.inCheck(position, color) || !isMoveSafe(position, square, castle.rookTo))) continue;
        moves.push({ from: square, to });
      }
    }
    return moves;
  }

  /**
   * Copy with the move played, or null when it leaves the mover's king exposed
   */
  private makeChild(position: Position, move: Move, color: Color): Position | null {
    const child = position.clone();
    playMove(child, move.from, move.to);
    return this.inCheck(child, color) ? null : child;
  }

  private hasLegalChild(position: Position, color: Color): boolean {
    return this.generateMoves(position, color).some(m => this.makeChild(position, m, color) !== null);
  }

  /**
   * In search copies a missing king counts as being in check
   */
  private inCheck(position: Position, color: Color): boolean {
    const king = position.findKing(color);
    return !king || isSquareAttacked(position, king, opposite(color));
  }

  /**
   * MVV-LVA for captures, then closeness of the destination to the center
   */
  private orderMoves(position: Position, moves: Move[]): Move[] {
    const center = Math.floor(position.size / 2);
    const scored: ScoredMove[] = moves.map(m => {
      const victim = position.get(m.to);
      const attacker = position.get(m.from);
      let order = 0;
      if (victim && attacker) {
        order += this.evaluator.pieceValue(victim.type) * 10 - this.evaluator.pieceValue(attacker.type);
      }
      order -= Math.abs(m.to.file - center) + Math.abs(m.to.rank - center);
      return { ...m, order };
    });
    // Stable: ties keep generation order
    scored.sort((a, b) => b.order - a.order);
    return scored.map(({ from, to }) => ({ from, to }));
  }

  // ===========================================================================
  // Stats
  // ===========================================================================

  private initStats(): SearchStats {
    return { nodes: 0, betaCutoffs: 0, time: 0 };
  }

  /**
   * Get search statistics of the last search
   */
  getStats(): SearchStats {
    return { ...this.stats };
  }

  /**
   * Update configuration
   */
  setConfig(config: Partial<SearchConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new search instance
 */
export function createChessSearch(evaluator?: ChessEvaluator, config?: Partial<SearchConfig>): ChessSearch {
  return new ChessSearch(evaluator, config);
}

/**
 * Uniform pick among equally scored moves; null for an empty list
 */
export function pickTiedMove(moves: readonly Move[], random: () => number): Move | null {
  if (moves.length === 0) return null;
  const chosen = moves[Math.min(moves.length - 1, Math.floor(random() * moves.length))];
  return { from: chosen.from, to: chosen.to };
}

/**
 * Perft - count leaf positions at `depth` for move-generation checks.
 * Promotions count once (to a queen).
 */
export function perft(position: Position, depth: number): number {
  if (depth === 0) return 1;

  const moves = allLegalMoves(position, position.sideToMove);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) {
    const child = position.clone();
    playMove(child, move.from, move.to);
    nodes += perft(child, depth - 1);
  }
  return nodes;
}

/**
 * Divide - Perft with per-move breakdown, keyed like "e2e4"
 */
export function divide(position: Position, depth: number): Map<string, number> {
  const result = new Map<string, number>();
  for (const move of allLegalMoves(position, position.sideToMove)) {
    const child = position.clone();
    playMove(child, move.from, move.to);
    result.set(`${squareName(move.from)}${squareName(move.to)}`, perft(child, depth - 1));
  }
  return result;
}
