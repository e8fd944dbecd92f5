/**
 * ChessEngine - Stateful game on top of the pure rules
 *
 * Owns one position and drives it through moves, promotion choices and
 * terminal detection. Move requests never throw: they return a MoveResult
 * and leave the game untouched when refused.
 */

import { SetupError } from './errors.js';
import { decodeFen, encodeFen } from './ChessFen.js';
import { buildMoveNotation } from './ChessNotation.js';
import { Position, createPiece } from './ChessPosition.js';
import {
  advanceTurn,
  applyMove,
  evaluateOutcome,
  isKingInCheck,
  isLegalMove,
  legalMovesFrom,
} from './ChessRules.js';
import { createSetup, prepareCustomSetup, validateCustomSetup } from './ChessSetup.js';
import { decodeTranscript, encodeTranscript } from './ChessTranscript.js';
import type {
  AppliedMove,
  ChessEngineConfig,
  Color,
  GameState,
  LoadResult,
  MoveResult,
  Outcome,
  PendingPromotion,
  PieceType,
  PromotionType,
  SetupMode,
  Square,
} from './types.js';
import { DEFAULT_ENGINE_CONFIG, sameSquare } from './types.js';

/** Pieces captured by each side */
export interface CapturedPieces {
  white: PieceType[];
  black: PieceType[];
}

const PROMOTION_NAMES = new Map<string, PromotionType>([
  ['q', 'q'],
  ['queen', 'q'],
  ['r', 'r'],
  ['rook', 'r'],
  ['b', 'b'],
  ['bishop', 'b'],
  ['n', 'n'],
  ['knight', 'n'],
]);

/**
 * Map a promotion choice to a piece; anything unrecognized (king, pawn,
 * unknown text) becomes a queen.
 */
export function toPromotionType(kind: string): PromotionType {
  return PROMOTION_NAMES.get(kind.trim().toLowerCase()) ?? 'q';
}

// =============================================================================
// ChessEngine Class
// =============================================================================

export class ChessEngine {
  private config: ChessEngineConfig;
  private position: Position;
  /** Copy of the starting position, for reset() */
  private startPosition: Position;
  private pending: PendingPromotion | null = null;
  private outcome: Outcome = 'playing';
  private moveHistory: string[] = [];
  private capturedPieces: CapturedPieces = { white: [], black: [] };

  constructor(config: Partial<ChessEngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };

    const setup = createSetup(this.config.setupMode, this.config.size, this.config.random);
    if (!setup.success) {
      throw new SetupError(setup.error, { mode: this.config.setupMode, size: this.config.size });
    }
    this.position = setup.position;
    this.startPosition = setup.position.clone();
  }

  // ===========================================================================
  // Game Lifecycle
  // ===========================================================================

  /**
   * Start a new game with a generated layout. The current game is kept on failure.
   */
  newGame(mode: SetupMode = this.config.setupMode, size: number = this.config.size): LoadResult {
    const setup = createSetup(mode, size, this.config.random);
    if (!setup.success) return { success: false, error: setup.error };

    this.config = { ...this.config, setupMode: mode, size };
    this.replacePosition(setup.position);
    return { success: true };
  }

  /**
   * Restart from the position the current game began with
   */
  reset(): void {
    this.replacePosition(this.startPosition.clone());
  }

  /**
   * Start from a hand-placed position after validating it
   */
  loadCustom(position: Position, sideToMove: Color = 'w'): LoadResult {
    const validation = validateCustomSetup(position);
    if (!validation.success) return validation;

    this.replacePosition(prepareCustomSetup(position, sideToMove));
    return { success: true };
  }

  /**
   * Replace the game with a FEN position. Nothing changes on failure.
   */
  importFen(fen: string): LoadResult {
    const decoded = decodeFen(fen);
    if (!decoded.success) return { success: false, error: decoded.error };

    this.replacePosition(decoded.position);
    return { success: true };
  }

  exportFen(): string {
    return encodeFen(this.position);
  }

  /**
   * Replace the board with a peer's transcript, keeping the board size
   * unless one is given
   */
  importTranscript(transcript: string, sideToMove: Color = 'w', size: number = this.position.size): LoadResult {
    const decoded = decodeTranscript(transcript, size);
    if (!decoded.success) return { success: false, error: decoded.error };

    const validation = validateCustomSetup(decoded.position);
    if (!validation.success) return validation;

    decoded.position.sideToMove = sideToMove;
    decoded.position.setupMode = this.position.setupMode;
    decoded.position.pawnFirstMoveDistance = this.position.pawnFirstMoveDistance;
    this.replacePosition(decoded.position);
    return { success: true };
  }

  exportTranscript(): string {
    return encodeTranscript(this.position);
  }

  private replacePosition(position: Position): void {
    this.position = position;
    this.startPosition = position.clone();
    this.pending = null;
    this.moveHistory = [];
    this.capturedPieces = { white: [], black: [] };
    this.outcome = evaluateOutcome(position);
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  /**
   * Legal destinations for the piece on `square` if it belongs to the side to move
   */
  getLegalMoves(square: Square): Square[] {
    if (this.pending || !this.position.inBounds(square.file, square.rank)) return [];
    return legalMovesFrom(this.position, square, this.position.sideToMove);
  }

  /**
   * Attempt a move for the side to move. A pawn reaching the far rank
   * leaves the turn with the mover until completePromotion().
   */
  tryMakeMove(from: Square, to: Square): MoveResult {
    if (this.pending) return { ok: false, reason: 'promotion_pending' };
    if (!this.position.inBounds(from.file, from.rank) || !this.position.inBounds(to.file, to.rank)) {
      return { ok: false, reason: 'illegal_move' };
    }
    if (!isLegalMove(this.position, from, to)) return { ok: false, reason: 'illegal_move' };

    const rivals = this.findRivals(from, to);
    const applied = applyMove(this.position, from, to);

    if (applied.promotionPending) {
      this.pending = { from, to, pawn: applied.piece, captured: applied.captured };
      return {
        ok: true,
        notation: null,
        promotionPending: true,
        sideToMove: this.position.sideToMove,
        check: false,
        outcome: this.outcome,
        captured: applied.captured ? applied.captured.type : null,
      };
    }

    advanceTurn(this.position, applied.captured !== null || applied.piece.type === 'p');
    return this.finishMove(from, to, applied, rivals, null);
  }

  /**
   * Replace the waiting pawn, then hand over the turn
   */
  completePromotion(kind: string = 'q'): MoveResult {
    const pending = this.pending;
    if (!pending) return { ok: false, reason: 'no_promotion_pending' };

    const type = toPromotionType(kind);
    this.position.set(pending.to, createPiece(type, pending.pawn.color, true));
    this.pending = null;
    advanceTurn(this.position, true);

    const applied: AppliedMove = {
      piece: pending.pawn,
      captured: pending.captured,
      enPassant: false,
      castle: null,
      promotionPending: false,
      promotedTo: type,
    };
    return this.finishMove(pending.from, pending.to, applied, [], type);
  }

  private finishMove(
    from: Square,
    to: Square,
    applied: AppliedMove,
    rivals: Square[],
    promotion: PromotionType | null
  ): MoveResult {
    if (applied.captured) {
      const bucket = applied.piece.color === 'w' ? this.capturedPieces.white : this.capturedPieces.black;
      bucket.push(applied.captured.type);
    }

    this.outcome = evaluateOutcome(this.position);
    const sideToMove = this.position.sideToMove;
    const check = isKingInCheck(this.position, sideToMove);
    const mate = this.outcome === 'white_wins' || this.outcome === 'black_wins';

    const notation = buildMoveNotation({
      piece: applied.piece.type,
      from,
      to,
      capture: applied.captured !== null,
      castle: applied.castle,
      promotion,
      rivals,
      check,
      mate,
    });
    this.moveHistory.push(notation);

    return {
      ok: true,
      notation,
      promotionPending: false,
      sideToMove,
      check,
      outcome: this.outcome,
      captured: applied.captured ? applied.captured.type : null,
    };
  }

  /**
   * Other pieces of the mover's kind that could also legally reach `to`
   */
  private findRivals(from: Square, to: Square): Square[] {
    const piece = this.position.get(from);
    if (!piece || piece.type === 'p' || piece.type === 'k') return [];

    return this.position
      .pieces(piece.color)
      .filter(p => p.piece.type === piece.type && !sameSquare(p.square, from))
      .filter(p => legalMovesFrom(this.position, p.square, piece.color).some(s => sameSquare(s, to)))
      .map(p => p.square);
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  turn(): Color {
    return this.position.sideToMove;
  }

  size(): number {
    return this.position.size;
  }

  isCheck(): boolean {
    return isKingInCheck(this.position, this.position.sideToMove);
  }

  getOutcome(): Outcome {
    return this.outcome;
  }

  isGameOver(): boolean {
    return this.outcome !== 'playing';
  }

  getPendingPromotion(): PendingPromotion | null {
    return this.pending;
  }

  history(): string[] {
    return [...this.moveHistory];
  }

  getCapturedPieces(): CapturedPieces {
    return {
      white: [...this.capturedPieces.white],
      black: [...this.capturedPieces.black],
    };
  }

  /**
   * Defensive copy for callers and the search
   */
  getPosition(): Position {
    return this.position.clone();
  }

  ascii(): string {
    return this.position.ascii();
  }

  /**
   * Snapshot of the whole game
   */
  getState(): GameState {
    return {
      size: this.position.size,
      fen: this.exportFen(),
      sideToMove: this.position.sideToMove,
      isCheck: this.isCheck(),
      outcome: this.outcome,
      isGameOver: this.isGameOver(),
      pendingPromotion: this.pending,
      halfMoveClock: this.position.halfMoveClock,
      fullMoveNumber: this.position.fullMoveNumber,
      plyCount: this.position.plyCount,
      setupMode: this.position.setupMode,
      history: this.history(),
      ascii: this.ascii(),
    };
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a new chess engine instance
 */
export function createChessEngine(config?: Partial<ChessEngineConfig>): ChessEngine {
  return new ChessEngine(config);
}

/**
 * Engine loaded from a FEN string; throws SetupError when it does not decode
 */
export function createChessEngineFromFen(fen: string, config?: Partial<ChessEngineConfig>): ChessEngine {
  const engine = new ChessEngine({ ...config, size: 8, setupMode: 'two-lines' });
  const result = engine.importFen(fen);
  if (!result.success) throw new SetupError(result.error, { fen });
  return engine;
}
