/**
 * ChessGame - turn controller for one game
 *
 * Sits between a front end and the engine: routes human moves, runs AI turns
 * and reports what happened through events. Input is refused once the game
 * is over, while a promotion choice is pending and while the AI is thinking.
 */

import { EventEmitter } from 'events';
import { ChessAI } from './ChessAI.js';
import { ChessEngine } from './ChessEngine.js';
import type { Position } from './ChessPosition.js';
import type {
  AIDifficulty,
  ChessGameConfig,
  Color,
  GameState,
  LoadResult,
  MoveResult,
  Outcome,
  PlayerKind,
  SetupMode,
  Square,
} from './types.js';
import { DEFAULT_GAME_CONFIG } from './types.js';

/**
 * Game events interface for TypeScript
 */
export interface ChessGameEvents {
  turnChanged: (color: Color) => void;
  check: (color: Color) => void;
  moveExecuted: (notation: string) => void;
  promotionRequested: (square: Square, color: Color) => void;
  gameOver: (outcome: Outcome) => void;
}

/** Why the controller refused a request before it reached the engine */
export type GameRefusal = 'game_over' | 'ai_thinking' | 'not_human_turn';

export type GameMoveResult = MoveResult | { ok: false; reason: GameRefusal };

export class ChessGame extends EventEmitter {
  private config: ChessGameConfig;
  private engine: ChessEngine;
  private ai: ChessAI;
  private thinking = false;

  constructor(config: Partial<ChessGameConfig> = {}) {
    super();
    this.config = { ...DEFAULT_GAME_CONFIG, ...config };
    this.engine = new ChessEngine({
      size: this.config.size,
      setupMode: this.config.setupMode,
      random: this.config.random,
    });
    this.ai = ChessAI.forDifficulty(this.config.difficulty, this.config.ai, this.config.random);
  }

  private emitEvent<E extends keyof ChessGameEvents>(event: E, ...args: Parameters<ChessGameEvents[E]>): void {
    this.emit(event, ...args);
  }

  // ===========================================================================
  // Setup
  // ===========================================================================

  newGame(mode?: SetupMode, size?: number): LoadResult {
    const result = this.engine.newGame(mode, size);
    if (result.success) this.announceTurn(this.engine.turn(), this.engine.isCheck(), this.engine.getOutcome());
    return result;
  }

  loadFen(fen: string): LoadResult {
    const result = this.engine.importFen(fen);
    if (result.success) this.announceTurn(this.engine.turn(), this.engine.isCheck(), this.engine.getOutcome());
    return result;
  }

  loadCustom(position: Position, sideToMove: Color = 'w'): LoadResult {
    const result = this.engine.loadCustom(position, sideToMove);
    if (result.success) this.announceTurn(this.engine.turn(), this.engine.isCheck(), this.engine.getOutcome());
    return result;
  }

  setPlayer(color: Color, kind: PlayerKind): void {
    if (color === 'w') this.config.white = kind;
    else this.config.black = kind;
  }

  setDifficulty(difficulty: AIDifficulty): void {
    this.config.difficulty = difficulty;
    this.ai.setDifficulty(difficulty);
  }

  // ===========================================================================
  // Turns
  // ===========================================================================

  playerKind(color: Color): PlayerKind {
    return color === 'w' ? this.config.white : this.config.black;
  }

  isAITurn(): boolean {
    return this.playerKind(this.engine.turn()) === 'ai' && !this.engine.isGameOver();
  }

  isThinking(): boolean {
    return this.thinking;
  }

  getLegalMoves(square: Square): Square[] {
    if (this.thinking || this.engine.isGameOver()) return [];
    return this.engine.getLegalMoves(square);
  }

  /**
   * Move for the human side to move
   */
  makeMove(from: Square, to: Square): GameMoveResult {
    const refusal = this.refusal();
    if (refusal) return { ok: false, reason: refusal };
    if (this.playerKind(this.engine.turn()) !== 'human') return { ok: false, reason: 'not_human_turn' };

    const result = this.engine.tryMakeMove(from, to);
    this.report(result, to);
    return result;
  }

  /**
   * Answer a promotion request
   */
  completePromotion(kind: string): GameMoveResult {
    if (this.engine.isGameOver()) return { ok: false, reason: 'game_over' };
    const result = this.engine.completePromotion(kind);
    this.report(result, null);
    return result;
  }

  /**
   * Let the AI move for the side to move. The AI promotes to a queen.
   */
  async playAITurn(): Promise<GameMoveResult> {
    const refusal = this.refusal();
    if (refusal) return { ok: false, reason: refusal };
    if (this.engine.getPendingPromotion()) return { ok: false, reason: 'promotion_pending' };

    this.thinking = true;
    let result: MoveResult = { ok: false, reason: 'illegal_move' };
    try {
      const aiMove = await this.ai.getBestMove(this.engine.getPosition());
      if (aiMove) {
        result = this.engine.tryMakeMove(aiMove.move.from, aiMove.move.to);
        if (result.ok && result.promotionPending) {
          result = this.engine.completePromotion('q');
        }
      }
    } finally {
      this.thinking = false;
    }

    this.report(result, null);
    return result;
  }

  private refusal(): GameRefusal | null {
    if (this.engine.isGameOver()) return 'game_over';
    if (this.thinking) return 'ai_thinking';
    return null;
  }

  private report(result: MoveResult, to: Square | null): void {
    if (!result.ok) return;

    if (result.promotionPending) {
      if (to) this.emitEvent('promotionRequested', to, result.sideToMove);
      return;
    }
    if (result.notation !== null) this.emitEvent('moveExecuted', result.notation);
    this.announceTurn(result.sideToMove, result.check, result.outcome);
  }

  /**
   * turnChanged, then check for the side now to move, then gameOver
   */
  private announceTurn(color: Color, check: boolean, outcome: Outcome): void {
    this.emitEvent('turnChanged', color);
    if (check) this.emitEvent('check', color);
    if (outcome !== 'playing') this.emitEvent('gameOver', outcome);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  getState(): GameState {
    return this.engine.getState();
  }

  getEngine(): ChessEngine {
    return this.engine;
  }

  async dispose(): Promise<void> {
    this.removeAllListeners();
    await this.ai.terminate();
  }
}
