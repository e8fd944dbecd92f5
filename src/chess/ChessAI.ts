/**
 * ChessAI - AI Player Orchestration
 *
 * Wraps the search with:
 * - Difficulty presets (depth 1/2/3; Easy sometimes plays a random move)
 * - A worker thread for the search, with a main-thread fallback
 * - AI vs AI matches over a ChessEngine
 */

import { Worker } from 'worker_threads';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { loadRuntimeConfig } from '../config.js';
import { ChessEngine } from './ChessEngine.js';
import { ChessEvaluator } from './ChessEvaluator.js';
import type { Position } from './ChessPosition.js';
import { allLegalMoves } from './ChessRules.js';
import { ChessSearch } from './ChessSearch.js';
import type { AIConfig, AIDifficulty, AIMove, ChessEngineConfig, Color, GameState, Outcome, SearchResult } from './types.js';
import { DEFAULT_AI_CONFIG, DIFFICULTY_DEPTH } from './types.js';
import { WorkerResponseSchema, toSearchResult, toSnapshot } from './workers/protocol.js';
import type { SearchRequest } from './workers/protocol.js';

// Get directory for worker resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// =============================================================================
// Difficulty Presets
// =============================================================================

export const DIFFICULTY_CONFIGS: Record<AIDifficulty, Partial<AIConfig>> = {
  easy: {
    maxDepth: DIFFICULTY_DEPTH.easy,
    randomMoveChance: 0.3,
  },
  medium: {
    maxDepth: DIFFICULTY_DEPTH.medium,
    randomMoveChance: 0,
  },
  hard: {
    maxDepth: DIFFICULTY_DEPTH.hard,
    randomMoveChance: 0,
  },
};

// =============================================================================
// ChessAI Class
// =============================================================================

export class ChessAI {
  private config: AIConfig;
  private search: ChessSearch;
  private random: () => number;
  private worker: Worker | null = null;
  /** Set once the compiled worker is found missing or fails to start */
  private workerUnavailable = false;

  constructor(config?: Partial<AIConfig>, random: () => number = Math.random) {
    this.config = { ...DEFAULT_AI_CONFIG, useWorker: loadRuntimeConfig().useWorker, ...config };
    this.random = random;
    this.search = new ChessSearch(new ChessEvaluator(), { maxDepth: this.config.maxDepth, random });
  }

  /**
   * Build an AI with a difficulty preset
   */
  static forDifficulty(difficulty: AIDifficulty, config?: Partial<AIConfig>, random?: () => number): ChessAI {
    return new ChessAI({ ...DIFFICULTY_CONFIGS[difficulty], ...config }, random);
  }

  /**
   * Switch difficulty preset
   */
  setDifficulty(difficulty: AIDifficulty): void {
    this.config = { ...this.config, ...DIFFICULTY_CONFIGS[difficulty] };
    this.search.setConfig({ maxDepth: this.config.maxDepth });
  }

  getConfig(): AIConfig {
    return { ...this.config };
  }

  // ===========================================================================
  // Move Selection
  // ===========================================================================

  /**
   * Pick a move for `color` (default: the side to move). Resolves to null
   * when that side has no legal move. The position is not modified.
   * A `difficulty` applies its preset to this call only.
   */
  async getBestMove(
    position: Position,
    color: Color = position.sideToMove,
    difficulty?: AIDifficulty
  ): Promise<AIMove | null> {
    const settings: AIConfig = difficulty ? { ...this.config, ...DIFFICULTY_CONFIGS[difficulty] } : this.config;
    const root = position.clone();
    if (root.sideToMove !== color) {
      root.sideToMove = color;
      root.enPassant = null;
    }

    const legalMoves = allLegalMoves(root, color);
    if (legalMoves.length === 0) return null;

    if (settings.randomMoveChance > 0 && this.random() < settings.randomMoveChance) {
      const idx = Math.min(legalMoves.length - 1, Math.floor(this.random() * legalMoves.length));
      return { move: legalMoves[idx], evaluation: 0, source: 'random' };
    }

    if (this.config.useWorker && !this.workerUnavailable) {
      try {
        return await this.runWorkerSearch(root, settings.maxDepth);
      } catch (error) {
        console.error('Worker search failed, falling back to main thread:', error);
      }
    }
    return this.runMainThreadSearch(root, settings.maxDepth);
  }

  private toAIMove(result: SearchResult): AIMove | null {
    if (!result.bestMove) return null;
    return { move: result.bestMove, evaluation: result.score, source: 'search', searchInfo: result };
  }

  /**
   * Run search in main thread (fallback)
   */
  private runMainThreadSearch(position: Position, depth: number): AIMove | null {
    return this.toAIMove(this.search.search(position, depth));
  }

  // ===========================================================================
  // Worker Management
  // ===========================================================================

  /**
   * Get or create worker instance; null when the compiled worker is absent
   * (running from TypeScript sources)
   */
  private getWorker(): Worker | null {
    if (this.worker) return this.worker;

    const workerPath = path.join(__dirname, 'workers', 'ai.worker.js');
    if (!existsSync(workerPath)) {
      this.workerUnavailable = true;
      return null;
    }

    const worker = new Worker(workerPath);
    // The pending search's watchdog keeps the process alive, not the worker
    worker.unref();

    worker.on('error', err => {
      console.error('Chess AI Worker Error:', err);
      if (this.worker === worker) this.worker = null;
    });
    worker.on('exit', code => {
      if (code !== 0) {
        console.error(`Chess AI Worker stopped with exit code ${code}`);
      }
      if (this.worker === worker) this.worker = null;
    });

    this.worker = worker;
    return worker;
  }

  /**
   * Run search in worker thread
   */
  private runWorkerSearch(position: Position, depth: number): Promise<AIMove | null> {
    const worker = this.getWorker();
    if (!worker) return Promise.resolve(this.runMainThreadSearch(position, depth));

    return new Promise((resolve, reject) => {
      const handleMessage = (raw: unknown) => {
        const parsed = WorkerResponseSchema.safeParse(raw);
        cleanup();
        if (!parsed.success) {
          reject(new Error(`Malformed worker response: ${parsed.error.message}`));
          return;
        }
        const msg = parsed.data;
        if (msg.type === 'ERROR') {
          reject(new Error(msg.error));
          return;
        }
        resolve(this.toAIMove(toSearchResult(msg, this.random)));
      };

      const handleError = (err: Error) => {
        cleanup();
        reject(err);
      };

      const cleanup = () => {
        worker.off('message', handleMessage);
        worker.off('error', handleError);
        clearTimeout(timeoutId);
      };

      // Timeout watchdog
      const timeoutId = setTimeout(() => {
        cleanup();
        this.terminate().catch(err => console.error('Failed to stop Chess AI Worker:', err));
        reject(new Error('AI search timed out'));
      }, this.config.workerTimeout);

      worker.on('message', handleMessage);
      worker.on('error', handleError);

      const request: SearchRequest = {
        type: 'SEARCH',
        position: toSnapshot(position),
        depth,
      };
      worker.postMessage(request);
    });
  }

  /**
   * Stop the worker thread, if one is running
   */
  async terminate(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (worker) await worker.terminate();
  }
}

// =============================================================================
// AI vs AI Match
// =============================================================================

export interface MatchMoveRecord {
  notation: string;
  evaluation: number;
  time: number;
}

export class ChessAIMatch {
  private engine: ChessEngine;
  private whiteAI: ChessAI;
  private blackAI: ChessAI;
  private moveHistory: MatchMoveRecord[] = [];
  private onMove?: (state: GameState, aiMove: AIMove) => void;
  private onGameEnd?: (outcome: Outcome) => void;

  constructor(whiteAI: ChessAI, blackAI: ChessAI, engineConfig?: Partial<ChessEngineConfig>) {
    this.engine = new ChessEngine(engineConfig);
    this.whiteAI = whiteAI;
    this.blackAI = blackAI;
  }

  /**
   * Set move callback
   */
  onMoveCallback(callback: (state: GameState, aiMove: AIMove) => void): void {
    this.onMove = callback;
  }

  /**
   * Set game end callback
   */
  onGameEndCallback(callback: (outcome: Outcome) => void): void {
    this.onGameEnd = callback;
  }

  getEngine(): ChessEngine {
    return this.engine;
  }

  /**
   * Play a single move; null once the game is over
   */
  async playMove(): Promise<AIMove | null> {
    if (this.engine.isGameOver()) return null;

    const startTime = Date.now();
    const ai = this.engine.turn() === 'w' ? this.whiteAI : this.blackAI;
    const aiMove = await ai.getBestMove(this.engine.getPosition());
    if (!aiMove) return null;

    let result = this.engine.tryMakeMove(aiMove.move.from, aiMove.move.to);
    if (result.ok && result.promotionPending) {
      result = this.engine.completePromotion('q');
    }
    if (!result.ok || result.notation === null) {
      throw new Error(`AI produced a move the engine refused: ${result.ok ? 'no notation' : result.reason}`);
    }

    this.moveHistory.push({ notation: result.notation, evaluation: aiMove.evaluation, time: Date.now() - startTime });
    this.onMove?.(this.engine.getState(), aiMove);

    if (this.engine.isGameOver()) {
      this.onGameEnd?.(this.engine.getOutcome());
    }
    return aiMove;
  }

  /**
   * Play until the game ends or `maxPlies` moves were made
   */
  async playGame(maxPlies: number = 200): Promise<{ outcome: Outcome; plies: number; moveHistory: MatchMoveRecord[] }> {
    let plies = 0;
    while (!this.engine.isGameOver() && plies < maxPlies) {
      const move = await this.playMove();
      if (!move) break;
      plies++;
    }
    return { outcome: this.engine.getOutcome(), plies, moveHistory: [...this.moveHistory] };
  }

  async dispose(): Promise<void> {
    await Promise.all([this.whiteAI.terminate(), this.blackAI.terminate()]);
  }
}
