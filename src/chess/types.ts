/**
 * Chess Module Type Definitions
 *
 * Shared types for the variable-size chess engine: board geometry, pieces,
 * move results, search and AI configuration.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** Pieces a pawn may become */
export type PromotionType = 'q' | 'r' | 'b' | 'n';

/** Board coordinates, 0-indexed from white's queen-side corner */
export interface Square {
  file: number;
  rank: number;
}

/** A from/to pair */
export interface Move {
  from: Square;
  to: Square;
}

/** Starting layout family */
export type SetupMode = 'two-lines' | 'one-line' | 'three-lines' | 'custom';

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board. Its square is wherever the grid holds it. */
export interface Piece {
  type: PieceType;
  color: Color;
  /** Set once the piece leaves its starting square; gates castling and pawn double steps */
  hasMoved: boolean;
}

/** A piece together with the square it occupies */
export interface PlacedPiece {
  square: Square;
  piece: Piece;
}

// =============================================================================
// Game State
// =============================================================================

/** Terminal state of a game ('playing' while in progress) */
export type Outcome = 'playing' | 'white_wins' | 'black_wins' | 'stalemate' | 'draw_by_clock';

/** A pawn that reached the far rank and waits for a piece choice */
export interface PendingPromotion {
  from: Square;
  to: Square;
  pawn: Piece;
  captured: Piece | null;
}

/** Why a move request was refused */
export type MoveFailureReason = 'illegal_move' | 'promotion_pending' | 'no_promotion_pending';

/** Result of tryMakeMove / completePromotion */
export type MoveResult =
  | { ok: false; reason: MoveFailureReason }
  | {
      ok: true;
      /** Move text, null while a promotion is pending */
      notation: string | null;
      promotionPending: boolean;
      sideToMove: Color;
      /** Side to move is in check */
      check: boolean;
      outcome: Outcome;
      captured: PieceType | null;
    };

/** Result of a setup or import */
export type LoadResult = { success: true } | { success: false; error: string };

/** What applyMove did to the board */
export interface AppliedMove {
  piece: Piece;
  captured: Piece | null;
  enPassant: boolean;
  castle: 'king' | 'queen' | null;
  /** Pawn reached the far rank without a promotion piece */
  promotionPending: boolean;
  promotedTo: PromotionType | null;
}

/** Read-only view of an engine's game */
export interface GameState {
  size: number;
  fen: string;
  sideToMove: Color;
  isCheck: boolean;
  outcome: Outcome;
  isGameOver: boolean;
  pendingPromotion: PendingPromotion | null;
  halfMoveClock: number;
  fullMoveNumber: number;
  plyCount: number;
  setupMode: SetupMode;
  history: string[];
  ascii: string;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Position evaluation breakdown, white-positive centipawns */
export interface EvaluationBreakdown {
  material: number;
  positional: number;
  total: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** Search statistics */
export interface SearchStats {
  /** Total nodes searched */
  nodes: number;
  /** Beta cutoffs */
  betaCutoffs: number;
  /** Search time in milliseconds */
  time: number;
}

/** Chess search configuration */
export interface SearchConfig {
  /** Search depth in plies */
  maxDepth: number;
  /** Randomness source for root tie-breaks */
  random: () => number;
}

/** Search result */
export interface SearchResult {
  /** Chosen move, null when the side has no legal move */
  bestMove: Move | null;
  /** Score from the mover's point of view */
  score: number;
  /** Search depth completed */
  depth: number;
  /** Nodes searched */
  nodes: number;
  /** Search time in ms */
  time: number;
  /** Root moves sharing the best score; bestMove is one of them */
  tiedMoves: Move[];
}

// =============================================================================
// AI Types
// =============================================================================

/** AI difficulty levels */
export type AIDifficulty = 'easy' | 'medium' | 'hard';

/** AI configuration */
export interface AIConfig {
  /** Search depth */
  maxDepth: number;
  /** Probability of skipping search and playing a random legal move */
  randomMoveChance: number;
  /** Run the search in a worker thread when the compiled worker exists */
  useWorker: boolean;
  /** Worker watchdog in ms */
  workerTimeout: number;
}

/** AI move result */
export interface AIMove {
  move: Move;
  /** Score from the mover's point of view (0 for random moves) */
  evaluation: number;
  /** Whether the move came from search or the random-move roll */
  source: 'search' | 'random';
  searchInfo?: SearchResult;
}

/** Player kinds for the game controller */
export type PlayerKind = 'human' | 'ai';

// =============================================================================
// Configuration Types
// =============================================================================

/** Chess engine configuration */
export interface ChessEngineConfig {
  /** Board size for new games */
  size: number;
  /** Setup mode for new games */
  setupMode: SetupMode;
  /** Randomness source for randomized setups */
  random: () => number;
}

/** Game controller configuration */
export interface ChessGameConfig extends ChessEngineConfig {
  white: PlayerKind;
  black: PlayerKind;
  difficulty: AIDifficulty;
  ai: Partial<AIConfig>;
}

// =============================================================================
// Constants
// =============================================================================

export const MIN_BOARD_SIZE = 3;
export const MAX_BOARD_SIZE = 99;
export const DEFAULT_BOARD_SIZE = 26;
/** Size assumed by FEN strings without a size prefix */
export const FEN_DEFAULT_SIZE = 8;

/** Half-move clock value that ends the game as a draw */
export const HALF_MOVE_DRAW_LIMIT = 100;

/** Base mate score; the remaining depth is added so faster mates score higher */
export const MATE_SCORE = 100000;

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 20000,
};

/** Uppercase letters used in notation */
export const PIECE_LETTERS: Record<PieceType, string> = {
  p: 'P',
  n: 'N',
  b: 'B',
  r: 'R',
  q: 'Q',
  k: 'K',
};

/** Depth per difficulty; easy also plays a random move 30% of the time */
export const DIFFICULTY_DEPTH: Record<AIDifficulty, number> = {
  easy: 1,
  medium: 2,
  hard: 3,
};

/** Default search configuration */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxDepth: 2,
  random: Math.random,
};

/** Default AI configuration */
export const DEFAULT_AI_CONFIG: AIConfig = {
  maxDepth: 2,
  randomMoveChance: 0,
  useWorker: true,
  workerTimeout: 60000,
};

/** Default engine configuration */
export const DEFAULT_ENGINE_CONFIG: ChessEngineConfig = {
  size: DEFAULT_BOARD_SIZE,
  setupMode: 'two-lines',
  random: Math.random,
};

export const DEFAULT_GAME_CONFIG: ChessGameConfig = {
  ...DEFAULT_ENGINE_CONFIG,
  white: 'human',
  black: 'ai',
  difficulty: 'medium',
  ai: {},
};

/** Opponent of a color */
export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/** Square equality */
export function sameSquare(a: Square, b: Square): boolean {
  return a.file === b.file && a.rank === b.rank;
}
