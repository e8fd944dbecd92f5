/**
 * Chess Module
 *
 * Chess variant rules on square boards from 3x3 to 99x99:
 * - Board model, move generation and legality
 * - Starting layouts (Two Lines, One Line, Three Lines, custom)
 * - Extended FEN and placement transcripts
 * - Negamax search with difficulty presets
 * - Turn controller with events
 *
 * @module chess
 */

// Board
export { Position, createPiece, pieceChar } from './ChessPosition.js';
export { fileLabel, parseFileLabel, squareName, parseSquare, buildMoveNotation } from './ChessNotation.js';
export type { NotationInput } from './ChessNotation.js';

// Rules
export {
  pseudoLegalMoves,
  castleOptions,
  isSquareAttacked,
  forwardDir,
  promotionRank,
} from './ChessPieces.js';
export type { CastleOption } from './ChessPieces.js';
export {
  isKingInCheck,
  legalMovesFrom,
  allLegalMoves,
  hasAnyLegalMove,
  isLegalMove,
  applyMove,
  advanceTurn,
  playMove,
  evaluateOutcome,
} from './ChessRules.js';

// Setup and codecs
export {
  SETUP_MODES,
  SETUP_MIN_SIZE,
  SETUP_MODE_NAMES,
  SETUP_MODE_DESCRIPTIONS,
  isSetupMode,
  createSetup,
  generateOneLineBackRank,
  validateCustomSetup,
} from './ChessSetup.js';
export type { GeneratedSetupMode, SetupResult } from './ChessSetup.js';
export { encodeFen, decodeFen } from './ChessFen.js';
export type { FenResult } from './ChessFen.js';
export { encodeTranscript, decodeTranscript, TranscriptRecordSchema } from './ChessTranscript.js';
export type { TranscriptRecord, TranscriptResult } from './ChessTranscript.js';

// Core Engine
export { ChessEngine, createChessEngine, createChessEngineFromFen, toPromotionType } from './ChessEngine.js';
export type { CapturedPieces } from './ChessEngine.js';

// Evaluation
export { ChessEvaluator, createChessEvaluator, quickEvaluate } from './ChessEvaluator.js';
export type { EvaluatorConfig } from './ChessEvaluator.js';

// Search
export { ChessSearch, createChessSearch, pickTiedMove, perft, divide } from './ChessSearch.js';

// AI Player
export { ChessAI, ChessAIMatch, DIFFICULTY_CONFIGS } from './ChessAI.js';
export type { MatchMoveRecord } from './ChessAI.js';

// Game controller
export { ChessGame } from './ChessGame.js';
export type { ChessGameEvents, GameRefusal, GameMoveResult } from './ChessGame.js';

// Errors
export {
  ChessError,
  ChessErrorCode,
  InvalidBoardSizeError,
  InvalidSquareError,
  EmptySquareError,
  SetupError,
} from './errors.js';

// Types
export type {
  Color,
  PieceType,
  PromotionType,
  Square,
  Move,
  SetupMode,
  Piece,
  PlacedPiece,
  Outcome,
  PendingPromotion,
  MoveFailureReason,
  MoveResult,
  LoadResult,
  AppliedMove,
  GameState,
  EvaluationBreakdown,
  SearchStats,
  SearchConfig,
  SearchResult,
  AIDifficulty,
  AIConfig,
  AIMove,
  PlayerKind,
  ChessEngineConfig,
  ChessGameConfig,
} from './types.js';

export {
  MIN_BOARD_SIZE,
  MAX_BOARD_SIZE,
  DEFAULT_BOARD_SIZE,
  FEN_DEFAULT_SIZE,
  HALF_MOVE_DRAW_LIMIT,
  MATE_SCORE,
  PIECE_VALUES,
  PIECE_LETTERS,
  DIFFICULTY_DEPTH,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_AI_CONFIG,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_GAME_CONFIG,
  opposite,
  sameSquare,
} from './types.js';
