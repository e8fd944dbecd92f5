/**
 * ChessSetup - starting layouts
 *
 * Two Lines (default), One Line (randomized back rank), Three Lines (dense,
 * pawns step up to three squares) and Custom (caller-placed, validated).
 */

import { Position, createPiece } from './ChessPosition.js';
import type { Color, PieceType, SetupMode } from './types.js';
import { MAX_BOARD_SIZE } from './types.js';

// =============================================================================
// Mode Metadata
// =============================================================================

export type GeneratedSetupMode = Exclude<SetupMode, 'custom'>;

export const SETUP_MODES: readonly SetupMode[] = ['two-lines', 'one-line', 'three-lines', 'custom'];

/** Smallest board each generated layout fits on */
export const SETUP_MIN_SIZE: Record<GeneratedSetupMode, number> = {
  'two-lines': 6,
  'one-line': 4,
  'three-lines': 8,
};

export const SETUP_MODE_NAMES: Record<SetupMode, string> = {
  'two-lines': 'Two Lines',
  'one-line': 'One Line',
  'three-lines': 'Three Lines',
  custom: 'Custom Setup',
};

export const SETUP_MODE_DESCRIPTIONS: Record<SetupMode, string> = {
  'two-lines': 'Two ranks of pieces with the king centered. Slower development.',
  'one-line': 'Randomized back rank shared by both sides. King between rooks, bishops on opposite colors.',
  'three-lines': 'Three ranks of pieces. Pawns may advance three squares on their first move.',
  custom: 'Pieces placed by hand.',
};

export function isSetupMode(value: string): value is SetupMode {
  return SETUP_MODES.some(m => m === value);
}

export type SetupResult = { success: true; position: Position } | { success: false; error: string };

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Build the starting position for a generated layout
 */
export function createSetup(mode: SetupMode, size: number, random: () => number = Math.random): SetupResult {
  if (mode === 'custom') {
    return { success: false, error: 'Custom setups are loaded from a placed position, not generated' };
  }
  const min = SETUP_MIN_SIZE[mode];
  if (!Number.isInteger(size) || size < min || size > MAX_BOARD_SIZE) {
    return { success: false, error: `${SETUP_MODE_NAMES[mode]} needs a board size in [${min}, ${MAX_BOARD_SIZE}], got ${size}` };
  }

  const position = new Position(size);
  position.setupMode = mode;

  switch (mode) {
    case 'two-lines':
      setupTwoLines(position, 'w');
      setupTwoLines(position, 'b');
      position.pawnFirstMoveDistance = 2;
      break;
    case 'one-line': {
      const pattern = generateOneLineBackRank(size, random);
      setupOneLine(position, 'w', pattern);
      setupOneLine(position, 'b', pattern);
      position.pawnFirstMoveDistance = 2;
      break;
    }
    case 'three-lines':
      setupThreeLines(position, 'w');
      setupThreeLines(position, 'b');
      position.pawnFirstMoveDistance = 3;
      break;
  }

  return { success: true, position };
}

/** Rank `offset` ranks in from this color's edge */
function homeRank(position: Position, color: Color, offset: number): number {
  return color === 'w' ? offset : position.size - 1 - offset;
}

function fillRank(position: Position, color: Color, rank: number, typeAt: (file: number) => PieceType): void {
  for (let file = 0; file < position.size; file++) {
    position.set({ file, rank }, createPiece(typeAt(file), color));
  }
}

// =============================================================================
// Two Lines
// =============================================================================

const TWO_LINES_OUTWARD: readonly PieceType[] = ['q', 'b', 'n', 'r'];
const TWO_LINES_SECOND_RANK: readonly PieceType[] = ['b', 'n', 'r', 'q', 'q', 'r', 'n', 'b'];

function setupTwoLines(position: Position, color: Color): void {
  const center = Math.floor(position.size / 2);
  const back = homeRank(position, color, 0);

  // King centered; Q B N R repeat symmetrically outward
  fillRank(position, color, back, file => {
    if (file === center) return 'k';
    return TWO_LINES_OUTWARD[(Math.abs(file - center) - 1) % TWO_LINES_OUTWARD.length];
  });
  fillRank(position, color, homeRank(position, color, 1), file => TWO_LINES_SECOND_RANK[file % TWO_LINES_SECOND_RANK.length]);
  fillRank(position, color, homeRank(position, color, 2), () => 'p');
}

// =============================================================================
// One Line
// =============================================================================

/**
 * Randomized back rank: bishops in pairs on opposite square colors, the king
 * strictly between two rooks, a few queens, knights elsewhere. Piece counts
 * grow with the board; 8 files give the usual 2R 2B 2N Q K.
 */
export function generateOneLineBackRank(size: number, random: () => number = Math.random): PieceType[] {
  const pick = (pool: number[]): number => {
    const idx = Math.min(pool.length - 1, Math.floor(random() * pool.length));
    const [value] = pool.splice(idx, 1);
    return value;
  };

  const pattern = new Array<PieceType>(size).fill('n');
  const rookCount = size >= 13 ? 4 : 2;
  const bishopPairs = Math.min(4, Math.floor((size - rookCount - 1) / 4));

  const light: number[] = [];
  const dark: number[] = [];
  for (let file = 0; file < size; file++) {
    (file % 2 === 0 ? light : dark).push(file);
  }
  for (let i = 0; i < bishopPairs; i++) {
    pattern[pick(light)] = 'b';
    pattern[pick(dark)] = 'b';
  }

  const available = [...light, ...dark].sort((a, b) => a - b);
  const kingAndRooks: number[] = [];
  for (let i = 0; i <= rookCount; i++) {
    kingAndRooks.push(pick(available));
  }
  kingAndRooks.sort((a, b) => a - b);

  // Never first or last, so a rook stands on each side
  const kingIdx = 1 + Math.min(kingAndRooks.length - 3, Math.floor(random() * (kingAndRooks.length - 2)));
  kingAndRooks.forEach((file, i) => {
    pattern[file] = i === kingIdx ? 'k' : 'r';
  });

  const queenCount = Math.min(3, Math.floor(available.length / 3));
  for (let i = 0; i < queenCount; i++) {
    pattern[pick(available)] = 'q';
  }

  return pattern;
}

function setupOneLine(position: Position, color: Color, pattern: PieceType[]): void {
  fillRank(position, color, homeRank(position, color, 0), file => pattern[file]);
  fillRank(position, color, homeRank(position, color, 1), () => 'p');
}

// =============================================================================
// Three Lines
// =============================================================================

const THREE_LINES_SECOND_RANK: readonly PieceType[] = ['q', 'b', 'n', 'r', 'b', 'n', 'q', 'r'];

function setupThreeLines(position: Position, color: Color): void {
  const center = Math.floor(position.size / 2);

  fillRank(position, color, homeRank(position, color, 0), file => {
    if (file === center) return 'k';
    return file % 3 === 1 ? 'q' : 'r';
  });
  fillRank(position, color, homeRank(position, color, 1), file => THREE_LINES_SECOND_RANK[file % THREE_LINES_SECOND_RANK.length]);
  fillRank(position, color, homeRank(position, color, 2), file => (file % 2 === 0 ? 'n' : 'b'));
  fillRank(position, color, homeRank(position, color, 3), () => 'p');
}

// =============================================================================
// Custom
// =============================================================================

/**
 * Validate a hand-placed position: one king per color, both sides present,
 * no pawn on the first or last rank.
 */
export function validateCustomSetup(position: Position): { success: true } | { success: false; error: string } {
  for (const color of ['w', 'b'] as const) {
    const name = color === 'w' ? 'White' : 'Black';
    const own = position.pieces(color);
    if (own.length === 0) {
      return { success: false, error: `${name} has no pieces` };
    }
    const kings = own.filter(p => p.piece.type === 'k').length;
    if (kings !== 1) {
      return { success: false, error: `${name} must have exactly one king, found ${kings}` };
    }
  }

  const lastRank = position.size - 1;
  const strayPawn = position
    .pieces()
    .find(p => p.piece.type === 'p' && (p.square.rank === 0 || p.square.rank === lastRank));
  if (strayPawn) {
    return { success: false, error: 'Pawns cannot stand on the first or last rank' };
  }

  return { success: true };
}

/**
 * Prepare a validated custom position for play
 */
export function prepareCustomSetup(position: Position, sideToMove: Color = 'w'): Position {
  const prepared = position.clone();
  prepared.setupMode = 'custom';
  prepared.pawnFirstMoveDistance = 2;
  prepared.sideToMove = sideToMove;
  prepared.enPassant = null;
  prepared.halfMoveClock = 0;
  prepared.fullMoveNumber = 1;
  prepared.plyCount = 0;
  return prepared;
}
