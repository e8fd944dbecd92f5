/**
 * Chess Domain Errors
 *
 * Thrown only for programmer errors such as a bad board size or an off-board square.
 * Rule violations and malformed input are reported through result objects.
 */

export enum ChessErrorCode {
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
  BOARD_INVALID_SQUARE = 'BOARD_INVALID_SQUARE',
  MOVE_EMPTY_SQUARE = 'MOVE_EMPTY_SQUARE',
  SETUP_FAILED = 'SETUP_FAILED',
}

/**
 * Base class for chess domain errors.
 */
export class ChessError extends Error {
  readonly code: ChessErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: ChessErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ChessError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, ChessError.prototype);
  }
}

export class InvalidBoardSizeError extends ChessError {
  constructor(size: number, min: number, max: number) {
    super(ChessErrorCode.BOARD_INVALID_SIZE, `Board size must be an integer in [${min}, ${max}], got ${size}`, {
      size,
      min,
      max,
    });
    this.name = 'InvalidBoardSizeError';
    Object.setPrototypeOf(this, InvalidBoardSizeError.prototype);
  }
}

export class InvalidSquareError extends ChessError {
  constructor(file: number, rank: number, size: number) {
    super(ChessErrorCode.BOARD_INVALID_SQUARE, `Square (${file}, ${rank}) is outside a ${size}x${size} board`, {
      file,
      rank,
      size,
    });
    this.name = 'InvalidSquareError';
    Object.setPrototypeOf(this, InvalidSquareError.prototype);
  }
}

export class EmptySquareError extends ChessError {
  constructor(file: number, rank: number) {
    super(ChessErrorCode.MOVE_EMPTY_SQUARE, `No piece on (${file}, ${rank}) to move`, { file, rank });
    this.name = 'EmptySquareError';
    Object.setPrototypeOf(this, EmptySquareError.prototype);
  }
}

export class SetupError extends ChessError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(ChessErrorCode.SETUP_FAILED, message, context);
    this.name = 'SetupError';
    Object.setPrototypeOf(this, SetupError.prototype);
  }
}
