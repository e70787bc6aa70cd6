/**
 * Chess Rules Errors - structured error types for the board engine
 *
 * Every failure the engine raises is a {@link ChessRulesError} carrying a
 * code for programmatic handling and a context object for debugging. Errors
 * are thrown before any board state is touched, so a failed call leaves the
 * position exactly as it was.
 *
 * Error Categories:
 * - **MOVE_***: the caller asked for a move the rules do not allow
 * - **STATE_***: the caller referred to a piece the board does not hold
 * - **BOARD_***: the caller passed a square off the board
 *
 * @module errors
 */

import type { PieceKind, Square } from './types.js';

// =============================================================================
// Error Codes
// =============================================================================

export enum ChessErrorCode {
  /** Destination is not among the piece's legal moves */
  MOVE_INVALID_DESTINATION = 'MOVE_INVALID_DESTINATION',
  /** A pawn reached the last rank and no promotion kind was given */
  MOVE_PROMOTION_REQUIRED = 'MOVE_PROMOTION_REQUIRED',
  /** Promotion kind is not queen, rook, bishop or knight */
  MOVE_INVALID_PROMOTION = 'MOVE_INVALID_PROMOTION',
  /** Piece is not in the board's live set */
  STATE_PIECE_NOT_FOUND = 'STATE_PIECE_NOT_FOUND',
  /** Square lies outside the 8x8 board */
  BOARD_INVALID_SQUARE = 'BOARD_INVALID_SQUARE',
}

// =============================================================================
// Base Error Class
// =============================================================================

export class ChessRulesError extends Error {
  /** Error code for programmatic handling */
  readonly code: ChessErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  constructor(code: ChessErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ChessRulesError';
    this.code = code;
    this.context = context;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): ChessRulesErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export interface ChessRulesErrorJSON {
  error: true;
  type: string;
  code: ChessErrorCode;
  message: string;
  context: Record<string, unknown>;
}

// =============================================================================
// Specific Error Classes
// =============================================================================

export class InvalidDestinationError extends ChessRulesError {
  constructor(pieceLabel: string, to: Square) {
    super(
      ChessErrorCode.MOVE_INVALID_DESTINATION,
      `Illegal destination (${to.file}, ${to.rank}) for ${pieceLabel}`,
      { piece: pieceLabel, to: { file: to.file, rank: to.rank } },
    );
    this.name = 'InvalidDestinationError';
  }
}

export class MissingPromotionChoiceError extends ChessRulesError {
  constructor(pieceLabel: string, to: Square) {
    super(
      ChessErrorCode.MOVE_PROMOTION_REQUIRED,
      `A promotion kind is required for ${pieceLabel} moving to (${to.file}, ${to.rank})`,
      { piece: pieceLabel, to: { file: to.file, rank: to.rank } },
    );
    this.name = 'MissingPromotionChoiceError';
  }
}

export class InvalidPromotionChoiceError extends ChessRulesError {
  constructor(kind: PieceKind) {
    super(
      ChessErrorCode.MOVE_INVALID_PROMOTION,
      `Cannot promote to ${kind}`,
      { kind },
    );
    this.name = 'InvalidPromotionChoiceError';
  }
}

export class PieceNotFoundError extends ChessRulesError {
  constructor(pieceLabel: string) {
    super(
      ChessErrorCode.STATE_PIECE_NOT_FOUND,
      `Piece is not on the board: ${pieceLabel}`,
      { piece: pieceLabel },
    );
    this.name = 'PieceNotFoundError';
  }
}

export class SquareOutOfBoundsError extends ChessRulesError {
  constructor(sq: Square) {
    super(
      ChessErrorCode.BOARD_INVALID_SQUARE,
      `Square (${sq.file}, ${sq.rank}) is off the board`,
      { file: sq.file, rank: sq.rank },
    );
    this.name = 'SquareOutOfBoundsError';
  }
}

/**
 * Type guard for errors raised by the engine
 */
export function isChessRulesError(error: unknown): error is ChessRulesError {
  return error instanceof ChessRulesError;
}
