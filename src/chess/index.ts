/**
 * Chess Module
 *
 * Rules engine for a two-player chess game:
 * - Piece and move-record model with algebraic notation
 * - Board with pseudo-legal generation and check-filtered legal moves
 * - Check, checkmate and stalemate queries
 * - Move application and undo, including castling, en passant and promotion
 *
 * @module chess
 */

// Core Engine
export {
  ChessBoard,
  BoardConfigSchema,
  createChessBoard,
  sortForDisplay,
} from './ChessBoard.js';

// Pieces and moves
export { Piece, opposite } from './Piece.js';
export { createMoveRecord, toAlgebraic } from './MoveRecord.js';
export type { MoveRecordFields } from './MoveRecord.js';

// Squares
export {
  square,
  isInBounds,
  assertSquare,
  sameSquare,
  squareIndex,
  toSquareName,
  parseSquare,
  toSquare,
  SquareSchema,
  SquareNameSchema,
} from './squares.js';

// Errors
export {
  ChessErrorCode,
  ChessRulesError,
  InvalidDestinationError,
  MissingPromotionChoiceError,
  InvalidPromotionChoiceError,
  PieceNotFoundError,
  SquareOutOfBoundsError,
  isChessRulesError,
} from './errors.js';
export type { ChessRulesErrorJSON } from './errors.js';

// Types
export type {
  Color,
  PieceKind,
  PromotionKind,
  FileLetter,
  RankDigit,
  SquareName,
  Square,
  MoveRecord,
  PieceMove,
  CapturedPieces,
  GameOutcome,
  PieceSnapshot,
  BoardSnapshot,
  BoardConfig,
} from './types.js';

// Constants
export {
  COLORS,
  PROMOTION_KINDS,
  BACK_RANK,
  PIECE_VALUES,
  PIECE_LETTERS,
  DISPLAY_ORDER,
  FILES,
  RANKS,
  DEFAULT_BOARD_CONFIG,
} from './types.js';
