/**
 * Chess Module Type Definitions
 *
 * Shared types and constants for the board engine: colors, piece kinds,
 * coordinates, move records and board configuration.
 */

import type { Piece } from './Piece.js';

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'white' | 'black';

/** Chess piece kinds */
export type PieceKind = 'pawn' | 'knight' | 'bishop' | 'rook' | 'queen' | 'king';

/** Kinds a pawn may become on the last rank */
export type PromotionKind = 'queen' | 'rook' | 'bishop' | 'knight';

/** File letter */
export type FileLetter = 'a' | 'b' | 'c' | 'd' | 'e' | 'f' | 'g' | 'h';

/** Rank digit */
export type RankDigit = '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8';

/** Square notation (a1-h8) */
export type SquareName = `${FileLetter}${RankDigit}`;

/**
 * A board coordinate. File 0 is the a-file, rank 0 is White's back rank.
 * Both components are integers in 0..7.
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

// =============================================================================
// Move Representation
// =============================================================================

/**
 * Immutable record of an applied move. Records are the only source of undo
 * information, so everything needed to invert the move lives here.
 */
export interface MoveRecord {
  /** The piece that moved */
  readonly piece: Piece;
  /** Kind of the moving piece before the move (pawn for promotions) */
  readonly pieceKind: PieceKind;
  /** Color of the mover */
  readonly color: Color;
  readonly from: Square;
  readonly to: Square;
  /** Piece removed by this move, if any */
  readonly captured: Piece | null;
  /** Where the captured piece stood (behind `to` for en passant) */
  readonly capturedSquare: Square | null;
  readonly isCastling: boolean;
  readonly isEnPassant: boolean;
  readonly isPromotion: boolean;
  readonly promotionKind: PromotionKind | null;
  /** Rook relocated by castling */
  readonly castlingRook: Piece | null;
  readonly rookFrom: Square | null;
  readonly rookTo: Square | null;
  /** Algebraic notation ("e2e4", "Nb1xc3", "O-O", "e7e8=Q") */
  readonly notation: string;
}

/** A legal move of some piece, as enumerated for a whole side */
export interface PieceMove {
  piece: Piece;
  to: Square;
}

// =============================================================================
// Game State
// =============================================================================

/** Captured pieces, keyed by the capturing color */
export interface CapturedPieces {
  white: Piece[];  // Pieces captured BY white (black's pieces)
  black: Piece[];  // Pieces captured BY black (white's pieces)
}

/** End-of-game condition for the side to move */
export type GameOutcome = 'checkmate' | 'stalemate';

/** A piece as it appears in a snapshot */
export interface PieceSnapshot {
  id: number;
  kind: PieceKind;
  color: Color;
  square: SquareName;
  hasMoved: boolean;
}

/**
 * JSON-safe view of the board for a presentation layer.
 */
export interface BoardSnapshot {
  pieces: PieceSnapshot[];
  captured: {
    white: PieceSnapshot[];
    black: PieceSnapshot[];
  };
  /** Move history in algebraic notation */
  history: string[];
  enPassant: SquareName | null;
  inCheck: Record<Color, boolean>;
  ascii: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

/** Board configuration */
export interface BoardConfig {
  /** Emit debug log lines for applied and undone moves */
  verbose?: boolean;
  /**
   * Kind used when a pawn reaches the last rank without an explicit choice.
   * `null` makes such a call fail.
   */
  defaultPromotion?: PromotionKind | null;
}

// =============================================================================
// Constants
// =============================================================================

export const COLORS: readonly Color[] = ['white', 'black'];

/** Promotion choices in picker order */
export const PROMOTION_KINDS: readonly PromotionKind[] = ['queen', 'rook', 'bishop', 'knight'];

/**
 * Back rank from the a-file. The king stands on the d-file and the queen on
 * the e-file for both colors.
 */
export const BACK_RANK: readonly PieceKind[] = [
  'rook', 'knight', 'bishop', 'king', 'queen', 'bishop', 'knight', 'rook',
];

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceKind, number> = {
  pawn: 100,
  knight: 320,
  bishop: 330,
  rook: 500,
  queen: 900,
  king: 0,
};

/** Notation letters; pawns have none in move notation */
export const PIECE_LETTERS: Record<PieceKind, string> = {
  pawn: 'P',
  knight: 'N',
  bishop: 'B',
  rook: 'R',
  queen: 'Q',
  king: 'K',
};

/** Order in which captured pieces are listed for display */
export const DISPLAY_ORDER: readonly PieceKind[] = ['pawn', 'queen', 'king', 'knight', 'rook', 'bishop'];

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** Default board configuration */
export const DEFAULT_BOARD_CONFIG: Required<BoardConfig> = {
  verbose: false,
  defaultPromotion: null,
};
