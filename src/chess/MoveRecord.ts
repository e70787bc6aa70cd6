/**
 * Move records and their algebraic notation.
 */

import { FILES, PIECE_LETTERS, RANKS, type MoveRecord, type Square } from './types.js';

export type MoveRecordFields = Omit<MoveRecord, 'notation'>;

function squareText(sq: Square): string {
  return `${FILES[sq.file]}${RANKS[sq.rank]}`;
}

/**
 * Render a move in the engine's algebraic notation.
 *
 * Castling is `O-O` toward the h-file and `O-O-O` toward the a-file. Every
 * other move spells out both squares: `<letter><from><x?><to><=P?>`, with no
 * letter for pawns.
 */
export function toAlgebraic(move: MoveRecordFields): string {
  if (move.isCastling) {
    return move.to.file > move.from.file ? 'O-O' : 'O-O-O';
  }

  const letter = move.pieceKind === 'pawn' ? '' : PIECE_LETTERS[move.pieceKind];
  const capture = move.captured ? 'x' : '';
  const promotion = move.isPromotion && move.promotionKind
    ? `=${PIECE_LETTERS[move.promotionKind]}`
    : '';

  return `${letter}${squareText(move.from)}${capture}${squareText(move.to)}${promotion}`;
}

/**
 * Build a frozen move record with its notation filled in
 */
export function createMoveRecord(fields: MoveRecordFields): MoveRecord {
  return Object.freeze({ ...fields, notation: toAlgebraic(fields) });
}
