/**
 * Shared helpers for board tests
 */

import { ChessBoard } from '../src/chess/ChessBoard.js';
import type { Piece } from '../src/chess/Piece.js';
import { parseSquare, toSquareName } from '../src/chess/squares.js';
import type { MoveRecord, PieceKind, Square } from '../src/chess/types.js';

/** Piece on a named square; throws when the square is empty */
export function at(board: ChessBoard, name: string): Piece {
  const piece = board.pieceAt(parseSquare(name));
  if (!piece) throw new Error(`No piece on ${name}`);
  return piece;
}

/** Apply a move given as square names, e.g. play(board, 'e2', 'e4') */
export function play(board: ChessBoard, from: string, to: string, promotion?: PieceKind): MoveRecord {
  return board.applyMove(at(board, from), parseSquare(to), promotion);
}

/** Apply a list of "e2-e4" style moves */
export function playAll(board: ChessBoard, moves: string[]): MoveRecord[] {
  return moves.map((m) => {
    const [from, to] = m.split('-');
    return play(board, from, to);
  });
}

/** Sorted square names */
export function names(squares: Square[]): string[] {
  return squares.map(toSquareName).sort();
}
