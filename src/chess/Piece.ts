/**
 * Piece - a chess piece with identity
 *
 * Two pieces of the same kind and color are never interchangeable: the board
 * keeps the same object through captures and undo, and move records refer to
 * pieces by reference. `kind`, `square` and `hasMoved` are read-only from
 * outside; only the board calls the `@internal` mutators.
 */

import { FILES, RANKS, type Color, type PieceKind, type Square } from './types.js';

/** Return the opposite color */
export function opposite(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

export class Piece {
  /** Unique within one board setup */
  readonly id: number;
  readonly color: Color;
  private currentKind: PieceKind;
  private currentSquare: Square;
  private moved: boolean;

  constructor(id: number, kind: PieceKind, color: Color, square: Square, hasMoved = false) {
    this.id = id;
    this.currentKind = kind;
    this.color = color;
    this.currentSquare = square;
    this.moved = hasMoved;
  }

  get kind(): PieceKind {
    return this.currentKind;
  }

  get square(): Square {
    return this.currentSquare;
  }

  get hasMoved(): boolean {
    return this.moved;
  }

  /** @internal Board use only: the board re-indexes occupancy around this */
  placeAt(sq: Square): void {
    this.currentSquare = sq;
  }

  /** @internal Board use only: promotion and its undo */
  setKind(kind: PieceKind): void {
    this.currentKind = kind;
  }

  /** @internal Board use only */
  setMoved(moved: boolean): void {
    this.moved = moved;
  }

  opposite(): Color {
    return opposite(this.color);
  }

  isPawn(): boolean {
    return this.kind === 'pawn';
  }

  isKing(): boolean {
    return this.kind === 'king';
  }

  isRook(): boolean {
    return this.kind === 'rook';
  }

  /** e.g. "white pawn at a2" */
  toString(): string {
    return `${this.color} ${this.kind} at ${FILES[this.square.file]}${RANKS[this.square.rank]}`;
  }
}
