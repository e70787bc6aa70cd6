import { describe, it, expect } from 'vitest';
import { Piece, opposite } from '../src/chess/Piece.js';
import { square } from '../src/chess/squares.js';

describe('Piece', () => {
  it('should start unmoved unless told otherwise', () => {
    expect(new Piece(1, 'rook', 'white', square(0, 0)).hasMoved).toBe(false);
    expect(new Piece(2, 'rook', 'white', square(7, 0), true).hasMoved).toBe(true);
  });

  it('should report its kind', () => {
    const pawn = new Piece(1, 'pawn', 'black', square(4, 6));
    const king = new Piece(2, 'king', 'black', square(3, 7));
    const rook = new Piece(3, 'rook', 'black', square(0, 7));

    expect([pawn.isPawn(), pawn.isKing(), pawn.isRook()]).toEqual([true, false, false]);
    expect([king.isPawn(), king.isKing(), king.isRook()]).toEqual([false, true, false]);
    expect([rook.isPawn(), rook.isKing(), rook.isRook()]).toEqual([false, false, true]);
  });

  it('should name the opposing color', () => {
    expect(opposite('white')).toBe('black');
    expect(opposite('black')).toBe('white');
    expect(new Piece(1, 'knight', 'black', square(1, 7)).opposite()).toBe('white');
  });

  it('should describe itself with its square name', () => {
    expect(String(new Piece(9, 'pawn', 'white', square(0, 1)))).toBe('white pawn at a2');
    expect(new Piece(4, 'king', 'black', square(3, 7)).toString()).toBe('black king at d8');
  });

  it('should expose kind, square and hasMoved without setters', () => {
    for (const name of ['kind', 'square', 'hasMoved']) {
      const descriptor = Object.getOwnPropertyDescriptor(Piece.prototype, name);
      expect(descriptor?.get).toBeTypeOf('function');
      expect(descriptor?.set).toBeUndefined();
    }
  });

  it('should change position state only through its mutators', () => {
    const pawn = new Piece(13, 'pawn', 'white', square(4, 1));
    pawn.placeAt(square(4, 3));
    pawn.setMoved(true);
    pawn.setKind('queen');

    expect(pawn.square).toEqual({ file: 4, rank: 3 });
    expect(pawn.hasMoved).toBe(true);
    expect(pawn.kind).toBe('queen');
    expect(pawn.toString()).toBe('white queen at e4');
  });

  it('should keep identity separate from kind and color', () => {
    const a = new Piece(1, 'pawn', 'white', square(0, 1));
    const b = new Piece(2, 'pawn', 'white', square(0, 1));
    expect(a).not.toBe(b);
    expect(a.id).not.toBe(b.id);
  });
});
