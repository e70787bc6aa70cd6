/**
 * Square helpers - construction, bounds checks and a1-style naming.
 */

import { z } from 'zod';
import { SquareOutOfBoundsError } from './errors.js';
import { FILES, RANKS, type Square, type SquareName } from './types.js';

/** External square input, e.g. from a controller's click or key mapping */
export const SquareSchema = z.object({
  file: z.number().int().min(0).max(7),
  rank: z.number().int().min(0).max(7),
});

/** External square name input ("e4") */
export const SquareNameSchema = z
  .string()
  .regex(/^[a-h][1-8]$/, 'Expected a square name from a1 to h8');

export function square(file: number, rank: number): Square {
  return { file, rank };
}

export function isInBounds(file: number, rank: number): boolean {
  return Number.isInteger(file) && Number.isInteger(rank)
    && file >= 0 && file <= 7 && rank >= 0 && rank <= 7;
}

/**
 * Throw unless the square lies on the board
 */
export function assertSquare(sq: Square): void {
  if (!isInBounds(sq.file, sq.rank)) {
    throw new SquareOutOfBoundsError(sq);
  }
}

export function sameSquare(a: Square | null, b: Square | null): boolean {
  if (!a || !b) return false;
  return a.file === b.file && a.rank === b.rank;
}

/** Index into a 64-slot array, a1 = 0, h8 = 63 */
export function squareIndex(sq: Square): number {
  return sq.rank * 8 + sq.file;
}

/**
 * Convert coordinates to algebraic notation
 */
export function toSquareName(sq: Square): SquareName {
  assertSquare(sq);
  return `${FILES[sq.file]}${RANKS[sq.rank]}`;
}

/**
 * Convert algebraic notation to coordinates
 * @param name - Square name such as "e4"; anything else throws a ZodError
 */
export function parseSquare(name: string): Square {
  const parsed = SquareNameSchema.parse(name);
  return {
    file: parsed.charCodeAt(0) - 97,
    rank: parseInt(parsed[1], 10) - 1,
  };
}

/**
 * Validate an untyped square object and return it as a Square
 */
export function toSquare(input: unknown): Square {
  const { file, rank } = SquareSchema.parse(input);
  return { file, rank };
}
