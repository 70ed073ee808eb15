import { InvalidSquareError } from "./errors.ts";

export const BOARD_SIZE = 8;

export interface Square {
  readonly r: number;
  readonly c: number;
}

export function makeSquare(r: number, c: number): Square {
  return { r, c };
}

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

export function isValidSquare(sq: Square): boolean {
  return Number.isInteger(sq.r) && Number.isInteger(sq.c) && inBounds(sq.r, sq.c);
}

export function assertSquare(sq: Square): Square {
  if (!isValidSquare(sq)) throw new InvalidSquareError(sq);
  return sq;
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.r === b.r && a.c === b.c;
}

export function squareIndex(sq: Square): number {
  return sq.r * BOARD_SIZE + sq.c;
}
