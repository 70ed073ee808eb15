import type { Square } from "./coords.ts";
import { BOARD_SIZE, isValidSquare } from "./coords.ts";

const A1_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

// Rows are addressed top-to-bottom (r0 is Black's back rank). Ranks count bottom-to-top.
export function squareToA1(sq: Square): string {
  if (!isValidSquare(sq)) return `r${sq.r}c${sq.c}`;
  const file = String.fromCharCode("a".charCodeAt(0) + sq.c);
  return `${file}${BOARD_SIZE - sq.r}`;
}

export function parseA1(name: string): Square | null {
  const match = A1_RE.exec(name.trim().toLowerCase());
  if (!match || !match.groups) return null;

  const c = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const r = BOARD_SIZE - Number(match.groups.rank);
  return { r, c };
}

export function a1ToSquare(name: string): Square {
  const sq = parseA1(name);
  if (!sq) throw new Error(`Invalid algebraic square: ${name}`);
  return sq;
}
