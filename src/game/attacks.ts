import type { Player, Rank } from "../types.ts";
import type { Board } from "./board.ts";
import type { Square } from "./coords.ts";
import { findKingSquare, opponentOf, pieceAt } from "./board.ts";
import { inBounds, makeSquare } from "./coords.ts";

export type Delta = { dr: number; dc: number };

export const ORTHOGONAL: readonly Delta[] = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
];

export const DIAGONAL: readonly Delta[] = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 1 },
];

export const KING_STEPS: readonly Delta[] = [...ORTHOGONAL, ...DIAGONAL];

export const KNIGHT_JUMPS: readonly Delta[] = [
  { dr: -2, dc: -1 },
  { dr: -2, dc: 1 },
  { dr: -1, dc: -2 },
  { dr: -1, dc: 2 },
  { dr: 1, dc: -2 },
  { dr: 1, dc: 2 },
  { dr: 2, dc: -1 },
  { dr: 2, dc: 1 },
];

/** Row direction a pawn of `player` advances in. White starts on rows 6/7 and moves toward row 0. */
export function pawnDir(player: Player): number {
  return player === "W" ? -1 : 1;
}

function hasPieceAt(board: Board, r: number, c: number, owner: Player, ranks: readonly Rank[]): boolean {
  if (!inBounds(r, c)) return false;
  const p = pieceAt(board, makeSquare(r, c));
  return Boolean(p && p.owner === owner && ranks.includes(p.rank));
}

function attackedAlongRays(board: Board, target: Square, byPlayer: Player, dirs: readonly Delta[], ranks: readonly Rank[]): boolean {
  for (const { dr, dc } of dirs) {
    let r = target.r + dr;
    let c = target.c + dc;
    while (inBounds(r, c)) {
      const p = pieceAt(board, makeSquare(r, c));
      if (p) {
        if (p.owner === byPlayer && ranks.includes(p.rank)) return true;
        break;
      }
      r += dr;
      c += dc;
    }
  }
  return false;
}

/**
 * Whether any piece of `byPlayer` could reach `square` in one step.
 * Pins and king safety are ignored; this never recurses into legality.
 */
export function isSquareAttacked(board: Board, square: Square, byPlayer: Player): boolean {
  const { r, c } = square;

  // A pawn attacks diagonally forward, so look one row behind the target.
  const pr = r - pawnDir(byPlayer);
  if (hasPieceAt(board, pr, c - 1, byPlayer, ["P"]) || hasPieceAt(board, pr, c + 1, byPlayer, ["P"])) return true;

  for (const { dr, dc } of KNIGHT_JUMPS) {
    if (hasPieceAt(board, r + dr, c + dc, byPlayer, ["N"])) return true;
  }

  for (const { dr, dc } of KING_STEPS) {
    if (hasPieceAt(board, r + dr, c + dc, byPlayer, ["K"])) return true;
  }

  if (attackedAlongRays(board, square, byPlayer, ORTHOGONAL, ["R", "Q"])) return true;
  return attackedAlongRays(board, square, byPlayer, DIAGONAL, ["B", "Q"]);
}

export function isKingInCheck(board: Board, player: Player): boolean {
  const kingSq = findKingSquare(board, player);
  // No king on the board: treat the side as permanently in check.
  if (!kingSq) return true;
  return isSquareAttacked(board, kingSq, opponentOf(player));
}
