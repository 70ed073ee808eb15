import type { Rank } from "../types.ts";
import type { Square } from "./coords.ts";
import { sameSquare } from "./coords.ts";

export interface Move {
  readonly from: Square;
  readonly to: Square;
  /** Rank the pawn becomes on the far row; the generator always offers a queen. */
  readonly promotion: Rank | null;
  readonly enPassant: boolean;
  /** King move of two files; the rook relocation is implied. */
  readonly castling: boolean;
}

export function sameMove(a: Move, b: Move): boolean {
  return (
    sameSquare(a.from, b.from) &&
    sameSquare(a.to, b.to) &&
    a.promotion === b.promotion &&
    a.enPassant === b.enPassant &&
    a.castling === b.castling
  );
}
