import type { Player } from "../types.ts";
import type { Board } from "./board.ts";
import type { Square } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import { applyMoveInPlace } from "./applyMove.ts";
import { isKingInCheck } from "./attacks.ts";
import { cloneBoard, pieceAt, squaresOf } from "./board.ts";
import { generatePseudoLegalMoves } from "./movegen.ts";

export function isMoveLegal(board: Board, move: Move, player: Player): boolean {
  const next = cloneBoard(board);
  applyMoveInPlace(next, move);
  return !isKingInCheck(next, player);
}

/** Legal moves of the piece on `from`; pieces of the side not to move have none. */
export function generateLegalMoves(board: Board, from: Square): Move[] {
  const piece = pieceAt(board, from);
  if (!piece || piece.owner !== board.toMove) return [];
  return generatePseudoLegalMoves(board, from).filter((m) => isMoveLegal(board, m, piece.owner));
}

export function generateAllLegalMoves(board: Board): Move[] {
  return squaresOf(board, board.toMove).flatMap((sq) => generateLegalMoves(board, sq));
}

export function hasAnyLegalMove(board: Board, player: Player): boolean {
  for (const sq of squaresOf(board, player)) {
    for (const m of generatePseudoLegalMoves(board, sq)) {
      if (isMoveLegal(board, m, player)) return true;
    }
  }
  return false;
}
