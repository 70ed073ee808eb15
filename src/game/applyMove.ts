import type { Player } from "../types.ts";
import type { Board } from "./board.ts";
import type { Square } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import { opponentOf, pieceAt, setPieceAt } from "./board.ts";
import { makeSquare } from "./coords.ts";
import { squareToA1 } from "./coordFormat.ts";
import { HOME_ROW, KING_SIDE_ROOK_COL, KING_START_COL, PROMOTION_ROW, QUEEN_SIDE_ROOK_COL } from "./initialPosition.ts";
import { AUTO_PROMOTION } from "./movegen.ts";

function revokeRookAt(board: Board, owner: Player, sq: Square): void {
  if (sq.r !== HOME_ROW[owner]) return;
  if (sq.c === KING_SIDE_ROOK_COL) board.castling[owner].kingSideRookMoved = true;
  if (sq.c === QUEEN_SIDE_ROOK_COL) board.castling[owner].queenSideRookMoved = true;
}

function relocateCastlingRook(board: Board, owner: Player, kingTo: Square): void {
  const kingSide = kingTo.c > KING_START_COL;
  const rookFrom = makeSquare(kingTo.r, kingSide ? KING_SIDE_ROOK_COL : QUEEN_SIDE_ROOK_COL);
  const rookTo = makeSquare(kingTo.r, kingSide ? kingTo.c - 1 : kingTo.c + 1);

  const rook = pieceAt(board, rookFrom);
  if (rook) {
    setPieceAt(board, rookTo, rook);
    setPieceAt(board, rookFrom, null);
  }
  if (kingSide) board.castling[owner].kingSideRookMoved = true;
  else board.castling[owner].queenSideRookMoved = true;
}

/**
 * Applies `move` to `board` in place: captures (including en passant),
 * promotion, castling rook relocation, castling flags, the en passant target
 * and the side to move.
 *
 * Live games and legality simulation both go through this routine; the latter
 * runs it on a clone.
 */
export function applyMoveInPlace(board: Board, move: Move): void {
  const moving = pieceAt(board, move.from);
  if (!moving) throw new Error(`applyMoveInPlace: no piece at ${squareToA1(move.from)}`);

  const target = pieceAt(board, move.to);
  if (target && target.rank === "R" && target.owner !== moving.owner) revokeRookAt(board, target.owner, move.to);

  setPieceAt(board, move.from, null);

  if (move.enPassant && moving.rank === "P") {
    setPieceAt(board, move.to, moving);
    setPieceAt(board, makeSquare(move.from.r, move.to.c), null);
  } else if (moving.rank === "P" && move.to.r === PROMOTION_ROW[moving.owner]) {
    setPieceAt(board, move.to, { owner: moving.owner, rank: move.promotion ?? AUTO_PROMOTION });
  } else {
    setPieceAt(board, move.to, moving);
  }

  if (moving.rank === "K") {
    board.castling[moving.owner].kingMoved = true;
    if (move.castling) relocateCastlingRook(board, moving.owner, move.to);
  }

  if (moving.rank === "R") revokeRookAt(board, moving.owner, move.from);

  const isDoublePush = moving.rank === "P" && Math.abs(move.to.r - move.from.r) === 2;
  board.enPassantTarget = isDoublePush ? makeSquare((move.from.r + move.to.r) / 2, move.from.c) : null;

  board.toMove = opponentOf(board.toMove);
}
