import type { Piece, Player } from "../types.ts";
import type { Square } from "./coords.ts";
import { BOARD_SIZE, makeSquare, squareIndex } from "./coords.ts";
import { BACK_RANK, HOME_ROW, PAWN_START_ROW } from "./initialPosition.ts";

export interface CastlingFlags {
  kingMoved: boolean;
  kingSideRookMoved: boolean;
  queenSideRookMoved: boolean;
}

export interface Board {
  /** Row-major, `cells[r * 8 + c]`. */
  cells: Array<Piece | null>;
  toMove: Player;
  castling: Record<Player, CastlingFlags>;
  /** Landing square of an en passant capture; only set right after a double pawn push. */
  enPassantTarget: Square | null;
}

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

function freshCastlingFlags(): CastlingFlags {
  return { kingMoved: false, kingSideRookMoved: false, queenSideRookMoved: false };
}

export function createEmptyBoard(toMove: Player = "W"): Board {
  return {
    cells: new Array<Piece | null>(BOARD_SIZE * BOARD_SIZE).fill(null),
    toMove,
    castling: { W: freshCastlingFlags(), B: freshCastlingFlags() },
    enPassantTarget: null,
  };
}

export function createInitialBoard(): Board {
  const board = createEmptyBoard("W");
  for (const owner of ["W", "B"] as const) {
    BACK_RANK.forEach((rank, c) => setPieceAt(board, makeSquare(HOME_ROW[owner], c), { owner, rank }));
    for (let c = 0; c < BOARD_SIZE; c++) {
      setPieceAt(board, makeSquare(PAWN_START_ROW[owner], c), { owner, rank: "P" });
    }
  }
  return board;
}

// Pieces are immutable values, so copying the cell array is enough.
export function cloneBoard(board: Board): Board {
  return {
    cells: board.cells.slice(),
    toMove: board.toMove,
    castling: { W: { ...board.castling.W }, B: { ...board.castling.B } },
    enPassantTarget: board.enPassantTarget ? { ...board.enPassantTarget } : null,
  };
}

export function pieceAt(board: Board, sq: Square): Piece | null {
  return board.cells[squareIndex(sq)] ?? null;
}

export function setPieceAt(board: Board, sq: Square, piece: Piece | null): void {
  board.cells[squareIndex(sq)] = piece;
}

export function isEmptyAt(board: Board, sq: Square): boolean {
  return pieceAt(board, sq) === null;
}

export function findKingSquare(board: Board, player: Player): Square | null {
  for (let i = 0; i < board.cells.length; i++) {
    const p = board.cells[i];
    if (p && p.owner === player && p.rank === "K") return makeSquare(Math.floor(i / BOARD_SIZE), i % BOARD_SIZE);
  }
  return null;
}

export function squaresOf(board: Board, player: Player): Square[] {
  const out: Square[] = [];
  for (let i = 0; i < board.cells.length; i++) {
    if (board.cells[i]?.owner === player) out.push(makeSquare(Math.floor(i / BOARD_SIZE), i % BOARD_SIZE));
  }
  return out;
}
