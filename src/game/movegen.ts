import type { Piece, Player, Rank } from "../types.ts";
import type { Board } from "./board.ts";
import type { Square } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import type { Delta } from "./attacks.ts";
import { DIAGONAL, KING_STEPS, KNIGHT_JUMPS, ORTHOGONAL, isSquareAttacked, pawnDir } from "./attacks.ts";
import { isEmptyAt, opponentOf, pieceAt } from "./board.ts";
import { inBounds, makeSquare, sameSquare } from "./coords.ts";
import {
  HOME_ROW,
  KING_SIDE_ROOK_COL,
  KING_START_COL,
  PAWN_START_ROW,
  PROMOTION_ROW,
  QUEEN_SIDE_ROOK_COL,
} from "./initialPosition.ts";

type PieceMoveGenerator = (board: Board, from: Square, piece: Piece) => Move[];

export type CastlingSide = "kingSide" | "queenSide";

/** The only promotion the engine offers. */
export const AUTO_PROMOTION: Rank = "Q";

function quiet(from: Square, to: Square): Move {
  return { from, to, promotion: null, enPassant: false, castling: false };
}

function canLandOn(board: Board, to: Square, player: Player): boolean {
  const top = pieceAt(board, to);
  return !top || top.owner !== player;
}

function generateSteps(board: Board, from: Square, player: Player, steps: readonly Delta[]): Move[] {
  const out: Move[] = [];
  for (const { dr, dc } of steps) {
    const r = from.r + dr;
    const c = from.c + dc;
    if (!inBounds(r, c)) continue;
    const to = makeSquare(r, c);
    if (canLandOn(board, to, player)) out.push(quiet(from, to));
  }
  return out;
}

function generateSlidingMoves(board: Board, from: Square, player: Player, dirs: readonly Delta[]): Move[] {
  const out: Move[] = [];

  for (const { dr, dc } of dirs) {
    let r = from.r + dr;
    let c = from.c + dc;
    while (inBounds(r, c)) {
      const to = makeSquare(r, c);
      const top = pieceAt(board, to);
      if (!top) {
        out.push(quiet(from, to));
      } else {
        if (top.owner !== player) out.push(quiet(from, to));
        break;
      }
      r += dr;
      c += dc;
    }
  }

  return out;
}

function pushPawnMove(out: Move[], from: Square, to: Square, player: Player): void {
  const promotion = to.r === PROMOTION_ROW[player] ? AUTO_PROMOTION : null;
  out.push({ from, to, promotion, enPassant: false, castling: false });
}

function generatePawnMoves(board: Board, from: Square, piece: Piece): Move[] {
  const player = piece.owner;
  const dr = pawnDir(player);
  const out: Move[] = [];

  // Forward 1, then forward 2 from the start row.
  const r1 = from.r + dr;
  if (inBounds(r1, from.c) && isEmptyAt(board, makeSquare(r1, from.c))) {
    pushPawnMove(out, from, makeSquare(r1, from.c), player);

    const r2 = from.r + 2 * dr;
    if (from.r === PAWN_START_ROW[player] && inBounds(r2, from.c) && isEmptyAt(board, makeSquare(r2, from.c))) {
      out.push(quiet(from, makeSquare(r2, from.c)));
    }
  }

  for (const dc of [-1, 1]) {
    const c = from.c + dc;
    if (!inBounds(r1, c)) continue;
    const to = makeSquare(r1, c);
    const top = pieceAt(board, to);
    if (top && top.owner !== player) {
      pushPawnMove(out, from, to, player);
      continue;
    }

    // En passant: the captured pawn sits beside us on our current row.
    const ep = board.enPassantTarget;
    if (!top && ep && sameSquare(ep, to)) {
      const passed = pieceAt(board, makeSquare(from.r, c));
      if (passed && passed.owner !== player && passed.rank === "P") {
        out.push({ from, to, promotion: null, enPassant: true, castling: false });
      }
    }
  }

  return out;
}

/**
 * Castling move for `player` on `side`, or null when any condition fails:
 * king and rook unmoved and at home, the squares between them empty, and the
 * king's start, transit and destination squares not attacked.
 */
export function castlingMove(board: Board, player: Player, side: CastlingSide): Move | null {
  const flags = board.castling[player];
  if (flags.kingMoved) return null;
  if (side === "kingSide" ? flags.kingSideRookMoved : flags.queenSideRookMoved) return null;

  const row = HOME_ROW[player];
  const kingFrom = makeSquare(row, KING_START_COL);
  const king = pieceAt(board, kingFrom);
  if (!king || king.owner !== player || king.rank !== "K") return null;

  const rookCol = side === "kingSide" ? KING_SIDE_ROOK_COL : QUEEN_SIDE_ROOK_COL;
  const rook = pieceAt(board, makeSquare(row, rookCol));
  if (!rook || rook.owner !== player || rook.rank !== "R") return null;

  const lo = Math.min(KING_START_COL, rookCol);
  const hi = Math.max(KING_START_COL, rookCol);
  for (let c = lo + 1; c < hi; c++) {
    if (!isEmptyAt(board, makeSquare(row, c))) return null;
  }

  const step = side === "kingSide" ? 1 : -1;
  const opp = opponentOf(player);
  for (const c of [KING_START_COL, KING_START_COL + step, KING_START_COL + 2 * step]) {
    if (isSquareAttacked(board, makeSquare(row, c), opp)) return null;
  }

  return { from: kingFrom, to: makeSquare(row, KING_START_COL + 2 * step), promotion: null, enPassant: false, castling: true };
}

function generateKingMoves(board: Board, from: Square, piece: Piece): Move[] {
  const out = generateSteps(board, from, piece.owner, KING_STEPS);
  for (const side of ["kingSide", "queenSide"] as const) {
    const m = castlingMove(board, piece.owner, side);
    if (m && sameSquare(m.from, from)) out.push(m);
  }
  return out;
}

const GENERATORS: Record<Rank, PieceMoveGenerator> = {
  P: generatePawnMoves,
  N: (board, from, piece) => generateSteps(board, from, piece.owner, KNIGHT_JUMPS),
  B: (board, from, piece) => generateSlidingMoves(board, from, piece.owner, DIAGONAL),
  R: (board, from, piece) => generateSlidingMoves(board, from, piece.owner, ORTHOGONAL),
  Q: (board, from, piece) => generateSlidingMoves(board, from, piece.owner, KING_STEPS),
  K: generateKingMoves,
};

/**
 * Moves that respect the piece's pattern and board occupancy but may leave
 * the mover's own king attacked. An empty square yields no moves.
 */
export function generatePseudoLegalMoves(board: Board, from: Square): Move[] {
  const piece = pieceAt(board, from);
  if (!piece) return [];
  return GENERATORS[piece.rank](board, from, piece);
}
