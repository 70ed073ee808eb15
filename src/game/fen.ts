import type { Piece, Player, Rank } from "../types.ts";
import type { Board } from "./board.ts";
import { createEmptyBoard, pieceAt, setPieceAt } from "./board.ts";
import { BOARD_SIZE, makeSquare } from "./coords.ts";
import { parseA1, squareToA1 } from "./coordFormat.ts";
import { HOME_ROW, KING_SIDE_ROOK_COL, KING_START_COL, QUEEN_SIDE_ROOK_COL } from "./initialPosition.ts";
import type { CastlingSide } from "./movegen.ts";

const RANKS: readonly Rank[] = ["K", "Q", "R", "B", "N", "P"];

function pieceToFenChar(piece: Piece): string {
  return piece.owner === "W" ? piece.rank : piece.rank.toLowerCase();
}

function fenCharToPiece(ch: string): Piece | null {
  const upper = ch.toUpperCase();
  const rank = RANKS.find((r) => r === upper);
  if (!rank) return null;
  return { owner: ch === upper ? "W" : "B", rank };
}

const CASTLING_LETTERS: ReadonlyArray<{ letter: string; owner: Player; side: CastlingSide }> = [
  { letter: "K", owner: "W", side: "kingSide" },
  { letter: "Q", owner: "W", side: "queenSide" },
  { letter: "k", owner: "B", side: "kingSide" },
  { letter: "q", owner: "B", side: "queenSide" },
];

function isOwnPiece(board: Board, owner: Player, rank: Rank, r: number, c: number): boolean {
  const piece = pieceAt(board, makeSquare(r, c));
  return piece !== null && piece.owner === owner && piece.rank === rank;
}

// King and the rook on `side` both stand on their home squares.
function castlingPiecesHome(board: Board, owner: Player, side: CastlingSide): boolean {
  const row = HOME_ROW[owner];
  const rookCol = side === "kingSide" ? KING_SIDE_ROOK_COL : QUEEN_SIDE_ROOK_COL;
  return isOwnPiece(board, owner, "K", row, KING_START_COL) && isOwnPiece(board, owner, "R", row, rookCol);
}

function castlingField(board: Board): string {
  let s = "";
  for (const { letter, owner, side } of CASTLING_LETTERS) {
    const flags = board.castling[owner];
    const rookMoved = side === "kingSide" ? flags.kingSideRookMoved : flags.queenSideRookMoved;
    if (!flags.kingMoved && !rookMoved && castlingPiecesHome(board, owner, side)) s += letter;
  }
  return s.length > 0 ? s : "-";
}

function nonNegativeInt(n: number | undefined, fallback: number, min: number): number {
  return n !== undefined && Number.isFinite(n) ? Math.max(min, Math.round(n)) : fallback;
}

export function boardToFen(board: Board, opts?: { fullmove?: number; halfmove?: number }): string {
  const rows: string[] = [];

  for (let r = 0; r < BOARD_SIZE; r++) {
    let empties = 0;
    let row = "";
    for (let c = 0; c < BOARD_SIZE; c++) {
      const piece = pieceAt(board, makeSquare(r, c));
      if (!piece) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += pieceToFenChar(piece);
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }

  const side = board.toMove === "W" ? "w" : "b";
  const ep = board.enPassantTarget ? squareToA1(board.enPassantTarget) : "-";
  const halfmove = nonNegativeInt(opts?.halfmove, 0, 0);
  const fullmove = nonNegativeInt(opts?.fullmove, 1, 1);

  return `${rows.join("/")} ${side} ${castlingField(board)} ${ep} ${halfmove} ${fullmove}`;
}

/**
 * Builds a board from the first four FEN fields. Halfmove and fullmove
 * counters are accepted but not tracked.
 */
export function boardFromFen(fen: string): Board {
  const fields = fen.trim().split(/\s+/);
  if (fields.length < 4) throw new Error(`Invalid FEN: expected at least 4 fields, got ${fields.length}`);
  const [placement, side, castling, ep] = fields;

  if (side !== "w" && side !== "b") throw new Error(`Invalid FEN: bad side to move "${side}"`);
  const board = createEmptyBoard(side === "w" ? "W" : "B");

  const rows = placement.split("/");
  if (rows.length !== BOARD_SIZE) throw new Error(`Invalid FEN: expected ${BOARD_SIZE} rows, got ${rows.length}`);

  rows.forEach((row, r) => {
    let c = 0;
    for (const ch of row) {
      if (/[1-8]/.test(ch)) {
        c += Number(ch);
        continue;
      }
      const piece = fenCharToPiece(ch);
      if (!piece) throw new Error(`Invalid FEN: unknown piece "${ch}"`);
      if (c >= BOARD_SIZE) throw new Error(`Invalid FEN: row ${r + 1} is too long`);
      setPieceAt(board, makeSquare(r, c), piece);
      c++;
    }
    if (c !== BOARD_SIZE) throw new Error(`Invalid FEN: row ${r + 1} has ${c} squares`);
  });

  if (!/^(-|(?=.)K?Q?k?q?)$/.test(castling)) throw new Error(`Invalid FEN: bad castling field "${castling}"`);
  for (const { letter, owner, side } of CASTLING_LETTERS) {
    if (castling.includes(letter) && !castlingPiecesHome(board, owner, side)) {
      throw new Error(`Invalid FEN: castling right "${letter}" without king and rook on their home squares`);
    }
  }
  for (const owner of ["W", "B"] as const) {
    const ks = owner === "W" ? "K" : "k";
    const qs = owner === "W" ? "Q" : "q";
    const flags = board.castling[owner];
    flags.kingSideRookMoved = !castling.includes(ks);
    flags.queenSideRookMoved = !castling.includes(qs);
    flags.kingMoved = flags.kingSideRookMoved && flags.queenSideRookMoved;
  }

  if (ep !== "-") {
    const target = parseA1(ep);
    // The target is the square the double-pushed pawn skipped: rank 6 for White to move, rank 3 for Black.
    if (!target || target.r !== (side === "w" ? 2 : 5)) throw new Error(`Invalid FEN: bad en passant square "${ep}"`);
    board.enPassantTarget = target;
  }

  return board;
}
