import type { Board, GameStatus, Move, Piece, Square } from "../core/index.ts";

/**
 * In-process surface a board UI talks to. Every call runs to completion
 * synchronously; callers serialize access to a driver.
 */
export interface GameDriver {
  /** Legal moves of the piece on `square`, for highlighting destinations. */
  legalMoves(square: Square): Move[];

  /** Applies a move previously returned by `legalMoves` and classifies the new position. */
  applyMove(move: Move): GameStatus;

  pieceAt(square: Square): Piece | null;

  /** Standard start position, White to move, phase `initial`. */
  reset(): void;

  getStatus(): GameStatus;
  toFen(): string;
  /** A copy; mutating it does not affect the game. */
  getBoard(): Board;
}
