import type { Player } from "../types.ts";
import type { Board } from "./board.ts";
import { isKingInCheck } from "./attacks.ts";
import { opponentOf } from "./board.ts";
import { hasAnyLegalMove } from "./legality.ts";

export type EvaluatedPhase = "ongoing" | "checkmate" | "stalemate";
export type GamePhase = "initial" | EvaluatedPhase;

export interface GameStatus {
  phase: GamePhase;
  toMove: Player;
  inCheck: boolean;
  /** Set only on checkmate. */
  winner: Player | null;
}

export function playerName(p: Player): string {
  return p === "W" ? "White" : "Black";
}

export function isTerminal(status: GameStatus): boolean {
  return status.phase === "checkmate" || status.phase === "stalemate";
}

/**
 * Classify the position for the side to move.
 * @param board - The position right after a move has been applied
 */
export function evaluateGameState(board: Board): GameStatus & { phase: EvaluatedPhase } {
  const toMove = board.toMove;
  const inCheck = isKingInCheck(board, toMove);

  if (hasAnyLegalMove(board, toMove)) {
    return { phase: "ongoing", toMove, inCheck, winner: null };
  }
  if (inCheck) {
    return { phase: "checkmate", toMove, inCheck, winner: opponentOf(toMove) };
  }
  return { phase: "stalemate", toMove, inCheck, winner: null };
}

export function describeStatus(status: GameStatus): string {
  const side = playerName(status.toMove);
  switch (status.phase) {
    case "checkmate":
      return `${side} is in checkmate. ${playerName(opponentOf(status.toMove))} wins!`;
    case "stalemate":
      return "Stalemate. Draw.";
    default:
      return `${side} to move${status.inCheck ? " (Check)" : ""}`;
  }
}
