import type { GameDriver } from "../driver/gameDriver.ts";
import type { GameStatus, Move, Square } from "../core/index.ts";
import { assertSquare, isTerminal, sameSquare } from "../core/index.ts";

export type ClickResult =
  | { kind: "moved"; move: Move; status: GameStatus }
  | { kind: "selected"; square: Square; targets: Square[] }
  | { kind: "cleared" }
  | { kind: "ignored" };

/**
 * Headless click flow for a board UI: the first click selects a piece of the
 * side to move, a click on one of its targets plays the move, anything else
 * clears the selection. Input is ignored once the game has ended.
 */
export class GameController {
  private driver: GameDriver;
  private selected: Square | null = null;
  private currentMoves: Move[] = [];
  private statusListeners: Array<(status: GameStatus) => void> = [];

  constructor(driver: GameDriver) {
    this.driver = driver;
  }

  onStatusChange(callback: (status: GameStatus) => void): () => void {
    this.statusListeners.push(callback);
    return () => {
      this.statusListeners = this.statusListeners.filter((cb) => cb !== callback);
    };
  }

  isOver(): boolean {
    return isTerminal(this.driver.getStatus());
  }

  getSelection(): Square | null {
    return this.selected;
  }

  getTargets(): Square[] {
    return this.currentMoves.map((m) => m.to);
  }

  clickSquare(square: Square): ClickResult {
    assertSquare(square);
    if (this.isOver()) return { kind: "ignored" };

    if (this.selected) {
      const move = this.currentMoves.find((m) => sameSquare(m.to, square));
      if (move) {
        const status = this.driver.applyMove(move);
        this.clearSelection();
        this.fireStatusChange(status);
        return { kind: "moved", move, status };
      }
    }

    const clicked = this.driver.pieceAt(square);
    if (clicked && clicked.owner === this.driver.getStatus().toMove) {
      this.selected = square;
      this.currentMoves = this.driver.legalMoves(square);
      return { kind: "selected", square, targets: this.getTargets() };
    }

    this.clearSelection();
    return { kind: "cleared" };
  }

  reset(): void {
    this.driver.reset();
    this.clearSelection();
    this.fireStatusChange(this.driver.getStatus());
  }

  private clearSelection(): void {
    this.selected = null;
    this.currentMoves = [];
  }

  private fireStatusChange(status: GameStatus): void {
    for (const cb of this.statusListeners) {
      try {
        cb(status);
      } catch (err) {
        // eslint-disable-next-line no-console
        console.error("[controller] status listener error", err);
      }
    }
  }
}
