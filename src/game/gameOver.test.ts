import { describe, it, expect } from "vitest";
import { describeStatus, evaluateGameState } from "./gameOver.ts";
import { applyMoveInPlace } from "./applyMove.ts";
import { createInitialBoard } from "./board.ts";
import { a1ToSquare, squareToA1 } from "./coordFormat.ts";
import { boardFromFen } from "./fen.ts";
import { generateLegalMoves } from "./legality.ts";
import type { Board } from "./board.ts";

function play(board: Board, from: string, to: string): void {
  const m = generateLegalMoves(board, a1ToSquare(from)).find((x) => squareToA1(x.to) === to);
  if (!m) throw new Error(`no legal move ${from}-${to}`);
  applyMoveInPlace(board, m);
}

describe("evaluateGameState", () => {
  it("is ongoing without check at the start", () => {
    expect(evaluateGameState(createInitialBoard())).toEqual({ phase: "ongoing", toMove: "W", inCheck: false, winner: null });
  });

  it("flags check while the game goes on", () => {
    const b = createInitialBoard();
    play(b, "e2", "e4");
    play(b, "f7", "f6");
    play(b, "d1", "h5");
    expect(evaluateGameState(b)).toEqual({ phase: "ongoing", toMove: "B", inCheck: true, winner: null });
  });

  it("detects fool's mate", () => {
    const b = createInitialBoard();
    play(b, "f2", "f3");
    play(b, "e7", "e5");
    play(b, "g2", "g4");
    play(b, "d8", "h4");
    expect(evaluateGameState(b)).toEqual({ phase: "checkmate", toMove: "W", inCheck: true, winner: "B" });
  });

  it("detects a back-rank mate", () => {
    const b = boardFromFen("6k1/5ppp/8/8/8/8/8/4R1K1 w - - 0 1");
    play(b, "e1", "e8");
    expect(evaluateGameState(b)).toEqual({ phase: "checkmate", toMove: "B", inCheck: true, winner: "W" });
  });

  it("detects stalemate", () => {
    const b = boardFromFen("7k/5Q2/6K1/8/8/8/8/8 b - - 0 1");
    expect(evaluateGameState(b)).toEqual({ phase: "stalemate", toMove: "B", inCheck: false, winner: null });
  });

  it("treats a side without a king as checkmated", () => {
    const b = boardFromFen("8/8/8/8/8/8/p7/4K3 b - - 0 1");
    expect(evaluateGameState(b)).toEqual({ phase: "checkmate", toMove: "B", inCheck: true, winner: "W" });
  });
});

describe("describeStatus", () => {
  it("renders each phase", () => {
    expect(describeStatus({ phase: "initial", toMove: "W", inCheck: false, winner: null })).toBe("White to move");
    expect(describeStatus({ phase: "ongoing", toMove: "B", inCheck: true, winner: null })).toBe("Black to move (Check)");
    expect(describeStatus({ phase: "checkmate", toMove: "W", inCheck: true, winner: "B" })).toBe(
      "White is in checkmate. Black wins!",
    );
    expect(describeStatus({ phase: "stalemate", toMove: "B", inCheck: false, winner: null })).toBe("Stalemate. Draw.");
  });
});
