import { describe, it, expect } from "vitest";
import { isKingInCheck, isSquareAttacked } from "./attacks.ts";
import { createInitialBoard } from "./board.ts";
import { a1ToSquare } from "./coordFormat.ts";
import { boardFromFen } from "./fen.ts";

const sq = a1ToSquare;

describe("isSquareAttacked", () => {
  it("start position", () => {
    const b = createInitialBoard();
    expect(isSquareAttacked(b, sq("f3"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("e4"), "W")).toBe(false);
    expect(isSquareAttacked(b, sq("e6"), "B")).toBe(true);
    expect(isSquareAttacked(b, sq("e5"), "B")).toBe(false);
  });

  it("pawns attack diagonally forward only", () => {
    const b = boardFromFen("4k3/8/8/8/4P3/8/8/4K3 w - - 0 1");
    expect(isSquareAttacked(b, sq("d5"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("f5"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("e5"), "W")).toBe(false);
    expect(isSquareAttacked(b, sq("d3"), "W")).toBe(false);
  });

  it("rays stop at the first occupied square", () => {
    const b = boardFromFen("4k3/8/8/8/R2p4/8/8/4K3 w - - 0 1");
    expect(isSquareAttacked(b, sq("c4"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("d4"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("e4"), "W")).toBe(false);
  });

  it("matches piece type to direction", () => {
    const b = boardFromFen("4k3/8/8/8/3B4/8/8/Q3K3 w - - 0 1");
    // The bishop on d4 covers h8 and shields it from the queen; it does not attack along the file.
    expect(isSquareAttacked(b, sq("h8"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("d8"), "W")).toBe(false);
    expect(isSquareAttacked(b, sq("a8"), "W")).toBe(true);
  });

  it("knights and kings", () => {
    const b = boardFromFen("4k3/8/8/8/8/8/8/1N2K3 w - - 0 1");
    expect(isSquareAttacked(b, sq("c3"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("d2"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("b3"), "W")).toBe(false);
    expect(isSquareAttacked(b, sq("f2"), "W")).toBe(true);
    expect(isSquareAttacked(b, sq("e3"), "W")).toBe(false);
  });
});

describe("isKingInCheck", () => {
  it("detects check from a distant slider", () => {
    const b = boardFromFen("4k3/8/8/8/1b6/8/8/4K3 w - - 0 1");
    expect(isKingInCheck(b, "W")).toBe(true);
    expect(isKingInCheck(b, "B")).toBe(false);
  });

  it("treats a side without a king as in check", () => {
    const b = boardFromFen("8/8/8/8/8/8/8/4K3 w - - 0 1");
    expect(isKingInCheck(b, "B")).toBe(true);
    expect(isKingInCheck(b, "W")).toBe(false);
  });
});
