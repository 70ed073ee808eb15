import { describe, it, expect, vi, afterEach } from "vitest";
import { GameController } from "./gameController.ts";
import { createLocalDriver } from "../driver/localDriver.ts";
import { InvalidSquareError, a1ToSquare, boardFromFen, squareToA1 } from "../core/index.ts";
import type { GameStatus } from "../core/index.ts";

const sq = a1ToSquare;

function newController(): GameController {
  return new GameController(createLocalDriver({ config: { logMoves: false, logPrefix: "[test]" } }));
}

function clickMove(controller: GameController, from: string, to: string): void {
  controller.clickSquare(sq(from));
  const result = controller.clickSquare(sq(to));
  if (result.kind !== "moved") throw new Error(`${from}-${to} did not move (${result.kind})`);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GameController", () => {
  it("selects a piece of the side to move and lists its targets", () => {
    const c = newController();
    const result = c.clickSquare(sq("g1"));
    expect(result.kind).toBe("selected");
    if (result.kind === "selected") {
      expect(result.square).toEqual(sq("g1"));
      expect(result.targets.map(squareToA1).sort()).toEqual(["f3", "h3"]);
    }
    expect(c.getSelection()).toEqual(sq("g1"));
  });

  it("plays the move when a target is clicked", () => {
    const c = newController();
    c.clickSquare(sq("e2"));
    const result = c.clickSquare(sq("e4"));
    expect(result.kind).toBe("moved");
    if (result.kind === "moved") {
      expect(squareToA1(result.move.to)).toBe("e4");
      expect(result.status).toEqual({ phase: "ongoing", toMove: "B", inCheck: false, winner: null });
    }
    expect(c.getSelection()).toBe(null);
    expect(c.getTargets()).toEqual([]);
  });

  it("clears the selection on an empty square or an opponent piece", () => {
    const c = newController();
    c.clickSquare(sq("e2"));
    expect(c.clickSquare(sq("e5"))).toEqual({ kind: "cleared" });
    expect(c.getSelection()).toBe(null);
    expect(c.clickSquare(sq("e7"))).toEqual({ kind: "cleared" });
  });

  it("switches selection to another own piece", () => {
    const c = newController();
    c.clickSquare(sq("e2"));
    const result = c.clickSquare(sq("d2"));
    expect(result.kind).toBe("selected");
    expect(c.getTargets().map(squareToA1).sort()).toEqual(["d3", "d4"]);
  });

  it("ignores input after checkmate until reset", () => {
    const c = newController();
    const seen: GameStatus[] = [];
    c.onStatusChange((s) => seen.push(s));

    clickMove(c, "f2", "f3");
    clickMove(c, "e7", "e5");
    clickMove(c, "g2", "g4");
    clickMove(c, "d8", "h4");

    expect(c.isOver()).toBe(true);
    expect(seen.map((s) => s.phase)).toEqual(["ongoing", "ongoing", "ongoing", "checkmate"]);
    expect(c.clickSquare(sq("a2"))).toEqual({ kind: "ignored" });

    c.reset();
    expect(c.isOver()).toBe(false);
    expect(seen[seen.length - 1]).toEqual({ phase: "initial", toMove: "W", inCheck: false, winner: null });
    expect(c.clickSquare(sq("a2")).kind).toBe("selected");
  });

  it("ignores input on a custom position that is already stalemate", () => {
    const driver = createLocalDriver({
      board: boardFromFen("7k/5Q2/6K1/8/8/8/8/8 b - - 0 1"),
      config: { logMoves: false, logPrefix: "[test]" },
    });
    const c = new GameController(driver);

    expect(c.isOver()).toBe(true);
    expect(c.clickSquare(sq("h8"))).toEqual({ kind: "ignored" });
    expect(c.getSelection()).toBe(null);
  });

  it("keeps notifying listeners when one of them throws", () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => {});
    const c = newController();
    const second = vi.fn();
    c.onStatusChange(() => {
      throw new Error("boom");
    });
    c.onStatusChange(second);

    clickMove(c, "e2", "e4");

    expect(second).toHaveBeenCalledTimes(1);
    expect(errorLog).toHaveBeenCalledTimes(1);
    expect(errorLog.mock.calls[0][0]).toBe("[controller] status listener error");
  });

  it("stops notifying after unsubscribe", () => {
    const c = newController();
    const listener = vi.fn();
    const off = c.onStatusChange(listener);
    off();
    clickMove(c, "e2", "e4");
    expect(listener).not.toHaveBeenCalled();
  });

  it("rejects squares off the board", () => {
    const c = newController();
    expect(() => c.clickSquare({ r: 0, c: 9 })).toThrow(InvalidSquareError);
  });
});
