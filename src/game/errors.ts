/**
 * Raised when a query receives a square outside the 8×8 board.
 *
 * This is the only error kind the engine reports to callers; every other
 * failure is a programming error and surfaces as a plain `Error`.
 */
export class InvalidSquareError extends Error {
  readonly kind = "InvalidSquare" as const;
  readonly square: { r: number; c: number };

  constructor(square: { r: number; c: number }) {
    super(`Invalid square: r=${square.r} c=${square.c}`);
    this.name = "InvalidSquareError";
    this.square = { r: square.r, c: square.c };
  }
}
