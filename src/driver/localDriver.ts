import type { GameDriver } from "./gameDriver.ts";
import type { Board, GameStatus, Move, Piece, Square } from "../core/index.ts";
import {
  applyMoveInPlace,
  assertSquare,
  boardToFen,
  cloneBoard,
  createInitialBoard,
  describeStatus,
  evaluateGameState,
  generateLegalMoves,
  isTerminal,
  pieceAt,
  sameMove,
  squareToA1,
} from "../core/index.ts";
import type { EngineConfig } from "../config.ts";
import { readEngineConfig } from "../config.ts";

// A position that is already decided reports its result; any other is "initial" until the first move.
function initialStatus(board: Board): GameStatus {
  const evaluated = evaluateGameState(board);
  return isTerminal(evaluated) ? evaluated : { ...evaluated, phase: "initial" };
}

export class LocalDriver implements GameDriver {
  private board: Board;
  private status: GameStatus;
  private config: EngineConfig;

  constructor(board: Board, config: EngineConfig) {
    this.board = board;
    this.config = config;
    this.status = initialStatus(board);
  }

  legalMoves(square: Square): Move[] {
    return generateLegalMoves(this.board, assertSquare(square));
  }

  applyMove(move: Move): GameStatus {
    if (isTerminal(this.status)) throw new Error(`applyMove: game is over (${this.status.phase})`);

    const offered = this.legalMoves(move.from);
    if (!offered.some((m) => sameMove(m, move))) {
      throw new Error(`applyMove: ${squareToA1(move.from)}-${squareToA1(move.to)} is not a legal move in this position`);
    }

    applyMoveInPlace(this.board, move);
    this.status = evaluateGameState(this.board);

    this.log(`move ${squareToA1(move.from)}-${squareToA1(move.to)} status=${this.status.phase} fen=${boardToFen(this.board)}`);
    if (isTerminal(this.status)) this.log(`game over: ${describeStatus(this.status)}`);

    return { ...this.status };
  }

  pieceAt(square: Square): Piece | null {
    return pieceAt(this.board, assertSquare(square));
  }

  reset(): void {
    this.board = createInitialBoard();
    this.status = initialStatus(this.board);
    this.log("reset");
  }

  getStatus(): GameStatus {
    return { ...this.status };
  }

  toFen(): string {
    return boardToFen(this.board);
  }

  getBoard(): Board {
    return cloneBoard(this.board);
  }

  private log(message: string): void {
    if (!this.config.logMoves) return;
    // eslint-disable-next-line no-console
    console.log(`${this.config.logPrefix} ${message}`);
  }
}

/**
 * Creates a driver on the standard start position, or on `board` when given
 * (the driver takes a copy). `reset()` always returns to the standard start.
 */
export function createLocalDriver(opts: { board?: Board; config?: EngineConfig } = {}): LocalDriver {
  const board = opts.board ? cloneBoard(opts.board) : createInitialBoard();
  return new LocalDriver(board, opts.config ?? readEngineConfig());
}
