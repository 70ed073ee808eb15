// "Core" is the stable, deterministic rules surface (no rendering, no I/O).

export type { Piece, Player, Rank } from "../types.ts";
export type { Square } from "../game/coords.ts";
export type { Board, CastlingFlags } from "../game/board.ts";
export type { Move } from "../game/moveTypes.ts";
export type { EvaluatedPhase, GamePhase, GameStatus } from "../game/gameOver.ts";
export type { CastlingSide } from "../game/movegen.ts";

export { InvalidSquareError } from "../game/errors.ts";
export { assertSquare, isValidSquare, makeSquare, sameSquare } from "../game/coords.ts";
export { a1ToSquare, parseA1, squareToA1 } from "../game/coordFormat.ts";
export { cloneBoard, createEmptyBoard, createInitialBoard, opponentOf, pieceAt } from "../game/board.ts";
export { sameMove } from "../game/moveTypes.ts";
export { isKingInCheck, isSquareAttacked } from "../game/attacks.ts";
export { castlingMove, generatePseudoLegalMoves } from "../game/movegen.ts";
export { applyMoveInPlace } from "../game/applyMove.ts";
export { generateAllLegalMoves, generateLegalMoves, hasAnyLegalMove, isMoveLegal } from "../game/legality.ts";
export { describeStatus, evaluateGameState, isTerminal, playerName } from "../game/gameOver.ts";
export { boardFromFen, boardToFen } from "../game/fen.ts";
export { pieceGlyph, pieceName } from "../pieces/pieceLabel.ts";
