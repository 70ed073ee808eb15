import type { Rank } from "../types.ts";

export const BACK_RANK: readonly Rank[] = ["R", "N", "B", "Q", "K", "B", "N", "R"];

export const HOME_ROW = { W: 7, B: 0 } as const;
export const PAWN_START_ROW = { W: 6, B: 1 } as const;
export const PROMOTION_ROW = { W: 0, B: 7 } as const;

export const KING_START_COL = 4;
export const KING_SIDE_ROOK_COL = 7;
export const QUEEN_SIDE_ROOK_COL = 0;
