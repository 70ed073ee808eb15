export type Player = "W" | "B";
export type Rank = "K" | "Q" | "R" | "B" | "N" | "P";

export interface Piece { readonly owner: Player; readonly rank: Rank; }
