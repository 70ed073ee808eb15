import type { Piece } from "../types.ts";

const GLYPHS: Record<Piece["rank"], { W: string; B: string }> = {
  K: { W: "♔", B: "♚" },
  Q: { W: "♕", B: "♛" },
  R: { W: "♖", B: "♜" },
  B: { W: "♗", B: "♝" },
  N: { W: "♘", B: "♞" },
  P: { W: "♙", B: "♟" },
};

function ownerLabel(owner: Piece["owner"]): string {
  return owner === "W" ? "White" : "Black";
}

function rankLabel(rank: Piece["rank"]): string {
  switch (rank) {
    case "P": return "Pawn";
    case "N": return "Knight";
    case "B": return "Bishop";
    case "R": return "Rook";
    case "Q": return "Queen";
    case "K": return "King";
  }
}

export function pieceName(p: Piece): string {
  return `${ownerLabel(p.owner)} ${rankLabel(p.rank)}`;
}

export function pieceGlyph(p: Piece): string {
  return GLYPHS[p.rank][p.owner];
}
