import type { Color } from "chess.js";
import { parsePosition, sideToMove } from "./chessRules";

export function turnOf(fen: string): Color {
  return sideToMove(parsePosition(fen));
}

/**
 * Caption marker shown above a puzzle diagram: a white or black circle for
 * the side to move.
 */
export function puzzleMarker(fen: string): string {
  return turnOf(fen) === "w" ? "\\whitecircle" : "\\blackcircle";
}

/**
 * Prefix for a solution line. Black-to-move solutions start with "... ".
 */
export function solutionPrefix(fen: string): string {
  return turnOf(fen) === "w" ? "" : "... ";
}
