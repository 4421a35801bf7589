import { applyMove, parsePosition } from "../lib/chessRules";
import { InvalidNotationError } from "../lib/errors";

export function splitMoves(moves: string): string[] {
  return moves.trim().split(/\s+/).filter((m) => m.length > 0);
}

/**
 * Translate a space-separated list of coordinate moves into SAN, replaying
 * each move on the board so check, mate and disambiguation come out right.
 *
 * Throws InvalidNotationError on the first illegal move (tagged with its
 * 1-based ply); nothing is returned for the moves before it.
 */
export function translateMoves(moves: string, fen: string): string {
  const uciMoves = splitMoves(moves);
  if (uciMoves.length === 0) return "";

  const chess = parsePosition(fen);
  const san: string[] = [];

  uciMoves.forEach((uci, i) => {
    try {
      san.push(applyMove(chess, uci).san);
    } catch (err) {
      if (err instanceof InvalidNotationError) {
        throw new InvalidNotationError(`Ply ${i + 1}: ${err.message}`, fen, uci);
      }
      throw err;
    }
  });

  return san.join(" ");
}
