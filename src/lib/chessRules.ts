import { Chess, SQUARES, type Color, type Move, type Square } from "chess.js";
import { InvalidNotationError, errorMessage } from "./errors";

type Promotion = "q" | "r" | "b" | "n";

export interface UciMove {
  from: Square;
  to: Square;
  promotion?: Promotion;
}

const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

function toSquare(name: string): Square | undefined {
  return SQUARES.find((sq) => sq === name);
}

function isPromotion(piece: string): piece is Promotion {
  return piece === "q" || piece === "r" || piece === "b" || piece === "n";
}

/**
 * Parse a coordinate move string (e.g. "e2e4", "e7e8q").
 * Returns null when the string is not a well-formed coordinate move.
 */
export function parseUci(uci: string): UciMove | null {
  const match = uci.match(UCI_PATTERN);
  if (!match) return null;

  const from = toSquare(match[1]);
  const to = toSquare(match[2]);
  if (!from || !to) return null;

  const promotion = match[3];
  if (promotion && isPromotion(promotion)) {
    return { from, to, promotion };
  }
  return { from, to };
}

/**
 * Load a FEN into a fresh chess.js board.
 */
export function parsePosition(fen: string): Chess {
  try {
    return new Chess(fen);
  } catch (err) {
    throw new InvalidNotationError(`Invalid FEN "${fen}": ${errorMessage(err)}`, fen);
  }
}

/**
 * Play a coordinate move on the board and return the resulting chess.js move.
 * Throws InvalidNotationError for malformed or illegal moves; the board is
 * left untouched in that case.
 */
export function applyMove(chess: Chess, uci: string): Move {
  const parsed = parseUci(uci);
  if (!parsed) {
    throw new InvalidNotationError(`Malformed move "${uci}"`, chess.fen(), uci);
  }

  try {
    return chess.move({
      from: parsed.from,
      to: parsed.to,
      ...(parsed.promotion ? { promotion: parsed.promotion } : {}),
    });
  } catch (err) {
    throw new InvalidNotationError(
      `Illegal move "${uci}" in position "${chess.fen()}": ${errorMessage(err)}`,
      chess.fen(),
      uci
    );
  }
}

/**
 * SAN for a single coordinate move in the current position, without playing
 * it. Replaying a whole line goes through applyMove instead, which hands back
 * the SAN of each move it plays.
 */
export function moveToAlgebraic(chess: Chess, uci: string): string {
  const move = applyMove(chess, uci);
  chess.undo();
  return move.san;
}

/**
 * Coordinate move for a SAN string in the current position, without playing it.
 */
export function algebraicToMove(chess: Chess, san: string): string {
  let move: Move;
  try {
    move = chess.move(san);
  } catch (err) {
    throw new InvalidNotationError(
      `Illegal move "${san}" in position "${chess.fen()}": ${errorMessage(err)}`,
      chess.fen(),
      san
    );
  }
  chess.undo();
  return move.lan;
}

export function sideToMove(chess: Chess): Color {
  return chess.turn();
}
