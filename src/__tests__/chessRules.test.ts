import { expect, test } from "vitest";
import {
  algebraicToMove,
  applyMove,
  moveToAlgebraic,
  parsePosition,
  parseUci,
  sideToMove,
} from "../lib/chessRules";
import { InvalidNotationError } from "../lib/errors";

const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";
const TWO_ROOKS_FEN = "4k3/8/8/8/8/8/4K3/R6R w - - 0 1";

test("parses coordinate moves", () => {
  expect(parseUci("e2e4")).toEqual({ from: "e2", to: "e4" });
  expect(parseUci("e7e8q")).toEqual({ from: "e7", to: "e8", promotion: "q" });
  expect(parseUci("e2")).toBeNull();
  expect(parseUci("e2e9")).toBeNull();
  expect(parseUci("Nf3")).toBeNull();
  expect(parseUci("e7e8k")).toBeNull();
});

test("rejects a malformed FEN", () => {
  expect(() => parsePosition("not a fen")).toThrow(InvalidNotationError);
});

test("reports the side to move", () => {
  const chess = parsePosition(START_FEN);
  expect(sideToMove(chess)).toBe("w");
  applyMove(chess, "e2e4");
  expect(sideToMove(chess)).toBe("b");
});

test("illegal moves throw and leave the board alone", () => {
  const chess = parsePosition(START_FEN);
  expect(() => applyMove(chess, "e2e5")).toThrow(InvalidNotationError);
  expect(() => applyMove(chess, "zz99")).toThrow(/Malformed move "zz99"/);
  expect(chess.fen()).toBe(START_FEN);
});

test("SAN disambiguates between two rooks", () => {
  const chess = parsePosition(TWO_ROOKS_FEN);
  expect(moveToAlgebraic(chess, "a1d1")).toBe("Rad1");
  expect(moveToAlgebraic(chess, "h1d1")).toBe("Rhd1");
  expect(moveToAlgebraic(chess, "a1a8")).toBe("Ra8+");
  expect(chess.fen()).toBe(TWO_ROOKS_FEN);
});

test("SAN marks mate and promotion", () => {
  expect(moveToAlgebraic(parsePosition("6k1/5ppp/8/8/8/8/8/4R1K1 w - - 0 1"), "e1e8")).toBe("Re8#");
  expect(moveToAlgebraic(parsePosition("8/4P3/8/8/8/8/k7/7K w - - 0 1"), "e7e8q")).toBe("e8=Q");
});

test("recovers coordinate moves from SAN", () => {
  const chess = parsePosition(TWO_ROOKS_FEN);
  expect(algebraicToMove(chess, "Rhd1")).toBe("h1d1");
  expect(algebraicToMove(chess, "Ra8+")).toBe("a1a8");
  expect(() => algebraicToMove(chess, "Qd4")).toThrow(InvalidNotationError);
  expect(chess.fen()).toBe(TWO_ROOKS_FEN);
});
