import { applyMove, parsePosition } from "../lib/chessRules";
import { InvalidCriteriaError, InvalidNotationError } from "../lib/errors";
import type { RawPuzzleRow } from "./dataset";
import { splitMoves } from "./moveTranslator";

export interface Puzzle extends Omit<RawPuzzleRow, "rating"> {
  /** Null when the raw column was blank or not a number. */
  rating: number | null;
}

export interface FilterCriteria {
  minRating?: number | null;
  maxRating?: number | null;
  /** Whitespace-separated theme tags. */
  themes?: string | null;
  /** true: every tag must match. false: at least one must. */
  allThemes?: boolean;
  /** Maximum number of puzzles kept, taken from the head. */
  limit: number;
}

/**
 * Result of advancing one puzzle past its first move. `index` is the row's
 * 1-based position in the current pass.
 */
export type AdvanceOutcome =
  | { kind: "ok"; index: number }
  | { kind: "skipped-insufficient-moves"; index: number }
  | { kind: "invalid-notation"; index: number; message: string };

export interface FilterResult {
  puzzles: Puzzle[];
  outcomes: AdvanceOutcome[];
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Decimal text only: "0x5DC", "Infinity" and blanks all come back null.
 */
export function coerceRating(raw: string | number | null | undefined): number | null {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (raw == null) return null;
  const text = raw.trim();
  if (!DECIMAL.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function toPuzzle(row: RawPuzzleRow): Puzzle {
  return { ...row, rating: coerceRating(row.rating) };
}

/**
 * Keep puzzles inside the inclusive rating range. A missing bound is not
 * applied; a puzzle without a rating fails every applied bound.
 */
export function filterByRating(
  puzzles: Puzzle[],
  minRating?: number | null,
  maxRating?: number | null
): Puzzle[] {
  return puzzles.filter((p) => {
    if (minRating != null && (p.rating == null || p.rating < minRating)) return false;
    if (maxRating != null && (p.rating == null || p.rating > maxRating)) return false;
    return true;
  });
}

export function splitThemes(themes: string | null | undefined): string[] {
  if (!themes) return [];
  return themes.split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Per-puzzle match flags for a set of theme tags. Each tag is a plain
 * substring test against the Themes column.
 */
export function buildThemeMask(puzzles: Puzzle[], tags: string[], allThemes: boolean): boolean[] {
  return puzzles.map((p) => {
    const themes = p.themes;
    const hits = tags.map((tag) => themes != null && themes.includes(tag));
    return allThemes ? hits.every(Boolean) : hits.some(Boolean);
  });
}

export function filterByThemes(
  puzzles: Puzzle[],
  themes: string | null | undefined,
  allThemes = true
): Puzzle[] {
  const tags = splitThemes(themes);
  if (tags.length === 0) return puzzles;

  const mask = buildThemeMask(puzzles, tags, allThemes);
  return puzzles.filter((_, i) => mask[i]);
}

/**
 * Play the opponent's first move so the stored position is the one the
 * solver faces. Puzzles with fewer than two moves come back unchanged.
 */
export function advancePuzzle(
  puzzle: Puzzle,
  index: number
): { puzzle: Puzzle; outcome: AdvanceOutcome } {
  const moves = splitMoves(puzzle.moves);
  if (moves.length < 2) {
    return { puzzle, outcome: { kind: "skipped-insufficient-moves", index } };
  }

  const chess = parsePosition(puzzle.fen);
  applyMove(chess, moves[0]);

  return {
    puzzle: { ...puzzle, fen: chess.fen(), moves: moves.slice(1).join(" ") },
    outcome: { kind: "ok", index },
  };
}

/**
 * Advance every puzzle. Rows with bad notation are reported and dropped;
 * rows with too few moves are reported and kept as they are.
 */
export function advancePuzzles(puzzles: Puzzle[]): FilterResult {
  const kept: Puzzle[] = [];
  const outcomes: AdvanceOutcome[] = [];

  puzzles.forEach((puzzle, i) => {
    const index = i + 1;
    try {
      const result = advancePuzzle(puzzle, index);
      if (result.outcome.kind === "skipped-insufficient-moves") {
        console.log(`Skipping row ${index}: Insufficient moves`);
      }
      kept.push(result.puzzle);
      outcomes.push(result.outcome);
    } catch (err) {
      if (!(err instanceof InvalidNotationError)) throw err;
      console.error(`Row ${index}: dropped, ${err.message}`);
      outcomes.push({ kind: "invalid-notation", index, message: err.message });
    }
  });

  return { puzzles: kept, outcomes };
}

export function validateLimit(limit: unknown): number {
  if (typeof limit !== "number" || !Number.isInteger(limit) || limit < 1) {
    throw new InvalidCriteriaError(`Result cap must be a positive integer, got ${String(limit)}`);
  }
  return limit;
}

export function takeHead<T>(rows: T[], limit: number): T[] {
  const cap = validateLimit(limit);
  return rows.length <= cap ? rows : rows.slice(0, cap);
}

/**
 * Rating range, then themes, then the first-move advance, then the cap.
 * The input rows are never modified.
 */
export function filterPuzzles(rows: RawPuzzleRow[], criteria: FilterCriteria): FilterResult {
  validateLimit(criteria.limit);

  const rated = filterByRating(rows.map(toPuzzle), criteria.minRating, criteria.maxRating);
  const themed = filterByThemes(rated, criteria.themes, criteria.allThemes ?? true);
  const { puzzles, outcomes } = advancePuzzles(themed);

  return { puzzles: takeHead(puzzles, criteria.limit), outcomes };
}
