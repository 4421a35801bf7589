import { spawn } from "child_process";
import fs from "fs";
import readline from "readline";
import type { Readable } from "stream";
import { DatasetError } from "../lib/errors";

export interface RawPuzzleRow {
  puzzleId: string | null;
  fen: string;
  /** Uncoerced column text; the filter turns it into a number. */
  rating: string;
  ratingDeviation: string | null;
  popularity: string | null;
  nbPlays: string | null;
  themes: string | null;
  moves: string;
  gameUrl: string | null;
  openingTags: string | null;
}

const REQUIRED_COLUMNS = ["FEN", "Rating", "Themes", "Moves"] as const;

/**
 * Split one CSV record into fields. Handles double-quoted fields with ""
 * escapes; records are assumed not to span lines. Fields are sliced out of
 * the line rather than built up character by character.
 */
export function parseCsvLine(line: string): string[] {
  if (!line.includes('"')) return line.split(",");

  const fields: string[] = [];
  let pos = 0;

  for (;;) {
    let next: number;

    if (line[pos] === '"') {
      let close = line.indexOf('"', pos + 1);
      let escaped = false;
      while (close !== -1 && line[close + 1] === '"') {
        escaped = true;
        close = line.indexOf('"', close + 2);
      }
      if (close === -1) close = line.length;

      const value = line.slice(pos + 1, close);
      fields.push(escaped ? value.replace(/""/g, '"') : value);
      next = line.indexOf(",", close);
    } else {
      next = line.indexOf(",", pos);
      fields.push(next === -1 ? line.slice(pos) : line.slice(pos, next));
    }

    if (next === -1) return fields;
    pos = next + 1;
  }
}

/**
 * Build a row parser for a table with the given header line. Returns null for
 * blank lines.
 */
export function puzzleRowReader(headerLine: string): (line: string) => RawPuzzleRow | null {
  const header = parseCsvLine(headerLine.replace(/^\uFEFF/, "")).map((h) => h.trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !header.includes(col));
  if (missing.length > 0) {
    throw new DatasetError(`Dataset is missing column(s): ${missing.join(", ")}`);
  }

  const col = {
    puzzleId: header.indexOf("PuzzleId"),
    fen: header.indexOf("FEN"),
    rating: header.indexOf("Rating"),
    ratingDeviation: header.indexOf("RatingDeviation"),
    popularity: header.indexOf("Popularity"),
    nbPlays: header.indexOf("NbPlays"),
    themes: header.indexOf("Themes"),
    moves: header.indexOf("Moves"),
    gameUrl: header.indexOf("GameUrl"),
    openingTags: header.indexOf("OpeningTags"),
  };

  return (line) => {
    if (!line.trim()) return null;
    const fields = parseCsvLine(line);

    const required = (i: number) => fields[i] ?? "";
    const optional = (i: number) => {
      const value = i >= 0 ? fields[i] : undefined;
      return value ? value : null;
    };

    return {
      puzzleId: optional(col.puzzleId),
      fen: required(col.fen),
      rating: required(col.rating),
      ratingDeviation: optional(col.ratingDeviation),
      popularity: optional(col.popularity),
      nbPlays: optional(col.nbPlays),
      themes: optional(col.themes),
      moves: required(col.moves),
      gameUrl: optional(col.gameUrl),
      openingTags: optional(col.openingTags),
    };
  };
}

/**
 * Turn the lines of a CSV table (header first) into puzzle rows.
 */
export function parsePuzzleTable(lines: string[]): RawPuzzleRow[] {
  const [headerLine, ...body] = lines;
  if (headerLine === undefined) {
    throw new DatasetError("Dataset is empty");
  }

  const read = puzzleRowReader(headerLine);
  const rows: RawPuzzleRow[] = [];
  for (const line of body) {
    const row = read(line);
    if (row) rows.push(row);
  }
  return rows;
}

/**
 * Parse rows as lines arrive, so only the rows are kept in memory.
 */
export async function readPuzzleRows(input: Readable): Promise<RawPuzzleRow[]> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let read: ((line: string) => RawPuzzleRow | null) | null = null;
  const rows: RawPuzzleRow[] = [];

  for await (const line of rl) {
    if (!read) {
      read = puzzleRowReader(line);
      continue;
    }
    const row = read(line);
    if (row) rows.push(row);
  }

  if (!read) throw new DatasetError("Dataset is empty");
  return rows;
}

/**
 * Decompress a .zst file with the zstd binary and parse its rows.
 */
async function readZstdRows(filePath: string): Promise<RawPuzzleRow[]> {
  const bin = process.env.ZSTD_PATH || "zstd";
  const proc = spawn(bin, ["-dc", filePath], { stdio: ["ignore", "pipe", "pipe"] });

  let stderr = "";
  proc.stderr.on("data", (chunk: Buffer) => {
    stderr += chunk.toString();
  });

  const exited = new Promise<void>((resolve, reject) => {
    proc.on("error", (err) => {
      reject(new DatasetError(`Failed to start ${bin}: ${err.message}`));
    });
    proc.on("close", (code) => {
      if (code === 0) resolve();
      else reject(new DatasetError(`${bin} exited with code ${code}: ${stderr.trim()}`));
    });
  });

  const [rows] = await Promise.all([readPuzzleRows(proc.stdout), exited]);
  return rows;
}

/**
 * Load the whole puzzle table into memory. Files ending in .zst are
 * decompressed through zstd; anything else is read as plain CSV.
 */
export async function loadPuzzles(filePath: string): Promise<RawPuzzleRow[]> {
  if (!fs.existsSync(filePath)) {
    throw new DatasetError(`Dataset not found: ${filePath}`);
  }

  return filePath.endsWith(".zst")
    ? readZstdRows(filePath)
    : readPuzzleRows(fs.createReadStream(filePath, { encoding: "utf8" }));
}
