#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { DEFAULT_CONFIG_PATH, loadConfig, toCriteria } from "../lib/config";
import { loadPuzzles } from "../services/dataset";
import { filterPuzzles } from "../services/puzzleFilter";
import { renderDocument } from "../services/document";

/**
 * Build the book described by a config file. Returns the output path.
 */
export async function generateBook(configPath: string): Promise<string> {
  const config = loadConfig(configPath);

  const rows = await loadPuzzles(config.dataset);
  console.log(`Loaded ${rows.length} puzzle(s) from ${config.dataset}`);

  const { puzzles, outcomes } = filterPuzzles(rows, toCriteria(config));
  const skipped = outcomes.filter((o) => o.kind === "skipped-insufficient-moves").length;
  const invalid = outcomes.filter((o) => o.kind === "invalid-notation").length;
  console.log(
    `Selected ${puzzles.length} puzzle(s) (${skipped} with too few moves, ${invalid} dropped for bad notation)`
  );

  const text = renderDocument(puzzles, {
    themes: config.themes,
    minRating: config.min_rating,
    maxRating: config.max_rating,
  });

  fs.mkdirSync(path.dirname(path.resolve(config.output)), { recursive: true });
  fs.writeFileSync(config.output, text, "utf8");
  console.log(`Done. Wrote ${config.output}`);

  return config.output;
}

/**
 * Runs the job and returns the process exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await generateBook(argv[2] || DEFAULT_CONFIG_PATH);
    return 0;
  } catch (err) {
    console.error("Book generation failed —", err);
    return 1;
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
