import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, expect, test, vi } from "vitest";
import { main } from "../jobs/generate-book";

const START_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

function workspace(configLines: (dir: string) => string[]): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "puzzle-book-job-"));
  fs.writeFileSync(
    path.join(dir, "puzzles.csv"),
    [
      "PuzzleId,FEN,Moves,Rating,Themes",
      `a,${START_FEN},e2e4 e7e5 g1f3,1500,fork endgame`,
      `b,${START_FEN},e2e4 e7e5,2600,fork`,
      "",
    ].join("\n"),
    "utf8"
  );
  const configPath = path.join(dir, "config.yaml");
  fs.writeFileSync(configPath, configLines(dir).join("\n"), "utf8");
  return configPath;
}

afterEach(() => {
  vi.restoreAllMocks();
});

test("writes the book and exits cleanly", async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  const configPath = workspace((dir) => [
    "max_rating: 2000",
    "themes: fork",
    "n: 5",
    `dataset: ${JSON.stringify(path.join(dir, "puzzles.csv"))}`,
    `output: ${JSON.stringify(path.join(dir, "out", "book.tex"))}`,
  ]);

  const code = await main(["node", "generate-book", configPath]);

  expect(code).toBe(0);
  const text = fs.readFileSync(path.join(path.dirname(configPath), "out", "book.tex"), "utf8");
  expect(text.split("\n")).toContain("\\textbf{\\#1} ... e5 Nf3\\\\");
  expect(text).toContain("\\section*{The Lichess Book of 1 Puzzles covering fork theme(s) from any to 2000}");
});

test("a failure is logged and gives exit code 1", async () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const configPath = workspace((dir) => ["n: 0", `dataset: ${JSON.stringify(path.join(dir, "puzzles.csv"))}`]);

  const code = await main(["node", "generate-book", configPath]);

  expect(code).toBe(1);
  expect(error).toHaveBeenCalledTimes(1);
  expect(error.mock.calls[0][0]).toBe("Book generation failed —");
});
