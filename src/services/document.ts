import { puzzleMarker, solutionPrefix } from "../lib/turnIndicator";
import type { Puzzle } from "./puzzleFilter";
import { translateMoves } from "./moveTranslator";

export interface DocumentOptions {
  themes?: string | null;
  minRating?: number | null;
  maxRating?: number | null;
}

const DIAGRAMS_PER_PAGE = 6;

const PREAMBLE = [
  "\\documentclass{article}",
  "\\usepackage{skak}",
  "\\usepackage{graphicx}",
  "\\usepackage[margin=1.5cm, a4paper]{geometry}",
  "\\usepackage{multicol}",
  "\\usepackage{tikz}",
  "",
  "\\newcommand{\\chessScaleFactor}{0.7}",
  "\\newcommand{\\NumberDiagramSpace}{\\vspace{0.2cm}}",
  "\\newcommand{\\whitecircle}{\\tikz\\draw[black,fill=white] (0,0) circle (3pt);}",
  "\\newcommand{\\blackcircle}{\\tikz\\draw[black,fill=black] (0,0) circle (3pt);}",
];

const LATEX_SPECIALS: Record<string, string> = {
  "\\": "\\textbackslash{}",
  "{": "\\{",
  "}": "\\}",
  $: "\\$",
  "&": "\\&",
  "#": "\\#",
  "^": "\\textasciicircum{}",
  _: "\\_",
  "%": "\\%",
  "~": "\\textasciitilde{}",
};

export function escapeLatex(text: string): string {
  return text.replace(/[\\{}$&#^_%~]/g, (ch) => LATEX_SPECIALS[ch] ?? ch);
}

export function bookTitle(count: number, options: DocumentOptions): string {
  const themes = options.themes?.trim() || "all";
  const min = options.minRating ?? "any";
  const max = options.maxRating ?? "any";
  return escapeLatex(
    `The Lichess Book of ${count} Puzzles covering ${themes} theme(s) from ${min} to ${max}`
  );
}

/**
 * One diagram cell. Odd-numbered cells open a row and push the next cell to
 * the right edge.
 */
export function renderDiagram(puzzle: Puzzle, number: number): string[] {
  const opensRow = number % 2 === 1;
  const lines = [
    ...(opensRow ? ["\\noindent"] : []),
    "\\parbox[t]{0.48\\textwidth}{%",
    "\\centering",
    `\\textbf{\\#${number}} ${puzzleMarker(puzzle.fen)}\\\\`,
    "\\NumberDiagramSpace",
    "\\resizebox{\\chessScaleFactor\\linewidth}{!}{%",
    "\\newgame",
    `\\fenboard{${puzzle.fen}}`,
    "\\showboard",
    "}",
    opensRow ? "}\\hfill" : "}",
  ];

  if (number % DIAGRAMS_PER_PAGE === 0) {
    lines.push("\\vspace{1cm}", "\\newpage");
  } else if (number % 2 === 0) {
    lines.push("\\vfill");
  }
  return lines;
}

export function renderSolution(puzzle: Puzzle, number: number): string {
  return `\\textbf{\\#${number}} ${solutionPrefix(puzzle.fen)}${translateMoves(puzzle.moves, puzzle.fen)}\\\\`;
}

/**
 * Full LaTeX source: a title, the puzzle diagrams, then the solutions in two
 * columns. Translation errors propagate.
 */
export function renderDocument(puzzles: Puzzle[], options: DocumentOptions = {}): string {
  const lines: string[] = [
    ...PREAMBLE,
    "",
    "\\begin{document}",
    "",
    `{\\centering \\section*{${bookTitle(puzzles.length, options)}}}`,
    "",
    "\\vspace{1cm}",
  ];

  puzzles.forEach((puzzle, i) => {
    lines.push(...renderDiagram(puzzle, i + 1));
  });

  lines.push("\\newpage", "\\begin{multicols}{2}");
  puzzles.forEach((puzzle, i) => {
    lines.push(renderSolution(puzzle, i + 1), "");
  });
  lines.push("\\end{multicols}", "\\end{document}", "");

  return lines.join("\n");
}
