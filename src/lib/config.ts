import fs from "fs";
import { parse } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import type { FilterCriteria } from "../services/puzzleFilter";

export const DEFAULT_CONFIG_PATH = "config.yaml";

const bookConfigSchema = z
  .object({
    min_rating: z.number().nullish(),
    max_rating: z.number().nullish(),
    themes: z.string().nullish(),
    all_themes: z.boolean().default(true),
    n: z.number().int().min(1, "n must be a positive integer"),
    dataset: z.string().min(1).default("data/lichess_db_puzzle.csv.zst"),
    output: z.string().min(1).default("output.tex"),
  })
  .strict();

export type BookConfig = z.infer<typeof bookConfigSchema>;

/**
 * Validate an already-parsed config document.
 */
export function parseConfig(raw: unknown): BookConfig {
  const parsed = bookConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid config",
      parsed.error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
    );
  }
  return parsed.data;
}

export function loadConfig(filePath = DEFAULT_CONFIG_PATH): BookConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigError(`Cannot parse config ${filePath}: ${errorMessage(err)}`);
  }

  return parseConfig(raw);
}

export function toCriteria(config: BookConfig): FilterCriteria {
  return {
    minRating: config.min_rating,
    maxRating: config.max_rating,
    themes: config.themes,
    allThemes: config.all_themes,
    limit: config.n,
  };
}
