export class InvalidNotationError extends Error {
  constructor(
    message: string,
    readonly fen: string,
    readonly move: string | null = null
  ) {
    super(message);
    this.name = "InvalidNotationError";
  }
}

export class InvalidCriteriaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCriteriaError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
