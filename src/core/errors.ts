export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class PatternError extends ConfigError {
  readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`invalid pattern ${JSON.stringify(expression)}: ${reason}`);
    this.name = "PatternError";
    this.expression = expression;
  }
}

export type ResolutionErrorDetails = {
  unit: string;
  specifier?: string;
  file?: string;
  line?: number;
  failedLookupLocations?: string[];
};

export class ResolutionError extends Error {
  readonly unit: string;
  readonly specifier?: string;
  readonly file?: string;
  readonly line?: number;
  readonly failedLookupLocations: string[];

  constructor(message: string, details: ResolutionErrorDetails) {
    super(message);
    this.name = "ResolutionError";
    this.unit = details.unit;
    this.specifier = details.specifier;
    this.file = details.file;
    this.line = details.line;
    this.failedLookupLocations = details.failedLookupLocations ?? [];
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
