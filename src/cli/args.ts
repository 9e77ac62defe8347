import path from "node:path";
import { ConfigError } from "../core/errors";
import { CheckOptions, OutputFormat } from "../core/types";

export const DEFAULT_CONFIG_FILE = "depfence.yaml";

export type RawCheckOptions = {
  config?: string;
  root?: string;
  entry?: string[];
  format?: string;
  verbose?: boolean;
};

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === "text" || value === "json") {
    return value ?? "text";
  }
  throw new ConfigError(`unknown output format ${JSON.stringify(value)}, expected text or json`);
}

function parseEntries(values: string[] | undefined): string[] {
  return Array.from(
    new Set((values ?? []).flatMap((value) => value.split(",")).map((value) => value.trim()).filter(Boolean))
  );
}

export function resolveCheckOptions(raw: RawCheckOptions, cwd: string, configArgument?: string): CheckOptions {
  const root = path.resolve(cwd, raw.root ?? ".");
  const configPath = configArgument ?? raw.config;

  return {
    root,
    config: configPath ? path.resolve(cwd, configPath) : path.join(root, DEFAULT_CONFIG_FILE),
    entries: parseEntries(raw.entry),
    format: parseFormat(raw.format),
    verbose: Boolean(raw.verbose)
  };
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
