import fs from "node:fs/promises";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { ZodError } from "zod";
import { ConfigError, errorMessage } from "../core/errors";
import { LoadedConfig } from "../core/types";
import { compileRegExp } from "../rules/pattern";
import { compileRule } from "../rules/rule";
import { RuleFile, RuleFileSchema } from "./schema";

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseRuleFile(text: string): RuleFile {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError(`invalid YAML: ${err.message}`);
    }
    throw err;
  }

  const parsed = RuleFileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigError(`invalid rule file: ${describeZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function compileRuleFile(file: RuleFile): LoadedConfig {
  const workingPrefix = file.options.working_prefix;
  if (workingPrefix.endsWith("/")) {
    throw new ConfigError(`working_prefix must be a package name, was ${workingPrefix}`);
  }

  const rules = file.rules.map((definition, index) => {
    try {
      return compileRule(workingPrefix, {
        name: definition.name,
        packages: definition.packages,
        mayDepend: definition.may_depend,
        expected: definition.expected
      });
    } catch (err) {
      if (err instanceof ConfigError) {
        throw new ConfigError(`rules.${index} (${definition.name}): ${err.message}`);
      }
      throw err;
    }
  });

  return {
    ruleSet: { workingPrefix, rules },
    graph: {
      workingPrefix,
      entries: file.options.entries ?? ["."],
      includeTypeImports: file.options.include_type_imports ?? true,
      includeTests: file.options.include_tests ?? false,
      ignoreImports: (file.options.ignore_imports ?? []).map((expression) => compileRegExp(expression))
    }
  };
}

export function parseConfig(text: string): LoadedConfig {
  return compileRuleFile(parseRuleFile(text));
}

export async function loadConfig(configPath: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read rule file ${configPath}: ${errorMessage(err)}`);
  }
  return parseConfig(text);
}
