import { errorMessage, PatternError } from "../core/errors";
import { DependencyPattern, PackageNode } from "../core/types";

export const THIRD_PARTIES = "third_parties";

export function compileRegExp(expression: string, source = expression): RegExp {
  if (expression.length === 0) {
    throw new PatternError(source, "expression is empty");
  }
  try {
    return new RegExp(expression);
  } catch (err) {
    throw new PatternError(source, errorMessage(err));
  }
}

/**
 * Compiles one `may_depend` entry.
 *
 * - `third_parties` matches every package outside the working prefix
 * - `<expr>` matches built-in modules whose name matches `expr`
 * - anything else matches non built-in packages whose name matches it
 */
export function compileDependencyPattern(workingPrefix: string, expression: string): DependencyPattern {
  if (expression === THIRD_PARTIES) {
    return { mode: "third-parties", workingPrefix };
  }

  if (expression.length >= 2 && expression.startsWith("<") && expression.endsWith(">")) {
    return { mode: "standard-library", expression: compileRegExp(expression.slice(1, -1), expression) };
  }

  return { mode: "project", expression: compileRegExp(expression) };
}

export function matchDependencyPattern(pattern: DependencyPattern, node: PackageNode): boolean {
  // Built-in names never carry the working prefix, so the flag is not consulted here.
  if (pattern.mode === "third-parties") {
    return !node.name.startsWith(pattern.workingPrefix);
  }

  if (node.standardLibrary !== (pattern.mode === "standard-library")) {
    return false;
  }
  return pattern.expression.test(node.name);
}

// RegExp#source escapes forward slashes.
export function regExpText(expression: RegExp): string {
  return expression.source.replace(/\\\//g, "/");
}

export function describePattern(pattern: DependencyPattern): string {
  switch (pattern.mode) {
    case "third-parties":
      return THIRD_PARTIES;
    case "standard-library":
      return `<${regExpText(pattern.expression)}>`;
    case "project":
    default:
      return regExpText(pattern.expression);
  }
}
