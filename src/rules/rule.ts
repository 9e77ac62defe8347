import { ConfigError } from "../core/errors";
import { PackageNode, Rule, RuleRunState, Violation } from "../core/types";
import { displayName, PackageGraph } from "../graph/packageGraph";
import { compileDependencyPattern, compileRegExp, matchDependencyPattern } from "./pattern";

export type RuleDefinition = {
  name: string;
  packages: string;
  mayDepend: string[];
  expected: string[];
};

export type ParsedException =
  | { kind: "generic"; dependency: string }
  | { kind: "specific"; dependent: string; dependency: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function parseException(workingPrefix: string, entry: string): ParsedException {
  const parts = entry.split("->").map((part) => part.trim());
  if (parts.some((part) => part.length === 0) || parts.length > 2) {
    throw new ConfigError(`malformed exception ${JSON.stringify(entry)}`);
  }

  if (parts.length === 1) {
    return { kind: "generic", dependency: `${workingPrefix}/${parts[0]}` };
  }
  return {
    kind: "specific",
    dependent: `${workingPrefix}/${parts[0]}`,
    dependency: `${workingPrefix}/${parts[1]}`
  };
}

export function compileRule(workingPrefix: string, definition: RuleDefinition): Rule {
  const rule: Rule = {
    name: definition.name,
    packageSelector: compileRegExp(`^${escapeRegExp(workingPrefix)}/${definition.packages}$`, definition.packages),
    allowedDependencyPatterns: definition.mayDepend.map((expression) => compileDependencyPattern(workingPrefix, expression)),
    genericExceptions: new Set(),
    specificExceptions: new Map()
  };

  for (const entry of definition.expected) {
    const exception = parseException(workingPrefix, entry);
    if (exception.kind === "generic") {
      rule.genericExceptions.add(exception.dependency);
      continue;
    }

    const targets = rule.specificExceptions.get(exception.dependent);
    if (targets) {
      targets.add(exception.dependency);
    } else {
      rule.specificExceptions.set(exception.dependent, new Set([exception.dependency]));
    }
  }

  return rule;
}

export function createRuleRunState(): RuleRunState {
  return {
    processedPackages: new Set(),
    violations: []
  };
}

export function formatViolation(violation: Violation): string {
  if (violation.kind === "missing") {
    return `missing ${violation.package}`;
  }
  return `${violation.kind} ${violation.from} -> ${violation.to}`;
}

function sorted(values: Iterable<string>): string[] {
  return Array.from(values).sort();
}

/**
 * Checks every edge leaving `node` against the rule and appends what it finds
 * to `state`. Each (rule, package) pair must be processed at most once per run.
 */
export function processPackage(rule: Rule, state: RuleRunState, graph: PackageGraph, node: PackageNode): void {
  state.processedPackages.add(node.name);

  const specific = rule.specificExceptions.get(node.name);
  const genericUsed = new Set<string>();
  const specificUsed = new Set<string>();
  const disallowed: PackageNode[] = [];

  for (const dependency of graph.dependenciesOf(node)) {
    if (rule.allowedDependencyPatterns.some((pattern) => matchDependencyPattern(pattern, dependency))) {
      continue;
    }
    if (rule.genericExceptions.has(dependency.name)) {
      genericUsed.add(dependency.name);
      continue;
    }
    if (specific?.has(dependency.name)) {
      specificUsed.add(dependency.name);
      continue;
    }
    disallowed.push(dependency);
  }

  const from = displayName(node);
  for (const dependency of disallowed) {
    state.violations.push({ kind: "disallowed", from, to: dependency.name });
  }
  for (const expected of sorted(rule.genericExceptions)) {
    if (expected !== node.name && !genericUsed.has(expected)) {
      state.violations.push({ kind: "expected", from, to: expected });
    }
  }
  for (const expected of sorted(specific ?? [])) {
    if (!specificUsed.has(expected)) {
      state.violations.push({ kind: "expected", from, to: expected });
    }
  }
}

export function processMissingPackages(rule: Rule, state: RuleRunState): void {
  for (const dependent of sorted(rule.specificExceptions.keys())) {
    if (!state.processedPackages.has(dependent)) {
      state.violations.push({ kind: "missing", package: dependent });
    }
  }
}
