import { CheckResult, SkippedImport, Violation } from "../core/types";
import { failingRules } from "../rules/ruleSet";

const KIND_WIDTH = "disallowed".length;

export function formatViolationLine(violation: Violation): string {
  const label = violation.kind.padEnd(KIND_WIDTH);
  if (violation.kind === "missing") {
    return `- ${label} ${violation.package}`;
  }
  return `- ${label} ${violation.from} -> ${violation.to}`;
}

function formatSkippedImport(skipped: SkippedImport): string {
  const what = skipped.reason === "dynamic" ? skipped.importText : skipped.specifier ?? skipped.importText;
  return `  ${skipped.file}:${skipped.line}:${skipped.column} [${skipped.importKind}] ${what} (${skipped.reason})`;
}

export function renderText(result: CheckResult, showVerbose: boolean): string {
  const lines: string[] = [];

  if (showVerbose) {
    lines.push(
      `Packages: ${result.stats.packages}, edges: ${result.stats.edges}, rules: ${result.stats.rules}, violations: ${result.stats.violations}`
    );
  }

  for (const entry of failingRules(result)) {
    lines.push(entry.rule.name);
    for (const violation of entry.violations) {
      lines.push(formatViolationLine(violation));
    }
  }

  if (showVerbose && result.skippedImports.length > 0) {
    lines.push("");
    lines.push("Skipped imports:");
    for (const skipped of result.skippedImports) {
      lines.push(formatSkippedImport(skipped));
    }
  }

  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
