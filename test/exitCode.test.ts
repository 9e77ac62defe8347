import { describe, expect, it } from "vitest";
import { determineExitCode, EXIT_OK, EXIT_VIOLATIONS } from "../src/cli/exitCode";
import { RuleResult } from "../src/core/types";
import { compileRule } from "../src/rules/rule";

const rule = compileRule("acme", { name: "layers", packages: ".*", mayDepend: [], expected: [] });

function rulesWith(...counts: number[]): RuleResult[] {
  return counts.map((count) => ({
    rule,
    violations: Array.from({ length: count }, (_, index) => ({ kind: "missing" as const, package: `acme/p${index}` }))
  }));
}

describe("determineExitCode", () => {
  it("returns 0 when no rule has violations", () => {
    expect(determineExitCode({ rules: rulesWith(0, 0) })).toBe(EXIT_OK);
    expect(determineExitCode({ rules: [] })).toBe(EXIT_OK);
  });

  it("returns 1 when any rule has a violation", () => {
    expect(determineExitCode({ rules: rulesWith(0, 2) })).toBe(EXIT_VIOLATIONS);
  });
});
