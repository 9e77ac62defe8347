import { RuleResult, RuleSet, RuleSetResult } from "../core/types";
import { PackageGraph } from "../graph/packageGraph";
import { createRuleRunState, processMissingPackages, processPackage } from "./rule";

export function runRuleSet(ruleSet: RuleSet, graph: PackageGraph): RuleSetResult {
  const runs = ruleSet.rules.map((rule) => ({ rule, state: createRuleRunState() }));

  for (const node of graph.packages()) {
    for (const run of runs) {
      if (run.rule.packageSelector.test(node.name)) {
        processPackage(run.rule, run.state, graph, node);
      }
    }
  }

  for (const run of runs) {
    processMissingPackages(run.rule, run.state);
  }

  const rules: RuleResult[] = runs.map((run) => ({ rule: run.rule, violations: run.state.violations }));
  return {
    rules,
    ok: rules.every((result) => result.violations.length === 0)
  };
}

export function failingRules(result: Pick<RuleSetResult, "rules">): RuleResult[] {
  return result.rules.filter((entry) => entry.violations.length > 0);
}

export function countViolations(result: Pick<RuleSetResult, "rules">): number {
  return result.rules.reduce((total, entry) => total + entry.violations.length, 0);
}
