import path from "node:path";
import { loadConfig } from "../config/loader";
import { buildPackageGraph } from "../graph/builder";
import { PackageGraph } from "../graph/packageGraph";
import { countViolations, runRuleSet } from "../rules/ruleSet";
import { CheckOptions, CheckResult, LoadedConfig } from "./types";

export async function loadProject(opts: CheckOptions): Promise<{ config: LoadedConfig; graph: PackageGraph }> {
  const config = await loadConfig(opts.config);
  const graph = await buildPackageGraph(opts.root, {
    ...config.graph,
    entries: opts.entries.length > 0 ? opts.entries : config.graph.entries
  });
  return { config, graph };
}

export async function runCheck(opts: CheckOptions, toolVersion: string): Promise<CheckResult> {
  const { config, graph } = await loadProject(opts);
  const outcome = runRuleSet(config.ruleSet, graph);

  return {
    meta: {
      tool: { name: "depfence", version: toolVersion },
      root: opts.root,
      config: path.relative(opts.root, opts.config) || opts.config,
      workingPrefix: config.ruleSet.workingPrefix,
      timestamp: new Date().toISOString()
    },
    rules: outcome.rules,
    ok: outcome.ok,
    skippedImports: graph.skippedImports,
    stats: {
      packages: graph.size,
      edges: graph.edgeCount,
      rules: config.ruleSet.rules.length,
      violations: countViolations(outcome)
    }
  };
}
