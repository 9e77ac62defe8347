#!/usr/bin/env node
import { Command } from "commander";
import packageJson from "../../package.json";
import { collect, RawCheckOptions, resolveCheckOptions } from "./args";
import { determineExitCode, EXIT_FAILURE } from "./exitCode";
import { loadProject, runCheck } from "../core/check";
import { errorMessage, ResolutionError } from "../core/errors";
import { CheckResult, CheckOptions } from "../core/types";
import { renderGraph } from "../report/graph";
import { renderJson } from "../report/json";
import { renderText } from "../report/text";

function renderResult(result: CheckResult, opts: CheckOptions): string {
  switch (opts.format) {
    case "json":
      return renderJson(result);
    case "text":
    default:
      return renderText(result, opts.verbose);
  }
}

function warnSkippedImports(result: CheckResult, opts: CheckOptions): void {
  if (opts.verbose || opts.format !== "text") {
    return;
  }
  const dynamic = result.skippedImports.filter((skipped) => skipped.reason === "dynamic").length;
  if (dynamic > 0) {
    process.stderr.write(`Warning: skipped ${dynamic} import(s) without a literal specifier (use --verbose to list them)\n`);
  }
}

async function runDefaultCheck(configArgument: string | undefined, raw: RawCheckOptions): Promise<void> {
  const opts = resolveCheckOptions(raw, process.cwd(), configArgument);
  const result = await runCheck(opts, packageJson.version);
  warnSkippedImports(result, opts);
  process.stdout.write(renderResult(result, opts));
  process.exitCode = determineExitCode(result);
}

async function runGraph(configArgument: string | undefined, raw: RawCheckOptions): Promise<void> {
  const opts = resolveCheckOptions(raw, process.cwd(), configArgument);
  const { graph } = await loadProject(opts);
  process.stdout.write(renderGraph(graph, opts.format));
}

const program = new Command();
program
  .name("depfence")
  .description("check the dependencies between the packages of a project against a rule file")
  .version(packageJson.version, "--version", "Show version")
  .argument("[config]", "rule file (default: <root>/depfence.yaml)")
  .option("--config <file>", "rule file")
  .option("--root <dir>", "project root", ".")
  .option("--entry <dir>", "entry directory relative to the root (repeatable)", collect, [])
  .option("--format <format>", "output format: text|json", "text")
  .option("--verbose", "print graph statistics and skipped imports")
  .action(async (configArgument: string | undefined, rawOptions: RawCheckOptions) => {
    await runDefaultCheck(configArgument, rawOptions);
  });

program
  .command("graph")
  .description("print the package graph the rules are checked against")
  .argument("[config]", "rule file (default: <root>/depfence.yaml)")
  .option("--config <file>", "rule file")
  .option("--root <dir>", "project root", ".")
  .option("--entry <dir>", "entry directory relative to the root (repeatable)", collect, [])
  .option("--format <format>", "output format: text|json", "text")
  .action(async (configArgument: string | undefined, _options: RawCheckOptions, command: Command) => {
    await runGraph(configArgument, command.optsWithGlobals<RawCheckOptions>());
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  if (err instanceof ResolutionError && program.opts<RawCheckOptions>().verbose) {
    for (const location of err.failedLookupLocations) {
      process.stderr.write(`  looked in ${location}\n`);
    }
  }
  process.exitCode = EXIT_FAILURE;
});
