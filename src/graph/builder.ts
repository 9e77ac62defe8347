import path from "node:path";
import { ResolutionError } from "../core/errors";
import { GraphOptions, SkippedImport } from "../core/types";
import { createModuleResolver, isNodeModulesPath, ModuleResolver } from "./moduleResolver";
import { builtinModuleName, isBareSpecifier, normalizePackageSpecifier } from "./packageResolve";
import { makePackageNode, PackageGraph } from "./packageGraph";
import { ParsedImport, parseImportsFromFile } from "./sourceParse";
import { isDirectory, listSourceFiles, packageNameFromNodeModulesPath, UnitNamer } from "./unitResolver";

export type BuildGraphOptions = Partial<GraphOptions> & Pick<GraphOptions, "workingPrefix">;

type ResolvedUnit = {
  name: string;
  standardLibrary: boolean;
  dir?: string;
};

type BuildContext = {
  projectRoot: string;
  options: GraphOptions;
  resolver: ModuleResolver;
  namer: UnitNamer;
  graph: PackageGraph;
  unitDirs: Map<string, string>;
  queue: string[];
};

function withDefaults(options: BuildGraphOptions): GraphOptions {
  return {
    workingPrefix: options.workingPrefix,
    entries: options.entries && options.entries.length > 0 ? options.entries : ["."],
    includeTypeImports: options.includeTypeImports ?? true,
    includeTests: options.includeTests ?? false,
    ignoreImports: options.ignoreImports ?? []
  };
}

function displayPath(ctx: BuildContext, filePath: string): string {
  return path.relative(ctx.projectRoot, filePath) || ".";
}

async function resolveEntry(ctx: BuildContext, entry: string): Promise<ResolvedUnit> {
  const dir = path.resolve(ctx.projectRoot, entry);
  if (!(await isDirectory(dir))) {
    throw new ResolutionError(`entry ${entry} is not a directory`, { unit: entry });
  }
  if ((await listSourceFiles(dir, ctx.options.includeTests)).length === 0) {
    throw new ResolutionError(`entry ${entry} has no source files`, { unit: entry });
  }

  const name = await ctx.namer.nameFor(dir);
  if (!name) {
    throw new ResolutionError(`no named package.json found above ${displayPath(ctx, dir)}`, { unit: entry });
  }
  return { name, standardLibrary: false, dir };
}

async function resolveImport(ctx: BuildContext, unit: string, file: string, parsed: ParsedImport, specifier: string): Promise<ResolvedUnit> {
  const builtin = builtinModuleName(specifier);
  if (builtin) {
    return { name: builtin, standardLibrary: true };
  }

  const resolution = ctx.resolver.resolveToFile(specifier, file, parsed.kind);
  if (!resolution.filePath) {
    throw new ResolutionError(
      `cannot resolve ${JSON.stringify(specifier)} imported by ${displayPath(ctx, file)}:${parsed.line}`,
      { unit, specifier, file, line: parsed.line, failedLookupLocations: resolution.failedLookupLocations }
    );
  }

  if (isNodeModulesPath(resolution.filePath)) {
    const packageName =
      (isBareSpecifier(specifier) ? normalizePackageSpecifier(specifier) : undefined) ??
      packageNameFromNodeModulesPath(resolution.filePath) ??
      specifier;
    return { name: packageName, standardLibrary: false };
  }

  const dir = path.dirname(resolution.filePath);
  const name = await ctx.namer.nameFor(dir);
  if (!name) {
    throw new ResolutionError(`no named package.json found above ${displayPath(ctx, dir)}`, {
      unit,
      specifier,
      file,
      line: parsed.line
    });
  }
  return { name, standardLibrary: false, dir };
}

function enqueue(ctx: BuildContext, unit: ResolvedUnit): void {
  if (ctx.graph.has(unit.name)) {
    return;
  }

  ctx.graph.add(makePackageNode(unit.name, unit.standardLibrary));
  if (unit.dir) {
    ctx.unitDirs.set(unit.name, unit.dir);
  }
  if (!unit.standardLibrary && unit.name.startsWith(ctx.options.workingPrefix)) {
    ctx.queue.push(unit.name);
  }
}

function skip(ctx: BuildContext, unit: string, file: string, parsed: ParsedImport, reason: SkippedImport["reason"]): void {
  ctx.graph.skippedImports.push({
    unit,
    file: displayPath(ctx, file),
    line: parsed.line,
    column: parsed.column,
    importKind: parsed.kind,
    specifier: parsed.specifier,
    importText: parsed.importText,
    reason
  });
}

async function expandUnit(ctx: BuildContext, unit: string): Promise<void> {
  const dir = ctx.unitDirs.get(unit);
  if (!dir) {
    return;
  }

  for (const file of await listSourceFiles(dir, ctx.options.includeTests)) {
    for (const parsed of await parseImportsFromFile(file)) {
      if (parsed.typeOnly && !ctx.options.includeTypeImports) {
        continue;
      }

      const specifier = parsed.specifier;
      if (specifier === undefined) {
        skip(ctx, unit, file, parsed, "dynamic");
        continue;
      }
      if (ctx.options.ignoreImports.some((pattern) => pattern.test(specifier))) {
        skip(ctx, unit, file, parsed, "ignored");
        continue;
      }

      const dependency = await resolveImport(ctx, unit, file, parsed, specifier);
      enqueue(ctx, dependency);
      ctx.graph.addDependency(unit, dependency.name);
    }
  }
}

/**
 * Builds the package graph reachable from the entry directories. Built-in
 * modules, third-party packages and packages outside the working prefix are
 * recorded as leaves; every other package is expanded exactly once.
 */
export async function buildPackageGraph(projectRoot: string, options: BuildGraphOptions): Promise<PackageGraph> {
  const root = path.resolve(projectRoot);
  const ctx: BuildContext = {
    projectRoot: root,
    options: withDefaults(options),
    resolver: createModuleResolver(root),
    namer: new UnitNamer(),
    graph: new PackageGraph(),
    unitDirs: new Map(),
    queue: []
  };

  for (const entry of ctx.options.entries) {
    enqueue(ctx, await resolveEntry(ctx, entry));
  }

  while (ctx.queue.length > 0) {
    const unit = ctx.queue.shift();
    if (unit) {
      await expandUnit(ctx, unit);
    }
  }

  return ctx.graph;
}
