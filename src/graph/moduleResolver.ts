import fs from "node:fs";
import path from "node:path";
import ts from "typescript";
import { ImportKind } from "../core/types";

const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  allowJs: true,
  resolveJsonModule: true
};

export type ModuleResolution = {
  filePath?: string;
  failedLookupLocations: string[];
};

export interface ModuleResolver {
  resolveToFile(specifier: string, fromFile: string, importKind: ImportKind): ModuleResolution;
}

function canonicalFileName(fileName: string): string {
  return ts.sys.useCaseSensitiveFileNames ? fileName : fileName.toLowerCase();
}

function findTsConfigPath(projectRoot: string): string | undefined {
  return ts.findConfigFile(projectRoot, ts.sys.fileExists, "tsconfig.json");
}

function loadCompilerOptionsFromTsConfig(configPath: string): ts.CompilerOptions | undefined {
  const config = ts.readConfigFile(configPath, ts.sys.readFile);
  if (config.error || !config.config) {
    return undefined;
  }

  const parsed = ts.parseJsonConfigFileContent(config.config, ts.sys, path.dirname(configPath));
  // A tsconfig whose include matches nothing still carries usable options.
  const fatal = parsed.errors.filter((diagnostic) => diagnostic.code !== 18003);
  if (fatal.length > 0) {
    return undefined;
  }

  return {
    ...DEFAULT_COMPILER_OPTIONS,
    ...parsed.options,
    allowJs: parsed.options.allowJs ?? true
  };
}

function readPackageType(dir: string, cache: Map<string, string | undefined>): string | undefined {
  if (cache.has(dir)) {
    return cache.get(dir);
  }

  let type: string | undefined;
  const manifestPath = path.join(dir, "package.json");
  if (fs.existsSync(manifestPath)) {
    const manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8")) as { type?: unknown };
    type = typeof manifest.type === "string" ? manifest.type : "commonjs";
  } else {
    const parent = path.dirname(dir);
    type = parent === dir ? undefined : readPackageType(parent, cache);
  }

  cache.set(dir, type);
  return type;
}

export function impliedModuleKind(
  fromFile: string,
  packageTypeCache: Map<string, string | undefined> = new Map()
): ts.ResolutionMode {
  const extension = path.extname(fromFile);
  if (extension === ".mts" || extension === ".mjs") {
    return ts.ModuleKind.ESNext;
  }
  if (extension === ".cts" || extension === ".cjs") {
    return ts.ModuleKind.CommonJS;
  }
  return readPackageType(path.dirname(fromFile), packageTypeCache) === "module"
    ? ts.ModuleKind.ESNext
    : ts.ModuleKind.CommonJS;
}

export function isNodeModulesPath(filePath: string): boolean {
  const normalized = path.normalize(filePath);
  return normalized.includes(`${path.sep}node_modules${path.sep}`);
}

class TypeScriptApiResolver implements ModuleResolver {
  private readonly compilerOptions: ts.CompilerOptions;
  private readonly cache: ts.ModuleResolutionCache;
  private readonly packageTypeCache = new Map<string, string | undefined>();

  constructor(projectRoot: string, compilerOptions: ts.CompilerOptions) {
    this.compilerOptions = compilerOptions;
    this.cache = ts.createModuleResolutionCache(projectRoot, canonicalFileName, compilerOptions);
  }

  private modeFor(fromFile: string, importKind: ImportKind): ts.ResolutionMode {
    if (importKind === "cjs-require") {
      return ts.ModuleKind.CommonJS;
    }
    if (importKind === "esm-dynamic-import") {
      return ts.ModuleKind.ESNext;
    }
    return impliedModuleKind(fromFile, this.packageTypeCache);
  }

  resolveToFile(specifier: string, fromFile: string, importKind: ImportKind): ModuleResolution {
    const resolved = ts.resolveModuleName(
      specifier,
      fromFile,
      this.compilerOptions,
      ts.sys,
      this.cache,
      undefined,
      this.modeFor(fromFile, importKind)
    );

    const failedLookupLocations =
      ((resolved as { failedLookupLocations?: readonly string[] }).failedLookupLocations ?? []).map((location: string) =>
        path.resolve(location)
      );
    const resolvedFileName = resolved.resolvedModule?.resolvedFileName;
    if (!resolvedFileName) {
      return { failedLookupLocations };
    }

    return {
      filePath: path.resolve(resolvedFileName),
      failedLookupLocations
    };
  }
}

export class TsResolver extends TypeScriptApiResolver {
  constructor(projectRoot: string, configPath: string) {
    super(projectRoot, loadCompilerOptionsFromTsConfig(configPath) ?? { ...DEFAULT_COMPILER_OPTIONS });
  }
}

export class NodeResolver extends TypeScriptApiResolver {
  constructor(projectRoot: string) {
    super(projectRoot, { ...DEFAULT_COMPILER_OPTIONS });
  }
}

export function createModuleResolver(projectRoot: string): ModuleResolver {
  const configPath = findTsConfigPath(projectRoot);
  if (configPath) {
    return new TsResolver(projectRoot, configPath);
  }
  return new NodeResolver(projectRoot);
}
