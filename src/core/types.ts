export type OutputFormat = "text" | "json";
export type ImportKind = "esm-import" | "cjs-require" | "esm-dynamic-import";

export type PackageNode = {
  name: string;
  standardLibrary: boolean;
  dependsOn: Set<string>;
};

export type SkippedImport = {
  unit: string;
  file: string;
  line: number;
  column: number;
  importKind: ImportKind;
  specifier?: string;
  importText: string;
  reason: "dynamic" | "ignored";
};

export type GraphOptions = {
  workingPrefix: string;
  entries: string[];
  includeTypeImports: boolean;
  includeTests: boolean;
  ignoreImports: RegExp[];
};

export type DependencyPattern =
  | {
      mode: "third-parties";
      workingPrefix: string;
    }
  | {
      mode: "standard-library" | "project";
      expression: RegExp;
    };

export type Rule = {
  name: string;
  packageSelector: RegExp;
  allowedDependencyPatterns: DependencyPattern[];
  genericExceptions: Set<string>;
  specificExceptions: Map<string, Set<string>>;
};

export type RuleSet = {
  workingPrefix: string;
  rules: Rule[];
};

export type LoadedConfig = {
  ruleSet: RuleSet;
  graph: GraphOptions;
};

export type Violation =
  | {
      kind: "disallowed" | "expected";
      from: string;
      to: string;
    }
  | {
      kind: "missing";
      package: string;
    };

export type RuleRunState = {
  processedPackages: Set<string>;
  violations: Violation[];
};

export type RuleResult = {
  rule: Rule;
  violations: Violation[];
};

export type RuleSetResult = {
  rules: RuleResult[];
  ok: boolean;
};

export type CheckOptions = {
  root: string;
  config: string;
  entries: string[];
  format: OutputFormat;
  verbose: boolean;
};

export type CheckMeta = {
  tool: {
    name: string;
    version: string;
  };
  root: string;
  config: string;
  workingPrefix: string;
  timestamp: string;
};

export type CheckResult = {
  meta: CheckMeta;
  rules: RuleResult[];
  ok: boolean;
  skippedImports: SkippedImport[];
  stats: {
    packages: number;
    edges: number;
    rules: number;
    violations: number;
  };
};
