export { runCheck, loadProject } from "./core/check";
export { ConfigError, PatternError, ResolutionError } from "./core/errors";
export * from "./core/types";
export { loadConfig, parseConfig } from "./config/loader";
export { buildPackageGraph } from "./graph/builder";
export type { BuildGraphOptions } from "./graph/builder";
export { displayName, makePackageNode, PackageGraph } from "./graph/packageGraph";
export { compileDependencyPattern, matchDependencyPattern } from "./rules/pattern";
export { compileRule, formatViolation, processMissingPackages, processPackage } from "./rules/rule";
export { runRuleSet } from "./rules/ruleSet";
