import { builtinModules } from "node:module";

// Scheme-only builtins such as node:test and node:sqlite are not listed without their prefix.
const SCHEME_ONLY_BUILTINS = ["test", "test/reporters", "sea", "sqlite"];

const BUILTIN_MODULES = new Set(builtinModules.map((name) => (name.startsWith("node:") ? name.slice(5) : name)));

export function builtinModuleName(specifier: string): string | undefined {
  if (specifier.startsWith("node:")) {
    const name = specifier.slice(5);
    return BUILTIN_MODULES.has(name) || SCHEME_ONLY_BUILTINS.includes(name) ? name : undefined;
  }
  return BUILTIN_MODULES.has(specifier) ? specifier : undefined;
}

export function isBareSpecifier(specifier: string): boolean {
  return !(specifier.startsWith(".") || specifier.startsWith("/") || /^[A-Za-z]:[\\/]/.test(specifier));
}

export function normalizePackageSpecifier(specifier: string): string | undefined {
  if (!specifier || !isBareSpecifier(specifier) || specifier.startsWith("node:")) {
    return undefined;
  }

  if (specifier.startsWith("@")) {
    const parts = specifier.split("/");
    if (parts.length < 2 || !parts[1]) {
      return undefined;
    }
    return `${parts[0]}/${parts[1]}`;
  }

  const firstSlash = specifier.indexOf("/");
  if (firstSlash < 0) {
    return specifier;
  }

  return specifier.slice(0, firstSlash);
}
