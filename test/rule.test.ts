import { describe, expect, it } from "vitest";
import { ConfigError } from "../src/core/errors";
import { PackageNode } from "../src/core/types";
import { PackageGraph } from "../src/graph/packageGraph";
import {
  compileRule,
  createRuleRunState,
  formatViolation,
  parseException,
  processMissingPackages,
  processPackage,
  RuleDefinition
} from "../src/rules/rule";
import { graphOf } from "./helpers";

function rule(overrides: Partial<RuleDefinition> = {}) {
  return compileRule("acme", { name: "test rule", packages: ".*", mayDepend: [], expected: [], ...overrides });
}

function nodeOf(graph: PackageGraph, name: string): PackageNode {
  const node = graph.get(name);
  if (!node) {
    throw new Error(`no node ${name}`);
  }
  return node;
}

function violationsFor(definition: Partial<RuleDefinition>, graph: PackageGraph, names: string[]): string[] {
  const compiled = rule(definition);
  const state = createRuleRunState();
  for (const name of names) {
    processPackage(compiled, state, graph, nodeOf(graph, name));
  }
  return state.violations.map((violation) => formatViolation(violation));
}

describe("compileRule", () => {
  it("anchors the package selector below the working prefix", () => {
    const compiled = rule({ packages: "src/core" });

    expect(compiled.packageSelector.test("acme/src/core")).toBe(true);
    expect(compiled.packageSelector.test("acme/src/core/io")).toBe(false);
    expect(compiled.packageSelector.test("other/acme/src/core")).toBe(false);
  });

  it("splits exceptions into generic and per-package sets", () => {
    const compiled = rule({ expected: ["src/legacy", " src/a  ->  src/b ", "src/a -> src/c", "src/legacy"] });

    expect(Array.from(compiled.genericExceptions)).toEqual(["acme/src/legacy"]);
    expect(Object.fromEntries(Array.from(compiled.specificExceptions, ([from, to]) => [from, Array.from(to)]))).toEqual({
      "acme/src/a": ["acme/src/b", "acme/src/c"]
    });
  });

  it("rejects malformed exceptions", () => {
    expect(() => parseException("acme", "a -> b -> c")).toThrow(ConfigError);
    expect(() => parseException("acme", " -> b")).toThrow('malformed exception " -> b"');
    expect(() => parseException("acme", "")).toThrow(ConfigError);
  });

  it("rejects an invalid selector", () => {
    expect(() => rule({ packages: "src/(" })).toThrow('invalid pattern "src/("');
  });
});

describe("processPackage", () => {
  it("flags every edge when nothing is allowed, naming a built-in target plainly", () => {
    const graph = graphOf({ "acme/app": ["<fs>", "lodash"] });

    expect(violationsFor({}, graph, ["acme/app"])).toEqual([
      "disallowed acme/app -> fs",
      "disallowed acme/app -> lodash"
    ]);
  });

  it("accepts edges matched by any allowed pattern", () => {
    const graph = graphOf({ "acme/app": ["<fs>", "lodash", "acme/util", "acme/db"] });

    expect(violationsFor({ mayDepend: ["<.*>", "third_parties", "acme/util"] }, graph, ["acme/app"])).toEqual([
      "disallowed acme/app -> acme/db"
    ]);
  });

  it("reports an unused generic exception for every processed package", () => {
    const graph = graphOf({ "acme/a": ["acme/b"], "acme/b": [], "acme/c": [] });

    expect(violationsFor({ mayDepend: ["acme/b"], expected: ["gone"] }, graph, ["acme/a", "acme/b", "acme/c"])).toEqual([
      "expected acme/a -> acme/gone",
      "expected acme/b -> acme/gone",
      "expected acme/c -> acme/gone"
    ]);
  });

  it("does not expect a package to depend on itself", () => {
    const graph = graphOf({ "acme/a": ["acme/shared"], "acme/shared": [], "acme/c": [] });

    expect(violationsFor({ expected: ["shared"] }, graph, ["acme/a", "acme/shared", "acme/c"])).toEqual([
      "expected acme/c -> acme/shared"
    ]);
  });

  it("still expects a generic exception whose edge an allowed pattern already covers", () => {
    const graph = graphOf({ "acme/a": ["acme/shared"] });

    expect(violationsFor({ mayDepend: ["acme/shared"], expected: ["shared"] }, graph, ["acme/a"])).toEqual([
      "expected acme/a -> acme/shared"
    ]);
  });

  it("emits disallowed edges first and unused exceptions sorted", () => {
    const graph = graphOf({ "acme/a": ["acme/z", "acme/used", "acme/y"] });

    expect(
      violationsFor({ expected: ["zeta", "a -> used", "a -> beta", "alpha"] }, graph, ["acme/a"])
    ).toEqual([
      "disallowed acme/a -> acme/z",
      "disallowed acme/a -> acme/y",
      "expected acme/a -> acme/alpha",
      "expected acme/a -> acme/zeta",
      "expected acme/a -> acme/beta"
    ]);
  });

  it("appends again when the same package is processed twice", () => {
    const graph = graphOf({ "acme/a": ["acme/b"] });

    expect(violationsFor({}, graph, ["acme/a", "acme/a"])).toEqual([
      "disallowed acme/a -> acme/b",
      "disallowed acme/a -> acme/b"
    ]);
  });
});

describe("processMissingPackages", () => {
  it("reports per-package exceptions for packages never processed", () => {
    const graph = graphOf({ "acme/a": ["acme/b"] });
    const compiled = rule({ expected: ["a -> b", "renamed -> b", "old -> b"] });
    const state = createRuleRunState();

    processPackage(compiled, state, graph, nodeOf(graph, "acme/a"));
    processMissingPackages(compiled, state);

    expect(state.violations).toEqual([
      { kind: "missing", package: "acme/old" },
      { kind: "missing", package: "acme/renamed" }
    ]);
    expect(state.violations.map((violation) => formatViolation(violation))).toEqual([
      "missing acme/old",
      "missing acme/renamed"
    ]);
  });
});
