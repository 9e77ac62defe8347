import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadProject, runCheck } from "../src/core/check";
import { ConfigError, ResolutionError } from "../src/core/errors";
import { CheckOptions } from "../src/core/types";
import { renderText } from "../src/report/text";
import { cleanupTempDirs, manifest, writeProject } from "./helpers";

afterEach(async () => {
  await cleanupTempDirs();
});

const RULES = `
options:
  working_prefix: shop
  entries: [src/api]
rules:
  - name: api only talks to services
    packages: src/api
    may_depend: ["<.*>", "shop/src/services"]
  - name: services stay below the api
    packages: src/services
    may_depend: ["<.*>", "third_parties", "shop/src/db"]
    expected:
      - src/legacy
      - src/checkout -> src/db
`;

function shopProject(): Promise<string> {
  return writeProject("depfence-check-", {
    "package.json": manifest("shop"),
    "depfence.yaml": RULES,
    "src/api/routes.ts": 'import http from "node:http";\nimport { cart } from "../services/cart";\nimport { rows } from "../db";\n',
    "src/services/cart.ts": 'import { rows } from "../db";\nimport { v4 } from "uuid";\nexport const cart = rows;\n',
    "src/db/index.ts": 'import { EventEmitter } from "events";\nexport const rows = new EventEmitter();\n',
    "node_modules/uuid/package.json": manifest("uuid", { types: "index.d.ts" }),
    "node_modules/uuid/index.d.ts": "export declare function v4(): string;\n"
  });
}

function options(root: string, overrides: Partial<CheckOptions> = {}): CheckOptions {
  return {
    root,
    config: path.join(root, "depfence.yaml"),
    entries: [],
    format: "text",
    verbose: false,
    ...overrides
  };
}

describe("runCheck", () => {
  it("reports disallowed, expected and missing entries per rule", async () => {
    const root = await shopProject();

    const result = await runCheck(options(root), "0.1.0");

    expect(result.ok).toBe(false);
    expect(result.meta).toMatchObject({ tool: { name: "depfence", version: "0.1.0" }, config: "depfence.yaml", workingPrefix: "shop" });
    expect(result.stats).toEqual({ packages: 6, edges: 6, rules: 2, violations: 3 });
    expect(renderText(result, false)).toBe(
      [
        "api only talks to services",
        "- disallowed shop/src/api -> shop/src/db",
        "services stay below the api",
        "- expected   shop/src/services -> shop/src/legacy",
        "- missing    shop/src/checkout",
        ""
      ].join("\n")
    );
  });

  it("lets --entry override the configured entries", async () => {
    const root = await shopProject();

    const { graph } = await loadProject(options(root, { entries: ["src/services"] }));

    expect(graph.packages().map((node) => node.name)).toEqual(["shop/src/services", "shop/src/db", "uuid", "events"]);
  });

  it("surfaces configuration and resolution failures as errors", async () => {
    const root = await shopProject();

    await expect(runCheck(options(root, { config: path.join(root, "missing.yaml") }), "0.1.0")).rejects.toBeInstanceOf(
      ConfigError
    );
    await expect(runCheck(options(root, { entries: ["src/nowhere"] }), "0.1.0")).rejects.toBeInstanceOf(ResolutionError);
  });
});
