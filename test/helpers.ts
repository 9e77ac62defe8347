import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { makePackageNode, PackageGraph } from "../src/graph/packageGraph";

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function writeProject(prefix: string, files: Record<string, string>): Promise<string> {
  const dir = await makeTempDir(prefix);
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(dir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
  }
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

export function manifest(name: string, extra: Record<string, unknown> = {}): string {
  return `${JSON.stringify({ name, version: "1.0.0", ...extra }, null, 2)}\n`;
}

/**
 * Builds a graph from `name -> [dependencies]` entries. Names wrapped in
 * angle brackets are built-in modules.
 */
export function graphOf(edges: Record<string, string[]>): PackageGraph {
  const graph = new PackageGraph();
  const ensure = (raw: string): string => {
    const standardLibrary = raw.startsWith("<") && raw.endsWith(">");
    const name = standardLibrary ? raw.slice(1, -1) : raw;
    graph.add(makePackageNode(name, standardLibrary));
    return name;
  };

  for (const [from, dependencies] of Object.entries(edges)) {
    const source = ensure(from);
    for (const dependency of dependencies) {
      graph.addDependency(source, ensure(dependency));
    }
  }
  return graph;
}
