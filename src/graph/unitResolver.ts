import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage, ResolutionError } from "../core/errors";

const SOURCE_EXTENSIONS = new Set([".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs", ".mts", ".cts"]);
const DECLARATION_FILE = /\.d\.[cm]?ts$/;
const TEST_FILE = /\.(test|spec)\.[cm]?[jt]sx?$/;

export function isSourceFileName(fileName: string, includeTests: boolean): boolean {
  if (!SOURCE_EXTENSIONS.has(path.extname(fileName)) || DECLARATION_FILE.test(fileName)) {
    return false;
  }
  return includeTests || !TEST_FILE.test(fileName);
}

export async function listSourceFiles(dir: string, includeTests: boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSourceFileName(entry.name, includeTests))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

export async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

export function packageNameFromNodeModulesPath(filePath: string): string | undefined {
  const segments = path.normalize(filePath).split(path.sep);
  const index = segments.lastIndexOf("node_modules");
  if (index < 0 || index + 1 >= segments.length - 1) {
    return undefined;
  }

  const first = segments[index + 1];
  if (first.startsWith("@")) {
    const second = segments[index + 2];
    return second && index + 2 < segments.length - 1 ? `${first}/${second}` : undefined;
  }
  return first;
}

function manifestName(text: string, dir: string, manifestPath: string): string | undefined {
  let manifest: { name?: unknown };
  try {
    manifest = JSON.parse(text) as { name?: unknown };
  } catch (err) {
    throw new ResolutionError(`invalid package.json ${manifestPath}: ${errorMessage(err)}`, {
      unit: dir,
      file: manifestPath
    });
  }
  return typeof manifest.name === "string" && manifest.name.length > 0 ? manifest.name : undefined;
}

type PackageRoot = {
  dir: string;
  name: string;
};

/**
 * Names a directory after the nearest package.json that declares a name,
 * followed by the directory's path below it: `acme`, `acme/src/core`.
 */
export class UnitNamer {
  private readonly roots = new Map<string, Promise<PackageRoot | undefined>>();

  async nameFor(dir: string): Promise<string | undefined> {
    const absolute = path.resolve(dir);
    const root = await this.packageRootOf(absolute);
    if (!root) {
      return undefined;
    }

    const relative = path.relative(root.dir, absolute);
    return relative ? `${root.name}/${relative.split(path.sep).join("/")}` : root.name;
  }

  private packageRootOf(dir: string): Promise<PackageRoot | undefined> {
    const cached = this.roots.get(dir);
    if (cached) {
      return cached;
    }

    const pending = this.lookup(dir);
    this.roots.set(dir, pending);
    return pending;
  }

  private async lookup(dir: string): Promise<PackageRoot | undefined> {
    const manifestPath = path.join(dir, "package.json");
    const text = await fs.readFile(manifestPath, "utf8").catch(() => undefined);
    if (text !== undefined) {
      const name = manifestName(text, dir, manifestPath);
      if (name) {
        return { dir, name };
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) {
      return undefined;
    }
    return this.packageRootOf(parent);
  }
}
