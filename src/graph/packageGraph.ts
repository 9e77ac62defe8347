import { PackageNode, SkippedImport } from "../core/types";

export function displayName(node: PackageNode): string {
  return node.standardLibrary ? `<${node.name}>` : node.name;
}

export function makePackageNode(name: string, standardLibrary = false): PackageNode {
  return {
    name,
    standardLibrary,
    dependsOn: new Set()
  };
}

export class PackageGraph {
  private readonly nodes = new Map<string, PackageNode>();
  readonly skippedImports: SkippedImport[] = [];

  get size(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const node of this.nodes.values()) {
      count += node.dependsOn.size;
    }
    return count;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get(name: string): PackageNode | undefined {
    return this.nodes.get(name);
  }

  add(node: PackageNode): PackageNode {
    const existing = this.nodes.get(node.name);
    if (existing) {
      return existing;
    }
    this.nodes.set(node.name, node);
    return node;
  }

  addDependency(from: string, to: string): void {
    const source = this.nodes.get(from);
    if (!source) {
      throw new Error(`unknown package ${from}`);
    }
    if (!this.nodes.has(to)) {
      throw new Error(`unknown dependency ${to} of ${from}`);
    }
    if (from === to) {
      return;
    }
    source.dependsOn.add(to);
  }

  packages(): PackageNode[] {
    return Array.from(this.nodes.values());
  }

  dependenciesOf(node: PackageNode): PackageNode[] {
    const out: PackageNode[] = [];
    for (const name of node.dependsOn) {
      const dependency = this.nodes.get(name);
      if (dependency) {
        out.push(dependency);
      }
    }
    return out;
  }
}
