import { OutputFormat } from "../core/types";
import { displayName, PackageGraph } from "../graph/packageGraph";

export function renderGraph(graph: PackageGraph, format: OutputFormat): string {
  if (format === "json") {
    const payload = graph.packages().map((node) => ({
      name: node.name,
      standardLibrary: node.standardLibrary,
      dependsOn: Array.from(node.dependsOn)
    }));
    return `${JSON.stringify(payload, null, 2)}\n`;
  }

  const lines = graph.packages().map((node) => {
    const dependencies = graph.dependenciesOf(node).map((dependency) => displayName(dependency));
    return dependencies.length > 0 ? `${displayName(node)} -> ${dependencies.join(", ")}` : displayName(node);
  });
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}
