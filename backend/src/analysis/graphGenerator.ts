import type { ProgramFunction } from "../core/function";
import { formatStatement } from "../core/statements";
import type { GraphEdge, GraphNode, GraphOutput } from "../types/analysis";
import type { ProgramRegistry } from "../types/sierra";

export function generateCfgGraph(fn: ProgramFunction, registry: ProgramRegistry): GraphOutput {
  const cfg = fn.getCfg();
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];

  for (const block of cfg.blocks.values()) {
    const instructions = block.statements.map((s) => formatStatement(s, registry));
    nodes.push({
      id: String(block.id),
      label: [`BB ${block.id}`, ...instructions].join("\n"),
      kind: block.id === cfg.entryBlock?.id ? "entry" : block.successors.length === 0 ? "exit" : "block",
      metadata: {
        start: block.start,
        end: block.end
      }
    });

    for (const destination of block.successors) {
      edges.push({
        id: `edge-${block.id}-${destination}`,
        from: String(block.id),
        to: String(destination)
      });
    }
  }

  return { nodes, edges };
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

/** Graphviz DOT for the function's CFG. */
export function cfgToDot(fn: ProgramFunction, registry: ProgramRegistry): string {
  const graph = generateCfgGraph(fn, registry);
  const lines = [`digraph ${quote(dotFileName(fn))} {`];

  for (const node of graph.nodes) {
    lines.push(`  ${node.id} [label=${quote(`${node.label}\n`)}];`);
  }
  for (const edge of graph.edges) {
    lines.push(`  ${edge.from} -> ${edge.to};`);
  }
  lines.push("}");

  return `${lines.join("\n")}\n`;
}

/** `a::b::c<T>` becomes `a_b_c.dot` */
export function dotFileName(fn: ProgramFunction): string {
  const [base = ""] = fn.name().split("<");
  return `${base.replace(/::/g, "_")}.dot`;
}
