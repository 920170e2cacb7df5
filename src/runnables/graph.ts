import { InvalidConfigError } from "../domain/errors.js";

export type RunnableKind =
  | "identity"
  | "lambda"
  | "retriever"
  | "prompt"
  | "generator"
  | "parser"
  | "sequence"
  | "parallel";

export type GraphNodeKind = RunnableKind | "input" | "output";

/** Human-readable description of what a stage takes and returns. */
export interface RunnableShape {
  input: string;
  output: string;
}

export interface GraphNode {
  id: string;
  label: string;
  kind: GraphNodeKind;
  shape: RunnableShape;
}

export interface GraphEdge {
  source: string;
  target: string;
  /** Branch name for edges leaving a parallel input marker. */
  label?: string;
}

/** Where a composed runnable attaches inside a graph. */
export interface GraphSpan {
  entry: string;
  exit: string;
}

export interface PipelineGraphJson {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

const BOX_GAP = "  ";

/**
 * Nodes and data-dependency edges of a composed pipeline. Built only for
 * diagnostics; it has no influence on invocation.
 */
export class PipelineGraph {
  private readonly nodeList: GraphNode[] = [];

  private readonly edgeList: GraphEdge[] = [];

  private readonly nodeById = new Map<string, GraphNode>();

  get nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  get edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  addNode(label: string, kind: GraphNodeKind, shape: RunnableShape): GraphNode {
    const node: GraphNode = {
      id: `node_${this.nodeList.length}`,
      label,
      kind,
      shape: { ...shape },
    };
    this.nodeList.push(node);
    this.nodeById.set(node.id, node);
    return node;
  }

  addEdge(source: string, target: string, label?: string): void {
    if (!this.nodeById.has(source) || !this.nodeById.has(target)) {
      throw new InvalidConfigError(`Cannot connect unknown graph nodes ${source} -> ${target}.`);
    }
    const edge: GraphEdge = label === undefined ? { source, target } : { source, target, label };
    this.edgeList.push(edge);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeById.get(id);
  }

  successors(id: string): GraphNode[] {
    return this.edgeList
      .filter((edge) => edge.source === id)
      .map((edge) => this.requireNode(edge.target));
  }

  toJSON(): PipelineGraphJson {
    return {
      nodes: this.nodeList.map((node) => ({ ...node, shape: { ...node.shape } })),
      edges: this.edgeList.map((edge) => ({ ...edge })),
    };
  }

  /**
   * Renders the graph top to bottom, one row of boxes per layer. A layer is
   * the longest path from a source node; boxes inside a layer keep insertion
   * order.
   */
  drawAscii(): string {
    const lines: string[] = [];

    this.layers().forEach((layer, layerIndex) => {
      const boxes = layer.map((node) => node.label);

      if (layerIndex > 0) {
        const centers: number[] = [];
        let offset = 0;
        for (const label of boxes) {
          const width = label.length + 4;
          centers.push(offset + Math.floor(width / 2));
          offset += width + BOX_GAP.length;
        }
        lines.push(markerRow(centers, "|"), markerRow(centers, "v"));
      }

      const border = boxes.map((label) => `+${"-".repeat(label.length + 2)}+`).join(BOX_GAP);
      lines.push(border, boxes.map((label) => `| ${label} |`).join(BOX_GAP), border);
    });

    return lines.map((line) => line.trimEnd()).join("\n");
  }

  private layers(): GraphNode[][] {
    const indegree = new Map<string, number>();
    const depth = new Map<string, number>();
    for (const node of this.nodeList) {
      indegree.set(node.id, 0);
      depth.set(node.id, 0);
    }
    for (const edge of this.edgeList) {
      indegree.set(edge.target, (indegree.get(edge.target) ?? 0) + 1);
    }

    const queue = this.nodeList.filter((node) => indegree.get(node.id) === 0);
    for (let cursor = 0; cursor < queue.length; cursor += 1) {
      const node = queue[cursor];
      const nodeDepth = depth.get(node.id) ?? 0;
      for (const next of this.successors(node.id)) {
        depth.set(next.id, Math.max(depth.get(next.id) ?? 0, nodeDepth + 1));
        const remaining = (indegree.get(next.id) ?? 0) - 1;
        indegree.set(next.id, remaining);
        if (remaining === 0) {
          queue.push(next);
        }
      }
    }

    const layers: GraphNode[][] = [];
    for (const node of this.nodeList) {
      const layerIndex = depth.get(node.id) ?? 0;
      while (layers.length <= layerIndex) {
        layers.push([]);
      }
      layers[layerIndex].push(node);
    }
    return layers;
  }

  private requireNode(id: string): GraphNode {
    const node = this.nodeById.get(id);
    if (!node) {
      throw new InvalidConfigError(`Unknown graph node ${id}.`);
    }
    return node;
  }
}

function markerRow(columns: number[], marker: string): string {
  let row = "";
  for (const column of columns) {
    row = `${row.padEnd(column, " ")}${marker}`;
  }
  return row;
}
