import type { AdjacencyMatrix, CouplingEdge, WeightedCouplingEdge } from "@cochange/core";
import { comparePaths } from "./compare-paths.js";
import { FileNode } from "./file-node.js";

/**
 * Deduplicated, ordered collection of file nodes.
 *
 * Nodes stay in insertion order until `sortByPath` is called. A path may be
 * recorded as a target before (or without) being inserted as a source; every
 * projection reports such paths with weight 0.
 */
export class CouplingGraph {
  private nodes: FileNode[] = [];
  private readonly nodeByPath = new Map<string, FileNode>();

  get size(): number {
    return this.nodes.length;
  }

  /**
   * Finds or creates the node for `path` and adds one to its weight toward
   * each entry of `targets`, once per occurrence. Entries equal to `path`
   * are skipped.
   */
  add(path: string, targets: Iterable<string>): FileNode {
    let node = this.nodeByPath.get(path);
    if (node === undefined) {
      node = new FileNode(path);
      this.nodeByPath.set(path, node);
      this.nodes.push(node);
    }

    for (const target of targets) {
      if (target !== path) {
        node.addCoChange(target);
      }
    }

    return node;
  }

  has(path: string): boolean {
    return this.nodeByPath.has(path);
  }

  nodeFor(path: string): FileNode | undefined {
    return this.nodeByPath.get(path);
  }

  weightBetween(from: string, to: string): number {
    return this.nodeByPath.get(from)?.weightTo(to) ?? 0;
  }

  sortByPath(): void {
    this.nodes = [...this.nodes].sort((a, b) => comparePaths(a.path, b.path));
  }

  toNodeList(): readonly string[] {
    return this.nodes.map((node) => node.path);
  }

  toEdgeList(): readonly CouplingEdge[] {
    return this.nodes.flatMap((node) => node.toEdgeList());
  }

  toWeightedEdgeList(): readonly WeightedCouplingEdge[] {
    return this.nodes.flatMap((node) => node.toWeightedEdgeList());
  }

  toAdjacencyMatrix(): AdjacencyMatrix {
    const header = this.toNodeList();
    return {
      header,
      rows: this.nodes.map((node) => header.map((path) => node.weightTo(path))),
    };
  }
}
