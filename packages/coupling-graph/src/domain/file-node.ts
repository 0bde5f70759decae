import type { CouplingEdge, WeightedCouplingEdge } from "@cochange/core";

/**
 * Outgoing co-change weights of one file.
 *
 * Targets keep the order in which they were first recorded. Looking up a
 * target that was never recorded yields 0 and does not record it.
 */
export class FileNode {
  readonly path: string;
  private readonly weights = new Map<string, number>();

  constructor(path: string) {
    this.path = path;
  }

  addCoChange(target: string): void {
    this.weights.set(target, this.weightTo(target) + 1);
  }

  weightTo(target: string): number {
    return this.weights.get(target) ?? 0;
  }

  hasEdgeTo(target: string): boolean {
    return this.weights.has(target);
  }

  get targets(): readonly string[] {
    return [...this.weights.keys()];
  }

  toEdgeList(): readonly CouplingEdge[] {
    return this.targets.map((target) => ({ from: this.path, to: target }));
  }

  toWeightedEdgeList(): readonly WeightedCouplingEdge[] {
    return [...this.weights.entries()].map(([target, weight]) => ({
      from: this.path,
      to: target,
      weight,
    }));
  }
}
