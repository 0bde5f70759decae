import { describe, expect, it } from "vitest";
import {
  buildCouplingGraph,
  buildCouplingGraphSummary,
  selectStrongestEdges,
  type BuildCouplingGraphProgressEvent,
} from "./index.js";

const changeSets = [["lib/b.rb", "lib/a.rb", "lib/c.rb"], ["lib/a.rb", "lib/b.rb"], ["lib/c.rb"]];

describe("buildCouplingGraphSummary", () => {
  it("projects a sorted graph into nodes, edges, matrix and metrics", () => {
    const summary = buildCouplingGraphSummary({ targetPath: "/work/checkout", changeSets });

    expect(summary.targetPath).toBe("/work/checkout");
    expect(summary.nodes).toEqual(["lib/a.rb", "lib/b.rb", "lib/c.rb"]);
    expect(summary.edges).toEqual([
      { from: "lib/a.rb", to: "lib/c.rb" },
      { from: "lib/a.rb", to: "lib/b.rb" },
      { from: "lib/b.rb", to: "lib/a.rb" },
      { from: "lib/b.rb", to: "lib/c.rb" },
    ]);
    expect(summary.adjacencyMatrix).toEqual({
      header: ["lib/a.rb", "lib/b.rb", "lib/c.rb"],
      rows: [
        [0, 1, 1],
        [1, 0, 1],
        [0, 0, 0],
      ],
    });
    expect(summary.metrics).toEqual({
      nodeCount: 3,
      edgeCount: 4,
      totalWeight: 4,
      maxWeight: 1,
    });
  });

  it("limits strongest edges to the configured count", () => {
    const summary = buildCouplingGraphSummary({
      targetPath: "/work/checkout",
      changeSets,
      config: { strongestEdgeCount: 2 },
    });

    expect(summary.strongestEdges).toEqual([
      { from: "lib/a.rb", to: "lib/b.rb", weight: 1 },
      { from: "lib/a.rb", to: "lib/c.rb", weight: 1 },
    ]);
  });

  it("is deterministic for identical input", () => {
    const firstRun = buildCouplingGraphSummary({ targetPath: "/work/checkout", changeSets });
    const secondRun = buildCouplingGraphSummary({ targetPath: "/work/checkout", changeSets });

    expect(secondRun).toEqual(firstRun);
  });

  it("reports the sort after the graph is built", () => {
    const events: BuildCouplingGraphProgressEvent[] = [];
    buildCouplingGraphSummary({
      targetPath: "/work/checkout",
      changeSets: [["y.rb", "x.rb"]],
      onProgress: (event) => events.push(event),
    });

    expect(events).toEqual([
      { stage: "change_set_accumulated", processed: 1, total: 1, files: 2 },
      { stage: "graph_built", nodeCount: 2 },
      { stage: "sorting_graph", nodeCount: 2 },
      { stage: "graph_sorted", nodeCount: 2 },
    ]);
  });

  it("returns an empty graph when no change sets were read", () => {
    const summary = buildCouplingGraphSummary({ targetPath: "/work/checkout", changeSets: [] });

    expect(summary.nodes).toEqual([]);
    expect(summary.adjacencyMatrix).toEqual({ header: [], rows: [] });
    expect(summary.metrics).toEqual({ nodeCount: 0, edgeCount: 0, totalWeight: 0, maxWeight: 0 });
  });
});

describe("buildCouplingGraph", () => {
  it("reports progress per change set", () => {
    const events: BuildCouplingGraphProgressEvent[] = [];
    const graph = buildCouplingGraph([["x.rb", "y.rb"], ["x.rb", "y.rb"]], (event) => events.push(event));

    expect(graph.weightBetween("x.rb", "y.rb")).toBe(2);
    expect(events).toEqual([
      { stage: "change_set_accumulated", processed: 1, total: 2, files: 2 },
      { stage: "change_set_accumulated", processed: 2, total: 2, files: 2 },
      { stage: "graph_built", nodeCount: 2 },
    ]);
  });
});

describe("selectStrongestEdges", () => {
  it("orders by weight, then source, then target", () => {
    expect(
      selectStrongestEdges(
        [
          { from: "b.rb", to: "a.rb", weight: 1 },
          { from: "a.rb", to: "c.rb", weight: 4 },
          { from: "a.rb", to: "b.rb", weight: 1 },
        ],
        10,
      ),
    ).toEqual([
      { from: "a.rb", to: "c.rb", weight: 4 },
      { from: "a.rb", to: "b.rb", weight: 1 },
      { from: "b.rb", to: "a.rb", weight: 1 },
    ]);
  });
});
