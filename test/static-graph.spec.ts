import { describe, expect, it } from "vitest";
import {
  ArityMismatchError,
  isBackwardNode,
  isForwardNode,
  isVariableNode,
  op,
  ShapeInferenceError,
  StaticGraph,
  variable,
} from "../src";
import { buildMlp } from "./helpers/graphs";

function project(graph: StaticGraph) {
  return {
    nodes: graph.nodes.map((node) => ({
      type: node.op ? node.op.typeString() : null,
      name: node.name,
      backwardSourceId: node.backwardSourceId,
      inputs: node.inputs,
    })),
    argNodes: graph.argNodes,
    heads: graph.heads,
  };
}

describe("toStaticGraph", () => {
  it("assigns ids in discovery order", () => {
    const { fc } = buildMlp();

    const graph = fc.toStaticGraph();

    expect(project(graph)).toEqual({
      nodes: [
        {
          type: "FullyConnected",
          name: "fc1",
          backwardSourceId: -1,
          inputs: [
            { sourceId: 1, index: 0 },
            { sourceId: 2, index: 0 },
            { sourceId: 3, index: 0 },
          ],
        },
        { type: null, name: "x", backwardSourceId: -1, inputs: [] },
        { type: null, name: "fc1_weight", backwardSourceId: -1, inputs: [] },
        { type: null, name: "fc1_bias", backwardSourceId: -1, inputs: [] },
      ],
      argNodes: [1, 2, 3],
      heads: [{ sourceId: 0, index: 0 }],
    });
  });

  it("copies operators instead of aliasing them", () => {
    const { fc } = buildMlp();

    const graph = fc.toStaticGraph();

    expect(graph.nodes[0].op).not.toBe(fc.heads[0].source.op);
  });

  it("is stable across lowerings of an unmodified graph", () => {
    const { net } = buildMlp();

    expect(project(net.toStaticGraph())).toEqual(project(net.toStaticGraph()));
  });

  it("records backward source ids of gradient nodes", () => {
    const x = variable("x");
    const relu = op("Activation", { data: x }, {
      name: "relu1",
      params: { actType: "relu" },
    });

    const graph = relu.grad(["x"]).toStaticGraph();

    expect(graph.nodes.map((node) => node.name)).toEqual([
      "relu1_backward",
      "relu1_0_grad",
      "relu1",
      "x",
    ]);
    expect(graph.nodes[0].backwardSourceId).toBe(2);
    expect(graph.argNodes).toEqual([1, 3]);
    expect(isBackwardNode(graph.nodes[0])).toBe(true);
    expect(isVariableNode(graph.nodes[1])).toBe(true);
    expect(isForwardNode(graph.nodes[2])).toBe(true);
  });
});

describe("topoSort", () => {
  it("orders inputs before their consumers", () => {
    const { fc } = buildMlp();

    expect(fc.toStaticGraph().topoSort()).toEqual([1, 2, 3, 0]);
  });
});

describe("makeBackwardPass", () => {
  it("appends head gradients and one backward node per operator", () => {
    const { net } = buildMlp();
    const graph = net.toStaticGraph();

    const pass = graph.makeBackwardPass();

    expect(pass.headGradNodes).toEqual([5]);
    expect(pass.argGrads).toEqual([
      { sourceId: 7, index: 0 },
      { sourceId: 7, index: 1 },
      { sourceId: 7, index: 2 },
    ]);
    expect(project(graph).nodes.slice(5)).toEqual([
      { type: null, name: "relu1_0_grad", backwardSourceId: -1, inputs: [] },
      {
        type: null,
        name: "relu1_backward",
        backwardSourceId: 0,
        inputs: [
          { sourceId: 5, index: 0 },
          { sourceId: 0, index: 0 },
        ],
      },
      {
        type: null,
        name: "fc1_backward",
        backwardSourceId: 1,
        inputs: [
          { sourceId: 6, index: 0 },
          { sourceId: 2, index: 0 },
          { sourceId: 3, index: 0 },
        ],
      },
    ]);
  });

  it("sums gradients flowing into one entry from several consumers", () => {
    const x = variable("x");
    const sum = op("ElementWiseSum", [x, x], {
      name: "s",
      params: { numArgs: 2 },
    });
    const graph = sum.toStaticGraph();

    const pass = graph.makeBackwardPass();

    expect(pass.argGrads).toEqual([{ sourceId: 4, index: 0 }]);
    expect(project(graph).nodes[4]).toEqual({
      type: "ElementWiseSum",
      name: "x_grad_agg",
      backwardSourceId: -1,
      inputs: [
        { sourceId: 3, index: 0 },
        { sourceId: 3, index: 1 },
      ],
    });
  });

  it("rejects a graph that already holds backward nodes", () => {
    const x = variable("x");
    const relu = op("Activation", { data: x }, { params: { actType: "relu" } });
    const graph = relu.grad(["x"]).toStaticGraph();

    expect(() => graph.makeBackwardPass()).toThrow(
      "makeBackwardPass: backward of backward is not supported",
    );
  });
});

describe("StaticGraph.inferShape", () => {
  it("fills in weight and bias shapes", () => {
    const { fc } = buildMlp();

    const result = fc.toStaticGraph().inferShape([[2, 3], [], []]);

    expect(result).toEqual({
      complete: true,
      argShapes: [[2, 3], [4, 3], [4]],
      outShapes: [[2, 4]],
    });
  });

  it("reports incomplete inference without failing", () => {
    const { fc } = buildMlp();

    const result = fc.toStaticGraph().inferShape([[], [], []]);

    expect(result).toEqual({
      complete: false,
      argShapes: [[], [], []],
      outShapes: [[]],
    });
  });

  it("requires one shape per argument", () => {
    const { fc } = buildMlp();

    expect(() => fc.toStaticGraph().inferShape([[2, 3]])).toThrow(
      new ArityMismatchError(3, 1),
    );
  });

  it("throws on inconsistent shapes", () => {
    const { fc } = buildMlp();

    expect(() => fc.toStaticGraph().inferShape([[2, 3], [5, 3], []])).toThrow(
      ShapeInferenceError,
    );
  });
});
