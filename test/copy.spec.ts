import { describe, expect, it } from "vitest";
import { collectNodes, op, variable, type SymbolGraph } from "../src";
import { buildMlp } from "./helpers/graphs";

function describeNodes(graph: SymbolGraph): string[] {
  return collectNodes(graph.heads).map((node) => {
    const type = node.op ? node.op.typeString() : "";
    return `${node.kind}:${node.name}:${type}`;
  });
}

describe("copy", () => {
  it("is structurally equal and shares no node", () => {
    const { net } = buildMlp();

    const clone = net.copy();

    expect(clone.numReturns).toBe(net.numReturns);
    expect(describeNodes(clone)).toEqual(describeNodes(net));
    const originalIds = new Set(collectNodes(net.heads).map((node) => node.id));
    for (const node of collectNodes(clone.heads)) {
      expect(originalIds.has(node.id)).toBe(false);
    }
  });

  it("copies operator descriptors", () => {
    const { net } = buildMlp();

    const clone = net.copy();

    const original = net.heads[0].source.op;
    const copied = clone.heads[0].source.op;
    expect(copied).not.toBe(original);
    expect(copied?.params()).toEqual({ actType: "relu" });
  });

  it("preserves sharing between edges", () => {
    const x = variable("x");
    const graph = op("ElementWiseSum", [x, x], { params: { numArgs: 2 } });

    const clone = graph.copy();

    const [first, second] = clone.heads[0].source.inputs;
    expect(first.source).toBe(second.source);
    expect(first.source).not.toBe(x.heads[0].source);
  });

  it("keeps the original intact when a call composes the clone", () => {
    const { net } = buildMlp();
    const before = net.debugString();

    const bound = net.call({ x: variable("input") }, "renamed");

    expect(bound.heads[0].source.name).toBe("renamed");
    expect(bound.listArguments()).toEqual(["input", "fc1_weight", "fc1_bias"]);
    expect(net.debugString()).toBe(before);
  });

  it("remaps backward sources that are part of the copy", () => {
    const x = variable("x");
    const relu = op("Activation", { data: x }, {
      name: "relu1",
      params: { actType: "relu" },
    });
    const gradient = relu.grad(["x"]);

    const clone = gradient.copy();

    const source = clone.heads[0].source.backwardSource;
    expect(source).not.toBeNull();
    expect(source).not.toBe(relu.heads[0].source);
    expect(collectNodes(clone.heads)).toContain(source);
    expect(source?.op?.typeString()).toBe("Activation");
  });

  it("keeps backward sources that are outside the copy", () => {
    const { fc } = buildMlp();
    const gradient = fc.grad(["x"]);

    const clone = gradient.copy();

    expect(clone.heads[0].source.backwardSource).toBe(fc.heads[0].source);
  });
});
