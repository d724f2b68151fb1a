import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { collectNodes, op, variable, type SymbolGraph } from "../src";

type Step =
  | { kind: "variable"; name: string }
  | { kind: "sum"; picks: number[] };

const nameArb = fc.constantFrom("a", "b", "c");

const stepsArb = fc.array(
  fc.oneof(
    nameArb.map((name): Step => ({ kind: "variable", name })),
    fc
      .array(fc.nat(), { minLength: 1, maxLength: 3 })
      .map((picks): Step => ({ kind: "sum", picks })),
  ),
  { minLength: 1, maxLength: 20 },
);

/** Replays steps; a sum takes earlier graphs picked modulo the count so far. */
function buildGraph(steps: Step[]): SymbolGraph {
  const built: SymbolGraph[] = [];
  steps.forEach((step, i) => {
    if (step.kind === "variable" || built.length === 0) {
      built.push(variable(step.kind === "variable" ? step.name : "a"));
      return;
    }
    const args = step.picks.map((pick) => built[pick % built.length]);
    built.push(
      op("ElementWiseSum", args, {
        name: `n${i}`,
        params: { numArgs: args.length },
      }),
    );
  });
  return built[built.length - 1];
}

function describeNodes(graph: SymbolGraph): string[] {
  const nodes = collectNodes(graph.heads);
  const position = new Map<number, number>();
  nodes.forEach((node, i) => position.set(node.id, i));
  return nodes.map((node) => {
    const inputs = node.inputs
      .map((input) => `${position.get(input.source.id)}.${input.index}`)
      .join(",");
    return `${node.kind}:${node.name}[${inputs}]`;
  });
}

describe("symbol graph properties", () => {
  it("copy is structurally equal and disjoint", () => {
    fc.assert(
      fc.property(stepsArb, (steps) => {
        const graph = buildGraph(steps);
        const clone = graph.copy();

        expect(describeNodes(clone)).toEqual(describeNodes(graph));
        const ids = new Set(collectNodes(graph.heads).map((node) => node.id));
        expect(collectNodes(clone.heads).some((node) => ids.has(node.id))).toBe(
          false,
        );
      }),
    );
  });

  it("lowering is deterministic", () => {
    fc.assert(
      fc.property(stepsArb, (steps) => {
        const graph = buildGraph(steps);

        const first = graph.toStaticGraph();
        const second = graph.toStaticGraph();

        expect(second.argNodes).toEqual(first.argNodes);
        expect(second.heads).toEqual(first.heads);
        expect(second.nodes.map((node) => [node.name, node.inputs])).toEqual(
          first.nodes.map((node) => [node.name, node.inputs]),
        );
      }),
    );
  });

  it("lowered arguments follow listArguments", () => {
    fc.assert(
      fc.property(stepsArb, (steps) => {
        const graph = buildGraph(steps);

        const lowered = graph.toStaticGraph();

        expect(lowered.argNodes.map((nid) => lowered.nodes[nid].name)).toEqual(
          graph.listArguments(),
        );
      }),
    );
  });

  it("duplicate counts cover every variable node", () => {
    fc.assert(
      fc.property(stepsArb, (steps) => {
        const graph = buildGraph(steps);

        const { max, counts } = graph.findDuplicateArgs();

        const variables = collectNodes(graph.heads).filter((node) =>
          node.isVariable(),
        );
        const total = Object.values(counts).reduce((acc, n) => acc + n, 0);
        expect(total).toBe(variables.length);
        expect(max).toBe(Math.max(1, ...Object.values(counts)));
      }),
    );
  });
});
