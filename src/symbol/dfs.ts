import type { DataEntry, SymbolNode } from "./node";

/**
 * Pre-order depth-first visit of every node reachable from `heads`.
 *
 * Each node is visited exactly once, keyed on its id. Heads seed the stack in
 * order and inputs are pushed in reverse, so siblings pop in input order.
 */
export function dfsVisit(
  heads: readonly DataEntry[],
  visit: (node: SymbolNode) => void,
): void {
  const stack: SymbolNode[] = [];
  const visited = new Set<number>();
  const discover = (node: SymbolNode) => {
    if (visited.has(node.id)) return;
    visited.add(node.id);
    stack.push(node);
  };

  for (const head of heads) {
    discover(head.source);
  }
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    visit(node);
    for (let i = node.inputs.length - 1; i >= 0; i -= 1) {
      discover(node.inputs[i].source);
    }
  }
}

/** Reachable nodes in visiting order. */
export function collectNodes(heads: readonly DataEntry[]): SymbolNode[] {
  const nodes: SymbolNode[] = [];
  dfsVisit(heads, (node) => nodes.push(node));
  return nodes;
}
