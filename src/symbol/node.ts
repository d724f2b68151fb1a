import type { OperatorProperty } from "../operator/operator-property";

// ============================================================================
// Node ID Counter
// ============================================================================

let nextNodeId = 1;

export function resetNodeIdCounter(): void {
  nextNodeId = 1;
}

/** Output `index` of node `source`: the edge representation of the graph. */
export interface DataEntry {
  readonly source: SymbolNode;
  readonly index: number;
}

export type SymbolNodeKind = "variable" | "atomic" | "applied" | "backward";

/**
 * A graph vertex. Nodes are shared between every edge, head list and backward
 * link that refers to them; `id` is a stable handle used as the identity key
 * by traversals.
 */
export class SymbolNode {
  readonly id = nextNodeId++;
  inputs: DataEntry[] = [];
  /**
   * Forward node this backward node was derived from. A lookup-only relation:
   * traversals follow `inputs` and never this link.
   */
  backwardSource: SymbolNode | null = null;

  constructor(
    readonly op: OperatorProperty | null = null,
    public name = "",
  ) {}

  get kind(): SymbolNodeKind {
    if (this.backwardSource) return "backward";
    if (!this.op) return "variable";
    return this.inputs.length === 0 ? "atomic" : "applied";
  }

  isVariable(): boolean {
    return this.op === null && this.backwardSource === null;
  }

  /** Operator template not yet applied to arguments. */
  isAtomic(): boolean {
    return this.op !== null && this.inputs.length === 0;
  }

  isBackward(): boolean {
    return this.backwardSource !== null;
  }
}

export function entry(source: SymbolNode, index = 0): DataEntry {
  return { source, index };
}
