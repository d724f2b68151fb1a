import { debugLog } from "../core/debug";
import { isShapeKnown, type Shape } from "../core/shape";
import type { OperatorProperty } from "../operator/operator-property";
import { createOperator } from "../operator/registry";
import { ArityMismatchError } from "../symbol/symbol-errors";

export const NO_BACKWARD_SOURCE = -1;

export interface StaticDataEntry {
  sourceId: number;
  index: number;
}

export interface StaticNode {
  /** Operator owned by this node; null for variables and backward nodes. */
  op: OperatorProperty | null;
  name: string;
  /** Id of the forward node a backward node derives from, or NO_BACKWARD_SOURCE. */
  backwardSourceId: number;
  inputs: StaticDataEntry[];
}

export interface BackwardPass {
  /** One gradient placeholder node per head, in head order. */
  headGradNodes: number[];
  /** Accumulated gradient of each argument, in argNodes order. */
  argGrads: StaticDataEntry[];
}

export interface InferShapeResult {
  /** False when some argument or output shape could not be resolved. */
  complete: boolean;
  argShapes: Shape[];
  outShapes: Shape[];
}

export function isVariableNode(node: StaticNode): boolean {
  return (
    node.op === null &&
    node.backwardSourceId === NO_BACKWARD_SOURCE &&
    node.inputs.length === 0
  );
}

export function isForwardNode(node: StaticNode): boolean {
  return node.op !== null && node.backwardSourceId === NO_BACKWARD_SOURCE;
}

/**
 * A backward node whose forward source was not lowered along with it keeps
 * the sentinel id; it still differs from a variable by having inputs.
 */
export function isBackwardNode(node: StaticNode): boolean {
  return !isForwardNode(node) && !isVariableNode(node);
}

function entryKey(entry: StaticDataEntry): string {
  return `${entry.sourceId}:${entry.index}`;
}

/**
 * Index-addressed form of a symbol graph, consumed by shape inference and
 * backward-pass synthesis.
 */
export class StaticGraph {
  nodes: StaticNode[] = [];
  /** Ids of the variable nodes, in discovery order. */
  argNodes: number[] = [];
  heads: StaticDataEntry[] = [];

  /**
   * Node ids ordered so that every node comes after its inputs and after its
   * backward source. Ties are broken by id.
   */
  topoSort(): number[] {
    const order: number[] = [];
    const state = new Uint8Array(this.nodes.length); // 0 new, 1 open, 2 done
    const dependencies = (nid: number): number[] => {
      const node = this.nodes[nid];
      const deps = node.inputs.map((input) => input.sourceId);
      if (node.backwardSourceId !== NO_BACKWARD_SOURCE) {
        deps.push(node.backwardSourceId);
      }
      return deps;
    };

    for (let root = 0; root < this.nodes.length; root += 1) {
      if (state[root] !== 0) continue;
      const stack: Array<{ nid: number; next: number; deps: number[] }> = [
        { nid: root, next: 0, deps: dependencies(root) },
      ];
      state[root] = 1;
      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (frame.next < frame.deps.length) {
          const dep = frame.deps[frame.next];
          frame.next += 1;
          if (state[dep] === 1) {
            throw new Error(`topoSort: cycle through node ${dep}`);
          }
          if (state[dep] === 0) {
            state[dep] = 1;
            stack.push({ nid: dep, next: 0, deps: dependencies(dep) });
          }
          continue;
        }
        stack.pop();
        state[frame.nid] = 2;
        order.push(frame.nid);
      }
    }
    return order;
  }

  /**
   * Propagates argument shapes through the graph. Operators may fill in
   * unknown argument shapes (weights, labels), which are reported back in
   * `argShapes`.
   */
  inferShape(argShapes: Shape[]): InferShapeResult {
    if (argShapes.length !== this.argNodes.length) {
      throw new ArityMismatchError(this.argNodes.length, argShapes.length);
    }
    const shapes: Shape[][] = this.nodes.map((node) =>
      Array.from({ length: node.op ? node.op.numReturns() : 1 }, (): Shape => []),
    );
    const read = (entry: StaticDataEntry): Shape =>
      shapes[entry.sourceId][entry.index] ?? [];

    this.argNodes.forEach((nid, i) => {
      shapes[nid][0] = argShapes[i].slice();
    });

    let complete = true;
    for (const nid of this.topoSort()) {
      const node = this.nodes[nid];
      if (isVariableNode(node)) continue;
      if (node.op && isForwardNode(node)) {
        const result = node.op.inferShape(node.inputs.map(read));
        if (!result) {
          complete = false;
          continue;
        }
        node.inputs.forEach((input, i) => {
          shapes[input.sourceId][input.index] = result.inShapes[i];
        });
        shapes[nid] = result.outShapes;
        continue;
      }
      // Gradient i of a backward node has the shape of its source's input i.
      if (node.backwardSourceId === NO_BACKWARD_SOURCE) {
        debugLog("infer-shape", `backward node ${node.name} has no source`);
        complete = false;
        continue;
      }
      shapes[nid] = this.nodes[node.backwardSourceId].inputs.map(read);
    }

    const outArgShapes = this.argNodes.map((nid) => shapes[nid][0]);
    const outShapes = this.heads.map(read);
    complete =
      complete &&
      outArgShapes.every((shape) => isShapeKnown(shape)) &&
      outShapes.every((shape) => isShapeKnown(shape));
    return { complete, argShapes: outArgShapes, outShapes };
  }

  /**
   * Appends the nodes computing the gradient of every head with respect to
   * every argument. Existing node ids are left untouched. Visible outputs
   * that no head depends on get a ZerosLike gradient.
   */
  makeBackwardPass(): BackwardPass {
    if (this.nodes.some((node) => isBackwardNode(node))) {
      throw new Error("makeBackwardPass: backward of backward is not supported");
    }
    const order = this.topoSort();
    const numForward = this.nodes.length;
    const gradMap = new Map<string, StaticDataEntry[]>();
    const addGrad = (target: StaticDataEntry, grad: StaticDataEntry) => {
      const key = entryKey(target);
      const grads = gradMap.get(key);
      if (grads) {
        grads.push(grad);
      } else {
        gradMap.set(key, [grad]);
      }
    };

    const headGradNodes: number[] = [];
    for (const head of this.heads) {
      const nid = this.appendNode({
        op: null,
        name: `${this.nodes[head.sourceId].name}_${head.index}_grad`,
        backwardSourceId: NO_BACKWARD_SOURCE,
        inputs: [],
      });
      addGrad(head, { sourceId: nid, index: 0 });
      headGradNodes.push(nid);
    }

    for (let i = order.length - 1; i >= 0; i -= 1) {
      const nid = order[i];
      const node = this.nodes[nid];
      if (!node.op || !isForwardNode(node)) continue;
      const outGrad: StaticDataEntry[] = [];
      const outData: StaticDataEntry[] = [];
      const numVisible = node.op.numVisibleReturns();
      for (let index = 0; index < node.op.numReturns(); index += 1) {
        outData.push({ sourceId: nid, index });
        if (index >= numVisible) continue;
        const grads = gradMap.get(entryKey({ sourceId: nid, index }));
        outGrad.push(
          grads
            ? this.aggregate(grads, `${node.name}_${index}_out_grad_agg`)
            : this.zeroGrad(
                { sourceId: nid, index },
                `${node.name}_${index}_zero_grad`,
              ),
        );
      }
      const gradId = this.appendNode({
        op: null,
        name: `${node.name}_backward`,
        backwardSourceId: nid,
        inputs: node.op
          .declareBackwardDependency(outGrad, node.inputs, outData)
          .map((dep) => ({ ...dep })),
      });
      node.inputs.forEach((input, index) => {
        addGrad(input, { sourceId: gradId, index });
      });
    }

    const argGrads = this.argNodes.map((nid) => {
      const grads = gradMap.get(entryKey({ sourceId: nid, index: 0 }));
      if (!grads) {
        throw new Error(
          `makeBackwardPass: argument ${this.nodes[nid].name} receives no gradient`,
        );
      }
      return this.aggregate(grads, `${this.nodes[nid].name}_grad_agg`);
    });

    debugLog(
      "backward",
      `forward=${numForward} appended=${this.nodes.length - numForward} args=${argGrads.length}`,
    );
    return { headGradNodes, argGrads };
  }

  private appendNode(node: StaticNode): number {
    this.nodes.push(node);
    return this.nodes.length - 1;
  }

  /** Gradient of a visible output that no head depends on. */
  private zeroGrad(output: StaticDataEntry, name: string): StaticDataEntry {
    const nid = this.appendNode({
      op: createOperator("ZerosLike"),
      name,
      backwardSourceId: NO_BACKWARD_SOURCE,
      inputs: [output],
    });
    return { sourceId: nid, index: 0 };
  }

  private aggregate(grads: StaticDataEntry[], name: string): StaticDataEntry {
    if (grads.length === 1) return grads[0];
    const nid = this.appendNode({
      op: createOperator("ElementWiseSum", { numArgs: grads.length }),
      name,
      backwardSourceId: NO_BACKWARD_SOURCE,
      inputs: grads.slice(),
    });
    return { sourceId: nid, index: 0 };
  }
}
