import { debugLog, isDebugEnabled } from "../core/debug";
import type { Shape } from "../core/shape";
import type { OperatorProperty } from "../operator/operator-property";
import {
  NO_BACKWARD_SOURCE,
  StaticGraph,
  type InferShapeResult,
  type StaticDataEntry,
} from "../static-graph/static-graph";
import { collectNodes, dfsVisit } from "./dfs";
import { entry, SymbolNode, type DataEntry } from "./node";
import {
  AmbiguousNameError,
  ArityMismatchError,
  keywordMismatch,
  NonScalarReceiverError,
  TupleArgumentError,
} from "./symbol-errors";

export type PositionalArgs = readonly SymbolGraph[];
export type KeywordArgs = Readonly<Record<string, SymbolGraph>>;
export type ComposeArgs = PositionalArgs | KeywordArgs;

export interface DuplicateArgReport {
  /** Largest number of distinct variable nodes sharing one name; at least 1. */
  max: number;
  /** Distinct variable nodes per name. */
  counts: Record<string, number>;
}

/** A staged edge rewrite: `node.inputs[slot] = target`. */
interface Replacement {
  node: SymbolNode;
  slot: number;
  target: DataEntry;
}

function isPositional(args: ComposeArgs): args is PositionalArgs {
  return Array.isArray(args);
}

function applyPlan(plan: Replacement[]): void {
  for (const { node, slot, target } of plan) {
    node.inputs[slot] = entry(target.source, target.index);
  }
}

/**
 * A symbolic expression: an ordered list of outputs ("heads") over a DAG of
 * operator and variable nodes.
 *
 * Nodes are shared between every graph that reaches them, so graphs are
 * never rewritten in place from outside: call() composes a fresh copy and
 * createApplied() binds a node no other graph has seen yet.
 */
export class SymbolGraph {
  private constructor(private readonly _heads: DataEntry[] = []) {}

  // ==========================================================================
  // Construction
  // ==========================================================================

  static createVariable(name: string): SymbolGraph {
    return new SymbolGraph([entry(new SymbolNode(null, name))]);
  }

  /** Wraps an operator as an atomic template with one head per visible return. */
  static create(op: OperatorProperty): SymbolGraph {
    const node = new SymbolNode(op, "");
    const heads: DataEntry[] = [];
    for (let i = 0; i < op.numVisibleReturns(); i += 1) {
      heads.push(entry(node, i));
    }
    return new SymbolGraph(heads);
  }

  /**
   * Applies a fresh node of `op` to `args` and returns one head per visible
   * return, so operators with several outputs can be used in a graph.
   */
  static createApplied(
    op: OperatorProperty,
    args: ComposeArgs,
    name = "",
  ): SymbolGraph {
    const node = new SymbolNode(op, "");
    new SymbolGraph([entry(node, 0)]).compose(args, name);
    const heads: DataEntry[] = [];
    for (let i = 0; i < op.numVisibleReturns(); i += 1) {
      heads.push(entry(node, i));
    }
    return new SymbolGraph(heads);
  }

  static createGroup(graphs: readonly SymbolGraph[]): SymbolGraph {
    return new SymbolGraph(graphs.flatMap((graph) => graph._heads));
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  get heads(): readonly DataEntry[] {
    return this._heads;
  }

  get numReturns(): number {
    return this._heads.length;
  }

  isAtomic(): boolean {
    return this._heads.length === 1 && this._heads[0].source.isAtomic();
  }

  listArguments(): string[] {
    const atomicOp = this.atomicOperator();
    if (atomicOp) {
      return atomicOp.listArguments();
    }
    const args: string[] = [];
    dfsVisit(this._heads, (node) => {
      if (node.isVariable()) args.push(node.name);
    });
    return args;
  }

  listReturns(): string[] {
    return this._heads.map(({ source, index }) => {
      if (source.isVariable()) return source.name;
      const returnName = returnNameOf(source, index);
      return source.name.length === 0
        ? returnName
        : `${source.name}_${returnName}`;
    });
  }

  /** The graph made of head `index` alone, sharing this graph's nodes. */
  at(index: number): SymbolGraph {
    if (!Number.isInteger(index) || index < 0 || index >= this.numReturns) {
      throw new RangeError(
        `Output index ${index} out of range for a graph with ${this.numReturns} outputs`,
      );
    }
    return new SymbolGraph([this._heads[index]]);
  }

  findDuplicateArgs(): DuplicateArgReport {
    const counts: Record<string, number> = {};
    let max = 1;
    dfsVisit(this._heads, (node) => {
      if (!node.isVariable()) return;
      const count = (counts[node.name] ?? 0) + 1;
      counts[node.name] = count;
      max = Math.max(max, count);
    });
    return { max, counts };
  }

  /** Debugging dump of the graph structure. Not a parsed format. */
  debugString(): string {
    const lines: string[] = [];
    const atomicOp = this.atomicOperator();
    if (atomicOp) {
      lines.push(`AtomicFunction Type:${atomicOp.typeString()}`, "Inputs:");
      this.listArguments().forEach((arg, i) => {
        lines.push(`\targ[${i}]=${arg}`);
      });
      return `${lines.join("\n")}\n`;
    }
    lines.push("Outputs:");
    this._heads.forEach((head, i) => {
      lines.push(`\toutput[${i}]=${head.source.name}(${head.index})`);
    });
    dfsVisit(this._heads, (node) => {
      if (node.isVariable()) {
        lines.push(`Variable:${node.name}`);
        return;
      }
      lines.push(`Name: ${node.name} Type:${typeStringOf(node)}`, "Inputs:");
      node.inputs.forEach((input, i) => {
        lines.push(`\targ[${i}]=${input.source.name}(${input.index})`);
      });
    });
    return `${lines.join("\n")}\n`;
  }

  toString(): string {
    return this.debugString();
  }

  // ==========================================================================
  // Copy and composition
  // ==========================================================================

  /** Deep structural copy; shares no node with this graph. */
  copy(): SymbolGraph {
    const oldToNew = new Map<number, SymbolNode>();
    const visited: SymbolNode[] = [];
    dfsVisit(this._heads, (node) => {
      visited.push(node);
      oldToNew.set(node.id, new SymbolNode(node.op ? node.op.copy() : null, node.name));
    });
    const lookup = (node: SymbolNode): SymbolNode => {
      const mapped = oldToNew.get(node.id);
      if (!mapped) {
        throw new Error(`copy: node ${node.name} was not visited`);
      }
      return mapped;
    };
    for (const oldNode of visited) {
      const newNode = lookup(oldNode);
      newNode.inputs = oldNode.inputs.map((input) =>
        entry(lookup(input.source), input.index),
      );
      if (oldNode.backwardSource) {
        newNode.backwardSource =
          oldToNew.get(oldNode.backwardSource.id) ?? oldNode.backwardSource;
      }
    }
    return new SymbolGraph(
      this._heads.map((head) => entry(lookup(head.source), head.index)),
    );
  }

  /**
   * Binds free variables in place, either positionally or by name, and names
   * the head node `name`. Only for graphs whose nodes nothing else reaches.
   */
  private compose(args: ComposeArgs, name: string): void {
    const head = this.requireComposableHead();
    head.name = name;
    if (isPositional(args)) {
      this.composePositional(head, args);
    } else {
      this.composeKeyword(head, args, name);
    }
    if (isDebugEnabled()) {
      debugLog("compose", `name=${name} args=${this.listArguments().join(",")}`);
    }
  }

  /**
   * Composes a copy of this graph, binding its free variables positionally or
   * by name and naming the head node `name`. This graph is left unchanged.
   */
  call(args: ComposeArgs, name = ""): SymbolGraph {
    const composed = this.copy();
    composed.compose(args, name);
    return composed;
  }

  private composePositional(head: SymbolNode, args: PositionalArgs): void {
    args.forEach((arg, i) => {
      if (arg.numReturns !== 1) throw new TupleArgumentError(i);
    });

    const atomicOp = this.atomicOperator();
    if (atomicOp) {
      const required = atomicOp.listArguments().length;
      if (required !== args.length) {
        throw new ArityMismatchError(required, args.length);
      }
      head.inputs = args.map((arg) => arg.singleHead());
      return;
    }

    // Every edge into the same variable node receives the same argument.
    const assigned = new Map<number, DataEntry | null>();
    const plan: Replacement[] = [];
    let distinct = 0;
    dfsVisit(this._heads, (node) => {
      node.inputs.forEach((input, slot) => {
        if (!input.source.isVariable()) return;
        let target = assigned.get(input.source.id);
        if (target === undefined) {
          target = distinct < args.length ? args[distinct].singleHead() : null;
          assigned.set(input.source.id, target);
          distinct += 1;
        }
        if (target) plan.push({ node, slot, target });
      });
    });
    if (distinct !== args.length) {
      throw new ArityMismatchError(distinct, args.length);
    }
    applyPlan(plan);
  }

  private composeKeyword(
    head: SymbolNode,
    kwargs: KeywordArgs,
    name: string,
  ): void {
    const keys = Object.keys(kwargs);
    for (const key of keys) {
      if (kwargs[key].numReturns !== 1) throw new TupleArgumentError(key);
    }

    const atomicOp = this.atomicOperator();
    if (atomicOp) {
      let matched = 0;
      head.inputs = atomicOp.listArguments().map((argName) => {
        const bound = kwargs[argName];
        if (Object.hasOwn(kwargs, argName) && bound) {
          matched += 1;
          return bound.singleHead();
        }
        const varName = name.length === 0 ? argName : `${name}_${argName}`;
        return entry(new SymbolNode(null, varName));
      });
      if (matched !== keys.length) {
        head.inputs = [];
        throw keywordMismatch("SymbolGraph.compose", keys, this.listArguments());
      }
      return;
    }

    const duplicates = this.findDuplicateArgs();
    if (duplicates.max > 1) {
      const offending = Object.fromEntries(
        Object.entries(duplicates.counts).filter(([, count]) => count > 1),
      );
      throw new AmbiguousNameError(offending);
    }

    const matchedNodes = new Set<number>();
    const plan: Replacement[] = [];
    dfsVisit(this._heads, (node) => {
      node.inputs.forEach((input, slot) => {
        const source = input.source;
        if (!source.isVariable() || !Object.hasOwn(kwargs, source.name)) return;
        matchedNodes.add(source.id);
        plan.push({ node, slot, target: kwargs[source.name].singleHead() });
      });
    });
    if (matchedNodes.size !== keys.length) {
      throw keywordMismatch("SymbolGraph.compose", keys, this.listArguments());
    }
    applyPlan(plan);
  }

  // ==========================================================================
  // Lowering and analysis
  // ==========================================================================

  /** Index-addressed projection; ids follow DFS discovery order. */
  toStaticGraph(): StaticGraph {
    const order = collectNodes(this._heads);
    const ids = new Map<number, number>();
    const graph = new StaticGraph();
    order.forEach((node, nid) => {
      ids.set(node.id, nid);
      if (node.isVariable()) graph.argNodes.push(nid);
    });
    const toStatic = (e: DataEntry): StaticDataEntry => {
      const sourceId = ids.get(e.source.id);
      if (sourceId === undefined) {
        throw new Error(`toStaticGraph: node ${e.source.name} is not part of the graph`);
      }
      return { sourceId, index: e.index };
    };

    graph.nodes = order.map((node) => {
      const sourceId = node.backwardSource
        ? ids.get(node.backwardSource.id)
        : undefined;
      if (node.backwardSource && sourceId === undefined) {
        debugLog(
          "lower",
          `backward source of ${node.name} is not reachable; lowered without it`,
        );
      }
      return {
        op: node.op ? node.op.copy() : null,
        name: node.name,
        backwardSourceId: sourceId ?? NO_BACKWARD_SOURCE,
        inputs: node.inputs.map(toStatic),
      };
    });
    graph.heads = this._heads.map(toStatic);
    return graph;
  }

  /**
   * Builds the graph of d(heads)/d(arg) for each argument named in `wrt`.
   * Forward nodes are shared with this graph; only gradient nodes are new.
   * A name carried by several variables resolves to the last of them in
   * listArguments() order.
   */
  grad(wrt: readonly string[]): SymbolGraph {
    const graph = this.toStaticGraph();
    const numForward = graph.nodes.length;
    const { argGrads } = graph.makeBackwardPass();

    const table = collectNodes(this._heads);
    for (let nid = numForward; nid < graph.nodes.length; nid += 1) {
      const staticNode = graph.nodes[nid];
      const node = new SymbolNode(staticNode.op, staticNode.name);
      if (staticNode.backwardSourceId !== NO_BACKWARD_SOURCE) {
        node.backwardSource = table[staticNode.backwardSourceId];
      }
      table.push(node);
    }
    for (let nid = numForward; nid < graph.nodes.length; nid += 1) {
      table[nid].inputs = graph.nodes[nid].inputs.map((input) =>
        entry(table[input.sourceId], input.index),
      );
    }

    const argNames = graph.argNodes.map((nid) => graph.nodes[nid].name);
    const argIndex = new Map<string, number>();
    argNames.forEach((argName, i) => argIndex.set(argName, i));
    const heads = wrt.map((argName) => {
      const position = argIndex.get(argName);
      if (position === undefined) {
        throw keywordMismatch("SymbolGraph.grad", [...wrt], argNames);
      }
      const grad = argGrads[position];
      return entry(table[grad.sourceId], grad.index);
    });

    debugLog(
      "grad",
      `forward=${numForward} appended=${graph.nodes.length - numForward} wrt=${wrt.join(",")}`,
    );
    return new SymbolGraph(heads);
  }

  /**
   * Infers argument and output shapes, from shapes given in listArguments()
   * order or from a subset of argument names.
   */
  inferShape(argShapes: readonly Shape[]): InferShapeResult;
  inferShape(knownShapes: Readonly<Record<string, Shape>>): InferShapeResult;
  inferShape(
    shapes: readonly Shape[] | Readonly<Record<string, Shape>>,
  ): InferShapeResult {
    const graph = this.toStaticGraph();
    if (isShapeList(shapes)) {
      return graph.inferShape(shapes.map((shape) => shape.slice()));
    }
    const argNames = graph.argNodes.map((nid) => graph.nodes[nid].name);
    const matchedNames = new Set<string>();
    const argShapes = argNames.map((argName) => {
      const known = shapes[argName];
      if (!Object.hasOwn(shapes, argName) || !known) return [];
      matchedNames.add(argName);
      return known.slice();
    });
    const keys = Object.keys(shapes);
    if (matchedNames.size !== keys.length) {
      throw keywordMismatch("SymbolGraph.inferShape", keys, argNames);
    }
    return graph.inferShape(argShapes);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private atomicOperator(): OperatorProperty | null {
    return this.isAtomic() ? this._heads[0].source.op : null;
  }

  private singleHead(): DataEntry {
    return this._heads[0];
  }

  private requireComposableHead(): SymbolNode {
    if (this._heads.length !== 1) {
      throw new NonScalarReceiverError("tuple");
    }
    const head = this._heads[0].source;
    if (head.isVariable()) {
      throw new NonScalarReceiverError("variable");
    }
    return head;
  }
}

function isShapeList(
  shapes: readonly Shape[] | Readonly<Record<string, Shape>>,
): shapes is readonly Shape[] {
  return Array.isArray(shapes);
}

function typeStringOf(node: SymbolNode): string {
  const op = node.backwardSource ? node.backwardSource.op : node.op;
  return op ? op.typeString() : "";
}

/**
 * Name of output `index` of an operator or backward node. A backward node
 * returns the gradient of its source's arguments.
 */
function returnNameOf(node: SymbolNode, index: number): string {
  if (node.op) {
    return node.op.listReturns()[index] ?? `output${index}`;
  }
  const sourceOp = node.backwardSource ? node.backwardSource.op : null;
  const argName = sourceOp ? sourceOp.listArguments()[index] : undefined;
  return `${argName ?? `arg${index}`}_grad`;
}
