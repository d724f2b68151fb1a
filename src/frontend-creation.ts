import type { OperatorParams } from "./operator/operator-property";
import { createOperator } from "./operator/registry";
import { SymbolGraph, type ComposeArgs } from "./symbol/symbol-graph";

export type OpCreateOptions = {
  /** Name of the composed node; also prefixes synthesized argument variables. */
  name?: string;
  params?: OperatorParams;
};

/**
 * Create a named, unbound variable.
 */
export function variable(name: string): SymbolGraph {
  return SymbolGraph.createVariable(name);
}

/**
 * Create an operator node from the registry and bind `args` to it.
 *
 * Keyword arguments may leave some operator arguments out; each gets a fresh
 * variable named `<name>_<argument>`. The default `{}` therefore yields an
 * operator applied to variables only. The result has one output per visible
 * return of the operator.
 */
export function op(
  type: string,
  args: ComposeArgs = {},
  options?: OpCreateOptions,
): SymbolGraph {
  return SymbolGraph.createApplied(
    createOperator(type, options?.params),
    args,
    options?.name ?? "",
  );
}

/**
 * Group several graphs into one with all of their outputs.
 */
export function group(...graphs: SymbolGraph[]): SymbolGraph {
  return SymbolGraph.createGroup(graphs);
}
