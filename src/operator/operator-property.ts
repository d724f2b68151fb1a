import type { Shape } from "../core/shape";

export type OperatorParamValue = string | number | boolean;
export type OperatorParams = Record<string, OperatorParamValue>;

export interface ShapeInference {
  /** Input shapes, with any shape the operator could deduce filled in. */
  inShapes: Shape[];
  /** One shape per return, hidden returns included. */
  outShapes: Shape[];
}

/**
 * Descriptor of an operator: its argument and return names, how shapes flow
 * through it, and which values its backward computation reads.
 *
 * Descriptors are owned by exactly one graph node; sharing one between graphs
 * goes through copy().
 */
export abstract class OperatorProperty {
  abstract typeString(): string;

  /** Argument names; their order defines positional binding. */
  listArguments(): string[] {
    return ["data"];
  }

  listReturns(): string[] {
    return ["output"];
  }

  numReturns(): number {
    return this.listReturns().length;
  }

  /**
   * Number of returns exposed as graph heads. The rest are auxiliary values
   * kept for the backward computation.
   */
  numVisibleReturns(): number {
    return this.numReturns();
  }

  /**
   * @param inShapes - one entry per argument, empty when unknown
   * @returns the completed shapes, or null when the known inputs are not
   *   enough to decide
   * @throws ShapeInferenceError when the known shapes are inconsistent
   */
  abstract inferShape(inShapes: Shape[]): ShapeInference | null;

  /**
   * Selects the entries the backward node consumes, in order.
   * The default keeps every output gradient, input and output.
   */
  declareBackwardDependency<T>(outGrad: T[], inData: T[], outData: T[]): T[] {
    return [...outGrad, ...inData, ...outData];
  }

  abstract params(): OperatorParams;

  abstract copy(): OperatorProperty;
}
