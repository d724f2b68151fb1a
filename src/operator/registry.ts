import { ActivationProperty } from "./ops/activation";
import { DropoutProperty } from "./ops/dropout";
import { ElementWiseSumProperty } from "./ops/elementwise-sum";
import { FlattenProperty } from "./ops/flatten";
import { FullyConnectedProperty } from "./ops/fully-connected";
import { SliceChannelProperty } from "./ops/slice-channel";
import { SoftmaxOutputProperty } from "./ops/softmax-output";
import { ZerosLikeProperty } from "./ops/zeros-like";
import { UnknownOperatorError } from "./operator-errors";
import type { OperatorParams, OperatorProperty } from "./operator-property";

export type OperatorFactory = (params: OperatorParams) => OperatorProperty;

const operators = new Map<string, OperatorFactory>();
operators.set("Activation", (params) => new ActivationProperty(params));
operators.set("Dropout", (params) => new DropoutProperty(params));
operators.set("ElementWiseSum", (params) => new ElementWiseSumProperty(params));
operators.set("Flatten", (params) => new FlattenProperty(params));
operators.set("FullyConnected", (params) => new FullyConnectedProperty(params));
operators.set("SliceChannel", (params) => new SliceChannelProperty(params));
operators.set("SoftmaxOutput", (params) => new SoftmaxOutputProperty(params));
operators.set("ZerosLike", (params) => new ZerosLikeProperty(params));

export function registerOperator(name: string, factory: OperatorFactory): void {
  operators.set(name, factory);
}

export function hasOperator(name: string): boolean {
  return operators.has(name);
}

export function listOperators(): string[] {
  return Array.from(operators.keys()).sort();
}

export function createOperator(
  name: string,
  params: OperatorParams = {},
): OperatorProperty {
  const factory = operators.get(name);
  if (!factory) {
    throw new UnknownOperatorError(name);
  }
  return factory(params);
}
