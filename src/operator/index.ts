export { ACTIVATION_TYPES, ActivationProperty, type ActivationType } from "./ops/activation";
export { DropoutProperty } from "./ops/dropout";
export { ElementWiseSumProperty } from "./ops/elementwise-sum";
export { FlattenProperty } from "./ops/flatten";
export { FullyConnectedProperty } from "./ops/fully-connected";
export { SliceChannelProperty } from "./ops/slice-channel";
export { SoftmaxOutputProperty } from "./ops/softmax-output";
export { ZerosLikeProperty } from "./ops/zeros-like";
export {
  OperatorParamError,
  ShapeInferenceError,
  UnknownOperatorError,
} from "./operator-errors";
export {
  OperatorProperty,
  type OperatorParams,
  type OperatorParamValue,
  type ShapeInference,
} from "./operator-property";
export {
  createOperator,
  hasOperator,
  listOperators,
  registerOperator,
  type OperatorFactory,
} from "./registry";
