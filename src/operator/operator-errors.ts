export class OperatorParamError extends Error {
  name = "OperatorParamError";
}

export class UnknownOperatorError extends Error {
  name = "UnknownOperatorError";

  constructor(readonly operatorName: string) {
    super(`Unknown operator: ${operatorName}`);
  }
}

export class ShapeInferenceError extends Error {
  name = "ShapeInferenceError";
}
