import { isShapeKnown, type Shape } from "../../core/shape";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams } from "../params";

const TYPE = "ZerosLike";

/** Zeros shaped like data. Stands in for the gradient of an unused output. */
export class ZerosLikeProperty extends OperatorProperty {
  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, []);
  }

  typeString(): string {
    return TYPE;
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data] = inShapes;
    if (!isShapeKnown(data)) return null;
    return { inShapes: [data.slice()], outShapes: [data.slice()] };
  }

  // Constant output: nothing flows back.
  declareBackwardDependency<T>(): T[] {
    return [];
  }

  params(): OperatorParams {
    return {};
  }

  copy(): ZerosLikeProperty {
    return new ZerosLikeProperty();
  }
}
