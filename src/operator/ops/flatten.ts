import { isShapeKnown, sizeOf, type Shape } from "../../core/shape";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams } from "../params";

const TYPE = "Flatten";

export class FlattenProperty extends OperatorProperty {
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
    return {
      inShapes: [data.slice()],
      outShapes: [[data[0], sizeOf(data.slice(1))]],
    };
  }

  declareBackwardDependency<T>(outGrad: T[]): T[] {
    return [outGrad[0]];
  }

  params(): OperatorParams {
    return {};
  }

  copy(): FlattenProperty {
    return new FlattenProperty();
  }
}
