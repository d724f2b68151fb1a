import { isShapeKnown, type Shape } from "../../core/shape";
import { ShapeInferenceError } from "../operator-errors";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { assignShape, checkKnownParams } from "../params";

const TYPE = "SoftmaxOutput";

/**
 * Softmax over axis 1 fused with its cross-entropy loss. The gradient comes
 * from the label and the output alone, so backward ignores the output gradient.
 */
export class SoftmaxOutputProperty extends OperatorProperty {
  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, []);
  }

  typeString(): string {
    return TYPE;
  }

  listArguments(): string[] {
    return ["data", "label"];
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data, label] = inShapes;
    if (!isShapeKnown(data)) return null;
    if (data.length !== 2) {
      throw new ShapeInferenceError(
        `${TYPE}: data must have 2 dimensions, got ${data.length}`,
      );
    }
    return {
      inShapes: [data.slice(), assignShape(TYPE, "label", label, [data[0]])],
      outShapes: [data.slice()],
    };
  }

  declareBackwardDependency<T>(_outGrad: T[], inData: T[], outData: T[]): T[] {
    return [inData[1], outData[0]];
  }

  params(): OperatorParams {
    return {};
  }

  copy(): SoftmaxOutputProperty {
    return new SoftmaxOutputProperty();
  }
}
