import { isShapeKnown, sizeOf, type Shape } from "../../core/shape";
import { ShapeInferenceError } from "../operator-errors";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { assignShape, checkKnownParams, readBool, readInt } from "../params";

const TYPE = "FullyConnected";

/** output = data · weightᵀ + bias, with data flattened to two dimensions. */
export class FullyConnectedProperty extends OperatorProperty {
  private readonly numHidden: number;
  private readonly noBias: boolean;

  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, ["numHidden", "noBias"]);
    this.numHidden = readInt(TYPE, params, "numHidden", { min: 1 });
    this.noBias = readBool(TYPE, params, "noBias", false);
  }

  typeString(): string {
    return TYPE;
  }

  listArguments(): string[] {
    return this.noBias ? ["data", "weight"] : ["data", "weight", "bias"];
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data] = inShapes;
    if (!isShapeKnown(data)) return null;
    if (data.length < 2) {
      throw new ShapeInferenceError(
        `${TYPE}: data must have at least 2 dimensions, got ${data.length}`,
      );
    }
    const numInput = sizeOf(data.slice(1));
    const filled = inShapes.slice();
    filled[1] = assignShape(TYPE, "weight", inShapes[1], [
      this.numHidden,
      numInput,
    ]);
    if (!this.noBias) {
      filled[2] = assignShape(TYPE, "bias", inShapes[2], [this.numHidden]);
    }
    return { inShapes: filled, outShapes: [[data[0], this.numHidden]] };
  }

  declareBackwardDependency<T>(outGrad: T[], inData: T[]): T[] {
    return [outGrad[0], inData[0], inData[1]];
  }

  params(): OperatorParams {
    return { numHidden: this.numHidden, noBias: this.noBias };
  }

  copy(): FullyConnectedProperty {
    return new FullyConnectedProperty(this.params());
  }
}
