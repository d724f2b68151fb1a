import { isShapeKnown, type Shape } from "../../core/shape";
import { ShapeInferenceError } from "../operator-errors";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams, readInt } from "../params";

const TYPE = "SliceChannel";

/** Splits data evenly along axis 1 into numOutputs visible returns. */
export class SliceChannelProperty extends OperatorProperty {
  private readonly numOutputs: number;

  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, ["numOutputs"]);
    this.numOutputs = readInt(TYPE, params, "numOutputs", { min: 1 });
  }

  typeString(): string {
    return TYPE;
  }

  listReturns(): string[] {
    return Array.from({ length: this.numOutputs }, (_, i) => `output${i}`);
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data] = inShapes;
    if (!isShapeKnown(data)) return null;
    if (data.length < 2 || data[1] % this.numOutputs !== 0) {
      throw new ShapeInferenceError(
        `${TYPE}: axis 1 of data must be divisible by ${this.numOutputs}`,
      );
    }
    const slice = data.slice();
    slice[1] = data[1] / this.numOutputs;
    return {
      inShapes: [data.slice()],
      outShapes: this.listReturns().map(() => slice.slice()),
    };
  }

  declareBackwardDependency<T>(outGrad: T[]): T[] {
    return outGrad.slice();
  }

  params(): OperatorParams {
    return { numOutputs: this.numOutputs };
  }

  copy(): SliceChannelProperty {
    return new SliceChannelProperty(this.params());
  }
}
