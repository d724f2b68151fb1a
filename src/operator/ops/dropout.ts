import { isShapeKnown, type Shape } from "../../core/shape";
import { OperatorParamError } from "../operator-errors";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams, readFloat } from "../params";

const TYPE = "Dropout";

/** Returns the dropped-out data plus a hidden mask reused by backward. */
export class DropoutProperty extends OperatorProperty {
  private readonly p: number;

  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, ["p"]);
    this.p = readFloat(TYPE, params, "p", 0.5);
    if (this.p < 0 || this.p >= 1) {
      throw new OperatorParamError(`${TYPE}: p must be in [0, 1), got ${this.p}`);
    }
  }

  typeString(): string {
    return TYPE;
  }

  listReturns(): string[] {
    return ["output", "mask"];
  }

  numVisibleReturns(): number {
    return 1;
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data] = inShapes;
    if (!isShapeKnown(data)) return null;
    return {
      inShapes: [data.slice()],
      outShapes: [data.slice(), data.slice()],
    };
  }

  declareBackwardDependency<T>(outGrad: T[], _inData: T[], outData: T[]): T[] {
    return [outGrad[0], outData[1]];
  }

  params(): OperatorParams {
    return { p: this.p };
  }

  copy(): DropoutProperty {
    return new DropoutProperty(this.params());
  }
}
