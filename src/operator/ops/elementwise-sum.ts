import { formatShape, isShapeKnown, shapesEqual, type Shape } from "../../core/shape";
import { ShapeInferenceError } from "../operator-errors";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams, readInt } from "../params";

const TYPE = "ElementWiseSum";

export class ElementWiseSumProperty extends OperatorProperty {
  private readonly numArgs: number;

  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, ["numArgs"]);
    this.numArgs = readInt(TYPE, params, "numArgs", { min: 1 });
  }

  typeString(): string {
    return TYPE;
  }

  listArguments(): string[] {
    return Array.from({ length: this.numArgs }, (_, i) => `arg${i}`);
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const known = inShapes.find((shape) => isShapeKnown(shape));
    if (!known) return null;
    inShapes.forEach((shape, i) => {
      if (isShapeKnown(shape) && !shapesEqual(shape, known)) {
        throw new ShapeInferenceError(
          `${TYPE}: arg${i} has shape ${formatShape(shape)}, expected ${formatShape(known)}`,
        );
      }
    });
    return {
      inShapes: inShapes.map(() => known.slice()),
      outShapes: [known.slice()],
    };
  }

  declareBackwardDependency<T>(outGrad: T[]): T[] {
    return [outGrad[0]];
  }

  params(): OperatorParams {
    return { numArgs: this.numArgs };
  }

  copy(): ElementWiseSumProperty {
    return new ElementWiseSumProperty(this.params());
  }
}
