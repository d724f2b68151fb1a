import { isShapeKnown, type Shape } from "../../core/shape";
import {
  OperatorProperty,
  type OperatorParams,
  type ShapeInference,
} from "../operator-property";
import { checkKnownParams, readEnum } from "../params";

const TYPE = "Activation";

export const ACTIVATION_TYPES = ["relu", "sigmoid", "tanh", "softrelu"] as const;
export type ActivationType = (typeof ACTIVATION_TYPES)[number];

export class ActivationProperty extends OperatorProperty {
  private readonly actType: ActivationType;

  constructor(params: OperatorParams = {}) {
    super();
    checkKnownParams(TYPE, params, ["actType"]);
    this.actType = readEnum(TYPE, params, "actType", ACTIVATION_TYPES);
  }

  typeString(): string {
    return TYPE;
  }

  inferShape(inShapes: Shape[]): ShapeInference | null {
    const [data] = inShapes;
    if (!isShapeKnown(data)) return null;
    return { inShapes: [data.slice()], outShapes: [data.slice()] };
  }

  // Every supported activation has a derivative expressible from its output.
  declareBackwardDependency<T>(outGrad: T[], _inData: T[], outData: T[]): T[] {
    return [outGrad[0], outData[0]];
  }

  params(): OperatorParams {
    return { actType: this.actType };
  }

  copy(): ActivationProperty {
    return new ActivationProperty(this.params());
  }
}
