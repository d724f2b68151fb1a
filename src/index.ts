export * from "./symbol";
export * from "./operator";
export * from "./static-graph";
export { isDebugEnabled, setDebugEnabled } from "./core/debug";
export {
  formatShape,
  isShapeKnown,
  shapesEqual,
  sizeOf,
  type Shape,
} from "./core/shape";
export { group, op, variable, type OpCreateOptions } from "./frontend-creation";
