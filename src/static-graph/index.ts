export {
  isBackwardNode,
  isForwardNode,
  isVariableNode,
  NO_BACKWARD_SOURCE,
  StaticGraph,
  type BackwardPass,
  type InferShapeResult,
  type StaticDataEntry,
  type StaticNode,
} from "./static-graph";
