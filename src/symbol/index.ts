export { collectNodes, dfsVisit } from "./dfs";
export {
  entry,
  resetNodeIdCounter,
  SymbolNode,
  type DataEntry,
  type SymbolNodeKind,
} from "./node";
export {
  SymbolGraph,
  type ComposeArgs,
  type DuplicateArgReport,
  type KeywordArgs,
  type PositionalArgs,
} from "./symbol-graph";
export {
  AmbiguousNameError,
  ArityMismatchError,
  keywordMismatch,
  NonScalarReceiverError,
  SymbolError,
  TupleArgumentError,
  UnknownKeywordError,
  type SymbolErrorKind,
} from "./symbol-errors";
