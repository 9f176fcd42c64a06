export { BddManager, type BddManagerOptions } from './manager';
export {
  type BddNode,
  type Decision,
  type Ref,
  type Terminal,
  FALSE,
  TRUE,
  NodeKind,
  renderNode,
} from './node';
export { NodeTable } from './node-table';
export {
  type FormulaBuilder,
  type Token,
  Lexer,
  Parser,
  TokenKind,
  formulaVariables,
  parseFormula,
} from './parse';
export {
  BddError,
  BddErrorKind,
  InvalidOrderingError,
  OutOfRangeError,
  UnassignedVariableError,
  UnexpectedTokenError,
  UnknownVariableError,
} from './errors';
export {
  type Classification,
  anySat,
  classify,
  evaluate,
  reachable,
  satCount,
  support,
} from './analysis';
export { toDot, toListing } from './export';
export { type BatchCase, type BatchResult, defaultCases, runBatch } from './batch';
