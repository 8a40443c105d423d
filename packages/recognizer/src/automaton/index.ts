export {
  DEFAULT_MAX_STEPS,
  StackAutomaton,
  type AnalysisResult,
  type StackAutomatonConfig,
} from './automaton.js';
export {
  NoTableEntryError,
  ParseError,
  StepLimitExceededError,
  UnconsumedInputError,
  UnconsumedObligationsError,
  UnexpectedTerminalError,
} from './parse-error.js';
export { ParseTable, ParseTableConfigError, type ParseTableEntry } from './parse-table.js';
export {
  describeSymbol,
  EMPTY,
  state,
  terminal,
  type EmptySymbol,
  type StackSymbol,
  type StateSymbol,
  type SymbolDescriber,
  type TerminalSymbol,
} from './stack-symbol.js';
export { SymbolStack } from './symbol-stack.js';
export { formatTrace, type TraceAction, type TraceRecord } from './trace.js';
