import { RecognizerError } from '../errors.js';
import { describeSymbol, type StackSymbol } from './stack-symbol.js';
import type { TraceRecord } from './trace.js';

/**
 * Error thrown by the stack automaton
 *
 * `position` is the index of the lookahead in the terminal word (equal to
 * the word's length once the input is exhausted).
 */
export abstract class ParseError<S extends string = string, T extends string = string> extends RecognizerError {
  readonly position: number;
  /** Trace up to the failing step */
  readonly trace: readonly TraceRecord<S, T>[];

  constructor(message: string, position: number, trace: readonly TraceRecord<S, T>[]) {
    super(message);
    this.position = position;
    this.trace = trace;
  }
}

/**
 * The terminal on top of the stack differs from the lookahead
 */
export class UnexpectedTerminalError<S extends string = string, T extends string = string> extends ParseError<S, T> {
  readonly code = 'UNEXPECTED_TERMINAL' as const;
  readonly expected: T;
  readonly found: T;

  constructor(expected: T, found: T, position: number, trace: readonly TraceRecord<S, T>[]) {
    super(`Expected ${expected} but found ${found}`, position, trace);
    this.expected = expected;
    this.found = found;
  }
}

/**
 * The table has no production for the state on top of the stack and the lookahead
 */
export class NoTableEntryError<S extends string = string, T extends string = string> extends ParseError<S, T> {
  readonly code = 'NO_TABLE_ENTRY' as const;
  readonly state: S;
  readonly lookahead: T;

  constructor(state: S, lookahead: T, position: number, trace: readonly TraceRecord<S, T>[]) {
    super(`No table entry for state ${state} on lookahead ${lookahead}`, position, trace);
    this.state = state;
    this.lookahead = lookahead;
  }
}

/**
 * Input ended while the stack still held terminals or non-nullable states
 */
export class UnconsumedObligationsError<S extends string = string, T extends string = string> extends ParseError<
  S,
  T
> {
  readonly code = 'UNCONSUMED_OBLIGATIONS' as const;
  /** Pending symbols, top of the stack first */
  readonly pending: readonly StackSymbol<S, T>[];

  constructor(pending: readonly StackSymbol<S, T>[], position: number, trace: readonly TraceRecord<S, T>[]) {
    super(`Input ended before ${pending.map(describeSymbol).join(' ')}`, position, trace);
    this.pending = pending;
  }
}

/**
 * The grammar was satisfied before the input ran out
 */
export class UnconsumedInputError<S extends string = string, T extends string = string> extends ParseError<S, T> {
  readonly code = 'UNCONSUMED_INPUT' as const;
  readonly remaining: readonly T[];

  constructor(remaining: readonly T[], position: number, trace: readonly TraceRecord<S, T>[]) {
    super(`Unexpected input after end of statement: ${remaining.join(' ')}`, position, trace);
    this.remaining = remaining;
  }
}

/**
 * The automaton ran more steps than allowed (a table that expands without consuming)
 */
export class StepLimitExceededError<S extends string = string, T extends string = string> extends ParseError<S, T> {
  readonly code = 'STEP_LIMIT_EXCEEDED' as const;
  readonly limit: number;

  constructor(limit: number, position: number, trace: readonly TraceRecord<S, T>[]) {
    super(`Automaton exceeded ${limit} steps`, position, trace);
    this.limit = limit;
  }
}
