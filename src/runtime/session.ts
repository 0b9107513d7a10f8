import * as AST from '../parser/ast';
import { Lexer } from '../lexer/lexer';
import { Parser } from '../parser/parser';
import { Interpreter, InterpreterOptions } from './interpreter';
import { SprigValue, sprigNil, valueToString } from './values';
import { ErrorCode, SprigError, formatError } from './errors';

export type Outcome =
  | { ok: true; value: SprigValue }
  | { ok: false; error: SprigError };

export interface SessionOptions extends InterpreterOptions {
  prompt?: string;
}

export const DEFAULT_PROMPT = 'sprig> ';

/** Lexer errors that only happen when the input stops inside a token. */
const UNTERMINATED_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.UnclosedString,
  ErrorCode.UnclosedInterpolation,
]);

/** Parser errors that mean "the input stops mid-form" when raised at end of input. */
const UNCLOSED_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.UnclosedList,
  ErrorCode.UnclosedInfix,
]);

/**
 * One interactive or batch run: an interpreter, its global environment and
 * the last value, which is bound to `_`.
 */
export class Session {
  readonly interpreter: Interpreter;
  prompt: string;
  private last: SprigValue = sprigNil();

  constructor(options: SessionOptions = {}) {
    this.interpreter = new Interpreter(options);
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.interpreter.globals.bindReserved('_', this.last);
  }

  get lastValue(): SprigValue {
    return this.last;
  }

  /**
   * Evaluate every form in `source`. A failing form is recorded and the next
   * one still runs; a lex or parse error ends the source there.
   */
  evaluate(source: string): Outcome[] {
    const outcomes: Outcome[] = [];
    let forms: Generator<AST.Term>;
    try {
      forms = new Parser().forms(new Lexer(source).tokenize());
    } catch (e) {
      return [failure(e)];
    }

    for (;;) {
      let next: IteratorResult<AST.Term>;
      try {
        next = forms.next();
      } catch (e) {
        outcomes.push(failure(e));
        break;
      }
      if (next.done) break;

      try {
        const value = this.interpreter.evaluate(next.value, this.interpreter.globals);
        this.last = value;
        this.interpreter.globals.bindReserved('_', value);
        outcomes.push({ ok: true, value });
      } catch (e) {
        outcomes.push(failure(e));
      }
    }
    return outcomes;
  }

  /** Evaluate a file into this session's global environment. */
  loadFile(file: string): void {
    this.interpreter.importFile(file);
  }

  /** True when `source` is a prefix of a form, not a complete or broken one. */
  isIncomplete(source: string): boolean {
    const parser = new Parser();
    try {
      parser.parse(new Lexer(source).tokenize());
      return false;
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      return UNTERMINATED_CODES.has(e.code) || (UNCLOSED_CODES.has(e.code) && parser.atEnd);
    }
  }
}

/** Rethrows anything that is not a language error. */
function failure(e: unknown): Outcome {
  if (e instanceof SprigError) return { ok: false, error: e };
  throw e;
}

/** The text the REPL prints for an outcome, or null for nothing (a nil value). */
export function formatOutcome(outcome: Outcome): string | null {
  if (!outcome.ok) return formatError(outcome.error);
  if (outcome.value.kind === 'nil') return null;
  return valueToString(outcome.value);
}
