/**
 * The closed catalog of Sprig error conditions.
 *
 * Every language-level failure, whether raised by the lexer, the parser, the
 * evaluator or a builtin, carries one of these codes. Descriptions are part
 * of the public contract and are printed verbatim.
 */

import type { Position } from '../parser/ast';
import type { SprigValue, SprigErrorValue } from './values';

export enum ErrorCode {
  UndefinedIdentifier = 1,
  NotCallable = 2,
  NoFunction = 3,
  ArityMismatch = 4,
  UnclosedList = 5,
  InfixMismatch = 6,
  UnclosedInfix = 7,
  UnclosedString = 8,
  SignatureMismatch = 9,
  HeadOfEmpty = 10,
  TailOfEmpty = 11,
  FlushFailed = 12,
  StructSyntax = 13,
  ReadFileFailed = 14,
  ReadStdinFailed = 15,
  ParseFailed = 16,
  LambdaSyntax = 17,
  CondNotBoolean = 18,
  CondCaseLength = 19,
  CondCaseNotList = 20,
  BindingListSyntax = 21,
  BindingNotSymbol = 22,
  BindingShape = 23,
  LetBodyMissing = 24,
  DefineTargetNotSymbol = 25,
  DefineShape = 26,
  ParamNotSymbol = 27,
  ReservedIdentifier = 28,
  NoSuchField = 29,
  TooManyStructs = 30,
  FormatWithoutExpression = 31,
  UnclosedInterpolation = 32,
}

export const ERROR_CATALOG: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.UndefinedIdentifier]: 'undefined identifier',
  [ErrorCode.NotCallable]: 'not a callable value',
  [ErrorCode.NoFunction]: 'no function to call',
  [ErrorCode.ArityMismatch]: 'arity mismatch',
  [ErrorCode.UnclosedList]: 'unclosed list',
  [ErrorCode.InfixMismatch]: 'infix functions must be identical',
  [ErrorCode.UnclosedInfix]: 'unclosed infix expression',
  [ErrorCode.UnclosedString]: 'unclosed string literal',
  [ErrorCode.SignatureMismatch]: 'signature mismatch',
  [ErrorCode.HeadOfEmpty]: 'cannot get the head of an empty list',
  [ErrorCode.TailOfEmpty]: 'cannot get the tail of an empty list',
  [ErrorCode.FlushFailed]: 'could not flush stdout',
  [ErrorCode.StructSyntax]: 'struct definition must have a name and a list of fields',
  [ErrorCode.ReadFileFailed]: 'could not read file',
  [ErrorCode.ReadStdinFailed]: 'failed to read stdin',
  [ErrorCode.ParseFailed]: 'could not parse expression',
  [ErrorCode.LambdaSyntax]: 'lambda syntax: (lambda [args...] body)',
  [ErrorCode.CondNotBoolean]: 'cond condition must be a boolean',
  [ErrorCode.CondCaseLength]: 'condition case must contain 2 elements',
  [ErrorCode.CondCaseNotList]: 'condition case must be a list',
  [ErrorCode.BindingListSyntax]: 'binding list must be a list of bindings',
  [ErrorCode.BindingNotSymbol]: 'identifier in binding must be a symbol',
  [ErrorCode.BindingShape]: 'binding must contain a symbol and a value',
  [ErrorCode.LetBodyMissing]: 'let body not found',
  [ErrorCode.DefineTargetNotSymbol]: 'value must be bound to a symbol',
  [ErrorCode.DefineShape]: 'define must bind either a function or a symbol',
  [ErrorCode.ParamNotSymbol]: 'function parameters must be symbols',
  [ErrorCode.ReservedIdentifier]: 'reserved identifier',
  [ErrorCode.NoSuchField]: 'struct does not contain specified field',
  [ErrorCode.TooManyStructs]: 'failed to define new struct; too many structs',
  [ErrorCode.FormatWithoutExpression]: 'format string must contain expression to interpolate',
  [ErrorCode.UnclosedInterpolation]: 'unclosed expression while interpolating string',
};

export function isErrorCode(code: number): code is ErrorCode {
  return Number.isInteger(code) && code >= 1 && code <= 32;
}

export function describeError(code: ErrorCode): string {
  return ERROR_CATALOG[code];
}

/** Zero-padded three digit form used in printed errors, e.g. `004`. */
export function formatCode(code: number): string {
  return String(code).padStart(3, '0');
}

export interface SprigErrorOptions {
  /** Extra context such as the offending identifier. Never part of the description. */
  detail?: string;
  payload?: SprigValue;
  position?: Position;
  /** Overrides the catalog text; only used for errors built by `make-error`. */
  description?: string;
}

export class SprigError extends Error {
  readonly code: ErrorCode;
  readonly description: string;
  readonly detail?: string;
  readonly payload?: SprigValue;
  readonly position?: Position;

  constructor(code: ErrorCode, options: SprigErrorOptions = {}) {
    const description = options.description ?? describeError(code);
    super(`error(${formatCode(code)}): ${description}`);
    this.name = 'SprigError';
    this.code = code;
    this.description = description;
    this.detail = options.detail;
    this.payload = options.payload;
    this.position = options.position;
  }

  toErrorValue(): SprigErrorValue {
    return {
      kind: 'error',
      code: this.code,
      description: this.description,
      payload: this.payload,
    };
  }

  static fromValue(value: SprigErrorValue): SprigError {
    return new SprigError(value.code, {
      description: value.description,
      payload: value.payload,
    });
  }
}

/**
 * Raised by the `exit` builtin. Not a SprigError, so `try` never catches it;
 * the CLI turns it into the process exit status.
 */
export class ExitSignal extends Error {
  readonly status: number;

  constructor(status: number) {
    super(`exit ${status}`);
    this.name = 'ExitSignal';
    this.status = status;
  }
}

/** Shorthand used by builtins for the very common type failure. */
export function signatureMismatch(expected: string, found: string): SprigError {
  return new SprigError(ErrorCode.SignatureMismatch, {
    detail: `expected ${expected}, found ${found}`,
  });
}

export function arityMismatch(expected: number | string, found: number): SprigError {
  return new SprigError(ErrorCode.ArityMismatch, {
    detail: `expected ${expected}, found ${found}`,
  });
}

/**
 * Format an error the way the REPL and CLI print it: the canonical line,
 * then an indented detail line when there is one.
 */
export function formatError(error: SprigError): string {
  const head = `error(${formatCode(error.code)}): ${error.description}`;
  const where = error.position ? `at line ${error.position.line}, column ${error.position.column}` : '';
  const context = [error.detail, where].filter(Boolean).join(' ');
  return context ? `${head}\n  ${context}` : head;
}
