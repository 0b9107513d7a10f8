/**
 * Primitive procedures available in every Sprig environment without import.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from '../lexer/lexer';
import { scanInterpolation } from '../lexer/interpolation';
import { Parser } from '../parser/parser';
import type { Term } from '../parser/ast';
import { Environment } from './environment';
import {
  Arity,
  BuiltinFn,
  SprigList,
  SprigValue,
  arrayToList,
  isList,
  isProcedure,
  listToArray,
  sprigBoolean,
  sprigBuiltin,
  sprigError,
  sprigNil,
  sprigNumber,
  sprigPair,
  sprigQuaternion,
  sprigString,
  sprigSymbol,
  termToValue,
  typeOf,
  valueToString,
  valueToTerm,
  valuesEqual,
} from './values';
import { ErrorCode, ExitSignal, SprigError, describeError, isErrorCode, signatureMismatch } from './errors';
import { getField } from './structs';
import { expandMacro } from './macros';
import {
  Quat,
  quatAdd,
  quatDiv,
  quatExp,
  quatFromReal,
  quatInverse,
  quatLn,
  quatMul,
  quatScale,
  quatSub,
} from './quaternion';
import { VERSION } from '../version';

// ─── Argument helpers ────────────────────────────────

function expectNumber(value: SprigValue): number {
  if (value.kind !== 'number') throw signatureMismatch('num', typeOf(value));
  return value.value;
}

/** A real number or a quaternion. */
type Numeric = number | Quat;

function expectNumeric(value: SprigValue): Numeric {
  if (value.kind === 'number') return value.value;
  if (value.kind === 'quaternion') return value.parts;
  throw signatureMismatch('num', typeOf(value));
}

function numericValue(x: Numeric): SprigValue {
  return typeof x === 'number' ? sprigNumber(x) : sprigQuaternion(x);
}

function toQuat(x: Numeric): Quat {
  return typeof x === 'number' ? quatFromReal(x) : x;
}

/** Real operands stay real; a quaternion operand promotes the other. */
function promoting(
  real: (a: number, b: number) => number,
  quat: (a: Quat, b: Quat) => Quat,
): (a: Numeric, b: Numeric) => Numeric {
  return (a, b) => typeof a === 'number' && typeof b === 'number' ? real(a, b) : quat(toQuat(a), toQuat(b));
}

const add = promoting((a, b) => a + b, quatAdd);
const subtract = promoting((a, b) => a - b, quatSub);
const multiply = promoting((a, b) => a * b, quatMul);
const divide = promoting((a, b) => a / b, quatDiv);

function expectString(value: SprigValue): string {
  if (value.kind !== 'string') throw signatureMismatch('string', typeOf(value));
  return value.value;
}

function expectBoolean(value: SprigValue): boolean {
  if (value.kind !== 'boolean') throw signatureMismatch('bool', typeOf(value));
  return value.value;
}

function expectList(value: SprigValue): SprigList {
  if (!isList(value)) throw signatureMismatch('list', typeOf(value));
  return value;
}

function exactly(n: number): Arity {
  return { min: n, max: n };
}

function atLeast(n: number): Arity {
  return { min: n, max: Infinity };
}

function numeric(fn: (x: number) => number): [Arity, BuiltinFn] {
  return [exactly(1), ([x]) => sprigNumber(fn(expectNumber(x)))];
}

/** A unary function that also takes quaternions. */
function numericOrQuat(real: (x: number) => Numeric, quat: (q: Quat) => Quat): [Arity, BuiltinFn] {
  return [exactly(1), ([x]) => {
    const n = expectNumeric(x);
    return numericValue(typeof n === 'number' ? real(n) : quat(n));
  }];
}

function comparison(test: (a: number, b: number) => boolean): [Arity, BuiltinFn] {
  return [exactly(2), ([a, b]) => sprigBoolean(test(expectNumber(a), expectNumber(b)))];
}

function display(args: SprigValue[]): string {
  return args.map(v => valueToString(v, { display: true })).join('');
}

/** Parse `source` and require exactly one form. */
function parseOne(source: string): Term {
  const terms = new Parser().parse(new Lexer(source).tokenize());
  if (terms.length !== 1) {
    throw new SprigError(ErrorCode.ParseFailed, {
      detail: `expected one expression, found ${terms.length}`,
    });
  }
  return terms[0];
}

// ─── Table ───────────────────────────────────────────

const and: [Arity, BuiltinFn] = [atLeast(0), args => sprigBoolean(args.map(expectBoolean).every(Boolean))];
const or: [Arity, BuiltinFn] = [atLeast(0), args => sprigBoolean(args.map(expectBoolean).some(Boolean))];

const BUILTINS: Record<string, [Arity, BuiltinFn]> = {
  // Arithmetic
  '+': [atLeast(0), args => numericValue(args.map(expectNumeric).reduce(add, 0))],
  '-': [atLeast(1), ([first, ...rest]) => {
    const x = expectNumeric(first);
    if (rest.length === 0) return numericValue(typeof x === 'number' ? -x : quatScale(x, -1));
    return numericValue(rest.map(expectNumeric).reduce(subtract, x));
  }],
  '*': [atLeast(0), args => numericValue(args.map(expectNumeric).reduce(multiply, 1))],
  '/': [atLeast(1), ([first, ...rest]) => {
    const x = expectNumeric(first);
    if (rest.length === 0) return numericValue(typeof x === 'number' ? 1 / x : quatInverse(x));
    return numericValue(rest.map(expectNumeric).reduce(divide, x));
  }],
  'quat': [exactly(4), args => {
    const [a, b, c, d] = args.map(expectNumber);
    return sprigQuaternion([a, b, c, d]);
  }],
  '%': [exactly(2), ([a, b]) => sprigNumber(expectNumber(a) % expectNumber(b))],
  'rem': [exactly(2), ([a, b]) => sprigNumber(expectNumber(a) % expectNumber(b))],
  'pow': [exactly(2), ([a, b]) => sprigNumber(Math.pow(expectNumber(a), expectNumber(b)))],
  'sqrt': [exactly(1), ([x]) => {
    const n = expectNumber(x);
    return n < 0 ? sprigQuaternion([0, Math.sqrt(-n), 0, 0]) : sprigNumber(Math.sqrt(n));
  }],
  'sin': numeric(Math.sin),
  'cos': numeric(Math.cos),
  'tan': numeric(Math.tan),
  'csc': numeric(x => 1 / Math.sin(x)),
  'sec': numeric(x => 1 / Math.cos(x)),
  'cot': numeric(x => 1 / Math.tan(x)),
  'asin': numeric(Math.asin),
  'acos': numeric(Math.acos),
  'atan': numeric(Math.atan),
  'exp': numericOrQuat(Math.exp, quatExp),
  'ln': numericOrQuat(Math.log, quatLn),
  'floor': numeric(Math.floor),
  'ceil': numeric(Math.ceil),
  'random': [exactly(0), () => sprigNumber(Math.random())],

  // Comparison
  '=': [exactly(2), ([a, b]) => sprigBoolean(valuesEqual(a, b))],
  'eq?': [exactly(2), ([a, b]) => sprigBoolean(valuesEqual(a, b))],
  '<': comparison((a, b) => a < b),
  '<=': comparison((a, b) => a <= b),
  '>': comparison((a, b) => a > b),
  '>=': comparison((a, b) => a >= b),

  // Booleans
  'and': and,
  '&&': and,
  'or': or,
  '||': or,
  'not': [exactly(1), ([x]) => sprigBoolean(!expectBoolean(x))],

  // Lists
  'cons': [exactly(2), ([head, tail]) => sprigPair(head, expectList(tail))],
  ':': [exactly(2), ([head, tail]) => sprigPair(head, expectList(tail))],
  'head': [exactly(1), ([xs]) => {
    const list = expectList(xs);
    if (list.kind === 'nil') throw new SprigError(ErrorCode.HeadOfEmpty);
    return list.head;
  }],
  'tail': [exactly(1), ([xs]) => {
    const list = expectList(xs);
    if (list.kind === 'nil') throw new SprigError(ErrorCode.TailOfEmpty);
    return list.tail;
  }],
  'list': [atLeast(0), args => arrayToList(args)],
  'append': [atLeast(0), args => arrayToList(args.flatMap(xs => listToArray(expectList(xs))))],
  '++': [atLeast(0), args => arrayToList(args.flatMap(xs => listToArray(expectList(xs))))],
  'empty?': [exactly(1), ([xs]) => sprigBoolean(expectList(xs).kind === 'nil')],
  'length': [exactly(1), ([xs]) => sprigNumber(listToArray(expectList(xs)).length)],

  // Strings
  'string-concat': [atLeast(0), args => sprigString(display(args))],
  'chars': [exactly(1), ([s]) => arrayToList(Array.from(expectString(s), ch => sprigString(ch)))],

  // I/O
  'display': [atLeast(0), (args, interp) => {
    interp.write(display(args));
    interp.flush();
    return sprigNil();
  }],
  'display-debug': [atLeast(0), (args, interp) => {
    interp.write(args.map(v => valueToString(v)).join(' '));
    interp.flush();
    return sprigNil();
  }],
  'newline': [exactly(0), (_args, interp) => {
    interp.write('\n');
    interp.flush();
    return sprigNil();
  }],
  'readline': [exactly(0), (_args, interp) => {
    const line = interp.readLine();
    return line === null ? sprigNil() : sprigString(line);
  }],
  'readfile': [exactly(1), (args, interp) => {
    const file = path.resolve(interp.scriptDir, expectString(args[0]));
    try {
      return sprigString(fs.readFileSync(file, 'utf-8'));
    } catch (e) {
      throw new SprigError(ErrorCode.ReadFileFailed, {
        detail: `${file}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }],

  // Meta
  'eval': [exactly(1), ([data], interp) => interp.evaluate(valueToTerm(data), interp.globals)],
  'parse': [exactly(1), ([source]) => termToValue(parseOne(expectString(source)))],
  'type-of': [exactly(1), ([x]) => sprigSymbol(typeOf(x))],
  'format': [exactly(1), ([template], interp) => {
    const text = expectString(template);
    const { parts } = scanInterpolation(text, 0, false);
    return sprigString(parts.map(part => part.kind === 'text'
      ? part.value
      : valueToString(interp.evaluate(parseOne(part.source), interp.globals), { display: true }),
    ).join(''));
  }],
  'expand': [exactly(1), ([data], interp) => {
    const term = valueToTerm(data);
    const head = term.type === 'List' ? term.elements[0] : undefined;
    if (term.type !== 'List' || head === undefined || head.type !== 'Symbol') {
      throw signatureMismatch('macro call', typeOf(data));
    }
    const macro = interp.callerEnv.lookup(head.name);
    if (macro.kind !== 'macro') throw signatureMismatch('macro', typeOf(macro));
    return termToValue(expandMacro(macro, term, interp));
  }],
  'repeat': [exactly(2), ([n, fn], interp) => {
    const count = expectNumber(n);
    if (!Number.isInteger(count) || count < 0) throw signatureMismatch('non-negative integer', String(count));
    if (!isProcedure(fn)) throw signatureMismatch('procedure', typeOf(fn));
    for (let i = 0; i < count; i++) interp.apply(fn, []);
    return sprigNil();
  }],
  'env-var': [exactly(1), ([name]) => {
    const value = process.env[expectString(name)];
    return value === undefined ? sprigNil() : sprigString(value);
  }],
  'current-time': [exactly(0), () => sprigNumber(Date.now() / 1000)],
  'exit': [{ min: 0, max: 1 }, ([code]) => {
    throw new ExitSignal(code === undefined ? 0 : expectNumber(code));
  }],

  // Errors
  'make-error': [{ min: 2, max: 3 }, ([code, description, payload]) => {
    const n = expectNumber(code);
    if (!isErrorCode(n)) throw signatureMismatch('error code between 1 and 32', String(n));
    return sprigError(n, expectString(description), payload);
  }],
  'raise': [exactly(1), ([err]) => {
    if (err.kind !== 'error') throw signatureMismatch('error', typeOf(err));
    throw SprigError.fromValue(err);
  }],
  'print-error': [exactly(1), ([err], interp) => {
    if (err.kind !== 'error') throw signatureMismatch('error', typeOf(err));
    interp.writeError(valueToString(err) + '\n');
    return sprigNil();
  }],
  'is-error?': [exactly(1), ([x]) => sprigBoolean(x.kind === 'error')],
  'error-code': [exactly(1), ([err]) => {
    if (err.kind !== 'error') throw signatureMismatch('error', typeOf(err));
    return sprigNumber(err.code);
  }],
  'error-description': [exactly(1), ([err]) => {
    if (err.kind !== 'error') throw signatureMismatch('error', typeOf(err));
    return sprigString(err.description);
  }],
  'error-payload': [exactly(1), ([err]) => {
    if (err.kind !== 'error') throw signatureMismatch('error', typeOf(err));
    return err.payload ?? sprigNil();
  }],
  'catalog-description': [exactly(1), ([code]) => {
    const n = expectNumber(code);
    if (!isErrorCode(n)) throw signatureMismatch('error code between 1 and 32', String(n));
    return sprigString(describeError(n));
  }],
  'expect-type': [exactly(2), ([expected, value], interp) => {
    const name = expected.kind === 'struct-type' ? expected.name
      : expected.kind === 'symbol' ? expected.name
      : null;
    if (name === null) throw signatureMismatch('symbol', typeOf(expected));
    if (!interp.conformsTo(value, name)) throw signatureMismatch(name, typeOf(value));
    return value;
  }],

  // Structs
  'struct-get': [exactly(2), ([instance, field]) => {
    if (instance.kind !== 'struct') throw signatureMismatch('struct', typeOf(instance));
    if (field.kind !== 'symbol') throw signatureMismatch('symbol', typeOf(field));
    return getField(instance, field.name);
  }],
  'struct-type-of': [exactly(1), ([instance]) => {
    if (instance.kind !== 'struct') throw signatureMismatch('struct', typeOf(instance));
    return instance.type;
  }],
  'struct-fields': [exactly(1), ([type]) => {
    const structType = type.kind === 'struct' ? type.type : type;
    if (structType.kind !== 'struct-type') throw signatureMismatch('struct-type', typeOf(type));
    return arrayToList(structType.fields.map(sprigSymbol));
  }],
};

/** Names every builtin is installed under. */
export const BUILTIN_NAMES: readonly string[] = Object.keys(BUILTINS);

export function installBuiltins(env: Environment): void {
  for (const [name, [arity, fn]] of Object.entries(BUILTINS)) {
    env.define(name, sprigBuiltin(name, arity, fn));
  }
  env.define('pi', sprigNumber(Math.PI));
  env.define('version', sprigString(VERSION));
}
