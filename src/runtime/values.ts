/**
 * Runtime value types for the Sprig language.
 * Every term evaluates to a SprigValue.
 */

import type { Term, Position } from '../parser/ast';
import type { Environment } from './environment';
import type { Interpreter } from './interpreter';
import { ErrorCode, formatCode } from './errors';
import type { Quat } from './quaternion';

export type SprigValue =
  | SprigNumber
  | SprigQuaternion
  | SprigString
  | SprigSymbol
  | SprigBoolean
  | SprigNil
  | SprigPair
  | SprigClosure
  | SprigMacro
  | SprigStructType
  | SprigStruct
  | SprigBuiltin
  | SprigErrorValue;

export interface SprigNumber {
  kind: 'number';
  value: number;
}

export interface SprigQuaternion {
  kind: 'quaternion';
  parts: Quat;
}

export interface SprigString {
  kind: 'string';
  value: string;
}

export interface SprigSymbol {
  kind: 'symbol';
  name: string;
}

export interface SprigBoolean {
  kind: 'boolean';
  value: boolean;
}

/** The empty list. */
export interface SprigNil {
  kind: 'nil';
}

/** A cons cell. Only proper lists are built: `tail` is another pair or nil. */
export interface SprigPair {
  kind: 'pair';
  head: SprigValue;
  tail: SprigList;
}

export type SprigList = SprigPair | SprigNil;

export interface SprigClosure {
  kind: 'closure';
  params: string[];
  body: Term[];
  env: Environment;
  name?: string;
}

export interface TemplateTransformer {
  kind: 'template';
  params: string[];
  body: Term;
  env: Environment;
}

export interface RuleTransformer {
  kind: 'rule';
  /** The call's operands, matched against the call-site terms. */
  pattern: Term[];
  template: Term;
}

export type MacroTransformer = TemplateTransformer | RuleTransformer;

export interface SprigMacro {
  kind: 'macro';
  name: string;
  transformer: MacroTransformer;
}

export interface SprigStructType {
  kind: 'struct-type';
  id: number;
  name: string;
  fields: string[];
}

export interface SprigStruct {
  kind: 'struct';
  type: SprigStructType;
  values: SprigValue[];
}

export interface Arity {
  min: number;
  /** `Infinity` for variadic builtins. */
  max: number;
}

export type BuiltinFn = (args: SprigValue[], interp: Interpreter) => SprigValue;

export interface SprigBuiltin {
  kind: 'builtin';
  name: string;
  arity: Arity;
  fn: BuiltinFn;
}

export interface SprigErrorValue {
  kind: 'error';
  code: ErrorCode;
  description: string;
  payload?: SprigValue;
}

export type SprigProcedure = SprigClosure | SprigBuiltin;

// ─── Constructors ────────────────────────────────────

const NIL: SprigNil = { kind: 'nil' };

export function sprigNumber(value: number): SprigNumber {
  return { kind: 'number', value };
}

export function sprigQuaternion(parts: Quat): SprigQuaternion {
  return { kind: 'quaternion', parts };
}

export function sprigString(value: string): SprigString {
  return { kind: 'string', value };
}

export function sprigSymbol(name: string): SprigSymbol {
  return { kind: 'symbol', name };
}

export function sprigBoolean(value: boolean): SprigBoolean {
  return { kind: 'boolean', value };
}

export function sprigNil(): SprigNil {
  return NIL;
}

export function sprigPair(head: SprigValue, tail: SprigList): SprigPair {
  return { kind: 'pair', head, tail };
}

export function sprigBuiltin(name: string, arity: Arity, fn: BuiltinFn): SprigBuiltin {
  return { kind: 'builtin', name, arity, fn };
}

export function sprigError(code: ErrorCode, description: string, payload?: SprigValue): SprigErrorValue {
  return { kind: 'error', code, description, payload };
}

// ─── Lists ───────────────────────────────────────────

export function isList(value: SprigValue): value is SprigList {
  return value.kind === 'pair' || value.kind === 'nil';
}

export function arrayToList(values: SprigValue[]): SprigList {
  let list: SprigList = NIL;
  for (let i = values.length - 1; i >= 0; i--) {
    list = sprigPair(values[i], list);
  }
  return list;
}

export function listToArray(list: SprigList): SprigValue[] {
  const out: SprigValue[] = [];
  let cur: SprigList = list;
  while (cur.kind === 'pair') {
    out.push(cur.head);
    cur = cur.tail;
  }
  return out;
}

export function isProcedure(value: SprigValue): value is SprigProcedure {
  return value.kind === 'closure' || value.kind === 'builtin';
}

// ─── Utilities ───────────────────────────────────────

export interface PrintOptions {
  /** Print strings raw instead of quoted. */
  display?: boolean;
}

/** Shortest round-trip digits, never in exponent notation. */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'NaN';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Object.is(n, -0)) return '-0';
  const text = String(Math.abs(n));
  const digits = text.includes('e') ? withoutExponent(text) : text;
  return n < 0 ? '-' + digits : digits;
}

function withoutExponent(text: string): string {
  const [mantissa, exponent] = text.split('e');
  const [whole, fraction = ''] = mantissa.split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return '0.' + '0'.repeat(-point) + digits;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return digits.slice(0, point) + '.' + digits.slice(point);
}

const QUAT_UNITS = ['', 'i', 'j', 'k'];

/** Nonzero parts in order, e.g. `1+2i-3k`; `0` when all are zero. */
export function formatQuaternion(parts: Quat): string {
  if (parts.some(Number.isNaN)) return 'NaN';
  let out = '';
  parts.forEach((x, i) => {
    if (x === 0) return;
    const sign = out !== '' && x > 0 ? '+' : '';
    out += sign + formatNumber(x) + QUAT_UNITS[i];
  });
  return out === '' ? '0' : out;
}

export function valueToString(value: SprigValue, options: PrintOptions = {}): string {
  switch (value.kind) {
    case 'number': return formatNumber(value.value);
    case 'quaternion': return formatQuaternion(value.parts);
    case 'string': return options.display ? value.value : JSON.stringify(value.value);
    case 'symbol': return value.name;
    case 'boolean': return String(value.value);
    case 'nil': return '()';
    case 'pair': {
      const items = listToArray(value);
      if (items.length === 2 && items[0].kind === 'symbol' && items[0].name === 'quote') {
        return `'${valueToString(items[1], options)}`;
      }
      return '(' + items.map(v => valueToString(v, options)).join(' ') + ')';
    }
    case 'closure': return value.name ? `<procedure ${value.name}>` : '<procedure>';
    case 'builtin': return `<builtin ${value.name}>`;
    case 'macro': return `<macro ${value.name}>`;
    case 'struct-type': return `<struct ${value.name}>`;
    case 'struct': {
      const fields = value.values.map(v => ' ' + valueToString(v, options)).join('');
      return `(make-${value.type.name}${fields})`;
    }
    case 'error': return `error(${formatCode(value.code)}): ${value.description}`;
  }
}

/**
 * Structural over data, nominal over struct types, identity over
 * procedures and macros.
 */
export function valuesEqual(a: SprigValue, b: SprigValue): boolean {
  switch (a.kind) {
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'quaternion': {
      if (b.kind !== 'quaternion') return false;
      const others = b.parts;
      return a.parts.every((x, i) => x === others[i]);
    }
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'symbol': return b.kind === 'symbol' && a.name === b.name;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'nil': return b.kind === 'nil';
    case 'pair': {
      if (b.kind !== 'pair') return false;
      const xs = listToArray(a);
      const ys = listToArray(b);
      return xs.length === ys.length && xs.every((x, i) => valuesEqual(x, ys[i]));
    }
    case 'struct-type': return b.kind === 'struct-type' && a.id === b.id;
    case 'struct': {
      if (b.kind !== 'struct' || a.type.id !== b.type.id) return false;
      const others = b.values;
      return a.values.every((v, i) => valuesEqual(v, others[i]));
    }
    case 'error':
      return b.kind === 'error'
        && a.code === b.code
        && a.description === b.description
        && (a.payload === undefined || b.payload === undefined
          ? a.payload === b.payload
          : valuesEqual(a.payload, b.payload));
    case 'closure':
    case 'builtin':
    case 'macro':
      return a === b;
  }
}

/** The name `type-of` returns. */
export function typeOf(value: SprigValue): string {
  switch (value.kind) {
    case 'number': return 'num';
    case 'quaternion': return 'quaternion';
    case 'string': return 'string';
    case 'symbol': return 'symbol';
    case 'boolean': return 'bool';
    case 'nil':
    case 'pair':
      return 'list';
    case 'closure':
    case 'builtin':
      return 'procedure';
    case 'macro': return 'macro';
    case 'struct-type': return 'struct-type';
    case 'error': return 'error';
    case 'struct': return value.type.name;
  }
}

// ─── Quote / eval bridge ─────────────────────────────

function tagged(tag: string, term: Term): SprigValue {
  return arrayToList([sprigSymbol(tag), termToValue(term)]);
}

/** Turn a term into the data it denotes when quoted. */
export function termToValue(term: Term): SprigValue {
  switch (term.type) {
    case 'Number': return sprigNumber(term.value);
    case 'String': return sprigString(term.value);
    case 'Symbol': return sprigSymbol(term.name);
    case 'Boolean': return sprigBoolean(term.value);
    case 'Nil': return NIL;
    case 'List': return arrayToList(term.elements.map(termToValue));
    case 'Quote': return tagged('quote', term.term);
    case 'Quasiquote': return tagged('quasiquote', term.term);
    case 'Unquote': return tagged('unquote', term.term);
    case 'Interpolation':
      return arrayToList([
        sprigSymbol('string-concat'),
        ...term.parts.map(p => typeof p === 'string' ? sprigString(p) : termToValue(p)),
      ]);
    case 'Embedded': return term.value;
  }
}

/** Turn data back into code, e.g. for `eval` and macro expansion. */
export function valueToTerm(value: SprigValue, position: Position = { line: 0, column: 0 }): Term {
  switch (value.kind) {
    case 'number': return { type: 'Number', value: value.value, position };
    case 'string': return { type: 'String', value: value.value, position };
    case 'symbol': return { type: 'Symbol', name: value.name, position };
    case 'boolean': return { type: 'Boolean', value: value.value, position };
    case 'nil':
    case 'pair':
      return {
        type: 'List',
        elements: listToArray(value).map(v => valueToTerm(v, position)),
        position,
      };
    default:
      return { type: 'Embedded', value, position };
  }
}
