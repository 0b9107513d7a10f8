import { Lexer } from '../src/lexer/lexer';
import { Parser } from '../src/parser/parser';
import { Environment } from '../src/runtime/environment';
import { ErrorCode } from '../src/runtime/errors';
import {
  SprigClosure,
  SprigStructType,
  SprigValue,
  arrayToList,
  formatNumber,
  formatQuaternion,
  listToArray,
  sprigBoolean,
  sprigBuiltin,
  sprigError,
  sprigNil,
  sprigNumber,
  sprigQuaternion,
  sprigString,
  sprigSymbol,
  termToValue,
  typeOf,
  valueToString,
  valueToTerm,
  valuesEqual,
} from '../src/runtime/values';

describe('Values', () => {
  const point: SprigStructType = { kind: 'struct-type', id: 0, name: 'point', fields: ['x', 'y'] };

  function closure(name?: string): SprigClosure {
    return { kind: 'closure', params: [], body: [{ type: 'Nil', position: { line: 1, column: 1 } }], env: new Environment(), name };
  }

  function nums(...xs: number[]): SprigValue {
    return arrayToList(xs.map(sprigNumber));
  }

  function quoted(source: string): SprigValue {
    const [term] = new Parser().parse(new Lexer(source).tokenize());
    return termToValue(term);
  }

  describe('lists', () => {
    it('should convert between arrays and lists', () => {
      const list = nums(1, 2, 3);
      expect(list.kind).toBe('pair');
      if (list.kind === 'pair') {
        expect(listToArray(list)).toEqual([sprigNumber(1), sprigNumber(2), sprigNumber(3)]);
      }
      expect(arrayToList([])).toEqual(sprigNil());
    });
  });

  describe('valueToString', () => {
    it('should print atoms', () => {
      expect(valueToString(sprigNumber(2.5))).toBe('2.5');
      expect(valueToString(sprigNumber(-0.5))).toBe('-0.5');
      expect(valueToString(sprigBoolean(false))).toBe('false');
      expect(valueToString(sprigSymbol('abc'))).toBe('abc');
      expect(valueToString(sprigNil())).toBe('()');
    });

    it('should print numbers in plain decimal', () => {
      expect(formatNumber(1e21)).toBe('1000000000000000000000');
      expect(formatNumber(1.5e-7)).toBe('0.00000015');
      expect(formatNumber(-2.5e-7)).toBe('-0.00000025');
      expect(formatNumber(-0)).toBe('-0');
      expect(formatNumber(NaN)).toBe('NaN');
      expect(formatNumber(-Infinity)).toBe('-inf');
    });

    it('should print quaternions by their nonzero parts', () => {
      expect(formatQuaternion([1, -2, 0, 0.5])).toBe('1-2i+0.5k');
      expect(formatQuaternion([0, 0, 0, -1])).toBe('-1k');
      expect(formatQuaternion([0, 0, 0, 0])).toBe('0');
      expect(formatQuaternion([1, NaN, 0, 0])).toBe('NaN');
      expect(valueToString(sprigQuaternion([0, 0, 3, 0]))).toBe('3j');
    });

    it('should quote strings unless displaying', () => {
      expect(valueToString(sprigString('a "b"'))).toBe('"a \\"b\\""');
      expect(valueToString(sprigString('a "b"'), { display: true })).toBe('a "b"');
    });

    it('should print lists and quote forms', () => {
      expect(valueToString(nums(1, 2, 3))).toBe('(1 2 3)');
      expect(valueToString(quoted("'(a 'b)"))).toBe("'(a 'b)");
    });

    it('should print procedures, macros and structs', () => {
      expect(valueToString(closure('fib'))).toBe('<procedure fib>');
      expect(valueToString(closure())).toBe('<procedure>');
      expect(valueToString(sprigBuiltin('+', { min: 0, max: Infinity }, () => sprigNil()))).toBe('<builtin +>');
      expect(valueToString(point)).toBe('<struct point>');
      expect(valueToString({ kind: 'struct', type: point, values: [sprigNumber(1), sprigString('b')] }))
        .toBe('(make-point 1 "b")');
    });

    it('should print errors with a padded code', () => {
      expect(valueToString(sprigError(ErrorCode.ArityMismatch, 'arity mismatch'))).toBe('error(004): arity mismatch');
    });
  });

  describe('valuesEqual', () => {
    it('should compare data structurally', () => {
      expect(valuesEqual(nums(1, 2), nums(1, 2))).toBe(true);
      expect(valuesEqual(nums(1, 2), nums(1, 2, 3))).toBe(false);
      expect(valuesEqual(sprigNumber(1), sprigString('1'))).toBe(false);
      expect(valuesEqual(sprigNil(), arrayToList([]))).toBe(true);
      expect(valuesEqual(sprigQuaternion([1, 2, 3, 4]), sprigQuaternion([1, 2, 3, 4]))).toBe(true);
      expect(valuesEqual(sprigQuaternion([1, 2, 3, 4]), sprigQuaternion([1, 2, 3, 5]))).toBe(false);
    });

    it('should compare struct instances by type and fields', () => {
      const other: SprigStructType = { ...point, id: 1 };
      const a: SprigValue = { kind: 'struct', type: point, values: [sprigNumber(1), sprigNumber(2)] };
      const b: SprigValue = { kind: 'struct', type: point, values: [sprigNumber(1), sprigNumber(2)] };
      const c: SprigValue = { kind: 'struct', type: other, values: [sprigNumber(1), sprigNumber(2)] };
      expect(valuesEqual(a, b)).toBe(true);
      expect(valuesEqual(a, c)).toBe(false);
    });

    it('should compare procedures by identity', () => {
      const f = closure('f');
      expect(valuesEqual(f, f)).toBe(true);
      expect(valuesEqual(f, closure('f'))).toBe(false);
    });
  });

  describe('typeOf', () => {
    it('should name every kind', () => {
      expect(typeOf(sprigNumber(1))).toBe('num');
      expect(typeOf(sprigQuaternion([0, 1, 0, 0]))).toBe('quaternion');
      expect(typeOf(sprigString(''))).toBe('string');
      expect(typeOf(sprigBoolean(true))).toBe('bool');
      expect(typeOf(sprigNil())).toBe('list');
      expect(typeOf(nums(1))).toBe('list');
      expect(typeOf(closure())).toBe('procedure');
      expect(typeOf(point)).toBe('struct-type');
      expect(typeOf({ kind: 'struct', type: point, values: [] })).toBe('point');
      expect(typeOf(sprigError(ErrorCode.NotCallable, 'x'))).toBe('error');
    });
  });

  describe('quote bridge', () => {
    it('should turn quoted terms into data', () => {
      expect(valueToString(quoted('(a 1 "s" (b))'))).toBe('(a 1 "s" (b))');
      expect(valueToString(quoted('`(a ,b)'))).toBe('(quasiquote (a (unquote b)))');
    });

    it('should turn data back into terms', () => {
      const term = valueToTerm(nums(1, 2));
      expect(term.type).toBe('List');
      if (term.type === 'List') {
        expect(term.elements.map(el => el.type)).toEqual(['Number', 'Number']);
      }
      expect(valueToTerm(closure()).type).toBe('Embedded');
    });
  });
});
