import { Interpreter, InterpreterOptions } from '../src/runtime/interpreter';
import { BufferSink } from '../src/runtime/io';
import { ErrorCode, SprigError } from '../src/runtime/errors';
import { StructRegistry } from '../src/runtime/structs';
import { valueToString } from '../src/runtime/values';

describe('Structs', () => {
  const POINT = '(define-struct point (x y)) (define p (make-point 1 2))';

  function show(source: string, options: InterpreterOptions = {}): string {
    return valueToString(new Interpreter({ output: new BufferSink(), ...options }).evaluateSource(source));
  }

  function errorOf(source: string, options: InterpreterOptions = {}): SprigError {
    try {
      show(source, options);
    } catch (e) {
      if (e instanceof SprigError) return e;
      throw e;
    }
    throw new Error(`expected ${source} to fail`);
  }

  describe('define-struct', () => {
    it('should bind a constructor and accessors', () => {
      expect(show(`${POINT} (list (point-x p) (point-y p))`)).toBe('(1 2)');
    });

    it('should print instances as constructor calls', () => {
      expect(show(`${POINT} p`)).toBe('(make-point 1 2)');
      expect(show(`${POINT} point`)).toBe('<struct point>');
    });

    it('should bind a predicate', () => {
      expect(show(`${POINT} (list (is-point? p) (is-point? 1))`)).toBe('(true false)');
    });

    it('should name the type in type-of', () => {
      expect(show(`${POINT} (type-of p)`)).toBe('point');
    });

    it('should compare instances by value', () => {
      expect(show(`${POINT} (= p (make-point 1 2))`)).toBe('true');
      expect(show(`${POINT} (= p (make-point 2 1))`)).toBe('false');
    });

    it('should make a redefinition a new type', () => {
      const source = '(define-struct t (v)) (define old (make-t 1)) (define-struct t (v)) (is-t? old)';
      expect(show(source)).toBe('false');
    });

    it('should check constructor arity (004)', () => {
      expect(errorOf(`${POINT} (make-point 1)`).code).toBe(ErrorCode.ArityMismatch);
    });

    it('should report malformed definitions (013)', () => {
      for (const source of [
        '(define-struct point)',
        '(define-struct point x)',
        '(define-struct (point) (x))',
        '(define-struct point (x 1))',
      ]) {
        expect(errorOf(source).code).toBe(ErrorCode.StructSyntax);
      }
    });
  });

  describe('fields', () => {
    it('should report an unknown accessor as 029', () => {
      const error = errorOf(`${POINT} (point-z p)`);
      expect(error.code).toBe(ErrorCode.NoSuchField);
      expect(error.detail).toBe('point has no field z');
    });

    it('should reject an accessor on a non-struct (009)', () => {
      expect(errorOf(`${POINT} (point-x 5)`).code).toBe(ErrorCode.SignatureMismatch);
    });

    it('should reject an accessor on another struct type (029)', () => {
      const source = '(define-struct a (v)) (define-struct b (v)) (a-v (make-b 1))';
      expect(errorOf(source).code).toBe(ErrorCode.NoSuchField);
    });

    it('should read fields by name with struct-get', () => {
      expect(show(`${POINT} (struct-get p 'y)`)).toBe('2');
      expect(errorOf(`${POINT} (struct-get p 'z)`).code).toBe(ErrorCode.NoSuchField);
    });

    it('should reflect on types', () => {
      expect(show(`${POINT} (struct-fields point)`)).toBe('(x y)');
      expect(show(`${POINT} (struct-fields p)`)).toBe('(x y)');
      expect(show(`${POINT} (struct-type-of p)`)).toBe('<struct point>');
    });
  });

  describe('capacity', () => {
    it('should refuse types past the limit (030)', () => {
      const error = errorOf('(define-struct a (x)) (define-struct b (x))', { structCapacity: 1 });
      expect(error.code).toBe(ErrorCode.TooManyStructs);
      expect(error.detail).toBe('limit is 1');
    });

    it('should allow 1024 types by default and refuse the next', () => {
      const types = Array.from({ length: 1024 }, (_, i) => `(define-struct s${i} (x))`).join('\n');
      expect(show(`${types} (s1023-x (make-s1023 7))`)).toBe('7');
      const error = errorOf(`${types} (define-struct one-too-many (x))`);
      expect(error.code).toBe(ErrorCode.TooManyStructs);
      expect(error.detail).toBe('limit is 1024');
    });

    it('should number types in registration order', () => {
      const registry = new StructRegistry(4);
      const first = registry.register('a', ['x']);
      const second = registry.register('a', ['x', 'y']);
      expect([first.id, second.id]).toEqual([0, 1]);
      expect(registry.size).toBe(2);
      expect(registry.find('a')).toBe(second);
      expect(registry.find('b')).toBeUndefined();
    });
  });

  describe('signature policy', () => {
    const TWO = '(define-struct a (x y)) (define-struct b (x y)) (expect-type a (make-b 1 2))';

    it('should match types by name under the nominal policy', () => {
      expect(errorOf(TWO).code).toBe(ErrorCode.SignatureMismatch);
      expect(show(`${POINT} (expect-type 'point p)`)).toBe('(make-point 1 2)');
    });

    it('should match types by shape under the structural policy', () => {
      expect(show(TWO, { signaturePolicy: 'structural' })).toBe('(make-b 1 2)');
    });

    it('should still reject different shapes under the structural policy', () => {
      const source = '(define-struct a (x y)) (define-struct c (y x)) (expect-type a (make-c 1 2))';
      expect(errorOf(source, { signaturePolicy: 'structural' }).code).toBe(ErrorCode.SignatureMismatch);
    });
  });
});
