import { Interpreter } from '../src/runtime/interpreter';
import { BufferSink } from '../src/runtime/io';
import { ErrorCode, SprigError } from '../src/runtime/errors';
import { valueToString } from '../src/runtime/values';

describe('Macros', () => {
  function show(source: string): string {
    return valueToString(new Interpreter({ output: new BufferSink() }).evaluateSource(source));
  }

  function errorCode(source: string): ErrorCode | undefined {
    try {
      show(source);
    } catch (e) {
      if (e instanceof SprigError) return e.code;
      throw e;
    }
    return undefined;
  }

  const SWAP = `
    (define-macro-rule (swap! x y)
      (let ((tmp x)) (set! x y) (set! y tmp)))`;

  describe('rule macros', () => {
    it('should rewrite the call by substitution', () => {
      expect(show(`${SWAP} (define a 1) (define b 2) (swap! a b) (list a b)`)).toBe('(2 1)');
    });

    it('should show the expansion through expand', () => {
      expect(show(`${SWAP} (expand '(swap! p q))`)).toBe('(let ((tmp p)) (set! p q) (set! q tmp))');
    });

    it('should expand macros defined in the calling scope', () => {
      expect(show("(let ((m 1)) (begin (define-macro-rule (sw a) a) (expand '(sw 1))))")).toBe('1');
    });

    it('should not see macros from a scope that has closed', () => {
      expect(errorCode("(begin (let ((m 1)) (define-macro-rule (sw a) a)) (expand '(sw 1)))"))
        .toBe(ErrorCode.UndefinedIdentifier);
    });

    it('should destructure nested patterns', () => {
      const source = `
        (define-macro-rule (my-let1 (name value) body) (let ((name value)) body))
        (my-let1 (x 5) {x + 3})`;
      expect(show(source)).toBe('8');
    });

    it('should reject a call that does not fit the pattern (009)', () => {
      const source = `
        (define-macro-rule (my-let1 (name value) body) (let ((name value)) body))
        (my-let1 x 1)`;
      expect(errorCode(source)).toBe(ErrorCode.SignatureMismatch);
    });

    it('should require repeated pattern variables to match the same term', () => {
      const rule = '(define-macro-rule (same x x) x)';
      expect(show(`${rule} (same 1 1)`)).toBe('1');
      expect(errorCode(`${rule} (same 1 2)`)).toBe(ErrorCode.SignatureMismatch);
    });

    it('should check the operand count (004)', () => {
      expect(errorCode(`${SWAP} (swap! a)`)).toBe(ErrorCode.ArityMismatch);
    });
  });

  describe('template macros', () => {
    const UNLESS = '(define-macro (my-unless c body) `(if ,c nil ,body))';

    it('should splice the call-site terms into the template', () => {
      expect(show(`${UNLESS} (my-unless false 7)`)).toBe('7');
      expect(show(`${UNLESS} (my-unless true (head nil))`)).toBe('()');
    });

    it('should evaluate each copy of an argument where it lands', () => {
      const source = `
        (define-macro (twice e) \`(begin ,e ,e))
        (define n 0)
        (twice (set! n {n + 1}))
        n`;
      expect(show(source)).toBe('2');
    });

    it('should see parameters as data in computed holes', () => {
      expect(show('(define-macro (count-args xs) `(+ 0 ,(length xs))) (count-args (a b c))')).toBe('3');
    });

    it('should evaluate a plain body to produce the expansion', () => {
      expect(show('(define-macro (quoted-length xs) (length xs)) (quoted-length (a b c))')).toBe('3');
    });

    it('should check the operand count (004)', () => {
      expect(errorCode(`${UNLESS} (my-unless true)`)).toBe(ErrorCode.ArityMismatch);
    });

    it('should print as a macro', () => {
      expect(show(`${UNLESS} my-unless`)).toBe('<macro my-unless>');
    });
  });

  describe('definitions', () => {
    it('should report malformed macro definitions', () => {
      expect(errorCode('(define-macro (m))')).toBe(ErrorCode.DefineShape);
      expect(errorCode('(define-macro m 1)')).toBe(ErrorCode.DefineShape);
      expect(errorCode('(define-macro-rule () 1)')).toBe(ErrorCode.DefineShape);
      expect(errorCode('(define-macro (1 x) x)')).toBe(ErrorCode.DefineTargetNotSymbol);
      expect(errorCode('(define-macro (m 1) 1)')).toBe(ErrorCode.ParamNotSymbol);
    });

    it('should refuse reserved names', () => {
      expect(errorCode('(define-macro (cond x) x)')).toBe(ErrorCode.ReservedIdentifier);
    });
  });

  describe('expansion in tail position', () => {
    it('should not grow the stack through macro calls', () => {
      const source = `
        (define-macro-rule (when-positive n body) (if {n > 0} body 'done))
        (define (down n) (when-positive n (down {n - 1})))
        (down 100000)`;
      expect(show(source)).toBe('done');
    });
  });
});
