import { Lexer } from '../src/lexer/lexer';
import { Parser } from '../src/parser/parser';
import * as AST from '../src/parser/ast';
import { ErrorCode, SprigError } from '../src/runtime/errors';

describe('Parser', () => {
  function parse(source: string): AST.Term[] {
    const tokens = new Lexer(source).tokenize();
    return new Parser().parse(tokens);
  }

  function source(src: string): string[] {
    return parse(src).map(AST.termToSource);
  }

  function errorCode(src: string): ErrorCode | undefined {
    try {
      parse(src);
    } catch (e) {
      if (e instanceof SprigError) return e.code;
      throw e;
    }
    return undefined;
  }

  describe('atoms and lists', () => {
    it('should parse an empty program', () => {
      expect(parse('')).toEqual([]);
    });

    it('should parse atoms', () => {
      const terms = parse('42 "hi" foo true #f nil');
      expect(terms.map(t => t.type)).toEqual(['Number', 'String', 'Symbol', 'Boolean', 'Boolean', 'Nil']);
      const [num, str, sym, yes, no] = terms;
      expect(num.type === 'Number' && num.value).toBe(42);
      expect(str.type === 'String' && str.value).toBe('hi');
      expect(sym.type === 'Symbol' && sym.name).toBe('foo');
      expect(yes.type === 'Boolean' && yes.value).toBe(true);
      expect(no.type === 'Boolean' && no.value).toBe(false);
    });

    it('should parse one term per top-level form', () => {
      expect(source('(+ 1 2) (f) x')).toEqual(['(+ 1 2)', '(f)', 'x']);
    });

    it('should treat brackets as lists', () => {
      expect(source('(let ([a 1]) a)')).toEqual(['(let ((a 1)) a)']);
    });

    it('should record positions', () => {
      const [term] = parse('\n  (a b)');
      expect(term.position).toEqual({ line: 2, column: 3 });
    });

    it('should report an unclosed list as 005', () => {
      expect(errorCode('(1 2')).toBe(ErrorCode.UnclosedList);
    });

    it('should report a mismatched closer as 005', () => {
      expect(errorCode('(1 2]')).toBe(ErrorCode.UnclosedList);
    });

    it('should report a stray closer as 016', () => {
      expect(errorCode(')')).toBe(ErrorCode.ParseFailed);
    });
  });

  describe('quotes', () => {
    it('should wrap quoted terms', () => {
      const [quoted] = parse("'x");
      expect(quoted.type).toBe('Quote');
      expect(source("'(a b) `(a ,b)")).toEqual(["'(a b)", '`(a ,b)']);
    });

    it('should reject a quote with nothing after it', () => {
      expect(errorCode("'")).toBe(ErrorCode.ParseFailed);
    });
  });

  describe('infix groups', () => {
    it('should rewrite an infix group to a prefix call', () => {
      expect(source('{1 + 2 + 3}')).toEqual(['(+ 1 2 3)']);
    });

    it('should make infix and prefix forms equal', () => {
      const [infix] = parse('{a * b}');
      const [prefix] = parse('(* a b)');
      expect(AST.termsEqual(infix, prefix)).toBe(true);
    });

    it('should nest infix groups', () => {
      expect(source('{(f 1) + {2 * 3}}')).toEqual(['(+ (f 1) (* 2 3))']);
    });

    it('should unwrap a single operand and empty braces', () => {
      expect(source('{x} {}')).toEqual(['x', '()']);
    });

    it('should reject mixed operators (006)', () => {
      expect(errorCode('{1 + 2 * 3}')).toBe(ErrorCode.InfixMismatch);
    });

    it('should report an unclosed infix group as 007', () => {
      expect(errorCode('{1 + 2')).toBe(ErrorCode.UnclosedInfix);
    });

    it('should reject a dangling operator (016)', () => {
      expect(errorCode('{1 +}')).toBe(ErrorCode.ParseFailed);
    });
  });

  describe('interpolation', () => {
    it('should parse embedded expressions', () => {
      const [term] = parse('#"sum: #{{1 + 2}}!"');
      expect(term.type).toBe('Interpolation');
      if (term.type === 'Interpolation') {
        expect(term.parts).toHaveLength(3);
        expect(term.parts[0]).toBe('sum: ');
        expect(term.parts[2]).toBe('!');
      }
      expect(AST.termToSource(term)).toBe('#"sum: #{(+ 1 2)}!"');
    });

    it('should position embedded expressions inside the string', () => {
      const [term] = parse('#"ab #{x}"');
      if (term.type !== 'Interpolation') throw new Error('expected an interpolation');
      const embedded = term.parts[1];
      expect(typeof embedded === 'string' ? null : embedded.position).toEqual({ line: 1, column: 8 });
    });

    it('should reject two forms in one expression', () => {
      expect(errorCode('#"#{a b}"')).toBe(ErrorCode.ParseFailed);
    });
  });

  describe('lazy forms', () => {
    it('should yield forms before a later parse error', () => {
      const tokens = new Lexer('1 (2').tokenize();
      const forms = new Parser().forms(tokens);
      const first = forms.next();
      expect(first.done).toBe(false);
      expect(first.value).toEqual({ type: 'Number', value: 1, position: { line: 1, column: 1 } });
      expect(() => forms.next()).toThrow(SprigError);
    });

    it('should report whether it stopped at end of input', () => {
      const parser = new Parser();
      expect(() => parser.parse(new Lexer('(a').tokenize())).toThrow(SprigError);
      expect(parser.atEnd).toBe(true);

      const other = new Parser();
      expect(() => other.parse(new Lexer('(a ]').tokenize())).toThrow(SprigError);
      expect(other.atEnd).toBe(false);
    });
  });
});
