import { Token, TokenType } from '../lexer/tokens';
import { Lexer } from '../lexer/lexer';
import { ErrorCode, SprigError } from '../runtime/errors';
import * as AST from './ast';

const CLOSERS = new Set([TokenType.RPAREN, TokenType.RBRACKET, TokenType.RBRACE]);

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(tokens: Token[]): AST.Term[] {
    return Array.from(this.forms(tokens));
  }

  /** Yield one term per top-level form, parsing lazily. */
  *forms(tokens: Token[]): Generator<AST.Term> {
    this.tokens = tokens;
    this.pos = 0;

    while (!this.check(TokenType.EOF)) {
      yield this.parseForm();
    }
  }

  /** Whether parsing stopped at end of input, e.g. after an unclosed-list error. */
  get atEnd(): boolean {
    return this.check(TokenType.EOF);
  }

  // ─── Forms ─────────────────────────────────────────────

  private parseForm(): AST.Term {
    const tok = this.peek();
    const position = this.position(tok);

    switch (tok.type) {
      case TokenType.LPAREN:
        this.advance();
        return this.parseList(TokenType.RPAREN, position);
      case TokenType.LBRACKET:
        this.advance();
        return this.parseList(TokenType.RBRACKET, position);
      case TokenType.LBRACE:
        this.advance();
        return this.rewriteInfix(this.parseInfix(position));
      case TokenType.QUOTE:
        this.advance();
        return { type: 'Quote', term: this.parseQuoted(tok), position };
      case TokenType.QUASIQUOTE:
        this.advance();
        return { type: 'Quasiquote', term: this.parseQuoted(tok), position };
      case TokenType.UNQUOTE:
        this.advance();
        return { type: 'Unquote', term: this.parseQuoted(tok), position };
      case TokenType.NUMBER:
        this.advance();
        return { type: 'Number', value: Number(tok.value), position };
      case TokenType.STRING:
        this.advance();
        return { type: 'String', value: tok.value, position };
      case TokenType.BOOLEAN:
        this.advance();
        return { type: 'Boolean', value: tok.value === 'true' || tok.value === '#t', position };
      case TokenType.NIL:
        this.advance();
        return { type: 'Nil', position };
      case TokenType.SYMBOL:
        this.advance();
        return AST.symbol(tok.value, position);
      case TokenType.STRING_INTERP_START:
        this.advance();
        return this.parseInterpolation(position);
      default:
        throw this.error(ErrorCode.ParseFailed, tok, `unexpected ${describeToken(tok)}`);
    }
  }

  private parseQuoted(marker: Token): AST.Term {
    if (this.check(TokenType.EOF)) {
      throw this.error(ErrorCode.ParseFailed, marker, `nothing to quote after ${marker.value}`);
    }
    return this.parseForm();
  }

  private parseList(closer: TokenType, position: AST.Position): AST.List {
    const elements: AST.Term[] = [];
    while (!this.check(closer)) {
      const tok = this.peek();
      if (tok.type === TokenType.EOF || CLOSERS.has(tok.type)) {
        throw new SprigError(ErrorCode.UnclosedList, {
          detail: tok.type === TokenType.EOF ? undefined : `found ${describeToken(tok)}`,
          position,
        });
      }
      elements.push(this.parseForm());
    }
    this.advance(); // closer
    return AST.list(elements, position);
  }

  /**
   * Read `{a op b op c}`: operands and operators alternate, and every
   * operator must be the same term as the first one.
   */
  private parseInfix(position: AST.Position): AST.InfixGroup {
    const operands: AST.Term[] = [];
    const operators: AST.Term[] = [];
    let expectOperand = true;

    while (!this.check(TokenType.RBRACE)) {
      const tok = this.peek();
      if (tok.type === TokenType.EOF || CLOSERS.has(tok.type)) {
        throw new SprigError(ErrorCode.UnclosedInfix, { position });
      }
      const term = this.parseForm();
      if (expectOperand) {
        operands.push(term);
      } else {
        if (operators.length > 0 && !AST.termsEqual(operators[0], term)) {
          throw this.error(
            ErrorCode.InfixMismatch,
            tok,
            `${AST.termToSource(operators[0])} and ${AST.termToSource(term)}`,
          );
        }
        operators.push(term);
      }
      expectOperand = !expectOperand;
    }
    const closing = this.advance();

    if (operators.length > 0 && operators.length === operands.length) {
      throw this.error(ErrorCode.ParseFailed, closing, 'infix group ends with an operator');
    }
    return { type: 'InfixGroup', operands, operators, position };
  }

  private rewriteInfix(group: AST.InfixGroup): AST.Term {
    if (group.operands.length === 0) return AST.list([], group.position);
    if (group.operands.length === 1) return group.operands[0];
    return AST.list([group.operators[0], ...group.operands], group.position);
  }

  private parseInterpolation(position: AST.Position): AST.Interpolation {
    const parts: (string | AST.Term)[] = [];
    while (!this.check(TokenType.STRING_INTERP_END)) {
      const tok = this.advance();
      if (tok.type === TokenType.STRING) {
        parts.push(tok.value);
      } else if (tok.type === TokenType.INTERP_EXPR) {
        parts.push(this.parseEmbedded(tok));
      } else {
        throw this.error(ErrorCode.ParseFailed, tok, `unexpected ${describeToken(tok)} in format string`);
      }
    }
    this.advance(); // STRING_INTERP_END
    return { type: 'Interpolation', parts, position };
  }

  private parseEmbedded(tok: Token): AST.Term {
    const tokens = new Lexer(tok.value, { line: tok.line, column: tok.column }).tokenize();
    const terms = new Parser().parse(tokens);
    if (terms.length === 0) {
      throw this.error(ErrorCode.FormatWithoutExpression, tok);
    }
    if (terms.length > 1) {
      throw this.error(ErrorCode.ParseFailed, tok, 'an interpolated expression must be a single form');
    }
    return terms[0];
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? EOF_TOKEN;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private advance(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  }

  private position(tok: Token): AST.Position {
    return { line: tok.line, column: tok.column };
  }

  private error(code: ErrorCode, tok: Token, detail?: string): SprigError {
    return new SprigError(code, { detail, position: this.position(tok) });
  }
}

const EOF_TOKEN: Token = { type: TokenType.EOF, value: '', line: 1, column: 1 };

function describeToken(tok: Token): string {
  if (tok.type === TokenType.EOF) return 'end of input';
  return `'${tok.value}'`;
}
