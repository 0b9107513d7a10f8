import { Token, TokenType, LITERAL_WORDS } from './tokens';
import { InterpolationScan, scanInterpolation, unescape } from './interpolation';
import { ErrorCode, SprigError } from '../runtime/errors';

const DELIMITERS = new Set(['(', ')', '[', ']', '{', '}', "'", '`', ',', '"', ';']);
const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['(', TokenType.LPAREN],
  [')', TokenType.RPAREN],
  ['[', TokenType.LBRACKET],
  [']', TokenType.RBRACKET],
  ['{', TokenType.LBRACE],
  ['}', TokenType.RBRACE],
  ["'", TokenType.QUOTE],
  ['`', TokenType.QUASIQUOTE],
  [',', TokenType.UNQUOTE],
]);
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export interface SourceOrigin {
  line: number;
  column: number;
}

/** Read position of one token sequence. */
interface Cursor {
  pos: number;
  line: number;
  column: number;
}

export class Lexer {
  private source: string;
  private origin: SourceOrigin;

  /**
   * @param origin - where `source` starts in the enclosing text; used when
   *   re-lexing the expression spans of a format string.
   */
  constructor(source: string, origin: SourceOrigin = { line: 1, column: 1 }) {
    this.source = source;
    this.origin = origin;
  }

  /**
   * Lazily produce the token stream. Each call starts again from the top of
   * the source with its own cursor, so sequences can be restarted and read
   * side by side.
   */
  *tokens(): Generator<Token> {
    const cur: Cursor = { pos: 0, line: this.origin.line, column: this.origin.column };

    while (cur.pos < this.source.length) {
      const ch = this.source[cur.pos];

      if (isWhitespace(ch)) {
        this.advance(cur);
        continue;
      }

      if (ch === ';') {
        while (cur.pos < this.source.length && this.source[cur.pos] !== '\n') {
          this.advance(cur);
        }
        continue;
      }

      if (ch === '"') {
        yield this.readString(cur);
        continue;
      }

      if (ch === '#' && this.source[cur.pos + 1] === '"') {
        yield* this.readFormatString(cur);
        continue;
      }

      const single = this.readDelimiter(cur, ch);
      if (single) {
        yield single;
        continue;
      }

      yield this.readWord(cur);
    }

    yield token(TokenType.EOF, '', cur.line, cur.column);
  }

  tokenize(): Token[] {
    return Array.from(this.tokens());
  }

  private readDelimiter(cur: Cursor, ch: string): Token | null {
    const type = SINGLE_CHAR_TOKENS.get(ch);
    if (!type) return null;
    const tok = token(type, ch, cur.line, cur.column);
    this.advance(cur);
    return tok;
  }

  private readString(cur: Cursor): Token {
    const startLine = cur.line;
    const startCol = cur.column;
    this.advance(cur); // opening quote
    let text = '';
    while (cur.pos < this.source.length && this.source[cur.pos] !== '"') {
      if (this.source[cur.pos] === '\\') {
        this.advance(cur);
        if (cur.pos < this.source.length) {
          text += unescape(this.source[cur.pos]);
          this.advance(cur);
        }
      } else {
        text += this.source[cur.pos];
        this.advance(cur);
      }
    }
    if (cur.pos >= this.source.length) {
      throw positioned(ErrorCode.UnclosedString, startLine, startCol);
    }
    this.advance(cur); // closing quote
    return token(TokenType.STRING, text, startLine, startCol);
  }

  private *readFormatString(cur: Cursor): Generator<Token> {
    const startLine = cur.line;
    const startCol = cur.column;
    const bodyStart = cur.pos + 2;

    const scan = this.scanFormat(bodyStart, startLine, startCol);

    yield token(TokenType.STRING_INTERP_START, '#"', startLine, startCol);
    for (const part of scan.parts) {
      this.advanceTo(cur, part.offset);
      if (part.kind === 'text') {
        yield token(TokenType.STRING, part.value, cur.line, cur.column);
      } else {
        yield token(TokenType.INTERP_EXPR, part.source, cur.line, cur.column);
      }
    }
    this.advanceTo(cur, scan.end);
    yield token(TokenType.STRING_INTERP_END, '"', cur.line, cur.column);
  }

  private scanFormat(bodyStart: number, line: number, column: number): InterpolationScan {
    try {
      return scanInterpolation(this.source, bodyStart, true);
    } catch (e) {
      if (e instanceof SprigError) throw positioned(e.code, line, column);
      throw e;
    }
  }

  private readWord(cur: Cursor): Token {
    const startLine = cur.line;
    const startCol = cur.column;
    let word = '';
    while (cur.pos < this.source.length) {
      const ch = this.source[cur.pos];
      if (isWhitespace(ch) || DELIMITERS.has(ch)) break;
      word += ch;
      this.advance(cur);
    }

    const literal = LITERAL_WORDS.get(word);
    if (literal) {
      return token(literal, word, startLine, startCol);
    }
    if (NUMBER_PATTERN.test(word)) {
      return token(TokenType.NUMBER, word, startLine, startCol);
    }
    return token(TokenType.SYMBOL, word, startLine, startCol);
  }

  private advance(cur: Cursor): void {
    if (this.source[cur.pos] === '\n') {
      cur.line++;
      cur.column = 1;
    } else {
      cur.column++;
    }
    cur.pos++;
  }

  private advanceTo(cur: Cursor, offset: number): void {
    while (cur.pos < offset && cur.pos < this.source.length) {
      this.advance(cur);
    }
  }
}

function token(type: TokenType, value: string, line: number, column: number): Token {
  return { type, value, line, column };
}

function positioned(code: ErrorCode, line: number, column: number): SprigError {
  return new SprigError(code, { position: { line, column } });
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}
