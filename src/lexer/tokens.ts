export enum TokenType {
  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  BOOLEAN = 'BOOLEAN',
  NIL = 'NIL',
  SYMBOL = 'SYMBOL',

  // Delimiters
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )
  LBRACKET = 'LBRACKET',       // [
  RBRACKET = 'RBRACKET',       // ]
  LBRACE = 'LBRACE',           // {
  RBRACE = 'RBRACE',           // }

  // Quote markers
  QUOTE = 'QUOTE',             // '
  QUASIQUOTE = 'QUASIQUOTE',   // `
  UNQUOTE = 'UNQUOTE',         // ,

  // Format strings: #"text #{expr} text"
  STRING_INTERP_START = 'STRING_INTERP_START',
  INTERP_EXPR = 'INTERP_EXPR',
  STRING_INTERP_END = 'STRING_INTERP_END',

  EOF = 'EOF',
}

/** Atoms that lex to something other than a symbol. */
export const LITERAL_WORDS: ReadonlyMap<string, TokenType> = new Map([
  ['true', TokenType.BOOLEAN],
  ['false', TokenType.BOOLEAN],
  ['#t', TokenType.BOOLEAN],
  ['#f', TokenType.BOOLEAN],
  ['nil', TokenType.NIL],
  ['empty', TokenType.NIL],
]);

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}
