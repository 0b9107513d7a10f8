export { Lexer, SourceOrigin } from './lexer/lexer';
export { Token, TokenType } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions, SignaturePolicy } from './runtime/interpreter';
export { Environment, RESERVED_IDENTIFIERS, isReserved } from './runtime/environment';
export {
  SprigValue,
  SprigNumber,
  SprigQuaternion,
  SprigString,
  SprigSymbol,
  SprigBoolean,
  SprigNil,
  SprigPair,
  SprigList,
  SprigClosure,
  SprigMacro,
  SprigStructType,
  SprigStruct,
  SprigBuiltin,
  SprigErrorValue,
  sprigNumber,
  sprigQuaternion,
  sprigString,
  sprigSymbol,
  sprigBoolean,
  sprigNil,
  sprigPair,
  arrayToList,
  listToArray,
  typeOf,
  termToValue,
  valueToTerm,
  valueToString,
  valuesEqual,
} from './runtime/values';
export {
  ErrorCode,
  ERROR_CATALOG,
  ExitSignal,
  SprigError,
  describeError,
  formatError,
} from './runtime/errors';
export { StructRegistry, DEFAULT_STRUCT_CAPACITY } from './runtime/structs';
export { Session, SessionOptions, Outcome, formatOutcome } from './runtime/session';
export { OutputSink, InputSource, BufferSink, LineSource } from './runtime/io';
export { SprigConfig, loadConfig, loadConfigForScript } from './runtime/config';
export { BUILTIN_NAMES } from './runtime/builtins';
export { Quat } from './runtime/quaternion';
export { VERSION } from './version';

import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { SprigValue } from './runtime/values';
import * as AST from './parser/ast';

/**
 * Parse a Sprig source string into terms.
 */
export function parse(source: string): AST.Term[] {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser();
  return parser.parse(tokens);
}

/**
 * Execute a Sprig source string in a fresh interpreter and return the last value.
 */
export function execute(source: string, options: InterpreterOptions = {}): SprigValue {
  const interpreter = new Interpreter(options);
  return interpreter.run(parse(source));
}
