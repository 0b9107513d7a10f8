import * as fs from 'fs';
import * as path from 'path';
import * as AST from '../parser/ast';
import { Lexer } from '../lexer/lexer';
import { Parser } from '../parser/parser';
import { Environment, isReserved } from './environment';
import {
  SprigBuiltin,
  SprigClosure,
  SprigMacro,
  SprigValue,
  arrayToList,
  sprigNil,
  sprigString,
  sprigSymbol,
  termToValue,
  typeOf,
  valueToString,
} from './values';
import { ErrorCode, SprigError, arityMismatch, signatureMismatch } from './errors';
import { installBuiltins } from './builtins';
import { expandMacro } from './macros';
import { DEFAULT_STRUCT_CAPACITY, StructRegistry, structProcedures } from './structs';
import { InputSource, OutputSink, StdinSource, stderrSink, stdoutSink } from './io';

export type SignaturePolicy = 'nominal' | 'structural';

export interface InterpreterOptions {
  trace?: boolean;
  /** Defaults to process stdout. */
  output?: OutputSink;
  /** Where `print-error` writes. Defaults to process stderr. */
  errorOutput?: OutputSink;
  /** Defaults to a blocking reader on stdin. */
  input?: InputSource;
  /** How many struct types may be defined. Defaults to 1024. */
  structCapacity?: number;
  /** Directory for resolving relative `import` and `readfile` paths. Defaults to cwd. */
  scriptDir?: string;
  signaturePolicy?: SignaturePolicy;
}

/** Either a finished value or a term to continue with in tail position. */
type Step =
  | { done: true; value: SprigValue }
  | { done: false; term: AST.Term; env: Environment };

type SpecialForm = (operands: AST.Term[], env: Environment, form: AST.List) => Step;

function done(value: SprigValue): Step {
  return { done: true, value };
}

function tail(term: AST.Term, env: Environment): Step {
  return { done: false, term, env };
}

export class Interpreter {
  readonly globals: Environment;
  readonly structs: StructRegistry;
  readonly signaturePolicy: SignaturePolicy;
  private output: OutputSink;
  private errorOutput: OutputSink;
  private input: InputSource;
  private currentDir: string;
  private importStack: Set<string> = new Set();
  private startTime = Date.now();
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private specialForms: ReadonlyMap<string, SpecialForm>;
  private callEnv: Environment;

  constructor(options: InterpreterOptions = {}) {
    this.traceEnabled = options.trace ?? false;
    this.output = options.output ?? stdoutSink;
    this.errorOutput = options.errorOutput ?? stderrSink;
    this.input = options.input ?? new StdinSource();
    this.currentDir = options.scriptDir ?? process.cwd();
    this.signaturePolicy = options.signaturePolicy ?? 'nominal';
    this.structs = new StructRegistry(options.structCapacity ?? DEFAULT_STRUCT_CAPACITY);
    this.globals = new Environment();
    installBuiltins(this.globals);
    this.callEnv = this.globals;

    const lambda: SpecialForm = (ops, env) => this.evalLambda(ops, env);
    this.specialForms = new Map<string, SpecialForm>([
      ['define', (ops, env) => this.evalDefine(ops, env)],
      ['lambda', lambda],
      ['λ', lambda],
      ['cond', (ops, env) => this.evalCond(ops, env)],
      ['if', (ops, env) => this.evalIf(ops, env)],
      ['let', (ops, env) => this.evalLet(ops, env)],
      ['begin', (ops, env) => this.evalBegin(ops, env)],
      ['quote', ops => done(termToValue(this.single(ops)))],
      ['quasiquote', (ops, env) => done(this.quasiquote(this.single(ops), env, 0))],
      ['unquote', (_ops, _env, form) => { throw unquoteOutside(form); }],
      ['define-struct', (ops, env) => this.evalDefineStruct(ops, env)],
      ['define-macro', (ops, env) => this.evalDefineMacro(ops, env)],
      ['define-macro-rule', (ops, env) => this.evalDefineMacroRule(ops, env)],
      ['set!', (ops, env) => this.evalSet(ops, env)],
      ['try', (ops, env) => this.evalTry(ops, env)],
      ['import', (ops, env) => this.evalImport(ops, env)],
    ]);
  }

  get scriptDir(): string {
    return this.currentDir;
  }

  /** Scope of the call site while a builtin runs; the globals otherwise. */
  get callerEnv(): Environment {
    return this.callEnv;
  }

  getTraceLog(): string[] {
    return [...this.traceLog];
  }

  // ─── Entry points ───────────────────────────────────────

  /** Evaluate each term in order and return the last value (nil for none). */
  run(terms: AST.Term[], env: Environment = this.globals): SprigValue {
    let result: SprigValue = sprigNil();
    for (const term of terms) {
      result = this.evaluate(term, env);
    }
    return result;
  }

  evaluateSource(source: string, env: Environment = this.globals): SprigValue {
    const tokens = new Lexer(source).tokenize();
    return this.run(new Parser().parse(tokens), env);
  }

  /**
   * Evaluate a term. Tail positions rebind `term` and `env` and go round the
   * loop again instead of recursing, so tail calls use no host stack.
   */
  evaluate(term: AST.Term, env: Environment): SprigValue {
    for (;;) {
      if (term.type !== 'List') {
        return this.evaluateAtom(term, env);
      }

      const [head, ...operands] = term.elements;
      if (head === undefined) {
        throw new SprigError(ErrorCode.NoFunction, { position: term.position });
      }

      if (head.type === 'Symbol') {
        const special = this.specialForms.get(head.name);
        if (special) {
          const step = special(operands, env, term);
          if (step.done) return step.value;
          term = step.term;
          env = step.env;
          continue;
        }

        const bound = env.tryLookup(head.name);
        if (bound?.kind === 'macro') {
          term = this.expand(bound, term);
          continue;
        }
      }

      const fn = this.evaluate(head, env);
      const args = operands.map(operand => this.evaluate(operand, env));

      if (fn.kind === 'builtin') {
        return this.callBuiltin(fn, args, env);
      }
      if (fn.kind !== 'closure') {
        throw new SprigError(ErrorCode.NotCallable, {
          detail: valueToString(fn),
          position: head.position,
        });
      }

      env = this.bindArguments(fn, args);
      term = this.evaluateLeading(fn.body, env);
    }
  }

  /** Call a procedure from host code, e.g. a `try` handler or `repeat`. */
  apply(fn: SprigValue, args: SprigValue[]): SprigValue {
    if (fn.kind === 'builtin') return this.callBuiltin(fn, args);
    if (fn.kind !== 'closure') {
      throw new SprigError(ErrorCode.NotCallable, { detail: valueToString(fn) });
    }
    const env = this.bindArguments(fn, args);
    return this.evaluate(this.evaluateLeading(fn.body, env), env);
  }

  /** Whether `value` satisfies the type named `name` under the signature policy. */
  conformsTo(value: SprigValue, name: string): boolean {
    if (typeOf(value) === name) return true;
    if (this.signaturePolicy !== 'structural' || value.kind !== 'struct') return false;
    const fields = value.type.fields;
    const target = this.structs.find(name);
    return target !== undefined
      && target.fields.length === fields.length
      && target.fields.every((field, i) => fields[i] === field);
  }

  // ─── I/O used by builtins ───────────────────────────────

  write(text: string): void {
    try {
      this.output.write(text);
    } catch (e) {
      throw new SprigError(ErrorCode.FlushFailed, { detail: hostMessage(e) });
    }
  }

  writeError(text: string): void {
    try {
      this.errorOutput.write(text);
      this.errorOutput.flush?.();
    } catch (e) {
      throw new SprigError(ErrorCode.FlushFailed, { detail: hostMessage(e) });
    }
  }

  flush(): void {
    try {
      this.output.flush?.();
    } catch (e) {
      throw new SprigError(ErrorCode.FlushFailed, { detail: hostMessage(e) });
    }
  }

  readLine(): string | null {
    try {
      return this.input.readLine();
    } catch (e) {
      throw new SprigError(ErrorCode.ReadStdinFailed, { detail: hostMessage(e) });
    }
  }

  // ─── Atoms and calls ────────────────────────────────────

  private evaluateAtom(term: Exclude<AST.Term, AST.List>, env: Environment): SprigValue {
    switch (term.type) {
      case 'Number':
      case 'String':
      case 'Boolean':
      case 'Nil':
        return termToValue(term);
      case 'Symbol':
        return this.lookup(term, env);
      case 'Embedded':
        return term.value;
      case 'Quote':
        return termToValue(term.term);
      case 'Quasiquote':
        return this.quasiquote(term.term, env, 0);
      case 'Unquote':
        throw unquoteOutside(term);
      case 'Interpolation':
        return sprigString(term.parts
          .map(part => typeof part === 'string'
            ? part
            : valueToString(this.evaluate(part, env), { display: true }))
          .join(''));
    }
  }

  private lookup(term: AST.SymbolAtom, env: Environment): SprigValue {
    const value = env.tryLookup(term.name);
    if (value !== undefined) return value;
    const accessorError = this.structs.resolveAccessor(term.name);
    if (accessorError) throw accessorError;
    throw new SprigError(ErrorCode.UndefinedIdentifier, { detail: term.name, position: term.position });
  }

  private callBuiltin(fn: SprigBuiltin, args: SprigValue[], env: Environment = this.globals): SprigValue {
    const { min, max } = fn.arity;
    if (args.length < min || args.length > max) {
      const expected = min === max ? min
        : max === Infinity ? `at least ${min}`
        : `${min} to ${max}`;
      throw arityMismatch(expected, args.length);
    }
    const saved = this.callEnv;
    this.callEnv = env;
    try {
      return fn.fn(args, this);
    } finally {
      this.callEnv = saved;
    }
  }

  private bindArguments(fn: SprigClosure, args: SprigValue[]): Environment {
    if (args.length !== fn.params.length) {
      throw arityMismatch(fn.params.length, args.length);
    }
    const scope = fn.env.child();
    fn.params.forEach((param, i) => scope.define(param, args[i]));
    return scope;
  }

  /** Evaluate all but the last form of a body; return the last for tail evaluation. */
  private evaluateLeading(body: AST.Term[], env: Environment): AST.Term {
    for (let i = 0; i < body.length - 1; i++) {
      this.evaluate(body[i], env);
    }
    return body[body.length - 1];
  }

  private expand(macro: SprigMacro, call: AST.List): AST.Term {
    const expansion = expandMacro(macro, call, this);
    if (this.traceEnabled) {
      this.trace(`Expanded ${macro.name}: ${AST.termToSource(expansion)}`);
    }
    return expansion;
  }

  private quasiquote(term: AST.Term, env: Environment, depth: number): SprigValue {
    switch (term.type) {
      case 'Unquote':
        if (depth === 0) return this.evaluate(term.term, env);
        return arrayToList([sprigSymbol('unquote'), this.quasiquote(term.term, env, depth - 1)]);
      case 'Quasiquote':
        return arrayToList([sprigSymbol('quasiquote'), this.quasiquote(term.term, env, depth + 1)]);
      case 'Quote':
        return arrayToList([sprigSymbol('quote'), this.quasiquote(term.term, env, depth)]);
      case 'List': {
        const [head, operand, ...rest] = term.elements;
        if (head && operand && rest.length === 0 && AST.isSymbol(head, 'unquote')) {
          return this.quasiquote({ type: 'Unquote', term: operand, position: term.position }, env, depth);
        }
        return arrayToList(term.elements.map(el => this.quasiquote(el, env, depth)));
      }
      default:
        return termToValue(term);
    }
  }

  // ─── Special forms ──────────────────────────────────────

  private single(operands: AST.Term[]): AST.Term {
    if (operands.length !== 1) throw arityMismatch(1, operands.length);
    return operands[0];
  }

  private makeClosure(params: AST.Term[], body: AST.Term[], env: Environment, name?: string): SprigClosure {
    const names = params.map(param => {
      if (param.type !== 'Symbol') {
        throw new SprigError(ErrorCode.ParamNotSymbol, {
          detail: AST.termToSource(param),
          position: param.position,
        });
      }
      if (isReserved(param.name)) {
        throw new SprigError(ErrorCode.ReservedIdentifier, { detail: param.name, position: param.position });
      }
      return param.name;
    });
    return { kind: 'closure', params: names, body, env, name };
  }

  private evalDefine(operands: AST.Term[], env: Environment): Step {
    const [target, ...rest] = operands;
    if (target === undefined) {
      throw new SprigError(ErrorCode.DefineShape);
    }

    if (target.type === 'List') {
      const [name, ...params] = target.elements;
      if (name === undefined || rest.length === 0) {
        throw new SprigError(ErrorCode.DefineShape, { position: target.position });
      }
      if (name.type !== 'Symbol') {
        throw new SprigError(ErrorCode.DefineTargetNotSymbol, {
          detail: AST.termToSource(name),
          position: name.position,
        });
      }
      env.define(name.name, this.makeClosure(params, rest, env, name.name));
      if (this.traceEnabled) this.trace(`Defined procedure ${name.name}/${params.length}`);
      return done(sprigNil());
    }

    if (target.type !== 'Symbol') {
      throw new SprigError(ErrorCode.DefineTargetNotSymbol, {
        detail: AST.termToSource(target),
        position: target.position,
      });
    }
    if (rest.length !== 1) {
      throw new SprigError(ErrorCode.DefineShape, { position: target.position });
    }

    let value = this.evaluate(rest[0], env);
    if (value.kind === 'closure' && value.name === undefined) {
      value = { ...value, name: target.name };
    }
    env.define(target.name, value);
    if (this.traceEnabled) this.trace(`Defined ${target.name}`);
    return done(sprigNil());
  }

  private evalLambda(operands: AST.Term[], env: Environment): Step {
    const [params, ...body] = operands;
    if (params === undefined || params.type !== 'List' || body.length === 0) {
      throw new SprigError(ErrorCode.LambdaSyntax);
    }
    return done(this.makeClosure(params.elements, body, env));
  }

  private evalCond(operands: AST.Term[], env: Environment): Step {
    for (const clause of operands) {
      if (clause.type !== 'List') {
        throw new SprigError(ErrorCode.CondCaseNotList, { position: clause.position });
      }
      if (clause.elements.length !== 2) {
        throw new SprigError(ErrorCode.CondCaseLength, {
          detail: `found ${clause.elements.length}`,
          position: clause.position,
        });
      }
      const [condition, consequent] = clause.elements;
      if (AST.isSymbol(condition, 'else')) {
        return tail(consequent, env);
      }
      const test = this.evaluate(condition, env);
      if (test.kind !== 'boolean') {
        throw new SprigError(ErrorCode.CondNotBoolean, {
          detail: `found ${typeOf(test)}`,
          position: condition.position,
        });
      }
      if (test.value) {
        return tail(consequent, env);
      }
    }
    return done(sprigNil());
  }

  private evalIf(operands: AST.Term[], env: Environment): Step {
    if (operands.length !== 3) {
      throw arityMismatch(3, operands.length);
    }
    const [condition, consequent, alternative] = operands;
    const test = this.evaluate(condition, env);
    if (test.kind !== 'boolean') {
      throw signatureMismatch('bool', typeOf(test));
    }
    return tail(test.value ? consequent : alternative, env);
  }

  private evalLet(operands: AST.Term[], env: Environment): Step {
    const [bindings, ...body] = operands;
    if (bindings === undefined || (bindings.type !== 'List' && bindings.type !== 'Nil')) {
      throw new SprigError(ErrorCode.BindingListSyntax);
    }
    const pairs = bindings.type === 'List' ? bindings.elements : [];

    const checked = pairs.map(binding => {
      if (binding.type !== 'List') {
        throw new SprigError(ErrorCode.BindingListSyntax, { position: binding.position });
      }
      if (binding.elements.length !== 2) {
        throw new SprigError(ErrorCode.BindingShape, { position: binding.position });
      }
      const [name, value] = binding.elements;
      if (name.type !== 'Symbol') {
        throw new SprigError(ErrorCode.BindingNotSymbol, {
          detail: AST.termToSource(name),
          position: name.position,
        });
      }
      return { name: name.name, value };
    });
    if (body.length === 0) {
      throw new SprigError(ErrorCode.LetBodyMissing, { position: bindings.position });
    }

    // Sequential: each binding sees the ones before it.
    const scope = env.child();
    for (const { name, value } of checked) {
      scope.define(name, this.evaluate(value, scope));
    }
    return tail(this.evaluateLeading(body, scope), scope);
  }

  private evalBegin(operands: AST.Term[], env: Environment): Step {
    if (operands.length === 0) return done(sprigNil());
    return tail(this.evaluateLeading(operands, env), env);
  }

  private evalDefineStruct(operands: AST.Term[], env: Environment): Step {
    const [name, fields] = operands;
    if (
      operands.length !== 2
      || name.type !== 'Symbol'
      || fields.type !== 'List'
      || !fields.elements.every(field => field.type === 'Symbol')
    ) {
      throw new SprigError(ErrorCode.StructSyntax);
    }
    const fieldNames = fields.elements.map(AST.termToSource);

    const type = this.structs.register(name.name, fieldNames);
    env.define(name.name, type);
    for (const proc of structProcedures(type)) {
      env.define(proc.name, proc);
    }
    if (this.traceEnabled) {
      this.trace(`Registered struct ${name.name} [${fieldNames.join(' ')}] (#${type.id})`);
    }
    return done(sprigNil());
  }

  /** Shared shape checks for both macro forms; returns the name and the signature's operands. */
  private macroSignature(operands: AST.Term[]): { name: string; params: AST.Term[]; body: AST.Term } {
    if (operands.length !== 2) {
      throw new SprigError(ErrorCode.DefineShape);
    }
    const [signature, body] = operands;
    if (signature.type !== 'List' || signature.elements.length === 0) {
      throw new SprigError(ErrorCode.DefineShape, { position: signature.position });
    }
    const [name, ...params] = signature.elements;
    if (name.type !== 'Symbol') {
      throw new SprigError(ErrorCode.DefineTargetNotSymbol, {
        detail: AST.termToSource(name),
        position: name.position,
      });
    }
    return { name: name.name, params, body };
  }

  private evalDefineMacro(operands: AST.Term[], env: Environment): Step {
    const { name, params, body } = this.macroSignature(operands);
    const names = params.map(param => {
      if (param.type !== 'Symbol') {
        throw new SprigError(ErrorCode.ParamNotSymbol, {
          detail: AST.termToSource(param),
          position: param.position,
        });
      }
      return param.name;
    });
    env.define(name, {
      kind: 'macro',
      name,
      transformer: { kind: 'template', params: names, body, env },
    });
    if (this.traceEnabled) this.trace(`Defined macro ${name}`);
    return done(sprigNil());
  }

  private evalDefineMacroRule(operands: AST.Term[], env: Environment): Step {
    const { name, params, body } = this.macroSignature(operands);
    env.define(name, {
      kind: 'macro',
      name,
      transformer: { kind: 'rule', pattern: params, template: body },
    });
    if (this.traceEnabled) this.trace(`Defined rule macro ${name}`);
    return done(sprigNil());
  }

  private evalSet(operands: AST.Term[], env: Environment): Step {
    if (operands.length !== 2) {
      throw arityMismatch(2, operands.length);
    }
    const [target, valueTerm] = operands;
    if (target.type !== 'Symbol') {
      throw signatureMismatch('symbol', AST.termToSource(target));
    }
    if (isReserved(target.name)) {
      throw new SprigError(ErrorCode.ReservedIdentifier, { detail: target.name, position: target.position });
    }
    env.set(target.name, this.evaluate(valueTerm, env));
    return done(sprigNil());
  }

  private evalTry(operands: AST.Term[], env: Environment): Step {
    if (operands.length !== 2) {
      throw arityMismatch(2, operands.length);
    }
    const [body, handlerTerm] = operands;
    const handler = this.evaluate(handlerTerm, env);
    if (handler.kind !== 'closure' && handler.kind !== 'builtin') {
      throw new SprigError(ErrorCode.NotCallable, {
        detail: valueToString(handler),
        position: handlerTerm.position,
      });
    }

    try {
      return done(this.evaluate(body, env));
    } catch (e) {
      if (!(e instanceof SprigError)) throw e;
      if (this.traceEnabled) this.trace(`Caught ${e.message}`);
      return done(this.apply(handler, [e.toErrorValue()]));
    }
  }

  private evalImport(operands: AST.Term[], env: Environment): Step {
    const target = this.evaluate(this.single(operands), env);
    if (target.kind !== 'string') {
      throw signatureMismatch('string', typeOf(target));
    }
    this.importFile(target.value);
    return done(sprigNil());
  }

  /**
   * Read, parse and evaluate a file in the global environment. Nested
   * imports resolve against the importing file's directory.
   */
  importFile(file: string): void {
    const resolved = path.resolve(this.currentDir, file);
    if (this.importStack.has(resolved)) {
      if (this.traceEnabled) this.trace(`Import skipped (already in progress): ${resolved}`);
      return;
    }

    let source: string;
    try {
      source = fs.readFileSync(resolved, 'utf-8');
    } catch (e) {
      throw new SprigError(ErrorCode.ReadFileFailed, { detail: `${resolved}: ${hostMessage(e)}` });
    }
    if (this.traceEnabled) this.trace(`Import: ${resolved}`);

    const previousDir = this.currentDir;
    this.importStack.add(resolved);
    this.currentDir = path.dirname(resolved);
    try {
      this.evaluateSource(source, this.globals);
    } finally {
      this.currentDir = previousDir;
      this.importStack.delete(resolved);
    }
  }

  private trace(message: string): void {
    this.traceLog.push(`[${Date.now() - this.startTime}ms] ${message}`);
    if (this.traceEnabled) {
      console.log(`  [trace] ${message}`);
    }
  }
}

function unquoteOutside(term: AST.Term): SprigError {
  return new SprigError(ErrorCode.ParseFailed, {
    detail: 'unquote outside of a quasiquote',
    position: term.position,
  });
}

function hostMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
