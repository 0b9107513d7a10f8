import { SprigValue } from './values';
import { ErrorCode, SprigError } from './errors';

/** Names that can never be bound with `define`, `let` or a parameter list. */
export const RESERVED_IDENTIFIERS: ReadonlySet<string> = new Set([
  'define', 'lambda', 'λ', 'cond', 'if', 'else', 'let', 'begin',
  'quote', 'quasiquote', 'unquote',
  'define-struct', 'define-macro', 'define-macro-rule',
  'set!', 'try', 'import',
  '_',
]);

export function isReserved(name: string): boolean {
  return RESERVED_IDENTIFIERS.has(name);
}

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain.
 */
export class Environment {
  private bindings: Map<string, SprigValue> = new Map();
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  lookup(name: string): SprigValue {
    const value = this.tryLookup(name);
    if (value === undefined) {
      throw new SprigError(ErrorCode.UndefinedIdentifier, { detail: name });
    }
    return value;
  }

  tryLookup(name: string): SprigValue | undefined {
    let scope: Environment | null = this;
    while (scope) {
      const value = scope.bindings.get(name);
      if (value !== undefined) return value;
      scope = scope.parent;
    }
    return undefined;
  }

  /** Bind in this scope only, shadowing any outer binding. */
  define(name: string, value: SprigValue): void {
    if (isReserved(name)) {
      throw new SprigError(ErrorCode.ReservedIdentifier, { detail: name });
    }
    this.bindings.set(name, value);
  }

  /** Bind a reserved name, e.g. the session's `_`. Not reachable from Sprig code. */
  bindReserved(name: string, value: SprigValue): void {
    this.bindings.set(name, value);
  }

  /**
   * Set a variable in the nearest scope where it's already defined.
   */
  set(name: string, value: SprigValue): void {
    let scope: Environment | null = this;
    while (scope) {
      if (scope.bindings.has(name)) {
        scope.bindings.set(name, value);
        return;
      }
      scope = scope.parent;
    }
    throw new SprigError(ErrorCode.UndefinedIdentifier, { detail: name });
  }

  has(name: string): boolean {
    return this.tryLookup(name) !== undefined;
  }

  child(): Environment {
    return new Environment(this);
  }

  /**
   * Get all bindings in this scope (not including parent).
   */
  ownBindings(): Map<string, SprigValue> {
    return new Map(this.bindings);
  }
}
