import { Environment, RESERVED_IDENTIFIERS } from '../src/runtime/environment';
import { ErrorCode, SprigError } from '../src/runtime/errors';
import { sprigNumber } from '../src/runtime/values';

describe('Environment', () => {
  function codeOf(fn: () => void): ErrorCode | undefined {
    try {
      fn();
    } catch (e) {
      if (e instanceof SprigError) return e.code;
      throw e;
    }
    return undefined;
  }

  it('should define and look up bindings', () => {
    const env = new Environment();
    env.define('x', sprigNumber(1));
    expect(env.lookup('x')).toEqual(sprigNumber(1));
    expect(env.has('x')).toBe(true);
  });

  it('should walk outward through parent scopes', () => {
    const root = new Environment();
    root.define('x', sprigNumber(1));
    const inner = root.child().child();
    expect(inner.lookup('x')).toEqual(sprigNumber(1));
  });

  it('should shadow without touching the parent', () => {
    const root = new Environment();
    root.define('x', sprigNumber(1));
    const inner = root.child();
    inner.define('x', sprigNumber(2));
    expect(inner.lookup('x')).toEqual(sprigNumber(2));
    expect(root.lookup('x')).toEqual(sprigNumber(1));
  });

  it('should set the binding in the scope that owns it', () => {
    const root = new Environment();
    root.define('x', sprigNumber(1));
    const inner = root.child();
    inner.set('x', sprigNumber(5));
    expect(root.lookup('x')).toEqual(sprigNumber(5));
    expect(inner.ownBindings().size).toBe(0);
  });

  it('should report undefined identifiers as 001', () => {
    const env = new Environment();
    expect(codeOf(() => env.lookup('missing'))).toBe(ErrorCode.UndefinedIdentifier);
    expect(codeOf(() => env.set('missing', sprigNumber(1)))).toBe(ErrorCode.UndefinedIdentifier);
    expect(env.tryLookup('missing')).toBeUndefined();
  });

  it('should refuse to bind reserved identifiers', () => {
    const env = new Environment();
    for (const name of ['define', 'lambda', 'λ', 'else', 'set!', '_']) {
      expect(RESERVED_IDENTIFIERS.has(name)).toBe(true);
      expect(codeOf(() => env.define(name, sprigNumber(1)))).toBe(ErrorCode.ReservedIdentifier);
    }
  });

  it('should let the host bind reserved names', () => {
    const env = new Environment();
    env.bindReserved('_', sprigNumber(7));
    expect(env.lookup('_')).toEqual(sprigNumber(7));
  });

  it('should list only its own bindings', () => {
    const root = new Environment();
    root.define('a', sprigNumber(1));
    const inner = root.child();
    inner.define('b', sprigNumber(2));
    expect(Array.from(inner.ownBindings().keys())).toEqual(['b']);
  });
});
