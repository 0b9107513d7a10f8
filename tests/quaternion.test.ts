import {
  Quat,
  quatAdd,
  quatDiv,
  quatExp,
  quatInverse,
  quatLn,
  quatMul,
  quatNorm,
} from '../src/runtime/quaternion';

describe('Quaternions', () => {
  function expectClose(actual: Quat, expected: Quat) {
    actual.forEach((x, i) => expect(x).toBeCloseTo(expected[i], 10));
  }

  it('should multiply the basis units', () => {
    const i: Quat = [0, 1, 0, 0];
    const j: Quat = [0, 0, 1, 0];
    const k: Quat = [0, 0, 0, 1];
    expect(quatMul(i, j)).toEqual([0, 0, 0, 1]);
    expect(quatMul(j, k)).toEqual([0, 1, 0, 0]);
    expect(quatMul(k, i)).toEqual([0, 0, 1, 0]);
    expect(quatMul(k, k)).toEqual([-1, 0, 0, 0]);
  });

  it('should add component-wise', () => {
    expect(quatAdd([1, 2, 3, 4], [4, 3, 2, 1])).toEqual([5, 5, 5, 5]);
  });

  it('should give the identity for q times its inverse', () => {
    const q: Quat = [1, 2, -1, 0.5];
    expectClose(quatMul(q, quatInverse(q)), [1, 0, 0, 0]);
    expectClose(quatDiv(q, q), [1, 0, 0, 0]);
  });

  it('should take the norm', () => {
    expect(quatNorm([1, 2, 2, 4])).toBe(5);
  });

  it('should satisfy Euler\'s identity', () => {
    expectClose(quatExp([0, Math.PI, 0, 0]), [-1, 0, 0, 0]);
  });

  it('should invert exp with ln', () => {
    const q: Quat = [0.5, 0.3, -0.2, 0.1];
    expectClose(quatLn(quatExp(q)), q);
  });

  it('should treat real quaternions like real numbers', () => {
    expectClose(quatExp([1, 0, 0, 0]), [Math.E, 0, 0, 0]);
    expectClose(quatLn([Math.E, 0, 0, 0]), [1, 0, 0, 0]);
  });
});
