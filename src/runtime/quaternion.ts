/**
 * Quaternion arithmetic. A quaternion is `[a, b, c, d]` for a + bi + cj + dk.
 */

export type Quat = readonly [number, number, number, number];

export function quatFromReal(x: number): Quat {
  return [x, 0, 0, 0];
}

export function quatAdd([a1, b1, c1, d1]: Quat, [a2, b2, c2, d2]: Quat): Quat {
  return [a1 + a2, b1 + b2, c1 + c2, d1 + d2];
}

export function quatSub([a1, b1, c1, d1]: Quat, [a2, b2, c2, d2]: Quat): Quat {
  return [a1 - a2, b1 - b2, c1 - c2, d1 - d2];
}

/** Hamilton product; not commutative. */
export function quatMul([a1, b1, c1, d1]: Quat, [a2, b2, c2, d2]: Quat): Quat {
  return [
    a1 * a2 - b1 * b2 - c1 * c2 - d1 * d2,
    a1 * b2 + b1 * a2 + c1 * d2 - d1 * c2,
    a1 * c2 - b1 * d2 + c1 * a2 + d1 * b2,
    a1 * d2 + b1 * c2 - c1 * b2 + d1 * a2,
  ];
}

export function quatScale([a, b, c, d]: Quat, k: number): Quat {
  return [a * k, b * k, c * k, d * k];
}

export function quatNorm([a, b, c, d]: Quat): number {
  return Math.sqrt(a * a + b * b + c * c + d * d);
}

export function quatInverse(q: Quat): Quat {
  const [a, b, c, d] = q;
  const n2 = a * a + b * b + c * c + d * d;
  return [a / n2, -b / n2, -c / n2, -d / n2];
}

/** Right division: `p * q⁻¹`. */
export function quatDiv(p: Quat, q: Quat): Quat {
  return quatMul(p, quatInverse(q));
}

/** Unit vector part and its length. A real quaternion gets the `i` axis. */
function axis([, b, c, d]: Quat): [Quat, number] {
  const len = Math.sqrt(b * b + c * c + d * d);
  if (len === 0) return [[0, 1, 0, 0], 0];
  return [[0, b / len, c / len, d / len], len];
}

export function quatExp(q: Quat): Quat {
  const [unit, theta] = axis(q);
  const scale = Math.exp(q[0]);
  return quatAdd([scale * Math.cos(theta), 0, 0, 0], quatScale(unit, scale * Math.sin(theta)));
}

export function quatLn(q: Quat): Quat {
  const norm = quatNorm(q);
  const [unit] = axis(q);
  return quatAdd([Math.log(norm), 0, 0, 0], quatScale(unit, Math.acos(q[0] / norm)));
}
