/**
 * PDF affine transform [a, b, c, d, e, f], applied to row vectors:
 * x' = a*x + c*y + e, y' = b*x + d*y + f
 */
export type Matrix = [number, number, number, number, number, number];

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Product m1 × m2: the result applies m1 first, then m2.
 *
 * A `cm` operator with matrix M updates the CTM to `multiply(M, ctm)`.
 */
export function multiply(m1: Matrix, m2: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = m1;
  const [a2, b2, c2, d2, e2, f2] = m2;
  return [
    a1 * a2 + b1 * c2,
    a1 * b2 + b1 * d2,
    c1 * a2 + d1 * c2,
    c1 * b2 + d1 * d2,
    e1 * a2 + f1 * c2 + e2,
    e1 * b2 + f1 * d2 + f2,
  ];
}

export function applyToPoint(
  m: Matrix,
  x: number,
  y: number,
): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

/**
 * Read a matrix from an untyped value, or null when it is not six finite
 * numbers
 */
export function toMatrix(value: unknown): Matrix | null {
  if (!Array.isArray(value) || value.length < 6) {
    return null;
  }
  const numbers: number[] = [];
  for (let i = 0; i < 6; i++) {
    const n: unknown = value[i];
    if (typeof n !== 'number' || !Number.isFinite(n)) {
      return null;
    }
    numbers.push(n);
  }
  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}
