/**
 * Complex scalars
 *
 * The entries of gate unitaries and measurement bases. Gate tables write an
 * entry as a `[re, im]` pair; everything else works on `Complex` records.
 */

export interface Complex {
  real: number;
  imag: number;
}

/** An entry as it appears in a gate table */
export type ComplexPair = readonly [number, number];

export function complex(real: number, imag = 0): Complex {
  return { real, imag };
}

export const ZERO: Complex = complex(0);
export const ONE: Complex = complex(1);
export const I: Complex = complex(0, 1);

// ============================================================================
// Gate Table Pairs
// ============================================================================

export function fromPair([real, imag]: ComplexPair): Complex {
  return { real, imag };
}

export function toPair({ real, imag }: Complex): ComplexPair {
  return [real, imag];
}

// ============================================================================
// Polar Form
// ============================================================================

/** |z|² */
export function magnitudeSquared({ real, imag }: Complex): number {
  return real * real + imag * imag;
}

/** |z| */
export function magnitude(z: Complex): number {
  return Math.hypot(z.real, z.imag);
}

/** arg(z) in (−π, π] */
export function phase(z: Complex): number {
  return Math.atan2(z.imag, z.real);
}

/**
 * Unit phase factor e^(iθ). Rotation gates and controlled phase kicks are
 * built from these.
 */
export function exp(theta: number): Complex {
  return complex(Math.cos(theta), Math.sin(theta));
}

// ============================================================================
// Arithmetic
// ============================================================================

export function conjugate(z: Complex): Complex {
  return complex(z.real, -z.imag);
}

export function add(a: Complex, b: Complex): Complex {
  return complex(a.real + b.real, a.imag + b.imag);
}

export function subtract(a: Complex, b: Complex): Complex {
  return complex(a.real - b.real, a.imag - b.imag);
}

export function multiply(a: Complex, b: Complex): Complex {
  return complex(a.real * b.real - a.imag * b.imag, a.real * b.imag + a.imag * b.real);
}

export function scale(z: Complex, factor: number): Complex {
  return complex(z.real * factor, z.imag * factor);
}

/**
 * a / b
 *
 * @throws when b is exactly zero; callers dividing by a matrix entry check
 * its magnitude against their tolerance first
 */
export function divide(a: Complex, b: Complex): Complex {
  const norm = magnitudeSquared(b);
  if (norm === 0) {
    throw new Error('Division by zero');
  }
  return scale(multiply(a, conjugate(b)), 1 / norm);
}

/** z · e^(iθ) */
export function rotate(z: Complex, theta: number): Complex {
  return multiply(z, exp(theta));
}

// ============================================================================
// Comparison and Display
// ============================================================================

/** Component-wise comparison within an absolute tolerance */
export function equals(a: Complex, b: Complex, epsilon = 1e-10): boolean {
  return Math.abs(a.real - b.real) <= epsilon && Math.abs(a.imag - b.imag) <= epsilon;
}

/** `re ± im i` with a fixed number of decimals, as used in error messages */
export function toString(z: Complex, precision = 4): string {
  const sign = z.imag < 0 ? '-' : '+';
  return `${z.real.toFixed(precision)} ${sign} ${Math.abs(z.imag).toFixed(precision)}i`;
}
