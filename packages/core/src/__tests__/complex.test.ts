import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  add,
  complex,
  conjugate,
  divide,
  equals,
  exp,
  fromPair,
  I,
  magnitude,
  magnitudeSquared,
  multiply,
  ONE,
  phase,
  rotate,
  scale,
  subtract,
  toPair,
  toString,
  ZERO,
} from '../complex';

const finite = fc.double({ min: -1e3, max: 1e3, noNaN: true });

describe('Gate Table Pairs', () => {
  it('converts both ways', () => {
    expect(fromPair([0.5, -0.25])).toEqual({ real: 0.5, imag: -0.25 });
    expect(toPair(complex(-1))).toEqual([-1, 0]);
  });

  it('names the units', () => {
    expect([ZERO, ONE, I].map(toPair)).toEqual([
      [0, 0],
      [1, 0],
      [0, 1],
    ]);
  });
});

describe('Polar Form', () => {
  it('measures length and angle', () => {
    expect(magnitude(complex(-3, 4))).toBe(5);
    expect(magnitudeSquared(complex(-3, 4))).toBe(25);
    expect(phase(complex(0, -2))).toBeCloseTo(-Math.PI / 2);
    expect(phase(complex(-1))).toBeCloseTo(Math.PI);
  });

  it('builds unit phase factors', () => {
    fc.assert(
      fc.property(finite, (theta) => {
        expect(magnitude(exp(theta))).toBeCloseTo(1, 12);
      })
    );
  });

  it('rotates without changing length', () => {
    expect(equals(rotate(I, Math.PI / 2), complex(-1), 1e-12)).toBe(true);
    expect(magnitude(rotate(complex(3, 4), 2.5))).toBeCloseTo(5);
  });
});

describe('Arithmetic', () => {
  it('adds, subtracts and scales', () => {
    expect(add(complex(1, 2), complex(0.5, -4))).toEqual({ real: 1.5, imag: -2 });
    expect(subtract(complex(1, 2), complex(0.5, -4))).toEqual({ real: 0.5, imag: 6 });
    expect(scale(complex(1, -2), 3)).toEqual({ real: 3, imag: -6 });
  });

  it('multiplies', () => {
    // (2 - i)(1 + 3i) = 5 + 5i
    expect(multiply(complex(2, -1), complex(1, 3))).toEqual({ real: 5, imag: 5 });
  });

  it('multiplies by the conjugate to the squared magnitude', () => {
    fc.assert(
      fc.property(finite, finite, (real, imag) => {
        const z = complex(real, imag);
        const product = multiply(z, conjugate(z));
        expect(product.real).toBeCloseTo(magnitudeSquared(z), 6);
        expect(product.imag).toBeCloseTo(0, 6);
      })
    );
  });

  it('divides', () => {
    // (1 + 2i)/(3 + 4i) = (11 + 2i)/25
    const quotient = divide(complex(1, 2), complex(3, 4));
    expect(quotient.real).toBeCloseTo(0.44);
    expect(quotient.imag).toBeCloseTo(0.08);
    expect(() => divide(ONE, ZERO)).toThrow('Division by zero');
  });
});

describe('Comparison and Display', () => {
  it('compares within a tolerance', () => {
    const nudged = complex(1 + 1e-12, -1e-12);
    expect(equals(ONE, nudged)).toBe(true);
    expect(equals(ONE, nudged, 1e-15)).toBe(false);
  });

  it('formats with a sign', () => {
    expect(toString(complex(0.5, -0.25), 2)).toBe('0.50 - 0.25i');
    expect(toString(I, 1)).toBe('0.0 + 1.0i');
  });
});
