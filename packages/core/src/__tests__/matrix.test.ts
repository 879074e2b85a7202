/**
 * Tests for Matrix
 */

import { describe, it, expect } from 'vitest';
import { complex, ONE, ZERO } from '../complex';
import { Matrix, qubitCountForLength } from '../matrix';

const X = Matrix.fromRows([
  [ZERO, ONE],
  [ONE, ZERO],
]);

describe('Matrix Creation', () => {
  it('derives the qubit count from the entry count', () => {
    expect(qubitCountForLength(4)).toBe(1);
    expect(qubitCountForLength(16)).toBe(2);
    expect(qubitCountForLength(64)).toBe(3);
    expect(qubitCountForLength(1)).toBeUndefined();
    expect(qubitCountForLength(8)).toBeUndefined();
    expect(qubitCountForLength(0)).toBeUndefined();
  });

  it('rejects sizes that are not 4^n', () => {
    expect(() => Matrix.fromEntries([ONE, ZERO, ZERO])).toThrow('Matrix has invalid size 3');
  });

  it('rejects non-square rows', () => {
    expect(() => Matrix.fromRows([[ONE, ZERO], [ONE]])).toThrow('Matrix must be square');
  });

  it('creates identities', () => {
    const identity = Matrix.identity(2);
    expect(identity.dimension).toBe(4);
    expect(identity.numQubits).toBe(2);
    expect(identity.get(3, 3)).toEqual(ONE);
    expect(identity.get(0, 3)).toEqual(ZERO);
  });
});

describe('Matrix Algebra', () => {
  it('multiplies', () => {
    expect(X.multiply(X).approxEquals(Matrix.identity(1), 1e-12, false)).toBe(true);
  });

  it('refuses to multiply mismatched dimensions', () => {
    expect(() => X.multiply(Matrix.identity(2))).toThrow('Cannot multiply 2x2 by 4x4 matrix');
  });

  it('takes the conjugate transpose', () => {
    const m = Matrix.fromRows([
      [complex(1, 1), complex(2, -3)],
      [complex(0, 4), complex(5)],
    ]);
    const adjoint = m.adjoint();
    expect(adjoint.get(0, 0)).toEqual({ real: 1, imag: -1 });
    expect(adjoint.get(0, 1)).toEqual({ real: 0, imag: -4 });
    expect(adjoint.get(1, 0)).toEqual({ real: 2, imag: 3 });
  });
});

describe('Normalization and Unitarity', () => {
  it('scales every column to unit norm', () => {
    const m = Matrix.diagonal([complex(2), complex(0, 3)]).normalizeColumns();
    expect(m.get(0, 0)).toEqual({ real: 1, imag: 0 });
    expect(m.get(1, 1)).toEqual({ real: 0, imag: 1 });
  });

  it('throws on a zero column', () => {
    const m = Matrix.fromRows([
      [ONE, ZERO],
      [ONE, ZERO],
    ]);
    expect(() => m.normalizeColumns()).toThrow('Column 1 has zero norm');
  });

  it('detects unitary matrices', () => {
    expect(X.isApproxUnitary(1e-9)).toBe(true);
    const skewed = Matrix.fromRows([
      [ONE, ONE],
      [ZERO, ONE],
    ]).normalizeColumns();
    expect(skewed.isApproxUnitary(1e-6)).toBe(false);
  });

  it('treats column norm drift beyond epsilon as non-unitary', () => {
    const drifted = Matrix.diagonal([ONE, complex(1.001)]);
    expect(drifted.isApproxUnitary(1e-6)).toBe(false);
    expect(drifted.isApproxUnitary(1e-2)).toBe(true);
  });
});

describe('Approximate Equality', () => {
  const minusIX = Matrix.fromRows([
    [ZERO, complex(0, -1)],
    [complex(0, -1), ZERO],
  ]);

  it('ignores global phase by default', () => {
    expect(X.approxEquals(minusIX, 1e-9)).toBe(true);
  });

  it('can compare exactly', () => {
    expect(X.approxEquals(minusIX, 1e-9, false)).toBe(false);
  });

  it('never equates different dimensions', () => {
    expect(X.approxEquals(Matrix.identity(2), 1)).toBe(false);
  });

  it('does not treat a relative phase as global', () => {
    const z = Matrix.diagonal([ONE, complex(-1)]);
    expect(Matrix.identity(1).approxEquals(z, 1e-9)).toBe(false);
  });
});

describe('Basis Equality', () => {
  it('accepts a separate phase on every column', () => {
    const z = Matrix.diagonal([complex(-1), complex(0, 1)]);
    expect(Matrix.identity(1).basisApproxEquals(z, 1e-9)).toBe(true);
  });

  it('rejects swapped or rotated columns', () => {
    expect(Matrix.identity(1).basisApproxEquals(X, 1e-9)).toBe(false);
    const h = complex(Math.SQRT1_2);
    const plus = Matrix.fromRows([
      [h, h],
      [h, complex(-Math.SQRT1_2)],
    ]);
    expect(Matrix.identity(1).basisApproxEquals(plus, 1e-6)).toBe(false);
  });

  it('rejects zero columns and other dimensions', () => {
    const zeroColumn = Matrix.fromRows([
      [ONE, ZERO],
      [ZERO, ZERO],
    ]);
    expect(Matrix.identity(1).basisApproxEquals(zeroColumn, 1e-9)).toBe(false);
    expect(Matrix.identity(1).basisApproxEquals(Matrix.identity(2), 1e-9)).toBe(false);
  });
});

describe('Control Structure', () => {
  it('adds controls as leading qubits', () => {
    const cnot = X.controlled(1);
    expect(cnot.numQubits).toBe(2);
    expect(cnot.get(0, 0)).toEqual(ONE);
    expect(cnot.get(1, 1)).toEqual(ONE);
    expect(cnot.get(2, 3)).toEqual(ONE);
    expect(cnot.get(3, 2)).toEqual(ONE);
    expect(cnot.get(2, 2)).toEqual(ZERO);
  });

  it('returns itself for zero controls', () => {
    expect(X.controlled(0)).toBe(X);
  });

  it('extracts the trailing block', () => {
    const toffoli = X.controlled(2);
    expect(toffoli.dimension).toBe(8);
    expect(toffoli.trailingBlock(1).approxEquals(X, 1e-12, false)).toBe(true);
  });
});

describe('Serialization', () => {
  it('writes gate table pairs', () => {
    expect(X.toPairs()).toEqual([
      [0, 0],
      [1, 0],
      [1, 0],
      [0, 0],
    ]);
  });

  it('formats rows', () => {
    expect(Matrix.identity(1).toString(1)).toBe(
      '[1.0 + 0.0i, 0.0 + 0.0i]\n[0.0 + 0.0i, 1.0 + 0.0i]'
    );
  });
});
