/**
 * Square complex matrices
 *
 * Gate unitaries and measurement bases. The dimension is always a power of
 * two (2^n for an n-qubit gate) and entries are stored row-major. The first
 * qubit of a gate's operand list is the most significant bit of the row and
 * column index.
 */

import {
  add,
  conjugate,
  divide,
  magnitude,
  magnitudeSquared,
  multiply,
  scale,
  subtract,
  toPair,
  toString as complexToString,
  ONE,
  ZERO,
  type Complex,
  type ComplexPair,
} from './complex';

/**
 * Number of qubits a row-major entry list of the given length describes, or
 * `undefined` when the length is not 4^n for some n >= 1.
 */
export function qubitCountForLength(length: number): number | undefined {
  let remaining = length;
  let numQubits = 0;
  while (remaining > 1) {
    if (remaining % 4 !== 0) {
      return undefined;
    }
    remaining /= 4;
    numQubits++;
  }
  return remaining === 1 && numQubits > 0 ? numQubits : undefined;
}

/**
 * Immutable square complex matrix
 *
 * @example
 * ```typescript
 * const x = Matrix.fromRows([
 *   [ZERO, ONE],
 *   [ONE, ZERO],
 * ]);
 * x.controlled(1).dimension; // 4
 * ```
 */
export class Matrix {
  private readonly _entries: readonly Complex[];
  private readonly _dimension: number;
  private readonly _numQubits: number;

  private constructor(entries: readonly Complex[], dimension: number, numQubits: number) {
    this._entries = entries;
    this._dimension = dimension;
    this._numQubits = numQubits;
  }

  // =========================================================================
  // Construction
  // =========================================================================

  /**
   * Create a matrix from row-major entries
   * @throws if the entry count is not 4^n for some n >= 1
   */
  static fromEntries(entries: readonly Complex[]): Matrix {
    const numQubits = qubitCountForLength(entries.length);
    if (numQubits === undefined) {
      throw new Error(`Matrix has invalid size ${entries.length}`);
    }
    return new Matrix(
      entries.map((c) => ({ real: c.real, imag: c.imag })),
      1 << numQubits,
      numQubits
    );
  }

  /**
   * Create a matrix from rows
   */
  static fromRows(rows: readonly (readonly Complex[])[]): Matrix {
    for (const row of rows) {
      if (row.length !== rows.length) {
        throw new Error('Matrix must be square');
      }
    }
    return Matrix.fromEntries(rows.flat());
  }

  /**
   * Create a diagonal matrix
   */
  static diagonal(diagonal: readonly Complex[]): Matrix {
    const dim = diagonal.length;
    const entries: Complex[] = [];
    for (let row = 0; row < dim; row++) {
      for (let col = 0; col < dim; col++) {
        entries.push(row === col ? diagonal[row] : ZERO);
      }
    }
    return Matrix.fromEntries(entries);
  }

  /**
   * Identity on the given number of qubits
   */
  static identity(numQubits: number = 1): Matrix {
    return Matrix.diagonal(new Array<Complex>(1 << numQubits).fill(ONE));
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Number of rows (and columns)
   */
  get dimension(): number {
    return this._dimension;
  }

  /**
   * Number of qubits the matrix acts on
   */
  get numQubits(): number {
    return this._numQubits;
  }

  /**
   * Row-major entries
   */
  get entries(): readonly Complex[] {
    return this._entries;
  }

  /**
   * Entry at (row, col)
   */
  get(row: number, col: number): Complex {
    return this._entries[row * this._dimension + col];
  }

  // =========================================================================
  // Algebra
  // =========================================================================

  /**
   * Matrix product this · other
   */
  multiply(other: Matrix): Matrix {
    if (other._dimension !== this._dimension) {
      throw new Error(
        `Cannot multiply ${this._dimension}x${this._dimension} by ${other._dimension}x${other._dimension} matrix`
      );
    }
    const dim = this._dimension;
    const entries: Complex[] = [];
    for (let row = 0; row < dim; row++) {
      for (let col = 0; col < dim; col++) {
        let sum = ZERO;
        for (let k = 0; k < dim; k++) {
          sum = add(sum, multiply(this.get(row, k), other.get(k, col)));
        }
        entries.push(sum);
      }
    }
    return new Matrix(entries, dim, this._numQubits);
  }

  /**
   * Conjugate transpose
   */
  adjoint(): Matrix {
    const dim = this._dimension;
    const entries: Complex[] = [];
    for (let row = 0; row < dim; row++) {
      for (let col = 0; col < dim; col++) {
        entries.push(conjugate(this.get(col, row)));
      }
    }
    return new Matrix(entries, dim, this._numQubits);
  }

  /**
   * Scale every column to unit L2 norm
   * @throws if a column is zero
   */
  normalizeColumns(): Matrix {
    const dim = this._dimension;
    const entries = [...this._entries];
    for (let col = 0; col < dim; col++) {
      let sum = 0;
      for (let row = 0; row < dim; row++) {
        sum += magnitudeSquared(entries[row * dim + col]);
      }
      if (sum === 0) {
        throw new Error(`Column ${col} has zero norm`);
      }
      const factor = 1 / Math.sqrt(sum);
      for (let row = 0; row < dim; row++) {
        entries[row * dim + col] = scale(entries[row * dim + col], factor);
      }
    }
    return new Matrix(entries, dim, this._numQubits);
  }

  /**
   * Whether U†U is the identity within epsilon, entry by entry
   */
  isApproxUnitary(epsilon: number): boolean {
    const product = this.adjoint().multiply(this);
    for (let row = 0; row < this._dimension; row++) {
      for (let col = 0; col < this._dimension; col++) {
        const expected = row === col ? ONE : ZERO;
        if (magnitude(subtract(product.get(row, col), expected)) > epsilon) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Compare two matrices entry by entry within epsilon.
   *
   * With `ignoreGlobalPhase`, `other` may differ from this matrix by a
   * unit-magnitude factor.
   */
  approxEquals(other: Matrix, epsilon: number, ignoreGlobalPhase: boolean = true): boolean {
    if (other._dimension !== this._dimension) {
      return false;
    }

    let factor = ONE;
    if (ignoreGlobalPhase) {
      const pivot = this.largestEntryIndex();
      const mine = this._entries[pivot];
      const theirs = other._entries[pivot];
      const theirMagnitude = magnitude(theirs);
      if (magnitude(mine) === 0 || theirMagnitude === 0) {
        factor = ONE;
      } else {
        const ratio = divide(theirs, mine);
        factor = scale(ratio, 1 / magnitude(ratio));
      }
    }

    for (let i = 0; i < this._entries.length; i++) {
      const diff = subtract(multiply(this._entries[i], factor), other._entries[i]);
      if (Math.abs(diff.real) > epsilon || Math.abs(diff.imag) > epsilon) {
        return false;
      }
    }
    return true;
  }

  /**
   * Compare two measurement bases. Each column is an eigenvector, so column
   * `i` of `other` may differ from column `i` of this matrix by its own
   * phase: the normalized overlap |⟨aᵢ|bᵢ⟩| must be at least 1 − epsilon.
   */
  basisApproxEquals(other: Matrix, epsilon: number): boolean {
    if (other._dimension !== this._dimension) {
      return false;
    }
    const dim = this._dimension;
    for (let col = 0; col < dim; col++) {
      let overlap = ZERO;
      let mineNorm = 0;
      let theirNorm = 0;
      for (let row = 0; row < dim; row++) {
        const mine = this.get(row, col);
        const theirs = other.get(row, col);
        overlap = add(overlap, multiply(conjugate(mine), theirs));
        mineNorm += magnitudeSquared(mine);
        theirNorm += magnitudeSquared(theirs);
      }
      if (mineNorm === 0 || theirNorm === 0) {
        return false;
      }
      if (magnitude(overlap) / Math.sqrt(mineNorm * theirNorm) < 1 - epsilon) {
        return false;
      }
    }
    return true;
  }

  // =========================================================================
  // Control Structure
  // =========================================================================

  /**
   * Extend with control qubits. The controls become the most significant
   * qubits, so the result is the identity except for its bottom-right block.
   */
  controlled(count: number): Matrix {
    if (count === 0) {
      return this;
    }
    const dim = this._dimension << count;
    const offset = dim - this._dimension;
    const entries: Complex[] = [];
    for (let row = 0; row < dim; row++) {
      for (let col = 0; col < dim; col++) {
        if (row >= offset && col >= offset) {
          entries.push(this.get(row - offset, col - offset));
        } else {
          entries.push(row === col ? ONE : ZERO);
        }
      }
    }
    return new Matrix(entries, dim, this._numQubits + count);
  }

  /**
   * Bottom-right block acting on the last `numQubits` qubits
   */
  trailingBlock(numQubits: number): Matrix {
    const size = 1 << numQubits;
    if (size > this._dimension) {
      throw new Error(`Cannot take a ${size}x${size} block of a ${this._dimension}x${this._dimension} matrix`);
    }
    const offset = this._dimension - size;
    const entries: Complex[] = [];
    for (let row = 0; row < size; row++) {
      for (let col = 0; col < size; col++) {
        entries.push(this.get(row + offset, col + offset));
      }
    }
    return new Matrix(entries, size, numQubits);
  }

  // =========================================================================
  // Serialization
  // =========================================================================

  /**
   * Row-major `[real, imag]` pairs, as a gate table writes them
   */
  toPairs(): ComplexPair[] {
    return this._entries.map(toPair);
  }

  /**
   * Format as rows of complex numbers
   */
  toString(precision: number = 4): string {
    const rows: string[] = [];
    for (let row = 0; row < this._dimension; row++) {
      const cells: string[] = [];
      for (let col = 0; col < this._dimension; col++) {
        cells.push(complexToString(this.get(row, col), precision));
      }
      rows.push(`[${cells.join(', ')}]`);
    }
    return rows.join('\n');
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private largestEntryIndex(): number {
    let best = 0;
    let bestMagnitude = -1;
    for (let i = 0; i < this._entries.length; i++) {
      const m = magnitudeSquared(this._entries[i]);
      if (m > bestMagnitude) {
        best = i;
        bestMagnitude = m;
      }
    }
    return best;
  }
}
