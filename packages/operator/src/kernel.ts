/**
 * Kernel
 *
 * A measurement-delimited batch of named gates on physical qubits, handed
 * to the circuit mapper as a whole.
 */

/**
 * Named gate on 0-based physical qubits
 */
export interface InternalGate {
  readonly name: string;
  readonly operands: readonly number[];
  readonly angle: number;
}

export class Kernel {
  private readonly _generation: number;
  private readonly _numQubits: number;
  private readonly _gates: InternalGate[] = [];

  /**
   * @param generation Number of kernels mapped before this one
   * @param numQubits Physical qubit count of the platform
   */
  constructor(generation: number, numQubits: number) {
    if (!Number.isInteger(generation) || generation < 0) {
      throw new Error('generation must be a non-negative integer');
    }
    if (!Number.isInteger(numQubits) || numQubits < 1) {
      throw new Error('numQubits must be a positive integer');
    }
    this._generation = generation;
    this._numQubits = numQubits;
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get name(): string {
    return `kernel_${this._generation}`;
  }

  get generation(): number {
    return this._generation;
  }

  get numQubits(): number {
    return this._numQubits;
  }

  get gates(): readonly InternalGate[] {
    return this._gates;
  }

  get length(): number {
    return this._gates.length;
  }

  get isEmpty(): boolean {
    return this._gates.length === 0;
  }

  // =========================================================================
  // Building
  // =========================================================================

  /**
   * Append a gate
   */
  gate(name: string, operands: readonly number[], angle: number = 0): this {
    for (const qubit of operands) {
      this.validateQubit(qubit);
    }
    this._gates.push({ name, operands: [...operands], angle });
    return this;
  }

  /**
   * Drop every gate from index `length` on
   */
  truncate(length: number): void {
    this._gates.splice(length);
  }

  /**
   * Kernel for the next batch
   */
  next(): Kernel {
    return new Kernel(this._generation + 1, this._numQubits);
  }

  toJSON(): { name: string; numQubits: number; gates: InternalGate[] } {
    return {
      name: this.name,
      numQubits: this._numQubits,
      gates: [...this._gates],
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private validateQubit(qubit: number): void {
    if (!Number.isInteger(qubit) || qubit < 0 || qubit >= this._numQubits) {
      throw new Error(`Qubit ${qubit} out of range [0, ${this._numQubits - 1}]`);
    }
  }
}
