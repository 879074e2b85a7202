/**
 * Stream gates
 *
 * The matrix-based gate representation exchanged with the upstream producer
 * and the downstream consumer. Qubit references on the stream are positive
 * integers.
 */

import { basisMatrix } from './gates';
import type { Matrix } from './matrix';

// ============================================================================
// Gate Definitions
// ============================================================================

/**
 * Unitary gate: `matrix` acts on `targets`, conditioned on every qubit in
 * `controls` being one
 */
export interface UnitaryStreamGate {
  readonly kind: 'unitary';
  readonly targets: readonly number[];
  readonly controls: readonly number[];
  readonly matrix: Matrix;
}

/**
 * Measurement of every qubit in `measures` in the given basis
 */
export interface MeasurementStreamGate {
  readonly kind: 'measurement';
  readonly measures: readonly number[];
  readonly basis: Matrix;
}

/**
 * State preparation of every qubit in `targets` in the given basis
 */
export interface PrepStreamGate {
  readonly kind: 'prep';
  readonly targets: readonly number[];
  readonly basis: Matrix;
}

/**
 * Union type for all stream gates
 */
export type StreamGate = UnitaryStreamGate | MeasurementStreamGate | PrepStreamGate;

/**
 * Measured value of a qubit
 */
export type QubitValue = 'zero' | 'one' | 'undefined';

/**
 * Measurement result for one qubit reference
 */
export interface Measurement {
  readonly qubit: number;
  readonly value: QubitValue;
}

// ============================================================================
// Constructors
// ============================================================================

export function unitaryGate(
  targets: readonly number[],
  matrix: Matrix,
  controls: readonly number[] = []
): UnitaryStreamGate {
  return { kind: 'unitary', targets: [...targets], controls: [...controls], matrix };
}

export function measurementGate(
  measures: readonly number[],
  basis: Matrix = basisMatrix('z')
): MeasurementStreamGate {
  return { kind: 'measurement', measures: [...measures], basis };
}

export function prepGate(
  targets: readonly number[],
  basis: Matrix = basisMatrix('z')
): PrepStreamGate {
  return { kind: 'prep', targets: [...targets], basis };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Qubits whose measurement result the gate asks for
 */
export function measuredQubits(gate: StreamGate): readonly number[] {
  return gate.kind === 'measurement' ? gate.measures : [];
}

/**
 * One-line summary for logs
 */
export function describeStreamGate(gate: StreamGate): string {
  switch (gate.kind) {
    case 'unitary': {
      const controls = gate.controls.length > 0 ? ` controls [${gate.controls.join(', ')}]` : '';
      return `unitary on [${gate.targets.join(', ')}]${controls}`;
    }
    case 'measurement':
      return `measurement of [${gate.measures.join(', ')}]`;
    case 'prep':
      return `prep of [${gate.targets.join(', ')}]`;
  }
}
