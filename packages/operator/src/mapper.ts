/**
 * Circuit mapper interface and reference mappers
 *
 * The operator treats the mapper as a function of (kernel, options) to a
 * mapped gate list and a relabelling of the kernel's qubits. The reference
 * mappers here only place qubits; they never route or reschedule.
 */

import type { InternalGate, Kernel } from './kernel';

// ============================================================================
// Interface
// ============================================================================

export type MapperOptions = ReadonlyMap<string, string>;

/**
 * `free`: the kernel's incoming layout may be chosen by the mapper.
 * `locked`: the incoming layout is the identity.
 */
export type PlacementMode = 'free' | 'locked';

export interface MapRequest {
  readonly kernel: Kernel;
  readonly options: MapperOptions;
  readonly mode: PlacementMode;
  readonly seed: number;
}

export interface MapResult {
  /**
   * Mapped gates on output physical qubits, in emission order
   */
  readonly gates: readonly InternalGate[];
  /**
   * `v2rOut[q]` is where kernel qubit `q` ends up after the kernel, or
   * `undefined` if it is not tracked
   */
  readonly v2rOut: ReadonlyArray<number | undefined>;
}

export interface CircuitMapper {
  map(request: MapRequest): MapResult;
}

// ============================================================================
// Reference Mappers
// ============================================================================

/**
 * Leaves every kernel as it is
 */
export class IdentityMapper implements CircuitMapper {
  map({ kernel }: MapRequest): MapResult {
    return {
      gates: kernel.gates,
      v2rOut: Array.from({ length: kernel.numQubits }, (_, qubit) => qubit),
    };
  }
}

/**
 * Draws a seeded random initial placement when the options ask for one
 * (`mapinitone2one=no`, `initialplace=yes`) and the layout is free;
 * otherwise behaves as {@link IdentityMapper}.
 */
export class RandomPlacementMapper implements CircuitMapper {
  map({ kernel, options, mode, seed }: MapRequest): MapResult {
    const place =
      mode === 'free' && options.get('mapinitone2one') === 'no' && options.get('initialplace') === 'yes';
    if (!place) {
      return new IdentityMapper().map({ kernel, options, mode, seed });
    }

    const placement = randomPermutation(kernel.numQubits, mulberry32(seed));
    return {
      gates: kernel.gates.map((gate) => ({
        ...gate,
        operands: gate.operands.map((qubit) => placement[qubit]),
      })),
      v2rOut: placement,
    };
  }
}

// ============================================================================
// Random Numbers
// ============================================================================

/**
 * Seeded uniform generator on [0, 1)
 */
export const mulberry32 = (seed: number): (() => number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let c = Math.imul(t ^ (t >>> 15), 1 | t);
    c ^= c + Math.imul(c ^ (c >>> 7), 61 | c);
    return ((c ^ (c >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Fisher-Yates shuffle of 0..count-1
 */
export function randomPermutation(count: number, random: () => number): number[] {
  const permutation = Array.from({ length: count }, (_, index) => index);
  for (let i = count - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [permutation[i], permutation[j]] = [permutation[j], permutation[i]];
  }
  return permutation;
}
