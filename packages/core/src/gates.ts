/**
 * Gate kinds
 *
 * The closed set of gate kinds a gate table may name, with the matrices of
 * the predefined ones and angle decoding for the parameterized ones.
 */

import {
  complex,
  divide,
  exp,
  magnitude,
  multiply,
  phase,
  rotate,
  I,
  ONE,
  ZERO,
  type Complex,
} from './complex';
import { Matrix } from './matrix';

// ============================================================================
// Gate Kind Definitions
// ============================================================================

/**
 * Every kind keyword, lowercase, as it appears in a gate table
 */
export const GATE_KINDS = [
  'i',
  'x',
  'y',
  'z',
  'h',
  's',
  's_dag',
  't',
  't_dag',
  'rx_90',
  'rx_m90',
  'rx_180',
  'rx',
  'ry_90',
  'ry_m90',
  'ry_180',
  'ry',
  'rz_90',
  'rz_m90',
  'rz_180',
  'rz',
  'phase',
  'swap',
  'sqswap',
  'unitary',
  'measure',
  'prep',
] as const;

/**
 * All gate kinds
 */
export type GateKind = (typeof GATE_KINDS)[number];

/**
 * Kinds whose matrix depends on an angle
 */
export type ParameterizedGateKind = 'rx' | 'ry' | 'rz' | 'phase';

/**
 * Kinds that carry a basis instead of a unitary
 */
export type BasisGateKind = 'measure' | 'prep';

/**
 * Kinds with a built-in matrix
 */
export type PredefinedGateKind = Exclude<GateKind, BasisGateKind | 'unitary'>;

/**
 * Pauli axis naming a measurement or preparation basis
 */
export type PauliBasis = 'x' | 'y' | 'z';

/**
 * Parse a kind keyword, case-insensitively
 */
export function parseGateKind(keyword: string): GateKind | undefined {
  const lower = keyword.toLowerCase();
  return GATE_KINDS.find((kind) => kind === lower);
}

/**
 * Parse a basis keyword, case-insensitively
 */
export function parsePauliBasis(keyword: string): PauliBasis | undefined {
  switch (keyword.toLowerCase()) {
    case 'x':
      return 'x';
    case 'y':
      return 'y';
    case 'z':
      return 'z';
    default:
      return undefined;
  }
}

export function isParameterizedKind(kind: GateKind): kind is ParameterizedGateKind {
  return kind === 'rx' || kind === 'ry' || kind === 'rz' || kind === 'phase';
}

export function isBasisKind(kind: GateKind): kind is BasisGateKind {
  return kind === 'measure' || kind === 'prep';
}

// ============================================================================
// Matrices
// ============================================================================

const HALF_SQRT2 = Math.SQRT1_2;

/**
 * Basis matrix whose columns are the eigenvectors of the given Pauli
 */
export function basisMatrix(basis: PauliBasis): Matrix {
  switch (basis) {
    case 'x':
      return Matrix.fromRows([
        [complex(HALF_SQRT2), complex(HALF_SQRT2)],
        [complex(HALF_SQRT2), complex(-HALF_SQRT2)],
      ]);
    case 'y':
      return Matrix.fromRows([
        [complex(HALF_SQRT2), complex(HALF_SQRT2)],
        [complex(0, HALF_SQRT2), complex(0, -HALF_SQRT2)],
      ]);
    case 'z':
      return Matrix.identity(1);
  }
}

function rx(theta: number): Matrix {
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);
  return Matrix.fromRows([
    [complex(c), complex(0, -s)],
    [complex(0, -s), complex(c)],
  ]);
}

function ry(theta: number): Matrix {
  const c = Math.cos(theta / 2);
  const s = Math.sin(theta / 2);
  return Matrix.fromRows([
    [complex(c), complex(-s)],
    [complex(s), complex(c)],
  ]);
}

function rz(theta: number): Matrix {
  return Matrix.diagonal([exp(-theta / 2), exp(theta / 2)]);
}

/**
 * Matrix of a predefined gate. `angle` is only read for parameterized kinds.
 */
export function predefinedMatrix(kind: PredefinedGateKind, angle: number = 0): Matrix {
  switch (kind) {
    case 'i':
      return Matrix.identity(1);
    case 'x':
      return Matrix.fromRows([
        [ZERO, ONE],
        [ONE, ZERO],
      ]);
    case 'y':
      return Matrix.fromRows([
        [ZERO, complex(0, -1)],
        [I, ZERO],
      ]);
    case 'z':
      return Matrix.diagonal([ONE, complex(-1)]);
    case 'h':
      return basisMatrix('x');
    case 's':
      return Matrix.diagonal([ONE, I]);
    case 's_dag':
      return Matrix.diagonal([ONE, complex(0, -1)]);
    case 't':
      return Matrix.diagonal([ONE, exp(Math.PI / 4)]);
    case 't_dag':
      return Matrix.diagonal([ONE, exp(-Math.PI / 4)]);
    case 'rx_90':
      return rx(Math.PI / 2);
    case 'rx_m90':
      return rx(-Math.PI / 2);
    case 'rx_180':
      return rx(Math.PI);
    case 'rx':
      return rx(angle);
    case 'ry_90':
      return ry(Math.PI / 2);
    case 'ry_m90':
      return ry(-Math.PI / 2);
    case 'ry_180':
      return ry(Math.PI);
    case 'ry':
      return ry(angle);
    case 'rz_90':
      return rz(Math.PI / 2);
    case 'rz_m90':
      return rz(-Math.PI / 2);
    case 'rz_180':
      return rz(Math.PI);
    case 'rz':
      return rz(angle);
    case 'phase':
      return Matrix.diagonal([ONE, exp(angle)]);
    case 'swap':
      return Matrix.fromRows([
        [ONE, ZERO, ZERO, ZERO],
        [ZERO, ZERO, ONE, ZERO],
        [ZERO, ONE, ZERO, ZERO],
        [ZERO, ZERO, ZERO, ONE],
      ]);
    case 'sqswap': {
      const a = complex(0.5, 0.5);
      const b = complex(0.5, -0.5);
      return Matrix.fromRows([
        [ONE, ZERO, ZERO, ZERO],
        [ZERO, a, b, ZERO],
        [ZERO, b, a, ZERO],
        [ZERO, ZERO, ZERO, ONE],
      ]);
    }
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled gate kind ${String(unreachable)}`);
    }
  }
}

// ============================================================================
// Angle Decoding
// ============================================================================

/**
 * Wrap an angle into (-π, π]
 */
export function normalizeAngle(theta: number): number {
  let t = theta % (2 * Math.PI);
  if (t <= -Math.PI) {
    t += 2 * Math.PI;
  } else if (t > Math.PI) {
    t -= 2 * Math.PI;
  }
  return t;
}

/**
 * Recover the angle of a single-qubit rotation matrix known only up to
 * global phase. The result lies in (-π, π] and still has to be verified by
 * rebuilding the matrix; `undefined` means no angle can be read at all.
 */
export function decodeAngle(kind: ParameterizedGateKind, block: Matrix): number | undefined {
  if (block.numQubits !== 1) {
    return undefined;
  }
  switch (kind) {
    case 'rx':
      return halfAngleFrom(block.get(0, 0), multiply(I, block.get(1, 0)));
    case 'ry':
      return halfAngleFrom(block.get(0, 0), block.get(1, 0));
    case 'rz':
    case 'phase': {
      const top = block.get(0, 0);
      if (magnitude(top) === 0) {
        return undefined;
      }
      return normalizeAngle(phase(divide(block.get(1, 1), top)));
    }
  }
}

/**
 * For g·cos(θ/2) and g·sin(θ/2) with unknown unit g, find θ.
 */
function halfAngleFrom(cosPart: Complex, sinPart: Complex): number | undefined {
  const reference = magnitude(cosPart) >= magnitude(sinPart) ? cosPart : sinPart;
  if (magnitude(reference) === 0) {
    return undefined;
  }
  const unwind = -phase(reference);
  const c = rotate(cosPart, unwind).real;
  const s = rotate(sinPart, unwind).real;
  return normalizeAngle(2 * Math.atan2(s, c));
}
