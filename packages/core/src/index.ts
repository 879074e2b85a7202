/**
 * @gatestream/core
 *
 * Gate translation between matrix-based stream gates and named gates,
 * complex matrix utilities and bijective qubit index maps.
 *
 * @example
 * ```typescript
 * import { GateMap, predefinedMatrix, unitaryGate, unwrap } from '@gatestream/core';
 *
 * const map = unwrap(GateMap.fromJson({ x: 'X', cnot: 'C-X', rx: 'RX' }));
 *
 * const desc = unwrap(map.detect(unitaryGate([2], predefinedMatrix('x'), [1])));
 * console.log(desc.name, desc.qubits);  // cnot [1, 2]
 *
 * const gate = unwrap(map.construct({ name: 'rx', qubits: [3], angle: 0.5 }));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Gate Translation
// ============================================================================

export { GateMap, DEFAULT_EPSILON } from './gate-map';
export type { GateRecord, GateDescription, GateRequest } from './gate-map';

export { gateTableEntries, parseGateTable, parseGateSpec, parseMatrix } from './gate-spec';
export type { GateSpec, GateTableEntries } from './gate-spec';

export {
  GATE_KINDS,
  parseGateKind,
  parsePauliBasis,
  isParameterizedKind,
  isBasisKind,
  basisMatrix,
  predefinedMatrix,
  normalizeAngle,
  decodeAngle,
} from './gates';
export type {
  GateKind,
  ParameterizedGateKind,
  BasisGateKind,
  PredefinedGateKind,
  PauliBasis,
} from './gates';

// ============================================================================
// Stream Gates
// ============================================================================

export {
  unitaryGate,
  measurementGate,
  prepGate,
  measuredQubits,
  describeStreamGate,
} from './stream';
export type {
  StreamGate,
  UnitaryStreamGate,
  MeasurementStreamGate,
  PrepStreamGate,
  Measurement,
  QubitValue,
} from './stream';

// ============================================================================
// Index Translation
// ============================================================================

export { BiMap } from './bimap';
export type { QubitBiMap } from './bimap';

// ============================================================================
// Errors
// ============================================================================

export {
  GateStreamFault,
  gateStreamError,
  ok,
  err,
  isOk,
  unwrap,
} from './errors';
export type { GateStreamError, GateStreamErrorKind, Result } from './errors';

// ============================================================================
// Complex Numbers and Matrices
// ============================================================================

export { Matrix, qubitCountForLength } from './matrix';

export {
  complex,
  magnitude,
  magnitudeSquared,
  phase,
  conjugate,
  add,
  subtract,
  multiply,
  scale,
  divide,
  exp,
  rotate,
  equals,
  toString,
  fromPair,
  toPair,
  ZERO,
  ONE,
  I,
} from './complex';
export type { Complex, ComplexPair } from './complex';

// ============================================================================
// Version Info
// ============================================================================

export const VERSION = '0.1.0';
