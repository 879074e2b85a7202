/**
 * Gate Translation Engine
 *
 * Converts stream gates (matrices and qubit lists) into named gate
 * descriptions and back, driven by a validated gate table.
 */

import { err, gateStreamError, ok, type Result } from './errors';
import {
  decodeAngle,
  isBasisKind,
  isParameterizedKind,
  predefinedMatrix,
  type GateKind,
} from './gates';
import { gateTableEntries, parseGateTable, type GateSpec, type GateTableEntries } from './gate-spec';
import type { Matrix } from './matrix';
import { describeStreamGate, type StreamGate } from './stream';

// ============================================================================
// Types
// ============================================================================

/**
 * Registered gate table entry
 */
export interface GateRecord extends GateSpec {
  /**
   * Whether the gate takes an angle parameter
   */
  readonly hasAngle: boolean;
  /**
   * Whether every operand is an independent single-qubit operation
   */
  readonly parallel: boolean;
}

/**
 * Named form of a gate
 */
export interface GateDescription {
  readonly name: string;
  /**
   * Operands, controls first, in the index space of the stream gate
   */
  readonly qubits: readonly number[];
  /**
   * Rotation angle in radians; 0 for gates without an angle
   */
  readonly angle: number;
  readonly parallel: boolean;
}

/**
 * Input to {@link GateMap.construct}
 */
export interface GateRequest {
  readonly name: string;
  readonly qubits: readonly number[];
  readonly angle?: number;
}

/**
 * Default matrix comparison tolerance
 */
export const DEFAULT_EPSILON = 1e-6;

// Controlled rotations distinguish θ from θ ± 2π.
const ANGLE_CANDIDATE_OFFSETS = [0, 2 * Math.PI, -2 * Math.PI];

// ============================================================================
// Gate Map
// ============================================================================

/**
 * Bidirectional map between stream gates and named gates
 *
 * @example
 * ```typescript
 * const map = unwrap(GateMap.fromJson({ x: 'X', cnot: 'C-X', rx: 'RX' }));
 * const desc = unwrap(map.detect(gate));      // { name: 'cnot', qubits: [1, 2], ... }
 * const back = unwrap(map.construct(desc));   // unitary gate, controls [1], targets [2]
 * ```
 */
export class GateMap {
  private readonly _records: readonly GateRecord[];
  private readonly _byName: ReadonlyMap<string, GateRecord>;
  private readonly _fixedMatrices: ReadonlyMap<GateRecord, Matrix>;
  private readonly _epsilon: number;

  private constructor(records: GateRecord[], epsilon: number) {
    this._records = records;
    this._byName = new Map<string, GateRecord>(records.map((record) => [record.name.toLowerCase(), record]));
    this._epsilon = epsilon;

    const fixed = new Map<GateRecord, Matrix>();
    for (const record of records) {
      const core = recordMatrix(record, 0);
      if (core !== undefined && !record.hasAngle) {
        fixed.set(record, core.controlled(record.controlCount));
      }
    }
    this._fixedMatrices = fixed;
  }

  /**
   * Build a gate map from table entries. Parameterized gates are registered
   * after every fixed gate so that a fixed-angle specialization is always
   * detected before the general rotation.
   */
  static create(entries: GateTableEntries, epsilon: number = DEFAULT_EPSILON): Result<GateMap> {
    const specs = parseGateTable(entries, epsilon);
    if (specs.kind === 'error') {
      return specs;
    }

    const fixed: GateRecord[] = [];
    const parameterized: GateRecord[] = [];
    for (const spec of specs.value) {
      const record: GateRecord = {
        ...spec,
        hasAngle: isParameterizedKind(spec.kind),
        parallel: isBasisKind(spec.kind),
      };
      (record.hasAngle ? parameterized : fixed).push(record);
    }

    return ok(new GateMap([...fixed, ...parameterized], epsilon));
  }

  /**
   * Build a gate map from a parsed gate table document
   */
  static fromJson(json: unknown, epsilon: number = DEFAULT_EPSILON): Result<GateMap> {
    const entries = gateTableEntries(json);
    if (entries.kind === 'error') {
      return entries;
    }
    return GateMap.create(entries.value, epsilon);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  /**
   * Records in detection order
   */
  get records(): readonly GateRecord[] {
    return this._records;
  }

  get epsilon(): number {
    return this._epsilon;
  }

  /**
   * Find a record by name, case-insensitively
   */
  lookup(name: string): GateRecord | undefined {
    return this._byName.get(name.toLowerCase());
  }

  // =========================================================================
  // Detection
  // =========================================================================

  /**
   * Convert a stream gate into its named form
   */
  detect(gate: StreamGate): Result<GateDescription> {
    const full = gate.kind === 'unitary' ? gate.matrix.controlled(gate.controls.length) : undefined;
    for (const record of this._records) {
      const detected = this.match(record, gate, full);
      if (detected !== undefined) {
        return ok(detected);
      }
    }
    return err(
      gateStreamError('UnknownGateFormat', `no gate table entry matches ${describeStreamGate(gate)}`)
    );
  }

  /**
   * @param full The unitary of `gate` extended by its controls, computed once per detection
   */
  private match(record: GateRecord, gate: StreamGate, full: Matrix | undefined): GateDescription | undefined {
    switch (gate.kind) {
      case 'measurement':
        if (record.kind !== 'measure' || !record.matrix.basisApproxEquals(gate.basis, this._epsilon)) {
          return undefined;
        }
        return describe(record, gate.measures, 0);

      case 'prep':
        if (record.kind !== 'prep' || !record.matrix.basisApproxEquals(gate.basis, this._epsilon)) {
          return undefined;
        }
        return describe(record, gate.targets, 0);

      case 'unitary': {
        if (full === undefined || gate.matrix.numQubits !== gate.targets.length) {
          return undefined;
        }
        const qubits = [...gate.controls, ...gate.targets];

        const fixed = this._fixedMatrices.get(record);
        if (fixed !== undefined) {
          return fixed.approxEquals(full, this._epsilon) ? describe(record, qubits, 0) : undefined;
        }
        if (!isParameterizedKind(record.kind) || full.numQubits !== record.controlCount + 1) {
          return undefined;
        }

        const decoded = decodeAngle(record.kind, full.trailingBlock(1));
        if (decoded === undefined) {
          return undefined;
        }
        for (const offset of ANGLE_CANDIDATE_OFFSETS) {
          const angle = decoded + offset;
          const expected = predefinedMatrix(record.kind, angle).controlled(record.controlCount);
          if (expected.approxEquals(full, this._epsilon)) {
            return describe(record, qubits, angle);
          }
        }
        return undefined;
      }
    }
  }

  // =========================================================================
  // Construction
  // =========================================================================

  /**
   * Convert a named gate back into a stream gate
   */
  construct(request: GateRequest): Result<StreamGate> {
    const record = this.lookup(request.name);
    if (record === undefined) {
      return err(gateStreamError('UnknownGateFormat', `unknown gate "${request.name}"`));
    }
    const qubits = [...request.qubits];

    switch (record.kind) {
      case 'measure':
        if (qubits.length === 0) {
          return err(gateStreamError('UnknownGateFormat', `gate "${record.name}" needs at least one qubit`));
        }
        return ok<StreamGate>({ kind: 'measurement', measures: qubits, basis: record.matrix });

      case 'prep':
        if (qubits.length === 0) {
          return err(gateStreamError('UnknownGateFormat', `gate "${record.name}" needs at least one qubit`));
        }
        return ok<StreamGate>({ kind: 'prep', targets: qubits, basis: record.matrix });

      default: {
        const angle = record.hasAngle ? (request.angle ?? 0) : 0;
        const core = recordMatrix(record, angle);
        if (core === undefined) {
          return err(gateStreamError('UnknownGateFormat', `gate "${record.name}" has no unitary`));
        }
        const arity = record.controlCount + core.numQubits;
        if (qubits.length !== arity) {
          return err(
            gateStreamError(
              'UnknownGateFormat',
              `gate "${record.name}" takes ${arity} qubit(s), got ${qubits.length}`
            )
          );
        }
        return ok<StreamGate>({
          kind: 'unitary',
          controls: qubits.slice(0, record.controlCount),
          targets: qubits.slice(record.controlCount),
          matrix: core,
        });
      }
    }
  }
}

// ============================================================================
// Private Helpers
// ============================================================================

/**
 * Unitary of a record without its controls; `undefined` for measure/prep
 */
function recordMatrix(record: { kind: GateKind; matrix: Matrix }, angle: number): Matrix | undefined {
  switch (record.kind) {
    case 'measure':
    case 'prep':
      return undefined;
    case 'unitary':
      return record.matrix;
    default:
      return predefinedMatrix(record.kind, angle);
  }
}

function describe(record: GateRecord, qubits: readonly number[], angle: number): GateDescription {
  return {
    name: record.name,
    qubits: [...qubits],
    angle: record.hasAngle ? angle : 0,
    parallel: record.parallel,
  };
}
