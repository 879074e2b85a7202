/**
 * Gate table loader
 *
 * Parses the declarative gate table (name → description) into validated
 * gate specs. A description is either a short string such as `"C-X"`, where
 * every leading `C-` adds a control qubit, or an object:
 *
 * ```json
 * {
 *   "cnot": "C-X",
 *   "measx": { "type": "measure", "basis": "x" },
 *   "iswap": { "type": "unitary", "matrix": [[1, 0], [0, 0], ...] }
 * }
 * ```
 */

import { fromPair, type Complex } from './complex';
import { err, gateStreamError, ok, type Result } from './errors';
import {
  basisMatrix,
  isBasisKind,
  parseGateKind,
  parsePauliBasis,
  type GateKind,
} from './gates';
import { Matrix, qubitCountForLength } from './matrix';

// ============================================================================
// Types
// ============================================================================

/**
 * One validated gate table entry
 */
export interface GateSpec {
  /**
   * Name as written in the table
   */
  readonly name: string;
  readonly kind: GateKind;
  readonly controlCount: number;
  /**
   * Basis for measure/prep, unitary for custom unitaries, Z basis otherwise
   */
  readonly matrix: Matrix;
}

/**
 * Gate table entries in declaration order
 */
export type GateTableEntries = ReadonlyArray<readonly [string, unknown]>;

const CONTROL_PREFIX = 'c-';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value) && value >= 0;

// ============================================================================
// Table Parsing
// ============================================================================

/**
 * Split a parsed gate table into entries. Accepts an object keyed by name
 * or an array of `[name, description]` pairs.
 */
export function gateTableEntries(json: unknown): Result<GateTableEntries> {
  if (isRecord(json)) {
    return ok(Object.entries(json));
  }
  if (Array.isArray(json)) {
    const entries: Array<readonly [string, unknown]> = [];
    for (const [index, item] of json.entries()) {
      if (!Array.isArray(item) || item.length !== 2 || typeof item[0] !== 'string') {
        return err(
          gateStreamError('GateTableError', `gate table item ${index} must be a [name, description] pair`)
        );
      }
      entries.push([item[0], item[1]]);
    }
    return ok(entries);
  }
  return err(gateStreamError('GateTableError', 'gate table must be an object'));
}

/**
 * Parse every entry of a gate table, rejecting names that collide
 * case-insensitively.
 */
export function parseGateTable(entries: GateTableEntries, epsilon: number): Result<GateSpec[]> {
  const specs: GateSpec[] = [];
  const seen = new Map<string, string>();

  for (const [name, raw] of entries) {
    const previous = seen.get(name.toLowerCase());
    if (previous !== undefined) {
      return err(
        gateStreamError(
          'GateTableError',
          `gate table entry "${name}": duplicate gate name (already defined as "${previous}")`,
          name
        )
      );
    }
    seen.set(name.toLowerCase(), name);

    const spec = parseGateSpec(name, raw, epsilon);
    if (spec.kind === 'error') {
      return spec;
    }
    specs.push(spec.value);
  }

  return ok(specs);
}

// ============================================================================
// Entry Parsing
// ============================================================================

/**
 * Parse one gate table entry
 */
export function parseGateSpec(name: string, raw: unknown, epsilon: number): Result<GateSpec> {
  const fail = (detail: string): Result<never> =>
    err(gateStreamError('GateTableError', `gate table entry "${name}": ${detail}`, name));

  if (typeof raw === 'string') {
    let keyword = raw.toLowerCase();
    let controlCount = 0;
    while (keyword.startsWith(CONTROL_PREFIX)) {
      keyword = keyword.slice(CONTROL_PREFIX.length);
      controlCount++;
    }
    const kind = parseGateKind(keyword);
    if (kind === undefined) {
      return fail(`unknown gate type "${keyword}"`);
    }
    if (isBasisKind(kind) && controlCount > 0) {
      return fail(`gate type "${kind}" cannot be controlled`);
    }
    return ok({ name, kind, controlCount, matrix: basisMatrix('z') });
  }

  if (!isRecord(raw)) {
    return fail('description must be a string or an object');
  }

  if (typeof raw.type !== 'string') {
    return fail('"type" must be a string');
  }
  const kind = parseGateKind(raw.type);
  if (kind === undefined) {
    return fail(`unknown gate type "${raw.type.toLowerCase()}"`);
  }

  let controlCount = 0;
  if (raw.controlled !== undefined) {
    if (!isNonNegativeInteger(raw.controlled)) {
      return fail('"controlled" must be a non-negative integer');
    }
    controlCount = raw.controlled;
  }
  if (isBasisKind(kind) && controlCount > 0) {
    return fail(`gate type "${kind}" cannot be controlled`);
  }

  if (raw.matrix !== undefined && raw.basis !== undefined) {
    return fail('"matrix" and "basis" are mutually exclusive');
  }
  const takesMatrix = kind === 'unitary' || isBasisKind(kind);
  if (!takesMatrix && (raw.matrix !== undefined || raw.basis !== undefined)) {
    const field = raw.matrix !== undefined ? 'matrix' : 'basis';
    return fail(`"${field}" does not apply to gate type "${kind}"`);
  }

  // Explicit matrix first, then a named basis, then the Z basis.
  let matrix = basisMatrix('z');
  if (raw.matrix !== undefined) {
    const parsed = parseMatrix(raw.matrix, epsilon);
    if (parsed.kind === 'error') {
      return fail(parsed.error);
    }
    matrix = parsed.value;
  } else if (raw.basis !== undefined) {
    const basis = typeof raw.basis === 'string' ? parsePauliBasis(raw.basis) : undefined;
    if (basis === undefined) {
      return fail(`unknown basis ${JSON.stringify(raw.basis)}`);
    }
    matrix = basisMatrix(basis);
  }

  if (isBasisKind(kind) && matrix.numQubits !== 1) {
    return fail(`basis for gate type "${kind}" must be a 2x2 matrix`);
  }

  return ok({ name, kind, controlCount, matrix });
}

/**
 * Parse a row-major list of `[real, imag]` pairs, normalize its columns and
 * check that it is unitary.
 */
export function parseMatrix(value: unknown, epsilon: number): Result<Matrix, string> {
  if (!Array.isArray(value)) {
    return err('"matrix" must be an array');
  }

  const entries: Complex[] = [];
  for (const element of value) {
    if (
      !Array.isArray(element) ||
      element.length !== 2 ||
      typeof element[0] !== 'number' ||
      typeof element[1] !== 'number' ||
      !Number.isFinite(element[0]) ||
      !Number.isFinite(element[1])
    ) {
      return err('"matrix" elements must be [real, imag] number pairs');
    }
    entries.push(fromPair([element[0], element[1]]));
  }

  if (qubitCountForLength(entries.length) === undefined) {
    return err(`"matrix" has invalid size ${entries.length}`);
  }

  let matrix: Matrix;
  try {
    matrix = Matrix.fromEntries(entries).normalizeColumns();
  } catch (error) {
    return err(`"matrix" cannot be normalized: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!matrix.isApproxUnitary(epsilon)) {
    return err('"matrix" is not unitary');
  }
  return ok(matrix);
}
