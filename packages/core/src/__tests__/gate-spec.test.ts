/**
 * Tests for the gate table loader
 */

import { describe, it, expect } from 'vitest';
import { gateTableEntries, parseGateSpec, parseGateTable, parseMatrix } from '../gate-spec';
import { basisMatrix } from '../gates';
import type { Result } from '../errors';

const EPSILON = 1e-6;

function value<T, E>(result: Result<T, E>): T {
  if (result.kind === 'error') {
    throw new Error(`expected ok, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

function failure<T, E>(result: Result<T, E>): E {
  if (result.kind === 'ok') {
    throw new Error('expected an error');
  }
  return result.error;
}

describe('Short Form', () => {
  it('parses a plain kind keyword', () => {
    const spec = value(parseGateSpec('h', 'H', EPSILON));
    expect(spec.kind).toBe('h');
    expect(spec.controlCount).toBe(0);
    expect(spec.name).toBe('h');
  });

  it('counts control prefixes case-insensitively', () => {
    expect(value(parseGateSpec('toffoli', 'C-C-X', EPSILON)).controlCount).toBe(2);
    const cphase = value(parseGateSpec('cphase', 'c-Phase', EPSILON));
    expect(cphase.kind).toBe('phase');
    expect(cphase.controlCount).toBe(1);
  });

  it('defaults measurements to the Z basis', () => {
    const spec = value(parseGateSpec('measure', 'measure', EPSILON));
    expect(spec.matrix.approxEquals(basisMatrix('z'), 1e-12, false)).toBe(true);
  });

  it('rejects unknown kinds', () => {
    expect(failure(parseGateSpec('foo', 'C-FOO', EPSILON))).toEqual({
      kind: 'GateTableError',
      message: 'gate table entry "foo": unknown gate type "foo"',
      entry: 'foo',
    });
  });

  it('rejects controlled measurements', () => {
    expect(failure(parseGateSpec('cm', 'C-MEASURE', EPSILON)).message).toBe(
      'gate table entry "cm": gate type "measure" cannot be controlled'
    );
  });
});

describe('Structured Form', () => {
  it('reads type and control count', () => {
    const spec = value(parseGateSpec('cz', { type: 'Z', controlled: 1 }, EPSILON));
    expect(spec.kind).toBe('z');
    expect(spec.controlCount).toBe(1);
  });

  it('resolves a named basis', () => {
    const spec = value(parseGateSpec('measx', { type: 'measure', basis: 'X' }, EPSILON));
    expect(spec.matrix.approxEquals(basisMatrix('x'), 1e-12, false)).toBe(true);
  });

  it('prefers an explicit matrix over the default', () => {
    const spec = value(
      parseGateSpec(
        'prep_y',
        { type: 'prep', matrix: basisMatrix('y').toPairs() },
        EPSILON
      )
    );
    expect(spec.matrix.approxEquals(basisMatrix('y'), 1e-12, false)).toBe(true);
  });

  it.each([
    [{ controlled: 1 }, '"type" must be a string'],
    [{ type: 'x', controlled: -1 }, '"controlled" must be a non-negative integer'],
    [{ type: 'x', controlled: 1.5 }, '"controlled" must be a non-negative integer'],
    [{ type: 'measure', basis: 'x', matrix: [] }, '"matrix" and "basis" are mutually exclusive'],
    [{ type: 'x', basis: 'x' }, '"basis" does not apply to gate type "x"'],
    [{ type: 'h', matrix: [[1, 0], [0, 0], [0, 0], [1, 0]] }, '"matrix" does not apply to gate type "h"'],
    [{ type: 'measure', basis: 'w' }, 'unknown basis "w"'],
    [{ type: 'prep', controlled: 2 }, 'gate type "prep" cannot be controlled'],
  ])('rejects %j', (raw, detail) => {
    expect(failure(parseGateSpec('g', raw, EPSILON)).message).toBe(`gate table entry "g": ${detail}`);
  });

  it('rejects descriptions of the wrong shape', () => {
    expect(failure(parseGateSpec('g', 42, EPSILON)).message).toBe(
      'gate table entry "g": description must be a string or an object'
    );
  });

  it('rejects a measurement basis wider than one qubit', () => {
    const identity4 = [
      [1, 0], [0, 0], [0, 0], [0, 0],
      [0, 0], [1, 0], [0, 0], [0, 0],
      [0, 0], [0, 0], [1, 0], [0, 0],
      [0, 0], [0, 0], [0, 0], [1, 0],
    ];
    expect(failure(parseGateSpec('m2', { type: 'measure', matrix: identity4 }, EPSILON)).message).toBe(
      'gate table entry "m2": basis for gate type "measure" must be a 2x2 matrix'
    );
  });
});

describe('Matrix Entries', () => {
  it('normalizes columns', () => {
    const m = value(parseMatrix([[2, 0], [0, 0], [0, 0], [0, 5]], EPSILON));
    expect(m.get(0, 0)).toEqual({ real: 1, imag: 0 });
    expect(m.get(1, 1)).toEqual({ real: 0, imag: 1 });
  });

  it.each([
    ['not a list', '"matrix" must be an array'],
    [[[1, 0], [0, 0], [0, 0]], '"matrix" has invalid size 3'],
    [[[1, 0], [0, 0], [0, 0], 1], '"matrix" elements must be [real, imag] number pairs'],
    [[[1, 0, 0], [0, 0], [0, 0], [1, 0]], '"matrix" elements must be [real, imag] number pairs'],
    [[[1, 0], [0, 0], [1, 0], [0, 0]], '"matrix" cannot be normalized: Column 1 has zero norm'],
    [[[1, 0], [1, 0], [0, 0], [1, 0]], '"matrix" is not unitary'],
  ])('rejects %j', (raw, message) => {
    expect(failure(parseMatrix(raw, EPSILON))).toBe(message);
  });
});

describe('Tables', () => {
  it('keeps declaration order and source casing', () => {
    const specs = value(parseGateTable(value(gateTableEntries({ CNOT: 'C-X', h: 'H' })), EPSILON));
    expect(specs.map((spec) => spec.name)).toEqual(['CNOT', 'h']);
  });

  it('accepts a list of pairs', () => {
    const entries = value(gateTableEntries([['x', 'X'], ['y', 'Y']]));
    expect(entries).toEqual([['x', 'X'], ['y', 'Y']]);
  });

  it('rejects malformed tables', () => {
    expect(failure(gateTableEntries('x')).message).toBe('gate table must be an object');
    expect(failure(gateTableEntries([['x']])).message).toBe(
      'gate table item 0 must be a [name, description] pair'
    );
  });

  it('rejects names that differ only in case', () => {
    expect(failure(parseGateTable([['X', 'X'], ['x', 'Y']], EPSILON))).toEqual({
      kind: 'GateTableError',
      message: 'gate table entry "x": duplicate gate name (already defined as "X")',
      entry: 'x',
    });
  });

  it('names the offending entry', () => {
    const error = failure(parseGateTable([['ok', 'H'], ['broken', { type: 'swap', controlled: 'one' }]], EPSILON));
    expect(error.entry).toBe('broken');
    expect(error.kind).toBe('GateTableError');
  });
});
