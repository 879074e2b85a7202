/**
 * Tests for bidirectional index maps
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { BiMap } from '../bimap';

describe('BiMap', () => {
  it('looks up both directions', () => {
    const map = BiMap.of<number, number>([
      [0, 3],
      [1, 0],
    ]);
    expect(map.forwardLookup(0)).toBe(3);
    expect(map.reverseLookup(0)).toBe(1);
    expect(map.forwardLookup(2)).toBeUndefined();
    expect(map.size).toBe(2);
  });

  it('replaces existing mappings on both sides', () => {
    const map = BiMap.of<number, number>([
      [0, 0],
      [1, 1],
    ]);
    map.map(0, 1);
    expect([...map.entries()]).toEqual([[0, 1]]);
    expect(map.reverseLookup(0)).toBeUndefined();
    expect(map.forwardLookup(1)).toBeUndefined();
  });

  it('unmaps by either side', () => {
    const map = BiMap.identity(3);
    map.unmapForward(0);
    map.unmapReverse(2);
    expect([...map.entries()]).toEqual([[1, 1]]);
    map.unmapForward(7);
    expect(map.size).toBe(1);
  });

  it('clones independently', () => {
    const map = BiMap.identity(2);
    const copy = map.clone();
    copy.map(0, 5);
    expect(map.forwardLookup(0)).toBe(0);
    expect(copy.forwardLookup(0)).toBe(5);
    expect(copy.reverseLookup(0)).toBeUndefined();
  });

  it('stays a bijection under any sequence of operations', () => {
    const op = fc.oneof(
      fc.tuple(fc.constant('map' as const), fc.nat(8), fc.nat(8)),
      fc.tuple(fc.constant('unmapForward' as const), fc.nat(8), fc.nat(8)),
      fc.tuple(fc.constant('unmapReverse' as const), fc.nat(8), fc.nat(8))
    );

    fc.assert(
      fc.property(fc.array(op, { maxLength: 40 }), (ops) => {
        const map = new BiMap<number, number>();
        for (const [name, a, b] of ops) {
          if (name === 'map') {
            map.map(a, b);
          } else if (name === 'unmapForward') {
            map.unmapForward(a);
          } else {
            map.unmapReverse(b);
          }
        }

        const entries = [...map.entries()];
        expect(new Set(entries.map(([a]) => a)).size).toBe(entries.length);
        expect(new Set(entries.map(([, b]) => b)).size).toBe(entries.length);
        for (const [a, b] of entries) {
          expect(map.forwardLookup(a)).toBe(b);
          expect(map.reverseLookup(b)).toBe(a);
        }
        expect(map.size).toBe(entries.length);
      })
    );
  });
});
