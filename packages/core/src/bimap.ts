/**
 * Bidirectional index maps
 *
 * A finite partial bijection between two index spaces:
 *
 * ```text
 *   .----------.  forward  .------------.
 *   | upstream |---------->| downstream |
 *   |  space   |<----------|   space    |
 *   '----------'  reverse  '------------'
 * ```
 *
 * Lookups report absence as `undefined`, so index 0 is an ordinary index.
 */
export class BiMap<A, B> {
  private readonly _forward = new Map<A, B>();
  private readonly _reverse = new Map<B, A>();

  /**
   * Create a map from (upstream, downstream) pairs, applied in order
   */
  static of<A, B>(pairs: Iterable<readonly [A, B]>): BiMap<A, B> {
    const map = new BiMap<A, B>();
    for (const [a, b] of pairs) {
      map.map(a, b);
    }
    return map;
  }

  /**
   * Identity map on 0..count-1
   */
  static identity(count: number): QubitBiMap {
    const map = new BiMap<number, number>();
    for (let index = 0; index < count; index++) {
      map.map(index, index);
    }
    return map;
  }

  /**
   * Number of mapped pairs
   */
  get size(): number {
    return this._forward.size;
  }

  /**
   * Downstream index for an upstream index
   */
  forwardLookup(upstream: A): B | undefined {
    return this._forward.get(upstream);
  }

  /**
   * Upstream index for a downstream index
   */
  reverseLookup(downstream: B): A | undefined {
    return this._reverse.get(downstream);
  }

  /**
   * Map `upstream` to `downstream`, dropping any mapping either side had
   */
  map(upstream: A, downstream: B): void {
    this.unmapForward(upstream);
    this.unmapReverse(downstream);
    this._forward.set(upstream, downstream);
    this._reverse.set(downstream, upstream);
  }

  /**
   * Drop the mapping of an upstream index, if any
   */
  unmapForward(upstream: A): void {
    const downstream = this._forward.get(upstream);
    if (downstream !== undefined) {
      this._forward.delete(upstream);
      this._reverse.delete(downstream);
    }
  }

  /**
   * Drop the mapping of a downstream index, if any
   */
  unmapReverse(downstream: B): void {
    const upstream = this._reverse.get(downstream);
    if (upstream !== undefined) {
      this._reverse.delete(downstream);
      this._forward.delete(upstream);
    }
  }

  /**
   * (upstream, downstream) pairs in insertion order
   */
  entries(): IterableIterator<[A, B]> {
    return this._forward.entries();
  }

  clone(): BiMap<A, B> {
    return BiMap.of(this._forward);
  }
}

/**
 * Map between two qubit index spaces
 */
export type QubitBiMap = BiMap<number, number>;
