/**
 * Batching & Flush Controller
 *
 * Owns the current kernel and the qubit index chain
 *
 * ```text
 *   upstream <-> virtual <-> physical  (+1) ->  downstream
 *   (1-based)    (0-based)   (0-based)          (1-based)
 * ```
 *
 * Gates are detected, moved to physical indices and queued. A gate that
 * measures flushes the kernel through the circuit mapper before its
 * results are read back, since the producer may need them to pick its
 * next gate.
 */

import {
  BiMap,
  describeStreamGate,
  err,
  gateStreamError,
  isOk,
  measuredQubits,
  ok,
  type GateDescription,
  type GateMap,
  type Measurement,
  type QubitBiMap,
  type Result,
  type StreamGate,
} from '@gatestream/core';
import { Kernel } from './kernel';
import { createSilentLogger, type Logger } from './logger';
import type { CircuitMapper, MapperOptions, MapResult, PlacementMode } from './mapper';

// ============================================================================
// Types
// ============================================================================

/**
 * Consumer of mapped gates. Qubit references are 1-based.
 */
export interface DownstreamSink {
  allocate(count: number): void;
  gate(gate: StreamGate): void;
  getMeasurement(qubit: number): Measurement | undefined;
}

export interface FlushControllerOptions {
  gateMap: GateMap;
  numQubits: number;
  mapper: CircuitMapper;
  sink: DownstreamSink;
  /**
   * User options, overridden by the placement options of each flush
   */
  mapperOptions?: MapperOptions;
  seed?: number;
  logger?: Logger;
}

// ============================================================================
// Index Convention
// ============================================================================

export const toDownstream = (physical: number): number => physical + 1;

export const fromDownstream = (downstream: number): number => downstream - 1;

// ============================================================================
// Controller
// ============================================================================

export class FlushController {
  private readonly _gateMap: GateMap;
  private readonly _numQubits: number;
  private readonly _mapper: CircuitMapper;
  private readonly _sink: DownstreamSink;
  private readonly _userOptions: MapperOptions;
  private readonly _seed: number;
  private readonly _logger: Logger;

  private readonly _upstreamToVirtual: QubitBiMap = new BiMap<number, number>();
  private _virtualToPhysical: QubitBiMap;
  private _kernel: Kernel;
  private _highestUpstream = 0;

  constructor(options: FlushControllerOptions) {
    this._gateMap = options.gateMap;
    this._numQubits = options.numQubits;
    this._mapper = options.mapper;
    this._sink = options.sink;
    this._userOptions = options.mapperOptions ?? new Map();
    this._seed = options.seed ?? 0;
    this._logger = options.logger ?? createSilentLogger();

    this._virtualToPhysical = BiMap.identity(options.numQubits);
    this._kernel = new Kernel(0, options.numQubits);
  }

  // =========================================================================
  // Properties
  // =========================================================================

  get numQubits(): number {
    return this._numQubits;
  }

  /**
   * Kernel being accumulated
   */
  get kernel(): Kernel {
    return this._kernel;
  }

  /**
   * Number of kernels mapped so far
   */
  get generation(): number {
    return this._kernel.generation;
  }

  get upstreamToVirtual(): QubitBiMap {
    return this._upstreamToVirtual.clone();
  }

  get virtualToPhysical(): QubitBiMap {
    return this._virtualToPhysical.clone();
  }

  // =========================================================================
  // Allocation
  // =========================================================================

  /**
   * Place an upstream qubit at the lowest free virtual index
   * @returns The virtual index
   */
  allocate(upstream: number): Result<number> {
    for (let virtual = 0; virtual < this._numQubits; virtual++) {
      if (this._upstreamToVirtual.reverseLookup(virtual) === undefined) {
        this._upstreamToVirtual.map(upstream, virtual);
        this._highestUpstream = Math.max(this._highestUpstream, upstream);
        this._logger.debug(`placed upstream qubit ${upstream} at virtual index ${virtual}`);
        return ok(virtual);
      }
    }
    return err(
      gateStreamError(
        'CapacityExceeded',
        `cannot allocate upstream qubit ${upstream}: all ${this._numQubits} qubits are live`
      )
    );
  }

  /**
   * Release an upstream qubit; no-op if it is not allocated
   */
  free(upstream: number): void {
    this._upstreamToVirtual.unmapForward(upstream);
    this._logger.debug(`freed upstream qubit ${upstream}`);
  }

  // =========================================================================
  // Gates
  // =========================================================================

  /**
   * Queue a gate. Gates that measure flush the kernel and return the
   * results relabelled with upstream qubit references.
   */
  submitGate(gate: StreamGate): Result<Measurement[]> {
    const detected = this._gateMap.detect(gate);
    if (detected.kind === 'error') {
      return detected;
    }
    const desc = detected.value;
    this._logger.debug(`receiving ${formatDescription(desc, 'upstream')}`);

    const physical: number[] = [];
    for (const upstream of desc.qubits) {
      const translated = this.toPhysical(upstream);
      if (translated.kind === 'error') {
        return translated;
      }
      physical.push(translated.value);
    }

    const mark = this._kernel.length;
    if (desc.parallel) {
      for (const qubit of physical) {
        this._kernel.gate(desc.name, [qubit], desc.angle);
      }
    } else {
      this._kernel.gate(desc.name, physical, desc.angle);
    }

    const measured = measuredQubits(gate);
    if (measured.length === 0) {
      return ok([]);
    }

    const flushed = this.flush();
    if (!isOk(flushed)) {
      this._kernel.truncate(mark);
      return flushed;
    }

    const measurements: Measurement[] = [];
    for (const upstream of measured) {
      const translated = this.toPhysical(upstream);
      if (translated.kind === 'error') {
        return translated;
      }
      const downstream = toDownstream(translated.value);
      const measurement = this._sink.getMeasurement(downstream);
      if (measurement === undefined) {
        return err(
          gateStreamError(
            'MappingInconsistency',
            `no measurement result for downstream qubit ${downstream}`
          )
        );
      }
      measurements.push({ ...measurement, qubit: upstream });
    }
    return ok(measurements);
  }

  // =========================================================================
  // Flushing
  // =========================================================================

  /**
   * Map the kernel and emit it downstream. Nothing changes unless every
   * mapped gate can be constructed.
   * @returns The number of gates emitted
   */
  flush(): Result<number> {
    const kernel = this._kernel;
    if (kernel.isEmpty) {
      return ok(0);
    }

    const options = this.mapperOptionsFor(kernel.generation);
    const mode: PlacementMode = kernel.generation === 0 ? 'free' : 'locked';
    this._logger.debug(`mapping ${kernel.name} (${kernel.length} gates)\n${this.formatQubitMap()}`);

    let result: MapResult;
    try {
      result = this._mapper.map({ kernel, options, mode, seed: this._seed });
    } catch (error) {
      return err(
        gateStreamError(
          'MappingInconsistency',
          `mapper failed on ${kernel.name}: ${error instanceof Error ? error.message : String(error)}`
        )
      );
    }

    const recomposed = this.recompose(result.v2rOut);
    if (recomposed.kind === 'error') {
      return recomposed;
    }

    const gates: StreamGate[] = [];
    for (const gate of result.gates) {
      const outside = gate.operands.find((qubit) => !this.isPhysical(qubit));
      if (outside !== undefined) {
        return err(
          gateStreamError(
            'MappingInconsistency',
            `mapped gate "${gate.name}" uses physical qubit ${outside} outside [0, ${this._numQubits})`
          )
        );
      }
      const constructed = this._gateMap.construct({
        name: gate.name,
        qubits: gate.operands.map(toDownstream),
        angle: gate.angle,
      });
      if (constructed.kind === 'error') {
        return constructed;
      }
      gates.push(constructed.value);
    }

    this._virtualToPhysical = recomposed.value;
    this._kernel = kernel.next();
    this._logger.debug(`qubit map after ${kernel.name}\n${this.formatQubitMap()}`);

    for (const gate of gates) {
      this._logger.debug(`sending ${describeStreamGate(gate)}`);
      this._sink.gate(gate);
    }
    return ok(gates.length);
  }

  /**
   * Options passed to the mapper for a kernel of the given generation. The
   * first kernel may be placed freely; later kernels were built on the
   * physical indices of the previous mapping, so their layout is locked.
   */
  mapperOptionsFor(generation: number): Map<string, string> {
    const options = new Map(this._userOptions);
    if (generation === 0) {
      options.set('mapinitone2one', 'no');
    } else {
      options.set('mapinitone2one', 'yes');
      options.set('initialplace', 'no');
    }
    options.set('mapassumezeroinitstate', 'yes');
    return options;
  }

  // =========================================================================
  // Diagnostics
  // =========================================================================

  /**
   * Table of every upstream qubit seen so far, then every physical qubit
   * not reached from one
   */
  formatQubitMap(): string {
    const lines = ['| upstream | virtual  | physical |downstream|', '|----------|----------|----------|----------|'];
    const row = (cells: Array<number | undefined>) =>
      `| ${cells.map((cell) => (cell === undefined ? '-' : String(cell)).padStart(8)).join(' | ')} |`;

    const printed = new Set<number>();
    for (let upstream = 1; upstream <= this._highestUpstream; upstream++) {
      const virtual = this._upstreamToVirtual.forwardLookup(upstream);
      const physical =
        virtual === undefined ? undefined : this._virtualToPhysical.forwardLookup(virtual);
      if (physical !== undefined) {
        printed.add(physical);
      }
      lines.push(row([upstream, virtual, physical, physical === undefined ? undefined : toDownstream(physical)]));
    }

    for (let physical = 0; physical < this._numQubits; physical++) {
      if (!printed.has(physical)) {
        lines.push(
          row([undefined, this._virtualToPhysical.reverseLookup(physical), physical, toDownstream(physical)])
        );
      }
    }
    return lines.join('\n');
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private toPhysical(upstream: number): Result<number> {
    const virtual = this._upstreamToVirtual.forwardLookup(upstream);
    if (virtual === undefined) {
      return err(gateStreamError('MappingInconsistency', `upstream qubit ${upstream} is not allocated`));
    }
    const physical = this._virtualToPhysical.forwardLookup(virtual);
    if (physical === undefined) {
      return err(
        gateStreamError('MappingInconsistency', `virtual qubit ${virtual} has no physical qubit`)
      );
    }
    return ok(physical);
  }

  private isPhysical(qubit: number): boolean {
    return Number.isInteger(qubit) && qubit >= 0 && qubit < this._numQubits;
  }

  /**
   * New virtual-to-physical map: a virtual on kernel qubit P moves to
   * `v2rOut[P]`; virtuals on untracked qubits become unmapped.
   */
  private recompose(v2rOut: ReadonlyArray<number | undefined>): Result<QubitBiMap> {
    const next = new BiMap<number, number>();
    const taken = new Set<number>();
    for (let physical = 0; physical < this._numQubits; physical++) {
      const target = v2rOut[physical];
      if (target === undefined) {
        continue;
      }
      if (!this.isPhysical(target)) {
        return err(
          gateStreamError(
            'MappingInconsistency',
            `mapper moved qubit ${physical} to ${target}, outside [0, ${this._numQubits})`
          )
        );
      }
      if (taken.has(target)) {
        return err(
          gateStreamError('MappingInconsistency', `mapper moved two qubits to physical qubit ${target}`)
        );
      }
      taken.add(target);
      const virtual = this._virtualToPhysical.reverseLookup(physical);
      if (virtual !== undefined) {
        next.map(virtual, target);
      }
    }
    return ok(next);
  }
}

function formatDescription(desc: GateDescription, space: string): string {
  return `gate ${desc.name} with ${space} qubit(s) ${desc.qubits.join(', ')} and angle ${desc.angle}`;
}
