/**
 * Shared test doubles: a recording downstream sink and a scripted mapper
 */

import { vi } from 'vitest';
import {
  describeStreamGate,
  GateMap,
  unwrap,
  type Measurement,
  type QubitValue,
  type StreamGate,
} from '@gatestream/core';
import type { DownstreamSink } from '../controller';
import type { InternalGate } from '../kernel';
import type { Logger } from '../logger';
import { IdentityMapper, type CircuitMapper, type MapRequest, type MapResult } from '../mapper';

export const GATE_TABLE = {
  x: 'X',
  h: 'H',
  cnot: 'C-X',
  rx: 'RX',
  measure: 'measure',
};

export const gateMap = (): GateMap => unwrap(GateMap.fromJson(GATE_TABLE));

/**
 * Records what reaches the downstream side. Every measured qubit reads back
 * as `outcome` unless `answerMeasurements` is off.
 */
export class RecordingSink implements DownstreamSink {
  readonly allocations: number[] = [];
  readonly gates: StreamGate[] = [];
  readonly events: string[] = [];
  answerMeasurements = true;
  outcome: QubitValue = 'one';

  private readonly _results = new Map<number, QubitValue>();

  allocate(count: number): void {
    this.allocations.push(count);
  }

  gate(gate: StreamGate): void {
    this.gates.push(gate);
    this.events.push(`gate ${describeStreamGate(gate)}`);
    if (gate.kind === 'measurement' && this.answerMeasurements) {
      for (const qubit of gate.measures) {
        this._results.set(qubit, this.outcome);
      }
    }
  }

  getMeasurement(qubit: number): Measurement | undefined {
    this.events.push(`read ${qubit}`);
    const value = this._results.get(qubit);
    return value === undefined ? undefined : { qubit, value };
  }
}

export interface RecordedRequest {
  readonly kernel: string;
  readonly gates: InternalGate[];
  readonly options: Map<string, string>;
  readonly mode: MapRequest['mode'];
  readonly seed: number;
}

/**
 * Answers each call with the next scripted step, then as the identity
 */
export class ScriptedMapper implements CircuitMapper {
  readonly requests: RecordedRequest[] = [];
  private readonly _script: Array<(request: MapRequest) => MapResult>;

  constructor(script: Array<(request: MapRequest) => MapResult> = []) {
    this._script = [...script];
  }

  map(request: MapRequest): MapResult {
    this.requests.push({
      kernel: request.kernel.name,
      gates: [...request.kernel.gates],
      options: new Map(request.options),
      mode: request.mode,
      seed: request.seed,
    });
    const step = this._script.shift();
    return step === undefined ? new IdentityMapper().map(request) : step(request);
  }
}

export function recordingLogger(): Logger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
