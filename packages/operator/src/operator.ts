/**
 * Mapper operator
 *
 * Hosting-process surface of the controller. Every failure is thrown as a
 * {@link GateStreamFault}.
 *
 * @example
 * ```typescript
 * const operator = new MapperOperator({ sink });
 * await operator.initialize([
 *   { iface: 'mapper', oper: 'hardware_config', args: ['platform.json'] },
 *   { iface: 'mapper', oper: 'gatemap', args: ['gates.json'] },
 * ]);
 * operator.allocate([1, 2]);
 * operator.gate(unitaryGate([1], predefinedMatrix('x')));
 * const results = operator.gate(measurementGate([1]));
 * operator.drop();
 * ```
 */

import { readFile } from 'node:fs/promises';
import {
  GateMap,
  GateStreamFault,
  gateStreamError,
  unwrap,
  type GateStreamError,
  type Measurement,
  type StreamGate,
} from '@gatestream/core';
import { resolveConfig, type Environment, type InitCommand } from './config';
import { FlushController, type DownstreamSink } from './controller';
import { createConsoleLogger, type Logger } from './logger';
import { RandomPlacementMapper, type CircuitMapper } from './mapper';
import { parsePlatform } from './platform';

export interface MapperOperatorOptions {
  sink: DownstreamSink;
  /**
   * Defaults to {@link RandomPlacementMapper}
   */
  mapper?: CircuitMapper;
  /**
   * Defaults to a console logger at the configured level
   */
  logger?: Logger;
  readFile?: (path: string) => Promise<string>;
}

export const LOG_SCOPE = 'gatestream:operator';

const fault = (error: GateStreamError) => new GateStreamFault(error);

export class MapperOperator {
  private readonly _sink: DownstreamSink;
  private readonly _mapper: CircuitMapper;
  private readonly _readFile: (path: string) => Promise<string>;
  private _logger: Logger | undefined;
  private _controller: FlushController | undefined;
  private _warnedAllocationData = false;
  private _warnedAdvance = false;

  constructor(options: MapperOperatorOptions) {
    this._sink = options.sink;
    this._mapper = options.mapper ?? new RandomPlacementMapper();
    this._logger = options.logger;
    this._readFile = options.readFile ?? ((path) => readFile(path, 'utf8'));
  }

  get isInitialized(): boolean {
    return this._controller !== undefined;
  }

  /**
   * @throws {GateStreamFault} `ConfigurationError` before {@link initialize}
   */
  get controller(): FlushController {
    if (this._controller === undefined) {
      throw fault(gateStreamError('ConfigurationError', 'operator is not initialized'));
    }
    return this._controller;
  }

  // =========================================================================
  // Lifecycle
  // =========================================================================

  /**
   * Resolve configuration, load the platform and gate table and reserve
   * the platform's qubits downstream
   */
  async initialize(commands: readonly InitCommand[], env?: Environment): Promise<void> {
    if (this._controller !== undefined) {
      throw fault(gateStreamError('ConfigurationError', 'operator is already initialized'));
    }

    const config = unwrap(resolveConfig(commands, env));
    const logger = this._logger ?? createConsoleLogger(LOG_SCOPE, config.logLevel);
    this._logger = logger;

    const platform = unwrap(parsePlatform(await this.readJson(config.hardwareConfigPath, 'hardware config')));
    const gateMap = unwrap(GateMap.fromJson(await this.readJson(config.gateMapPath, 'gate map'), config.epsilon));

    const controller = new FlushController({
      gateMap,
      numQubits: platform.numQubits,
      mapper: this._mapper,
      sink: this._sink,
      mapperOptions: config.mapperOptions,
      seed: config.seed,
      logger,
    });

    this._sink.allocate(platform.numQubits);
    this._controller = controller;
    logger.info(`platform with ${platform.numQubits} qubits loaded, ${gateMap.records.length} gates`);
  }

  /**
   * Allocate upstream qubits. Either every qubit is placed or none is.
   * Attached data is discarded.
   */
  allocate(qubits: readonly number[], data: readonly unknown[] = []): void {
    const controller = this.controller;
    if (data.length > 0 && !this._warnedAllocationData) {
      this._warnedAllocationData = true;
      this.logger.warn('found data attached to qubit allocation; this operator discards it');
    }

    const placed: number[] = [];
    for (const qubit of qubits) {
      const result = controller.allocate(qubit);
      if (result.kind === 'error') {
        placed.forEach((upstream) => controller.free(upstream));
        throw fault(result.error);
      }
      placed.push(qubit);
    }
  }

  free(qubits: readonly number[]): void {
    const controller = this.controller;
    for (const qubit of qubits) {
      controller.free(qubit);
    }
  }

  /**
   * Queue or, for measurements, flush a gate
   * @returns Measurement results keyed by upstream qubit
   */
  gate(gate: StreamGate): Measurement[] {
    return unwrap(this.controller.submitGate(gate));
  }

  /**
   * Results are returned from {@link gate} directly, so nothing passes
   * through here.
   */
  modifyMeasurement(_measurement: Measurement): Measurement[] {
    return [];
  }

  /**
   * Time is not meaningful before mapping; the request is discarded.
   */
  advance(_cycles: number): void {
    if (!this._warnedAdvance) {
      this._warnedAdvance = true;
      this.logger.warn('discarding request to advance time: scheduling happens after mapping');
    }
  }

  /**
   * Flush whatever follows the last measurement
   */
  drop(): void {
    unwrap(this.controller.flush());
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private get logger(): Logger {
    return this._logger ?? createConsoleLogger(LOG_SCOPE);
  }

  private async readJson(path: string, what: string): Promise<unknown> {
    let text: string;
    try {
      text = await this._readFile(path);
    } catch (error) {
      throw fault(gateStreamError('ConfigurationError', `cannot read ${what} "${path}": ${messageOf(error)}`));
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw fault(gateStreamError('ConfigurationError', `${what} "${path}" is not valid JSON: ${messageOf(error)}`));
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
