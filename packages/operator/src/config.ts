/**
 * Operator configuration
 *
 * Built once from the initialization command stream, with environment
 * variables as fallbacks:
 *
 * | command                  | args       | environment                  |
 * |--------------------------|------------|------------------------------|
 * | `mapper.hardware_config` | path       | `GATESTREAM_HARDWARE_CONFIG` |
 * | `mapper.gatemap`         | path       | `GATESTREAM_GATEMAP`         |
 * | `mapper.option`          | key, value |                              |
 * | `mapper.epsilon`         | number     | `GATESTREAM_EPSILON`         |
 * | `mapper.seed`            | integer    | `GATESTREAM_SEED`            |
 *
 * The log level comes from `GATESTREAM_LOG_LEVEL`.
 */

import { DEFAULT_EPSILON, err, gateStreamError, ok, type Result } from '@gatestream/core';
import { parseLogLevel, type LogLevel } from './logger';

// ============================================================================
// Types
// ============================================================================

/**
 * One initialization command, addressed as `<iface>.<oper>`
 */
export interface InitCommand {
  readonly iface: string;
  readonly oper: string;
  readonly args: readonly string[];
}

export type Environment = Readonly<Record<string, string | undefined>>;

export interface OperatorConfig {
  readonly hardwareConfigPath: string;
  readonly gateMapPath: string;
  /**
   * Passed to the circuit mapper verbatim, later keys overriding earlier ones
   */
  readonly mapperOptions: ReadonlyMap<string, string>;
  readonly epsilon: number;
  readonly seed: number;
  readonly logLevel: LogLevel;
}

/** Seeds feed a 32-bit generator */
export const MAX_SEED = 0xffffffff;

export const MAPPER_INTERFACE = 'mapper';

export const ENV = {
  hardwareConfig: 'GATESTREAM_HARDWARE_CONFIG',
  gateMap: 'GATESTREAM_GATEMAP',
  epsilon: 'GATESTREAM_EPSILON',
  seed: 'GATESTREAM_SEED',
  logLevel: 'GATESTREAM_LOG_LEVEL',
} as const;

// ============================================================================
// Resolution
// ============================================================================

const configError = (message: string) => err(gateStreamError('ConfigurationError', message));

/**
 * Resolve the operator configuration. Commands addressed to other
 * interfaces are ignored.
 */
export function resolveConfig(
  commands: readonly InitCommand[],
  env: Environment = process.env
): Result<OperatorConfig> {
  let hardwareConfigPath = env[ENV.hardwareConfig] ?? '';
  let gateMapPath = env[ENV.gateMap] ?? '';
  let epsilonText = env[ENV.epsilon];
  let seedText = env[ENV.seed];
  const mapperOptions = new Map<string, string>();

  for (const command of commands) {
    if (command.iface !== MAPPER_INTERFACE) {
      continue;
    }
    const oper = command.oper.replace(/-/g, '_');
    const expectArgs = (count: number) =>
      command.args.length === count
        ? undefined
        : configError(
            `expected ${count === 1 ? 'one argument' : 'two arguments'} for ${MAPPER_INTERFACE}.${oper}, got ${command.args.length}`
          );

    switch (oper) {
      case 'hardware_config': {
        const failure = expectArgs(1);
        if (failure) {
          return failure;
        }
        hardwareConfigPath = command.args[0];
        break;
      }
      case 'gatemap': {
        const failure = expectArgs(1);
        if (failure) {
          return failure;
        }
        gateMapPath = command.args[0];
        break;
      }
      case 'option': {
        const failure = expectArgs(2);
        if (failure) {
          return failure;
        }
        mapperOptions.set(command.args[0], command.args[1]);
        break;
      }
      case 'epsilon': {
        const failure = expectArgs(1);
        if (failure) {
          return failure;
        }
        epsilonText = command.args[0];
        break;
      }
      case 'seed': {
        const failure = expectArgs(1);
        if (failure) {
          return failure;
        }
        seedText = command.args[0];
        break;
      }
      default:
        return configError(`unknown command ${MAPPER_INTERFACE}.${command.oper}`);
    }
  }

  if (hardwareConfigPath === '') {
    return configError(
      `missing ${MAPPER_INTERFACE}.hardware_config command or ${ENV.hardwareConfig} environment variable`
    );
  }
  if (gateMapPath === '') {
    return configError(`missing ${MAPPER_INTERFACE}.gatemap command or ${ENV.gateMap} environment variable`);
  }

  let epsilon = DEFAULT_EPSILON;
  if (epsilonText !== undefined) {
    epsilon = Number(epsilonText);
    if (epsilonText.trim() === '' || !Number.isFinite(epsilon) || epsilon <= 0) {
      return configError(`epsilon must be a positive number, got "${epsilonText}"`);
    }
  }

  let seed = 0;
  if (seedText !== undefined) {
    seed = Number(seedText);
    if (!/^\d+$/.test(seedText.trim()) || !Number.isSafeInteger(seed)) {
      return configError(`seed must be a non-negative integer, got "${seedText}"`);
    }
    if (seed > MAX_SEED) {
      return configError(`seed must be at most ${MAX_SEED}, got "${seedText}"`);
    }
  }

  const levelText = env[ENV.logLevel];
  const logLevel = levelText === undefined ? 'info' : parseLogLevel(levelText);
  if (logLevel === undefined) {
    return configError(`unknown log level "${levelText}"`);
  }

  return ok({ hardwareConfigPath, gateMapPath, mapperOptions, epsilon, seed, logLevel });
}
