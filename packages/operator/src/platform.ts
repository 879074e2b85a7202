/**
 * Hardware platform description
 *
 * Only the parts the operator needs are read: the physical qubit count and
 * the instruction names.
 *
 * ```json
 * {
 *   "hardware_settings": { "qubit_number": 7 },
 *   "instructions": { "x q0": {}, "cz q0,q2": {} },
 *   "gate_decomposition": { "cnot %0,%1": ["ym90 %1", "cz %0,%1", "y90 %1"] }
 * }
 * ```
 */

import { err, gateStreamError, ok, type Result } from '@gatestream/core';

export interface Platform {
  readonly numQubits: number;
  /**
   * First word of every instruction and decomposition name, without
   * duplicates, in order of appearance
   */
  readonly instructions: readonly string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const platformError = (message: string) => err(gateStreamError('ConfigurationError', message));

export function parsePlatform(json: unknown): Result<Platform> {
  if (!isRecord(json)) {
    return platformError('platform description must be an object');
  }

  const settings = json.hardware_settings;
  const qubitNumber = isRecord(settings) && settings.qubit_number !== undefined
    ? settings.qubit_number
    : json.qubit_number;
  if (qubitNumber === undefined) {
    return platformError('platform description has no hardware_settings.qubit_number');
  }
  if (typeof qubitNumber !== 'number' || !Number.isInteger(qubitNumber) || qubitNumber < 1) {
    return platformError(`qubit_number must be a positive integer, got ${JSON.stringify(qubitNumber)}`);
  }

  const names: string[] = [];

  const { instructions } = json;
  if (Array.isArray(instructions)) {
    for (const name of instructions) {
      if (typeof name !== 'string') {
        return platformError('"instructions" must list instruction names');
      }
      names.push(name);
    }
  } else if (isRecord(instructions)) {
    names.push(...Object.keys(instructions));
  } else if (instructions !== undefined) {
    return platformError('"instructions" must be an object or a list');
  }

  const decompositions = json.gate_decomposition;
  if (isRecord(decompositions)) {
    for (const [name, expansion] of Object.entries(decompositions)) {
      if (!Array.isArray(expansion) || !expansion.every((step): step is string => typeof step === 'string')) {
        return platformError(`gate_decomposition "${name}" must be a list of instructions`);
      }
      names.push(name, ...expansion);
    }
  } else if (decompositions !== undefined) {
    return platformError('"gate_decomposition" must be an object');
  }

  return ok({ numQubits: qubitNumber, instructions: uniqueFirstWords(names) });
}

function uniqueFirstWords(names: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const word = name.trim().split(/\s+/)[0];
    if (word !== '') {
      seen.add(word);
    }
  }
  return [...seen];
}
