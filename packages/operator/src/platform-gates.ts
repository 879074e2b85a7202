/**
 * Gate table suggestion
 *
 * Guesses a gate table for a platform from its instruction names. The
 * result is a starting point to review by hand, not a verified table.
 */

import aliases from './data/instruction-aliases.json';
import type { Platform } from './platform';

export interface GateTableSuggestion {
  /**
   * Gate table entries for every recognized instruction, in platform order
   */
  readonly table: Record<string, unknown>;
  /**
   * Instruction names without a known alias, sorted
   */
  readonly unrecognized: string[];
}

const ALIASES: Readonly<Record<string, unknown>> = aliases;

/**
 * Alias key of an instruction name: lower case, without `_` and `-`,
 * with `measure` shortened to `meas`
 */
export function instructionAliasKey(name: string): string {
  return name.toLowerCase().replace(/[_-]/g, '').replace('measure', 'meas');
}

export function suggestGateTable(platform: Pick<Platform, 'instructions'>): GateTableSuggestion {
  const table: Record<string, unknown> = {};
  const unrecognized = new Set<string>();

  for (const name of platform.instructions) {
    const key = instructionAliasKey(name);
    if (Object.hasOwn(ALIASES, key)) {
      table[name] = ALIASES[key];
    } else {
      unrecognized.add(name);
    }
  }

  return { table, unrecognized: [...unrecognized].sort() };
}
