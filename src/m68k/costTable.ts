import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/**
 * Cost rule attached to an instruction shape.
 *
 * - `static`: fixed cycle count.
 * - `registerList`: `base + perRegister * registers` for `movem`.
 * - `shiftCount`: `base + perShift * count` for shifts/rotates by a literal immediate.
 * - `branch`: two outcomes; never resolved without an explicit override.
 */
export type CostRule =
  | { kind: 'static'; cycles: number }
  | { kind: 'registerList'; base: number; perRegister: number }
  | { kind: 'shiftCount'; base: number; perShift: number }
  | { kind: 'branch'; taken: number; notTaken: number };

export interface CostTable {
  rules: ReadonlyMap<string, CostRule>;
  /** Cost of one `nop`, the padding unit. */
  nopCycles: number;
}

const DEFAULT_TABLE_URL = new URL('../../data/m68k_cycles.json', import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCycleCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function toRule(value: unknown): CostRule | undefined {
  if (isCycleCount(value)) return { kind: 'static', cycles: value };
  if (!isRecord(value)) return undefined;
  const keys = Object.keys(value).sort().join(',');
  if (keys === 'base,perRegister' && isCycleCount(value.base) && isCycleCount(value.perRegister)) {
    return { kind: 'registerList', base: value.base, perRegister: value.perRegister };
  }
  if (keys === 'base,perShift' && isCycleCount(value.base) && isCycleCount(value.perShift)) {
    return { kind: 'shiftCount', base: value.base, perShift: value.perShift };
  }
  if (keys === 'notTaken,taken' && isCycleCount(value.taken) && isCycleCount(value.notTaken)) {
    return { kind: 'branch', taken: value.taken, notTaken: value.notTaken };
  }
  return undefined;
}

/**
 * Validate a parsed cost-table document (shape key -> rule).
 *
 * The table must define a static `nop`, which is the padding unit.
 */
export function parseCostTable(
  json: unknown,
  file: string,
  diagnostics: Diagnostic[],
): CostTable | undefined {
  const fail = (message: string): undefined => {
    diagnostics.push({ id: DiagnosticIds.ConfigError, severity: 'error', message, file });
    return undefined;
  };
  if (!isRecord(json)) return fail('Cost table must be a JSON object.');

  const rules = new Map<string, CostRule>();
  for (const [key, value] of Object.entries(json)) {
    const rule = toRule(value);
    if (!rule) return fail(`Cost table entry "${key}" is not a valid cost rule.`);
    rules.set(key.toLowerCase(), rule);
  }
  const nop = rules.get('nop');
  if (nop?.kind !== 'static' || nop.cycles === 0) {
    return fail('Cost table must define a non-zero static "nop" cost.');
  }
  return { rules, nopCycles: nop.cycles };
}

/**
 * Load the bundled 68000 timing table from `data/m68k_cycles.json`.
 */
export function loadDefaultCostTable(diagnostics: Diagnostic[]): CostTable | undefined {
  const file = fileURLToPath(DEFAULT_TABLE_URL);
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(DEFAULT_TABLE_URL, 'utf8'));
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read cost table: ${String(err)}`,
      file,
    });
    return undefined;
  }
  return parseCostTable(json, file, diagnostics);
}
