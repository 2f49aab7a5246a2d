import type { InstructionBody } from '../frontend/ast.js';
import { registerListMask } from './reglist.js';

/**
 * 68000 addressing-mode classes used as cost-table keys.
 */
export type OperandClass =
  | 'dn'
  | 'an'
  | '(an)'
  | '(an)+'
  | '-(an)'
  | 'd(an)'
  | 'd(an,ix)'
  | 'xxx.w'
  | 'xxx.l'
  | 'd(pc)'
  | 'd(pc,ix)'
  | '#xxx'
  | 'reglist'
  | 'sr'
  | 'ccr'
  | 'usp';

/**
 * Normalized instruction shape: mnemonic with explicit size, plus one class per operand.
 */
export interface InstructionShape {
  mnemonic: string;
  operands: OperandClass[];
  /** Raw operand text, split at top-level commas and trimmed. */
  operandText: string[];
  /** Table key, e.g. `movem.l reglist,-(an)`. */
  key: string;
}

const CONDITIONS = 'hi|ls|cc|cs|ne|eq|vc|vs|pl|mi|ge|lt|gt|le|hs|lo';
const BRANCH_RE = new RegExp(`^b(ra|sr|${CONDITIONS})$`);
const DBCC_RE = new RegExp(`^db(t|f|ra|${CONDITIONS})$`);
const LONG_ONLY = new Set(['lea', 'pea', 'moveq', 'exg']);
const UNSIZED = new Set([
  'nop',
  'rts',
  'rte',
  'rtr',
  'jmp',
  'jsr',
  'stop',
  'trap',
  'btst',
  'bset',
  'bclr',
  'bchg',
]);

const DATA_RE = /^d[0-7]$/;
const ADDR_RE = /^(a[0-7]|sp)$/;
const AN = '(?:a[0-7]|sp)';
const IX = '(?:[da][0-7]|sp)(?:\\.[wl])?';
const IND_RE = new RegExp(`^\\(${AN}\\)$`);
const POSTINC_RE = new RegExp(`^\\(${AN}\\)\\+$`);
const PREDEC_RE = new RegExp(`^-\\(${AN}\\)$`);
const DISP_RE = new RegExp(`^[^()]+\\(${AN}\\)$|^\\([^()]+,${AN}\\)$`);
const INDEX_RE = new RegExp(`^(?:[^()]*)\\(${AN},${IX}\\)$|^\\([^()]+,${AN},${IX}\\)$`);
const PC_RE = /^(?:[^()]*)\(pc\)$|^\([^()]+,pc\)$/;
const PC_INDEX_RE = new RegExp(`^(?:[^()]*)\\(pc,${IX}\\)$|^\\([^()]+,pc,${IX}\\)$`);
const ABS_WORD_RE = /^(?:\(([^()]+)\)|([^()]+))\.w$/;
const ABS_LONG_RE = /^(?:\(([^()]+)\)|([^()]+))\.l$/;
const SIMPLE_ABS_RE = /^[^(),#]+$/;

/**
 * Split operand text at commas outside parentheses and quotes.
 */
export function splitOperands(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  const out: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed.charAt(i);
    if (quote) {
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === '(') depth++;
    else if (ch === ')') depth = Math.max(0, depth - 1);
    else if (ch === ',' && depth === 0) {
      out.push(trimmed.slice(start, i).trim());
      start = i + 1;
    }
  }
  out.push(trimmed.slice(start).trim());
  return out;
}

/**
 * Lowercase a mnemonic and make its size explicit.
 *
 * `lea`/`pea`/`moveq`/`exg` are always `.l`; branches take `.b` for `.s` and default to `.w`;
 * `DBcc` is always `.w`; control-flow and bit instructions stay unsized unless written with a
 * size; everything else defaults to `.w`.
 */
export function normalizeMnemonic(mnemonic: string): string {
  const lower = mnemonic.trim().toLowerCase();
  const dot = lower.indexOf('.');
  const base = dot < 0 ? lower : lower.slice(0, dot);
  const size = dot < 0 ? undefined : lower.slice(dot + 1);

  if (LONG_ONLY.has(base)) return `${base}.l`;
  if (DBCC_RE.test(base)) return `${base}.w`;
  if (BRANCH_RE.test(base)) {
    if (size === 's' || size === 'b') return `${base}.b`;
    return `${base}.w`;
  }
  if (size !== undefined) return `${base}.${size}`;
  if (UNSIZED.has(base)) return base;
  return `${base}.w`;
}

/**
 * Classify one operand into its addressing-mode class.
 *
 * `inRegisterListPosition` is set for `movem` operands, where even a single register is a list.
 */
export function classifyOperand(
  text: string,
  inRegisterListPosition = false,
): OperandClass | undefined {
  const op = text.trim().toLowerCase().replace(/\s+/g, '');
  if (op.length === 0) return undefined;
  if (op.startsWith('#')) return op.length > 1 ? '#xxx' : undefined;
  if (op === 'sr' || op === 'ccr' || op === 'usp') return op;

  if (inRegisterListPosition && registerListMask(op) !== undefined) return 'reglist';
  if (DATA_RE.test(op)) return 'dn';
  if (ADDR_RE.test(op)) return 'an';
  if (/[/-]/.test(op) && registerListMask(op) !== undefined) return 'reglist';

  if (IND_RE.test(op)) return '(an)';
  if (POSTINC_RE.test(op)) return '(an)+';
  if (PREDEC_RE.test(op)) return '-(an)';
  if (INDEX_RE.test(op)) return 'd(an,ix)';
  if (DISP_RE.test(op)) return 'd(an)';
  if (PC_INDEX_RE.test(op)) return 'd(pc,ix)';
  if (PC_RE.test(op)) return 'd(pc)';
  if (ABS_WORD_RE.test(op)) return 'xxx.w';
  if (ABS_LONG_RE.test(op)) return 'xxx.l';
  if (SIMPLE_ABS_RE.test(op)) return 'xxx.l';
  return undefined;
}

/**
 * Compute the cost-table shape of an instruction, or `undefined` when an operand has no class.
 */
export function instructionShape(instruction: InstructionBody): InstructionShape | undefined {
  const mnemonic = normalizeMnemonic(instruction.mnemonic);
  const operandText = splitOperands(instruction.operands);
  const isMovem = mnemonic.startsWith('movem.');
  const operands: OperandClass[] = [];
  for (const text of operandText) {
    const cls = classifyOperand(text, isMovem);
    if (cls === undefined) return undefined;
    operands.push(cls);
  }
  const key = operands.length > 0 ? `${mnemonic} ${operands.join(',')}` : mnemonic;
  return { mnemonic, operands, operandText, key };
}
