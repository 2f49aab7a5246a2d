const REGISTER_RE = /^([da])([0-7])$/;

/**
 * Bit index of a register in the 16-bit `movem` mask: d0-d7 are 0-7, a0-a7 are 8-15.
 */
export function registerBit(name: string): number | undefined {
  const lower = name.trim().toLowerCase();
  if (lower === 'sp') return 15;
  const m = REGISTER_RE.exec(lower);
  if (!m) return undefined;
  const base = m[1] === 'a' ? 8 : 0;
  return base + Number(m[2]);
}

/**
 * Mask of the registers named by a register list such as `d0-d7/a1-a3` or `d0/a6/sp`.
 *
 * Ranges must stay within one register bank and run upwards. Returns `undefined` when any element
 * is malformed.
 */
export function registerListMask(text: string): number | undefined {
  const body = text.trim();
  if (body.length === 0) return undefined;
  let mask = 0;
  for (const part of body.split('/')) {
    const bounds = part.split('-');
    if (bounds.length === 1) {
      const bit = registerBit(part);
      if (bit === undefined) return undefined;
      mask |= 1 << bit;
      continue;
    }
    if (bounds.length !== 2) return undefined;
    const from = registerBit(bounds[0] ?? '');
    const to = registerBit(bounds[1] ?? '');
    if (from === undefined || to === undefined) return undefined;
    if (from > to || from >> 3 !== to >> 3) return undefined;
    for (let bit = from; bit <= to; bit++) mask |= 1 << bit;
  }
  return mask;
}

/**
 * Number of distinct registers a register list names; duplicates count once.
 */
export function countRegisterList(text: string): number | undefined {
  const mask = registerListMask(text);
  if (mask === undefined) return undefined;
  let count = 0;
  for (let bit = 0; bit < 16; bit++) {
    if ((mask >> bit) & 1) count++;
  }
  return count;
}
