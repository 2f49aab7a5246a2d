#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, PadStyle } from './formats/types.js';
import { packageVersion } from './version.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  templatePath?: string;
  overridesPath?: string;
  label?: string;
  width?: number;
  roundTo?: number;
  padStyle: PadStyle;
  emitReport: boolean;
};

function usage(): string {
  return [
    'syncline [options] <input.s>',
    '',
    'Options:',
    '  -o, --output <file>     Output assembly path (default: <input>.out.s)',
    '  -t, --template <file>   Border template (default: bundled fullscreen template)',
    '  -l, --label <name>      Symbol bound to the scanline count (default: SCANLINES_CONSUMED)',
    '  -w, --width <cycles>    Cycles per scanline (default: 512)',
    '      --round <n>         Round table costs up to a multiple of n (default: 4, 1 disables)',
    '      --pad <style>       Padding style: nop|dcb (default: nop)',
    '      --overrides <file>  JSON table of cycle overrides',
    '      --report            Also write <output>.cycles.json',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
    'Notes:',
    '  - <input.s> must be the last argument (assembler-style).',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parsePositiveInt(flag: string, v: string): number {
  if (!/^[0-9]+$/.test(v) || Number(v) <= 0) fail(`${flag} expects a positive integer (got "${v}")`);
  return Number(v);
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let templatePath: string | undefined;
  let overridesPath: string | undefined;
  let label: string | undefined;
  let width: number | undefined;
  let roundTo: number | undefined;
  let padStyle: PadStyle = 'nop';
  let emitReport = false;
  let entryFile: string | undefined;

  // Value of `-x v`, `--long v` or `--long=v`; undefined when `a` is not this flag.
  const valueOf = (a: string, i: number, short: string | undefined, long: string): string | undefined => {
    if (a.startsWith(`${long}=`)) {
      const v = a.slice(long.length + 1);
      if (!v) fail(`${long} expects a value`);
      return v;
    }
    if (a !== long && a !== short) return undefined;
    const v = argv[i + 1];
    if (!v) fail(`${a} expects a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '--report') {
      emitReport = true;
      continue;
    }
    const consumed = a.includes('=') ? 0 : 1;

    const output = valueOf(a, i, '-o', '--output');
    if (output !== undefined) {
      outputPath = output;
      i += consumed;
      continue;
    }
    const template = valueOf(a, i, '-t', '--template');
    if (template !== undefined) {
      templatePath = template;
      i += consumed;
      continue;
    }
    const lbl = valueOf(a, i, '-l', '--label');
    if (lbl !== undefined) {
      label = lbl;
      i += consumed;
      continue;
    }
    const w = valueOf(a, i, '-w', '--width');
    if (w !== undefined) {
      width = parsePositiveInt(a.startsWith('--width') ? '--width' : a, w);
      i += consumed;
      continue;
    }
    const round = valueOf(a, i, undefined, '--round');
    if (round !== undefined) {
      roundTo = parsePositiveInt('--round', round);
      i += consumed;
      continue;
    }
    const pad = valueOf(a, i, undefined, '--pad');
    if (pad !== undefined) {
      if (pad !== 'nop' && pad !== 'dcb') fail(`Unsupported --pad "${pad}" (expected nop|dcb)`);
      padStyle = pad;
      i += consumed;
      continue;
    }
    const overrides = valueOf(a, i, undefined, '--overrides');
    if (overrides !== undefined) {
      overridesPath = overrides;
      i += consumed;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <input.s> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <input.s> argument (and it must be last)`);
  }
  if (outputPath && resolve(outputPath) === resolve(entryFile)) {
    fail(`--output must not overwrite the input file`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    ...(templatePath ? { templatePath } : {}),
    ...(overridesPath ? { overridesPath } : {}),
    ...(label !== undefined ? { label } : {}),
    ...(width !== undefined ? { width } : {}),
    ...(roundTo !== undefined ? { roundTo } : {}),
    padStyle,
    emitReport,
  };
}

/**
 * Output path of the assembly artifact: `--output`, or `<input stem>.out.s`.
 */
function outputFor(entryFile: string, outputPath?: string): string {
  if (outputPath) return resolve(outputPath);
  const entry = resolve(entryFile);
  const ext = extname(entry);
  const stem = ext.length > 0 ? entry.slice(0, -ext.length) : entry;
  return `${stem}.out.s`;
}

async function writeArtifacts(asmPath: string, artifacts: Artifact[]): Promise<void> {
  const ext = extname(asmPath);
  const base = ext.length > 0 ? asmPath.slice(0, -ext.length) : asmPath;
  const reportPath = `${base}.cycles.json`;
  await mkdir(dirname(asmPath), { recursive: true });

  const written: string[] = [];
  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    if (artifact.kind === 'asm') {
      writes.push(writeFile(asmPath, artifact.text, 'utf8'));
      written.push(asmPath);
    } else {
      writes.push(writeFile(reportPath, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
      written.push(reportPath);
    }
  }
  await Promise.all(writes);
  for (const p of written) process.stdout.write(`${p}\n`);
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Render a diagnostic as `file:line: severity: [ID] message`, followed by the repeat path.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc = d.line !== undefined ? `${d.file}:${d.line}` : d.file;
  const head = `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
  if (!d.reptPath || d.reptPath.length === 0) return head;
  return `${head}\n  in ${d.reptPath.join(' > ')}`;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(
      parsed.entryFile,
      {
        ...(parsed.templatePath ? { templatePath: parsed.templatePath } : {}),
        ...(parsed.overridesPath ? { overridesPath: parsed.overridesPath } : {}),
        ...(parsed.label !== undefined ? { label: parsed.label } : {}),
        ...(parsed.width !== undefined ? { width: parsed.width } : {}),
        ...(parsed.roundTo !== undefined ? { roundTo: parsed.roundTo } : {}),
        padStyle: parsed.padStyle,
        emitReport: parsed.emitReport,
      },
      { formats: defaultFormatWriters },
    );

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    await writeArtifacts(outputFor(parsed.entryFile, parsed.outputPath), res.artifacts);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`syncline: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
