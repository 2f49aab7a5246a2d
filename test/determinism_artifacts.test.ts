import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import { compile, compileSource } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import { overrideTemplate } from './helpers/fixtures.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const scroller = join(__dirname, '..', 'examples', 'scroller.s');

describe('determinism', () => {
  it('produces identical artifacts across runs', async () => {
    const run = () =>
      compile(scroller, { emitReport: true, toolVersion: '0.0.1' }, { formats: defaultFormatWriters });
    const first = await run();
    const second = await run();
    expect(first.diagnostics).toEqual([]);
    expect(second).toEqual(first);
  });

  it('does not depend on the order options are spelled in', () => {
    const inputs = {
      source: { path: 'main.s', text: '\tnop\n\tmove.w\td0,d1\n' },
      template: { path: 'template.s', text: overrideTemplate(12, 12, 12) },
    };
    const a = compileSource(
      inputs,
      { width: 64, padStyle: 'dcb', toolVersion: '1.0.0' },
      { formats: defaultFormatWriters },
    );
    const b = compileSource(
      inputs,
      { toolVersion: '1.0.0', padStyle: 'dcb', width: 64 },
      { formats: defaultFormatWriters },
    );
    expect(a.diagnostics).toEqual([]);
    expect(b).toEqual(a);
  });
});
