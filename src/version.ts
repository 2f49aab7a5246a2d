import { createRequire } from 'node:module';

/**
 * Version from the package manifest, or `0.0.0` when it cannot be read.
 */
export function packageVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}
