import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Same relative location from src/cli and dist/cli.
const PACKAGE_JSON = fileURLToPath(new URL('../../package.json', import.meta.url));

let cached: string | undefined;

export function readPackageVersion(): string {
  if (cached === undefined) {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
    cached =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';
  }
  return cached;
}
