import { readFileSync } from 'node:fs';

/**
 * Package version, read once from package.json.
 *
 * Both `src/utils/` and `dist/utils/` sit two levels below the package root.
 */
function readVersion(): string {
  try {
    const pkgUrl = new URL('../../package.json', import.meta.url);
    const pkg = JSON.parse(readFileSync(pkgUrl, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    // Not fatal: only --version output depends on it
    return '0.0.0';
  }
}

export const VERSION: string = readVersion();
