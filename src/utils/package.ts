import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

let cachedRoot: string | undefined;

/**
 * Directory holding setupkit's own package.json.
 * Works from both src/ (tsx) and dist/ (compiled) layouts.
 */
export function getPackageRoot(): string {
  if (cachedRoot) {
    return cachedRoot;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error('Unable to locate setupkit package root');
    }
    dir = parent;
  }
  cachedRoot = dir;
  return dir;
}

export function getVersion(): string {
  const content = readFileSync(join(getPackageRoot(), 'package.json'), 'utf8');
  const parsed: unknown = JSON.parse(content);
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}
