import { InvalidComponentIdError } from './errors.js';
import type { ComponentId } from '../types/index.js';

const IDENTIFIER_CHARS = /^[\p{L}\p{N}_-]+$/u;
const IDENTIFIER_CHARS_WITH_DOTS = /^[\p{L}\p{N}_.-]+$/u;

/**
 * Environment variable names must be usable as bare TOML keys and shell names
 */
export const ENV_NAME_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface IdentifierOptions {
  /** Accept '.' inside the identifier (e.g. "node-v1.2") */
  allowDots?: boolean;
}

/**
 * Syntactic identifier check.
 *
 * Rejects empty strings, path separators, "." and "..", and any character
 * other than letters, digits, '-', '_' and (optionally) '.'.
 */
export function validateIdentifier(id: string, options: IdentifierOptions = {}): boolean {
  if (id.length === 0) {
    return false;
  }
  if (id.includes('/') || id.includes('\\')) {
    return false;
  }
  if (id === '.' || id === '..') {
    return false;
  }
  const pattern = options.allowDots ? IDENTIFIER_CHARS_WITH_DOTS : IDENTIFIER_CHARS;
  return pattern.test(id);
}

export function isValidComponentId(id: string): boolean {
  return validateIdentifier(id, { allowDots: true });
}

/**
 * Validate a component identifier
 * @throws InvalidComponentIdError if the id is not well formed
 */
export function validateComponentId(id: string): ComponentId {
  if (!isValidComponentId(id)) {
    throw new InvalidComponentIdError(id);
  }
  return id;
}

export function isValidEnvName(name: string): boolean {
  return ENV_NAME_REGEX.test(name);
}
