/**
 * vars.toml / secrets.toml merging.
 *
 * Existing documents are user-owned: their text is carried through
 * untouched and new keys are only ever appended. A value is never
 * overwritten and never moved between the plain and secret documents.
 */

import * as TOML from 'smol-toml';
import type { Catalog, EnvArtifacts, EnvSpec, ResolvedOrder } from '../../types/index.js';
import { ComponentNotFoundError, MalformedEnvTomlError, type EnvDocumentKind } from '../../utils/errors.js';

const DOCUMENT_HEADERS: Record<EnvDocumentKind, string> = {
  plain: '# Non-secret environment configuration for setupkit',
  secret: '# Secret environment configuration for setupkit'
};

const EDIT_HINT = '# Edit values as needed before running install.sh';

function isFlatValue(value: unknown): boolean {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint' ||
    value instanceof Date
  );
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'an array';
  if (value !== null && typeof value === 'object') return 'a table';
  return typeof value;
}

/**
 * Parse an env document as a flat key/value table.
 * An absent document is an empty table; an unparseable one is an error.
 */
export function parseEnvDocument(kind: EnvDocumentKind, content: string | undefined): Map<string, unknown> {
  const table = new Map<string, unknown>();
  if (content === undefined) {
    return table;
  }

  let parsed: Record<string, unknown>;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    throw new MalformedEnvTomlError(kind, error instanceof Error ? error.message : String(error));
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (!isFlatValue(value)) {
      throw new MalformedEnvTomlError(kind, `key '${key}' must hold a plain value, found ${describeValue(value)}`);
    }
    table.set(key, value);
  }
  return table;
}

export function renderEnvHeader(kind: EnvDocumentKind): string {
  return `${DOCUMENT_HEADERS[kind]}\n${EDIT_HINT}\n`;
}

function renderComment(spec: EnvSpec): string {
  const text = spec.description.trim().length > 0 ? spec.description.trim() : spec.name;
  return text
    .split('\n')
    .map(line => (line.length > 0 ? `# ${line}` : '#'))
    .join('\n');
}

function renderEntry(spec: EnvSpec): string {
  const assignment = TOML.stringify({ [spec.name]: spec.default ?? '' }).trim();
  return `\n${renderComment(spec)}\n${assignment}\n`;
}

function renderDocument(kind: EnvDocumentKind, existing: string | undefined, additions: EnvSpec[]): string {
  if (existing !== undefined && additions.length === 0) {
    return existing;
  }
  if (existing !== undefined && existing.trim().length > 0) {
    const base = existing.endsWith('\n') ? existing : `${existing}\n`;
    return base + additions.map(renderEntry).join('');
  }
  return renderEnvHeader(kind) + additions.map(renderEntry).join('');
}

/**
 * Merge the env declarations of `order` into the existing plain and secret documents.
 *
 * Keys already present keep their value and position. Missing keys are
 * appended in resolved order, then declaration order, with their default
 * (or an empty string) under a comment holding the description. When a name
 * is declared by several components the first declaration wins.
 *
 * @throws MalformedEnvTomlError if an existing document is not a flat TOML table
 */
export function mergeEnvDocuments(
  order: ResolvedOrder,
  catalog: Catalog,
  existingPlain?: string,
  existingSecret?: string
): EnvArtifacts {
  const existingKeys: Record<EnvDocumentKind, Map<string, unknown>> = {
    plain: parseEnvDocument('plain', existingPlain),
    secret: parseEnvDocument('secret', existingSecret)
  };
  const additions: Record<EnvDocumentKind, EnvSpec[]> = { plain: [], secret: [] };
  const misplaced: string[] = [];
  const seen = new Set<string>();

  for (const id of order) {
    const component = catalog.get(id);
    if (!component) {
      throw new ComponentNotFoundError(id, [...catalog.keys()].sort());
    }

    for (const spec of component.envSpecs) {
      if (seen.has(spec.name)) {
        continue;
      }
      seen.add(spec.name);

      const target: EnvDocumentKind = spec.secret ? 'secret' : 'plain';
      const opposite: EnvDocumentKind = spec.secret ? 'plain' : 'secret';
      if (existingKeys[target].has(spec.name)) {
        continue;
      }
      if (existingKeys[opposite].has(spec.name)) {
        misplaced.push(spec.name);
      }
      additions[target].push(spec);
    }
  }

  return {
    plain: renderDocument('plain', existingPlain, additions.plain),
    secret: renderDocument('secret', existingSecret, additions.secret),
    misplaced
  };
}
