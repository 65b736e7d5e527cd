/**
 * Loads setup component definitions from TOML files.
 *
 * One file per component (`<id>.toml`):
 *
 *   name = "GitHub CLI"
 *   description = "..."
 *   dependencies = ["git"]
 *   install = ["sudo apt-get install -y gh"]
 *
 *   [vars.GH_HOST]
 *   description = "..."
 *   default = "github.com"
 *
 *   [secrets.GH_TOKEN]
 *   description = "..."
 */

import { basename, extname, join } from 'path';
import * as TOML from 'smol-toml';
import type { Catalog, EnvSpec, SetupComponent } from '../../types/index.js';
import { FILE_PATTERNS, SETUP_ENV } from '../../constants/index.js';
import { ConfigError, InvalidComponentMetadataError } from '../../utils/errors.js';
import { isValidComponentId } from '../../utils/component-id.js';
import { isDirectory, listFiles, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getPackageRoot } from '../../utils/package.js';
import { createCatalog, overlayCatalog } from './catalog.js';

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function readOptionalString(table: Table, key: string, component: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidComponentMetadataError(component, `'${key}' must be a string`);
  }
  return value;
}

function readStringList(table: Table, key: string, component: string): string[] {
  const value = table[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidComponentMetadataError(component, `'${key}' must be an array of strings`);
  }
  return value;
}

function readEnvSection(table: Table, section: 'vars' | 'secrets', component: string): EnvSpec[] {
  const value = table[section];
  if (value === undefined) return [];
  if (!isTable(value)) {
    throw new InvalidComponentMetadataError(component, `[${section}] must be a table`);
  }

  return Object.entries(value).map(([name, entry]) => {
    if (!isTable(entry)) {
      throw new InvalidComponentMetadataError(component, `[${section}.${name}] must be a table`);
    }
    const spec: EnvSpec = {
      name,
      secret: section === 'secrets',
      description: readOptionalString(entry, 'description', component) ?? ''
    };
    const defaultValue = readOptionalString(entry, 'default', component);
    if (defaultValue !== undefined) {
      spec.default = defaultValue;
    }
    return spec;
  });
}

/**
 * Parse one component definition. `fallbackId` (the file stem) is used when
 * the file does not name its own id and in error reports.
 */
export function parseComponentDefinition(content: string, fallbackId: string): SetupComponent {
  let table: Table;
  try {
    table = TOML.parse(content);
  } catch (error) {
    throw new InvalidComponentMetadataError(fallbackId, error instanceof Error ? error.message : String(error));
  }

  const id = readOptionalString(table, 'id', fallbackId) ?? fallbackId;
  if (!isValidComponentId(id)) {
    throw new InvalidComponentMetadataError(fallbackId, `invalid setup component id '${id}'`);
  }

  const dependencies = readStringList(table, 'dependencies', fallbackId);
  for (const dep of dependencies) {
    if (!isValidComponentId(dep)) {
      throw new InvalidComponentMetadataError(fallbackId, `invalid dependency id '${dep}'`);
    }
  }

  const vars = readEnvSection(table, 'vars', fallbackId);
  const secrets = readEnvSection(table, 'secrets', fallbackId);
  const secretNames = new Set(secrets.map(spec => spec.name));
  const both = vars.find(spec => secretNames.has(spec.name));
  if (both) {
    throw new InvalidComponentMetadataError(
      fallbackId,
      `environment key '${both.name}' is declared in both [vars] and [secrets]`
    );
  }

  return {
    id,
    displayName: readOptionalString(table, 'name', fallbackId) ?? id,
    description: readOptionalString(table, 'description', fallbackId) ?? '',
    dependencies: new Set(dependencies),
    installSteps: readStringList(table, 'install', fallbackId),
    envSpecs: [...vars, ...secrets]
  };
}

/**
 * Load every `*.toml` component file of a directory, in file-name order
 */
export async function loadComponentsFromDirectory(dir: string): Promise<SetupComponent[]> {
  const files = (await listFiles(dir)).filter(file => extname(file) === FILE_PATTERNS.TOML_FILES);
  const components: SetupComponent[] = [];

  for (const file of files) {
    const content = await readTextFile(join(dir, file));
    components.push(parseComponentDefinition(content, basename(file, FILE_PATTERNS.TOML_FILES)));
  }

  logger.debug(`Loaded ${components.length} setup component(s) from ${dir}`);
  return components;
}

export function getBuiltinCatalogDir(): string {
  return process.env[SETUP_ENV.CATALOG_DIR] || join(getPackageRoot(), 'assets', 'components');
}

export interface LoadCatalogOptions {
  /** Base directory; defaults to the built-in catalog */
  builtinDir?: string;
  /** Additional directories layered on top, later ones winning per id */
  extraDirs?: string[];
}

export async function loadCatalog(options: LoadCatalogOptions = {}): Promise<Catalog> {
  const builtinDir = options.builtinDir ?? getBuiltinCatalogDir();
  let catalog = createCatalog(await loadComponentsFromDirectory(builtinDir));

  for (const dir of options.extraDirs ?? []) {
    if (!(await isDirectory(dir))) {
      throw new ConfigError(`Component catalog directory not found: ${dir}`, { dir });
    }
    const overrides = await loadComponentsFromDirectory(dir);
    for (const component of overrides) {
      if (catalog.has(component.id)) {
        logger.debug(`Component '${component.id}' from ${dir} replaces an earlier definition`);
      }
    }
    catalog = overlayCatalog(catalog, createCatalog(overrides).values());
  }

  return catalog;
}
