/**
 * Filesystem side of the setup commands.
 *
 * Generation is all-or-nothing: every artifact is rendered in memory before
 * the first write, so a failure in any step leaves the workspace untouched.
 */

import { join, resolve } from 'path';
import type { ComponentDetail, ComponentSummary, ResolvedOrder } from '../../types/index.js';
import { DIR_PATTERNS, EXECUTABLE_MODE, FILE_PATTERNS, SECRET_FILE_MODE } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { ensureDir, exists, readTextFile, readTextFileIfExists, writeTextFile, writeTextFileIfChanged } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { describeComponent, listComponents } from './catalog.js';
import { loadCatalog, type LoadCatalogOptions } from './catalog-loader.js';
import { DependencyGraph } from './dependency-graph.js';
import { mergeEnvDocuments } from './env-merger.js';
import { generateInstallScript } from './install-script.js';
import { TOOLS_YML_TEMPLATE, parseToolsCatalogDir, parseToolsConfig } from './tools-config.js';

const GITIGNORE_CONTENT = `# Secret values never belong in version control
${FILE_PATTERNS.SECRETS_TOML}
`;

export interface SetupPaths {
  dir: string;
  toolsYml: string;
  installSh: string;
  varsToml: string;
  secretsToml: string;
  gitignore: string;
}

export function getSetupPaths(cwd: string): SetupPaths {
  const dir = join(cwd, DIR_PATTERNS.SETUP);
  return {
    dir,
    toolsYml: join(dir, FILE_PATTERNS.TOOLS_YML),
    installSh: join(dir, FILE_PATTERNS.INSTALL_SH),
    varsToml: join(dir, FILE_PATTERNS.VARS_TOML),
    secretsToml: join(dir, FILE_PATTERNS.SECRETS_TOML),
    gitignore: join(dir, FILE_PATTERNS.GITIGNORE)
  };
}

/**
 * Create `.setup/` with a tools.yml template and a .gitignore for secrets
 */
export async function runSetupInit(cwd: string): Promise<SetupPaths> {
  const paths = getSetupPaths(cwd);
  if (await exists(paths.dir)) {
    throw new ConfigError(`Setup already initialized: ${paths.dir}`, { dir: paths.dir });
  }

  await ensureDir(paths.dir);
  await writeTextFile(paths.toolsYml, TOOLS_YML_TEMPLATE);
  await writeTextFile(paths.gitignore, GITIGNORE_CONTENT);
  logger.debug(`Initialized setup directory at ${paths.dir}`);
  return paths;
}

export interface SetupListOptions {
  detail?: string;
  /** Overrides the built-in catalog directory */
  builtinCatalogDir?: string;
}

export type SetupListResult =
  | { kind: 'summary'; components: ComponentSummary[] }
  | { kind: 'detail'; component: ComponentDetail };

function workspaceCatalogOptions(cwd: string, catalogDir: string | undefined, builtinDir: string | undefined): LoadCatalogOptions {
  return {
    builtinDir,
    extraDirs: catalogDir ? [resolve(cwd, catalogDir)] : []
  };
}

/**
 * List the catalog `setup gen` would use: the built-in components plus the
 * `catalog` directory named in tools.yml, when the workspace has one.
 */
export async function runSetupList(cwd: string, options: SetupListOptions = {}): Promise<SetupListResult> {
  const toolsYml = await readTextFileIfExists(getSetupPaths(cwd).toolsYml);
  const catalogDir = toolsYml !== undefined ? parseToolsCatalogDir(toolsYml) : undefined;
  const catalog = await loadCatalog(workspaceCatalogOptions(cwd, catalogDir, options.builtinCatalogDir));

  if (options.detail !== undefined) {
    return { kind: 'detail', component: describeComponent(catalog, options.detail) };
  }
  return { kind: 'summary', components: listComponents(catalog) };
}

export interface SetupGenerateOptions {
  /** Overrides the built-in catalog directory */
  builtinCatalogDir?: string;
}

export interface SetupGenerateResult {
  order: ResolvedOrder;
  written: string[];
  unchanged: string[];
  misplaced: string[];
}

/**
 * Resolve tools.yml and (re)generate install.sh, vars.toml and secrets.toml
 */
export async function runSetupGenerate(cwd: string, options: SetupGenerateOptions = {}): Promise<SetupGenerateResult> {
  const paths = getSetupPaths(cwd);
  if (!(await exists(paths.dir))) {
    throw new ConfigError("Setup not initialized. Run 'setupkit setup init' first.", { dir: paths.dir });
  }
  if (!(await exists(paths.toolsYml))) {
    throw new ConfigError(`Setup config file (${FILE_PATTERNS.TOOLS_YML}) not found`, { path: paths.toolsYml });
  }

  const config = parseToolsConfig(await readTextFile(paths.toolsYml));
  const catalog = await loadCatalog(workspaceCatalogOptions(cwd, config.catalog, options.builtinCatalogDir));

  const order = DependencyGraph.build(catalog).resolve(config.tools);
  logger.debug(`Resolved install order: ${order.join(', ')}`);

  const script = generateInstallScript(order, catalog);
  const env = mergeEnvDocuments(
    order,
    catalog,
    await readTextFileIfExists(paths.varsToml),
    await readTextFileIfExists(paths.secretsToml)
  );

  for (const name of env.misplaced) {
    logger.warn(`Environment variable '${name}' is stored in the other env document; its value was left in place`);
  }

  const outputs: Array<{ path: string; content: string; mode?: number }> = [
    { path: paths.installSh, content: script, mode: EXECUTABLE_MODE },
    { path: paths.varsToml, content: env.plain },
    { path: paths.secretsToml, content: env.secret, mode: SECRET_FILE_MODE }
  ];

  const written: string[] = [];
  const unchanged: string[] = [];
  for (const output of outputs) {
    const changed = await writeTextFileIfChanged(output.path, output.content, output.mode);
    (changed ? written : unchanged).push(output.path);
  }

  return { order, written, unchanged, misplaced: env.misplaced };
}
