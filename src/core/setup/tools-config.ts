import * as yaml from 'js-yaml';
import { ConfigError, ValidationError } from '../../utils/errors.js';

/**
 * Parsed `.setup/tools.yml`
 */
export interface ToolsConfig {
  /** Requested component ids */
  tools: string[];
  /** Extra component directory, relative to the workspace root */
  catalog?: string;
}

export const TOOLS_YML_TEMPLATE = `# setupkit configuration
# List the components you want to install (see \`setupkit setup list\`)

tools:
  # - git
  # - just
  # - uv

# Optional directory of extra component definitions (<id>.toml), relative to the workspace root
# catalog: ./setup-components
`;

function loadToolsDocument(content: string): object {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse tools.yml: ${error instanceof Error ? error.message : String(error)}`, { error });
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ValidationError("tools.yml must be a mapping with a 'tools' list");
  }
  return parsed;
}

function readCatalogSetting(document: object): string | undefined {
  const catalog: unknown = 'catalog' in document ? document.catalog : undefined;
  if (catalog === undefined || catalog === null) {
    return undefined;
  }
  if (typeof catalog !== 'string' || catalog.trim().length === 0) {
    throw new ValidationError("'catalog' in tools.yml must be a directory path");
  }
  return catalog;
}

/**
 * Parse and validate tools.yml content
 */
export function parseToolsConfig(content: string): ToolsConfig {
  const parsed = loadToolsDocument(content);

  const tools: unknown = 'tools' in parsed ? parsed.tools : undefined;
  if (tools === null || tools === undefined || (Array.isArray(tools) && tools.length === 0)) {
    throw new ValidationError("No tools specified in tools.yml. Add tools to the 'tools' list.");
  }
  if (!Array.isArray(tools) || !tools.every((tool): tool is string => typeof tool === 'string')) {
    throw new ValidationError("'tools' in tools.yml must be a list of component names");
  }

  const config: ToolsConfig = { tools };
  const catalog = readCatalogSetting(parsed);
  if (catalog !== undefined) {
    config.catalog = catalog;
  }
  return config;
}

/**
 * Read only the `catalog` directory of tools.yml; an empty tools list is fine here
 */
export function parseToolsCatalogDir(content: string): string | undefined {
  return readCatalogSetting(loadToolsDocument(content));
}
