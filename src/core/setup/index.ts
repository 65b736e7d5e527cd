/**
 * Setup core: install-order resolution and artifact generation
 */

export { DependencyGraph, resolveInstallOrder } from './dependency-graph.js';
export type { ClosureResult, VisitState } from './dependency-graph.js';
export { generateInstallScript, INSTALL_SCRIPT_PREAMBLE } from './install-script.js';
export { mergeEnvDocuments, parseEnvDocument, renderEnvHeader } from './env-merger.js';
export { createCatalog, overlayCatalog, listComponents, describeComponent } from './catalog.js';
export { loadCatalog, loadComponentsFromDirectory, parseComponentDefinition } from './catalog-loader.js';
export { parseToolsCatalogDir, parseToolsConfig } from './tools-config.js';
export type { ToolsConfig } from './tools-config.js';
