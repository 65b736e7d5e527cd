import type { Catalog, ComponentDetail, ComponentSummary, SetupComponent } from '../../types/index.js';
import { ComponentNotFoundError, InvalidComponentMetadataError } from '../../utils/errors.js';

/**
 * Freeze a list of components into a catalog keyed by id, ascending.
 */
export function createCatalog(components: Iterable<SetupComponent>): Catalog {
  const list = [...components];
  const seen = new Set<string>();
  for (const component of list) {
    if (seen.has(component.id)) {
      throw new InvalidComponentMetadataError(component.id, 'component id is declared more than once');
    }
    seen.add(component.id);
  }

  list.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return new Map(list.map(component => [component.id, component]));
}

/**
 * Replace or add components by id; later layers win.
 */
export function overlayCatalog(base: Catalog, overrides: Iterable<SetupComponent>): Catalog {
  const merged = new Map(base);
  for (const component of overrides) {
    merged.set(component.id, component);
  }
  return createCatalog(merged.values());
}

export function listComponents(catalog: Catalog): ComponentSummary[] {
  return [...catalog.values()].map(component => ({
    id: component.id,
    displayName: component.displayName,
    description: component.description
  }));
}

export function describeComponent(catalog: Catalog, id: string): ComponentDetail {
  const component = catalog.get(id);
  if (!component) {
    throw new ComponentNotFoundError(id, catalog.keys());
  }

  return {
    id: component.id,
    displayName: component.displayName,
    description: component.description,
    dependencies: [...component.dependencies].sort(),
    installSteps: [...component.installSteps],
    envSpecs: component.envSpecs.map(spec => ({ ...spec }))
  };
}
