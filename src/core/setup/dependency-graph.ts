/**
 * Install-order resolution for setup components.
 *
 * `build` validates the whole catalog in one pass. `resolve` collects the
 * transitive closure of the requested components with an explicit-stack
 * depth-first walk (tri-state markers, cycles reported as a full path), then
 * orders the closure with Kahn's algorithm: ready components are processed
 * first-in first-out and every newly ready batch is sorted ascending, so the
 * output never depends on catalog iteration order.
 */

import type { Catalog, ComponentId, ResolvedOrder } from '../../types/index.js';
import {
  CircularDependencyError,
  ComponentNotFoundError,
  InvalidComponentMetadataError
} from '../../utils/errors.js';
import { isValidComponentId, isValidEnvName, validateComponentId } from '../../utils/component-id.js';

export type VisitState = 'unvisited' | 'in-progress' | 'done';

export interface ClosureResult {
  /** Closure members in depth-first postorder */
  components: ComponentId[];
  /** Final marker of every catalog id after the walk */
  states: ReadonlyMap<ComponentId, VisitState>;
}

interface TraversalFrame {
  id: ComponentId;
  deps: readonly ComponentId[];
  next: number;
}

interface EnvOwner {
  component: ComponentId;
  secret: boolean;
}

function byId(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export class DependencyGraph {
  private readonly edges: ReadonlyMap<ComponentId, readonly ComponentId[]>;

  private constructor(edges: ReadonlyMap<ComponentId, readonly ComponentId[]>) {
    this.edges = edges;
  }

  /**
   * Validate a catalog and capture its dependency edges.
   *
   * @throws InvalidComponentMetadataError for bad ids, self-dependencies,
   *   bad or duplicate env names, or env names whose secrecy differs between components
   * @throws ComponentNotFoundError for a dependency missing from the catalog
   */
  static build(catalog: Catalog): DependencyGraph {
    const ids = [...catalog.keys()].sort(byId);
    const envOwners = new Map<string, EnvOwner>();
    const edges = new Map<ComponentId, readonly ComponentId[]>();

    for (const key of ids) {
      const component = catalog.get(key);
      if (!component) {
        continue;
      }

      if (component.id.length === 0) {
        throw new InvalidComponentMetadataError(key, 'component id must not be empty');
      }
      if (!isValidComponentId(component.id)) {
        throw new InvalidComponentMetadataError(key, `invalid component id '${component.id}'`);
      }
      if (component.id !== key) {
        throw new InvalidComponentMetadataError(key, `catalog key does not match component id '${component.id}'`);
      }

      const deps = [...component.dependencies].sort(byId);
      for (const dep of deps) {
        if (dep === component.id) {
          throw new InvalidComponentMetadataError(component.id, 'component cannot depend on itself');
        }
        if (!isValidComponentId(dep)) {
          throw new InvalidComponentMetadataError(component.id, `invalid dependency id '${dep}'`);
        }
        if (!catalog.has(dep)) {
          throw new ComponentNotFoundError(dep, ids);
        }
      }

      const declared = new Set<string>();
      for (const spec of component.envSpecs) {
        if (!isValidEnvName(spec.name)) {
          throw new InvalidComponentMetadataError(component.id, `invalid environment variable name '${spec.name}'`);
        }
        if (declared.has(spec.name)) {
          throw new InvalidComponentMetadataError(component.id, `duplicate environment variable '${spec.name}'`);
        }
        declared.add(spec.name);

        const owner = envOwners.get(spec.name);
        if (owner && owner.secret !== spec.secret) {
          throw new InvalidComponentMetadataError(
            component.id,
            `environment variable '${spec.name}' is ${spec.secret ? 'secret' : 'plain'} here but ${owner.secret ? 'secret' : 'plain'} in '${owner.component}'`
          );
        }
        if (!owner) {
          envOwners.set(spec.name, { component: component.id, secret: spec.secret });
        }
      }

      edges.set(component.id, deps);
    }

    return new DependencyGraph(edges);
  }

  /** All component ids, ascending */
  get ids(): ComponentId[] {
    return [...this.edges.keys()];
  }

  has(id: string): boolean {
    return this.edges.has(id);
  }

  /** Direct dependencies of a component, ascending */
  dependenciesOf(id: ComponentId): readonly ComponentId[] {
    const deps = this.edges.get(id);
    if (!deps) {
      throw new ComponentNotFoundError(id, this.ids);
    }
    return deps;
  }

  /** Components that directly depend on `id`, ascending */
  dependentsOf(id: ComponentId): ComponentId[] {
    this.dependenciesOf(id);
    return this.ids.filter(candidate => this.dependenciesOf(candidate).includes(id));
  }

  /**
   * Transitive closure of the selected components.
   *
   * Roots are visited in ascending order, and each component's dependencies
   * in ascending order before the component itself is emitted.
   */
  collectClosure(selected: Iterable<string>): ClosureResult {
    const roots = this.validateSelection(selected);
    const states = new Map<ComponentId, VisitState>(this.ids.map(id => [id, 'unvisited']));
    const components: ComponentId[] = [];
    const stack: TraversalFrame[] = [];

    for (const root of roots) {
      if (states.get(root) === 'done') {
        continue;
      }
      states.set(root, 'in-progress');
      stack.push({ id: root, deps: this.dependenciesOf(root), next: 0 });

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];

        if (frame.next < frame.deps.length) {
          const dep = frame.deps[frame.next];
          frame.next += 1;

          const state = states.get(dep);
          if (state === 'in-progress') {
            const start = stack.findIndex(entry => entry.id === dep);
            throw new CircularDependencyError([...stack.slice(start).map(entry => entry.id), dep]);
          }
          if (state === 'done') {
            continue;
          }
          states.set(dep, 'in-progress');
          stack.push({ id: dep, deps: this.dependenciesOf(dep), next: 0 });
          continue;
        }

        stack.pop();
        states.set(frame.id, 'done');
        components.push(frame.id);
      }
    }

    return { components, states };
  }

  /**
   * Install order for the selected components and everything they depend on.
   *
   * @throws InvalidComponentIdError for a malformed requested id
   * @throws ComponentNotFoundError for a requested id missing from the catalog
   * @throws CircularDependencyError with the cycle path, e.g. ["a", "b", "c", "a"]
   */
  resolve(selected: Iterable<string>): ResolvedOrder {
    const { components } = this.collectClosure(selected);
    const members = [...components].sort(byId);

    const inDegree = new Map<ComponentId, number>();
    const dependents = new Map<ComponentId, ComponentId[]>();
    for (const id of members) {
      inDegree.set(id, 0);
      dependents.set(id, []);
    }
    for (const id of members) {
      for (const dep of this.dependenciesOf(id)) {
        inDegree.set(id, (inDegree.get(id) ?? 0) + 1);
        dependents.get(dep)?.push(id);
      }
    }

    const queue = members.filter(id => inDegree.get(id) === 0);
    const order: ComponentId[] = [];

    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      order.push(current);

      const ready: ComponentId[] = [];
      for (const dependent of dependents.get(current) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
      queue.push(...ready.sort(byId));
    }

    return order;
  }

  private validateSelection(selected: Iterable<string>): ComponentId[] {
    const roots = new Set<ComponentId>();
    for (const name of selected) {
      const id = validateComponentId(name);
      if (!this.edges.has(id)) {
        throw new ComponentNotFoundError(id, this.ids);
      }
      roots.add(id);
    }
    return [...roots].sort(byId);
  }
}

/**
 * Build the graph for `catalog` and resolve `selected` against it
 */
export function resolveInstallOrder(catalog: Catalog, selected: Iterable<string>): ResolvedOrder {
  return DependencyGraph.build(catalog).resolve(selected);
}
