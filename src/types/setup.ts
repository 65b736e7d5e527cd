/**
 * Setup component model.
 *
 * A catalog is loaded once per invocation and never mutated; every operation
 * receives it as an argument.
 */

/** Validated component identifier (see utils/component-id.ts) */
export type ComponentId = string;

/**
 * Environment variable a component needs at runtime
 */
export interface EnvSpec {
  name: string;
  /** Routes the variable to the secret document instead of the plain one */
  secret: boolean;
  description: string;
  default?: string;
}

export interface SetupComponent {
  id: ComponentId;
  displayName: string;
  description: string;
  dependencies: ReadonlySet<ComponentId>;
  /** Shell commands, emitted verbatim in declared order */
  installSteps: readonly string[];
  envSpecs: readonly EnvSpec[];
}

export type Catalog = ReadonlyMap<ComponentId, SetupComponent>;

/**
 * Component ids in install order: every dependency precedes its dependents
 * and each component appears exactly once.
 */
export type ResolvedOrder = readonly ComponentId[];

export interface EnvArtifacts {
  plain: string;
  secret: string;
  /**
   * Names declared by a component but currently stored in the opposite
   * document. Their values are left where they are.
   */
  misplaced: string[];
}

export interface ComponentSummary {
  id: ComponentId;
  displayName: string;
  description: string;
}

export interface ComponentDetail extends ComponentSummary {
  dependencies: ComponentId[];
  installSteps: string[];
  envSpecs: EnvSpec[];
}
