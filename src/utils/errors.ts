import { SetupkitError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the setupkit CLI
 */

export class ComponentNotFoundError extends SetupkitError {
  readonly componentName: string;
  readonly available: string[];

  constructor(name: string, available: Iterable<string>) {
    const availableList = [...available];
    super(
      `Setup component '${name}' not found. Available: ${availableList.length > 0 ? availableList.join(', ') : '(none)'}`,
      ErrorCodes.COMPONENT_NOT_FOUND,
      { name, available: availableList }
    );
    this.name = 'ComponentNotFoundError';
    this.componentName = name;
    this.available = availableList;
  }
}

export class CircularDependencyError extends SetupkitError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, ErrorCodes.CIRCULAR_DEPENDENCY, { cycle });
    this.name = 'CircularDependencyError';
    this.cycle = cycle;
  }
}

export class InvalidComponentMetadataError extends SetupkitError {
  readonly component: string;
  readonly reason: string;

  constructor(component: string, reason: string) {
    super(
      `Invalid setup component metadata for '${component}': ${reason}`,
      ErrorCodes.INVALID_COMPONENT_METADATA,
      { component, reason }
    );
    this.name = 'InvalidComponentMetadataError';
    this.component = component;
    this.reason = reason;
  }
}

export type EnvDocumentKind = 'plain' | 'secret';

export class MalformedEnvTomlError extends SetupkitError {
  readonly reason: string;
  readonly document: EnvDocumentKind;

  constructor(document: EnvDocumentKind, reason: string) {
    super(`Malformed ${document} environment TOML: ${reason}`, ErrorCodes.MALFORMED_ENV_TOML, { document, reason });
    this.name = 'MalformedEnvTomlError';
    this.reason = reason;
    this.document = document;
  }
}

export class InvalidComponentIdError extends SetupkitError {
  readonly id: string;

  constructor(id: string) {
    super(
      `Invalid setup component identifier '${id}': must be alphanumeric with hyphens, underscores, or periods`,
      ErrorCodes.INVALID_COMPONENT_ID,
      { id }
    );
    this.name = 'InvalidComponentIdError';
    this.id = id;
  }
}

export class FileSystemError extends SetupkitError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends SetupkitError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends SetupkitError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof SetupkitError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(1);
    }
  };
}
