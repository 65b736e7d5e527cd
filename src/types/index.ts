/**
 * Common types and interfaces for the setupkit CLI application
 */

export * from './setup.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class SetupkitError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'SetupkitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  COMPONENT_NOT_FOUND = 'COMPONENT_NOT_FOUND',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  INVALID_COMPONENT_METADATA = 'INVALID_COMPONENT_METADATA',
  MALFORMED_ENV_TOML = 'MALFORMED_ENV_TOML',
  INVALID_COMPONENT_ID = 'INVALID_COMPONENT_ID',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
