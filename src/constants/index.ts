/**
 * Shared constants for the setupkit CLI application
 * Single source of truth for directory names, file names and environment variables.
 */

export const DIR_PATTERNS = {
  SETUP: '.setup'
} as const;

export const FILE_PATTERNS = {
  TOML_FILES: '.toml',
  TOOLS_YML: 'tools.yml',
  INSTALL_SH: 'install.sh',
  VARS_TOML: 'vars.toml',
  SECRETS_TOML: 'secrets.toml',
  GITIGNORE: '.gitignore'
} as const;

export const SETUP_ENV = {
  VERBOSE: 'SETUPKIT_VERBOSE',
  CATALOG_DIR: 'SETUPKIT_CATALOG_DIR'
} as const;

/** Mode for the generated install script */
export const EXECUTABLE_MODE = 0o755;

/** Mode for the secret env document */
export const SECRET_FILE_MODE = 0o600;
