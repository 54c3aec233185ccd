/**
 * Error types
 *
 * Expected conditions (unknown input ids, missing option actions, empty
 * menus) are not errors and never reach these classes.
 */

/**
 * The display environment cannot do what was asked (mode cannot be set,
 * terminal unavailable). Fatal: nothing retries it.
 */
export class DisplayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DisplayError';
  }
}

/**
 * A configuration file exists but cannot be read or parsed
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'ConfigError';
    this.path = path;
  }
}
