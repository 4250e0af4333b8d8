/**
 * Error thrown when a configuration file does not match its schema
 */
export class ConfigValidationError extends Error {
  public readonly source: string;
  public readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid configuration in ${source}: ${errors.join("; ")}`);
    this.name = "ConfigValidationError";
    this.source = source;
    this.errors = errors;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
