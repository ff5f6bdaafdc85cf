/**
 * Raised when a visualizer or layout configuration cannot be used.
 * Not recoverable mid-run: fix the configuration and build a new engine.
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "ConfigurationError";
    this.field = field;
  }
}
