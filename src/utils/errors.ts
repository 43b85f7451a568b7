/**
 * Error types for the deployment engine
 *
 * Each class maps to a distinct process exit code so callers can tell
 * failures apart.
 */

/**
 * Base error class for deployment errors
 */
export class QuadletError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "QuadletError";
  }
}

/**
 * Source directory structure violation (no files touched)
 */
export class LayoutError extends QuadletError {
  override readonly exitCode = 2;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LayoutError";
  }
}

/**
 * Template rendering failure
 */
export class TemplateError extends QuadletError {
  override readonly exitCode = 3;
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super(`${file}: ${message}`, options);
    this.name = "TemplateError";
    this.file = file;
  }
}

/**
 * Malformed unit descriptor
 */
export class PreprocessError extends QuadletError {
  override readonly exitCode = 4;
  readonly file: string;
  readonly line?: number;

  constructor(file: string, message: string, options?: ErrorOptions & { line?: number }) {
    const location = options?.line !== undefined ? `${file}:${options.line}` : file;
    super(`${location}: ${message}`, options);
    this.name = "PreprocessError";
    this.file = file;
    if (options?.line !== undefined) {
      this.line = options.line;
    }
  }
}

/**
 * Dependency graph cannot be ordered
 */
export class DependencyError extends QuadletError {
  override readonly exitCode = 5;
  readonly services: string[];

  constructor(message: string, options?: ErrorOptions & { services?: string[] }) {
    super(message, options);
    this.name = "DependencyError";
    this.services = options?.services ?? [];
  }
}

/**
 * Supervisor call failed or timed out
 */
export class ServiceError extends QuadletError {
  override readonly exitCode = 6;
  readonly command: string;

  constructor(command: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ServiceError";
    this.command = command;
  }
}

/**
 * Secret store lookup error
 */
export class SecretError extends QuadletError {
  override readonly exitCode = 7;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SecretError";
  }
}

/**
 * Invalid invocation parameters
 */
export class ConfigError extends QuadletError {
  override readonly exitCode = 8;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}
