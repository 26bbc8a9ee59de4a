export type PubkitErrorCode =
  | "CONFIGURATION"
  | "DISCOVERY"
  | "VALIDATION"
  | "PLUGIN"
  | "ABORTED";

export class PubkitError extends Error {
  readonly code: PubkitErrorCode;

  constructor(code: PubkitErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PubkitError";
    this.code = code;
  }
}

/** Invalid plugin path, settings file or config value. Raised to the caller immediately. */
export class ConfigurationError extends PubkitError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

/** A malformed plugin definition. Recorded by discovery, never thrown out of it. */
export class DiscoveryError extends PubkitError {
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super("DISCOVERY", message, options);
    this.name = "DiscoveryError";
    this.file = file;
  }
}

/** Raised by plugins when an instance does not meet their criteria. */
export class ValidationError extends PubkitError {
  constructor(message: string, options?: ErrorOptions) {
    super("VALIDATION", message, options);
    this.name = "ValidationError";
  }
}

export class PluginError extends PubkitError {
  constructor(message: string, options?: ErrorOptions) {
    super("PLUGIN", message, options);
    this.name = "PluginError";
  }
}

/** A yielded failure escalated by the caller into a pipeline abort. */
export class PipelineAbortedError extends PubkitError {
  constructor(message: string, cause: Error) {
    super("ABORTED", message, { cause });
    this.name = "PipelineAbortedError";
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new PluginError(`Non-error value thrown: ${String(value)}`, { cause: value });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
