export class PipelineError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

export class ResolveError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "RESOLVE_ERROR", retryable: false, cause });
  }
}

export class LoadError extends PipelineError {
  constructor(message: string, cause?: unknown, retryable = false) {
    super(message, { code: "LOAD_ERROR", retryable, cause });
  }
}

export class SchemaError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "SCHEMA_ERROR", retryable: false, cause });
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", retryable: false, cause });
  }
}

/** Loader and schema failures mean the caller has no table to show. */
export function isDataUnavailable(error: unknown): error is PipelineError {
  return (
    error instanceof ResolveError || error instanceof LoadError || error instanceof SchemaError
  );
}
