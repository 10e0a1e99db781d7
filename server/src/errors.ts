/** Base class for every failure the pipeline reports as a job error. */
export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Aggregated pre-flight issues, reported before any stage executes. */
export class ValidationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Validation failed: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** An external service call failed or returned unusable output. */
export class CollaboratorFailure extends PipelineError {
  readonly service: string;

  constructor(service: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.service = service;
  }
}

/** Structured output from the dialogue service could not be decoded. */
export class ParseError extends PipelineError {}

/** A file or artifact the pipeline depends on is missing or unusable. */
export class ResourceError extends PipelineError {}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

/** HTTP status carried by SDK and fetch errors, if any. */
export function errorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  for (const key of ['status', 'statusCode', 'httpCode'] as const) {
    const value: unknown = Reflect.get(err, key);
    if (typeof value === 'number') return value;
  }
  return undefined;
}
