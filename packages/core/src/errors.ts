// packages/core/src/errors.ts
// Error taxonomy shared by the engine, the backends and the HTTP surface.

export type EngineErrorCode =
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'GENERATION'
  | 'BACKEND_QUERY'
  | 'SYNTHESIS'
  | 'TRACE';

export interface EngineErrorOptions {
  cause?: unknown;
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options: EngineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'EngineError';
    this.code = code;
  }
}

/** Missing backend, missing dialect prompt, bad template, wrong driver. Never retried. */
export class ConfigurationError extends EngineError {
  constructor(message: string, options?: EngineErrorOptions) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, options?: EngineErrorOptions) {
    super('VALIDATION', message, options);
    this.name = 'ValidationError';
  }
}

export class GenerationError extends EngineError {
  constructor(message: string, options?: EngineErrorOptions) {
    super('GENERATION', message, options);
    this.name = 'GenerationError';
  }
}

export class UnsupportedPromptKindError extends GenerationError {
  readonly promptKind: string;

  constructor(promptKind: string, model: string) {
    super(`${model} does not support prompt kind '${promptKind}'`);
    this.name = 'UnsupportedPromptKindError';
    this.promptKind = promptKind;
  }
}

/** The backend rejected or failed to run a query, or failed to describe its schema. */
export class BackendQueryError extends EngineError {
  constructor(message: string, options?: EngineErrorOptions) {
    super('BACKEND_QUERY', message, options);
    this.name = 'BackendQueryError';
  }
}

export class SynthesisError extends EngineError {
  constructor(message: string, options?: EngineErrorOptions) {
    super('SYNTHESIS', message, options);
    this.name = 'SynthesisError';
  }
}

export class TraceError extends EngineError {
  constructor(message: string) {
    super('TRACE', message);
    this.name = 'TraceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
