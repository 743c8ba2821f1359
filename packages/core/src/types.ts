// packages/core/src/types.ts
import type { PromptTemplate, PromptVariables } from './prompts';

// --------------------
// Backends
// --------------------
export const GRAPH_BACKEND_KINDS = ['nebula', 'neo4j', 'mongodb', 'mysql'] as const;

export type GraphBackendKind = typeof GRAPH_BACKEND_KINDS[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(GRAPH_BACKEND_KINDS);

export function isGraphBackendKind(value: unknown): value is GraphBackendKind {
  return typeof value === 'string' && KNOWN_KINDS.has(value);
}

// Capabilities may answer immediately or later; the engine's drivers decide
// which of the two they accept.
export type MaybePromise<T> = T | PromiseLike<T>;

export function isPromiseLike<T>(value: MaybePromise<T>): value is PromiseLike<T> {
  return typeof value === 'object'
    && value !== null
    && 'then' in value
    && typeof value.then === 'function';
}

export interface BackendHealth {
  ok: boolean;
  details?: Record<string, unknown>;
}

/**
 * A graph store the engine can describe to the model and run generated
 * queries against. Results are opaque text. `kind` is checked against the
 * dialect registry when an engine is built.
 *
 * `query` may return a promise or a plain string. The asynchronous entry
 * point awaits either form; a backend that answers synchronously therefore
 * runs inline on the event loop, and only such a backend can serve the
 * synchronous entry point. A synchronous call that gets a promise back refuses
 * it, but by then the query has been sent and will still run.
 */
export interface GraphBackend {
  readonly kind: string;
  getSchema(refresh?: boolean): MaybePromise<string>;
  query(text: string): MaybePromise<string>;
  health?(): Promise<BackendHealth>;
  close?(): Promise<void>;
}

// --------------------
// Language model
// --------------------
export interface CompletionModel {
  readonly name: string;
  predict(prompt: PromptTemplate, variables: PromptVariables): string;
  apredict(prompt: PromptTemplate, variables: PromptVariables): Promise<string>;
}

// --------------------
// Evidence + synthesis
// --------------------
export const FULL_CONFIDENCE = 1.0;

export interface EvidenceMetadata {
  originalQuestion: string;
  generatedQuery: string;
  backendResult: string;
  schemaSnapshot: string;
}

export interface EvidenceUnit {
  readonly text: string;
  readonly score: number;
  readonly metadata: Readonly<EvidenceMetadata>;
}

export interface ResponseSynthesizer {
  synthesize(question: string, evidence: readonly EvidenceUnit[]): string;
  asynthesize(question: string, evidence: readonly EvidenceUnit[]): Promise<string>;
}
