/* tests/helpers.ts */
// In-process stand-ins for the capabilities the engine is wired with.
import type {
  CompletionModel,
  EvidenceUnit,
  GraphBackend,
  MaybePromise,
  PromptTemplate,
  PromptVariables,
  ResponseSynthesizer,
} from '@kgq/core';

export const ACTOR_SCHEMA = [
  'Node properties:',
  'Actor {name}',
  'Movie {title}',
  'Relationships:',
  '(:Actor)-[:ACTED_IN]->(:Movie)',
].join('\n');

export const ACTOR_QUERY = "MATCH (a:Actor)-[:ACTED_IN]->(m:Movie {title: 'Film1'}) RETURN a.name";
export const ACTOR_RESULT = '[{"a.name":"Actor1"}]';

export interface FixtureGraphBackendOptions {
  kind?: string;
  schema?: string | (() => string);
  result?: string;
  queryError?: Error;
  schemaError?: Error;
  /** Answer through promises instead of inline. */
  async?: boolean;
}

export class FixtureGraphBackend implements GraphBackend {
  readonly kind: string;
  readonly schemaCalls: boolean[] = [];
  readonly queries: string[] = [];
  closed = false;
  private readonly opts: FixtureGraphBackendOptions;

  constructor(opts: FixtureGraphBackendOptions = {}) {
    this.kind = opts.kind ?? 'neo4j';
    this.opts = opts;
  }

  getSchema(refresh = false): MaybePromise<string> {
    this.schemaCalls.push(refresh);
    return this.answer(() => {
      if (this.opts.schemaError) throw this.opts.schemaError;
      const s = this.opts.schema ?? ACTOR_SCHEMA;
      return typeof s === 'function' ? s() : s;
    });
  }

  query(text: string): MaybePromise<string> {
    this.queries.push(text);
    return this.answer(() => {
      if (this.opts.queryError) throw this.opts.queryError;
      return this.opts.result ?? ACTOR_RESULT;
    });
  }

  async health() {
    return { ok: true, details: { fixture: true } };
  }

  async close() {
    this.closed = true;
  }

  private answer(fn: () => string): MaybePromise<string> {
    if (!this.opts.async) return fn();
    return new Promise<string>((resolve) => resolve(fn()));
  }
}

export interface PredictCall {
  kind: string;
  variables: PromptVariables;
  prompt: string;
  async: boolean;
}

export interface FixtureCompletionModelOptions {
  query?: string;
  answer?: string;
  generationError?: Error;
}

/** Writes `query` for graph-query prompts and `answer` for everything else. */
export class FixtureCompletionModel implements CompletionModel {
  readonly name = 'fixture';
  readonly calls: PredictCall[] = [];

  constructor(private readonly opts: FixtureCompletionModelOptions = {}) {}

  predict(prompt: PromptTemplate, variables: PromptVariables): string {
    return this.respond(prompt, variables, false);
  }

  async apredict(prompt: PromptTemplate, variables: PromptVariables): Promise<string> {
    return this.respond(prompt, variables, true);
  }

  private respond(prompt: PromptTemplate, variables: PromptVariables, isAsync: boolean): string {
    this.calls.push({ kind: prompt.kind, variables, prompt: prompt.format(variables), async: isAsync });
    if (prompt.kind === 'text_to_graph_query') {
      if (this.opts.generationError) throw this.opts.generationError;
      return this.opts.query ?? ACTOR_QUERY;
    }
    return this.opts.answer ?? 'The actor is Actor1.';
  }
}

export class FixtureSynthesizer implements ResponseSynthesizer {
  readonly seen: Array<readonly EvidenceUnit[]> = [];

  constructor(private readonly answer = 'synthesized', private readonly error?: Error) {}

  synthesize(_question: string, evidence: readonly EvidenceUnit[]): string {
    this.seen.push(evidence);
    if (this.error) throw this.error;
    return this.answer;
  }

  async asynthesize(question: string, evidence: readonly EvidenceUnit[]): Promise<string> {
    return this.synthesize(question, evidence);
  }
}

/** span-1, span-2, ... */
export function sequentialIds(prefix = 'span'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
