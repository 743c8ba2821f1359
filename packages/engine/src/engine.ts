// packages/engine/src/engine.ts
import {
  ANSWER_PROMPT_VARIABLES,
  BackendQueryError,
  ConfigurationError,
  DEFAULT_KG_RESPONSE_ANSWER_PROMPT,
  EngineError,
  EventTracer,
  GenerationError,
  QUERY_PROMPT_VARIABLES,
  SynthesisError,
  TraceError,
  ValidationError,
  createLogger,
  errorMessage,
  isGraphBackendKind,
  lookupDialectPrompt,
} from '@kgq/core';
import type {
  CompletionModel,
  EventKind,
  EventPayload,
  EvidenceUnit,
  GraphBackend,
  GraphBackendKind,
  Logger,
  PromptTemplate,
  ResponseSynthesizer,
} from '@kgq/core';
import { assembleEvidence } from './evidence';
import { generationStep } from './generation';
import { Step, runAsync, runSync } from './pipeline';
import type { Pipeline, Stage } from './pipeline';
import { CompletionSynthesizer } from './synthesizer';

export interface KnowledgeGraphQueryEngineOptions {
  backend?: GraphBackend;
  llm?: CompletionModel;
  synthesizer?: ResponseSynthesizer;
  tracer?: EventTracer;
  graphQuerySynthesisPrompt?: PromptTemplate;
  graphResponseAnswerPrompt?: PromptTemplate;
  /** Pass `refresh` to the backend on the first schema fetch. */
  refreshSchema?: boolean;
  /** Also log the final answer. */
  verbose?: boolean;
  logger?: Logger;
}

export interface QueryOutcome {
  answer: string;
  evidence: EvidenceUnit;
  queryEventId: string;
}

function requireVariables(prompt: PromptTemplate, names: readonly string[], role: string): void {
  const missing = names.filter((n) => !prompt.variables.includes(n));
  if (missing.length) {
    throw new ConfigurationError(`${role} prompt is missing variables: ${missing.join(', ')}`);
  }
}

function asStageError(stage: Stage, err: unknown): EngineError {
  if (err instanceof ConfigurationError || err instanceof TraceError) return err;
  switch (stage) {
    case 'schema':
      return err instanceof BackendQueryError
        ? err
        : new BackendQueryError(`graph schema introspection failed: ${errorMessage(err)}`, { cause: err });
    case 'generate':
      return err instanceof GenerationError
        ? err
        : new GenerationError(`graph query generation failed: ${errorMessage(err)}`, { cause: err });
    case 'execute':
      return err instanceof BackendQueryError
        ? err
        : new BackendQueryError(`graph query failed: ${errorMessage(err)}`, { cause: err });
    case 'synthesize':
      return err instanceof SynthesisError
        ? err
        : new SynthesisError(`answer synthesis failed: ${errorMessage(err)}`, { cause: err });
  }
}

function* perform<T>(step: Step<T>): Pipeline<T> {
  try {
    yield step;
  } catch (err) {
    throw asStageError(step.stage, err);
  }
  return step.value;
}

function failurePayload(err: unknown): EventPayload {
  return {
    error: {
      code: err instanceof EngineError ? err.code : 'INTERNAL',
      message: errorMessage(err),
    },
  };
}

function checkQuestion(question: string): void {
  if (typeof question !== 'string' || question.trim().length === 0) {
    throw new ValidationError('question must be a non-empty string');
  }
}

/**
 * Answers a natural-language question from a graph store: the model writes a
 * query in the backend's dialect, the backend runs it, and the synthesizer
 * answers from the result. `query` and `aquery` run the same pipeline.
 *
 * Trace: one `query` span per call, with one `retrieve` span nested inside it
 * around backend execution. Both are closed on every path, failures included,
 * before the caller sees the outcome.
 */
export class KnowledgeGraphQueryEngine {
  readonly tracer: EventTracer;
  readonly queryPrompt: PromptTemplate;
  readonly answerPrompt: PromptTemplate;
  readonly kind: GraphBackendKind;

  private readonly backend: GraphBackend;
  private readonly llm: CompletionModel;
  private readonly synthesizer: ResponseSynthesizer;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  private readonly refreshOnFirstFetch: boolean;
  private cachedSchema: string | undefined;

  constructor(opts: KnowledgeGraphQueryEngineOptions) {
    if (!opts.backend) throw new ConfigurationError('a graph backend is required');
    if (!opts.llm) throw new ConfigurationError('a completion model is required');

    const kind = opts.backend.kind;
    if (!isGraphBackendKind(kind)) {
      throw new ConfigurationError(`unsupported graph backend kind '${kind}'`);
    }

    this.kind = kind;
    this.backend = opts.backend;
    this.llm = opts.llm;
    this.queryPrompt = opts.graphQuerySynthesisPrompt ?? lookupDialectPrompt(kind);
    this.answerPrompt = opts.graphResponseAnswerPrompt ?? DEFAULT_KG_RESPONSE_ANSWER_PROMPT;
    requireVariables(this.queryPrompt, QUERY_PROMPT_VARIABLES, 'graph query synthesis');
    requireVariables(this.answerPrompt, ANSWER_PROMPT_VARIABLES, 'graph response answer');

    this.synthesizer = opts.synthesizer ?? new CompletionSynthesizer(opts.llm);
    this.tracer = opts.tracer ?? new EventTracer();
    this.logger = opts.logger ?? createLogger('engine', { backend: kind });
    this.verbose = opts.verbose ?? false;
    this.refreshOnFirstFetch = opts.refreshSchema ?? false;
  }

  /** The cached schema text, if it has been fetched. */
  get schema(): string | undefined {
    return this.cachedSchema;
  }

  query(question: string): string {
    return runSync(this.pipeline(question)).answer;
  }

  async aquery(question: string): Promise<string> {
    const outcome = await runAsync(this.pipeline(question));
    return outcome.answer;
  }

  run(question: string): QueryOutcome {
    return runSync(this.pipeline(question));
  }

  arun(question: string): Promise<QueryOutcome> {
    return runAsync(this.pipeline(question));
  }

  generateQuery(question: string): string {
    return runSync(this.generation(question));
  }

  agenerateQuery(question: string): Promise<string> {
    return runAsync(this.generation(question));
  }

  /** The cached schema, fetched on first use. */
  loadSchema(): Promise<string> {
    return runAsync(this.schemaSnapshot());
  }

  refreshSchemaSync(): string {
    return runSync(this.refresh());
  }

  refreshSchema(): Promise<string> {
    return runAsync(this.refresh());
  }

  private schemaStep(refresh: boolean): Step<string> {
    return new Step('schema', () => this.backend.getSchema(refresh));
  }

  // Each call reads the cached reference once; a later refresh swaps the
  // reference and never touches a snapshot already taken.
  private *schemaSnapshot(): Pipeline<string> {
    const cached = this.cachedSchema;
    if (cached !== undefined) return cached;
    const schema = yield* perform(this.schemaStep(this.refreshOnFirstFetch));
    this.cachedSchema ??= schema;
    return schema;
  }

  private *refresh(): Pipeline<string> {
    const schema = yield* perform(this.schemaStep(true));
    this.cachedSchema = schema;
    this.logger.info({ kind: this.kind, length: schema.length }, 'graph-schema-refreshed');
    return schema;
  }

  private *generation(question: string): Pipeline<string> {
    checkQuestion(question);
    const schema = yield* this.schemaSnapshot();
    return yield* perform(generationStep(this.llm, this.queryPrompt, question, schema));
  }

  private *execute(generatedQuery: string, queryId: string): Pipeline<string> {
    const retrieveId = this.tracer.onEventStart('retrieve', { queryStr: generatedQuery }, queryId);
    let result: string;
    try {
      result = yield* perform(new Step('execute', () => this.backend.query(generatedQuery)));
    } catch (err) {
      this.closeFailed('retrieve', retrieveId, err);
      throw err;
    }
    this.tracer.onEventEnd('retrieve', { response: result }, retrieveId);
    return result;
  }

  // The stage failure is what the caller sees; a handler that fails while
  // the span closes is only logged.
  private closeFailed(kind: EventKind, id: string, err: unknown): void {
    try {
      this.tracer.onEventEnd(kind, failurePayload(err), id);
    } catch (handlerErr) {
      this.logger.warn({ kind, id, err: errorMessage(handlerErr) }, 'span-close-failed');
    }
  }

  private *pipeline(question: string): Pipeline<QueryOutcome> {
    checkQuestion(question);
    const queryId = this.tracer.onEventStart('query', { queryStr: question });

    let answer: string;
    let evidence: EvidenceUnit;
    try {
      const schema = yield* this.schemaSnapshot();
      const generatedQuery = yield* perform(generationStep(this.llm, this.queryPrompt, question, schema));
      this.logger.info({ graphQuery: generatedQuery }, 'graph-store-query');

      const backendResult = yield* this.execute(generatedQuery, queryId);
      this.logger.info({ graphResponse: backendResult }, 'graph-store-response');

      const unit = assembleEvidence(this.answerPrompt, { question, generatedQuery, backendResult, schema });
      evidence = unit;
      answer = yield* perform(new Step(
        'synthesize',
        () => this.synthesizer.synthesize(question, [unit]),
        () => this.synthesizer.asynthesize(question, [unit]),
      ));
    } catch (err) {
      this.closeFailed('query', queryId, err);
      throw err;
    }

    if (this.verbose) this.logger.info({ answer }, 'final-response');
    this.tracer.onEventEnd('query', { response: answer }, queryId);
    return { answer, evidence, queryEventId: queryId };
  }
}
