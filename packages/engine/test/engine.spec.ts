import { describe, it, expect, vi } from 'vitest';
import {
  BackendQueryError,
  ConfigurationError,
  DEFAULT_KG_RESPONSE_ANSWER_PROMPT,
  DIALECT_PROMPTS,
  EventTracer,
  GenerationError,
  PromptTemplate,
  RecordingEventHandler,
  SynthesisError,
  UnsupportedPromptKindError,
  ValidationError,
  createLogger,
} from '@kgq/core';
import type { EventHandler } from '@kgq/core';
import { MockCompletionModel } from '@kgq/llm';
import { KnowledgeGraphQueryEngine } from '@kgq/engine';
import type { KnowledgeGraphQueryEngineOptions } from '@kgq/engine';
import {
  ACTOR_QUERY,
  ACTOR_RESULT,
  ACTOR_SCHEMA,
  FixtureCompletionModel,
  FixtureGraphBackend,
  FixtureSynthesizer,
  sequentialIds,
} from '../../../tests/helpers';

const QUESTION = 'Who acted in Film1?';

function setup(opts: Partial<KnowledgeGraphQueryEngineOptions> = {}) {
  const recorder = new RecordingEventHandler();
  const tracer = new EventTracer({ handlers: [recorder], idFactory: sequentialIds() });
  const backend = opts.backend ?? new FixtureGraphBackend();
  const llm = opts.llm ?? new FixtureCompletionModel();
  const engine = new KnowledgeGraphQueryEngine({ ...opts, backend, llm, tracer });
  return { engine, recorder, tracer, backend, llm };
}

describe('KnowledgeGraphQueryEngine: end to end', () => {
  it('answers from the backend result through the default prompts', () => {
    const backend = new FixtureGraphBackend();
    const llm = new FixtureCompletionModel();
    const { engine } = setup({ backend, llm });

    const outcome = engine.run(QUESTION);

    expect(outcome.answer).toBe('The actor is Actor1.');
    expect(backend.queries).toEqual([ACTOR_QUERY]);
    expect(llm.calls.map((c) => c.kind)).toEqual(['text_to_graph_query', 'question_answer']);
    expect(llm.calls[0]?.variables).toEqual({ query_str: QUESTION, schema: ACTOR_SCHEMA });
    expect(llm.calls[1]?.variables.context_str).toBe(outcome.evidence.text);
  });

  it('builds one evidence unit with full confidence and the pipeline inputs', () => {
    const { engine } = setup();
    const { evidence } = engine.run(QUESTION);

    expect(evidence.score).toBe(1.0);
    expect(evidence.text).toBe(DEFAULT_KG_RESPONSE_ANSWER_PROMPT.format({
      query_str: QUESTION,
      kg_query_str: ACTOR_QUERY,
      kg_response_str: ACTOR_RESULT,
    }));
    expect(evidence.text.endsWith(
      `Original question: ${QUESTION}\nGraph query: ${ACTOR_QUERY}\nGraph response: ${ACTOR_RESULT}\nResponse:\n`,
    )).toBe(true);
    expect(evidence.metadata).toEqual({
      originalQuestion: QUESTION,
      generatedQuery: ACTOR_QUERY,
      backendResult: ACTOR_RESULT,
      schemaSnapshot: ACTOR_SCHEMA,
    });
    expect(Object.isFrozen(evidence)).toBe(true);
    expect(Object.isFrozen(evidence.metadata)).toBe(true);
  });

  it('answers which actor starred in a movie', () => {
    const question = 'Which actor starred in the movie X?';
    const query = "MATCH (a:Actor)-[:ACTED_IN]->(m:Movie {title: 'X'}) RETURN a.name";
    const backend = new FixtureGraphBackend();
    const llm = new FixtureCompletionModel({ query });
    const { engine, tracer } = setup({ backend, llm });

    expect(engine.query(question)).toBe('The actor is Actor1.');
    expect(backend.queries).toEqual([query]);
    expect(llm.calls[1]?.variables.query_str).toBe(question);
    expect(tracer.openSpans()).toEqual([]);
  });

  it('uses the dialect prompt of the backend kind', () => {
    const { engine } = setup({ backend: new FixtureGraphBackend({ kind: 'mysql' }) });
    expect(engine.kind).toBe('mysql');
    expect(engine.queryPrompt).toBe(DIALECT_PROMPTS.mysql);
    expect(engine.answerPrompt).toBe(DEFAULT_KG_RESPONSE_ANSWER_PROMPT);
  });

  it('hands the evidence to a custom synthesizer', async () => {
    const synthesizer = new FixtureSynthesizer('from synthesizer');
    const { engine } = setup({ synthesizer });

    await expect(engine.aquery(QUESTION)).resolves.toBe('from synthesizer');
    expect(synthesizer.seen).toHaveLength(1);
    expect(synthesizer.seen[0]?.[0]?.metadata.generatedQuery).toBe(ACTOR_QUERY);
  });
});

describe('KnowledgeGraphQueryEngine: tracing', () => {
  it('nests the retrieve span under the query span', () => {
    const { engine, recorder, tracer } = setup();
    const outcome = engine.run(QUESTION);

    expect(outcome.queryEventId).toBe('span-1');
    expect(recorder.spans.map((s) => [s.kind, s.id, s.parentId])).toEqual([
      ['retrieve', 'span-2', 'span-1'],
      ['query', 'span-1', undefined],
    ]);
    const [retrieve, query] = recorder.spans;
    expect(retrieve?.startPayload).toEqual({ queryStr: ACTOR_QUERY });
    expect(retrieve?.endPayload).toEqual({ response: ACTOR_RESULT });
    expect(query?.startPayload).toEqual({ queryStr: QUESTION });
    expect(query?.endPayload).toEqual({ response: 'The actor is Actor1.' });
    expect(tracer.openSpans()).toEqual([]);
  });

  it('emits start and end events in nesting order', async () => {
    const { engine, recorder } = setup();
    await engine.aquery(QUESTION);
    expect(recorder.events.map((e) => `${e.phase}:${e.kind}`)).toEqual([
      'start:query',
      'start:retrieve',
      'end:retrieve',
      'end:query',
    ]);
  });

  it('closes both spans with the error when the backend fails', async () => {
    const backend = new FixtureGraphBackend({ queryError: new Error('connection refused') });
    const { engine, recorder, tracer } = setup({ backend });

    const err = await engine.aquery(QUESTION).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BackendQueryError);
    expect(err instanceof BackendQueryError && err.message).toBe('graph query failed: connection refused');
    expect(tracer.openSpans()).toEqual([]);
    const failure = { error: { code: 'BACKEND_QUERY', message: 'graph query failed: connection refused' } };
    expect(recorder.spans.map((s) => s.endPayload)).toEqual([failure, failure]);
  });

  it('keeps the original error as the cause', () => {
    const original = new Error('socket hang up');
    const { engine } = setup({ backend: new FixtureGraphBackend({ queryError: original }) });

    try {
      engine.query(QUESTION);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(BackendQueryError);
      expect(e instanceof Error ? e.cause : undefined).toBe(original);
    }
  });

  it('passes a backend error that is already classified through unchanged', () => {
    const original = new BackendQueryError('syntax error near MATCH');
    const { engine } = setup({ backend: new FixtureGraphBackend({ queryError: original }) });
    expect(() => engine.query(QUESTION)).toThrow(original);
  });

  it('opens no retrieve span when generation fails', () => {
    const llm = new FixtureCompletionModel({ generationError: new Error('rate limited') });
    const backend = new FixtureGraphBackend();
    const { engine, recorder, tracer } = setup({ llm, backend });

    expect(() => engine.query(QUESTION)).toThrow(GenerationError);
    expect(() => engine.query(QUESTION)).toThrow('graph query generation failed: rate limited');
    expect(backend.queries).toEqual([]);
    expect(recorder.spans.map((s) => s.kind)).toEqual(['query', 'query']);
    expect(recorder.spans[0]?.endPayload.error?.code).toBe('GENERATION');
    expect(tracer.openSpans()).toEqual([]);
  });

  it('wraps synthesizer failures after a successful retrieve', async () => {
    const synthesizer = new FixtureSynthesizer('unused', new Error('boom'));
    const { engine, recorder } = setup({ synthesizer });

    await expect(engine.aquery(QUESTION)).rejects.toThrow(SynthesisError);
    expect(recorder.spans.map((s) => [s.kind, s.endPayload.error?.code])).toEqual([
      ['retrieve', undefined],
      ['query', 'SYNTHESIS'],
    ]);
  });

  it('leaves no span open when a handler rejects the retrieve start', () => {
    const failing: EventHandler = {
      onEventStart: (kind) => {
        if (kind === 'retrieve') throw new Error('handler down');
      },
      onEventEnd: () => undefined,
    };
    const recorder = new RecordingEventHandler();
    const tracer = new EventTracer({ handlers: [recorder, failing], idFactory: sequentialIds() });
    const backend = new FixtureGraphBackend();
    const engine = new KnowledgeGraphQueryEngine({ backend, llm: new FixtureCompletionModel(), tracer });

    expect(() => engine.query(QUESTION)).toThrow('handler down');
    expect(tracer.openSpans()).toEqual([]);
    expect(backend.queries).toEqual([]);
    expect(recorder.spans.map((s) => [s.kind, s.endPayload])).toEqual([
      ['query', { error: { code: 'INTERNAL', message: 'handler down' } }],
    ]);
  });

  it('reports the stage failure when a handler fails while a span closes', async () => {
    const failing: EventHandler = {
      onEventStart: () => undefined,
      onEventEnd: (_kind, payload) => {
        if (payload.error) throw new Error('sink full');
      },
    };
    const tracer = new EventTracer({ handlers: [failing], idFactory: sequentialIds() });
    const logger = createLogger('test');
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const backend = new FixtureGraphBackend({ queryError: new BackendQueryError('syntax error') });
    const engine = new KnowledgeGraphQueryEngine({ backend, llm: new FixtureCompletionModel(), tracer, logger });

    const err = await engine.aquery(QUESTION).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(BackendQueryError);
    expect(err instanceof Error && err.message).toBe('syntax error');
    expect(tracer.openSpans()).toEqual([]);
    expect(warn).toHaveBeenNthCalledWith(1, { kind: 'retrieve', id: 'span-2', err: 'sink full' }, 'span-close-failed');
    expect(warn).toHaveBeenNthCalledWith(2, { kind: 'query', id: 'span-1', err: 'sink full' }, 'span-close-failed');
  });

  it('keeps overlapping calls on one tracer apart', async () => {
    const { engine, recorder, tracer } = setup({ backend: new FixtureGraphBackend({ async: true }) });

    const [a, b] = await Promise.all([engine.arun('Who acted in Film1?'), engine.arun('Who acted in Film2?')]);

    expect(recorder.events.slice(0, 2).map((e) => `${e.phase}:${e.kind}:${e.id}`)).toEqual([
      'start:query:span-1',
      'start:query:span-2',
    ]);
    expect([a.queryEventId, b.queryEventId]).toEqual(['span-1', 'span-2']);
    for (const outcome of [a, b]) {
      expect(recorder.spansUnder(outcome.queryEventId).map((s) => [s.kind, s.parentId])).toEqual([
        ['retrieve', outcome.queryEventId],
        ['query', undefined],
      ]);
    }
    expect(a.evidence.metadata.originalQuestion).toBe('Who acted in Film1?');
    expect(b.evidence.metadata.originalQuestion).toBe('Who acted in Film2?');
    expect(recorder.spans).toHaveLength(4);
    expect(tracer.openSpans()).toEqual([]);
  });

  it('rejects questions before opening any span', async () => {
    const { engine, recorder } = setup();
    expect(() => engine.query('   ')).toThrow(ValidationError);
    await expect(engine.aquery('')).rejects.toThrow('question must be a non-empty string');
    expect(recorder.events).toEqual([]);
  });
});

describe('KnowledgeGraphQueryEngine: sync and async entry points', () => {
  it('returns the same outcome from run and arun', async () => {
    const a = setup().engine.run(QUESTION);
    const b = await setup().engine.arun(QUESTION);
    expect(b.answer).toBe(a.answer);
    expect(b.evidence).toEqual(a.evidence);
    expect(b.queryEventId).toBe(a.queryEventId);
  });

  it('emits the same spans and payloads from run and arun', async () => {
    const first = setup();
    first.engine.run(QUESTION);
    const second = setup();
    await second.engine.arun(QUESTION);

    expect(first.recorder.events).toHaveLength(4);
    expect(second.recorder.events).toEqual(first.recorder.events);
  });

  it('emits the same spans on failure from query and aquery', async () => {
    const failing = () => setup({ backend: new FixtureGraphBackend({ queryError: new Error('connection refused') }) });
    const first = failing();
    expect(() => first.engine.query(QUESTION)).toThrow(BackendQueryError);
    const second = failing();
    await expect(second.engine.aquery(QUESTION)).rejects.toThrow(BackendQueryError);

    expect(second.recorder.events).toEqual(first.recorder.events);
  });

  it('uses predict for query and apredict for aquery', async () => {
    const llm = new FixtureCompletionModel();
    const { engine } = setup({ llm });
    engine.query(QUESTION);
    await engine.aquery(QUESTION);
    expect(llm.calls.map((c) => c.async)).toEqual([false, false, true, true]);
  });

  it('serves async backends through aquery', async () => {
    const { engine } = setup({ backend: new FixtureGraphBackend({ async: true }) });
    await expect(engine.aquery(QUESTION)).resolves.toBe('The actor is Actor1.');
  });

  it('refuses an async backend in a synchronous query and closes the span', () => {
    const { engine, tracer, recorder } = setup({ backend: new FixtureGraphBackend({ async: true }) });

    expect(() => engine.query(QUESTION)).toThrow(ConfigurationError);
    expect(tracer.openSpans()).toEqual([]);
    expect(recorder.spans[0]?.endPayload.error?.code).toBe('CONFIGURATION');
  });

  it('has already sent the query when an async backend answer is refused', async () => {
    const backend = new FixtureGraphBackend({ async: true });
    const { engine } = setup({ backend });
    await engine.loadSchema();

    expect(() => engine.query(QUESTION)).toThrow(
      'the execute step answered asynchronously during a synchronous query; use the async entry point',
    );
    expect(backend.queries).toEqual([ACTOR_QUERY]);
  });

  it('generates a query without running it', async () => {
    const backend = new FixtureGraphBackend();
    const { engine, recorder } = setup({ backend });

    expect(engine.generateQuery(QUESTION)).toBe(ACTOR_QUERY);
    await expect(engine.agenerateQuery(QUESTION)).resolves.toBe(ACTOR_QUERY);
    expect(backend.queries).toEqual([]);
    expect(recorder.events).toEqual([]);
  });
});

describe('KnowledgeGraphQueryEngine: schema cache', () => {
  function versioned() {
    let n = 0;
    return new FixtureGraphBackend({ schema: () => `schema v${++n}` });
  }

  it('fetches the schema once and reuses it', () => {
    const backend = new FixtureGraphBackend();
    const { engine } = setup({ backend });
    expect(engine.schema).toBeUndefined();

    engine.query(QUESTION);
    engine.query(QUESTION);

    expect(backend.schemaCalls).toEqual([false]);
    expect(engine.schema).toBe(ACTOR_SCHEMA);
  });

  it('loads the schema without a query', async () => {
    const backend = new FixtureGraphBackend();
    const { engine } = setup({ backend });
    await expect(engine.loadSchema()).resolves.toBe(ACTOR_SCHEMA);
    await engine.loadSchema();
    expect(backend.schemaCalls).toEqual([false]);
  });

  it('asks the backend to refresh on the first fetch when configured', () => {
    const backend = new FixtureGraphBackend();
    setup({ backend, refreshSchema: true }).engine.query(QUESTION);
    expect(backend.schemaCalls).toEqual([true]);
  });

  it('replaces the cached schema on refresh and leaves earlier evidence alone', async () => {
    const backend = versioned();
    const { engine } = setup({ backend });

    const first = await engine.arun(QUESTION);
    await expect(engine.refreshSchema()).resolves.toBe('schema v2');
    const second = engine.run(QUESTION);

    expect(backend.schemaCalls).toEqual([false, true]);
    expect(first.evidence.metadata.schemaSnapshot).toBe('schema v1');
    expect(second.evidence.metadata.schemaSnapshot).toBe('schema v2');
    expect(engine.schema).toBe('schema v2');
    expect(engine.refreshSchemaSync()).toBe('schema v3');
  });

  it('keeps the snapshot of a call that overlaps a refresh', async () => {
    let n = 0;
    const backend = new FixtureGraphBackend({ async: true, schema: () => `schema v${++n}` });
    const { engine } = setup({ backend });

    const pending = engine.arun(QUESTION);
    const refreshed = await engine.refreshSchema();
    const outcome = await pending;

    expect(refreshed).toBe('schema v2');
    expect(outcome.evidence.metadata.schemaSnapshot).toBe('schema v1');
    expect(engine.schema).toBe('schema v2');
  });

  it('wraps introspection failures as backend errors', () => {
    const backend = new FixtureGraphBackend({ schemaError: new Error('no such procedure') });
    const { engine } = setup({ backend });
    expect(() => engine.query(QUESTION)).toThrow('graph schema introspection failed: no such procedure');
  });
});

describe('KnowledgeGraphQueryEngine: configuration', () => {
  const llm = new FixtureCompletionModel();

  it('requires a backend and a model', () => {
    expect(() => new KnowledgeGraphQueryEngine({ llm })).toThrow('a graph backend is required');
    expect(() => new KnowledgeGraphQueryEngine({ backend: new FixtureGraphBackend() }))
      .toThrow('a completion model is required');
  });

  it('rejects a backend kind without a dialect prompt', () => {
    const backend = new FixtureGraphBackend({ kind: 'janusgraph' });
    expect(() => new KnowledgeGraphQueryEngine({ backend, llm })).toThrow(ConfigurationError);
    expect(() => new KnowledgeGraphQueryEngine({ backend, llm }))
      .toThrow("unsupported graph backend kind 'janusgraph'");
  });

  it('checks prompt variables up front', () => {
    const backend = new FixtureGraphBackend();
    expect(() => new KnowledgeGraphQueryEngine({
      backend,
      llm,
      graphQuerySynthesisPrompt: new PromptTemplate('Write a query for {query_str}', 'text_to_graph_query'),
    })).toThrow('graph query synthesis prompt is missing variables: schema');
    expect(() => new KnowledgeGraphQueryEngine({
      backend,
      llm,
      graphResponseAnswerPrompt: new PromptTemplate('{query_str} {kg_response_str}'),
    })).toThrow('graph response answer prompt is missing variables: kg_query_str');
  });

  it('accepts a custom query prompt', () => {
    const custom = new PromptTemplate('Schema: {schema}\nQ: {query_str}', 'text_to_graph_query');
    const model = new FixtureCompletionModel();
    const { engine } = setup({ llm: model, graphQuerySynthesisPrompt: custom });
    engine.generateQuery(QUESTION);
    expect(model.calls[0]?.prompt).toBe(`Schema: ${ACTOR_SCHEMA}\nQ: ${QUESTION}`);
  });

  it('surfaces a model that cannot write graph queries', async () => {
    const { engine } = setup({ llm: new MockCompletionModel() });
    await expect(engine.aquery(QUESTION)).rejects.toBeInstanceOf(UnsupportedPromptKindError);
  });
});
