// packages/core/src/trace.ts
// Paired start/end events. One tracer is passed explicitly to whoever emits
// spans; it keeps the table of spans that are still open.
import { randomUUID } from 'node:crypto';
import { TraceError } from './errors';
import type { Logger } from './logger';

export type EventKind = 'query' | 'retrieve' | 'llm';

export interface EventPayload {
  queryStr?: string;
  response?: string;
  prompt?: string;
  template?: string;
  error?: { code: string; message: string };
}

export interface OpenSpan {
  id: string;
  kind: EventKind;
  parentId?: string;
  startPayload: EventPayload;
  startedAt: number;
}

export interface EventSpan extends OpenSpan {
  endPayload: EventPayload;
  endedAt: number;
}

/** What the engine talks to. */
export interface EventSink {
  onEventStart(kind: EventKind, payload?: EventPayload, parentId?: string): string;
  onEventEnd(kind: EventKind, payload: EventPayload | undefined, id: string): void;
}

/**
 * What a tracer notifies. Handler errors propagate to the emitter; a span
 * whose start a handler rejected is not left open.
 */
export interface EventHandler {
  onEventStart(kind: EventKind, payload: EventPayload, id: string, parentId?: string): void;
  onEventEnd(kind: EventKind, payload: EventPayload, id: string): void;
}

export interface EventTracerOptions {
  handlers?: EventHandler[];
  idFactory?: () => string;
  clock?: () => number;
}

export class EventTracer implements EventSink {
  private readonly spans = new Map<string, OpenSpan>();
  private readonly handlers: EventHandler[];
  private readonly newId: () => string;
  private readonly now: () => number;

  constructor(opts: EventTracerOptions = {}) {
    this.handlers = [...(opts.handlers ?? [])];
    this.newId = opts.idFactory ?? randomUUID;
    this.now = opts.clock ?? Date.now;
  }

  addHandler(handler: EventHandler): void {
    this.handlers.push(handler);
  }

  removeHandler(handler: EventHandler): void {
    const i = this.handlers.indexOf(handler);
    if (i >= 0) this.handlers.splice(i, 1);
  }

  onEventStart(kind: EventKind, payload: EventPayload = {}, parentId?: string): string {
    const id = this.newId();
    if (this.spans.has(id)) throw new TraceError(`span id '${id}' is already open`);
    this.spans.set(id, { id, kind, parentId, startPayload: payload, startedAt: this.now() });
    try {
      for (const h of this.handlers) h.onEventStart(kind, payload, id, parentId);
    } catch (err) {
      this.spans.delete(id);
      throw err;
    }
    return id;
  }

  onEventEnd(kind: EventKind, payload: EventPayload = {}, id: string): void {
    const span = this.spans.get(id);
    if (!span) throw new TraceError(`no open span with id '${id}'`);
    if (span.kind !== kind) {
      throw new TraceError(`span '${id}' was opened as '${span.kind}', not '${kind}'`);
    }
    this.spans.delete(id);
    for (const h of this.handlers) h.onEventEnd(kind, payload, id);
  }

  open(kind: EventKind, payload?: EventPayload, parentId?: string): string {
    return this.onEventStart(kind, payload, parentId);
  }

  close(kind: EventKind, payload: EventPayload | undefined, id: string): void {
    this.onEventEnd(kind, payload, id);
  }

  openSpans(): OpenSpan[] {
    return [...this.spans.values()].map((s) => ({ ...s }));
  }

  isOpen(id: string): boolean {
    return this.spans.has(id);
  }
}

export type TraceEvent =
  | { phase: 'start'; kind: EventKind; id: string; parentId?: string; payload: EventPayload }
  | { phase: 'end'; kind: EventKind; id: string; payload: EventPayload };

/**
 * Keeps the most recent completed spans and the raw start/end sequence.
 * Both are capped at `limit` entries, and so are the starts still waiting for
 * their end; the oldest are dropped first.
 */
export class RecordingEventHandler implements EventHandler {
  readonly events: TraceEvent[] = [];
  private readonly pending = new Map<string, OpenSpan>();
  private readonly done: EventSpan[] = [];

  constructor(private readonly limit = 1000, private readonly now: () => number = Date.now) {}

  onEventStart(kind: EventKind, payload: EventPayload, id: string, parentId?: string): void {
    this.push(this.events, { phase: 'start', kind, id, parentId, payload });
    this.pending.set(id, { id, kind, parentId, startPayload: payload, startedAt: this.now() });
    for (const stale of this.pending.keys()) {
      if (this.pending.size <= this.limit) break;
      this.pending.delete(stale);
    }
  }

  onEventEnd(kind: EventKind, payload: EventPayload, id: string): void {
    this.push(this.events, { phase: 'end', kind, id, payload });
    const start = this.pending.get(id);
    if (!start) return;
    this.pending.delete(id);
    this.push(this.done, { ...start, endPayload: payload, endedAt: this.now() });
  }

  get spans(): readonly EventSpan[] {
    return this.done;
  }

  /** The span `rootId` and every completed span below it, in completion order. */
  spansUnder(rootId: string): EventSpan[] {
    const ids = new Set([rootId]);
    const out: EventSpan[] = [];
    // children finish before their parent, so walk parents first
    for (const s of [...this.done].reverse()) {
      if (s.id === rootId || (s.parentId !== undefined && ids.has(s.parentId))) {
        ids.add(s.id);
        out.push(s);
      }
    }
    return out.reverse();
  }

  clear(): void {
    this.events.length = 0;
    this.done.length = 0;
    this.pending.clear();
  }

  private push<T>(list: T[], item: T): void {
    list.push(item);
    if (list.length > this.limit) list.splice(0, list.length - this.limit);
  }
}

export class LoggingEventHandler implements EventHandler {
  constructor(private readonly logger: Logger) {}

  onEventStart(kind: EventKind, payload: EventPayload, id: string, parentId?: string): void {
    this.logger.debug({ kind, id, parentId, payload }, 'span-start');
  }

  onEventEnd(kind: EventKind, payload: EventPayload, id: string): void {
    if (payload.error) this.logger.warn({ kind, id, error: payload.error }, 'span-failed');
    else this.logger.debug({ kind, id, payload }, 'span-end');
  }
}
