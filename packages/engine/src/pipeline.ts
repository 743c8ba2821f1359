// packages/engine/src/pipeline.ts
// The orchestration is written once, as a generator that yields steps. A step
// carries an immediate form and a deferred form of the same capability call;
// runSync drives the immediate forms, runAsync awaits the deferred ones, and
// both hand results and failures back into the same generator.
import { ConfigurationError, isPromiseLike } from '@kgq/core';
import type { MaybePromise } from '@kgq/core';

export type Stage = 'schema' | 'generate' | 'execute' | 'synthesize';

export interface PendingStep {
  readonly stage: Stage;
  runSync(): void;
  runAsync(): Promise<void>;
}

export type Pipeline<R> = Generator<PendingStep, R, void>;

export class Step<T> implements PendingStep {
  private outcome: { value: T } | undefined;

  constructor(
    readonly stage: Stage,
    private readonly immediate: () => MaybePromise<T>,
    private readonly deferred: () => Promise<T> = () => new Promise<T>((resolve) => resolve(immediate())),
  ) {}

  runSync(): void {
    const value = this.immediate();
    if (isPromiseLike(value)) {
      // the pending call is abandoned; its own failure would only repeat this one
      void value.then(undefined, () => undefined);
      throw new ConfigurationError(
        `the ${this.stage} step answered asynchronously during a synchronous query; use the async entry point`
      );
    }
    this.outcome = { value };
  }

  runAsync(): Promise<void> {
    return this.deferred().then((value) => {
      this.outcome = { value };
    });
  }

  get value(): T {
    if (!this.outcome) throw new Error(`${this.stage} step has not run`);
    return this.outcome.value;
  }
}

export function runSync<R>(pipeline: Pipeline<R>): R {
  let next = pipeline.next();
  while (!next.done) {
    try {
      next.value.runSync();
    } catch (err) {
      next = pipeline.throw(err);
      continue;
    }
    next = pipeline.next();
  }
  return next.value;
}

export async function runAsync<R>(pipeline: Pipeline<R>): Promise<R> {
  let next = pipeline.next();
  while (!next.done) {
    try {
      await next.value.runAsync();
    } catch (err) {
      next = pipeline.throw(err);
      continue;
    }
    next = pipeline.next();
  }
  return next.value;
}
