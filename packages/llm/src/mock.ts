// packages/llm/src/mock.ts
// Deterministic completions for tests and offline runs. Output depends only
// on the prompt kind and the size of the prompt's inputs; kinds without a rule
// go to the fallback model, when there is one.
import { EngineError, UnsupportedPromptKindError, errorMessage } from '@kgq/core';
import type { CompletionModel, EventSink, PromptTemplate, PromptVariables } from '@kgq/core';
import { countTokens, extractKeywords } from './tokens';

export const DEFAULT_NUM_OUTPUTS = 256;

export interface MockCompletionModelOptions {
  maxTokens?: number;
  /** When set, every prediction is reported as an `llm` span. */
  tracer?: EventSink;
  /** Answers the prompt kinds this model has no rule for; without it they are refused. */
  fallback?: CompletionModel;
}

function repeat(word: string, times: number): string {
  return Array.from({ length: times }, () => word).join(' ');
}

export class MockCompletionModel implements CompletionModel {
  readonly name = 'mock';
  readonly maxTokens: number;
  private readonly tracer?: EventSink;
  private readonly fallback?: CompletionModel;

  constructor(opts: MockCompletionModelOptions = {}) {
    this.maxTokens = opts.maxTokens ?? DEFAULT_NUM_OUTPUTS;
    this.tracer = opts.tracer;
    this.fallback = opts.fallback;
  }

  predict(prompt: PromptTemplate, variables: PromptVariables): string {
    const formatted = prompt.format(variables);
    const id = this.tracer?.onEventStart('llm', { template: prompt.kind, prompt: formatted });
    let output: string;
    try {
      output = this.respond(prompt, variables);
    } catch (err) {
      if (id !== undefined) {
        const code = err instanceof EngineError ? err.code : 'INTERNAL';
        this.tracer?.onEventEnd('llm', { error: { code, message: errorMessage(err) } }, id);
      }
      throw err;
    }
    if (id !== undefined) this.tracer?.onEventEnd('llm', { prompt: formatted, response: output }, id);
    return output;
  }

  async apredict(prompt: PromptTemplate, variables: PromptVariables): Promise<string> {
    return this.predict(prompt, variables);
  }

  private budget(...texts: Array<string | undefined>): number {
    const tokens = texts.reduce((n, t) => n + countTokens(t ?? ''), 0);
    return Math.min(tokens, this.maxTokens);
  }

  private respond(prompt: PromptTemplate, vars: PromptVariables): string {
    switch (prompt.kind) {
      case 'summary':
        return repeat('summary', this.budget(vars.context_str));
      case 'question_answer':
        return repeat('answer', this.budget(vars.context_str));
      case 'refine':
        return repeat('answer', this.budget(vars.context_msg, vars.existing_answer));
      case 'keyword_extract':
        return `KEYWORDS: ${extractKeywords(vars.text ?? '').join(', ')}`;
      case 'custom':
        return '';
      default:
        if (this.fallback) return this.fallback.predict(prompt, vars);
        throw new UnsupportedPromptKindError(prompt.kind, this.name);
    }
  }
}
