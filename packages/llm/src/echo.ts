// packages/llm/src/echo.ts
// Completes any prompt without looking at its kind: the formatted prompt comes
// back as is, or as `maxTokens` filler words when a budget is set.
import type { CompletionModel, PromptTemplate, PromptVariables } from '@kgq/core';

export interface Completion {
  text: string;
  /** What this chunk added, when streaming. */
  delta?: string;
}

export interface EchoCompletionModelOptions {
  maxTokens?: number;
}

function filler(length: number): string {
  return Array.from({ length }, () => 'text').join(' ');
}

export class EchoCompletionModel implements CompletionModel {
  readonly name = 'echo';
  readonly maxTokens: number | undefined;

  constructor(opts: EchoCompletionModelOptions = {}) {
    this.maxTokens = opts.maxTokens;
  }

  complete(prompt: string): Completion {
    return { text: this.maxTokens ? filler(this.maxTokens) : prompt };
  }

  *streamComplete(prompt: string): Generator<Completion, void, void> {
    if (this.maxTokens) {
      for (let i = 1; i <= this.maxTokens; i++) yield { text: filler(i), delta: 'text ' };
      return;
    }
    for (const ch of prompt) yield { text: prompt, delta: ch };
  }

  predict(prompt: PromptTemplate, variables: PromptVariables): string {
    return this.complete(prompt.format(variables)).text;
  }

  async apredict(prompt: PromptTemplate, variables: PromptVariables): Promise<string> {
    return this.predict(prompt, variables);
  }
}
