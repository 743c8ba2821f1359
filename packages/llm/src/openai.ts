// packages/llm/src/openai.ts
import OpenAI from 'openai';
import { ConfigurationError, GenerationError } from '@kgq/core';
import type { CompletionModel, PromptTemplate, PromptVariables } from '@kgq/core';

export interface OpenAICompletionModelOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAICompletionModel implements CompletionModel {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(opts: OpenAICompletionModelOptions = {}) {
    const apiKey = opts.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) throw new ConfigurationError('OPENAI_API_KEY is not configured');

    this.client = new OpenAI({ apiKey, baseURL: opts.baseURL });
    this.model = opts.model ?? 'gpt-4o-mini';
    this.temperature = opts.temperature ?? 0;
    this.maxTokens = opts.maxTokens ?? 512;
    this.name = `openai:${this.model}`;
  }

  // A remote completion cannot be awaited without yielding the thread.
  predict(_prompt: PromptTemplate, _variables: PromptVariables): string {
    throw new GenerationError(`${this.name} has no synchronous completion; use apredict`);
  }

  async apredict(prompt: PromptTemplate, variables: PromptVariables): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: [{ role: 'user', content: prompt.format(variables) }],
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new GenerationError(`${this.name} returned an empty response`);
    }
    return content;
  }
}
