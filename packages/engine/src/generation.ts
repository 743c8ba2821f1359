// packages/engine/src/generation.ts
import type { CompletionModel, PromptTemplate, PromptVariables } from '@kgq/core';
import { Step } from './pipeline';

export function generationVariables(question: string, schema: string): PromptVariables {
  return { query_str: question, schema };
}

/**
 * Fill the dialect prompt and ask the model for a query. The model's text is
 * returned as is: whether it is valid for the backend is only learned when
 * the backend runs it.
 */
export function generationStep(
  llm: CompletionModel,
  prompt: PromptTemplate,
  question: string,
  schema: string,
): Step<string> {
  const vars = generationVariables(question, schema);
  return new Step(
    'generate',
    () => llm.predict(prompt, vars),
    () => llm.apredict(prompt, vars),
  );
}
