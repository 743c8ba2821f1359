// packages/engine/src/synthesizer.ts
import { DEFAULT_TEXT_QA_PROMPT } from '@kgq/core';
import type {
  CompletionModel,
  EvidenceUnit,
  PromptTemplate,
  PromptVariables,
  ResponseSynthesizer,
} from '@kgq/core';

/**
 * Answers from the evidence by one completion over a question-answer prompt.
 * Evidence texts are joined in the order given.
 */
export class CompletionSynthesizer implements ResponseSynthesizer {
  constructor(
    private readonly llm: CompletionModel,
    private readonly prompt: PromptTemplate = DEFAULT_TEXT_QA_PROMPT,
  ) {}

  synthesize(question: string, evidence: readonly EvidenceUnit[]): string {
    return this.llm.predict(this.prompt, this.variables(question, evidence));
  }

  asynthesize(question: string, evidence: readonly EvidenceUnit[]): Promise<string> {
    return this.llm.apredict(this.prompt, this.variables(question, evidence));
  }

  private variables(question: string, evidence: readonly EvidenceUnit[]): PromptVariables {
    return {
      query_str: question,
      context_str: evidence.map((e) => e.text).join('\n\n'),
    };
  }
}
