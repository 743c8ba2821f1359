// packages/engine/src/evidence.ts
import { FULL_CONFIDENCE } from '@kgq/core';
import type { EvidenceUnit, PromptTemplate } from '@kgq/core';

export interface EvidenceInput {
  question: string;
  generatedQuery: string;
  backendResult: string;
  schema: string;
}

// One graph result per call, so there is nothing to rank it against.
export function assembleEvidence(prompt: PromptTemplate, input: EvidenceInput): EvidenceUnit {
  const text = prompt.format({
    query_str: input.question,
    kg_query_str: input.generatedQuery,
    kg_response_str: input.backendResult,
  });
  const metadata = Object.freeze({
    originalQuestion: input.question,
    generatedQuery: input.generatedQuery,
    backendResult: input.backendResult,
    schemaSnapshot: input.schema,
  });
  return Object.freeze({ text, score: FULL_CONFIDENCE, metadata });
}
