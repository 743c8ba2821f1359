export { KnowledgeGraphQueryEngine } from './engine';
export type { KnowledgeGraphQueryEngineOptions, QueryOutcome } from './engine';
export { assembleEvidence } from './evidence';
export type { EvidenceInput } from './evidence';
export { generationStep, generationVariables } from './generation';
export { Step, runAsync, runSync } from './pipeline';
export type { PendingStep, Pipeline, Stage } from './pipeline';
export { CompletionSynthesizer } from './synthesizer';
