// packages/core/src/schemas.ts
import { z } from 'zod';
import { GRAPH_BACKEND_KINDS } from './types';

export const GraphBackendKindSchema = z.enum(GRAPH_BACKEND_KINDS);

const Question = z.string().trim().min(1, 'question must not be empty').max(4000);

// POST /query
export const QueryRequestSchema = z.object({
  question: Question,
  // sync only succeeds against backends and models that answer inline
  mode: z.enum(['async', 'sync']).default('async'),
}).strict();

// POST /generate
export const GenerateRequestSchema = z.object({
  question: Question,
}).strict();

export type QueryRequest = z.infer<typeof QueryRequestSchema>;
export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
