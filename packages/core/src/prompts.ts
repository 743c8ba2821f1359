// packages/core/src/prompts.ts
import { ConfigurationError } from './errors';

export type PromptKind =
  | 'text_to_graph_query'
  | 'question_answer'
  | 'summary'
  | 'refine'
  | 'keyword_extract'
  | 'custom';

export type PromptVariables = Readonly<Record<string, string>>;

// {{ and }} are literal braces; {name} is a slot.
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class PromptTemplate {
  readonly variables: readonly string[];

  constructor(readonly template: string, readonly kind: PromptKind = 'custom') {
    const seen = new Set<string>();
    for (const m of template.matchAll(TOKEN)) {
      if (m[1] !== undefined) seen.add(m[1]);
    }
    this.variables = Object.freeze([...seen]);
    Object.freeze(this);
  }

  hasVariables(...names: string[]): boolean {
    return names.every((n) => this.variables.includes(n));
  }

  format(values: PromptVariables): string {
    return this.template.replace(TOKEN, (token: string, name: string | undefined) => {
      if (name === undefined) return token === '{{' ? '{' : '}';
      const value = values[name];
      if (value === undefined) {
        throw new ConfigurationError(`prompt variable '${name}' has no value`);
      }
      return value;
    });
  }
}

export const DEFAULT_KG_RESPONSE_ANSWER_PROMPT = new PromptTemplate(
  `
The original question is given below.
This question has been translated into a Graph Database query.
Both the Graph query and the response are given below.
Given the Graph Query response, synthesise a response to the original question.

Original question: {query_str}
Graph query: {kg_query_str}
Graph response: {kg_response_str}
Response:
`,
  'question_answer'
);

export const DEFAULT_TEXT_QA_PROMPT = new PromptTemplate(
  `Context information is below.
---------------------
{context_str}
---------------------
Given the context information and not prior knowledge, answer the question: {query_str}
`,
  'question_answer'
);

export const QUERY_PROMPT_VARIABLES = ['schema', 'query_str'] as const;
export const ANSWER_PROMPT_VARIABLES = ['query_str', 'kg_query_str', 'kg_response_str'] as const;
