// packages/core/src/dialects.ts
// One natural-language-to-query prompt per backend kind.
import { ConfigurationError } from './errors';
import { PromptTemplate } from './prompts';
import type { GraphBackendKind } from './types';

const NEBULA_NL2CYPHER = `
Generate NebulaGraph query from natural language.
Use only the provided relationship types and properties in the schema.
Do not use any other relationship types or properties that are not provided.
Schema:
---
{schema}
---
Note: NebulaGraph speaks a dialect of Cypher, comparing to standard Cypher:

1. it uses double equals sign for comparison: \`==\` rather than \`=\`
2. it needs explicit label specification when referring to node properties, i.e.
v is a variable of a node, and we know its label is Foo, v.\`foo\`.name is correct
while v.name is not.

For example, see this diff between standard and NebulaGraph Cypher dialect:
\`\`\`diff
< MATCH (p:person)-[:directed]->(m:movie) WHERE m.name = 'The Godfather'
< RETURN p.name;
---
> MATCH (p:\`person\`)-[:directed]->(m:\`movie\`) WHERE m.\`movie\`.\`name\` == 'The Godfather'
> RETURN p.\`person\`.\`name\`;
\`\`\`

Question: {query_str}

NebulaGraph Cypher dialect query:
`;

const NEO4J_NL2CYPHER = `
Generate a Cypher query for Neo4j from natural language.
Use only the provided node labels, relationship types and properties in the schema.
Do not use any other relationship types or properties that are not provided.
The query must only read data: no CREATE, MERGE, SET, DELETE or REMOVE clauses.
Schema:
---
{schema}
---
Return only the query, without explanations or code fences.

Question: {query_str}

Cypher query:
`;

const MONGODB_NL2AGGREGATION = `
Generate a MongoDB aggregation request from natural language.
The graph is stored in two collections:
- nodes: {{ "id": string, "label": string, ...properties }}
- edges: {{ "source": node id, "target": node id, "type": string, "sourceLabel": string, "targetLabel": string, ...properties }}
Use $graphLookup on the edges collection to follow relationships.
Use only the labels, relationship types and properties in the schema.
Schema:
---
{schema}
---
Answer with a single JSON object and nothing else:
{{ "collection": "nodes" | "edges", "pipeline": [ ...stages ] }}
Do not use $out or $merge stages.

Question: {query_str}

Aggregation request:
`;

const MYSQL_NL2SQL = `
Generate a MySQL query from natural language over a graph stored in two tables:
- nodes(id VARCHAR, label VARCHAR, properties JSON)
- edges(source VARCHAR, target VARCHAR, type VARCHAR, properties JSON)
edges.source and edges.target reference nodes.id. Read properties with
JSON_UNQUOTE(JSON_EXTRACT(properties, '$.name')). Use WITH RECURSIVE for
multi-hop traversals.
Use only the labels, relationship types and properties in the schema.
Schema:
---
{schema}
---
Answer with one read-only SELECT statement and nothing else.

Question: {query_str}

SQL query:
`;

export const DIALECT_PROMPTS = Object.freeze({
  nebula: new PromptTemplate(NEBULA_NL2CYPHER, 'text_to_graph_query'),
  neo4j: new PromptTemplate(NEO4J_NL2CYPHER, 'text_to_graph_query'),
  mongodb: new PromptTemplate(MONGODB_NL2AGGREGATION, 'text_to_graph_query'),
  mysql: new PromptTemplate(MYSQL_NL2SQL, 'text_to_graph_query'),
} satisfies Record<GraphBackendKind, PromptTemplate>);

export function hasDialectPrompt(kind: string): kind is GraphBackendKind {
  return Object.prototype.hasOwnProperty.call(DIALECT_PROMPTS, kind);
}

export function lookupDialectPrompt(kind: string): PromptTemplate {
  if (!hasDialectPrompt(kind)) {
    throw new ConfigurationError(`no query prompt registered for graph backend '${kind}'`);
  }
  return DIALECT_PROMPTS[kind];
}
