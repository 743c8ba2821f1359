// apps/http/src/wiring.ts
import { ConfigurationError } from '@kgq/core';
import type { CompletionModel, EventSink, GraphBackend } from '@kgq/core';
import { MongoGraphBackend } from '@kgq/graph-mongo';
import { MySQLGraphBackend } from '@kgq/graph-mysql';
import { Neo4jGraphBackend } from '@kgq/graph-neo4j';
import { EchoCompletionModel, MockCompletionModel, OpenAICompletionModel } from '@kgq/llm';
import type { AppConfig } from './config';

export async function createBackend(config: AppConfig): Promise<GraphBackend> {
  switch (config.GRAPH_BACKEND) {
    case 'neo4j':
      return Neo4jGraphBackend.connect({
        uri: config.NEO4J_URI,
        user: config.NEO4J_USER,
        password: config.NEO4J_PASSWORD,
        database: config.NEO4J_DATABASE,
      });
    case 'mongodb':
      return MongoGraphBackend.connect({ uri: config.MONGO_URI, db: config.MONGO_DB });
    case 'mysql':
      return MySQLGraphBackend.connect(config.MYSQL_URI);
    case 'nebula':
      throw new ConfigurationError("graph backend 'nebula' has a query prompt but no client in this build");
  }
}

export function createCompletionModel(config: AppConfig, tracer?: EventSink): CompletionModel {
  if (config.LLM_PROVIDER === 'mock') {
    // graph-query prompts are echoed back as the query
    return new MockCompletionModel({ maxTokens: config.LLM_MAX_TOKENS, tracer, fallback: new EchoCompletionModel() });
  }
  return new OpenAICompletionModel({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    model: config.OPENAI_MODEL,
    maxTokens: config.LLM_MAX_TOKENS,
  });
}
