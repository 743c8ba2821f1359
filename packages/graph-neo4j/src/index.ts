// packages/graph-neo4j/src/index.ts
import neo4j, { isInt, isNode, isRelationship } from 'neo4j-driver';
import { BackendQueryError, createLogger, errorMessage, formatSchema, groupProperties } from '@kgq/core';
import type { BackendHealth, GraphBackend, Logger, RelationshipSummary } from '@kgq/core';

// The slice of neo4j-driver this backend uses.
export interface CypherRecord {
  toObject(): Record<string, unknown>;
}

export interface CypherSession {
  run(query: string, parameters?: Record<string, unknown>): PromiseLike<{ records: CypherRecord[] }>;
  close(): Promise<void>;
}

export interface CypherDriver {
  session(config?: { database?: string; defaultAccessMode?: 'READ' | 'WRITE' }): CypherSession;
  verifyConnectivity(): Promise<unknown>;
  close(): Promise<void>;
}

export interface Neo4jGraphBackendOptions {
  database?: string;
  /** Run generated queries in READ sessions (default true). */
  readOnly?: boolean;
  /** Relationship patterns sampled for the schema. */
  patternLimit?: number;
  logger?: Logger;
}

export interface Neo4jConnectOptions extends Neo4jGraphBackendOptions {
  uri?: string;
  user?: string;
  password?: string;
}

const NODE_PROPERTIES = `
CALL db.schema.nodeTypeProperties() YIELD nodeLabels, propertyName
RETURN nodeLabels, propertyName`;

const REL_PROPERTIES = `
CALL db.schema.relTypeProperties() YIELD relType, propertyName
RETURN relType, propertyName`;

const REL_PATTERNS = `
MATCH (a)-[r]->(b)
WITH labels(a)[0] AS src, type(r) AS rel, labels(b)[0] AS dst
RETURN DISTINCT src, rel, dst
LIMIT $limit`;

/** Plain JSON-friendly values out of driver types. */
export function toPlain(value: unknown): unknown {
  if (isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString();
  if (Array.isArray(value)) return value.map(toPlain);
  if (value === null || typeof value !== 'object') return value;
  if (isNode(value)) return { labels: value.labels, ...plainObject(value.properties) };
  if (isRelationship(value)) return { type: value.type, ...plainObject(value.properties) };
  return plainObject(value);
}

function plainObject(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) out[k] = toPlain(v);
  return out;
}

// ":`ACTED_IN`" -> "ACTED_IN"
function stripRelType(relType: string): string {
  return relType.replace(/^:/, '').replace(/^`(.*)`$/, '$1');
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export class Neo4jGraphBackend implements GraphBackend {
  readonly kind = 'neo4j' as const;
  private readonly database?: string;
  private readonly readOnly: boolean;
  private readonly patternLimit: number;
  private readonly logger: Logger;
  private schema: string | undefined;

  constructor(private readonly driver: CypherDriver, opts: Neo4jGraphBackendOptions = {}) {
    this.database = opts.database;
    this.readOnly = opts.readOnly ?? true;
    this.patternLimit = opts.patternLimit ?? 100;
    this.logger = opts.logger ?? createLogger('graph-neo4j');
  }

  static connect(opts: Neo4jConnectOptions = {}): Neo4jGraphBackend {
    const uri = opts.uri ?? 'bolt://127.0.0.1:7687';
    const driver = neo4j.driver(uri, neo4j.auth.basic(opts.user ?? 'neo4j', opts.password ?? 'password'));
    return new Neo4jGraphBackend(driver, opts);
  }

  async getSchema(refresh = false): Promise<string> {
    if (this.schema !== undefined && !refresh) return this.schema;

    const [nodeRows, relRows, patternRows] = await this.read(async (s) => [
      await s.run(NODE_PROPERTIES),
      await s.run(REL_PROPERTIES),
      await s.run(REL_PATTERNS, { limit: neo4j.int(this.patternLimit) }),
    ]);

    const nodes = groupProperties(nodeRows.records.flatMap((r) => {
      const row = r.toObject();
      const labels = Array.isArray(row.nodeLabels) ? row.nodeLabels.filter((l): l is string => typeof l === 'string') : [];
      return labels.map((label) => ({ label, property: str(row.propertyName) }));
    }));

    const relProps = new Map<string, string[]>();
    for (const r of relRows.records) {
      const row = r.toObject();
      const relType = str(row.relType);
      const prop = str(row.propertyName);
      if (!relType) continue;
      const type = stripRelType(relType);
      const list = relProps.get(type) ?? [];
      if (prop) list.push(prop);
      relProps.set(type, list);
    }

    const relationships: RelationshipSummary[] = [];
    for (const r of patternRows.records) {
      const row = r.toObject();
      const from = str(row.src);
      const type = str(row.rel);
      const to = str(row.dst);
      if (from && type && to) relationships.push({ from, type, to, properties: relProps.get(type) ?? [] });
    }

    this.schema = formatSchema({ nodes, relationships });
    this.logger.info({ labels: nodes.length, patterns: relationships.length }, 'graph-schema-loaded');
    return this.schema;
  }

  async query(text: string): Promise<string> {
    try {
      const result = await this.read((s) => s.run(text), this.readOnly ? 'READ' : 'WRITE');
      return JSON.stringify(result.records.map((r) => toPlain(r.toObject())));
    } catch (e) {
      throw new BackendQueryError(`cypher query failed: ${errorMessage(e)}`, { cause: e });
    }
  }

  async health(): Promise<BackendHealth> {
    try {
      await this.driver.verifyConnectivity();
      return { ok: true };
    } catch (e) {
      return { ok: false, details: { error: errorMessage(e) } };
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async read<T>(work: (s: CypherSession) => PromiseLike<T>, mode: 'READ' | 'WRITE' = 'READ'): Promise<T> {
    const session = this.driver.session({ database: this.database, defaultAccessMode: mode });
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }
}

export default Neo4jGraphBackend;
