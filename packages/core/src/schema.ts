// packages/core/src/schema.ts
// Backends introspect into a summary; the text handed to the model is
// rendered here so every dialect sees the same layout.

export interface NodeTypeSummary {
  label: string;
  properties: string[];
}

export interface RelationshipSummary {
  from: string;
  type: string;
  to: string;
  properties?: string[];
}

export interface GraphSchemaSummary {
  nodes: NodeTypeSummary[];
  relationships: RelationshipSummary[];
}

const byLabel = (a: NodeTypeSummary, b: NodeTypeSummary) => a.label.localeCompare(b.label);

function patternOf(r: RelationshipSummary): string {
  return `(:${r.from})-[:${r.type}]->(:${r.to})`;
}

export function formatSchema(summary: GraphSchemaSummary): string {
  const lines: string[] = ['Node properties:'];
  for (const n of [...summary.nodes].sort(byLabel)) {
    const props = [...new Set(n.properties)].sort();
    lines.push(`${n.label} {${props.join(', ')}}`);
  }

  const withProps = summary.relationships.filter((r) => r.properties && r.properties.length > 0);
  if (withProps.length) {
    lines.push('Relationship properties:');
    for (const r of withProps) {
      lines.push(`${r.type} {${[...new Set(r.properties)].sort().join(', ')}}`);
    }
  }

  lines.push('Relationships:');
  const patterns = [...new Set(summary.relationships.map(patternOf))].sort();
  lines.push(...patterns);
  return lines.join('\n');
}

/** Merge rows of (label, property) pairs into node summaries. */
export function groupProperties(rows: Iterable<{ label: string; property?: string | null }>): NodeTypeSummary[] {
  const byName = new Map<string, Set<string>>();
  for (const row of rows) {
    const props = byName.get(row.label) ?? new Set<string>();
    if (row.property) props.add(row.property);
    byName.set(row.label, props);
  }
  return [...byName].map(([label, props]) => ({ label, properties: [...props] }));
}
