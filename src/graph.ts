import { Graph, GraphEdge, GraphNode, MdRecord, RecordId } from './types.js';
import { DEFAULT_STATUS } from './status.js';

const MARKDOWN_SUFFIX = /\.md$/;

/**
 * Turn a raw `related` entry into the identifier it points at.
 */
export function referenceTarget(reference: string): RecordId {
  return reference.replace(MARKDOWN_SUFFIX, '');
}

export function nodeFromRecord(record: MdRecord): GraphNode {
  return {
    id: record.id,
    status: record.metadata.status,
    title: record.metadata.title
  };
}

/**
 * Node for a referenced identifier that has no record in the batch.
 */
export function placeholderNode(id: RecordId): GraphNode {
  return { id, status: DEFAULT_STATUS };
}

/**
 * Build the relationship graph of a batch.
 *
 * Every `related` entry yields one edge, duplicates included, even when the
 * target is unknown; unknown targets get a placeholder node. Real nodes come
 * first, so they win the dedup by id.
 */
export function buildGraph(records: readonly MdRecord[]): Graph {
  const nodes: GraphNode[] = records.map(nodeFromRecord);
  const edges: GraphEdge[] = [];
  const known = new Set(records.map(record => record.id));

  for (const record of records) {
    for (const reference of record.metadata.related) {
      const target = referenceTarget(reference);
      edges.push({ source: record.id, target, type: 'related' });
      if (!known.has(target)) {
        nodes.push(placeholderNode(target));
      }
    }
  }

  const seen = new Set<RecordId>();
  const unique = nodes.filter(node => {
    if (seen.has(node.id)) {
      return false;
    }
    seen.add(node.id);
    return true;
  });

  return { nodes: unique, edges };
}

export interface Neighbors {
  outgoing: GraphEdge[];
  incoming: GraphEdge[];
}

/**
 * Edges leaving and entering a node.
 */
export function neighbors(graph: Graph, id: RecordId): Neighbors {
  return {
    outgoing: graph.edges.filter(edge => edge.source === id),
    incoming: graph.edges.filter(edge => edge.target === id)
  };
}
