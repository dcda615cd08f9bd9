import { Pool, PoolClient } from 'pg';
import type { GraphIndexer } from '@contentreview/core';
import { withTransaction } from '../connection';

type NodeKind = 'content' | 'topic' | 'entity' | 'collection';

interface GraphNode {
  id: string;
  kind: NodeKind;
  label: string;
}

interface GraphEdge {
  sourceId: string;
  targetId: string;
  relation: 'about' | 'mentions' | 'belongs_to';
}

export function nodeId(kind: NodeKind, label: string): string {
  return `${kind}:${label.trim().toLowerCase()}`;
}

/**
 * Nodes and edges written for one content item. Topics and entities are
 * normalised so the same label from two items lands on one node.
 */
export function buildGraphFragment(
  contentItemId: string,
  topics: string[],
  entities: string[],
  collectionId: string
): { nodes: GraphNode[]; edges: GraphEdge[] } {
  const contentNode: GraphNode = { id: `content:${contentItemId}`, kind: 'content', label: contentItemId };
  const collectionNode: GraphNode = {
    id: `collection:${collectionId}`,
    kind: 'collection',
    label: collectionId,
  };

  const nodes = new Map<string, GraphNode>([
    [contentNode.id, contentNode],
    [collectionNode.id, collectionNode],
  ]);
  const edges = new Map<string, GraphEdge>();

  const addEdge = (edge: GraphEdge): void => {
    edges.set(`${edge.sourceId}|${edge.targetId}|${edge.relation}`, edge);
  };

  addEdge({ sourceId: contentNode.id, targetId: collectionNode.id, relation: 'belongs_to' });

  for (const topic of topics) {
    if (!topic.trim()) continue;
    const node: GraphNode = { id: nodeId('topic', topic), kind: 'topic', label: topic.trim() };
    nodes.set(node.id, node);
    addEdge({ sourceId: contentNode.id, targetId: node.id, relation: 'about' });
  }

  for (const entity of entities) {
    if (!entity.trim()) continue;
    const node: GraphNode = { id: nodeId('entity', entity), kind: 'entity', label: entity.trim() };
    nodes.set(node.id, node);
    addEdge({ sourceId: contentNode.id, targetId: node.id, relation: 'mentions' });
  }

  return { nodes: [...nodes.values()], edges: [...edges.values()] };
}

async function writeFragment(
  client: PoolClient,
  fragment: { nodes: GraphNode[]; edges: GraphEdge[] }
): Promise<void> {
  for (const node of fragment.nodes) {
    await client.query(
      `INSERT INTO graph_nodes (id, kind, label) VALUES ($1, $2, $3)
       ON CONFLICT (id) DO NOTHING`,
      [node.id, node.kind, node.label]
    );
  }

  for (const edge of fragment.edges) {
    await client.query(
      `INSERT INTO graph_edges (source_id, target_id, relation) VALUES ($1, $2, $3)
       ON CONFLICT (source_id, target_id, relation) DO NOTHING`,
      [edge.sourceId, edge.targetId, edge.relation]
    );
  }
}

export function createGraphStore(pool: Pool): GraphIndexer {
  return {
    async update(
      contentItemId: string,
      topics: string[],
      entities: string[],
      collectionId: string
    ): Promise<{ success: boolean }> {
      const fragment = buildGraphFragment(contentItemId, topics, entities, collectionId);
      await withTransaction(pool, (client) => writeFragment(client, fragment));
      return { success: true };
    },
  };
}
