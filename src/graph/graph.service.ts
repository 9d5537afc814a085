// ============================================================
// Identity Graph Engine — Graph read service
//
// Read-only views over the identity graph. Shows whatever state
// exists; missing nodes are a 404, never a fabricated default.
// ============================================================

import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { GRAPH_STORE, GraphStore } from './graph-store';
import { GraphEdgeView, GraphNodeView } from './graph.types';

export interface IdentityGraphResponse {
  user_id: string;
  nodes: GraphNodeView[];
  edges: GraphEdgeView[];
  node_count: number;
  edge_count: number;
}

@Injectable()
export class GraphService {
  constructor(@Inject(GRAPH_STORE) private readonly store: GraphStore) {}

  async getIdentityGraph(userId: string): Promise<IdentityGraphResponse> {
    const { nodes, edges } = await this.store.getUserGraph(userId);
    return {
      user_id: userId,
      nodes,
      edges,
      node_count: nodes.length,
      edge_count: edges.length,
    };
  }

  async getNode(nodeId: string): Promise<GraphNodeView> {
    const node = await this.store.getNode(nodeId);
    if (!node) {
      throw new NotFoundException(`Node not found: ${nodeId}`);
    }
    return node;
  }
}
