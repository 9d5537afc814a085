// ============================================================
// Identity Graph Engine — Graph Controller
// Routes: /api/users/:user_id/graph, /api/nodes/:node_id
// ============================================================

import { Controller, Get, Param } from '@nestjs/common';
import { GraphService } from './graph.service';

@Controller('api')
export class GraphController {
  constructor(private readonly graphService: GraphService) {}

  /**
   * GET /api/users/:user_id/graph
   *
   * The user node, every credential it owns, the claims those
   * credentials support, and all edges among them (including
   * CONTRADICTS edges between the user's own claims).
   *
   * Response: { user_id, nodes, edges, node_count, edge_count }
   * An unknown user yields an empty graph.
   */
  @Get('users/:user_id/graph')
  async getIdentityGraph(@Param('user_id') userId: string) {
    return this.graphService.getIdentityGraph(userId);
  }

  /**
   * GET /api/nodes/:node_id
   *
   * Response: { node_id, node_type, properties, created_at }
   * 404 when no node has this id.
   */
  @Get('nodes/:node_id')
  async getNode(@Param('node_id') nodeId: string) {
    return this.graphService.getNode(nodeId);
  }
}
