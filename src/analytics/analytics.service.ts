// ============================================================
// Identity Graph Engine — Analytics Service
// Aggregate graph and ledger counts for GET /api/analytics
// ============================================================

import { Inject, Injectable } from '@nestjs/common';
import { EventsService } from '../events/events.service';
import { GRAPH_STORE, GraphStore } from '../graph/graph-store';
import { EdgeType, NodeType } from '../graph/graph.types';

export interface AnalyticsSummary {
  total_users: number;
  total_events: number;
  events_by_source_type: Record<string, number>;
  node_counts: Record<string, number>;
  edge_counts: Record<string, number>;
  total_conflicts: number;
}

@Injectable()
export class AnalyticsService {
  constructor(
    @Inject(GRAPH_STORE) private readonly store: GraphStore,
    private readonly events: EventsService,
  ) {}

  async getAnalytics(): Promise<AnalyticsSummary> {
    const [totalUsers, totalEvents, bySourceType, statistics] = await Promise.all([
      this.store.countNodes(NodeType.USER),
      this.events.totalCount(),
      this.events.countBySourceType(),
      this.store.getStatistics(),
    ]);

    return {
      total_users: totalUsers,
      total_events: totalEvents,
      events_by_source_type: bySourceType,
      node_counts: statistics.nodes,
      edge_counts: statistics.edges,
      total_conflicts: statistics.edges[EdgeType.CONTRADICTS] ?? 0,
    };
  }
}
