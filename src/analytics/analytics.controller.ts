// ============================================================
// Identity Graph Engine — Analytics Controller
// Route: GET /api/analytics
// ============================================================

import { Controller, Get } from '@nestjs/common';
import { AnalyticsService } from './analytics.service';

@Controller('api/analytics')
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  /**
   * GET /api/analytics
   *
   *   Response: {
   *     total_users, total_events,
   *     events_by_source_type: { "VC": 3, "OIDC": 1 },
   *     node_counts: { "Claim": 12, ... },
   *     edge_counts: { "SUPPORTS": 12, ... },
   *     total_conflicts
   *   }
   */
  @Get()
  async getAnalytics() {
    return this.analyticsService.getAnalytics();
  }
}
