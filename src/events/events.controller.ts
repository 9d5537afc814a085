// ============================================================
// Identity Graph Engine — Ledger Controller
// Routes: /api/users/:user_id/events, /api/ledger/:event_id
// ============================================================

import { Controller, Get, Param, NotFoundException } from '@nestjs/common';
import { EventsService } from './events.service';

@Controller('api')
export class EventsController {
  constructor(private readonly events: EventsService) {}

  /**
   * GET /api/users/:user_id/events
   *
   * Ledger entries for one user, newest first (at most 100).
   *
   * Response: [ { event_id, user_id, source_type, payload, checksum, received_at } ]
   */
  @Get('users/:user_id/events')
  async getTimeline(@Param('user_id') userId: string) {
    return this.events.getTimeline(userId);
  }

  /**
   * GET /api/ledger/:event_id
   */
  @Get('ledger/:event_id')
  async getEvent(@Param('event_id') eventId: string) {
    const entry = await this.events.getEvent(eventId);
    if (!entry) {
      throw new NotFoundException(`Event not found: ${eventId}`);
    }
    return entry;
  }
}
