// ============================================================
// Identity Graph Engine — SSE Controller
//
// GET /api/events/stream[?user_id=]: live feed of ingestion,
// decomposition and conflict activity, optionally for one user.
// ============================================================

import { Controller, Get, Res, Req, Query } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { Response, Request } from 'express';
import { SseService, toSseFrame } from './sse.service';

const HEARTBEAT_MS = 30_000;

@Controller('api/events')
export class SseController {
  constructor(private readonly sse: SseService) {}

  /**
   * GET /api/events/stream?user_id=<id>
   *
   * Event format:
   *   event: <activity type>
   *   data: { type, data, timestamp }
   *
   * A comment heartbeat every 30s keeps proxies from closing
   * the connection.
   */
  @Get('stream')
  @SkipThrottle()
  stream(@Req() req: Request, @Res() res: Response, @Query('user_id') userId?: string) {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    res.write(
      `event: connected\ndata: ${JSON.stringify({
        clients: this.sse.getClientCount() + 1,
        user_id: userId ?? null,
        timestamp: new Date().toISOString(),
      })}\n\n`,
    );

    const unsubscribe = this.sse.subscribe((activity) => res.write(toSseFrame(activity)), {
      userId,
    });

    const heartbeat = setInterval(() => {
      res.write(`: heartbeat ${new Date().toISOString()}\n\n`);
    }, HEARTBEAT_MS);

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  }
}
