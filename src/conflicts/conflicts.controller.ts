// ============================================================
// Identity Graph Engine — Conflicts Controller
// Routes:
//   GET  /api/users/:user_id/conflicts
//   POST /api/conflicts/:conflict_id/resolve
// ============================================================

import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ConflictDetector } from './conflict-detector.service';
import { ResolveConflictDto } from './dto/resolve-conflict.dto';

@Controller('api')
export class ConflictsController {
  constructor(private readonly detector: ConflictDetector) {}

  /**
   * GET /api/users/:user_id/conflicts
   *
   * One entry per CONTRADICTS edge, oldest first. Repeated
   * detection runs show up as repeated entries.
   *
   * Response: [ { conflict_id, attribute, claim_a_id, claim_a_value, claim_b_id, claim_b_value } ]
   */
  @Get('users/:user_id/conflicts')
  async listConflicts(@Param('user_id') userId: string) {
    const conflicts = await this.detector.getUserConflicts(userId);
    return conflicts.map((c) => ({
      conflict_id: c.conflictId,
      attribute: c.attribute,
      claim_a_id: c.claimAId,
      claim_a_value: c.claimAValue,
      claim_b_id: c.claimBId,
      claim_b_value: c.claimBValue,
    }));
  }

  /**
   * POST /api/conflicts/:conflict_id/resolve
   *
   * Acknowledges the preferred claim. Nothing is persisted yet;
   * the response says so with `persisted: false`.
   */
  @Post('conflicts/:conflict_id/resolve')
  async resolve(
    @Param('conflict_id') conflictId: string,
    @Body() dto: ResolveConflictDto,
  ) {
    return this.detector.resolveConflict(conflictId, dto.preferred_claim_id);
  }
}
