// ============================================================
// Identity Graph Engine — Resolve Conflict DTO
//
// Validates POST /api/conflicts/:conflict_id/resolve.
// ============================================================

import { IsString, IsNotEmpty } from 'class-validator';

export class ResolveConflictDto {
  /**
   * Node id of the claim to prefer. Expected to be one of the two
   * claims joined by the conflict edge.
   */
  @IsString()
  @IsNotEmpty()
  preferred_claim_id!: string;
}
