// ============================================================
// Identity Graph Engine — Ingest Event DTO
//
// Validates POST /api/ingest bodies and queue deliveries alike.
// Source types handled by the pipeline:
//   - VC    payload is a Verifiable Credential document
//   - OIDC  payload is a set of OIDC ID-token claims
// Other source types (MANUAL, ...) are accepted and skipped.
// ============================================================

import {
  IsString,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsISO8601,
} from 'class-validator';

export class IngestEventDto {
  /**
   * Sender-assigned id, kept for traceability on the Credential
   * node. Generated when absent.
   */
  @IsString()
  @IsNotEmpty()
  @IsOptional()
  event_id?: string;

  /**
   * External id of the user the credential is about.
   */
  @IsString()
  @IsNotEmpty()
  user_id!: string;

  /**
   * VC, OIDC or MANUAL. Free-form so that new source types reach
   * the processor (which logs and skips them) instead of failing here.
   */
  @IsString()
  @IsNotEmpty()
  source_type!: string;

  /**
   * VC:   { "@context", type, issuer, issuanceDate, credentialSubject, ... }
   * OIDC: { iss, sub, email, name, given_name, family_name, picture, timestamp }
   */
  @IsObject()
  payload!: Record<string, unknown>;

  /** When the signal was ingested upstream (ISO-8601). */
  @IsISO8601()
  @IsOptional()
  timestamp?: string;
}
