// ============================================================
// Identity Graph Engine — API Key Guard
//
// Validates the X-Ingest-API-Key header on HTTP ingest. The
// SHA-256 hex digest of the provided key must appear in
// INGEST_API_KEY_HASHES. With no hashes configured the route
// is open (local development); main.ts warns at startup.
// ============================================================

import {
  Injectable,
  CanActivate,
  ExecutionContext,
  ForbiddenException,
} from '@nestjs/common';
import { createHash } from 'crypto';
import { Request } from 'express';
import { Settings } from '../../config/settings';

export const API_KEY_HEADER = 'x-ingest-api-key';

export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly settings: Settings) {}

  canActivate(context: ExecutionContext): boolean {
    const allowed = this.settings.ingestApiKeyHashes;
    if (allowed.length === 0) return true;

    const request = context.switchToHttp().getRequest<Request>();
    const apiKey = request.headers[API_KEY_HEADER];

    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      throw new ForbiddenException('Missing X-Ingest-API-Key header');
    }

    if (!allowed.includes(hashApiKey(apiKey))) {
      throw new ForbiddenException('Invalid API key');
    }

    return true;
  }
}
