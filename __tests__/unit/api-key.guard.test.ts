/**
 * Unit Tests: API Key Guard
 */

import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ApiKeyGuard, hashApiKey } from '../../src/common/guards/api-key.guard';
import { createTestSettings } from '../utils/test-helpers';

function contextWithHeaders(headers: Record<string, string>): ExecutionContextHost {
  return new ExecutionContextHost([{ headers }]);
}

describe('ApiKeyGuard', () => {
  const guard = new ApiKeyGuard(
    createTestSettings({ ingestApiKeyHashes: [hashApiKey('test-key')] }),
  );

  test('hashes keys as SHA-256 hex', () => {
    expect(hashApiKey('test-key')).toMatch(/^[0-9a-f]{64}$/);
    expect(hashApiKey('test-key')).not.toBe(hashApiKey('other-key'));
  });

  test('allows a configured key', () => {
    expect(guard.canActivate(contextWithHeaders({ 'x-ingest-api-key': 'test-key' }))).toBe(true);
  });

  test('rejects a missing header', () => {
    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(
      new ForbiddenException('Missing X-Ingest-API-Key header'),
    );
  });

  test('rejects an unknown key', () => {
    expect(() =>
      guard.canActivate(contextWithHeaders({ 'x-ingest-api-key': 'wrong-key' })),
    ).toThrow('Invalid API key');
  });

  test('allows everything when no keys are configured', () => {
    const open = new ApiKeyGuard(createTestSettings());
    expect(open.canActivate(contextWithHeaders({}))).toBe(true);
  });
});
