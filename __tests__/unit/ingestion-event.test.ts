/**
 * Unit Tests: Ingestion event envelope decoding
 */

import {
  MalformedEventError,
  decodeIngestionEvent,
  toIngestionEvent,
} from '../../src/ingest/ingestion-event';
import { IngestEventDto } from '../../src/ingest/dto/ingest-event.dto';
import { mockCredentials, mockEnvelope, mockUsers } from '../utils/mock-data';

function body(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value));
}

describe('decodeIngestionEvent', () => {
  test('decodes a complete envelope', () => {
    const event = decodeIngestionEvent(body(mockEnvelope()));

    expect(event).toEqual({
      eventId: 'evt-1',
      userId: mockUsers.alice,
      sourceType: 'VC',
      payload: mockCredentials.degree,
      timestamp: new Date('2024-01-15T10:00:00Z'),
    });
  });

  test('generates an event id when none is given', () => {
    const event = decodeIngestionEvent(body(mockEnvelope({ event_id: undefined })));
    expect(event.eventId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  test('accepts unknown source types', () => {
    expect(decodeIngestionEvent(body(mockEnvelope({ source_type: 'MANUAL' }))).sourceType).toBe(
      'MANUAL',
    );
  });

  test('accepts a string body', () => {
    expect(decodeIngestionEvent(JSON.stringify(mockEnvelope())).eventId).toBe('evt-1');
  });

  test('rejects invalid JSON', () => {
    expect(() => decodeIngestionEvent(Buffer.from('{not json'))).toThrow(MalformedEventError);
    expect(() => decodeIngestionEvent(Buffer.from('{not json'))).toThrow(
      /^Invalid JSON in message: /,
    );
  });

  test('rejects a body that is not an object', () => {
    expect(() => decodeIngestionEvent(body([mockEnvelope()]))).toThrow(
      'Message body is not a JSON object',
    );
    expect(() => decodeIngestionEvent(body('VC'))).toThrow('Message body is not a JSON object');
  });

  test('rejects a missing user id', () => {
    expect(() => decodeIngestionEvent(body(mockEnvelope({ user_id: undefined })))).toThrow(
      /^Invalid event envelope: .*user_id must be a string/,
    );
  });

  test('rejects a payload that is not an object', () => {
    expect(() => decodeIngestionEvent(body(mockEnvelope({ payload: 'credential' })))).toThrow(
      /payload must be an object/,
    );
  });

  test('rejects a timestamp that is not ISO-8601', () => {
    expect(() => decodeIngestionEvent(body(mockEnvelope({ timestamp: 'yesterday' })))).toThrow(
      /timestamp must be a valid ISO 8601 date string/,
    );
  });

  test.each(['2024-W05-3', '2024-032', '2024-02-30'])(
    'rejects %s, which is not a calendar date-time',
    (timestamp) => {
      const decode = () => decodeIngestionEvent(body(mockEnvelope({ timestamp })));

      expect(decode).toThrow(MalformedEventError);
      expect(decode).toThrow(
        `Invalid event envelope: timestamp is not a calendar date-time: ${timestamp}`,
      );
    },
  );

  test('keeps integers beyond the safe range exact', () => {
    const text =
      '{"user_id":"user-alice","source_type":"VC",' +
      '"payload":{"credentialSubject":{"nationalId":12345678901234567891,"age":42}}}';

    const event = decodeIngestionEvent(text);

    expect(event.payload).toEqual({
      credentialSubject: { nationalId: 12345678901234567891n, age: 42 },
    });
  });
});

describe('toIngestionEvent', () => {
  test('leaves the timestamp unset when absent', () => {
    const dto = Object.assign(new IngestEventDto(), {
      user_id: mockUsers.alice,
      source_type: 'OIDC',
      payload: {},
    });

    const event = toIngestionEvent(dto);
    expect(event.timestamp).toBeUndefined();
    expect(event.sourceType).toBe('OIDC');
  });
});
