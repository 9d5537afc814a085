// ============================================================
// Identity Graph Engine — Credential model
//
// Best-effort reading of a W3C Verifiable Credential document.
// Fields of the wrong shape fall back to empty values; nothing
// here rejects a credential.
// ============================================================

import { StructuredMap, toStructuredMap } from './structured-value';

export const GENERIC_CREDENTIAL_TYPE = 'VerifiableCredential';

/** Key of the subject's own identifier inside credentialSubject. */
export const SUBJECT_ID_KEY = 'id';

/** `"did:x"` or `{ "id": "did:x", "name": "Example U" }` */
export type CredentialIssuer =
  | { kind: 'id'; id: string }
  | { kind: 'object'; id: string; name?: string };

export interface Credential {
  readonly context: readonly string[];
  readonly type: readonly string[];
  readonly id?: string;
  readonly issuer: CredentialIssuer;
  readonly issuanceDate?: string;
  readonly expirationDate?: string;
  readonly subject: StructuredMap;
  readonly proof?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseIssuer(value: unknown): CredentialIssuer {
  if (typeof value === 'string') {
    return { kind: 'id', id: value };
  }
  if (isRecord(value)) {
    return {
      kind: 'object',
      id: optionalString(value.id) ?? '',
      name: optionalString(value.name),
    };
  }
  return { kind: 'id', id: '' };
}

/** Read a decoded credential document (JSON payload). */
export function parseCredential(document: Record<string, unknown>): Credential {
  return {
    context: stringList(document['@context']),
    type: stringList(document.type),
    id: optionalString(document.id),
    issuer: parseIssuer(document.issuer),
    issuanceDate: optionalString(document.issuanceDate),
    expirationDate: optionalString(document.expirationDate),
    subject: toStructuredMap(document.credentialSubject),
    proof: isRecord(document.proof) ? document.proof : undefined,
  };
}

export function getIssuerId(credential: Credential): string {
  return credential.issuer.id;
}

export function getIssuerName(credential: Credential): string | undefined {
  return credential.issuer.kind === 'object' ? credential.issuer.name : undefined;
}

/** First type other than the generic marker, or the marker itself. */
export function getCredentialType(credential: Credential): string {
  return credential.type.find((t) => t !== GENERIC_CREDENTIAL_TYPE) ?? GENERIC_CREDENTIAL_TYPE;
}

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parse an ISO-8601 date or date-time. A trailing `Z` means UTC;
 * a missing offset is read as UTC as well. Returns undefined when
 * the text is not a valid date.
 */
export function parseIssuanceDate(text: string): Date | undefined {
  const match = ISO_8601.exec(text.trim());
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const monthIndex = Number(month) - 1;
  const millis = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;

  // setUTCFullYear keeps years 0-99 as given; Date.UTC would map them to 19xx.
  const date = new Date(0);
  date.setUTCFullYear(Number(year), monthIndex, Number(day));
  date.setUTCHours(Number(hour ?? 0), Number(minute ?? 0), Number(second ?? 0), millis);

  // Out-of-range fields roll over; reject instead.
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== Number(day) ||
    date.getUTCHours() !== Number(hour ?? 0) ||
    date.getUTCMinutes() !== Number(minute ?? 0) ||
    date.getUTCSeconds() !== Number(second ?? 0)
  ) {
    return undefined;
  }

  let time = date.getTime();
  if (offset && offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const offsetMinutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
    time -= sign * offsetMinutes * 60_000;
  }

  return new Date(time);
}
