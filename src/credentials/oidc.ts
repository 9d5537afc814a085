// ============================================================
// Identity Graph Engine — OIDC normalisation
//
// Maps the standard claims of an OIDC ID token onto the
// credential document shape so the decomposer can treat both
// sources alike. Pure: no state, no I/O.
// ============================================================

import { GENERIC_CREDENTIAL_TYPE, SUBJECT_ID_KEY } from './credential';

export const OIDC_CREDENTIAL_TYPE = 'OIDCCredential';
export const UNKNOWN_ISSUER = 'unknown';

const W3C_CREDENTIALS_CONTEXT = 'https://www.w3.org/2018/credentials/v1';

/** credentialSubject key ← OIDC claim, in output order. */
const SUBJECT_CLAIMS: ReadonlyArray<readonly [string, string]> = [
  [SUBJECT_ID_KEY, 'sub'],
  ['email', 'email'],
  ['name', 'name'],
  ['given_name', 'given_name'],
  ['family_name', 'family_name'],
  ['picture', 'picture'],
];

/**
 * Build a credential document from an OIDC payload.
 *
 * The issuance date is the payload's `timestamp`; `fallbackTimestamp`
 * (the envelope's timestamp) is used when the payload has none.
 */
export function normalizeOidcPayload(
  payload: Record<string, unknown>,
  fallbackTimestamp?: string,
): Record<string, unknown> {
  const subject: Record<string, unknown> = {};
  for (const [key, claim] of SUBJECT_CLAIMS) {
    const value = payload[claim];
    if (value !== undefined && value !== null) {
      subject[key] = value;
    }
  }

  const issuer = payload.iss;
  const timestamp = payload.timestamp ?? fallbackTimestamp;

  const document: Record<string, unknown> = {
    '@context': [W3C_CREDENTIALS_CONTEXT],
    type: [GENERIC_CREDENTIAL_TYPE, OIDC_CREDENTIAL_TYPE],
    issuer: issuer === undefined || issuer === null ? UNKNOWN_ISSUER : issuer,
    credentialSubject: subject,
  };
  if (timestamp !== undefined && timestamp !== null) {
    document.issuanceDate = timestamp;
  }
  return document;
}
