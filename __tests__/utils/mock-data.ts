/**
 * Mock Data for Tests
 *
 * Credential documents, OIDC payloads and ingestion envelopes
 * shared across unit and integration tests.
 */

export const W3C_CONTEXT = 'https://www.w3.org/2018/credentials/v1';

export const mockUsers = {
  alice: 'user-alice',
  bob: 'user-bob',
};

export const mockCredentials = {
  degree: {
    '@context': [W3C_CONTEXT],
    type: ['VerifiableCredential', 'UniversityDegreeCredential'],
    issuer: { id: 'did:example:university', name: 'Example University' },
    issuanceDate: '2024-01-15T10:00:00Z',
    credentialSubject: {
      id: 'did:example:alice',
      name: 'Alice Example',
      email: 'alice@example.com',
      degree: { type: 'BachelorDegree', name: 'Computer Science' },
    },
  },

  employment: {
    '@context': [W3C_CONTEXT],
    type: ['VerifiableCredential', 'EmploymentCredential'],
    issuer: 'did:example:employer',
    issuanceDate: '2024-03-01T00:00:00Z',
    credentialSubject: {
      id: 'did:example:alice',
      name: 'Alice Q. Example',
      employer: 'Example Corp',
      skills: ['typescript', 'sql'],
    },
  },

  badDate: {
    '@context': [W3C_CONTEXT],
    type: ['VerifiableCredential'],
    issuer: 'did:example:issuer',
    issuanceDate: 'not-a-date',
    credentialSubject: { name: 'Alice Example' },
  },
};

export const mockOidcPayloads = {
  google: {
    iss: 'https://accounts.example.com',
    sub: 'oidc-subject-1',
    email: 'alice@example.com',
    name: 'Alice Example',
    given_name: 'Alice',
    family_name: 'Example',
    picture: null,
    aud: 'client-id',
  },
};

export function mockEnvelope(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    event_id: 'evt-1',
    user_id: mockUsers.alice,
    source_type: 'VC',
    payload: mockCredentials.degree,
    timestamp: '2024-01-15T10:00:00Z',
    ...overrides,
  };
}
