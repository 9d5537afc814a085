/**
 * Test Helper Functions
 *
 * - Settings for an in-memory, queue-less application
 * - In-memory SQLite database and graph store
 * - jest.fn() doubles of the GraphStore interface
 * - The ingest pipeline wired by hand over an in-memory store
 */

import { Settings } from '../../src/config/settings';
import { DatabaseService } from '../../src/database.service';
import { SqliteGraphStore } from '../../src/graph/sqlite-graph-store.service';
import { GraphStore } from '../../src/graph/graph-store';
import { SseService } from '../../src/sse/sse.service';
import { EventsService } from '../../src/events/events.service';
import { IngestService } from '../../src/ingest/ingest.service';
import { CredentialDecomposer } from '../../src/credentials/decomposer.service';
import { ConflictDetector } from '../../src/conflicts/conflict-detector.service';
import {
  ClaimNode,
  ConflictListing,
  CredentialNode,
  ExistingClaim,
  GraphNodeView,
  GraphStatistics,
  IdentityGraph,
  NodeType,
} from '../../src/graph/graph.types';

export function createTestSettings(overrides: Partial<Settings> = {}): Settings {
  return Object.assign(new Settings(), {
    nodeEnv: 'test',
    databasePath: ':memory:',
    rabbitmqEnabled: false,
    ...overrides,
  });
}

export async function createTestDatabase(): Promise<DatabaseService> {
  const database = new DatabaseService(createTestSettings());
  await database.onModuleInit();
  return database;
}

export async function createTestStore(): Promise<{
  database: DatabaseService;
  store: SqliteGraphStore;
}> {
  const database = await createTestDatabase();
  return { database, store: new SqliteGraphStore(database) };
}

export type MockGraphStore = {
  [K in keyof GraphStore]: jest.Mock<ReturnType<GraphStore[K]>, Parameters<GraphStore[K]>>;
};

/** Every method resolves with a plausible empty result until overridden. */
export function createMockGraphStore(): MockGraphStore {
  let counter = 0;
  const nextId = async () => `edge-${++counter}`;

  return {
    upsertSubject: jest.fn<Promise<string>, [string]>(async (subjectId) => subjectId),
    createCredentialNode: jest.fn<Promise<string>, [CredentialNode, string]>(
      async (credential) => credential.nodeId,
    ),
    createClaimNode: jest.fn<Promise<string>, [ClaimNode]>(async (claim) => claim.nodeId),
    createSupportsEdge: jest.fn<Promise<string>, [string, string]>(nextId),
    createContradictsEdge: jest.fn<Promise<string>, [string, string, number]>(nextId),
    findExistingClaims: jest.fn<Promise<ExistingClaim[]>, [string, string]>(async () => []),
    getConflicts: jest.fn<Promise<ConflictListing[]>, [string]>(async () => []),
    getUserGraph: jest.fn<Promise<IdentityGraph>, [string]>(async () => ({ nodes: [], edges: [] })),
    getNode: jest.fn<Promise<GraphNodeView | null>, [string]>(async () => null),
    countNodes: jest.fn<Promise<number>, [NodeType]>(async () => 0),
    getStatistics: jest.fn<Promise<GraphStatistics>, []>(async () => ({ nodes: {}, edges: {} })),
  };
}

/** The full event pipeline over one in-memory database. */
export async function createTestPipeline() {
  const { database, store } = await createTestStore();
  const sse = new SseService();
  const events = new EventsService(database, sse);
  const ingest = new IngestService(
    events,
    new CredentialDecomposer(store),
    new ConflictDetector(store),
    sse,
  );
  return { database, store, sse, events, ingest };
}
