// ============================================================
// Identity Graph Engine — Graph Module
//
// Global so every feature module can inject GRAPH_STORE. Swap
// the useExisting target to change the storage backend.
// ============================================================

import { Global, Module } from '@nestjs/common';
import { GRAPH_STORE } from './graph-store';
import { SqliteGraphStore } from './sqlite-graph-store.service';
import { GraphService } from './graph.service';
import { GraphController } from './graph.controller';

@Global()
@Module({
  controllers: [GraphController],
  providers: [
    SqliteGraphStore,
    { provide: GRAPH_STORE, useExisting: SqliteGraphStore },
    GraphService,
  ],
  exports: [GRAPH_STORE],
})
export class GraphModule {}
