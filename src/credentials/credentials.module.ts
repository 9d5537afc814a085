// ============================================================
// Identity Graph Engine — Credentials Module
//
// Credential parsing and decomposition. The graph store is
// provided globally by GraphModule.
// ============================================================

import { Module } from '@nestjs/common';
import { CredentialDecomposer } from './decomposer.service';

@Module({
  providers: [CredentialDecomposer],
  exports: [CredentialDecomposer],
})
export class CredentialsModule {}
