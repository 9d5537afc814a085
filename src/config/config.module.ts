// ============================================================
// Identity Graph Engine — Config Module
//
// Validated Settings, loaded once from the environment and
// injectable everywhere. Tests override the Settings provider.
// ============================================================

import { Global, Module } from '@nestjs/common';
import { Settings, loadSettings } from './settings';

@Global()
@Module({
  providers: [
    {
      provide: Settings,
      useFactory: () => loadSettings(),
    },
  ],
  exports: [Settings],
})
export class ConfigModule {}
