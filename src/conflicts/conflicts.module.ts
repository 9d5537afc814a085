import { Module } from '@nestjs/common';
import { ConflictDetector } from './conflict-detector.service';
import { ConflictsController } from './conflicts.controller';

@Module({
  controllers: [ConflictsController],
  providers: [ConflictDetector],
  exports: [ConflictDetector], // IngestService runs detection after each decomposition
})
export class ConflictsModule {}
