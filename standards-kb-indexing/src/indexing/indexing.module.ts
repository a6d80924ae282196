import { Module } from '@nestjs/common';
import { IndexingService } from './indexing.service';
import { IndexingTcpController } from './indexing-tcp.controller';
import { ChunkStageModule } from './stages/chunk/chunk-stage.module';
import { EnrichStageModule } from './stages/enrich/enrich-stage.module';

@Module({
  imports: [ChunkStageModule, EnrichStageModule],
  controllers: [IndexingTcpController],
  providers: [IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
