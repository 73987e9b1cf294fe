import { Module } from '@nestjs/common';
import { IndexingModule } from './indexing/indexing.module';
import { RagModule } from './rag/rag.module';
import { AiController } from './ai.controller';

@Module({
  imports: [IndexingModule, RagModule],
  controllers: [AiController],
  exports: [IndexingModule, RagModule],
})
export class AiModule {}
