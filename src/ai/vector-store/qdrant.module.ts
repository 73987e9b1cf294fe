import { Module } from '@nestjs/common';
import { QdrantService } from './qdrant.service';

/** Catalog and content collections, shared by search and indexing */
@Module({
  providers: [QdrantService],
  exports: [QdrantService],
})
export class QdrantModule {}
