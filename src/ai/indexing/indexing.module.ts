import { Module } from '@nestjs/common';
import { CourseIndexingService } from './course-indexing.service';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { QdrantModule } from '../vector-store/qdrant.module';

@Module({
  imports: [EmbeddingsModule, QdrantModule],
  providers: [CourseIndexingService],
  exports: [CourseIndexingService],
})
export class IndexingModule {}
