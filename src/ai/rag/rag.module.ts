import { Module } from '@nestjs/common';
import { RagService } from './rag.service';
import { EmbeddingsModule } from '../embeddings/embeddings.module';
import { QdrantModule } from '../vector-store/qdrant.module';
import { OllamaModule } from '../llm/ollama.module';
import { CourseSearchService } from './services/course-search.service';
import { GenerationService } from './services/generation.service';
import { SessionStoreService } from './services/session-store.service';

@Module({
  imports: [EmbeddingsModule, QdrantModule, OllamaModule],
  providers: [
    RagService,
    SessionStoreService,
    CourseSearchService,
    GenerationService,
  ],
  exports: [RagService],
})
export class RagModule {}
