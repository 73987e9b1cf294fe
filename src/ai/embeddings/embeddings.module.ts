import { Module } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { OllamaModule } from '../llm/ollama.module';
import { EmbeddingsService } from './embeddings.service';

@Module({
  imports: [
    OllamaModule,
    CacheModule.register({
      ttl: 3600000, // 1 hour
      max: 1000,
    }),
  ],
  providers: [EmbeddingsService],
  exports: [EmbeddingsService],
})
export class EmbeddingsModule {}
