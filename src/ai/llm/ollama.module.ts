import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { OllamaService } from './ollama.service';
import { LlmConfig } from '../../config/llm.config';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        // Per-request timeouts override this for embeddings and health checks
        timeout: configService.getOrThrow<LlmConfig>('llm').completionTimeout,
        maxRedirects: 5,
      }),
    }),
  ],
  providers: [OllamaService],
  exports: [OllamaService],
})
export class OllamaModule {}
