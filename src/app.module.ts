import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AiModule } from './ai/ai.module';
import qdrantConfig from './config/qdrant.config';
import llmConfig from './config/llm.config';
import ragConfig from './config/rag.config';

@Module({
  imports: [
    // Global config
    ConfigModule.forRoot({
      isGlobal: true,
      load: [qdrantConfig, llmConfig, ragConfig],
      envFilePath: '.env',
    }),

    AiModule,
  ],
})
export class AppModule {}
