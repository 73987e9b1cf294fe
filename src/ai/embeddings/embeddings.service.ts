import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import type { Cache } from 'cache-manager';
import * as crypto from 'crypto';
import { OllamaService } from '../llm/ollama.service';
import { QdrantConfig } from '../../config/qdrant.config';

@Injectable()
export class EmbeddingsService {
  private readonly logger = new Logger(EmbeddingsService.name);
  private readonly vectorDimension: number;
  private readonly maxTextLength: number = 32000; // ~8192 tokens
  private readonly CACHE_TTL = 3600000; // 1 hour

  constructor(
    private readonly ollamaService: OllamaService,
    private readonly configService: ConfigService,
    @Inject(CACHE_MANAGER) private cacheManager: Cache,
  ) {
    this.vectorDimension =
      this.configService.getOrThrow<QdrantConfig>('qdrant').vectorSize;
  }

  /**
   * Generate embedding for a single text. Course titles are embedded on
   * every fuzzy name lookup, so repeated texts are served from the cache.
   */
  async generateEmbedding(text: string): Promise<number[]> {
    const processedText = this.preprocessText(text);
    const cacheKey = this.generateCacheKey(processedText);

    const cached = await this.cacheManager.get<number[]>(cacheKey);
    if (cached) {
      this.logger.debug('✅ Using cached embedding');
      return cached;
    }

    this.logger.debug(
      `🔢 Embedding text: "${processedText.substring(0, 50)}..."`,
    );
    const embedding = await this.ollamaService.generateEmbedding(processedText);

    if (!this.validateEmbedding(embedding)) {
      throw new Error('Generated embedding failed validation');
    }

    await this.cacheManager.set(cacheKey, embedding, this.CACHE_TTL);
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts, sequentially
   */
  async generateBatchEmbeddings(texts: string[]): Promise<number[][]> {
    this.logger.log(`Generating batch embeddings for ${texts.length} texts...`);

    const embeddings: number[][] = [];
    for (const [i, text] of texts.entries()) {
      embeddings.push(await this.generateEmbedding(text));

      if ((i + 1) % 10 === 0 || i + 1 === texts.length) {
        this.logger.log(`Progress: ${i + 1}/${texts.length} embeddings generated`);
      }
    }

    return embeddings;
  }

  preprocessText(text: string): string {
    let processed = text.trim().replace(/\s+/g, ' ').normalize('NFC');

    if (processed.length > this.maxTextLength) {
      this.logger.warn(
        `Text exceeds max length (${processed.length} > ${this.maxTextLength}), truncating...`,
      );
      processed = processed.substring(0, this.maxTextLength);
    }

    // Control characters other than newline and tab
    return processed.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  }

  validateEmbedding(embedding: number[]): boolean {
    if (embedding.length !== this.vectorDimension) {
      this.logger.error(
        `Invalid embedding dimension: expected ${this.vectorDimension}, got ${embedding.length}`,
      );
      return false;
    }

    if (embedding.some((val) => !Number.isFinite(val))) {
      this.logger.error('Embedding contains NaN or infinite values');
      return false;
    }

    if (embedding.every((val) => val === 0)) {
      this.logger.error('Embedding is all zeros (invalid)');
      return false;
    }

    return true;
  }

  private generateCacheKey(text: string): string {
    return `embedding:${crypto.createHash('md5').update(text).digest('hex')}`;
  }
}
