import { registerAs } from '@nestjs/config';

export interface QdrantConfig {
  host: string;
  port: number;
  apiKey?: string;
  https: boolean;
  timeout: number;
  catalogCollection: string;
  contentCollection: string;
  vectorSize: number;
}

export default registerAs(
  'qdrant',
  (): QdrantConfig => ({
    host: process.env.QDRANT_HOST || 'localhost',
    port: parseInt(process.env.QDRANT_PORT || '6333', 10),
    apiKey: process.env.QDRANT_API_KEY || undefined,
    https: process.env.QDRANT_HTTPS === 'true',
    timeout: parseInt(process.env.QDRANT_TIMEOUT || '30000', 10),
    catalogCollection:
      process.env.QDRANT_CATALOG_COLLECTION || 'course_catalog',
    contentCollection:
      process.env.QDRANT_CONTENT_COLLECTION || 'course_content',
    vectorSize: parseInt(process.env.QDRANT_VECTOR_SIZE || '768', 10),
  }),
);
