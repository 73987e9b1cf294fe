import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QdrantClient } from '@qdrant/js-client-rest';
import { QdrantConfig } from '../../config/qdrant.config';
import { errorMessage } from '../../common/utils/guards';
import { IndexQueryError } from '../errors';

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export interface SearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface CollectionInfo {
  exists: boolean;
  vectorCount?: number;
}

/** Equality condition on one payload field */
export interface MatchCondition {
  key: string;
  match: { value: string | number };
}

/** Conjunction of equality conditions, applied before similarity ranking */
export interface PayloadFilter {
  must: MatchCondition[];
}

export interface PayloadIndexSpec {
  field: string;
  schema: 'keyword' | 'integer';
}

@Injectable()
export class QdrantService implements OnModuleInit {
  private readonly logger = new Logger(QdrantService.name);
  private readonly client: QdrantClient;
  private readonly config: QdrantConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = this.configService.getOrThrow<QdrantConfig>('qdrant');

    this.client = new QdrantClient({
      url: `${this.config.https ? 'https' : 'http'}://${this.config.host}:${this.config.port}`,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
    });
  }

  async onModuleInit() {
    await this.initialize();
  }

  /**
   * Test connection to Qdrant and report the state of both course collections
   */
  async initialize(): Promise<void> {
    try {
      this.logger.log('Connecting to Qdrant...');
      await this.client.getCollections();
      this.logger.log(
        `✓ Connected to Qdrant at ${this.config.host}:${this.config.port}`,
      );

      for (const name of [
        this.config.catalogCollection,
        this.config.contentCollection,
      ]) {
        const info = await this.getCollection(name);
        if (info.exists) {
          this.logger.log(
            `✓ Collection "${name}" found (${info.vectorCount ?? 0} vectors)`,
          );
        } else {
          this.logger.warn(
            `⚠ Collection "${name}" does not exist. Load courses with: npm run index:courses`,
          );
        }
      }
    } catch (error) {
      this.logger.error(`✗ Failed to connect to Qdrant: ${errorMessage(error)}`);

      // Fail-fast in development
      if (process.env.NODE_ENV === 'development') {
        throw new Error(`Qdrant connection failed: ${errorMessage(error)}`);
      }

      this.logger.warn(
        '⚠ Course search will be unavailable until Qdrant is accessible',
      );
    }
  }

  /**
   * Create a cosine collection with payload indices, unless it exists
   */
  async ensureCollection(
    collectionName: string,
    indices: PayloadIndexSpec[],
  ): Promise<void> {
    if (await this.collectionExists(collectionName)) {
      this.logger.log(
        `Collection "${collectionName}" already exists, skipping creation`,
      );
      return;
    }

    this.logger.log(
      `Creating collection "${collectionName}" with vector size ${this.config.vectorSize}...`,
    );

    await this.client.createCollection(collectionName, {
      vectors: {
        size: this.config.vectorSize,
        distance: 'Cosine',
      },
      hnsw_config: {
        m: 16, // Number of connections per node
        ef_construct: 100, // Quality of index construction
      },
    });

    for (const index of indices) {
      await this.client.createPayloadIndex(collectionName, {
        field_name: index.field,
        field_schema: index.schema,
      });
    }

    this.logger.log(`✓ Collection "${collectionName}" created successfully`);
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    try {
      const collections = await this.client.getCollections();
      return collections.collections.some((col) => col.name === collectionName);
    } catch (error) {
      this.logger.error(
        `Failed to check collection existence: ${errorMessage(error)}`,
      );
      return false;
    }
  }

  /**
   * Upsert points in batches
   */
  async upsertPoints(
    collectionName: string,
    points: VectorPoint[],
    batchSize: number = 100,
  ): Promise<void> {
    for (let i = 0; i < points.length; i += batchSize) {
      const batch = points.slice(i, i + batchSize);

      for (const point of batch) {
        if (point.vector.length !== this.config.vectorSize) {
          throw new Error(
            `Vector dimension mismatch for id "${point.id}": expected ${this.config.vectorSize}, got ${point.vector.length}`,
          );
        }
      }

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((point) => ({
          id: point.id,
          vector: point.vector,
          payload: point.payload,
        })),
      });

      this.logger.debug(
        `Progress: ${Math.min(i + batchSize, points.length)}/${points.length} points upserted into "${collectionName}"`,
      );
    }
  }

  /**
   * Similarity search, optionally restricted by a payload filter
   */
  async searchVectors(
    collectionName: string,
    queryVector: number[],
    limit: number,
    filter?: PayloadFilter,
  ): Promise<SearchResult[]> {
    try {
      const results = await this.client.search(collectionName, {
        vector: queryVector,
        limit,
        with_payload: true,
        filter: filter && filter.must.length > 0 ? filter : undefined,
      });

      return results.map((result) => ({
        id: result.id.toString(),
        score: result.score,
        payload: result.payload || {},
      }));
    } catch (error) {
      this.logger.error(
        `Search in "${collectionName}" failed: ${errorMessage(error)}`,
      );
      throw new IndexQueryError(collectionName, errorMessage(error), error);
    }
  }

  /**
   * Read points by filter without a query vector
   */
  async scrollPoints(
    collectionName: string,
    filter?: PayloadFilter,
    limit: number = 100,
  ): Promise<SearchResult[]> {
    try {
      const results = await this.client.scroll(collectionName, {
        limit,
        with_payload: true,
        with_vector: false,
        filter: filter && filter.must.length > 0 ? filter : undefined,
      });

      return results.points.map((point) => ({
        id: point.id.toString(),
        score: 0,
        payload: point.payload || {},
      }));
    } catch (error) {
      this.logger.error(
        `Scroll in "${collectionName}" failed: ${errorMessage(error)}`,
      );
      throw new IndexQueryError(collectionName, errorMessage(error), error);
    }
  }

  /**
   * Read every point matching `filter`, following `next_page_offset` until
   * Qdrant reports no further page.
   */
  async scrollAll(
    collectionName: string,
    filter?: PayloadFilter,
    pageSize: number = 256,
  ): Promise<SearchResult[]> {
    const points: SearchResult[] = [];
    let offset: string | number | Record<string, unknown> | undefined;
    let pages = 0;

    try {
      do {
        const page = await this.client.scroll(collectionName, {
          limit: pageSize,
          offset,
          with_payload: true,
          with_vector: false,
          filter: filter && filter.must.length > 0 ? filter : undefined,
        });

        for (const point of page.points) {
          points.push({
            id: point.id.toString(),
            score: 0,
            payload: point.payload || {},
          });
        }
        offset = page.next_page_offset ?? undefined;
        pages++;
      } while (offset !== undefined);
    } catch (error) {
      this.logger.error(
        `Scroll in "${collectionName}" failed after ${pages} page(s): ${errorMessage(error)}`,
      );
      throw new IndexQueryError(collectionName, errorMessage(error), error);
    }

    this.logger.debug(
      `Scrolled ${points.length} point(s) from "${collectionName}" in ${pages} page(s)`,
    );
    return points;
  }

  async getCollection(collectionName: string): Promise<CollectionInfo> {
    try {
      if (!(await this.collectionExists(collectionName))) {
        return { exists: false };
      }

      const info = await this.client.getCollection(collectionName);
      return {
        exists: true,
        vectorCount: info.points_count ?? undefined,
      };
    } catch (error) {
      this.logger.error(`Failed to get collection info: ${errorMessage(error)}`);
      return { exists: false };
    }
  }

  getCatalogCollection(): string {
    return this.config.catalogCollection;
  }

  getContentCollection(): string {
    return this.config.contentCollection;
  }
}
