import { createDatabase, type DatabaseConnection } from '../config/database';
import type { Env } from '../config/env';
import { getJudgmentModelConfig } from '../config/models';
import { logger } from '../utils/logger';
import { CharEstimateTokenizer, SemanticChunker } from './chunker';
import { createEmbeddingProvider, RedisEmbeddingCacheStore, type EmbeddingProvider } from './embeddings';
import { GeminiJudgmentModel } from './gemini/judgment.model';
import { IngestionOrchestrator } from './ingestion';
import { DocumentParser, PdfJsBackend, type PdfTextBackend } from './parser';
import { RedisService } from './redis';
import { createReranker, type RerankerProvider } from './reranker';
import { Retriever } from './retriever';
import { StanceAggregator, type JudgmentModel } from './stance';
import { MemoryVectorStore, PostgresVectorStore, VectorIndex, type VectorStore } from './vectorIndex';

export interface Services {
  config: Env;
  parser: DocumentParser;
  chunker: SemanticChunker;
  embedder: EmbeddingProvider;
  index: VectorIndex;
  retriever: Retriever;
  stance: StanceAggregator;
  ingestion: IngestionOrchestrator;
  close(): Promise<void>;
}

/** Swap points for the external edges; tests pass in-process fakes. */
export interface ServiceOverrides {
  backend?: PdfTextBackend;
  embedder?: EmbeddingProvider;
  store?: VectorStore;
  reranker?: RerankerProvider | null;
  judgmentModel?: JudgmentModel;
  now?: () => Date;
}

export function createServices(config: Env, overrides: ServiceOverrides = {}): Services {
  let redis: RedisService | null = null;
  let database: DatabaseConnection | null = null;

  const parser = new DocumentParser(overrides.backend ?? new PdfJsBackend(), {
    strategy: config.PARSER_STRATEGY,
    device: config.PARSER_DEVICE,
    threadCount: config.PARSER_THREADS,
  });

  let embedder = overrides.embedder;
  if (!embedder) {
    if (config.REDIS_URL) {
      redis = new RedisService(config.REDIS_URL);
    }
    embedder = createEmbeddingProvider(config, redis ? new RedisEmbeddingCacheStore(redis) : undefined);
  }

  const chunker = new SemanticChunker(embedder, new CharEstimateTokenizer(config.CHARS_PER_TOKEN), {
    tokenBudget: config.CHUNK_TOKEN_BUDGET,
    similarityThreshold: config.CHUNK_SIMILARITY_THRESHOLD,
    doublePassMerge: config.CHUNK_DOUBLE_PASS_MERGE,
  });

  let store = overrides.store;
  if (!store) {
    if (config.VECTOR_STORE === 'postgres') {
      database = createDatabase(config);
      store = new PostgresVectorStore(database.db, config.COLLECTION_NAME);
    } else {
      store = new MemoryVectorStore();
    }
  }
  const index = new VectorIndex(store, config.EMBEDDING_DIMENSIONS);

  const reranker = overrides.reranker === undefined ? createReranker(config) : overrides.reranker;
  const retriever = new Retriever(embedder, index, reranker, {
    topKDefault: config.TOP_K_DEFAULT,
    overfetchFactor: config.OVERFETCH_FACTOR,
  });

  const judgmentModel =
    overrides.judgmentModel ??
    new GeminiJudgmentModel({
      apiKey: config.GEMINI_API_KEY,
      model: config.JUDGMENT_MODEL,
      modelConfig: getJudgmentModelConfig(config.JUDGMENT_MODEL),
      timeoutMs: config.MODEL_TIMEOUT_MS,
      maxAttempts: config.MODEL_MAX_ATTEMPTS,
      retryBaseMs: config.MODEL_RETRY_BASE_MS,
    });
  const stance = new StanceAggregator(judgmentModel, {
    concurrency: config.MODEL_CONCURRENCY,
    weighting: config.STANCE_WEIGHTING,
  });

  const ingestion = new IngestionOrchestrator(parser, chunker, embedder, index, {
    documentsDir: config.DOCUMENTS_DIR,
    now: overrides.now,
  });

  logger.info(
    {
      store: index.backend,
      embeddingModel: embedder.model,
      judgmentModel: judgmentModel.name,
      reranker: reranker?.name ?? null,
    },
    'Services created'
  );

  return {
    config,
    parser,
    chunker,
    embedder,
    index,
    retriever,
    stance,
    ingestion,
    async close() {
      await index.close();
      if (database) await database.close();
      if (redis) await redis.disconnect();
    },
  };
}
