import {
  pgTable,
  varchar,
  text,
  integer,
  doublePrecision,
  date,
  timestamp,
  vector,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';
import { env } from '../config/env';

export const chunks = pgTable('chunks', {
  collection: varchar('collection', { length: 255 }).notNull(),
  id: varchar('id', { length: 64 }).notNull(),
  documentId: varchar('document_id', { length: 512 }).notNull(),
  ordinal: integer('ordinal').notNull(),
  text: text('text').notNull(),
  tokenCount: integer('token_count').notNull(),
  pageStart: integer('page_start').notNull(),
  pageEnd: integer('page_end').notNull(),
  embedding: vector('embedding', { dimensions: env.EMBEDDING_DIMENSIONS }).notNull(),
  author: varchar('author', { length: 255 }).notNull(),
  region: varchar('region', { length: 255 }),
  date: date('date', { mode: 'string' }),
  language: varchar('language', { length: 32 }).notNull(),
  sizeMb: doublePrecision('size_mb').notNull(),
  uploadTime: timestamp('upload_time', { mode: 'string', withTimezone: true }).notNull(),
  contentHash: varchar('content_hash', { length: 64 }).notNull(),
}, (table) => ({
  pk: primaryKey({ columns: [table.collection, table.id] }),
  documentIdx: index('chunks_collection_document_idx').on(table.collection, table.documentId),
  authorIdx: index('chunks_collection_author_idx').on(table.collection, table.author),
  embeddingIdx: index('chunks_embedding_idx').using('hnsw', table.embedding.op('vector_cosine_ops')),
}));

export type ChunkRow = typeof chunks.$inferSelect;
export type NewChunkRow = typeof chunks.$inferInsert;
