import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { logger } from '../utils/logger';
import type { Env } from './env';

export type Database = PostgresJsDatabase;

export interface DatabaseConnection {
  db: Database;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}

export function createDatabase(config: Env): DatabaseConnection {
  const isProd = config.NODE_ENV === 'production';

  const queryClient = postgres({
    host: config.DB_HOST,
    port: config.DB_PORT,
    username: config.DB_USER,
    password: config.DB_PASSWORD,
    database: config.DB_NAME,
    max: config.DB_POOL_MAX ?? (isProd ? 10 : 5),
    idle_timeout: 20,
    connect_timeout: isProd ? 5 : 10,
    onnotice: () => {},
    ssl: isProd ? 'require' : false,
  });

  return {
    db: drizzle(queryClient),

    async testConnection() {
      try {
        await queryClient`SELECT 1`;
        logger.info('Database connection successful');
        return true;
      } catch (error) {
        logger.error({ error }, 'Database connection failed');
        return false;
      }
    },

    async close() {
      await queryClient.end();
    },
  };
}
