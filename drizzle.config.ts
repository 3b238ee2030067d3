import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/models/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    host: process.env.DB_HOST || 'localhost',
    port: Number(process.env.DB_PORT) || 5432,
    user: process.env.DB_USER || 'stance',
    password: process.env.DB_PASSWORD || 'stance_dev_pass',
    database: process.env.DB_NAME || 'stance_search',
  },
});
