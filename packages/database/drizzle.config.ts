import { defineConfig } from 'drizzle-kit';

// Use environment variables directly (with defaults for migration generation)
const url =
  process.env.POSTGRES_URL ||
  `postgres://${process.env.POSTGRES_USER || 'postgres'}:${process.env.POSTGRES_PASSWORD || 'postgres'}@${process.env.POSTGRES_HOST || 'localhost'}:${process.env.POSTGRES_PORT || '5432'}/${process.env.POSTGRES_DB || 'groundwork'}`;

export default defineConfig({
  schema: './src/schema/postgres.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url,
  },
});
