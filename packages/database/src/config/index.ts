import { z } from 'zod';

const envSchema = z.object({
  // Milvus Configuration
  MILVUS_HOST: z.string().default('localhost'),
  MILVUS_PORT: z.string().default('19530'),
  MILVUS_USER: z.string().optional(),
  MILVUS_PASSWORD: z.string().optional(),

  // Neo4j Configuration
  NEO4J_URI: z.string().default('bolt://localhost:7687'),
  NEO4J_USER: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().min(1, 'NEO4J_PASSWORD is required'),

  // Postgres Configuration
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.string().default('5432'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().min(1, 'POSTGRES_PASSWORD is required'),
  POSTGRES_DB: z.string().default('groundwork'),

  // App Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type DatabaseConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate database settings, reporting every issue in one error
 */
export function parseDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsedEnv = envSchema.safeParse(env);

  if (!parsedEnv.success) {
    const issues = parsedEnv.error.issues
      .map((issue) => {
        const path = issue.path.join('.') || 'ROOT';
        return `  - ${path}: ${issue.message}`;
      })
      .join('\n');

    throw new Error(`Invalid environment configuration:\n${issues}`);
  }

  return parsedEnv.data;
}

let config: DatabaseConfig | null = null;

/**
 * process.env is read on first use, not on import
 */
export function getDatabaseConfig(): DatabaseConfig {
  if (!config) {
    try {
      config = parseDatabaseConfig();
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      throw error;
    }
  }
  return config;
}

export function postgresConnectionString(
  cfg: Pick<DatabaseConfig, 'POSTGRES_USER' | 'POSTGRES_PASSWORD' | 'POSTGRES_HOST' | 'POSTGRES_PORT' | 'POSTGRES_DB'>
): string {
  const user = encodeURIComponent(cfg.POSTGRES_USER);
  const password = encodeURIComponent(cfg.POSTGRES_PASSWORD);
  return `postgres://${user}:${password}@${cfg.POSTGRES_HOST}:${cfg.POSTGRES_PORT}/${cfg.POSTGRES_DB}`;
}
