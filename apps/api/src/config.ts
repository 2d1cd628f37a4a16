/**
 * API server settings from the environment
 * @module apps/api/config
 */

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  API_MAX_CONCURRENT: z.coerce.number().int().positive().default(10),
  API_MAX_QUEUE_SIZE: z.coerce.number().int().min(0).default(50),
  API_QUEUE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  /** Record each query's outcome in the rag_queries table */
  API_QUERY_LOG: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export type ApiConfig = z.infer<typeof envSchema>;

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.') || 'ROOT'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid API configuration:\n${issues}`);
  }

  return parsed.data;
}
