import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from '../schema/postgres';
import { getDatabaseConfig, postgresConnectionString } from '../config/index';

export type PostgresDb = PostgresJsDatabase<typeof schema>;
export type PostgresSql = ReturnType<typeof postgres>;

let clientInstance: PostgresSql | null = null;
let dbInstance: PostgresDb | null = null;

const connect = (): { sql: PostgresSql; db: PostgresDb } => {
  const config = getDatabaseConfig();

  console.log(`Connecting to Postgres at ${config.POSTGRES_HOST}:${config.POSTGRES_PORT}...`);

  // postgres.js handles connection pooling and reconnection automatically
  const sql = postgres(postgresConnectionString(config), {
    max: 10,
    onnotice: () => undefined,
  });
  const db = drizzle(sql, { schema });

  clientInstance = sql;
  dbInstance = db;
  return { sql, db };
};

export const getPostgresClient = (): PostgresDb => {
  return dbInstance ?? connect().db;
};

/**
 * Raw postgres.js client behind the drizzle instance, for health checks
 */
export const getPostgresSql = (): PostgresSql => {
  return clientInstance ?? connect().sql;
};

export const closePostgresClient = async () => {
  if (clientInstance) {
    await clientInstance.end();
    clientInstance = null;
    dbInstance = null;
  }
};
