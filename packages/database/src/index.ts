import type { MilvusClient } from '@zilliz/milvus2-sdk-node';
import type { Driver } from 'neo4j-driver';

import { getMilvusClient, closeMilvusClient } from './clients/milvus';
import { getNeo4jDriver, closeNeo4jDriver } from './clients/neo4j';
import {
  getPostgresClient,
  getPostgresSql,
  closePostgresClient,
  type PostgresDb,
  type PostgresSql,
} from './clients/postgres';
import { healthCheck, type HealthStatus } from './health/index';

export { initMilvusCollection, COLLECTION_NAME, VECTOR_DIM } from './schema/milvus';
export {
  initGraphConstraints,
  initGraphFulltextIndexes,
  initGraphSchema,
  FULLTEXT_INDEX_NAME,
} from './schema/neo4j';
export * as postgresSchema from './schema/postgres';
export type { DocumentMetadata, DocumentRow } from './schema/postgres';
export { withRetry, type RetryOptions } from './retry/index';
export {
  healthCheck,
  checkMilvusHealth,
  checkNeo4jHealth,
  checkPostgresHealth,
  checkRedisHealth,
  type HealthStatus,
  type HealthCheckClients,
} from './health/index';
export {
  parseDatabaseConfig,
  getDatabaseConfig,
  postgresConnectionString,
  type DatabaseConfig,
} from './config/index';
export type { PostgresDb, PostgresSql } from './clients/postgres';
export {
  PostgresQueryLog,
  hashQuery,
  toQueryRow,
  toRetrievalMetricsRow,
  type QueryLog,
  type QueryLogEntry,
  type RetrievalMetricsEntry,
} from './repositories/query-log';

interface RedisPing {
  ping(): Promise<string>;
}

export class DatabaseManager {
  private _milvus: MilvusClient | null = null;
  private _neo4j: Driver | null = null;
  private _postgres: PostgresDb | null = null;
  private _postgresSql: PostgresSql | null = null;
  private _connected = false;

  get milvus(): MilvusClient {
    if (!this._milvus) {
      throw new Error('Milvus client not connected. Call connect() first.');
    }
    return this._milvus;
  }

  get neo4j(): Driver {
    if (!this._neo4j) {
      throw new Error('Neo4j driver not connected. Call connect() first.');
    }
    return this._neo4j;
  }

  get postgres(): PostgresDb {
    if (!this._postgres) {
      throw new Error('Postgres client not connected. Call connect() first.');
    }
    return this._postgres;
  }

  get isConnected(): boolean {
    return this._connected;
  }

  async connect(): Promise<void> {
    if (this._connected) {
      console.log('DatabaseManager already connected.');
      return;
    }

    console.log('DatabaseManager: Connecting to all databases...');

    const [milvusClient, neo4jDriver] = await Promise.all([
      getMilvusClient(),
      getNeo4jDriver(),
    ]);

    this._milvus = milvusClient;
    this._neo4j = neo4jDriver;
    this._postgres = getPostgresClient();
    this._postgresSql = getPostgresSql();
    this._connected = true;

    console.log('DatabaseManager: All databases connected successfully.');
  }

  async disconnect(): Promise<void> {
    if (!this._connected) {
      console.log('DatabaseManager already disconnected.');
      return;
    }

    console.log('DatabaseManager: Disconnecting from all databases...');

    await Promise.all([
      closeMilvusClient(),
      closeNeo4jDriver(),
      closePostgresClient(),
    ]);

    this._milvus = null;
    this._neo4j = null;
    this._postgres = null;
    this._postgresSql = null;
    this._connected = false;

    console.log('DatabaseManager: All databases disconnected.');
  }

  /**
   * @param redis - cache client to include in the report, when one is configured
   */
  async healthCheck(redis: RedisPing | null = null): Promise<HealthStatus> {
    return healthCheck({
      milvus: this._milvus,
      neo4j: this._neo4j,
      postgres: this._postgresSql,
      redis,
    });
  }
}

let instance: DatabaseManager | null = null;

/**
 * Process-wide manager, created on first use
 */
export const getDatabaseManager = (): DatabaseManager => {
  if (!instance) {
    instance = new DatabaseManager();
  }
  return instance;
};

export { DatabaseManager as default };
