import type { MilvusClient } from '@zilliz/milvus2-sdk-node';
import type { Driver } from 'neo4j-driver';

export interface HealthStatus {
  milvus: boolean;
  neo4j: boolean;
  postgres: boolean;
  /** null when no Redis cache is configured */
  redis: boolean | null;
  healthy: boolean;
}

type MilvusHealthClient = Pick<MilvusClient, 'checkHealth'>;
type Neo4jHealthDriver = Pick<Driver, 'verifyConnectivity'>;
/** A postgres.js tagged-template client */
type PostgresHealthClient = (strings: TemplateStringsArray) => PromiseLike<unknown>;
interface RedisHealthClient {
  ping(): Promise<string>;
}

export interface HealthCheckClients {
  milvus: MilvusHealthClient | null;
  neo4j: Neo4jHealthDriver | null;
  postgres: PostgresHealthClient | null;
  redis?: RedisHealthClient | null;
}

export const checkMilvusHealth = async (client: MilvusHealthClient | null): Promise<boolean> => {
  if (!client) return false;
  try {
    const health = await client.checkHealth();
    return health.isHealthy;
  } catch {
    return false;
  }
};

export const checkNeo4jHealth = async (driver: Neo4jHealthDriver | null): Promise<boolean> => {
  if (!driver) return false;
  try {
    await driver.verifyConnectivity();
    return true;
  } catch {
    return false;
  }
};

export const checkPostgresHealth = async (client: PostgresHealthClient | null): Promise<boolean> => {
  if (!client) return false;
  try {
    await client`SELECT 1`;
    return true;
  } catch {
    return false;
  }
};

export const checkRedisHealth = async (client: RedisHealthClient | null): Promise<boolean> => {
  if (!client) return false;
  try {
    return (await client.ping()) === 'PONG';
  } catch {
    return false;
  }
};

export const healthCheck = async (clients: HealthCheckClients): Promise<HealthStatus> => {
  const redisClient = clients.redis ?? null;

  const [milvus, neo4j, postgres, redis] = await Promise.all([
    checkMilvusHealth(clients.milvus),
    checkNeo4jHealth(clients.neo4j),
    checkPostgresHealth(clients.postgres),
    redisClient ? checkRedisHealth(redisClient) : Promise.resolve(null),
  ]);

  return {
    milvus,
    neo4j,
    postgres,
    redis,
    healthy: milvus && neo4j && postgres && redis !== false,
  };
};
