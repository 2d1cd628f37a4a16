import { MilvusClient } from '@zilliz/milvus2-sdk-node';
import { getDatabaseConfig } from '../config/index';
import { withRetry } from '../retry/index';

let clientInstance: MilvusClient | null = null;

/**
 * Verifies the Milvus client connection is healthy.
 * Returns true if healthy, false otherwise.
 */
const verifyConnection = async (client: MilvusClient): Promise<boolean> => {
  try {
    const health = await client.checkHealth();
    return health.isHealthy;
  } catch {
    return false;
  }
};

export const getMilvusClient = async (): Promise<MilvusClient> => {
  // If we have an existing client, verify it's still connected
  if (clientInstance) {
    const isHealthy = await verifyConnection(clientInstance);
    if (isHealthy) {
      return clientInstance;
    }
    console.log('Milvus connection stale, reconnecting...');
    const stale = clientInstance;
    clientInstance = null;
    await stale.closeConnection().catch((error: unknown) => {
      console.warn('Closing stale Milvus connection failed:', error instanceof Error ? error.message : String(error));
    });
  }

  const config = getDatabaseConfig();
  const address = `${config.MILVUS_HOST}:${config.MILVUS_PORT}`;

  // Milvus may still be starting up
  const client = await withRetry(async () => {
    console.log(`Connecting to Milvus at ${address}...`);
    const candidate = new MilvusClient({
      address,
      username: config.MILVUS_USER,
      password: config.MILVUS_PASSWORD,
    });

    const isHealthy = await verifyConnection(candidate);
    if (!isHealthy) {
      throw new Error(`Failed to connect to Milvus at ${address}: health check failed`);
    }

    console.log('Successfully connected to Milvus');
    return candidate;
  });

  clientInstance = client;
  return client;
};

export const closeMilvusClient = async () => {
  if (clientInstance) {
    await clientInstance.closeConnection();
    clientInstance = null;
  }
};
