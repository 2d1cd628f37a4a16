import neo4j, { type Driver } from 'neo4j-driver';
import { getDatabaseConfig } from '../config/index';
import { withRetry } from '../retry/index';

let driverInstance: Driver | null = null;

export const getNeo4jDriver = async (): Promise<Driver> => {
  if (driverInstance) {
    return driverInstance;
  }

  const { NEO4J_URI: uri, NEO4J_USER: user, NEO4J_PASSWORD: password } = getDatabaseConfig();

  const driver = await withRetry(async () => {
    console.log(`Connecting to Neo4j at ${uri}...`);

    const candidate = neo4j.driver(uri, neo4j.auth.basic(user, password));

    try {
      const serverInfo = await candidate.getServerInfo();
      console.log(`Connected to Neo4j: ${serverInfo.address} (${serverInfo.agent})`);
    } catch (error) {
      await candidate.close();
      throw error;
    }

    return candidate;
  });

  driverInstance = driver;
  return driver;
};

export const closeNeo4jDriver = async () => {
  if (driverInstance) {
    await driverInstance.close();
    driverInstance = null;
  }
};
