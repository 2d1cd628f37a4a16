import type { Driver } from 'neo4j-driver';

export const FULLTEXT_INDEX_NAME = 'documentContentIndex';

export const initGraphConstraints = async (driver: Driver) => {
  const session = driver.session();

  try {
    console.log('Initializing Neo4j constraints...');

    // Document: id must be unique (correlates with Postgres and Milvus)
    await session.executeWrite((tx) =>
      tx.run(`
        CREATE CONSTRAINT document_id_unique IF NOT EXISTS
        FOR (d:Document) REQUIRE d.id IS UNIQUE
      `)
    );

    console.log('Neo4j constraints initialized successfully.');
  } catch (error) {
    console.error('Failed to initialize Neo4j constraints:', error);
    throw error;
  } finally {
    await session.close();
  }
};

export const initGraphFulltextIndexes = async (driver: Driver) => {
  const session = driver.session();

  try {
    console.log(`Initializing Neo4j full-text index ${FULLTEXT_INDEX_NAME}...`);

    await session.executeWrite((tx) =>
      tx.run(`
        CREATE FULLTEXT INDEX ${FULLTEXT_INDEX_NAME} IF NOT EXISTS
        FOR (d:Document) ON EACH [d.content]
      `)
    );

    console.log('Neo4j full-text index initialized successfully.');
  } catch (error) {
    console.error('Failed to initialize Neo4j full-text index:', error);
    throw error;
  } finally {
    await session.close();
  }
};

export const initGraphSchema = async (driver: Driver) => {
  await initGraphConstraints(driver);
  await initGraphFulltextIndexes(driver);
};
