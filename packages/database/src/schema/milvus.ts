import { DataType, type MilvusClient } from '@zilliz/milvus2-sdk-node';

export const COLLECTION_NAME = 'document_vectors';
export const VECTOR_DIM = 1536;

const createVectorIndex = async (client: MilvusClient) => {
  await client.createIndex({
    collection_name: COLLECTION_NAME,
    field_name: 'vector',
    index_name: 'vector_hnsw',
    index_type: 'HNSW',
    metric_type: 'COSINE',
    params: { M: 16, efConstruction: 200 },
  });
};

export const initMilvusCollection = async (client: MilvusClient, dim: number = VECTOR_DIM) => {
  console.log(`Checking Milvus collection: ${COLLECTION_NAME}...`);

  const hasCollection = await client.hasCollection({
    collection_name: COLLECTION_NAME,
  });

  if (hasCollection.value) {
    console.log(`Collection ${COLLECTION_NAME} already exists.`);

    await createVectorIndex(client);
    await client.loadCollectionSync({
      collection_name: COLLECTION_NAME,
    });

    return;
  }

  console.log(`Creating collection ${COLLECTION_NAME}...`);

  await client.createCollection({
    collection_name: COLLECTION_NAME,
    fields: [
      {
        name: 'doc_id',
        description: 'Document id (matches Postgres documents.id)',
        data_type: DataType.VarChar,
        max_length: 256,
        is_primary_key: true,
        autoID: false,
      },
      {
        name: 'version',
        description: 'Document version the vector was computed from',
        data_type: DataType.Int64,
      },
      {
        name: 'vector',
        description: 'Embedding vector',
        data_type: DataType.FloatVector,
        dim,
      },
      {
        name: 'metadata',
        description: 'Flat scalar metadata used for filtering',
        data_type: DataType.JSON,
      },
    ],
  });

  console.log(`Creating index for ${COLLECTION_NAME}...`);
  await createVectorIndex(client);

  console.log(`Loading collection ${COLLECTION_NAME}...`);
  await client.loadCollectionSync({
    collection_name: COLLECTION_NAME,
  });

  console.log(`Collection ${COLLECTION_NAME} initialized successfully.`);
};
