import { describe, it, expect } from 'vitest';
import { loadApiConfig } from '../../src/config';
import { baseIndexNames } from '../../src/services';

describe('loadApiConfig', () => {
  it('should apply defaults', () => {
    expect(loadApiConfig({})).toEqual({
      PORT: 8080,
      API_MAX_CONCURRENT: 10,
      API_MAX_QUEUE_SIZE: 50,
      API_QUEUE_TIMEOUT_MS: 30000,
      API_QUERY_LOG: true,
    });
  });

  it('should coerce values from strings', () => {
    const config = loadApiConfig({ PORT: '3000', API_MAX_QUEUE_SIZE: '0', API_QUERY_LOG: 'false' });

    expect(config.PORT).toBe(3000);
    expect(config.API_MAX_QUEUE_SIZE).toBe(0);
    expect(config.API_QUERY_LOG).toBe(false);
  });

  it('should reject an invalid port', () => {
    expect(() => loadApiConfig({ PORT: '70000' })).toThrow(
      'Invalid API configuration:\n  - PORT: Number must be less than or equal to 65535'
    );
  });
});

describe('baseIndexNames', () => {
  it('should use the schema names for the default base', () => {
    expect(baseIndexNames('default')).toEqual({
      fulltextIndex: 'documentContentIndex',
      collectionName: 'document_vectors',
    });
  });

  it('should suffix the names for other bases', () => {
    expect(baseIndexNames('runbooks')).toEqual({
      fulltextIndex: 'documentContentIndex_runbooks',
      collectionName: 'document_vectors_runbooks',
    });
  });
});
