/**
 * Neo4j Lexical Index
 *
 * Keyword search over `:Document` nodes through the Lucene full-text index
 * `documentContentIndex`. Lucene scores are BM25-style; only the order they
 * produce is kept for fusion.
 *
 * @module @groundwork/rag/retrieval/lexical
 */

import { int, type Driver } from 'neo4j-driver';
import { z } from 'zod';
import type { CandidateResult, SearchOptions } from '../types';
import { IndexUnavailableError, errorMessage } from '../errors';
import { activeFilters } from './filters';

/**
 * Keyword-ranking index contract
 */
export interface LexicalIndex {
  readonly name: string;
  search(text: string, topK: number, options?: SearchOptions): Promise<CandidateResult[]>;
}

export interface Neo4jLexicalIndexConfig {
  /** Name reported in errors and traces */
  name: string;
  /** Full-text index over Document.content */
  fulltextIndex: string;
  /** Neo4j database; the server default when omitted */
  database?: string;
}

const DEFAULT_CONFIG: Neo4jLexicalIndexConfig = {
  name: 'neo4j-fulltext',
  fulltextIndex: 'documentContentIndex',
};

const hitSchema = z.object({
  docId: z.string(),
  score: z.number(),
});

/**
 * Escape special Lucene query characters
 */
export function escapeLuceneQuery(query: string): string {
  const specialChars = /[+\-&|!(){}[\]^"~*?:\\/]/g;
  return query.replace(specialChars, '\\$&');
}

export function assertValidTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}`);
  }
}

/**
 * The slice of the Neo4j driver this index calls
 */
export type Neo4jSessionFactory = Pick<Driver, 'session'>;

export class Neo4jLexicalIndex implements LexicalIndex {
  private driver: Neo4jSessionFactory;
  private config: Neo4jLexicalIndexConfig;

  constructor(driver: Neo4jSessionFactory, config: Partial<Neo4jLexicalIndexConfig> = {}) {
    this.driver = driver;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get name(): string {
    return this.config.name;
  }

  async search(
    text: string,
    topK: number,
    options: SearchOptions = {}
  ): Promise<CandidateResult[]> {
    assertValidTopK(topK);

    const escaped = escapeLuceneQuery(text.trim());
    if (escaped.length === 0) {
      return [];
    }

    const filters = Object.fromEntries(activeFilters(options.filters));
    const cypher = `
      CALL db.index.fulltext.queryNodes($indexName, $query) YIELD node, score
      WHERE all(key IN keys($filters) WHERE node[key] = $filters[key])
      RETURN node.id AS docId, score
      ORDER BY score DESC, docId ASC
      LIMIT $topK
    `;

    const session = this.driver.session(
      this.config.database ? { database: this.config.database } : {}
    );

    let closed = false;
    const closeSession = (): Promise<void> => {
      if (closed) return Promise.resolve();
      closed = true;
      return session.close();
    };

    // Closing the session abandons the in-flight query
    const onAbort = () => {
      closeSession().catch((error: unknown) => {
        console.warn(`Failed to close aborted lexical session: ${errorMessage(error)}`);
      });
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await session.run(cypher, {
        indexName: this.config.fulltextIndex,
        query: escaped,
        filters,
        topK: int(topK),
      });

      return result.records.map((record, rank) => {
        const hit = hitSchema.parse({
          docId: record.get('docId'),
          score: record.get('score'),
        });
        return {
          docId: hit.docId,
          source: 'lexical' as const,
          rank,
          rawScore: hit.score,
        };
      });
    } catch (error) {
      throw new IndexUnavailableError(this.config.name, 'lexical_index', errorMessage(error), error);
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      await closeSession();
    }
  }
}

export function createLexicalIndex(
  driver: Neo4jSessionFactory,
  config?: Partial<Neo4jLexicalIndexConfig>
): Neo4jLexicalIndex {
  return new Neo4jLexicalIndex(driver, config);
}
