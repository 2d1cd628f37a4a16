/**
 * Postgres-backed document store (drizzle over postgres.js)
 * @module @groundwork/rag/documents/postgres
 */

import { eq, inArray, sql } from 'drizzle-orm';
import type { PostgresDb } from '@groundwork/database';
import { documents, type DocumentRow } from '@groundwork/database/schema';
import type { Document, ScalarMap } from '../types';
import { VersionBumpEmitter, type DocumentStore, type VersionBumpListener } from './store';

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    content: row.content,
    metadata: row.metadata,
    version: row.version,
  };
}

export class PostgresDocumentStore implements DocumentStore {
  private db: PostgresDb;
  private emitter = new VersionBumpEmitter();

  constructor(db: PostgresDb) {
    this.db = db;
  }

  async get(id: string): Promise<Document | null> {
    const rows = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return rows.length > 0 ? toDocument(rows[0]) : null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, Document>> {
    const found = new Map<string, Document>();
    if (ids.length === 0) {
      return found;
    }

    const rows = await this.db
      .select()
      .from(documents)
      .where(inArray(documents.id, Array.from(new Set(ids))));

    for (const row of rows) {
      found.set(row.id, toDocument(row));
    }
    return found;
  }

  async currentVersion(id: string): Promise<number | null> {
    const rows = await this.db
      .select({ version: documents.version })
      .from(documents)
      .where(eq(documents.id, id))
      .limit(1);
    return rows.length > 0 ? rows[0].version : null;
  }

  onVersionBump(listener: VersionBumpListener): () => void {
    return this.emitter.subscribe(listener);
  }

  /**
   * Create a document or store a new version of it. The row lock keeps
   * concurrent writers from producing the same version twice.
   */
  async put(id: string, content: string, metadata: ScalarMap = {}): Promise<Document> {
    const { document, previousVersion } = await this.db.transaction(async (tx) => {
      const existing = await tx
        .select({ version: documents.version })
        .from(documents)
        .where(eq(documents.id, id))
        .for('update');

      if (existing.length === 0) {
        const [inserted] = await tx
          .insert(documents)
          .values({ id, content, metadata, version: 1 })
          .returning();
        return { document: toDocument(inserted), previousVersion: null };
      }

      const previous = existing[0].version;
      const [updated] = await tx
        .update(documents)
        .set({ content, metadata, version: previous + 1, updatedAt: sql`now()` })
        .where(eq(documents.id, id))
        .returning();
      return { document: toDocument(updated), previousVersion: previous };
    });

    // Notify after commit so listeners never see the old version as current
    if (previousVersion !== null) {
      await this.emitter.emit(id, previousVersion);
    }
    return document;
  }

  async remove(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(documents)
      .where(eq(documents.id, id))
      .returning({ version: documents.version });

    if (deleted.length === 0) return false;
    await this.emitter.emit(id, deleted[0].version);
    return true;
  }

  /**
   * Signal a bump made outside this process, e.g. by an ingestion job
   */
  async notifyVersionBump(docId: string, oldVersion: number): Promise<void> {
    await this.emitter.emit(docId, oldVersion);
  }
}

export function createPostgresDocumentStore(db: PostgresDb): PostgresDocumentStore {
  return new PostgresDocumentStore(db);
}
