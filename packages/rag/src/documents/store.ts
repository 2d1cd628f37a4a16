/**
 * Document Store
 *
 * Versioned document records and the version-bump hook that drives cache
 * invalidation. Readers compare versions without locking; each version of
 * a document is immutable.
 *
 * @module @groundwork/rag/documents/store
 */

import type { Document, ScalarMap } from '../types';

/**
 * Called after a document moves past `oldVersion` (edited or removed)
 */
export type VersionBumpListener = (
  docId: string,
  oldVersion: number
) => void | Promise<void>;

export interface DocumentStore {
  get(id: string): Promise<Document | null>;
  getMany(ids: readonly string[]): Promise<Map<string, Document>>;
  /** Current version, or null when the document does not exist */
  currentVersion(id: string): Promise<number | null>;
  /** Subscribe to version bumps; returns an unsubscribe function */
  onVersionBump(listener: VersionBumpListener): () => void;
}

/**
 * Listener registry shared by the store implementations
 */
export class VersionBumpEmitter {
  private listeners = new Set<VersionBumpListener>();

  subscribe(listener: VersionBumpListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Notify every listener. A failing listener is logged and does not stop
   * the others; lazy invalidation on read covers what it missed.
   */
  async emit(docId: string, oldVersion: number): Promise<void> {
    const results = await Promise.allSettled(
      Array.from(this.listeners, async (listener) => listener(docId, oldVersion))
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        console.error(
          `Version bump listener failed for ${docId}@${oldVersion}:`,
          result.reason instanceof Error ? result.reason.message : String(result.reason)
        );
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }
}

/**
 * In-process document store
 */
export class InMemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, Document>();
  private emitter = new VersionBumpEmitter();

  constructor(initial: ReadonlyArray<Omit<Document, 'version'>> = []) {
    for (const doc of initial) {
      this.documents.set(doc.id, { ...doc, metadata: { ...doc.metadata }, version: 1 });
    }
  }

  async get(id: string): Promise<Document | null> {
    return this.documents.get(id) ?? null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, Document>> {
    const found = new Map<string, Document>();
    for (const id of ids) {
      const doc = this.documents.get(id);
      if (doc) found.set(id, doc);
    }
    return found;
  }

  async currentVersion(id: string): Promise<number | null> {
    return this.documents.get(id)?.version ?? null;
  }

  onVersionBump(listener: VersionBumpListener): () => void {
    return this.emitter.subscribe(listener);
  }

  /**
   * Create a document or store a new version of it
   */
  async put(id: string, content: string, metadata: ScalarMap = {}): Promise<Document> {
    const previous = this.documents.get(id);
    const next: Document = {
      id,
      content,
      metadata: { ...metadata },
      version: previous ? previous.version + 1 : 1,
    };

    // Replace the record before notifying so readers never see the old version as current
    this.documents.set(id, next);

    if (previous) {
      await this.emitter.emit(id, previous.version);
    }

    return next;
  }

  /**
   * Remove a document; cached values built from it are invalidated
   */
  async remove(id: string): Promise<boolean> {
    const previous = this.documents.get(id);
    if (!previous) return false;

    this.documents.delete(id);
    await this.emitter.emit(id, previous.version);
    return true;
  }

  get size(): number {
    return this.documents.size;
  }
}
