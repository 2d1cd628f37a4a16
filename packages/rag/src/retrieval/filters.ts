/**
 * Metadata filter helpers shared by the index adapters
 * @module @groundwork/rag/retrieval/filters
 */

import type { Scalar, ScalarMap } from '../types';

const FILTER_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validate filter keys and drop null values. A null filter value means
 * "no constraint on this key" for every index.
 */
export function activeFilters(filters: ScalarMap = {}): Array<[string, Exclude<Scalar, null>]> {
  const active: Array<[string, Exclude<Scalar, null>]> = [];

  for (const key of Object.keys(filters).sort()) {
    if (!FILTER_KEY.test(key)) {
      throw new RangeError(`Invalid filter key: ${key}`);
    }
    const value = filters[key];
    if (value !== null && value !== undefined) {
      active.push([key, value]);
    }
  }

  return active;
}

/**
 * Milvus boolean expression over the JSON `metadata` field
 */
export function toMilvusFilter(filters: ScalarMap = {}): string {
  return activeFilters(filters)
    .map(([key, value]) => `metadata["${key}"] == ${JSON.stringify(value)}`)
    .join(' and ');
}
