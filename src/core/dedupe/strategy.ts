// src/core/dedupe/strategy.ts
import type { ExtractRecord } from '../types/index.js';
import { isValidUrl, normalizeUrl } from '../render/utils.js';

export type RecordIdentity = (record: ExtractRecord) => string | null;

/**
 * Stable key of a record: the identity field, hash-stripped when it is a URL.
 */
export function getRecordKey(record: ExtractRecord, identityField: string): string | null {
  const value = record[identityField];
  if (value === null || value === undefined || typeof value === 'object') {
    return null;
  }

  const key = String(value).trim();
  if (!key) {
    return null;
  }

  return isValidUrl(key) ? normalizeUrl(key) : key;
}

export function byField(identityField: string): RecordIdentity {
  return (record) => getRecordKey(record, identityField);
}
