// src/core/dedupe/seen.ts

/**
 * Record keys seen by one session, plus keys known from earlier runs.
 */
export class SeenRecords {
  private known: Set<string>;
  private session = new Set<string>();

  constructor(knownKeys: Iterable<string> = []) {
    this.known = new Set(knownKeys);
  }

  /** Seen earlier in this session or known from a previous run */
  has(key: string): boolean {
    return this.session.has(key) || this.known.has(key);
  }

  /** Known from a previous run only */
  isKnown(key: string): boolean {
    return this.known.has(key);
  }

  add(key: string): void {
    this.session.add(key);
  }
}
