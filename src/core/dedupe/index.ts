// src/core/dedupe/index.ts
export { SeenRecords } from './seen.js';
export { getRecordKey, byField } from './strategy.js';
export type { RecordIdentity } from './strategy.js';
