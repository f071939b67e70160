// src/core/extract/records.ts
import type { DomNode, ExtractRecord } from '../types/index.js';
import type { RecordSchema, TransformContext } from './field.js';
import { extractField } from './engine.js';
import type { DiagnosticSink } from '../logging/diagnostics.js';

export async function extractRecord(
  container: DomNode,
  schema: RecordSchema,
  sink?: DiagnosticSink,
  context?: TransformContext
): Promise<ExtractRecord> {
  const record: ExtractRecord = {};
  for (const [key, field] of Object.entries(schema)) {
    record[key] = await extractField(container, field, key, sink, context);
  }
  return record;
}

/**
 * One record per container, in document order.
 */
export async function extractRecords(
  containers: DomNode[],
  schema: RecordSchema,
  sink?: DiagnosticSink,
  context?: TransformContext
): Promise<ExtractRecord[]> {
  const records: ExtractRecord[] = [];
  for (const container of containers) {
    records.push(await extractRecord(container, schema, sink, context));
  }
  return records;
}
