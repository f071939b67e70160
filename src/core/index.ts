// src/core/index.ts
export type {
  DomNode,
  ExtractRecord,
  ExtractScalar,
  ExtractValue,
  FeedPage,
  QueryRoot,
  ScrollablePage,
} from './types/index.js';
export { findContainer, findElement, findElements, readValue, releaseNodes } from './locate/locator.js';
export type { LocateOptions } from './locate/locator.js';
export { defineField, defineSchema, field } from './extract/field.js';
export type {
  CompositeField,
  CustomField,
  ExtractField,
  FieldSpec,
  LeafField,
  ListField,
  RecordSchema,
  Transform,
  TransformContext,
} from './extract/field.js';
export { extractField } from './extract/engine.js';
export { extractRecord, extractRecords } from './extract/records.js';
export { loadSchemaFile, parseSchemaDocument } from './extract/schema-loader.js';
export { composeTransforms, TRANSFORM_NAMES } from './extract/transforms.js';
export type { TransformName } from './extract/transforms.js';
export type { FeedSchema } from './extract/schema-loader.js';
export { adjustTimeoutCounter, rateLimitBackoffSeconds, TimeoutTracker } from './backoff/timeout-tracker.js';
export { ScrollController } from './scroll/controller.js';
export type { CollectResult, ControllerState, DoneReason, ScrollControllerOptions } from './scroll/controller.js';
export { adaptiveScrollMultiplier } from './scroll/adaptive.js';
export { waitFor } from './scroll/wait.js';
export type { WaitFn } from './scroll/wait.js';
export { SeenRecords, byField, getRecordKey } from './dedupe/index.js';
export { ConsoleSink, MemorySink, emitDiagnostic, silentSink } from './logging/diagnostics.js';
export type { DiagnosticEvent, DiagnosticSink, Severity } from './logging/diagnostics.js';
export { StaticPage } from './render/static-page.js';
export { PlaywrightFeedPage } from './render/playwright-page.js';
export { BrowserManager } from './render/browser.js';
export type { BrowserOptions } from './render/browser.js';
export { HarvestOrchestrator, extractStatic } from './orchestrator.js';
export type { CollectOptions, CollectReport } from './orchestrator.js';
export { ErrorCode, HarvestError, summarizeError } from './errors.js';
export { formatJsonOutput, writeOutput } from './export/json.js';
export type { ExtractReport } from './export/json.js';
