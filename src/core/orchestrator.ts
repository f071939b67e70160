// src/core/orchestrator.ts
import { BrowserManager, type BrowserOptions } from './render/browser.js';
import { PlaywrightFeedPage } from './render/playwright-page.js';
import { StaticPage } from './render/static-page.js';
import { isValidUrl } from './render/utils.js';
import { ScrollController, type DoneReason, type ScrollControllerOptions } from './scroll/controller.js';
import { extractRecords } from './extract/records.js';
import { findElements, releaseNodes } from './locate/locator.js';
import { byField } from './dedupe/index.js';
import { ErrorCode, HarvestError } from './errors.js';
import { ConsoleSink, emitDiagnostic, type DiagnosticSink } from './logging/diagnostics.js';
import { DEFAULT_TIMEOUT, INITIAL_LOAD_TIMEOUT } from './config/constants.js';
import type { FeedSchema } from './extract/schema-loader.js';
import type { ExtractRecord } from './types/index.js';

export type CollectOptions = Omit<
  ScrollControllerOptions,
  'containerSelector' | 'schema' | 'identify'
> & {
  navigationTimeout?: number;
  /** How long to wait for the first container */
  initialLoadTimeout?: number;
};

export interface CollectReport {
  url: string;
  reason: DoneReason | 'no-containers';
  records: ExtractRecord[];
  attempts: number;
  backoffs: number;
  consecutiveTimeouts: number;
  fetchedAt: string;
}

export class HarvestOrchestrator {
  private browserManager: BrowserManager;

  constructor(options?: BrowserOptions, sessionDir?: string) {
    this.browserManager = new BrowserManager(sessionDir, options);
  }

  async collect(url: string, schema: FeedSchema, options: CollectOptions = {}): Promise<CollectReport> {
    if (!isValidUrl(url)) {
      throw new HarvestError(ErrorCode.INVALID_URL, `Invalid URL: ${url}`);
    }

    const sink: DiagnosticSink = options.sink ?? new ConsoleSink();
    const fetchedAt = new Date().toISOString();
    const context = await this.browserManager.launch();

    try {
      const page = await context.newPage();

      try {
        await page.goto(url, {
          waitUntil: 'load',
          timeout: options.navigationTimeout ?? DEFAULT_TIMEOUT,
        });
      } catch (error) {
        throw new HarvestError(
          ErrorCode.NAVIGATION_FAILED,
          `Failed to load ${url}: ${error instanceof Error ? error.message : String(error)}`,
          true,
          'Check your connection or raise --timeout'
        );
      }

      try {
        await page.waitForSelector(schema.containerSelector, {
          timeout: options.initialLoadTimeout ?? INITIAL_LOAD_TIMEOUT,
        });
      } catch {
        emitDiagnostic(sink, {
          severity: 'error',
          message: 'Timeout waiting for items to load',
          selector: schema.containerSelector,
        });
        return {
          url,
          reason: 'no-containers',
          records: [],
          attempts: 0,
          backoffs: 0,
          consecutiveTimeouts: 0,
          fetchedAt,
        };
      }

      const controller = new ScrollController(new PlaywrightFeedPage(page), {
        ...options,
        sink,
        containerSelector: schema.containerSelector,
        schema: schema.fields,
        identify: byField(schema.identityField),
        endMarkerSelector: options.endMarkerSelector ?? schema.endMarkerSelector,
      });
      const result = await controller.run();

      return { url, ...result, fetchedAt };
    } finally {
      await this.browserManager.close();
    }
  }
}

/**
 * One extraction pass over a saved HTML document.
 */
export async function extractStatic(
  html: string,
  schema: FeedSchema,
  location?: string,
  sink?: DiagnosticSink
): Promise<ExtractRecord[]> {
  const page = new StaticPage(html, location);
  const containers = await findElements(page, schema.containerSelector, {
    description: 'containers',
    sink,
  });
  const records = await extractRecords(containers, schema.fields, sink, {
    location: page.currentLocation(),
  });
  await releaseNodes(containers, { sink });
  return records;
}
