// src/cli/commands/collect.ts
import { Command } from 'commander';
import { HarvestOrchestrator } from '../../core/orchestrator.js';
import { loadSchemaFile } from '../../core/extract/schema-loader.js';
import { formatJsonOutput, writeOutput } from '../../core/export/json.js';
import { ConsoleSink, resolveLogLevel, type Severity } from '../../core/logging/diagnostics.js';
import { DEFAULT_MAX_SCROLLS, DEFAULT_MAX_STALL_CYCLES, DEFAULT_TIMEOUT } from '../../core/config/constants.js';
import type { BrowserType } from '../../core/types/index.js';
import {
  parseBrowserType,
  parseDate,
  parseLogLevel,
  parsePositiveInt,
  parsePositiveNumber,
  printError,
  readKnownKeys,
} from '../parsers.js';

export interface CollectCommandOptions {
  schema: string;
  out?: string;
  maxItems?: number;
  maxAttempts: number;
  maxStall: number;
  maxBackoff?: number;
  endMarker?: string;
  known?: string;
  stopOnSeen: boolean;
  stopBefore?: Date;
  dateField: string;
  browser: BrowserType;
  cdp?: string;
  headless: boolean;
  timeout: number;
  logLevel?: Severity;
}

export function registerCollectCommand(program: Command): void {
  program
    .command('collect <url>')
    .description('Scroll a feed and collect records')
    .requiredOption('--schema <file>', 'JSON schema document')
    .option('--out <file>', 'Write the JSON result to a file instead of stdout')
    .option('--max-items <n>', 'Stop after this many records', parsePositiveInt)
    .option('--max-attempts <n>', 'Maximum scroll cycles', parsePositiveInt, DEFAULT_MAX_SCROLLS)
    .option('--max-stall <n>', 'Cycles without new records before stopping', parsePositiveInt, DEFAULT_MAX_STALL_CYCLES)
    .option('--max-backoff <seconds>', 'Stop instead of backing off longer than this', parsePositiveNumber)
    .option('--end-marker <selector>', 'Selector present once the feed is exhausted')
    .option('--known <file>', 'Record keys from earlier runs, one per line')
    .option('--stop-on-seen', 'Stop at the first record listed in --known', false)
    .option('--stop-before <date>', 'Stop at the first record older than this date', parseDate)
    .option('--date-field <name>', 'Record field holding the item date', 'created_at')
    .option('--browser <browser>', 'Browser to use (chrome|edge|chromium)', parseBrowserType, 'chrome')
    .option('--cdp <endpoint>', 'Connect to an existing browser via CDP (e.g., http://localhost:9222)')
    .option('--headless', 'Run the browser headless', false)
    .option('--timeout <ms>', 'Navigation timeout in milliseconds', parsePositiveInt, DEFAULT_TIMEOUT)
    .option('--log-level <level>', 'Diagnostics shown on stderr (debug|info|warn|error)', parseLogLevel)
    .action(async (url: string, options: CollectCommandOptions) => {
      await handleCollect(url, options);
    });
}

export async function handleCollect(url: string, options: CollectCommandOptions): Promise<void> {
  const sink = new ConsoleSink(options.logLevel ?? resolveLogLevel());
  const abort = new AbortController();
  const onInterrupt = () => {
    console.error('[WARN] Interrupted, stopping collection...');
    abort.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const schema = await loadSchemaFile(options.schema, { location: url });
    const knownKeys = options.known ? await readKnownKeys(options.known) : undefined;

    const orchestrator = new HarvestOrchestrator({
      browserType: options.browser,
      cdpEndpoint: options.cdp,
      headless: options.headless,
    });

    console.error(`Collecting: ${url}`);
    const report = await orchestrator.collect(url, schema, {
      sink,
      signal: abort.signal,
      maxItems: options.maxItems,
      maxAttempts: options.maxAttempts,
      maxStallCycles: options.maxStall,
      maxBackoffSeconds: options.maxBackoff,
      endMarkerSelector: options.endMarker,
      knownKeys,
      stopOnSeen: options.stopOnSeen,
      stopBefore: options.stopBefore,
      dateField: options.dateField,
      navigationTimeout: options.timeout,
    });

    await writeOutput(formatJsonOutput(report), options.out);
    console.error(`Collected ${report.records.length} records (${report.reason})`);
  } catch (error) {
    printError(error);
    process.exit(1);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
