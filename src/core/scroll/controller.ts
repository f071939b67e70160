// src/core/scroll/controller.ts
import type { ExtractRecord, ScrollablePage } from '../types/index.js';
import type { RecordSchema } from '../extract/field.js';
import { extractRecords } from '../extract/records.js';
import { findElements, releaseNodes } from '../locate/locator.js';
import { TimeoutTracker } from '../backoff/timeout-tracker.js';
import { SeenRecords, byField, type RecordIdentity } from '../dedupe/index.js';
import {
  ConsoleSink,
  describeError,
  emitDiagnostic,
  type DiagnosticSink,
  type Severity,
} from '../logging/diagnostics.js';
import { waitFor, type WaitFn } from './wait.js';
import { adaptiveScrollMultiplier } from './adaptive.js';
import {
  DEFAULT_IDENTITY_FIELD,
  DEFAULT_MAX_SCROLLS,
  DEFAULT_MAX_STALL_CYCLES,
  DEFAULT_SCROLL_DISTANCE,
} from '../config/constants.js';

export type ControllerState = 'collecting' | 'backoff' | 'done';

export type DoneReason =
  | 'no-new-content'
  | 'max-attempts'
  | 'backoff-ceiling'
  | 'end-of-feed'
  | 'max-items'
  | 'seen-record'
  | 'date-cutoff'
  | 'cancelled';

export interface ScrollControllerOptions {
  containerSelector: string;
  schema: RecordSchema;
  /** Defaults to the normalized `url` field */
  identify?: RecordIdentity;
  maxAttempts?: number;
  /** Consecutive cycles without new records before giving up */
  maxStallCycles?: number;
  /** Stop instead of waiting longer than this */
  maxBackoffSeconds?: number;
  maxItems?: number;
  /** Present in the DOM once the feed has no more content */
  endMarkerSelector?: string;
  /** Keys collected by earlier runs */
  knownKeys?: Iterable<string>;
  /** Stop at the first record already collected by an earlier run */
  stopOnSeen?: boolean;
  dateField?: string;
  /** Stop at the first record dated before this */
  stopBefore?: Date;
  /** Fraction of the viewport per scroll; grows while every record in view was already seen */
  scrollDistance?: number;
  signal?: AbortSignal;
  sink?: DiagnosticSink;
  wait?: WaitFn;
  onRecord?: (record: ExtractRecord) => void | Promise<void>;
}

export interface CollectResult {
  records: ExtractRecord[];
  reason: DoneReason;
  attempts: number;
  backoffs: number;
  consecutiveTimeouts: number;
}

interface CycleOutcome {
  newRecords: number;
  total: number;
  /** Records were found and every one of them was already seen */
  allSeen: boolean;
  done?: DoneReason;
}

/**
 * Repeats locate, extract and progress detection against one page until a stop condition.
 * One instance per page and session.
 */
export class ScrollController {
  private readonly tracker = new TimeoutTracker();
  private readonly seen: SeenRecords;
  private readonly records: ExtractRecord[] = [];
  private readonly identify: RecordIdentity;
  private readonly sink: DiagnosticSink;
  private readonly wait: WaitFn;
  private currentState: ControllerState = 'collecting';
  private attempts = 0;
  private backoffs = 0;
  private stallCycles = 0;
  private allSeenCycles = 0;
  private running?: Promise<CollectResult>;

  constructor(
    private readonly page: ScrollablePage,
    private readonly options: ScrollControllerOptions
  ) {
    this.seen = new SeenRecords(options.knownKeys);
    this.identify = options.identify ?? byField(DEFAULT_IDENTITY_FIELD);
    this.sink = options.sink ?? new ConsoleSink();
    this.wait = options.wait ?? waitFor;
  }

  get state(): ControllerState {
    return this.currentState;
  }

  get consecutiveTimeouts(): number {
    return this.tracker.count;
  }

  /**
   * Run the session. Never rejects; repeated calls share one run.
   */
  run(): Promise<CollectResult> {
    this.running ??= this.loop();
    return this.running;
  }

  private async loop(): Promise<CollectResult> {
    const maxAttempts = this.options.maxAttempts ?? DEFAULT_MAX_SCROLLS;
    let reason: DoneReason | undefined;

    while (!reason) {
      if (this.options.signal?.aborted) {
        reason = 'cancelled';
        break;
      }
      if (this.attempts >= maxAttempts) {
        reason = 'max-attempts';
        break;
      }

      this.attempts++;
      this.currentState = 'collecting';

      if (this.tracker.count > 0) {
        this.log('info', `Current consecutive timeouts: ${this.tracker.count}`);
      }

      let outcome: CycleOutcome;
      try {
        outcome = await this.collectOnce();
        this.allSeenCycles = outcome.allSeen ? this.allSeenCycles + 1 : 0;
        if (!outcome.done && outcome.newRecords > 0) {
          await this.page.scroll(this.scrollDistance());
        }
      } catch (error) {
        this.log('error', `Cycle ${this.attempts} failed: ${describeError(error)}`);
        outcome = { newRecords: 0, total: 0, allSeen: false };
        this.allSeenCycles = 0;
      }

      if (outcome.done) {
        reason = outcome.done;
        break;
      }

      if (outcome.newRecords > 0) {
        this.stallCycles = 0;
        this.tracker.record({
          success: true,
          aggressive: outcome.newRecords === outcome.total,
        });
        continue;
      }

      reason = await this.handleStall();
    }

    this.currentState = 'done';
    this.log('info', `Collection finished (${reason}): ${this.records.length} records in ${this.attempts} cycles`);

    return {
      records: [...this.records],
      reason,
      attempts: this.attempts,
      backoffs: this.backoffs,
      consecutiveTimeouts: this.tracker.count,
    };
  }

  private async collectOnce(): Promise<CycleOutcome> {
    const { containerSelector, schema, endMarkerSelector, maxItems } = this.options;

    const containers = await findElements(this.page, containerSelector, {
      description: 'containers',
      sink: this.sink,
    });
    const records = await extractRecords(containers, schema, this.sink, {
      location: this.page.currentLocation(),
    });
    await releaseNodes(containers, { sink: this.sink });

    let newRecords = 0;
    let seenRecords = 0;
    const finish = (done: DoneReason): CycleOutcome => ({
      newRecords,
      total: records.length,
      allSeen: false,
      done,
    });

    for (const record of records) {
      const key = this.identify(record);
      if (key === null) {
        this.log('debug', 'Skipping record without identity');
        continue;
      }

      if (this.seen.has(key)) {
        seenRecords++;
        if (this.options.stopOnSeen && this.seen.isKnown(key)) {
          this.log('warn', `Found already seen record: ${key}`);
          return finish('seen-record');
        }
        continue;
      }

      if (this.isPastCutoff(record)) {
        this.log('warn', `Reached date cutoff at record: ${key}`);
        return finish('date-cutoff');
      }

      this.seen.add(key);
      this.records.push(record);
      newRecords++;
      await this.notify(record);

      if (maxItems !== undefined && this.records.length >= maxItems) {
        return finish('max-items');
      }
    }

    this.log(
      'debug',
      `Cycle ${this.attempts}: containers=${containers.length}, new=${newRecords}, total=${this.records.length}`,
      containerSelector
    );

    // checked last so the batch shown next to the marker is kept
    if (endMarkerSelector) {
      const marker = await this.page.queryOne(endMarkerSelector);
      if (marker) {
        await releaseNodes([marker], { sink: this.sink });
        this.log('info', 'End of feed marker found', endMarkerSelector);
        return finish('end-of-feed');
      }
    }

    return {
      newRecords,
      total: records.length,
      allSeen: records.length > 0 && seenRecords === records.length,
    };
  }

  /**
   * A cycle without new records counts as a soft timeout.
   */
  private async handleStall(): Promise<DoneReason | undefined> {
    this.stallCycles++;
    const count = this.tracker.record({ success: false, timeoutOccurred: true });

    const maxStallCycles = this.options.maxStallCycles ?? DEFAULT_MAX_STALL_CYCLES;
    if (this.stallCycles >= maxStallCycles) {
      this.log('warn', `No new content after ${this.stallCycles} cycles, stopping`);
      return 'no-new-content';
    }

    const seconds = this.tracker.backoffSeconds();
    const { maxBackoffSeconds } = this.options;
    if (maxBackoffSeconds !== undefined && seconds > maxBackoffSeconds) {
      this.log('error', `Aborting due to persistent rate limiting (${count} timeouts, next wait ${seconds}s)`);
      return 'backoff-ceiling';
    }

    this.currentState = 'backoff';
    this.log(
      'warn',
      this.tracker.isRateLimited
        ? `Rate limit suspected, cooling down for ${seconds.toFixed(1)}s (${count} timeouts)`
        : `No new content, brief cooldown for ${seconds.toFixed(1)}s`
    );

    if (this.allSeenCycles > 0) {
      this.log(
        'debug',
        `Only seen records for ${this.allSeenCycles} cycles, scrolling ${adaptiveScrollMultiplier(this.allSeenCycles)}x`
      );
    }

    try {
      await this.page.scroll(this.scrollDistance());
    } catch (error) {
      this.log('error', `Scroll failed: ${describeError(error)}`);
    }

    this.backoffs++;
    try {
      const completed = await this.wait(seconds * 1000, this.options.signal);
      if (!completed) {
        return 'cancelled';
      }
    } catch (error) {
      this.log('error', `Backoff wait failed: ${describeError(error)}`);
    }
    return undefined;
  }

  private scrollDistance(): number {
    const base = this.options.scrollDistance ?? DEFAULT_SCROLL_DISTANCE;
    return base * adaptiveScrollMultiplier(this.allSeenCycles);
  }

  private isPastCutoff(record: ExtractRecord): boolean {
    const { dateField, stopBefore } = this.options;
    if (!dateField || !stopBefore) {
      return false;
    }

    const value = record[dateField];
    if (typeof value !== 'string' && typeof value !== 'number') {
      return false;
    }

    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      this.log('warn', `Error parsing date: ${String(value)}`);
      return false;
    }
    return date.getTime() < stopBefore.getTime();
  }

  private async notify(record: ExtractRecord): Promise<void> {
    if (!this.options.onRecord) {
      return;
    }
    try {
      await this.options.onRecord(record);
    } catch (error) {
      this.log('error', `Record handler failed: ${describeError(error)}`);
    }
  }

  private log(severity: Severity, message: string, selector?: string): void {
    emitDiagnostic(this.sink, { severity, message, selector });
  }
}
