// src/core/logging/diagnostics.ts

export type Severity = 'debug' | 'info' | 'warn' | 'error';

export interface DiagnosticEvent {
  severity: Severity;
  message: string;
  selector?: string;
  parentKey?: string;
}

export interface DiagnosticSink {
  emit(event: DiagnosticEvent): void;
}

const SEVERITY_ORDER: Record<Severity, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_ORDER, value);
}

export function formatDiagnostic(event: DiagnosticEvent): string {
  const tags: string[] = [];
  if (event.selector !== undefined) tags.push(`selector=${event.selector}`);
  if (event.parentKey) tags.push(`key=${event.parentKey}`);

  const suffix = tags.length > 0 ? ` (${tags.join(', ')})` : '';
  return `[${event.severity.toUpperCase()}] ${event.message}${suffix}`;
}

/**
 * Writes diagnostics to stderr, below `minSeverity` is dropped.
 */
export class ConsoleSink implements DiagnosticSink {
  constructor(private minSeverity: Severity = resolveLogLevel()) {}

  emit(event: DiagnosticEvent): void {
    if (SEVERITY_ORDER[event.severity] < SEVERITY_ORDER[this.minSeverity]) {
      return;
    }
    console.error(formatDiagnostic(event));
  }
}

/**
 * Keeps every event in memory.
 */
export class MemorySink implements DiagnosticSink {
  readonly events: DiagnosticEvent[] = [];

  emit(event: DiagnosticEvent): void {
    this.events.push(event);
  }

  bySeverity(severity: Severity): DiagnosticEvent[] {
    return this.events.filter(e => e.severity === severity);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export const silentSink: DiagnosticSink = {
  emit: () => undefined,
};

/**
 * Hand an event to a sink. A failing sink never fails the caller.
 */
export function emitDiagnostic(sink: DiagnosticSink, event: DiagnosticEvent): void {
  try {
    sink.emit(event);
  } catch (error) {
    console.error(`[ERROR] Diagnostic sink failed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): Severity {
  if (value && isSeverity(value)) {
    return value;
  }
  return 'info';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
