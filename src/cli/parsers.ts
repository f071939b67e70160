// src/cli/parsers.ts
import { InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { isSeverity, type Severity } from '../core/logging/diagnostics.js';
import type { BrowserType } from '../core/types/index.js';
import { HarvestError, summarizeError } from '../core/errors.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Expected a date such as 2026-01-31 or an ISO timestamp.');
  }
  return date;
}

export function parseLogLevel(value: string): Severity {
  if (!isSeverity(value)) {
    throw new InvalidArgumentError('Use debug, info, warn or error.');
  }
  return value;
}

export function parseBrowserType(value: string): BrowserType {
  if (value === 'chrome' || value === 'edge' || value === 'chromium') {
    return value;
  }
  throw new InvalidArgumentError(`Invalid browser: ${value}. Use chrome, edge, or chromium`);
}

/**
 * Record keys from an earlier run, one per line. Blank lines and `#` comments are ignored.
 */
export async function readKnownKeys(filePath: string): Promise<string[]> {
  const content = await readFile(filePath, 'utf-8');
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function printError(error: unknown): void {
  const summary = summarizeError(error);
  console.error('Error:', summary.message);
  if (error instanceof HarvestError && error.suggestion) {
    console.error('Hint:', error.suggestion);
  }
}
