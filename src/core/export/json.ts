// src/core/export/json.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import type { CollectReport } from '../orchestrator.js';
import type { ExtractRecord } from '../types/index.js';

export interface ExtractReport {
  location: string;
  records: ExtractRecord[];
  fetchedAt: string;
}

export function formatJsonOutput(result: CollectReport | ExtractReport): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Write to `outPath`, or print to stdout when no path is given.
 */
export async function writeOutput(content: string, outPath?: string): Promise<void> {
  if (!outPath) {
    console.log(content);
    return;
  }

  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, content + '\n');
}
