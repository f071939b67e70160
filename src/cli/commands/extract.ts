// src/cli/commands/extract.ts
import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { extractStatic } from '../../core/orchestrator.js';
import { loadSchemaFile } from '../../core/extract/schema-loader.js';
import { formatJsonOutput, writeOutput } from '../../core/export/json.js';
import { ConsoleSink, resolveLogLevel, type Severity } from '../../core/logging/diagnostics.js';
import { parseLogLevel, printError } from '../parsers.js';

export interface ExtractCommandOptions {
  schema: string;
  location: string;
  out?: string;
  logLevel?: Severity;
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract <file>')
    .description('Run one extraction pass over a saved HTML file')
    .requiredOption('--schema <file>', 'JSON schema document')
    .option('--location <url>', 'Page URL used to resolve relative links', 'about:blank')
    .option('--out <file>', 'Write the JSON result to a file instead of stdout')
    .option('--log-level <level>', 'Diagnostics shown on stderr (debug|info|warn|error)', parseLogLevel)
    .action(async (file: string, options: ExtractCommandOptions) => {
      await handleExtract(file, options);
    });
}

export async function handleExtract(file: string, options: ExtractCommandOptions): Promise<void> {
  const sink = new ConsoleSink(options.logLevel ?? resolveLogLevel());

  try {
    const schema = await loadSchemaFile(options.schema, { location: options.location });
    const html = await readFile(file, 'utf-8');
    const records = await extractStatic(html, schema, options.location, sink);

    await writeOutput(
      formatJsonOutput({ location: options.location, records, fetchedAt: new Date().toISOString() }),
      options.out
    );
  } catch (error) {
    printError(error);
    process.exit(1);
  }
}
