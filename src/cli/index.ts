#!/usr/bin/env node

import { Command } from 'commander';
import { registerCollectCommand } from './commands/collect.js';
import { registerExtractCommand } from './commands/extract.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('feedharvest')
    .description('Collect structured records from lazily loading feeds')
    .version('0.1.0');

  registerCollectCommand(program);
  registerExtractCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
