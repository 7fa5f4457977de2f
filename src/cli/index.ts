/**
 * CLI program assembly.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createRunCommand } from './commands/run.js';
import { createAnalyzeCommand } from './commands/analyze.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('ablate')
    .description('Simulate context-injection ablations and decide which condition to adopt')
    .version(VERSION);
  [createRunCommand, createAnalyzeCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
