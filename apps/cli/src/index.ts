#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Media information for local files and URLs, plus ffprobe housekeeping.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config/index.js';
import { analyzeCommand, type AnalyzeOptions } from './commands/analyze.js';
import { provisionCommand } from './commands/provision.js';
import { doctorCommand } from './commands/doctor.js';

const config = loadConfig();
const program = new Command();

program
  .name('mediapeek')
  .description('Container, stream and chapter info for media files')
  .version('1.0.0');

program
  .command('analyze')
  .description('Show media info for a local file or an http(s) URL')
  .argument('<source>', 'File path, file:// URL or http(s) URL')
  .option('--json', 'Print the media info as JSON')
  .option('--size <bytes>', 'Total file size, when it cannot be looked up')
  .action((source: string, options: AnalyzeOptions) => analyzeCommand(config, source, options));

program
  .command('provision')
  .description('Find ffprobe or download a static build for this platform')
  .action(() => provisionCommand(config));

program
  .command('doctor')
  .description('Check what media info will be able to do on this machine')
  .action(() => doctorCommand(config));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
