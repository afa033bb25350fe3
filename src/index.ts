#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { runCommand } from './cli/commands/run';
import { templateListCommand, templateShowCommand } from './cli/commands/template';

dotenvConfig({ path: path.join(process.cwd(), '.env') });

const program = new Command();

program
  .name('req2code')
  .description('Turn a natural-language requirement into reviewed code, docs, tests and deployment files')
  .version('1.0.0');

program
  .command('run')
  .description('Run the requirement -> code -> review -> artifacts workflow')
  .argument('[requirement...]', 'Requirement text (or use --file)')
  .option('-f, --file <path>', 'Read the requirement from a file')
  .option('-c, --config <path>', 'Path to config file')
  .option('-d, --debug', 'Enable debug mode with verbose output')
  .option('--max-iterations <n>', 'Maximum Coding -> Review iterations', (v) => parseInt(v, 10))
  .option('--provider <name>', 'AI provider (openai, anthropic, azure, gemini, ollama)')
  .option('--model <name>', 'Model name for the provider')
  .option('-o, --output <path>', 'Write the text report to a file')
  .option('--json', 'Print the final document as JSON')
  .action(runCommand);

const templates = program
  .command('templates')
  .description('Inspect prompt templates');

templates
  .command('list')
  .description('List available template ids')
  .option('-c, --config <path>', 'Path to config file')
  .action(templateListCommand);

templates
  .command('show <id>')
  .description('Print a template and the context keys it needs')
  .option('-c, --config <path>', 'Path to config file')
  .action(templateShowCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
