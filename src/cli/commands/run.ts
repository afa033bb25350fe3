import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs-extra';
import { loadConfig } from '../../config/loader';
import { WorkflowStatus } from '../../types';
import { WorkflowEventStream } from '../../core/event-stream';
import { runWorkflow } from '../../core/workflow/runner';
import { renderReport, saveReport } from '../../core/reporting/report-generator';
import { DEFAULT_MODELS } from '../../providers/ai/langchain/models';
import { errorMessage } from '../../core/errors';
import { logger } from '../../core/logger';
import { printEvent } from '../progress';

export interface RunCommandOptions {
  file?: string;
  config?: string;
  debug?: boolean;
  maxIterations?: number;
  provider?: string;
  model?: string;
  output?: string;
  json?: boolean;
}

export const EXIT_CODES: Record<WorkflowStatus, number> = {
  running: 1,
  completed: 0,
  degraded: 0,
  failed: 1,
  cancelled: 130,
};

async function readRequirement(words: string[], file?: string): Promise<string> {
  if (file) {
    return fs.readFile(file, 'utf-8');
  }
  return words.join(' ');
}

/**
 * Config overrides from command-line flags
 */
export function buildOverrides(options: RunCommandOptions): Record<string, unknown> {
  const ai: Record<string, unknown> = {};
  if (options.provider) {
    ai.provider = options.provider;
    ai.model = options.model || DEFAULT_MODELS[options.provider];
  } else if (options.model) {
    ai.model = options.model;
  }

  return {
    debug: options.debug || undefined,
    ai,
    workflow: options.maxIterations !== undefined ? { maxIterations: options.maxIterations } : {},
  };
}

export async function runCommand(words: string[], options: RunCommandOptions): Promise<void> {
  const spinner = ora({ text: 'Loading configuration', isSilent: options.json }).start();
  const controller = new AbortController();
  const events = new WorkflowEventStream();

  const onSigint = () => {
    spinner.text = 'Cancelling after the current step';
    controller.abort();
  };

  try {
    const requirement = await readRequirement(words, options.file);
    if (!requirement.trim()) {
      spinner.fail('No requirement given');
      console.error(chalk.red('Pass the requirement as arguments or with --file <path>'));
      process.exit(1);
    }

    const config = await loadConfig(options.config, buildOverrides(options));
    logger.configure({ logPath: config.logs.outputPath, debug: config.debug, quiet: options.json });
    spinner.succeed(`Configuration loaded (${config.ai.provider}/${config.ai.model})`);

    const unsubscribe = events.subscribe(event => {
      if (options.json) return;
      spinner.clear();
      printEvent(event);
      spinner.render();
    });
    process.once('SIGINT', onSigint);

    spinner.start('Running workflow');
    const document = await runWorkflow(requirement, { config, events, signal: controller.signal }).finally(() => {
      process.removeListener('SIGINT', onSigint);
      unsubscribe();
    });

    switch (document.status) {
      case 'completed':
        spinner.succeed('Workflow completed');
        break;
      case 'degraded':
        spinner.warn('Workflow finished with warnings');
        break;
      case 'cancelled':
        spinner.warn('Workflow cancelled');
        break;
      default:
        spinner.fail('Workflow failed');
    }

    if (options.json) {
      console.log(JSON.stringify(document, null, 2));
    } else {
      console.log('\n' + renderReport(document));
    }

    const reportPath = options.output || config.output.reportPath;
    if (reportPath) {
      const written = await saveReport(document, reportPath);
      if (!options.json) {
        console.log(chalk.green(`Report written to ${written}`));
      }
    }

    process.exitCode = EXIT_CODES[document.status];
  } catch (error) {
    spinner.fail('Failed to run workflow');
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  }
}
