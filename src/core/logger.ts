import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  logPath?: string;
  debug?: boolean;
  /** Suppress console output; the log file still receives entries */
  quiet?: boolean;
}

export interface AICallRecord {
  agent?: string;
  model?: string;
  prompt?: string;
  response?: string;
  inputTokens?: number;
  outputTokens?: number;
  duration?: number;
  error?: string;
}

const CONSOLE_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const PROMPT_LIMIT = 10000;
const RESPONSE_LIMIT = 20000;

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.substring(0, limit)}\n...[truncated]` : text;
}

/**
 * Logger that writes to the console and, when configured, a log file.
 * Debug lines only reach the console in debug mode.
 */
export class Logger {
  private static instance: Logger | null = null;
  private logPath: string | null = null;
  private debugMode = false;
  private quiet = false;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  configure(options: LoggerOptions): void {
    const previousPath = this.logPath;

    this.logPath = options.logPath || null;
    this.debugMode = options.debug || false;
    this.quiet = options.quiet || false;

    if (!this.logPath || this.logPath === previousPath) {
      return;
    }

    const dir = path.dirname(this.logPath);
    if (dir !== '.' && dir !== '/') {
      fs.ensureDirSync(dir);
    }
    const rule = '='.repeat(80);
    this.writeToFile([
      '',
      rule,
      `req2code session started: ${new Date().toISOString()}`,
      `Debug mode: ${this.debugMode}`,
      `${rule}\n`,
    ].join('\n'));
  }

  private writeToFile(content: string): void {
    if (!this.logPath) {
      return;
    }
    try {
      fs.appendFileSync(this.logPath, content + '\n');
    } catch (error) {
      // Log file problems must not stop a run
      console.error(chalk.red(`[Logger] Failed to write to ${this.logPath}: ${error}`));
    }
  }

  private toConsole(line: string, style: (text: string) => string = chalk.gray): void {
    if (!this.quiet) {
      console.log(style(line));
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    let entry = `[${new Date().toISOString()}] [${level.toUpperCase().padEnd(5)}] ${message}`;
    if (data !== undefined) {
      entry += typeof data === 'object' ? `\n${JSON.stringify(data, null, 2)}` : ` ${data}`;
    }
    this.writeToFile(entry);

    if (level !== 'debug' || this.debugMode) {
      this.toConsole(`[${level.toUpperCase()}] ${message}`, CONSOLE_STYLES[level]);
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Record an AI request or response. Prompts and responses go to the log file only.
   */
  logAICall(direction: 'request' | 'response', record: AICallRecord): void {
    const marker = direction === 'request' ? '>>> AI REQUEST' : '<<< AI RESPONSE';
    const rule = '-'.repeat(40);
    const lines = ['', rule, marker, rule];

    if (record.agent) lines.push(`Agent: ${record.agent}`);
    if (record.model) lines.push(`Model: ${record.model}`);
    if (record.duration !== undefined) lines.push(`Duration: ${record.duration}ms`);
    if (record.inputTokens !== undefined) lines.push(`Input tokens: ${record.inputTokens}`);
    if (record.outputTokens !== undefined) lines.push(`Output tokens: ${record.outputTokens}`);
    if (record.prompt) lines.push('', '--- Prompt ---', truncate(record.prompt, PROMPT_LIMIT));
    if (record.response) lines.push('', '--- Response ---', truncate(record.response, RESPONSE_LIMIT));
    if (record.error) lines.push('', '--- Error ---', record.error);
    lines.push(`${rule}\n`);

    this.writeToFile(lines.join('\n'));

    if (this.debugMode) {
      this.toConsole(`[DEBUG] ${marker}${record.agent ? ` (${record.agent})` : ''}`, chalk.cyan);
      if (record.model) this.toConsole(`  Model: ${record.model}`);
      if (record.duration) this.toConsole(`  Duration: ${record.duration}ms`);
    }
  }

  logWorkflow(event: string, data?: unknown): void {
    this.writeToFile(data ? `\n[WORKFLOW] ${event}\n${JSON.stringify(data, null, 2)}` : `\n[WORKFLOW] ${event}`);
    if (this.debugMode) {
      this.toConsole(`[WORKFLOW] ${event}`, chalk.magenta);
    }
  }
}

export const logger = Logger.getInstance();
