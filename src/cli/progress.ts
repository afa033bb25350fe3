import chalk from 'chalk';
import { WorkflowEvent } from '../core/event-stream';

function formatDuration(ms: unknown): string {
  return typeof ms === 'number' ? ` (${(ms / 1000).toFixed(1)}s)` : '';
}

/**
 * One uncoloured progress line per event, or null for events the CLI does not show.
 */
export function formatEvent(event: WorkflowEvent): string | null {
  const node = event.node || 'workflow';
  const { data } = event;

  switch (event.type) {
    case 'node:started':
      return `${node} started`;
    case 'node:completed':
      return `${node} completed${formatDuration(data.durationMs)}`;
    case 'node:failed':
      return `${node} failed${formatDuration(data.durationMs)}`;
    case 'node:retry':
      return `${node} retry ${data.attempt}/${data.maxRetries} after ${data.reason}`;
    case 'review:verdict':
      return `review iteration ${data.iteration}: ${data.verdict}`;
    case 'loop:max_iterations':
      return `no approval after ${data.maxIterations} iteration(s), policy: ${data.policy}`;
    case 'requirement:warning':
      return `requirement warning: ${data.warning}`;
    case 'workflow:cancelled':
      return `workflow cancelled before ${data.node}`;
    default:
      return null;
  }
}

export function printEvent(event: WorkflowEvent): void {
  const line = formatEvent(event);
  if (!line) return;

  const color = event.severity === 'error' ? chalk.red : event.severity === 'warn' ? chalk.yellow : chalk.gray;
  console.log(color(`  ${line}`));
}
