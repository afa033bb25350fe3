/**
 * Plumbing shared by every agent node: retried agent calls, lifecycle events
 * and the cancellation check at node entry.
 */

import { AgentName, DocumentField, FieldFailures } from '../../../types';
import { Config } from '../../../config/schema';
import { PromptExecutor } from '../../../providers/ai/interface';
import { PromptContext } from '../../template-manager';
import { WorkflowEventStream } from '../../event-stream';
import { withRetry } from '../../error-recovery';
import { MissingContextError, WorkflowCancelledError, errorMessage } from '../../errors';
import { logger } from '../../logger';
import { DocumentUpdate, WorkflowDocument } from '../state';

export interface AgentNodeConfig {
  executor: PromptExecutor;
  config: Config;
  events: WorkflowEventStream;
  /** Checked when a node starts, never during a model call */
  signal?: AbortSignal;
  /** Injected into withRetry; tests pass a no-op */
  sleep?: (ms: number) => Promise<void>;
  /** Sees the document each node starts from, i.e. the output of every finished node */
  onNodeEntry?: (node: AgentName, state: WorkflowDocument) => void;
}

export type AgentNode = (state: WorkflowDocument) => Promise<DocumentUpdate>;

/**
 * One agent call, retried on TransientCallError up to `workflow.maxCallRetries` times.
 */
export function callAgent(
  nodeConfig: AgentNodeConfig,
  agent: AgentName,
  templateId: string,
  context: PromptContext
): Promise<string> {
  const { executor, config, events, sleep } = nodeConfig;

  return withRetry(() => executor.execute(templateId, context, { agent }), {
    maxRetries: config.workflow.maxCallRetries,
    backoffMs: config.workflow.retryBackoffMs,
    sleep,
    onRetry: ({ attempt, maxRetries, delayMs, error }) => {
      logger.warn(`[${agent}] ${error.message}; retry ${attempt}/${maxRetries} in ${delayMs}ms`);
      events.emit('node:retry', {
        attempt,
        maxRetries,
        delayMs,
        reason: error.reason,
        error: error.message,
      }, { severity: 'warn', node: agent });
    },
  });
}

/**
 * Errors that must leave the graph instead of becoming a field failure
 */
export function isFatalNodeError(error: unknown): boolean {
  return error instanceof MissingContextError || error instanceof WorkflowCancelledError;
}

/**
 * Patch recording that `field` could not be produced.
 */
export function failurePatch(agent: AgentName, field: DocumentField, message: string): DocumentUpdate {
  logger.error(`[${agent}] ${message}`);
  const failures: FieldFailures = {};
  failures[field] = message;
  return {
    failures,
    messages: [`${agentLabel(agent)}: failed (${message})`],
  };
}

/**
 * Wrap a node with the cancellation check and start/end events.
 */
export function instrumentNode(agent: AgentName, nodeConfig: AgentNodeConfig, node: AgentNode): AgentNode {
  const { events, signal, onNodeEntry } = nodeConfig;

  return async (state: WorkflowDocument): Promise<DocumentUpdate> => {
    onNodeEntry?.(agent, state);
    if (signal?.aborted) {
      throw new WorkflowCancelledError(agent);
    }

    const startTime = Date.now();
    events.emit('node:started', { iteration: state.iterationCount }, { node: agent });
    logger.logWorkflow(`${agent} started`);

    try {
      const update = await node(state);
      const durationMs = Date.now() - startTime;
      const failed = Object.keys(update.failures || {}).length > 0;

      if (failed) {
        events.emit('node:failed', { durationMs, failures: update.failures }, { severity: 'error', node: agent });
      } else {
        events.emit('node:completed', { durationMs }, { node: agent });
      }
      logger.logWorkflow(`${agent} ${failed ? 'failed' : 'completed'}`, { durationMs });

      return update;
    } catch (error) {
      events.emit('node:failed', { durationMs: Date.now() - startTime, error: errorMessage(error) }, { severity: 'error', node: agent });
      throw error;
    }
  };
}

const AGENT_LABELS: Record<AgentName, string> = {
  requirementAgent: 'Requirement Agent',
  codingAgent: 'Coding Agent',
  reviewAgent: 'Review Agent',
  documentationAgent: 'Documentation Agent',
  testAgent: 'Test Agent',
  deploymentAgent: 'Deployment Agent',
};

export function agentLabel(agent: AgentName): string {
  return AGENT_LABELS[agent];
}
