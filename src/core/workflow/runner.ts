/**
 * Workflow Runner
 *
 * Runs one requirement through the graph and returns the final document.
 * Cancellation returns the document as it stood at the last node boundary.
 */

import { WorkflowStatus } from '../../types';
import { Config, validateConfig } from '../../config/schema';
import { defaultConfig } from '../../config/defaults';
import { PromptExecutor } from '../../providers/ai/interface';
import { createExecutorFromConfig } from '../../providers/ai/langchain/provider';
import { WorkflowEventStream, getEventStream } from '../event-stream';
import { Req2CodeError, WorkflowCancelledError, errorMessage } from '../errors';
import { logger } from '../logger';
import { createWorkflowGraph, recursionLimitFor } from './graph';
import { WorkflowDocument, createInitialDocument } from './state';

export interface RunWorkflowOptions {
  config?: Config;
  /** Defaults to the LangChain executor built from `config` */
  executor?: PromptExecutor;
  events?: WorkflowEventStream;
  signal?: AbortSignal;
  /** Backoff sleep between retries */
  sleep?: (ms: number) => Promise<void>;
}

const CORE_FIELDS = ['refinedRequirement', 'code', 'reviewVerdict'] as const;

/**
 * Final status of a document that ran to the end of the graph.
 */
export function resolveStatus(document: WorkflowDocument): WorkflowStatus {
  if (document.status === 'failed' || CORE_FIELDS.some(field => document.failures[field] !== undefined)) {
    return 'failed';
  }
  if (document.loopState === 'max_iterations_reached' || Object.keys(document.failures).length > 0) {
    return 'degraded';
  }
  return 'completed';
}

/**
 * The cancellation behind a graph error. Nodes of one superstep that all see
 * the abort fail together, and LangGraph reports them as an AggregateError.
 */
export function cancellationOf(error: unknown): WorkflowCancelledError | null {
  if (error instanceof WorkflowCancelledError) {
    return error;
  }
  if (error instanceof AggregateError && error.errors.length > 0) {
    const cancelled = error.errors.filter((inner): inner is WorkflowCancelledError => inner instanceof WorkflowCancelledError);
    return cancelled.length === error.errors.length ? cancelled[0] : null;
  }
  return null;
}

export async function runWorkflow(rawRequirement: string, options: RunWorkflowOptions = {}): Promise<WorkflowDocument> {
  if (!rawRequirement.trim()) {
    throw new Req2CodeError('Requirement text must not be empty');
  }

  const config = options.config || validateConfig(defaultConfig);
  const executor = options.executor || createExecutorFromConfig(config);
  const events = options.events || getEventStream();
  const { signal, sleep } = options;

  // Document as of the last node boundary; returned when the run is cancelled
  let lastBoundary = createInitialDocument(rawRequirement);
  const app = createWorkflowGraph({
    executor,
    config,
    events,
    signal,
    sleep,
    onNodeEntry: (_node, state) => {
      lastBoundary = state;
    },
  });
  const startTime = Date.now();

  events.emit('workflow:started', { executor: executor.name, maxIterations: config.workflow.maxIterations });
  logger.logWorkflow('Workflow started', { executor: executor.name, maxIterations: config.workflow.maxIterations });

  let document: WorkflowDocument;
  try {
    document = await app.invoke(lastBoundary, { recursionLimit: recursionLimitFor(config) });
  } catch (error) {
    const cancelled = cancellationOf(error);
    if (cancelled) {
      logger.warn(cancelled.message);
      events.emit('workflow:cancelled', { node: cancelled.node, durationMs: Date.now() - startTime }, { severity: 'warn' });
      return { ...lastBoundary, status: 'cancelled' };
    }
    events.emit('workflow:failed', { error: errorMessage(error) }, { severity: 'error' });
    throw error;
  }

  const status = resolveStatus(document);
  const durationMs = Date.now() - startTime;

  if (status === 'failed') {
    events.emit('workflow:failed', { failures: document.failures, durationMs }, { severity: 'error' });
  } else {
    events.emit('workflow:completed', { status, iterations: document.iterationCount, durationMs });
  }
  logger.logWorkflow('Workflow finished', { status, iterations: document.iterationCount, durationMs });

  return { ...document, status };
}
