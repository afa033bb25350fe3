/**
 * Library entry point
 */

export { runWorkflow, resolveStatus, cancellationOf, RunWorkflowOptions } from './runner';
export {
  createWorkflowGraph,
  routeAfterReview,
  recursionLimitFor,
  ARTIFACT_NODES,
  CompiledWorkflowGraph,
  WorkflowGraphConfig,
} from './graph';
export { DocumentAnnotation, WorkflowDocument, DocumentUpdate, createInitialDocument } from './state';
export { parseReviewVerdict, extractCode, parseDeploymentFiles, ParsedReview } from './output-parsers';

export { LangChainPromptExecutor, createExecutorFromConfig } from '../../providers/ai/langchain/provider';
export { PromptExecutor, ExecuteOptions } from '../../providers/ai/interface';
export { TemplateManager, PromptContext } from '../template-manager';
export { checkRequirementStructure } from '../requirement-check';
export { WorkflowEventStream, WorkflowEvent, EventType, getEventStream } from '../event-stream';
export { renderReport, saveReport } from '../reporting/report-generator';
export { loadConfig } from '../../config/loader';
export { validateConfig, Config, ConfigInput } from '../../config/schema';
export * from '../errors';
export * from '../../types';
export { logger } from '../logger';
