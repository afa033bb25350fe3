/**
 * Shared types for the requirement-to-code workflow.
 */

/** Agents (graph nodes) that issue one prompt each */
export type AgentName =
  | 'requirementAgent'
  | 'codingAgent'
  | 'reviewAgent'
  | 'documentationAgent'
  | 'testAgent'
  | 'deploymentAgent';

export const AGENT_NAMES: readonly AgentName[] = [
  'requirementAgent',
  'codingAgent',
  'reviewAgent',
  'documentationAgent',
  'testAgent',
  'deploymentAgent',
];

/** Builtin prompt template identifiers */
export type TemplateId =
  | 'requirement-analysis'
  | 'coding'
  | 'review-balanced'
  | 'review-strict'
  | 'documentation'
  | 'test-generation'
  | 'deployment';

export type ReviewVerdict = 'approved' | 'needs_revision';

/**
 * Position of the document in the Coding/Review loop.
 * `approved` and `max_iterations_reached` are terminal.
 */
export type LoopState =
  | 'pending'
  | 'coding'
  | 'reviewing'
  | 'approved'
  | 'max_iterations_reached';

export type WorkflowStatus = 'running' | 'completed' | 'degraded' | 'failed' | 'cancelled';

/** Generated deployment artifacts keyed by file name */
export interface DeploymentConfig {
  files: Record<string, string>;
}

/** Fields a node can fail to produce */
export type DocumentField =
  | 'refinedRequirement'
  | 'code'
  | 'reviewVerdict'
  | 'documentation'
  | 'tests'
  | 'deploymentConfig';

export type FieldFailures = Partial<Record<DocumentField, string>>;

/** Model selection for one agent, or the workflow default */
export interface ModelSelection {
  provider: string;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  input?: number;
  output?: number;
}
