/**
 * LangGraph Workflow Document
 *
 * The shared document threaded through every agent node. Nodes return patches
 * holding only the fields they own; the reducers below merge them, so no node
 * mutates the document in place.
 */

import { Annotation } from '@langchain/langgraph';
import {
  DeploymentConfig,
  FieldFailures,
  LoopState,
  ReviewVerdict,
  WorkflowStatus,
} from '../../types';

const replace = <T>(_: T, next: T): T => next;

export const DocumentAnnotation = Annotation.Root({
  // === Requirement ===

  /** Raw user text, set once at ingestion */
  rawRequirement: Annotation<string>({
    reducer: (current, next) => current || next,
    default: () => '',
  }),

  /** Structured requirement produced by the requirement agent */
  refinedRequirement: Annotation<string>({
    reducer: replace,
    default: () => '',
  }),

  requirementWarnings: Annotation<string[]>({
    reducer: replace,
    default: () => [],
  }),

  // === Coding/Review loop ===

  code: Annotation<string>({
    reducer: replace,
    default: () => '',
  }),

  codingAttempts: Annotation<number>({
    reducer: replace,
    default: () => 0,
  }),

  /** Verdict for the `code` value present when the review ran */
  reviewVerdict: Annotation<ReviewVerdict | null>({
    reducer: replace,
    default: () => null,
  }),

  reviewFeedback: Annotation<string>({
    reducer: replace,
    default: () => '',
  }),

  /** Completed Coding -> Review cycles */
  iterationCount: Annotation<number>({
    reducer: replace,
    default: () => 0,
  }),

  loopState: Annotation<LoopState>({
    reducer: replace,
    default: () => 'pending',
  }),

  // === Artifacts (written once each, after the loop) ===

  documentation: Annotation<string>({
    reducer: replace,
    default: () => '',
  }),

  tests: Annotation<string>({
    reducer: replace,
    default: () => '',
  }),

  deploymentConfig: Annotation<DeploymentConfig | null>({
    reducer: replace,
    default: () => null,
  }),

  /** Artifacts were generated from code that never got approved */
  degraded: Annotation<boolean>({
    reducer: replace,
    default: () => false,
  }),

  // === Outcome ===

  /** One entry per field that could not be produced; sibling nodes merge theirs */
  failures: Annotation<FieldFailures>({
    reducer: (current, next) => ({ ...current, ...next }),
    default: () => ({}),
  }),

  warnings: Annotation<string[]>({
    reducer: (current, next) => [...current, ...next],
    default: () => [],
  }),

  /** One status line per node run */
  messages: Annotation<string[]>({
    reducer: (current, next) => [...current, ...next],
    default: () => [],
  }),

  status: Annotation<WorkflowStatus>({
    reducer: replace,
    default: () => 'running',
  }),
});

export type WorkflowDocument = typeof DocumentAnnotation.State;
export type DocumentUpdate = typeof DocumentAnnotation.Update;

/**
 * A fresh document for a run
 */
export function createInitialDocument(rawRequirement: string): WorkflowDocument {
  return {
    rawRequirement,
    refinedRequirement: '',
    requirementWarnings: [],
    code: '',
    codingAttempts: 0,
    reviewVerdict: null,
    reviewFeedback: '',
    iterationCount: 0,
    loopState: 'pending',
    documentation: '',
    tests: '',
    deploymentConfig: null,
    degraded: false,
    failures: {},
    warnings: [],
    messages: [],
    status: 'running',
  };
}
