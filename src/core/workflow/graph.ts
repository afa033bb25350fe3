/**
 * Workflow StateGraph
 *
 * requirementAgent -> codingAgent <-> reviewAgent -> { documentationAgent, testAgent, deploymentAgent }
 *
 * The three artifact nodes run in the same superstep once the loop has ended
 * in approval, or without approval under the `degrade` policy.
 */

import { StateGraph, END, START } from '@langchain/langgraph';
import { DocumentAnnotation, WorkflowDocument } from './state';
import * as nodes from './nodes';
import { AgentNodeConfig } from './nodes';
import { Config } from '../../config/schema';
import { logger } from '../logger';

export const ARTIFACT_NODES = ['documentationAgent', 'testAgent', 'deploymentAgent'] as const;

export type ArtifactNode = typeof ARTIFACT_NODES[number];
export type ReviewRoute = 'codingAgent' | typeof END | ArtifactNode[];

export type WorkflowGraphConfig = AgentNodeConfig;

export type CompiledWorkflowGraph = ReturnType<typeof createWorkflowGraph>;

export function routeAfterRequirement(state: WorkflowDocument): 'codingAgent' | 'end' {
  return state.status === 'failed' ? 'end' : 'codingAgent';
}

export function routeAfterCoding(state: WorkflowDocument): 'reviewAgent' | 'end' {
  return state.status === 'failed' ? 'end' : 'reviewAgent';
}

export function routeAfterReview(state: WorkflowDocument, policy: Config['workflow']['onMaxIterations']): ReviewRoute {
  if (state.status === 'failed') {
    return END;
  }
  switch (state.loopState) {
    case 'approved':
      return [...ARTIFACT_NODES];
    case 'max_iterations_reached':
      if (policy === 'skip') {
        logger.debug('[Graph] Max iterations reached, skipping artifacts');
        return END;
      }
      logger.debug('[Graph] Max iterations reached, generating artifacts from unapproved code');
      return [...ARTIFACT_NODES];
    default:
      return 'codingAgent';
  }
}

/**
 * LangGraph counts supersteps: one for requirements, two per iteration, one
 * for the artifacts.
 */
export function recursionLimitFor(config: Config): number {
  return 2 * config.workflow.maxIterations + 10;
}

export function createWorkflowGraph(graphConfig: WorkflowGraphConfig) {
  const { config } = graphConfig;

  logger.debug(`[Graph] Creating workflow StateGraph (maxIterations=${config.workflow.maxIterations})`);

  const graph = new StateGraph(DocumentAnnotation)
    .addNode('requirementAgent', nodes.instrumentNode('requirementAgent', graphConfig, nodes.requirementAnalysis(graphConfig)))
    .addNode('codingAgent', nodes.instrumentNode('codingAgent', graphConfig, nodes.coding(graphConfig)))
    .addNode('reviewAgent', nodes.instrumentNode('reviewAgent', graphConfig, nodes.review(graphConfig)))
    .addNode('documentationAgent', nodes.instrumentNode('documentationAgent', graphConfig, nodes.documentation(graphConfig)))
    .addNode('testAgent', nodes.instrumentNode('testAgent', graphConfig, nodes.testGeneration(graphConfig)))
    .addNode('deploymentAgent', nodes.instrumentNode('deploymentAgent', graphConfig, nodes.deployment(graphConfig)))

    .addEdge(START, 'requirementAgent')

    .addConditionalEdges('requirementAgent', routeAfterRequirement, {
      codingAgent: 'codingAgent',
      end: END,
    })

    .addConditionalEdges('codingAgent', routeAfterCoding, {
      reviewAgent: 'reviewAgent',
      end: END,
    })

    .addConditionalEdges(
      'reviewAgent',
      (state: WorkflowDocument) => routeAfterReview(state, config.workflow.onMaxIterations),
      ['codingAgent', 'documentationAgent', 'testAgent', 'deploymentAgent', END]
    )

    .addEdge('documentationAgent', END)
    .addEdge('testAgent', END)
    .addEdge('deploymentAgent', END);

  return graph.compile();
}
