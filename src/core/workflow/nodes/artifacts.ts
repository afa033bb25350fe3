/**
 * Artifact Nodes
 *
 * Documentation, tests and deployment files, generated from the final code
 * in parallel. Each node records its own failure and never stops its siblings.
 */

import { AgentName, DocumentField } from '../../../types';
import { DocumentUpdate, WorkflowDocument } from '../state';
import { extractCode, parseDeploymentFiles } from '../output-parsers';
import { ArtifactGenerationError, errorMessage } from '../../errors';
import { PromptContext } from '../../template-manager';
import { AgentNodeConfig, agentLabel, callAgent, failurePatch, isFatalNodeError } from './shared';

interface ArtifactDefinition {
  agent: AgentName;
  field: DocumentField;
  templateId: string;
  /** Extra context beyond language, requirement and code */
  context?: (nodeConfig: AgentNodeConfig) => Record<string, string>;
  /** Builds the patch; returns null when the response holds nothing usable */
  toUpdate: (response: string) => DocumentUpdate | null;
}

function artifactNode(artifact: ArtifactDefinition, nodeConfig: AgentNodeConfig) {
  const { config } = nodeConfig;

  return async (state: WorkflowDocument): Promise<DocumentUpdate> => {
    const context: PromptContext = {
      language: config.target.language,
      refinedRequirement: state.refinedRequirement,
      code: state.code,
      ...artifact.context?.(nodeConfig),
    };

    try {
      const response = await callAgent(nodeConfig, artifact.agent, artifact.templateId, context);
      const update = artifact.toUpdate(response);
      if (!update) {
        throw new Error('empty response');
      }
      return {
        ...update,
        messages: [`${agentLabel(artifact.agent)}: ${artifact.field} generated${state.degraded ? ' from unapproved code' : ''}`],
      };
    } catch (error) {
      if (isFatalNodeError(error)) throw error;
      const failure = new ArtifactGenerationError(artifact.field, errorMessage(error), { cause: error });
      return failurePatch(artifact.agent, artifact.field, failure.message);
    }
  };
}

export function documentation(nodeConfig: AgentNodeConfig) {
  return artifactNode({
    agent: 'documentationAgent',
    field: 'documentation',
    templateId: 'documentation',
    toUpdate: response => {
      const text = response.trim();
      return text ? { documentation: text } : null;
    },
  }, nodeConfig);
}

export function testGeneration(nodeConfig: AgentNodeConfig) {
  return artifactNode({
    agent: 'testAgent',
    field: 'tests',
    templateId: 'test-generation',
    context: ({ config }) => ({
      testFramework: config.target.testFramework,
      moduleFileName: config.target.moduleFileName,
    }),
    toUpdate: response => {
      const tests = extractCode(response);
      return tests ? { tests } : null;
    },
  }, nodeConfig);
}

export function deployment(nodeConfig: AgentNodeConfig) {
  return artifactNode({
    agent: 'deploymentAgent',
    field: 'deploymentConfig',
    templateId: 'deployment',
    toUpdate: response => {
      const files = parseDeploymentFiles(response);
      return Object.keys(files).length > 0 ? { deploymentConfig: { files } } : null;
    },
  }, nodeConfig);
}
