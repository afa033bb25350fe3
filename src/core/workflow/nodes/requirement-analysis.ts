/**
 * Requirement Analysis Node
 *
 * Turns the raw user text into a refined requirement with fixed sections.
 * Runs once per workflow.
 */

import { DocumentUpdate, WorkflowDocument } from '../state';
import { checkRequirementStructure } from '../../requirement-check';
import { errorMessage } from '../../errors';
import { logger } from '../../logger';
import { AgentNodeConfig, agentLabel, callAgent, failurePatch, isFatalNodeError } from './shared';

const AGENT = 'requirementAgent';

export function requirementAnalysis(nodeConfig: AgentNodeConfig) {
  const { config, events } = nodeConfig;

  return async (state: WorkflowDocument): Promise<DocumentUpdate> => {
    let refinedRequirement: string;
    try {
      const response = await callAgent(nodeConfig, AGENT, 'requirement-analysis', {
        language: config.target.language,
        userInput: state.rawRequirement,
      });
      refinedRequirement = response.trim();
    } catch (error) {
      if (isFatalNodeError(error)) throw error;
      return { ...failurePatch(AGENT, 'refinedRequirement', errorMessage(error)), status: 'failed' };
    }

    if (!refinedRequirement) {
      return { ...failurePatch(AGENT, 'refinedRequirement', 'Requirement agent returned an empty response'), status: 'failed' };
    }

    const check = checkRequirementStructure(refinedRequirement);
    for (const warning of check.warnings) {
      logger.warn(`[${AGENT}] ${warning}`);
      events.emit('requirement:warning', { warning }, { severity: 'warn', node: AGENT });
    }

    return {
      refinedRequirement,
      requirementWarnings: check.warnings,
      loopState: 'coding',
      messages: [`${agentLabel(AGENT)}: requirement refined${check.valid ? '' : ` (${check.missingSections.length} section(s) missing)`}`],
    };
  };
}
