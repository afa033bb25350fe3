/**
 * Review Node
 *
 * Judges the current code and decides where the loop goes next. Each run of
 * this node completes one Coding -> Review iteration.
 */

import { DocumentUpdate, WorkflowDocument } from '../state';
import { parseReviewVerdict } from '../output-parsers';
import { MaxIterationsExceeded, errorMessage } from '../../errors';
import { logger } from '../../logger';
import { AgentNodeConfig, agentLabel, callAgent, failurePatch, isFatalNodeError } from './shared';

const AGENT = 'reviewAgent';

export function review(nodeConfig: AgentNodeConfig) {
  const { config, events } = nodeConfig;
  const { maxIterations, onMaxIterations } = config.workflow;

  return async (state: WorkflowDocument): Promise<DocumentUpdate> => {
    let response: string;
    try {
      response = await callAgent(nodeConfig, AGENT, `review-${config.review.mode}`, {
        language: config.target.language,
        refinedRequirement: state.refinedRequirement,
        code: state.code,
      });
    } catch (error) {
      if (isFatalNodeError(error)) throw error;
      return { ...failurePatch(AGENT, 'reviewVerdict', errorMessage(error)), status: 'failed' };
    }

    const { verdict, feedback, tokenFound } = parseReviewVerdict(response);
    const iterationCount = state.iterationCount + 1;
    const warnings: string[] = [];

    if (!tokenFound) {
      const warning = `Review response at iteration ${iterationCount} had no verdict; treated as needs revision`;
      logger.warn(`[${AGENT}] ${warning}`);
      warnings.push(warning);
    }

    events.emit('review:verdict', { verdict, iteration: iterationCount, tokenFound }, {
      severity: verdict === 'approved' ? 'info' : 'warn',
      node: AGENT,
    });

    const update: DocumentUpdate = {
      reviewVerdict: verdict,
      reviewFeedback: feedback,
      iterationCount,
    };

    if (verdict === 'approved') {
      return {
        ...update,
        loopState: 'approved',
        warnings,
        messages: [`${agentLabel(AGENT)}: code approved at iteration ${iterationCount}`],
      };
    }

    if (iterationCount < maxIterations) {
      return {
        ...update,
        loopState: 'coding',
        warnings,
        messages: [`${agentLabel(AGENT)}: revision requested (iteration ${iterationCount}/${maxIterations})`],
      };
    }

    const exceeded = new MaxIterationsExceeded(maxIterations);
    logger.warn(`[${AGENT}] ${exceeded.message}`);
    events.emit('loop:max_iterations', { maxIterations, policy: onMaxIterations }, { severity: 'warn', node: AGENT });

    return {
      ...update,
      loopState: 'max_iterations_reached',
      degraded: onMaxIterations === 'degrade',
      warnings: [...warnings, exceeded.message],
      messages: [`${agentLabel(AGENT)}: ${exceeded.message}`],
    };
  };
}
