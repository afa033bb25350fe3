/**
 * Coding Node
 *
 * Writes the code from the refined requirement. On later iterations the
 * prompt also carries the previous code and the reviewer's feedback.
 */

import { DocumentUpdate, WorkflowDocument } from '../state';
import { extractCode } from '../output-parsers';
import { Req2CodeError, errorMessage } from '../../errors';
import { AgentNodeConfig, agentLabel, callAgent, failurePatch, isFatalNodeError } from './shared';

const AGENT = 'codingAgent';

/**
 * Prompt section asking for a revision; empty on the first attempt.
 */
export function buildRevisionBlock(state: Pick<WorkflowDocument, 'iterationCount' | 'code' | 'reviewFeedback'>): string {
  if (state.iterationCount === 0) {
    return '';
  }
  return [
    '## Previous Code',
    '',
    state.code,
    '',
    '## Review Feedback',
    '',
    state.reviewFeedback,
    '',
    'Revise the previous code so that it addresses every point of the feedback. Keep the parts the feedback does not mention.',
  ].join('\n');
}

export function coding(nodeConfig: AgentNodeConfig) {
  const { config } = nodeConfig;

  return async (state: WorkflowDocument): Promise<DocumentUpdate> => {
    // Approved code is final
    if (state.loopState === 'approved') {
      throw new Req2CodeError('Coding agent invoked after the code was approved');
    }

    let code: string;
    try {
      const response = await callAgent(nodeConfig, AGENT, 'coding', {
        language: config.target.language,
        refinedRequirement: state.refinedRequirement,
        revisionBlock: buildRevisionBlock(state),
      });
      code = extractCode(response);
    } catch (error) {
      if (isFatalNodeError(error)) throw error;
      return { ...failurePatch(AGENT, 'code', errorMessage(error)), status: 'failed' };
    }

    if (!code) {
      return { ...failurePatch(AGENT, 'code', 'Coding agent returned no code'), status: 'failed' };
    }

    const attempt = state.codingAttempts + 1;
    return {
      code,
      codingAttempts: attempt,
      loopState: 'reviewing',
      messages: [`${agentLabel(AGENT)}: ${attempt === 1 ? 'code written' : `code revised (attempt ${attempt})`}`],
    };
  };
}
