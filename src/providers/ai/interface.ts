import { AgentName } from '../../types';
import { PromptContext } from '../../core/template-manager';

export interface ExecuteOptions {
  /** Agent issuing the call; selects that agent's model */
  agent?: AgentName;
}

/**
 * Sends one templated prompt to a language model and returns its raw text.
 *
 * Implementations throw MissingContextError before any call when the template
 * references an absent key, and TransientCallError for timeouts and network
 * failures. They never retry.
 */
export interface PromptExecutor {
  readonly name: string;
  execute(templateId: string, context: PromptContext, options?: ExecuteOptions): Promise<string>;
}
