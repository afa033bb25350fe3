/**
 * LangChain Prompt Executor
 *
 * Renders a prompt template, sends it to the chat model selected for the
 * calling agent and returns the raw text. One call per execute(), with a
 * caller-visible timeout; failures worth retrying come out as TransientCallError.
 */

import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { AIMessage, AIMessageChunk, BaseMessage, HumanMessage, MessageContent } from '@langchain/core/messages';
import { ExecuteOptions, PromptExecutor } from '../interface';
import { AgentName, ModelSelection, TokenUsage } from '../../../types';
import { Config } from '../../../config/schema';
import { PromptContext, TemplateManager } from '../../../core/template-manager';
import { TransientCallError, errorMessage } from '../../../core/errors';
import { toTransientCallError } from '../../../core/error-recovery';
import { logger } from '../../../core/logger';
import { createLangChainModel, getApiKeyEnvVar } from './models';

export type ModelFactory = (selection: ModelSelection) => BaseChatModel;

export interface LangChainExecutorConfig {
  defaultModel: ModelSelection;
  agentModels?: Partial<Record<AgentName, Partial<ModelSelection>>>;
  timeoutMs: number;
  templates: TemplateManager;
  /** Replaces createLangChainModel, e.g. with a fake model in tests */
  modelFactory?: ModelFactory;
}

/**
 * Concatenate the text parts of a message's content.
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map(part => {
      if (typeof part === 'string') return part;
      return 'text' in part && typeof part.text === 'string' ? part.text : '';
    })
    .join('');
}

/**
 * Token counts reported with a model answer; empty when the provider sends none.
 */
export function tokenUsage(message: BaseMessage): TokenUsage {
  if ((message instanceof AIMessage || message instanceof AIMessageChunk) && message.usage_metadata) {
    return { input: message.usage_metadata.input_tokens, output: message.usage_metadata.output_tokens };
  }
  return {};
}

export class LangChainPromptExecutor implements PromptExecutor {
  readonly name: string;
  private config: LangChainExecutorConfig;
  private modelFactory: ModelFactory;
  private models = new Map<string, BaseChatModel>();

  constructor(config: LangChainExecutorConfig) {
    this.config = config;
    this.modelFactory = config.modelFactory || createLangChainModel;
    this.name = `langchain-${config.defaultModel.provider}`;
  }

  async execute(templateId: string, context: PromptContext, options: ExecuteOptions = {}): Promise<string> {
    // Throws MissingContextError before anything leaves the process
    const prompt = await this.config.templates.renderTemplate(templateId, context);
    const selection = this.resolveSelection(options.agent);
    const model = this.getModel(selection);

    logger.logAICall('request', { agent: options.agent, model: selection.model, prompt });
    const startTime = Date.now();

    try {
      const message = await this.invokeWithTimeout(model, prompt);
      const text = messageText(message.content);
      const usage = tokenUsage(message);

      logger.logAICall('response', {
        agent: options.agent,
        model: selection.model,
        response: text,
        duration: Date.now() - startTime,
        inputTokens: usage.input,
        outputTokens: usage.output,
      });

      return text;
    } catch (error) {
      logger.logAICall('response', {
        agent: options.agent,
        model: selection.model,
        duration: Date.now() - startTime,
        error: errorMessage(error),
      });

      const transient = toTransientCallError(error);
      if (transient) {
        throw transient;
      }
      throw error;
    }
  }

  /**
   * Model selection for an agent: its override on top of the default. An
   * override that switches provider does not inherit the default's key or URL.
   */
  resolveSelection(agent?: AgentName): ModelSelection {
    const { defaultModel, agentModels } = this.config;
    const override: Partial<ModelSelection> = (agent && agentModels?.[agent]) || {};

    const provider = override.provider ?? defaultModel.provider;
    const providerChanged = provider !== defaultModel.provider;

    const selection: ModelSelection = {
      provider,
      model: override.model ?? (providerChanged ? '' : defaultModel.model),
      apiKey: override.apiKey ?? (providerChanged ? undefined : defaultModel.apiKey),
      baseUrl: override.baseUrl ?? (providerChanged ? undefined : defaultModel.baseUrl),
      maxTokens: override.maxTokens ?? defaultModel.maxTokens,
      temperature: override.temperature ?? defaultModel.temperature,
    };

    return {
      ...selection,
      apiKey: selection.apiKey || process.env[getApiKeyEnvVar(selection.provider)] || undefined,
    };
  }

  private getModel(selection: ModelSelection): BaseChatModel {
    const key = `${selection.provider}|${selection.model}|${selection.baseUrl || ''}|${selection.temperature ?? ''}|${selection.maxTokens ?? ''}`;
    let model = this.models.get(key);
    if (!model) {
      model = this.modelFactory(selection);
      this.models.set(key, model);
      logger.debug(`[LangChainExecutor] Created model ${selection.provider}/${selection.model || 'default'}`);
    }
    return model;
  }

  private async invokeWithTimeout(model: BaseChatModel, prompt: string): Promise<BaseMessage> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransientCallError(`Model call timed out after ${timeoutMs}ms`, 'timeout'));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        model.invoke([new HumanMessage(prompt)], { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Build the executor described by the configuration
 */
export function createExecutorFromConfig(config: Config, modelFactory?: ModelFactory): LangChainPromptExecutor {
  const { timeoutMs, ...defaultModel } = config.ai;
  return new LangChainPromptExecutor({
    defaultModel,
    agentModels: config.agents,
    timeoutMs,
    templates: new TemplateManager({ customPath: config.templates.customPath }),
    modelFactory,
  });
}
