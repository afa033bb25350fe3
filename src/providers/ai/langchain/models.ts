/**
 * LangChain Model Factory
 *
 * Builds a chat model for a provider/model selection. An empty `model` falls
 * back to the provider's default.
 */

import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOpenAI, AzureChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatOllama } from '@langchain/ollama';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ModelSelection } from '../../../types';
import { Provider, providerSchema } from '../../../config/schema';
import { ConfigError } from '../../../core/errors';

type ModelBuilder = (selection: ModelSelection) => BaseChatModel;

const DEFAULT_MAX_TOKENS = 4096;

// Retries belong to the workflow nodes (workflow.maxCallRetries)
const MAX_RETRIES = 0;

export const DEFAULT_MODELS: Record<string, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
  azure: 'gpt-4o-mini',
  gemini: 'gemini-1.5-pro',
  ollama: 'llama3.1',
};

const API_KEY_ENV_VARS: Record<Provider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  azure: 'AZURE_OPENAI_API_KEY',
  gemini: 'GOOGLE_API_KEY',
  ollama: '',
};

/**
 * "https://my-resource.openai.azure.com/" -> "my-resource"
 */
function azureInstanceName(endpoint?: string): string {
  const match = endpoint?.match(/https?:\/\/([^.]+)\./);
  return match ? match[1] : '';
}

const MODEL_BUILDERS: Record<Provider, ModelBuilder> = {
  anthropic: ({ model, apiKey, maxTokens, temperature }) => new ChatAnthropic({
    anthropicApiKey: apiKey,
    model: model || DEFAULT_MODELS.anthropic,
    maxTokens: maxTokens || DEFAULT_MAX_TOKENS,
    temperature,
    maxRetries: MAX_RETRIES,
  }) as BaseChatModel,

  openai: ({ model, apiKey, baseUrl, maxTokens, temperature }) => new ChatOpenAI({
    openAIApiKey: apiKey,
    model: model || DEFAULT_MODELS.openai,
    maxTokens: maxTokens || DEFAULT_MAX_TOKENS,
    temperature,
    configuration: baseUrl ? { baseURL: baseUrl } : undefined,
    maxRetries: MAX_RETRIES,
  }) as BaseChatModel,

  azure: ({ model, apiKey, baseUrl, maxTokens, temperature }) => new AzureChatOpenAI({
    azureOpenAIApiKey: apiKey || process.env.AZURE_OPENAI_API_KEY,
    azureOpenAIApiInstanceName: azureInstanceName(baseUrl || process.env.AZURE_OPENAI_ENDPOINT),
    azureOpenAIApiDeploymentName: model || process.env.AZURE_OPENAI_DEPLOYMENT_NAME || DEFAULT_MODELS.azure,
    azureOpenAIApiVersion: process.env.AZURE_OPENAI_API_VERSION || '2024-02-15-preview',
    maxTokens: maxTokens || DEFAULT_MAX_TOKENS,
    temperature,
    maxRetries: MAX_RETRIES,
  }) as BaseChatModel,

  gemini: ({ model, apiKey, maxTokens, temperature }) => new ChatGoogleGenerativeAI({
    apiKey,
    model: model || DEFAULT_MODELS.gemini,
    maxOutputTokens: maxTokens || DEFAULT_MAX_TOKENS,
    temperature,
    maxRetries: MAX_RETRIES,
  }) as BaseChatModel,

  ollama: ({ model, baseUrl, temperature }) => new ChatOllama({
    model: model || DEFAULT_MODELS.ollama,
    baseUrl: baseUrl || 'http://localhost:11434',
    temperature,
    maxRetries: MAX_RETRIES,
  }) as BaseChatModel,
};

export function createLangChainModel(selection: ModelSelection): BaseChatModel {
  const provider = providerSchema.safeParse(selection.provider);
  if (!provider.success) {
    throw new ConfigError(`Unknown AI provider: ${selection.provider}. Supported: ${providerSchema.options.join(', ')}`);
  }
  return MODEL_BUILDERS[provider.data](selection);
}

/**
 * Environment variable holding the provider's API key; empty for providers without one.
 */
export function getApiKeyEnvVar(provider: string): string {
  const parsed = providerSchema.safeParse(provider);
  return parsed.success ? API_KEY_ENV_VARS[parsed.data] : '';
}
