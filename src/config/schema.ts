import { z } from 'zod';

export const providerSchema = z.enum(['openai', 'anthropic', 'azure', 'gemini', 'ollama']);

const modelSelectionSchema = z.object({
  provider: providerSchema,
  model: z.string().min(1),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

// Per-agent overrides; anything left out falls back to `ai`
const agentOverrideSchema = modelSelectionSchema.partial();

const configSchema = z.object({
  debug: z.boolean().default(false),
  ai: modelSelectionSchema.extend({
    // Caller-visible limit for each model call
    timeoutMs: z.number().int().positive().default(120000),
  }),
  agents: z.object({
    requirementAgent: agentOverrideSchema.optional(),
    codingAgent: agentOverrideSchema.optional(),
    reviewAgent: agentOverrideSchema.optional(),
    documentationAgent: agentOverrideSchema.optional(),
    testAgent: agentOverrideSchema.optional(),
    deploymentAgent: agentOverrideSchema.optional(),
  }).default({}),
  workflow: z.object({
    maxIterations: z.number().int().min(1).default(3),
    maxCallRetries: z.number().int().min(0).default(2),
    retryBackoffMs: z.number().int().min(0).default(1000),
    // What happens after the loop ends without approval
    onMaxIterations: z.enum(['degrade', 'skip']).default('degrade'),
  }).default({}),
  review: z.object({
    mode: z.enum(['balanced', 'strict']).default('balanced'),
  }).default({}),
  target: z.object({
    language: z.string().default('Python'),
    testFramework: z.string().default('pytest'),
    // File name the generated tests import the code from
    moduleFileName: z.string().default('app.py'),
  }).default({}),
  templates: z.object({
    // Directory whose <template-id>.md files override the builtin ones
    customPath: z.string().optional(),
  }).default({}),
  logs: z.object({
    // Path to req2code's own log file (AI calls, workflow events)
    outputPath: z.string().optional(),
  }).default({}),
  output: z.object({
    reportPath: z.string().optional(),
  }).default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
export type Provider = z.infer<typeof providerSchema>;

export function validateConfig(data: unknown): Config {
  return configSchema.parse(data);
}

export function safeValidateConfig(data: unknown) {
  return configSchema.safeParse(data);
}
