import { ConfigInput } from './schema';

export const defaultConfig: ConfigInput = {
  ai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0.1,
    timeoutMs: 120000,
  },
  workflow: {
    maxIterations: 3,
    maxCallRetries: 2,
    retryBackoffMs: 1000,
    onMaxIterations: 'degrade',
  },
  review: {
    mode: 'balanced',
  },
  target: {
    language: 'Python',
    testFramework: 'pytest',
    moduleFileName: 'app.py',
  },
};
