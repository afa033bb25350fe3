import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, mergeConfig, configExists } from '../../src/config/loader';
import { ConfigError } from '../../src/core/errors';

describe('loadConfig', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), 'req2code-config-'));
  });

  afterEach(async () => {
    await fs.remove(cwd);
  });

  it('should return defaults when no config file exists', async () => {
    const config = await loadConfig(undefined, {}, cwd);

    expect(config.ai.provider).toBe('openai');
    expect(config.ai.model).toBe('gpt-4o-mini');
    expect(config.ai.timeoutMs).toBe(120000);
    expect(config.workflow).toEqual({
      maxIterations: 3,
      maxCallRetries: 2,
      retryBackoffMs: 1000,
      onMaxIterations: 'degrade',
    });
    expect(config.review.mode).toBe('balanced');
    expect(config.target).toEqual({ language: 'Python', testFramework: 'pytest', moduleFileName: 'app.py' });
    expect(config.agents).toEqual({});
    expect(config.debug).toBe(false);
  });

  it('should merge a JSON config file found in the working directory', async () => {
    await fs.writeJson(path.join(cwd, 'req2code.config.json'), {
      workflow: { maxIterations: 5 },
      agents: { reviewAgent: { provider: 'anthropic', model: 'claude-test' } },
    });

    const config = await loadConfig(undefined, {}, cwd);

    expect(config.workflow.maxIterations).toBe(5);
    expect(config.workflow.maxCallRetries).toBe(2);
    expect(config.agents.reviewAgent).toEqual({ provider: 'anthropic', model: 'claude-test' });
    expect(config.ai.model).toBe('gpt-4o-mini');
  });

  it('should read YAML files', async () => {
    const file = path.join(cwd, 'custom.yaml');
    await fs.writeFile(file, 'review:\n  mode: strict\ntarget:\n  language: TypeScript\n');

    const config = await loadConfig(file, {}, cwd);

    expect(config.review.mode).toBe('strict');
    expect(config.target.language).toBe('TypeScript');
    expect(config.target.testFramework).toBe('pytest');
  });

  it('should let overrides win over the file', async () => {
    await fs.writeJson(path.join(cwd, 'req2code.config.json'), { workflow: { maxIterations: 5 } });

    const config = await loadConfig(undefined, { workflow: { maxIterations: 2 }, ai: { model: 'gpt-4o' } }, cwd);

    expect(config.workflow.maxIterations).toBe(2);
    expect(config.ai.model).toBe('gpt-4o');
    expect(config.ai.provider).toBe('openai');
  });

  it('should reject an explicit path that does not exist', async () => {
    const missing = path.join(cwd, 'missing.json');
    await expect(loadConfig(missing, {}, cwd)).rejects.toThrow(new ConfigError(`Config file not found: ${missing}`));
  });

  it('should report invalid values with their path', async () => {
    await fs.writeJson(path.join(cwd, 'req2code.config.json'), { workflow: { maxIterations: 0 } });

    await expect(loadConfig(undefined, {}, cwd)).rejects.toThrow(
      'Invalid configuration:\n  workflow.maxIterations: Number must be greater than or equal to 1'
    );
  });

  it('should reject unknown providers', async () => {
    await expect(loadConfig(undefined, { ai: { provider: 'mystery' } }, cwd)).rejects.toBeInstanceOf(ConfigError);
  });

  it('should report whether a config file exists', async () => {
    expect(await configExists(undefined, cwd)).toBe(false);
    await fs.writeFile(path.join(cwd, 'req2code.config.yml'), 'debug: true\n');
    expect(await configExists(undefined, cwd)).toBe(true);
  });
});

describe('mergeConfig', () => {
  it('should merge nested objects and replace arrays and scalars', () => {
    const merged = mergeConfig(
      { a: { b: 1, c: [1, 2] }, d: 'x' },
      { a: { c: [3] }, d: 'y', e: undefined }
    );
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'y' });
  });
});
