/**
 * Workflow Graph Tests
 *
 * End-to-end runs of the requirement -> coding <-> review -> artifacts graph
 * against scripted agents.
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { runWorkflow } from '../../src/core/workflow/runner';
import { WorkflowEventStream } from '../../src/core/event-stream';
import { TemplateManager } from '../../src/core/template-manager';
import { MissingContextError, Req2CodeError, TransientCallError } from '../../src/core/errors';
import { logger } from '../../src/core/logger';
import {
  APPROVE,
  DOCUMENTATION,
  FIRST_CODE,
  REFINED_REQUIREMENT,
  REJECT,
  ScriptedExecutor,
  happyScripts,
  testConfig,
} from '../helpers/scripted-executor';

const RAW_REQUIREMENT = 'Write a function that adds two numbers';

describe('runWorkflow', () => {
  let events: WorkflowEventStream;

  beforeAll(() => {
    logger.configure({ quiet: true });
  });

  beforeEach(() => {
    events = new WorkflowEventStream();
  });

  describe('approval on the first review', () => {
    it('should produce every artifact after a single iteration', async () => {
      const executor = new ScriptedExecutor(happyScripts());

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.status).toBe('completed');
      expect(document.rawRequirement).toBe(RAW_REQUIREMENT);
      expect(document.iterationCount).toBe(1);
      expect(document.codingAttempts).toBe(1);
      expect(document.reviewVerdict).toBe('approved');
      expect(document.loopState).toBe('approved');
      expect(document.code).toBe(FIRST_CODE);
      expect(document.documentation).toBe(DOCUMENTATION);
      expect(document.tests).toBe('def test_add():\n    assert add(1, 2) == 3');
      expect(document.deploymentConfig).toEqual({
        files: { 'requirements.txt': 'pytest', 'run.sh': 'python app.py' },
      });
      expect(document.degraded).toBe(false);
      expect(document.failures).toEqual({});
      expect(document.requirementWarnings).toEqual([]);
    });

    it('should call each artifact agent exactly once with the approved code', async () => {
      const executor = new ScriptedExecutor(happyScripts());

      await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      for (const agent of ['documentationAgent', 'testAgent', 'deploymentAgent'] as const) {
        const calls = executor.callsFor(agent);
        expect(calls).toHaveLength(1);
        expect(calls[0].context.code).toBe(FIRST_CODE);
      }
      expect(executor.calls).toHaveLength(6);
    });

    it('should emit lifecycle events in order for the sequential part', async () => {
      const executor = new ScriptedExecutor(happyScripts());

      await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      const started = events.getByType('node:started').map(event => event.node);
      expect(started.slice(0, 3)).toEqual(['requirementAgent', 'codingAgent', 'reviewAgent']);
      expect(started).toHaveLength(6);
      expect(events.getByType('node:completed')).toHaveLength(6);
      expect(events.getByType('workflow:completed')[0].data.status).toBe('completed');
      expect(events.getByType('review:verdict')[0].data).toEqual({ verdict: 'approved', iteration: 1, tokenFound: true });
    });
  });

  describe('requirement round-trip', () => {
    it('should pass the refined requirement to the coding agent unchanged', async () => {
      const executor = new ScriptedExecutor(happyScripts());

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(executor.callsFor('requirementAgent')[0].context.userInput).toBe(RAW_REQUIREMENT);
      expect(document.refinedRequirement).toBe(REFINED_REQUIREMENT);
      expect(executor.callsFor('codingAgent')[0].context.refinedRequirement).toBe(REFINED_REQUIREMENT);
      expect(executor.callsFor('codingAgent')[0].context.revisionBlock).toBe('');
    });

    it('should record missing requirement sections as warnings without stopping', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        requirementAgent: ['## Purpose\nAdd numbers.\n## Inputs\na, b\n## Outputs\nsum\n## Error Handling\nraise\n## Assumptions\nnone'],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.requirementWarnings).toEqual(['Refined requirement has no "non-goals" section']);
      expect(document.status).toBe('completed');
      expect(events.getByType('requirement:warning')).toHaveLength(1);
    });
  });

  describe('max iterations', () => {
    it('should stop after two rejected reviews and degrade to the latest code', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: ['code v1', 'code v2'],
        reviewAgent: [REJECT],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxIterations: 2 } }),
        executor,
        events,
      });

      expect(document.status).toBe('degraded');
      expect(document.loopState).toBe('max_iterations_reached');
      expect(document.iterationCount).toBe(2);
      expect(document.codingAttempts).toBe(2);
      expect(document.code).toBe('code v2');
      expect(document.reviewVerdict).toBe('needs_revision');
      expect(document.reviewFeedback).toBe('Handle non-numeric input.');
      expect(document.degraded).toBe(true);
      expect(document.warnings).toContain('Code was not approved within 2 review iteration(s)');
      expect(document.documentation).toBe(DOCUMENTATION);
      expect(executor.callsFor('documentationAgent')[0].context.code).toBe('code v2');
      expect(events.getByType('loop:max_iterations')[0].data).toEqual({ maxIterations: 2, policy: 'degrade' });
    });

    it('should give the second coding call the previous code and the feedback', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: ['code v1', 'code v2'],
        reviewAgent: [REJECT],
      }));

      await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxIterations: 2 } }),
        executor,
        events,
      });

      const revision = executor.callsFor('codingAgent')[1].context.revisionBlock;
      expect(revision).toContain('## Previous Code\n\ncode v1\n');
      expect(revision).toContain('## Review Feedback\n\nHandle non-numeric input.\n');
      expect(executor.callsFor('reviewAgent')[1].context.code).toBe('code v2');
    });

    it.each([1, 2, 3, 4])('should make exactly %i coding attempts when every review rejects', async (maxIterations) => {
      const executor = new ScriptedExecutor(happyScripts({ reviewAgent: [REJECT] }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxIterations } }),
        executor,
        events,
      });

      expect(executor.callsFor('codingAgent')).toHaveLength(maxIterations);
      expect(executor.callsFor('reviewAgent')).toHaveLength(maxIterations);
      expect(document.iterationCount).toBe(maxIterations);
    });

    it('should never let the iteration count pass the maximum', async () => {
      const executor = new ScriptedExecutor(happyScripts({ reviewAgent: [REJECT] }));

      await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxIterations: 3 } }),
        executor,
        events,
      });

      const iterations = events.getByType('review:verdict').map(event => event.data.iteration);
      expect(iterations).toEqual([1, 2, 3]);
    });

    it('should end without artifacts under the skip policy', async () => {
      const executor = new ScriptedExecutor(happyScripts({ reviewAgent: [REJECT] }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxIterations: 1, onMaxIterations: 'skip' } }),
        executor,
        events,
      });

      expect(document.status).toBe('degraded');
      expect(document.degraded).toBe(false);
      expect(document.documentation).toBe('');
      expect(document.tests).toBe('');
      expect(document.deploymentConfig).toBeNull();
      expect(document.warnings).toEqual(['Code was not approved within 1 review iteration(s)']);
      expect(executor.callsFor('documentationAgent')).toHaveLength(0);
    });
  });

  describe('code after approval', () => {
    it('should keep the approved code once a revision is accepted', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: ['code v1', 'code v2', 'code v3'],
        reviewAgent: [REJECT, APPROVE],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.status).toBe('completed');
      expect(document.iterationCount).toBe(2);
      expect(executor.callsFor('codingAgent')).toHaveLength(2);
      expect(document.code).toBe('code v2');
      expect(executor.callsFor('testAgent')[0].context.code).toBe('code v2');
    });
  });

  describe('unparseable review', () => {
    it('should treat a response without a verdict as a rejection with the text as feedback', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: ['code v1', 'code v2'],
        reviewAgent: ['Mostly fine, but rename the function.', APPROVE],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.warnings).toEqual(['Review response at iteration 1 had no verdict; treated as needs revision']);
      expect(executor.callsFor('codingAgent')[1].context.revisionBlock).toContain('Mostly fine, but rename the function.');
      expect(document.status).toBe('completed');
      expect(document.iterationCount).toBe(2);
    });
  });

  describe('transient errors', () => {
    it('should retry a transient coding failure once and then proceed', async () => {
      const sleep = jest.fn(async (_ms: number) => undefined);
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: [new TransientCallError('Connection reset', 'network'), FIRST_CODE],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { retryBackoffMs: 10 } }),
        executor,
        events,
        sleep,
      });

      expect(document.status).toBe('completed');
      expect(document.code).toBe(FIRST_CODE);
      expect(document.codingAttempts).toBe(1);
      expect(executor.callsFor('codingAgent')).toHaveLength(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(10);

      const retries = events.getByType('node:retry');
      expect(retries).toHaveLength(1);
      expect(retries[0].node).toBe('codingAgent');
      expect(retries[0].data).toEqual({
        attempt: 1,
        maxRetries: 2,
        delayMs: 10,
        reason: 'network',
        error: 'Connection reset',
      });
    });

    it('should fail the run when a core node exhausts its retries', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: [new TransientCallError('Connection reset', 'network')],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig({ workflow: { maxCallRetries: 1 } }),
        executor,
        events,
      });

      expect(document.status).toBe('failed');
      expect(document.failures).toEqual({ code: 'Connection reset' });
      expect(document.refinedRequirement).toBe(REFINED_REQUIREMENT);
      expect(document.code).toBe('');
      expect(executor.callsFor('codingAgent')).toHaveLength(2);
      expect(executor.callsFor('reviewAgent')).toHaveLength(0);
      expect(events.getByType('workflow:failed')).toHaveLength(1);
    });

    it('should not retry errors that are not transient', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        requirementAgent: [new Error('Invalid API key')],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.status).toBe('failed');
      expect(document.failures).toEqual({ refinedRequirement: 'Invalid API key' });
      expect(executor.calls).toHaveLength(1);
      expect(events.getByType('node:retry')).toHaveLength(0);
    });
  });

  describe('artifact failures', () => {
    it('should record one failing artifact without blocking the others', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        documentationAgent: [new Error('Model refused')],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.failures).toEqual({ documentation: 'Failed to generate documentation: Model refused' });
      expect(document.documentation).toBe('');
      expect(document.tests).toBe('def test_add():\n    assert add(1, 2) == 3');
      expect(document.deploymentConfig?.files['run.sh']).toBe('python app.py');
      expect(document.status).toBe('degraded');
    });

    it('should merge failures from several artifact nodes', async () => {
      const executor = new ScriptedExecutor(happyScripts({
        testAgent: ['   '],
        deploymentAgent: [new Error('Quota exceeded')],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events });

      expect(document.failures).toEqual({
        tests: 'Failed to generate tests: empty response',
        deploymentConfig: 'Failed to generate deploymentConfig: Quota exceeded',
      });
      expect(document.documentation).toBe(DOCUMENTATION);
    });
  });

  describe('cancellation', () => {
    it('should return the partial document when cancelled between nodes', async () => {
      const controller = new AbortController();
      const executor = new ScriptedExecutor(happyScripts({
        codingAgent: [() => {
          controller.abort();
          return FIRST_CODE;
        }],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig(),
        executor,
        events,
        signal: controller.signal,
      });

      expect(document.status).toBe('cancelled');
      expect(document.refinedRequirement).toBe(REFINED_REQUIREMENT);
      expect(document.code).toBe(FIRST_CODE);
      expect(document.reviewVerdict).toBeNull();
      expect(executor.callsFor('reviewAgent')).toHaveLength(0);
      expect(events.getByType('workflow:cancelled')[0].data.node).toBe('reviewAgent');
    });

    it('should return the approved document when cancelled before the artifact agents', async () => {
      const controller = new AbortController();
      const executor = new ScriptedExecutor(happyScripts({
        reviewAgent: [() => {
          controller.abort();
          return APPROVE;
        }],
      }));

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig(),
        executor,
        events,
        signal: controller.signal,
      });

      expect(document.status).toBe('cancelled');
      expect(document.loopState).toBe('approved');
      expect(document.reviewVerdict).toBe('approved');
      expect(document.code).toBe(FIRST_CODE);
      expect(document.iterationCount).toBe(1);
      expect(executor.callsFor('documentationAgent')).toHaveLength(0);
      expect(executor.callsFor('testAgent')).toHaveLength(0);
      expect(executor.callsFor('deploymentAgent')).toHaveLength(0);
      expect(['documentationAgent', 'testAgent', 'deploymentAgent']).toContain(
        events.getByType('workflow:cancelled')[0].data.node
      );
      expect(events.getByType('workflow:failed')).toHaveLength(0);
    });

    it('should not call any agent when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const executor = new ScriptedExecutor(happyScripts());

      const document = await runWorkflow(RAW_REQUIREMENT, {
        config: testConfig(),
        executor,
        events,
        signal: controller.signal,
      });

      expect(document.status).toBe('cancelled');
      expect(document.rawRequirement).toBe(RAW_REQUIREMENT);
      expect(document.refinedRequirement).toBe('');
      expect(executor.calls).toHaveLength(0);
    });
  });

  describe('invalid input', () => {
    it('should reject an empty requirement before running any node', async () => {
      const executor = new ScriptedExecutor(happyScripts());

      await expect(runWorkflow('   \n', { config: testConfig(), executor, events })).rejects.toThrow(Req2CodeError);
      expect(executor.calls).toHaveLength(0);
    });

    it('should raise MissingContextError when a template needs a key no node supplies', async () => {
      const customPath = await fs.mkdtemp(path.join(os.tmpdir(), 'req2code-templates-'));
      await fs.writeFile(path.join(customPath, 'coding.md'), 'Write {{language}} code for:\n{{refinedRequirement}}\nStyle: {{styleGuide}}');
      const executor = new ScriptedExecutor(happyScripts(), new TemplateManager({ customPath }));

      try {
        await expect(runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events }))
          .rejects.toThrow('Template "coding" is missing context: styleGuide');
        await expect(runWorkflow(RAW_REQUIREMENT, { config: testConfig(), executor, events }))
          .rejects.toBeInstanceOf(MissingContextError);
        expect(executor.callsFor('codingAgent')).toHaveLength(0);
      } finally {
        await fs.remove(customPath);
      }
    });
  });
});
