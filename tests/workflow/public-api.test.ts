import * as req2code from '../../src/core/workflow';
import { ScriptedExecutor, happyScripts, testConfig } from '../helpers/scripted-executor';

describe('library entry point', () => {
  beforeAll(() => {
    req2code.logger.configure({ quiet: true });
  });

  it('should expose the workflow and its building blocks', () => {
    expect(typeof req2code.runWorkflow).toBe('function');
    expect(typeof req2code.createWorkflowGraph).toBe('function');
    expect(typeof req2code.renderReport).toBe('function');
    expect(req2code.AGENT_NAMES).toHaveLength(6);
    expect(new req2code.MaxIterationsExceeded(1)).toBeInstanceOf(req2code.Req2CodeError);
  });

  it('should run a requirement through the exported API', async () => {
    const events = new req2code.WorkflowEventStream();
    const document = await req2code.runWorkflow('Add two numbers', {
      config: testConfig(),
      executor: new ScriptedExecutor(happyScripts()),
      events,
    });

    expect(document.status).toBe('completed');
    expect(req2code.renderReport(document).split('\n')[2]).toBe('Status: completed');
  });
});
