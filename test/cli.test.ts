/**
 * CLI Tests
 * Runs commands against in-memory services and inspects printed output
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { runCli } from '../src/control-plane/cli.js';
import type { PlancraftServices } from '../src/services.js';
import { executionSchema } from '../src/types/index.js';
import { createMemoryServices } from './helpers/fixtures.js';

function argv(...args: string[]): string[] {
  return ['node', 'plancraft', ...args];
}

function spyConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
    error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
  };
}

describe('CLI', () => {
  let services: PlancraftServices;
  let spies: ReturnType<typeof spyConsole>;
  const originalNoColor = process.env['NO_COLOR'];

  beforeEach(() => {
    process.env['NO_COLOR'] = '1';
    services = createMemoryServices();
    spies = spyConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    if (originalNoColor === undefined) {
      delete process.env['NO_COLOR'];
    } else {
      process.env['NO_COLOR'] = originalNoColor;
    }
  });

  async function run(...args: string[]): Promise<void> {
    await runCli(argv(...args), () => services);
  }

  function lastJson(): unknown {
    const calls = spies.log.mock.calls;
    const last = calls[calls.length - 1];
    return JSON.parse(String(last?.[0]));
  }

  it('should build a plan and print it as JSON', async () => {
    await run('plan', 'Why did consumer conversion drop?', '--json');

    expect(lastJson()).toMatchObject({ category: 'consumer', scene: 'data_discuss' });
    expect(await services.planning.listPlanHistory()).toHaveLength(1);
  });

  it('should print a success line for a human-readable plan', async () => {
    await run('plan', 'What changed in revenue?');

    const [plan] = await services.planning.listPlanHistory();
    expect(spies.log).toHaveBeenCalledWith(`✓ Plan created: ${plan?.planId}`);
  });

  it('should reject an unknown category', async () => {
    await run('plan', 'q', '--category', 'retail');

    expect(process.exitCode).toBe(1);
    expect(spies.error).toHaveBeenCalledTimes(1);
    expect(String(spies.error.mock.calls[0]?.[0])).toContain('✗ Validation failed:');
    expect(await services.planning.listPlanHistory()).toHaveLength(0);
  });

  it('should start, act on and run an execution', async () => {
    await run('start', '--question', 'What changed in revenue?', '--json');
    const { executionId } = z.object({ executionId: z.string() }).parse(lastJson());

    await run('action', executionId, 'task_1', 'complete', '--note', 'checked', '--json');
    const acted = executionSchema.parse(lastJson());
    expect(acted.tasks[0]).toMatchObject({ status: 'completed', outputSummary: 'checked' });

    await run('run', executionId, '--max-steps', '5', '--json');
    expect(lastJson()).toMatchObject({ state: 'completed' });
  });

  it('should require --plan or --question to start', async () => {
    await run('start');

    expect(process.exitCode).toBe(1);
    expect(String(spies.error.mock.calls[0]?.[0])).toContain('Either --plan or --question is required');
  });

  it('should honor --no-auto-start', async () => {
    await run('start', '-q', 'What changed in revenue?', '--no-auto-start', '--json');
    expect(lastJson()).toMatchObject({ autoStart: false, startedAt: null });
  });

  it('should report domain errors on stderr', async () => {
    await run('status', 'missing');

    expect(process.exitCode).toBe(1);
    expect(spies.error).toHaveBeenCalledWith('✗ Execution not found: missing');
  });

  it('should tick, cancel and list executions', async () => {
    const execution = await services.engine.startExecution({ question: 'What changed in revenue?' });

    await run('tick', execution.executionId, '--json');
    expect(executionSchema.parse(lastJson()).tasks[0]?.status).toBe('completed');

    await run('cancel', execution.executionId, '--reason', 'no longer needed');
    expect(spies.log).toHaveBeenLastCalledWith(`✓ Execution cancelled: ${execution.executionId}`);

    await run('list', '--json');
    expect(lastJson()).toMatchObject([{ executionId: execution.executionId, state: 'cancelled' }]);
  });

  it('should print the execution log for one execution', async () => {
    const execution = await services.engine.startExecution({ question: 'What changed in revenue?' });
    await services.executionLog.record({ planId: execution.planId });

    await run('logs', '--execution', execution.executionId, '--json');
    expect(lastJson()).toMatchObject([{ executionId: execution.executionId, step: 'execution_start' }]);
  });

  it('should list plans in a table', async () => {
    await services.planning.buildPlan({ question: 'What changed in revenue?' });
    await run('plans');

    const output = String(spies.log.mock.calls[0]?.[0]);
    expect(output.split('\n')[0]).toContain('CATEGORY');
    expect(output).toContain('What changed in revenue?');
  });
});
