/**
 * Correction Loop Unit Tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  CorrectionLoop,
  InMemoryAttemptLog,
  stripCodeFences,
} from '../src/correction/correction-loop.js';
import { resetConfig } from '../src/config/index.js';
import { InvalidArgumentError } from '../src/errors.js';
import type { AttemptRecorder } from '../src/types/index.js';

const CONTEXT = { question: 'Monthly revenue by region', context: 'table sales(region, amount, month)' };

function failingUntil(successOnCall: number) {
  let calls = 0;
  return {
    execute: vi.fn(async (operation: string) => {
      calls += 1;
      if (calls < successOnCall) {
        throw new Error(`syntax error near call ${calls}`);
      }
      return `rows for ${operation}`;
    }),
  };
}

function corrector(...proposals: string[]) {
  let index = 0;
  return {
    proposeCorrection: vi.fn(async () => {
      const proposal = proposals[Math.min(index, proposals.length - 1)] ?? '';
      index += 1;
      return proposal;
    }),
  };
}

describe('stripCodeFences', () => {
  it('should strip a language-tagged fence', () => {
    expect(stripCodeFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('should strip a bare fence', () => {
    expect(stripCodeFences('```\nSELECT 2\n```\n')).toBe('SELECT 2');
  });

  it('should strip an inline fence without eating the statement', () => {
    expect(stripCodeFences('```SELECT 3```')).toBe('SELECT 3');
  });

  it('should only trim unfenced text', () => {
    expect(stripCodeFences('  SELECT 4  ')).toBe('SELECT 4');
  });
});

describe('CorrectionLoop', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should return on first success without recording', async () => {
    const executor = failingUntil(1);
    const provider = corrector('unused');
    const attempts = new InMemoryAttemptLog();
    const loop = new CorrectionLoop(executor, provider, attempts, { maxRetries: 3 });

    const outcome = await loop.executeWithCorrection('q-1', 'SELECT 1', CONTEXT);

    expect(outcome).toEqual({ operation: 'SELECT 1', result: 'rows for SELECT 1', attempts: 1 });
    expect(provider.proposeCorrection).not.toHaveBeenCalled();
    expect(attempts.list()).toHaveLength(0);
  });

  it('should correct twice and succeed on the third attempt', async () => {
    const executor = failingUntil(3);
    const provider = corrector('```sql\nSELECT a\n```', 'SELECT b');
    const attempts = new InMemoryAttemptLog();
    const loop = new CorrectionLoop(executor, provider, attempts);

    const outcome = await loop.executeWithCorrection('q-1', 'SELECT x', CONTEXT, 2);

    expect(outcome).toEqual({ operation: 'SELECT b', result: 'rows for SELECT b', attempts: 3 });
    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(executor.execute).toHaveBeenNthCalledWith(2, 'SELECT a');
    expect(provider.proposeCorrection).toHaveBeenCalledTimes(2);
    expect(provider.proposeCorrection).toHaveBeenNthCalledWith(1, {
      id: 'q-1',
      question: CONTEXT.question,
      context: CONTEXT.context,
      previousOperation: 'SELECT x',
      errorMessage: 'syntax error near call 1',
    });

    const recorded = attempts.list('q-1');
    expect(recorded).toHaveLength(3);
    expect(recorded.map((a) => [a.attempt, a.success, a.errorMessage])).toEqual([
      [1, false, 'syntax error near call 1'],
      [2, false, 'syntax error near call 2'],
      [3, true, 'syntax error near call 2'],
    ]);
  });

  it('should rethrow the original error when retries are disabled', async () => {
    const failure = new Error('relation "sales" does not exist');
    const executor = { execute: vi.fn(async () => Promise.reject(failure)) };
    const provider = corrector('SELECT 1');
    const attempts = new InMemoryAttemptLog();
    const loop = new CorrectionLoop<string>(executor, provider, attempts);

    await expect(loop.executeWithCorrection('q-2', 'SELECT * FROM sales', CONTEXT, 0)).rejects.toBe(failure);
    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(provider.proposeCorrection).not.toHaveBeenCalled();
    expect(attempts.list()).toHaveLength(1);
  });

  it('should rethrow the last execution error after exhausting retries', async () => {
    const executor = failingUntil(10);
    const provider = corrector('SELECT retry');
    const loop = new CorrectionLoop(executor, provider, new InMemoryAttemptLog(), { maxRetries: 2 });

    await expect(loop.executeWithCorrection('q-3', 'SELECT 1', CONTEXT)).rejects.toThrow(
      'syntax error near call 3'
    );
    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(provider.proposeCorrection).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the execution error when the corrector fails', async () => {
    const executor = failingUntil(10);
    const provider = { proposeCorrection: vi.fn(async () => Promise.reject(new Error('model offline'))) };
    const loop = new CorrectionLoop(executor, provider, new InMemoryAttemptLog());

    await expect(loop.executeWithCorrection('q-4', 'SELECT 1', CONTEXT)).rejects.toThrow(
      'syntax error near call 1'
    );
    expect(executor.execute).toHaveBeenCalledTimes(1);
  });

  it('should keep going when the recorder fails', async () => {
    const executor = failingUntil(2);
    const recorder: AttemptRecorder = { record: vi.fn(async () => Promise.reject(new Error('disk full'))) };
    const loop = new CorrectionLoop(executor, corrector('SELECT ok'), recorder);

    const outcome = await loop.executeWithCorrection('q-5', 'SELECT bad', CONTEXT);

    expect(outcome.result).toBe('rows for SELECT ok');
    expect(recorder.record).toHaveBeenCalledTimes(2);
  });

  it('should take its default retry budget from configuration', async () => {
    vi.stubEnv('PLANCRAFT_CORRECTION_MAX_RETRIES', '1');
    resetConfig();
    const executor = failingUntil(10);
    const provider = corrector('SELECT retry');
    const loop = new CorrectionLoop(executor, provider, new InMemoryAttemptLog());

    await expect(loop.executeWithCorrection('q-7', 'SELECT 1', CONTEXT)).rejects.toThrow(
      'syntax error near call 2'
    );
    expect(executor.execute).toHaveBeenCalledTimes(2);
    expect(provider.proposeCorrection).toHaveBeenCalledTimes(1);
  });

  it('should reject an invalid maxRetries', async () => {
    expect(() => new CorrectionLoop(failingUntil(1), corrector(), new InMemoryAttemptLog(), { maxRetries: -1 })).toThrow(
      InvalidArgumentError
    );

    const loop = new CorrectionLoop(failingUntil(1), corrector(), new InMemoryAttemptLog());
    await expect(loop.executeWithCorrection('q-6', 'SELECT 1', CONTEXT, 1.5)).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });
});

describe('InMemoryAttemptLog', () => {
  it('should cap stored attempts', async () => {
    const log = new InMemoryAttemptLog(2);
    for (let attempt = 1; attempt <= 3; attempt++) {
      await log.record({
        id: 'q',
        attempt,
        operation: 'SELECT 1',
        errorMessage: null,
        success: true,
        timestamp: new Date(0),
      });
    }

    expect(log.list().map((a) => a.attempt)).toEqual([2, 3]);
    log.clear();
    expect(log.list()).toEqual([]);
  });
});
