import { describe, test, expect } from '@jest/globals';
import { runPhase, runTestCase, summarize } from '../../src/rbac/runner.js';
import type { TestResult } from '../../src/rbac/types.js';
import { executionContext, restError, suiteContext, testCase } from '../helpers/fakes.js';

function result(overrides: Partial<TestResult>): TestResult {
  return {
    id: 'AUTH-001',
    module: 'Authorization',
    requirementId: 'REQ-1',
    requirementName: 'First',
    name: 'n',
    description: 'd',
    expectation: 'deny',
    status: 'PASS',
    message: '',
    durationMs: 1,
    timestamp: '2026-10-19T12:00:00.000Z',
    ...overrides,
  };
}

describe('runTestCase', () => {
  test('should skip without executing when a prerequisite is missing', async () => {
    let executed = false;
    const subject = testCase({
      requires: ['nsgId', 'hubSubnetId', 'resourceGroupId'],
      execute: async () => {
        executed = true;
      },
    });
    const context = executionContext(suiteContext({ scaffold: { resourceGroupId: '/subscriptions/x/resourceGroups/rg' } }));

    const outcome = await runTestCase(subject, context);

    expect(executed).toBe(false);
    expect(outcome.status).toBe('SKIPPED');
    expect(outcome.message).toBe('Prerequisite not provisioned: nsgId, hubSubnetId');
    expect(outcome.durationMs).toBe(0);
  });

  test('should classify a thrown denial as PASS for a deny test', async () => {
    const subject = testCase({
      execute: async () => {
        throw restError(403, 'AuthorizationFailed', 'denied');
      },
    });

    const outcome = await runTestCase(subject, executionContext(suiteContext()));

    expect(outcome).toMatchObject({
      id: 'AUTH-900',
      module: 'Authorization',
      requirementId: 'REQ-X',
      requirementName: 'Example requirement',
      expectation: 'deny',
      status: 'PASS',
      message: 'Denied as expected: denied',
      errorCode: 'AuthorizationFailed',
    });
  });

  test('should never throw, even when execute rejects with a non-Error', async () => {
    const subject = testCase({
      expectation: 'allow',
      execute: () => Promise.reject('boom'),
    });

    const outcome = await runTestCase(subject, executionContext(suiteContext()));

    expect(outcome.status).toBe('ERROR');
    expect(outcome.message).toBe('Unexpected error: boom');
  });
});

describe('runPhase', () => {
  test('should run tests in order and return one result each', async () => {
    const order: string[] = [];
    const tests = ['AUTH-001', 'AUTH-002', 'AUTH-003'].map(id =>
      testCase({
        id,
        expectation: 'allow',
        execute: async () => {
          order.push(id);
        },
      })
    );

    const results = await runPhase('Authorization', tests, executionContext(suiteContext()));

    expect(order).toEqual(['AUTH-001', 'AUTH-002', 'AUTH-003']);
    expect(results.map(r => r.status)).toEqual(['PASS', 'PASS', 'PASS']);
  });
});

describe('summarize', () => {
  test('should count statuses and compute the pass rate over executed tests', () => {
    const summary = summarize([
      result({ id: 'A', status: 'PASS' }),
      result({ id: 'B', status: 'PASS' }),
      result({ id: 'C', status: 'FAIL', requirementId: 'REQ-2', requirementName: 'Second' }),
      result({ id: 'D', status: 'SKIPPED', requirementId: 'REQ-2', requirementName: 'Second' }),
    ]);

    expect(summary.total).toBe(4);
    expect(summary.passed).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.errors).toBe(0);
    expect(summary.skipped).toBe(1);
    expect(summary.passRate).toBe(66.67);
    expect(summary.byRequirement).toEqual([
      { requirementId: 'REQ-1', requirementName: 'First', total: 2, passed: 2, failed: 0, errors: 0, skipped: 0 },
      { requirementId: 'REQ-2', requirementName: 'Second', total: 2, passed: 0, failed: 1, errors: 0, skipped: 1 },
    ]);
  });

  test('should report a zero pass rate when nothing executed', () => {
    expect(summarize([]).passRate).toBe(0);
    expect(summarize([result({ status: 'SKIPPED' })]).passRate).toBe(0);
  });
});
