import type { SuiteReport, TestResult } from '../../src/rbac/types.js';

export function sampleResult(overrides: Partial<TestResult> = {}): TestResult {
  return {
    id: 'NET-013',
    module: 'Networking',
    requirementId: 'REQ-11',
    requirementName: 'Network security groups',
    name: 'Open RDP on the NSG',
    description: 'Adds an inbound allow rule',
    expectation: 'deny',
    status: 'PASS',
    message: 'Denied as expected: no access',
    errorCode: 'AuthorizationFailed',
    durationMs: 120,
    timestamp: '2026-10-19T12:00:05.000Z',
    ...overrides,
  };
}

export function sampleReport(results: TestResult[] = [sampleResult()]): SuiteReport {
  return {
    metadata: {
      runId: '20261019120000abcd',
      toolVersion: '1.4.0',
      subscriptionId: '00000000-0000-0000-0000-000000000001',
      region: 'eastus',
      resourceGroup: 'rbac-test-20261019120000abcd',
      roleName: 'Network Restricted Contributor (20261019120000abcd)',
      modules: ['Authorization', 'Networking'],
      startedAt: '2026-10-19T12:00:00.000Z',
      finishedAt: '2026-10-19T12:10:00.000Z',
      durationMs: 600000,
    },
    summary: {
      total: results.length,
      passed: results.filter(r => r.status === 'PASS').length,
      failed: results.filter(r => r.status === 'FAIL').length,
      errors: results.filter(r => r.status === 'ERROR').length,
      skipped: results.filter(r => r.status === 'SKIPPED').length,
      passRate: 100,
      byRequirement: [],
    },
    results,
  };
}
