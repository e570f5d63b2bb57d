import { describe, test, expect } from '@jest/globals';
import { join } from 'path';
import { DEFAULTS, loadSuiteOptions } from '../src/config.js';
import { ValidationError } from '../src/errors.js';
import { CONFIG_DIR } from '../src/paths.js';

describe('loadSuiteOptions', () => {
  test('should fall back to defaults', () => {
    expect(loadSuiteOptions({}, {})).toEqual({
      subscriptionId: undefined,
      region: 'eastus',
      resourceGroupPrefix: 'rbac-test',
      roleName: undefined,
      roleDefinitionFile: join(CONFIG_DIR, 'custom-role.json'),
      modules: ['Authorization', 'Networking'],
      testIds: undefined,
      formats: ['json', 'csv', 'html', 'text'],
      outputDir: 'rbac-reports',
      keepEnvironment: false,
      runId: undefined,
      secretLifetimeHours: 24,
      propagation: { timeoutMs: 300000, intervalMs: 15000 },
      replication: { attempts: 10, intervalMs: 10000 },
      cleanup: { attempts: 5, intervalMs: 20000 },
    });
  });

  test('should read environment variables', () => {
    const options = loadSuiteOptions({}, {
      AZURE_SUBSCRIPTION_ID: '00000000-0000-0000-0000-000000000001',
      AZURE_REGION: 'WestEurope',
      RBAC_ROLE_NAME: ' Ops Contributor ',
      RBAC_MODULES: 'networking',
      RBAC_TEST_IDS: 'net-001,NET-002',
      RBAC_REPORT_FORMATS: 'pdf,json',
      RBAC_KEEP_ENVIRONMENT: 'yes',
      RBAC_PROPAGATION_TIMEOUT_SECONDS: '60',
      RBAC_CLEANUP_ATTEMPTS: '2',
    });

    expect(options.subscriptionId).toBe('00000000-0000-0000-0000-000000000001');
    expect(options.region).toBe('westeurope');
    expect(options.roleName).toBe('Ops Contributor');
    expect(options.modules).toEqual(['Networking']);
    expect(options.testIds).toEqual(['NET-001', 'NET-002']);
    expect(options.formats).toEqual(['pdf', 'json']);
    expect(options.keepEnvironment).toBe(true);
    expect(options.propagation.timeoutMs).toBe(60000);
    expect(options.cleanup.attempts).toBe(2);
  });

  test('should prefer command options over environment variables', () => {
    const options = loadSuiteOptions(
      { region: 'uksouth', outputDir: 'reports', cleanupInterval: '5' },
      { AZURE_REGION: 'eastus2', RBAC_OUTPUT_DIR: 'elsewhere', RBAC_CLEANUP_INTERVAL_SECONDS: '30' }
    );
    expect(options.region).toBe('uksouth');
    expect(options.outputDir).toBe('reports');
    expect(options.cleanup.intervalMs).toBe(5000);
  });

  test('should ignore blank values', () => {
    const options = loadSuiteOptions({}, { AZURE_REGION: '  ', RBAC_KEEP_ENVIRONMENT: 'no' });
    expect(options.region).toBe(DEFAULTS.region);
    expect(options.keepEnvironment).toBe(false);
  });

  test('should reject unknown test IDs', () => {
    expect(() => loadSuiteOptions({ tests: 'AUTH-001,AUTH-099' }, {})).toThrow('Unknown test ID(s): AUTH-099');
  });

  test('should reject an over-long resource group prefix', () => {
    expect(() => loadSuiteOptions({ resourceGroupPrefix: 'p'.repeat(71) }, {})).toThrow(ValidationError);
  });

  test('should reject invalid numbers and formats', () => {
    expect(() => loadSuiteOptions({ propagationInterval: '0' }, {})).toThrow('propagation interval must be a positive integer, got: 0');
    expect(() => loadSuiteOptions({ formats: 'docx' }, {})).toThrow('Invalid report format: docx');
  });

  test('should take the run ID of a kept environment from the environment or the command', () => {
    expect(loadSuiteOptions({ keepEnvironment: true }, { RBAC_RUN_ID: '20261019120000abcd' }).runId).toBe('20261019120000abcd');
    expect(loadSuiteOptions({ runId: '20261019120000ABCD' }, { RBAC_RUN_ID: '20261019130000ef01' }).runId).toBe('20261019120000abcd');
  });

  test('should reject run IDs that cannot name a storage account', () => {
    expect(() => loadSuiteOptions({ runId: 'run_1' }, {})).toThrow('Invalid run ID format: run_1');
    expect(() => loadSuiteOptions({ runId: 'a'.repeat(23) }, {})).toThrow('Input exceeds maximum length of 22 characters');
  });

  test('should reject a prefix and run ID too long for a resource group name', () => {
    expect(() => loadSuiteOptions({ resourceGroupPrefix: 'p'.repeat(70), runId: '20261019120000abcd1234' }, {})).toThrow(
      'Resource group prefix and run ID together exceed the 90-character resource group name limit'
    );
  });
});
