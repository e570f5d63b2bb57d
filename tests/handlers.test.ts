import { describe, test, expect } from '@jest/globals';
import type { ComputeManagementClient } from '@azure/arm-compute';
import type { RecoveryServicesBackupClient } from '@azure/arm-recoveryservicesbackup';
import type { ResourceManagementClient } from '@azure/arm-resources';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { booleanArg, handleToolCall, renderHelp, stringArg } from '../src/handlers.js';
import type { ToolServices } from '../src/services.js';
import { TOOL_DEFINITIONS } from '../src/tools.js';
import { asyncIter, fakeClients } from './helpers/fakes.js';
import { SUBSCRIPTION, harness } from './helpers/suite.js';

function services(calls: string[] = []): ToolServices {
  const compute = {
    virtualMachines: {
      list: () => asyncIter([]),
      get: async (_rg: string, name: string) => {
        calls.push(`get ${name}`);
        return {
          id: `/subscriptions/s/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/${name}`,
          name,
          location: 'eastus',
          securityProfile: { encryptionAtHost: false },
          storageProfile: {
            osDisk: {
              name: `${name}-osdisk`,
              createOption: 'FromImage',
              managedDisk: { id: `/subscriptions/s/resourceGroups/rg-app/providers/Microsoft.Compute/disks/${name}-osdisk` },
            },
          },
          instanceView: { statuses: [{ code: 'PowerState/running' }] },
        };
      },
      beginDeallocateAndWait: async () => {
        calls.push('deallocate');
      },
    },
  } as unknown as ComputeManagementClient;
  const resources = {
    resources: {
      list: () => asyncIter([{ id: '/subscriptions/s/resourceGroups/rg/providers/Microsoft.Network/routeTables/rt', name: 'rt', type: 'Microsoft.Network/routeTables', location: 'eastus' }]),
    },
  } as unknown as ResourceManagementClient;

  const backup = {
    backupProtectedItems: {
      list: (vault: string) => {
        calls.push(`list items ${vault}`);
        return asyncIter([]);
      },
    },
  } as unknown as RecoveryServicesBackupClient;

  return {
    version: '1.4.0',
    resolveSubscription: async requested => ({ subscriptionId: requested ?? SUBSCRIPTION, tenantId: 'tenant', displayName: 'Test Subscription' }),
    clientsFor: subscriptionId => fakeClients({ compute, resources, backup }, subscriptionId),
    suiteDependencies: () => harness().deps,
  };
}

describe('Argument helpers', () => {
  test('should read optional strings and reject other types', () => {
    expect(stringArg({ a: 'x' }, 'a')).toBe('x');
    expect(stringArg({}, 'a')).toBeUndefined();
    expect(() => stringArg({ a: 3 }, 'a')).toThrow("Argument 'a' must be a string");
  });

  test('should read booleans and their string forms', () => {
    expect(booleanArg({}, 'dryRun', true)).toBe(true);
    expect(booleanArg({ dryRun: false }, 'dryRun', true)).toBe(false);
    expect(booleanArg({ dryRun: 'false' }, 'dryRun', true)).toBe(false);
    expect(() => booleanArg({ dryRun: 'no' }, 'dryRun', true)).toThrow("Argument 'dryRun' must be a boolean");
  });
});

describe('handleToolCall', () => {
  test('should describe every tool in the help text', async () => {
    const response = await handleToolCall('azure_admin_help', {}, services());
    expect(response.isError).toBeUndefined();
    expect(response.content[0].text).toBe(renderHelp('1.4.0'));
    for (const tool of TOOL_DEFINITIONS) {
      expect(response.content[0].text).toContain(`### ${tool.name}\n`);
    }
    expect(response.content[0].text).toContain('- `resourceGroup` (required): Resource group of the VM(s)\n');
  });

  test('should answer with a result the MCP server can return', async () => {
    const response: CallToolResult = await handleToolCall('azure_admin_help', {}, services());
    expect(response.content).toHaveLength(1);
    expect(response.content[0].type).toBe('text');
  });

  test('should list the catalog as JSON', async () => {
    const response = await handleToolCall('rbac_list_test_cases', { modules: 'networking', format: 'json' }, services());
    const parsed = JSON.parse(response.content[0].text);
    expect(parsed.tool).toBe('rbac_list_test_cases');
    expect(parsed.data.testCases).toHaveLength(24);
    expect(parsed.data.testCases[0].id).toBe('NET-001');
  });

  test('should run the suite and report the exit code', async () => {
    const response = await handleToolCall('rbac_run_test_suite', { testIds: 'AUTH-001', reportFormats: 'json' }, services());
    const text = response.content[0].text;
    expect(response.isError).toBeUndefined();
    expect(text.startsWith('# RBAC Test Report\n')).toBe(true);
    expect(text).toContain('| AUTH-001 | REQ-X | Example operation | deny | PASS | Denied as expected: denied |\n');
    expect(text).toContain('## Reports\n\n- json: rbac-reports/json\n');
    expect(text.endsWith('\nExit code: 0\n')).toBe(true);
  });

  test('should export inventory as JSON', async () => {
    const response = await handleToolCall('inventory_export', { format: 'json' }, services());
    const parsed = JSON.parse(response.content[0].text);
    expect(parsed.data.count).toBe(1);
    expect(parsed.data.resources[0]).toMatchObject({ name: 'rt', resourceGroup: 'rg' });
  });

  test('should default encryption_at_host_enable to a dry run', async () => {
    const calls: string[] = [];
    const response = await handleToolCall('encryption_at_host_enable', { resourceGroup: 'rg-app', vmName: 'vm-web', format: 'json' }, services(calls));
    const parsed = JSON.parse(response.content[0].text);
    expect(parsed.data.dryRun).toBe(true);
    expect(parsed.data.outcomes[0].status).toBe('planned');
    expect(calls).toEqual(['get vm-web']);
  });

  test('should default vm_repair_create to a dry run', async () => {
    const calls: string[] = [];
    const response = await handleToolCall(
      'vm_repair_create',
      { resourceGroup: 'rg-app', vmName: 'vm-web', rescueVmName: 'vm-rescue', format: 'json' },
      services(calls)
    );
    const parsed = JSON.parse(response.content[0].text);
    expect(response.isError).toBeUndefined();
    expect(parsed.data.dryRun).toBe(true);
    expect(parsed.data.outcome.status).toBe('planned');
    expect(parsed.data.outcome.lun).toBe(0);
    expect(calls).toEqual(['get vm-web', 'get vm-rescue']);
  });

  test('should list backup items of a vault', async () => {
    const calls: string[] = [];
    const response = await handleToolCall('backup_vault_list_items', { resourceGroup: 'rg-backup', vaultName: 'rsv-old', format: 'json' }, services(calls));
    const parsed = JSON.parse(response.content[0].text);
    expect(parsed.data).toEqual({ vault: { resourceGroup: 'rg-backup', vaultName: 'rsv-old' }, items: [] });
    expect(calls).toEqual(['list items rsv-old']);
  });

  test('should require a target vault for backup_vault_migrate', async () => {
    const response = await handleToolCall('backup_vault_migrate', { resourceGroup: 'rg-backup', vaultName: 'rsv-old' }, services());
    expect(response.isError).toBe(true);
    expect(response.content[0].text).toContain('**Message:** Required input is missing: resource name');
  });

  test('should return validation failures as error responses', async () => {
    const response = await handleToolCall('encryption_at_host_enable', {}, services());
    expect(response.isError).toBe(true);
    expect(response.content[0].text).toContain('**Message:** Required input is missing: resource group');
  });

  test('should format errors as JSON when asked', async () => {
    const response = await handleToolCall('nope', { format: 'json' }, services());
    expect(response.isError).toBe(true);
    const parsed = JSON.parse(response.content[0].text);
    expect(parsed.error.code).toBe('VALIDATION_ERROR');
    expect(parsed.error.message).toBe('Unknown tool: nope');
  });

  test('should reject an unknown response format', async () => {
    const response = await handleToolCall('azure_admin_help', { format: 'xml' }, services());
    expect(response.isError).toBe(true);
    expect(response.content[0].text).toContain("Invalid format: xml. Must be 'markdown' or 'json'.");
  });
});
