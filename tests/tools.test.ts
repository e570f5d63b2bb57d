import { describe, test, expect } from '@jest/globals';
import { findTool, TOOL_DEFINITIONS } from '../src/tools.js';

/**
 * Tool definitions: names, schemas and annotations
 */

const EXPECTED_TOOLS = [
  'azure_admin_help',
  'rbac_list_test_cases',
  'rbac_run_test_suite',
  'inventory_export',
  'encryption_at_host_status',
  'encryption_at_host_enable',
  'vm_repair_create',
  'vm_repair_restore',
  'backup_vault_list_items',
  'backup_vault_migrate',
];

describe('Tool Structure Validation', () => {
  test('should define the expected tools in order', () => {
    expect(TOOL_DEFINITIONS.map(t => t.name)).toEqual(EXPECTED_TOOLS);
  });

  test('all tool names should be lowercase with underscores', () => {
    for (const tool of TOOL_DEFINITIONS) {
      expect(tool.name).toMatch(/^[a-z_]+$/);
    }
  });

  test('every required argument should be a declared property', () => {
    for (const tool of TOOL_DEFINITIONS) {
      for (const name of tool.inputSchema.required ?? []) {
        expect(Object.keys(tool.inputSchema.properties)).toContain(name);
      }
    }
  });

  test('only the tools that act on named resources should require arguments', () => {
    const withRequired = TOOL_DEFINITIONS.filter(t => (t.inputSchema.required ?? []).length > 0);
    expect(withRequired.map(t => t.name)).toEqual([
      'encryption_at_host_enable',
      'vm_repair_create',
      'vm_repair_restore',
      'backup_vault_list_items',
      'backup_vault_migrate',
    ]);
    expect(findTool('encryption_at_host_enable')?.inputSchema.required).toEqual(['resourceGroup']);
    expect(findTool('vm_repair_restore')?.inputSchema.required).toEqual(['resourceGroup', 'vmName', 'rescueVmName', 'repairDiskName']);
    expect(findTool('backup_vault_migrate')?.inputSchema.required).toEqual(['resourceGroup', 'vaultName', 'targetVaultName']);
  });

  test('every tool that changes Azure should offer a dry run', () => {
    for (const tool of TOOL_DEFINITIONS.filter(t => !t.annotations.readOnly && t.name !== 'rbac_run_test_suite')) {
      expect(tool.inputSchema.properties.dryRun?.type).toBe('boolean');
    }
  });

  test('every property should carry a description', () => {
    for (const tool of TOOL_DEFINITIONS) {
      for (const schema of Object.values(tool.inputSchema.properties)) {
        expect(schema.description.length).toBeGreaterThan(10);
      }
    }
  });
});

describe('Tool Annotation Validation', () => {
  test('read-only tools should never be destructive', () => {
    for (const tool of TOOL_DEFINITIONS) {
      if (tool.annotations.readOnly) {
        expect(tool.annotations.destructive).toBe(false);
      }
    }
  });

  test('tools that change Azure should be marked destructive', () => {
    expect(findTool('rbac_run_test_suite')?.annotations).toEqual({
      readOnly: false,
      destructive: true,
      idempotent: false,
      openWorld: true,
    });
    expect(findTool('encryption_at_host_enable')?.annotations.destructive).toBe(true);
    expect(findTool('vm_repair_restore')?.annotations.destructive).toBe(true);
    expect(findTool('backup_vault_migrate')?.annotations.destructive).toBe(true);
    expect(findTool('backup_vault_list_items')?.annotations.readOnly).toBe(true);
  });

  test('static tools should not reach the cloud', () => {
    expect(findTool('azure_admin_help')?.annotations.openWorld).toBe(false);
    expect(findTool('rbac_list_test_cases')?.annotations.openWorld).toBe(false);
    expect(findTool('inventory_export')?.annotations.openWorld).toBe(true);
  });

  test('should return undefined for unknown tools', () => {
    expect(findTool('scan_everything')).toBeUndefined();
  });
});
