/**
 * MCP tool definitions
 */

import { REPORT_FORMATS } from './rbac/exporter.js';
import { TEST_MODULES } from './rbac/types.js';
import { INVENTORY_FORMATS } from './inventory.js';
import { RESPONSE_FORMATS } from './format.js';

export interface PropertySchema {
  type: 'string' | 'boolean';
  description: string;
  enum?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, PropertySchema>;
    required?: string[];
  };
  annotations: {
    readOnly: boolean;
    destructive: boolean;
    idempotent: boolean;
    openWorld: boolean;
  };
}

const FORMAT_PROPERTY: PropertySchema = {
  type: 'string',
  enum: [...RESPONSE_FORMATS],
  description: "Output format: 'markdown' (default, human-readable) or 'json' (machine-readable)",
};

const SUBSCRIPTION_PROPERTY: PropertySchema = {
  type: 'string',
  description: 'Azure subscription ID. Default: AZURE_SUBSCRIPTION_ID, then the first enabled subscription',
};

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'azure_admin_help',
    description: 'Describe the available Azure administration tools, their arguments and the environment variables they read',
    inputSchema: { type: 'object', properties: {} },
    annotations: { readOnly: true, destructive: false, idempotent: true, openWorld: false },
  },
  {
    name: 'rbac_list_test_cases',
    description: 'List the RBAC test catalog: test ID, requirement, expected outcome and the scaffold each test needs',
    inputSchema: {
      type: 'object',
      properties: {
        modules: {
          type: 'string',
          description: `Comma-separated modules to list (${TEST_MODULES.join(', ')}). Default: all`,
        },
        format: FORMAT_PROPERTY,
      },
    },
    annotations: { readOnly: true, destructive: false, idempotent: true, openWorld: false },
  },
  {
    name: 'rbac_run_test_suite',
    description:
      'Provision a throwaway environment, assign the custom role to a new service principal, attempt every selected ' +
      'operation as that principal, classify each outcome (PASS/FAIL/ERROR/SKIPPED), write reports and delete the environment',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        region: { type: 'string', description: 'Azure region for the scaffold. Default: AZURE_REGION, then eastus' },
        roleName: { type: 'string', description: 'Test this existing custom role instead of creating one from the role definition file' },
        modules: { type: 'string', description: `Comma-separated modules to run (${TEST_MODULES.join(', ')}). Default: all` },
        testIds: { type: 'string', description: 'Comma-separated test IDs to run, e.g. AUTH-001,NET-013. Default: all' },
        reportFormats: { type: 'string', description: `Comma-separated report formats (${REPORT_FORMATS.join(', ')}). Default: json,csv,html,text` },
        outputDir: { type: 'string', description: 'Directory for report files. Default: rbac-reports' },
        keepEnvironment: { type: 'boolean', description: 'Skip cleanup and leave the test resource group in place' },
        runId: { type: 'string', description: 'Run ID of an earlier run kept with keepEnvironment; its environment is reused. Default: a new run' },
        format: FORMAT_PROPERTY,
      },
    },
    annotations: { readOnly: false, destructive: true, idempotent: false, openWorld: true },
  },
  {
    name: 'inventory_export',
    description: 'Export every resource in a subscription or resource group (name, type, resource group, location, SKU, kind, tags, ID) as CSV or JSON',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Limit to one resource group' },
        resourceType: { type: 'string', description: 'Limit to one resource type, e.g. Microsoft.Storage/storageAccounts' },
        location: { type: 'string', description: "Location filter: 'all', 'common' or a comma-separated list" },
        outputFormat: { type: 'string', enum: [...INVENTORY_FORMATS], description: "Export format: 'csv' (default) or 'json'" },
        outputFile: { type: 'string', description: 'Write the export to this file instead of returning it' },
        format: FORMAT_PROPERTY,
      },
    },
    annotations: { readOnly: true, destructive: false, idempotent: false, openWorld: true },
  },
  {
    name: 'encryption_at_host_status',
    description: 'Report encryption-at-host state, size and power state of virtual machines',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Limit to one resource group' },
        format: FORMAT_PROPERTY,
      },
    },
    annotations: { readOnly: true, destructive: false, idempotent: false, openWorld: true },
  },
  {
    name: 'encryption_at_host_enable',
    description:
      'Enable encryption at host on one VM or every VM in a resource group. Running VMs are deallocated, updated and ' +
      'started again. Runs as a dry run unless dryRun is false',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Resource group of the VM(s)' },
        vmName: { type: 'string', description: 'One VM; every VM in the resource group when omitted' },
        dryRun: { type: 'boolean', description: 'Report the plan without changing anything. Default: true' },
        format: FORMAT_PROPERTY,
      },
      required: ['resourceGroup'],
    },
    annotations: { readOnly: false, destructive: true, idempotent: true, openWorld: true },
  },
  {
    name: 'vm_repair_create',
    description:
      "Snapshot a VM's OS disk, create a disk from the snapshot and attach it to a rescue VM as a data disk. " +
      'Runs as a dry run unless dryRun is false',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Resource group of the VM to repair' },
        vmName: { type: 'string', description: 'VM whose OS disk needs repair' },
        rescueVmName: { type: 'string', description: 'Existing VM in the same region and zone to attach the copy to' },
        rescueResourceGroup: { type: 'string', description: 'Resource group of the rescue VM. Default: resourceGroup' },
        dryRun: { type: 'boolean', description: 'Report the plan without changing anything. Default: true' },
        format: FORMAT_PROPERTY,
      },
      required: ['resourceGroup', 'vmName', 'rescueVmName'],
    },
    annotations: { readOnly: false, destructive: false, idempotent: false, openWorld: true },
  },
  {
    name: 'vm_repair_restore',
    description:
      'Detach the repair disk from the rescue VM and make it the OS disk of the repaired VM, deallocating and ' +
      'restarting it as needed. The previous OS disk is kept. Runs as a dry run unless dryRun is false',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Resource group of the VM being repaired' },
        vmName: { type: 'string', description: 'VM that gets the repaired OS disk' },
        rescueVmName: { type: 'string', description: 'Rescue VM the repair disk is attached to' },
        rescueResourceGroup: { type: 'string', description: 'Resource group of the rescue VM. Default: resourceGroup' },
        repairDiskName: { type: 'string', description: 'Name of the repair disk made by vm_repair_create' },
        dryRun: { type: 'boolean', description: 'Report the plan without changing anything. Default: true' },
        format: FORMAT_PROPERTY,
      },
      required: ['resourceGroup', 'vmName', 'rescueVmName', 'repairDiskName'],
    },
    annotations: { readOnly: false, destructive: true, idempotent: false, openWorld: true },
  },
  {
    name: 'backup_vault_list_items',
    description: 'List the items protected by a Recovery Services vault, with workload, management type and policy',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Resource group of the vault' },
        vaultName: { type: 'string', description: 'Recovery Services vault name' },
        format: FORMAT_PROPERTY,
      },
      required: ['resourceGroup', 'vaultName'],
    },
    annotations: { readOnly: true, destructive: false, idempotent: true, openWorld: true },
  },
  {
    name: 'backup_vault_migrate',
    description:
      'Move Azure VM backups to another Recovery Services vault: stop protection and delete backup data in the source, ' +
      'then protect the VM in the target with the given policy. Runs as a dry run unless dryRun is false',
    inputSchema: {
      type: 'object',
      properties: {
        subscriptionId: SUBSCRIPTION_PROPERTY,
        resourceGroup: { type: 'string', description: 'Resource group of the source vault' },
        vaultName: { type: 'string', description: 'Source Recovery Services vault' },
        targetResourceGroup: { type: 'string', description: 'Resource group of the target vault. Default: resourceGroup' },
        targetVaultName: { type: 'string', description: 'Target Recovery Services vault' },
        policyName: { type: 'string', description: 'Backup policy in the target vault. Default: DefaultPolicy' },
        items: { type: 'string', description: 'Comma-separated VM or protected item names; every item when omitted' },
        dryRun: { type: 'boolean', description: 'Report the plan without changing anything. Default: true' },
        format: FORMAT_PROPERTY,
      },
      required: ['resourceGroup', 'vaultName', 'targetVaultName'],
    },
    annotations: { readOnly: false, destructive: true, idempotent: false, openWorld: true },
  },
];

export function findTool(name: string): ToolDefinition | undefined {
  return TOOL_DEFINITIONS.find(tool => tool.name === name);
}
