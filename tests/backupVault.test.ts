import { describe, test, expect } from '@jest/globals';
import type { ProtectedItemResource, RecoveryServicesBackupClient } from '@azure/arm-recoveryservicesbackup';
import {
  listProtectedItems,
  migrateProtectedItems,
  renderItemsMarkdown,
  selectItems,
  toProtectedItemSummary,
  type MigrationRequest,
} from '../src/backupVault.js';
import { ValidationError } from '../src/errors.js';
import { asyncIter, restError } from './helpers/fakes.js';

const VAULTS = '/subscriptions/sub-1/resourceGroups/rg-backup/providers/Microsoft.RecoveryServices/vaults';
const VM_CONTAINER = 'IaasVMContainer;iaasvmcontainerv2;rg-app;vm-web';
const VM_ITEM_NAME = 'VM;iaasvmcontainerv2;rg-app;vm-web';
const VM_SOURCE = '/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/vm-web';
const TARGET_POLICY_ID = `${VAULTS}/rsv-new/backupPolicies/DefaultPolicy`;

const VM_ITEM: ProtectedItemResource = {
  id: `${VAULTS}/rsv-old/backupFabrics/Azure/protectionContainers/${VM_CONTAINER}/protectedItems/${VM_ITEM_NAME}`,
  name: VM_ITEM_NAME,
  properties: {
    protectedItemType: 'Microsoft.Compute/virtualMachines',
    backupManagementType: 'AzureIaasVM',
    workloadType: 'VM',
    sourceResourceId: VM_SOURCE,
    policyId: `${VAULTS}/rsv-old/backupPolicies/DailyPolicy`,
  },
};

const SHARE_ITEM: ProtectedItemResource = {
  id: `${VAULTS}/rsv-old/backupFabrics/Azure/protectionContainers/StorageContainer;Storage;rg-app;stshared/protectedItems/AzureFileShare;share1`,
  name: 'AzureFileShare;share1',
  properties: {
    protectedItemType: 'AzureFileShareProtectedItem',
    backupManagementType: 'AzureStorage',
    workloadType: 'AzureFileShare',
    sourceResourceId: '/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Storage/storageAccounts/stshared',
  },
};

interface FakeBackup {
  backup: RecoveryServicesBackupClient;
  calls: string[];
}

function fakeBackup(items: ProtectedItemResource[], options: { failDelete?: boolean; protectFailures?: number } = {}): FakeBackup {
  const calls: string[] = [];
  let protectFailures = options.protectFailures ?? 0;
  const backup = {
    subscriptionId: 'sub-1',
    backupProtectedItems: {
      list: (vault: string, rg: string) => {
        calls.push(`list ${rg}/${vault}`);
        return asyncIter(items);
      },
    },
    protectionPolicies: {
      get: async (vault: string, _rg: string, name: string) => ({ id: `${VAULTS}/${vault}/backupPolicies/${name}`, name }),
    },
    protectionContainers: {
      refresh: async (vault: string, rg: string, fabric: string) => {
        calls.push(`refresh ${rg}/${vault} ${fabric}`);
      },
    },
    protectedItems: {
      delete: async (vault: string, _rg: string, _fabric: string, container: string, name: string) => {
        calls.push(`delete ${vault} ${container} ${name}`);
        if (options.failDelete) throw restError(400, 'BMSUserErrorDeleteNotAllowed', 'Delete rejected');
      },
      createOrUpdate: async (
        vault: string,
        _rg: string,
        _fabric: string,
        _container: string,
        name: string,
        body: { properties: { policyId: string } }
      ) => {
        calls.push(`protect ${vault} ${name} policy=${body.properties.policyId}`);
        if (protectFailures > 0) {
          protectFailures--;
          throw restError(409, 'UserErrorBackupItemAlreadyProtected', 'Protection rejected');
        }
        return {};
      },
    },
  } as unknown as RecoveryServicesBackupClient;
  return { backup, calls };
}

const REQUEST: MigrationRequest = {
  source: { resourceGroup: 'rg-backup', vaultName: 'rsv-old' },
  target: { resourceGroup: 'rg-backup', vaultName: 'rsv-new' },
  targetPolicy: 'DefaultPolicy',
};

describe('Protected items', () => {
  test('should summarise a VM backup item from its resource ID', () => {
    expect(toProtectedItemSummary(VM_ITEM)).toEqual({
      name: VM_ITEM_NAME,
      sourceName: 'vm-web',
      fabricName: 'Azure',
      containerName: VM_CONTAINER,
      backupManagementType: 'AzureIaasVM',
      workloadType: 'VM',
      protectedItemType: 'Microsoft.Compute/virtualMachines',
      sourceResourceId: VM_SOURCE,
      policyName: 'DailyPolicy',
      id: VM_ITEM.id,
    });
  });

  test('should list every item of the vault', async () => {
    const { backup, calls } = fakeBackup([VM_ITEM, SHARE_ITEM]);
    const items = await listProtectedItems(backup, REQUEST.source);
    expect(items.map(item => item.sourceName)).toEqual(['vm-web', 'stshared']);
    expect(calls).toEqual(['list rg-backup/rsv-old']);
  });

  test('should select items by VM name or item name', () => {
    const items = [toProtectedItemSummary(VM_ITEM), toProtectedItemSummary(SHARE_ITEM)];
    expect(selectItems(items, ['VM-WEB']).map(item => item.name)).toEqual([VM_ITEM_NAME]);
    expect(selectItems(items, ['azurefileshare;share1']).map(item => item.name)).toEqual(['AzureFileShare;share1']);
    expect(selectItems(items, undefined)).toHaveLength(2);
    expect(() => selectItems(items, ['vm-web', 'vm-gone'])).toThrow('Not protected in the source vault: vm-gone');
  });

  test('should render one row per item', () => {
    const md = renderItemsMarkdown(REQUEST.source, [toProtectedItemSummary(VM_ITEM)]);
    expect(md).toContain(`| vm-web | VM | AzureIaasVM | DailyPolicy | ${VM_CONTAINER} |\n`);
  });
});

describe('migrateProtectedItems', () => {
  test('should plan VM moves and skip other workloads on a dry run', async () => {
    const { backup, calls } = fakeBackup([VM_ITEM, SHARE_ITEM]);

    const outcomes = await migrateProtectedItems(backup, REQUEST, { dryRun: true });

    expect(outcomes).toEqual([
      {
        item: VM_ITEM_NAME,
        sourceName: 'vm-web',
        status: 'planned',
        message: 'Dry run: would stop protection and delete backup data in rsv-old, then protect in rsv-new with policy DefaultPolicy',
      },
      {
        item: 'AzureFileShare;share1',
        sourceName: 'stshared',
        status: 'skipped',
        message: 'Only Azure VM backups can be moved; AzureStorage stays in rsv-old',
      },
    ]);
    expect(calls).toEqual(['list rg-backup/rsv-old']);
  });

  test('should stop protection in the source and protect in the target', async () => {
    const { backup, calls } = fakeBackup([VM_ITEM, SHARE_ITEM]);

    const outcomes = await migrateProtectedItems(backup, { ...REQUEST, items: ['vm-web'] }, { dryRun: false });

    expect(outcomes).toEqual([
      { item: VM_ITEM_NAME, sourceName: 'vm-web', status: 'moved', message: 'Protected in rsv-new with policy DefaultPolicy' },
    ]);
    expect(calls).toEqual([
      'list rg-backup/rsv-old',
      'refresh rg-backup/rsv-new Azure',
      `delete rsv-old ${VM_CONTAINER} ${VM_ITEM_NAME}`,
      `protect rsv-new ${VM_ITEM_NAME} policy=${TARGET_POLICY_ID}`,
    ]);
  });

  test('should retry protection while the source deletion settles', async () => {
    const { backup, calls } = fakeBackup([VM_ITEM], { protectFailures: 1 });

    const outcomes = await migrateProtectedItems(backup, REQUEST, { dryRun: false, protectAttempts: 2, protectIntervalMs: 0 });

    expect(outcomes[0].status).toBe('moved');
    expect(calls.filter(call => call.startsWith('protect '))).toHaveLength(2);
  });

  test('should report an item left unprotected when the target refuses it', async () => {
    const { backup } = fakeBackup([VM_ITEM], { protectFailures: 5 });

    const outcomes = await migrateProtectedItems(backup, REQUEST, { dryRun: false, protectAttempts: 1, protectIntervalMs: 0 });

    expect(outcomes[0]).toEqual({
      item: VM_ITEM_NAME,
      sourceName: 'vm-web',
      status: 'failed',
      message: 'Protection rejected (protection was removed from rsv-old; vm-web is unprotected)',
    });
  });

  test('should not touch the target when stopping protection fails', async () => {
    const { backup, calls } = fakeBackup([VM_ITEM], { failDelete: true });

    const outcomes = await migrateProtectedItems(backup, REQUEST, { dryRun: false });

    expect(outcomes[0].message).toBe('Delete rejected (still protected in rsv-old)');
    expect(calls.some(call => call.startsWith('protect '))).toBe(false);
  });

  test('should refuse to migrate a vault onto itself', async () => {
    const { backup } = fakeBackup([VM_ITEM]);
    await expect(
      migrateProtectedItems(backup, { ...REQUEST, target: { resourceGroup: 'RG-BACKUP', vaultName: 'RSV-OLD' } }, { dryRun: true })
    ).rejects.toThrow(ValidationError);
  });
});
