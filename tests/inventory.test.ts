import { describe, test, expect, afterAll } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { GenericResourceExpanded, ResourceManagementClient } from '@azure/arm-resources';
import {
  collectInventory,
  exportInventory,
  formatTags,
  renderInventory,
  summarizeByType,
  toInventoryRow,
} from '../src/inventory.js';
import { asyncIter } from './helpers/fakes.js';

const RESOURCES: GenericResourceExpanded[] = [
  {
    id: '/subscriptions/s/resourceGroups/rg-app/providers/Microsoft.Storage/storageAccounts/stapp',
    name: 'stapp',
    type: 'Microsoft.Storage/storageAccounts',
    location: 'eastus',
    sku: { name: 'Standard_LRS' },
    kind: 'StorageV2',
    tags: { env: 'dev', owner: 'ops' },
  },
  {
    id: '/subscriptions/s/resourceGroups/rg-net/providers/Microsoft.Network/virtualNetworks/vnet-a',
    name: 'vnet-a',
    type: 'Microsoft.Network/virtualNetworks',
    location: 'westeurope',
  },
];

function fakeResourceClient(calls: string[]): ResourceManagementClient {
  return {
    resources: {
      list: (options: { filter?: string }) => {
        calls.push(`list ${options.filter ?? ''}`);
        return asyncIter(RESOURCES);
      },
      listByResourceGroup: (rg: string, options: { filter?: string }) => {
        calls.push(`listByResourceGroup ${rg} ${options.filter ?? ''}`);
        return asyncIter(RESOURCES.slice(0, 1));
      },
    },
  } as unknown as ResourceManagementClient;
}

describe('Inventory rows', () => {
  test('should flatten tags', () => {
    expect(formatTags({ env: 'dev', owner: 'ops' })).toBe('env=dev;owner=ops');
    expect(formatTags(undefined)).toBe('');
  });

  test('should map a resource to a row', () => {
    expect(toInventoryRow(RESOURCES[0])).toEqual({
      name: 'stapp',
      type: 'Microsoft.Storage/storageAccounts',
      resourceGroup: 'rg-app',
      location: 'eastus',
      sku: 'Standard_LRS',
      kind: 'StorageV2',
      tags: 'env=dev;owner=ops',
      id: RESOURCES[0].id,
    });
    expect(toInventoryRow({}).resourceGroup).toBe('');
  });
});

describe('collectInventory', () => {
  test('should list the subscription and filter by location', async () => {
    const calls: string[] = [];
    const rows = await collectInventory(fakeResourceClient(calls), { location: 'westeurope' });
    expect(calls).toEqual(['list ']);
    expect(rows.map(r => r.name)).toEqual(['vnet-a']);
  });

  test('should scope to a resource group with a type filter', async () => {
    const calls: string[] = [];
    await collectInventory(fakeResourceClient(calls), {
      resourceGroup: 'rg-app',
      resourceType: 'Microsoft.Storage/storageAccounts',
    });
    expect(calls).toEqual(["listByResourceGroup rg-app resourceType eq 'Microsoft.Storage/storageAccounts'"]);
  });
});

describe('Inventory output', () => {
  const dir = mkdtempSync(join(tmpdir(), 'azadmin-inventory-'));
  const rows = RESOURCES.map(toInventoryRow);

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should count resources by type', () => {
    expect(summarizeByType(rows)).toEqual({
      'Microsoft.Storage/storageAccounts': 1,
      'Microsoft.Network/virtualNetworks': 1,
    });
  });

  test('should render CSV with a header row', () => {
    expect(renderInventory(rows.slice(1), 'csv')).toBe(
      'Name,Type,Resource Group,Location,SKU,Kind,Tags,ID\n' +
        `vnet-a,Microsoft.Network/virtualNetworks,rg-net,westeurope,,,,${RESOURCES[1].id}\n`
    );
  });

  test('should write JSON and CSV files', async () => {
    const jsonFile = join(dir, 'inventory.json');
    const csvFile = join(dir, 'inventory.csv');

    await exportInventory(rows, 'json', jsonFile);
    await exportInventory(rows, 'csv', csvFile);

    expect(JSON.parse(readFileSync(jsonFile, 'utf-8'))).toEqual(rows);
    expect(readFileSync(csvFile, 'utf-8')).toBe(renderInventory(rows, 'csv'));
  });
});
