import { describe, test, expect } from '@jest/globals';
import { parseResourceId, resourceGroupScope, resourceId, roleDefinitionResourceId } from '../src/azure/resourceId.js';

describe('parseResourceId', () => {
  test('should parse a child resource ID', () => {
    expect(parseResourceId('/subscriptions/sub-1/resourceGroups/rg-a/providers/Microsoft.Network/virtualNetworks/vnet-hub/subnets/snet-workload')).toEqual({
      subscriptionId: 'sub-1',
      resourceGroup: 'rg-a',
      provider: 'Microsoft.Network',
      types: ['virtualNetworks', 'subnets'],
      names: ['vnet-hub', 'snet-workload'],
      name: 'snet-workload',
    });
  });

  test('should accept any casing of the fixed segments', () => {
    const parsed = parseResourceId('/SUBSCRIPTIONS/sub-1/RESOURCEGROUPS/rg-a');
    expect(parsed.subscriptionId).toBe('sub-1');
    expect(parsed.resourceGroup).toBe('rg-a');
    expect(parsed.name).toBeUndefined();
  });
});

describe('Resource ID builders', () => {
  test('should build scopes and IDs', () => {
    expect(resourceGroupScope('s', 'rg')).toBe('/subscriptions/s/resourceGroups/rg');
    expect(resourceId('s', 'rg', 'Microsoft.Network', 'routeTables', 'rt-workload')).toBe(
      '/subscriptions/s/resourceGroups/rg/providers/Microsoft.Network/routeTables/rt-workload'
    );
    expect(roleDefinitionResourceId('s', 'guid')).toBe('/subscriptions/s/providers/Microsoft.Authorization/roleDefinitions/guid');
  });
});
