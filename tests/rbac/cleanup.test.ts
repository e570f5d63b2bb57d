import { describe, test, expect } from '@jest/globals';
import { CleanupRegistry, runCleanup } from '../../src/rbac/cleanup.js';
import { fakeClients, restError } from '../helpers/fakes.js';

describe('CleanupRegistry', () => {
  test('should hand actions back newest first', () => {
    const registry = new CleanupRegistry();
    registry.register('first', async () => {});
    registry.register('second', async () => {});
    expect(registry.size).toBe(2);
    expect(registry.pending().map(a => a.description)).toEqual(['second', 'first']);
  });
});

describe('runCleanup', () => {
  test('should retry failures, treat not-found as done and carry on past a failure', async () => {
    const registry = new CleanupRegistry();
    const order: string[] = [];
    let flakyCalls = 0;

    registry.register('Delete resource group', async () => {
      order.push('rg');
    });
    registry.register('Delete application', async () => {
      order.push('app');
      throw restError(409, 'Conflict', 'still in use');
    });
    registry.register('Delete role assignment', async () => {
      order.push('assignment');
      flakyCalls++;
      if (flakyCalls < 2) throw restError(500, 'InternalServerError', 'try again');
    });
    registry.register('Delete lock', async () => {
      order.push('lock');
      throw restError(404, 'NotFound', 'gone');
    });

    const summary = await runCleanup(registry, fakeClients({}), { attempts: 3, intervalMs: 1 });

    expect(summary.outcomes).toEqual([
      { description: 'Delete lock', status: 'already-gone', attempts: 1 },
      { description: 'Delete role assignment', status: 'deleted', attempts: 2 },
      { description: 'Delete application', status: 'failed', attempts: 3, error: 'still in use' },
      { description: 'Delete resource group', status: 'deleted', attempts: 1 },
    ]);
    expect(summary.succeeded).toBe(3);
    expect(summary.failed).toBe(1);
    expect(order).toEqual(['lock', 'assignment', 'assignment', 'app', 'app', 'app', 'rg']);
  });

  test('should pass the operator clients to every action', async () => {
    const registry = new CleanupRegistry();
    const clients = fakeClients({}, '00000000-0000-0000-0000-0000000000ff');
    let seen = '';
    registry.register('Inspect', async c => {
      seen = c.subscriptionId;
    });

    await runCleanup(registry, clients, { attempts: 1, intervalMs: 1 });

    expect(seen).toBe('00000000-0000-0000-0000-0000000000ff');
  });
});
