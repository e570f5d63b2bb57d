import { describe, test, expect } from '@jest/globals';
import type { TokenCredential } from '@azure/identity';
import type { AzureClients } from '../../src/azure/clients.js';
import { AuthenticationError, InternalError } from '../../src/errors.js';
import { propagationAttempts, switchToServicePrincipal } from '../../src/rbac/authContext.js';
import { fakeClients, restError, suiteContext } from '../helpers/fakes.js';

const credential: TokenCredential = { getToken: async () => null };

const principal = {
  displayName: 'rbac-test-sp',
  appId: 'app-id',
  objectId: 'sp-object-id',
  applicationObjectId: 'app-object-id',
  clientSecret: 'test-secret',
};

function clientsFailing(times: number, reads: string[]): AzureClients {
  let failures = times;
  return fakeClients({
    resources: {
      resourceGroups: {
        get: async (rg: string) => {
          reads.push(rg);
          if (failures > 0) {
            failures--;
            throw restError(403, 'AuthorizationFailed', 'denied');
          }
          return { id: `/subscriptions/s/resourceGroups/${rg}` };
        },
      },
    },
  });
}

describe('propagationAttempts', () => {
  test('should poll once up front and once per interval', () => {
    expect(propagationAttempts({ timeoutMs: 300000, intervalMs: 15000 })).toBe(21);
    expect(propagationAttempts({ timeoutMs: 10, intervalMs: 15 })).toBe(1);
  });
});

describe('switchToServicePrincipal', () => {
  test('should build service principal clients and wait until they can read the resource group', async () => {
    const reads: string[] = [];
    const credentialArgs: string[][] = [];
    const clients = clientsFailing(2, reads);
    const context = suiteContext({ servicePrincipal: principal });

    const result = await switchToServicePrincipal(
      context,
      { timeoutMs: 5, intervalMs: 1 },
      (cred, subscriptionId) => {
        expect(cred).toBe(credential);
        expect(subscriptionId).toBe(context.subscriptionId);
        return clients;
      },
      (tenantId, clientId, secret) => {
        credentialArgs.push([tenantId, clientId, secret]);
        return credential;
      }
    );

    expect(result).toBe(clients);
    expect(reads).toEqual([context.resourceGroup, context.resourceGroup, context.resourceGroup]);
    expect(credentialArgs).toEqual([[context.tenantId, 'app-id', 'test-secret']]);
  });

  test('should give up with an authentication error after the timeout', async () => {
    const reads: string[] = [];
    const context = suiteContext({ servicePrincipal: principal });

    const switching = switchToServicePrincipal(
      context,
      { timeoutMs: 3, intervalMs: 1 },
      () => clientsFailing(100, reads),
      () => credential
    );

    await expect(switching).rejects.toThrow(AuthenticationError);
    await expect(switching).rejects.toThrow(`Service principal could not read resource group ${context.resourceGroup} within 3ms`);
    expect(reads).toHaveLength(4);
  });

  test('should carry the last error in the details', async () => {
    const context = suiteContext({ servicePrincipal: principal });
    try {
      await switchToServicePrincipal(context, { timeoutMs: 1, intervalMs: 1 }, () => clientsFailing(100, []), () => credential);
      throw new Error('expected a throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AuthenticationError);
      if (error instanceof AuthenticationError) {
        expect(error.details).toEqual({ attempts: 2, lastError: 'denied', lastErrorCode: 'AuthorizationFailed' });
      }
    }
  });

  test('should refuse to switch without a service principal', async () => {
    await expect(switchToServicePrincipal(suiteContext(), { timeoutMs: 1, intervalMs: 1 }, () => fakeClients({}), () => credential))
      .rejects.toThrow(InternalError);
  });
});
