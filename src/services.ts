/**
 * Azure access shared by the CLI and the MCP server, behind one seam tests can replace
 */

import type { AzureClients, SubscriptionInfo } from './azure/clients.js';
import {
  createClients,
  createOperatorCredential,
  createSubscriptionClient,
  resolveSubscription,
} from './azure/clients.js';
import { readPackageVersion } from './paths.js';
import { createDefaultDependencies, type SuiteDependencies } from './rbac/orchestrator.js';

export interface ToolServices {
  version: string;
  resolveSubscription(requested?: string): Promise<SubscriptionInfo>;
  clientsFor(subscriptionId: string): AzureClients;
  suiteDependencies(): SuiteDependencies;
}

/**
 * Operator-credential services; the credential is created on first use
 */
export function createToolServices(): ToolServices {
  let credential: ReturnType<typeof createOperatorCredential> | undefined;
  const operator = () => {
    if (!credential) {
      credential = createOperatorCredential();
    }
    return credential;
  };

  return {
    version: readPackageVersion(),
    resolveSubscription: requested => resolveSubscription(createSubscriptionClient(operator()), requested),
    clientsFor: subscriptionId => createClients(operator(), subscriptionId),
    suiteDependencies: () => createDefaultDependencies(),
  };
}
