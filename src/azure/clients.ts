/**
 * Azure credentials and management clients
 */

import {
  AzureCliCredential,
  ChainedTokenCredential,
  ClientSecretCredential,
  DefaultAzureCredential,
  type TokenCredential,
} from "@azure/identity";
import { SubscriptionClient } from "@azure/arm-subscriptions";
import { ResourceManagementClient } from "@azure/arm-resources";
import { NetworkManagementClient } from "@azure/arm-network";
import { AuthorizationManagementClient } from "@azure/arm-authorization";
import { StorageManagementClient } from "@azure/arm-storage";
import { ComputeManagementClient } from "@azure/arm-compute";
import { RecoveryServicesBackupClient } from "@azure/arm-recoveryservicesbackup";
import { logger } from "../logging.js";
import { ConfigurationError, readRestErrorFields } from "../errors.js";

/**
 * The management clients a phase works with, all bound to one credential
 */
export interface AzureClients {
  subscriptionId: string;
  resources: ResourceManagementClient;
  network: NetworkManagementClient;
  authorization: AuthorizationManagementClient;
  storage: StorageManagementClient;
  compute: ComputeManagementClient;
  backup: RecoveryServicesBackupClient;
}

export type ClientsFactory = (credential: TokenCredential, subscriptionId: string) => AzureClients;

export interface SubscriptionInfo {
  subscriptionId: string;
  tenantId: string;
  displayName: string;
}

/**
 * Operator credential: Azure CLI login first, then the environment/managed identity chain
 */
export function createOperatorCredential(): TokenCredential {
  return new ChainedTokenCredential(
    new AzureCliCredential(),
    new DefaultAzureCredential()
  );
}

export function createServicePrincipalCredential(tenantId: string, clientId: string, clientSecret: string): TokenCredential {
  return new ClientSecretCredential(tenantId, clientId, clientSecret);
}

export const createClients: ClientsFactory = (credential, subscriptionId) => ({
  subscriptionId,
  resources: new ResourceManagementClient(credential, subscriptionId),
  network: new NetworkManagementClient(credential, subscriptionId),
  authorization: new AuthorizationManagementClient(credential, subscriptionId),
  storage: new StorageManagementClient(credential, subscriptionId),
  compute: new ComputeManagementClient(credential, subscriptionId),
  backup: new RecoveryServicesBackupClient(credential, subscriptionId),
});

/**
 * Resolve the subscription to work in: the requested one, or the first enabled one
 */
export async function resolveSubscription(
  client: SubscriptionClient,
  requested?: string
): Promise<SubscriptionInfo> {
  if (requested) {
    const subscription = await client.subscriptions.get(requested);
    if (!subscription.subscriptionId || !subscription.tenantId) {
      throw new ConfigurationError(`Subscription ${requested} returned no tenant ID`, 'AZURE_SUBSCRIPTION_ID');
    }
    return {
      subscriptionId: subscription.subscriptionId,
      tenantId: subscription.tenantId,
      displayName: subscription.displayName ?? subscription.subscriptionId,
    };
  }

  for await (const subscription of client.subscriptions.list()) {
    if (subscription.state === "Enabled" && subscription.subscriptionId && subscription.tenantId) {
      logger.info(`No subscription given, using ${subscription.displayName ?? subscription.subscriptionId}`);
      return {
        subscriptionId: subscription.subscriptionId,
        tenantId: subscription.tenantId,
        displayName: subscription.displayName ?? subscription.subscriptionId,
      };
    }
  }

  throw new ConfigurationError(
    'No enabled subscription is visible to the current credential',
    'AZURE_SUBSCRIPTION_ID'
  );
}

export function createSubscriptionClient(credential: TokenCredential): SubscriptionClient {
  return new SubscriptionClient(credential);
}

export function isNotFound(error: unknown): boolean {
  const { statusCode, code } = readRestErrorFields(error);
  return statusCode === 404 || code === 'ResourceNotFound' || code === 'ResourceGroupNotFound' || code === 'NotFound';
}

/**
 * Run a lookup, mapping "not found" to undefined
 */
export async function getOrUndefined<T>(lookup: () => Promise<T>): Promise<T | undefined> {
  try {
    return await lookup();
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw error;
  }
}
