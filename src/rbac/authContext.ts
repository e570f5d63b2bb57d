/**
 * Switch from the operator to the restricted service principal
 */

import type { TokenCredential } from "@azure/identity";
import type { AzureClients, ClientsFactory } from "../azure/clients.js";
import { createClients, createServicePrincipalCredential } from "../azure/clients.js";
import { AuthenticationError, InternalError, readRestErrorFields } from "../errors.js";
import { logger, performanceTracker } from "../logging.js";
import { linearRetry, retry } from "../retry.js";
import type { SuiteContext } from "./types.js";

export interface PropagationOptions {
  timeoutMs: number;
  intervalMs: number;
}

export type CredentialFactory = (tenantId: string, clientId: string, clientSecret: string) => TokenCredential;

/**
 * Polls within the timeout: one attempt up front, then one per interval
 */
export function propagationAttempts(options: PropagationOptions): number {
  return Math.floor(options.timeoutMs / options.intervalMs) + 1;
}

/**
 * Build clients bound to the service principal and wait until a read of the test
 * resource group succeeds with them. New secrets and role assignments take minutes
 * to replicate; giving up is fatal to the run.
 */
export async function switchToServicePrincipal(
  context: SuiteContext,
  options: PropagationOptions,
  factory: ClientsFactory = createClients,
  credentialFactory: CredentialFactory = createServicePrincipalCredential
): Promise<AzureClients> {
  const principal = context.servicePrincipal;
  if (!principal) {
    throw new InternalError("No service principal to switch to");
  }

  const credential = credentialFactory(context.tenantId, principal.appId, principal.clientSecret);
  const clients = factory(credential, context.subscriptionId);
  const attempts = propagationAttempts(options);
  const trackingId = performanceTracker.start("auth-context-switch");

  logger.info(
    `Waiting for service principal access to propagate (up to ${Math.round(options.timeoutMs / 1000)}s)`,
    { appId: principal.appId },
    "auth"
  );

  try {
    await retry(
      async () => {
        performanceTracker.recordAPICall(trackingId);
        await clients.resources.resourceGroups.get(context.resourceGroup);
      },
      linearRetry(attempts, options.intervalMs),
      "service principal propagation"
    );
  } catch (error) {
    performanceTracker.end(trackingId, false, "PROPAGATION_TIMEOUT");
    const { message, code } = readRestErrorFields(error);
    throw new AuthenticationError(
      `Service principal could not read resource group ${context.resourceGroup} within ${options.timeoutMs}ms`,
      { attempts, lastError: message, lastErrorCode: code }
    );
  }

  performanceTracker.end(trackingId, true);
  logger.info("Now acting as the service principal", { appId: principal.appId }, "auth");
  return clients;
}
