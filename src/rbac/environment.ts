/**
 * Environment Initializer
 *
 * Provisions the scaffold the test cases act on, with the operator's credential.
 * Every step looks its resource up first and reuses it, so re-running setup with the
 * run ID of a kept environment (--keep-environment, then --run-id) converges instead
 * of failing. Whatever belongs to the run is registered for cleanup, whether this
 * invocation or the kept one created it.
 */

import { randomUUID } from "crypto";
import type { AzureClients } from "../azure/clients.js";
import { getOrUndefined } from "../azure/clients.js";
import type { ServicePrincipalDirectory } from "../azure/graph.js";
import { resourceGroupScope, roleDefinitionResourceId, subscriptionScope } from "../azure/resourceId.js";
import { ConfigurationError, InternalError, readRestErrorFields } from "../errors.js";
import { logger, performanceTracker } from "../logging.js";
import { linearRetry, retry } from "../retry.js";
import {
  ADDRESS_SPACE,
  ALLOWED_LOCATIONS_POLICY_ID,
  API_VERSIONS,
  BUILT_IN_ROLES,
  SCAFFOLD_NAMES,
  TAGS,
} from "./constants.js";
import { buildRoleDefinition, findRoleByName, loadRoleTemplate } from "./customRole.js";
import { byIdPath } from "./cases/support.js";
import type { SuiteContext } from "./types.js";

const N = SCAFFOLD_NAMES;
const COMPONENT = "setup";

export interface EnvironmentOptions {
  /** Use this existing custom role instead of creating one from the template */
  roleName?: string;
  roleDefinitionFile: string;
  secretLifetimeHours: number;
  /** Retries while a new principal replicates to the authorization service */
  replication: { attempts: number; intervalMs: number };
}

export interface Ensured<T> {
  resource: T;
  created: boolean;
}

/**
 * Look a resource up; create it only when missing
 */
export async function ensureResource<T>(
  label: string,
  find: () => Promise<T | undefined>,
  create: () => Promise<T>
): Promise<Ensured<T>> {
  const existing = await find();
  if (existing !== undefined) {
    logger.info(`Reusing ${label}`, undefined, COMPONENT);
    return { resource: existing, created: false };
  }
  logger.info(`Creating ${label}`, undefined, COMPONENT);
  return { resource: await create(), created: true };
}

function requireId(resource: { id?: string }, label: string): string {
  if (!resource.id) {
    throw new InternalError(`Azure returned ${label} without an ID`);
  }
  return resource.id;
}

export function storageAccountNameFor(runId: string): string {
  return `st${runId}`.toLowerCase().replace(/[^a-z0-9]/g, "").slice(0, 24);
}

export function isOwnedBy(tags: Record<string, string> | undefined, runId: string): boolean {
  return tags?.purpose === TAGS.purpose && tags.runId === runId;
}

async function ensureResourceGroup(context: SuiteContext, clients: AzureClients): Promise<void> {
  const rg = context.resourceGroup;
  const { resource, created } = await ensureResource(
    `resource group ${rg}`,
    () => getOrUndefined(() => clients.resources.resourceGroups.get(rg)),
    () => clients.resources.resourceGroups.createOrUpdate(rg, {
      location: context.region,
      tags: { purpose: TAGS.purpose, runId: context.runId },
    })
  );
  context.scaffold.resourceGroupId = requireId(resource, "resource group");
  if (created || isOwnedBy(resource.tags, context.runId)) {
    context.cleanup.register(`Delete resource group ${rg}`, c => c.resources.resourceGroups.beginDeleteAndWait(rg));
  }
}

async function ensureCustomRole(context: SuiteContext, clients: AzureClients, options: EnvironmentOptions): Promise<void> {
  const rgScope = resourceGroupScope(context.subscriptionId, context.resourceGroup);

  if (options.roleName) {
    const existing = await findRoleByName(clients.authorization, subscriptionScope(context.subscriptionId), options.roleName);
    if (!existing?.id || !existing.name) {
      throw new ConfigurationError(`Custom role '${options.roleName}' was not found in the subscription`, "RBAC_ROLE_NAME");
    }
    context.customRole = {
      id: existing.id,
      name: existing.name,
      roleName: options.roleName,
      scope: existing.assignableScopes?.[0] ?? subscriptionScope(context.subscriptionId),
      owned: false,
    };
    context.scaffold.customRoleDefinitionId = existing.id;
    logger.info(`Testing existing custom role ${options.roleName}`, undefined, COMPONENT);
    return;
  }

  const template = loadRoleTemplate(options.roleDefinitionFile);
  const definition = buildRoleDefinition(template, context.runId, rgScope);
  const roleName = definition.roleName ?? template.roleName;

  const { resource } = await ensureResource(
    `custom role ${roleName}`,
    () => findRoleByName(clients.authorization, rgScope, roleName),
    () => clients.authorization.roleDefinitions.createOrUpdate(rgScope, randomUUID(), definition)
  );
  const id = requireId(resource, "role definition");
  const guid = resource.name ?? id.split("/").pop() ?? "";

  // The role name carries the run ID, so a reused definition is this run's own
  context.customRole = { id, name: guid, roleName, scope: rgScope, owned: true };
  context.scaffold.customRoleDefinitionId = id;
  context.cleanup.register(`Delete custom role ${roleName}`, c => c.authorization.roleDefinitions.delete(rgScope, guid));
}

async function ensureServicePrincipal(
  context: SuiteContext,
  directory: ServicePrincipalDirectory,
  options: EnvironmentOptions
): Promise<void> {
  const displayName = `${context.resourceGroup}-sp`;
  const { application } = await directory.ensureApplication(displayName);
  // The name carries the run ID, so a reused registration is this run's own
  context.cleanup.register(`Delete application ${displayName}`, () => directory.deleteApplication(application.id));

  const objectId = await directory.ensureServicePrincipal(application);
  const clientSecret = await directory.addSecret(application, options.secretLifetimeHours);
  context.servicePrincipal = {
    displayName,
    appId: application.appId,
    objectId,
    applicationObjectId: application.id,
    clientSecret,
  };
  logger.info(`Service principal ready: ${displayName}`, { appId: application.appId }, COMPONENT);
}

/**
 * Assign a role to the test principal at the resource group, reusing an existing assignment
 */
async function ensureRoleAssignment(
  context: SuiteContext,
  clients: AzureClients,
  roleDefinitionId: string,
  label: string,
  options: EnvironmentOptions
): Promise<string> {
  const principal = context.servicePrincipal;
  if (!principal) {
    throw new InternalError("Service principal must be provisioned before role assignments");
  }
  const scope = resourceGroupScope(context.subscriptionId, context.resourceGroup);

  const { resource } = await ensureResource(
    `${label} assignment`,
    async () => {
      for await (const assignment of clients.authorization.roleAssignments.listForScope(scope, {
        filter: `principalId eq '${principal.objectId}'`,
      })) {
        if (assignment.roleDefinitionId?.toLowerCase() === roleDefinitionId.toLowerCase()) {
          return assignment;
        }
      }
      return undefined;
    },
    () => retry(
      () => clients.authorization.roleAssignments.create(scope, randomUUID(), {
        roleDefinitionId,
        principalId: principal.objectId,
        principalType: "ServicePrincipal",
      }),
      {
        ...linearRetry(options.replication.attempts, options.replication.intervalMs),
        shouldRetry: error => readRestErrorFields(error).code === "PrincipalNotFound",
      },
      `assign ${label}`
    )
  );

  const id = requireId(resource, `${label} assignment`);
  context.cleanup.register(`Delete ${label} assignment`, c => c.authorization.roleAssignments.deleteById(id));
  return id;
}

async function ensureNetwork(context: SuiteContext, clients: AzureClients): Promise<void> {
  const rg = context.resourceGroup;
  const location = context.region;
  const network = clients.network;

  const nsg = await ensureResource(
    `network security group ${N.nsg}`,
    () => getOrUndefined(() => network.networkSecurityGroups.get(rg, N.nsg)),
    () => network.networkSecurityGroups.beginCreateOrUpdateAndWait(rg, N.nsg, { location })
  );
  const nsgId = requireId(nsg.resource, N.nsg);
  context.scaffold.nsgId = nsgId;

  const hub = await ensureResource(
    `virtual network ${N.hubVnet}`,
    () => getOrUndefined(() => network.virtualNetworks.get(rg, N.hubVnet)),
    () => network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.hubVnet, {
      location,
      addressSpace: { addressPrefixes: [ADDRESS_SPACE.hubVnet] },
      subnets: [
        { name: N.workloadSubnet, addressPrefix: ADDRESS_SPACE.hubWorkloadSubnet, networkSecurityGroup: { id: nsgId } },
        { name: N.gatewaySubnet, addressPrefix: ADDRESS_SPACE.hubGatewaySubnet },
      ],
    })
  );
  context.scaffold.hubVnetId = requireId(hub.resource, N.hubVnet);
  context.scaffold.hubSubnetId = hub.resource.subnets?.find(s => s.name === N.workloadSubnet)?.id;
  context.scaffold.gatewaySubnetId = hub.resource.subnets?.find(s => s.name === N.gatewaySubnet)?.id;

  const spoke = await ensureResource(
    `virtual network ${N.spokeVnet}`,
    () => getOrUndefined(() => network.virtualNetworks.get(rg, N.spokeVnet)),
    () => network.virtualNetworks.beginCreateOrUpdateAndWait(rg, N.spokeVnet, {
      location,
      addressSpace: { addressPrefixes: [ADDRESS_SPACE.spokeVnet] },
      subnets: [{ name: N.workloadSubnet, addressPrefix: ADDRESS_SPACE.spokeWorkloadSubnet }],
    })
  );
  context.scaffold.spokeVnetId = requireId(spoke.resource, N.spokeVnet);
  context.scaffold.spokeSubnetId = spoke.resource.subnets?.find(s => s.name === N.workloadSubnet)?.id;

  const routeTable = await ensureResource(
    `route table ${N.routeTable}`,
    () => getOrUndefined(() => network.routeTables.get(rg, N.routeTable)),
    () => network.routeTables.beginCreateOrUpdateAndWait(rg, N.routeTable, { location })
  );
  context.scaffold.routeTableId = requireId(routeTable.resource, N.routeTable);

  for (const [name, key] of [[N.publicIp, "publicIpId"], [N.natPublicIp, "natPublicIpId"]] as const) {
    const pip = await ensureResource(
      `public IP ${name}`,
      () => getOrUndefined(() => network.publicIPAddresses.get(rg, name)),
      () => network.publicIPAddresses.beginCreateOrUpdateAndWait(rg, name, {
        location,
        sku: { name: "Standard" },
        publicIPAllocationMethod: "Static",
      })
    );
    context.scaffold[key] = requireId(pip.resource, name);
  }

  if (context.scaffold.hubSubnetId) {
    const hubSubnetId = context.scaffold.hubSubnetId;
    const nic = await ensureResource(
      `network interface ${N.nic}`,
      () => getOrUndefined(() => network.networkInterfaces.get(rg, N.nic)),
      () => network.networkInterfaces.beginCreateOrUpdateAndWait(rg, N.nic, {
        location,
        ipConfigurations: [{ name: "ipconfig1", subnet: { id: hubSubnetId } }],
      })
    );
    context.scaffold.nicId = requireId(nic.resource, N.nic);
  }

  const natPublicIpId = context.scaffold.natPublicIpId;
  const natGateway = await ensureResource(
    `NAT gateway ${N.natGateway}`,
    () => getOrUndefined(() => network.natGateways.get(rg, N.natGateway)),
    () => network.natGateways.beginCreateOrUpdateAndWait(rg, N.natGateway, {
      location,
      sku: { name: "Standard" },
      publicIpAddresses: natPublicIpId ? [{ id: natPublicIpId }] : [],
    })
  );
  context.scaffold.natGatewayId = requireId(natGateway.resource, N.natGateway);
}

async function ensureStorageAccount(context: SuiteContext, clients: AzureClients): Promise<void> {
  const rg = context.resourceGroup;
  const name = context.storageAccountName;
  const account = await ensureResource(
    `storage account ${name}`,
    () => getOrUndefined(() => clients.storage.storageAccounts.getProperties(rg, name)),
    () => clients.storage.storageAccounts.beginCreateAndWait(rg, name, {
      location: context.region,
      sku: { name: "Standard_LRS" },
      kind: "StorageV2",
      publicNetworkAccess: "Disabled",
      allowBlobPublicAccess: false,
      minimumTlsVersion: "TLS1_2",
      tags: { purpose: TAGS.purpose, runId: context.runId },
    })
  );
  context.scaffold.storageAccountId = requireId(account.resource, name);
}

async function ensureGovernance(context: SuiteContext, clients: AzureClients): Promise<void> {
  const resources = clients.resources.resources;
  const storageAccountId = context.scaffold.storageAccountId;

  if (storageAccountId) {
    const lockId = `${storageAccountId}/providers/Microsoft.Authorization/locks/${N.lock}`;
    const lock = await ensureResource(
      `management lock ${N.lock}`,
      () => getOrUndefined(() => resources.getById(byIdPath(lockId), API_VERSIONS.locks)),
      () => resources.beginCreateOrUpdateByIdAndWait(byIdPath(lockId), API_VERSIONS.locks, {
        properties: { level: "CanNotDelete", notes: "RBAC test suite scaffold" },
      })
    );
    context.scaffold.lockId = lock.resource.id ?? lockId;
    // Locks block deleting what they protect, so this must run before the resource group goes
    context.cleanup.register(`Delete lock ${N.lock}`, c =>
      c.resources.resources.beginDeleteByIdAndWait(byIdPath(lockId), API_VERSIONS.locks)
    );
  }

  const assignmentId = `${resourceGroupScope(context.subscriptionId, context.resourceGroup)}/providers/Microsoft.Authorization/policyAssignments/${N.policyAssignment}`;
  const assignment = await ensureResource(
    `policy assignment ${N.policyAssignment}`,
    () => getOrUndefined(() => resources.getById(byIdPath(assignmentId), API_VERSIONS.policyAssignments)),
    () => resources.beginCreateOrUpdateByIdAndWait(byIdPath(assignmentId), API_VERSIONS.policyAssignments, {
      properties: {
        displayName: "RBAC test suite scaffold",
        policyDefinitionId: ALLOWED_LOCATIONS_POLICY_ID,
        parameters: { listOfAllowedLocations: { value: [context.region] } },
      },
    })
  );
  context.scaffold.policyAssignmentId = assignment.resource.id ?? assignmentId;
  context.cleanup.register(`Delete policy assignment ${N.policyAssignment}`, c =>
    c.resources.resources.beginDeleteByIdAndWait(byIdPath(assignmentId), API_VERSIONS.policyAssignments)
  );
}

/**
 * Provision the whole scaffold, in dependency order
 */
export async function initializeEnvironment(
  context: SuiteContext,
  clients: AzureClients,
  directory: ServicePrincipalDirectory,
  options: EnvironmentOptions
): Promise<void> {
  const trackingId = performanceTracker.start("environment-setup");
  const steps: Array<[string, () => Promise<unknown>]> = [
    ["resource group", () => ensureResourceGroup(context, clients)],
    ["custom role", () => ensureCustomRole(context, clients, options)],
    ["service principal", () => ensureServicePrincipal(context, directory, options)],
    ["custom role assignment", async () => {
      const roleId = context.customRole?.id;
      if (!roleId) throw new InternalError("Custom role must exist before it is assigned");
      context.scaffold.customRoleAssignmentId = await ensureRoleAssignment(context, clients, roleId, "custom role", options);
    }],
    ["reader assignment", async () => {
      context.scaffold.readerAssignmentId = await ensureRoleAssignment(
        context,
        clients,
        roleDefinitionResourceId(context.subscriptionId, BUILT_IN_ROLES.reader),
        "Reader",
        options
      );
    }],
    ["network", () => ensureNetwork(context, clients)],
    ["storage account", () => ensureStorageAccount(context, clients)],
    ["lock and policy", () => ensureGovernance(context, clients)],
  ];

  try {
    for (const [label, step] of steps) {
      logger.info(`Setup: ${label}`, undefined, COMPONENT);
      await step();
      performanceTracker.recordAPICall(trackingId);
    }
    performanceTracker.end(trackingId, true);
  } catch (error) {
    performanceTracker.end(trackingId, false, error instanceof Error ? error.name : "UnknownError");
    throw error;
  }
}
