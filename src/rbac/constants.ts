/**
 * Fixed names and well-known IDs used by the scaffold and the test catalog
 */

export const SCAFFOLD_NAMES = {
  nsg: "nsg-workload",
  hubVnet: "vnet-hub",
  spokeVnet: "vnet-spoke",
  workloadSubnet: "snet-workload",
  gatewaySubnet: "GatewaySubnet",
  routeTable: "rt-workload",
  publicIp: "pip-existing",
  natPublicIp: "pip-nat",
  nic: "nic-existing",
  natGateway: "natgw-existing",
  lock: "lock-existing",
  policyAssignment: "pa-allowed-locations",
} as const;

export const ADDRESS_SPACE = {
  hubVnet: "10.10.0.0/16",
  hubWorkloadSubnet: "10.10.1.0/24",
  hubGatewaySubnet: "10.10.255.0/27",
  spokeVnet: "10.20.0.0/16",
  spokeWorkloadSubnet: "10.20.1.0/24",
} as const;

// Built-in role definition GUIDs (identical in every tenant)
export const BUILT_IN_ROLES = {
  owner: "8e3af657-a8ff-443c-a75c-2fe8c4bcb635",
  contributor: "b24988ac-6180-42a0-ab88-20f7382dd24c",
  reader: "acdd72a7-3385-48ef-bd42-f606fba81ae7",
  userAccessAdministrator: "18d7d88d-d35e-4fb5-a5c3-7773c20a72d9",
} as const;

// Built-in policy "Allowed locations"
export const ALLOWED_LOCATIONS_POLICY_ID =
  "/providers/Microsoft.Authorization/policyDefinitions/e56962a6-4747-49cd-b67b-bf8b01975c4c";

// API versions for resources reached through the generic resources client
export const API_VERSIONS = {
  locks: "2020-05-01",
  policyAssignments: "2022-06-01",
} as const;

export const TAGS = {
  purpose: "rbac-test",
} as const;
