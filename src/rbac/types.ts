/**
 * RBAC test suite - shared types
 */

import type { AzureClients } from "../azure/clients.js";
import type { ServicePrincipalIdentity } from "../azure/graph.js";
import type { CleanupRegistry, CleanupSummary } from "./cleanup.js";

export type TestStatus = "PASS" | "FAIL" | "ERROR" | "SKIPPED";

export type TestModule = "Authorization" | "Networking";

export const TEST_MODULES: readonly TestModule[] = ["Authorization", "Networking"];

/** What the custom role is expected to do with the operation */
export type Expectation = "deny" | "allow";

export interface Requirement {
  id: string;
  name: string;
}

/**
 * Scaffold resources the environment initializer provisions, by resource ID
 */
export interface Scaffold {
  resourceGroupId?: string;
  customRoleDefinitionId?: string;
  customRoleAssignmentId?: string;
  readerAssignmentId?: string;
  nsgId?: string;
  hubVnetId?: string;
  hubSubnetId?: string;
  gatewaySubnetId?: string;
  spokeVnetId?: string;
  spokeSubnetId?: string;
  routeTableId?: string;
  publicIpId?: string;
  natPublicIpId?: string;
  nicId?: string;
  storageAccountId?: string;
  natGatewayId?: string;
  lockId?: string;
  policyAssignmentId?: string;
}

export type ScaffoldKey = keyof Scaffold;

export interface CustomRoleInfo {
  /** Full resource ID of the role definition */
  id: string;
  /** Role definition GUID */
  name: string;
  roleName: string;
  /** Scope the definition was created at (needed to update or delete it) */
  scope: string;
  /** True for the run's own role; false when an existing role (--role-name) is under test */
  owned: boolean;
}

/**
 * State shared by every stage of a run
 */
export interface SuiteContext {
  runId: string;
  subscriptionId: string;
  tenantId: string;
  region: string;
  resourceGroup: string;
  storageAccountName: string;
  scaffold: Scaffold;
  customRole?: CustomRoleInfo;
  servicePrincipal?: ServicePrincipalIdentity;
  cleanup: CleanupRegistry;
}

/**
 * What a test operation gets: the suite state and clients bound to the service principal
 */
export interface TestExecutionContext {
  suite: SuiteContext;
  clients: AzureClients;
}

export interface TestCase {
  id: string;
  module: TestModule;
  requirement: Requirement;
  name: string;
  description: string;
  expectation: Expectation;
  requires: ScaffoldKey[];
  execute(context: TestExecutionContext): Promise<void>;
}

export interface TestResult {
  id: string;
  module: TestModule;
  requirementId: string;
  requirementName: string;
  name: string;
  description: string;
  expectation: Expectation;
  status: TestStatus;
  message: string;
  errorCode?: string;
  durationMs: number;
  timestamp: string;
}

export interface RequirementSummary {
  requirementId: string;
  requirementName: string;
  total: number;
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
}

export interface SuiteSummary {
  total: number;
  passed: number;
  failed: number;
  errors: number;
  skipped: number;
  /** Percentage of executed (non-skipped) tests that passed */
  passRate: number;
  byRequirement: RequirementSummary[];
}

export interface ReportMetadata {
  runId: string;
  toolVersion: string;
  subscriptionId: string;
  tenantId?: string;
  region: string;
  resourceGroup: string;
  roleName?: string;
  servicePrincipalAppId?: string;
  modules: TestModule[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  fatalError?: string;
}

export interface SuiteReport {
  metadata: ReportMetadata;
  summary: SuiteSummary;
  results: TestResult[];
  cleanup?: CleanupSummary;
}
