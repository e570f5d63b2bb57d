/**
 * Authorization test cases: the custom role must not let its holder change who can do what
 */

import { randomUUID } from "crypto";
import type { RoleDefinition } from "@azure/arm-authorization";
import {
  resourceGroupScope,
  roleDefinitionResourceId,
  subscriptionScope,
} from "../../azure/resourceId.js";
import { InternalError } from "../../errors.js";
import { ALLOWED_LOCATIONS_POLICY_ID, API_VERSIONS, BUILT_IN_ROLES } from "../constants.js";
import type { Requirement, TestCase, TestExecutionContext } from "../types.js";
import { byIdPath, principalObjectId, runScopedName, scaffoldId } from "./support.js";

export const AUTHORIZATION_REQUIREMENTS = {
  roleAssignmentCreate: { id: "REQ-01", name: "Role assignment creation" },
  roleAssignmentDelete: { id: "REQ-02", name: "Role assignment removal" },
  roleDefinitions: { id: "REQ-03", name: "Role definition management" },
  locks: { id: "REQ-04", name: "Resource locks" },
  policy: { id: "REQ-05", name: "Policy assignment" },
  readAccess: { id: "REQ-06", name: "Read access (positive control)" },
} satisfies Record<string, Requirement>;

const R = AUTHORIZATION_REQUIREMENTS;

async function attemptRoleAssignment(
  context: TestExecutionContext,
  scope: string,
  builtInRoleGuid: string
): Promise<void> {
  const { suite, clients } = context;
  const assignmentName = randomUUID();

  await clients.authorization.roleAssignments.create(scope, assignmentName, {
    roleDefinitionId: roleDefinitionResourceId(suite.subscriptionId, builtInRoleGuid),
    principalId: principalObjectId(context),
    principalType: "ServicePrincipal",
  });

  suite.cleanup.register(`Delete role assignment ${assignmentName} at ${scope}`, c =>
    c.authorization.roleAssignments.delete(scope, assignmentName)
  );
}

function currentCustomRole(context: TestExecutionContext) {
  const role = context.suite.customRole;
  if (!role) {
    throw new InternalError("Custom role is not available");
  }
  return role;
}

export const AUTHORIZATION_TESTS: TestCase[] = [
  {
    id: "AUTH-001",
    module: "Authorization",
    requirement: R.roleAssignmentCreate,
    name: "Assign Owner at resource group scope",
    description: "The service principal tries to grant itself Owner on the test resource group.",
    expectation: "deny",
    requires: ["resourceGroupId", "customRoleAssignmentId"],
    execute: async context =>
      attemptRoleAssignment(
        context,
        resourceGroupScope(context.suite.subscriptionId, context.suite.resourceGroup),
        BUILT_IN_ROLES.owner
      ),
  },
  {
    id: "AUTH-002",
    module: "Authorization",
    requirement: R.roleAssignmentCreate,
    name: "Assign Contributor at subscription scope",
    description: "The service principal tries to grant itself Contributor on the whole subscription.",
    expectation: "deny",
    requires: ["customRoleAssignmentId"],
    execute: async context =>
      attemptRoleAssignment(context, subscriptionScope(context.suite.subscriptionId), BUILT_IN_ROLES.contributor),
  },
  {
    id: "AUTH-003",
    module: "Authorization",
    requirement: R.roleAssignmentCreate,
    name: "Assign User Access Administrator on a storage account",
    description: "The service principal tries to become User Access Administrator on a single resource.",
    expectation: "deny",
    requires: ["storageAccountId", "customRoleAssignmentId"],
    execute: async context =>
      attemptRoleAssignment(context, scaffoldId(context, "storageAccountId"), BUILT_IN_ROLES.userAccessAdministrator),
  },
  {
    id: "AUTH-004",
    module: "Authorization",
    requirement: R.roleAssignmentDelete,
    name: "Delete an existing role assignment",
    description: "The service principal tries to remove the Reader assignment it holds on the resource group.",
    expectation: "deny",
    requires: ["readerAssignmentId"],
    execute: async context => {
      await context.clients.authorization.roleAssignments.deleteById(scaffoldId(context, "readerAssignmentId"));
    },
  },
  {
    id: "AUTH-005",
    module: "Authorization",
    requirement: R.roleDefinitions,
    name: "Create a custom role definition",
    description: "The service principal tries to define a new role allowing every action.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const scope = resourceGroupScope(suite.subscriptionId, suite.resourceGroup);
      const roleGuid = randomUUID();

      await clients.authorization.roleDefinitions.createOrUpdate(scope, roleGuid, {
        roleName: runScopedName(context, "rbac-test-escalation"),
        description: "Created by the RBAC test suite; must never exist",
        roleType: "CustomRole",
        permissions: [{ actions: ["*"], notActions: [] }],
        assignableScopes: [scope],
      });

      suite.cleanup.register(`Delete role definition ${roleGuid}`, c =>
        c.authorization.roleDefinitions.delete(scope, roleGuid)
      );
    },
  },
  {
    id: "AUTH-006",
    module: "Authorization",
    requirement: R.roleDefinitions,
    name: "Widen the restricting custom role",
    description: "The service principal tries to add '*' to the actions of the role it holds.",
    expectation: "deny",
    requires: ["customRoleDefinitionId"],
    execute: async context => {
      const { suite, clients } = context;
      const role = currentCustomRole(context);
      const original = await clients.authorization.roleDefinitions.get(role.scope, role.name);
      const originalPermissions = original.permissions ?? [];

      const widened: RoleDefinition = {
        roleName: original.roleName,
        description: original.description,
        roleType: "CustomRole",
        permissions: [{ actions: ["*"], notActions: [] }],
        assignableScopes: original.assignableScopes,
      };
      await clients.authorization.roleDefinitions.createOrUpdate(role.scope, role.name, widened);

      suite.cleanup.register(`Restore permissions of role ${role.roleName}`, c =>
        c.authorization.roleDefinitions.createOrUpdate(role.scope, role.name, {
          ...widened,
          permissions: originalPermissions,
        })
      );
    },
  },
  {
    id: "AUTH-007",
    module: "Authorization",
    requirement: R.roleDefinitions,
    name: "Delete the restricting custom role",
    description: "The service principal tries to delete the definition of the role it holds.",
    expectation: "deny",
    requires: ["customRoleDefinitionId"],
    execute: async context => {
      const { suite, clients } = context;
      const role = currentCustomRole(context);
      if (role.owned) {
        await clients.authorization.roleDefinitions.delete(role.scope, role.name);
        return;
      }

      // An existing role under test is not the run's to lose
      const original = await clients.authorization.roleDefinitions.get(role.scope, role.name);
      await clients.authorization.roleDefinitions.delete(role.scope, role.name);

      suite.cleanup.register(`Recreate role ${role.roleName}`, c =>
        c.authorization.roleDefinitions.createOrUpdate(role.scope, role.name, {
          roleName: original.roleName,
          description: original.description,
          roleType: "CustomRole",
          permissions: original.permissions,
          assignableScopes: original.assignableScopes,
        })
      );
    },
  },
  {
    id: "AUTH-008",
    module: "Authorization",
    requirement: R.locks,
    name: "Delete an existing management lock",
    description: "The service principal tries to remove the CanNotDelete lock on the storage account.",
    expectation: "deny",
    requires: ["lockId"],
    execute: async context => {
      await context.clients.resources.resources.beginDeleteByIdAndWait(
        byIdPath(scaffoldId(context, "lockId")),
        API_VERSIONS.locks
      );
    },
  },
  {
    id: "AUTH-009",
    module: "Authorization",
    requirement: R.locks,
    name: "Create a management lock",
    description: "The service principal tries to put a ReadOnly lock on the route table.",
    expectation: "deny",
    requires: ["routeTableId"],
    execute: async context => {
      const { suite, clients } = context;
      const lockId = `${scaffoldId(context, "routeTableId")}/providers/Microsoft.Authorization/locks/${runScopedName(context, "lock")}`;

      await clients.resources.resources.beginCreateOrUpdateByIdAndWait(byIdPath(lockId), API_VERSIONS.locks, {
        properties: { level: "ReadOnly", notes: "Created by the RBAC test suite; must never exist" },
      });

      suite.cleanup.register(`Delete lock ${lockId}`, c =>
        c.resources.resources.beginDeleteByIdAndWait(byIdPath(lockId), API_VERSIONS.locks)
      );
    },
  },
  {
    id: "AUTH-010",
    module: "Authorization",
    requirement: R.policy,
    name: "Create a policy assignment",
    description: "The service principal tries to assign the built-in Allowed locations policy to the resource group.",
    expectation: "deny",
    requires: ["resourceGroupId"],
    execute: async context => {
      const { suite, clients } = context;
      const assignmentId = `${resourceGroupScope(suite.subscriptionId, suite.resourceGroup)}/providers/Microsoft.Authorization/policyAssignments/${runScopedName(context, "pa")}`;

      await clients.resources.resources.beginCreateOrUpdateByIdAndWait(byIdPath(assignmentId), API_VERSIONS.policyAssignments, {
        properties: {
          displayName: "RBAC test suite attempt",
          policyDefinitionId: ALLOWED_LOCATIONS_POLICY_ID,
          parameters: { listOfAllowedLocations: { value: [suite.region] } },
        },
      });

      suite.cleanup.register(`Delete policy assignment ${assignmentId}`, c =>
        c.resources.resources.beginDeleteByIdAndWait(byIdPath(assignmentId), API_VERSIONS.policyAssignments)
      );
    },
  },
  {
    id: "AUTH-011",
    module: "Authorization",
    requirement: R.policy,
    name: "Delete an existing policy assignment",
    description: "The service principal tries to remove the Allowed locations assignment on the resource group.",
    expectation: "deny",
    requires: ["policyAssignmentId"],
    execute: async context => {
      await context.clients.resources.resources.beginDeleteByIdAndWait(
        byIdPath(scaffoldId(context, "policyAssignmentId")),
        API_VERSIONS.policyAssignments
      );
    },
  },
  {
    id: "AUTH-012",
    module: "Authorization",
    requirement: R.readAccess,
    name: "Read the resource group",
    description: "Positive control: the role grants */read, so reading the resource group must work.",
    expectation: "allow",
    requires: ["resourceGroupId"],
    execute: async context => {
      await context.clients.resources.resourceGroups.get(context.suite.resourceGroup);
    },
  },
  {
    id: "AUTH-013",
    module: "Authorization",
    requirement: R.readAccess,
    name: "List role assignments on the resource group",
    description: "Positive control: reading role assignments is covered by */read.",
    expectation: "allow",
    requires: ["resourceGroupId"],
    execute: async context => {
      const scope = resourceGroupScope(context.suite.subscriptionId, context.suite.resourceGroup);
      for await (const _assignment of context.clients.authorization.roleAssignments.listForScope(scope)) {
        // draining the pager is the operation under test
      }
    },
  },
];
