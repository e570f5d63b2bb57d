/**
 * The custom role under test: loaded from a JSON template or looked up by name
 */

import { readFileSync } from "fs";
import type { AuthorizationManagementClient, RoleDefinition } from "@azure/arm-authorization";
import { ConfigurationError } from "../errors.js";

export interface CustomRoleTemplate {
  roleName: string;
  description: string;
  actions: string[];
  notActions: string[];
  dataActions: string[];
  notDataActions: string[];
}

function stringArray(raw: Record<string, unknown>, key: string, file: string, required: boolean): string[] {
  const value = raw[key];
  if (value === undefined && !required) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigurationError(`Role definition ${file}: "${key}" must be an array of strings`, "RBAC_ROLE_DEFINITION_FILE");
  }
  return value;
}

export function parseRoleTemplate(raw: unknown, file: string = "role definition"): CustomRoleTemplate {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigurationError(`Role definition ${file} must be a JSON object`, "RBAC_ROLE_DEFINITION_FILE");
  }
  const record: Record<string, unknown> = { ...raw };

  if (typeof record.roleName !== "string" || record.roleName.trim() === "") {
    throw new ConfigurationError(`Role definition ${file}: "roleName" is required`, "RBAC_ROLE_DEFINITION_FILE");
  }

  const template: CustomRoleTemplate = {
    roleName: record.roleName.trim(),
    description: typeof record.description === "string" ? record.description : "",
    actions: stringArray(record, "actions", file, true),
    notActions: stringArray(record, "notActions", file, false),
    dataActions: stringArray(record, "dataActions", file, false),
    notDataActions: stringArray(record, "notDataActions", file, false),
  };

  if (template.actions.length === 0) {
    throw new ConfigurationError(`Role definition ${file}: "actions" must not be empty`, "RBAC_ROLE_DEFINITION_FILE");
  }
  return template;
}

export function loadRoleTemplate(file: string): CustomRoleTemplate {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read role definition ${file}: ${error instanceof Error ? error.message : String(error)}`,
      "RBAC_ROLE_DEFINITION_FILE"
    );
  }
  return parseRoleTemplate(raw, file);
}

/**
 * Role names are tenant-unique, so each run gets its own
 */
export function buildRoleDefinition(template: CustomRoleTemplate, runId: string, scope: string): RoleDefinition {
  return {
    roleName: `${template.roleName} (${runId})`,
    description: template.description,
    roleType: "CustomRole",
    permissions: [
      {
        actions: template.actions,
        notActions: template.notActions,
        dataActions: template.dataActions,
        notDataActions: template.notDataActions,
      },
    ],
    assignableScopes: [scope],
  };
}

export async function findRoleByName(
  authorization: AuthorizationManagementClient,
  scope: string,
  roleName: string
): Promise<RoleDefinition | undefined> {
  const escaped = roleName.replace(/'/g, "''");
  for await (const role of authorization.roleDefinitions.list(scope, { filter: `roleName eq '${escaped}'` })) {
    if (role.roleName === roleName) {
      return role;
    }
  }
  return undefined;
}
