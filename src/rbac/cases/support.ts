import { InternalError } from "../../errors.js";
import type { ScaffoldKey, TestExecutionContext } from "../types.js";

/**
 * Scaffold ID a test declared in `requires`; the runner skips the test before this can throw
 */
export function scaffoldId(context: TestExecutionContext, key: ScaffoldKey): string {
  const id = context.suite.scaffold[key];
  if (!id) {
    throw new InternalError(`Scaffold resource ${key} is not available`);
  }
  return id;
}

export function principalObjectId(context: TestExecutionContext): string {
  const principal = context.suite.servicePrincipal;
  if (!principal) {
    throw new InternalError("Service principal is not available");
  }
  return principal.objectId;
}

/**
 * Name for a resource a test tries to create, unique per run
 */
export function runScopedName(context: TestExecutionContext, prefix: string): string {
  return `${prefix}-${context.suite.runId}`;
}

/**
 * The generic resources client takes IDs without the leading slash
 */
export function byIdPath(resourceId: string): string {
  return resourceId.replace(/^\/+/, "");
}
