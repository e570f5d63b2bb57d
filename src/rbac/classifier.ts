/**
 * Maps the outcome of an attempted operation to a test status
 */

import { readRestErrorFields } from "../errors.js";
import type { Expectation, TestStatus } from "./types.js";

export const DENIAL_PATTERNS: readonly string[] = [
  "authorizationfailed",
  "linkedauthorizationfailed",
  "authorizationpermissionmismatch",
  "insufficientpermissions",
  "does not have authorization",
  "does not have permission",
  "not authorized",
  "forbidden",
];

export type OperationOutcome =
  | { succeeded: true }
  | { succeeded: false; error: unknown };

export interface Classification {
  status: TestStatus;
  message: string;
  errorCode?: string;
}

/**
 * True when the error is an RBAC denial rather than any other failure
 */
export function isAuthorizationDenial(error: unknown): boolean {
  const { statusCode, code, message } = readRestErrorFields(error);
  if (statusCode === 403) {
    return true;
  }
  const haystack = `${code ?? ""} ${message}`.toLowerCase();
  return DENIAL_PATTERNS.some(pattern => haystack.includes(pattern));
}

function firstLine(text: string, maxLength: number = 300): string {
  const line = text.split("\n")[0].trim();
  return line.length > maxLength ? `${line.slice(0, maxLength - 3)}...` : line;
}

export function classifyOutcome(expectation: Expectation, outcome: OperationOutcome): Classification {
  if (outcome.succeeded) {
    return expectation === "deny"
      ? { status: "FAIL", message: "Operation succeeded but the role should have denied it" }
      : { status: "PASS", message: "Operation allowed as expected" };
  }

  const { code, message } = readRestErrorFields(outcome.error);
  const errorCode = code;

  if (isAuthorizationDenial(outcome.error)) {
    return expectation === "deny"
      ? { status: "PASS", message: `Denied as expected: ${firstLine(message)}`, errorCode }
      : { status: "FAIL", message: `Operation was denied but the role should allow it: ${firstLine(message)}`, errorCode };
  }

  return { status: "ERROR", message: `Unexpected error: ${firstLine(message)}`, errorCode };
}
