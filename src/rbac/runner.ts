/**
 * Executes test cases one at a time and tallies the results
 */

import { logger, performanceTracker } from "../logging.js";
import { classifyOutcome, type Classification } from "./classifier.js";
import type {
  RequirementSummary,
  SuiteSummary,
  TestCase,
  TestExecutionContext,
  TestModule,
  TestResult,
} from "./types.js";

function toResult(test: TestCase, classification: Classification, durationMs: number, timestamp: string): TestResult {
  return {
    id: test.id,
    module: test.module,
    requirementId: test.requirement.id,
    requirementName: test.requirement.name,
    name: test.name,
    description: test.description,
    expectation: test.expectation,
    status: classification.status,
    message: classification.message,
    errorCode: classification.errorCode,
    durationMs,
    timestamp,
  };
}

/**
 * Attempt one operation and classify what happened. Never throws.
 */
export async function runTestCase(test: TestCase, context: TestExecutionContext): Promise<TestResult> {
  const timestamp = new Date().toISOString();
  const missing = test.requires.filter(key => !context.suite.scaffold[key]);

  if (missing.length > 0) {
    logger.warn(`${test.id} skipped: missing ${missing.join(", ")}`, undefined, test.module);
    return toResult(
      test,
      { status: "SKIPPED", message: `Prerequisite not provisioned: ${missing.join(", ")}` },
      0,
      timestamp
    );
  }

  const trackingId = performanceTracker.start(test.id);
  const started = Date.now();
  let classification: Classification;

  try {
    await test.execute(context);
    classification = classifyOutcome(test.expectation, { succeeded: true });
  } catch (error) {
    classification = classifyOutcome(test.expectation, { succeeded: false, error });
  }

  performanceTracker.recordAPICall(trackingId);
  performanceTracker.end(trackingId, classification.status === "PASS", classification.errorCode);

  const result = toResult(test, classification, Date.now() - started, timestamp);
  const log = result.status === "PASS" ? logger.info.bind(logger) : logger.warn.bind(logger);
  log(`${test.id} ${result.status}: ${test.name}`, { message: result.message, durationMs: result.durationMs }, test.module);
  return result;
}

/**
 * Run a module's tests in catalog order
 */
export async function runPhase(
  module: TestModule,
  tests: readonly TestCase[],
  context: TestExecutionContext
): Promise<TestResult[]> {
  logger.info(`Starting ${module} tests (${tests.length})`, undefined, module);
  const results: TestResult[] = [];
  for (const test of tests) {
    results.push(await runTestCase(test, context));
  }
  return results;
}

export function summarize(results: readonly TestResult[]): SuiteSummary {
  const count = (status: TestResult["status"], within: readonly TestResult[] = results) =>
    within.filter(r => r.status === status).length;

  const byRequirement: RequirementSummary[] = [];
  for (const result of results) {
    if (byRequirement.some(r => r.requirementId === result.requirementId)) continue;
    const inRequirement = results.filter(r => r.requirementId === result.requirementId);
    byRequirement.push({
      requirementId: result.requirementId,
      requirementName: result.requirementName,
      total: inRequirement.length,
      passed: count("PASS", inRequirement),
      failed: count("FAIL", inRequirement),
      errors: count("ERROR", inRequirement),
      skipped: count("SKIPPED", inRequirement),
    });
  }

  const skipped = count("SKIPPED");
  const passed = count("PASS");
  const executed = results.length - skipped;

  return {
    total: results.length,
    passed,
    failed: count("FAIL"),
    errors: count("ERROR"),
    skipped,
    passRate: executed > 0 ? Math.round((passed / executed) * 10000) / 100 : 0,
    byRequirement,
  };
}
