/**
 * RBAC Test Suite orchestrator
 *
 * setup → auth-context switch → test phases → export → cleanup
 */

import { randomBytes } from "crypto";
import type { TokenCredential } from "@azure/identity";
import type { AzureClients, ClientsFactory, SubscriptionInfo } from "../azure/clients.js";
import {
  createClients,
  createOperatorCredential,
  createSubscriptionClient,
  resolveSubscription,
} from "../azure/clients.js";
import { GraphServicePrincipalDirectory, type ServicePrincipalDirectory } from "../azure/graph.js";
import { normalizeError } from "../errors.js";
import { logger, performanceTracker } from "../logging.js";
import { readPackageVersion } from "../paths.js";
import { switchToServicePrincipal, type PropagationOptions } from "./authContext.js";
import { ALL_TEST_CASES, selectTestCases, testCasesByModule } from "./catalog.js";
import { CleanupRegistry, runCleanup, type CleanupOptions, type CleanupSummary } from "./cleanup.js";
import { initializeEnvironment, storageAccountNameFor, type EnvironmentOptions } from "./environment.js";
import { exportReport, type ExportedFile, type ReportFormat } from "./exporter.js";
import { runPhase, summarize } from "./runner.js";
import type { SuiteContext, SuiteReport, TestCase, TestModule, TestResult } from "./types.js";

export interface SuiteOptions {
  /** Fixed run ID; generated when absent */
  runId?: string;
  subscriptionId?: string;
  region: string;
  resourceGroupPrefix: string;
  roleName?: string;
  roleDefinitionFile: string;
  modules: TestModule[];
  testIds?: string[];
  formats: ReportFormat[];
  outputDir: string;
  keepEnvironment: boolean;
  secretLifetimeHours: number;
  propagation: PropagationOptions;
  replication: EnvironmentOptions["replication"];
  cleanup: CleanupOptions;
}

/**
 * Everything the orchestrator reaches outside itself
 */
export interface SuiteDependencies {
  operatorCredential: TokenCredential;
  resolveSubscription(requested?: string): Promise<SubscriptionInfo>;
  createClients: ClientsFactory;
  directory: ServicePrincipalDirectory;
  initializeEnvironment: typeof initializeEnvironment;
  switchToServicePrincipal(context: SuiteContext, options: PropagationOptions): Promise<AzureClients>;
  exportReport: typeof exportReport;
  catalog: readonly TestCase[];
  toolVersion: string;
}

export type ExitCode = 0 | 1 | 2;

export interface SuiteRunResult {
  report: SuiteReport;
  files: ExportedFile[];
  exitCode: ExitCode;
}

export function createDefaultDependencies(): SuiteDependencies {
  const credential = createOperatorCredential();
  return {
    operatorCredential: credential,
    resolveSubscription: requested => resolveSubscription(createSubscriptionClient(credential), requested),
    createClients,
    directory: GraphServicePrincipalDirectory.fromCredential(credential),
    initializeEnvironment,
    switchToServicePrincipal: (context, options) => switchToServicePrincipal(context, options),
    exportReport,
    catalog: ALL_TEST_CASES,
    toolVersion: readPackageVersion(),
  };
}

/**
 * UTC timestamp plus four random hex characters, e.g. 20261019142501a3f0
 */
export function createRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:T]/g, "").slice(0, 14);
  return `${stamp}${randomBytes(2).toString("hex")}`;
}

export function exitCodeFor(report: SuiteReport): ExitCode {
  if (report.metadata.fatalError) return 2;
  return report.summary.failed + report.summary.errors > 0 ? 1 : 0;
}

async function timed<T>(phase: string, fn: () => Promise<T>): Promise<T> {
  const trackingId = performanceTracker.start(phase);
  try {
    const result = await fn();
    const metric = performanceTracker.end(trackingId, true);
    logger.info(`Phase ${phase} finished`, { durationMs: metric?.duration }, "orchestrator");
    return result;
  } catch (error) {
    performanceTracker.end(trackingId, false, error instanceof Error ? error.name : "UnknownError");
    throw error;
  }
}

export async function runSuite(options: SuiteOptions, deps: SuiteDependencies): Promise<SuiteRunResult> {
  const startedAt = new Date();
  const runId = options.runId ?? createRunId(startedAt);
  const tests = selectTestCases({ modules: options.modules, testIds: options.testIds }, deps.catalog);
  const results: TestResult[] = [];
  let context: SuiteContext | undefined;
  let operatorClients: AzureClients | undefined;
  let fatalError: string | undefined;
  let files: ExportedFile[] = [];
  let cleanup: CleanupSummary | undefined;

  logger.info(`RBAC test run ${runId}: ${tests.length} test case(s)`, { modules: options.modules }, "orchestrator");

  try {
    try {
      const subscription = await deps.resolveSubscription(options.subscriptionId);
      const suite: SuiteContext = {
        runId,
        subscriptionId: subscription.subscriptionId,
        tenantId: subscription.tenantId,
        region: options.region,
        resourceGroup: `${options.resourceGroupPrefix}-${runId}`,
        storageAccountName: storageAccountNameFor(runId),
        scaffold: {},
        cleanup: new CleanupRegistry(),
      };
      const clients = deps.createClients(deps.operatorCredential, subscription.subscriptionId);
      context = suite;
      operatorClients = clients;

      await timed("setup", () => deps.initializeEnvironment(suite, clients, deps.directory, {
        roleName: options.roleName,
        roleDefinitionFile: options.roleDefinitionFile,
        secretLifetimeHours: options.secretLifetimeHours,
        replication: options.replication,
      }));

      const principalClients = await timed("auth-context-switch", () =>
        deps.switchToServicePrincipal(suite, options.propagation)
      );

      for (const [module, moduleTests] of testCasesByModule(tests)) {
        const phaseResults = await timed(module, () =>
          runPhase(module, moduleTests, { suite, clients: principalClients })
        );
        results.push(...phaseResults);
      }
    } catch (error) {
      const normalized = normalizeError(error);
      fatalError = normalized.message;
      logger.error(`Run aborted: ${normalized.message}`, { code: normalized.code, category: normalized.category }, "orchestrator");
    }

    const report = buildReport(options, deps, runId, startedAt, context, results, fatalError);
    try {
      files = await timed("export", () => deps.exportReport(report, options.formats, options.outputDir));
    } catch (error) {
      const normalized = normalizeError(error);
      fatalError = fatalError ?? `Report export failed: ${normalized.message}`;
      logger.error(`Report export failed: ${normalized.message}`, undefined, "orchestrator");
    }
  } finally {
    if (context && operatorClients) {
      if (options.keepEnvironment) {
        logger.warn(`Keeping environment: resource group ${context.resourceGroup} was not deleted`, undefined, "orchestrator");
      } else {
        const registry = context.cleanup;
        const clients = operatorClients;
        cleanup = await timed("cleanup", () => runCleanup(registry, clients, options.cleanup));
      }
    }
  }

  const report: SuiteReport = {
    ...buildReport(options, deps, runId, startedAt, context, results, fatalError),
    cleanup,
  };
  const exitCode = exitCodeFor(report);
  logger.info(
    `Run ${runId} finished with exit code ${exitCode}`,
    { passed: report.summary.passed, failed: report.summary.failed, errors: report.summary.errors },
    "orchestrator"
  );
  return { report, files, exitCode };
}

function buildReport(
  options: SuiteOptions,
  deps: SuiteDependencies,
  runId: string,
  startedAt: Date,
  context: SuiteContext | undefined,
  results: TestResult[],
  fatalError: string | undefined
): SuiteReport {
  const finishedAt = new Date();
  return {
    metadata: {
      runId,
      toolVersion: deps.toolVersion,
      subscriptionId: context?.subscriptionId ?? options.subscriptionId ?? "unresolved",
      tenantId: context?.tenantId,
      region: options.region,
      resourceGroup: context?.resourceGroup ?? `${options.resourceGroupPrefix}-${runId}`,
      roleName: context?.customRole?.roleName ?? options.roleName,
      servicePrincipalAppId: context?.servicePrincipal?.appId,
      modules: [...options.modules],
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      fatalError,
    },
    summary: summarize(results),
    results: [...results],
  };
}
