/**
 * RBAC suite configuration: command options over environment variables over defaults
 */

import { join } from 'path';
import { ValidationError } from './errors.js';
import { CONFIG_DIR } from './paths.js';
import { findUnknownTestIds } from './rbac/catalog.js';
import { DEFAULT_REPORT_FORMATS, REPORT_FORMATS } from './rbac/exporter.js';
import type { SuiteOptions } from './rbac/orchestrator.js';
import { TEST_MODULES } from './rbac/types.js';
import {
  validateList,
  validatePositiveInt,
  validateRegion,
  validateResourceGroup,
  validateRunId,
  validateSubscriptionId,
  validateTestIds,
} from './validation.js';

export type Environment = Record<string, string | undefined>;

/**
 * Raw `rbac run` options as commander hands them over
 */
export interface RunCommandOptions {
  subscription?: string;
  region?: string;
  resourceGroupPrefix?: string;
  roleName?: string;
  roleDefinition?: string;
  modules?: string;
  tests?: string;
  formats?: string;
  outputDir?: string;
  keepEnvironment?: boolean;
  runId?: string;
  propagationTimeout?: string;
  propagationInterval?: string;
  cleanupAttempts?: string;
  cleanupInterval?: string;
}

export const DEFAULTS = {
  region: 'eastus',
  resourceGroupPrefix: 'rbac-test',
  roleDefinitionFile: join(CONFIG_DIR, 'custom-role.json'),
  outputDir: 'rbac-reports',
  propagationTimeoutSeconds: 300,
  propagationIntervalSeconds: 15,
  cleanupAttempts: 5,
  cleanupIntervalSeconds: 20,
  replicationAttempts: 10,
  replicationIntervalSeconds: 10,
  secretLifetimeHours: 24,
} as const;

function pick(option: string | undefined, env: string | undefined): string | undefined {
  const value = option ?? env;
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseFlag(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

export function loadSuiteOptions(cli: RunCommandOptions, env: Environment = process.env): SuiteOptions {
  const testIds = validateTestIds(pick(cli.tests, env.RBAC_TEST_IDS));
  if (testIds) {
    const unknown = findUnknownTestIds(testIds);
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown test ID(s): ${unknown.join(', ')}`, { unknown });
    }
  }

  const prefix = validateResourceGroup(pick(cli.resourceGroupPrefix, env.RBAC_RESOURCE_GROUP_PREFIX)) ?? DEFAULTS.resourceGroupPrefix;
  if (prefix.length > 70) {
    throw new ValidationError('Resource group prefix must be at most 70 characters', { provided: prefix.length });
  }

  const runId = validateRunId(pick(cli.runId, env.RBAC_RUN_ID));
  if (runId && `${prefix}-${runId}`.length > 90) {
    throw new ValidationError('Resource group prefix and run ID together exceed the 90-character resource group name limit', {
      provided: `${prefix}-${runId}`.length,
    });
  }

  const seconds = (option: string | undefined, envValue: string | undefined, name: string, fallback: number) =>
    validatePositiveInt(pick(option, envValue), name, fallback) * 1000;

  return {
    subscriptionId: validateSubscriptionId(pick(cli.subscription, env.AZURE_SUBSCRIPTION_ID), false),
    region: validateRegion(pick(cli.region, env.AZURE_REGION)) ?? DEFAULTS.region,
    resourceGroupPrefix: prefix,
    roleName: pick(cli.roleName, env.RBAC_ROLE_NAME)?.trim(),
    roleDefinitionFile: pick(cli.roleDefinition, env.RBAC_ROLE_DEFINITION_FILE) ?? DEFAULTS.roleDefinitionFile,
    modules: validateList(pick(cli.modules, env.RBAC_MODULES), TEST_MODULES, 'module') ?? [...TEST_MODULES],
    testIds,
    formats: validateList(pick(cli.formats, env.RBAC_REPORT_FORMATS), REPORT_FORMATS, 'report format') ?? [...DEFAULT_REPORT_FORMATS],
    outputDir: pick(cli.outputDir, env.RBAC_OUTPUT_DIR) ?? DEFAULTS.outputDir,
    keepEnvironment: cli.keepEnvironment === true || parseFlag(env.RBAC_KEEP_ENVIRONMENT),
    runId,
    secretLifetimeHours: DEFAULTS.secretLifetimeHours,
    propagation: {
      timeoutMs: seconds(cli.propagationTimeout, env.RBAC_PROPAGATION_TIMEOUT_SECONDS, 'propagation timeout', DEFAULTS.propagationTimeoutSeconds),
      intervalMs: seconds(cli.propagationInterval, env.RBAC_PROPAGATION_INTERVAL_SECONDS, 'propagation interval', DEFAULTS.propagationIntervalSeconds),
    },
    replication: {
      attempts: DEFAULTS.replicationAttempts,
      intervalMs: DEFAULTS.replicationIntervalSeconds * 1000,
    },
    cleanup: {
      attempts: validatePositiveInt(pick(cli.cleanupAttempts, env.RBAC_CLEANUP_ATTEMPTS), 'cleanup attempts', DEFAULTS.cleanupAttempts),
      intervalMs: seconds(cli.cleanupInterval, env.RBAC_CLEANUP_INTERVAL_SECONDS, 'cleanup interval', DEFAULTS.cleanupIntervalSeconds),
    },
  };
}
