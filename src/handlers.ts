/**
 * MCP tool handlers
 */

import { loadSuiteOptions } from './config.js';
import {
  collectInventory,
  exportInventory,
  INVENTORY_FORMATS,
  renderInventory,
  summarizeByType,
  type InventoryFormat,
} from './inventory.js';
import {
  enableEncryptionAtHost,
  listEncryptionStatus,
  renderOutcomesMarkdown,
  renderStatusMarkdown,
} from './encryptionAtHost.js';
import {
  listProtectedItems,
  migrateProtectedItems,
  renderItemsMarkdown,
  renderMigrationMarkdown,
} from './backupVault.js';
import { formatErrorJSON, formatErrorMarkdown, normalizeError, ValidationError } from './errors.js';
import { formatResponse, parseResponseFormat } from './format.js';
import { logger, performanceTracker } from './logging.js';
import { renderCatalogMarkdown, selectTestCases, toCatalogEntry } from './rbac/catalog.js';
import { renderResultsMarkdown, renderSummaryMarkdown } from './rbac/exporter.js';
import { runSuite } from './rbac/orchestrator.js';
import { TEST_MODULES } from './rbac/types.js';
import type { ToolServices } from './services.js';
import { TOOL_DEFINITIONS } from './tools.js';
import { createRepair, renderRepairMarkdown, restoreRepair } from './vmRepair.js';
import {
  AZURE_PATTERNS,
  validateBackupItems,
  validateInput,
  validateList,
  validateLocationFilter,
  validateResourceGroup,
  validateResourceName,
  validateSubscriptionId,
} from './validation.js';

export type ToolArguments = Record<string, unknown>;

// A type alias rather than an interface: the SDK's CallToolResult carries an index signature
export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function text(value: string, isError?: boolean): ToolResponse {
  return isError ? { content: [{ type: 'text', text: value }], isError } : { content: [{ type: 'text', text: value }] };
}

export function stringArg(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`Argument '${key}' must be a string`, { argument: key });
  }
  return value;
}

function required(value: string | undefined, argument: string): string {
  if (!value) {
    throw new ValidationError(`${argument} is required`, { argument });
  }
  return value;
}

export function booleanArg(args: ToolArguments, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === 'false') return value === 'true';
  throw new ValidationError(`Argument '${key}' must be a boolean`, { argument: key });
}

export function renderHelp(version: string): string {
  let help = `# Azure Admin Toolkit v${version}\n\n`;
  help += `Azure administration tools over the Azure Resource Manager API. Tools authenticate with your Azure CLI login (az login), `;
  help += `falling back to environment, workload and managed identity credentials.\n\n`;
  help += `## Tools\n\n`;
  for (const tool of TOOL_DEFINITIONS) {
    help += `### ${tool.name}\n${tool.description}\n\n`;
    const args = Object.entries(tool.inputSchema.properties);
    if (args.length > 0) {
      for (const [name, schema] of args) {
        const required = tool.inputSchema.required?.includes(name) ? ' (required)' : '';
        help += `- \`${name}\`${required}: ${schema.description}\n`;
      }
      help += `\n`;
    }
  }
  help += `## Environment\n\n`;
  help += `- \`AZURE_SUBSCRIPTION_ID\`, \`AZURE_REGION\`: defaults for subscription and region\n`;
  help += `- \`RBAC_ROLE_DEFINITION_FILE\`, \`RBAC_ROLE_NAME\`, \`RBAC_OUTPUT_DIR\`, \`RBAC_KEEP_ENVIRONMENT\`, \`RBAC_RUN_ID\`: RBAC suite defaults\n`;
  help += `- \`LOG_LEVEL\`, \`ENABLE_CONSOLE_LOGGING\`, \`LOG_FILE\`: logging\n`;
  return help;
}

async function runTestSuiteTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const options = loadSuiteOptions({
    subscription: stringArg(args, 'subscriptionId'),
    region: stringArg(args, 'region'),
    roleName: stringArg(args, 'roleName'),
    modules: stringArg(args, 'modules'),
    tests: stringArg(args, 'testIds'),
    formats: stringArg(args, 'reportFormats'),
    outputDir: stringArg(args, 'outputDir'),
    keepEnvironment: booleanArg(args, 'keepEnvironment', false),
    runId: stringArg(args, 'runId'),
  });
  const { report, files, exitCode } = await runSuite(options, services.suiteDependencies());

  if (parseResponseFormat(format) === 'json') {
    return text(formatResponse({ exitCode, files, report }, format, 'rbac_run_test_suite'), exitCode === 2);
  }

  let output = renderSummaryMarkdown(report);
  if (report.results.length > 0) {
    output += `\n## Results\n\n${renderResultsMarkdown(report.results)}`;
  }
  if (files.length > 0) {
    output += `\n## Reports\n\n${files.map(f => `- ${f.format}: ${f.path}`).join('\n')}\n`;
  }
  output += `\nExit code: ${exitCode}\n`;
  return text(output, exitCode === 2);
}

async function inventoryTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const outputFormat = validateInput(stringArg(args, 'outputFormat'), {
    allowedValues: INVENTORY_FORMATS,
    patternName: 'output format',
  }) ?? 'csv';
  const exportFormat: InventoryFormat = outputFormat === 'json' ? 'json' : 'csv';
  const outputFile = validateInput(stringArg(args, 'outputFile'), { maxLength: 500, patternName: 'output file' });

  const clients = services.clientsFor(subscription.subscriptionId);
  const rows = await collectInventory(clients.resources, {
    resourceGroup: validateResourceGroup(stringArg(args, 'resourceGroup')),
    resourceType: validateInput(stringArg(args, 'resourceType'), {
      maxLength: 200,
      pattern: AZURE_PATTERNS.resourceType,
      patternName: 'resource type',
    }),
    location: validateLocationFilter(stringArg(args, 'location')),
  });

  if (outputFile) {
    await exportInventory(rows, exportFormat, outputFile);
    return text(formatResponse(`[OK] Inventory saved to: ${outputFile}\n\nResources exported: ${rows.length}`, format, 'inventory_export'));
  }

  if (parseResponseFormat(format) === 'json') {
    return text(formatResponse({ subscriptionId: subscription.subscriptionId, count: rows.length, resources: rows }, format, 'inventory_export'));
  }

  let output = `# Azure Resource Inventory\n\nSubscription: ${subscription.displayName}\n\nFound ${rows.length} resource(s)\n\n`;
  output += `## Summary by Type\n\n${JSON.stringify(summarizeByType(rows), null, 2)}\n\n`;
  output += `## Export (${exportFormat})\n\n\`\`\`${exportFormat}\n${renderInventory(rows, exportFormat)}\n\`\`\`\n`;
  return text(output);
}

async function encryptionStatusTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const statuses = await listEncryptionStatus(
    services.clientsFor(subscription.subscriptionId).compute,
    validateResourceGroup(stringArg(args, 'resourceGroup'))
  );
  const data = parseResponseFormat(format) === 'json' ? { virtualMachines: statuses } : renderStatusMarkdown(statuses);
  return text(formatResponse(data, format, 'encryption_at_host_status'));
}

async function encryptionEnableTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const resourceGroup = required(validateResourceGroup(stringArg(args, 'resourceGroup'), true), 'resourceGroup');
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const dryRun = booleanArg(args, 'dryRun', true);
  const outcomes = await enableEncryptionAtHost(
    services.clientsFor(subscription.subscriptionId).compute,
    { resourceGroup, vmName: validateResourceName(stringArg(args, 'vmName')) },
    { dryRun }
  );
  const data = parseResponseFormat(format) === 'json' ? { dryRun, outcomes } : renderOutcomesMarkdown(outcomes, dryRun);
  return text(formatResponse(data, format, 'encryption_at_host_enable'), outcomes.some(o => o.status === 'failed'));
}

async function repairTool(args: ToolArguments, services: ToolServices, format: string | undefined, name: string): Promise<ToolResponse> {
  const target = {
    resourceGroup: required(validateResourceGroup(stringArg(args, 'resourceGroup'), true), 'resourceGroup'),
    vmName: required(validateResourceName(stringArg(args, 'vmName'), true), 'vmName'),
    rescueVmName: required(validateResourceName(stringArg(args, 'rescueVmName'), true), 'rescueVmName'),
    rescueResourceGroup: validateResourceGroup(stringArg(args, 'rescueResourceGroup')),
  };
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const compute = services.clientsFor(subscription.subscriptionId).compute;
  const dryRun = booleanArg(args, 'dryRun', true);

  const outcome = name === 'vm_repair_restore'
    ? await restoreRepair(
      compute,
      { ...target, repairDiskName: required(validateResourceName(stringArg(args, 'repairDiskName'), true), 'repairDiskName') },
      { dryRun }
    )
    : await createRepair(compute, target, { dryRun });
  const title = name === 'vm_repair_restore' ? 'Restore Repaired OS Disk' : 'Prepare VM Repair';
  const data = parseResponseFormat(format) === 'json' ? { dryRun, outcome } : renderRepairMarkdown(outcome, title);
  return text(formatResponse(data, format, name), outcome.status === 'failed');
}

async function backupItemsTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const vault = {
    resourceGroup: required(validateResourceGroup(stringArg(args, 'resourceGroup'), true), 'resourceGroup'),
    vaultName: required(validateResourceName(stringArg(args, 'vaultName'), true), 'vaultName'),
  };
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const items = await listProtectedItems(services.clientsFor(subscription.subscriptionId).backup, vault);
  const data = parseResponseFormat(format) === 'json' ? { vault, items } : renderItemsMarkdown(vault, items);
  return text(formatResponse(data, format, 'backup_vault_list_items'));
}

async function backupMigrateTool(args: ToolArguments, services: ToolServices, format: string | undefined): Promise<ToolResponse> {
  const sourceGroup = required(validateResourceGroup(stringArg(args, 'resourceGroup'), true), 'resourceGroup');
  const request = {
    source: { resourceGroup: sourceGroup, vaultName: required(validateResourceName(stringArg(args, 'vaultName'), true), 'vaultName') },
    target: {
      resourceGroup: validateResourceGroup(stringArg(args, 'targetResourceGroup')) ?? sourceGroup,
      vaultName: required(validateResourceName(stringArg(args, 'targetVaultName'), true), 'targetVaultName'),
    },
    targetPolicy: validateResourceName(stringArg(args, 'policyName')) ?? 'DefaultPolicy',
    items: validateBackupItems(stringArg(args, 'items')),
  };
  const subscription = await services.resolveSubscription(validateSubscriptionId(stringArg(args, 'subscriptionId'), false));
  const dryRun = booleanArg(args, 'dryRun', true);
  const outcomes = await migrateProtectedItems(services.clientsFor(subscription.subscriptionId).backup, request, { dryRun });
  const data = parseResponseFormat(format) === 'json' ? { dryRun, outcomes } : renderMigrationMarkdown(request, outcomes, dryRun);
  return text(formatResponse(data, format, 'backup_vault_migrate'), outcomes.some(o => o.status === 'failed'));
}

/**
 * Dispatch one tool call; failures come back as an error response, never as a throw
 */
export async function handleToolCall(name: string, args: ToolArguments | undefined, services: ToolServices): Promise<ToolResponse> {
  const toolArgs = args ?? {};
  const trackingId = performanceTracker.start(name);
  logger.info(`Tool invoked: ${name}`, { args: toolArgs }, name);

  try {
    const format = stringArg(toolArgs, 'format');
    parseResponseFormat(format);
    let response: ToolResponse;

    switch (name) {
      case 'azure_admin_help':
        response = text(renderHelp(services.version));
        break;
      case 'rbac_list_test_cases': {
        const modules = validateList(stringArg(toolArgs, 'modules'), TEST_MODULES, 'module');
        const tests = selectTestCases({ modules });
        const data = parseResponseFormat(format) === 'json' ? { testCases: tests.map(toCatalogEntry) } : renderCatalogMarkdown(tests);
        response = text(formatResponse(data, format, name));
        break;
      }
      case 'rbac_run_test_suite':
        response = await runTestSuiteTool(toolArgs, services, format);
        break;
      case 'inventory_export':
        response = await inventoryTool(toolArgs, services, format);
        break;
      case 'encryption_at_host_status':
        response = await encryptionStatusTool(toolArgs, services, format);
        break;
      case 'encryption_at_host_enable':
        response = await encryptionEnableTool(toolArgs, services, format);
        break;
      case 'vm_repair_create':
      case 'vm_repair_restore':
        response = await repairTool(toolArgs, services, format, name);
        break;
      case 'backup_vault_list_items':
        response = await backupItemsTool(toolArgs, services, format);
        break;
      case 'backup_vault_migrate':
        response = await backupMigrateTool(toolArgs, services, format);
        break;
      default:
        throw new ValidationError(`Unknown tool: ${name}`, { tool: name });
    }

    performanceTracker.end(trackingId, !response.isError);
    logger.info(`Tool completed: ${name}`, undefined, name);
    return response;
  } catch (error) {
    performanceTracker.end(trackingId, false, error instanceof Error ? error.name : 'UnknownError');
    const structured = normalizeError(error);
    logger.error(`Tool execution failed: ${name}`, { ...structured.toJSON() }, name);

    const errorOutput = toolArgs.format === 'json' ? formatErrorJSON(structured) : formatErrorMarkdown(structured);
    return text(errorOutput, true);
  }
}
