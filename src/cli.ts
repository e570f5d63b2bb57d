#!/usr/bin/env node
/**
 * azadmin command line
 */

import { Command } from 'commander';
import { loadSuiteOptions, type RunCommandOptions } from './config.js';
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
import { formatErrorMarkdown, normalizeError, ValidationError } from './errors.js';
import { collectInventory, exportInventory, INVENTORY_FORMATS, renderInventory } from './inventory.js';
import { logger, parseLogLevel } from './logging.js';
import { renderCatalogMarkdown, selectTestCases, toCatalogEntry } from './rbac/catalog.js';
import { renderText } from './rbac/exporter.js';
import { runSuite } from './rbac/orchestrator.js';
import { TEST_MODULES } from './rbac/types.js';
import { startMcpServer } from './server.js';
import { createToolServices, type ToolServices } from './services.js';
import { createRepair, renderRepairMarkdown, restoreRepair, type RepairOutcome } from './vmRepair.js';
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

export type Output = (text: string) => void;

interface GlobalOptions {
  logLevel?: string;
  logFile?: string;
  quiet?: boolean;
}

interface ListOptions {
  modules?: string;
  json?: boolean;
}

interface InventoryOptions {
  subscription?: string;
  resourceGroup?: string;
  resourceType?: string;
  location?: string;
  outputFormat?: string;
  outputFile?: string;
}

interface EncryptionOptions {
  subscription?: string;
  resourceGroup?: string;
  vm?: string;
  dryRun?: boolean;
  json?: boolean;
}

interface RepairOptions {
  subscription?: string;
  resourceGroup?: string;
  vm?: string;
  rescueVm?: string;
  rescueResourceGroup?: string;
  repairDisk?: string;
  dryRun?: boolean;
  json?: boolean;
}

interface BackupOptions {
  subscription?: string;
  resourceGroup?: string;
  vault?: string;
  targetResourceGroup?: string;
  targetVault?: string;
  policy?: string;
  items?: string;
  dryRun?: boolean;
  json?: boolean;
}

function requiredOption(value: string | undefined, flag: string): string {
  if (!value) {
    throw new ValidationError(`${flag} is required`);
  }
  return value;
}

const stdout: Output = text => {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
};

export function createProgram(services: ToolServices, out: Output = stdout): Command {
  const program = new Command();

  program
    .name('azadmin')
    .description('Azure administration toolkit: RBAC custom role test suite, resource inventory, encryption at host, VM repair and backup vault migration')
    .version(services.version)
    .option('--log-level <level>', 'DEBUG, INFO, WARN, ERROR or SECURITY (default: LOG_LEVEL or INFO)')
    .option('--log-file <path>', 'also write log entries as JSON lines to this file (default: LOG_FILE)')
    .option('-q, --quiet', 'no log output on stderr')
    .hook('preAction', thisCommand => {
      const opts: GlobalOptions = thisCommand.opts();
      if (opts.logLevel) logger.setLevel(parseLogLevel(opts.logLevel));
      if (opts.logFile) logger.setLogFile(opts.logFile);
      if (opts.quiet) logger.setConsole(false);
    });

  const rbac = program.command('rbac').description('custom role RBAC test suite');

  rbac
    .command('run')
    .description('provision the test environment, run the selected tests as the restricted principal, export reports and clean up')
    .option('-s, --subscription <id>', 'subscription ID (default: AZURE_SUBSCRIPTION_ID, then the first enabled one)')
    .option('-r, --region <region>', 'region for the scaffold (default: AZURE_REGION, then eastus)')
    .option('--resource-group-prefix <prefix>', 'test resource group name prefix (default: rbac-test)')
    .option('--role-name <name>', 'test this existing custom role instead of creating one')
    .option('--role-definition <file>', 'custom role definition JSON (default: config/custom-role.json)')
    .option('-m, --modules <list>', `comma-separated modules: ${TEST_MODULES.join(', ')}`)
    .option('-t, --tests <ids>', 'comma-separated test IDs, e.g. AUTH-001,NET-013')
    .option('-f, --formats <list>', 'report formats: json, csv, html, text, pdf (default: json,csv,html,text)')
    .option('-o, --output-dir <dir>', 'report directory (default: rbac-reports)')
    .option('--keep-environment', 'skip cleanup and leave the test resource group in place')
    .option('--run-id <id>', 'reuse the environment of an earlier run kept with --keep-environment (default: RBAC_RUN_ID, then a new ID)')
    .option('--propagation-timeout <seconds>', 'how long to wait for the service principal to gain access (default: 300)')
    .option('--propagation-interval <seconds>', 'poll interval while waiting (default: 15)')
    .option('--cleanup-attempts <n>', 'attempts per cleanup action (default: 5)')
    .option('--cleanup-interval <seconds>', 'wait between cleanup attempts (default: 20)')
    .action(async (opts: RunCommandOptions) => {
      const options = loadSuiteOptions(opts);
      const { report, files, exitCode } = await runSuite(options, services.suiteDependencies());
      out(renderText(report));
      for (const file of files) {
        out(`Report (${file.format}): ${file.path}`);
      }
      process.exitCode = exitCode;
    });

  rbac
    .command('list')
    .description('list the test catalog')
    .option('-m, --modules <list>', `comma-separated modules: ${TEST_MODULES.join(', ')}`)
    .option('--json', 'print JSON')
    .action((opts: ListOptions) => {
      const tests = selectTestCases({ modules: validateList(opts.modules, TEST_MODULES, 'module') });
      out(opts.json ? JSON.stringify(tests.map(toCatalogEntry), null, 2) : renderCatalogMarkdown(tests));
    });

  program
    .command('inventory')
    .description('resource inventory')
    .command('export')
    .description('export resources (name, type, resource group, location, SKU, kind, tags, ID)')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('-g, --resource-group <name>', 'limit to one resource group')
    .option('--resource-type <type>', 'limit to one resource type, e.g. Microsoft.Storage/storageAccounts')
    .option('-l, --location <filter>', "'all', 'common' or a comma-separated list")
    .option('--output-format <format>', 'csv or json', 'csv')
    .option('-o, --output-file <path>', 'write to this file instead of stdout')
    .action(async (opts: InventoryOptions) => {
      const format = validateList(opts.outputFormat, INVENTORY_FORMATS, 'output format')?.[0] ?? 'csv';
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const rows = await collectInventory(services.clientsFor(subscription.subscriptionId).resources, {
        resourceGroup: validateResourceGroup(opts.resourceGroup),
        resourceType: validateInput(opts.resourceType, {
          maxLength: 200,
          pattern: AZURE_PATTERNS.resourceType,
          patternName: 'resource type',
        }),
        location: validateLocationFilter(opts.location),
      });
      if (opts.outputFile) {
        await exportInventory(rows, format, opts.outputFile);
        out(`Inventory saved to ${opts.outputFile} (${rows.length} resources)`);
      } else {
        out(renderInventory(rows, format));
      }
    });

  const encryption = program.command('encryption-at-host').description('VM encryption at host');

  encryption
    .command('status')
    .description('show encryption at host, size and power state per VM')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('-g, --resource-group <name>', 'limit to one resource group')
    .option('--json', 'print JSON')
    .action(async (opts: EncryptionOptions) => {
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const statuses = await listEncryptionStatus(
        services.clientsFor(subscription.subscriptionId).compute,
        validateResourceGroup(opts.resourceGroup)
      );
      out(opts.json ? JSON.stringify(statuses, null, 2) : renderStatusMarkdown(statuses));
    });

  encryption
    .command('enable')
    .description('enable encryption at host; running VMs are deallocated, updated and started again')
    .requiredOption('-g, --resource-group <name>', 'resource group of the VM(s)')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('--vm <name>', 'one VM; every VM in the resource group when omitted')
    .option('--dry-run', 'report the plan without changing anything')
    .option('--json', 'print JSON')
    .action(async (opts: EncryptionOptions) => {
      const resourceGroup = requiredOption(validateResourceGroup(opts.resourceGroup, true), '--resource-group');
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const dryRun = opts.dryRun === true;
      const outcomes = await enableEncryptionAtHost(
        services.clientsFor(subscription.subscriptionId).compute,
        { resourceGroup, vmName: validateResourceName(opts.vm) },
        { dryRun }
      );
      out(opts.json ? JSON.stringify(outcomes, null, 2) : renderOutcomesMarkdown(outcomes, dryRun));
      if (outcomes.some(o => o.status === 'failed')) {
        process.exitCode = 1;
      }
    });

  const repair = program.command('vm-repair').description("repair a VM's OS disk from a rescue VM");

  const repairTarget = (opts: RepairOptions) => ({
    resourceGroup: requiredOption(validateResourceGroup(opts.resourceGroup, true), '--resource-group'),
    vmName: requiredOption(validateResourceName(opts.vm, true), '--vm'),
    rescueVmName: requiredOption(validateResourceName(opts.rescueVm, true), '--rescue-vm'),
    rescueResourceGroup: validateResourceGroup(opts.rescueResourceGroup),
  });
  const printRepair = (outcome: RepairOutcome, title: string, json: boolean | undefined) => {
    out(json ? JSON.stringify(outcome, null, 2) : renderRepairMarkdown(outcome, title));
    if (outcome.status === 'failed') {
      process.exitCode = 1;
    }
  };

  repair
    .command('create')
    .description('snapshot the OS disk, copy it to a new disk and attach that disk to the rescue VM')
    .requiredOption('-g, --resource-group <name>', 'resource group of the VM to repair')
    .requiredOption('--vm <name>', 'VM whose OS disk needs repair')
    .requiredOption('--rescue-vm <name>', 'existing VM in the same region and zone')
    .option('--rescue-resource-group <name>', 'resource group of the rescue VM (default: --resource-group)')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('--dry-run', 'report the plan without changing anything')
    .option('--json', 'print JSON')
    .action(async (opts: RepairOptions) => {
      const target = repairTarget(opts);
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const outcome = await createRepair(services.clientsFor(subscription.subscriptionId).compute, target, { dryRun: opts.dryRun === true });
      printRepair(outcome, 'Prepare VM Repair', opts.json);
    });

  repair
    .command('restore')
    .description('detach the repair disk from the rescue VM and make it the OS disk of the repaired VM')
    .requiredOption('-g, --resource-group <name>', 'resource group of the VM being repaired')
    .requiredOption('--vm <name>', 'VM that gets the repaired OS disk')
    .requiredOption('--rescue-vm <name>', 'rescue VM the repair disk is attached to')
    .requiredOption('--repair-disk <name>', 'repair disk made by vm-repair create')
    .option('--rescue-resource-group <name>', 'resource group of the rescue VM (default: --resource-group)')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('--dry-run', 'report the plan without changing anything')
    .option('--json', 'print JSON')
    .action(async (opts: RepairOptions) => {
      const target = {
        ...repairTarget(opts),
        repairDiskName: requiredOption(validateResourceName(opts.repairDisk, true), '--repair-disk'),
      };
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const outcome = await restoreRepair(services.clientsFor(subscription.subscriptionId).compute, target, { dryRun: opts.dryRun === true });
      printRepair(outcome, 'Restore Repaired OS Disk', opts.json);
    });

  const backup = program.command('backup-vault').description('Recovery Services vault items');

  backup
    .command('list')
    .description('list the items a vault protects')
    .requiredOption('-g, --resource-group <name>', 'resource group of the vault')
    .requiredOption('--vault <name>', 'Recovery Services vault')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('--json', 'print JSON')
    .action(async (opts: BackupOptions) => {
      const vault = {
        resourceGroup: requiredOption(validateResourceGroup(opts.resourceGroup, true), '--resource-group'),
        vaultName: requiredOption(validateResourceName(opts.vault, true), '--vault'),
      };
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const items = await listProtectedItems(services.clientsFor(subscription.subscriptionId).backup, vault);
      out(opts.json ? JSON.stringify(items, null, 2) : renderItemsMarkdown(vault, items));
    });

  backup
    .command('migrate')
    .description('move Azure VM backups to another vault; backup data in the source vault is deleted')
    .requiredOption('-g, --resource-group <name>', 'resource group of the source vault')
    .requiredOption('--vault <name>', 'source Recovery Services vault')
    .requiredOption('--target-vault <name>', 'target Recovery Services vault')
    .option('--target-resource-group <name>', 'resource group of the target vault (default: --resource-group)')
    .option('--policy <name>', 'backup policy in the target vault', 'DefaultPolicy')
    .option('--items <list>', 'comma-separated VM or protected item names (default: every item)')
    .option('-s, --subscription <id>', 'subscription ID')
    .option('--dry-run', 'report the plan without changing anything')
    .option('--json', 'print JSON')
    .action(async (opts: BackupOptions) => {
      const sourceGroup = requiredOption(validateResourceGroup(opts.resourceGroup, true), '--resource-group');
      const request = {
        source: { resourceGroup: sourceGroup, vaultName: requiredOption(validateResourceName(opts.vault, true), '--vault') },
        target: {
          resourceGroup: validateResourceGroup(opts.targetResourceGroup) ?? sourceGroup,
          vaultName: requiredOption(validateResourceName(opts.targetVault, true), '--target-vault'),
        },
        targetPolicy: validateResourceName(opts.policy) ?? 'DefaultPolicy',
        items: validateBackupItems(opts.items),
      };
      const subscription = await services.resolveSubscription(validateSubscriptionId(opts.subscription, false));
      const dryRun = opts.dryRun === true;
      const outcomes = await migrateProtectedItems(services.clientsFor(subscription.subscriptionId).backup, request, { dryRun });
      out(opts.json ? JSON.stringify(outcomes, null, 2) : renderMigrationMarkdown(request, outcomes, dryRun));
      if (outcomes.some(o => o.status === 'failed')) {
        process.exitCode = 1;
      }
    });

  program
    .command('mcp')
    .description('run as an MCP server over stdio')
    .action(() => startMcpServer(services));

  return program;
}

async function main(): Promise<void> {
  const services = createToolServices();
  try {
    await createProgram(services).parseAsync(process.argv);
  } catch (error) {
    const structured = normalizeError(error);
    logger.error(`Command failed: ${structured.message}`, { code: structured.code });
    console.error(formatErrorMarkdown(structured));
    process.exitCode = 2;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error in main():', error);
    process.exit(2);
  });
}
