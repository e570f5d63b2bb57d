/**
 * Backup vault migration: move Azure VM backups from one Recovery Services vault to another
 *
 * A VM can be protected by one vault at a time, so each move stops protection in the source
 * vault (deleting its backup data there) and then protects the VM in the target vault with the
 * chosen policy. Recovery points in the source vault do not carry over.
 */

import type { ProtectedItemResource, RecoveryServicesBackupClient } from '@azure/arm-recoveryservicesbackup';
import { parseResourceId, resourceId } from './azure/resourceId.js';
import { readRestErrorFields, ValidationError } from './errors.js';
import { logger } from './logging.js';
import { linearRetry, retry } from './retry.js';

export interface VaultRef {
  resourceGroup: string;
  vaultName: string;
}

export interface ProtectedItemSummary {
  name: string;
  /** Name of the protected VM (or other source), from its resource ID */
  sourceName: string;
  fabricName: string;
  containerName: string;
  backupManagementType: string;
  workloadType: string;
  protectedItemType: string;
  sourceResourceId: string;
  policyName: string;
  id: string;
}

export type MigrationStatus = 'moved' | 'planned' | 'skipped' | 'failed';

export interface MigrationOutcome {
  item: string;
  sourceName: string;
  status: MigrationStatus;
  message: string;
}

export interface MigrationRequest {
  source: VaultRef;
  target: VaultRef;
  targetPolicy: string;
  /** Source names (VM names) or protected item names; every item when omitted */
  items?: string[];
}

export interface MigrationOptions {
  dryRun: boolean;
  /** Attempts to protect an item in the target while the source deletion settles */
  protectAttempts?: number;
  protectIntervalMs?: number;
}

const COMPONENT = 'backup-vault';
const MOVABLE_MANAGEMENT_TYPE = 'AzureIaasVM';
const VM_ITEM_TYPE = 'Microsoft.Compute/virtualMachines';
const DEFAULT_PROTECT_ATTEMPTS = 10;
const DEFAULT_PROTECT_INTERVAL_MS = 30000;

function segmentAfter(types: readonly string[], names: readonly string[], type: string): string | undefined {
  const index = types.findIndex(t => t.toLowerCase() === type.toLowerCase());
  return index >= 0 ? names[index] : undefined;
}

export function toProtectedItemSummary(item: ProtectedItemResource): ProtectedItemSummary {
  const id = item.id ?? '';
  const { types, names } = parseResourceId(id);
  const properties = item.properties;
  const sourceResourceId = properties?.sourceResourceId ?? '';
  const policyId = properties?.policyId;

  return {
    name: item.name ?? segmentAfter(types, names, 'protectedItems') ?? '',
    sourceName: parseResourceId(sourceResourceId).name ?? '',
    fabricName: segmentAfter(types, names, 'backupFabrics') ?? 'Azure',
    containerName: segmentAfter(types, names, 'protectionContainers') ?? properties?.containerName ?? '',
    backupManagementType: properties?.backupManagementType ?? '',
    workloadType: properties?.workloadType ?? '',
    protectedItemType: properties?.protectedItemType ?? '',
    sourceResourceId,
    policyName: policyId ? parseResourceId(policyId).name ?? '' : '',
    id,
  };
}

export async function listProtectedItems(backup: RecoveryServicesBackupClient, vault: VaultRef): Promise<ProtectedItemSummary[]> {
  const items: ProtectedItemSummary[] = [];
  for await (const item of backup.backupProtectedItems.list(vault.vaultName, vault.resourceGroup)) {
    items.push(toProtectedItemSummary(item));
  }
  return items;
}

export function selectItems(items: readonly ProtectedItemSummary[], wanted: readonly string[] | undefined): ProtectedItemSummary[] {
  if (!wanted || wanted.length === 0) {
    return [...items];
  }
  const names = new Set(wanted.map(name => name.toLowerCase()));
  const selected = items.filter(item => names.has(item.sourceName.toLowerCase()) || names.has(item.name.toLowerCase()));
  const found = new Set(selected.flatMap(item => [item.sourceName.toLowerCase(), item.name.toLowerCase()]));
  const missing = wanted.filter(name => !found.has(name.toLowerCase()));
  if (missing.length > 0) {
    throw new ValidationError(`Not protected in the source vault: ${missing.join(', ')}`, { items: missing });
  }
  return selected;
}

async function targetPolicyId(backup: RecoveryServicesBackupClient, target: VaultRef, policyName: string): Promise<string> {
  const policy = await backup.protectionPolicies.get(target.vaultName, target.resourceGroup, policyName);
  return policy.id ??
    resourceId(backup.subscriptionId, target.resourceGroup, 'Microsoft.RecoveryServices', 'vaults', target.vaultName, 'backupPolicies', policyName);
}

async function moveOne(
  backup: RecoveryServicesBackupClient,
  request: MigrationRequest,
  item: ProtectedItemSummary,
  policyId: string,
  options: MigrationOptions
): Promise<MigrationOutcome> {
  const { source, target } = request;
  const outcome = (status: MigrationStatus, message: string): MigrationOutcome => ({
    item: item.name,
    sourceName: item.sourceName,
    status,
    message,
  });

  logger.info(`Stopping protection of ${item.sourceName} in ${source.vaultName}`, undefined, COMPONENT);
  try {
    await backup.protectedItems.delete(source.vaultName, source.resourceGroup, item.fabricName, item.containerName, item.name);
  } catch (error) {
    const { message } = readRestErrorFields(error);
    logger.error(`Stopping protection of ${item.sourceName} failed`, { error: message }, COMPONENT);
    return outcome('failed', `${message} (still protected in ${source.vaultName})`);
  }

  try {
    await retry(
      () =>
        backup.protectedItems.createOrUpdate(target.vaultName, target.resourceGroup, item.fabricName, item.containerName, item.name, {
          properties: { protectedItemType: VM_ITEM_TYPE, sourceResourceId: item.sourceResourceId, policyId },
        }),
      linearRetry(options.protectAttempts ?? DEFAULT_PROTECT_ATTEMPTS, options.protectIntervalMs ?? DEFAULT_PROTECT_INTERVAL_MS),
      `Protect ${item.sourceName} in ${target.vaultName}`
    );
  } catch (error) {
    const { message } = readRestErrorFields(error);
    logger.error(`Protecting ${item.sourceName} in ${target.vaultName} failed`, { error: message }, COMPONENT);
    return outcome('failed', `${message} (protection was removed from ${source.vaultName}; ${item.sourceName} is unprotected)`);
  }

  return outcome('moved', `Protected in ${target.vaultName} with policy ${request.targetPolicy}`);
}

/**
 * One item at a time; a failure on one does not stop the rest
 */
export async function migrateProtectedItems(
  backup: RecoveryServicesBackupClient,
  request: MigrationRequest,
  options: MigrationOptions
): Promise<MigrationOutcome[]> {
  const { source, target } = request;
  if (source.vaultName.toLowerCase() === target.vaultName.toLowerCase() && source.resourceGroup.toLowerCase() === target.resourceGroup.toLowerCase()) {
    throw new ValidationError('Source and target vault are the same');
  }

  const policyId = await targetPolicyId(backup, target, request.targetPolicy);
  const items = selectItems(await listProtectedItems(backup, source), request.items);
  const movable = items.filter(item => item.backupManagementType === MOVABLE_MANAGEMENT_TYPE);

  if (!options.dryRun && movable.length > 0) {
    // Lets the target vault discover VMs it has not seen before
    await backup.protectionContainers.refresh(target.vaultName, target.resourceGroup, movable[0].fabricName);
  }

  const outcomes: MigrationOutcome[] = [];
  for (const item of items) {
    if (item.backupManagementType !== MOVABLE_MANAGEMENT_TYPE) {
      outcomes.push({
        item: item.name,
        sourceName: item.sourceName,
        status: 'skipped',
        message: `Only Azure VM backups can be moved; ${item.backupManagementType || 'this item'} stays in ${source.vaultName}`,
      });
    } else if (options.dryRun) {
      outcomes.push({
        item: item.name,
        sourceName: item.sourceName,
        status: 'planned',
        message: `Dry run: would stop protection and delete backup data in ${source.vaultName}, then protect in ${target.vaultName} with policy ${request.targetPolicy}`,
      });
    } else {
      outcomes.push(await moveOne(backup, request, item, policyId, options));
    }
  }
  return outcomes;
}

export function renderItemsMarkdown(vault: VaultRef, items: readonly ProtectedItemSummary[]): string {
  let md = `# Protected Items in ${vault.vaultName}\n\n${items.length} item(s)\n\n`;
  md += `| Source | Workload | Management Type | Policy | Container |\n|---|---|---|---|---|\n`;
  for (const item of items) {
    md += `| ${item.sourceName} | ${item.workloadType} | ${item.backupManagementType} | ${item.policyName} | ${item.containerName} |\n`;
  }
  return md;
}

export function renderMigrationMarkdown(request: MigrationRequest, outcomes: readonly MigrationOutcome[], dryRun: boolean): string {
  let md = `# Backup Vault Migration${dryRun ? ' (dry run)' : ''}\n\n`;
  md += `${request.source.vaultName} → ${request.target.vaultName} (policy ${request.targetPolicy})\n\n`;
  md += `| Source | Result | Detail |\n|---|---|---|\n`;
  for (const o of outcomes) {
    md += `| ${o.sourceName} | ${o.status} | ${o.message} |\n`;
  }
  return md;
}
