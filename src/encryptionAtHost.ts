/**
 * Encryption at host: report it per VM and turn it on
 *
 * The setting can only change while the VM is deallocated, so enabling it on a
 * running VM means deallocate → update → start.
 */

import type { ComputeManagementClient, VirtualMachine, VirtualMachineInstanceView } from '@azure/arm-compute';
import { parseResourceId } from './azure/resourceId.js';
import { readRestErrorFields } from './errors.js';
import { logger } from './logging.js';

export interface VmEncryptionStatus {
  name: string;
  resourceGroup: string;
  location: string;
  size: string;
  powerState: string;
  encryptionAtHost: boolean;
  id: string;
}

export type EnableStatus = 'enabled' | 'already-enabled' | 'planned' | 'failed';

export interface EnableOutcome {
  name: string;
  resourceGroup: string;
  status: EnableStatus;
  wasRunning: boolean;
  message: string;
}

export interface EnableTarget {
  resourceGroup: string;
  /** Every VM in the resource group when omitted */
  vmName?: string;
}

const COMPONENT = 'encryption-at-host';

/**
 * "running", "deallocated", "stopped"... from the PowerState/* status code
 */
export function powerStateOf(view: VirtualMachineInstanceView | undefined): string {
  const code = view?.statuses?.find(s => s.code?.startsWith('PowerState/'))?.code;
  return code ? code.slice('PowerState/'.length) : 'unknown';
}

export function toEncryptionStatus(vm: VirtualMachine, view?: VirtualMachineInstanceView): VmEncryptionStatus {
  const id = vm.id ?? '';
  return {
    name: vm.name ?? '',
    resourceGroup: parseResourceId(id).resourceGroup ?? '',
    location: vm.location,
    size: vm.hardwareProfile?.vmSize ?? '',
    powerState: powerStateOf(view ?? vm.instanceView),
    encryptionAtHost: vm.securityProfile?.encryptionAtHost === true,
    id,
  };
}

export async function listEncryptionStatus(compute: ComputeManagementClient, resourceGroup?: string): Promise<VmEncryptionStatus[]> {
  const vms = resourceGroup ? compute.virtualMachines.list(resourceGroup) : compute.virtualMachines.listAll();
  const statuses: VmEncryptionStatus[] = [];

  for await (const vm of vms) {
    const partial = toEncryptionStatus(vm);
    const view = await compute.virtualMachines.instanceView(partial.resourceGroup, partial.name);
    statuses.push(toEncryptionStatus(vm, view));
  }
  return statuses;
}

async function targetStatuses(compute: ComputeManagementClient, target: EnableTarget): Promise<VmEncryptionStatus[]> {
  if (!target.vmName) {
    return listEncryptionStatus(compute, target.resourceGroup);
  }
  const vm = await compute.virtualMachines.get(target.resourceGroup, target.vmName, { expand: 'instanceView' });
  return [toEncryptionStatus(vm)];
}

export function planSteps(status: VmEncryptionStatus): string[] {
  const steps: string[] = [];
  if (status.powerState !== 'deallocated') steps.push('deallocate');
  steps.push('enable encryption at host');
  if (status.powerState === 'running') steps.push('start');
  return steps;
}

async function enableOne(compute: ComputeManagementClient, status: VmEncryptionStatus, dryRun: boolean): Promise<EnableOutcome> {
  const { name, resourceGroup } = status;
  const wasRunning = status.powerState === 'running';
  const outcome = (result: EnableStatus, message: string): EnableOutcome => ({ name, resourceGroup, status: result, wasRunning, message });

  if (status.encryptionAtHost) {
    return outcome('already-enabled', 'Encryption at host already enabled');
  }

  const steps = planSteps(status);
  if (dryRun) {
    return outcome('planned', `Dry run: would ${steps.join(', then ')}`);
  }

  let deallocated = false;
  try {
    if (status.powerState !== 'deallocated') {
      logger.info(`Deallocating ${name}`, undefined, COMPONENT);
      await compute.virtualMachines.beginDeallocateAndWait(resourceGroup, name);
      deallocated = true;
    }

    logger.info(`Enabling encryption at host on ${name}`, undefined, COMPONENT);
    await compute.virtualMachines.beginUpdateAndWait(resourceGroup, name, {
      securityProfile: { encryptionAtHost: true },
    });

    if (wasRunning) {
      logger.info(`Starting ${name}`, undefined, COMPONENT);
      await compute.virtualMachines.beginStartAndWait(resourceGroup, name);
    }
    return outcome('enabled', wasRunning ? 'Encryption at host enabled; VM started again' : 'Encryption at host enabled');
  } catch (error) {
    const { message } = readRestErrorFields(error);
    logger.error(`Enabling encryption at host on ${name} failed`, { error: message }, COMPONENT);

    if (deallocated && wasRunning) {
      try {
        await compute.virtualMachines.beginStartAndWait(resourceGroup, name);
        return outcome('failed', `${message} (VM started again)`);
      } catch (startError) {
        const startMessage = readRestErrorFields(startError).message;
        logger.error(`Restarting ${name} failed; it is left deallocated`, { error: startMessage }, COMPONENT);
        return outcome('failed', `${message} (restart failed, VM left deallocated: ${startMessage})`);
      }
    }
    return outcome('failed', message);
  }
}

/**
 * One VM at a time; a failure on one does not stop the rest
 */
export async function enableEncryptionAtHost(
  compute: ComputeManagementClient,
  target: EnableTarget,
  options: { dryRun: boolean }
): Promise<EnableOutcome[]> {
  const outcomes: EnableOutcome[] = [];
  for (const status of await targetStatuses(compute, target)) {
    outcomes.push(await enableOne(compute, status, options.dryRun));
  }
  return outcomes;
}

export function renderStatusMarkdown(statuses: readonly VmEncryptionStatus[]): string {
  const enabled = statuses.filter(s => s.encryptionAtHost).length;
  let md = `# Encryption at Host\n\n${enabled} of ${statuses.length} VM(s) have encryption at host enabled\n\n`;
  md += `| VM | Resource Group | Location | Size | Power State | Encryption at Host |\n|---|---|---|---|---|---|\n`;
  for (const s of statuses) {
    md += `| ${s.name} | ${s.resourceGroup} | ${s.location} | ${s.size} | ${s.powerState} | ${s.encryptionAtHost ? 'enabled' : 'disabled'} |\n`;
  }
  return md;
}

export function renderOutcomesMarkdown(outcomes: readonly EnableOutcome[], dryRun: boolean): string {
  let md = `# Enable Encryption at Host${dryRun ? ' (dry run)' : ''}\n\n`;
  md += `| VM | Resource Group | Result | Detail |\n|---|---|---|---|\n`;
  for (const o of outcomes) {
    md += `| ${o.name} | ${o.resourceGroup} | ${o.status} | ${o.message} |\n`;
  }
  return md;
}
