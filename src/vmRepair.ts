/**
 * VM repair: work on a broken VM's OS disk from a rescue VM, then swap the repaired copy back
 *
 * `createRepair` snapshots the OS disk, makes a managed disk from the snapshot and attaches it
 * to the rescue VM as a data disk. `restoreRepair` detaches that disk, deallocates the broken VM,
 * makes the disk its OS disk and starts the VM again if it was running. The original OS disk and
 * the snapshot are never deleted.
 */

import type { ComputeManagementClient, DataDisk, VirtualMachine } from '@azure/arm-compute';
import { parseResourceId, resourceId } from './azure/resourceId.js';
import { powerStateOf } from './encryptionAtHost.js';
import { readRestErrorFields, ValidationError } from './errors.js';
import { logger } from './logging.js';

export interface RepairTarget {
  resourceGroup: string;
  vmName: string;
  rescueVmName: string;
  /** Defaults to the broken VM's resource group */
  rescueResourceGroup?: string;
}

export interface RestoreTarget extends RepairTarget {
  repairDiskName: string;
}

export type RepairStatus = 'attached' | 'restored' | 'planned' | 'failed';

export interface RepairOutcome {
  vmName: string;
  resourceGroup: string;
  rescueVmName: string;
  status: RepairStatus;
  repairDiskName: string;
  snapshotName?: string;
  lun?: number;
  /** Steps carried out; on a dry run, the steps that would be */
  steps: string[];
  message: string;
}

const COMPONENT = 'vm-repair';
const DISK_TYPE = 'disks';

/**
 * Snapshot and disk names for a repair started at `now`
 */
export function repairNames(vmName: string, now: Date = new Date()): { snapshotName: string; repairDiskName: string } {
  const stamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return {
    snapshotName: `${vmName}-os-snapshot-${stamp}`,
    repairDiskName: `${vmName}-os-repair-${stamp}`,
  };
}

export function nextFreeLun(dataDisks: readonly DataDisk[] | undefined): number {
  const used = new Set((dataDisks ?? []).map(disk => disk.lun));
  let lun = 0;
  while (used.has(lun)) lun++;
  return lun;
}

function managedOsDiskId(vm: VirtualMachine): string {
  const id = vm.storageProfile?.osDisk?.managedDisk?.id;
  if (!id) {
    throw new ValidationError(`VM ${vm.name ?? ''} has no managed OS disk`, { vm: vm.name });
  }
  return id;
}

function sameZones(a: readonly string[] | undefined, b: readonly string[] | undefined): boolean {
  return [...(a ?? [])].sort().join(',') === [...(b ?? [])].sort().join(',');
}

function isDisk(disk: DataDisk, name: string): boolean {
  const id = disk.managedDisk?.id;
  return id !== undefined && parseResourceId(id).name?.toLowerCase() === name.toLowerCase();
}

function failureMessage(error: unknown, steps: readonly string[]): string {
  const { message } = readRestErrorFields(error);
  return steps.length > 0 ? `${message} (completed: ${steps.join('; ')})` : message;
}

export async function createRepair(
  compute: ComputeManagementClient,
  target: RepairTarget,
  options: { dryRun: boolean; now?: Date }
): Promise<RepairOutcome> {
  const { resourceGroup, vmName, rescueVmName } = target;
  const rescueGroup = target.rescueResourceGroup ?? resourceGroup;
  const { snapshotName, repairDiskName } = repairNames(vmName, options.now);

  const vm = await compute.virtualMachines.get(resourceGroup, vmName);
  const rescue = await compute.virtualMachines.get(rescueGroup, rescueVmName);
  if (rescue.location !== vm.location) {
    throw new ValidationError(`Rescue VM ${rescueVmName} is in ${rescue.location}, not ${vm.location} like ${vmName}`);
  }
  // The copy is made in the rescue VM's zone and later becomes the broken VM's OS disk
  if (!sameZones(rescue.zones, vm.zones)) {
    throw new ValidationError(`Rescue VM ${rescueVmName} must be in the same availability zone as ${vmName}`);
  }

  const osDiskId = managedOsDiskId(vm);
  const osDisk = parseResourceId(osDiskId);
  const lun = nextFreeLun(rescue.storageProfile?.dataDisks);
  const plan = [
    `snapshot OS disk ${osDisk.name ?? osDiskId} as ${snapshotName}`,
    `create disk ${repairDiskName} from the snapshot`,
    `attach ${repairDiskName} to ${rescueVmName} at LUN ${lun}`,
  ];
  const outcome = (status: RepairStatus, steps: string[], message: string): RepairOutcome => ({
    vmName,
    resourceGroup,
    rescueVmName,
    status,
    repairDiskName,
    snapshotName,
    lun,
    steps,
    message,
  });

  if (options.dryRun) {
    return outcome('planned', plan, `Dry run: would ${plan.join(', then ')}`);
  }

  const steps: string[] = [];
  try {
    const source = await compute.disks.get(osDisk.resourceGroup ?? resourceGroup, osDisk.name ?? '');

    logger.info(`Snapshotting the OS disk of ${vmName}`, { snapshot: snapshotName }, COMPONENT);
    const snapshot = await compute.snapshots.beginCreateOrUpdateAndWait(resourceGroup, snapshotName, {
      location: vm.location,
      creationData: { createOption: 'Copy', sourceResourceId: osDiskId },
      tags: { repairOf: vmName },
    });
    steps.push(plan[0]);

    logger.info(`Creating repair disk ${repairDiskName}`, undefined, COMPONENT);
    const disk = await compute.disks.beginCreateOrUpdateAndWait(resourceGroup, repairDiskName, {
      location: vm.location,
      zones: vm.zones,
      sku: source.sku,
      hyperVGeneration: source.hyperVGeneration,
      creationData: {
        createOption: 'Copy',
        sourceResourceId: snapshot.id ?? resourceId(compute.subscriptionId, resourceGroup, 'Microsoft.Compute', 'snapshots', snapshotName),
      },
      tags: { repairOf: vmName },
    });
    steps.push(plan[1]);

    logger.info(`Attaching ${repairDiskName} to ${rescueVmName}`, { lun }, COMPONENT);
    await compute.virtualMachines.beginUpdateAndWait(rescueGroup, rescueVmName, {
      storageProfile: {
        dataDisks: [
          ...(rescue.storageProfile?.dataDisks ?? []),
          {
            lun,
            name: repairDiskName,
            createOption: 'Attach',
            managedDisk: { id: disk.id ?? resourceId(compute.subscriptionId, resourceGroup, 'Microsoft.Compute', DISK_TYPE, repairDiskName) },
          },
        ],
      },
    });
    steps.push(plan[2]);

    return outcome('attached', steps, `Repair disk ${repairDiskName} is attached to ${rescueVmName} at LUN ${lun}`);
  } catch (error) {
    logger.error(`Preparing the repair of ${vmName} failed`, { error: readRestErrorFields(error).message }, COMPONENT);
    return outcome('failed', steps, failureMessage(error, steps));
  }
}

export async function restoreRepair(
  compute: ComputeManagementClient,
  target: RestoreTarget,
  options: { dryRun: boolean }
): Promise<RepairOutcome> {
  const { resourceGroup, vmName, rescueVmName, repairDiskName } = target;
  const rescueGroup = target.rescueResourceGroup ?? resourceGroup;

  const rescue = await compute.virtualMachines.get(rescueGroup, rescueVmName);
  const vm = await compute.virtualMachines.get(resourceGroup, vmName, { expand: 'instanceView' });
  const currentOsDisk = vm.storageProfile?.osDisk;
  if (!currentOsDisk) {
    throw new ValidationError(`VM ${vmName} has no OS disk profile`, { vm: vmName });
  }

  const rescueDisks = rescue.storageProfile?.dataDisks ?? [];
  const attached = rescueDisks.find(disk => isDisk(disk, repairDiskName));
  const repairDiskId =
    attached?.managedDisk?.id ?? resourceId(compute.subscriptionId, resourceGroup, 'Microsoft.Compute', DISK_TYPE, repairDiskName);
  const powerState = powerStateOf(vm.instanceView);
  const wasRunning = powerState === 'running';

  const plan: string[] = [];
  if (attached) plan.push(`detach ${repairDiskName} from ${rescueVmName}`);
  if (powerState !== 'deallocated') plan.push(`deallocate ${vmName}`);
  plan.push(`make ${repairDiskName} the OS disk of ${vmName}`);
  if (wasRunning) plan.push(`start ${vmName}`);

  const outcome = (status: RepairStatus, steps: string[], message: string): RepairOutcome => ({
    vmName,
    resourceGroup,
    rescueVmName,
    status,
    repairDiskName,
    steps,
    message,
  });

  if (options.dryRun) {
    return outcome('planned', plan, `Dry run: would ${plan.join(', then ')}`);
  }

  const steps: string[] = [];
  try {
    if (attached) {
      logger.info(`Detaching ${repairDiskName} from ${rescueVmName}`, undefined, COMPONENT);
      await compute.virtualMachines.beginUpdateAndWait(rescueGroup, rescueVmName, {
        storageProfile: { dataDisks: rescueDisks.filter(disk => disk !== attached) },
      });
      steps.push(`detach ${repairDiskName} from ${rescueVmName}`);
    }

    if (powerState !== 'deallocated') {
      logger.info(`Deallocating ${vmName}`, undefined, COMPONENT);
      await compute.virtualMachines.beginDeallocateAndWait(resourceGroup, vmName);
      steps.push(`deallocate ${vmName}`);
    }

    logger.info(`Swapping the OS disk of ${vmName}`, { from: currentOsDisk.name, to: repairDiskName }, COMPONENT);
    await compute.virtualMachines.beginUpdateAndWait(resourceGroup, vmName, {
      storageProfile: {
        osDisk: { ...currentOsDisk, name: repairDiskName, managedDisk: { id: repairDiskId } },
      },
    });
    steps.push(`make ${repairDiskName} the OS disk of ${vmName}`);

    if (wasRunning) {
      logger.info(`Starting ${vmName}`, undefined, COMPONENT);
      await compute.virtualMachines.beginStartAndWait(resourceGroup, vmName);
      steps.push(`start ${vmName}`);
    }

    return outcome('restored', steps, `${vmName} now boots from ${repairDiskName}; the previous OS disk ${currentOsDisk.name ?? ''} is kept`);
  } catch (error) {
    logger.error(`Restoring ${vmName} failed`, { error: readRestErrorFields(error).message }, COMPONENT);
    return outcome('failed', steps, failureMessage(error, steps));
  }
}

export function renderRepairMarkdown(outcome: RepairOutcome, title: string): string {
  let md = `# ${title}${outcome.status === 'planned' ? ' (dry run)' : ''}\n\n`;
  md += `| VM | Rescue VM | Repair Disk | Result |\n|---|---|---|---|\n`;
  md += `| ${outcome.vmName} | ${outcome.rescueVmName} | ${outcome.repairDiskName} | ${outcome.status} |\n\n`;
  md += `${outcome.message}\n`;
  if (outcome.steps.length > 0) {
    md += `\n${outcome.steps.map((step, index) => `${index + 1}. ${step}`).join('\n')}\n`;
  }
  return md;
}
