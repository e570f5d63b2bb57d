/**
 * Resource inventory export
 */

import { writeFileSync } from 'fs';
import type { GenericResourceExpanded, ResourceManagementClient } from '@azure/arm-resources';
import { createObjectCsvStringifier, createObjectCsvWriter } from 'csv-writer';
import { parseResourceId } from './azure/resourceId.js';
import { logger } from './logging.js';
import { filterByLocation, resolveLocations } from './validation.js';

export type InventoryFormat = 'csv' | 'json';

export const INVENTORY_FORMATS: readonly InventoryFormat[] = ['csv', 'json'];

// Type alias: csv-writer records need an index signature
export type InventoryRow = {
  name: string;
  type: string;
  resourceGroup: string;
  location: string;
  sku: string;
  kind: string;
  tags: string;
  id: string;
};

export interface InventoryQuery {
  resourceGroup?: string;
  resourceType?: string;
  /** "all", "common" or a comma-separated list */
  location?: string;
}

export const INVENTORY_CSV_HEADER = [
  { id: 'name', title: 'Name' },
  { id: 'type', title: 'Type' },
  { id: 'resourceGroup', title: 'Resource Group' },
  { id: 'location', title: 'Location' },
  { id: 'sku', title: 'SKU' },
  { id: 'kind', title: 'Kind' },
  { id: 'tags', title: 'Tags' },
  { id: 'id', title: 'ID' },
];

export function formatTags(tags: Record<string, string> | undefined): string {
  if (!tags) return '';
  return Object.entries(tags).map(([key, value]) => `${key}=${value}`).join(';');
}

export function toInventoryRow(resource: GenericResourceExpanded): InventoryRow {
  const id = resource.id ?? '';
  return {
    name: resource.name ?? '',
    type: resource.type ?? '',
    resourceGroup: id ? parseResourceId(id).resourceGroup ?? '' : '',
    location: resource.location ?? '',
    sku: resource.sku?.name ?? '',
    kind: resource.kind ?? '',
    tags: formatTags(resource.tags),
    id,
  };
}

export async function collectInventory(client: ResourceManagementClient, query: InventoryQuery = {}): Promise<InventoryRow[]> {
  const filter = query.resourceType ? `resourceType eq '${query.resourceType}'` : undefined;
  const pages = query.resourceGroup
    ? client.resources.listByResourceGroup(query.resourceGroup, { filter })
    : client.resources.list({ filter });

  const rows: InventoryRow[] = [];
  for await (const resource of pages) {
    rows.push(toInventoryRow(resource));
  }

  const filtered = filterByLocation(rows, resolveLocations(query.location));
  logger.info(`Inventory: ${filtered.length} of ${rows.length} resource(s) after location filter`, undefined, 'inventory');
  return filtered;
}

export function summarizeByType(rows: readonly InventoryRow[]): Record<string, number> {
  return rows.reduce<Record<string, number>>((acc, row) => {
    acc[row.type] = (acc[row.type] ?? 0) + 1;
    return acc;
  }, {});
}

export function renderInventory(rows: readonly InventoryRow[], format: InventoryFormat): string {
  if (format === 'json') {
    return JSON.stringify(rows, null, 2);
  }
  const stringifier = createObjectCsvStringifier({ header: INVENTORY_CSV_HEADER });
  return stringifier.getHeaderString() + stringifier.stringifyRecords([...rows]);
}

/**
 * Write rows to a file in the given format
 */
export async function exportInventory(rows: readonly InventoryRow[], format: InventoryFormat, outputFile: string): Promise<void> {
  if (format === 'csv') {
    const csvWriter = createObjectCsvWriter({ path: outputFile, header: INVENTORY_CSV_HEADER });
    await csvWriter.writeRecords([...rows]);
  } else {
    writeFileSync(outputFile, renderInventory(rows, format), 'utf-8');
  }
  logger.info(`Inventory written: ${outputFile}`, { rows: rows.length }, 'inventory');
}
