/**
 * Input validation for CLI options, environment variables and MCP tool arguments
 */

import { join } from 'path';
import { ValidationError } from './errors.js';
import { CONFIG_DIR, readJsonFile } from './paths.js';

/**
 * Azure resource ID patterns for validation
 */
export const AZURE_PATTERNS = {
  subscriptionId: /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
  resourceGroup: /^[-\w._()]+$/,
  resourceName: /^[a-zA-Z0-9][-a-zA-Z0-9._]{0,78}[a-zA-Z0-9]$/,
  location: /^[a-z0-9]+$/,
  testId: /^(AUTH|NET)-\d{3}$/,
  // Becomes part of the storage account name (st + run ID, at most 24 characters)
  runId: /^[a-z0-9]{4,22}$/,
  resourceType: /^[A-Za-z0-9.]+\/[A-Za-z0-9./]+$/,
  // VM name or protected item name such as VM;iaasvmcontainerv2;rg-app;vm-web
  backupItem: /^[A-Za-z0-9][-A-Za-z0-9._;]{0,199}$/,
};

interface LocationCatalog {
  all: string[];
  common: string[];
}

function loadLocations(): LocationCatalog {
  const raw = readJsonFile(join(CONFIG_DIR, 'locations.json'));
  const isStringArray = (value: unknown): value is string[] =>
    Array.isArray(value) && value.every(item => typeof item === 'string');

  if (raw && typeof raw === 'object' && 'all' in raw && 'common' in raw && isStringArray(raw.all) && isStringArray(raw.common)) {
    return { all: raw.all, common: raw.common };
  }
  throw new ValidationError('config/locations.json must contain "all" and "common" string arrays');
}

const LOCATIONS = loadLocations();

// All Azure regions/locations
export const AZURE_LOCATIONS: readonly string[] = LOCATIONS.all;

// Common Azure locations (most used)
export const COMMON_LOCATIONS: readonly string[] = LOCATIONS.common;

/**
 * Resolve a location filter: undefined = no filter, "all", "common", or a comma list
 */
export function resolveLocations(location?: string): string[] | null {
  if (!location) return null;
  if (location.toLowerCase() === "all") return [...AZURE_LOCATIONS];
  if (location.toLowerCase() === "common") return [...COMMON_LOCATIONS];
  return location.split(",").map(l => l.trim().toLowerCase());
}

export function filterByLocation<T extends { location?: string }>(resources: T[], locations: string[] | null): T[] {
  if (!locations) return resources;
  return resources.filter(r => r.location && locations.includes(r.location.toLowerCase()));
}

export interface ValidateInputOptions {
  required?: boolean;
  maxLength?: number;
  pattern?: RegExp;
  patternName?: string;
  allowedValues?: readonly string[];
}

/**
 * Validate generic string input with sanitization
 */
export function validateInput(input: string | undefined, options: ValidateInputOptions = {}): string | undefined {
  if (input === undefined || input === null || input === '') {
    if (options.required) {
      throw new ValidationError(`Required input is missing${options.patternName ? `: ${options.patternName}` : ''}`, { field: options.patternName ?? 'input' });
    }
    return undefined;
  }

  // Sanitize: trim and remove control characters
  const sanitized = input.toString().trim().replace(/[\x00-\x1f\x7f]/g, '');

  const maxLen = options.maxLength || 1000;
  if (sanitized.length > maxLen) {
    throw new ValidationError(
      `Input exceeds maximum length of ${maxLen} characters`,
      { provided: sanitized.length, maxLength: maxLen }
    );
  }

  if (options.allowedValues && !options.allowedValues.includes(sanitized)) {
    throw new ValidationError(
      `Invalid value: ${sanitized}. Allowed: ${options.allowedValues.join(', ')}`,
      { provided: sanitized, allowed: options.allowedValues }
    );
  }

  if (options.pattern && !options.pattern.test(sanitized)) {
    const name = options.patternName || 'input';
    throw new ValidationError(
      `Invalid ${name} format: ${sanitized}`,
      { provided: sanitized, pattern: options.pattern.toString() }
    );
  }

  return sanitized;
}

export function validateSubscriptionId(subscriptionId: string | undefined, required: boolean = true): string | undefined {
  return validateInput(subscriptionId, {
    required,
    pattern: AZURE_PATTERNS.subscriptionId,
    patternName: 'subscription ID',
    maxLength: 36,
  });
}

/**
 * Validate a single region against the known location list
 */
export function validateRegion(region: string | undefined): string | undefined {
  if (!region) return undefined;

  const sanitized = region.trim().toLowerCase();
  if (!AZURE_PATTERNS.location.test(sanitized)) {
    throw new ValidationError(`Invalid Azure location format: ${region}`, { provided: region });
  }
  if (!AZURE_LOCATIONS.includes(sanitized)) {
    throw new ValidationError(
      `Unknown Azure location: ${region}. Use one of: ${COMMON_LOCATIONS.slice(0, 5).join(', ')}...`,
      { provided: region }
    );
  }
  return sanitized;
}

/**
 * Validate a location filter ("all", "common" or a comma list)
 */
export function validateLocationFilter(location: string | undefined): string | undefined {
  if (!location) return undefined;

  const sanitized = location.trim().toLowerCase();
  if (sanitized === 'all' || sanitized === 'common') {
    return sanitized;
  }

  sanitized.split(',').map(l => l.trim()).forEach(loc => validateRegion(loc));
  return sanitized;
}

export function validateResourceGroup(resourceGroup: string | undefined, required: boolean = false): string | undefined {
  return validateInput(resourceGroup, {
    required,
    maxLength: 90,
    pattern: AZURE_PATTERNS.resourceGroup,
    patternName: 'resource group',
  });
}

export function validateResourceName(resourceName: string | undefined, required: boolean = false): string | undefined {
  return validateInput(resourceName, {
    required,
    maxLength: 80,
    pattern: AZURE_PATTERNS.resourceName,
    patternName: 'resource name',
  });
}

/**
 * Validate a comma-separated list against allowed values, de-duplicated in input order
 */
export function validateList<T extends string>(
  input: string | undefined,
  allowed: readonly T[],
  name: string
): T[] | undefined {
  if (!input) return undefined;

  const values: T[] = [];
  for (const part of input.split(',')) {
    const value = part.trim().toLowerCase();
    if (!value) continue;
    const match = allowed.find(a => a.toLowerCase() === value);
    if (!match) {
      throw new ValidationError(
        `Invalid ${name}: ${part.trim()}. Allowed: ${allowed.join(', ')}`,
        { provided: part.trim(), allowed }
      );
    }
    if (!values.includes(match)) values.push(match);
  }
  return values;
}

export function validateTestIds(input: string | undefined): string[] | undefined {
  if (!input) return undefined;
  return input.split(',').map(id => id.trim().toUpperCase()).filter(id => id.length > 0).map(id => {
    if (!AZURE_PATTERNS.testId.test(id)) {
      throw new ValidationError(`Invalid test ID: ${id}. Expected AUTH-NNN or NET-NNN`, { provided: id });
    }
    return id;
  });
}

export function validateBackupItems(input: string | undefined): string[] | undefined {
  if (!input) return undefined;
  const items = input.split(',').map(item => item.trim()).filter(item => item.length > 0);
  for (const item of items) {
    if (!AZURE_PATTERNS.backupItem.test(item)) {
      throw new ValidationError(`Invalid backup item: ${item}`, { provided: item });
    }
  }
  return items;
}

/**
 * Run ID of an earlier, kept run; lowercased
 */
export function validateRunId(input: string | undefined): string | undefined {
  return validateInput(input?.trim().toLowerCase(), {
    maxLength: 22,
    pattern: AZURE_PATTERNS.runId,
    patternName: 'run ID',
  });
}

export function validatePositiveInt(input: string | number | undefined, name: string, fallback: number): number {
  if (input === undefined || input === '') return fallback;
  const value = typeof input === 'number' ? input : Number(input);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got: ${input}`, { field: name, provided: input });
  }
  return value;
}
