/**
 * ARM resource ID parsing and building
 */

export interface ParsedResourceId {
  subscriptionId?: string;
  resourceGroup?: string;
  provider?: string;
  /** Type segments after the provider, e.g. ["virtualNetworks", "subnets"] */
  types: string[];
  /** Name segments matching `types` */
  names: string[];
  name?: string;
}

/**
 * Parse "/subscriptions/{s}/resourceGroups/{rg}/providers/{ns}/{type}/{name}[/{childType}/{childName}]"
 */
export function parseResourceId(id: string): ParsedResourceId {
  const segments = id.split('/').filter(s => s.length > 0);
  const parsed: ParsedResourceId = { types: [], names: [] };

  let i = 0;
  while (i < segments.length) {
    const key = segments[i].toLowerCase();
    if (key === 'subscriptions' && i + 1 < segments.length) {
      parsed.subscriptionId = segments[i + 1];
      i += 2;
    } else if (key === 'resourcegroups' && i + 1 < segments.length) {
      parsed.resourceGroup = segments[i + 1];
      i += 2;
    } else if (key === 'providers' && i + 1 < segments.length) {
      parsed.provider = segments[i + 1];
      i += 2;
      while (i + 1 < segments.length) {
        parsed.types.push(segments[i]);
        parsed.names.push(segments[i + 1]);
        i += 2;
      }
      break;
    } else {
      i++;
    }
  }

  parsed.name = parsed.names[parsed.names.length - 1];
  return parsed;
}

export function subscriptionScope(subscriptionId: string): string {
  return `/subscriptions/${subscriptionId}`;
}

export function resourceGroupScope(subscriptionId: string, resourceGroup: string): string {
  return `${subscriptionScope(subscriptionId)}/resourceGroups/${resourceGroup}`;
}

/**
 * ID of a resource in a resource group; `path` alternates type and name segments
 */
export function resourceId(
  subscriptionId: string,
  resourceGroup: string,
  provider: string,
  ...path: string[]
): string {
  return `${resourceGroupScope(subscriptionId, resourceGroup)}/providers/${provider}/${path.join('/')}`;
}

export function roleDefinitionResourceId(subscriptionId: string, roleDefinitionGuid: string): string {
  return `${subscriptionScope(subscriptionId)}/providers/Microsoft.Authorization/roleDefinitions/${roleDefinitionGuid}`;
}
