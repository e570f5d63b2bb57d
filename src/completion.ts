/**
 * Argument completion for MCP clients
 */

import { INVENTORY_FORMATS } from './inventory.js';
import { RESPONSE_FORMATS } from './format.js';
import { ALL_TEST_CASES } from './rbac/catalog.js';
import { REPORT_FORMATS } from './rbac/exporter.js';
import { TEST_MODULES } from './rbac/types.js';
import { AZURE_LOCATIONS, COMMON_LOCATIONS } from './validation.js';

export interface Completion {
  values: string[];
  total: number;
  hasMore: boolean;
}

const MAX_VALUES = 20;

function complete(candidates: readonly string[], partial: string): Completion {
  const prefix = partial.toLowerCase();
  const suggestions = candidates.filter(c => c.toLowerCase().startsWith(prefix));
  return {
    values: suggestions.slice(0, MAX_VALUES),
    total: suggestions.length,
    hasMore: suggestions.length > MAX_VALUES,
  };
}

/**
 * Completions for a comma-separated list complete the last item
 */
function completeListItem(candidates: readonly string[], partial: string): Completion {
  const items = partial.split(',');
  const last = items.pop() ?? '';
  const chosen = items.map(i => i.trim().toLowerCase());
  const head = items.length > 0 ? `${items.join(',')},` : '';
  const result = complete(candidates.filter(c => !chosen.includes(c.toLowerCase())), last.trim());
  return { ...result, values: result.values.map(v => head + v) };
}

export function getCompletions(argumentName: string, value: string): Completion {
  switch (argumentName) {
    // Never suggest real subscription IDs
    case 'subscriptionId':
      return { values: ['<your-subscription-id>'], total: 1, hasMore: false };
    case 'location':
      return complete([...COMMON_LOCATIONS, 'all', 'common'], value);
    case 'region':
      return complete(AZURE_LOCATIONS, value);
    case 'format':
      return complete(RESPONSE_FORMATS, value);
    case 'outputFormat':
      return complete(INVENTORY_FORMATS, value);
    case 'reportFormats':
      return completeListItem(REPORT_FORMATS, value);
    case 'modules':
      return completeListItem(TEST_MODULES, value);
    case 'testIds':
      return completeListItem(ALL_TEST_CASES.map(t => t.id), value);
    // Policies every new Recovery Services vault starts with
    case 'policyName':
      return complete(['DefaultPolicy', 'EnhancedPolicy'], value);
    default:
      return { values: [], total: 0, hasMore: false };
  }
}
