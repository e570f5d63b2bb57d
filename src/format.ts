/**
 * Tool response formatting: markdown (default) or a JSON envelope
 */

import { ValidationError } from './errors.js';

export type ResponseFormat = 'markdown' | 'json';

export const RESPONSE_FORMATS: readonly ResponseFormat[] = ['markdown', 'json'];

export function parseResponseFormat(format: string | undefined): ResponseFormat {
  const value = (format || 'markdown').toLowerCase();
  if (value !== 'markdown' && value !== 'json') {
    throw new ValidationError(`Invalid format: ${format}. Must be 'markdown' or 'json'.`, { provided: format });
  }
  return value;
}

/**
 * Markdown mode returns strings unchanged; JSON mode wraps the data with tool name and timestamp
 */
export function formatResponse(data: unknown, format: string | undefined, toolName: string): string {
  if (parseResponseFormat(format) === 'json') {
    return JSON.stringify({
      tool: toolName,
      format: 'json',
      timestamp: new Date().toISOString(),
      data: typeof data === 'string' ? { markdownOutput: data } : data,
    }, null, 2);
  }

  return typeof data === 'string' ? data : JSON.stringify(data, null, 2);
}
