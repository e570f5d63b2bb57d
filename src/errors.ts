/**
 * Azure Admin Toolkit - Structured Error Handling
 *
 * Every failure surfaced by the CLI, the MCP tools and the RBAC suite's fatal
 * phases is a ToolkitError: categorized, with a severity, a stable code and a
 * remediation hint. Expected denials inside test cases are NOT errors; they are
 * classified by rbac/classifier.ts.
 */

export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  AUTHENTICATION = 'AUTHENTICATION',
  API = 'API',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMIT = 'RATE_LIMIT',
  NETWORK = 'NETWORK',
  CONFIGURATION = 'CONFIGURATION',
  INTERNAL = 'INTERNAL',
}

export enum ErrorSeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
  CRITICAL = 'CRITICAL',
}

export interface StructuredError {
  code: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details?: Record<string, unknown>;
  remediation?: string;
  timestamp: string;
  retryable: boolean;
}

/**
 * Base class for all toolkit errors
 */
export class ToolkitError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly details?: Record<string, unknown>;
  public readonly remediation?: string;
  public readonly timestamp: string;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    retryable: boolean = false,
    details?: Record<string, unknown>,
    remediation?: string
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.details = details;
    this.remediation = remediation;
    this.timestamp = new Date().toISOString();
    this.retryable = retryable;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): StructuredError {
    return {
      code: this.code,
      category: this.category,
      severity: this.severity,
      message: this.message,
      details: this.details,
      remediation: this.remediation,
      timestamp: this.timestamp,
      retryable: this.retryable,
    };
  }

  toString(): string {
    return `[${this.severity}] ${this.category}/${this.code}: ${this.message}${this.remediation ? `\nRemediation: ${this.remediation}` : ''}`;
  }
}

/**
 * Validation errors (invalid inputs)
 */
export class ValidationError extends ToolkitError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    remediation?: string
  ) {
    super(
      message,
      'VALIDATION_ERROR',
      ErrorCategory.VALIDATION,
      ErrorSeverity.MEDIUM,
      false,
      details,
      remediation || 'Check input parameters and format. Refer to tool documentation.'
    );
  }
}

/**
 * Authentication errors (Azure credentials invalid/missing)
 */
export class AuthenticationError extends ToolkitError {
  constructor(
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'AUTH_ERROR',
      ErrorCategory.AUTHENTICATION,
      ErrorSeverity.HIGH,
      false,
      details,
      'Verify Azure credentials: az login or set Azure environment variables (AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET).'
    );
  }
}

/**
 * Azure API errors
 */
export class AzureAPIError extends ToolkitError {
  constructor(
    message: string,
    azureErrorCode?: string,
    statusCode?: number,
    retryable: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      azureErrorCode || 'AZURE_API_ERROR',
      ErrorCategory.API,
      statusCode && statusCode >= 500 ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
      retryable,
      { ...details, statusCode, azureErrorCode },
      retryable 
        ? 'Retry the operation. If error persists, check Azure service health status.' 
        : 'Check Azure API documentation for this error code. Verify resource exists and parameters are correct.'
    );
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends ToolkitError {
  constructor(
    operation: string,
    timeoutMs: number,
    details?: Record<string, unknown>
  ) {
    super(
      `Operation '${operation}' timed out after ${timeoutMs}ms`,
      'TIMEOUT_ERROR',
      ErrorCategory.TIMEOUT,
      ErrorSeverity.MEDIUM,
      true,
      { ...details, operation, timeoutMs },
      'Increase timeout value or check network connectivity. Operation can be retried.'
    );
  }
}

/**
 * Rate limit errors
 */
export class RateLimitError extends ToolkitError {
  constructor(
    message: string,
    retryAfterMs?: number,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'RATE_LIMIT_ERROR',
      ErrorCategory.RATE_LIMIT,
      ErrorSeverity.MEDIUM,
      true,
      { ...details, retryAfterMs },
      retryAfterMs 
        ? `Wait ${retryAfterMs}ms before retrying.` 
        : 'Reduce request rate or implement exponential backoff.'
    );
  }
}

/**
 * Network errors
 */
export class NetworkError extends ToolkitError {
  constructor(
    message: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'NETWORK_ERROR',
      ErrorCategory.NETWORK,
      ErrorSeverity.HIGH,
      true,
      details,
      'Check network connectivity and firewall rules. Verify Azure endpoints are accessible.'
    );
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ToolkitError {
  constructor(
    message: string,
    configKey?: string,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'CONFIG_ERROR',
      ErrorCategory.CONFIGURATION,
      ErrorSeverity.HIGH,
      false,
      { ...details, configKey },
      configKey 
        ? `Set configuration: ${configKey}` 
        : 'Review command options and environment variables (see .env.example).'
    );
  }
}

/**
 * Internal errors
 */
export class InternalError extends ToolkitError {
  constructor(
    message: string,
    originalError?: Error,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      'INTERNAL_ERROR',
      ErrorCategory.INTERNAL,
      ErrorSeverity.CRITICAL,
      false,
      originalError ? { ...details, originalError: originalError.message, stack: originalError.stack } : details,
      'Unexpected failure. Re-run with LOG_LEVEL=DEBUG and inspect the transcript.'
    );
  }
}

/**
 * Fields the Azure SDK puts on a RestError, read without trusting the shape.
 */
export interface RestErrorFields {
  message: string;
  statusCode?: number;
  code?: string;
  requestId?: string;
}

export function readRestErrorFields(error: unknown): RestErrorFields {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const fields: RestErrorFields = { message: error.message };
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  const code: unknown = Reflect.get(error, 'code');

  if (typeof statusCode === 'number') {
    fields.statusCode = statusCode;
  }
  if (typeof code === 'string') {
    fields.code = code;
  }
  // RestError defines request as a non-enumerable property
  const request: unknown = Reflect.get(error, 'request');
  if (request && typeof request === 'object' && 'requestId' in request && typeof request.requestId === 'string') {
    fields.requestId = request.requestId;
  }

  return fields;
}

const CREDENTIAL_ERROR_NAMES = ['CredentialUnavailableError', 'AuthenticationError', 'AuthenticationRequiredError'];

/**
 * Convert unknown errors to structured errors
 */
export function normalizeError(error: unknown): ToolkitError {
  if (error instanceof ToolkitError) {
    return error;
  }

  if (error instanceof Error) {
    const fields = readRestErrorFields(error);

    // @azure/identity's AuthenticationError carries a statusCode too
    if (CREDENTIAL_ERROR_NAMES.includes(error.name)) {
      return new AuthenticationError(error.message, { statusCode: fields.statusCode });
    }

    if (fields.statusCode === 429 || fields.code === 'TooManyRequests') {
      return new RateLimitError(error.message, undefined, { requestId: fields.requestId });
    }

    if (fields.statusCode === 404 || fields.code === 'ResourceNotFound' || fields.code === 'ResourceGroupNotFound') {
      return new AzureAPIError(error.message, fields.code ?? 'RESOURCE_NOT_FOUND', 404, false, {
        requestId: fields.requestId,
      });
    }

    if (fields.statusCode !== undefined || fields.code !== undefined) {
      const statusCode = fields.statusCode;
      return new AzureAPIError(
        error.message,
        fields.code ?? error.name,
        statusCode,
        (statusCode !== undefined && statusCode >= 500) || fields.code === 'ETIMEDOUT',
        {
          requestId: fields.requestId,
        }
      );
    }

    if (error.message.includes('timeout') || error.message.includes('ETIMEDOUT')) {
      return new TimeoutError('Operation', 30000, { originalMessage: error.message });
    }

    if (
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('ENOTFOUND') ||
      error.message.includes('ENETUNREACH')
    ) {
      return new NetworkError(error.message);
    }

    // Default to internal error
    return new InternalError(error.message, error);
  }

  // Unknown error type
  return new InternalError(
    'An unknown error occurred',
    undefined,
    { originalError: String(error) }
  );
}

/**
 * Format error for user display (markdown)
 */
export function formatErrorMarkdown(error: ToolkitError): string {
  return `
## ❌ Error: ${error.category}

**Severity:** ${error.severity}  
**Code:** \`${error.code}\`  
**Message:** ${error.message}

${error.details ? `**Details:**\n\`\`\`json\n${JSON.stringify(error.details, null, 2)}\n\`\`\`\n` : ''}
${error.remediation ? `### 💡 Remediation\n${error.remediation}\n` : ''}
${error.retryable ? '**Note:** This operation can be retried automatically.\n' : ''}

*Timestamp: ${error.timestamp}*
`.trim();
}

/**
 * Format error for JSON response
 */
export function formatErrorJSON(error: ToolkitError): string {
  return JSON.stringify(
    {
      error: error.toJSON(),
    },
    null,
    2
  );
}
