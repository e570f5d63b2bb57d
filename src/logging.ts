/**
 * Azure Admin Toolkit - Logging and Performance Tracking
 *
 * Provides:
 * - Structured logging with levels (stderr, so stdout stays clean for reports and MCP)
 * - PII and secret redaction
 * - Optional JSON-lines transcript file
 * - Phase timing and API call counts
 */

import { appendFileSync } from 'fs';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SECURITY = 'SECURITY',
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  component?: string;
}

export interface PerformanceMetrics {
  operation: string;
  startTime: number;
  endTime?: number;
  duration?: number;
  success: boolean;
  errorCode?: string;
  apiCalls?: number;
}

/**
 * PII patterns to redact from logs
 */
const PII_PATTERNS = [
  // Tenant, subscription and object IDs (GUID format)
  { pattern: /([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})/gi, replacement: '***GUID_REDACTED***' },
  // Client secrets: whole tokens of 32+ characters, unless made of short separated words (file and resource names)
  {
    pattern: /(?<![A-Za-z0-9~._-])(?![A-Za-z0-9]{1,24}(?:[-._][A-Za-z0-9]{1,24})+(?![A-Za-z0-9~._-]))[A-Za-z0-9~._-]{32,}/g,
    replacement: '***CLIENT_SECRET_REDACTED***',
  },
  // Email addresses
  { pattern: /([a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,})/g, replacement: '***EMAIL_REDACTED***' },
  // SAS tokens
  { pattern: /(sig=[A-Za-z0-9%+/=]+)/gi, replacement: 'sig=***SAS_TOKEN_REDACTED***' },
  // Storage account keys
  { pattern: /(AccountKey=[A-Za-z0-9+/=]{88})/g, replacement: 'AccountKey=***STORAGE_KEY_REDACTED***' },
];

/**
 * Sensitive field names to redact (compared lower-cased)
 */
const SENSITIVE_FIELDS = new Set([
  'password',
  'secret',
  'secrettext',
  'token',
  'clientsecret',
  'authtoken',
  'apikey',
  'privatekey',
  'credential',
  'accountkey',
  'sastoken',
  'connectionstring',
]);

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SECURITY];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const upper = value.trim().toUpperCase();
  return LEVEL_ORDER.find(level => level === upper) ?? fallback;
}

export class Logger {
  private minLevel: LogLevel;
  private logs: LogEntry[] = [];
  private maxLogs: number = 1000;
  private enableConsole: boolean;
  private logFile?: string;

  constructor(minLevel: LogLevel = LogLevel.INFO, enableConsole: boolean = true) {
    this.minLevel = minLevel;
    this.enableConsole = enableConsole;
  }

  /**
   * Redact PII from a string
   */
  redactText(text: string): string {
    let redacted = text;
    for (const { pattern, replacement } of PII_PATTERNS) {
      redacted = redacted.replace(pattern, replacement);
    }
    return redacted;
  }

  /**
   * Redact PII from log data
   */
  redact(data: unknown): unknown {
    if (typeof data === 'string') {
      return this.redactText(data);
    }

    if (Array.isArray(data)) {
      return data.map(item => this.redact(item));
    }

    if (data && typeof data === 'object') {
      const redacted: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(data)) {
        if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
          redacted[key] = '***REDACTED***';
        } else {
          redacted[key] = this.redact(value);
        }
      }
      return redacted;
    }

    return data;
  }

  private redactRecord(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      redacted[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '***REDACTED***' : this.redact(value);
    }
    return redacted;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.minLevel);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    component?: string
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: this.redactText(message),
      data: data ? this.redactRecord(data) : undefined,
      component,
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    if (this.logFile) {
      appendFileSync(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    }

    if (this.enableConsole) {
      const prefix = `[${entry.timestamp}] [${level}]${component ? ` [${component}]` : ''}`;
      console.error(`${prefix} ${entry.message}`);
      if (entry.data && Object.keys(entry.data).length > 0) {
        console.error(JSON.stringify(entry.data, null, 2));
      }
    }
  }

  debug(message: string, data?: Record<string, unknown>, component?: string): void {
    this.log(LogLevel.DEBUG, message, data, component);
  }

  info(message: string, data?: Record<string, unknown>, component?: string): void {
    this.log(LogLevel.INFO, message, data, component);
  }

  warn(message: string, data?: Record<string, unknown>, component?: string): void {
    this.log(LogLevel.WARN, message, data, component);
  }

  error(message: string, data?: Record<string, unknown>, component?: string): void {
    this.log(LogLevel.ERROR, message, data, component);
  }

  security(message: string, data?: Record<string, unknown>, component?: string): void {
    this.log(LogLevel.SECURITY, message, data, component);
  }

  /**
   * Get recent logs
   */
  getLogs(level?: LogLevel, limit?: number): LogEntry[] {
    let filtered = level
      ? this.logs.filter(log => log.level === level)
      : this.logs;

    if (limit) {
      filtered = filtered.slice(-limit);
    }

    return filtered;
  }

  clearLogs(): void {
    this.logs = [];
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  setConsole(enabled: boolean): void {
    this.enableConsole = enabled;
  }

  /**
   * Mirror every entry to a JSON-lines transcript file (undefined stops it)
   */
  setLogFile(path: string | undefined): void {
    this.logFile = path;
  }
}

/**
 * Performance tracker for phases and operations
 */
export class PerformanceTracker {
  private metrics: Map<string, PerformanceMetrics> = new Map();
  private maxMetrics: number = 500;
  private sequence = 0;

  /**
   * Start tracking an operation
   */
  start(operation: string): string {
    this.sequence++;
    const id = `${operation}-${Date.now()}-${this.sequence}`;

    this.metrics.set(id, {
      operation,
      startTime: Date.now(),
      success: false,
      apiCalls: 0,
    });

    if (this.metrics.size > this.maxMetrics) {
      const oldestKey = this.metrics.keys().next().value;
      if (oldestKey) {
        this.metrics.delete(oldestKey);
      }
    }

    return id;
  }

  /**
   * End tracking an operation
   */
  end(
    id: string,
    success: boolean = true,
    errorCode?: string
  ): PerformanceMetrics | null {
    const metric = this.metrics.get(id);
    if (!metric) return null;

    metric.endTime = Date.now();
    metric.duration = metric.endTime - metric.startTime;
    metric.success = success;
    metric.errorCode = errorCode;

    logger.debug(
      `Performance: ${metric.operation} completed in ${metric.duration}ms`,
      {
        duration: metric.duration,
        success,
        apiCalls: metric.apiCalls,
      },
      metric.operation
    );

    return metric;
  }

  recordAPICall(id: string): void {
    const metric = this.metrics.get(id);
    if (metric) {
      metric.apiCalls = (metric.apiCalls || 0) + 1;
    }
  }

  /**
   * Get performance summary
   */
  getSummary(): {
    totalOperations: number;
    successRate: number;
    averageDuration: number;
    totalAPIcalls: number;
  } {
    const allMetrics = Array.from(this.metrics.values()).filter(m => m.duration !== undefined);

    if (allMetrics.length === 0) {
      return {
        totalOperations: 0,
        successRate: 0,
        averageDuration: 0,
        totalAPIcalls: 0,
      };
    }

    const successful = allMetrics.filter(m => m.success).length;
    const totalDuration = allMetrics.reduce((sum, m) => sum + (m.duration || 0), 0);
    const totalAPIcalls = allMetrics.reduce((sum, m) => sum + (m.apiCalls || 0), 0);

    return {
      totalOperations: allMetrics.length,
      successRate: (successful / allMetrics.length) * 100,
      averageDuration: totalDuration / allMetrics.length,
      totalAPIcalls,
    };
  }
}

// Singleton instances
export const logger = new Logger(
  parseLogLevel(process.env.LOG_LEVEL),
  process.env.ENABLE_CONSOLE_LOGGING !== 'false'
);

if (process.env.LOG_FILE) {
  logger.setLogFile(process.env.LOG_FILE);
}

export const performanceTracker = new PerformanceTracker();
