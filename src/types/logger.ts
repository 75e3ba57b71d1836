/**
 * Logger interface
 * Structured logging with orchestration event types and metadata
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the workflow lifecycle
 */
export type LogEventType =
  // Workflow lifecycle
  | 'workflow_started'
  | 'workflow_completed'
  | 'workflow_paused'
  | 'workflow_waiting'
  | 'workflow_resuming'
  // Step lifecycle
  | 'state_started'
  | 'state_completed'
  | 'transition_applied'
  // Agent lifecycle
  | 'agent_spawned'
  | 'agent_terminated'
  | 'agent_paused'
  | 'agent_failed'
  // Backend invocations
  | 'invocation_started'
  | 'invocation_completed'
  | 'invocation_failed'
  | 'reminder_sent'
  | 'budget_exceeded'
  // Persistence and diagnostics
  | 'state_persisted'
  | 'diagnostic_written'
  | 'subscriber_failed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Workflow this event belongs to */
  workflowId?: string;
  /** Agent that produced the event */
  agentId?: string;
  /** State unit the agent was executing */
  stateName?: string;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

/**
 * Options for configuring the logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output (for secrets) */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to console or to a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (workflowId, etc.) for all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'agent_failed':
    case 'invocation_failed':
    case 'subscriber_failed':
      return 'error';
    case 'warn':
    case 'workflow_paused':
    case 'agent_paused':
    case 'budget_exceeded':
    case 'reminder_sent':
      return 'warn';
    case 'debug':
    case 'state_persisted':
    case 'invocation_started':
    case 'invocation_completed':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Common secret patterns to redact
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  /sk-ant-[a-zA-Z0-9-_]{40,}/gi,
  /gh[pousr]_[a-zA-Z0-9]{36}/g,
  // Generic secrets in env vars
  /(?:password|secret|token|credential)[=:\s]*['"]?([^\s'"]{8,})['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      // Keep the first few characters for debugging
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
