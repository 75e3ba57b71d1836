/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

/**
 * Buffer-based logger for testing
 * Children share the parent's event buffer so tests see every event.
 */
export class BufferLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private readonly store: { events: LogEvent[] };
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}, store: { events: LogEvent[] } = { events: [] }) {
    this.minLevel = options.minLevel ?? 'debug';
    this.options = {
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
    this.store = store;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.store.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new BufferLogger(this.options, this.store);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  /**
   * Clear all stored events
   */
  clear(): void {
    this.store.events.length = 0;
  }

  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.store.events.filter((e) => e.level === level);
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.store.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.store.events.some((e) => e.eventType === eventType);
  }

  /**
   * Get events whose message matches a pattern
   */
  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.store.events.filter((e) => pattern.test(e.message));
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = redactSecrets(value, this.options.redactPatterns);
      }
    }

    this.store.events.push({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: redactSecrets(message, this.options.redactPatterns),
      metadata: merged,
    });
  }
}

