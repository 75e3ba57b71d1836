/**
 * Logging module - structured loggers, diagnostics and event observers
 */

export { ConsoleLogger, createConsoleLogger } from './console-logger';
export { BufferLogger } from './buffer-logger';

export { DiagnosticWriter, formatDiagnosticReport, compactTimestamp } from './diagnostics';
export type { DiagnosticContext } from './diagnostics';

export { DebugObserver, debugDirectoryFor, formatTransitionLogEntry } from './debug-observer';
export { ConsoleObserver, truncate, DEFAULT_CONSOLE_WIDTH } from './console-observer';
export type { ConsoleObserverOptions } from './console-observer';
export { TitleBarObserver, titleSequence } from './titlebar-observer';
