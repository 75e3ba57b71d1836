/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export { ok, err, unwrap } from './result';
export type { Result, Ok, Err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription } from './exit-codes';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';

// File system interface
export { createFileSystemError } from './file-system';
export type { FileSystem, WriteOptions, FileSystemError, FileSystemErrorCode } from './file-system';

// Prompter interface
export { createPrompterError } from './prompter';
export type { Prompter, SelectChoice, SelectOptions, PrompterError, PrompterErrorCode } from './prompter';

// Clock interface
export { SystemClock, MockClock } from './clock';
export type { Clock, MockClockOptions } from './clock';

// Logger interface
export { compareLogLevels, shouldLog, getEventLevel, DEFAULT_REDACT_PATTERNS, redactSecrets } from './logger';
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';

// LLM backend interface
export type {
  LlmBackend,
  InvocationRequest,
  InvocationResponse,
  StreamMessage,
  StreamMessageHandler,
} from './llm-backend';

// Workflow data model
export { TRANSITION_TAGS, isTransitionTag, clearTransientFields, cloneAgent } from './workflow';
export type {
  TransitionTag,
  Transition,
  Frame,
  AgentStatus,
  AgentState,
  WorkflowState,
  StateUnitKind,
  ResolvedStateUnit,
  ExecutionResult,
} from './workflow';
export type { AllowedTransition, Policy, LoadedPrompt } from './policy';

// Effective config types
export { MODEL_NAMES, isModelName, DEFAULT_CONFIG } from './effective-config';
export type {
  ModelName,
  EffectiveConfig,
  StepDefaults,
  BehaviorConfig,
  OutputConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';
