/**
 * Engines module - process runners and the LLM backend
 */

// ProcessRunner implementations
export { RealProcessRunner, createRealProcessRunner } from './real-process-runner';
export { MockProcessRunner, createMockProcessRunner } from './mock-process-runner';
export type { MockProcessConfig, MockProcessCall } from './mock-process-runner';

// Engine adapter base class and the Claude backend
export { BaseEngineAdapter } from './engine-adapter';
export type { EngineAdapterOptions } from './engine-adapter';
export { ClaudeAdapter, createClaudeAdapter } from './claude-adapter';

// Stream parsing
export { LineBuffer } from './line-buffer';
export {
  parseStreamLine,
  extractSessionId,
  extractOutputText,
  extractCost,
  extractRateLimitMessage,
  extractToolUses,
  extractProgressText,
} from './stream-output';
export type { ToolUse } from './stream-output';
