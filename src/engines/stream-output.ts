/**
 * Readers for the Claude CLI stream-json format
 */

import { basename } from 'path';
import { StreamMessage } from '../types/llm-backend';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one output line; non-JSON and non-object lines yield null
 */
export function parseStreamLine(line: string): StreamMessage | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extractSessionId(message: StreamMessage): string | null {
  if (typeof message.session_id === 'string') {
    return message.session_id;
  }
  if (isRecord(message.metadata) && typeof message.metadata.session_id === 'string') {
    return message.metadata.session_id;
  }
  return null;
}

function textItems(content: unknown): string {
  if (typeof content === 'string') {
    return content;
  }
  if (!Array.isArray(content)) {
    return '';
  }
  let text = '';
  for (const item of content) {
    if (isRecord(item) && typeof item.text === 'string') {
      text += item.text;
    }
  }
  return text;
}

/**
 * Text output of an invocation.
 * `result` fields win outright; otherwise message content, then text, then content.
 */
export function extractOutputText(messages: StreamMessage[]): string {
  const results = messages
    .map((message) => message.result)
    .filter((value): value is string => typeof value === 'string');
  if (results.length > 0) {
    return results.join('');
  }

  let text = '';
  for (const message of messages) {
    if (isRecord(message.message)) {
      text += textItems(message.message.content);
    } else if (typeof message.text === 'string') {
      text += message.text;
    } else if (message.content !== undefined) {
      text += textItems(message.content);
    }
  }
  return text;
}

/**
 * Cost of the invocation: the last total_cost_usd in the stream, or 0
 */
export function extractCost(messages: StreamMessage[]): number {
  for (let i = messages.length - 1; i >= 0; i--) {
    const cost = messages[i].total_cost_usd;
    if (typeof cost === 'number' && Number.isFinite(cost)) {
      return cost;
    }
  }
  return 0;
}

/**
 * Text of a usage-limit result, or null
 */
export function extractRateLimitMessage(message: StreamMessage): string | null {
  if (
    message.type === 'result' &&
    message.is_error === true &&
    typeof message.result === 'string' &&
    message.result.toLowerCase().includes('hit your limit')
  ) {
    return message.result;
  }
  return null;
}

export interface ToolUse {
  toolName: string;
  detail: string;
}

const FILE_TOOLS = new Set(['Read', 'Write', 'Edit', 'MultiEdit', 'NotebookEdit']);
const COMMAND_PREVIEW_LENGTH = 40;

function describeTool(name: string, input: unknown): string {
  if (!isRecord(input)) {
    return '';
  }
  if (FILE_TOOLS.has(name)) {
    const path = input.file_path ?? input.notebook_path;
    return typeof path === 'string' ? basename(path) : '';
  }
  if (name === 'Bash' && typeof input.command === 'string') {
    const command = input.command;
    return command.length > COMMAND_PREVIEW_LENGTH
      ? `${command.slice(0, COMMAND_PREVIEW_LENGTH)}...`
      : command;
  }
  if ((name === 'Grep' || name === 'Glob') && typeof input.pattern === 'string') {
    return input.pattern;
  }
  return '';
}

function assistantContent(message: StreamMessage): unknown[] {
  if (message.type !== 'assistant' || !isRecord(message.message)) {
    return [];
  }
  const content = message.message.content;
  return Array.isArray(content) ? content : [];
}

/**
 * Tool calls the assistant made in this message
 */
export function extractToolUses(message: StreamMessage): ToolUse[] {
  const uses: ToolUse[] = [];
  for (const item of assistantContent(message)) {
    if (isRecord(item) && item.type === 'tool_use' && typeof item.name === 'string') {
      uses.push({ toolName: item.name, detail: describeTool(item.name, item.input) });
    }
  }
  return uses;
}

/**
 * Prose the assistant wrote in this message
 */
export function extractProgressText(message: StreamMessage): string[] {
  const texts: string[] = [];
  for (const item of assistantContent(message)) {
    if (isRecord(item) && item.type === 'text' && typeof item.text === 'string' && item.text.trim()) {
      texts.push(item.text.trim());
    }
  }
  return texts;
}
