/**
 * Type guards for Claude Agent SDK message types, so the SDK runner can narrow
 * query() messages without casts.
 */

import type {
  SDKAssistantMessage,
  SDKMessage,
  SDKResultMessage,
} from '@anthropic-ai/claude-agent-sdk';

export type { SDKAssistantMessage, SDKMessage, SDKResultMessage };

/**
 * Result messages close a query and carry total_cost_usd plus the success/error subtype.
 */
export function isResultMessage(message: SDKMessage): message is SDKResultMessage {
  return message.type === 'result';
}

export function isAssistantMessage(message: SDKMessage): message is SDKAssistantMessage {
  return message.type === 'assistant';
}
