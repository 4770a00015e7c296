/**
 * Completion provider interface.
 *
 * A provider wraps one vendor's chat API and gives the orchestrator a
 * single capability: turn an ordered list of role-tagged messages into text.
 *
 * Backends differ in how they fail. The OpenAI backend throws a ProviderError;
 * the Anthropic backend logs and returns "". Callers must accept both.
 */

import type { ModelProvider } from "../config.js";

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface CompletionProvider {
  /** Provider tag from configuration (e.g. "openai-chatgpt") */
  readonly tag: ModelProvider;
  /** Vendor model identifier */
  readonly model: string;

  generateCompletion(messages: ChatMessage[]): Promise<string>;
}
