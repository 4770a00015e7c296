import type { CompletionProvider } from "./base.js";
import type { ModelConfig } from "../config.js";
import { OpenAIProvider } from "./openai.js";
import { AnthropicProvider } from "./anthropic.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("adapters");

export type ProviderFactory = (config: ModelConfig) => CompletionProvider;

/**
 * Create the completion backend named by the model's provider tag.
 * An unknown tag is a configuration error, raised before any round runs.
 */
export function createProvider(config: ModelConfig): CompletionProvider {
  const tag: string = config.modelProvider;
  switch (tag) {
    case "openai-chatgpt":
      log.debug("creating OpenAIProvider for", config.name, "model=" + config.version);
      return new OpenAIProvider(config);
    case "anthropic-claude":
      log.debug("creating AnthropicProvider for", config.name, "model=" + config.version);
      return new AnthropicProvider(config);
    default:
      throw new ConfigurationError(`Model "${config.name}": unsupported model provider "${tag}"`);
  }
}

export { OpenAIProvider } from "./openai.js";
export { AnthropicProvider, flattenMessages } from "./anthropic.js";
export type { CompletionProvider, ChatMessage, MessageRole } from "./base.js";
