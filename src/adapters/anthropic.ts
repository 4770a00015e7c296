import type { CompletionProvider, ChatMessage } from "./base.js";
import { postJson, joinUrl } from "./http.js";
import type { ModelConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("anthropic");

export const ANTHROPIC_DEFAULT_ENDPOINT = "https://api.anthropic.com";
export const ANTHROPIC_VERSION = "2023-06-01";

interface MessagesResponse {
  content?: Array<{ type: string; text?: string }>;
  usage?: { input_tokens: number; output_tokens: number };
}

/**
 * Flatten role-tagged messages into one prompt: "\n\nROLE: content" per message.
 */
export function flattenMessages(messages: ChatMessage[]): string {
  return messages.map((m) => `\n\n${m.role.toUpperCase()}: ${m.content}`).join("");
}

/**
 * Anthropic Messages API backend ("anthropic-claude").
 *
 * Never throws: transport errors, HTTP errors and replies without content
 * are logged and reported as an empty completion.
 */
export class AnthropicProvider implements CompletionProvider {
  readonly tag = "anthropic-claude" as const;
  readonly model: string;
  private readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(config: ModelConfig) {
    this.name = config.name;
    this.model = config.version;
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint ?? ANTHROPIC_DEFAULT_ENDPOINT;
    this.maxTokens = config.maxTokens;
    this.timeoutMs = config.timeoutMs;
  }

  async generateCompletion(messages: ChatMessage[]): Promise<string> {
    const url = joinUrl(this.endpoint, "/v1/messages");
    const start = Date.now();
    const prompt = flattenMessages(messages);
    log.debug(this.name, "request, model=" + this.model + ", prompt length:", prompt.length);

    try {
      const { status, body } = await postJson(
        url,
        {
          "x-api-key": this.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [{ role: "user", content: prompt }],
        },
        this.timeoutMs,
      );

      if (status !== 200) {
        log.error(this.name, `API error ${status}:`, body);
        return "";
      }

      const parsed = JSON.parse(body) as MessagesResponse | null;
      if (typeof parsed !== "object" || parsed === null || !parsed.content) {
        log.error(this.name, "response missing 'content':", body);
        return "";
      }

      log.info(this.name, "complete:", (Date.now() - start) + "ms" +
        (parsed.usage ? `, ${parsed.usage.input_tokens + parsed.usage.output_tokens} tokens` : ""));
      return parsed.content[0]?.text ?? "";
    } catch (err) {
      log.error(this.name, "request failed:", err instanceof Error ? err.message : String(err));
      return "";
    }
  }
}
