import type { CompletionProvider, ChatMessage } from "./base.js";
import { postJson, joinUrl } from "./http.js";
import type { ModelConfig } from "../config.js";
import { ProviderError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai");

export const OPENAI_DEFAULT_ENDPOINT = "https://api.openai.com";

interface ChatCompletionResponse {
  id?: string;
  choices?: Array<{
    message?: {
      role: string;
      content: string | null;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}

/**
 * OpenAI chat completions backend ("openai-chatgpt").
 *
 * Uses POST /v1/chat/completions. Every failure (transport, HTTP status,
 * unparseable or empty reply) is thrown as a ProviderError and stops the run.
 */
export class OpenAIProvider implements CompletionProvider {
  readonly tag = "openai-chatgpt" as const;
  readonly model: string;
  private readonly name: string;
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(config: ModelConfig) {
    this.name = config.name;
    this.model = config.version;
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint ?? OPENAI_DEFAULT_ENDPOINT;
    this.timeoutMs = config.timeoutMs;
  }

  async generateCompletion(messages: ChatMessage[]): Promise<string> {
    const url = joinUrl(this.endpoint, "/v1/chat/completions");
    const start = Date.now();
    log.debug(this.name, "request, model=" + this.model + ",", messages.length, "messages");

    let status: number;
    let body: string;
    try {
      ({ status, body } = await postJson(
        url,
        { "Authorization": `Bearer ${this.apiKey}` },
        { model: this.model, messages },
        this.timeoutMs,
      ));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error(this.name, "transport error:", reason);
      throw new ProviderError(`${this.name}: request to ${url} failed: ${reason}`, this.tag, this.model);
    }

    if (status >= 400) {
      log.error(this.name, "API error", status, body);
      throw new ProviderError(`${this.name}: API error ${status}: ${body}`, this.tag, this.model, status);
    }

    let parsed: ChatCompletionResponse | null;
    try {
      parsed = JSON.parse(body) as ChatCompletionResponse | null;
    } catch {
      throw new ProviderError(`${this.name}: unparseable response from ${url}`, this.tag, this.model, status);
    }
    if (typeof parsed !== "object" || parsed === null) {
      throw new ProviderError(`${this.name}: unexpected response from ${url}: ${body}`, this.tag, this.model, status);
    }

    const first = parsed.choices?.[0];
    if (!first) {
      throw new ProviderError(`${this.name}: empty response from ${url}`, this.tag, this.model, status);
    }

    log.info(this.name, "complete:", (Date.now() - start) + "ms" +
      (parsed.usage ? `, ${parsed.usage.prompt_tokens + parsed.usage.completion_tokens} tokens` : ""));
    return first.message?.content ?? "";
  }
}
