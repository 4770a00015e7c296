/**
 * Completion backend tests: factory selection, plus each backend against
 * an in-process HTTP server on 127.0.0.1.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createServer, type IncomingMessage, type Server } from "node:http";
import { createProvider, flattenMessages } from "../adapters/index.js";
import { OpenAIProvider } from "../adapters/openai.js";
import { AnthropicProvider, ANTHROPIC_VERSION } from "../adapters/anthropic.js";
import { ModelConfigSchema, type ModelConfig } from "../config.js";
import { ConfigurationError, ProviderError } from "../errors.js";

// --- Fake vendor API ---

interface RecordedRequest {
  method: string;
  path: string;
  headers: IncomingMessage["headers"];
  body: unknown;
}

interface FakeReply {
  status: number;
  body: string;
}

let server: Server;
let baseUrl: string;
let requests: RecordedRequest[];
let reply: FakeReply;

beforeEach(async () => {
  requests = [];
  reply = { status: 200, body: "{}" };
  server = createServer((req, res) => {
    let data = "";
    req.on("data", (chunk) => (data += chunk));
    req.on("end", () => {
      requests.push({
        method: req.method ?? "",
        path: req.url ?? "",
        headers: req.headers,
        body: data ? JSON.parse(data) : undefined,
      });
      res.writeHead(reply.status, { "Content-Type": "application/json" });
      res.end(reply.body);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  baseUrl = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function modelConfig(overrides: Partial<ModelConfig> = {}): ModelConfig {
  return ModelConfigSchema.parse({
    name: "test-model",
    modelProvider: "openai-chatgpt",
    version: "test-version",
    apiKey: "test-secret",
    endpoint: baseUrl,
    ...overrides,
  });
}

const MESSAGES = [{ role: "user" as const, content: "What is the evidence?" }];

// --- Factory ---

describe("createProvider", () => {
  it("creates OpenAIProvider for openai-chatgpt", () => {
    const provider = createProvider(modelConfig({ modelProvider: "openai-chatgpt" }));
    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.tag).toBe("openai-chatgpt");
    expect(provider.model).toBe("test-version");
  });

  it("creates AnthropicProvider for anthropic-claude", () => {
    const provider = createProvider(modelConfig({ modelProvider: "anthropic-claude" }));
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.tag).toBe("anthropic-claude");
  });

  it("throws ConfigurationError for an unsupported provider tag", () => {
    const bad: ModelConfig = JSON.parse(JSON.stringify({ ...modelConfig(), modelProvider: "mistral-le-chat" }));
    expect(() => createProvider(bad)).toThrow(ConfigurationError);
    expect(() => createProvider(bad)).toThrow('unsupported model provider "mistral-le-chat"');
  });
});

// --- OpenAI ---

describe("OpenAIProvider", () => {
  it("posts the messages with a bearer key and returns the first choice", async () => {
    reply = {
      status: 200,
      body: JSON.stringify({
        choices: [{ message: { role: "assistant", content: "An answer." } }],
        usage: { prompt_tokens: 10, completion_tokens: 5 },
      }),
    };
    const provider = new OpenAIProvider(modelConfig());

    const text = await provider.generateCompletion(MESSAGES);

    expect(text).toBe("An answer.");
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].path).toBe("/v1/chat/completions");
    expect(requests[0].headers.authorization).toBe("Bearer test-secret");
    expect(requests[0].body).toEqual({ model: "test-version", messages: MESSAGES });
  });

  it("throws ProviderError with the status on an API error", async () => {
    reply = { status: 429, body: '{"error":"rate limited"}' };
    const provider = new OpenAIProvider(modelConfig());

    const err = await provider.generateCompletion(MESSAGES).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ provider: "openai-chatgpt", model: "test-version", status: 429 });
  });

  it("throws ProviderError when the reply has no choices", async () => {
    reply = { status: 200, body: '{"choices":[]}' };
    const provider = new OpenAIProvider(modelConfig());
    await expect(provider.generateCompletion(MESSAGES)).rejects.toThrow("empty response");
  });

  it("throws ProviderError when the reply body is JSON null", async () => {
    reply = { status: 200, body: "null" };
    const provider = new OpenAIProvider(modelConfig());

    const err = await provider.generateCompletion(MESSAGES).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ status: 200 });
  });

  it("throws ProviderError when the reply body is not an object", async () => {
    reply = { status: 200, body: "42" };
    const provider = new OpenAIProvider(modelConfig());
    await expect(provider.generateCompletion(MESSAGES)).rejects.toThrow("unexpected response");
  });

  it("sends no max_tokens even when one is configured", async () => {
    reply = { status: 200, body: JSON.stringify({ choices: [{ message: { role: "assistant", content: "ok" } }] }) };
    const provider = new OpenAIProvider(modelConfig({ maxTokens: 64 }));
    await provider.generateCompletion(MESSAGES);
    expect(requests[0].body).not.toHaveProperty("max_tokens");
  });

  it("throws ProviderError when the endpoint is unreachable", async () => {
    const provider = new OpenAIProvider(modelConfig({ endpoint: "http://127.0.0.1:1" }));
    await expect(provider.generateCompletion(MESSAGES)).rejects.toBeInstanceOf(ProviderError);
  });
});

// --- Anthropic ---

describe("flattenMessages", () => {
  it("joins messages as upper-cased role blocks", () => {
    expect(flattenMessages([
      { role: "system", content: "Be brief." },
      { role: "user", content: "Hello" },
    ])).toBe("\n\nSYSTEM: Be brief.\n\nUSER: Hello");
  });
});

describe("AnthropicProvider", () => {
  const config = () => modelConfig({ modelProvider: "anthropic-claude", maxTokens: 256 });

  it("posts one flattened user message with vendor headers", async () => {
    reply = { status: 200, body: JSON.stringify({ content: [{ type: "text", text: "Claude's answer." }] }) };
    const provider = new AnthropicProvider(config());

    const text = await provider.generateCompletion(MESSAGES);

    expect(text).toBe("Claude's answer.");
    expect(requests[0].path).toBe("/v1/messages");
    expect(requests[0].headers["x-api-key"]).toBe("test-secret");
    expect(requests[0].headers["anthropic-version"]).toBe(ANTHROPIC_VERSION);
    expect(requests[0].body).toEqual({
      model: "test-version",
      max_tokens: 256,
      messages: [{ role: "user", content: "\n\nUSER: What is the evidence?" }],
    });
  });

  it("defaults max_tokens to 1024", async () => {
    reply = { status: 200, body: JSON.stringify({ content: [{ type: "text", text: "ok" }] }) };
    const provider = new AnthropicProvider(modelConfig({ modelProvider: "anthropic-claude" }));
    await provider.generateCompletion(MESSAGES);
    expect(requests[0].body).toMatchObject({ max_tokens: 1024 });
  });

  it("returns an empty string on an API error", async () => {
    reply = { status: 500, body: '{"error":"overloaded"}' };
    const provider = new AnthropicProvider(config());
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });

  it("returns an empty string when content is missing", async () => {
    reply = { status: 200, body: '{"id":"msg_1"}' };
    const provider = new AnthropicProvider(config());
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });

  it("returns an empty string when content is an empty list", async () => {
    reply = { status: 200, body: '{"content":[]}' };
    const provider = new AnthropicProvider(config());
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });

  it("returns an empty string when the reply body is JSON null", async () => {
    reply = { status: 200, body: "null" };
    const provider = new AnthropicProvider(config());
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });

  it("returns an empty string on malformed JSON", async () => {
    reply = { status: 200, body: "not json" };
    const provider = new AnthropicProvider(config());
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });

  it("returns an empty string when the endpoint is unreachable", async () => {
    const provider = new AnthropicProvider(modelConfig({ modelProvider: "anthropic-claude", endpoint: "http://127.0.0.1:1" }));
    expect(await provider.generateCompletion(MESSAGES)).toBe("");
  });
});
