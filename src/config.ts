import { z } from "zod";
import { readFileSync } from "node:fs";
import { resolve, dirname, isAbsolute } from "node:path";
import { ConfigurationError } from "./errors.js";

// --- Schemas ---

export const MODEL_PROVIDERS = ["openai-chatgpt", "anthropic-claude"] as const;

/** Model names become store file names: <name>.db */
const SAFE_MODEL_NAME = /^[A-Za-z0-9._-]+$/;

export const ModelConfigSchema = z.object({
  name: z.string().regex(SAFE_MODEL_NAME, "must contain only letters, digits, '.', '_' or '-'"),
  modelProvider: z.enum(MODEL_PROVIDERS),
  /** Vendor model identifier (e.g. "gpt-4o", "claude-3-5-sonnet-latest") */
  version: z.string().min(1),
  apiKey: z.string().min(1),
  /** Override the vendor's API base URL (proxies, compatible gateways) */
  endpoint: z.string().url().optional(),
  /** Sent as max_tokens by anthropic-claude only; openai-chatgpt requests carry no token limit */
  maxTokens: z.number().int().positive().default(1024),
  timeoutMs: z.number().int().positive().default(120_000),
});

export const ConfigSchema = z.object({
  responsesFolderPath: z.string().default("responses"),
  convergenceThreshold: z
    .number()
    .min(0)
    .max(100)
    .default(90)
    .describe("Average agreement percentage at which the discussion stops"),
  models: z
    .array(ModelConfigSchema)
    .min(1, "at least one model is required")
    .superRefine((models, ctx) => {
      const seen = new Set<string>();
      for (const [i, m] of models.entries()) {
        if (seen.has(m.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate model name "${m.name}"`,
            path: [i, "name"],
          });
        }
        seen.add(m.name);
      }
    }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelProvider = (typeof MODEL_PROVIDERS)[number];

// --- snake_case compatibility ---

const KEY_ALIASES: Record<string, string> = {
  responses_folder_path: "responsesFolderPath",
  convergence_threshold: "convergenceThreshold",
  model_provider: "modelProvider",
  api_key: "apiKey",
  max_tokens: "maxTokens",
  timeout_ms: "timeoutMs",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rename snake_case keys to their camelCase form, recursively. Existing camelCase keys win. */
export function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys);
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    const target = KEY_ALIASES[key] ?? key;
    if (target !== key && target in value) continue;
    out[target] = normalizeKeys(v);
  }
  return out;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/** Validate an already-parsed config object. */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(normalizeKeys(raw));
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

// --- Loader ---

/**
 * Load and validate a JSON config file.
 * A relative responsesFolderPath is resolved against the config file's directory.
 */
export function loadConfig(path: string): Config {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Cannot read config file "${path}": ${reason}`);
  }

  const config = parseConfig(raw);
  if (!isAbsolute(config.responsesFolderPath)) {
    config.responsesFolderPath = resolve(dirname(resolve(path)), config.responsesFolderPath);
  }
  return config;
}
