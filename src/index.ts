/**
 * peer-consensus: public API.
 *
 * Re-exports the orchestrator, its building blocks and the review server
 * for programmatic use.
 */

// --- Discussion ---
export { DiscussionSession, MIN_INTERACTIONS } from "./orchestrator.js";
export type {
  DiscussionOptions,
  DiscussionResult,
  DiscussionStatus,
  DiscussionHooks,
  ResponseEvent,
  RoundEvent,
  Session,
} from "./orchestrator.js";
export { buildInitialPrompt, buildIterativePrompt } from "./prompts.js";
export { CONVERGENCE_PHRASE, extractConvergence, checkConvergence } from "./consensus/convergence.js";
export type { ConvergenceCheck } from "./consensus/convergence.js";
export { formatSessionTimestamp, sessionFolderPath, createSessionFolder, storePath } from "./session.js";

// --- Store ---
export { SqliteResponseStore } from "./store/sqlite.js";
export type { IResponseStore } from "./store/interfaces.js";
export type { ResponseRecord } from "./store/types.js";

// --- Adapters ---
export { createProvider, OpenAIProvider, AnthropicProvider } from "./adapters/index.js";
export type { CompletionProvider, ChatMessage, MessageRole, ProviderFactory } from "./adapters/index.js";

// --- Config ---
export { loadConfig, parseConfig, ConfigSchema } from "./config.js";
export type { Config, ModelConfig, ModelProvider } from "./config.js";

// --- Errors ---
export { ConfigurationError, StorageError, ProviderError } from "./errors.js";

// --- Review ---
export { startReviewServer } from "./review/server.js";
export type { ReviewServer, ReviewServerOptions } from "./review/server.js";
export { loadSessionData } from "./review/data.js";
