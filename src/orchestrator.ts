/**
 * DiscussionSession: drives N models through rounds until their average
 * self-reported agreement reaches the threshold or the rounds run out.
 *
 * Responsibilities:
 * - Validate arguments and build every provider before touching the disk
 * - Create the session folder and one response store per model
 * - Query models one at a time, in configuration order, and persist each answer
 * - Check convergence after every round and decide whether to continue
 *
 * Models are never queried concurrently. The latest-responses map is updated
 * as soon as a model answers, so a model queried later in a round sees the
 * same-round answers of the models before it; the first model only ever sees
 * the previous round.
 */

import type { CompletionProvider } from "./adapters/base.js";
import { createProvider, type ProviderFactory } from "./adapters/index.js";
import type { Config } from "./config.js";
import type { IResponseStore } from "./store/interfaces.js";
import { SqliteResponseStore } from "./store/sqlite.js";
import { CONVERGENCE_PHRASE, checkConvergence, extractConvergence } from "./consensus/convergence.js";
import { buildInitialPrompt, buildIterativePrompt } from "./prompts.js";
import { createSessionFolder, storePath } from "./session.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, createSessionLog, truncate, type Logger, type SessionLog } from "./logger.js";

export const MIN_INTERACTIONS = 2;

export type DiscussionStatus = "converged" | "exhausted";

export interface ResponseEvent {
  round: number;
  model: string;
  response: string;
  convergence: number;
}

export interface RoundEvent {
  round: number;
  average: number;
  converged: boolean;
}

/** Observers for progress output. They cannot alter the run. */
export interface DiscussionHooks {
  onRoundStart?: (round: number) => void;
  onResponse?: (event: ResponseEvent) => void;
  onRoundComplete?: (event: RoundEvent) => void;
}

export interface DiscussionOptions {
  title: string;
  researchPrompt: string;
  maxInteractions: number;
  config: Config;
  /** Defaults to createProvider (vendor backends). */
  providerFactory?: ProviderFactory;
  /** Defaults to a SQLite store per model. */
  storeFactory?: (path: string) => IResponseStore;
  /** Clock for the session folder timestamp. */
  now?: () => Date;
  logger?: Logger;
  hooks?: DiscussionHooks;
}

export interface Session {
  readonly title: string;
  readonly researchPrompt: string;
  readonly createdAt: Date;
  readonly models: readonly string[];
  readonly maxInteractions: number;
  readonly convergenceThreshold: number;
  readonly folder: string;
}

interface Participant {
  readonly name: string;
  readonly provider: CompletionProvider;
  readonly store: IResponseStore;
}

export interface DiscussionResult {
  session: Session;
  status: DiscussionStatus;
  roundsCompleted: number;
  /** Average agreement after each completed round */
  averages: number[];
  /** Each model's answer from the last completed round */
  latestResponses: Map<string, string>;
  durationMs: number;
}

/** Folder names are built from the title; keep it to a single path segment. */
const UNSAFE_TITLE = /[/\\\0]/;

export class DiscussionSession {
  private readonly options: DiscussionOptions;
  private readonly log: Logger;

  constructor(options: DiscussionOptions) {
    this.options = options;
    this.log = options.logger ?? createLogger("orchestrator");
  }

  /** Reject arguments that would make the run meaningless. Throws ConfigurationError. */
  static validate(options: Pick<DiscussionOptions, "title" | "researchPrompt" | "maxInteractions" | "config">): void {
    const { title, researchPrompt, maxInteractions, config } = options;
    if (!Number.isInteger(maxInteractions) || maxInteractions < MIN_INTERACTIONS) {
      throw new ConfigurationError(
        `maxInteractions must be an integer of at least ${MIN_INTERACTIONS} (got ${maxInteractions})`
      );
    }
    if (config.models.length === 0) {
      throw new ConfigurationError("No models configured. At least one model is required for a discussion.");
    }
    const names = new Set(config.models.map((m) => m.name));
    if (names.size !== config.models.length) {
      throw new ConfigurationError("Model names must be unique within a session.");
    }
    if (title.trim() === "" || UNSAFE_TITLE.test(title)) {
      throw new ConfigurationError(`Invalid session title: "${title}"`);
    }
    if (researchPrompt.trim() === "") {
      throw new ConfigurationError("Research prompt must not be empty.");
    }
  }

  async run(): Promise<DiscussionResult> {
    const start = Date.now();
    const { title, researchPrompt, maxInteractions, config, hooks } = this.options;
    DiscussionSession.validate(this.options);

    // Every provider is built before anything is written to disk.
    const providerFactory = this.options.providerFactory ?? createProvider;
    const providers = config.models.map((m) => ({ name: m.name, provider: providerFactory(m) }));

    const createdAt = (this.options.now ?? (() => new Date()))();
    const folder = createSessionFolder(config.responsesFolderPath, title, createdAt);
    const session: Session = Object.freeze({
      title,
      researchPrompt,
      createdAt,
      models: Object.freeze(config.models.map((m) => m.name)),
      maxInteractions,
      convergenceThreshold: config.convergenceThreshold,
      folder,
    });

    const slog = createSessionLog(session.folder);
    slog.write("info", `session "${title}" | prompt: ${researchPrompt}`);
    slog.write("info", `models: ${session.models.join(", ")} | max interactions: ${maxInteractions} | threshold: ${session.convergenceThreshold}%`);
    this.log.info("session start:", session.models.length, "models, max", maxInteractions, "interactions, folder:", session.folder);

    const storeFactory = this.options.storeFactory ?? ((path: string) => new SqliteResponseStore(path));
    const participants: Participant[] = [];

    try {
      for (const { name, provider } of providers) {
        const store = storeFactory(storePath(session.folder, name));
        participants.push({ name, provider, store });
        await store.initialize();
      }

      const outcome = await this.runRounds(session, participants, slog, hooks);
      const durationMs = Date.now() - start;
      this.log.info("session end:", outcome.status, "after", outcome.roundsCompleted, "rounds,", durationMs + "ms");
      slog.write("info", `session end: ${outcome.status} after ${outcome.roundsCompleted} rounds, ${durationMs}ms`);
      return { session, ...outcome, durationMs };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error("session aborted:", message);
      slog.write("error", `session aborted: ${message}`);
      throw err;
    } finally {
      for (const p of participants) {
        await p.store.close();
      }
    }
  }

  private async runRounds(
    session: Session,
    participants: Participant[],
    slog: SessionLog,
    hooks: DiscussionHooks | undefined,
  ): Promise<Omit<DiscussionResult, "session" | "durationMs">> {
    const latestResponses = new Map<string, string>();
    const averages: number[] = [];

    for (let round = 1; round <= session.maxInteractions; round++) {
      this.log.info("round", round + "/" + session.maxInteractions, "start");
      hooks?.onRoundStart?.(round);

      for (const participant of participants) {
        const messages = round === 1
          ? buildInitialPrompt(session.researchPrompt, CONVERGENCE_PHRASE)
          : buildIterativePrompt(
              latestResponses.get(participant.name) ?? "",
              new Map([...latestResponses].filter(([name]) => name !== participant.name)),
              CONVERGENCE_PHRASE,
            );

        this.log.debug(participant.name, "prompt:", truncate(messages.map((m) => m.content).join("\n")));
        slog.write("debug", `--- round ${round} ${participant.name} prompt ---\n` +
          messages.map((m) => `[${m.role}]\n${m.content}`).join("\n"));

        const response = await participant.provider.generateCompletion(messages);
        const convergence = extractConvergence(response);

        slog.write("debug", `--- round ${round} ${participant.name} response (convergence: ${convergence}%) ---\n${response}`);
        if (response === "") {
          this.log.warn(participant.name, "returned an empty response in round", round);
        }

        await participant.store.insert(round, response, convergence);
        latestResponses.set(participant.name, response);
        hooks?.onResponse?.({ round, model: participant.name, response, convergence });
      }

      const { converged, average } = checkConvergence(latestResponses, session.convergenceThreshold);
      averages.push(average);
      this.log.info("round", round, "average convergence:", average + "%");
      slog.write("info", `round ${round} complete: average convergence ${average}%`);
      hooks?.onRoundComplete?.({ round, average, converged });

      if (converged) {
        return { status: "converged", roundsCompleted: round, averages, latestResponses };
      }
    }

    return { status: "exhausted", roundsCompleted: session.maxInteractions, averages, latestResponses };
  }
}
