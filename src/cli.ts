#!/usr/bin/env node

/**
 * peer-consensus CLI.
 *
 * Commands:
 *   peer-consensus discuss --config <file> --prompt-title <title> --max-interactions <n> --research-prompt <text>
 *   peer-consensus review --session-folder <dir> [--port 5000]
 */

import { parseArgs } from "node:util";
import { existsSync, statSync } from "node:fs";
import { loadConfig } from "./config.js";
import { DiscussionSession, MIN_INTERACTIONS } from "./orchestrator.js";
import { startReviewServer } from "./review/server.js";
import { ConfigurationError } from "./errors.js";
import { setLogLevel } from "./logger.js";

const VERSION = "0.1.0";

const USAGE = `Usage: peer-consensus <command> [options]

Commands:
  discuss                  Run a multi-model discussion until consensus or max interactions
  review                   Browse the stored responses of a session in the browser

discuss options:
  --config <file>          Path to configuration JSON file (required)
  --prompt-title <title>   Title for the discussion session (required)
  --max-interactions <n>   Maximum number of interactions, at least ${MIN_INTERACTIONS} (required)
  --research-prompt <text> Research prompt, e.g. "a promising avenue for cancer treatment" (required)

review options:
  --session-folder <dir>   Session folder containing the model .db files (required)
  --port <n>               Port for the review server (default: 5000)

Global options:
  --verbose                Show info-level logs on stderr
  --debug                  Show all logs (debug level) on stderr
  --help                   Show this help
  --version                Show version

Environment:
  PEER_CONSENSUS_LOG_LEVEL Set log level: error, warn (default), info, debug
`;

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

async function main() {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.includes("--debug")) {
    setLogLevel("debug");
  } else if (rawArgs.includes("--verbose")) {
    setLogLevel("info");
  }
  const args = rawArgs.filter((a) => a !== "--verbose" && a !== "--debug");

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log(`peer-consensus v${VERSION}`);
    process.exit(0);
  }

  const command = args[0];
  switch (command) {
    case "discuss":
      await cmdDiscuss(args.slice(1));
      break;
    case "review":
      await cmdReview(args.slice(1));
      break;
    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

async function cmdDiscuss(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string" },
      "prompt-title": { type: "string" },
      "max-interactions": { type: "string" },
      "research-prompt": { type: "string" },
    },
  });

  const configPath = values.config;
  const title = values["prompt-title"];
  const researchPrompt = values["research-prompt"];
  const maxRaw = values["max-interactions"];
  if (!configPath || !title || !researchPrompt || !maxRaw) {
    fail("discuss requires --config, --prompt-title, --max-interactions and --research-prompt");
  }
  if (!existsSync(configPath)) {
    fail(`config file not found: ${configPath}`);
  }

  const maxInteractions = Number(maxRaw);
  if (!Number.isInteger(maxInteractions) || maxInteractions < MIN_INTERACTIONS) {
    fail(`max-interactions must be at least ${MIN_INTERACTIONS} (got "${maxRaw}")`);
  }

  const config = loadConfig(configPath);
  const session = new DiscussionSession({
    title,
    researchPrompt,
    maxInteractions,
    config,
    hooks: {
      onRoundStart: (round) => console.log(`\n--- Interaction ${round} ---`),
      onResponse: ({ model, response }) => {
        console.log(`Response from ${model}:\n${response}\n`);
      },
      onRoundComplete: ({ round, average, converged }) => {
        console.log(`Average convergence after interaction ${round}: ${average}%`);
        if (converged) console.log("Consensus achieved. Stopping discussion.");
      },
    },
  });

  console.log(`Starting discussion with ${config.models.length} models. Max interactions: ${maxInteractions}`);
  const result = await session.run();

  console.log(`\nSession folder: ${result.session.folder}`);
  if (result.status === "exhausted") {
    console.log(`No consensus after ${result.roundsCompleted} interactions.`);
  }
  console.log("Discussion complete.");
  console.log("Run the following command to review the conversation:");
  console.log(`peer-consensus review --session-folder "${result.session.folder}" --port 5000`);
}

async function cmdReview(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      "session-folder": { type: "string" },
      port: { type: "string", default: "5000" },
    },
  });

  const sessionFolder = values["session-folder"];
  if (!sessionFolder) {
    fail("review requires --session-folder");
  }
  if (!existsSync(sessionFolder) || !statSync(sessionFolder).isDirectory()) {
    fail(`session folder not found: ${sessionFolder}`);
  }

  const port = Number(values.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    fail(`--port must be an integer between 0 and 65535 (got "${values.port}")`);
  }

  const server = await startReviewServer({ sessionFolder, port });
  console.log(`Reviewing ${sessionFolder}`);
  console.log(`Open ${server.url} in your browser (Ctrl+C to stop)`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  const prefix = err instanceof ConfigurationError ? "Configuration error:" : "Error:";
  console.error(prefix, err instanceof Error ? err.message : err);
  process.exit(1);
});
