/**
 * Typed error classes.
 *
 * ConfigurationError: rejected before any round runs (bad config, bad arguments)
 * StorageError: a response store could not be opened, written or read
 * ProviderError: a completion backend failed (transport, HTTP status, malformed reply)
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class StorageError extends Error {
  readonly storePath: string;
  readonly roundNumber?: number;

  constructor(message: string, storePath: string, roundNumber?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.storePath = storePath;
    this.roundNumber = roundNumber;
  }
}

export class ProviderError extends Error {
  readonly provider: string;
  readonly model: string;
  readonly status?: number;

  constructor(message: string, provider: string, model: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.model = model;
    this.status = status;
  }
}
