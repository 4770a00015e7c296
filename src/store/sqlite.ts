/**
 * SQLite response store using better-sqlite3.
 *
 * Schema: responses(response_number INTEGER PRIMARY KEY, response TEXT NOT NULL,
 *                   convergence REAL NOT NULL, timestamp TEXT NOT NULL)
 *
 * Statements run in autocommit mode with synchronous=FULL, so each insert is
 * on disk before the call returns.
 */

import Database from "better-sqlite3";
import type { IResponseStore } from "./interfaces.js";
import type { ResponseRecord } from "./types.js";
import { StorageError } from "../errors.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as "YYYY-MM-DD HH:MM:SS". */
export function formatRecordTimestamp(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface ResponseRow {
  response_number: number;
  response: string;
  convergence: number;
  timestamp: string;
}

export interface SqliteResponseStoreOptions {
  /** Open an existing store without write access (review tooling). */
  readonly?: boolean;
  /** Clock for record timestamps. */
  now?: () => Date;
}

export class SqliteResponseStore implements IResponseStore {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(path: string, options: SqliteResponseStoreOptions = {}) {
    this.path = path;
    this.now = options.now ?? (() => new Date());
    try {
      this.db = options.readonly
        ? new Database(path, { readonly: true, fileMustExist: true })
        : new Database(path);
      if (!options.readonly) {
        this.db.pragma("synchronous = FULL");
      }
    } catch (err) {
      throw new StorageError(`Cannot open response store ${path}: ${errorMessage(err)}`, path, undefined, { cause: err });
    }
  }

  async initialize(): Promise<void> {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS responses (
          response_number INTEGER PRIMARY KEY,
          response TEXT NOT NULL,
          convergence REAL NOT NULL,
          timestamp TEXT NOT NULL
        );
      `);
    } catch (err) {
      throw new StorageError(`Cannot initialize response store ${this.path}: ${errorMessage(err)}`, this.path, undefined, { cause: err });
    }
  }

  async insert(roundNumber: number, response: string, convergence: number): Promise<ResponseRecord> {
    const record: ResponseRecord = {
      roundNumber,
      response,
      convergence,
      timestamp: formatRecordTimestamp(this.now()),
    };

    try {
      this.db.prepare(`
        INSERT INTO responses (response_number, response, convergence, timestamp)
        VALUES (?, ?, ?, ?)
      `).run(record.roundNumber, record.response, record.convergence, record.timestamp);
    } catch (err) {
      throw new StorageError(
        `Cannot insert round ${roundNumber} into ${this.path}: ${errorMessage(err)}`,
        this.path,
        roundNumber,
        { cause: err },
      );
    }
    return record;
  }

  async readAll(): Promise<ResponseRecord[]> {
    try {
      const rows = this.db.prepare<[], ResponseRow>(
        "SELECT response_number, response, convergence, timestamp FROM responses ORDER BY response_number ASC"
      ).all();
      return rows.map((row) => ({
        roundNumber: row.response_number,
        response: row.response,
        convergence: row.convergence,
        timestamp: row.timestamp,
      }));
    } catch (err) {
      throw new StorageError(`Cannot read response store ${this.path}: ${errorMessage(err)}`, this.path, undefined, { cause: err });
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
