/**
 * Response store interface.
 *
 * Append-only: insert() rejects a round number that already exists.
 * Every insert is committed before it returns.
 */

import type { ResponseRecord } from "./types.js";

export interface IResponseStore {
  /** Path of the backing file */
  readonly path: string;

  /** Create the schema if absent. Safe to call on an existing store. */
  initialize(): Promise<void>;
  insert(roundNumber: number, response: string, convergence: number): Promise<ResponseRecord>;
  /** All records, ascending by round number. */
  readAll(): Promise<ResponseRecord[]>;
  close(): Promise<void>;
}
