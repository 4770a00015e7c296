/**
 * Response store types.
 *
 * One store per model per session. Each row is one round's answer,
 * keyed by round number and never updated after insertion.
 */

export interface ResponseRecord {
  /** 1-based round number; primary key */
  roundNumber: number;
  /** Raw response text, possibly empty when the backend failed softly */
  response: string;
  /** Agreement percentage extracted from the response (0 if absent) */
  convergence: number;
  /** Local wall-clock write time, "YYYY-MM-DD HH:MM:SS" */
  timestamp: string;
}

/** Store file extension inside a session folder: <model>.db */
export const STORE_EXTENSION = ".db";
