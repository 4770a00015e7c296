import { mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { STORE_EXTENSION } from "./store/types.js";
import { StorageError } from "./errors.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as "YYYYMMDDHHMMSS". */
export function formatSessionTimestamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/** {responsesFolderPath}/{title} - {YYYYMMDDHHMMSS} */
export function sessionFolderPath(responsesFolderPath: string, title: string, createdAt: Date): string {
  return join(responsesFolderPath, `${title} - ${formatSessionTimestamp(createdAt)}`);
}

/**
 * Create a fresh session folder. The parent is created as needed; an existing
 * session folder (same title, same second) is an error, never reused.
 */
export function createSessionFolder(responsesFolderPath: string, title: string, createdAt: Date): string {
  const folder = sessionFolderPath(responsesFolderPath, title, createdAt);
  try {
    mkdirSync(dirname(folder), { recursive: true });
    mkdirSync(folder);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StorageError(`Cannot create session folder ${folder}: ${reason}`, folder, undefined, { cause: err });
  }
  return folder;
}

export function storePath(sessionFolder: string, modelName: string): string {
  return join(sessionFolder, `${modelName}${STORE_EXTENSION}`);
}
