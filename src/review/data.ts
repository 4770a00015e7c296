import { readdirSync } from "node:fs";
import { basename, join } from "node:path";
import { SqliteResponseStore } from "../store/sqlite.js";
import { STORE_EXTENSION, type ResponseRecord } from "../store/types.js";

export interface ReviewEntry extends ResponseRecord {
  preview: string;
}

export interface ModelResponses {
  model: string;
  /** Newest round first */
  responses: ReviewEntry[];
}

const PREVIEW_CHARS = 100;

/**
 * Short preview of a response: its first two non-blank lines, or the first
 * 100 characters when it has fewer than two.
 */
export function makePreview(response: string): string {
  const lines = response.split(/\r?\n/).map((l) => l.trim()).filter((l) => l !== "");
  if (lines.length >= 2) {
    return lines.slice(0, 2).join("\n");
  }
  return response.slice(0, PREVIEW_CHARS) + (response.length > PREVIEW_CHARS ? "..." : "");
}

/** Read one model's store, newest round first. */
export async function readModelResponses(dbPath: string): Promise<ReviewEntry[]> {
  const store = new SqliteResponseStore(dbPath, { readonly: true });
  try {
    const records = await store.readAll();
    return records
      .reverse()
      .map((r) => ({ ...r, preview: makePreview(r.response) }));
  } finally {
    await store.close();
  }
}

/** Every <model>.db in the session folder, sorted by model name. */
export async function loadSessionData(sessionFolder: string): Promise<ModelResponses[]> {
  const files = readdirSync(sessionFolder)
    .filter((f) => f.endsWith(STORE_EXTENSION))
    .sort();

  const data: ModelResponses[] = [];
  for (const file of files) {
    data.push({
      model: basename(file, STORE_EXTENSION),
      responses: await readModelResponses(join(sessionFolder, file)),
    });
  }
  return data;
}
