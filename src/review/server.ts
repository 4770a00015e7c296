/**
 * Review HTTP server: read-only view of a finished session.
 *
 * GET / renders every model's responses, newest round first.
 * Stores are opened read-only on each request and closed right after.
 */

import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { existsSync } from "node:fs";
import { basename } from "node:path";
import { loadSessionData } from "./data.js";
import { renderReviewPage } from "./page.js";
import { createLogger } from "../logger.js";

const log = createLogger("review");

export interface ReviewServerOptions {
  sessionFolder: string;
  /** 0 picks a free port */
  port: number;
  host?: string;
}

export interface ReviewServer {
  readonly url: string;
  readonly port: number;
  close: () => Promise<void>;
}

export async function startReviewServer(opts: ReviewServerOptions): Promise<ReviewServer> {
  const { sessionFolder } = opts;
  const host = opts.host ?? "127.0.0.1";

  const httpServer = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (req.method !== "GET" || url.pathname !== "/") {
        res.writeHead(404, { "Content-Type": "text/plain; charset=utf-8" });
        res.end("Not found");
        return;
      }

      if (!existsSync(sessionFolder)) {
        res.writeHead(400, { "Content-Type": "text/plain; charset=utf-8" });
        res.end("Invalid session folder configuration.");
        return;
      }

      const data = await loadSessionData(sessionFolder);
      res.writeHead(200, { "Content-Type": "text/html; charset=utf-8" });
      res.end(renderReviewPage(basename(sessionFolder), data));
    } catch (err) {
      log.error("request handler error:", err instanceof Error ? err.message : String(err));
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "text/plain; charset=utf-8" });
        res.end("Internal server error");
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(opts.port, host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : opts.port;
  const url = `http://${host}:${port}/`;
  log.info(`review server listening on ${url}`);

  return {
    url,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.close((err) => (err ? reject(err) : resolve()));
        log.info("review server stopped");
      }),
  };
}
