import http from "node:http";
import https from "node:https";

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * POST a JSON body and collect the full response text.
 * Resolves for any HTTP status; rejects on transport errors and timeouts.
 */
export function postJson(
  url: string,
  headers: Record<string, string>,
  body: object,
  timeoutMs: number,
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const parsed = new URL(url);
    const isHttps = parsed.protocol === "https:";
    const transport = isHttps ? https : http;

    const payload = JSON.stringify(body);
    const allHeaders: Record<string, string> = {
      "Accept": "application/json",
      "Content-Type": "application/json",
      "Content-Length": String(Buffer.byteLength(payload)),
      ...headers,
    };

    const req = transport.request(
      {
        hostname: parsed.hostname,
        port: parsed.port || (isHttps ? 443 : 80),
        path: parsed.pathname + parsed.search,
        method: "POST",
        headers: allHeaders,
        timeout: timeoutMs,
      },
      (res) => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => resolve({ status: res.statusCode ?? 0, body: data }));
        res.on("error", reject);
      }
    );

    req.on("error", reject);
    req.on("timeout", () => {
      req.destroy(new Error(`request timeout after ${timeoutMs}ms`));
    });

    req.write(payload);
    req.end();
  });
}

/** Join a base URL (with or without trailing slash) and an absolute API path. */
export function joinUrl(base: string, path: string): string {
  return base.replace(/\/+$/, "") + path;
}
