import * as fs from "fs";
import * as http from "http";
import { pipeline } from "stream/promises";
import type { QueryService } from "@ontoscope/core";
import type { ServerConfig } from "./config";
import type { ScopedLogger } from "./logger";
import { corsHeaders } from "./cors";
import { routeApiRequest } from "./routes";
import { contentTypeFor, findStaticFile } from "./static-files";

type ServerOptions = Pick<ServerConfig, "allowedOrigins" | "webDir">;

function sendJson(res: http.ServerResponse, status: number, body: unknown, headOnly = false): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(headOnly ? undefined : payload);
}

async function serveStatic(
  res: http.ServerResponse,
  webDir: string,
  pathname: string,
  headOnly: boolean,
): Promise<boolean> {
  const filePath = await findStaticFile(webDir, pathname);
  if (!filePath) return false;

  res.writeHead(200, { "Content-Type": contentTypeFor(filePath) });
  if (headOnly) {
    res.end();
    return true;
  }

  try {
    await pipeline(fs.createReadStream(filePath), res);
  } catch (err) {
    // The client disconnected mid-file; both streams are already closed.
    if (!(err instanceof Error && "code" in err && err.code === "ERR_STREAM_PREMATURE_CLOSE")) throw err;
  }
  return true;
}

/**
 * HTTP front for the query service. The service must be fully built before
 * this is called; the server has no notion of a loading state.
 */
export function createServer(service: QueryService, options: ServerOptions, logger: ScopedLogger): http.Server {
  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    for (const [name, value] of Object.entries(corsHeaders(options.allowedOrigins, req.headers.origin))) {
      res.setHeader(name, value);
    }

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const headOnly = method === "HEAD";
    const result = routeApiRequest(service, method, url);
    if (result) {
      sendJson(res, result.status, result.body, headOnly);
      return;
    }

    if (options.webDir && (method === "GET" || headOnly)) {
      if (await serveStatic(res, options.webDir, url.pathname, headOnly)) return;
    }

    sendJson(res, 404, { detail: "Not found" }, headOnly);
  };

  return http.createServer((req, res) => {
    const startTime = Date.now();
    res.on("finish", () => {
      logger.verbose(`${req.method} ${req.url} ${res.statusCode} ${Date.now() - startTime}ms`);
    });

    handle(req, res).catch((err: unknown) => {
      logger.error(`Error handling ${req.method} ${req.url}:`, err);
      if (res.headersSent) {
        res.destroy(err instanceof Error ? err : undefined);
        return;
      }
      sendJson(res, 500, { detail: "Internal server error" });
    });
  });
}

export function startServer(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
