/**
 * HTTP server for the research API.
 *
 *   GET /health   health check, no auth
 *   /api/*        delegated to ApiRouter
 *
 * Auth: Bearer token via Authorization header or x-research-token header.
 * A report content URL carrying a valid `expires` + `sig` pair needs no token.
 * Owner: x-owner-id header, "dev-user" when absent.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { ServerConfig } from "../config.js";
import type { ApiRouter } from "./router.js";
import { sendJson, readJsonBody, BodyTooLargeError } from "./respond.js";
import { ReportLinkSigner } from "../reports/links.js";
import { isReportFormat } from "../reports/types.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("api-server");

export const DEFAULT_OWNER_ID = "dev-user";

const CONTENT_ROUTE = /^\/api\/reports\/([^/]+)\/content$/;

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export class ApiServer {
  private server: Server | null = null;
  private router: ApiRouter | null = null;
  private links: ReportLinkSigner;

  constructor(
    private config: ServerConfig,
    links?: ReportLinkSigner,
  ) {
    this.links = links ?? new ReportLinkSigner(config.token);
  }

  setRouter(router: ApiRouter): void {
    this.router = router;
  }

  async start(): Promise<void> {
    const server = createServer((req, res) => {
      res.setHeader("Access-Control-Allow-Origin", "*");
      res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
      res.setHeader(
        "Access-Control-Allow-Headers",
        "Content-Type, Authorization, x-research-token, x-owner-id",
      );

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      this.handleRequest(req, res).catch((e: unknown) => {
        log.error({ err: e }, "unhandled API error");
        if (!res.headersSent) {
          sendJson(res, 500, { error: "Internal server error" });
        } else {
          res.end();
        }
      });
    });
    this.server = server;

    const bind = this.config.bind ?? "127.0.0.1";
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, bind, () => {
        server.off("error", reject);
        log.info({ port: this.getPort(), bind }, "API server listening");
        resolve();
      });
    });
  }

  /** Bound port, or null before start(). */
  getPort(): number | null {
    const addr = this.server?.address();
    return addr && typeof addr !== "string" ? addr.port : null;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = req.url ?? "/";
    const method = req.method ?? "GET";

    if (url === "/health" && method === "GET") {
      sendJson(res, 200, { status: "ok", uptime: process.uptime() });
      return;
    }

    if (method === "GET" && (await this.handleSignedContent(url, res))) {
      return;
    }

    if (!this.authenticate(req)) {
      sendJson(res, 401, { error: "Unauthorized" });
      return;
    }

    if (!url.startsWith("/api/")) {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    if (!this.router) {
      sendJson(res, 503, { error: "API not available" });
      return;
    }

    let body: unknown;
    if (method === "POST" || method === "PUT") {
      try {
        body = await readJsonBody(req);
      } catch (e) {
        if (e instanceof BodyTooLargeError) {
          sendJson(res, 413, { error: e.message });
        } else {
          sendJson(res, 400, { error: "Invalid JSON body" });
        }
        return;
      }
    }

    const ownerId = headerValue(req, "x-owner-id")?.trim() || DEFAULT_OWNER_ID;
    const handled = await this.router.handle(method, url, res, ownerId, body);
    if (!handled) {
      sendJson(res, 404, { error: "Not found" });
    }
  }

  /** Signed report links. Returns false when the URL is not one. */
  private async handleSignedContent(url: string, res: ServerResponse): Promise<boolean> {
    const [path, queryString] = url.split("?", 2);
    const query = new URLSearchParams(queryString ?? "");
    const match = path.match(CONTENT_ROUTE);
    if (!match || !query.has("sig")) return false;

    const id = decodeURIComponent(match[1]);
    const format = query.get("format") ?? "md";
    if (!isReportFormat(format) || !this.links.verify(id, format, query.get("expires"), query.get("sig"))) {
      sendJson(res, 403, { error: "Invalid or expired link" });
      return true;
    }
    if (!this.router) {
      sendJson(res, 503, { error: "API not available" });
      return true;
    }

    await this.router.serveReportContent(id, format, res);
    return true;
  }

  private authenticate(req: IncomingMessage): boolean {
    const authHeader = headerValue(req, "authorization");
    const tokenHeader = headerValue(req, "x-research-token");

    if (authHeader) {
      const match = authHeader.match(/^Bearer\s+(.+)$/i);
      if (match && match[1] === this.config.token) return true;
    }

    return tokenHeader === this.config.token;
  }
}
