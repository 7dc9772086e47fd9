/**
 * pdfdex HTTP Server
 * Express app exposing ingestion and search over a PdfdexService
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Server } from "node:http";
import type { PdfdexService } from "../rag/service.js";
import { httpStatusFor, toPdfdexError, ValidationError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { createApiRouter } from "./routes/api.js";

export interface ServerOptions {
  /** Maximum accepted JSON body (default: "1mb") */
  bodyLimit?: string;
}

export interface PdfdexServer {
  app: Express;
  port: number;
  url: string;
  shutdown: () => Promise<void>;
}

/**
 * Error body returned to clients. Never carries a stack trace.
 */
interface ErrorResponse {
  error: string;
  field?: string;
}

/**
 * body-parser reports malformed JSON with a 4xx status and a `type`
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    "type" in error &&
    typeof error.type === "string"
  );
}

function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    res.status(error.status).json({ error: error.type === "entity.parse.failed" ? "Invalid JSON body" : error.message });
    return;
  }

  const status = httpStatusFor(error);
  const pdfdexError = toPdfdexError(error);
  const body: ErrorResponse = { error: status >= 500 ? pdfdexError.getUserMessage("medium") : pdfdexError.message };
  if (error instanceof ValidationError && error.field) {
    body.field = error.field;
  }

  if (status >= 500) {
    getLogger().error(`[Server] ${req.method} ${req.path} failed`, error);
  } else {
    getLogger().debug(`[Server] ${req.method} ${req.path} -> ${status}: ${pdfdexError.message}`);
  }
  res.status(status).json(body);
}

/**
 * Create and configure the Express app (not yet listening)
 */
export function createApp(service: PdfdexService, options: ServerOptions = {}): Express {
  const app = express();

  app.use(express.json({ limit: options.bodyLimit ?? "1mb" }));

  // Security headers
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    next();
  });

  app.use("/", createApiRouter(service));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  app.use(errorHandler);

  return app;
}

/**
 * Start listening. Port 0 picks a free port; the bound one is reported back.
 */
export function listen(app: Express, host: string, port: number): Promise<PdfdexServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, host);

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const boundPort = typeof address === "object" && address !== null ? address.port : port;
      const url = `http://${host}:${boundPort}`;

      const shutdown = (): Promise<void> =>
        new Promise((done, fail) => {
          server.close((err) => (err ? fail(err) : done()));
        });

      resolve({ app, port: boundPort, url, shutdown });
    });
  });
}
