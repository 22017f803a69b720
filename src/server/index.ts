import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { isObject } from "../lib/json/getPath";

const PARSER_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Invalid JSON payload",
  "entity.too.large": "Payload too large",
  "charset.unsupported": "Unsupported charset",
  "encoding.unsupported": "Unsupported content encoding",
  "request.aborted": "Request aborted",
};

/** Body-parser errors carry a `type` tag and a 4xx `status`. */
function parserErrorStatus(err: unknown): { status: number; type: string } | null {
  if (!isObject(err) || typeof err.type !== "string" || typeof err.status !== "number") {
    return null;
  }
  return { status: err.status >= 400 && err.status < 500 ? err.status : 400, type: err.type };
}

/**
 * server/ — pure HTTP transport layer
 *
 * - Express app creation + JSON body parsing only
 * - No routes, no listening, no config usage
 */
export function createApp(): Express {
  const app = express();
  app.use(express.json());

  // Registered right after the parser so rejected bodies get a JSON 4xx
  // instead of Express's HTML error page; route errors never reach it.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const parserError = parserErrorStatus(err);
    if (parserError) {
      res.status(parserError.status).json({
        status: "error",
        error: PARSER_ERROR_MESSAGES[parserError.type] ?? "Invalid request body",
      });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: "error", error: "Invalid JSON payload" });
      return;
    }
    next(err);
  });

  return app;
}
