import crypto from "crypto";
import express from "express";
import type { Request, Response } from "express";
import type { ProcessingResult } from "../apps/legalReview/domain";
import { buildManualTriggerEvent, type LegalReviewHandler } from "../apps/legalReview/handler";
import type { AppConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { getString, isObject } from "../lib/json/getPath";
import { createRequestContext, type LogSink, type RequestContext } from "../lib/logging";

export const APP_NAME = "legal-review";

/** Collaborator status codes are never forwarded; only 200 or 500 leave this service. */
export function statusCodeFor(result: ProcessingResult): 200 | 500 {
  return result.status === "error" ? 500 : 200;
}

function getPayloadPreview(body: unknown, limit = 500): string {
  const json = JSON.stringify(body) ?? String(body);
  return json.length > limit ? `${json.slice(0, limit)}...` : json;
}

function hasJsonPayload(body: unknown): boolean {
  return isObject(body) && Object.keys(body).length > 0;
}

export function createLegalReviewRouter(args: {
  handler: LegalReviewHandler;
  config: AppConfig;
  logSink?: LogSink;
}): express.Router {
  const { handler, config, logSink } = args;
  const router = express.Router();

  async function withRequestContext(
    route: string,
    req: Request,
    res: Response,
    fn: (ctx: RequestContext) => Promise<Response>,
  ): Promise<Response> {
    const requestId = crypto.randomUUID();
    const ctx = createRequestContext({ app: APP_NAME, requestId, sink: logSink });
    const httpCtx = ctx.withDomain("http");
    const startedAt = Date.now();
    ctx.set({ path: req.path });

    res.on("finish", () => {
      httpCtx.log("info", "response_finished", {
        route,
        status_code: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });

    try {
      httpCtx.log("info", "request_received", { route });
      if (config.debugPayloads) {
        httpCtx.withDomain("ingress").log("info", "payload_preview", {
          payload_preview: getPayloadPreview(req.body),
        });
      }
      return await fn(ctx);
    } catch (err) {
      httpCtx.log("error", "unexpected_error", {
        route,
        error: errorMessage(err),
        error_name: err instanceof Error ? err.name : undefined,
      });
      return res.status(500).json({ status: "error", error: "Internal server error" });
    }
  }

  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      notionConfigured: Boolean(config.notion.apiKey),
      jiraConfigured: Boolean(config.jira.apiToken),
    });
  });

  router.post("/webhook", async (req: Request, res: Response) => {
    return await withRequestContext("webhook", req, res, async (ctx) => {
      if (!hasJsonPayload(req.body)) {
        return res.status(400).json({ status: "error", error: "No JSON payload received" });
      }
      const result = await handler.handleWebhook(ctx, req.body);
      return res.status(statusCodeFor(result)).json(result);
    });
  });

  // Manual trigger for a known page, bypassing the Notion automation.
  router.post("/test", async (req: Request, res: Response) => {
    return await withRequestContext("test", req, res, async (ctx) => {
      const pageId = getString(req.body, ["page_id"])?.trim();
      if (!pageId) {
        return res.status(400).json({ status: "error", error: "page_id is required" });
      }
      const result = await handler.handleWebhook(ctx, buildManualTriggerEvent(pageId));
      return res.status(result.status === "success" ? 200 : 500).json(result);
    });
  });

  return router;
}
