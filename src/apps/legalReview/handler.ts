import type { AppConfig } from "../../lib/config";
import type { FetchFn } from "../../lib/http/fetchWithDeadline";
import { createJiraApi } from "../../lib/jira/api";
import { createJiraClient } from "../../lib/jira/client";
import type { RequestContext } from "../../lib/logging";
import { createNotionApi } from "../../lib/notion/api";
import { createNotionClient } from "../../lib/notion/client";
import { TRIGGER_STATUS, type DocumentRecord, type ProcessingResult } from "./domain";
import { fetchDocumentRecord } from "./extract/fetchDocumentRecord";
import { processWebhook, type LegalReviewDeps } from "./processWebhook";
import { DESCRIPTION_LAYOUTS } from "./ticket/descriptionLayouts";

export interface LegalReviewHandler {
  handleWebhook(ctx: RequestContext, body: unknown): Promise<ProcessingResult>;
  fetchDocument(ctx: RequestContext, documentId: string): Promise<DocumentRecord>;
}

/** Flat-shape body that always passes interpretation, used by manual triggers. */
export function buildManualTriggerEvent(documentId: string): Record<string, unknown> {
  return {
    event: "page_updated",
    page_id: documentId,
    properties: {
      status: {
        type: "status",
        status: { name: TRIGGER_STATUS },
      },
    },
  };
}

export function createLegalReviewHandler(
  config: AppConfig,
  options: { fetchFn?: FetchFn } = {},
): LegalReviewHandler {
  const notionClient = createNotionClient({
    token: config.notion.apiKey,
    notionVersion: config.notion.version,
    timeoutMs: config.requestTimeoutMs,
    fetchFn: options.fetchFn,
  });
  const jiraClient = createJiraClient({
    domain: config.jira.domain,
    username: config.jira.username,
    apiToken: config.jira.apiToken,
    timeoutMs: config.requestTimeoutMs,
    fetchFn: options.fetchFn,
  });
  const layout = DESCRIPTION_LAYOUTS[config.jira.descriptionLayout];

  function depsFor(ctx: RequestContext): LegalReviewDeps {
    const notionLogger = ctx.withDomain("notion");
    const jiraLogger = ctx.withDomain("jira");
    return {
      notion: createNotionApi((o) => notionClient.request({ ...o, logger: notionLogger })),
      jira: createJiraApi((o) => jiraClient.request({ ...o, logger: jiraLogger })),
      projectKey: config.jira.projectKey,
      layout,
    };
  }

  return {
    async handleWebhook(ctx, body) {
      ctx.withDomain("handler").log("info", "webhook_received");
      const result = await processWebhook({ ctx, event: body, deps: depsFor(ctx) });
      ctx.withDomain("handler").log(result.status === "error" ? "error" : "info", "webhook_processed", {
        result_status: result.status,
        duration_ms: Date.now() - ctx.startedAtMs,
      });
      return result;
    },
    async fetchDocument(ctx, documentId) {
      ctx.set({ document_id: documentId });
      return fetchDocumentRecord(depsFor(ctx).notion, documentId);
    },
  };
}
