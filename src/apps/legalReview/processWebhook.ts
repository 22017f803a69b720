import { FetchError, SubmissionError, ValidationError, errorMessage } from "../../lib/errors";
import type { JiraApi } from "../../lib/jira/api";
import type { RequestContext } from "../../lib/logging";
import type { NotionApi } from "../../lib/notion/api";
import type { ProcessingResult } from "./domain";
import { fetchDocumentRecord } from "./extract/fetchDocumentRecord";
import { interpretEvent } from "./interpret/interpretEvent";
import { submitTicket } from "./submitTicket";
import { buildTicketRequest } from "./ticket/buildTicketRequest";
import type { DescriptionLayout } from "./ticket/descriptionLayouts";

export interface LegalReviewDeps {
  notion: Pick<NotionApi, "getPage">;
  jira: Pick<JiraApi, "createIssue">;
  projectKey: string;
  layout: DescriptionLayout;
}

async function timeStep<T>(
  ctx: RequestContext,
  step: string,
  fn: () => Promise<T>,
  extra?: Record<string, unknown>,
): Promise<T> {
  const startedAt = Date.now();
  const stepCtx = ctx.withDomain("steps");
  try {
    const result = await fn();
    stepCtx.log("info", "completed", {
      step,
      duration_ms: Date.now() - startedAt,
      ...(extra ?? {}),
    });
    return result;
  } catch (err) {
    stepCtx.log("error", "failed", {
      step,
      duration_ms: Date.now() - startedAt,
      error: errorMessage(err),
      ...(extra ?? {}),
    });
    throw err;
  }
}

function isAutomationError(err: unknown): err is FetchError | ValidationError | SubmissionError {
  return err instanceof FetchError || err instanceof ValidationError || err instanceof SubmissionError;
}

function toErrorResult(err: unknown, documentId: string | null): ProcessingResult {
  const error = isAutomationError(err)
    ? `Campaign automation error: ${err.message}`
    : `Unexpected error in campaign automation: ${errorMessage(err)}`;
  return { status: "error", error, documentId };
}

export function successMessage(args: { title: string; ticketKey: string; documentId: string }): string {
  return (
    `Successfully processed campaign '${args.title}'. ` +
    `Created Jira ticket: ${args.ticketKey} for Notion page: ${args.documentId}`
  );
}

/**
 * interpret -> fetch + validate -> build -> submit. Every failure after
 * interpretation becomes an `error` result; nothing is thrown to the caller.
 */
export async function processWebhook(args: {
  ctx: RequestContext;
  event: unknown;
  deps: LegalReviewDeps;
}): Promise<ProcessingResult> {
  const { ctx, event, deps } = args;
  const processingCtx = ctx.withDomain("processing");

  // 1) interpret
  const interpretation = interpretEvent(event, ctx.withDomain("interpret"));
  if (!interpretation.actionable) {
    return { status: "ignored", reason: interpretation.detail, code: interpretation.reason };
  }

  const { documentId } = interpretation;
  ctx.set({ document_id: documentId });

  try {
    // 2) fetch + validate
    const record = await timeStep(ctx, "fetch_document_record", () =>
      fetchDocumentRecord(deps.notion, documentId),
    );

    // 3) build + submit
    const request = buildTicketRequest(record, { projectKey: deps.projectKey, layout: deps.layout });
    const ticketKey = await timeStep(ctx, "submit_ticket", () => submitTicket(deps.jira, request), {
      project_key: deps.projectKey,
      layout: deps.layout.name,
    });

    // 4) done
    const message = successMessage({ title: record.title, ticketKey, documentId });
    processingCtx.log("info", "ticket_created", { title: record.title, ticket_key: ticketKey });

    return { status: "success", documentId, title: record.title, ticketKey, message };
  } catch (err) {
    const result = toErrorResult(err, documentId);
    processingCtx.log("error", "processing_failed", {
      error: errorMessage(err),
      error_name: err instanceof Error ? err.name : undefined,
      error_kind: err instanceof FetchError || err instanceof SubmissionError ? err.kind : undefined,
      missing_field: err instanceof ValidationError ? err.field : undefined,
    });
    return result;
  }
}
