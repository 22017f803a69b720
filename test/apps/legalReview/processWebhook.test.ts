import { describe, expect, it, vi } from "vitest";
import { processWebhook, type LegalReviewDeps } from "../../../src/apps/legalReview/processWebhook";
import { headedLayout, simpleLayout } from "../../../src/apps/legalReview/ticket/descriptionLayouts";
import { FetchError, SubmissionError } from "../../../src/lib/errors";
import type { CreateIssueRequest, CreatedIssue } from "../../../src/lib/jira/api";
import type { NotionPage } from "../../../src/lib/notion/api";
import { flatEvent, testContext, wrappedEvent } from "../../helpers";

function page(args: { title: string; copyUrl: string; designUrl: string }): NotionPage {
  return {
    id: "p1",
    properties: {
      Name: { type: "title", title: [{ plain_text: args.title }] },
      "Final Copy URL": { type: "url", url: args.copyUrl },
      "Final Design URL": { type: "url", url: args.designUrl },
    },
  };
}

const springSale = page({ title: "Spring Sale", copyUrl: "http://x/copy", designUrl: "http://x/design" });

function fakeDeps(overrides: {
  getPage?: (id: string) => Promise<NotionPage>;
  createIssue?: (request: CreateIssueRequest) => Promise<CreatedIssue>;
} = {}) {
  const getPage = vi.fn(overrides.getPage ?? (async (_id: string) => springSale));
  const createIssue = vi.fn(overrides.createIssue ?? (async (_r: CreateIssueRequest) => ({ key: "MKTG-42" })));
  const deps: LegalReviewDeps = {
    notion: { getPage },
    jira: { createIssue },
    projectKey: "MKTG",
    layout: headedLayout,
  };
  return { deps, getPage, createIssue };
}

describe("processWebhook", () => {
  it("creates a ticket for a wrapped event in the trigger status", async () => {
    const { deps, getPage, createIssue } = fakeDeps();

    const result = await processWebhook({
      ctx: testContext(),
      event: { data: { id: "p1", properties: { Status: { status: { name: "Ready for Legal Review" } } } } },
      deps,
    });

    expect(result).toEqual({
      status: "success",
      documentId: "p1",
      title: "Spring Sale",
      ticketKey: "MKTG-42",
      message: "Successfully processed campaign 'Spring Sale'. Created Jira ticket: MKTG-42 for Notion page: p1",
    });
    expect(getPage).toHaveBeenCalledWith("p1");
    expect(createIssue).toHaveBeenCalledTimes(1);
    expect(createIssue.mock.calls[0][0].fields.summary).toBe("Spring Sale - Legal Review");
    expect(createIssue.mock.calls[0][0].fields.project).toEqual({ key: "MKTG" });
  });

  it("treats wrapped and flat events alike", async () => {
    const wrapped = fakeDeps();
    const flat = fakeDeps();

    const a = await processWebhook({ ctx: testContext(), event: wrappedEvent("p1", "Ready for Legal Review"), deps: wrapped.deps });
    const b = await processWebhook({ ctx: testContext(), event: flatEvent("p1", "Ready for Legal Review"), deps: flat.deps });

    expect(b).toEqual(a);
    expect(flat.createIssue.mock.calls).toEqual(wrapped.createIssue.mock.calls);
  });

  it("ignores other statuses without any outbound call", async () => {
    const { deps, getPage, createIssue } = fakeDeps();

    const result = await processWebhook({ ctx: testContext(), event: wrappedEvent("p1", "Draft"), deps });

    expect(result).toEqual({
      status: "ignored",
      reason: "Status is 'Draft', not 'Ready for Legal Review'",
      code: "status_mismatch",
    });
    expect(getPage).not.toHaveBeenCalled();
    expect(createIssue).not.toHaveBeenCalled();
  });

  it("ignores malformed bodies", async () => {
    const { deps, getPage } = fakeDeps();
    for (const event of [null, 42, "text", [], { event: "page_updated" }, { hello: "world" }]) {
      const result = await processWebhook({ ctx: testContext(), event, deps });
      expect(result.status).toBe("ignored");
    }
    expect(getPage).not.toHaveBeenCalled();
  });

  it("returns an error naming the status code when the page fetch is rejected", async () => {
    const { deps, createIssue } = fakeDeps({
      getPage: async () => {
        throw new FetchError("Failed to fetch Notion page p1. Status: 404, Response: not found", {
          kind: "rejected",
          status: 404,
        });
      },
    });

    const result = await processWebhook({ ctx: testContext(), event: wrappedEvent("p1", "Ready for Legal Review"), deps });

    expect(result).toEqual({
      status: "error",
      documentId: "p1",
      error: "Campaign automation error: Failed to fetch Notion page p1. Status: 404, Response: not found",
    });
    expect(createIssue).not.toHaveBeenCalled();
  });

  it("names the empty field and never submits", async () => {
    const { deps, createIssue } = fakeDeps({
      getPage: async () => page({ title: "Spring Sale", copyUrl: "http://x/copy", designUrl: "   " }),
    });

    const result = await processWebhook({ ctx: testContext(), event: flatEvent("p1", "Ready for Legal Review"), deps });

    expect(result).toEqual({
      status: "error",
      documentId: "p1",
      error: "Campaign automation error: Final Design URL is missing or empty",
    });
    expect(createIssue).not.toHaveBeenCalled();
  });

  it("returns an error when submission fails", async () => {
    const { deps } = fakeDeps({
      createIssue: async () => {
        throw new SubmissionError("Jira ticket created but no key returned", { kind: "missing_key", status: 201 });
      },
    });

    const result = await processWebhook({ ctx: testContext(), event: wrappedEvent("p1", "Ready for Legal Review"), deps });

    expect(result).toEqual({
      status: "error",
      documentId: "p1",
      error: "Campaign automation error: Jira ticket created but no key returned",
    });
  });

  it("converts unexpected faults into error results", async () => {
    const { deps } = fakeDeps({
      getPage: async () => {
        throw new RangeError("something odd");
      },
    });

    const result = await processWebhook({ ctx: testContext(), event: wrappedEvent("p1", "Ready for Legal Review"), deps });

    expect(result).toEqual({
      status: "error",
      documentId: "p1",
      error: "Unexpected error in campaign automation: something odd",
    });
  });

  it("uses the configured description layout", async () => {
    const { deps, createIssue } = fakeDeps();

    await processWebhook({
      ctx: testContext(),
      event: wrappedEvent("p1", "Ready for Legal Review"),
      deps: { ...deps, layout: simpleLayout },
    });

    expect(createIssue.mock.calls[0][0].fields.description).toEqual(simpleLayout.build({
      title: "Spring Sale",
      copyUrl: "http://x/copy",
      designUrl: "http://x/design",
    }));
  });

  it("logs each step with the document id", async () => {
    const lines: string[] = [];
    const { deps } = fakeDeps();

    await processWebhook({ ctx: testContext(lines), event: wrappedEvent("p1", "Ready for Legal Review"), deps });

    const headers = lines.map((l) => l.split("\n")[0]);
    expect(headers).toEqual([
      'INFO: [test:interpret] event_actionable rid=00000000 document="p1"',
      'INFO: [test:steps] completed rid=00000000 document="p1"',
      'INFO: [test:steps] completed rid=00000000 document="p1"',
      'INFO: [test:processing] ticket_created rid=00000000 document="p1"',
    ]);
  });
});
