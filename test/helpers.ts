import { loadConfig, type AppConfig } from "../src/lib/config";
import type { FetchFn } from "../src/lib/http/fetchWithDeadline";
import { createRequestContext, type RequestContext } from "../src/lib/logging";

export const TEST_ENV = {
  NOTION_API_KEY: "test-notion-key",
  JIRA_API_TOKEN: "test-jira-token",
  JIRA_DOMAIN: "example.atlassian.net",
  JIRA_USERNAME: "bot@example.com",
};

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export function testContext(lines: string[] = []): RequestContext {
  return createRequestContext({
    app: "test",
    requestId: "00000000-test",
    sink: (line) => lines.push(line),
  });
}

export interface RecordedCall {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
  signal: AbortSignal | null;
}

export type FakeRoute = (call: RecordedCall) => Response | Promise<Response>;

/** In-process stand-in for the Notion and Jira HTTP APIs. */
export function createFakeFetch(route: FakeRoute): { fetchFn: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const call: RecordedCall = {
      url: input,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
      signal: init.signal ?? null,
    };
    calls.push(call);
    return route(call);
  };
  return { fetchFn, calls };
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** A response whose headers arrive but whose body never finishes until the request signal fires. */
export function stalledBodyResponse(status: number, signal: AbortSignal | null): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode("{"));
      if (signal) {
        const requestSignal = signal;
        requestSignal.addEventListener("abort", () => controller.error(requestSignal.reason));
      }
    },
  });
  return new Response(body, { status });
}

export function notionPage(args: {
  id?: string;
  title?: string;
  copyUrl?: string;
  designUrl?: string;
}): Record<string, unknown> {
  return {
    object: "page",
    id: args.id ?? "p1",
    properties: {
      Name: {
        type: "title",
        title: args.title === undefined ? [] : [{ type: "text", plain_text: args.title }],
      },
      "Final Copy URL": { type: "url", url: args.copyUrl ?? null },
      "Final Design URL": { type: "url", url: args.designUrl ?? null },
    },
  };
}

export function wrappedEvent(id: string, statusName: string): Record<string, unknown> {
  return {
    source: { type: "automation" },
    data: {
      object: "page",
      id,
      properties: {
        Status: { id: "abc", type: "status", status: { name: statusName } },
      },
    },
  };
}

export function flatEvent(pageId: string, statusName: string): Record<string, unknown> {
  return {
    event: "page_updated",
    page_id: pageId,
    properties: {
      status: { type: "status", status: { name: statusName } },
    },
  };
}
