import { fetchWithDeadline, type FetchFn } from "../http/fetchWithDeadline";
import type { Logger } from "../logging";

export const NOTION_BASE_URL = "https://api.notion.com/v1";

export interface NotionRequestOptions {
  path: string;
  method?: string;
  body?: unknown;
  logger?: Logger;
}

export interface NotionClient {
  request(options: NotionRequestOptions): Promise<Response>;
}

export function createNotionClient(args: {
  token: string;
  notionVersion: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}): NotionClient {
  const { token, notionVersion, timeoutMs, fetchFn } = args;

  return {
    async request(options: NotionRequestOptions): Promise<Response> {
      const { path, method = "GET", body, logger } = options;
      const startedAt = Date.now();

      logger?.log("info", "request_started", { method, path });

      const response = await fetchWithDeadline({
        fetchFn,
        url: `${NOTION_BASE_URL}${path}`,
        init: {
          method,
          body: body !== undefined ? JSON.stringify(body) : undefined,
          headers: {
            Authorization: `Bearer ${token}`,
            "Notion-Version": notionVersion,
            "Content-Type": "application/json",
          },
        },
        timeoutMs,
      });

      logger?.log("info", "request_finished", {
        method,
        path,
        status: response.status,
        duration_ms: Date.now() - startedAt,
      });

      return response;
    },
  };
}
