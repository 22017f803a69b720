import { fetchWithDeadline, type FetchFn } from "../http/fetchWithDeadline";
import type { Logger } from "../logging";

export interface JiraRequestOptions {
  path: string;
  method?: string;
  body?: unknown;
  logger?: Logger;
}

export interface JiraClient {
  baseUrl: string;
  request(options: JiraRequestOptions): Promise<Response>;
}

export function jiraBaseUrl(domain: string): string {
  return `https://${domain}/rest/api/3`;
}

export function createJiraClient(args: {
  domain: string;
  username: string;
  apiToken: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}): JiraClient {
  const { domain, username, apiToken, timeoutMs, fetchFn } = args;
  const baseUrl = jiraBaseUrl(domain);
  const authorization = `Basic ${Buffer.from(`${username}:${apiToken}`).toString("base64")}`;

  return {
    baseUrl,
    async request(options: JiraRequestOptions): Promise<Response> {
      const { path, method = "GET", body, logger } = options;
      const startedAt = Date.now();

      logger?.log("info", "request_started", { method, path });

      const response = await fetchWithDeadline({
        fetchFn,
        url: `${baseUrl}${path}`,
        init: {
          method,
          body: body !== undefined ? JSON.stringify(body) : undefined,
          headers: {
            Authorization: authorization,
            Accept: "application/json",
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
