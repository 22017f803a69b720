import { FetchError, NetworkError, errorMessage } from "../errors";
import { isAbort } from "../http/fetchWithDeadline";
import { isObject, type JsonObject } from "../json/getPath";
import type { NotionRequestOptions } from "./client";

export type NotionRequestFn = (options: NotionRequestOptions) => Promise<Response>;

export interface NotionPage {
  id: string;
  properties: JsonObject;
  url?: string;
}

export function createNotionApi(notionRequest: NotionRequestFn) {
  async function getPage(pageId: string): Promise<NotionPage> {
    const path = `/pages/${encodeURIComponent(pageId)}`;

    let response: Response;
    let text: string;
    try {
      response = await notionRequest({ path, method: "GET" });
      text = await response.text();
    } catch (err) {
      if (err instanceof NetworkError || err instanceof TypeError || isAbort(err)) {
        throw new FetchError(`Network error fetching Notion page ${pageId}: ${errorMessage(err)}`, {
          kind: "network",
          cause: err,
        });
      }
      throw err;
    }

    if (response.status !== 200) {
      throw new FetchError(
        `Failed to fetch Notion page ${pageId}. Status: ${response.status}, Response: ${text}`,
        { kind: "rejected", status: response.status },
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      throw new FetchError(`Notion page ${pageId} response was not valid JSON`, {
        kind: "rejected",
        status: response.status,
        cause: err,
      });
    }

    if (!isObject(data)) {
      throw new FetchError(`Notion page ${pageId} response was not a JSON object`, {
        kind: "rejected",
        status: response.status,
      });
    }

    return {
      id: typeof data.id === "string" ? data.id : pageId,
      properties: isObject(data.properties) ? data.properties : {},
      url: typeof data.url === "string" ? data.url : undefined,
    };
  }

  return {
    getPage,
  };
}

export type NotionApi = ReturnType<typeof createNotionApi>;
