import { NetworkError, SubmissionError, errorMessage } from "../errors";
import { isAbort } from "../http/fetchWithDeadline";
import { isObject } from "../json/getPath";
import type { AdfDoc } from "./adf";
import type { JiraRequestOptions } from "./client";

export type JiraRequestFn = (options: JiraRequestOptions) => Promise<Response>;

export interface CreateIssueRequest {
  fields: {
    project: { key: string };
    summary: string;
    description: AdfDoc;
    issuetype: { name: string };
  };
}

export interface CreatedIssue {
  key: string;
  id?: string;
  self?: string;
}

const CREATE_ISSUE_SUCCESS_STATUSES: ReadonlySet<number> = new Set([200, 201]);

function parseJsonOrNull(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function createJiraApi(jiraRequest: JiraRequestFn) {
  async function createIssue(request: CreateIssueRequest): Promise<CreatedIssue> {
    let response: Response;
    let text: string;
    try {
      response = await jiraRequest({ path: "/issue", method: "POST", body: request });
      text = await response.text();
    } catch (err) {
      if (err instanceof NetworkError || err instanceof TypeError || isAbort(err)) {
        throw new SubmissionError(`Network error creating Jira ticket: ${errorMessage(err)}`, {
          kind: "network",
          cause: err,
        });
      }
      throw err;
    }

    if (!CREATE_ISSUE_SUCCESS_STATUSES.has(response.status)) {
      throw new SubmissionError(
        `Failed to create Jira ticket. Status: ${response.status}, Response: ${text}`,
        { kind: "rejected", status: response.status },
      );
    }

    const data = parseJsonOrNull(text);
    const key = isObject(data) ? data.key : undefined;
    if (typeof key !== "string" || !key) {
      throw new SubmissionError("Jira ticket created but no key returned", {
        kind: "missing_key",
        status: response.status,
      });
    }

    return {
      key,
      id: isObject(data) && typeof data.id === "string" ? data.id : undefined,
      self: isObject(data) && typeof data.self === "string" ? data.self : undefined,
    };
  }

  return {
    createIssue,
  };
}

export type JiraApi = ReturnType<typeof createJiraApi>;
