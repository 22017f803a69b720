import type { JiraApi } from "../../lib/jira/api";
import type { TicketRequest } from "./domain";

/** Returns the created ticket key; throws SubmissionError otherwise. */
export async function submitTicket(
  jira: Pick<JiraApi, "createIssue">,
  request: TicketRequest,
): Promise<string> {
  const created = await jira.createIssue(request);
  return created.key;
}
