import type { DocumentRecord, TicketRequest } from "../domain";
import type { DescriptionLayout } from "./descriptionLayouts";

export const TICKET_ISSUE_TYPE = "Task";

export function ticketSummary(title: string): string {
  return `${title} - Legal Review`;
}

export function buildTicketRequest(
  record: DocumentRecord,
  options: { projectKey: string; layout: DescriptionLayout },
): TicketRequest {
  return {
    fields: {
      project: { key: options.projectKey },
      summary: ticketSummary(record.title),
      description: options.layout.build(record),
      issuetype: { name: TICKET_ISSUE_TYPE },
    },
  };
}
