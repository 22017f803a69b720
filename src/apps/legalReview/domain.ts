import type { CreateIssueRequest } from "../../lib/jira/api";

export const TRIGGER_STATUS = "Ready for Legal Review";

export type PayloadShape = "wrapped" | "flat";

export interface ActionableDocument {
  actionable: true;
  shape: PayloadShape;
  documentId: string;
  statusName: string;
}

export type NotActionableReason =
  | "unrecognized_format"
  | "missing_document_id"
  | "status_mismatch"
  | "interpret_failed";

export interface NotActionable {
  actionable: false;
  reason: NotActionableReason;
  /** Human-readable explanation, surfaced in the `ignored` result. */
  detail: string;
  shape: PayloadShape | null;
  documentId: string | null;
}

export type Interpretation = ActionableDocument | NotActionable;

export interface DocumentRecord {
  title: string;
  copyUrl: string;
  designUrl: string;
}

export type TicketRequest = CreateIssueRequest;

export interface SuccessResult {
  status: "success";
  documentId: string;
  title: string;
  ticketKey: string;
  message: string;
}

export interface IgnoredResult {
  status: "ignored";
  reason: string;
  code: NotActionableReason;
}

export interface ErrorResult {
  status: "error";
  error: string;
  documentId: string | null;
}

export type ProcessingResult = SuccessResult | IgnoredResult | ErrorResult;
