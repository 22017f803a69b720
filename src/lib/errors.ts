export class NetworkError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = "NetworkError";
    this.timedOut = options.timedOut ?? false;
  }
}

export type FetchErrorKind = "network" | "rejected";

/** Retrieving the source document from Notion failed. */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;

  constructor(message: string, args: { kind: FetchErrorKind; status?: number; cause?: unknown }) {
    super(message, { cause: args.cause });
    this.name = "FetchError";
    this.kind = args.kind;
    this.status = args.status ?? null;
  }
}

export type DocumentField = "title" | "copyUrl" | "designUrl";

export const DOCUMENT_FIELD_LABELS: Record<DocumentField, string> = {
  title: "Campaign name",
  copyUrl: "Final Copy URL",
  designUrl: "Final Design URL",
};

/** The fetched document lacks a required field. */
export class ValidationError extends Error {
  readonly field: DocumentField;

  constructor(field: DocumentField) {
    super(`${DOCUMENT_FIELD_LABELS[field]} is missing or empty`);
    this.name = "ValidationError";
    this.field = field;
  }
}

export type SubmissionErrorKind = "network" | "rejected" | "missing_key";

/** Creating the Jira ticket failed. */
export class SubmissionError extends Error {
  readonly kind: SubmissionErrorKind;
  readonly status: number | null;

  constructor(message: string, args: { kind: SubmissionErrorKind; status?: number; cause?: unknown }) {
    super(message, { cause: args.cause });
    this.name = "SubmissionError";
    this.kind = args.kind;
    this.status = args.status ?? null;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
