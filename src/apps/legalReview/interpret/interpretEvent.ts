import { errorMessage } from "../../../lib/errors";
import type { Logger } from "../../../lib/logging";
import { TRIGGER_STATUS, type Interpretation, type NotActionable } from "../domain";
import { classifyPayload, readShapeFields } from "./classifyPayload";

function notActionable(args: Omit<NotActionable, "actionable">): NotActionable {
  return { actionable: false, ...args };
}

function interpret(event: unknown): Interpretation {
  const shape = classifyPayload(event);
  if (!shape) {
    return notActionable({
      reason: "unrecognized_format",
      detail: "Unrecognized webhook format",
      shape: null,
      documentId: null,
    });
  }

  const { documentId, statusName } = readShapeFields(event, shape);

  if (!documentId) {
    return notActionable({
      reason: "missing_document_id",
      detail: "Missing page id in webhook payload",
      shape,
      documentId: null,
    });
  }

  if (statusName !== TRIGGER_STATUS) {
    return notActionable({
      reason: "status_mismatch",
      detail:
        statusName === null
          ? `Status is missing, not '${TRIGGER_STATUS}'`
          : `Status is '${statusName}', not '${TRIGGER_STATUS}'`,
      shape,
      documentId,
    });
  }

  return { actionable: true, shape, documentId, statusName };
}

/**
 * Decides whether a webhook body should produce a legal review ticket.
 * Never throws: a fault while reading the body is logged at error level and
 * reported as `interpret_failed`, which callers treat like any other ignored event.
 */
export function interpretEvent(event: unknown, logger?: Logger): Interpretation {
  let result: Interpretation;
  try {
    result = interpret(event);
  } catch (err) {
    logger?.log("error", "interpret_failed", {
      error: errorMessage(err),
      error_name: err instanceof Error ? err.name : undefined,
    });
    return notActionable({
      reason: "interpret_failed",
      detail: "Webhook payload could not be interpreted",
      shape: null,
      documentId: null,
    });
  }

  if (result.actionable) {
    logger?.log("info", "event_actionable", {
      shape: result.shape,
      document_id: result.documentId,
      status_name: result.statusName,
    });
  } else {
    logger?.log("info", "event_not_actionable", {
      reason: result.reason,
      detail: result.detail,
      shape: result.shape,
      document_id: result.documentId ?? undefined,
    });
  }

  return result;
}
