import { getString, isObject } from "../../../lib/json/getPath";
import type { PayloadShape } from "../domain";

export interface ShapeFields {
  documentId: ReadonlyArray<string>;
  statusName: ReadonlyArray<string>;
}

/**
 * Where each webhook shape keeps the page id and the status name.
 * - wrapped: Notion automation "Send webhook" body (`data` envelope)
 * - flat: hand-built `page_updated` body used by older senders and the /test route
 */
export const SHAPE_FIELDS: Readonly<Record<PayloadShape, ShapeFields>> = {
  wrapped: {
    documentId: ["data", "id"],
    statusName: ["data", "properties", "Status", "status", "name"],
  },
  flat: {
    documentId: ["page_id"],
    statusName: ["properties", "status", "status", "name"],
  },
};

/** Wrapped is checked before flat; a body with a `data` key is never read as flat. */
export function classifyPayload(event: unknown): PayloadShape | null {
  if (!isObject(event)) return null;
  if ("data" in event) return "wrapped";
  if (getString(event, ["event"]) === "page_updated") return "flat";
  return null;
}

export function readShapeFields(
  event: unknown,
  shape: PayloadShape,
): { documentId: string | null; statusName: string | null } {
  const fields = SHAPE_FIELDS[shape];
  const documentId = getString(event, fields.documentId);
  const statusName = getString(event, fields.statusName);
  return {
    documentId: documentId && documentId.trim() ? documentId : null,
    statusName: statusName ?? null,
  };
}
