import { ValidationError, type DocumentField } from "../../../lib/errors";
import type { JsonObject } from "../../../lib/json/getPath";
import type { NotionApi } from "../../../lib/notion/api";
import type { DocumentRecord } from "../domain";
import {
  COPY_URL_PROPERTY,
  DESIGN_URL_PROPERTY,
  extractTitleFromProperties,
  extractUrlFromProperty,
} from "./extractors";

const VALIDATION_ORDER: ReadonlyArray<DocumentField> = ["title", "copyUrl", "designUrl"];

export function validateDocumentRecord(record: DocumentRecord): DocumentRecord {
  for (const field of VALIDATION_ORDER) {
    if (!record[field]) {
      throw new ValidationError(field);
    }
  }
  return record;
}

export function extractDocumentRecord(properties: JsonObject): DocumentRecord {
  return validateDocumentRecord({
    title: extractTitleFromProperties(properties).trim(),
    copyUrl: extractUrlFromProperty(properties, COPY_URL_PROPERTY).trim(),
    designUrl: extractUrlFromProperty(properties, DESIGN_URL_PROPERTY).trim(),
  });
}

/** Throws FetchError when Notion cannot be reached or refuses, ValidationError when a field is empty. */
export async function fetchDocumentRecord(
  notion: Pick<NotionApi, "getPage">,
  documentId: string,
): Promise<DocumentRecord> {
  const page = await notion.getPage(documentId);
  return extractDocumentRecord(page.properties);
}
