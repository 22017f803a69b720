import { getArray, getObject, getString, isObject, type JsonObject } from "../../../lib/json/getPath";

export const TITLE_PROPERTY_NAMES = ["Name", "title"] as const;
export const COPY_URL_PROPERTY = "Final Copy URL";
export const DESIGN_URL_PROPERTY = "Final Design URL";

function plainText(run: unknown): string {
  return getString(run, ["plain_text"]) ?? "";
}

function hasKeys(value: unknown): value is JsonObject {
  return isObject(value) && Object.keys(value).length > 0;
}

/** Concatenated plain text of the page title ("Name", falling back to "title"). */
export function extractTitleFromProperties(props: JsonObject): string {
  const prop = TITLE_PROPERTY_NAMES.map((name) => props[name]).find(hasKeys) ?? {};
  return getArray(prop, ["title"]).map(plainText).join("");
}

/**
 * A URL-ish property may be a real `url` property or a rich_text property
 * holding the link as text; the first rich_text run wins in the latter case.
 */
export function extractUrlFromProperty(props: JsonObject, propName: string): string {
  const prop = getObject(props, [propName]);
  const url = getString(prop, ["url"]);
  if (url) return url;
  return plainText(getArray(prop, ["rich_text"])[0]);
}
