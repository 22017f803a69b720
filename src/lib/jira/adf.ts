// Atlassian Document Format (ADF) node builders for Jira rich-text fields.

export type AdfMark =
  | { type: "strong" }
  | { type: "em" }
  | { type: "link"; attrs: { href: string } };

export interface AdfText {
  type: "text";
  text: string;
  marks?: AdfMark[];
}

export interface AdfParagraph {
  type: "paragraph";
  content: AdfText[];
}

export interface AdfHeading {
  type: "heading";
  attrs: { level: 1 | 2 | 3 | 4 | 5 | 6 };
  content: AdfText[];
}

export interface AdfListItem {
  type: "listItem";
  content: AdfParagraph[];
}

export interface AdfBulletList {
  type: "bulletList";
  content: AdfListItem[];
}

export type AdfBlock = AdfParagraph | AdfHeading | AdfBulletList;

export interface AdfDoc {
  type: "doc";
  version: 1;
  content: AdfBlock[];
}

export function text(value: string, ...marks: AdfMark[]): AdfText {
  return marks.length > 0 ? { type: "text", text: value, marks } : { type: "text", text: value };
}

export const strong: AdfMark = { type: "strong" };
export const em: AdfMark = { type: "em" };

/** A link run whose visible text is the URL itself. */
export function link(href: string): AdfText {
  return text(href, { type: "link", attrs: { href } });
}

export function paragraph(...content: AdfText[]): AdfParagraph {
  return { type: "paragraph", content };
}

export function heading(level: AdfHeading["attrs"]["level"], ...content: AdfText[]): AdfHeading {
  return { type: "heading", attrs: { level }, content };
}

export function bulletList(...items: AdfParagraph[]): AdfBulletList {
  return {
    type: "bulletList",
    content: items.map((p) => ({ type: "listItem", content: [p] })),
  };
}

export function doc(...content: AdfBlock[]): AdfDoc {
  return { type: "doc", version: 1, content };
}
