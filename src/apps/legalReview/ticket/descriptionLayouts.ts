import type { DescriptionLayoutName } from "../../../lib/config";
import {
  bulletList,
  doc,
  em,
  heading,
  link,
  paragraph,
  strong,
  text,
  type AdfDoc,
} from "../../../lib/jira/adf";
import type { DocumentRecord } from "../domain";

export interface DescriptionLayout {
  readonly name: DescriptionLayoutName;
  build(record: DocumentRecord): AdfDoc;
}

export const simpleLayout: DescriptionLayout = {
  name: "simple",
  build(record) {
    return doc(
      paragraph(
        text(
          "This campaign is ready for legal and compliance review. Please find the final approved assets below.",
        ),
      ),
      bulletList(
        paragraph(text("Final Copy: "), link(record.copyUrl)),
        paragraph(text("Final Design: "), link(record.designUrl)),
      ),
    );
  },
};

export const headedLayout: DescriptionLayout = {
  name: "headed",
  build(record) {
    return doc(
      heading(3, text("Campaign Legal Review Request")),
      paragraph(text(`Campaign "${record.title}" is ready for legal and compliance review.`)),
      paragraph(),
      heading(4, text("Review Materials:", strong)),
      bulletList(
        paragraph(text("Final Copy: ", strong), link(record.copyUrl)),
        paragraph(text("Final Design: ", strong), link(record.designUrl)),
      ),
      paragraph(),
      paragraph(
        text("Please review for compliance with legal requirements and brand guidelines.", em),
      ),
    );
  },
};

export const DESCRIPTION_LAYOUTS: Readonly<Record<DescriptionLayoutName, DescriptionLayout>> = {
  simple: simpleLayout,
  headed: headedLayout,
};
