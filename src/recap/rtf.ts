import { RtfDocument } from "../rtf/document.js";
import type { PullRequest } from "./pullRequest.js";
import { cleanTitle } from "./title.js";

export const RTF_FONT = "Arial";
export const LINK_COLOR = "#0366d6";

export function appendRtfEntry(doc: RtfDocument, pr: PullRequest): void {
  doc.paragraph((p) => {
    p.text(cleanTitle(pr.title), { bold: true });
    p.text(" (");
    p.link(pr.url, pr.url, { color: LINK_COLOR, underline: true });
    p.text(")");
  });

  const summary = pr.summary;
  if (summary) {
    doc.paragraph((p) => p.text(summary));
  }

  // Spacing between entries
  doc.paragraph();
}

export function renderRtf(prs: PullRequest[]): string {
  const doc = new RtfDocument(RTF_FONT);
  for (const pr of prs) {
    appendRtfEntry(doc, pr);
  }
  return doc.toRtf();
}
