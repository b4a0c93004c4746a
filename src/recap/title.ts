// A leading tag such as "[WEB-123] " and the whitespace after it
const LEADING_TAG = /^\s*\[[^\]]*\]\s*/;

// Display form of a PR title, shared by every renderer.
export function cleanTitle(title: string): string {
  return title.replace(LEADING_TAG, "");
}
