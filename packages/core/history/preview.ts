export const PREVIEW_LENGTH = 100;
export const PREVIEW_ELLIPSIS = "...";

/**
 * Stored preview: the first {@link PREVIEW_LENGTH} characters, marked when cut.
 * Counts code points, so a cut never splits a surrogate pair.
 */
export function makePreview(content: string): string {
  if (content.length <= PREVIEW_LENGTH) return content;
  const chars: string[] = [];
  for (const ch of content) {
    if (chars.length === PREVIEW_LENGTH) return chars.join("") + PREVIEW_ELLIPSIS;
    chars.push(ch);
  }
  return content;
}

/**
 * Flatten text onto one line for display. Every renderer applies this to the
 * stored preview and nothing else.
 */
export function toDisplayLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
