import type { PayloadValue } from "../events/types.js";

const EDGE_PUNCTUATION = /^[.,;:!?()[\]{}"'`-]+|[.,;:!?()[\]{}"'`-]+$/g;

/** Lower-cased whitespace tokens with edge punctuation removed; tokens of two characters or fewer are skipped. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((word) => word.replace(EDGE_PUNCTUATION, ""))
    .filter((word) => word.length > 2);
}

/** Every string leaf of a content value, depth first. */
export function contentStrings(content: PayloadValue): string[] {
  if (typeof content === "string") return [content];
  if (content === null || typeof content !== "object") return [];
  const values = Array.isArray(content) ? content : Object.values(content);
  return values.flatMap(contentStrings);
}

export function contentTokens(content: PayloadValue): Set<string> {
  return new Set(contentStrings(content).flatMap(tokenize));
}
