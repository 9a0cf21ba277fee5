export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function sanitizePathSegment(text: string): string {
  return text.replace(/[\s/\\]/g, "_");
}
