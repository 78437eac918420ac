export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, Math.max(0, max - 1)).trimEnd() + '…';
}

export function compactWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Canonical form of a chat message: lowercase, curly apostrophes folded,
 * punctuation other than apostrophes and hyphens dropped, whitespace collapsed.
 * Repetition detection and intent rules both work on this form.
 */
export function normalizeUtterance(text: string): string {
  return compactWhitespace(
    String(text ?? '')
      .toLowerCase()
      .replace(/[‘’ʼ]/g, "'")
      .replace(/[^a-z0-9'\-\s]/g, ' '),
  );
}

export function words(text: string): string[] {
  return text.toLowerCase().replace(/[^a-z0-9'\s]/g, ' ').split(/\s+/).filter(Boolean);
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
