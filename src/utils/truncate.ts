/**
 * Cuts text to at most `limit` UTF-16 units including a trailing '...'.
 * Cuts between code points so an emoji is never split.
 */
export function truncateWithEllipsis(text: string, limit: number): string {
  if (text.length <= limit) return text;

  let kept = '';
  for (const char of text) {
    if (kept.length + char.length > limit - 3) break;
    kept += char;
  }
  return kept.trimEnd() + '...';
}
