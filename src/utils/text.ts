/**
 * Text helpers for prompt assembly and Telegram delivery
 */

/** Telegram rejects messages above 4096 characters */
export const TELEGRAM_CHUNK_SIZE = 3800;

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}…`;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').trim();
}

/**
 * Splits text into chunks no longer than `limit`, preferring line breaks.
 * A single line longer than the limit is cut hard.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_CHUNK_SIZE): string[] {
  if (text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current);
      current = '';
    }
  };

  for (const line of text.split('\n')) {
    const candidate = current.length > 0 ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    flush();
    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }

  flush();
  return chunks;
}
