export const TELEGRAM_MESSAGE_LIMIT = 4096;

export function escapeMarkdownV2(text: string): string {
  if (!text) return '';
  return text.replace(/[_*[\]()~`>#+\-=|{}.!\\]/g, '\\$&');
}

/**
 * Text after the command word, e.g. "Paris, FR" for "/weather@MyBot Paris, FR".
 */
export function parseCommandArgument(text: string): string {
  return text.replace(/^\/\S+/, '').trim();
}

/**
 * Splits text into pieces Telegram accepts, breaking at the last newline or
 * space inside each piece where there is one.
 */
export function splitMessage(
  text: string,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    const breakAt = Math.max(window.lastIndexOf('\n'), window.lastIndexOf(' '));
    const cut = breakAt > 0 ? breakAt : limit;
    const chunk = rest.slice(0, cut).trimEnd();
    if (chunk) chunks.push(chunk);
    rest = rest.slice(cut).trimStart();
  }

  if (rest || chunks.length === 0) chunks.push(rest);
  return chunks;
}
