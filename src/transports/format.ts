export const DISCORD_CHUNK_LIMIT = 1900;

/**
 * Splits a reply for platforms with a per-message size limit, preferring a
 * line break in the second half of each chunk.
 */
export const splitMessage = (text: string, limit = DISCORD_CHUNK_LIMIT) => {
  const parts: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    let cut = rest.lastIndexOf('\n', limit);
    if (cut < limit / 2) cut = limit;
    parts.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, '');
  }
  if (rest || parts.length === 0) parts.push(rest);
  return parts;
};

export const stripMarkdownBold = (text: string) => text.replace(/\*\*(.+?)\*\*/gs, '$1');

export const stripBotMention = (content: string, botId: string) =>
  content.replace(new RegExp(`<@!?${botId}(?:\\|[^>]+)?>`, 'g'), '').trim();
