/**
 * Markdown to Telegram HTML.
 * Telegram supports: <b>, <i>, <u>, <s>, <code>, <pre>, <a>
 * Does NOT support: headers, lists, tables
 */

const MARKDOWN_RULES: Array<[RegExp, string]> = [
  // Code blocks first, so inline code doesn't eat their fences
  [/```\w*\n?([\s\S]*?)```/g, "<pre>$1</pre>"],
  [/`([^`\n]+)`/g, "<code>$1</code>"],
  [/^#{1,6} (.+)$/gm, "<b>$1</b>"],
  [/^---+$/gm, "───────────"],
  [/^[-*] (.+)$/gm, "• $1"],
  [/\*\*([^*]+)\*\*/g, "<b>$1</b>"],
  [/(?<!\*)\*([^*\n]+)\*(?!\*)/g, "<i>$1</i>"],
  [/~~([^~]+)~~/g, "<s>$1</s>"],
  [/\[([^\]]+)\]\(([^)\s]+)\)/g, '<a href="$2">$1</a>'],
];

export function markdownToTelegramHtml(text: string): string {
  let html = text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
  for (const [pattern, replacement] of MARKDOWN_RULES) {
    html = html.replace(pattern, replacement);
  }
  return html.replace(/\n{3,}/g, "\n\n").trim();
}

/**
 * Split text into chunks of at most `maxLength` characters, breaking at the
 * last newline, then the last space, before the limit. The separator a chunk
 * breaks on is dropped.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > maxLength) {
    let cut = rest.lastIndexOf("\n", maxLength);
    if (cut <= 0) cut = rest.lastIndexOf(" ", maxLength);
    const separated = cut > 0;
    if (!separated) cut = maxLength;

    chunks.push(rest.slice(0, cut));
    rest = rest.slice(separated ? cut + 1 : cut);
  }

  if (rest.length > 0) chunks.push(rest);
  return chunks;
}
