/**
 * Markdown formatting for Slack output.
 *
 * Gemini answers in standard Markdown; Slack's mrkdwn differs in a few
 * places, and notification text should carry no markup at all.
 */

export type MarkdownFormat = 'slack' | 'plaintext';

interface FormatRule {
  pattern: RegExp;
  replacement: string;
}

const formatters: Record<MarkdownFormat, FormatRule[]> = {
  slack: [
    // **bold** → *bold* (Slack uses single asterisks)
    { pattern: /\*\*(.+?)\*\*/g, replacement: '*$1*' },
    // __bold__ → *bold*
    { pattern: /__(.+?)__/g, replacement: '*$1*' },
    // ~~strikethrough~~ → ~strikethrough~ (Slack uses single tildes)
    { pattern: /~~(.+?)~~/g, replacement: '~$1~' },
    // [label](url) → <url|label>
    { pattern: /\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, replacement: '<$2|$1>' },
    // ## Heading → *Heading*
    { pattern: /^#{1,6}\s+(.+)$/gm, replacement: '*$1*' },
  ],
  plaintext: [
    { pattern: /\*\*(.+?)\*\*/g, replacement: '$1' },
    { pattern: /\*(.+?)\*/g, replacement: '$1' },
    { pattern: /~~(.+?)~~/g, replacement: '$1' },
    { pattern: /`(.+?)`/g, replacement: '$1' },
    { pattern: /\[([^\]]+)\]\((https?:\/\/[^)\s]+)\)/g, replacement: '$1 ($2)' },
    { pattern: /^#+\s+/gm, replacement: '' },
    { pattern: /^[-*]\s+/gm, replacement: '- ' },
  ],
};

/**
 * Convert markdown to a specific output format.
 */
export function formatMarkdown(text: string, format: MarkdownFormat): string {
  let result = text;
  for (const rule of formatters[format]) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}
