/** Characters Telegram's MarkdownV2 treats as markup, backslash first. */
const MARKDOWN_V2_RESERVED = /[\\_*[\]()~`>#+\-=|{}.!]/g;

/**
 * Escape text for verbatim display in a MarkdownV2 message.
 * Safe both in plain text and inside `code` spans.
 */
export function escapeMarkdownV2(text: string): string {
    return text.replace(MARKDOWN_V2_RESERVED, '\\$&');
}
