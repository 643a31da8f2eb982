/**
 * Escapes HTML special characters so code and model text render literally.
 */
export function escapeHtml(str: string | number | undefined | null): string {
  if (str === null || str === undefined) return "";
  return String(str)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Escapes characters that would break a Markdown inline code span or table.
 */
export function escapeMarkdownInline(str: string): string {
  return str.replace(/\|/g, "\\|").replace(/`/g, "\\`");
}
