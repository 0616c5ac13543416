/**
 * Shared Formatting Utilities
 */

/**
 * Format a boxed message with title and metadata fields
 *
 * ```
 * ┌─ Title ─────────────────────────────────────────
 * │ Key1: Value1
 * │ Key2: Value2
 * └─────────────────────────────────────────────────
 * ```
 *
 * @param width - Total box width (default: 52)
 */
export function formatBoxedMessage(
  title: string,
  fields: Record<string, string>,
  width: number = 52
): string {
  const titleText = ` ${title} `;
  const dashCount = Math.max(0, width - titleText.length - 2);
  const lines = [`┌─${titleText}${'─'.repeat(dashCount)}`];

  for (const [key, value] of Object.entries(fields)) {
    lines.push(`│ ${key}: ${value}`);
  }

  lines.push(`└${'─'.repeat(width - 1)}`);
  return lines.join('\n');
}

/**
 * Bulleted list, or a placeholder line when empty
 */
export function formatList(items: readonly string[], empty: string = '(none)'): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : empty;
}
