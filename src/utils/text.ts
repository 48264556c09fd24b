/**
 * Shorten text to `maxLength` characters, appending "..." when cut.
 */
export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

/**
 * Render a heading followed by a rule line.
 */
export function heading(title: string, width = 50): string {
  return `${title}\n${'='.repeat(width)}`;
}

/**
 * Render a boolean as "Yes" or "No".
 */
export function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}
