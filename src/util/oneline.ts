/**
 * Collapse a multi-line template into a single line of text.
 *
 * @example
 * oneline(`
 *   Cannot hash
 *   this value
 * `) // "Cannot hash this value"
 */
export function oneline(text: string): string {
  return text.trim().split(/\s+/).join(" ");
}
