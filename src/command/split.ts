/**
 * Naive whitespace split: `"echo  -n Hi"` -> `['echo', '-n', 'Hi']`.
 * Quotes and escapes are not interpreted.
 */
export function splitCommandString(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Wraps text in single quotes so it stays one word when a shell launcher interprets
 * the command line. Embedded single quotes become `'\''`.
 */
export function quoted(text: string): string {
  return `'${text.replace(/'/g, `'\\''`)}'`;
}
