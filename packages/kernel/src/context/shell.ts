/**
 * Quoting for command lines the kernel builds itself (mkdir, chown, mv in
 * the file units). Words made only of path-safe characters pass through
 * unchanged so the common case stays readable in the log.
 */

const SAFE_WORD = /^[A-Za-z0-9_\/.:=@%+,-]+$/;

/** Single-quote `value` for sh unless it is already a single safe word. */
export function shellQuote(value: string): string {
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
