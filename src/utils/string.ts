/*
 * String utilities.
 */

/*
 * split `s` at the first occurrence of `sep`; null if `sep` is absent
 */
export function split_once(s: string, sep: string): [string, string] | null {
  const i = s.indexOf(sep);
  if (i < 0) return null;
  return [s.slice(0, i), s.slice(i + sep.length)];
}

/*
 * whether `s` is a (possibly negative) decimal integer
 */
export function is_int(s: string): boolean {
  return /^-?\d+$/.test(s);
}
