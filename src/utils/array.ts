/*
 * Array utilities.
 */

/*
 * Fill an array with `n` copies of `val`, or with `n` separate results of
 * val(i) if `val` is a function.
 */
export function array_fill<T>(
  n: number,
  val: T | ((i: number) => T)
): T[] {
  const a: T[] = [];
  for (let i = 0; i < n; ++i) {
    a.push(val instanceof Function ? val(i) : val);
  }
  return a;
}

/*
 * Sum of an array of numbers.
 */
export function array_sum(arr: readonly number[]): number {
  return arr.reduce((acc, n) => acc + n, 0);
}

/*
 * Set arr[i] to `val`, first padding `arr` out to `i` with `pad`.
 */
export function array_put<T>(arr: T[], i: number, val: T, pad: T) {
  while (arr.length <= i) arr.push(pad);
  arr[i] = val;
}
