/*
 * results for local parses that fall back rather than throw
 */

import * as assert from 'assert'

export type Result<T, Err> = {ok: T} | {err: Err};

export function Ok<T>(x: T): {ok: T} {
  return {ok: x};
}

export function Err<E>(x: E): {err: E} {
  return {err: x};
}

export function assertOk<T, E>(r: Result<T, E>): T {
  if ('ok' in r) {
    return r.ok;
  } else {
    assert.fail("expected no error here");
  }
}

export function fold<T, E, R>(
  r: Result<T, E>,
  ifOk: ((val: T) => R),
  ifErr: ((err: E) => R),
): R {
  if ('ok' in r) {
    return ifOk(r.ok)
  } else {
    return ifErr(r.err);
  }
}
