/*
 * assertion wrapper
 */

import assert_ from 'assert'

import log from './logger'

export default function assert(
  cond: boolean,
  msg?: string,
  ...args: unknown[]
) {
  if (!cond && msg) log.error(msg, ...args);
  assert_.strict(cond, msg);
}
