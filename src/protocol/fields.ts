/*
 * io-ts decoders for wire fields, and helpers for building message decoders
 * out of them.
 */

import { pipe } from 'fp-ts/lib/function'
import * as E from 'fp-ts/lib/Either'

import * as D from 'io-ts/lib/Decoder'

import { EMPTYSTR, split } from './wire'
import { is_int } from '../utils/string'

///////////////////////////////////////////////////////////////////////////////
/*
 * field decoders.  every field arrives as a string token.
 */

export const Str: D.Decoder<unknown, string> = pipe(
  D.string,
  D.map((s: string) => s === EMPTYSTR ? '' : s),
);

export const Int: D.Decoder<unknown, number> = pipe(
  D.string,
  D.parse((s: string): E.Either<D.DecodeError, number> =>
    is_int(s) ? D.success(parseInt(s, 10)) : D.failure(s, 'integer')
  ),
);

export const Bool: D.Decoder<unknown, boolean> = pipe(
  D.string,
  D.parse((s: string): E.Either<D.DecodeError, boolean> =>
    s === 'true' ? D.success(true) :
    s === 'false' ? D.success(false) :
    D.failure(s, 'boolean')
  ),
);

/*
 * parse every token as an integer; null if any isn't one
 */
export function ints(toks: readonly string[]): number[] | null {
  if (!toks.every(is_int)) return null;
  return toks.map(t => parseInt(t, 10));
}

export function strs(toks: readonly string[]): string[] {
  return toks.map(t => t === EMPTYSTR ? '' : t);
}

export function bools(toks: readonly string[]): boolean[] | null {
  if (!toks.every(t => t === 'true' || t === 'false')) return null;
  return toks.map(t => t === 'true');
}

///////////////////////////////////////////////////////////////////////////////
/*
 * message body decoders.
 *
 * a body is split on `sep`, the leading fields are decoded by the tuple
 * decoder `row`, and `build` assembles the message from those plus the raw
 * tokens (for trailing repeated fields).  `build` returns null for a body it
 * can't make sense of.
 */

export function body<A, M>(
  sep: string,
  row: D.Decoder<unknown, A>,
  build: (a: A, toks: string[]) => M | null,
): D.Decoder<string, M> {
  return {
    decode: (s: string) => {
      const toks = split(s, sep);
      return pipe(row.decode(toks), E.chain((a): E.Either<D.DecodeError, M> => {
        const m = build(a, toks);
        return m === null ? D.failure<M>(s, 'garbled message body') : D.success(m);
      }));
    },
  };
}

/*
 * a body that is one free-text field, separators and all
 */
export function text_body<M>(build: (text: string) => M): D.Decoder<string, M> {
  return {decode: (s: string) => D.success(build(s === EMPTYSTR ? '' : s))};
}

///////////////////////////////////////////////////////////////////////////////
/*
 * interface for interacting with decode results.
 *
 * io-ts just leaks its fp-ts representations; this hides them again.
 */

export function on_decode<I, A, R1, R2>(
  decoder: D.Decoder<I, A>,
  input: I,
  onsuccess: (value: A) => R1,
  onfail: (err: D.DecodeError) => R2,
): R1 | R2 {
  return pipe(decoder.decode(input), E.fold(
    (e): R1 | R2 => onfail(e),
    (v): R1 | R2 => onsuccess(v),
  ));
}

export const draw_error = (e: D.DecodeError): string => D.draw(e);
