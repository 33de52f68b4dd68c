/*
 * Game options: the rule variants a game is created with, and the catalog of
 * options this client knows about.
 *
 * The catalog is versioned.  Each option records the version that introduced
 * it and the version that last changed it, which is what lets a client and a
 * server of different versions work out which options to describe to each
 * other.
 */

import * as D from 'io-ts/lib/Decoder'

import catalog_json from './data/game-options.json'

import { on_decode, draw_error } from '../../protocol/fields'
import { Result, Ok, Err } from '../../utils/result'
import { is_int } from '../../utils/string'

export enum OptionType {
  UNKNOWN = 0,
  BOOL = 1,
  INT = 2,
  INTBOOL = 3,
  ENUM = 4,
  ENUMBOOL = 5,
  STR = 6,
  STRHIDE = 7,
}

export type GameOption = {
  key: string;
  otype: OptionType;
  min_version: number;
  last_mod_version: number;

  default_bool: boolean;
  default_int: number;
  min_int: number;
  max_int: number;
  flags: number;
  desc: string;
  enum_vals: string[];

  // current value
  bool_value: boolean;
  int_value: number;
  str_value: string;
};

/*
 * Option keys of more than 3 characters, or with an underscore, were added in
 * version 2000; older servers can't parse them.
 */
export const VERSION_FOR_LONGER_OPTNAMES = 2000;

export function is_long_key(key: string): boolean {
  return key.length > 3 || key.includes('_');
}

/*
 * a placeholder for an option the client has no description of
 */
export function unknown_option(key: string): GameOption {
  return {
    key,
    otype: OptionType.UNKNOWN,
    min_version: Number.MAX_SAFE_INTEGER,
    last_mod_version: Number.MAX_SAFE_INTEGER,
    default_bool: false,
    default_int: 0,
    min_int: 0,
    max_int: 0,
    flags: 0,
    desc: key,
    enum_vals: [],
    bool_value: false,
    int_value: 0,
    str_value: '',
  };
}

///////////////////////////////////////////////////////////////////////////////
/*
 * the built-in catalog
 */

const CatalogEntry = D.struct({
  key: D.string,
  type: D.number,
  min_version: D.number,
  last_mod_version: D.number,
  default_bool: D.boolean,
  default_int: D.number,
  min_int: D.number,
  max_int: D.number,
  flags: D.number,
  desc: D.string,
});
type CatalogEntry = D.TypeOf<typeof CatalogEntry>;

function from_entry(e: CatalogEntry): GameOption {
  return {
    key: e.key,
    otype: e.type in OptionType ? e.type : OptionType.UNKNOWN,
    min_version: e.min_version,
    last_mod_version: e.last_mod_version,
    default_bool: e.default_bool,
    default_int: e.default_int,
    min_int: e.min_int,
    max_int: e.max_int,
    flags: e.flags,
    desc: e.desc,
    enum_vals: [],
    bool_value: e.default_bool,
    int_value: e.default_int,
    str_value: '',
  };
}

const raw_catalog: unknown = catalog_json;

const catalog: readonly GameOption[] = on_decode(
  D.array(CatalogEntry), raw_catalog,
  (entries): GameOption[] => entries.map(from_entry),
  (err): GameOption[] => {
    throw new Error(`bad game option catalog: ${draw_error(err)}`);
  },
);

///////////////////////////////////////////////////////////////////////////////

/*
 * A set of options keyed by option key.
 */
export class OptionSet {
  private opts = new Map<string, GameOption>();

  constructor(opts: Iterable<GameOption> = []) {
    for (const opt of opts) this.opts.set(opt.key, {...opt});
  }

  /*
   * every option in the built-in catalog, at its default value
   */
  static all_known(): OptionSet {
    return new OptionSet(catalog);
  }

  get(key: string): GameOption | null {
    return this.opts.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.opts.has(key);
  }

  /*
   * add or replace an option; returns the one it replaced, if any
   */
  put(opt: GameOption): GameOption | null {
    const prev = this.opts.get(opt.key) ?? null;
    this.opts.set(opt.key, opt);
    return prev;
  }

  remove(key: string): GameOption | null {
    const prev = this.opts.get(key) ?? null;
    this.opts.delete(key);
    return prev;
  }

  /*
   * take a server's description of an option.  a description of unknown
   * type means the server doesn't know the option either, so we drop it
   */
  add_known(opt: GameOption): boolean {
    if (opt.otype === OptionType.UNKNOWN) {
      this.remove(opt.key);
      return false;
    }
    this.put(opt);
    return true;
  }

  /*
   * the known options created or changed after `version`
   */
  options_newer_than(version: number): GameOption[] {
    return [...this.opts.values()].filter(
      opt => opt.otype !== OptionType.UNKNOWN && opt.last_mod_version > version
    );
  }

  keys(): string[] {
    return [...this.opts.keys()];
  }

  values(): GameOption[] {
    return [...this.opts.values()];
  }

  get size(): number {
    return this.opts.size;
  }

  copy(): OptionSet {
    return new OptionSet(this.opts.values());
  }
}

///////////////////////////////////////////////////////////////////////////////
/*
 * packed option strings: `KEY=value,KEY=value`.  booleans are t or f;
 * INTBOOL and ENUMBOOL values are a boolean immediately followed by an int.
 */

function parse_value(opt: GameOption, val: string): GameOption | null {
  const bool = (c: string) => c === 't' ? true : c === 'f' ? false : null;

  switch (opt.otype) {
    case OptionType.BOOL: {
      const b = bool(val);
      return b === null ? null : {...opt, bool_value: b};
    }
    case OptionType.INT:
    case OptionType.ENUM:
      return is_int(val) ? {...opt, int_value: parseInt(val, 10)} : null;

    case OptionType.INTBOOL:
    case OptionType.ENUMBOOL: {
      const b = bool(val.charAt(0));
      const n = val.slice(1);
      if (b === null || !is_int(n)) return null;
      return {...opt, bool_value: b, int_value: parseInt(n, 10)};
    }
    case OptionType.STR:
    case OptionType.STRHIDE:
      return {...opt, str_value: val};

    case OptionType.UNKNOWN:
      return opt;
  }
}

/*
 * parse a packed option string against the options in `known`.  keys not in
 * `known` come back as unknown options, to be asked about.
 */
export function parse_options(
  packed: string,
  known: OptionSet,
): Result<Map<string, GameOption>, string> {
  const out = new Map<string, GameOption>();
  if (packed === '' || packed === '-') return Ok(out);

  for (const tok of packed.split(',')) {
    const eq = tok.indexOf('=');
    if (eq <= 0) return Err(`malformed option "${tok}"`);

    const key = tok.slice(0, eq);
    const base = known.get(key) ?? unknown_option(key);
    const opt = parse_value(base, tok.slice(eq + 1));
    if (opt === null) return Err(`bad value for option ${key}: "${tok}"`);
    out.set(key, opt);
  }
  return Ok(out);
}

/*
 * the keys of `opts` whose option types we don't know, or null if there
 * are none
 */
export function find_unknowns(opts: Iterable<GameOption>): string[] | null {
  const keys = [...opts]
    .filter(opt => opt.otype === OptionType.UNKNOWN)
    .map(opt => opt.key);
  return keys.length > 0 ? keys : null;
}
