/*
 * Game scenarios: named bundles of game options with their own board
 * layouts and special rules.
 */

import * as D from 'io-ts/lib/Decoder'

import catalog_json from './data/scenarios.json'

import { on_decode, draw_error } from '../../protocol/fields'

export type Scenario = {
  key: string;
  min_version: number;
  last_mod_version: number;
  // packed game options the scenario sets
  opts: string;
  title: string;
  desc: string | null;
};

const CatalogEntry = D.struct({
  key: D.string,
  min_version: D.number,
  last_mod_version: D.number,
  opts: D.string,
  title: D.string,
  desc: D.nullable(D.string),
});

const raw_catalog: unknown = catalog_json;

const catalog: readonly Scenario[] = on_decode(
  D.array(CatalogEntry), raw_catalog,
  (entries): Scenario[] => entries,
  (err): Scenario[] => {
    throw new Error(`bad scenario catalog: ${draw_error(err)}`);
  },
);

/*
 * The scenarios known on one connection.  Starts from the built-in catalog;
 * the server adds to it, updates it, and tells us about keys it doesn't know.
 */
export class ScenarioSet {
  private scens = new Map<string, Scenario>();

  constructor(scens: Iterable<Scenario> = catalog) {
    for (const sc of scens) this.scens.set(sc.key, {...sc});
  }

  get(key: string): Scenario | null {
    return this.scens.get(key) ?? null;
  }

  add_known(sc: Scenario) {
    this.scens.set(sc.key, sc);
  }

  remove_unknown(key: string) {
    this.scens.delete(key);
  }

  /*
   * replace a scenario's text with a localized version; ignored for keys we
   * don't have
   */
  localize(key: string, title: string, desc: string | null): boolean {
    const sc = this.scens.get(key);
    if (sc === undefined || title === '') return false;
    sc.title = title;
    sc.desc = desc === '' ? null : desc;
    return true;
  }

  keys(): string[] {
    return [...this.scens.keys()];
  }

  /*
   * the scenarios created or changed after `version`
   */
  newer_than(version: number): Scenario[] {
    return [...this.scens.values()].filter(sc => sc.last_mod_version > version);
  }
}
