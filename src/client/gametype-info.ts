/*
 * Per-connection state of the game option and scenario handshake.
 *
 * Client and server may know different option and scenario catalogs.  After
 * the version exchange they describe the differences to each other over
 * several rounds; this tracks what we've asked, what's come back, and what
 * the merged catalog looks like so far.
 */

import { GameOption, OptionSet, OptionType, find_unknowns } from '../lib/game/game-options'
import { ScenarioSet } from '../lib/game/scenarios'

import { NONE } from '../protocol/wire'

export class ServerGametypeInfo {
  // every option description the server is going to send has arrived
  all_options_received: boolean = false;
  // the user asked to create a game before the options arrived
  new_game_waiting_for_opts: boolean = false;

  // options known on this connection; null if the server is too old to
  // support options at all
  known_opts: OptionSet | null = OptionSet.all_known();

  asked_defaults_already: boolean = false;
  asked_defaults_time: number = 0;
  defaults_received: boolean = false;

  all_scen_strings_received: boolean = false;
  all_scen_info_received: boolean = false;
  // scenario keys the server has told us about
  scen_keys = new Set<string>();
  scenarios = new ScenarioSet();

  /*
   * the server has nothing more to tell us about options.  `asked_defaults`
   * also marks the defaults as received
   */
  no_more_options(asked_defaults: boolean) {
    this.all_options_received = true;
    if (asked_defaults) {
      this.defaults_received = true;
      this.asked_defaults_already = true;
      this.asked_defaults_time = Date.now();
    }
  }

  /*
   * take the server's default values.  returns the keys among them we have
   * no description of, or null if we know them all
   */
  receive_defaults(serv_opts: ReadonlyMap<string, GameOption>): string[] | null {
    if (this.known_opts === null || this.known_opts.size === 0) {
      this.known_opts = new OptionSet(serv_opts.values());
    } else {
      for (const opt of serv_opts.values()) this.known_opts.put(opt);
    }

    const unknowns = find_unknowns(serv_opts.values());
    this.all_options_received = unknowns === null;
    this.defaults_received = true;
    return unknowns;
  }

  /*
   * take one option description.  returns true if it was the end-of-list
   * marker, after which we have everything
   */
  receive_info(opt: GameOption): boolean {
    const is_unknown = opt.otype === OptionType.UNKNOWN;
    if (opt.key === NONE && is_unknown) {
      this.no_more_options(false);
      return true;
    }

    this.known_opts ??= new OptionSet();
    // an option the server doesn't know stays, marked unknown, so we don't
    // ask about it again
    if (!this.known_opts.add_known(opt)) this.known_opts.put(opt);
    return false;
  }
}
