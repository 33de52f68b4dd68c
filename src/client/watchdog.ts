/*
 * Timers guarding the option handshake against a server that never answers.
 *
 * When a timer fires and its reply still hasn't come, we carry on as if the
 * server had said it has nothing more to tell us.
 */

import { OptionType } from '../lib/game/game-options'

import * as M from '../protocol/message'
import { NONE } from '../protocol/wire'

import { Dispatcher } from './dispatcher'

import * as options from '../options'
import log from '../utils/logger'

type Timer = ReturnType<typeof setTimeout>;

/*
 * the option list's end marker, as the server would send it
 */
function end_of_options(): M.GameOptionInfo {
  return {
    kind: 'game_option_info',
    key: NONE,
    otype: OptionType.UNKNOWN,
    min_version: options.client_version,
    last_mod_version: options.client_version,
    default_bool: false,
    default_int: 0,
    min_int: 0,
    max_int: 0,
    bool_value: false,
    value: '',
    flags: 0,
    desc: NONE,
    enum_vals: [],
  };
}

export class NegotiationWatchdog {
  // keyed by `${what}:${is_practice}`
  private timers = new Map<string, Timer>();

  constructor(
    readonly dispatcher: Dispatcher,
    readonly timeout: number = options.negotiation_timeout,
  ) {}

  /*
   * we've asked for option descriptions
   */
  arm_infos(is_practice: boolean) {
    this.arm('infos', is_practice, () => {
      const info = this.dispatcher.session.gametype(is_practice);
      if (info.all_options_received) return;

      log.warn('no reply to game option info request', {is_practice});
      info.no_more_options(false);
      this.dispatcher.handle(end_of_options(), is_practice);
    });
  }

  /*
   * we've asked for the server's option defaults
   */
  arm_defaults(is_practice: boolean) {
    this.arm('defaults', is_practice, () => {
      const {session} = this.dispatcher;
      const info = session.gametype(is_practice);
      if (info.defaults_received) return;

      log.warn('no reply to game option defaults request', {is_practice});
      info.no_more_options(true);
      if (info.new_game_waiting_for_opts) {
        info.new_game_waiting_for_opts = false;
        session.post(d => d.optionsReceived(info, is_practice, false, true));
      }
    });
  }

  cancel_all() {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  get armed(): number {
    return this.timers.size;
  }

  private arm(what: string, is_practice: boolean, fire: () => void) {
    const key = `${what}:${is_practice}`;
    const prev = this.timers.get(key);
    if (prev !== undefined) clearTimeout(prev);

    this.timers.set(key, setTimeout(() => {
      this.timers.delete(key);
      fire();
    }, this.timeout));
  }
}
