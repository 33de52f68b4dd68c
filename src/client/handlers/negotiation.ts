/*
 * The game option and scenario handshake, after the version exchange has
 * started it.
 */

import {
  GameOption, OptionSet, OptionType, parse_options,
} from '../../lib/game/game-options'

import * as M from '../../protocol/message'
import * as encode from '../../protocol/encode'
import { NONE } from '../../protocol/wire'

import { Context, HandlerTable, wants_i18n } from './common'

import log from '../../utils/logger'
import { fold } from '../../utils/result'
import { is_int } from '../../utils/string'

const is_str_type = (t: OptionType) =>
  t === OptionType.STR || t === OptionType.STRHIDE;

export function option_from_info(m: M.GameOptionInfo): GameOption {
  const otype: OptionType = m.otype in OptionType ? m.otype : OptionType.UNKNOWN;
  return {
    key: m.key,
    otype,
    min_version: m.min_version,
    last_mod_version: m.last_mod_version,
    default_bool: m.default_bool,
    default_int: m.default_int,
    min_int: m.min_int,
    max_int: m.max_int,
    flags: m.flags,
    desc: m.desc,
    enum_vals: m.enum_vals,
    bool_value: m.bool_value,
    int_value: !is_str_type(otype) && is_int(m.value)
      ? parseInt(m.value, 10)
      : m.default_int,
    str_value: is_str_type(otype) ? m.value : '',
  };
}

/*
 * (key, desc) pairs.  an empty desc keeps the one we have
 */
function localize_options(known: OptionSet | null, strs: string[]) {
  for (let i = 0; i + 1 < strs.length; i += 2) {
    const opt = known?.get(strs[i]) ?? null;
    if (opt !== null && strs[i + 1] !== '') opt.desc = strs[i + 1];
  }
}

/*
 * (key, title, desc) triples, or (key, KEY_UNKNOWN) for scenarios the
 * server has no text for
 */
function localize_scenarios(cx: Context, strs: string[], sent_all: boolean) {
  const info = cx.session.gametype(cx.is_practice);

  let i = 0;
  while (i < strs.length) {
    const key = strs[i++];
    info.scen_keys.add(key);

    const title = strs[i++];
    if (title === undefined || title === M.LOCALIZED_KEY_UNKNOWN) continue;
    const desc = strs[i++] ?? null;

    info.scenarios.localize(key, title, desc);
  }
  if (sent_all) info.all_scen_strings_received = true;
}

export const handlers = {
  game_option_get_defaults: (cx: Context, m: M.GameOptionGetDefaults) => {
    const {session, is_practice} = cx;
    const info = session.gametype(is_practice);

    const parsed = parse_options(m.opts, info.known_opts ?? OptionSet.all_known());
    const serv_opts = fold(parsed, opts => opts, err => {
      log.warn('bad default options from server', {err, opts: m.opts});
      return null;
    });
    if (serv_opts === null) return;

    const unknowns = info.receive_defaults(serv_opts);
    if (unknowns !== null) {
      if (!is_practice) session.post(d => d.optionsRequested());
      const req = encode.game_option_get_infos(unknowns, wants_i18n(cx));
      session.request(req, 'infos', is_practice);
    } else {
      info.new_game_waiting_for_opts = false;
      session.post(d => d.optionsReceived(info, is_practice, false, true));
    }
  },

  game_option_info: (cx: Context, m: M.GameOptionInfo) => {
    const {session, is_practice} = cx;
    const info = session.gametype(is_practice);

    const has_all_now = info.receive_info(option_from_info(m));
    const is_dash = m.key === NONE;
    session.post(d => d.optionsReceived(info, is_practice, is_dash, has_all_now));
  },

  localized_strings: (cx: Context, m: M.LocalizedStrings) => {
    switch (m.stype) {
      case M.LOCALIZED_TYPE_GAMEOPT:
        localize_options(cx.session.gametype(cx.is_practice).known_opts, m.strs);
        break;
      case M.LOCALIZED_TYPE_SCENARIO:
        localize_scenarios(cx, m.strs, (m.flags & M.LOCALIZED_FLAG_SENT_ALL) !== 0);
        break;
      default:
        log.warn('unknown localized string type', {stype: m.stype});
    }
  },

  scenario_info: (cx: Context, m: M.ScenarioInfo) => {
    const info = cx.session.gametype(cx.is_practice);

    if (m.no_more) {
      info.all_scen_strings_received = true;
      info.all_scen_info_received = true;
      return;
    }
    if (m.key_unknown) {
      info.scenarios.remove_unknown(m.key);
    } else {
      info.scenarios.add_known({
        key: m.key,
        min_version: m.min_version,
        last_mod_version: m.last_mod_version,
        opts: m.opts,
        title: m.title,
        desc: m.desc,
      });
    }
    info.scen_keys.add(m.key);
  },
} satisfies Partial<HandlerTable>;
