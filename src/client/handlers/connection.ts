/*
 * Connection-level messages: version exchange, pings, status text, and
 * broadcasts.
 */

import { OptionSet, is_long_key } from '../../lib/game/game-options'

import * as M from '../../protocol/message'
import * as encode from '../../protocol/encode'
import { sep2 } from '../../protocol/wire'

import { ServerCapabilities } from '../capabilities'
import { Context, HandlerTable, wants_i18n } from './common'

import * as options from '../../options'
import { Result, Ok, Err, fold } from '../../utils/result'

/*
 * Start the option handshake.  What we ask depends on which side is newer:
 *
 *   - server newer (or we want localized text from a server of our own
 *     version): ask it to describe every option we don't know
 *   - client newer, and the server knows about options: tell the server
 *     which of our options it won't know, less any whose keys it can't parse
 *   - client newer, server predates options: options are off for good
 *   - otherwise there's nothing to negotiate
 */
function negotiate_options(cx: Context) {
  const {session, is_practice} = cx;
  const caps = session.caps(is_practice);
  const info = session.gametype(is_practice);

  const i18n = wants_i18n(cx);
  const same_version = caps.version === options.client_version;

  if ((!is_practice && caps.version > options.client_version) ||
      (i18n && (is_practice || same_version))) {
    if (!is_practice) session.post(d => d.optionsRequested());
    const req = encode.game_option_get_infos(null, i18n, i18n && same_version);
    session.request(req, 'infos', is_practice);
    return;
  }

  if (!is_practice && caps.version < options.client_version) {
    if (!caps.supports_options()) {
      info.no_more_options(true);
      info.known_opts = null;
      return;
    }

    const known = info.known_opts ?? OptionSet.all_known();
    let too_new = known.options_newer_than(caps.version);

    if (!caps.supports_long_option_names()) {
      for (const opt of too_new) {
        if (is_long_key(opt.key)) known.remove(opt.key);
      }
      too_new = too_new.filter(opt => !is_long_key(opt.key));
    }
    info.known_opts = known;

    if (too_new.length > 0) {
      session.post(d => d.optionsRequested());
      const req = encode.game_option_get_infos(too_new.map(o => o.key), i18n);
      session.request(req, 'infos', false);
    } else if (i18n) {
      session.request(encode.game_option_get_infos(null, true, false), 'infos', false);
    }
    return;
  }

  info.known_opts ??= OptionSet.all_known();
  info.no_more_options(is_practice);
}

///////////////////////////////////////////////////////////////////////////////
/*
 * status text with structure packed into it
 */

/*
 * `errMsg,game,optkey,optkey...`, rendered with each option's description
 */
function option_problem_text(
  text: string,
  known: OptionSet | null,
): Result<string, string> {
  const toks = text.split(sep2).filter(t => t !== '');
  if (toks.length < 2) return Err(text);

  const [err_msg, game, ...keys] = toks;
  const lines = keys.map(k => `\n- ${known?.get(k)?.desc ?? k}`);
  return Ok(`Cannot create game ${game}\n${err_msg}${lines.join('')}`);
}

/*
 * `errMsg,game[,feats]`
 */
function missing_features_text(
  text: string,
  game_exists: (game: string) => boolean,
): Result<string, string> {
  const toks = text.split(sep2).filter(t => t !== '');
  if (toks.length < 2) return Err(text);

  const [, game] = toks;
  const feats = toks[2] ?? '?';
  const verb = game_exists(game) ? 'join' : 'create';
  return Ok(`Cannot ${verb} game ${game}\n` +
    `This client does not have required feature(s): ${feats}`);
}

const raw = (text: string) => text;

///////////////////////////////////////////////////////////////////////////////

export const handlers = {
  version: (cx: Context, m: M.Version) => {
    const {session, is_practice} = cx;

    if (!is_practice) {
      session.remote_caps = ServerCapabilities.from_report(m.version, m.feats);
      const feats = session.remote_caps.feats.toString();
      session.post(d => d.showVersion(m.version, m.version_str, m.build, feats));
    }
    negotiate_options(cx);
  },

  server_ping: (cx: Context, m: M.ServerPing) => {
    if (m.sleep_time !== -1) {
      cx.session.put(encode.server_ping(m.sleep_time), cx.is_practice);
      return;
    }
    cx.session.shutdown_from_network('Kicked by player with same name.');
  },

  status_message: (cx: Context, m: M.StatusMessage) => {
    const {session, is_practice} = cx;
    let sv = m.sv;
    let text = m.text;

    if (sv === M.StatusValue.OK_SET_NICKNAME) {
      sv = M.StatusValue.OK;
      const i = text.indexOf(sep2);
      if (i > 0) {
        const nick = text.slice(0, i);
        session.nickname = nick;
        text = text.slice(i + 1);
        session.post(d => d.setNickname(nick));
      }
    }

    const debug = session.caps(is_practice).reports_debug_via_status_value()
      ? sv === M.StatusValue.OK_DEBUG_MODE_ON
      : text.toLowerCase().includes('debug');
    session.in_debug_mode = debug;

    const shown = text;
    session.post(d => d.showStatus(shown, debug));

    switch (sv) {
      case M.StatusValue.PW_WRONG:
        session.post(d => d.focusPassword());
        break;

      case M.StatusValue.NEWGAME_OPTION_VALUE_TOONEW: {
        const known = session.gametype(is_practice).known_opts;
        const msg = fold(option_problem_text(text, known), raw, raw);
        session.post(d => d.showErrorDialog(msg));
        break;
      }
      case M.StatusValue.GAME_CLIENT_FEATURES_NEEDED: {
        const listed = session.listings(is_practice);
        const msg = fold(missing_features_text(text, g => listed.has(g)), raw, raw);
        session.post(d => d.showErrorDialog(msg));
        break;
      }
    }
  },

  reject_connection: (cx: Context, m: M.RejectConnection) => {
    cx.session.net.disconnect(cx.is_practice);
    cx.session.post(d => d.showErrorPanel(m.text, true));
  },

  bcast_text_msg: (cx: Context, m: M.BCastTextMsg) => {
    cx.session.post(d => d.chatMessageBroadcast(m.text));
    for (const l of cx.session.listeners.values()) {
      l.messageBroadcast(m.text);
    }
  },
} satisfies Partial<HandlerTable>;
