/*
 * Joining and leaving games, seats, and in-game chat.
 */

import { GameState } from '../../lib/game/constants'
import { Game } from '../../lib/game/game'
import { GameOption, OptionSet, parse_options } from '../../lib/game/game-options'
import { Player } from '../../lib/game/player'

import * as M from '../../protocol/message'
import * as encode from '../../protocol/encode'

import { Context, HandlerTable, per_game } from './common'

import log from '../../utils/logger'
import { fold } from '../../utils/result'

/*
 * in game text from this "nickname" is from the server itself
 */
const SERVERNAME = 'Server';

/*
 * the options of a listed game, parsed against what we know on that
 * connection
 */
function listed_options(cx: Context, game: string): Map<string, GameOption> {
  const packed = cx.session.listings(cx.is_practice).get(game) ?? null;
  if (packed === null) return new Map();

  const known = cx.session.gametype(cx.is_practice).known_opts ?? OptionSet.all_known();
  return fold(parse_options(packed, known), opts => opts, err => {
    log.warn('bad options for listed game', {game, err});
    return new Map<string, GameOption>();
  });
}

export const handlers = {
  /*
   * we're in: create the replica and its listener
   */
  join_game_auth: (cx: Context, m: M.JoinGameAuth) => {
    const ga = new Game(m.game, listed_options(cx, m.game), cx.is_practice);
    cx.session.add_game(ga, cx.session.make_listener(ga, cx.is_practice));
  },

  join_game: per_game((cx, ga, l, m: M.JoinGame) => {
    ga.members.add(m.nick);
    l?.playerJoined(m.nick);
  }),

  leave_game: per_game((cx, ga, l, m: M.LeaveGame) => {
    const player = ga.player_by_name(m.nick);
    // the listener sees the player while they're still seated
    l?.playerLeft(m.nick, player);
    if (player !== null) ga.remove_player(m.nick);
    ga.members.delete(m.nick);
  }),

  sit_down: per_game(({session, is_practice}, ga, l, m: M.SitDown) => {
    ga.with_monitor(() => {
      ga.add_player(m.nick, m.pn);
      ga.player(m.pn).robot = m.robot;
    });
    l?.playerSitdown(m.pn, m.nick);

    if (m.nick === session.nickname &&
        !ga.is_board_reset &&
        ga.state < GameState.START1A) {
      ga.player(m.pn).face_id = session.last_face_id;
      session.put(encode.change_face(ga.name, m.pn, session.last_face_id), is_practice);
    }
  }),

  game_members: per_game((cx, ga, l, m: M.GameMembers) => {
    for (const nick of m.members) ga.members.add(nick);
    l?.membersListed(m.members);
  }),

  set_seat_lock: per_game((cx, ga, l, m: M.SetSeatLock) => {
    if ('all' in m.seats) {
      m.seats.all.forEach((lock, pn) => {
        if (pn < ga.max_players) ga.set_seat_lock(pn, lock);
      });
    } else {
      ga.set_seat_lock(m.seats.pn, m.seats.lock);
    }
    l?.seatLockUpdated();
  }),

  change_face: per_game((cx, ga, l, m: M.ChangeFace) => {
    const player = ga.player(m.pn);
    player.face_id = m.face_id;
    l?.playerFaceChanged(player, m.face_id);
  }),

  game_text_msg: per_game((cx, ga, l, m: M.GameTextMsg) => {
    l?.messageReceived(m.nick === SERVERNAME ? null : m.nick, m.text);
  }),

  game_server_text: per_game((cx, ga, l, m: M.GameServerText) => {
    l?.messageReceived(null, m.text);
  }),

  game_stats: per_game((cx, ga, l, m: M.GameStats) => {
    ga.final_scores = m.scores;

    const scores = new Map<Player, number>();
    m.scores.forEach((score, pn) => {
      if (pn >= ga.max_players) return;
      const p = ga.player(pn);
      if (p.name !== null) scores.set(p, score);
    });
    l?.gameEnded(scores);
  }),
} satisfies Partial<HandlerTable>;
