/*
 * Handler plumbing shared by every handler module.
 */

import { Game } from '../../lib/game/game'
import { Player } from '../../lib/game/player'

import * as M from '../../protocol/message'

import { Listener } from '../listener'
import { ClientSession } from '../session'

import * as options from '../../options'

/*
 * what a handler gets besides its message
 */
export type Context = {
  session: ClientSession;
  // the message came in on the practice connection
  is_practice: boolean;
};

export type Handler<T> = (cx: Context, m: T) => void;

/*
 * one handler per message kind; the dispatcher's table must fill every slot
 */
export type HandlerTable = {[K in M.Kind]: Handler<M.MessageMap[K]>};

/*
 * wrap a handler for a game-scoped message.  messages for games we haven't
 * joined (or have already left) are dropped here, before the handler runs
 */
export function per_game<T extends M.GameMessage>(
  fn: (cx: Context, ga: Game, l: Listener | null, m: T) => void,
): Handler<T> {
  return (cx, m) => {
    const ga = cx.session.game(m.game);
    if (ga === null) return;
    fn(cx, ga, cx.session.listener(m.game), m);
  };
}

/*
 * the player in seat `pn`, or null for -1 and other out-of-range seats
 */
export function seat(ga: Game, pn: number): Player | null {
  return pn >= 0 && pn < ga.max_players ? ga.player(pn) : null;
}

/*
 * whether to ask for localized option and scenario text on this connection
 */
export function wants_i18n(cx: Context): boolean {
  return options.locale !== null &&
    options.locale !== 'en_US' &&
    cx.session.caps(cx.is_practice).supports_i18n();
}
