/*
 * The game list.
 */

import * as M from '../../protocol/message'

import { Context, HandlerTable } from './common'

import * as options from '../../options'

/*
 * record a connection's listed games and show them.  on the remote
 * connection a game list also means the server is done describing options,
 * since it always sends those first
 */
function list_games(cx: Context, games: M.GameListing[]) {
  const {session, is_practice} = cx;
  const listed = session.listings(is_practice);
  for (const g of games) listed.set(g.game, g.opts);

  if (!is_practice) session.remote_info.no_more_options(false);

  for (const g of games) {
    session.post(d => d.addToGameList(g.game, g.opts, !g.unjoinable, is_practice));
  }
}

export const handlers = {
  games: (cx: Context, m: M.Games) => list_games(cx, m.games),

  games_with_options: (cx: Context, m: M.GamesWithOptions) => list_games(cx, m.games),

  new_game: ({session, is_practice}: Context, m: M.NewGame) => {
    session.listings(is_practice).set(m.game, null);
    session.post(d => d.addToGameList(m.game, null, !m.unjoinable, is_practice));
  },

  new_game_with_options: ({session, is_practice}: Context, m: M.NewGameWithOptions) => {
    const can_join = m.min_version <= options.client_version && !m.unjoinable;
    session.listings(is_practice).set(m.game, m.opts);
    session.post(d => d.addToGameList(m.game, m.opts, can_join, is_practice));
  },

  delete_game: ({session, is_practice}: Context, m: M.DeleteGame) => {
    session.listings(is_practice).delete(m.game);
    session.post(d => d.deleteFromGameList(m.game, is_practice));

    const ga = session.game(m.game);
    if (ga === null || ga.is_practice !== is_practice) return;
    session.listener(m.game)?.gameDisconnected(true, null);
    session.remove_game(m.game);
  },
} satisfies Partial<HandlerTable>;
