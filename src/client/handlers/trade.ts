/*
 * Player-to-player and bank trades.
 */

import { ResourceSet } from '../../lib/game/resources'

import * as M from '../../protocol/message'

import { HandlerTable, per_game, seat } from './common'

export const handlers = {
  make_offer: per_game((cx, ga, l, m: M.MakeOffer) => {
    const from = ga.player(m.from);
    from.current_offer = {
      from: m.from,
      to: m.to,
      give: ResourceSet.from_known(m.give),
      get: ResourceSet.from_known(m.get),
    };
    l?.requestedTrade(from);
  }),

  // pn -1 clears everyone's offer
  clear_offer: per_game((cx, ga, l, m: M.ClearOffer) => {
    const player = seat(ga, m.pn);
    const players = player === null ? ga.players : [player];
    for (const p of players) p.current_offer = null;
    l?.requestedTradeClear(player, false);
  }),

  reject_offer: per_game((cx, ga, l, m: M.RejectOffer) => {
    l?.requestedTradeRejection(ga.player(m.pn));
  }),

  accept_offer: per_game((cx, ga, l, m: M.AcceptOffer) => {
    l?.playerTradeAccepted(ga.player(m.offering), ga.player(m.accepting));
  }),

  /*
   * older servers leave out the trading player; it's whoever's turn it is
   */
  bank_trade: per_game((cx, ga, l, m: M.BankTrade) => {
    const player = seat(ga, m.pn) ?? seat(ga, ga.current_player);
    if (player === null) return;
    l?.playerBankTrade(player, ResourceSet.from_known(m.give), ResourceSet.from_known(m.get));
  }),

  clear_trade_msg: per_game((cx, ga, l, m: M.ClearTradeMsg) => {
    l?.requestedTradeReset(seat(ga, m.pn));
  }),
} satisfies Partial<HandlerTable>;
