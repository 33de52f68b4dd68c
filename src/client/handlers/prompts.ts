/*
 * Server prompts and the generic request/action messages.
 */

import * as M from '../../protocol/message'
import { SimpleActionType, SimpleRequestType } from '../../protocol/message'

import { HandlerTable, per_game, seat } from './common'

import log from '../../utils/logger'

export const handlers = {
  discard_request: per_game((cx, ga, l, m: M.DiscardRequest) => {
    l?.requestedDiscard(m.count);
  }),

  choose_player_request: per_game((cx, ga, l, m: M.ChoosePlayerRequest) => {
    const choices = ga.players.filter(p => m.choices[p.pn] ?? false);
    l?.requestedChoosePlayer(choices, m.can_choose_none);
  }),

  // the victim has been chosen; now pick cloth or a resource to steal
  choose_player: per_game((cx, ga, l, m: M.ChoosePlayer) => {
    l?.requestedChooseRobResourceType(seat(ga, m.choice));
  }),

  roll_dice_prompt: per_game((cx, ga, l, m: M.RollDicePrompt) => {
    l?.requestedDiceRoll(m.pn);
  }),

  /*
   * a request from one player, or the server's reply to ours.  pn -1 is a
   * rejected request
   */
  simple_request: per_game((cx, ga, l, m: M.SimpleRequest) => {
    if (m.rtype === SimpleRequestType.TRADE_PORT_PLACE && m.pn >= 0) {
      ga.board.place_port(m.value1, m.value2);
    }
    l?.simpleRequest(m.pn, m.rtype, m.value1, m.value2);
  }),

  simple_action: per_game((cx, ga, l, m: M.SimpleAction) => {
    switch (m.atype) {
      case SimpleActionType.SC_PIRI_FORT_ATTACK_RESULT:
        l?.pirateFortressAttackResult(false, m.value1, m.value2);
        return;

      case SimpleActionType.BOARD_EDGE_SET_SPECIAL:
        if (ga.has_sea_board()) ga.board.set_special_edge(m.value1, m.value2);
        break;
      case SimpleActionType.TRADE_PORT_REMOVED:
        if (ga.has_sea_board()) ga.board.remove_port(m.value1);
        break;

      case SimpleActionType.DEVCARD_BOUGHT:
      case SimpleActionType.RSRC_TYPE_MONOPOLIZED:
        break;

      default:
        log.warn('unknown simple action', {game: ga.name, atype: m.atype});
        return;
    }
    l?.simpleAction(m.pn, m.atype, m.value1, m.value2);
  }),
} satisfies Partial<HandlerTable>;
