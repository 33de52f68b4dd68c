/*
 * Phase, turn, dice, and the game-wide counters.
 */

import { GameState, GOLD_LOCAL, Resource } from '../../lib/game/constants'
import { Game } from '../../lib/game/game'
import { ResourceSet } from '../../lib/game/resources'

import * as M from '../../protocol/message'
import { GEType } from '../../protocol/message'

import { Listener, UpdateType } from '../listener'
import {
  reconcile_resource_count, refresh_largest_army, refresh_longest_road,
} from './elements'
import { HandlerTable, per_game, seat } from './common'

import log from '../../utils/logger'

/*
 * Move `ga` to `state` and report it.
 *
 * Leaving NEW is the game starting, and the listener hears that first.  We
 * may have joined mid-game, so the first state we ever see for a game can
 * already be past NEW; that counts as leaving it too.
 */
export function change_state(ga: Game, l: Listener | null, state: GameState) {
  if (state === GameState.NEW) return;

  const old = ga.set_state(state);
  if (old === GameState.NEW) l?.gameStarted();
  l?.gameStateChanged(state, old);
}

/*
 * one game element; the single-purpose messages come through here too
 */
function apply_game_element(ga: Game, l: Listener | null, etype: number, value: number) {
  switch (etype) {
    case GEType.ROUND_COUNT:
      ga.round_count = value;
      break;
    case GEType.DEV_CARD_COUNT:
      ga.dev_card_count = value;
      l?.devCardDeckUpdated();
      break;
    case GEType.FIRST_PLAYER:
      ga.first_player = value;
      break;
    case GEType.CURRENT_PLAYER:
      ga.set_current_player(value);
      l?.playerTurnSet(value);
      break;
    case GEType.LARGEST_ARMY_PLAYER:
      refresh_largest_army(ga, l, () => {
        ga.largest_army_pn = seat(ga, value)?.pn ?? -1;
      });
      break;
    case GEType.LONGEST_ROAD_PLAYER:
      refresh_longest_road(ga, l, () => {
        ga.longest_road_pn = seat(ga, value)?.pn ?? -1;
      });
      break;
    default:
      log.warn('unknown game element', {game: ga.name, etype});
  }
}

export const handlers = {
  start_game: per_game((cx, ga, l, m: M.StartGame) => {
    if (m.state !== null) change_state(ga, l, m.state);
  }),

  game_state: per_game((cx, ga, l, m: M.GameState) => {
    change_state(ga, l, m.state);
  }),

  turn: per_game((cx, ga, l, m: M.Turn) => {
    if (m.state !== null) change_state(ga, l, m.state);

    ga.set_current_player(m.pn);
    ga.update_at_turn();
    l?.playerTurnSet(m.pn);
  }),

  set_turn: per_game((cx, ga, l, m: M.SetTurn) => {
    apply_game_element(ga, l, GEType.CURRENT_PLAYER, m.pn);
  }),

  first_player: per_game((cx, ga, l, m: M.FirstPlayer) => {
    apply_game_element(ga, l, GEType.FIRST_PLAYER, m.pn);
  }),

  longest_road: per_game((cx, ga, l, m: M.LongestRoad) => {
    apply_game_element(ga, l, GEType.LONGEST_ROAD_PLAYER, m.pn);
  }),

  largest_army: per_game((cx, ga, l, m: M.LargestArmy) => {
    apply_game_element(ga, l, GEType.LARGEST_ARMY_PLAYER, m.pn);
  }),

  dev_card_count: per_game((cx, ga, l, m: M.DevCardCount) => {
    apply_game_element(ga, l, GEType.DEV_CARD_COUNT, m.count);
  }),

  game_elements: per_game((cx, ga, l, m: M.GameElements) => {
    m.etypes.forEach((etype, i) => {
      apply_game_element(ga, l, etype, m.values[i] ?? 0);
    });
  }),

  dice_result: per_game((cx, ga, l, m: M.DiceResult) => {
    const player = seat(ga, ga.current_player);
    ga.current_dice = m.roll;
    l?.diceRolled(player, m.roll);
  }),

  /*
   * what each player got from the roll, with their new totals: add the
   * gains, then check the totals against ours
   */
  dice_result_resources: per_game((cx, ga, l, m: M.DiceResultResources) => {
    const pns: number[] = [];
    const gains: ResourceSet[] = [];

    for (const {pn, rsrc} of m.gains) {
      const rs = new ResourceSet();
      for (const [amount, rtype] of rsrc) rs.add(rtype, amount);

      ga.player(pn).resources.add_set(rs);
      pns.push(pn);
      gains.push(rs);
    }
    l?.diceRolledResources(pns, gains);

    for (const {pn, total} of m.gains) {
      reconcile_resource_count(cx, ga, l, pn, total);
    }
  }),

  player_stats: per_game((cx, ga, l, m: M.PlayerStats) => {
    if (m.stype !== M.PlayerStatType.RES_ROLL) return;

    const v = (i: number) => m.values[i] ?? 0;
    const stats = new Map<UpdateType, number>([
      [UpdateType.Clay, v(Resource.CLAY)],
      [UpdateType.Ore, v(Resource.ORE)],
      [UpdateType.Sheep, v(Resource.SHEEP)],
      [UpdateType.Wheat, v(Resource.WHEAT)],
      [UpdateType.Wood, v(Resource.WOOD)],
    ]);
    if (v(GOLD_LOCAL) !== 0) stats.set(UpdateType.GoldGains, v(GOLD_LOCAL));

    l?.playerStats(stats);
  }),

  svp_text_msg: per_game((cx, ga, l, m: M.SVPTextMsg) => {
    const pl = ga.player(m.pn);
    pl.add_special_vp_info(m.svp, m.desc);
    l?.playerSVPAwarded(pl, m.svp, m.desc);
  }),
} satisfies Partial<HandlerTable>;
