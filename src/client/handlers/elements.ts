/*
 * Per-player counters: resources, pieces in stock, knights, and the
 * scenario fields that ride along with them.
 */

import { PieceType, Resource } from '../../lib/game/constants'
import { Game } from '../../lib/game/game'
import { Player } from '../../lib/game/player'

import * as M from '../../protocol/message'
import { PEAction, PEType } from '../../protocol/message'

import { Listener, UpdateType } from '../listener'
import { Context, HandlerTable, per_game, seat } from './common'

import log from '../../utils/logger'

const PIECE_ELEMENTS: Partial<Record<number, [PieceType, UpdateType]>> = {
  [PEType.ROADS]: [PieceType.ROAD, UpdateType.Road],
  [PEType.SETTLEMENTS]: [PieceType.SETTLEMENT, UpdateType.Settlement],
  [PEType.CITIES]: [PieceType.CITY, UpdateType.City],
  [PEType.SHIPS]: [PieceType.SHIP, UpdateType.Ship],
};

const RESOURCE_ELEMENTS: Partial<Record<number, [Resource, UpdateType]>> = {
  [PEType.CLAY]: [Resource.CLAY, UpdateType.Clay],
  [PEType.ORE]: [Resource.ORE, UpdateType.Ore],
  [PEType.SHEEP]: [Resource.SHEEP, UpdateType.Sheep],
  [PEType.WHEAT]: [Resource.WHEAT, UpdateType.Wheat],
  [PEType.WOOD]: [Resource.WOOD, UpdateType.Wood],
  [PEType.UNKNOWN]: [Resource.UNKNOWN, UpdateType.Unknown],
};

/*
 * `current` after a SET, GAIN, or LOSE of `amount`
 */
function apply_action(action: PEAction, current: number, amount: number): number {
  switch (action) {
    case PEAction.SET: return amount;
    case PEAction.GAIN: return current + amount;
    case PEAction.LOSE: return current - amount;
  }
}

/*
 * losing unknown resources means we can no longer tell which known ones are
 * left, so everything is folded into unknown first
 */
function apply_resource(pl: Player, action: PEAction, rtype: Resource, amount: number) {
  const rs = pl.resources;
  switch (action) {
    case PEAction.SET:
      rs.set(rtype, amount);
      break;
    case PEAction.GAIN:
      rs.add(rtype, amount);
      break;
    case PEAction.LOSE:
      if (rtype === Resource.UNKNOWN) rs.convert_to_unknown();
      rs.subtract(rtype, amount);
      break;
  }
}

/*
 * run `update`, then tell the listener if it moved largest army
 */
export function refresh_largest_army(ga: Game, l: Listener | null, update: () => void) {
  const old = ga.largest_army_pn;
  update();
  if (ga.largest_army_pn !== old) {
    l?.largestArmyRefresh(seat(ga, old), seat(ga, ga.largest_army_pn));
  }
}

export function refresh_longest_road(ga: Game, l: Listener | null, update: () => void) {
  const old = ga.longest_road_pn;
  update();
  if (ga.longest_road_pn !== old) {
    l?.longestRoadRefresh(seat(ga, old), seat(ga, ga.longest_road_pn));
  }
}

/*
 * A player's resource total as the server counts it.  A total that
 * disagrees with ours means we lost track of another player's hand; our
 * own hand we trust.
 */
export function reconcile_resource_count(
  cx: Context,
  ga: Game,
  l: Listener | null,
  pn: number,
  count: number,
) {
  const pl = ga.player(pn);
  if (count === pl.resources.total()) return;
  if (pl.name === cx.session.nickname) return;

  pl.resources.clear();
  pl.resources.set(Resource.UNKNOWN, count);
  l?.playerResourcesUpdated(pl);
}

/*
 * Apply one player element update to `ga` and report it.
 *
 * `pn` is -1 for a few elements that apply to the whole game or to every
 * player; for the rest a bad seat throws.
 */
export function apply_player_element(
  cx: Context,
  ga: Game,
  l: Listener | null,
  pn: number,
  action: PEAction,
  etype: number,
  amount: number,
  news: boolean,
) {
  const player = () => ga.player(pn);
  let updated: [Player, UpdateType] | null = null;

  const piece = PIECE_ELEMENTS[etype];
  const rsrc = RESOURCE_ELEMENTS[etype];
  if (piece !== undefined) {
    const [ptype, utype] = piece;
    const pl = player();
    pl.set_num_pieces(ptype, apply_action(action, pl.num_pieces(ptype), amount));
    updated = [pl, utype];
  } else if (rsrc !== undefined) {
    const [rtype, utype] = rsrc;
    const pl = player();
    apply_resource(pl, action, rtype, amount);
    updated = [pl, utype];
  } else {
    switch (etype) {
      case PEType.NUMKNIGHTS: {
        const pl = player();
        refresh_largest_army(ga, l, () => {
          pl.num_knights = Math.max(0, apply_action(action, pl.num_knights, amount));
          ga.update_largest_army();
        });
        updated = [pl, UpdateType.Knight];
        break;
      }
      case PEType.ASK_SPECIAL_BUILD: {
        const pl = player();
        pl.asked_special_build = amount !== 0;
        // a request, not a counter
        l?.requestedSpecialBuild(pl);
        break;
      }
      case PEType.RESOURCE_COUNT:
        reconcile_resource_count(cx, ga, l, pn, amount);
        break;

      case PEType.NUM_PICK_GOLD_HEX_RESOURCES: {
        const pl = player();
        pl.need_to_pick_gold = amount;
        l?.requestedGoldResourceCountUpdated(pl, 0);
        break;
      }
      case PEType.SCENARIO_SVP: {
        const pl = player();
        pl.special_vp = amount;
        updated = [pl, UpdateType.SpecialVictoryPoints];
        break;
      }
      case PEType.SCENARIO_CLOTH_COUNT:
        if (pn === -1) {
          ga.board.cloth = amount;
        } else {
          const pl = player();
          pl.cloth = amount;
          updated = [pl, UpdateType.Cloth];
        }
        break;

      case PEType.SCENARIO_WARSHIP_COUNT: {
        const pl = player();
        if (action === PEAction.LOSE) break;
        pl.num_warships = apply_action(action, pl.num_warships, amount);
        updated = [pl, UpdateType.Warship];
        break;
      }
      case PEType.SCENARIO_PLAYEREVENTS_BITMASK:
        player().scenario_events = amount;
        break;
      case PEType.SCENARIO_SVP_LANDAREAS_BITMASK:
        player().svp_landareas = amount;
        break;
      case PEType.STARTING_LANDAREAS:
        player().starting_landareas = amount;
        break;
      case PEType.LAST_SETTLEMENT_NODE:
        player().last_settlement_coord = amount;
        break;

      case PEType.PLAYED_DEV_CARD_FLAG: {
        const players = pn === -1 ? ga.players : [player()];
        for (const p of players) p.played_dev_card = amount !== 0;
        break;
      }
      default:
        log.warn('unknown player element', {game: ga.name, etype});
    }
  }

  if (updated === null) return;
  const [pl, utype] = updated;

  if (!news) {
    l?.playerElementUpdated(pl, utype, false, false);
  } else if (action === PEAction.GAIN) {
    l?.playerElementUpdated(pl, utype, true, false);
  } else {
    l?.playerElementUpdated(pl, utype, false, true);
  }
}

export const handlers = {
  player_element: per_game((cx, ga, l, m: M.PlayerElement) => {
    apply_player_element(cx, ga, l, m.pn, m.action, m.etype, m.amount, m.news);
  }),

  player_elements: per_game((cx, ga, l, m: M.PlayerElements) => {
    m.etypes.forEach((etype, i) => {
      apply_player_element(cx, ga, l, m.pn, m.action, etype, m.amounts[i] ?? 0, false);
    });
  }),

  resource_count: per_game((cx, ga, l, m: M.ResourceCount) => {
    reconcile_resource_count(cx, ga, l, m.pn, m.count);
  }),
} satisfies Partial<HandlerTable>;
