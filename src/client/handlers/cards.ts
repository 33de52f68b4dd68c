/*
 * Development cards, inventory items, and scenario special items.
 */

import {
  DevCard, KNIGHT_FOR_VERS_1_X, UNKNOWN_FOR_VERS_1_X,
} from '../../lib/game/constants'
import { InventoryItem, ItemState } from '../../lib/game/inventory'
import { SpecialItem } from '../../lib/game/player'

import * as M from '../../protocol/message'
import {
  DevCardActionType, InvItemActionType, SpecialItemOp,
} from '../../protocol/message'

import { Context, HandlerTable, per_game, seat } from './common'
import { apply_player_element } from './elements'

/*
 * servers before the card renumbering swap the codes for knights and
 * unknown cards
 */
function card_type(cx: Context, ctype: number): number {
  if (!cx.session.caps(cx.is_practice).uses_legacy_dev_card_codes()) return ctype;
  if (ctype === KNIGHT_FOR_VERS_1_X) return DevCard.KNIGHT;
  if (ctype === UNKNOWN_FOR_VERS_1_X) return DevCard.UNKNOWN;
  return ctype;
}

export const handlers = {
  dev_card_action: per_game((cx, ga, l, m: M.DevCardAction) => {
    if (m.action === DevCardActionType.CANNOT_PLAY) {
      l?.devCardPlayRejected(card_type(cx, m.ctype));
      return;
    }
    const pl = ga.player(m.pn);
    const ctype = card_type(cx, m.ctype);
    const inv = pl.inventory;

    switch (m.action) {
      case DevCardActionType.DRAW:
      case DevCardActionType.ADD_NEW:
        inv.add_dev_card(1, ItemState.NEW, ctype);
        break;
      case DevCardActionType.ADD_OLD:
        inv.add_dev_card(1, ItemState.OLD, ctype);
        break;
      case DevCardActionType.PLAY:
        inv.remove_dev_card(ItemState.OLD, ctype);
        break;
    }
    l?.playerDevCardUpdated(pl, m.action === DevCardActionType.ADD_OLD);
  }),

  // pn -1 sets everyone's flag
  set_played_dev_card: per_game((cx, ga, l, m: M.SetPlayedDevCard) => {
    apply_player_element(
      cx, ga, null, m.pn, M.PEAction.SET, M.PEType.PLAYED_DEV_CARD_FLAG,
      m.played ? 1 : 0, false,
    );
  }),

  inventory_item_action: per_game((cx, ga, l, m: M.InventoryItemAction) => {
    if (m.pn === -1 || m.action === InvItemActionType.CANNOT_PLAY) {
      l?.invItemPlayRejected(m.itype, m.flags);
      return;
    }
    const pl = ga.player(m.pn);
    const inv = pl.inventory;

    const kept = (m.flags & M.INV_ITEM_FLAG_KEPT) !== 0;
    const can_cancel = (m.flags & M.INV_ITEM_FLAG_CAN_CANCEL) !== 0;
    const fresh = (): InventoryItem => ({
      itype: m.itype,
      kept_on_play: kept,
      is_vp: (m.flags & M.INV_ITEM_FLAG_VP) !== 0,
      can_cancel,
    });
    // in the fort-trading scenario, playing an item means placing it
    const for_placement = ga.option_bool('_SC_FTRI');

    switch (m.action) {
      case InvItemActionType.ADD_PLAYABLE:
        inv.add_item(ItemState.PLAYABLE, fresh());
        break;
      case InvItemActionType.ADD_OTHER:
        inv.add_item(ItemState.KEPT, fresh());
        break;

      case InvItemActionType.PLAYED: {
        const item = inv.play_item(m.itype, kept);
        if (for_placement) ga.placing_item = item ?? fresh();
        break;
      }
      case InvItemActionType.PLACING_EXTRA:
        ga.placing_item = fresh();
        break;
    }

    l?.playerDevCardUpdated(pl, m.action === InvItemActionType.ADD_PLAYABLE);
    if (m.action === InvItemActionType.PLAYED) {
      l?.playerCanCancelInvItemPlay(pl, can_cancel);
    }
  }),

  /*
   * an item can be in the game's list (at gi), its owner's (at pi), or both
   */
  set_special_item: per_game((cx, ga, l, m: M.SetSpecialItem) => {
    const {type_key, gi, pi, pn} = m;
    const owner = seat(ga, pn);

    switch (m.op) {
      case SpecialItemOp.CLEAR:
        if (gi !== -1) ga.set_special_item(type_key, gi, null);
        if (pi !== -1) owner?.set_special_item(type_key, pi, null);
        break;

      case SpecialItemOp.SET: {
        if (gi === -1 && (pi === -1 || owner === null)) break;
        const item: SpecialItem = {pn, coord: m.coord, level: m.level, sv: m.sv};
        if (gi !== -1) ga.set_special_item(type_key, gi, item);
        if (pi !== -1) owner?.set_special_item(type_key, pi, item);
        break;
      }
    }

    const pl = pi !== -1 ? owner : null;
    switch (m.op) {
      case SpecialItemOp.SET:
      case SpecialItemOp.CLEAR:
        l?.playerSetSpecialItem(type_key, pl, gi, pi, m.op === SpecialItemOp.SET);
        break;
      case SpecialItemOp.PICK:
      case SpecialItemOp.DECLINE:
        l?.playerPickSpecialItem(
          type_key, pl, gi, pi, m.op === SpecialItemOp.PICK, m.coord, m.level, m.sv,
        );
        break;
    }
  }),
} satisfies Partial<HandlerTable>;
