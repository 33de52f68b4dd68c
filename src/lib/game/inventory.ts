/*
 * A player's inventory of development cards and scenario items.
 */

import { DevCard, is_vp_card } from './constants'

/*
 * Where an item sits.  NEW items were received this turn and can't be played
 * until the next; PLAYABLE items can; KEPT items are played-and-kept or
 * victory-point cards.
 */
export enum ItemState {
  OLD = 0,
  NEW = 1,
  PLAYABLE = 2,
  KEPT = 3,
}

export type InventoryItem = {
  itype: number;
  // kept in the inventory after being played, e.g. scenario port pieces
  kept_on_play: boolean;
  is_vp: boolean;
  can_cancel: boolean;
};

function dev_card(ctype: number): InventoryItem {
  const is_vp = is_vp_card(ctype);
  return {itype: ctype, kept_on_play: is_vp, is_vp, can_cancel: false};
}

export class Inventory {
  news: InventoryItem[] = [];
  playables: InventoryItem[] = [];
  kept: InventoryItem[] = [];

  /*
   * add `n` cards of `ctype`; OLD and PLAYABLE both land in the playable
   * list, and victory-point cards are always kept
   */
  add_dev_card(n: number, state: ItemState, ctype: number) {
    for (let i = 0; i < n; ++i) {
      this.add_item(state, dev_card(ctype));
    }
  }

  add_item(state: ItemState, item: InventoryItem) {
    if (item.is_vp || state === ItemState.KEPT) {
      this.kept.push(item);
    } else if (state === ItemState.NEW) {
      this.news.push(item);
    } else {
      this.playables.push(item);
    }
  }

  /*
   * remove one card of `ctype` from the given list; if there is none, remove
   * an unknown card instead, since we may not have known what it was
   */
  remove_dev_card(state: ItemState, ctype: number): boolean {
    const list = this.list_for(state);
    return remove_first(list, ctype) || remove_first(list, DevCard.UNKNOWN);
  }

  /*
   * mark an item of `itype` as played: drop it from the playable list, or
   * move it to kept if it stays in the inventory.  returns the item, or null
   * if there was none to play
   */
  play_item(itype: number, kept?: boolean): InventoryItem | null {
    const i = this.playables.findIndex(it => it.itype === itype);
    if (i < 0) return null;
    const [item] = this.playables.splice(i, 1);
    if (kept ?? item.kept_on_play) this.kept.push(item);
    return item;
  }

  /*
   * start-of-turn aging: everything new becomes playable
   */
  new_to_old() {
    this.playables.push(...this.news);
    this.news = [];
  }

  num_vp_items(): number {
    return this.kept.filter(it => it.is_vp).length;
  }

  num_unplayed(): number {
    return this.news.length + this.playables.length;
  }

  total(): number {
    return this.news.length + this.playables.length + this.kept.length;
  }

  clear() {
    this.news = [];
    this.playables = [];
    this.kept = [];
  }

  private list_for(state: ItemState): InventoryItem[] {
    switch (state) {
      case ItemState.NEW: return this.news;
      case ItemState.KEPT: return this.kept;
      case ItemState.OLD:
      case ItemState.PLAYABLE: return this.playables;
    }
  }
}

function remove_first(list: InventoryItem[], itype: number): boolean {
  const i = list.findIndex(it => it.itype === itype);
  if (i < 0) return false;
  list.splice(i, 1);
  return true;
}
