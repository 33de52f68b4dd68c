/*
 * Per-seat player records.
 */

import { PieceType, PIECE_STOCK } from './constants'
import { Inventory } from './inventory'
import { ResourceSet } from './resources'

import * as options from '../../options'
import { array_put } from '../../utils/array'

export type TradeOffer = {
  from: number;
  // which seats the offer is made to
  to: boolean[];
  give: ResourceSet;
  get: ResourceSet;
};

/*
 * a scenario special item, such as a wonder being built
 */
export type SpecialItem = {
  // -1 if nobody owns it
  pn: number;
  coord: number;
  level: number;
  sv: string;
};

export type SpecialVPInfo = {
  svp: number;
  desc: string;
};

export class Player {
  // null iff the seat is vacant
  name: string | null = null;
  robot: boolean = false;
  face_id: number = options.default_face_id;

  resources = new ResourceSet();
  inventory = new Inventory();

  // remaining pieces in stock, indexed by PieceType
  pieces: Record<number, number> = {...PIECE_STOCK};
  num_knights: number = 0;
  num_warships: number = 0;
  cloth: number = 0;

  special_vp: number = 0;
  svp_info: SpecialVPInfo[] = [];

  current_offer: TradeOffer | null = null;
  played_dev_card: boolean = false;
  asked_special_build: boolean = false;
  need_to_pick_gold: number = 0;
  last_settlement_coord: number = 0;

  scenario_events: number = 0;
  svp_landareas: number = 0;
  starting_landareas: number = 0;

  potential_settlements = new Set<number>();

  // scenario special items, by type key, indexed by player item index
  special_items = new Map<string, (SpecialItem | null)[]>();

  // resources gained from dice rolls over the game, indexed by Resource;
  // slot 6 holds gold-hex picks
  roll_stats: number[] = [];

  constructor(readonly pn: number) {}

  num_pieces(ptype: PieceType): number {
    return this.pieces[ptype] ?? 0;
  }

  set_num_pieces(ptype: PieceType, n: number) {
    this.pieces[ptype] = Math.max(0, n);
  }

  set_special_item(type_key: string, pi: number, item: SpecialItem | null) {
    const items = this.special_items.get(type_key) ?? [];
    array_put(items, pi, item, null);
    this.special_items.set(type_key, items);
  }

  add_special_vp_info(svp: number, desc: string) {
    this.svp_info.push({svp, desc});
  }

  /*
   * start-of-turn bookkeeping
   */
  update_at_turn() {
    this.inventory.new_to_old();
    this.played_dev_card = false;
  }

  /*
   * clear everything but the seat's occupant, for a board reset
   */
  reset_for_new_board(): Player {
    const p = new Player(this.pn);
    p.name = this.name;
    p.robot = this.robot;
    p.face_id = this.face_id;
    return p;
  }

  toString(): string {
    return `Player(${this.pn}, ${this.name ?? '<vacant>'})`;
  }
}
