/*
 * The client-side replica of one game.
 *
 * Nothing here makes game-logic decisions; the server does that.  The
 * replica only records what the server tells us, through small named
 * mutations the message handlers call.
 */

import {
  BoardEncoding, GameState, PieceType, SeatLock,
  MAX_PLAYERS_STANDARD, MAX_PLAYERS_6PL, VP_WINNER_STANDARD,
} from './constants'
import { Board, Piece } from './board'
import { Replica } from './errors'
import { GameOption } from './game-options'
import { InventoryItem } from './inventory'
import { Player, SpecialItem } from './player'

import assert from '../../utils/assert'
import { array_fill, array_put } from '../../utils/array'

/*
 * the initial-placement states, each mapped to the one before it
 */
const UNDO_INIT_SETTLEMENT: Partial<Record<GameState, GameState>> = {
  [GameState.START1B]: GameState.START1A,
  [GameState.START2B]: GameState.START2A,
  [GameState.START3B]: GameState.START3A,
};

export class Game {
  readonly max_players: number;
  readonly vp_winner: number;

  board: Board = new Board();
  players: Player[];
  seat_locks: SeatLock[];
  // everyone in the game, seated or not
  members = new Set<string>();

  state: GameState = GameState.NEW;
  old_state: GameState = GameState.NEW;

  current_player: number = -1;
  first_player: number = -1;
  current_dice: number = 0;
  round_count: number = 0;
  dev_card_count: number = 0;

  largest_army_pn: number = -1;
  longest_road_pn: number = -1;

  // this replica was made by a board reset
  is_board_reset: boolean = false;
  // final scores, once the game is over
  final_scores: number[] | null = null;

  // scenario special items, by type key, indexed by game item index
  special_items = new Map<string, (SpecialItem | null)[]>();

  // in debug mode, pieces can go anywhere
  debug_free_placement: boolean = false;

  // an inventory item being placed on the board, in PLACING_INV_ITEM
  placing_item: InventoryItem | null = null;

  #monitor_held: boolean = false;

  constructor(
    readonly name: string,
    readonly options: ReadonlyMap<string, GameOption> = new Map(),
    readonly is_practice: boolean = false,
  ) {
    this.max_players = this.option_bool('PLB')
      ? MAX_PLAYERS_6PL
      : MAX_PLAYERS_STANDARD;

    const vp = this.options.get('VP');
    this.vp_winner = vp !== undefined && vp.bool_value
      ? vp.int_value
      : VP_WINNER_STANDARD;

    this.players = array_fill(this.max_players, pn => new Player(pn));
    this.seat_locks = array_fill(this.max_players, SeatLock.UNLOCKED);
  }

  option_bool(key: string): boolean {
    return this.options.get(key)?.bool_value ?? false;
  }

  has_sea_board(): boolean {
    return this.option_bool('SBL') || this.board.encoding === BoardEncoding.LARGE;
  }

  toString(): string {
    return `Game(${this.name})`;
  }

  /////////////////////////////////////////////////////////////////////////////
  /*
   * monitor
   *
   * multi-step mutations take the monitor so a reader on the UI side of the
   * task queue never sees them half done.
   */

  take_monitor() {
    assert(!this.#monitor_held, 'game monitor already held', {game: this.name});
    this.#monitor_held = true;
  }

  release_monitor() {
    this.#monitor_held = false;
  }

  get monitor_held(): boolean {
    return this.#monitor_held;
  }

  with_monitor<T>(fn: () => T): T {
    this.take_monitor();
    try {
      return fn();
    } finally {
      this.release_monitor();
    }
  }

  /////////////////////////////////////////////////////////////////////////////
  /*
   * seats and players
   */

  player(pn: number): Player {
    const p = this.players[pn];
    if (p === undefined) {
      throw new Replica.BadSeatError(`${this.name}: no seat ${pn}`);
    }
    return p;
  }

  player_by_name(name: string): Player | null {
    return this.players.find(p => p.name === name) ?? null;
  }

  add_player(name: string, pn: number) {
    const p = this.player(pn);
    p.name = name;
    this.members.add(name);
  }

  /*
   * vacate `name`'s seat; returns the seat they had
   */
  remove_player(name: string): number {
    const p = this.player_by_name(name);
    if (p === null) {
      throw new Replica.NoPlayerError(`${this.name}: ${name} is not seated`);
    }
    this.players[p.pn] = new Player(p.pn);
    return p.pn;
  }

  set_seat_lock(pn: number, lock: SeatLock) {
    this.player(pn);
    this.seat_locks[pn] = lock;
  }

  /////////////////////////////////////////////////////////////////////////////
  /*
   * phase and turn
   */

  /*
   * move to `state`; returns the state we were in
   */
  set_state(state: GameState): GameState {
    this.old_state = this.state;
    this.state = state;
    return this.old_state;
  }

  set_current_player(pn: number) {
    if (pn >= 0) this.player(pn);
    this.current_player = pn;
  }

  /*
   * start of a new turn for the current player
   */
  update_at_turn() {
    if (this.current_player < 0) return;
    this.player(this.current_player).update_at_turn();
    for (const p of this.players) p.current_offer = null;
  }

  /*
   * recompute who holds largest army.  to take it from its holder, a player
   * needs strictly more knights; with no holder, 3 knights takes it.
   * returns the holder, or -1
   */
  update_largest_army(): number {
    let size = this.largest_army_pn >= 0
      ? this.player(this.largest_army_pn).num_knights
      : 2;

    for (const p of this.players) {
      if (p.num_knights > size) {
        size = p.num_knights;
        this.largest_army_pn = p.pn;
      }
    }
    return this.largest_army_pn;
  }

  /////////////////////////////////////////////////////////////////////////////
  /*
   * pieces
   */

  /*
   * place a piece and take it out of its owner's stock.  a city replaces
   * a settlement, which goes back to stock
   */
  put_piece(piece: Piece) {
    const replaced = this.board.put_piece(piece);
    if (piece.pn < 0) return;

    const owner = this.player(piece.pn);
    owner.set_num_pieces(piece.ptype, owner.num_pieces(piece.ptype) - 1);

    if (replaced !== null &&
        replaced.ptype === PieceType.SETTLEMENT &&
        piece.ptype === PieceType.CITY &&
        replaced.pn >= 0) {
      const prev = this.player(replaced.pn);
      prev.set_num_pieces(PieceType.SETTLEMENT, prev.num_pieces(PieceType.SETTLEMENT) + 1);
    }
    if (piece.ptype === PieceType.SETTLEMENT) {
      owner.last_settlement_coord = piece.coord;
      for (const p of this.players) p.potential_settlements.delete(piece.coord);
    }
  }

  /*
   * take a piece off the board and return it to its owner's stock
   */
  remove_piece(ptype: PieceType, coord: number): Piece | null {
    const removed = this.board.remove_piece(ptype, coord);
    if (removed === null || removed.pn < 0) return removed;
    const owner = this.player(removed.pn);
    owner.set_num_pieces(ptype, owner.num_pieces(ptype) + 1);
    return removed;
  }

  move_piece(ptype: PieceType, from: number, to: number): Piece | null {
    return this.board.move_piece(ptype, from, to);
  }

  /*
   * take back `pn`'s initial settlement after they cancel it, returning to
   * the state where they place it
   */
  undo_put_init_settlement(pn: number): boolean {
    const p = this.player(pn);
    const coord = p.last_settlement_coord;
    if (this.board.remove_piece(PieceType.SETTLEMENT, coord) === null) {
      return false;
    }
    p.set_num_pieces(PieceType.SETTLEMENT, p.num_pieces(PieceType.SETTLEMENT) + 1);

    const prev = UNDO_INIT_SETTLEMENT[this.state];
    if (prev !== undefined) this.set_state(prev);
    return true;
  }

  /////////////////////////////////////////////////////////////////////////////
  /*
   * scenario items
   */

  set_special_item(type_key: string, gi: number, item: SpecialItem | null) {
    const items = this.special_items.get(type_key) ?? [];
    array_put(items, gi, item, null);
    this.special_items.set(type_key, items);
  }

  special_item(type_key: string, gi: number): SpecialItem | null {
    return this.special_items.get(type_key)?.[gi] ?? null;
  }

  /////////////////////////////////////////////////////////////////////////////

  /*
   * a fresh copy of this game for a board reset.  human players keep their
   * seats, faces, and seat locks; robots are dropped, since the server
   * replaces them; CLEAR_ON_RESET locks are cleared
   */
  reset_as_copy(): Game {
    const g = new Game(this.name, this.options, this.is_practice);
    g.is_board_reset = true;
    g.members = new Set(this.members);

    for (const p of this.players) {
      if (p.name !== null && !p.robot) {
        g.players[p.pn] = p.reset_for_new_board();
      }
    }
    g.seat_locks = this.seat_locks.map(
      l => l === SeatLock.CLEAR_ON_RESET ? SeatLock.UNLOCKED : l
    );
    this.set_state(GameState.RESET_OLD);
    return g;
  }
}
