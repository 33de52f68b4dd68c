import { Board } from '../src/lib/game/board'
import {
  BoardEncoding, DevCard, GameState, PieceType, Resource, SeatLock,
} from '../src/lib/game/constants'
import { Replica } from '../src/lib/game/errors'
import { Game } from '../src/lib/game/game'
import {
  OptionSet, OptionType, find_unknowns, parse_options,
} from '../src/lib/game/game-options'
import { Inventory, ItemState } from '../src/lib/game/inventory'
import { ResourceSet } from '../src/lib/game/resources'
import { ScenarioSet } from '../src/lib/game/scenarios'

import { array_fill } from '../src/utils/array'
import { assertOk, fold } from '../src/utils/result'

import {expect} from 'chai'

describe('ResourceSet', () => {
  it('takes a shortfall out of the unknown bucket', () => {
    const rs = new ResourceSet({[Resource.ORE]: 1, [Resource.UNKNOWN]: 3});
    rs.subtract(Resource.ORE, 3);
    expect(rs.get(Resource.ORE)).to.equal(0);
    expect(rs.get(Resource.UNKNOWN)).to.equal(1);
    expect(rs.total()).to.equal(1);
  });

  it('folds known resources into unknown', () => {
    const rs = new ResourceSet({[Resource.CLAY]: 2, [Resource.WOOD]: 1});
    rs.convert_to_unknown();
    expect(rs.get(Resource.CLAY)).to.equal(0);
    expect(rs.get(Resource.UNKNOWN)).to.equal(3);
    expect(rs.known_total()).to.equal(0);
  });

  it('never goes negative', () => {
    const rs = new ResourceSet();
    rs.add(Resource.CLAY, -5);
    expect(rs.get(Resource.CLAY)).to.equal(0);
  });

  it('builds from the five known counts', () => {
    const rs = ResourceSet.from_known([1, 0, 2, 0, 3]);
    expect(rs.toString()).to.equal('clay=1|ore=0|sheep=2|wheat=0|wood=3|unknown=0');
    expect(rs.equals(rs.copy())).to.equal(true);
  });
});

describe('Inventory', () => {
  it('sorts cards by state, keeping victory points', () => {
    const inv = new Inventory();
    inv.add_dev_card(1, ItemState.NEW, DevCard.KNIGHT);
    inv.add_dev_card(1, ItemState.OLD, DevCard.MONO);
    inv.add_dev_card(1, ItemState.NEW, DevCard.CAP);

    expect(inv.news.map(it => it.itype)).to.deep.equal([DevCard.KNIGHT]);
    expect(inv.playables.map(it => it.itype)).to.deep.equal([DevCard.MONO]);
    expect(inv.kept.map(it => it.itype)).to.deep.equal([DevCard.CAP]);
    expect(inv.num_vp_items()).to.equal(1);
    expect(inv.num_unplayed()).to.equal(2);

    inv.new_to_old();
    expect(inv.playables.map(it => it.itype)).to.deep.equal([DevCard.MONO, DevCard.KNIGHT]);
  });

  it('removes an unknown card when the named one is missing', () => {
    const inv = new Inventory();
    inv.add_dev_card(1, ItemState.OLD, DevCard.UNKNOWN);
    expect(inv.remove_dev_card(ItemState.OLD, DevCard.ROADS)).to.equal(true);
    expect(inv.total()).to.equal(0);
    expect(inv.remove_dev_card(ItemState.OLD, DevCard.ROADS)).to.equal(false);
  });

  it('keeps played items that stay in the inventory', () => {
    const inv = new Inventory();
    inv.add_item(ItemState.PLAYABLE, {itype: 3, kept_on_play: true, is_vp: false, can_cancel: false});
    inv.add_item(ItemState.PLAYABLE, {itype: 4, kept_on_play: false, is_vp: false, can_cancel: false});

    expect(inv.play_item(3)?.itype).to.equal(3);
    expect(inv.play_item(4)?.itype).to.equal(4);
    expect(inv.play_item(4)).to.be.null;
    expect(inv.kept.map(it => it.itype)).to.deep.equal([3]);
    expect(inv.playables).to.deep.equal([]);
  });
});

describe('Game', () => {
  const opts = (packed: string) => assertOk(parse_options(packed, OptionSet.all_known()));

  it('sizes itself from its options', () => {
    const ga = new Game('g1', opts('PLB=t,VP=t12'));
    expect(ga.max_players).to.equal(6);
    expect(ga.players.length).to.equal(6);
    expect(ga.vp_winner).to.equal(12);

    const plain = new Game('g2');
    expect(plain.max_players).to.equal(4);
    expect(plain.vp_winner).to.equal(10);
  });

  it('throws replica errors for bad seats and players', () => {
    const ga = new Game('g1');
    expect(() => ga.player(4)).to.throw(Replica.BadSeatError, 'g1: no seat 4');
    expect(() => ga.remove_player('nobody')).to.throw(Replica.NoPlayerError);
  });

  it('moves pieces in and out of stock', () => {
    const ga = new Game('g1');
    ga.add_player('alice', 0);
    ga.player(1).potential_settlements = new Set([0x67, 0x69]);

    ga.put_piece({ptype: PieceType.SETTLEMENT, pn: 0, coord: 0x67, value: 0});
    const alice = ga.player(0);
    expect(alice.num_pieces(PieceType.SETTLEMENT)).to.equal(4);
    expect(alice.last_settlement_coord).to.equal(0x67);
    expect([...ga.player(1).potential_settlements]).to.deep.equal([0x69]);

    ga.put_piece({ptype: PieceType.CITY, pn: 0, coord: 0x67, value: 0});
    expect(alice.num_pieces(PieceType.CITY)).to.equal(3);
    expect(alice.num_pieces(PieceType.SETTLEMENT)).to.equal(5);
    expect(ga.board.node_piece(0x67)?.ptype).to.equal(PieceType.CITY);

    ga.remove_piece(PieceType.CITY, 0x67);
    expect(alice.num_pieces(PieceType.CITY)).to.equal(4);
    expect(ga.board.node_piece(0x67)).to.be.null;
  });

  it('takes back an initial settlement', () => {
    const ga = new Game('g1');
    ga.add_player('alice', 0);
    ga.put_piece({ptype: PieceType.SETTLEMENT, pn: 0, coord: 0x45, value: 0});
    ga.set_state(GameState.START2B);

    expect(ga.undo_put_init_settlement(0)).to.equal(true);
    expect(ga.state).to.equal(GameState.START2A);
    expect(ga.player(0).num_pieces(PieceType.SETTLEMENT)).to.equal(5);
    expect(ga.undo_put_init_settlement(0)).to.equal(false);
  });

  it('needs strictly more knights to take largest army', () => {
    const ga = new Game('g1');
    ga.player(1).num_knights = 2;
    expect(ga.update_largest_army()).to.equal(-1);
    ga.player(1).num_knights = 3;
    expect(ga.update_largest_army()).to.equal(1);
    ga.player(2).num_knights = 3;
    expect(ga.update_largest_army()).to.equal(1);
    ga.player(2).num_knights = 4;
    expect(ga.update_largest_army()).to.equal(2);
  });

  it('makes a reset copy that keeps only the humans', () => {
    const ga = new Game('g1');
    ga.add_player('alice', 0);
    ga.add_player('robbie', 1);
    ga.player(1).robot = true;
    ga.player(0).face_id = 7;
    ga.player(0).resources.add(Resource.WHEAT, 3);
    ga.set_seat_lock(2, SeatLock.CLEAR_ON_RESET);
    ga.set_seat_lock(3, SeatLock.LOCKED);

    const fresh = ga.reset_as_copy();
    expect(fresh.is_board_reset).to.equal(true);
    expect(fresh.state).to.equal(GameState.NEW);
    expect(fresh.players.map(p => p.name)).to.deep.equal(['alice', null, null, null]);
    expect(fresh.player(0).face_id).to.equal(7);
    expect(fresh.player(0).resources.total()).to.equal(0);
    expect(fresh.seat_locks).to.deep.equal([
      SeatLock.UNLOCKED, SeatLock.UNLOCKED, SeatLock.UNLOCKED, SeatLock.LOCKED,
    ]);
    expect(ga.state).to.equal(GameState.RESET_OLD);
  });

  it('refuses to take its monitor twice', () => {
    const ga = new Game('g1');
    expect(() => ga.with_monitor(() => ga.take_monitor())).to.throw();
    expect(ga.monitor_held).to.equal(false);
  });

  it('keeps special items by index', () => {
    const ga = new Game('g1');
    ga.set_special_item('_SC_WOND', 2, {pn: 1, coord: 0, level: 1, sv: 'w'});
    expect(ga.special_items.get('_SC_WOND')?.length).to.equal(3);
    expect(ga.special_item('_SC_WOND', 0)).to.be.null;
    expect(ga.special_item('_SC_WOND', 2)?.level).to.equal(1);
  });
});

describe('Board', () => {
  it('converts the legacy layout encoding', () => {
    const hexes = array_fill(37, 6);
    hexes[1] = 0;
    hexes[2] = 1;
    const numbers = array_fill(37, -1);
    numbers[2] = 5;

    const board = new Board();
    board.set_legacy_layout(hexes, numbers, 2);
    expect(board.hex_layout.slice(0, 3)).to.deep.equal([0, 6, 1]);
    expect(board.number_layout.slice(0, 3)).to.deep.equal([0, 0, 8]);
    expect(board.robber_hex).to.equal(2);
  });

  it('reads the large layout parts', () => {
    const board = new Board();
    const ok = board.set_layout_parts(BoardEncoding.LARGE, new Map<string, number[] | string>([
      ['LH', [0x0703, 1, 6]],
      ['PH', '3'],
      ['CV', [10, 2, 0x0508, 6]],
      ['AL', 'x'],
    ]));
    expect(ok).to.equal(true);
    expect(board.encoding).to.equal(BoardEncoding.LARGE);
    expect(board.land_hex_layout).to.deep.equal([0x0703, 1, 6]);
    expect(board.pirate_hex).to.equal(3);
    expect(board.cloth).to.equal(10);
    expect(board.node_piece(0x0508)).to.deep.equal({
      ptype: PieceType.VILLAGE, pn: -1, coord: 0x0508, value: 2,
    });
    expect(board.parts.get('AL')).to.equal('x');
  });

  it('leaves the board alone for an unknown encoding', () => {
    const board = new Board();
    expect(board.set_layout_parts(7, new Map([['HL', [1]]]))).to.equal(false);
    expect(board.encoding).to.equal(BoardEncoding.ORIGINAL);
  });

  it('tracks removed and placed ports', () => {
    const board = new Board();
    board.remove_port(0x0405);
    expect(board.removed_ports).to.deep.equal([0x0405]);
    board.place_port(0x0405, 3);
    expect(board.removed_ports).to.deep.equal([]);
    expect(board.placed_ports.get(0x0405)).to.equal(3);
  });
});

describe('game options', () => {
  const known = OptionSet.all_known();

  it('parses packed values by type', () => {
    const opts = assertOk(parse_options('PL=6,SBL=t,N7=t5,ZZZ=1', known));
    expect(opts.get('PL')?.int_value).to.equal(6);
    expect(opts.get('SBL')?.bool_value).to.equal(true);
    expect(opts.get('N7')?.bool_value).to.equal(true);
    expect(opts.get('N7')?.int_value).to.equal(5);
    expect(opts.get('ZZZ')?.otype).to.equal(OptionType.UNKNOWN);
    expect(find_unknowns(opts.values())).to.deep.equal(['ZZZ']);
  });

  it('reports what it cannot parse', () => {
    const err = (packed: string) => fold(parse_options(packed, known), () => '', e => e);
    expect(err('PL')).to.equal('malformed option "PL"');
    expect(err('SBL=x')).to.equal('bad value for option SBL: "SBL=x"');
  });

  it('finds options changed after a version', () => {
    expect(known.options_newer_than(2000).map(o => o.key))
      .to.deep.equal(['PLP', '_VP_ALL', 'PLAY_FO', 'PLAY_VPO']);
  });

  it('drops options the server describes as unknown', () => {
    const set = known.copy();
    const sbl = set.get('SBL');
    if (sbl === null) throw new Error('SBL missing from catalog');
    expect(set.add_known({...sbl, otype: OptionType.UNKNOWN})).to.equal(false);
    expect(set.has('SBL')).to.equal(false);
    expect(known.has('SBL')).to.equal(true);
  });
});

describe('ScenarioSet', () => {
  it('localizes only scenarios it has', () => {
    const scens = new ScenarioSet();
    expect(scens.localize('SC_FOG', 'Nebelinseln', '')).to.equal(true);
    expect(scens.get('SC_FOG')?.title).to.equal('Nebelinseln');
    expect(scens.get('SC_FOG')?.desc).to.be.null;
    expect(scens.localize('SC_NOPE', 'x', null)).to.equal(false);
  });
});
