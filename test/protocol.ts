import { decode, is_known_type } from '../src/protocol/decode'
import * as encode from '../src/protocol/encode'
import { MsgType, frame } from '../src/protocol/wire'

import { SeatLock } from '../src/lib/game/constants'

import {expect} from 'chai'

describe('frame', () => {
  it('splits the type id from the body', () => {
    expect(frame('1018|g1,5')).to.deep.equal({type: 1018, body: 'g1,5'});
    expect(frame('1080')).to.deep.equal({type: 1080, body: ''});
    expect(frame('x|y')).to.be.null;
  });
});

describe('decode', () => {
  it('returns null for lines it does not recognize', () => {
    expect(decode('hello')).to.be.null;
    expect(decode('4242|x')).to.be.null;
    expect(decode('1018|g1,abc')).to.be.null;
    expect(decode('1009|g1,0,1')).to.be.null;
    expect(decode('1024|g1,1,7,2,2')).to.be.null;
  });

  it('knows which types it can decode', () => {
    expect(is_known_type(MsgType.TURN)).to.equal(true);
    expect(is_known_type(MsgType.GAMEOPTIONGETINFOS)).to.equal(false);
  });

  it('decodes a version report', () => {
    expect(decode('9998|2500,2.5.00,JM2023,;6pl;sb;')).to.deep.equal({
      kind: 'version', version: 2500, version_str: '2.5.00',
      build: 'JM2023', feats: ';6pl;sb;',
    });
    expect(decode('9998|1118,1.1.18,OV\r\n')).to.deep.equal({
      kind: 'version', version: 1118, version_str: '1.1.18', build: 'OV', feats: '',
    });
  });

  it('decodes status values only when text follows', () => {
    expect(decode('1069|20,alice,Welcome')).to.deep.equal({
      kind: 'status_message', sv: 20, text: 'alice,Welcome',
    });
    expect(decode('1069|Welcome!')).to.deep.equal({
      kind: 'status_message', sv: 0, text: 'Welcome!',
    });
    expect(decode('1069|3,')).to.deep.equal({
      kind: 'status_message', sv: 0, text: '3,',
    });
  });

  it('keeps separators inside free text', () => {
    expect(decode('1005|lobby,bob,hi, all')).to.deep.equal({
      kind: 'channel_text_msg', channel: 'lobby', nick: 'bob', text: 'hi, all',
    });
    expect(decode('1091|g1\u0001hello, world|x')).to.deep.equal({
      kind: 'game_server_text', game: 'g1', text: 'hello, world|x',
    });
  });

  it('decodes optional trailing fields', () => {
    expect(decode('1018|g1')).to.deep.equal({kind: 'start_game', game: 'g1', state: null});
    expect(decode('1018|g1,5')).to.deep.equal({kind: 'start_game', game: 'g1', state: 5});
    expect(decode('1026|g1,2,15')).to.deep.equal({
      kind: 'turn', game: 'g1', pn: 2, state: 15,
    });
    expect(decode('1024|g1,1,101,2,2,Y')).to.deep.equal({
      kind: 'player_element', game: 'g1',
      pn: 1, action: 101, etype: 2, amount: 2, news: true,
    });
    expect(decode('1100|g1,0,1,3')).to.deep.equal({
      kind: 'inventory_item_action', game: 'g1', pn: 0, action: 1, itype: 3, flags: 0,
    });
  });

  it('decodes multi-parameter bodies', () => {
    expect(decode('1086|g1|2|100|1|3|5|0')).to.deep.equal({
      kind: 'player_elements', game: 'g1', pn: 2, action: 100,
      etypes: [1, 5], amounts: [3, 0],
    });
    expect(decode('1085|g1|1|0|3|1|0|2|5')).to.deep.equal({
      kind: 'player_stats', game: 'g1', stype: 1, values: [1, 0, 3, 1, 0, 2, 5],
    });
    expect(decode('1083|g1|-|?g2|PL=6')).to.deep.equal({
      kind: 'games_with_options',
      games: [
        {game: 'g1', opts: null, unjoinable: false},
        {game: 'g2', opts: 'PL=6', unjoinable: true},
      ],
    });
  });

  it('decodes per-player dice gains', () => {
    expect(decode('1092|g1|2|0|3|2|1|0|1|4|1|5')).to.deep.equal({
      kind: 'dice_result_resources', game: 'g1',
      gains: [
        {pn: 0, total: 3, rsrc: [[2, 1]]},
        {pn: 1, total: 4, rsrc: [[1, 5]]},
      ],
    });
    // says two players, sends one
    expect(decode('1092|g1|2|0|3|2|1')).to.be.null;
  });

  it('decodes a trade offer', () => {
    expect(decode('1041|g1,0,false,true,false,false,1,0,0,0,0,0,0,2,0,0')).to.deep.equal({
      kind: 'make_offer', game: 'g1', from: 0,
      to: [false, true, false, false],
      give: [1, 0, 0, 0, 0],
      get: [0, 0, 2, 0, 0],
    });
  });

  it('decodes board layout parts', () => {
    expect(decode('1084|Test,1,HL,[3,1,2,3,NL,[3,0,5,8,RH,2')).to.deep.equal({
      kind: 'board_layout2', game: 'Test', bef: 1,
      parts: new Map<string, number[] | string>([
        ['HL', [1, 2, 3]],
        ['NL', [0, 5, 8]],
        ['RH', '2'],
      ]),
    });
    // array shorter than its declared length
    expect(decode('1084|Test,1,HL,[3,1,2')).to.be.null;
  });

  it('decodes both seat lock forms', () => {
    expect(decode('1068|g1,2,clear')).to.deep.equal({
      kind: 'set_seat_lock', game: 'g1',
      seats: {pn: 2, lock: SeatLock.CLEAR_ON_RESET},
    });
    expect(decode('1068|g1,true,false,false,clear')).to.deep.equal({
      kind: 'set_seat_lock', game: 'g1',
      seats: {all: [
        SeatLock.LOCKED, SeatLock.UNLOCKED, SeatLock.UNLOCKED, SeatLock.CLEAR_ON_RESET,
      ]},
    });
  });

  it('decodes choose-player flags', () => {
    expect(decode('1036|g1,NONE,true,false,true,false')).to.deep.equal({
      kind: 'choose_player_request', game: 'g1',
      can_choose_none: true, choices: [true, false, true, false],
    });
  });

  it('decodes scenario info and its markers', () => {
    expect(decode('1103|-')).to.deep.include({kind: 'scenario_info', no_more: true});
    expect(decode('1103|SC_XYZ|2000|-2')).to.deep.include({
      key: 'SC_XYZ', key_unknown: true,
    });
    expect(decode('1103|SC_NEW|2100|2100|SBL=t|New Land')).to.deep.equal({
      kind: 'scenario_info', no_more: false, key: 'SC_NEW', key_unknown: false,
      min_version: 2100, last_mod_version: 2100,
      opts: 'SBL=t', title: 'New Land', desc: null,
    });
  });

  it('decodes option descriptions', () => {
    expect(decode('1082|XYZ|1|2500|2500|false|0|0|0|true|0|0|Some option')).to.deep.equal({
      kind: 'game_option_info',
      key: 'XYZ', otype: 1, min_version: 2500, last_mod_version: 2500,
      default_bool: false, default_int: 0, min_int: 0, max_int: 0,
      bool_value: true, value: '0', flags: 0, desc: 'Some option',
      enum_vals: [],
    });
  });
});

describe('encode', () => {
  it('builds option info requests', () => {
    expect(encode.game_option_get_infos(null, false)).to.equal('1081|-');
    expect(encode.game_option_get_infos(['SBL', 'PLB'], true)).to.equal('1081|SBL,PLB,?I18N');
    expect(encode.game_option_get_infos(null, true, true)).to.equal('1081|?I18N');
    expect(encode.game_option_get_defaults()).to.equal('1080|');
  });

  it('sends empty fields as the empty-string token', () => {
    expect(encode.version(2500, '2.5.00', 'b1', '', null)).to.equal('9998|2500,2.5.00,b1,\t');
    expect(encode.version(2500, '2.5.00', 'b1', '', 'de_DE'))
      .to.equal('9998|2500,2.5.00,b1,\t,de_DE');
  });

  it('builds the other requests', () => {
    expect(encode.server_ping(3000)).to.equal('9999|3000');
    expect(encode.change_face('g1', 2, 7)).to.equal('1058|g1,2,7');
    expect(encode.localized_strings('S', ['SC_FOG'])).to.equal('1102|S|0|SC_FOG');
    expect(encode.scenario_info(['SC_FOG'], true)).to.equal('1103|SC_FOG|?');
  });
});
