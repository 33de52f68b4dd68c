import { Harness } from './common'

import {expect} from 'chai'

describe('version exchange', () => {
  it('asks a newer server to describe all its options', () => {
    const h = new Harness();
    h.recv('9998|2600,2.6.00,b1,;ch;6pl;');

    expect(h.session.remote_caps.version).to.equal(2600);
    expect(h.net.sent).to.deep.equal([['1081|-', false]]);
    expect(h.shown().calls).to.deep.equal([
      ['showVersion', [2600, '2.6.00', 'b1', ';ch;6pl;']],
      ['optionsRequested', []],
    ]);
  });

  it('tells an older server which of our options are newer', () => {
    const h = new Harness();
    h.recv('9998|2000,2.0.00,b1,;ch;');

    expect(h.net.sent).to.deep.equal([
      ['1081|PLP,_VP_ALL,PLAY_FO,PLAY_VPO', false],
    ]);
    expect(h.shown().names()).to.deep.equal(['showVersion', 'optionsRequested']);
  });

  it('leaves out long option keys for servers that cannot parse them', () => {
    const h = new Harness();
    h.recv('9998|1118,1.1.18,b1');

    expect(h.net.sent).to.deep.equal([['1081|PLP,SBL,N7C,VP,SC', false]]);

    const known = h.session.remote_info.known_opts;
    expect(known?.has('SBL')).to.equal(true);
    expect(known?.has('_SC_FOG')).to.equal(false);
    expect(known?.has('PL')).to.equal(true);
    // too old to report features
    expect(h.shown().args('showVersion')).to.deep.equal([
      [1118, '1.1.18', 'b1', ';accts;ch;oreg;'],
    ]);
  });

  it('turns options off for servers that predate them', () => {
    const h = new Harness();
    h.recv('9998|1000,1.0.00,old');

    const info = h.session.remote_info;
    expect(h.net.sent).to.deep.equal([]);
    expect(info.known_opts).to.be.null;
    expect(info.all_options_received).to.equal(true);
    expect(info.defaults_received).to.equal(true);
  });

  it('has nothing to negotiate with a server of our version', () => {
    const h = new Harness();
    h.recv('9998|2500,2.5.00,b1,;ch;');

    const info = h.session.remote_info;
    expect(h.net.sent).to.deep.equal([]);
    expect(info.all_options_received).to.equal(true);
    expect(info.defaults_received).to.equal(false);
  });

  it('keeps practice capabilities on the practice connection', () => {
    const h = new Harness();
    h.recv('9998|2500,2.5.00,b1', true);

    expect(h.session.remote_caps.version).to.equal(0);
    expect(h.shown().calls).to.deep.equal([]);
    expect(h.session.practice_info.all_options_received).to.equal(true);
    expect(h.session.practice_info.defaults_received).to.equal(true);
  });
});

describe('pings', () => {
  it('echoes the sleep time back', () => {
    const h = new Harness();
    h.recv('9999|3000');
    h.recv('9999|500', true);

    expect(h.net.sent).to.deep.equal([['9999|3000', false], ['9999|500', true]]);
  });

  it('shuts down the remote connection when kicked', () => {
    const h = new Harness();
    const l = h.join('g1');
    h.join('p1', [], true);

    h.recv('9999|-1');

    const reason = 'Kicked by player with same name.';
    expect(l.args('gameDisconnected')).to.deep.equal([[false, reason]]);
    expect(h.session.game('g1')).to.be.null;
    expect(h.session.game('p1')).to.not.be.null;
    expect(h.net.disconnects).to.deep.equal([false]);
    expect(h.shown().args('showErrorPanel')).to.deep.equal([[reason, true]]);
  });
});

describe('status messages', () => {
  it('takes the nickname the server accepted', () => {
    const h = new Harness();
    h.recv('1069|20,alice,Welcome');

    expect(h.session.nickname).to.equal('alice');
    expect(h.shown().calls).to.deep.equal([
      ['setNickname', ['alice']],
      ['showStatus', ['Welcome', false]],
    ]);
  });

  it('reads debug mode from the status value when the server sends one', () => {
    const h = new Harness();
    h.recv('1069|21,Debug mode on', true);
    expect(h.session.in_debug_mode).to.equal(true);

    h.recv('1069|Debug mode off', true);
    expect(h.session.in_debug_mode).to.equal(false);
  });

  it('reads debug mode from the text of an older server', () => {
    const h = new Harness();
    h.recv('1069|Debug mode on');

    expect(h.session.in_debug_mode).to.equal(true);
    expect(h.shown().args('showStatus')).to.deep.equal([['Debug mode on', true]]);
  });

  it('focuses the password field after a wrong password', () => {
    const h = new Harness();
    h.recv('1069|3,Incorrect password');

    expect(h.shown().names()).to.deep.equal(['showStatus', 'focusPassword']);
  });

  it('describes options the server would not accept', () => {
    const h = new Harness();
    h.recv('1069|10,Too new,newgame,SBL,ZZZ');

    expect(h.shown().args('showErrorDialog')).to.deep.equal([
      ['Cannot create game newgame\nToo new\n- Use sea board\n- ZZZ'],
    ]);
  });

  it('shows the raw text when it lacks the game name', () => {
    const h = new Harness();
    h.recv('1069|10,oops');

    expect(h.shown().args('showErrorDialog')).to.deep.equal([['oops']]);
  });

  it('says whether missing features stop a create or a join', () => {
    const h = new Harness();
    h.recv('1069|22,Missing,g9,;sb;');
    h.recv('1016|g9');
    h.recv('1069|22,Missing,g9');

    expect(h.shown().args('showErrorDialog')).to.deep.equal([
      ['Cannot create game g9\nThis client does not have required feature(s): ;sb;'],
      ['Cannot join game g9\nThis client does not have required feature(s): ?'],
    ]);
  });
});

describe('connection notices', () => {
  it('disconnects when the server rejects us', () => {
    const h = new Harness();
    h.recv('1059|Server is full');

    expect(h.net.disconnects).to.deep.equal([false]);
    expect(h.shown().args('showErrorPanel')).to.deep.equal([['Server is full', true]]);
  });

  it('sends broadcasts to the lobby and to every game', () => {
    const h = new Harness();
    const l1 = h.join('g1');
    const l2 = h.join('g2');

    h.recv('1062|Maintenance at noon');

    expect(l1.args('messageBroadcast')).to.deep.equal([['Maintenance at noon']]);
    expect(l2.args('messageBroadcast')).to.deep.equal([['Maintenance at noon']]);
    expect(h.shown().args('chatMessageBroadcast')).to.deep.equal([['Maintenance at noon']]);
  });
});

describe('channels', () => {
  it('tracks channels and their members', () => {
    const h = new Harness();
    h.recv('1003|lobby,help');
    h.recv('1020|alice,lobby');
    h.recv('1004|bob,\t,host,lobby');
    h.recv('1006|bob,host,lobby');
    h.recv('1002|help,amy,ben');
    h.recv('1001|new');
    h.recv('1007|help');

    const {channels} = h.session;
    expect([...channels.keys()]).to.deep.equal(['lobby', 'new']);
    expect([...(channels.get('lobby') ?? [])]).to.deep.equal(['alice']);
    expect(h.shown().calls).to.deep.equal([
      ['channelList', [['lobby', 'help']]],
      ['channelJoined', ['lobby']],
      ['channelMemberJoined', ['lobby', 'bob']],
      ['channelMemberLeft', ['lobby', 'bob']],
      ['channelMembers', ['help', ['amy', 'ben']]],
      ['channelCreated', ['new']],
      ['channelDeleted', ['help']],
    ]);
  });

  it('keeps commas in chat text', () => {
    const h = new Harness();
    h.recv('1005|lobby,amy,hi, all');

    expect(h.shown().args('chatMessageReceived')).to.deep.equal([['lobby', 'amy', 'hi, all']]);
  });
});

describe('game list', () => {
  it('lists games and ends the option handshake', () => {
    const h = new Harness();
    h.recv('1083|g1|-|?g2|PL=6');

    expect(h.session.server_games).to.deep.equal(new Map([['g1', null], ['g2', 'PL=6']]));
    expect(h.session.remote_info.all_options_received).to.equal(true);
    expect(h.shown().args('addToGameList')).to.deep.equal([
      ['g1', null, true, false],
      ['g2', 'PL=6', false, false],
    ]);
  });

  it('keeps practice games apart', () => {
    const h = new Harness();
    h.recv('1016|p1', true);

    expect(h.session.server_games).to.be.null;
    expect(h.session.practice_games.has('p1')).to.equal(true);
    expect(h.session.remote_info.all_options_received).to.equal(false);
  });

  it('cannot join games that need a newer client', () => {
    const h = new Harness();
    h.recv('1079|g3,2600,PL=6,SBL=t');
    h.recv('1079|g4,2000,PL=6');

    expect(h.shown().args('addToGameList')).to.deep.equal([
      ['g3', 'PL=6,SBL=t', false, false],
      ['g4', 'PL=6', true, false],
    ]);
  });

  it('drops a deleted game we were in', () => {
    const h = new Harness();
    const l = h.join('g1');
    h.recv('1015|g1');

    expect(l.args('gameDisconnected')).to.deep.equal([[true, null]]);
    expect(h.session.game('g1')).to.be.null;
    expect(h.shown().args('deleteFromGameList')).to.deep.equal([['g1', false]]);
  });

  it('keeps a game deleted on the other connection', () => {
    const h = new Harness();
    const l = h.join('g1');
    h.recv('1015|g1', true);

    expect(l.calls).to.deep.equal([]);
    expect(h.session.game('g1')).to.not.be.null;
    expect(h.shown().args('deleteFromGameList')).to.deep.equal([['g1', true]]);
  });

  it('creates a joined game with its listed options', () => {
    const h = new Harness();
    h.recv('1083|sea|PLB=t,SBL=t');
    h.join('sea');

    const ga = h.game('sea');
    expect(ga.max_players).to.equal(6);
    expect(ga.has_sea_board()).to.equal(true);
  });
});

describe('option negotiation', () => {
  it('adds an option the server describes', () => {
    const h = new Harness();
    h.recv('1082|ZZZ|1|2600|2600|false|0|0|0|true|0|0|Zany');

    const info = h.session.remote_info;
    const opt = info.known_opts?.get('ZZZ');
    expect(opt?.desc).to.equal('Zany');
    expect(opt?.bool_value).to.equal(true);
    expect(h.shown().args('optionsReceived')).to.deep.equal([[info, false, false, false]]);
  });

  it('finishes at the end-of-list marker', () => {
    const h = new Harness();
    h.recv('1082|-|0|2500|2500|false|0|0|0|false|0|0|-');

    const info = h.session.remote_info;
    expect(info.all_options_received).to.equal(true);
    expect(h.shown().args('optionsReceived')).to.deep.equal([[info, false, true, true]]);
  });

  it('asks about default options it does not know', () => {
    const h = new Harness();
    h.recv('1080|PL=5,ZZZ=t');

    const info = h.session.remote_info;
    expect(info.known_opts?.get('PL')?.int_value).to.equal(5);
    expect(info.defaults_received).to.equal(true);
    expect(info.all_options_received).to.equal(false);
    expect(h.net.sent).to.deep.equal([['1081|ZZZ', false]]);
    expect(h.shown().names()).to.deep.equal(['optionsRequested']);
  });

  it('reports defaults it knows straight away', () => {
    const h = new Harness();
    h.session.remote_info.new_game_waiting_for_opts = true;
    h.recv('1080|PL=5');

    const info = h.session.remote_info;
    expect(info.new_game_waiting_for_opts).to.equal(false);
    expect(h.net.sent).to.deep.equal([]);
    expect(h.shown().args('optionsReceived')).to.deep.equal([[info, false, false, true]]);
  });

  it('takes localized option descriptions', () => {
    const h = new Harness();
    h.recv('1102|O|0|SBL|Seekarte|PL|\t');

    const known = h.session.remote_info.known_opts;
    expect(known?.get('SBL')?.desc).to.equal('Seekarte');
    expect(known?.get('PL')?.desc).to.equal('Maximum # players');
  });

  it('takes localized scenario text and skips keys without any', () => {
    const h = new Harness();
    h.recv('1102|S|4|SC_FOG|Nebel|Inseln im Nebel|SC_ZZZ|\u0016K');

    const info = h.session.remote_info;
    expect(info.scenarios.get('SC_FOG')).to.deep.include({
      title: 'Nebel', desc: 'Inseln im Nebel',
    });
    expect([...info.scen_keys]).to.deep.equal(['SC_FOG', 'SC_ZZZ']);
    expect(info.all_scen_strings_received).to.equal(true);
  });

  it('adds, removes, and finishes scenarios', () => {
    const h = new Harness();
    h.recv('1103|SC_NEW|2100|2100|SBL=t|New Land');
    h.recv('1103|SC_FOG|2000|-2');

    const info = h.session.remote_info;
    expect(info.scenarios.get('SC_NEW')?.title).to.equal('New Land');
    expect(info.scenarios.get('SC_FOG')).to.be.null;
    expect(info.all_scen_info_received).to.equal(false);

    h.recv('1103|-');
    expect(info.all_scen_info_received).to.equal(true);
    expect(info.all_scen_strings_received).to.equal(true);
  });
});
