/*
 * Test fixtures: a listener and a display that record every call, a net that
 * records what we send, and a session wired to all three.
 */

import { Dispatcher } from '../src/client/dispatcher'
import { ServerGametypeInfo } from '../src/client/gametype-info'
import { ClientDisplay, Listener, UpdateType } from '../src/client/listener'
import { ClientSession, Net } from '../src/client/session'
import { TaskQueue } from '../src/client/task-queue'

import { Piece } from '../src/lib/game/board'
import { Game } from '../src/lib/game/game'
import { Player } from '../src/lib/game/player'
import { ResourceSet } from '../src/lib/game/resources'

import * as M from '../src/protocol/message'

export type Call = [string, unknown[]];

/*
 * the argument lists of every call to `name`, in order
 */
function args_of(calls: readonly Call[], name: string): unknown[][] {
  return calls.filter(([n]) => n === name).map(([, args]) => args);
}

export class RecordingListener implements Listener {
  calls: Call[] = [];

  private rec(name: keyof Listener, ...args: unknown[]) {
    this.calls.push([name, args]);
  }

  names(): string[] {
    return this.calls.map(([n]) => n);
  }

  args(name: keyof Listener): unknown[][] {
    return args_of(this.calls, name);
  }

  playerJoined(nick: string) { this.rec('playerJoined', nick); }
  playerLeft(nick: string, player: Player | null) { this.rec('playerLeft', nick, player); }
  playerSitdown(pn: number, nick: string) { this.rec('playerSitdown', pn, nick); }
  membersListed(names: string[]) { this.rec('membersListed', names); }
  seatLockUpdated() { this.rec('seatLockUpdated'); }
  playerFaceChanged(player: Player, face_id: number) {
    this.rec('playerFaceChanged', player, face_id);
  }
  messageReceived(nick: string | null, text: string) { this.rec('messageReceived', nick, text); }
  messageBroadcast(text: string) { this.rec('messageBroadcast', text); }
  gameDisconnected(was_deleted: boolean, err: string | null) {
    this.rec('gameDisconnected', was_deleted, err);
  }
  gameEnded(scores: Map<Player, number>) { this.rec('gameEnded', scores); }

  boardLayoutUpdated() { this.rec('boardLayoutUpdated'); }
  boardUpdated() { this.rec('boardUpdated'); }
  boardPotentialsUpdated() { this.rec('boardPotentialsUpdated'); }
  playerPiecePlaced(player: Player, coord: number, ptype: number) {
    this.rec('playerPiecePlaced', player, coord, ptype);
  }
  playerPieceMoved(player: Player, from: number, to: number, ptype: number) {
    this.rec('playerPieceMoved', player, from, to, ptype);
  }
  playerPieceRemoved(player: Player, coord: number, ptype: number) {
    this.rec('playerPieceRemoved', player, coord, ptype);
  }
  buildRequestCanceled(player: Player) { this.rec('buildRequestCanceled', player); }
  robberMoved(hex: number, is_pirate: boolean) { this.rec('robberMoved', hex, is_pirate); }
  pieceValueUpdated(piece: Piece) { this.rec('pieceValueUpdated', piece); }
  debugFreePlaceModeToggled(on: boolean) { this.rec('debugFreePlaceModeToggled', on); }

  gameStarted() { this.rec('gameStarted'); }
  gameStateChanged(state: number, old_state: number) {
    this.rec('gameStateChanged', state, old_state);
  }
  playerTurnSet(pn: number) { this.rec('playerTurnSet', pn); }
  diceRolled(player: Player | null, roll: number) { this.rec('diceRolled', player, roll); }
  diceRolledResources(pns: number[], gains: ResourceSet[]) {
    this.rec('diceRolledResources', pns, gains);
  }

  playerElementUpdated(player: Player, utype: UpdateType, is_gain: boolean, is_lose: boolean) {
    this.rec('playerElementUpdated', player, utype, is_gain, is_lose);
  }
  playerResourcesUpdated(player: Player) { this.rec('playerResourcesUpdated', player); }
  requestedSpecialBuild(player: Player) { this.rec('requestedSpecialBuild', player); }
  requestedGoldResourceCountUpdated(player: Player, count: number) {
    this.rec('requestedGoldResourceCountUpdated', player, count);
  }
  largestArmyRefresh(old: Player | null, holder: Player | null) {
    this.rec('largestArmyRefresh', old, holder);
  }
  longestRoadRefresh(old: Player | null, holder: Player | null) {
    this.rec('longestRoadRefresh', old, holder);
  }
  devCardDeckUpdated() { this.rec('devCardDeckUpdated'); }
  playerStats(stats: Map<UpdateType, number>) { this.rec('playerStats', stats); }
  playerSVPAwarded(player: Player, svp: number, desc: string) {
    this.rec('playerSVPAwarded', player, svp, desc);
  }

  requestedDiscard(count: number) { this.rec('requestedDiscard', count); }
  requestedChoosePlayer(choices: Player[], can_choose_none: boolean) {
    this.rec('requestedChoosePlayer', choices, can_choose_none);
  }
  requestedChooseRobResourceType(player: Player | null) {
    this.rec('requestedChooseRobResourceType', player);
  }
  requestedDiceRoll(pn: number) { this.rec('requestedDiceRoll', pn); }
  simpleRequest(pn: number, rtype: number, value1: number, value2: number) {
    this.rec('simpleRequest', pn, rtype, value1, value2);
  }
  simpleAction(pn: number, atype: number, value1: number, value2: number) {
    this.rec('simpleAction', pn, atype, value1, value2);
  }
  pirateFortressAttackResult(for_practice: boolean, strength: number, losses: number) {
    this.rec('pirateFortressAttackResult', for_practice, strength, losses);
  }

  requestedTrade(offerer: Player) { this.rec('requestedTrade', offerer); }
  requestedTradeClear(player: Player | null, is_bank: boolean) {
    this.rec('requestedTradeClear', player, is_bank);
  }
  requestedTradeRejection(player: Player) { this.rec('requestedTradeRejection', player); }
  requestedTradeReset(player: Player | null) { this.rec('requestedTradeReset', player); }
  playerTradeAccepted(offerer: Player, acceptor: Player) {
    this.rec('playerTradeAccepted', offerer, acceptor);
  }
  playerBankTrade(player: Player, give: ResourceSet, get: ResourceSet) {
    this.rec('playerBankTrade', player, give, get);
  }

  playerDevCardUpdated(player: Player, added_playable: boolean) {
    this.rec('playerDevCardUpdated', player, added_playable);
  }
  devCardPlayRejected(ctype: number) { this.rec('devCardPlayRejected', ctype); }
  invItemPlayRejected(itype: number, reason: number) {
    this.rec('invItemPlayRejected', itype, reason);
  }
  playerCanCancelInvItemPlay(player: Player, can_cancel: boolean) {
    this.rec('playerCanCancelInvItemPlay', player, can_cancel);
  }
  playerSetSpecialItem(
    type_key: string, player: Player | null, gi: number, pi: number, is_set: boolean,
  ) {
    this.rec('playerSetSpecialItem', type_key, player, gi, pi, is_set);
  }
  playerPickSpecialItem(
    type_key: string, player: Player | null, gi: number, pi: number,
    is_pick: boolean, coord: number, level: number, sv: string,
  ) {
    this.rec('playerPickSpecialItem', type_key, player, gi, pi, is_pick, coord, level, sv);
  }

  boardReset(game: Game, rejoin_pn: number, requesting_pn: number) {
    this.rec('boardReset', game, rejoin_pn, requesting_pn);
  }
  boardResetVoteRequested(player: Player) { this.rec('boardResetVoteRequested', player); }
  boardResetVoteCast(player: Player, vote: boolean) {
    this.rec('boardResetVoteCast', player, vote);
  }
  boardResetVoteRejected() { this.rec('boardResetVoteRejected'); }
}

export class RecordingDisplay implements ClientDisplay {
  calls: Call[] = [];

  private rec(name: keyof ClientDisplay, ...args: unknown[]) {
    this.calls.push([name, args]);
  }

  names(): string[] {
    return this.calls.map(([n]) => n);
  }

  args(name: keyof ClientDisplay): unknown[][] {
    return args_of(this.calls, name);
  }

  showVersion(version: number, version_str: string, build: string, feats: string) {
    this.rec('showVersion', version, version_str, build, feats);
  }
  showStatus(text: string, in_debug_mode: boolean) { this.rec('showStatus', text, in_debug_mode); }
  setNickname(nick: string) { this.rec('setNickname', nick); }
  focusPassword() { this.rec('focusPassword'); }
  showErrorDialog(text: string) { this.rec('showErrorDialog', text); }
  showErrorPanel(text: string, can_practice: boolean) {
    this.rec('showErrorPanel', text, can_practice);
  }

  channelList(channels: string[]) { this.rec('channelList', channels); }
  channelCreated(channel: string) { this.rec('channelCreated', channel); }
  channelDeleted(channel: string) { this.rec('channelDeleted', channel); }
  channelJoined(channel: string) { this.rec('channelJoined', channel); }
  channelMemberJoined(channel: string, nick: string) {
    this.rec('channelMemberJoined', channel, nick);
  }
  channelMemberLeft(channel: string, nick: string) {
    this.rec('channelMemberLeft', channel, nick);
  }
  channelMembers(channel: string, members: string[]) {
    this.rec('channelMembers', channel, members);
  }
  chatMessageReceived(channel: string, nick: string, text: string) {
    this.rec('chatMessageReceived', channel, nick, text);
  }
  chatMessageBroadcast(text: string) { this.rec('chatMessageBroadcast', text); }

  addToGameList(game: string, opts: string | null, can_join: boolean, is_practice: boolean) {
    this.rec('addToGameList', game, opts, can_join, is_practice);
  }
  deleteFromGameList(game: string, is_practice: boolean) {
    this.rec('deleteFromGameList', game, is_practice);
  }

  optionsRequested() { this.rec('optionsRequested'); }
  optionsReceived(
    info: ServerGametypeInfo, is_practice: boolean, is_dash: boolean, has_all_now: boolean,
  ) {
    this.rec('optionsReceived', info, is_practice, is_dash, has_all_now);
  }
}

export class RecordingNet implements Net {
  sent: [string, boolean][] = [];
  disconnects: boolean[] = [];

  put(text: string, is_practice: boolean) {
    this.sent.push([text, is_practice]);
  }

  disconnect(is_practice: boolean) {
    this.disconnects.push(is_practice);
  }
}

///////////////////////////////////////////////////////////////////////////////

/*
 * a session with a recording display and net, whose games each get a
 * recording listener.  the UI queue is drained by hand, through shown()
 */
export class Harness {
  readonly display = new RecordingDisplay();
  readonly net = new RecordingNet();
  readonly ui = new TaskQueue(false);
  readonly listeners = new Map<string, RecordingListener>();
  readonly session: ClientSession;
  readonly dispatcher: Dispatcher;

  constructor(with_listeners: boolean = true) {
    this.session = new ClientSession(this.display, this.net, ga => {
      if (!with_listeners) return null;
      const l = new RecordingListener();
      this.listeners.set(ga.name, l);
      return l;
    }, this.ui);
    this.dispatcher = new Dispatcher(this.session);
  }

  recv(line: string, is_practice: boolean = false) {
    this.dispatcher.handle_line(line, is_practice);
  }

  deliver(msg: M.Message, is_practice: boolean = false) {
    this.dispatcher.handle(msg, is_practice);
  }

  /*
   * run queued display updates and return every display call so far
   */
  shown(): RecordingDisplay {
    this.ui.drain();
    return this.display;
  }

  game(name: string): Game {
    const ga = this.session.game(name);
    if (ga === null) throw new Error(`not in game ${name}`);
    return ga;
  }

  listener(name: string): RecordingListener {
    const l = this.listeners.get(name);
    if (l === undefined) throw new Error(`no listener for ${name}`);
    return l;
  }

  /*
   * join `game` and seat each of `seats`, then forget the calls that made
   */
  join(game: string, seats: [string, number][] = [], is_practice: boolean = false): RecordingListener {
    this.recv(`1021|${game}`, is_practice);
    for (const [nick, pn] of seats) {
      this.recv(`1012|${game},${nick},${pn},false`, is_practice);
    }
    const l = this.listener(game);
    l.calls = [];
    return l;
  }
}
