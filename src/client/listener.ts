/*
 * The notification boundary.
 *
 * Handlers report what changed through these two interfaces and never touch
 * a concrete UI.  A Listener observes one game; the ClientDisplay observes
 * everything that isn't scoped to a game (status text, lists, dialogs).
 */

import { Piece } from '../lib/game/board'
import { Game } from '../lib/game/game'
import { Player } from '../lib/game/player'
import { ResourceSet } from '../lib/game/resources'

import { ServerGametypeInfo } from './gametype-info'

/*
 * what a playerElementUpdated call is about
 */
export enum UpdateType {
  Clay = 'Clay',
  Ore = 'Ore',
  Sheep = 'Sheep',
  Wheat = 'Wheat',
  Wood = 'Wood',
  Unknown = 'Unknown',
  Road = 'Road',
  Settlement = 'Settlement',
  City = 'City',
  Ship = 'Ship',
  Knight = 'Knight',
  Warship = 'Warship',
  Cloth = 'Cloth',
  SpecialVictoryPoints = 'SpecialVictoryPoints',
  GoldGains = 'GoldGains',
}

export interface Listener {
  // membership and chat
  playerJoined(nick: string): void;
  playerLeft(nick: string, player: Player | null): void;
  playerSitdown(pn: number, nick: string): void;
  membersListed(names: string[]): void;
  seatLockUpdated(): void;
  playerFaceChanged(player: Player, face_id: number): void;
  messageReceived(nick: string | null, text: string): void;
  messageBroadcast(text: string): void;
  gameDisconnected(was_deleted: boolean, err: string | null): void;
  gameEnded(scores: Map<Player, number>): void;

  // board
  boardLayoutUpdated(): void;
  boardUpdated(): void;
  boardPotentialsUpdated(): void;
  playerPiecePlaced(player: Player, coord: number, ptype: number): void;
  playerPieceMoved(player: Player, from: number, to: number, ptype: number): void;
  playerPieceRemoved(player: Player, coord: number, ptype: number): void;
  buildRequestCanceled(player: Player): void;
  robberMoved(hex: number, is_pirate: boolean): void;
  pieceValueUpdated(piece: Piece): void;
  debugFreePlaceModeToggled(on: boolean): void;

  // phase and turn
  gameStarted(): void;
  gameStateChanged(state: number, old_state: number): void;
  playerTurnSet(pn: number): void;
  diceRolled(player: Player | null, roll: number): void;
  diceRolledResources(pns: number[], gains: ResourceSet[]): void;

  // scores and counters
  playerElementUpdated(player: Player, utype: UpdateType, is_gain: boolean, is_lose: boolean): void;
  playerResourcesUpdated(player: Player): void;
  requestedSpecialBuild(player: Player): void;
  requestedGoldResourceCountUpdated(player: Player, count: number): void;
  largestArmyRefresh(old: Player | null, holder: Player | null): void;
  longestRoadRefresh(old: Player | null, holder: Player | null): void;
  devCardDeckUpdated(): void;
  playerStats(stats: Map<UpdateType, number>): void;
  playerSVPAwarded(player: Player, svp: number, desc: string): void;

  // prompts
  requestedDiscard(count: number): void;
  requestedChoosePlayer(choices: Player[], can_choose_none: boolean): void;
  requestedChooseRobResourceType(player: Player | null): void;
  requestedDiceRoll(pn: number): void;
  simpleRequest(pn: number, rtype: number, value1: number, value2: number): void;
  simpleAction(pn: number, atype: number, value1: number, value2: number): void;
  pirateFortressAttackResult(for_practice: boolean, strength: number, losses: number): void;

  // trading
  requestedTrade(offerer: Player): void;
  requestedTradeClear(player: Player | null, is_bank: boolean): void;
  requestedTradeRejection(player: Player): void;
  requestedTradeReset(player: Player | null): void;
  playerTradeAccepted(offerer: Player, acceptor: Player): void;
  playerBankTrade(player: Player, give: ResourceSet, get: ResourceSet): void;

  // cards and items
  playerDevCardUpdated(player: Player, added_playable: boolean): void;
  devCardPlayRejected(ctype: number): void;
  invItemPlayRejected(itype: number, reason: number): void;
  playerCanCancelInvItemPlay(player: Player, can_cancel: boolean): void;
  playerSetSpecialItem(
    type_key: string, player: Player | null, gi: number, pi: number, is_set: boolean,
  ): void;
  playerPickSpecialItem(
    type_key: string, player: Player | null, gi: number, pi: number,
    is_pick: boolean, coord: number, level: number, sv: string,
  ): void;

  // board reset
  boardReset(game: Game, rejoin_pn: number, requesting_pn: number): void;
  boardResetVoteRequested(player: Player): void;
  boardResetVoteCast(player: Player, vote: boolean): void;
  boardResetVoteRejected(): void;
}

/*
 * Calls on the display are posted to the UI task queue rather than made
 * from the dispatcher directly.
 */
export interface ClientDisplay {
  showVersion(version: number, version_str: string, build: string, feats: string): void;
  showStatus(text: string, in_debug_mode: boolean): void;
  setNickname(nick: string): void;
  focusPassword(): void;
  showErrorDialog(text: string): void;
  showErrorPanel(text: string, can_practice: boolean): void;

  channelList(channels: string[]): void;
  channelCreated(channel: string): void;
  channelDeleted(channel: string): void;
  channelJoined(channel: string): void;
  channelMemberJoined(channel: string, nick: string): void;
  channelMemberLeft(channel: string, nick: string): void;
  channelMembers(channel: string, members: string[]): void;
  chatMessageReceived(channel: string, nick: string, text: string): void;
  chatMessageBroadcast(text: string): void;

  addToGameList(game: string, opts: string | null, can_join: boolean, is_practice: boolean): void;
  deleteFromGameList(game: string, is_practice: boolean): void;

  optionsRequested(): void;
  optionsReceived(
    info: ServerGametypeInfo, is_practice: boolean, is_dash: boolean, has_all_now: boolean,
  ): void;
}
