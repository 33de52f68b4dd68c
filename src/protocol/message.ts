/*
 * The decoded message model: one record type per wire message, tagged by
 * `kind`, plus the sub-codes those messages carry.
 *
 * Game-scoped messages have a `game` field naming the game they apply to.
 */

import { SeatLock } from '../lib/game/constants'

///////////////////////////////////////////////////////////////////////////////
/*
 * sub-codes
 */

/*
 * PLAYERELEMENT actions
 */
export enum PEAction {
  SET = 100,
  GAIN = 101,
  LOSE = 102,
}

export enum PEType {
  CLAY = 1,
  ORE = 2,
  SHEEP = 3,
  WHEAT = 4,
  WOOD = 5,
  UNKNOWN = 6,
  ROADS = 10,
  SETTLEMENTS = 11,
  CITIES = 12,
  SHIPS = 13,
  NUMKNIGHTS = 15,
  ASK_SPECIAL_BUILD = 16,
  NUM_PICK_GOLD_HEX_RESOURCES = 17,
  SCENARIO_SVP = 18,
  SCENARIO_PLAYEREVENTS_BITMASK = 19,
  SCENARIO_SVP_LANDAREAS_BITMASK = 20,
  STARTING_LANDAREAS = 21,
  SCENARIO_CLOTH_COUNT = 22,
  SCENARIO_WARSHIP_COUNT = 23,
  RESOURCE_COUNT = 24,
  LAST_SETTLEMENT_NODE = 25,
  PLAYED_DEV_CARD_FLAG = 26,
}

export enum GEType {
  ROUND_COUNT = 1,
  DEV_CARD_COUNT = 2,
  FIRST_PLAYER = 3,
  CURRENT_PLAYER = 4,
  LARGEST_ARMY_PLAYER = 5,
  LONGEST_ROAD_PLAYER = 6,
}

export enum DevCardActionType {
  DRAW = 0,
  PLAY = 1,
  ADD_NEW = 2,
  ADD_OLD = 3,
  CANNOT_PLAY = 4,
}

export enum InvItemActionType {
  ADD_PLAYABLE = 1,
  ADD_OTHER = 2,
  PLAY = 3,
  CANNOT_PLAY = 4,
  PLAYED = 5,
  PLACING_EXTRA = 6,
}

export enum SpecialItemOp {
  SET = 1,
  CLEAR = 2,
  PICK = 3,
  DECLINE = 4,
  SET_PICK = 5,
  CLEAR_PICK = 6,
}

export enum SimpleActionType {
  DEVCARD_BOUGHT = 1,
  TRADE_SUCCESSFUL = 2,
  RSRC_TYPE_MONOPOLIZED = 3,
  BOARD_EDGE_SET_SPECIAL = 4,
  DICE_RESULTS_FULLY_SENT = 5,
  SC_PIRI_FORT_ATTACK_RESULT = 1001,
  TRADE_PORT_REMOVED = 1002,
}

export enum SimpleRequestType {
  PROMPT_PICK_RESOURCES = 1,
  SC_PIRI_FORT_ATTACK = 1000,
  TRADE_PORT_PLACE = 1001,
}

export enum StatusValue {
  OK = 0,
  NOT_OK_GENERIC = 1,
  NAME_NOT_FOUND = 2,
  PW_WRONG = 3,
  NAME_IN_USE = 4,
  CANT_JOIN_GAME_VERSION = 5,
  NEWGAME_OPTION_UNKNOWN = 9,
  NEWGAME_OPTION_VALUE_TOONEW = 10,
  NEWGAME_ALREADY_EXISTS = 11,
  PW_REQUIRED = 16,
  OK_SET_NICKNAME = 20,
  OK_DEBUG_MODE_ON = 21,
  GAME_CLIENT_FEATURES_NEEDED = 22,
}

export enum PlayerStatType {
  RES_ROLL = 1,
  TRADES = 2,
}

export const INV_ITEM_FLAG_KEPT = 0x01;
export const INV_ITEM_FLAG_VP = 0x02;
export const INV_ITEM_FLAG_CAN_CANCEL = 0x04;

export const LOCALIZED_TYPE_GAMEOPT = 'O';
export const LOCALIZED_TYPE_SCENARIO = 'S';
export const LOCALIZED_FLAG_SENT_ALL = 0x04;
// stands in for a key's strings when the server has none for it
export const LOCALIZED_KEY_UNKNOWN = '\u0016K';

///////////////////////////////////////////////////////////////////////////////
/*
 * connection-level messages
 */

export type Version = {
  kind: 'version',
  version: number,
  version_str: string,
  build: string,
  feats: string,
};

export type ServerPing = {
  kind: 'server_ping',
  sleep_time: number,
};

export type StatusMessage = {
  kind: 'status_message',
  sv: number,
  text: string,
};

export type RejectConnection = {
  kind: 'reject_connection',
  text: string,
};

export type BCastTextMsg = {
  kind: 'bcast_text_msg',
  text: string,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * chat channels
 */

export type NewChannel = {kind: 'new_channel', channel: string};
export type DeleteChannel = {kind: 'delete_channel', channel: string};
export type Channels = {kind: 'channels', channels: string[]};

export type ChannelMembers = {
  kind: 'channel_members',
  channel: string,
  members: string[],
};

export type JoinChannel = {kind: 'join_channel', nick: string, channel: string};
export type JoinChannelAuth = {kind: 'join_channel_auth', nick: string, channel: string};
export type LeaveChannel = {kind: 'leave_channel', nick: string, channel: string};

export type ChannelTextMsg = {
  kind: 'channel_text_msg',
  channel: string,
  nick: string,
  text: string,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * game list and option/scenario negotiation
 */

export type GameListing = {
  game: string,
  // packed option string, or null if the game has none
  opts: string | null,
  unjoinable: boolean,
};

export type Games = {kind: 'games', games: GameListing[]};
export type NewGame = {kind: 'new_game', game: string, unjoinable: boolean};

export type NewGameWithOptions = {
  kind: 'new_game_with_options',
  game: string,
  min_version: number,
  opts: string,
  unjoinable: boolean,
};

export type GamesWithOptions = {kind: 'games_with_options', games: GameListing[]};

export type DeleteGame = {kind: 'delete_game', game: string};

export type GameOptionGetDefaults = {
  kind: 'game_option_get_defaults',
  opts: string,
};

export type GameOptionInfo = {
  kind: 'game_option_info',
  key: string,
  otype: number,
  min_version: number,
  last_mod_version: number,
  default_bool: boolean,
  default_int: number,
  min_int: number,
  max_int: number,
  bool_value: boolean,
  // int value, or string value for string types
  value: string,
  flags: number,
  desc: string,
  enum_vals: string[],
};

export type LocalizedStrings = {
  kind: 'localized_strings',
  stype: string,
  flags: number,
  strs: string[],
};

export type ScenarioInfo = {
  kind: 'scenario_info',
  // "no more scenarios" end marker
  no_more: boolean,
  key: string,
  // the server doesn't know this scenario key
  key_unknown: boolean,
  min_version: number,
  last_mod_version: number,
  opts: string,
  title: string,
  desc: string | null,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * game membership
 */

export type JoinGameAuth = {kind: 'join_game_auth', game: string};
export type JoinGame = {kind: 'join_game', game: string, nick: string};
export type LeaveGame = {kind: 'leave_game', game: string, nick: string};

export type SitDown = {
  kind: 'sit_down',
  game: string,
  nick: string,
  pn: number,
  robot: boolean,
};

export type GameMembers = {kind: 'game_members', game: string, members: string[]};

export type SetSeatLock = {
  kind: 'set_seat_lock',
  game: string,
  // one seat, or every seat at once
  seats: {pn: number, lock: SeatLock} | {all: SeatLock[]},
};

export type ChangeFace = {kind: 'change_face', game: string, pn: number, face_id: number};

export type GameTextMsg = {kind: 'game_text_msg', game: string, nick: string, text: string};
export type GameServerText = {kind: 'game_server_text', game: string, text: string};

export type GameStats = {
  kind: 'game_stats',
  game: string,
  scores: number[],
  robots: boolean[],
};

///////////////////////////////////////////////////////////////////////////////
/*
 * board
 */

export type BoardLayout = {
  kind: 'board_layout',
  game: string,
  // still in the sent encoding
  hexes: number[],
  numbers: number[],
  robber: number,
};

export type BoardLayout2 = {
  kind: 'board_layout2',
  game: string,
  bef: number,
  parts: Map<string, number[] | string>,
};

export type PutPiece = {kind: 'put_piece', game: string, pn: number, ptype: number, coord: number};
export type CancelBuildRequest = {kind: 'cancel_build_request', game: string, ptype: number};

export type MovePiece = {
  kind: 'move_piece',
  game: string,
  pn: number,
  ptype: number,
  from: number,
  to: number,
};

export type RemovePiece = {kind: 'remove_piece', game: string, pn: number, ptype: number, coord: number};
export type MoveRobber = {kind: 'move_robber', game: string, pn: number, coord: number};

export type PotentialSettlements = {
  kind: 'potential_settlements',
  game: string,
  pn: number,
  nodes: number[],
};

export type LastSettlement = {kind: 'last_settlement', game: string, pn: number, coord: number};

export type RevealFogHex = {
  kind: 'reveal_fog_hex',
  game: string,
  hex: number,
  htype: number,
  dice: number,
};

export type PieceValue = {
  kind: 'piece_value',
  game: string,
  ptype: number,
  coord: number,
  value: number,
  value2: number,
};

export type DebugFreePlace = {
  kind: 'debug_free_place',
  game: string,
  pn: number,
  ptype: number,
  coord: number,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * turn, phase, and elements
 */

export type StartGame = {kind: 'start_game', game: string, state: number | null};
export type GameState = {kind: 'game_state', game: string, state: number};
export type Turn = {kind: 'turn', game: string, pn: number, state: number | null};
export type SetTurn = {kind: 'set_turn', game: string, pn: number};
export type FirstPlayer = {kind: 'first_player', game: string, pn: number};

export type PlayerElement = {
  kind: 'player_element',
  game: string,
  pn: number,
  action: PEAction,
  etype: number,
  amount: number,
  news: boolean,
};

export type PlayerElements = {
  kind: 'player_elements',
  game: string,
  pn: number,
  action: PEAction,
  etypes: number[],
  amounts: number[],
};

export type ResourceCount = {kind: 'resource_count', game: string, pn: number, count: number};

export type GameElements = {
  kind: 'game_elements',
  game: string,
  etypes: number[],
  values: number[],
};

export type LongestRoad = {kind: 'longest_road', game: string, pn: number};
export type LargestArmy = {kind: 'largest_army', game: string, pn: number};

export type DiceResult = {kind: 'dice_result', game: string, roll: number};

export type DiceResultResources = {
  kind: 'dice_result_resources',
  game: string,
  gains: {
    pn: number,
    total: number,
    // [amount, resource type] pairs
    rsrc: [number, number][],
  }[],
};

export type PlayerStats = {
  kind: 'player_stats',
  game: string,
  stype: number,
  // led by stype, so that values[rtype] is that resource's count
  values: number[],
};
export type SVPTextMsg = {kind: 'svp_text_msg', game: string, pn: number, svp: number, desc: string};

///////////////////////////////////////////////////////////////////////////////
/*
 * prompts
 */

export type DiscardRequest = {kind: 'discard_request', game: string, count: number};

export type ChoosePlayerRequest = {
  kind: 'choose_player_request',
  game: string,
  can_choose_none: boolean,
  choices: boolean[],
};

export type ChoosePlayer = {kind: 'choose_player', game: string, choice: number};
export type RollDicePrompt = {kind: 'roll_dice_prompt', game: string, pn: number};

export type SimpleRequest = {
  kind: 'simple_request',
  game: string,
  pn: number,
  rtype: number,
  value1: number,
  value2: number,
};

export type SimpleAction = {
  kind: 'simple_action',
  game: string,
  pn: number,
  atype: number,
  value1: number,
  value2: number,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * trading
 */

export type MakeOffer = {
  kind: 'make_offer',
  game: string,
  from: number,
  to: boolean[],
  give: number[],
  get: number[],
};

export type ClearOffer = {kind: 'clear_offer', game: string, pn: number};
export type RejectOffer = {kind: 'reject_offer', game: string, pn: number};
export type AcceptOffer = {kind: 'accept_offer', game: string, accepting: number, offering: number};

export type BankTrade = {
  kind: 'bank_trade',
  game: string,
  give: number[],
  get: number[],
  pn: number,
};

export type ClearTradeMsg = {kind: 'clear_trade_msg', game: string, pn: number};

///////////////////////////////////////////////////////////////////////////////
/*
 * cards and items
 */

export type DevCardAction = {
  kind: 'dev_card_action',
  game: string,
  pn: number,
  action: number,
  ctype: number,
};

export type DevCardCount = {kind: 'dev_card_count', game: string, count: number};
export type SetPlayedDevCard = {kind: 'set_played_dev_card', game: string, pn: number, played: boolean};

export type InventoryItemAction = {
  kind: 'inventory_item_action',
  game: string,
  pn: number,
  action: number,
  itype: number,
  // INV_ITEM_FLAG_* bits; for CANNOT_PLAY, the reason code
  flags: number,
};

export type SetSpecialItem = {
  kind: 'set_special_item',
  game: string,
  op: number,
  type_key: string,
  gi: number,
  pi: number,
  pn: number,
  coord: number,
  level: number,
  sv: string,
};

///////////////////////////////////////////////////////////////////////////////
/*
 * board reset
 */

export type ResetBoardAuth = {
  kind: 'reset_board_auth',
  game: string,
  rejoin_pn: number,
  requesting_pn: number,
};

export type ResetBoardVoteRequest = {kind: 'reset_board_vote_request', game: string, pn: number};
export type ResetBoardVote = {kind: 'reset_board_vote', game: string, pn: number, vote: boolean};
export type ResetBoardReject = {kind: 'reset_board_reject', game: string};

///////////////////////////////////////////////////////////////////////////////

export type MessageMap = {
  version: Version,
  server_ping: ServerPing,
  status_message: StatusMessage,
  reject_connection: RejectConnection,
  bcast_text_msg: BCastTextMsg,

  new_channel: NewChannel,
  delete_channel: DeleteChannel,
  channels: Channels,
  channel_members: ChannelMembers,
  join_channel: JoinChannel,
  join_channel_auth: JoinChannelAuth,
  leave_channel: LeaveChannel,
  channel_text_msg: ChannelTextMsg,

  games: Games,
  new_game: NewGame,
  new_game_with_options: NewGameWithOptions,
  games_with_options: GamesWithOptions,
  delete_game: DeleteGame,
  game_option_get_defaults: GameOptionGetDefaults,
  game_option_info: GameOptionInfo,
  localized_strings: LocalizedStrings,
  scenario_info: ScenarioInfo,

  join_game_auth: JoinGameAuth,
  join_game: JoinGame,
  leave_game: LeaveGame,
  sit_down: SitDown,
  game_members: GameMembers,
  set_seat_lock: SetSeatLock,
  change_face: ChangeFace,
  game_text_msg: GameTextMsg,
  game_server_text: GameServerText,
  game_stats: GameStats,

  board_layout: BoardLayout,
  board_layout2: BoardLayout2,
  put_piece: PutPiece,
  cancel_build_request: CancelBuildRequest,
  move_piece: MovePiece,
  remove_piece: RemovePiece,
  move_robber: MoveRobber,
  potential_settlements: PotentialSettlements,
  last_settlement: LastSettlement,
  reveal_fog_hex: RevealFogHex,
  piece_value: PieceValue,
  debug_free_place: DebugFreePlace,

  start_game: StartGame,
  game_state: GameState,
  turn: Turn,
  set_turn: SetTurn,
  first_player: FirstPlayer,
  player_element: PlayerElement,
  player_elements: PlayerElements,
  resource_count: ResourceCount,
  game_elements: GameElements,
  longest_road: LongestRoad,
  largest_army: LargestArmy,
  dice_result: DiceResult,
  dice_result_resources: DiceResultResources,
  player_stats: PlayerStats,
  svp_text_msg: SVPTextMsg,

  discard_request: DiscardRequest,
  choose_player_request: ChoosePlayerRequest,
  choose_player: ChoosePlayer,
  roll_dice_prompt: RollDicePrompt,
  simple_request: SimpleRequest,
  simple_action: SimpleAction,

  make_offer: MakeOffer,
  clear_offer: ClearOffer,
  reject_offer: RejectOffer,
  accept_offer: AcceptOffer,
  bank_trade: BankTrade,
  clear_trade_msg: ClearTradeMsg,

  dev_card_action: DevCardAction,
  dev_card_count: DevCardCount,
  set_played_dev_card: SetPlayedDevCard,
  inventory_item_action: InventoryItemAction,
  set_special_item: SetSpecialItem,

  reset_board_auth: ResetBoardAuth,
  reset_board_vote_request: ResetBoardVoteRequest,
  reset_board_vote: ResetBoardVote,
  reset_board_reject: ResetBoardReject,
};

export type Kind = keyof MessageMap;
export type Message = MessageMap[Kind];

/*
 * the game-scoped messages
 */
export type GameMessage = Extract<Message, {game: string}>;
