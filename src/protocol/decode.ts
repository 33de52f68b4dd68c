/*
 * Wire text -> Message.
 *
 * Decoding is total: anything we don't recognize, whether an unknown type id
 * from a newer server or a body that doesn't parse, comes back as null.
 */

import * as D from 'io-ts/lib/Decoder'

import {
  EMPTYSTR, MsgType, NONE, UNJOINABLE_MARKER, UNLIKELY_CHAR1,
  frame, sep, sep2,
} from './wire'
import {
  Bool, Int, Str,
  body, bools, draw_error, ints, on_decode, strs, text_body,
} from './fields'
import * as M from './message'

import { ORIGINAL_HEX_COUNT } from '../lib/game/board'
import { SeatLock } from '../lib/game/constants'
import log from '../utils/logger'
import { is_int, split_once } from '../utils/string'

type Dec = D.Decoder<string, M.Message>;

const csv = <A, R>(
  row: D.Decoder<unknown, A>,
  build: (a: A, toks: string[]) => R | null,
): D.Decoder<string, R> => body(sep2, row, build);

const multi = <A, R>(
  row: D.Decoder<unknown, A>,
  build: (a: A, toks: string[]) => R | null,
): D.Decoder<string, R> => body(sep, row, build);

const Game = D.tuple(Str);
const GamePn = D.tuple(Str, Int);

///////////////////////////////////////////////////////////////////////////////
/*
 * small parsers for the irregular fields
 */

function listing(name: string, opts: string | null): M.GameListing {
  const unjoinable = name.startsWith(UNJOINABLE_MARKER);
  return {
    game: unjoinable ? name.slice(UNJOINABLE_MARKER.length) : name,
    opts,
    unjoinable,
  };
}

function seat_lock(tok: string): SeatLock | null {
  switch (tok) {
    case 'true': return SeatLock.LOCKED;
    case 'false': return SeatLock.UNLOCKED;
    case 'clear': return SeatLock.CLEAR_ON_RESET;
  }
  return null;
}

function seat_locks(toks: readonly string[]): SeatLock[] | null {
  const locks: SeatLock[] = [];
  for (const t of toks) {
    const l = seat_lock(t);
    if (l === null) return null;
    locks.push(l);
  }
  return locks;
}

/*
 * the text following the first `n` fields, separators included
 */
function rest(toks: readonly string[], n: number): string | null {
  if (toks.length <= n) return null;
  return toks.slice(n).join(sep2);
}

function board_parts(
  toks: readonly string[],
): Map<string, number[] | string> | null {
  const parts = new Map<string, number[] | string>();
  let i = 0;
  while (i < toks.length) {
    const key = toks[i++];
    const val = toks[i++];
    if (val === undefined) return null;

    if (!val.startsWith('[')) {
      parts.set(key, val);
      continue;
    }
    const n = val.slice(1);
    if (!is_int(n)) return null;
    const len = parseInt(n, 10);
    const arr = ints(toks.slice(i, i + len));
    if (arr === null || arr.length !== len) return null;
    parts.set(key, arr);
    i += len;
  }
  return parts;
}

function dice_gains(
  vals: readonly number[],
): M.DiceResultResources['gains'] | null {
  const [n, ...vs] = vals;
  if (n === undefined) return null;

  const gains: M.DiceResultResources['gains'] = [];
  let i = 0;
  while (i < vs.length) {
    const pn = vs[i];
    const total = vs[i + 1];
    if (total === undefined) return null;
    i += 2;

    const rsrc: [number, number][] = [];
    while (i < vs.length && vs[i] !== 0) {
      const rtype = vs[i + 1];
      if (rtype === undefined) return null;
      rsrc.push([vs[i], rtype]);
      i += 2;
    }
    ++i;  // end-of-player marker
    gains.push({pn, total, rsrc});
  }
  return gains.length === n ? gains : null;
}

function status(s: string): M.StatusMessage {
  const text = s === EMPTYSTR ? '' : s;
  const parts = split_once(text, sep2);
  if (parts !== null && is_int(parts[0]) && parts[1] !== '') {
    return {kind: 'status_message', sv: parseInt(parts[0], 10), text: parts[1]};
  }
  return {kind: 'status_message', sv: 0, text};
}

///////////////////////////////////////////////////////////////////////////////

const decoders = new Map<number, Dec>([

  // connection

  [MsgType.VERSION, csv(D.tuple(Int, Str, Str),
    ([version, version_str, build], toks): M.Version => ({
      kind: 'version', version, version_str, build,
      feats: toks[3] === undefined || toks[3] === EMPTYSTR ? '' : toks[3],
    })
  )],
  [MsgType.SERVERPING, csv(D.tuple(Int),
    ([sleep_time]): M.ServerPing => ({kind: 'server_ping', sleep_time})
  )],
  [MsgType.STATUSMESSAGE, {decode: (s: string) => D.success(status(s))}],
  [MsgType.REJECTCONNECTION, text_body(
    (text): M.RejectConnection => ({kind: 'reject_connection', text})
  )],
  [MsgType.BCASTTEXTMSG, text_body(
    (text): M.BCastTextMsg => ({kind: 'bcast_text_msg', text})
  )],

  // channels

  [MsgType.NEWCHANNEL, text_body(
    (channel): M.NewChannel => ({kind: 'new_channel', channel})
  )],
  [MsgType.DELETECHANNEL, text_body(
    (channel): M.DeleteChannel => ({kind: 'delete_channel', channel})
  )],
  [MsgType.CHANNELS, csv(D.tuple(),
    (_, toks): M.Channels => ({kind: 'channels', channels: strs(toks)})
  )],
  [MsgType.CHANNELMEMBERS, csv(D.tuple(Str),
    ([channel], toks): M.ChannelMembers => ({
      kind: 'channel_members', channel, members: strs(toks.slice(1)),
    })
  )],
  [MsgType.JOINCHANNEL, csv(D.tuple(Str, Str, Str, Str),
    ([nick, , , channel]): M.JoinChannel => ({kind: 'join_channel', nick, channel})
  )],
  [MsgType.JOINCHANNELAUTH, csv(D.tuple(Str, Str),
    ([nick, channel]): M.JoinChannelAuth => ({kind: 'join_channel_auth', nick, channel})
  )],
  [MsgType.LEAVECHANNEL, csv(D.tuple(Str, Str, Str),
    ([nick, , channel]): M.LeaveChannel => ({kind: 'leave_channel', nick, channel})
  )],
  [MsgType.CHANNELTEXTMSG, csv(D.tuple(Str, Str),
    ([channel, nick], toks): M.ChannelTextMsg | null => {
      const text = rest(toks, 2);
      return text === null ? null : {kind: 'channel_text_msg', channel, nick, text};
    }
  )],

  // game list, options, scenarios

  [MsgType.GAMES, csv(D.tuple(),
    (_, toks): M.Games => ({
      kind: 'games', games: strs(toks).map(g => listing(g, null)),
    })
  )],
  [MsgType.NEWGAME, text_body(
    (name): M.NewGame => {
      const {game, unjoinable} = listing(name, null);
      return {kind: 'new_game', game, unjoinable};
    }
  )],
  [MsgType.NEWGAMEWITHOPTIONS, csv(D.tuple(Str, Int),
    ([name, min_version], toks): M.NewGameWithOptions | null => {
      const opts = rest(toks, 2);
      const {game, unjoinable} = listing(name, opts);
      return opts === null ? null : {
        kind: 'new_game_with_options', game, min_version, opts, unjoinable,
      };
    }
  )],
  [MsgType.GAMESWITHOPTIONS, multi(D.tuple(),
    (_, toks): M.GamesWithOptions | null => {
      if (toks.length % 2 !== 0) return null;
      const games: M.GameListing[] = [];
      for (let i = 0; i < toks.length; i += 2) {
        const opts = toks[i + 1];
        games.push(listing(toks[i], opts === NONE || opts === EMPTYSTR ? null : opts));
      }
      return {kind: 'games_with_options', games};
    }
  )],
  [MsgType.DELETEGAME, text_body(
    (game): M.DeleteGame => ({kind: 'delete_game', game})
  )],
  [MsgType.GAMEOPTIONGETDEFAULTS, text_body(
    (opts): M.GameOptionGetDefaults => ({kind: 'game_option_get_defaults', opts})
  )],
  [MsgType.GAMEOPTIONINFO, multi(
    D.tuple(Str, Int, Int, Int, Bool, Int, Int, Int, Bool, Str, Int, Str),
    ([
      key, otype, min_version, last_mod_version,
      default_bool, default_int, min_int, max_int,
      bool_value, value, flags, desc,
    ], toks): M.GameOptionInfo => ({
      kind: 'game_option_info',
      key, otype, min_version, last_mod_version,
      default_bool, default_int, min_int, max_int,
      bool_value, value, flags, desc,
      enum_vals: strs(toks.slice(12)),
    })
  )],
  [MsgType.LOCALIZEDSTRINGS, multi(D.tuple(Str, Str),
    ([stype, hex], toks): M.LocalizedStrings | null => {
      if (!/^[0-9a-fA-F]+$/.test(hex)) return null;
      return {
        kind: 'localized_strings',
        stype,
        flags: parseInt(hex, 16),
        strs: strs(toks.slice(2)),
      };
    }
  )],
  [MsgType.SCENARIOINFO, multi(D.tuple(Str),
    ([key], toks): M.ScenarioInfo | null => {
      const none: M.ScenarioInfo = {
        kind: 'scenario_info',
        no_more: false, key, key_unknown: false,
        min_version: 0, last_mod_version: 0,
        opts: '', title: '', desc: null,
      };
      if (key === NONE && toks.length === 1) return {...none, no_more: true};

      const vers = ints(toks.slice(1, 3));
      if (vers === null || vers.length < 2) return null;
      const [min_version, last_mod_version] = vers;
      if (last_mod_version === -2) return {...none, key_unknown: true};

      if (toks.length < 5) return null;
      const [opts, title, desc] = strs(toks.slice(3, 6));
      return {
        ...none,
        min_version, last_mod_version,
        opts: opts === NONE ? '' : opts,
        title,
        desc: desc === undefined || desc === '' ? null : desc,
      };
    }
  )],

  // game membership

  [MsgType.JOINGAMEAUTH, csv(Game,
    ([game]): M.JoinGameAuth => ({kind: 'join_game_auth', game})
  )],
  [MsgType.JOINGAME, csv(D.tuple(Str, Str, Str, Str),
    ([nick, , , game]): M.JoinGame => ({kind: 'join_game', game, nick})
  )],
  [MsgType.LEAVEGAME, csv(D.tuple(Str, Str, Str),
    ([nick, , game]): M.LeaveGame => ({kind: 'leave_game', game, nick})
  )],
  [MsgType.SITDOWN, csv(D.tuple(Str, Str, Int, Bool),
    ([game, nick, pn, robot]): M.SitDown => ({kind: 'sit_down', game, nick, pn, robot})
  )],
  [MsgType.GAMEMEMBERS, csv(Game,
    ([game], toks): M.GameMembers => ({
      kind: 'game_members', game, members: strs(toks.slice(1)),
    })
  )],
  [MsgType.SETSEATLOCK, csv(Game,
    ([game], toks): M.SetSeatLock | null => {
      if (toks.length === 3 && is_int(toks[1])) {
        const lock = seat_lock(toks[2]);
        if (lock === null) return null;
        return {
          kind: 'set_seat_lock', game,
          seats: {pn: parseInt(toks[1], 10), lock},
        };
      }
      const all = seat_locks(toks.slice(1));
      if (all === null || all.length === 0) return null;
      return {kind: 'set_seat_lock', game, seats: {all}};
    }
  )],
  [MsgType.CHANGEFACE, csv(D.tuple(Str, Int, Int),
    ([game, pn, face_id]): M.ChangeFace => ({kind: 'change_face', game, pn, face_id})
  )],
  [MsgType.GAMETEXTMSG, csv(D.tuple(Str, Str),
    ([game, nick], toks): M.GameTextMsg | null => {
      const text = rest(toks, 2);
      return text === null ? null : {kind: 'game_text_msg', game, nick, text};
    }
  )],
  [MsgType.GAMESERVERTEXT, {
    decode: (s: string) => {
      const parts = split_once(s, UNLIKELY_CHAR1);
      if (parts === null) return D.failure(s, 'game server text');
      const m: M.GameServerText = {
        kind: 'game_server_text', game: parts[0], text: parts[1],
      };
      return D.success(m);
    },
  }],
  [MsgType.GAMESTATS, csv(Game,
    ([game], toks): M.GameStats | null => {
      const vals = toks.slice(1);
      if (vals.length === 0 || vals.length % 2 !== 0) return null;
      const scores = ints(vals.slice(0, vals.length / 2));
      const robots = bools(vals.slice(vals.length / 2));
      if (scores === null || robots === null) return null;
      return {kind: 'game_stats', game, scores, robots};
    }
  )],

  // board

  [MsgType.BOARDLAYOUT, csv(Game,
    ([game], toks): M.BoardLayout | null => {
      const vals = ints(toks.slice(1));
      const n = ORIGINAL_HEX_COUNT;
      if (vals === null || vals.length !== n * 2 + 1) return null;
      return {
        kind: 'board_layout',
        game,
        hexes: vals.slice(0, n),
        numbers: vals.slice(n, n * 2),
        robber: vals[n * 2],
      };
    }
  )],
  [MsgType.BOARDLAYOUT2, csv(GamePn,
    ([game, bef], toks): M.BoardLayout2 | null => {
      const parts = board_parts(toks.slice(2));
      return parts === null ? null : {kind: 'board_layout2', game, bef, parts};
    }
  )],
  [MsgType.PUTPIECE, csv(D.tuple(Str, Int, Int, Int),
    ([game, pn, ptype, coord]): M.PutPiece => ({kind: 'put_piece', game, pn, ptype, coord})
  )],
  [MsgType.CANCELBUILDREQUEST, csv(GamePn,
    ([game, ptype]): M.CancelBuildRequest => ({kind: 'cancel_build_request', game, ptype})
  )],
  [MsgType.MOVEPIECE, csv(D.tuple(Str, Int, Int, Int, Int),
    ([game, pn, ptype, from, to]): M.MovePiece => ({
      kind: 'move_piece', game, pn, ptype, from, to,
    })
  )],
  [MsgType.REMOVEPIECE, csv(D.tuple(Str, Int, Int, Int),
    ([game, pn, ptype, coord]): M.RemovePiece => ({
      kind: 'remove_piece', game, pn, ptype, coord,
    })
  )],
  [MsgType.MOVEROBBER, csv(D.tuple(Str, Int, Int),
    ([game, pn, coord]): M.MoveRobber => ({kind: 'move_robber', game, pn, coord})
  )],
  [MsgType.POTENTIALSETTLEMENTS, csv(GamePn,
    ([game, pn], toks): M.PotentialSettlements | null => {
      const nodes = ints(toks.slice(2));
      return nodes === null ? null : {kind: 'potential_settlements', game, pn, nodes};
    }
  )],
  [MsgType.LASTSETTLEMENT, csv(D.tuple(Str, Int, Int),
    ([game, pn, coord]): M.LastSettlement => ({kind: 'last_settlement', game, pn, coord})
  )],
  [MsgType.REVEALFOGHEX, csv(D.tuple(Str, Int, Int, Int),
    ([game, hex, htype, dice]): M.RevealFogHex => ({
      kind: 'reveal_fog_hex', game, hex, htype, dice,
    })
  )],
  [MsgType.PIECEVALUE, csv(D.tuple(Str, Int, Int, Int, Int),
    ([game, ptype, coord, value, value2]): M.PieceValue => ({
      kind: 'piece_value', game, ptype, coord, value, value2,
    })
  )],
  [MsgType.DEBUGFREEPLACE, csv(D.tuple(Str, Int, Int, Int),
    ([game, pn, ptype, coord]): M.DebugFreePlace => ({
      kind: 'debug_free_place', game, pn, ptype, coord,
    })
  )],

  // turn, phase, elements

  [MsgType.STARTGAME, csv(Game,
    ([game], toks): M.StartGame | null => {
      const t = toks[1];
      if (t === undefined) return {kind: 'start_game', game, state: null};
      return is_int(t) ? {kind: 'start_game', game, state: parseInt(t, 10)} : null;
    }
  )],
  [MsgType.GAMESTATE, csv(GamePn,
    ([game, state]): M.GameState => ({kind: 'game_state', game, state})
  )],
  [MsgType.TURN, csv(GamePn,
    ([game, pn], toks): M.Turn | null => {
      const t = toks[2];
      if (t === undefined) return {kind: 'turn', game, pn, state: null};
      return is_int(t) ? {kind: 'turn', game, pn, state: parseInt(t, 10)} : null;
    }
  )],
  [MsgType.SETTURN, csv(GamePn,
    ([game, pn]): M.SetTurn => ({kind: 'set_turn', game, pn})
  )],
  [MsgType.FIRSTPLAYER, csv(GamePn,
    ([game, pn]): M.FirstPlayer => ({kind: 'first_player', game, pn})
  )],
  [MsgType.PLAYERELEMENT, csv(D.tuple(Str, Int, Int, Int, Int),
    ([game, pn, action, etype, amount], toks): M.PlayerElement | null => {
      if (!(action in M.PEAction)) return null;
      return {
        kind: 'player_element',
        game, pn, action, etype, amount,
        news: toks[5] === 'Y',
      };
    }
  )],
  [MsgType.PLAYERELEMENTS, multi(D.tuple(Str, Int, Int),
    ([game, pn, action], toks): M.PlayerElements | null => {
      const vals = ints(toks.slice(3));
      if (vals === null || vals.length % 2 !== 0) return null;
      if (!(action in M.PEAction)) return null;
      return {
        kind: 'player_elements',
        game, pn, action,
        etypes: vals.filter((_, i) => i % 2 === 0),
        amounts: vals.filter((_, i) => i % 2 === 1),
      };
    }
  )],
  [MsgType.RESOURCECOUNT, csv(D.tuple(Str, Int, Int),
    ([game, pn, count]): M.ResourceCount => ({kind: 'resource_count', game, pn, count})
  )],
  [MsgType.GAMEELEMENTS, multi(Game,
    ([game], toks): M.GameElements | null => {
      const vals = ints(toks.slice(1));
      if (vals === null || vals.length === 0 || vals.length % 2 !== 0) return null;
      return {
        kind: 'game_elements',
        game,
        etypes: vals.filter((_, i) => i % 2 === 0),
        values: vals.filter((_, i) => i % 2 === 1),
      };
    }
  )],
  [MsgType.LONGESTROAD, csv(GamePn,
    ([game, pn]): M.LongestRoad => ({kind: 'longest_road', game, pn})
  )],
  [MsgType.LARGESTARMY, csv(GamePn,
    ([game, pn]): M.LargestArmy => ({kind: 'largest_army', game, pn})
  )],
  [MsgType.DICERESULT, csv(GamePn,
    ([game, roll]): M.DiceResult => ({kind: 'dice_result', game, roll})
  )],
  [MsgType.DICERESULTRESOURCES, multi(Game,
    ([game], toks): M.DiceResultResources | null => {
      const vals = ints(toks.slice(1));
      const gains = vals === null ? null : dice_gains(vals);
      return gains === null ? null : {kind: 'dice_result_resources', game, gains};
    }
  )],
  [MsgType.PLAYERSTATS, multi(GamePn,
    ([game, stype], toks): M.PlayerStats | null => {
      const values = ints(toks.slice(1));
      return values === null ? null : {kind: 'player_stats', game, stype, values};
    }
  )],
  [MsgType.SVPTEXTMSG, csv(D.tuple(Str, Int, Int),
    ([game, pn, svp], toks): M.SVPTextMsg | null => {
      const desc = rest(toks, 3);
      return desc === null ? null : {kind: 'svp_text_msg', game, pn, svp, desc};
    }
  )],

  // prompts

  [MsgType.DISCARDREQUEST, csv(GamePn,
    ([game, count]): M.DiscardRequest => ({kind: 'discard_request', game, count})
  )],
  [MsgType.CHOOSEPLAYERREQUEST, csv(Game,
    ([game], toks): M.ChoosePlayerRequest | null => {
      const can_choose_none = toks[1] === 'NONE';
      const choices = bools(toks.slice(can_choose_none ? 2 : 1));
      return choices === null ? null : {
        kind: 'choose_player_request', game, can_choose_none, choices,
      };
    }
  )],
  [MsgType.CHOOSEPLAYER, csv(GamePn,
    ([game, choice]): M.ChoosePlayer => ({kind: 'choose_player', game, choice})
  )],
  [MsgType.ROLLDICEPROMPT, csv(GamePn,
    ([game, pn]): M.RollDicePrompt => ({kind: 'roll_dice_prompt', game, pn})
  )],
  [MsgType.SIMPLEREQUEST, csv(D.tuple(Str, Int, Int, Int, Int),
    ([game, pn, rtype, value1, value2]): M.SimpleRequest => ({
      kind: 'simple_request', game, pn, rtype, value1, value2,
    })
  )],
  [MsgType.SIMPLEACTION, csv(D.tuple(Str, Int, Int, Int, Int),
    ([game, pn, atype, value1, value2]): M.SimpleAction => ({
      kind: 'simple_action', game, pn, atype, value1, value2,
    })
  )],

  // trading

  [MsgType.MAKEOFFER, csv(GamePn,
    ([game, from], toks): M.MakeOffer | null => {
      const nto = toks.length - 2 - 10;
      if (nto < 1) return null;
      const to = bools(toks.slice(2, 2 + nto));
      const amounts = ints(toks.slice(2 + nto));
      if (to === null || amounts === null) return null;
      return {
        kind: 'make_offer', game, from, to,
        give: amounts.slice(0, 5),
        get: amounts.slice(5),
      };
    }
  )],
  [MsgType.CLEAROFFER, csv(GamePn,
    ([game, pn]): M.ClearOffer => ({kind: 'clear_offer', game, pn})
  )],
  [MsgType.REJECTOFFER, csv(GamePn,
    ([game, pn]): M.RejectOffer => ({kind: 'reject_offer', game, pn})
  )],
  [MsgType.ACCEPTOFFER, csv(D.tuple(Str, Int, Int),
    ([game, accepting, offering]): M.AcceptOffer => ({
      kind: 'accept_offer', game, accepting, offering,
    })
  )],
  [MsgType.BANKTRADE, csv(Game,
    ([game], toks): M.BankTrade | null => {
      const vals = ints(toks.slice(1));
      if (vals === null || (vals.length !== 10 && vals.length !== 11)) return null;
      return {
        kind: 'bank_trade', game,
        give: vals.slice(0, 5),
        get: vals.slice(5, 10),
        pn: vals[10] ?? -1,
      };
    }
  )],
  [MsgType.CLEARTRADEMSG, csv(GamePn,
    ([game, pn]): M.ClearTradeMsg => ({kind: 'clear_trade_msg', game, pn})
  )],

  // cards and items

  [MsgType.DEVCARDACTION, csv(D.tuple(Str, Int, Int, Int),
    ([game, pn, action, ctype]): M.DevCardAction => ({
      kind: 'dev_card_action', game, pn, action, ctype,
    })
  )],
  [MsgType.DEVCARDCOUNT, csv(GamePn,
    ([game, count]): M.DevCardCount => ({kind: 'dev_card_count', game, count})
  )],
  [MsgType.SETPLAYEDDEVCARD, csv(D.tuple(Str, Int, Bool),
    ([game, pn, played]): M.SetPlayedDevCard => ({
      kind: 'set_played_dev_card', game, pn, played,
    })
  )],
  [MsgType.INVENTORYITEMACTION, csv(D.tuple(Str, Int, Int, Int),
    ([game, pn, action, itype], toks): M.InventoryItemAction | null => {
      const f = toks[4] ?? '0';
      return is_int(f) ? {
        kind: 'inventory_item_action', game, pn, action, itype,
        flags: parseInt(f, 10),
      } : null;
    }
  )],
  [MsgType.SETSPECIALITEM, csv(D.tuple(Str, Int, Str, Int, Int, Int, Int, Int, Str),
    ([game, op, type_key, gi, pi, pn, coord, level, sv]): M.SetSpecialItem => ({
      kind: 'set_special_item', game, op, type_key, gi, pi, pn, coord, level, sv,
    })
  )],

  // board reset

  [MsgType.RESETBOARDAUTH, csv(D.tuple(Str, Int, Int),
    ([game, rejoin_pn, requesting_pn]): M.ResetBoardAuth => ({
      kind: 'reset_board_auth', game, rejoin_pn, requesting_pn,
    })
  )],
  [MsgType.RESETBOARDVOTEREQUEST, csv(GamePn,
    ([game, pn]): M.ResetBoardVoteRequest => ({
      kind: 'reset_board_vote_request', game, pn,
    })
  )],
  [MsgType.RESETBOARDVOTE, csv(D.tuple(Str, Int, Int),
    ([game, pn, vote]): M.ResetBoardVote => ({
      kind: 'reset_board_vote', game, pn, vote: vote !== 0,
    })
  )],
  [MsgType.RESETBOARDREJECT, csv(Game,
    ([game]): M.ResetBoardReject => ({kind: 'reset_board_reject', game})
  )],
]);

///////////////////////////////////////////////////////////////////////////////

/*
 * decode one line of wire text; null if it's not a message we understand
 */
export function decode(line: string): M.Message | null {
  const f = frame(line.replace(/\r?\n$/, ''));
  if (f === null) {
    log.debug('unframed message', {line});
    return null;
  }
  const decoder = decoders.get(f.type);
  if (decoder === undefined) {
    log.debug('unknown message type', {type: f.type});
    return null;
  }
  return on_decode(decoder, f.body,
    (msg): M.Message | null => msg,
    (err): M.Message | null => {
      log.debug('garbled message', {type: f.type, err: draw_error(err)});
      return null;
    }
  );
}

/*
 * whether `type` is a message id we can decode
 */
export function is_known_type(type: number): boolean {
  return decoders.has(type);
}
