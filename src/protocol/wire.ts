/*
 * Wire-level framing: separators and message type ids.
 *
 * A message is a single line, `TYPE|body`.  Most bodies are comma-separated;
 * the multi-parameter messages separate their fields with `|` instead.
 */

export const sep = '|';
export const sep2 = ',';

/*
 * the empty-string token; a field can't be literally empty on the wire
 */
export const EMPTYSTR = '\t';

/*
 * separates game name from text in GAMESERVERTEXT, which may contain either
 * of the usual separators
 */
export const UNLIKELY_CHAR1 = '\u0001';

/*
 * prefixed to a listed game's name when this client can't join it
 */
export const UNJOINABLE_MARKER = '?';

/*
 * an option string, scenario key, or option key standing for "none"
 */
export const NONE = '-';

export enum MsgType {
  NEWCHANNEL = 1001,
  CHANNELMEMBERS = 1002,
  CHANNELS = 1003,
  JOINCHANNEL = 1004,
  CHANNELTEXTMSG = 1005,
  LEAVECHANNEL = 1006,
  DELETECHANNEL = 1007,
  PUTPIECE = 1009,
  GAMETEXTMSG = 1010,
  LEAVEGAME = 1011,
  SITDOWN = 1012,
  JOINGAME = 1013,
  BOARDLAYOUT = 1014,
  DELETEGAME = 1015,
  NEWGAME = 1016,
  GAMEMEMBERS = 1017,
  STARTGAME = 1018,
  GAMES = 1019,
  JOINCHANNELAUTH = 1020,
  JOINGAMEAUTH = 1021,
  PLAYERELEMENT = 1024,
  GAMESTATE = 1025,
  TURN = 1026,
  DICERESULT = 1028,
  DISCARDREQUEST = 1029,
  MOVEROBBER = 1034,
  CHOOSEPLAYER = 1035,
  CHOOSEPLAYERREQUEST = 1036,
  REJECTOFFER = 1037,
  CLEAROFFER = 1038,
  ACCEPTOFFER = 1039,
  BANKTRADE = 1040,
  MAKEOFFER = 1041,
  CLEARTRADEMSG = 1042,
  CANCELBUILDREQUEST = 1044,
  DEVCARDACTION = 1046,
  DEVCARDCOUNT = 1047,
  SETPLAYEDDEVCARD = 1048,
  FIRSTPLAYER = 1054,
  SETTURN = 1055,
  POTENTIALSETTLEMENTS = 1057,
  CHANGEFACE = 1058,
  REJECTCONNECTION = 1059,
  LASTSETTLEMENT = 1060,
  GAMESTATS = 1061,
  BCASTTEXTMSG = 1062,
  RESOURCECOUNT = 1063,
  LONGESTROAD = 1066,
  LARGESTARMY = 1067,
  SETSEATLOCK = 1068,
  STATUSMESSAGE = 1069,
  ROLLDICEPROMPT = 1072,
  RESETBOARDAUTH = 1074,
  RESETBOARDVOTEREQUEST = 1075,
  RESETBOARDVOTE = 1076,
  RESETBOARDREJECT = 1077,
  NEWGAMEWITHOPTIONS = 1079,
  GAMEOPTIONGETDEFAULTS = 1080,
  GAMEOPTIONGETINFOS = 1081,
  GAMEOPTIONINFO = 1082,
  GAMESWITHOPTIONS = 1083,
  BOARDLAYOUT2 = 1084,
  PLAYERSTATS = 1085,
  PLAYERELEMENTS = 1086,
  DEBUGFREEPLACE = 1087,
  SIMPLEREQUEST = 1089,
  SIMPLEACTION = 1090,
  GAMESERVERTEXT = 1091,
  DICERESULTRESOURCES = 1092,
  MOVEPIECE = 1093,
  REMOVEPIECE = 1094,
  PIECEVALUE = 1095,
  GAMEELEMENTS = 1096,
  REVEALFOGHEX = 1097,
  SVPTEXTMSG = 1099,
  INVENTORYITEMACTION = 1100,
  SETSPECIALITEM = 1101,
  LOCALIZEDSTRINGS = 1102,
  SCENARIOINFO = 1103,
  VERSION = 9998,
  SERVERPING = 9999,
}

export type Frame = {
  type: number;
  body: string;
};

/*
 * split a line into its type id and body; null if there's no type id
 */
export function frame(line: string): Frame | null {
  const i = line.indexOf(sep);
  const head = i < 0 ? line : line.slice(0, i);
  if (!/^\d+$/.test(head)) return null;
  return {
    type: parseInt(head, 10),
    body: i < 0 ? '' : line.slice(i + 1),
  };
}

/*
 * split a body on `s`; an empty body has no fields
 */
export function split(body: string, s: string): string[] {
  return body === '' ? [] : body.split(s);
}
