/*
 * Numeric codes shared between the wire protocol and the game replica.
 *
 * These values are fixed by the server; never renumber them.
 */

/*
 * Game phase.
 *
 * The phase only moves forward through this graph, except for a board reset,
 * which replaces the whole game with a fresh copy in NEW.
 */
export enum GameState {
  NEW = 0,
  READY = 1,
  START1A = 5,   // first initial settlement
  START1B = 6,   // first initial road or ship
  START2A = 10,
  START2B = 11,
  START3A = 12,  // third initial settlement, some scenarios only
  START3B = 13,
  ROLL_OR_CARD = 15,
  PLAY1 = 20,
  PLACING_ROAD = 30,
  PLACING_SETTLEMENT = 31,
  PLACING_CITY = 32,
  PLACING_ROBBER = 33,
  PLACING_PIRATE = 34,
  PLACING_SHIP = 35,
  PLACING_FREE_ROAD1 = 40,
  PLACING_FREE_ROAD2 = 41,
  PLACING_INV_ITEM = 42,
  WAITING_FOR_DISCARDS = 50,
  WAITING_FOR_ROB_CHOOSE_PLAYER = 51,
  WAITING_FOR_DISCOVERY = 52,
  WAITING_FOR_MONOPOLY = 53,
  WAITING_FOR_ROBBER_OR_PIRATE = 54,
  WAITING_FOR_ROB_CLOTH_OR_RESOURCE = 55,
  WAITING_FOR_PICK_GOLD_RESOURCE = 56,
  SPECIAL_BUILDING = 100,
  OVER = 1000,
  RESET_OLD = 1001,
}

export const MAX_PLAYERS_STANDARD = 4;
export const MAX_PLAYERS_6PL = 6;
export const VP_WINNER_STANDARD = 10;

/*
 * Resource types; also the indices into a ResourceSet.
 */
export enum Resource {
  CLAY = 1,
  ORE = 2,
  SHEEP = 3,
  WHEAT = 4,
  WOOD = 5,
  UNKNOWN = 6,
}

export const KNOWN_RESOURCES: readonly Resource[] = [
  Resource.CLAY, Resource.ORE, Resource.SHEEP, Resource.WHEAT, Resource.WOOD,
];

/*
 * index of gold-hex gains in per-player roll stats
 */
export const GOLD_LOCAL = 6;

export enum PieceType {
  ROAD = 0,
  SETTLEMENT = 1,
  CITY = 2,
  SHIP = 3,
  FORTRESS = 4,
  VILLAGE = 5,
}

/*
 * Pieces each player starts with.
 */
export const PIECE_STOCK: Readonly<Record<number, number>> = {
  [PieceType.ROAD]: 15,
  [PieceType.SETTLEMENT]: 5,
  [PieceType.CITY]: 4,
  [PieceType.SHIP]: 15,
};

/*
 * Development card types.
 *
 * Victory-point cards (CAP through CHAPEL) are never played, only kept.
 */
export enum DevCard {
  UNKNOWN = 0,
  ROADS = 1,
  DISC = 2,
  MONO = 3,
  CAP = 4,
  MARKET = 5,
  UNIV = 6,
  TEMP = 7,
  CHAPEL = 8,
  KNIGHT = 9,
}

export function is_vp_card(ctype: number): boolean {
  return ctype >= DevCard.CAP && ctype <= DevCard.CHAPEL;
}

/*
 * Before the renumbering at version 2000, knights were 0 and unknown cards 9.
 */
export const DEV_CARD_VERSION_FOR_NEW_TYPES = 2000;
export const KNIGHT_FOR_VERS_1_X = 0;
export const UNKNOWN_FOR_VERS_1_X = 9;

/*
 * Hex types on the board, as stored in a hex layout.
 */
export enum Hex {
  WATER = 0,
  CLAY = 1,
  ORE = 2,
  SHEEP = 3,
  WHEAT = 4,
  WOOD = 5,
  DESERT = 6,
  GOLD = 7,
  FOG = 8,
}

/*
 * Board encoding formats.
 */
export enum BoardEncoding {
  ORIGINAL = 1,
  SIX_PLAYER = 2,
  LARGE = 3,
}

export enum SeatLock {
  UNLOCKED,
  LOCKED,
  CLEAR_ON_RESET,
}
