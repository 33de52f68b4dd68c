/*
 * The replica's board: hex and number layouts, robber and pirate, and every
 * placed piece.
 *
 * Three layout encodings exist.  The two small fixed-size encodings (ORIGINAL
 * and SIX_PLAYER) address hexes by index into a flat hex layout; the LARGE
 * encoding is a sparse set of land hexes plus named layout parts that vary by
 * scenario.
 */

import { BoardEncoding, Hex, PieceType } from './constants'

import log from '../../utils/logger'

/*
 * number of hexes in the original fixed layout
 */
export const ORIGINAL_HEX_COUNT = 37;

/*
 * In the legacy layout message, water and desert trade places (water is sent
 * as 6, desert as 0), and dice numbers are sent as indices into this table,
 * with -1 meaning no number.
 */
const SENT_NUM_TO_DICE = [2, 3, 4, 5, 6, 8, 9, 10, 11, 12];

export function sent_hex_to_board(h: number): number {
  if (h === 6) return Hex.WATER;
  if (h === 0) return Hex.DESERT;
  return h;
}

export function sent_num_to_board(n: number): number {
  return SENT_NUM_TO_DICE[n] ?? 0;
}

export type LayoutPart = number | number[] | string;

export type Piece = {
  ptype: PieceType;
  // -1 for pieces owned by nobody (villages, unowned fortresses)
  pn: number;
  coord: number;
  // village cloth, or fortress strength
  value: number;
};

function is_edge_piece(ptype: PieceType): boolean {
  return ptype === PieceType.ROAD || ptype === PieceType.SHIP;
}

export class Board {
  encoding: BoardEncoding;

  hex_layout: number[] = [];
  number_layout: number[] = [];
  // LARGE only: triples of (coord, hex type, dice number)
  land_hex_layout: number[] = [];
  port_layout: number[] = [];

  robber_hex: number = 0;
  prev_robber_hex: number = 0;
  pirate_hex: number = 0;
  prev_pirate_hex: number = 0;

  // general cloth supply, for the cloth trade scenario
  cloth: number = 0;

  // layout parts we keep but don't interpret
  parts = new Map<string, LayoutPart>();

  revealed_hexes = new Map<number, {htype: number, dice: number}>();
  special_edges = new Map<number, number>();
  removed_ports: number[] = [];
  // ports placed during play, by edge
  placed_ports = new Map<number, number>();

  private nodes = new Map<number, Piece>();
  private edges = new Map<number, Piece>();

  constructor(encoding: BoardEncoding = BoardEncoding.ORIGINAL) {
    this.encoding = encoding;
  }

  /*
   * apply the legacy fixed-size layout, still in its sent encoding
   */
  set_legacy_layout(hexes: number[], numbers: number[], robber: number) {
    this.hex_layout = hexes.map(sent_hex_to_board);
    this.number_layout = numbers.map(sent_num_to_board);
    this.set_robber_hex(robber);
  }

  /*
   * apply a self-describing layout.  returns false (and changes nothing) if
   * the encoding is one we don't know or a required part is missing
   */
  set_layout_parts(bef: number, parts: Map<string, LayoutPart>): boolean {
    const ints = (k: string): number[] | null => {
      const v = parts.get(k);
      return Array.isArray(v) ? v : null;
    };
    const int = (k: string): number | null => {
      const v = parts.get(k);
      if (typeof v === 'number') return v;
      if (typeof v === 'string' && /^-?\d+$/.test(v)) return parseInt(v, 10);
      return null;
    };

    switch (bef) {
      case BoardEncoding.ORIGINAL:
      case BoardEncoding.SIX_PLAYER: {
        const hl = ints('HL');
        const nl = ints('NL');
        const rh = int('RH');
        if (hl === null || nl === null || rh === null) return false;

        this.encoding = bef;
        this.hex_layout = hl;
        this.number_layout = nl;
        this.port_layout = ints('PL') ?? this.port_layout;
        this.set_robber_hex(rh);
        return true;
      }
      case BoardEncoding.LARGE: {
        const lh = ints('LH');
        if (lh === null) return false;

        this.encoding = bef;
        this.land_hex_layout = lh;
        this.port_layout = ints('PL') ?? [];

        const rh = int('RH');
        if (rh !== null && rh !== 0) this.set_robber_hex(rh);
        const ph = int('PH');
        if (ph !== null && ph !== 0) this.set_pirate_hex(ph);

        const cv = ints('CV');
        if (cv !== null) this.set_village_layout(cv);

        for (const [k, v] of parts) {
          if (!['LH', 'PL', 'RH', 'PH', 'CV'].includes(k)) this.parts.set(k, v);
        }
        return true;
      }
      default:
        log.warn('unrecognized board encoding', {bef});
        return false;
    }
  }

  /*
   * CV part: general cloth supply, starting cloth per village, then pairs of
   * village node and dice number
   */
  private set_village_layout(cv: number[]) {
    if (cv.length < 2) return;
    this.cloth = cv[0];
    const per_village = cv[1];
    for (let i = 2; i + 1 < cv.length; i += 2) {
      this.nodes.set(cv[i], {
        ptype: PieceType.VILLAGE,
        pn: -1,
        coord: cv[i],
        value: per_village,
      });
    }
  }

  set_robber_hex(hex: number) {
    this.prev_robber_hex = this.robber_hex;
    this.robber_hex = hex;
  }

  set_pirate_hex(hex: number) {
    this.prev_pirate_hex = this.pirate_hex;
    this.pirate_hex = hex;
  }

  /*
   * place `piece`, replacing whatever was at its coordinate; returns the
   * replaced piece, if any
   */
  put_piece(piece: Piece): Piece | null {
    const map = is_edge_piece(piece.ptype) ? this.edges : this.nodes;
    const old = map.get(piece.coord) ?? null;
    map.set(piece.coord, piece);
    return old;
  }

  remove_piece(ptype: PieceType, coord: number): Piece | null {
    const map = is_edge_piece(ptype) ? this.edges : this.nodes;
    const old = map.get(coord);
    if (old === undefined || old.ptype !== ptype) return null;
    map.delete(coord);
    return old;
  }

  move_piece(ptype: PieceType, from: number, to: number): Piece | null {
    const p = this.remove_piece(ptype, from);
    if (p === null) return null;
    const moved = {...p, coord: to};
    this.put_piece(moved);
    return moved;
  }

  node_piece(coord: number): Piece | null {
    return this.nodes.get(coord) ?? null;
  }

  edge_piece(coord: number): Piece | null {
    return this.edges.get(coord) ?? null;
  }

  reveal_fog_hex(hex: number, htype: number, dice: number) {
    this.revealed_hexes.set(hex, {htype, dice});
  }

  set_special_edge(edge: number, etype: number) {
    if (etype === 0) {
      this.special_edges.delete(edge);
    } else {
      this.special_edges.set(edge, etype);
    }
  }

  remove_port(edge: number) {
    this.placed_ports.delete(edge);
    this.removed_ports.push(edge);
  }

  place_port(edge: number, ptype: number) {
    const i = this.removed_ports.indexOf(edge);
    if (i >= 0) this.removed_ports.splice(i, 1);
    this.placed_ports.set(edge, ptype);
  }
}
