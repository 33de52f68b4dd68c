/*
 * Board layout and pieces.
 */

import { GameState, PieceType } from '../../lib/game/constants'
import { Piece } from '../../lib/game/board'

import * as M from '../../protocol/message'

import { HandlerTable, per_game, seat } from './common'

// states where the current player may take back their initial piece
const CANCELABLE_INIT_STATES: readonly number[] = [
  GameState.START1B, GameState.START2B, GameState.START3B,
];

export const handlers = {
  /*
   * the legacy layout always arrives in the original fixed-size encoding
   */
  board_layout: per_game((cx, ga, l, m: M.BoardLayout) => {
    ga.board.set_legacy_layout(m.hexes, m.numbers, m.robber);
    l?.boardLayoutUpdated();
  }),

  board_layout2: per_game((cx, ga, l, m: M.BoardLayout2) => {
    if (ga.board.set_layout_parts(m.bef, m.parts)) l?.boardLayoutUpdated();
  }),

  put_piece: per_game((cx, ga, l, m: M.PutPiece) => {
    ga.put_piece({ptype: m.ptype, pn: m.pn, coord: m.coord, value: 0});
    const player = seat(ga, m.pn);
    if (player !== null) l?.playerPiecePlaced(player, m.coord, m.ptype);
  }),

  move_piece: per_game((cx, ga, l, m: M.MovePiece) => {
    ga.move_piece(m.ptype, m.from, m.to);
    l?.playerPieceMoved(ga.player(m.pn), m.from, m.to, m.ptype);
  }),

  remove_piece: per_game((cx, ga, l, m: M.RemovePiece) => {
    ga.remove_piece(m.ptype, m.coord);
    l?.playerPieceRemoved(ga.player(m.pn), m.coord, m.ptype);
  }),

  /*
   * the current player took back a piece they were placing.  during initial
   * placement that can be the settlement they just put down
   */
  cancel_build_request: per_game((cx, ga, l, m: M.CancelBuildRequest) => {
    const player = seat(ga, ga.current_player);
    if (player === null) return;

    if (m.ptype >= PieceType.SETTLEMENT) {
      if (!CANCELABLE_INIT_STATES.includes(ga.state)) return;
      if (m.ptype === PieceType.SETTLEMENT) ga.undo_put_init_settlement(player.pn);
    }
    l?.buildRequestCanceled(player);
  }),

  // coordinates of 0 or less are the pirate ship's, negated
  move_robber: per_game((cx, ga, l, m: M.MoveRobber) => {
    const is_pirate = m.coord <= 0;
    const hex = is_pirate ? -m.coord : m.coord;
    if (is_pirate) {
      ga.board.set_pirate_hex(hex);
    } else {
      ga.board.set_robber_hex(hex);
    }
    l?.robberMoved(hex, is_pirate);
  }),

  potential_settlements: per_game((cx, ga, l, m: M.PotentialSettlements) => {
    const players = m.pn === -1 ? ga.players : [ga.player(m.pn)];
    for (const p of players) p.potential_settlements = new Set(m.nodes);
    l?.boardPotentialsUpdated();
  }),

  last_settlement: per_game((cx, ga, l, m: M.LastSettlement) => {
    ga.player(m.pn).last_settlement_coord = m.coord;
  }),

  reveal_fog_hex: per_game((cx, ga, l, m: M.RevealFogHex) => {
    if (!ga.has_sea_board()) return;
    ga.board.reveal_fog_hex(m.hex, m.htype, m.dice);
    l?.boardUpdated();
  }),

  /*
   * cloth at a village, or a pirate fortress's strength
   */
  piece_value: per_game((cx, ga, l, m: M.PieceValue) => {
    if (!ga.has_sea_board()) return;

    let piece: Piece | null = null;
    if (ga.option_bool('_SC_CLVI')) {
      piece = ga.board.node_piece(m.coord);
      if (piece?.ptype !== PieceType.VILLAGE) piece = null;
    } else if (ga.option_bool('_SC_PIRI')) {
      piece = ga.board.node_piece(m.coord);
      if (piece?.ptype !== PieceType.FORTRESS) piece = null;
    }
    if (piece === null) return;

    piece.value = m.value;
    l?.pieceValueUpdated(piece);
  }),

  debug_free_place: per_game((cx, ga, l, m: M.DebugFreePlace) => {
    ga.debug_free_placement = m.coord === 1;
    l?.debugFreePlaceModeToggled(ga.debug_free_placement);
  }),
} satisfies Partial<HandlerTable>;
