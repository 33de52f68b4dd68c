/*
 * Board reset and its vote.
 */

import * as M from '../../protocol/message'

import { HandlerTable, per_game } from './common'

export const handlers = {
  /*
   * the reset went through: swap in a fresh copy of the game.  the listener
   * stays, and is handed the new replica
   */
  reset_board_auth: per_game(({session}, ga, l, m: M.ResetBoardAuth) => {
    const fresh = ga.reset_as_copy();
    session.replace_game(fresh);
    l?.boardReset(fresh, m.rejoin_pn, m.requesting_pn);
  }),

  reset_board_vote_request: per_game((cx, ga, l, m: M.ResetBoardVoteRequest) => {
    l?.boardResetVoteRequested(ga.player(m.pn));
  }),

  reset_board_vote: per_game((cx, ga, l, m: M.ResetBoardVote) => {
    l?.boardResetVoteCast(ga.player(m.pn), m.vote);
  }),

  reset_board_reject: per_game((cx, ga, l, m: M.ResetBoardReject) => {
    l?.boardResetVoteRejected();
  }),
} satisfies Partial<HandlerTable>;
