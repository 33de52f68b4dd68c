/*
 * The dispatcher: the single way in from either connection.
 *
 * Every decoded message is routed by its kind to exactly one handler.  The
 * handler table is keyed on the full set of kinds, so a kind without a
 * handler fails to compile.
 */

import * as M from '../protocol/message'
import { decode } from '../protocol/decode'

import { Context, HandlerTable } from './handlers/common'
import * as board from './handlers/board'
import * as cards from './handlers/cards'
import * as channels from './handlers/channels'
import * as connection from './handlers/connection'
import * as elements from './handlers/elements'
import * as lobby from './handlers/lobby'
import * as membership from './handlers/membership'
import * as negotiation from './handlers/negotiation'
import * as prompts from './handlers/prompts'
import * as reset from './handlers/reset'
import * as trade from './handlers/trade'
import * as turn from './handlers/turn'
import { ClientSession } from './session'

import * as options from '../options'
import log from '../utils/logger'

const handlers: HandlerTable = {
  ...connection.handlers,
  ...channels.handlers,
  ...lobby.handlers,
  ...negotiation.handlers,
  ...membership.handlers,
  ...board.handlers,
  ...turn.handlers,
  ...elements.handlers,
  ...prompts.handlers,
  ...trade.handlers,
  ...cards.handlers,
  ...reset.handlers,
};

function run<K extends M.Kind>(cx: Context, kind: K, msg: M.MessageMap[K]) {
  const handler: HandlerTable[K] = handlers[kind];
  handler(cx, msg);
}

export class Dispatcher {
  constructor(readonly session: ClientSession) {}

  /*
   * Apply one message from the practice or remote connection.
   *
   * A null message (one the decoder didn't recognize) is ignored.  A fault
   * in a handler is logged and dropped; the next message is processed as
   * usual.
   */
  handle(msg: M.Message | null, is_practice: boolean) {
    if (msg === null) return;

    if (options.debug_traffic) {
      log.debug('dispatch', {is_practice, msg});
    }
    try {
      run({session: this.session, is_practice}, msg.kind, msg);
    } catch (err) {
      log.error('message handler failed', {
        kind: msg.kind,
        game: 'game' in msg ? msg.game : null,
        is_practice,
        err,
      });
    }
  }

  /*
   * decode and apply one line of wire text
   */
  handle_line(line: string, is_practice: boolean) {
    this.handle(decode(line), is_practice);
  }
}
