/*
 * The client: a session, its dispatcher, and the connections feeding it.
 */

import * as encode from '../protocol/encode'

import { Dispatcher } from './dispatcher'
import { ClientDisplay } from './listener'
import {
  ClientNet, PracticePipe, PracticeServer, SocketOpener, WebSocketTransport, open_ws,
} from './net'
import { ClientSession, ListenerFactory } from './session'
import { TaskQueue } from './task-queue'
import { NegotiationWatchdog } from './watchdog'

import * as options from '../options'
import log from '../utils/logger'

export class GameClient {
  readonly net = new ClientNet();
  readonly session: ClientSession;
  readonly dispatcher: Dispatcher;
  readonly watchdog: NegotiationWatchdog;

  constructor(
    display: ClientDisplay,
    make_listener: ListenerFactory,
    ui: TaskQueue = new TaskQueue(),
    negotiation_timeout: number = options.negotiation_timeout,
  ) {
    this.session = new ClientSession(display, this.net, make_listener, ui);
    this.dispatcher = new Dispatcher(this.session);
    this.watchdog = new NegotiationWatchdog(this.dispatcher, negotiation_timeout);

    this.session.watch = (what, is_practice) => {
      if (what === 'infos') {
        this.watchdog.arm_infos(is_practice);
      } else {
        this.watchdog.arm_defaults(is_practice);
      }
    };
  }

  private receive = (line: string, is_practice: boolean) => {
    this.dispatcher.handle_line(line, is_practice);
  };

  /*
   * our version report, sent first on every connection
   */
  private hello(is_practice: boolean) {
    this.net.put(encode.version(
      options.client_version,
      options.client_version_string,
      options.client_build,
      '',
      options.locale,
    ), is_practice);
  }

  /*
   * connect to a remote server at `url`
   */
  connect(url: string, opener: SocketOpener = open_ws): WebSocketTransport {
    this.net.disconnect(false);

    const transport = new WebSocketTransport(
      url, this.receive, () => this.hello(false), opener,
    );
    this.net.remote = transport;
    transport.connect();
    log.info('connecting', {url});
    return transport;
  }

  /*
   * start a practice connection to `server`
   */
  start_practice(server: PracticeServer): PracticePipe {
    this.net.disconnect(true);

    const pipe = new PracticePipe(server, this.receive);
    this.net.practice = pipe;
    this.hello(true);
    return pipe;
  }

  /*
   * ask for the server's option defaults ahead of creating a game
   */
  request_option_defaults(is_practice: boolean) {
    const info = this.session.gametype(is_practice);
    if (info.asked_defaults_already) return;

    info.asked_defaults_already = true;
    info.asked_defaults_time = Date.now();
    this.session.request(encode.game_option_get_defaults(), 'defaults', is_practice);
  }

  /*
   * ask about options we have no description of, or all the server's
   */
  request_option_infos(keys: readonly string[] | null, is_practice: boolean) {
    this.session.request(encode.game_option_get_infos(keys, false), 'infos', is_practice);
  }

  close() {
    this.watchdog.cancel_all();
    this.net.disconnect(false);
    this.net.disconnect(true);
  }
}
