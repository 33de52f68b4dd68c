/*
 * Client session state: everything the dispatcher reads or changes that
 * outlives a single message.
 *
 * One session serves both connections, remote and practice.  State that
 * differs between them (server capabilities, option negotiation, the game
 * list) is kept per connection and looked up by the `is_practice` flag every
 * message arrives with.
 */

import { Game } from '../lib/game/game'

import { ServerCapabilities } from './capabilities'
import { ServerGametypeInfo } from './gametype-info'
import { ClientDisplay, Listener } from './listener'
import { TaskQueue } from './task-queue'

import * as options from '../options'
import log from '../utils/logger'

/*
 * the outbound side of both connections
 */
export interface Net {
  put(text: string, is_practice: boolean): void;
  disconnect(is_practice: boolean): void;
}

/*
 * makes the UI observer for a newly joined game; null if there is none
 */
export type ListenerFactory = (game: Game, is_practice: boolean) => Listener | null;

/*
 * replies to our option requests that a watchdog waits on
 */
export type PendingReply = 'infos' | 'defaults';

export class ClientSession {
  // our nickname, once the server has accepted one
  nickname: string | null = null;
  // face we last chose; we ask for it again when sitting down
  last_face_id: number = options.default_face_id;
  in_debug_mode: boolean = false;

  games = new Map<string, Game>();
  listeners = new Map<string, Listener>();

  // channel name -> members
  channels = new Map<string, Set<string>>();

  // listed games, name -> packed options; the remote list is null until the
  // server first sends one
  server_games: Map<string, string | null> | null = null;
  practice_games = new Map<string, string | null>();

  remote_info = new ServerGametypeInfo();
  practice_info = new ServerGametypeInfo();

  remote_caps: ServerCapabilities = ServerCapabilities.unknown();
  readonly practice_caps: ServerCapabilities = ServerCapabilities.practice();

  // told whenever we send a request in PendingReply
  watch: ((what: PendingReply, is_practice: boolean) => void) | null = null;

  constructor(
    readonly display: ClientDisplay,
    readonly net: Net,
    readonly make_listener: ListenerFactory,
    readonly ui: TaskQueue = new TaskQueue(),
  ) {}

  caps(is_practice: boolean): ServerCapabilities {
    return is_practice ? this.practice_caps : this.remote_caps;
  }

  gametype(is_practice: boolean): ServerGametypeInfo {
    return is_practice ? this.practice_info : this.remote_info;
  }

  /*
   * the game list for a connection, creating the remote one if need be
   */
  listings(is_practice: boolean): Map<string, string | null> {
    if (is_practice) return this.practice_games;
    return this.server_games ??= new Map();
  }

  put(text: string, is_practice: boolean) {
    this.net.put(text, is_practice);
  }

  /*
   * send a request, and have its reply watched for
   */
  request(text: string, what: PendingReply, is_practice: boolean) {
    this.net.put(text, is_practice);
    this.watch?.(what, is_practice);
  }

  /*
   * post a display update to the UI queue
   */
  post(fn: (display: ClientDisplay) => void) {
    this.ui.post(() => fn(this.display));
  }

  ///////////////////////////////////////////////////////////////////////////
  /*
   * game lifecycle
   */

  game(name: string): Game | null {
    return this.games.get(name) ?? null;
  }

  listener(name: string): Listener | null {
    return this.listeners.get(name) ?? null;
  }

  /*
   * register a joined game, and its listener if it has one
   */
  add_game(game: Game, listener: Listener | null) {
    this.games.set(game.name, game);
    if (listener !== null) {
      this.listeners.set(game.name, listener);
    } else {
      this.listeners.delete(game.name);
    }
  }

  /*
   * swap in a new replica under the same name, keeping the listener
   */
  replace_game(game: Game) {
    this.games.set(game.name, game);
  }

  remove_game(name: string) {
    this.games.delete(name);
    this.listeners.delete(name);
  }

  /*
   * the remote server has cut us off: tell every remote game, drop the
   * connection, and report `reason`
   */
  shutdown_from_network(reason: string) {
    log.warn('remote connection shut down', {reason});
    for (const [name, game] of [...this.games]) {
      if (game.is_practice) continue;
      this.listener(name)?.gameDisconnected(false, reason);
      this.remove_game(name);
    }
    this.net.disconnect(false);
    this.post(d => d.showErrorPanel(reason, true));
  }
}
