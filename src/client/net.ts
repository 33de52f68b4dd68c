/*
 * The two connections: a websocket to a remote server, and an in-memory pipe
 * to a practice server running in this process.
 *
 * Both carry one wire message per line of text, and both hand what they
 * receive to the same sink, tagged with which connection it came in on.
 */

import WebSocket from 'ws'

import { Net } from './session'

import * as options from '../options'
import log from '../utils/logger'

/*
 * websocket close code for a close we asked for; nothing to reconnect
 */
export const CLOSE_NORMAL = 1000;

export type LineSink = (line: string, is_practice: boolean) => void;

///////////////////////////////////////////////////////////////////////////////
/*
 * remote
 */

export type SocketEvents = {
  open: () => void;
  message: (text: string) => void;
  close: (code: number) => void;
  error: (err: Error) => void;
};

/*
 * the part of a websocket we use
 */
export interface Socket {
  send(text: string): void;
  close(code: number): void;
  readonly is_open: boolean;
}

export type SocketOpener = (url: string, ev: SocketEvents) => Socket;

export const open_ws: SocketOpener = (url, ev) => {
  const ws = new WebSocket(url);

  ws.on('open', () => ev.open());
  ws.on('message', (data, is_binary) => {
    if (is_binary) {
      log.warn('ignoring binary frame', {url});
      return;
    }
    ev.message(data.toString());
  });
  ws.on('close', code => ev.close(code));
  ws.on('error', err => ev.error(err));

  return {
    send: text => ws.send(text),
    close: code => ws.close(code),
    get is_open() { return ws.readyState === WebSocket.OPEN; },
  };
};

export class WebSocketTransport {
  socket: Socket | null = null;

  // exponential backoff delay for reconnecting; in milliseconds
  reconnect_delay: number;

  private closed: boolean = false;
  private timer: ReturnType<typeof setTimeout> | null = null;

  /*
   * @param on_open  called on every (re)connect, before any message
   */
  constructor(
    readonly url: string,
    private sink: LineSink,
    private on_open: () => void,
    private opener: SocketOpener = open_ws,
    readonly initial_delay: number = options.reconnect_delay,
    readonly max_delay: number = options.reconnect_delay_max,
  ) {
    this.reconnect_delay = initial_delay;
  }

  connect() {
    this.closed = false;
    this.socket = this.opener(this.url, {
      open: () => {
        this.reconnect_delay = this.initial_delay;
        this.on_open();
      },
      message: text => this.sink(text, false),
      close: code => this.on_close(code),
      error: err => log.warn('websocket error', {url: this.url, err: err.message}),
    });
  }

  send(text: string) {
    if (this.socket === null || !this.socket.is_open) {
      log.warn('dropping message; not connected', {url: this.url, text});
      return;
    }
    this.socket.send(text);
  }

  close() {
    this.closed = true;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.socket?.close(CLOSE_NORMAL);
    this.socket = null;
  }

  private on_close(code: number) {
    this.socket = null;
    if (code === CLOSE_NORMAL || this.closed) return;

    log.info('connection lost; reconnecting', {
      url: this.url, code, delay: this.reconnect_delay,
    });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.reconnect_delay = Math.min(this.reconnect_delay * 2, this.max_delay);
      this.connect();
    }, this.reconnect_delay);
  }
}

///////////////////////////////////////////////////////////////////////////////
/*
 * practice
 */

/*
 * a server living in this process
 */
export interface PracticeServer {
  // `send` delivers a line to the client
  connect(send: (line: string) => void): void;
  receive(line: string): void;
  disconnect(): void;
}

/*
 * Lines go through the pipe on a microtask, never synchronously, so that
 * neither side sees the other's reply before its own call has returned.
 */
export class PracticePipe {
  private open: boolean = true;

  constructor(
    readonly server: PracticeServer,
    private sink: LineSink,
  ) {
    server.connect(line => queueMicrotask(() => {
      if (this.open) this.sink(line, true);
    }));
  }

  get is_open(): boolean {
    return this.open;
  }

  send(text: string) {
    if (!this.open) {
      log.warn('dropping message; practice pipe closed', {text});
      return;
    }
    queueMicrotask(() => this.server.receive(text));
  }

  close() {
    if (!this.open) return;
    this.open = false;
    this.server.disconnect();
  }
}

///////////////////////////////////////////////////////////////////////////////

/*
 * routes outbound text to whichever connection it's meant for
 */
export class ClientNet implements Net {
  remote: WebSocketTransport | null = null;
  practice: PracticePipe | null = null;

  put(text: string, is_practice: boolean) {
    const conn = is_practice ? this.practice : this.remote;
    if (conn === null) {
      log.warn('dropping message; no connection', {is_practice, text});
      return;
    }
    conn.send(text);
  }

  disconnect(is_practice: boolean) {
    if (is_practice) {
      this.practice?.close();
      this.practice = null;
    } else {
      this.remote?.close();
      this.remote = null;
    }
  }
}
