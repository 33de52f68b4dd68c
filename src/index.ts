/*
 * Public surface of the client core.
 */

export { GameClient } from './client/client'
export { Dispatcher } from './client/dispatcher'
export { ClientSession } from './client/session'
export type { ListenerFactory, Net, PendingReply } from './client/session'
export type { ClientDisplay, Listener } from './client/listener'
export { UpdateType } from './client/listener'
export { ServerCapabilities, FeatureSet } from './client/capabilities'
export { ServerGametypeInfo } from './client/gametype-info'
export { TaskQueue } from './client/task-queue'
export {
  ClientNet, PracticePipe, WebSocketTransport, open_ws,
} from './client/net'
export type { PracticeServer, Socket, SocketEvents, SocketOpener } from './client/net'
export { NegotiationWatchdog } from './client/watchdog'

export { decode } from './protocol/decode'
export * as encode from './protocol/encode'
export * as M from './protocol/message'

export { Game } from './lib/game/game'
export { Player } from './lib/game/player'
export { Board } from './lib/game/board'
export { ResourceSet } from './lib/game/resources'
export { Inventory, ItemState } from './lib/game/inventory'
export { OptionSet, parse_options } from './lib/game/game-options'
export { ScenarioSet } from './lib/game/scenarios'
export { Replica } from './lib/game/errors'
export * from './lib/game/constants'
