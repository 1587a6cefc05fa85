import type { Connection } from './connection.js'
import type { Registry } from './registry.js'
import type { FileRelay } from '../transfer/relay.js'
import type { RelayCommand } from '../protocol/types.js'
import { logNow, type EventSink } from '../log.js'
import { validateIdentity } from '../identity.js'
import { AuthError, ProtocolError, RelayError, RoutingError } from '../errors.js'
import { notices, parseCommand, INVALID_USERNAME, NO_PENDING_OFFER } from '../protocol/messages.js'
import { errorMessage } from '../utils.js'

export interface RouterConfig {
  registry: Registry<Connection>
  relay: FileRelay
  log: EventSink
  authTimeoutMs?: number
}

const DEFAULT_AUTH_TIMEOUT_MS = 60_000

/**
 * Runs the command loop of each connection: authenticate, dispatch commands
 * in arrival order, tear down. One serve() call per connection; the router
 * itself holds no per-connection state.
 */
export class Router {
  private registry: Registry<Connection>
  private relay: FileRelay
  private log: EventSink
  private authTimeoutMs: number

  constructor(config: RouterConfig) {
    this.registry = config.registry
    this.relay = config.relay
    this.log = config.log
    this.authTimeoutMs = config.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS
  }

  async serve(connection: Connection): Promise<void> {
    connection.beginAuthentication()

    let identity: string | null
    try {
      identity = await this.authenticate(connection)
    } catch (err) {
      connection.markClosing()
      if (err instanceof AuthError) {
        await connection.notify(err.message)
        this.event(`Rejected ${connection.peerAddress}: ${err.message}`)
      } else {
        this.event(`Authentication from ${connection.peerAddress} failed: ${errorMessage(err)}`)
      }
      await connection.close()
      return
    }

    if (identity === null) {
      connection.markClosing()
      await connection.close()
      return
    }

    try {
      await this.commandLoop(connection, identity)
    } catch (err) {
      this.event(`Connection ${identity} dropped: ${errorMessage(err)}`)
    } finally {
      await this.teardown(connection, identity)
    }
  }

  // Resolves the registered identity, or null when the peer went away first.
  private async authenticate(connection: Connection): Promise<string | null> {
    const frame = await connection.read({ timeoutMs: this.authTimeoutMs })
    if (!frame || frame.kind !== 'text') return null

    const identity = frame.text.trim()
    if (validateIdentity(identity) !== null) {
      throw new AuthError(INVALID_USERNAME)
    }
    if (!this.registry.tryRegister(identity, connection)) {
      throw new AuthError(notices.usernameTaken(identity))
    }

    try {
      connection.activate(identity)
    } catch (err) {
      this.registry.deregister(identity, connection)
      throw err
    }
    this.event(`${identity} connected from ${connection.peerAddress}`)

    await connection.notify(notices.welcome(identity))
    await this.broadcast(connection, notices.joined(identity))
    return identity
  }

  private async commandLoop(connection: Connection, identity: string): Promise<void> {
    for (;;) {
      const frame = await connection.read()
      if (!frame) {
        this.event(`${identity} disconnected`)
        return
      }
      if (frame.kind === 'data') continue  // stray chunk outside a transfer

      const line = frame.text.trim()
      if (!line) continue
      this.event(`[${identity}] ${line}`)

      try {
        const command = parseCommand(line)
        if (command && !(await this.dispatch(connection, identity, command))) {
          return
        }
      } catch (err) {
        if (!(err instanceof RelayError) || err.kind === 'transport') throw err
        await connection.notify(err.message)
      }
    }
  }

  // Returns false once the connection asked to leave.
  private async dispatch(connection: Connection, identity: string, command: RelayCommand): Promise<boolean> {
    switch (command.type) {
      case 'list':
        await connection.sendText(notices.activeUsers(this.registry.listIdentities()))
        return true

      case 'direct':
        await this.sendDirect(connection, identity, command.target, command.text)
        return true

      case 'sendfile':
        await this.relay.relay({
          sender: connection,
          recipient: command.target,
          filename: command.filename,
          size: command.size
        })
        return true

      case 'respond':
        if (!this.relay.respond(connection, command.accept, command.transferId)) {
          throw new ProtocolError(NO_PENDING_OFFER)
        }
        return true

      case 'quit':
        await connection.notify(notices.goodbye(identity))
        this.event(`${identity} quit`)
        return false

      case 'broadcast':
        await this.broadcast(connection, notices.broadcast(identity, command.text))
        return true
    }
  }

  private async sendDirect(connection: Connection, identity: string, target: string, text: string): Promise<void> {
    const recipient = this.registry.lookup(target)
    if (!recipient || !recipient.isActive) {
      throw new RoutingError(notices.userNotFound(target))
    }
    if (!(await recipient.notify(notices.privateIn(identity, text)))) {
      throw new RoutingError(notices.userNotFound(target))
    }
    await connection.sendText(notices.privateOut(target, text))
  }

  /** Delivers to every Active connection except `from`, in registry order. */
  private async broadcast(from: Connection, message: string): Promise<void> {
    const targets = this.registry.snapshot().filter(({ member }) => member !== from && member.isActive)
    await Promise.all(targets.map(async ({ identity, member }) => {
      try {
        if (!(await member.notify(message))) this.event(`Broadcast to ${identity} failed`)
      } catch (err) {
        this.event(`Broadcast to ${identity} failed: ${errorMessage(err)}`)
      }
    }))
    this.event(`Broadcast: ${message}`)
  }

  private async teardown(connection: Connection, identity: string): Promise<void> {
    connection.markClosing()
    this.relay.cancelOffersTo(connection)
    this.registry.deregister(identity, connection)
    await this.broadcast(connection, notices.left(identity))
    await connection.close()
    this.event(`${identity} removed (${this.registry.size} online)`)
  }

  private event(message: string): void {
    logNow(this.log, message)
  }
}
