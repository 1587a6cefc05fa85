import net from 'node:net'
import { Connection, type Transport } from './connection.js'
import { Registry } from './registry.js'
import { Router } from './router.js'
import { FileRelay } from '../transfer/relay.js'
import { SHUTDOWN_NOTICE } from '../protocol/messages.js'
import { logNow, type EventSink } from '../log.js'
import { errorMessage } from '../utils.js'

export interface RelayServerConfig {
  port: number
  host?: string
  log: EventSink
  offerTimeoutMs?: number
  transferIdleTimeoutMs?: number
  authTimeoutMs?: number
  shutdownGraceMs?: number
}

const DEFAULT_SHUTDOWN_GRACE_MS = 10_000

/**
 * Accepts connections and owns one handler task per connection. stop()
 * refuses new connections, lets in-flight transfers finish within the grace
 * period, then closes everything and waits for every task to end.
 */
export class RelayServer {
  readonly registry: Registry<Connection> = new Registry()
  readonly relay: FileRelay
  private router: Router
  private server: net.Server | null = null
  private tasks: Map<Connection, Promise<void>> = new Map()
  private config: RelayServerConfig
  private stopping = false

  constructor(config: RelayServerConfig) {
    this.config = config
    this.relay = new FileRelay({
      registry: this.registry,
      log: config.log,
      offerTimeoutMs: config.offerTimeoutMs,
      idleTimeoutMs: config.transferIdleTimeoutMs
    })
    this.router = new Router({
      registry: this.registry,
      relay: this.relay,
      log: config.log,
      authTimeoutMs: config.authTimeoutMs
    })
  }

  get connectionCount(): number {
    return this.tasks.size
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        socket.setNoDelay(true)
        this.accept(socket, `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`)
      })

      server.once('error', reject)
      server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        server.off('error', reject)
        server.on('error', (err) => this.event(`Server error: ${err.message}`))

        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        this.event(`Relay server listening on ${this.config.host ?? '0.0.0.0'}:${port}`)
        resolve(port)
      })
      this.server = server
    })
  }

  /** Hands a transport to a new handler task. Returns the task's connection. */
  accept(transport: Transport, peerAddress?: string): Connection {
    const connection = new Connection(transport, peerAddress)
    if (this.stopping) {
      void connection.shutdown(SHUTDOWN_NOTICE).catch((err: unknown) => {
        this.event(`Closing ${connection.peerAddress} failed: ${errorMessage(err)}`)
      })
      return connection
    }

    this.event(`New connection from ${connection.peerAddress}`)
    const task = this.router.serve(connection)
      .catch((err: unknown) => {
        this.event(`Handler for ${connection.label} failed: ${errorMessage(err)}`)
      })
      .finally(() => {
        this.tasks.delete(connection)
      })
    this.tasks.set(connection, task)
    return connection
  }

  async stop(): Promise<void> {
    if (this.stopping) return
    this.stopping = true
    this.event('Shutting down')

    const closed = this.closeListener()

    const grace = this.config.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS
    if (!(await this.relay.drain(grace))) {
      this.event(`${this.relay.activeCount} transfer(s) still running after ${grace}ms, closing anyway`)
    }

    await Promise.all(Array.from(this.tasks.keys(), conn => conn.shutdown(SHUTDOWN_NOTICE)))
    await Promise.all(this.tasks.values())
    await closed
    this.event('Server stopped')
  }

  private closeListener(): Promise<void> {
    const server = this.server
    this.server = null
    if (!server) return Promise.resolve()
    return new Promise((resolve) => {
      server.close(() => resolve())
    })
  }

  private event(message: string): void {
    logNow(this.config.log, message)
  }
}
