import { EventEmitter } from 'node:events'
import assert from 'node:assert/strict'
import b4a from 'b4a'
import { Connection, type Transport } from '../src/relay/connection.js'
import { Registry } from '../src/relay/registry.js'
import { Router } from '../src/relay/router.js'
import { FileRelay } from '../src/transfer/relay.js'
import { notices } from '../src/protocol/messages.js'
import { dataFrame } from '../src/protocol/frame.js'
import type { Frame } from '../src/protocol/types.js'
import type { EventSink } from '../src/log.js'

/**
 * In-memory stand-in for a connected net.Socket. Bytes and FIN reach the
 * peer on a later turn of the event loop; receiving FIN ends the local side
 * too, like a socket without allowHalfOpen.
 */
export class FakeSocket extends EventEmitter implements Transport {
  readonly remoteAddress: string
  peer: FakeSocket | null = null
  failWrites = false
  bytesWritten = 0
  private ended = false
  private peerEnded = false
  private destroyed = false
  private flowPaused = false

  constructor(remoteAddress: string) {
    super()
    this.remoteAddress = remoteAddress
  }

  get isDestroyed(): boolean {
    return this.destroyed
  }

  // Only recorded; delivery carries on so tests can see when a reader asked to stop.
  get isPaused(): boolean {
    return this.flowPaused
  }

  pause(): void {
    this.flowPaused = true
  }

  resume(): void {
    this.flowPaused = false
  }

  write(data: Uint8Array, cb: (err?: Error | null) => void): boolean {
    if (this.destroyed || this.ended || this.failWrites) {
      setImmediate(() => cb(new Error('write EPIPE')))
      return false
    }
    const copy = b4a.from(data)
    this.bytesWritten += copy.byteLength
    const peer = this.peer
    setImmediate(() => {
      peer?.receive(copy)
      cb()
    })
    return true
  }

  end(): void {
    if (this.ended || this.destroyed) return
    this.ended = true
    const peer = this.peer
    setImmediate(() => peer?.receiveEnd())
    this.maybeClose()
  }

  destroy(): void {
    if (this.destroyed) return
    this.destroyed = true
    const peer = this.peer
    setImmediate(() => {
      this.emit('close')
      peer?.receiveReset()
    })
  }

  /** Delivers raw bytes as if the peer wrote them. */
  inject(bytes: Uint8Array): void {
    setImmediate(() => this.receive(b4a.from(bytes)))
  }

  private receive(chunk: Buffer): void {
    if (this.destroyed) return
    this.emit('data', chunk)
  }

  private receiveEnd(): void {
    if (this.destroyed || this.peerEnded) return
    this.peerEnded = true
    this.emit('end')
    this.end()
    this.maybeClose()
  }

  private receiveReset(): void {
    if (this.destroyed) return
    if (!this.peerEnded) {
      this.peerEnded = true
      this.emit('end')
    }
    this.destroy()
  }

  private maybeClose(): void {
    if (!this.ended || !this.peerEnded || this.destroyed) return
    this.destroyed = true
    setImmediate(() => this.emit('close'))
  }
}

export function socketPair(clientAddress = '127.0.0.1:40000', serverAddress = '127.0.0.1:5000'): [FakeSocket, FakeSocket] {
  const client = new FakeSocket(serverAddress)
  const server = new FakeSocket(clientAddress)
  client.peer = server
  server.peer = client
  return [client, server]
}

export interface MemoryLog {
  sink: EventSink
  events: string[]
}

export function memoryLog(): MemoryLog {
  const events: string[] = []
  return { sink: (event) => { events.push(event) }, events }
}

/** Frame-level client used to drive the server side in tests. */
export class TestPeer {
  readonly connection: Connection
  readonly socket: FakeSocket

  constructor(socket: FakeSocket) {
    this.socket = socket
    this.connection = new Connection(socket)
  }

  say(text: string): Promise<void> {
    return this.connection.sendText(text)
  }

  sendData(data: Uint8Array): Promise<void> {
    return this.connection.send(dataFrame(data))
  }

  async next(timeoutMs = 2000): Promise<Frame | null> {
    return this.connection.read({ timeoutMs })
  }

  async expectText(timeoutMs = 2000): Promise<string> {
    const frame = await this.next(timeoutMs)
    if (!frame) throw new Error('Connection closed while waiting for text')
    if (frame.kind !== 'text') throw new Error(`Expected text, got ${frame.data.byteLength} data bytes`)
    return frame.text
  }

  async expectData(timeoutMs = 2000): Promise<Buffer> {
    const frame = await this.next(timeoutMs)
    if (!frame) throw new Error('Connection closed while waiting for data')
    if (frame.kind !== 'data') throw new Error(`Expected data, got text "${frame.text}"`)
    return frame.data
  }

  /** Resolves true once the server side has closed the stream. */
  async expectClosed(timeoutMs = 2000): Promise<boolean> {
    const frame = await this.next(timeoutMs)
    return frame === null
  }

  close(): Promise<void> {
    return this.connection.close()
  }
}

export function pattern(size: number, seed = 7): Buffer {
  const data = b4a.alloc(size)
  for (let i = 0; i < size; i++) data[i] = (i * 31 + seed) % 256
  return data
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export interface HarnessOptions {
  offerTimeoutMs?: number
  idleTimeoutMs?: number
  authTimeoutMs?: number
}

/** Registry, relay and router wired together, served over in-memory sockets. */
export class Harness {
  readonly log = memoryLog()
  readonly registry = new Registry<Connection>()
  readonly relay: FileRelay
  readonly router: Router
  readonly tasks: Promise<void>[] = []
  private clients = 0

  constructor(options: HarnessOptions = {}) {
    this.relay = new FileRelay({
      registry: this.registry,
      log: this.log.sink,
      offerTimeoutMs: options.offerTimeoutMs ?? 1000,
      idleTimeoutMs: options.idleTimeoutMs ?? 1000
    })
    this.router = new Router({
      registry: this.registry,
      relay: this.relay,
      log: this.log.sink,
      authTimeoutMs: options.authTimeoutMs ?? 1000
    })
  }

  /** Serves a new in-memory connection and returns the client end. */
  connectSocket(): FakeSocket {
    this.clients++
    const [client, server] = socketPair(`127.0.0.1:${40000 + this.clients}`)
    this.tasks.push(this.router.serve(new Connection(server)))
    return client
  }

  connect(): TestPeer {
    return new TestPeer(this.connectSocket())
  }

  async login(identity: string): Promise<TestPeer> {
    const peer = this.connect()
    await peer.say(identity)
    assert.equal(await peer.expectText(), notices.welcome(identity))
    return peer
  }

  settled(): Promise<void[]> {
    return Promise.all(this.tasks)
  }
}
