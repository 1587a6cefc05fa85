import { EventEmitter } from 'node:events'
import { FrameDecoder, encodeFrame, textFrame } from '../protocol/frame.js'
import type { Frame, TextFrame } from '../protocol/types.js'
import { TransportError } from '../errors.js'
import { errorMessage } from '../utils.js'

/**
 * The parts of a byte stream a Connection needs. net.Socket satisfies it;
 * tests pass an in-memory pair.
 */
export interface Transport {
  readonly remoteAddress?: string | undefined
  write(data: Uint8Array, cb: (err?: Error | null) => void): boolean
  end(): void
  destroy(): void
  pause?(): void
  resume?(): void
  on(event: 'data', listener: (chunk: Buffer) => void): this
  on(event: 'end', listener: () => void): this
  on(event: 'close', listener: () => void): this
  on(event: 'error', listener: (err: Error) => void): this
}

export type ConnectionState = 'Connecting' | 'Authenticating' | 'Active' | 'Closing' | 'Closed'

export interface ReadOptions {
  timeoutMs?: number
  // Skip text frames (they are held for the next plain read) and return
  // only data frames.
  dataOnly?: boolean
}

interface PendingRead {
  dataOnly: boolean
  resolve: (frame: Frame | null) => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout> | null
}

// Frames queued before the socket is paused
const INBOUND_HIGH_WATER = 4
const HELD_HIGH_WATER = 32
const CLOSE_TIMEOUT_MS = 2000

const noop = (): void => {}

/**
 * One client endpoint. Exactly one handler reads from it; any handler may
 * write to it. Emits 'disconnect' once when the transport ends, fails or
 * closes.
 */
export class Connection extends EventEmitter {
  readonly peerAddress: string
  private transport: Transport
  private decoder = new FrameDecoder()
  private _identity: string | null = null
  private _state: ConnectionState = 'Connecting'
  private inbound: Frame[] = []
  private held: TextFrame[] = []
  private pendingRead: PendingRead | null = null
  private readEnded = false
  private failure: TransportError | null = null
  private transportClosed = false
  private paused = false
  private disconnected = false
  private writeChain: Promise<void> = Promise.resolve()

  constructor(transport: Transport, peerAddress?: string) {
    super()
    this.transport = transport
    this.peerAddress = peerAddress ?? transport.remoteAddress ?? 'unknown'

    transport.on('data', (chunk) => this.handleData(chunk))
    transport.on('end', () => this.handleEnd())
    transport.on('error', (err) => this.handleError(new TransportError(err.message)))
    transport.on('close', () => this.handleClose())
  }

  get identity(): string | null {
    return this._identity
  }

  get state(): ConnectionState {
    return this._state
  }

  get isActive(): boolean {
    return this._state === 'Active'
  }

  get isDisconnected(): boolean {
    return this.readEnded || this.transportClosed || this.failure !== null
  }

  get label(): string {
    return this._identity ?? this.peerAddress
  }

  beginAuthentication(): void {
    if (this._state === 'Connecting') this._state = 'Authenticating'
  }

  activate(identity: string): void {
    if (this._state !== 'Authenticating') {
      throw new Error(`Cannot activate connection in state ${this._state}`)
    }
    this._identity = identity
    this._state = 'Active'
  }

  markClosing(): void {
    if (this._state !== 'Closed') this._state = 'Closing'
  }

  // --- Inbound (single reader) ---

  read(options: ReadOptions = {}): Promise<Frame | null> {
    const dataOnly = options.dataOnly ?? false
    const ready = this.takeFrame(dataOnly)
    if (ready) return Promise.resolve(ready)
    if (this.failure) return Promise.reject(this.failure)
    if (this.readEnded) return Promise.resolve(null)
    if (this.pendingRead) {
      return Promise.reject(new Error(`Concurrent read on connection ${this.label}`))
    }

    return new Promise((resolve, reject) => {
      const pending: PendingRead = { dataOnly, resolve, reject, timer: null }
      if (options.timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          if (this.pendingRead === pending) this.pendingRead = null
          reject(new TransportError(`Timed out after ${options.timeoutMs}ms waiting for ${this.label}`))
        }, options.timeoutMs)
      }
      this.pendingRead = pending
    })
  }

  private takeFrame(dataOnly: boolean): Frame | null {
    let frame: Frame | null = dataOnly ? null : (this.held.shift() ?? null)
    while (!frame) {
      const next = this.inbound.shift()
      if (!next) break
      if (dataOnly && next.kind === 'text') {
        this.held.push(next)
      } else {
        frame = next
      }
    }
    this.updateFlow()
    return frame
  }

  // Text held back during a data read counts too, so a peer cannot grow it unbounded
  private updateFlow(): void {
    const backedUp = this.inbound.length >= INBOUND_HIGH_WATER || this.held.length >= HELD_HIGH_WATER
    if (backedUp && !this.paused && this.transport.pause) {
      this.paused = true
      this.transport.pause()
    } else if (this.paused && this.inbound.length === 0 && this.held.length < HELD_HIGH_WATER) {
      this.paused = false
      this.transport.resume?.()
    }
  }

  private settleRead(): void {
    const pending = this.pendingRead
    if (!pending) return

    const frame = this.takeFrame(pending.dataOnly)
    if (frame) {
      this.finishRead(pending)
      pending.resolve(frame)
    } else if (this.failure) {
      this.finishRead(pending)
      pending.reject(this.failure)
    } else if (this.readEnded) {
      this.finishRead(pending)
      pending.resolve(null)
    }
  }

  private finishRead(pending: PendingRead): void {
    if (pending.timer) clearTimeout(pending.timer)
    this.pendingRead = null
  }

  private handleData(chunk: Buffer): void {
    if (this.failure) return
    try {
      this.inbound.push(...this.decoder.push(chunk))
    } catch (err) {
      this.handleError(err instanceof TransportError ? err : new TransportError(errorMessage(err)))
      this.transport.destroy()
      return
    }

    this.settleRead()
    this.updateFlow()
  }

  private handleEnd(): void {
    this.readEnded = true
    this.settleRead()
    this.emitDisconnect()
  }

  private handleError(err: TransportError): void {
    if (!this.failure) this.failure = err
    this.settleRead()
    this.emitDisconnect()
  }

  private handleClose(): void {
    this.transportClosed = true
    this.readEnded = true
    if (this._state === 'Closing') this._state = 'Closed'
    this.settleRead()
    this.emitDisconnect()
  }

  private emitDisconnect(): void {
    if (this.disconnected) return
    this.disconnected = true
    this.emit('disconnect')
  }

  // --- Outbound (serialized) ---

  /**
   * Queues a frame behind every earlier write to this connection. Writers on
   * other handlers share this chain, so frames never interleave on the wire.
   */
  send(frame: Frame): Promise<void> {
    const result = this.writeChain.then(() => this.write(frame))
    this.writeChain = result.then(noop, noop)
    return result
  }

  sendText(text: string): Promise<void> {
    return this.send(textFrame(text))
  }

  /** Best-effort text delivery; resolves false when the write failed. */
  async notify(text: string): Promise<boolean> {
    try {
      await this.sendText(text)
      return true
    } catch (err) {
      if (err instanceof TransportError) return false
      throw err
    }
  }

  // A failed write leaves the connection Closing; nothing is retried.
  private write(frame: Frame): Promise<void> {
    if (this.transportClosed || this.failure) {
      this.markClosing()
      return Promise.reject(new TransportError(`Connection to ${this.label} is closed`))
    }
    const bytes = encodeFrame(frame)
    return new Promise((resolve, reject) => {
      this.transport.write(bytes, (err) => {
        if (err) {
          this.markClosing()
          reject(new TransportError(`Write to ${this.label} failed: ${err.message}`))
        } else {
          resolve()
        }
      })
    })
  }

  // --- Lifecycle ---

  /** Flushes queued writes, then releases the transport. */
  async close(): Promise<void> {
    if (this._state === 'Closed') return
    this.markClosing()
    await this.writeChain

    if (!this.transportClosed) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.transport.destroy()
          resolve()
        }, CLOSE_TIMEOUT_MS)
        this.transport.on('close', () => {
          clearTimeout(timer)
          resolve()
        })
        this.transport.end()
      })
    }
    this._state = 'Closed'
  }

  /** Sends a final notice (best-effort) and closes. */
  async shutdown(notice: string): Promise<void> {
    await this.notify(notice)
    await this.close()
  }
}
