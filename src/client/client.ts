import net from 'node:net'
import { EventEmitter } from 'node:events'
import b4a from 'b4a'
import { Connection, type Transport } from '../relay/connection.js'
import { dataFrame, CHUNK_SIZE } from '../protocol/frame.js'
import {
  notices,
  parseFileData,
  parseFileOffer,
  parseFileReady,
  parseTransferOutcome,
  parseActiveUsers,
  type FileDataNotice,
  type FileOfferNotice
} from '../protocol/messages.js'
import { AuthError, ProtocolError, RoutingError, TransferError, TransportError } from '../errors.js'
import { errorMessage } from '../utils.js'
import { saveReceivedFile, type SavedFile } from './downloads.js'

export interface RelayClientOptions {
  downloadDir?: string      // received files are saved under <downloadDir>/<identity>/
  replyTimeoutMs?: number
  transferTimeoutMs?: number  // covers the recipient's answer and the whole stream
}

export interface ReceivedFile extends FileDataNotice {
  data: Buffer
  saved: SavedFile | null
}

export interface FailedFile extends FileDataNotice {
  reason: string
}

export interface RelayClientEvents {
  'message': (text: string) => void
  'file-offer': (offer: FileOfferNotice) => void
  'file-received': (file: ReceivedFile) => void
  'file-failed': (file: FailedFile) => void
  'close': () => void
}

interface Waiter {
  match: (text: string) => boolean
  resolve: (text: string) => void
  reject: (err: Error) => void
  timer: ReturnType<typeof setTimeout>
}

interface IncomingFile {
  notice: FileDataNotice
  chunks: Buffer[]
  received: number
}

const DEFAULT_REPLY_TIMEOUT_MS = 10_000
const DEFAULT_TRANSFER_TIMEOUT_MS = 120_000

/**
 * Client side of the relay protocol. Every notice from the server is emitted
 * as 'message'; file offers and incoming files also get their own events.
 */
export class RelayClient extends EventEmitter {
  readonly done: Promise<void>
  private connection: Connection
  private options: RelayClientOptions
  private waiters: Set<Waiter> = new Set()
  private incoming: IncomingFile | null = null
  private _identity: string | null = null
  private closed = false

  constructor(transport: Transport, options: RelayClientOptions = {}) {
    super()
    this.connection = new Connection(transport)
    this.options = options
    this.done = this.pump()
  }

  static connect(host: string, port: number, options: RelayClientOptions = {}): Promise<RelayClient> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port })
      socket.once('error', reject)
      socket.once('connect', () => {
        socket.off('error', reject)
        socket.setNoDelay(true)
        resolve(new RelayClient(socket, options))
      })
    })
  }

  get identity(): string | null {
    return this._identity
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Claims an identity. Resolves with the welcome banner. */
  async login(identity: string): Promise<string> {
    const welcome = notices.welcome(identity.trim())
    const reply = await this.request(identity, text => text === welcome || text.startsWith('ERROR:'))
    if (reply !== welcome) throw new AuthError(reply)
    this._identity = identity.trim()
    return reply
  }

  /** Sends one raw command line. Broadcasts are plain text. */
  send(text: string): Promise<void> {
    return this.connection.sendText(text)
  }

  async list(): Promise<string[]> {
    const reply = await this.request('/list', text => parseActiveUsers(text) !== null)
    return parseActiveUsers(reply) ?? []
  }

  /** Sends a direct message. Resolves with the server's echo. */
  async message(target: string, text: string): Promise<string> {
    const echo = notices.privateOut(target, text.trim())
    const reply = await this.request(`@${target} ${text}`, r => r === echo || r.startsWith('ERROR:'))
    if (reply === echo) return reply
    if (reply === notices.userNotFound(target)) throw new RoutingError(reply)
    throw new ProtocolError(reply)
  }

  /**
   * Offers a file and waits for the recipient's answer. Resolves with the
   * transfer id once the server is ready for chunks.
   */
  async offerFile(target: string, filename: string, size: number): Promise<string> {
    const declined = notices.declined(target, filename)
    const reply = await this.request(
      `/sendfile ${target} ${filename} ${size}`,
      text => parseFileReady(text) !== null || text === declined || text.startsWith('ERROR:'),
      this.transferTimeout
    )
    const id = parseFileReady(reply)
    if (id === null) throw new TransferError(reply)
    return id
  }

  /** Sends one chunk of an accepted transfer. An empty chunk ends the stream early. */
  submitChunk(chunk: Uint8Array): Promise<void> {
    if (chunk.byteLength > CHUNK_SIZE) {
      return Promise.reject(new RangeError(`Chunk of ${chunk.byteLength} bytes exceeds ${CHUNK_SIZE}`))
    }
    return this.connection.send(dataFrame(chunk))
  }

  /** offerFile, then every chunk, then the server's verdict. */
  async sendFile(target: string, filename: string, data: Uint8Array): Promise<void> {
    const id = await this.offerFile(target, filename, data.byteLength)
    const [verdict] = await Promise.all([
      this.waitFor(text => parseTransferOutcome(text)?.id === id, this.transferTimeout),
      this.streamChunks(data)
    ])
    if (!parseTransferOutcome(verdict)?.complete) throw new TransferError(verdict)
  }

  acceptFile(transferId?: string): Promise<void> {
    return this.send(transferId ? `/accept_file ${transferId}` : '/accept_file')
  }

  rejectFile(transferId?: string): Promise<void> {
    return this.send(transferId ? `/reject_file ${transferId}` : '/reject_file')
  }

  async quit(): Promise<void> {
    if (this.closed) return
    const identity = this._identity
    if (identity) {
      await this.request('/quit', text => text === notices.goodbye(identity))
    }
    await this.close()
  }

  async close(): Promise<void> {
    await this.connection.close()
    await this.done
  }

  /** Resolves with the next notice that matches. Only notices arriving after the call count. */
  waitFor(match: (text: string) => boolean, timeoutMs: number = this.replyTimeout): Promise<string> {
    if (this.closed) return Promise.reject(new TransportError('Connection closed'))

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        match,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.delete(waiter)
          reject(new TransportError(`No matching reply within ${timeoutMs}ms`))
        }, timeoutMs)
      }
      this.waiters.add(waiter)
    })
  }

  private get replyTimeout(): number {
    return this.options.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS
  }

  private get transferTimeout(): number {
    return this.options.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT_MS
  }

  private async request(text: string, match: (reply: string) => boolean, timeoutMs?: number): Promise<string> {
    const [reply] = await Promise.all([this.waitFor(match, timeoutMs), this.send(text)])
    return reply
  }

  private async streamChunks(data: Uint8Array): Promise<void> {
    for (let offset = 0; offset < data.byteLength; offset += CHUNK_SIZE) {
      await this.submitChunk(data.subarray(offset, offset + CHUNK_SIZE))
    }
  }

  private async pump(): Promise<void> {
    let reason = 'Connection closed'
    try {
      for (;;) {
        const frame = await this.connection.read()
        if (!frame) break
        if (frame.kind === 'data') {
          this.handleChunk(frame.data)
        } else {
          this.handleText(frame.text)
        }
      }
    } catch (err) {
      reason = errorMessage(err)
    }

    this.closed = true
    this.failIncoming(reason)
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer)
      waiter.reject(new TransportError(reason))
    }
    this.waiters.clear()
    this.emit('close')
  }

  private handleText(text: string): void {
    const offer = parseFileOffer(text)
    if (offer) this.emit('file-offer', offer)

    const data = parseFileData(text)
    const outcome = parseTransferOutcome(text)
    if (data) {
      this.failIncoming('Superseded by another transfer')
      this.incoming = { notice: data, chunks: [], received: 0 }
    } else if (outcome && outcome.id === this.incoming?.notice.id) {
      if (outcome.complete) {
        this.finishIncoming()
      } else {
        this.failIncoming(text)
      }
    }

    this.emit('message', text)
    for (const waiter of this.waiters) {
      if (!waiter.match(text)) continue
      this.waiters.delete(waiter)
      clearTimeout(waiter.timer)
      waiter.resolve(text)
    }
  }

  private handleChunk(chunk: Buffer): void {
    if (!this.incoming) return
    this.incoming.chunks.push(chunk)
    this.incoming.received += chunk.byteLength
  }

  private finishIncoming(): void {
    const incoming = this.incoming
    if (!incoming) return
    if (incoming.received !== incoming.notice.size) {
      this.failIncoming(`Received ${incoming.received} of ${incoming.notice.size} bytes`)
      return
    }
    this.incoming = null

    const data = b4a.concat(incoming.chunks)
    let saved: SavedFile | null = null
    if (this.options.downloadDir && this._identity) {
      try {
        saved = saveReceivedFile(this.options.downloadDir, this._identity, incoming.notice.from, incoming.notice.filename, data)
      } catch (err) {
        this.emit('file-failed', { ...incoming.notice, reason: `Could not save file: ${errorMessage(err)}` })
        return
      }
    }
    this.emit('file-received', { ...incoming.notice, data, saved })
  }

  private failIncoming(reason: string): void {
    const incoming = this.incoming
    if (!incoming) return
    this.incoming = null
    this.emit('file-failed', { ...incoming.notice, reason })
  }
}
