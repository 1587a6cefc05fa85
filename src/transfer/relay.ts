import type { Connection } from '../relay/connection.js'
import type { Registry } from '../relay/registry.js'
import type { Frame } from '../protocol/types.js'
import { logNow, type EventSink } from '../log.js'
import { TransferError, TransportError } from '../errors.js'
import { notices, INVALID_FILE_SIZE, SELF_TRANSFER } from '../protocol/messages.js'
import { generateId, formatFileSize } from '../utils.js'
import { MAX_FILE_SIZE, type Transfer, type TransferRequest, type TransferState, type OfferAnswer } from './types.js'

export interface FileRelayConfig {
  registry: Registry<Connection>
  log: EventSink
  offerTimeoutMs?: number
  idleTimeoutMs?: number
}

interface Lane {
  ahead: Promise<void> | null
  release: () => void
}

interface PendingOffer {
  transfer: Transfer
  settle: (answer: OfferAnswer) => void
}

const DEFAULT_OFFER_TIMEOUT_MS = 30_000
const DEFAULT_IDLE_TIMEOUT_MS = 30_000
const PROGRESS_STEP = 0.05

/**
 * Streams one file at a time per sender through the server.
 *
 * relay() runs on the sender's handler and does not return until the
 * transfer is terminal, so the sender's next command waits for it. The
 * recipient answers through its own handler, which calls respond(); the
 * relay only ever reads from the sender.
 *
 * DATA frames carry no transfer id, so a recipient receives one stream at a
 * time: accepted transfers to a busy recipient wait in its lane.
 */
export class FileRelay {
  private registry: Registry<Connection>
  private log: EventSink
  private offerTimeoutMs: number
  private idleTimeoutMs: number
  private pendingOffers: Map<string, PendingOffer> = new Map()  // transfer id -> offer
  private active: Set<Transfer> = new Set()
  private idleWaiters: Set<() => void> = new Set()
  private lanes: Map<Connection, Promise<void>> = new Map()  // recipient -> tail of its queue

  constructor(config: FileRelayConfig) {
    this.registry = config.registry
    this.log = config.log
    this.offerTimeoutMs = config.offerTimeoutMs ?? DEFAULT_OFFER_TIMEOUT_MS
    this.idleTimeoutMs = config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS
  }

  get activeCount(): number {
    return this.active.size
  }

  /**
   * Validates and runs a transfer to a terminal state. Throws TransferError
   * only for requests rejected before an offer is made; every later outcome
   * is reported to the parties and reflected in the returned Transfer.
   */
  async relay(request: TransferRequest): Promise<Transfer> {
    const { sender, filename, size } = request
    if (!sender.isActive || !sender.identity) {
      throw new Error(`Connection ${sender.label} is not active`)
    }
    if (!Number.isInteger(size) || size < 1 || size > MAX_FILE_SIZE) {
      throw new TransferError(INVALID_FILE_SIZE)
    }
    if (request.recipient === sender.identity) {
      throw new TransferError(SELF_TRANSFER)
    }

    const recipient = this.registry.lookup(request.recipient)
    if (!recipient || !recipient.isActive) {
      throw new TransferError(notices.userOffline(request.recipient))
    }

    const now = Date.now()
    const transfer: Transfer = {
      id: generateId(),
      sender,
      recipient,
      filename,
      size,
      state: 'Offered',
      bytesMoved: 0,
      failureReason: null,
      createdAt: now,
      updatedAt: now
    }

    this.active.add(transfer)
    try {
      await this.run(transfer)
    } finally {
      this.active.delete(transfer)
      if (this.active.size === 0) this.wakeIdleWaiters()
    }
    return transfer
  }

  /**
   * Delivers a recipient's answer to a pending offer: the offer with the
   * given id, or the oldest offer addressed to that recipient.
   */
  respond(recipient: Connection, accept: boolean, transferId: string | null = null): boolean {
    for (const [id, offer] of this.pendingOffers) {
      if (offer.transfer.recipient !== recipient) continue
      if (transferId !== null && id !== transferId) continue
      offer.settle(accept ? 'accepted' : 'rejected')
      return true
    }
    return false
  }

  /** Resolves every offer waiting on this connection as if it disconnected. */
  cancelOffersTo(recipient: Connection): number {
    const offers = Array.from(this.pendingOffers.values()).filter(o => o.transfer.recipient === recipient)
    for (const offer of offers) {
      offer.settle('recipient-gone')
    }
    return offers.length
  }

  /** Waits until no transfer is in flight. Resolves false on timeout. */
  drain(timeoutMs: number): Promise<boolean> {
    if (this.active.size === 0) return Promise.resolve(true)
    return new Promise((resolve) => {
      const waiter = (): void => {
        clearTimeout(timer)
        resolve(true)
      }
      const timer = setTimeout(() => {
        this.idleWaiters.delete(waiter)
        resolve(false)
      }, timeoutMs)
      this.idleWaiters.add(waiter)
    })
  }

  private wakeIdleWaiters(): void {
    const waiters = Array.from(this.idleWaiters)
    this.idleWaiters.clear()
    for (const waiter of waiters) waiter()
  }

  private event(message: string): void {
    logNow(this.log, message)
  }

  private setState(transfer: Transfer, state: TransferState): void {
    transfer.state = state
    transfer.updatedAt = Date.now()
  }

  private async run(transfer: Transfer): Promise<void> {
    const { id, sender, recipient, filename, size } = transfer
    const from = sender.label
    const to = recipient.label

    this.event(`File offer ${id.slice(0, 8)}: ${from} -> ${to} (${filename}, ${formatFileSize(size)})`)

    // Registered before the offer is written so an immediate answer finds it
    const pending = this.awaitAnswer(transfer)
    if (!(await recipient.notify(notices.fileOffer(id, from, filename, size)))) {
      this.pendingOffers.get(id)?.settle('recipient-gone')
      await pending
      return this.fail(transfer, `${to} is unreachable`)
    }
    await sender.notify(notices.awaitingAnswer(to, filename))

    const answer = await pending
    switch (answer) {
      case 'accepted':
        break
      case 'rejected':
        this.setState(transfer, 'Rejected')
        await sender.notify(notices.declined(to, filename))
        this.event(`File offer ${id.slice(0, 8)} declined by ${to}`)
        return
      case 'timeout':
        this.setState(transfer, 'Rejected')
        await Promise.all([
          sender.notify(notices.noAnswer(to)),
          recipient.notify(notices.offerExpired(id, from))
        ])
        this.event(`File offer ${id.slice(0, 8)} to ${to} expired`)
        return
      case 'recipient-gone':
        this.setState(transfer, 'Rejected')
        await sender.notify(notices.userOffline(to))
        this.event(`File offer ${id.slice(0, 8)} dropped: ${to} left before answering`)
        return
      case 'sender-gone':
        return this.fail(transfer, `${from} left before ${to} answered`)
    }

    this.setState(transfer, 'Accepted')
    const lane = this.joinLane(recipient)
    try {
      if (lane.ahead) {
        this.event(`File transfer ${id.slice(0, 8)} queued behind another transfer to ${to}`)
        await sender.notify(notices.queued(to, filename))
        await lane.ahead
      }
      await this.deliver(transfer)
    } finally {
      lane.release()
    }
  }

  // ahead settles once every earlier accepted transfer to the recipient has ended.
  private joinLane(recipient: Connection): Lane {
    const ahead = this.lanes.get(recipient) ?? null

    let open: () => void = () => {}
    const current = new Promise<void>((resolve) => { open = resolve })
    const tail = ahead ? ahead.then(() => current) : current
    this.lanes.set(recipient, tail)

    return {
      ahead,
      release: () => {
        open()
        if (this.lanes.get(recipient) === tail) this.lanes.delete(recipient)
      }
    }
  }

  private async deliver(transfer: Transfer): Promise<void> {
    const { id, sender, recipient, filename, size } = transfer
    const from = sender.label
    const to = recipient.label

    if (sender.isDisconnected) {
      return this.fail(transfer, `${from} left while queued`)
    }
    if (!(await recipient.notify(notices.fileData(id, from, filename, size)))) {
      return this.fail(transfer, `${to} is unreachable`)
    }
    if (!(await sender.notify(notices.fileReady(id)))) {
      return this.fail(transfer, `${from} is unreachable`)
    }

    this.setState(transfer, 'Streaming')
    this.event(`File transfer ${id.slice(0, 8)} streaming: ${from} -> ${to} (${formatFileSize(size)})`)

    const failure = await this.stream(transfer)
    if (failure) {
      return this.fail(transfer, failure)
    }

    this.setState(transfer, 'Complete')
    await Promise.all([sender.notify(notices.transferComplete(id)), recipient.notify(notices.transferComplete(id))])
    this.event(`File transfer completed: ${from} -> ${to} (${filename})`)
  }

  // Returns a failure reason, or null once exactly `size` bytes were forwarded.
  private async stream(transfer: Transfer): Promise<string | null> {
    const { sender, recipient, size } = transfer
    let lastLogged = 0

    while (transfer.bytesMoved < size) {
      let frame: Frame | null
      try {
        frame = await sender.read({ dataOnly: true, timeoutMs: this.idleTimeoutMs })
      } catch (err) {
        if (err instanceof TransportError) return `reading from ${sender.label} failed: ${err.message}`
        throw err
      }

      if (!frame || frame.kind !== 'data') {
        return `${sender.label} disconnected after ${transfer.bytesMoved} of ${size} bytes`
      }
      const length = frame.data.byteLength
      if (length === 0) {
        return `${sender.label} ended the stream after ${transfer.bytesMoved} of ${size} bytes`
      }
      if (transfer.bytesMoved + length > size) {
        return `${sender.label} sent more than the declared ${size} bytes`
      }

      try {
        await recipient.send(frame)
      } catch (err) {
        if (err instanceof TransportError) return `forwarding to ${recipient.label} failed: ${err.message}`
        throw err
      }

      transfer.bytesMoved += length
      transfer.updatedAt = Date.now()

      if (transfer.bytesMoved - lastLogged > size * PROGRESS_STEP) {
        const percent = Math.floor((transfer.bytesMoved * 100) / size)
        this.event(`File transfer ${transfer.id.slice(0, 8)}: ${percent}% complete`)
        lastLogged = transfer.bytesMoved
      }
    }

    return null
  }

  private async fail(transfer: Transfer, reason: string): Promise<void> {
    transfer.failureReason = reason
    this.setState(transfer, 'Failed')
    const notice = notices.transferFailed(transfer.id)
    await Promise.all([transfer.sender.notify(notice), transfer.recipient.notify(notice)])
    this.event(`File transfer failed: ${transfer.sender.label} -> ${transfer.recipient.label} (${reason})`)
  }

  private awaitAnswer(transfer: Transfer): Promise<OfferAnswer> {
    const { sender, recipient } = transfer
    if (recipient.isDisconnected) return Promise.resolve('recipient-gone')
    if (sender.isDisconnected) return Promise.resolve('sender-gone')

    return new Promise((resolve) => {
      const onRecipientGone = (): void => settle('recipient-gone')
      const onSenderGone = (): void => settle('sender-gone')
      const timer = setTimeout(() => settle('timeout'), this.offerTimeoutMs)

      const settle = (answer: OfferAnswer): void => {
        if (!this.pendingOffers.delete(transfer.id)) return
        clearTimeout(timer)
        recipient.off('disconnect', onRecipientGone)
        sender.off('disconnect', onSenderGone)
        resolve(answer)
      }

      recipient.once('disconnect', onRecipientGone)
      sender.once('disconnect', onSenderGone)
      this.pendingOffers.set(transfer.id, { transfer, settle })
    })
  }
}
